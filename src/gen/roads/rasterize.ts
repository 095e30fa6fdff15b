import type { Coordinate } from "../../types";

/**
 * Grid cells from `start` to `end`. Diagonal moves are split with an orthogonal cell so that
 * consecutive cells always share a side.
 */
export const rasterizeEdge = (start: Coordinate, end: Coordinate): Coordinate[] => {
  const dRow = end.row - start.row;
  const dCol = end.col - start.col;
  const steps = Math.max(Math.abs(dRow), Math.abs(dCol));
  const points: Coordinate[] = [{ row: start.row, col: start.col }];

  for (let i = 1; i <= steps; i += 1) {
    const next = {
      row: start.row + Math.round((i * dRow) / steps),
      col: start.col + Math.round((i * dCol) / steps)
    };
    const prev = points[points.length - 1];
    if (next.row !== prev.row && next.col !== prev.col) {
      points.push({ row: prev.row, col: next.col });
    }
    if (next.row !== prev.row || next.col !== prev.col) {
      points.push(next);
    }
  }

  return points;
};

export const snapToBorder = (value: number, max: number, distance: number): number => {
  if (value >= max - distance) {
    return max;
  }
  if (value <= distance) {
    return 0;
  }
  return value;
};
