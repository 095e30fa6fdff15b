import { coordinateKey } from "../../types";
import type { Coordinate } from "../../types";
import type { ElevationField } from "../elevation";

export type SliceBounds = {
  start: number;
  end: number;
};

/** Splits `[0, length)` into `count` slices; the last absorbs the remainder. */
export const sliceBounds = (length: number, count: number): SliceBounds[] => {
  const span = Math.floor(length / count);
  const slices: SliceBounds[] = [];
  for (let i = 0; i < count; i += 1) {
    slices.push({ start: i * span, end: i === count - 1 ? length : (i + 1) * span });
  }
  return slices;
};

/**
 * Highest cell of each slice (ties go to the later cell in row-major order), kept only when it
 * rises above `minElevation`.
 */
export const findPeaks = (field: ElevationField, sliceCount: number, minElevation: number): Coordinate[] => {
  const rows = sliceBounds(field.length, sliceCount);
  const cols = sliceBounds(field[0]?.length ?? 0, sliceCount);
  const peaks: Coordinate[] = [];

  for (const rowSlice of rows) {
    for (const colSlice of cols) {
      let best: Coordinate | null = null;
      let bestValue = -Infinity;
      for (let row = rowSlice.start; row < rowSlice.end; row += 1) {
        for (let col = colSlice.start; col < colSlice.end; col += 1) {
          if (field[row][col] >= bestValue) {
            bestValue = field[row][col];
            best = { row, col };
          }
        }
      }
      if (best && bestValue > minElevation) {
        peaks.push(best);
      }
    }
  }

  return peaks;
};

const thinBand = (
  field: ElevationField,
  band: Coordinate[],
  axis: (peak: Coordinate) => number,
  bandwidth: number,
  removed: Set<string>
): void => {
  const ordered = [...band].sort((a, b) => field[b.row][b.col] - field[a.row][a.col]);
  const kept: Coordinate[] = [];
  for (const peak of ordered) {
    if (kept.some((higher) => Math.abs(axis(higher) - axis(peak)) <= bandwidth)) {
      removed.add(coordinateKey(peak));
    } else {
      kept.push(peak);
    }
  }
};

/**
 * Thins peaks that crowd an interior slice boundary: inside each band, a peak within `bandwidth`
 * (across the boundary) of a higher kept peak is dropped. Peaks away from every boundary survive.
 */
export const mergePeaks = (
  field: ElevationField,
  peaks: Coordinate[],
  sliceCount: number,
  bandwidth: number
): Coordinate[] => {
  const span = Math.floor(field.length / sliceCount);
  const half = Math.floor(bandwidth / 2);
  const removed = new Set<string>();
  const alive = (peak: Coordinate): boolean => !removed.has(coordinateKey(peak));

  for (let index = 1; index < sliceCount; index += 1) {
    const boundary = index * span;
    const vertical = peaks.filter((peak) => alive(peak) && Math.abs(peak.col - boundary) <= half);
    thinBand(field, vertical, (peak) => peak.col, bandwidth, removed);
    const horizontal = peaks.filter((peak) => alive(peak) && Math.abs(peak.row - boundary) <= half);
    thinBand(field, horizontal, (peak) => peak.row, bandwidth, removed);
  }

  return peaks.filter(alive);
};
