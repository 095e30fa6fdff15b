export type Point = {
  x: number;
  y: number;
};

export type Coordinate = {
  row: number;
  col: number;
};

// Half-open: draws land in [start, end).
export type NumberRange = {
  start: number;
  end: number;
};

export const coordinateKey = (coordinate: Coordinate): string => `${coordinate.row},${coordinate.col}`;

export const compareCoordinates = (a: Coordinate, b: Coordinate): number => {
  return a.row === b.row ? a.col - b.col : a.row - b.row;
};
