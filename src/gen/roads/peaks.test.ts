import { describe, expect, it } from "vitest";
import type { ElevationField } from "../elevation";
import { findPeaks, mergePeaks, sliceBounds } from "./peaks";

const zeros = (size: number): ElevationField => Array.from({ length: size }, () => new Array<number>(size).fill(0));

describe("sliceBounds", () => {
  it("gives the remainder to the last slice", () => {
    expect(sliceBounds(10, 3)).toEqual([
      { start: 0, end: 3 },
      { start: 3, end: 6 },
      { start: 6, end: 10 }
    ]);
  });
});

describe("findPeaks", () => {
  const field: ElevationField = [
    [1, 2, 0, 0],
    [0, 5, 0, 7],
    [0, 0, 3, 0],
    [9, 0, 0, 3]
  ];

  it("takes the highest cell of each slice, later cell on ties", () => {
    expect(findPeaks(field, 2, 0)).toEqual([
      { row: 1, col: 1 },
      { row: 1, col: 3 },
      { row: 3, col: 0 },
      { row: 3, col: 3 }
    ]);
  });

  it("drops peaks not above the cutoff", () => {
    expect(findPeaks(field, 2, 5)).toEqual([
      { row: 1, col: 3 },
      { row: 3, col: 0 }
    ]);
  });
});

describe("mergePeaks", () => {
  it("drops the lower of two peaks crowding a boundary", () => {
    const field = zeros(10);
    field[2][4] = 9;
    field[7][5] = 5;
    field[1][1] = 8;
    const peaks = [
      { row: 2, col: 4 },
      { row: 7, col: 5 },
      { row: 1, col: 1 }
    ];
    expect(mergePeaks(field, peaks, 2, 2)).toEqual([
      { row: 2, col: 4 },
      { row: 1, col: 1 }
    ]);
  });

  it("thins each band independently", () => {
    const field = zeros(10);
    field[2][4] = 4;
    field[5][8] = 6;
    const peaks = [
      { row: 2, col: 4 },
      { row: 5, col: 8 }
    ];
    expect(mergePeaks(field, peaks, 2, 2)).toEqual(peaks);
  });
});
