import { describe, expect, it } from "vitest";
import type { Point } from "../../types";
import { GeometryError } from "../errors";
import { buildVoronoiCells, clipPolygonWithBisector } from "./voronoi";

const area = (polygon: Point[]): number => {
  let sum = 0;
  for (let i = 0; i < polygon.length; i += 1) {
    const a = polygon[i];
    const b = polygon[(i + 1) % polygon.length];
    sum += a.x * b.y - b.x * a.y;
  }
  return Math.abs(sum) / 2;
};

describe("clipPolygonWithBisector", () => {
  it("keeps the half nearer the site", () => {
    const square = [
      { x: 0, y: 0 },
      { x: 10, y: 0 },
      { x: 10, y: 10 },
      { x: 0, y: 10 }
    ];
    const clipped = clipPolygonWithBisector(square, { x: 2, y: 5 }, { x: 8, y: 5 });
    expect(area(clipped)).toBeCloseTo(50);
    expect(Math.max(...clipped.map((point) => point.x))).toBeCloseTo(5);
  });
});

describe("buildVoronoiCells", () => {
  it("needs at least three sites", () => {
    expect(() => buildVoronoiCells([{ x: 1, y: 1 }, { x: 5, y: 5 }], 10, 10)).toThrow(GeometryError);
  });

  it("splits the box into one cell per site", () => {
    const sites = [
      { x: 2.5, y: 2.5 },
      { x: 7.5, y: 2.5 },
      { x: 2.5, y: 7.5 },
      { x: 7.5, y: 7.5 }
    ];
    const cells = buildVoronoiCells(sites, 10, 10);
    expect(cells).toHaveLength(4);
    for (const cell of cells) {
      expect(area(cell.polygon)).toBeCloseTo(25);
    }
    const first = cells[0].polygon;
    expect(Math.max(...first.map((point) => point.x))).toBeCloseTo(5);
    expect(Math.max(...first.map((point) => point.y))).toBeCloseTo(5);
  });
});
