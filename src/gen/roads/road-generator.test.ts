import { describe, expect, it } from "vitest";
import { createTileMatrix } from "../../world/grid";
import type { ElevationField } from "../elevation";
import { GeometryError } from "../errors";
import { collectEdges, placeRoads, RoadNetworkGenerator, roadEdgeKey } from "./road-generator";

const peakField = (size: number, peaks: [number, number][]): ElevationField => {
  const field = Array.from({ length: size }, () => new Array<number>(size).fill(0));
  for (const [row, col] of peaks) {
    field[row][col] = 1;
  }
  return field;
};

const gridPeaks: [number, number][] = [
  [5, 5],
  [5, 15],
  [5, 25],
  [15, 5],
  [15, 15],
  [15, 25],
  [25, 5],
  [25, 15],
  [25, 25]
];

describe("roadEdgeKey", () => {
  it("ignores endpoint order", () => {
    const a = { row: 3, col: 9 };
    const b = { row: 1, col: 4 };
    expect(roadEdgeKey(a, b)).toBe("1,4|3,9");
    expect(roadEdgeKey(b, a)).toBe("1,4|3,9");
  });
});

describe("collectEdges", () => {
  it("truncates, snaps to the border and dedupes", () => {
    const polygon = [
      { x: 0.5, y: 0.5 },
      { x: 9.2, y: 0.4 },
      { x: 9.7, y: 9.9 }
    ];
    const site = { x: 5, y: 3 };
    const edges = collectEdges(
      [
        { site, polygon },
        { site, polygon }
      ],
      11
    );
    expect(edges).toEqual([
      { start: { row: 0, col: 0 }, end: { row: 0, col: 10 } },
      { start: { row: 0, col: 10 }, end: { row: 10, col: 10 } },
      { start: { row: 0, col: 0 }, end: { row: 10, col: 10 } }
    ]);
  });

  it("merges a shared vertex that neighbouring cells place either side of an integer", () => {
    const edges = collectEdges(
      [
        { site: { x: 15, y: 5 }, polygon: [{ x: 10, y: 10 }, { x: 25, y: 14.9999999999 }] },
        { site: { x: 15, y: 20 }, polygon: [{ x: 25, y: 15.0000000001 }, { x: 10.0000000002, y: 10 }] }
      ],
      40
    );
    expect(edges).toEqual([{ start: { row: 10, col: 10 }, end: { row: 15, col: 25 } }]);
  });
});

describe("RoadNetworkGenerator", () => {
  it("rasterizes connected paths inside the field", () => {
    const field = peakField(30, gridPeaks);
    const network = new RoadNetworkGenerator(field, { sliceCount: 3, minElevation: 0.5, bandwidth: 0 }).generate();
    expect(network.peaks).toHaveLength(9);
    expect(network.paths.length).toBeGreaterThan(0);
    for (const path of network.paths) {
      for (let i = 0; i < path.length; i += 1) {
        expect(path[i].row).toBeGreaterThanOrEqual(0);
        expect(path[i].row).toBeLessThan(30);
        expect(path[i].col).toBeGreaterThanOrEqual(0);
        expect(path[i].col).toBeLessThan(30);
        if (i > 0) {
          const distance = Math.abs(path[i].row - path[i - 1].row) + Math.abs(path[i].col - path[i - 1].col);
          expect(distance).toBe(1);
        }
      }
    }
    const keys = network.edges.map((edge) => roadEdgeKey(edge.start, edge.end));
    expect(new Set(keys).size).toBe(keys.length);
  });

  it("fails when fewer than three peaks survive", () => {
    const field = peakField(30, [[5, 5]]);
    const generator = new RoadNetworkGenerator(field, { sliceCount: 3, minElevation: 0.5, bandwidth: 0 });
    expect(() => generator.generate()).toThrow(GeometryError);
  });
});

describe("placeRoads", () => {
  it("turns path tiles into street and clears what a street cannot hold", () => {
    const tiles = createTileMatrix(5, "grass");
    tiles[0][1].content = { kind: "tree", quantity: 3 };
    tiles[0][2].content = { kind: "coin", quantity: 2 };
    const touched = placeRoads(tiles, [
      [
        { row: 0, col: 0 },
        { row: 0, col: 1 },
        { row: 0, col: 2 }
      ],
      [
        { row: 0, col: 2 },
        { row: 1, col: 2 }
      ]
    ]);
    expect(touched).toBe(4);
    expect(tiles[0][1]).toEqual({ terrain: "street", content: { kind: "none" } });
    expect(tiles[0][2]).toEqual({ terrain: "street", content: { kind: "coin", quantity: 2 } });
    expect(tiles[1][2].terrain).toBe("street");
    expect(tiles[1][1].terrain).toBe("grass");
  });

  it("covers the corners of the field on a generated network", () => {
    const field = peakField(30, gridPeaks);
    const tiles = createTileMatrix(30, "grass");
    const network = new RoadNetworkGenerator(field, { sliceCount: 3, minElevation: 0.5, bandwidth: 0 }).generate();
    placeRoads(tiles, network.paths);
    expect(tiles[0][0].terrain).toBe("street");
    expect(tiles[29][29].terrain).toBe("street");
  });
});
