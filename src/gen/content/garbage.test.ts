import { describe, expect, it } from "vitest";
import { createRng } from "../../util/random";
import { createTileMatrix } from "../../world/grid";
import type { TileMatrix } from "../../world/types";
import { defaultGarbageSettings } from "../config";
import type { GarbageSettings } from "../config";
import { buildRingMatrix, spawnGarbage } from "./garbage";

const settings = (overrides: Partial<GarbageSettings>): GarbageSettings => ({
  ...defaultGarbageSettings(100),
  ...overrides
});

const garbageOnTiles = (tiles: TileMatrix): number[] => {
  const quantities: number[] = [];
  for (const row of tiles) {
    for (const tile of row) {
      if (tile.content.kind === "garbage") {
        quantities.push(tile.content.quantity);
      }
    }
  }
  return quantities;
};

describe("buildRingMatrix", () => {
  it("decreases from the centre outwards", () => {
    expect(buildRingMatrix(3, 1, 0.5)).toEqual([
      [0.5, 0.5, 0.5],
      [0.5, 1, 0.5],
      [0.5, 0.5, 0.5]
    ]);
  });

  it("grows even diameters to the next odd size", () => {
    const matrix = buildRingMatrix(4, 0.8, 0.25);
    expect(matrix).toHaveLength(5);
    expect(matrix[2][2]).toBeCloseTo(0.8);
    expect(matrix[1][3]).toBeCloseTo(0.6);
    expect(matrix[0][4]).toBeCloseTo(0.4);
  });

  it("never goes below zero", () => {
    const matrix = buildRingMatrix(7, 0.5, 0.5);
    expect(matrix[0][0]).toBe(0);
  });
});

describe("spawnGarbage", () => {
  it("places nothing for a zero total", () => {
    const tiles = createTileMatrix(100, "grass");
    expect(spawnGarbage(tiles, settings({ totalQuantity: 0 }), createRng(1))).toBe(0);
    expect(garbageOnTiles(tiles)).toEqual([]);
  });

  it("reaches the requested total exactly", () => {
    const tiles = createTileMatrix(100, "grass");
    const placed = spawnGarbage(tiles, settings({ totalQuantity: 50, maxPiles: 400 }), createRng(2));
    expect(placed).toBe(50);
    const quantities = garbageOnTiles(tiles);
    expect(quantities.reduce((sum, value) => sum + value, 0)).toBe(50);
    for (const quantity of quantities) {
      expect(quantity).toBeGreaterThanOrEqual(1);
      expect(quantity).toBeLessThanOrEqual(3);
    }
  });

  it("gives up after the pile cap when nothing can hold garbage", () => {
    const tiles = createTileMatrix(100, "deep-water");
    expect(spawnGarbage(tiles, settings({ totalQuantity: 10, maxPiles: 20 }), createRng(3))).toBe(0);
    expect(garbageOnTiles(tiles)).toEqual([]);
  });

  it("leaves occupied tiles alone", () => {
    const tiles = createTileMatrix(100, "grass");
    for (const row of tiles) {
      for (const tile of row) {
        tile.content = { kind: "coin", quantity: 1 };
      }
    }
    expect(spawnGarbage(tiles, settings({ totalQuantity: 5, maxPiles: 10 }), createRng(4))).toBe(0);
  });
});
