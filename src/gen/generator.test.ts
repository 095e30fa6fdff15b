import { describe, expect, it } from "vitest";
import { createTileMatrix } from "../world/grid";
import { defaultEnvironmentalConditions } from "../world/environment";
import { checkWorld } from "../world/stats";
import { isWalkable } from "../world/tile-properties";
import { DEFAULT_SPAWN_ORDER, defaultGeneratorConfig, resolveGeneratorConfig } from "./config";
import type { GeneratorConfig } from "./config";
import { digestWorld } from "./digest";
import { ConfigurationError } from "./errors";
import { canTransition, dedupeSpawnOrder, findSpawnPoint, generateWorld, WorldGenerator } from "./generator";

const quickConfig = (seed: number, overrides: Partial<GeneratorConfig> = {}): GeneratorConfig => ({
  ...resolveGeneratorConfig(100, { noise: { seed, octaves: 4 }, roads: { minElevation: -1 } }),
  ...overrides
});

describe("dedupeSpawnOrder", () => {
  it("keeps the first occurrence of each kind", () => {
    expect(dedupeSpawnOrder(["lava", "roads", "lava", "fire", "roads"])).toEqual(["lava", "roads", "fire"]);
  });
});

describe("findSpawnPoint", () => {
  it("returns the first walkable tile in row-major order", () => {
    const tiles = createTileMatrix(3, "deep-water");
    tiles[2][0].terrain = "grass";
    tiles[1][2].terrain = "sand";
    expect(findSpawnPoint(tiles)).toEqual({ row: 1, col: 2 });
  });

  it("falls back to the origin", () => {
    expect(findSpawnPoint(createTileMatrix(3, "lava"))).toEqual({ row: 0, col: 0 });
  });
});

describe("canTransition", () => {
  it("only allows the generation order", () => {
    expect(canTransition("idle", "elevation-ready")).toBe(true);
    expect(canTransition("idle", "terrain-classified")).toBe(false);
    expect(canTransition("terrain-classified", "lava-placed")).toBe(true);
    expect(canTransition("blobs-placed", "blobs-placed")).toBe(true);
    expect(canTransition("terrain-classified", "spawn-point-resolved")).toBe(true);
    expect(canTransition("spawn-point-resolved", "done")).toBe(true);
    expect(canTransition("done", "idle")).toBe(false);
  });
});

describe("WorldGenerator", () => {
  it("rejects a world smaller than 100 before generating", () => {
    const generator = new WorldGenerator({ ...quickConfig(1), size: 60 });
    expect(() => generator.generate()).toThrow(ConfigurationError);
  });

  it("builds a consistent world", () => {
    const world = generateWorld(quickConfig(1234));
    expect(world.tiles).toHaveLength(100);
    expect(world.tiles.every((row) => row.length === 100)).toBe(true);
    expect(world.elevation).toHaveLength(100);
    expect(checkWorld(world.tiles)).toBe(true);
    expect(world.phases).toEqual(DEFAULT_SPAWN_ORDER);
    expect(world.conditions).toEqual(defaultEnvironmentalConditions());
    expect(world.stages.slice(0, 2)).toEqual(["elevation-ready", "terrain-classified"]);
    expect(world.stages.slice(-2)).toEqual(["spawn-point-resolved", "done"]);
    expect(world.stages).toHaveLength(DEFAULT_SPAWN_ORDER.length + 4);
    expect(world.spawn).toEqual(findSpawnPoint(world.tiles));
    expect(isWalkable(world.tiles[world.spawn.row][world.spawn.col].terrain)).toBe(true);
    expect(world.reports.roads).toBeGreaterThan(0);
  });

  it("builds worlds from the default settings", () => {
    for (const seed of [0, 1, 2]) {
      const world = generateWorld(defaultGeneratorConfig(100, seed));
      expect(checkWorld(world.tiles)).toBe(true);
      expect(world.reports.roads).toBeGreaterThan(0);
      expect(world.tiles.flat().some((tile) => tile.terrain === "street")).toBe(true);
    }
  });

  it("is reproducible for a fixed seed", () => {
    const first = generateWorld(quickConfig(99));
    const second = generateWorld(quickConfig(99));
    expect(digestWorld(second)).toBe(digestWorld(first));
    expect(second.tiles).toEqual(first.tiles);
  });

  it("runs each kind once, in order", () => {
    const world = generateWorld(quickConfig(5, { spawnOrder: ["garbage", "coins", "garbage"] }));
    expect(world.phases).toEqual(["garbage", "coins"]);
    expect(world.stages).toEqual([
      "elevation-ready",
      "terrain-classified",
      "garbage-placed",
      "content-scattered",
      "spawn-point-resolved",
      "done"
    ]);
    const kinds = new Set(world.tiles.flat().map((tile) => tile.content.kind));
    expect([...kinds].every((kind) => kind === "none" || kind === "garbage" || kind === "coin")).toBe(true);
    expect(world.tiles.flat().some((tile) => tile.terrain === "street" || tile.terrain === "lava")).toBe(false);
  });

  it("places no content when the spawn order is empty", () => {
    const world = generateWorld(quickConfig(5, { spawnOrder: [] }));
    expect(world.tiles.flat().every((tile) => tile.content.kind === "none")).toBe(true);
    expect(world.reports).toEqual({});
  });
});
