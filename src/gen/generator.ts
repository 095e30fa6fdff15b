import { coordinateKey } from "../types";
import type { Coordinate } from "../types";
import { Logger } from "../util/logger";
import { seededRng } from "../util/random";
import { defaultEnvironmentalConditions } from "../world/environment";
import { isWalkable } from "../world/tile-properties";
import type { EnvironmentalConditions, GenerationStage, SpawnKind, TileMatrix } from "../world/types";
import type { GeneratorConfig } from "./config";
import { spawnBlobs } from "./content/blob";
import { spawnGarbage } from "./content/garbage";
import { spawnCoins, spawnRocks, spawnStorage } from "./content/scatter";
import { generateElevationField } from "./elevation";
import type { ElevationField } from "./elevation";
import { WorldGenError } from "./errors";
import { spawnLava } from "./lava";
import { placeRoads, RoadNetworkGenerator } from "./roads/road-generator";
import { classifyTerrain } from "./terrain";
import { validateGeneratorConfig } from "./validation";

const log = Logger.scope("WORLDGEN");

export type GeneratedWorld = {
  tiles: TileMatrix;
  spawn: Coordinate;
  conditions: EnvironmentalConditions;
  elevation: ElevationField;
  stages: GenerationStage[];
  phases: SpawnKind[];
  /** Tiles touched per phase; garbage reports the quantity placed. */
  reports: Partial<Record<SpawnKind, number>>;
};

const PHASE_STAGE: Record<SpawnKind, GenerationStage> = {
  roads: "roads-placed",
  lava: "lava-placed",
  fire: "blobs-placed",
  trees: "blobs-placed",
  garbage: "garbage-placed",
  rocks: "content-scattered",
  coins: "content-scattered",
  bins: "content-scattered",
  crates: "content-scattered",
  banks: "content-scattered"
};

const phaseStages = new Set<GenerationStage>(Object.values(PHASE_STAGE));

export const canTransition = (from: GenerationStage, to: GenerationStage): boolean => {
  switch (from) {
    case "idle":
      return to === "elevation-ready";
    case "elevation-ready":
      return to === "terrain-classified";
    case "spawn-point-resolved":
      return to === "done";
    case "done":
      return false;
    default:
      return phaseStages.has(to) || to === "spawn-point-resolved";
  }
};

class StageTracker {
  private current: GenerationStage = "idle";
  readonly history: GenerationStage[] = [];

  advance(next: GenerationStage): void {
    if (!canTransition(this.current, next)) {
      throw new WorldGenError(`Invalid stage transition: ${this.current} -> ${next}`);
    }
    log.debug(`stage ${this.current} -> ${next}`);
    this.current = next;
    this.history.push(next);
  }
}

/** Keeps the first occurrence of each kind, in order. */
export const dedupeSpawnOrder = (order: readonly SpawnKind[]): SpawnKind[] => {
  const seen = new Set<SpawnKind>();
  const unique: SpawnKind[] = [];
  for (const kind of order) {
    if (!seen.has(kind)) {
      seen.add(kind);
      unique.push(kind);
    }
  }
  return unique;
};

/** First walkable tile in row-major order, or the origin when none is walkable. */
export const findSpawnPoint = (tiles: TileMatrix): Coordinate => {
  for (let row = 0; row < tiles.length; row += 1) {
    for (let col = 0; col < tiles[row].length; col += 1) {
      if (isWalkable(tiles[row][col].terrain)) {
        return { row, col };
      }
    }
  }
  return { row: 0, col: 0 };
};

const distinctTiles = (paths: Coordinate[][]): number => {
  const keys = new Set<string>();
  for (const path of paths) {
    for (const point of path) {
      keys.add(coordinateKey(point));
    }
  }
  return keys.size;
};

export class WorldGenerator {
  private readonly config: GeneratorConfig;

  constructor(config: GeneratorConfig) {
    this.config = config;
  }

  generate(): GeneratedWorld {
    const config = validateGeneratorConfig(this.config);
    const startedAt = performance.now();
    const stages = new StageTracker();

    const elevation = this.timed("elevation", () => generateElevationField(config.size, config.noise));
    stages.advance("elevation-ready");

    const tiles = this.timed("terrain", () => classifyTerrain(elevation, config.thresholds));
    stages.advance("terrain-classified");

    const phases = dedupeSpawnOrder(config.spawnOrder);
    const reports: Partial<Record<SpawnKind, number>> = {};
    for (const kind of phases) {
      reports[kind] = this.timed(kind, () => this.runPhase(kind, tiles, elevation));
      stages.advance(PHASE_STAGE[kind]);
    }

    const spawn = findSpawnPoint(tiles);
    stages.advance("spawn-point-resolved");
    stages.advance("done");

    log.info(
      `world size=${config.size} seed=${config.noise.seed} generated in ${(performance.now() - startedAt).toFixed(1)}ms`
    );

    return {
      tiles,
      spawn,
      conditions: defaultEnvironmentalConditions(),
      elevation,
      stages: stages.history,
      phases,
      reports
    };
  }

  private runPhase(kind: SpawnKind, tiles: TileMatrix, elevation: ElevationField): number {
    const config = this.config;
    const rng = seededRng(`${config.noise.seed}:${kind}`);

    switch (kind) {
      case "roads": {
        const network = new RoadNetworkGenerator(elevation, config.roads).generate();
        return placeRoads(tiles, network.paths);
      }
      case "lava":
        return distinctTiles(spawnLava(tiles, elevation, config.lava, rng));
      case "fire":
        return spawnBlobs(tiles, config.fire, "fire", rng).tiles;
      case "trees":
        return spawnBlobs(tiles, config.trees, "tree", rng).tiles;
      case "garbage":
        return spawnGarbage(tiles, config.garbage, rng);
      case "rocks":
        return spawnRocks(tiles, config.rocks, rng).length;
      case "coins":
        return spawnCoins(tiles, config.coins, rng).length;
      case "bins":
        return spawnStorage(tiles, config.bins, "bin", rng).length;
      case "crates":
        return spawnStorage(tiles, config.crates, "crate", rng).length;
      case "banks":
        return spawnStorage(tiles, config.banks, "bank", rng).length;
    }
  }

  private timed<T>(label: string, run: () => T): T {
    const startedAt = performance.now();
    const result = run();
    log.debug(`${label} done in ${(performance.now() - startedAt).toFixed(1)}ms`);
    return result;
  }
}

export const generateWorld = (config: GeneratorConfig): GeneratedWorld => {
  return new WorldGenerator(config).generate();
};
