import {
  BLOB_SHAPE_CONFIG,
  GARBAGE_DEFAULTS,
  LAVA_DEFAULTS,
  NOISE_DEFAULTS,
  ROAD_DEFAULTS,
  SCATTER_DEFAULTS,
  THRESHOLD_DEFAULTS
} from "../config";
import type { NumberRange } from "../types";
import { randomSeed } from "../util/random";
import type { SpawnKind, TerrainKind } from "../world/types";

export type NoiseSettings = {
  seed: number;
  octaves: number;
  frequency: number;
  lacunarity: number;
  persistence: number;
  attenuation: number;
};

/** Percentages of the elevation span, one upper bound per terrain band below snow. */
export type Thresholds = {
  deepWater: number;
  shallowWater: number;
  sand: number;
  grass: number;
  hill: number;
  mountain: number;
};

export type RoadSettings = {
  sliceCount: number;
  minElevation: number;
  bandwidth: number;
};

export type LavaSettings = {
  spawnPointCount: number;
  flowLengthRange: NumberRange;
};

export type BlobSettings = {
  tileBudget: NumberRange;
  blobCount: NumberRange;
  radiusRange: NumberRange;
  variationRange: NumberRange;
};

export type TreeSettings = BlobSettings & {
  keepProbability: number;
};

export type GarbageSettings = {
  totalQuantity: number;
  pileSizeRange: NumberRange;
  quantityPerTileRange: NumberRange;
  spawnProbability: number;
  probabilityStep: number;
  distanceFromBorders: number;
  maxPiles: number;
};

export type RockSettings = {
  maxRocks: number;
  terrainProbability: Record<TerrainKind, number>;
};

export type ScatterSettings = {
  count: number;
};

export type GeneratorConfig = {
  size: number;
  noise: NoiseSettings;
  thresholds: Thresholds;
  roads: RoadSettings;
  lava: LavaSettings;
  fire: BlobSettings;
  trees: TreeSettings;
  garbage: GarbageSettings;
  rocks: RockSettings;
  coins: ScatterSettings;
  bins: ScatterSettings;
  crates: ScatterSettings;
  banks: ScatterSettings;
  spawnOrder: SpawnKind[];
};

export const DEFAULT_SPAWN_ORDER: SpawnKind[] = [
  "roads",
  "lava",
  "banks",
  "bins",
  "crates",
  "garbage",
  "fire",
  "trees",
  "rocks",
  "coins"
];

export const defaultNoiseSettings = (seed: number): NoiseSettings => ({
  seed: seed >>> 0,
  ...NOISE_DEFAULTS
});

export const defaultThresholds = (): Thresholds => ({ ...THRESHOLD_DEFAULTS });

export const defaultRoadSettings = (size: number): RoadSettings => ({
  sliceCount: ROAD_DEFAULTS.sliceCount,
  minElevation: ROAD_DEFAULTS.minElevation,
  bandwidth: Math.floor(size / ROAD_DEFAULTS.bandwidthDivisor)
});

export const defaultLavaSettings = (size: number): LavaSettings => ({
  spawnPointCount: Math.floor((size * size) / LAVA_DEFAULTS.spawnDivisor),
  flowLengthRange: { start: 1, end: Math.floor((size * size) / LAVA_DEFAULTS.flowDivisor) }
});

const blobTileCeiling = (radiusEnd: number, blobCountEnd: number): number => {
  const side = Math.ceil(radiusEnd) * 2;
  return side * side * blobCountEnd;
};

const defaultVariation = (): NumberRange => ({
  start: BLOB_SHAPE_CONFIG.variationMin,
  end: BLOB_SHAPE_CONFIG.variationMax
});

export const defaultFireSettings = (size: number): BlobSettings => {
  const radiusRange = { start: 2, end: Math.max(2, Math.min(size / 40, 10)) };
  const blobCount = { start: Math.max(1, Math.floor(size / 100)), end: Math.max(2, Math.floor(size / 50)) };
  return {
    tileBudget: { start: 1, end: blobTileCeiling(radiusRange.end, blobCount.end) },
    blobCount,
    radiusRange,
    variationRange: defaultVariation()
  };
};

export const defaultTreeSettings = (size: number): TreeSettings => {
  const radiusRange = { start: 1, end: Math.max(1, Math.min(size / 50, 4)) };
  const blobCount = { start: Math.floor(size * 0.1), end: Math.floor(size * 0.15) };
  return {
    tileBudget: { start: 1, end: blobTileCeiling(radiusRange.end, blobCount.end) },
    blobCount,
    radiusRange,
    variationRange: defaultVariation(),
    keepProbability: BLOB_SHAPE_CONFIG.treeKeepProbability
  };
};

export const defaultGarbageSettings = (size: number): GarbageSettings => {
  const totalQuantity = Math.floor((size * size) / 100);
  return {
    totalQuantity,
    pileSizeRange: { start: GARBAGE_DEFAULTS.pileSizeMin, end: GARBAGE_DEFAULTS.pileSizeMax },
    quantityPerTileRange: { start: 1, end: 4 },
    spawnProbability: GARBAGE_DEFAULTS.spawnProbability,
    probabilityStep: GARBAGE_DEFAULTS.probabilityStep,
    distanceFromBorders: 1,
    maxPiles: totalQuantity * GARBAGE_DEFAULTS.pileAttemptsPerUnit
  };
};

export const defaultRockSettings = (size: number): RockSettings => ({
  maxRocks: Math.floor((size * size) / SCATTER_DEFAULTS.rockDivisor),
  terrainProbability: {
    "deep-water": 0,
    "shallow-water": 0,
    sand: 0.1,
    grass: 0.25,
    street: 0,
    hill: 0.45,
    mountain: 0.5,
    snow: 0.7,
    lava: 0
  }
});

export const defaultCoinSettings = (size: number): ScatterSettings => ({
  count: Math.floor((size * size) / SCATTER_DEFAULTS.coinDivisor)
});

export const defaultStorageSettings = (size: number): ScatterSettings => ({
  count: Math.floor(size / SCATTER_DEFAULTS.storageDivisor)
});

export const defaultGeneratorConfig = (size: number, seed: number = randomSeed()): GeneratorConfig => ({
  size,
  noise: defaultNoiseSettings(seed),
  thresholds: defaultThresholds(),
  roads: defaultRoadSettings(size),
  lava: defaultLavaSettings(size),
  fire: defaultFireSettings(size),
  trees: defaultTreeSettings(size),
  garbage: defaultGarbageSettings(size),
  rocks: defaultRockSettings(size),
  coins: defaultCoinSettings(size),
  bins: defaultStorageSettings(size),
  crates: defaultStorageSettings(size),
  banks: defaultStorageSettings(size),
  spawnOrder: [...DEFAULT_SPAWN_ORDER]
});

export type GeneratorOverrides = {
  [K in keyof GeneratorConfig]?: GeneratorConfig[K] extends unknown[]
    ? GeneratorConfig[K]
    : GeneratorConfig[K] extends object
      ? Partial<GeneratorConfig[K]>
      : GeneratorConfig[K];
};

/** Defaults for `size`, with each overridden block merged one level deep. */
export const resolveGeneratorConfig = (
  size: number,
  overrides: Omit<GeneratorOverrides, "size"> = {}
): GeneratorConfig => {
  const base = defaultGeneratorConfig(size, overrides.noise?.seed);
  return {
    size,
    noise: { ...base.noise, ...overrides.noise },
    thresholds: { ...base.thresholds, ...overrides.thresholds },
    roads: { ...base.roads, ...overrides.roads },
    lava: { ...base.lava, ...overrides.lava },
    fire: { ...base.fire, ...overrides.fire },
    trees: { ...base.trees, ...overrides.trees },
    garbage: { ...base.garbage, ...overrides.garbage },
    rocks: { ...base.rocks, ...overrides.rocks },
    coins: { ...base.coins, ...overrides.coins },
    bins: { ...base.bins, ...overrides.bins },
    crates: { ...base.crates, ...overrides.crates },
    banks: { ...base.banks, ...overrides.banks },
    spawnOrder: overrides.spawnOrder ?? base.spawnOrder
  };
};
