export const WORLD_LIMITS = {
  minSize: 100
} as const;

export const NOISE_DEFAULTS = {
  octaves: 12,
  frequency: 2.5,
  lacunarity: 2.0,
  persistence: 1.25,
  attenuation: 2.5
} as const;

export const THRESHOLD_DEFAULTS = {
  deepWater: 4,
  shallowWater: 10,
  sand: 15,
  grass: 45,
  hill: 65,
  mountain: 77.5
} as const;

export const ROAD_DEFAULTS = {
  sliceCount: 10,
  minElevation: 0,
  bandwidthDivisor: 100,
  borderSnap: 2
} as const;

export const LAVA_DEFAULTS = {
  spawnDivisor: 500,
  flowDivisor: 25
} as const;

export const BLOB_SHAPE_CONFIG = {
  borderSamples: 361,
  variationMin: 0.075,
  variationMax: 0.125,
  treeKeepProbability: 0.9
} as const;

export const GARBAGE_DEFAULTS = {
  pileSizeMin: 3,
  pileSizeMax: 8,
  spawnProbability: 0.6,
  probabilityStep: 0.2,
  pileAttemptsPerUnit: 8
} as const;

export const SCATTER_DEFAULTS = {
  rockDivisor: 20,
  coinDivisor: 25,
  storageDivisor: 25,
  rockQuantityMax: 4
} as const;

export const ENVIRONMENT_CONFIG = {
  weather: ["rainy", "sunny", "foggy", "tropical-monsoon", "trentino-snow"],
  tickLengthMinutes: 1,
  initialHour: 9
} as const;
