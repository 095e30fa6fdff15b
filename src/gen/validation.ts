import { z } from "zod";
import { WORLD_LIMITS } from "../config";
import { SPAWN_KINDS } from "../world/types";
import { checkBlobSettings } from "./content/blob";
import type { GeneratorConfig } from "./config";
import { ConfigurationError } from "./errors";

const count = z.number().int().min(0);
const probability = z.number().min(0).max(1);

const rangeOf = (bound: z.ZodNumber) =>
  z
    .object({ start: bound, end: bound })
    .refine((range) => range.start <= range.end, { message: "start must not exceed end" });

const noiseSchema = z.object({
  seed: z.number().int().min(0).max(0xffffffff),
  octaves: z.number().int().min(0).max(32),
  frequency: z.number().positive(),
  lacunarity: z.number().positive(),
  persistence: z.number().min(0),
  attenuation: z.number().positive()
});

const thresholdsSchema = z
  .object({
    deepWater: z.number().min(0).max(100),
    shallowWater: z.number().min(0).max(100),
    sand: z.number().min(0).max(100),
    grass: z.number().min(0).max(100),
    hill: z.number().min(0).max(100),
    mountain: z.number().min(0).max(100)
  })
  .refine(
    (t) => t.deepWater <= t.shallowWater && t.shallowWater <= t.sand && t.sand <= t.grass && t.grass <= t.hill && t.hill <= t.mountain,
    { message: "thresholds must be ascending" }
  );

const blobSchema = z.object({
  tileBudget: rangeOf(count),
  blobCount: rangeOf(count),
  radiusRange: rangeOf(z.number().positive()),
  variationRange: rangeOf(z.number().min(0).lt(1))
});

const scatterSchema = z.object({ count });

export const generatorConfigSchema = z.object({
  size: z.number().int(),
  noise: noiseSchema,
  thresholds: thresholdsSchema,
  roads: z.object({
    sliceCount: z.number().int().min(1),
    minElevation: z.number(),
    bandwidth: count
  }),
  lava: z.object({
    spawnPointCount: count,
    flowLengthRange: rangeOf(z.number().int().min(1))
  }),
  fire: blobSchema,
  trees: blobSchema.extend({ keepProbability: probability }),
  garbage: z.object({
    totalQuantity: count,
    pileSizeRange: rangeOf(z.number().int().min(1)),
    quantityPerTileRange: rangeOf(z.number().int().min(1)),
    spawnProbability: probability,
    probabilityStep: z.number().min(0),
    distanceFromBorders: count,
    maxPiles: count
  }),
  rocks: z.object({
    maxRocks: count,
    terrainProbability: z.object({
      "deep-water": probability,
      "shallow-water": probability,
      sand: probability,
      grass: probability,
      street: probability,
      hill: probability,
      mountain: probability,
      snow: probability,
      lava: probability
    })
  }),
  coins: scatterSchema,
  bins: scatterSchema,
  crates: scatterSchema,
  banks: scatterSchema,
  spawnOrder: z.array(z.enum(SPAWN_KINDS))
});

const formatIssues = (error: z.ZodError): string[] => {
  return error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`);
};

/** Rejects anything that would fail part-way through generation. Runs before the grid exists. */
export const validateGeneratorConfig = (config: GeneratorConfig): GeneratorConfig => {
  if (!Number.isInteger(config.size) || config.size < WORLD_LIMITS.minSize) {
    throw new ConfigurationError(`Invalid world size: ${config.size} (minimum ${WORLD_LIMITS.minSize})`);
  }

  const parsed = generatorConfigSchema.safeParse(config);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigurationError(`Invalid generator configuration: ${issues.join("; ")}`, issues);
  }

  if (config.roads.sliceCount > config.size) {
    throw new ConfigurationError(`Invalid road slice count: ${config.roads.sliceCount} exceeds size ${config.size}`);
  }
  const pileSpan = config.garbage.pileSizeRange.end + 1 + config.garbage.distanceFromBorders * 2;
  if (pileSpan > config.size) {
    throw new ConfigurationError(`Invalid garbage pile size: ${config.garbage.pileSizeRange.end} does not fit size ${config.size}`);
  }
  if (config.spawnOrder.includes("fire")) {
    checkBlobSettings(config.fire, config.size, "fire");
  }
  if (config.spawnOrder.includes("trees")) {
    checkBlobSettings(config.trees, config.size, "trees");
  }

  return config;
};
