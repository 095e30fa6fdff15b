import { createNoise2D } from "simplex-noise";
import type { NoiseFunction2D } from "simplex-noise";
import { hashCoords } from "../lib/hash";
import { clamp } from "../lib/math";
import { createRng } from "../util/random";
import type { NoiseSettings } from "./config";

/** Indexed `[row][col]`. */
export type ElevationField = number[][];

export type NoiseSampler = (x: number, y: number) => number;

const octaveSalt = 0x51;

/** Divisor mapping the ridged sum onto [0, 2]; independent of persistence. */
export const ridgedScale = (octaves: number): number => 2 - 0.5 ** (octaves - 1);

/**
 * Ridged multifractal over simplex octaves. Output lies in [-1, 1]; zero octaves give a flat 0.
 */
export const createRidgedNoise = (settings: NoiseSettings): NoiseSampler => {
  const sources: NoiseFunction2D[] = [];
  for (let i = 0; i < settings.octaves; i += 1) {
    sources.push(createNoise2D(createRng(hashCoords(settings.seed, i, 0, octaveSalt)).next));
  }

  const scale = ridgedScale(sources.length);

  return (x: number, y: number): number => {
    if (sources.length === 0) {
      return 0;
    }

    let px = x * settings.frequency;
    let py = y * settings.frequency;
    let weight = 1;
    let amplitude = 1;
    let total = 0;

    for (const source of sources) {
      let signal = 1 - Math.abs(source(px, py));
      signal *= signal;
      signal *= weight;
      weight = clamp(signal / settings.attenuation, 0, 1);

      total += signal * amplitude;
      amplitude *= settings.persistence;
      px *= settings.lacunarity;
      py *= settings.lacunarity;
    }

    return clamp((total * 2) / scale - 1, -1, 1);
  };
};

export const sampleElevationRow = (noise: NoiseSampler, row: number, size: number): number[] => {
  const values: number[] = new Array(size);
  for (let col = 0; col < size; col += 1) {
    values[col] = noise(col / size, row / size);
  }
  return values;
};

export const generateElevationField = (size: number, settings: NoiseSettings): ElevationField => {
  const noise = createRidgedNoise(settings);
  const field: ElevationField = [];
  for (let row = 0; row < size; row += 1) {
    field.push(sampleElevationRow(noise, row, size));
  }
  return field;
};
