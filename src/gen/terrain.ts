import { NO_CONTENT } from "../world/grid";
import type { TerrainKind, Tile, TileMatrix } from "../world/types";
import type { Thresholds } from "./config";
import type { ElevationField } from "./elevation";

export type FieldBounds = {
  min: number;
  max: number;
};

export type TerrainCutoff = {
  kind: TerrainKind;
  below: number;
};

// Elevation order of the classified bands; street and lava are placed later.
export const TERRAIN_RANK: readonly TerrainKind[] = [
  "deep-water",
  "shallow-water",
  "sand",
  "grass",
  "hill",
  "mountain",
  "snow"
];

export const fieldBounds = (field: ElevationField): FieldBounds => {
  let min = Infinity;
  let max = -Infinity;
  for (const row of field) {
    for (const value of row) {
      if (value < min) {
        min = value;
      }
      if (value > max) {
        max = value;
      }
    }
  }
  if (min > max) {
    return { min: 0, max: 0 };
  }
  return { min, max };
};

export const thresholdValue = (percentage: number, min: number, max: number): number => {
  return (percentage / 100) * (max - min) + min;
};

export const buildCutoffs = (thresholds: Thresholds, bounds: FieldBounds): TerrainCutoff[] => {
  const at = (percentage: number): number => thresholdValue(percentage, bounds.min, bounds.max);
  return [
    { kind: "deep-water", below: at(thresholds.deepWater) },
    { kind: "shallow-water", below: at(thresholds.shallowWater) },
    { kind: "sand", below: at(thresholds.sand) },
    { kind: "grass", below: at(thresholds.grass) },
    { kind: "hill", below: at(thresholds.hill) },
    { kind: "mountain", below: at(thresholds.mountain) }
  ];
};

export const classifyElevation = (value: number, cutoffs: TerrainCutoff[]): TerrainKind => {
  for (const cutoff of cutoffs) {
    if (value < cutoff.below) {
      return cutoff.kind;
    }
  }
  return "snow";
};

export const classifyTerrain = (field: ElevationField, thresholds: Thresholds): TileMatrix => {
  const cutoffs = buildCutoffs(thresholds, fieldBounds(field));
  return field.map((row) =>
    row.map((value): Tile => ({ terrain: classifyElevation(value, cutoffs), content: NO_CONTENT }))
  );
};
