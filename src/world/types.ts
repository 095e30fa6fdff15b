import type { NumberRange } from "../types";

export const TERRAIN_KINDS = [
  "deep-water",
  "shallow-water",
  "sand",
  "grass",
  "street",
  "hill",
  "mountain",
  "snow",
  "lava"
] as const;

export type TerrainKind = (typeof TERRAIN_KINDS)[number];

export const CONTENT_KINDS = [
  "rock",
  "tree",
  "garbage",
  "fire",
  "coin",
  "bin",
  "crate",
  "bank",
  "water",
  "none"
] as const;

export type ContentKind = (typeof CONTENT_KINDS)[number];

export type QuantityContent = {
  kind: "rock" | "tree" | "garbage" | "coin" | "water";
  quantity: number;
};

export type StorageContent = {
  kind: "bin" | "crate" | "bank";
  capacity: NumberRange;
};

export type Content = QuantityContent | StorageContent | { kind: "fire" } | { kind: "none" };

export type Tile = {
  terrain: TerrainKind;
  content: Content;
};

export type TileMatrix = Tile[][];

export const SPAWN_KINDS = [
  "roads",
  "lava",
  "fire",
  "trees",
  "garbage",
  "rocks",
  "coins",
  "bins",
  "crates",
  "banks"
] as const;

export type SpawnKind = (typeof SPAWN_KINDS)[number];

export type WeatherKind = "rainy" | "sunny" | "foggy" | "tropical-monsoon" | "trentino-snow";

export type EnvironmentalConditions = {
  weather: WeatherKind[];
  tickLengthMinutes: number;
  initialHour: number;
};

export type GenerationStage =
  | "idle"
  | "elevation-ready"
  | "terrain-classified"
  | "roads-placed"
  | "lava-placed"
  | "blobs-placed"
  | "garbage-placed"
  | "content-scattered"
  | "spawn-point-resolved"
  | "done";
