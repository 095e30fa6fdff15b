import { z } from "zod";
import { CONTENT_KINDS } from "./types";
import type { ContentKind, TerrainKind } from "./types";
import table from "./tile-properties.json";

export type TerrainProperties = {
  walk: boolean;
  cost: number;
  hold: ReadonlySet<ContentKind>;
};

export type ContentProperties = {
  destroy: boolean;
  max: number;
  store: boolean;
  cost: number;
};

const terrainEntrySchema = z
  .object({
    walk: z.boolean(),
    cost: z.number().int().min(0),
    hold: z.array(z.enum(CONTENT_KINDS))
  })
  .transform((entry): TerrainProperties => ({ ...entry, hold: new Set<ContentKind>(entry.hold) }));

const contentEntrySchema = z.object({
  destroy: z.boolean(),
  max: z.number().int().min(0),
  store: z.boolean(),
  cost: z.number().int().min(0)
});

const tableSchema = z.object({
  terrain: z.object({
    "deep-water": terrainEntrySchema,
    "shallow-water": terrainEntrySchema,
    sand: terrainEntrySchema,
    grass: terrainEntrySchema,
    street: terrainEntrySchema,
    hill: terrainEntrySchema,
    mountain: terrainEntrySchema,
    snow: terrainEntrySchema,
    lava: terrainEntrySchema
  }),
  content: z.object({
    rock: contentEntrySchema,
    tree: contentEntrySchema,
    garbage: contentEntrySchema,
    fire: contentEntrySchema,
    coin: contentEntrySchema,
    bin: contentEntrySchema,
    crate: contentEntrySchema,
    bank: contentEntrySchema,
    water: contentEntrySchema,
    none: contentEntrySchema
  })
});

const parsed = tableSchema.parse(table);

export const TERRAIN_PROPERTIES: Readonly<Record<TerrainKind, TerrainProperties>> = parsed.terrain;

export const CONTENT_PROPERTIES: Readonly<Record<ContentKind, ContentProperties>> = parsed.content;

// Empty tiles are valid everywhere, so "none" is never listed in the table.
export const canHold = (terrain: TerrainKind, content: ContentKind): boolean => {
  return content === "none" || TERRAIN_PROPERTIES[terrain].hold.has(content);
};

export const isWalkable = (terrain: TerrainKind): boolean => {
  return TERRAIN_PROPERTIES[terrain].walk;
};

export const maxQuantity = (content: ContentKind): number => {
  return CONTENT_PROPERTIES[content].max;
};

