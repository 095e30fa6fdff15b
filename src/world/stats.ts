import { canHold, maxQuantity } from "./tile-properties";
import { CONTENT_KINDS, TERRAIN_KINDS } from "./types";
import type { Content, ContentKind, TerrainKind, TileMatrix } from "./types";

const tileCount = (tiles: TileMatrix): number => {
  let count = 0;
  for (const row of tiles) {
    count += row.length;
  }
  return count;
};

const zeroTerrain = (): Record<TerrainKind, number> => ({
  "deep-water": 0,
  "shallow-water": 0,
  sand: 0,
  grass: 0,
  street: 0,
  hill: 0,
  mountain: 0,
  snow: 0,
  lava: 0
});

const zeroContent = (): Record<ContentKind, number> => ({
  rock: 0,
  tree: 0,
  garbage: 0,
  fire: 0,
  coin: 0,
  bin: 0,
  crate: 0,
  bank: 0,
  water: 0,
  none: 0
});

/** Fraction of tiles per terrain kind, summing to 1. */
export const terrainShares = (tiles: TileMatrix): Record<TerrainKind, number> => {
  const shares = zeroTerrain();
  const total = tileCount(tiles);
  if (total === 0) {
    return shares;
  }
  for (const row of tiles) {
    for (const tile of row) {
      shares[tile.terrain] += 1;
    }
  }
  for (const kind of TERRAIN_KINDS) {
    shares[kind] = shares[kind] / total;
  }
  return shares;
};

export const contentShares = (tiles: TileMatrix): Record<ContentKind, number> => {
  const shares = zeroContent();
  const total = tileCount(tiles);
  if (total === 0) {
    return shares;
  }
  for (const row of tiles) {
    for (const tile of row) {
      shares[tile.content.kind] += 1;
    }
  }
  for (const kind of CONTENT_KINDS) {
    shares[kind] = shares[kind] / total;
  }
  return shares;
};

export const contentAmount = (content: Content): number => {
  switch (content.kind) {
    case "bin":
    case "crate":
    case "bank":
      return content.capacity.end;
    case "fire":
    case "none":
      return 0;
    default:
      return content.quantity;
  }
};

/** True when every tile holds a kind its terrain allows, in an amount within that kind's maximum. */
export const checkWorld = (tiles: TileMatrix): boolean => {
  for (const row of tiles) {
    for (const tile of row) {
      if (!canHold(tile.terrain, tile.content.kind)) {
        return false;
      }
      if (contentAmount(tile.content) > maxQuantity(tile.content.kind)) {
        return false;
      }
    }
  }
  return true;
};
