import type { Coordinate } from "../types";
import { canHold } from "./tile-properties";
import type { Content, TerrainKind, Tile, TileMatrix } from "./types";

export const NO_CONTENT: Content = { kind: "none" };

export const createTileMatrix = (size: number, terrain: TerrainKind): TileMatrix => {
  const tiles: TileMatrix = [];
  for (let row = 0; row < size; row += 1) {
    const line: Tile[] = [];
    for (let col = 0; col < size; col += 1) {
      line.push({ terrain, content: NO_CONTENT });
    }
    tiles.push(line);
  }
  return tiles;
};

export const inBounds = (tiles: TileMatrix, row: number, col: number): boolean => {
  return row >= 0 && col >= 0 && row < tiles.length && col < (tiles[row]?.length ?? 0);
};

export const isEmpty = (tile: Tile): boolean => tile.content.kind === "none";

/** Changes terrain and drops content the new terrain cannot hold. */
export const retypeTile = (tile: Tile, terrain: TerrainKind): void => {
  tile.terrain = terrain;
  if (!canHold(terrain, tile.content.kind)) {
    tile.content = NO_CONTENT;
  }
};

export const collectCoordinates = (
  tiles: TileMatrix,
  predicate: (tile: Tile) => boolean
): Coordinate[] => {
  const matches: Coordinate[] = [];
  for (let row = 0; row < tiles.length; row += 1) {
    for (let col = 0; col < tiles[row].length; col += 1) {
      if (predicate(tiles[row][col])) {
        matches.push({ row, col });
      }
    }
  }
  return matches;
};
