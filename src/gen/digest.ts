import { hashString, toHex } from "../lib/hash";
import type { Content, Tile, TileMatrix } from "../world/types";
import type { GeneratedWorld } from "./generator";

const encodeContent = (content: Content): string => {
  switch (content.kind) {
    case "bin":
    case "crate":
    case "bank":
      return `${content.kind}:${content.capacity.start}-${content.capacity.end}`;
    case "fire":
    case "none":
      return content.kind;
    default:
      return `${content.kind}:${content.quantity}`;
  }
};

const encodeTile = (tile: Tile): string => `${tile.terrain}/${encodeContent(tile.content)}`;

export const digestTiles = (tiles: TileMatrix): string => {
  return toHex(hashString(tiles.map((row) => row.map(encodeTile).join(",")).join(";")));
};

/** Stable fingerprint of the tiles and spawn point; equal worlds share a digest. */
export const digestWorld = (world: Pick<GeneratedWorld, "tiles" | "spawn">): string => {
  return toHex(hashString(`${digestTiles(world.tiles)}|${world.spawn.row},${world.spawn.col}`));
};
