import type { Coordinate } from "../../types";
import { Logger } from "../../util/logger";
import { randomIntInclusive, shuffle } from "../../util/random";
import type { Rng } from "../../util/random";
import { collectCoordinates, isEmpty } from "../../world/grid";
import { canHold, maxQuantity } from "../../world/tile-properties";
import type { Content, ContentKind, StorageContent, TileMatrix } from "../../world/types";
import type { RockSettings, ScatterSettings } from "../config";

const log = Logger.scope("CONTENT");

export type ContentFactory = (rng: Rng) => Content;

/** Fills up to `count` random empty tiles that can hold `kind`; returns the filled coordinates. */
export const scatterContent = (
  tiles: TileMatrix,
  count: number,
  kind: ContentKind,
  rng: Rng,
  make: ContentFactory
): Coordinate[] => {
  const candidates = shuffle(
    collectCoordinates(tiles, (tile) => isEmpty(tile) && canHold(tile.terrain, kind)),
    rng
  );
  const chosen = candidates.slice(0, Math.max(0, count));
  for (const point of chosen) {
    tiles[point.row][point.col].content = make(rng);
  }
  if (chosen.length < count) {
    log.warn(`${kind}: only ${chosen.length} of ${count} tiles available`);
  }
  return chosen;
};

/**
 * Row-major sweep: each empty tile that can hold a rock gets one with its terrain's probability,
 * until `maxRocks` are down.
 */
export const spawnRocks = (tiles: TileMatrix, settings: RockSettings, rng: Rng): Coordinate[] => {
  const placed: Coordinate[] = [];
  const max = maxQuantity("rock");

  for (let row = 0; row < tiles.length && placed.length < settings.maxRocks; row += 1) {
    for (let col = 0; col < tiles[row].length && placed.length < settings.maxRocks; col += 1) {
      const tile = tiles[row][col];
      if (!isEmpty(tile) || !canHold(tile.terrain, "rock")) {
        continue;
      }
      if (rng.next() < settings.terrainProbability[tile.terrain]) {
        tile.content = { kind: "rock", quantity: randomIntInclusive(rng, 1, max) };
        placed.push({ row, col });
      }
    }
  }

  log.debug(`rocks placed=${placed.length}`);
  return placed;
};

export const spawnCoins = (tiles: TileMatrix, settings: ScatterSettings, rng: Rng): Coordinate[] => {
  const max = maxQuantity("coin");
  return scatterContent(tiles, settings.count, "coin", rng, (draw) => ({
    kind: "coin",
    quantity: randomIntInclusive(draw, 1, max)
  }));
};

/** Bins, crates and banks: capacity `1..upper` with `upper` drawn from `2..=max`. */
export const spawnStorage = (
  tiles: TileMatrix,
  settings: ScatterSettings,
  kind: StorageContent["kind"],
  rng: Rng
): Coordinate[] => {
  const max = maxQuantity(kind);
  return scatterContent(tiles, settings.count, kind, rng, (draw) => ({
    kind,
    capacity: { start: 1, end: randomIntInclusive(draw, 2, max) }
  }));
};
