import type { Coordinate } from "../types";
import { Logger } from "../util/logger";
import { shuffle } from "../util/random";
import type { Rng } from "../util/random";
import { collectCoordinates, inBounds, retypeTile } from "../world/grid";
import type { TileMatrix } from "../world/types";
import type { LavaSettings } from "./config";
import type { ElevationField } from "./elevation";

const log = Logger.scope("LAVA");

const neighborOffsets: readonly Coordinate[] = [
  { row: -1, col: 0 },
  { row: 1, col: 0 },
  { row: 0, col: -1 },
  { row: 0, col: 1 }
];

export const lowestNeighbor = (
  tiles: TileMatrix,
  field: ElevationField,
  from: Coordinate
): Coordinate | null => {
  let best: Coordinate | null = null;
  let bestValue = Infinity;
  for (const offset of neighborOffsets) {
    const row = from.row + offset.row;
    const col = from.col + offset.col;
    if (!inBounds(tiles, row, col)) {
      continue;
    }
    if (field[row][col] < bestValue) {
      bestValue = field[row][col];
      best = { row, col };
    }
  }
  return best;
};

/**
 * Marks `start` as lava, then takes `steps` hops to the lowest neighbour each time, uphill
 * included. Returns every visited cell in order.
 */
export const flowLava = (
  tiles: TileMatrix,
  field: ElevationField,
  start: Coordinate,
  steps: number
): Coordinate[] => {
  const path: Coordinate[] = [];
  let current: Coordinate | null = start;
  let remaining = steps;

  while (current) {
    retypeTile(tiles[current.row][current.col], "lava");
    path.push(current);
    if (remaining <= 0) {
      break;
    }
    remaining -= 1;
    current = lowestNeighbor(tiles, field, current);
  }

  return path;
};

export const spawnLava = (
  tiles: TileMatrix,
  field: ElevationField,
  settings: LavaSettings,
  rng: Rng
): Coordinate[][] => {
  const mountains = shuffle(
    collectCoordinates(tiles, (tile) => tile.terrain === "mountain"),
    rng
  );
  if (mountains.length === 0) {
    log.warn("no mountain tiles, lava skipped");
    return [];
  }

  const starts = mountains.slice(0, Math.min(settings.spawnPointCount, mountains.length));
  const steps = settings.flowLengthRange.end - settings.flowLengthRange.start;
  const flows = starts.map((start) => flowLava(tiles, field, start, steps));
  log.debug(`lava flows=${flows.length} hops=${steps}`);
  return flows;
};
