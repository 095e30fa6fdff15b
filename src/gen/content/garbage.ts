import { clamp } from "../../lib/math";
import { Logger } from "../../util/logger";
import { randomInt, randomIntInRange } from "../../util/random";
import type { Rng } from "../../util/random";
import { canHold, maxQuantity } from "../../world/tile-properties";
import type { TileMatrix } from "../../world/types";
import type { GarbageSettings } from "../config";

const log = Logger.scope("CONTENT");

/**
 * Square matrix of placement probabilities. Ring `d` (Chebyshev distance from the centre) holds
 * `spawnProbability * (1 - probabilityStep * d)`. Even diameters grow by one so a centre exists.
 */
export const buildRingMatrix = (diameter: number, spawnProbability: number, probabilityStep: number): number[][] => {
  const side = Math.max(1, diameter % 2 === 0 ? diameter + 1 : diameter);
  const center = (side - 1) / 2;
  const matrix: number[][] = [];
  for (let row = 0; row < side; row += 1) {
    const line: number[] = [];
    for (let col = 0; col < side; col += 1) {
      const ring = Math.max(Math.abs(row - center), Math.abs(col - center));
      line.push(clamp(spawnProbability * (1 - probabilityStep * ring), 0, 1));
    }
    matrix.push(line);
  }
  return matrix;
};

/** Returns the garbage quantity actually placed. */
export const spawnGarbage = (tiles: TileMatrix, settings: GarbageSettings, rng: Rng): number => {
  const total = settings.totalQuantity;
  const size = tiles.length;
  const cap = maxQuantity("garbage");
  let placed = 0;
  let piles = 0;

  while (placed < total && piles < settings.maxPiles) {
    piles += 1;
    const matrix = buildRingMatrix(
      randomIntInRange(rng, settings.pileSizeRange),
      settings.spawnProbability,
      settings.probabilityStep
    );
    const side = matrix.length;
    const border = settings.distanceFromBorders;
    const originRow = randomInt(rng, border, size - side - border);
    const originCol = randomInt(rng, border, size - side - border);

    for (let row = 0; row < side && placed < total; row += 1) {
      for (let col = 0; col < side && placed < total; col += 1) {
        if (rng.next() <= 1 - matrix[row][col]) {
          continue;
        }
        const tile = tiles[originRow + row][originCol + col];
        if (!canHold(tile.terrain, "garbage") || tile.content.kind !== "none") {
          continue;
        }
        const quantity = Math.min(randomIntInRange(rng, settings.quantityPerTileRange), cap, total - placed);
        tile.content = { kind: "garbage", quantity };
        placed += quantity;
      }
    }
  }

  if (placed < total) {
    log.warn(`garbage stopped at ${placed}/${total} after ${piles} piles`);
  } else {
    log.debug(`garbage placed=${placed} piles=${piles}`);
  }
  return placed;
};
