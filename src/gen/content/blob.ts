import { createNoise2D } from "simplex-noise";
import type { NoiseFunction2D } from "simplex-noise";
import { BLOB_SHAPE_CONFIG } from "../../config";
import { mapRange } from "../../lib/math";
import type { Coordinate } from "../../types";
import { Logger } from "../../util/logger";
import { createRng, randomInRange, randomInt, randomIntInclusive } from "../../util/random";
import type { Rng } from "../../util/random";
import { canHold, maxQuantity } from "../../world/tile-properties";
import type { Content, TileMatrix } from "../../world/types";
import type { BlobSettings, TreeSettings } from "../config";
import { ConfigurationError } from "../errors";

const log = Logger.scope("CONTENT");

export type BlobContentKind = "fire" | "tree";

export type BlobShape = {
  center: Coordinate;
  radius: number;
  variation: number;
  border: Coordinate[];
  points: Coordinate[];
};

export type BlobSpawnReport = {
  blobs: number;
  tiles: number;
};

// Clockwise from the upper-left neighbour.
const fillMoves: ReadonlyArray<readonly [number, number]> = [
  [-1, -1],
  [-1, 0],
  [-1, 1],
  [0, 1],
  [1, 1],
  [1, 0],
  [1, -1],
  [0, -1]
];

export const blobMargin = (radius: number, variation: number): number => {
  return Math.ceil(radius * (1 + variation)) + 1;
};

/** Throws when the settings cannot produce a blob inside a world of side `size`. */
export const checkBlobSettings = (settings: BlobSettings, size: number, label = "blob"): void => {
  const { tileBudget, blobCount, radiusRange, variationRange } = settings;
  if (tileBudget.start >= tileBudget.end) {
    throw new ConfigurationError(`Invalid ${label} tile budget: ${tileBudget.start}..${tileBudget.end} is empty`);
  }
  if (Math.floor(radiusRange.start) * blobCount.start > tileBudget.end) {
    throw new ConfigurationError(
      `Invalid ${label} settings: tileBudget.end ${tileBudget.end} is below the smallest possible total ` +
        `(radius ${radiusRange.start} x ${blobCount.start} blobs)`
    );
  }
  if (Math.ceil(radiusRange.end) * blobCount.end < tileBudget.start) {
    throw new ConfigurationError(
      `Invalid ${label} settings: tileBudget.start ${tileBudget.start} is above the largest possible total ` +
        `(radius ${radiusRange.end} x ${blobCount.end} blobs)`
    );
  }
  const margin = blobMargin(Math.max(radiusRange.start, radiusRange.end), Math.max(variationRange.start, variationRange.end));
  if (margin * 2 >= size) {
    throw new ConfigurationError(`Invalid ${label} radius: ${radiusRange.end} does not fit a world of size ${size}`);
  }
};

export const traceBorder = (
  center: Coordinate,
  radius: number,
  variation: number,
  noise: NoiseFunction2D
): Coordinate[] => {
  const border: Coordinate[] = [];
  for (let degree = 0; degree < BLOB_SHAPE_CONFIG.borderSamples; degree += 1) {
    const radian = (degree * Math.PI) / 180;
    const cos = Math.cos(radian);
    const sin = Math.sin(radian);
    const r = mapRange(noise(cos + 1, sin + 1), -1, 1, radius * (1 - variation), radius * (1 + variation));
    border.push({
      row: Math.trunc(center.row + sin * r),
      col: Math.trunc(center.col + cos * r)
    });
  }
  return border;
};

/**
 * Stack fill from `center` inside the border's bounding box. A diagonal step is only taken when
 * both cells beside it are still open, so the fill cannot slip between two border cells.
 */
export const fillBorder = (center: Coordinate, border: Coordinate[]): Coordinate[] => {
  let top = center.row;
  let left = center.col;
  let bottom = center.row;
  let right = center.col;
  for (const point of border) {
    top = Math.min(top, point.row);
    left = Math.min(left, point.col);
    bottom = Math.max(bottom, point.row);
    right = Math.max(right, point.col);
  }

  const width = right - left + 1;
  const height = bottom - top + 1;
  const visited = new Uint8Array(width * height);
  const index = (row: number, col: number): number => row * width + col;
  const open = (row: number, col: number): boolean =>
    row >= 0 && col >= 0 && row < height && col < width && visited[index(row, col)] === 0;

  for (const point of border) {
    visited[index(point.row - top, point.col - left)] = 1;
  }

  const stack: Coordinate[] = [];
  const visit = (row: number, col: number): void => {
    visited[index(row, col)] = 1;
    stack.push({ row, col });
  };
  visit(center.row - top, center.col - left);

  let current = stack.pop();
  while (current) {
    const { row, col } = current;
    for (const [dRow, dCol] of fillMoves) {
      if (!open(row + dRow, col + dCol)) {
        continue;
      }
      if (dRow !== 0 && dCol !== 0 && !(open(row + dRow, col) && open(row, col + dCol))) {
        continue;
      }
      visit(row + dRow, col + dCol);
    }
    current = stack.pop();
  }

  const points: Coordinate[] = [];
  for (let row = 0; row < height; row += 1) {
    for (let col = 0; col < width; col += 1) {
      if (visited[index(row, col)] === 1) {
        points.push({ row: row + top, col: col + left });
      }
    }
  }
  return points;
};

/** Swap-removes points whose tile cannot take `kind` or is already occupied. */
export const restrictToHolders = (points: Coordinate[], tiles: TileMatrix, kind: BlobContentKind): Coordinate[] => {
  let i = 0;
  while (i < points.length) {
    const tile = tiles[points[i].row][points[i].col];
    if (!canHold(tile.terrain, kind) || tile.content.kind !== "none") {
      points[i] = points[points.length - 1];
      points.pop();
    } else {
      i += 1;
    }
  }
  return points;
};

export const buildBlob = (
  tiles: TileMatrix,
  radius: number,
  variation: number,
  rng: Rng,
  kind: BlobContentKind,
  keepProbability = 1
): BlobShape => {
  const size = tiles.length;
  const margin = blobMargin(radius, variation);
  const center = { row: randomInt(rng, margin, size - margin), col: randomInt(rng, margin, size - margin) };
  const noise = createNoise2D(createRng(Math.floor(rng.next() * 4294967296)).next);
  const border = traceBorder(center, radius, variation, noise);
  let points = fillBorder(center, border);
  if (keepProbability < 1) {
    points = points.filter(() => rng.next() < keepProbability);
  }
  return { center, radius, variation, border, points: restrictToHolders(points, tiles, kind) };
};

const blobContent = (kind: BlobContentKind, rng: Rng): Content => {
  if (kind === "fire") {
    return { kind: "fire" };
  }
  return { kind: "tree", quantity: randomIntInclusive(rng, 1, maxQuantity("tree")) };
};

/**
 * Places blobs until a blob would overrun the remaining tile budget or the blob count runs out.
 */
export const spawnBlobs = (
  tiles: TileMatrix,
  settings: BlobSettings | TreeSettings,
  kind: BlobContentKind,
  rng: Rng
): BlobSpawnReport => {
  checkBlobSettings(settings, tiles.length, kind);
  const keepProbability = "keepProbability" in settings ? settings.keepProbability : 1;
  let remainingTiles = settings.tileBudget.end;
  let remainingBlobs = settings.blobCount.end;
  const report: BlobSpawnReport = { blobs: 0, tiles: 0 };

  for (;;) {
    const variation = randomInRange(rng, settings.variationRange);
    const radius = randomInRange(rng, settings.radiusRange);
    const blob = buildBlob(tiles, radius, variation, rng, kind, keepProbability);

    if (blob.points.length > remainingTiles || remainingBlobs < 1) {
      break;
    }
    remainingTiles -= blob.points.length;
    remainingBlobs -= 1;

    for (const point of blob.points) {
      tiles[point.row][point.col].content = blobContent(kind, rng);
    }
    report.blobs += 1;
    report.tiles += blob.points.length;
  }

  log.debug(`${kind} blobs=${report.blobs} tiles=${report.tiles}`);
  return report;
};
