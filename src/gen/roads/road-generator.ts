import { ROAD_DEFAULTS } from "../../config";
import { compareCoordinates, coordinateKey } from "../../types";
import type { Coordinate, Point } from "../../types";
import { Logger } from "../../util/logger";
import { retypeTile } from "../../world/grid";
import type { TileMatrix } from "../../world/types";
import type { RoadSettings } from "../config";
import type { ElevationField } from "../elevation";
import { findPeaks, mergePeaks } from "./peaks";
import { rasterizeEdge, snapToBorder } from "./rasterize";
import { buildVoronoiCells } from "./voronoi";
import type { VoronoiCell } from "./voronoi";

const log = Logger.scope("ROADS");

export type RoadEdge = {
  start: Coordinate;
  end: Coordinate;
};

export type RoadNetwork = {
  peaks: Coordinate[];
  edges: RoadEdge[];
  paths: Coordinate[][];
};

export const roadEdgeKey = (a: Coordinate, b: Coordinate): string => {
  return compareCoordinates(a, b) <= 0
    ? `${coordinateKey(a)}|${coordinateKey(b)}`
    : `${coordinateKey(b)}|${coordinateKey(a)}`;
};

const vertexEpsilon = 1e-6;

// Cells clip a shared bisector separately; its vertex can straddle an integer.
const settleVertex = (value: number): number => {
  const nearest = Math.round(value);
  return Math.abs(value - nearest) < vertexEpsilon ? nearest : value;
};

const toGridCoordinate = (point: Point, size: number): Coordinate => {
  const max = size - 1;
  const truncate = (value: number): number => Math.max(0, Math.min(max, Math.trunc(settleVertex(value))));
  return {
    row: snapToBorder(truncate(point.y), max, ROAD_DEFAULTS.borderSnap),
    col: snapToBorder(truncate(point.x), max, ROAD_DEFAULTS.borderSnap)
  };
};

/** Unique, non-degenerate cell sides in grid coordinates, endpoints ordered. */
export const collectEdges = (cells: VoronoiCell[], size: number): RoadEdge[] => {
  const seen = new Set<string>();
  const edges: RoadEdge[] = [];

  for (const cell of cells) {
    const vertices = cell.polygon.map((point) => toGridCoordinate(point, size));
    for (let i = 0; i < vertices.length; i += 1) {
      const a = vertices[i];
      const b = vertices[(i + 1) % vertices.length];
      if (a.row === b.row && a.col === b.col) {
        continue;
      }
      const key = roadEdgeKey(a, b);
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
      edges.push(compareCoordinates(a, b) <= 0 ? { start: a, end: b } : { start: b, end: a });
    }
  }

  return edges;
};

export class RoadNetworkGenerator {
  private readonly field: ElevationField;
  private readonly settings: RoadSettings;

  constructor(field: ElevationField, settings: RoadSettings) {
    this.field = field;
    this.settings = settings;
  }

  generate(): RoadNetwork {
    const size = this.field.length;
    const found = findPeaks(this.field, this.settings.sliceCount, this.settings.minElevation);
    const peaks = mergePeaks(this.field, found, this.settings.sliceCount, this.settings.bandwidth);
    log.debug(`peaks found=${found.length} kept=${peaks.length}`);

    const sites = peaks.map((peak): Point => ({ x: peak.col, y: peak.row }));
    const cells = buildVoronoiCells(sites, size - 1, size - 1);
    const edges = collectEdges(cells, size);
    const paths = edges.map((edge) => rasterizeEdge(edge.start, edge.end));
    log.debug(`road edges=${edges.length}`);

    return { peaks, edges, paths };
  }
}

/** Turns every path tile into street; returns the number of distinct tiles touched. */
export const placeRoads = (tiles: TileMatrix, paths: Coordinate[][]): number => {
  const touched = new Set<string>();
  for (const path of paths) {
    for (const point of path) {
      retypeTile(tiles[point.row][point.col], "street");
      touched.add(coordinateKey(point));
    }
  }
  return touched.size;
};
