import type { Point } from "../../types";
import { GeometryError } from "../errors";

export type VoronoiCell = {
  site: Point;
  polygon: Point[];
};

const epsilon = 1e-6;

const evaluateLine = (point: Point, midpoint: Point, normal: Point): number => {
  return (point.x - midpoint.x) * normal.x + (point.y - midpoint.y) * normal.y;
};

const intersectSegmentWithLine = (start: Point, end: Point, startValue: number, endValue: number): Point => {
  const denominator = startValue - endValue;
  if (Math.abs(denominator) < 1e-9) {
    return { x: (start.x + end.x) * 0.5, y: (start.y + end.y) * 0.5 };
  }
  const t = Math.max(0, Math.min(1, startValue / denominator));
  return {
    x: start.x + (end.x - start.x) * t,
    y: start.y + (end.y - start.y) * t
  };
};

/** Keeps the part of `polygon` on the `site` side of the bisector between `site` and `other`. */
export const clipPolygonWithBisector = (polygon: Point[], site: Point, other: Point): Point[] => {
  const midpoint = { x: (site.x + other.x) * 0.5, y: (site.y + other.y) * 0.5 };
  const normal = { x: other.x - site.x, y: other.y - site.y };
  const clipped: Point[] = [];

  for (let i = 0; i < polygon.length; i += 1) {
    const current = polygon[i];
    const next = polygon[(i + 1) % polygon.length];
    const currentValue = evaluateLine(current, midpoint, normal);
    const nextValue = evaluateLine(next, midpoint, normal);
    const currentInside = currentValue <= epsilon;
    const nextInside = nextValue <= epsilon;

    if (currentInside && nextInside) {
      clipped.push(next);
    } else if (currentInside) {
      clipped.push(intersectSegmentWithLine(current, next, currentValue, nextValue));
    } else if (nextInside) {
      clipped.push(intersectSegmentWithLine(current, next, currentValue, nextValue));
      clipped.push(next);
    }
  }

  return clipped;
};

const buildCell = (site: Point, sites: Point[], width: number, height: number): Point[] => {
  let polygon: Point[] = [
    { x: 0, y: 0 },
    { x: width, y: 0 },
    { x: width, y: height },
    { x: 0, y: height }
  ];

  for (const other of sites) {
    if (other === site || (other.x === site.x && other.y === site.y)) {
      continue;
    }
    polygon = clipPolygonWithBisector(polygon, site, other);
    if (polygon.length < 3) {
      return [];
    }
  }

  return polygon;
};

/** Voronoi cells of `sites` clipped to the box [0, width] x [0, height]. */
export const buildVoronoiCells = (sites: Point[], width: number, height: number): VoronoiCell[] => {
  if (sites.length < 3) {
    throw new GeometryError(`Cannot build a Voronoi diagram from ${sites.length} site(s); at least 3 are required`);
  }
  return sites.map((site) => ({ site, polygon: buildCell(site, sites, width, height) }));
};
