import type { GeoPoint } from '@transit-pulse/domain';
import { EARTH_RADIUS_METERS } from '../geo/haversine.js';

/**
 * Polyline in a local equirectangular frame anchored at its mean latitude.
 * Distances along it are metres in that frame.
 */
export interface RouteShape {
  points: GeoPoint[];
  cumulativeMeters: number[];
  totalLengthMeters: number;
  refLatRad: number;
}

export interface Projection {
  distanceAlongMeters: number;
  deviationMeters: number;
}

interface XY {
  x: number;
  y: number;
}

const toRad = (deg: number): number => (deg * Math.PI) / 180;

function toXY(point: GeoPoint, refLatRad: number): XY {
  return {
    x: EARTH_RADIUS_METERS * toRad(point.longitude) * Math.cos(refLatRad),
    y: EARTH_RADIUS_METERS * toRad(point.latitude),
  };
}

export function buildRouteShape(points: GeoPoint[]): RouteShape {
  const meanLat = points.reduce((sum, p) => sum + p.latitude, 0) / Math.max(points.length, 1);
  const refLatRad = toRad(meanLat);
  const xy = points.map((p) => toXY(p, refLatRad));

  const cumulativeMeters: number[] = [0];
  let total = 0;
  for (let i = 1; i < xy.length; i += 1) {
    total += Math.hypot(xy[i].x - xy[i - 1].x, xy[i].y - xy[i - 1].y);
    cumulativeMeters.push(total);
  }
  return { points, cumulativeMeters, totalLengthMeters: total, refLatRad };
}

/** Nearest point on the polyline, expressed as arc length from its first vertex. */
export function projectOntoShape(shape: RouteShape, point: GeoPoint): Projection {
  const p = toXY(point, shape.refLatRad);
  let best: Projection = { distanceAlongMeters: 0, deviationMeters: Number.POSITIVE_INFINITY };

  for (let i = 1; i < shape.points.length; i += 1) {
    const start = toXY(shape.points[i - 1], shape.refLatRad);
    const end = toXY(shape.points[i], shape.refLatRad);
    const segX = end.x - start.x;
    const segY = end.y - start.y;
    const lengthSq = segX * segX + segY * segY;

    let t = 0;
    if (lengthSq > 0) {
      t = ((p.x - start.x) * segX + (p.y - start.y) * segY) / lengthSq;
      t = Math.max(0, Math.min(1, t));
    }

    const deviation = Math.hypot(p.x - (start.x + t * segX), p.y - (start.y + t * segY));
    if (deviation < best.deviationMeters) {
      best = {
        distanceAlongMeters: shape.cumulativeMeters[i - 1] + t * Math.sqrt(lengthSq),
        deviationMeters: deviation,
      };
    }
  }
  return best;
}

/** Point at the given arc length; clamps to the ends. */
export function interpolateAlongShape(shape: RouteShape, distanceMeters: number): GeoPoint {
  const { points, cumulativeMeters } = shape;
  const last = points[points.length - 1];
  if (distanceMeters <= 0) return points[0];
  if (distanceMeters >= shape.totalLengthMeters) return last;

  for (let i = 1; i < points.length; i += 1) {
    if (cumulativeMeters[i] < distanceMeters) continue;
    const segLength = cumulativeMeters[i] - cumulativeMeters[i - 1];
    const t = segLength > 0 ? (distanceMeters - cumulativeMeters[i - 1]) / segLength : 0;
    const a = points[i - 1];
    const b = points[i];
    return {
      latitude: a.latitude + t * (b.latitude - a.latitude),
      longitude: a.longitude + t * (b.longitude - a.longitude),
    };
  }
  return last;
}

export function snapToShape(shape: RouteShape, point: GeoPoint): GeoPoint {
  return interpolateAlongShape(shape, projectOntoShape(shape, point).distanceAlongMeters);
}
