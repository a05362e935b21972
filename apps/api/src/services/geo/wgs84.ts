import type { GeoPoint } from '@transit-pulse/domain';

// WGS84 ellipsoid
const A = 6_378_137;
const F = 1 / 298.257223563;
const E2 = F * (2 - F);
const B = A * (1 - F);

const toRad = (deg: number): number => (deg * Math.PI) / 180;
const toDeg = (rad: number): number => (rad * 180) / Math.PI;

export interface Ecef {
  x: number;
  y: number;
  z: number;
}

export interface Geodetic extends GeoPoint {
  altitude: number;
}

function primeVerticalRadius(sinLat: number): number {
  return A / Math.sqrt(1 - E2 * sinLat * sinLat);
}

export function geodeticToEcef(latitude: number, longitude: number, altitude: number): Ecef {
  const lat = toRad(latitude);
  const lon = toRad(longitude);
  const sinLat = Math.sin(lat);
  const cosLat = Math.cos(lat);
  const n = primeVerticalRadius(sinLat);
  return {
    x: (n + altitude) * cosLat * Math.cos(lon),
    y: (n + altitude) * cosLat * Math.sin(lon),
    z: (n * (1 - E2) + altitude) * sinLat,
  };
}

/** Iterative inverse; converges to sub-millimetre within a handful of steps. */
export function ecefToGeodetic({ x, y, z }: Ecef): Geodetic {
  const longitude = toDeg(Math.atan2(y, x));
  const p = Math.hypot(x, y);

  if (p < 1e-9) {
    return { latitude: z >= 0 ? 90 : -90, longitude: 0, altitude: Math.abs(z) - B };
  }

  let lat = Math.atan2(z, p * (1 - E2));
  let altitude = 0;
  for (let i = 0; i < 10; i++) {
    const n = primeVerticalRadius(Math.sin(lat));
    altitude = p / Math.cos(lat) - n;
    const next = Math.atan2(z, p * (1 - (E2 * n) / (n + altitude)));
    const converged = Math.abs(next - lat) < 1e-12;
    lat = next;
    if (converged) break;
  }

  return { latitude: toDeg(lat), longitude, altitude };
}
