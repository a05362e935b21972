import type { SeededRng } from '@transit-pulse/adapters';
import type { DriveState } from './drive-simulator.js';

export type FixFormat = 'geodetic' | 'ecef';

// WGS84
const A = 6_378_137;
const F = 1 / 298.257223563;
const E2 = F * (2 - F);

function toEcef(lat: number, lon: number, alt: number): { x: number; y: number; z: number } {
  const phi = (lat * Math.PI) / 180;
  const lambda = (lon * Math.PI) / 180;
  const n = A / Math.sqrt(1 - E2 * Math.sin(phi) ** 2);
  return {
    x: (n + alt) * Math.cos(phi) * Math.cos(lambda),
    y: (n + alt) * Math.cos(phi) * Math.sin(lambda),
    z: (n * (1 - E2) + alt) * Math.sin(phi),
  };
}

/**
 * One wire-format sensor reading. The reported fix is the true position
 * plus a few metres of noise, the way a phone's WLS solution drifts.
 */
export function buildSensorReading(
  deviceId: string,
  state: DriveState,
  rng: SeededRng,
  format: FixFormat,
): Record<string, string | number> {
  const noisyLat = state.latitude + (rng.nextGaussian() * 4) / 111_320;
  const noisyLng = state.longitude + (rng.nextGaussian() * 4) / 111_320;

  const base: Record<string, string | number> = {
    device_id: deviceId,
    Cn0DbHz: Math.round(rng.nextFloat(18, 45) * 10) / 10,
    Svid: Math.floor(rng.nextFloat(1, 33)),
    SvElevationDegrees: Math.round(rng.nextFloat(10, 85) * 10) / 10,
    SvAzimuthDegrees: Math.round(rng.nextFloat(0, 360) * 10) / 10,
    IMU_MessageType: 'UncalAccel',
    MeasurementX: rng.nextGaussian() * 0.2,
    MeasurementY: rng.nextGaussian() * 0.2,
    MeasurementZ: 9.81 + rng.nextGaussian() * 0.1,
    BiasX: 0,
    BiasY: 0,
    BiasZ: 0,
    SpeedMps: Math.round((state.speedKph / 3.6) * 100) / 100,
  };

  if (format === 'ecef') {
    const ecef = toEcef(noisyLat, noisyLng, state.altitude);
    return {
      ...base,
      WlsPositionXEcefMeters: ecef.x,
      WlsPositionYEcefMeters: ecef.y,
      WlsPositionZEcefMeters: ecef.z,
    };
  }
  return { ...base, raw_latitude: noisyLat, raw_longitude: noisyLng, raw_altitude: state.altitude };
}
