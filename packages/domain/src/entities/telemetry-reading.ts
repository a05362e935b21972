import type { GeoPoint } from './geo-point.js';

export interface EcefFix {
  readonly kind: 'ecef';
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

export interface GeodeticFix {
  readonly kind: 'geodetic';
  readonly latitude: number;
  readonly longitude: number;
  /** metres above the WGS84 ellipsoid */
  readonly altitude: number;
}

/** Raw WLS solution as reported by the device: exactly one representation. */
export type PositionFix = EcefFix | GeodeticFix;

export interface AxisTriple {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

export interface TelemetryReading {
  readonly deviceId: string;
  readonly cn0DbHz: number;
  readonly svid: number;
  readonly svElevationDegrees: number;
  readonly svAzimuthDegrees: number;
  readonly imuMessageType: string;
  readonly measurement: AxisTriple;
  readonly bias: AxisTriple;
  /** Normalized to m/s at decode time. */
  readonly speedMps: number;
  readonly fix: PositionFix;
  /** Only honoured when ground-truth comparison is switched on. */
  readonly groundTruth?: GeoPoint;
}

export interface CorrectedPosition extends GeoPoint {
  readonly snapped: boolean;
}
