import type { GeoPoint } from './geo-point.js';

export type EtaConfidence = 'high' | 'medium' | 'low';

export interface EtaEstimate {
  readonly vehicleId: string;
  readonly vehiclePlate: string;
  readonly vehicleRoute: string;
  readonly distanceMeters: number;
  readonly currentSpeedMps: number;
  readonly averageSpeedMps: number;
  readonly etaMinutes: number;
  readonly etaFormatted: string;
  readonly confidence: EtaConfidence;
  readonly message: string;
  readonly isStopped: boolean;
  readonly status: string;
  readonly vehicleLocation: GeoPoint;
  readonly userLocation: GeoPoint;
}
