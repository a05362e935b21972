import type { GeoPoint } from '../../entities/geo-point.js';
import type { Rider } from '../../entities/rider.js';
import type { Vehicle } from '../../entities/vehicle.js';

export type ProximityReason =
  | 'sent'
  | 'out_of_range'
  | 'missing_coordinates'
  | 'missing_token'
  | 'recent_notification'
  | 'dispatch_failed'
  | 'check_failed';

export interface ProximityOutcome {
  vehicleId: string;
  success: boolean;
  reason: ProximityReason;
  message: string;
  distanceMeters?: number;
}

export interface RiderLocationUpdate {
  updated: boolean;
  checks: number;
  notified: number;
  outcomes: ProximityOutcome[];
}

export interface SweepSummary {
  riders: number;
  checks: number;
  notified: number;
}

export interface ProximityAlertPort {
  checkPair(rider: Rider, vehicle: Vehicle): Promise<ProximityOutcome>;
  /** Stores the rider's location then checks the rider's fleet. */
  updateRiderLocation(userId: string, location: GeoPoint): Promise<RiderLocationUpdate>;
  sweep(): Promise<SweepSummary>;
}
