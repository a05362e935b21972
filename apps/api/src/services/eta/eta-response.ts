import type { EtaEstimate, GeoPoint } from '@transit-pulse/domain';
import { round2 } from './eta-math.js';

/** Wire shape shared by the HTTP endpoint and the ETA channel. */
export interface EtaResponse {
  vehicle_id: string;
  vehicle_plate: string;
  vehicle_route: string;
  distance_meters: number;
  distance_km: number;
  current_speed_mps: number;
  current_speed_kmh: number;
  average_speed_mps: number;
  average_speed_kmh: number;
  eta_minutes: number;
  eta_formatted: string;
  vehicle_location: GeoPoint;
  user_location: GeoPoint;
  status: string;
  message: string;
  is_stopped: boolean;
  confidence: string;
}

export function toEtaResponse(eta: EtaEstimate): EtaResponse {
  return {
    vehicle_id: eta.vehicleId,
    vehicle_plate: eta.vehiclePlate,
    vehicle_route: eta.vehicleRoute,
    distance_meters: round2(eta.distanceMeters),
    distance_km: round2(eta.distanceMeters / 1000),
    current_speed_mps: round2(eta.currentSpeedMps),
    current_speed_kmh: round2(eta.currentSpeedMps * 3.6),
    average_speed_mps: round2(eta.averageSpeedMps),
    average_speed_kmh: round2(eta.averageSpeedMps * 3.6),
    eta_minutes: round2(eta.etaMinutes),
    eta_formatted: eta.etaFormatted,
    vehicle_location: { latitude: eta.vehicleLocation.latitude, longitude: eta.vehicleLocation.longitude },
    user_location: { latitude: eta.userLocation.latitude, longitude: eta.userLocation.longitude },
    status: eta.status,
    message: eta.message,
    is_stopped: eta.isStopped,
    confidence: eta.confidence,
  };
}
