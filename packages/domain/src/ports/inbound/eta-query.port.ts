import type { EtaEstimate } from '../../entities/eta.js';
import type { GeoPoint } from '../../entities/geo-point.js';

export interface EtaRequest {
  vehicleId: string;
  userLocation: GeoPoint;
}

export interface EtaQueryPort {
  /** Rejects with NotFoundError or VehicleLocationUnavailableError. */
  estimate(request: EtaRequest): Promise<EtaEstimate>;
}
