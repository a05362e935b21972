import type { Vehicle, VehicleStatus } from '../../entities/vehicle.js';
import type { GeoPoint } from '../../entities/geo-point.js';

export interface VehicleListFilters {
  status?: VehicleStatus[];
  /** Only vehicles whose location has both coordinates set. */
  withLocation?: boolean;
}

export interface VehicleCounts {
  total: number;
  available: number;
}

export interface VehicleRegistryPort {
  findById(vehicleId: string): Promise<Vehicle | null>;
  /** Device ids arrive either as strings or as numeric ids rendered to text. */
  findByDeviceId(deviceId: string): Promise<Vehicle | null>;
  listByFleet(fleetId: string, filters?: VehicleListFilters): Promise<Vehicle[]>;
  /** Overwrites only the location column; returns false when no row matched. */
  updateLocation(vehicleId: string, location: GeoPoint): Promise<boolean>;
  counts(): Promise<VehicleCounts>;
}
