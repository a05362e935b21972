import type { GeoPoint } from './geo-point.js';

export type VehicleStatus = 'available' | 'full' | 'unavailable';

/** Free-form keypad detail; `standing` changes how ETA is estimated. */
export type VehicleStatusDetail = 'available' | 'full' | 'standing' | 'inactive' | string;

export interface Vehicle {
  readonly id: string;
  readonly fleetId: string;
  readonly deviceId?: string;
  readonly plate?: string;
  readonly routeId?: string;
  readonly routeName?: string;
  readonly driverName?: string;
  readonly status: VehicleStatus;
  readonly statusDetail?: VehicleStatusDetail;
  readonly boundFor?: string;
  readonly location?: GeoPoint;
  readonly updatedAt?: Date;
}

/** Shape pushed on the fleet vehicle-list channel. */
export interface VehicleSummary {
  readonly id: string;
  readonly plate?: string;
  readonly route?: string;
  readonly driverName?: string;
  readonly status: VehicleStatus;
  readonly statusDetail?: VehicleStatusDetail;
  readonly boundFor?: string;
  readonly location?: GeoPoint;
}

export function toVehicleSummary(vehicle: Vehicle): VehicleSummary {
  return {
    id: vehicle.id,
    plate: vehicle.plate,
    route: vehicle.routeName,
    driverName: vehicle.driverName,
    status: vehicle.status,
    statusDetail: vehicle.statusDetail,
    boundFor: vehicle.boundFor,
    location: vehicle.location,
  };
}
