import type {
  GeoPoint,
  Vehicle,
  VehicleCounts,
  VehicleListFilters,
  VehicleRegistryPort,
  VehicleStatus,
} from '@transit-pulse/domain';
import { getPool } from './pool.js';

export type VehicleRow = {
  id: string;
  fleet_id: string;
  device_id: string | null;
  plate: string | null;
  route_id: string | null;
  route_name: string | null;
  driver_name: string | null;
  status: string;
  status_detail: string | null;
  bound_for: string | null;
  latitude: number | null;
  longitude: number | null;
  updated_at: Date | null;
};

const SELECT_VEHICLE = `
  SELECT v.id, v.fleet_id, v.device_id, v.plate, v.route_id, r.name AS route_name,
         v.driver_name, v.status, v.status_detail, v.bound_for,
         v.latitude, v.longitude, v.updated_at
  FROM transit.vehicles v
  LEFT JOIN transit.routes r ON r.id = v.route_id
`;

export class PgVehicleRegistry implements VehicleRegistryPort {
  async findById(vehicleId: string): Promise<Vehicle | null> {
    const { rows } = await getPool().query<VehicleRow>(
      `${SELECT_VEHICLE} WHERE v.id = $1`,
      [vehicleId],
    );
    return rows[0] ? mapVehicleRow(rows[0]) : null;
  }

  async findByDeviceId(deviceId: string): Promise<Vehicle | null> {
    const { rows } = await getPool().query<VehicleRow>(
      `${SELECT_VEHICLE} WHERE v.device_id = $1 LIMIT 1`,
      [deviceId],
    );
    return rows[0] ? mapVehicleRow(rows[0]) : null;
  }

  async listByFleet(fleetId: string, filters: VehicleListFilters = {}): Promise<Vehicle[]> {
    const conditions: string[] = ['v.fleet_id = $1'];
    const params: unknown[] = [fleetId];
    let idx = 2;

    if (filters.status && filters.status.length > 0) {
      conditions.push(`v.status = ANY($${idx++})`);
      params.push(filters.status);
    }
    if (filters.withLocation) {
      conditions.push('v.latitude IS NOT NULL AND v.longitude IS NOT NULL');
    }

    const { rows } = await getPool().query<VehicleRow>(
      `${SELECT_VEHICLE} WHERE ${conditions.join(' AND ')} ORDER BY v.plate`,
      params,
    );
    return rows.map(mapVehicleRow);
  }

  async updateLocation(vehicleId: string, location: GeoPoint): Promise<boolean> {
    const result = await getPool().query(
      `UPDATE transit.vehicles
         SET latitude = $2, longitude = $3, updated_at = NOW()
       WHERE id = $1`,
      [vehicleId, location.latitude, location.longitude],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async counts(): Promise<VehicleCounts> {
    const { rows } = await getPool().query<{ total: string; available: string }>(
      `SELECT COUNT(*) AS total,
              COUNT(*) FILTER (WHERE status = 'available') AS available
       FROM transit.vehicles`,
    );
    const row = rows[0];
    return {
      total: row ? Number(row.total) : 0,
      available: row ? Number(row.available) : 0,
    };
  }
}

function parseStatus(raw: string): VehicleStatus {
  return raw === 'available' || raw === 'full' ? raw : 'unavailable';
}

export function mapVehicleRow(row: VehicleRow): Vehicle {
  return {
    id: row.id,
    fleetId: row.fleet_id,
    deviceId: row.device_id ?? undefined,
    plate: row.plate ?? undefined,
    routeId: row.route_id ?? undefined,
    routeName: row.route_name ?? undefined,
    driverName: row.driver_name ?? undefined,
    status: parseStatus(row.status),
    statusDetail: row.status_detail ?? undefined,
    boundFor: row.bound_for ?? undefined,
    location:
      row.latitude !== null && row.longitude !== null
        ? { latitude: row.latitude, longitude: row.longitude }
        : undefined,
    updatedAt: row.updated_at ?? undefined,
  };
}
