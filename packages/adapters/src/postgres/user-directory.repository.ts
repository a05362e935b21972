import type { GeoPoint, Rider, UserDirectoryPort } from '@transit-pulse/domain';
import { getPool } from './pool.js';

export type RiderRow = {
  id: string;
  fleet_id: string | null;
  latitude: number | null;
  longitude: number | null;
  push_token: string | null;
  notify: boolean;
};

export class PgUserDirectory implements UserDirectoryPort {
  async findById(userId: string): Promise<Rider | null> {
    const { rows } = await getPool().query<RiderRow>(
      `SELECT id, fleet_id, latitude, longitude, push_token, notify
       FROM transit.riders WHERE id = $1`,
      [userId],
    );
    return rows[0] ? mapRiderRow(rows[0]) : null;
  }

  async updateLocation(userId: string, location: GeoPoint): Promise<boolean> {
    const result = await getPool().query(
      `UPDATE transit.riders
         SET latitude = $2, longitude = $3, location_updated_at = NOW()
       WHERE id = $1`,
      [userId, location.latitude, location.longitude],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async listNotifiable(): Promise<Rider[]> {
    const { rows } = await getPool().query<RiderRow>(
      `SELECT id, fleet_id, latitude, longitude, push_token, notify
       FROM transit.riders
       WHERE notify = TRUE
         AND push_token IS NOT NULL
         AND fleet_id IS NOT NULL
         AND latitude IS NOT NULL
         AND longitude IS NOT NULL`,
    );
    return rows.map(mapRiderRow);
  }

  async count(): Promise<number> {
    const { rows } = await getPool().query<{ total: string }>(
      `SELECT COUNT(*) AS total FROM transit.riders`,
    );
    return rows[0] ? Number(rows[0].total) : 0;
  }
}

export function mapRiderRow(row: RiderRow): Rider {
  return {
    id: row.id,
    fleetId: row.fleet_id ?? undefined,
    location:
      row.latitude !== null && row.longitude !== null
        ? { latitude: row.latitude, longitude: row.longitude }
        : undefined,
    pushToken: row.push_token ?? undefined,
    notify: row.notify,
  };
}
