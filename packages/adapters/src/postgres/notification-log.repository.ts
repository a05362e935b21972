import type {
  NotificationLogPort,
  NotificationRecord,
  RecentNotificationQuery,
} from '@transit-pulse/domain';
import { getPool } from './pool.js';

export type NotificationRow = {
  user_id: string;
  vehicle_id: string;
  ts: Date;
  success: boolean;
  distance_meters: number;
  message: string | null;
};

export class PgNotificationLog implements NotificationLogPort {
  async append(record: NotificationRecord): Promise<void> {
    await getPool().query(
      `INSERT INTO transit.notification_logs
        (user_id, vehicle_id, ts, success, distance_meters, notification_type, message)
       VALUES ($1,$2,$3,$4,$5,$6,$7)`,
      [
        record.userId,
        record.vehicleId,
        record.ts,
        record.success,
        record.distanceMeters,
        record.kind,
        record.message ?? null,
      ],
    );
  }

  async findRecent(query: RecentNotificationQuery): Promise<NotificationRecord | null> {
    const { rows } = await getPool().query<NotificationRow>(
      `SELECT user_id, vehicle_id, ts, success, distance_meters, message
       FROM transit.notification_logs
       WHERE user_id = $1 AND vehicle_id = $2 AND ts >= $3
         AND ($4::boolean IS FALSE OR success = TRUE)
       ORDER BY ts DESC
       LIMIT 1`,
      [query.userId, query.vehicleId, query.since, query.successOnly ?? false],
    );
    return rows[0] ? mapNotificationRow(rows[0]) : null;
  }

  async listByUser(userId: string, limit: number): Promise<NotificationRecord[]> {
    const { rows } = await getPool().query<NotificationRow>(
      `SELECT user_id, vehicle_id, ts, success, distance_meters, message
       FROM transit.notification_logs
       WHERE user_id = $1
       ORDER BY ts DESC
       LIMIT $2`,
      [userId, limit],
    );
    return rows.map(mapNotificationRow);
  }
}

function mapNotificationRow(row: NotificationRow): NotificationRecord {
  return {
    userId: row.user_id,
    vehicleId: row.vehicle_id,
    ts: row.ts,
    success: row.success,
    distanceMeters: row.distance_meters,
    kind: 'proximity',
    message: row.message ?? undefined,
  };
}
