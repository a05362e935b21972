import type {
  SpeedHistoryQuery,
  SpeedSample,
  TrackingLogPort,
  TrackingLogRecord,
} from '@transit-pulse/domain';
import { getPool } from './pool.js';

export type SpeedRow = {
  speed_mps: number;
  ts: Date;
};

export class PgTrackingLog implements TrackingLogPort {
  async append(record: TrackingLogRecord): Promise<void> {
    await getPool().query(
      `INSERT INTO transit.tracking_logs
        (vehicle_id, fleet_id, device_id, ts, speed_mps,
         latitude, longitude, snapped, raw_reading)
       VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9)`,
      [
        record.vehicleId,
        record.fleetId ?? null,
        record.deviceId,
        record.ts,
        record.speedMps,
        record.corrected.latitude,
        record.corrected.longitude,
        record.corrected.snapped,
        JSON.stringify(record.raw),
      ],
    );
  }

  async latestSample(deviceId: string): Promise<SpeedSample | null> {
    const { rows } = await getPool().query<SpeedRow>(
      `SELECT speed_mps, ts FROM transit.tracking_logs
       WHERE device_id = $1
       ORDER BY ts DESC
       LIMIT 1`,
      [deviceId],
    );
    return rows[0] ? mapSpeedRow(rows[0]) : null;
  }

  async recentSpeedSamples(query: SpeedHistoryQuery): Promise<SpeedSample[]> {
    const { rows } = await getPool().query<SpeedRow>(
      `SELECT speed_mps, ts FROM transit.tracking_logs
       WHERE device_id = $1 AND ts >= $2
       ORDER BY ts DESC
       LIMIT $3`,
      [query.deviceId, query.since, query.limit],
    );
    return rows.map(mapSpeedRow);
  }
}

function mapSpeedRow(row: SpeedRow): SpeedSample {
  return { speedMps: row.speed_mps, ts: row.ts };
}
