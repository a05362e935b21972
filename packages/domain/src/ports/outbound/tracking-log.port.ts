import type { SpeedSample, TrackingLogRecord } from '../../entities/tracking-log.js';

export interface SpeedHistoryQuery {
  deviceId: string;
  since: Date;
  limit: number;
}

export interface TrackingLogPort {
  append(record: TrackingLogRecord): Promise<void>;
  latestSample(deviceId: string): Promise<SpeedSample | null>;
  /** Newest first. */
  recentSpeedSamples(query: SpeedHistoryQuery): Promise<SpeedSample[]>;
}
