import type { CorrectedPosition, TelemetryReading } from './telemetry-reading.js';

export interface TrackingLogRecord {
  readonly vehicleId: string;
  readonly fleetId?: string;
  readonly deviceId: string;
  readonly ts: Date;
  readonly speedMps: number;
  readonly raw: TelemetryReading;
  readonly corrected: CorrectedPosition;
}

export interface SpeedSample {
  readonly speedMps: number;
  readonly ts: Date;
}
