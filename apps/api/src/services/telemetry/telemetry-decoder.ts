import { z } from 'zod';
import { SchemaValidationError } from '@transit-pulse/domain';
import type { PositionFix, TelemetryReading } from '@transit-pulse/domain';
import { decryptEnvelope } from '@transit-pulse/adapters';

const finite = z.number().finite();

/** Field names are the ones devices put on the wire. */
export const sensorReadingSchema = z.object({
  device_id: z.union([z.string().min(1), z.number().int().nonnegative()]),
  Cn0DbHz: finite,
  Svid: z.number().int(),
  SvElevationDegrees: z.number().min(-90).max(90),
  SvAzimuthDegrees: finite,
  IMU_MessageType: z.string(),
  MeasurementX: finite,
  MeasurementY: finite,
  MeasurementZ: finite,
  BiasX: finite,
  BiasY: finite,
  BiasZ: finite,
  WlsPositionXEcefMeters: finite.optional(),
  WlsPositionYEcefMeters: finite.optional(),
  WlsPositionZEcefMeters: finite.optional(),
  raw_latitude: z.number().min(-90).max(90).optional(),
  raw_longitude: z.number().min(-180).max(180).optional(),
  raw_altitude: finite.optional(),
  SpeedMps: z.number().finite().nonnegative().optional(),
  SpeedKmh: z.number().finite().nonnegative().optional(),
  LatitudeDegrees_gt: z.number().min(-90).max(90).optional(),
  LongitudeDegrees_gt: z.number().min(-180).max(180).optional(),
});

export type SensorReadingPayload = z.infer<typeof sensorReadingSchema>;

/**
 * Exactly one representation: a full ECEF triple, or raw latitude, longitude
 * and altitude together. A partial set of either is rejected.
 */
function resolveFix(p: SensorReadingPayload): PositionFix {
  const ecefParts = [p.WlsPositionXEcefMeters, p.WlsPositionYEcefMeters, p.WlsPositionZEcefMeters];
  const ecefCount = ecefParts.filter((v) => v !== undefined).length;
  const rawParts = [p.raw_latitude, p.raw_longitude, p.raw_altitude];
  const rawCount = rawParts.filter((v) => v !== undefined).length;

  if (ecefCount > 0 && ecefCount < 3) {
    throw new SchemaValidationError('ECEF position needs all of X, Y and Z', [
      { path: 'WlsPositionXEcefMeters', message: 'incomplete ECEF triple' },
    ]);
  }
  if (ecefCount === 3 && rawCount > 0) {
    throw new SchemaValidationError('Supply either an ECEF position or raw coordinates, not both');
  }
  if (
    p.WlsPositionXEcefMeters !== undefined &&
    p.WlsPositionYEcefMeters !== undefined &&
    p.WlsPositionZEcefMeters !== undefined
  ) {
    return {
      kind: 'ecef',
      x: p.WlsPositionXEcefMeters,
      y: p.WlsPositionYEcefMeters,
      z: p.WlsPositionZEcefMeters,
    };
  }
  if (p.raw_latitude !== undefined && p.raw_longitude !== undefined && p.raw_altitude !== undefined) {
    return {
      kind: 'geodetic',
      latitude: p.raw_latitude,
      longitude: p.raw_longitude,
      altitude: p.raw_altitude,
    };
  }
  throw new SchemaValidationError(
    rawCount > 0
      ? 'Raw coordinates need raw_latitude, raw_longitude and raw_altitude'
      : 'Reading carries neither an ECEF position nor raw coordinates',
  );
}

function speedMps(p: SensorReadingPayload): number {
  if (p.SpeedMps !== undefined) return p.SpeedMps;
  if (p.SpeedKmh !== undefined) return p.SpeedKmh / 3.6;
  return 0;
}

/** Validates an already-decrypted payload. */
export function parseSensorReading(plaintext: string): TelemetryReading {
  let json: unknown;
  try {
    json = JSON.parse(plaintext);
  } catch (err) {
    throw new SchemaValidationError('Decrypted payload is not JSON', [], { cause: err });
  }

  const parsed = sensorReadingSchema.safeParse(json);
  if (!parsed.success) {
    throw new SchemaValidationError(
      'Decrypted payload does not match the sensor reading schema',
      parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    );
  }

  const p = parsed.data;
  const groundTruth =
    p.LatitudeDegrees_gt !== undefined && p.LongitudeDegrees_gt !== undefined
      ? { latitude: p.LatitudeDegrees_gt, longitude: p.LongitudeDegrees_gt }
      : undefined;

  return {
    deviceId: String(p.device_id),
    cn0DbHz: p.Cn0DbHz,
    svid: p.Svid,
    svElevationDegrees: p.SvElevationDegrees,
    svAzimuthDegrees: p.SvAzimuthDegrees,
    imuMessageType: p.IMU_MessageType,
    measurement: { x: p.MeasurementX, y: p.MeasurementY, z: p.MeasurementZ },
    bias: { x: p.BiasX, y: p.BiasY, z: p.BiasZ },
    speedMps: speedMps(p),
    fix: resolveFix(p),
    groundTruth,
  };
}

export class TelemetryDecoder {
  constructor(private readonly key: Buffer) {}

  /** Throws DecryptionError or SchemaValidationError. */
  decode(encryptedData: string): TelemetryReading {
    return parseSensorReading(decryptEnvelope(encryptedData, this.key));
  }
}
