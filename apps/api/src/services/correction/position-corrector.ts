import { InferenceError, ModelNotReadyError } from '@transit-pulse/domain';
import type { GeoPoint, PositionFeatures, TelemetryReading } from '@transit-pulse/domain';
import { ecefToGeodetic, geodeticToEcef, type Ecef } from '../geo/wgs84.js';
import type { ModelLoader } from '../model/model-loader.js';

export type CorrectionResult =
  | { ok: true; position: GeoPoint; ecef: Ecef; offset: readonly [number, number] }
  | { ok: false; error: ModelNotReadyError | InferenceError };

function toEcef(reading: TelemetryReading): Ecef {
  const { fix } = reading;
  if (fix.kind === 'ecef') return { x: fix.x, y: fix.y, z: fix.z };
  return geodeticToEcef(fix.latitude, fix.longitude, fix.altitude);
}

export function buildFeatures(reading: TelemetryReading, ecef: Ecef): PositionFeatures {
  return {
    cn0DbHz: reading.cn0DbHz,
    svid: reading.svid,
    svElevationDegrees: reading.svElevationDegrees,
    svAzimuthDegrees: reading.svAzimuthDegrees,
    imuMessageType: reading.imuMessageType,
    measurementX: reading.measurement.x,
    measurementY: reading.measurement.y,
    measurementZ: reading.measurement.z,
    biasX: reading.bias.x,
    biasY: reading.bias.y,
    biasZ: reading.bias.z,
    wlsPositionXEcefMeters: ecef.x,
    wlsPositionYEcefMeters: ecef.y,
    wlsPositionZEcefMeters: ecef.z,
    signalQuality: reading.cn0DbHz * Math.sin((reading.svElevationDegrees * Math.PI) / 180),
    wlsDistance: Math.sqrt(ecef.x ** 2 + ecef.y ** 2 + ecef.z ** 2),
    speedMps: reading.speedMps,
  };
}

/** Applies the model's (Δlat, Δlon) to the device's WLS fix. Never throws. */
export class PositionCorrector {
  constructor(private readonly loader: Pick<ModelLoader, 'acquire'>) {}

  async correct(reading: TelemetryReading): Promise<CorrectionResult> {
    const model = this.loader.acquire();
    if (model instanceof ModelNotReadyError) return { ok: false, error: model };

    try {
      const ecef = toEcef(reading);
      const offset = await model.predictOffset(buildFeatures(reading, ecef));
      const base = ecefToGeodetic(ecef);
      const position = {
        latitude: base.latitude + offset[0],
        longitude: base.longitude + offset[1],
      };
      if (!Number.isFinite(position.latitude) || !Number.isFinite(position.longitude)) {
        return { ok: false, error: new InferenceError('Model produced a non-finite position') };
      }
      return { ok: true, position, ecef, offset };
    } catch (err) {
      return {
        ok: false,
        error: new InferenceError(
          `Inference failed: ${err instanceof Error ? err.message : String(err)}`,
          { cause: err },
        ),
      };
    }
  }
}
