import { fetch } from 'undici';
import { z } from 'zod';
import type {
  ModelSourcePort,
  PositionFeatures,
  PositionInferencePort,
  PositionOffset,
} from '@transit-pulse/domain';

const ML_INFERENCE_URL = process.env['ML_INFERENCE_URL'] ?? 'http://localhost:8500';

const healthSchema = z.object({
  status: z.literal('ok'),
  model: z.string(),
});

const predictionSchema = z.object({
  offset: z.tuple([z.number(), z.number()]),
});

/** Column names the correction model was trained on. */
function toModelColumns(f: PositionFeatures): Record<string, number | string> {
  return {
    Cn0DbHz: f.cn0DbHz,
    Svid: f.svid,
    SvElevationDegrees: f.svElevationDegrees,
    SvAzimuthDegrees: f.svAzimuthDegrees,
    IMU_MessageType: f.imuMessageType,
    MeasurementX: f.measurementX,
    MeasurementY: f.measurementY,
    MeasurementZ: f.measurementZ,
    BiasX: f.biasX,
    BiasY: f.biasY,
    BiasZ: f.biasZ,
    WlsPositionXEcefMeters: f.wlsPositionXEcefMeters,
    WlsPositionYEcefMeters: f.wlsPositionYEcefMeters,
    WlsPositionZEcefMeters: f.wlsPositionZEcefMeters,
    SignalQuality: f.signalQuality,
    WLS_Distance: f.wlsDistance,
    SpeedMps: f.speedMps,
  };
}

class HttpPositionInference implements PositionInferencePort {
  constructor(
    private readonly baseUrl: string,
    readonly modelName: string,
  ) {}

  async predictOffset(features: PositionFeatures): Promise<PositionOffset> {
    const resp = await fetch(`${this.baseUrl}/predict`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ features: toModelColumns(features) }),
    });
    if (!resp.ok) {
      throw new Error(`inference service responded ${resp.status}: ${await resp.text()}`);
    }
    const { offset } = predictionSchema.parse(await resp.json());
    return offset;
  }
}

/** Waits for the inference service to report a loaded model. */
export class HttpModelSource implements ModelSourcePort {
  constructor(private readonly baseUrl: string = ML_INFERENCE_URL) {}

  async load(): Promise<PositionInferencePort> {
    const resp = await fetch(`${this.baseUrl}/health`);
    if (!resp.ok) {
      throw new Error(`inference service unavailable (${resp.status})`);
    }
    const health = healthSchema.parse(await resp.json());
    console.log(`[inference] model ${health.model} ready at ${this.baseUrl}`);
    return new HttpPositionInference(this.baseUrl, health.model);
  }
}
