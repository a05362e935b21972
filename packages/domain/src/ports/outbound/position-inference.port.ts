/** Feature vector handed to the correction model, one entry per model input. */
export interface PositionFeatures {
  cn0DbHz: number;
  svid: number;
  svElevationDegrees: number;
  svAzimuthDegrees: number;
  imuMessageType: string;
  measurementX: number;
  measurementY: number;
  measurementZ: number;
  biasX: number;
  biasY: number;
  biasZ: number;
  wlsPositionXEcefMeters: number;
  wlsPositionYEcefMeters: number;
  wlsPositionZEcefMeters: number;
  signalQuality: number;
  wlsDistance: number;
  speedMps: number;
}

/** (Δlatitude, Δlongitude) in degrees. */
export type PositionOffset = readonly [number, number];

export interface PositionInferencePort {
  readonly modelName: string;
  predictOffset(features: PositionFeatures): Promise<PositionOffset>;
}

/** Produces a ready inference capability; may download or warm a model. */
export interface ModelSourcePort {
  load(): Promise<PositionInferencePort>;
}
