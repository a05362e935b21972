import type { CorrectedPosition } from '../../entities/telemetry-reading.js';

// ---------------------------------------------------------------------------
// Inbound envelope (from a device)
// ---------------------------------------------------------------------------

export interface TelemetryEnvelope {
  /** base64(IV ‖ AES-256-CBC ciphertext) */
  encryptedData: string;
}

/** Distance between the corrected fix and a ground-truth fix sent by test devices. */
export interface GroundTruthAnalysis {
  groundTruthLatitude: number;
  groundTruthLongitude: number;
  errorMeters: number;
}

export interface TelemetryIngestResult {
  position: CorrectedPosition;
  vehicleId: string | null;
  analysis?: GroundTruthAnalysis;
}

// ---------------------------------------------------------------------------
// Port
// ---------------------------------------------------------------------------

export interface TelemetryIngestionPort {
  /**
   * Rejects with DecryptionError, SchemaValidationError, ModelNotReadyError or
   * InferenceError. Secondary write failures only log.
   */
  ingest(envelope: TelemetryEnvelope): Promise<TelemetryIngestResult>;
}
