import type { ModelLoadState } from '../entities/model-load-state.js';

/** Base for errors the HTTP layer maps straight to a status code. */
export abstract class PipelineError extends Error {
  abstract readonly status: number;
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad base64, IV or padding, or a key that does not match. */
export class DecryptionError extends PipelineError {
  readonly status = 400;
  readonly code = 'decryption_error';
}

export interface SchemaIssue {
  path: string;
  message: string;
}

/** Decrypted payload is not JSON or does not satisfy the reading schema. */
export class SchemaValidationError extends PipelineError {
  readonly status = 422;
  readonly code = 'schema_validation_error';

  constructor(
    message: string,
    readonly issues: SchemaIssue[] = [],
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class ModelNotReadyError extends PipelineError {
  readonly code = 'model_not_ready';

  constructor(
    readonly loadState: Exclude<ModelLoadState, 'ready'>,
    message: string,
  ) {
    super(message);
  }

  /** 202 means "retry later", 503 means loading failed for good. */
  get status(): number {
    return this.loadState === 'error' ? 503 : 202;
  }
}

export class InferenceError extends PipelineError {
  readonly status = 500;
  readonly code = 'inference_error';
}

export class NotFoundError extends PipelineError {
  readonly status = 404;
  readonly code = 'not_found';
}

export class VehicleLocationUnavailableError extends PipelineError {
  readonly status = 400;
  readonly code = 'vehicle_location_unavailable';

  constructor(vehicleId: string) {
    super(`Vehicle ${vehicleId} location not available`);
  }
}

/** Raised by a realtime connection whose send failed; the fabric drops it. */
export class ConnectionFault extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectionFault';
  }
}

/** Push gateway rejected or failed to deliver a message. */
export class PushDispatchFailure extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PushDispatchFailure';
  }
}

/** Route geometry could not be loaded; callers fall back to the unsnapped fix. */
export class GeometryUnavailable extends Error {
  constructor(
    readonly routeKey: string,
    options?: { cause?: unknown },
  ) {
    super(`Route geometry unavailable for ${routeKey}`, options);
    this.name = 'GeometryUnavailable';
  }
}

/** A secondary write failed after the primary result was already computed. */
export class PersistenceWarning extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistenceWarning';
  }
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}
