/**
 * Domain Entity Tests
 *
 * The domain package is mostly interfaces; the few runtime pieces are:
 *   1. isGeoPoint — the guard every adapter uses on stored coordinates
 *   2. toVehicleSummary — the projection pushed on fleet channels
 *   3. the pipeline error classes and the status codes they carry
 */

import { describe, it, expect } from '@jest/globals';

import {
  ConnectionFault,
  DecryptionError,
  GeometryUnavailable,
  InferenceError,
  ModelNotReadyError,
  NotFoundError,
  PipelineError,
  SchemaValidationError,
  VehicleLocationUnavailableError,
  isGeoPoint,
  isPipelineError,
  toVehicleSummary,
} from '../index.js';
import type { PositionFix, Vehicle, VehicleStatus } from '../index.js';

// ─── Helpers ──────────────────────────────────────────────────────────────────

function makeVehicle(overrides: Partial<Vehicle> = {}): Vehicle {
  return {
    id: 'veh-01',
    fleetId: 'fleet-north',
    deviceId: 'dev-01',
    plate: 'ABC 123',
    routeId: 'route-7',
    routeName: 'Centro - Lahug',
    driverName: 'Test Driver',
    status: 'available',
    statusDetail: 'standing',
    boundFor: 'Lahug',
    location: { latitude: 10.31, longitude: 123.89 },
    updatedAt: new Date('2026-01-01T00:00:00Z'),
    ...overrides,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// GeoPoint
// ═══════════════════════════════════════════════════════════════════════════════

describe('isGeoPoint', () => {
  it('accepts finite latitude and longitude', () => {
    expect(isGeoPoint({ latitude: 10.3, longitude: 123.9 })).toBe(true);
  });

  it('ignores extra fields', () => {
    expect(isGeoPoint({ latitude: 0, longitude: 0, altitude: 12 })).toBe(true);
  });

  it('rejects a missing coordinate', () => {
    expect(isGeoPoint({ latitude: 10 })).toBe(false);
  });

  it('rejects non-numeric and non-finite coordinates', () => {
    expect(isGeoPoint({ latitude: '10', longitude: 120 })).toBe(false);
    expect(isGeoPoint({ latitude: Number.NaN, longitude: 120 })).toBe(false);
    expect(isGeoPoint({ latitude: 10, longitude: Number.POSITIVE_INFINITY })).toBe(false);
  });

  it('rejects null and primitives', () => {
    expect(isGeoPoint(null)).toBe(false);
    expect(isGeoPoint(42)).toBe(false);
    expect(isGeoPoint('10,120')).toBe(false);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Vehicle
// ═══════════════════════════════════════════════════════════════════════════════

describe('toVehicleSummary', () => {
  it('projects the fields clients render and renames routeName to route', () => {
    expect(toVehicleSummary(makeVehicle())).toEqual({
      id: 'veh-01',
      plate: 'ABC 123',
      route: 'Centro - Lahug',
      driverName: 'Test Driver',
      status: 'available',
      statusDetail: 'standing',
      boundFor: 'Lahug',
      location: { latitude: 10.31, longitude: 123.89 },
    });
  });

  it('drops internal identifiers', () => {
    const summary = toVehicleSummary(makeVehicle());
    expect(summary).not.toHaveProperty('deviceId');
    expect(summary).not.toHaveProperty('fleetId');
    expect(summary).not.toHaveProperty('updatedAt');
  });

  it('covers every vehicle status', () => {
    const statuses: VehicleStatus[] = ['available', 'full', 'unavailable'];
    for (const status of statuses) {
      expect(toVehicleSummary(makeVehicle({ status })).status).toBe(status);
    }
  });
});

describe('PositionFix', () => {
  it('discriminates on kind', () => {
    const fixes: PositionFix[] = [
      { kind: 'ecef', x: 1, y: 2, z: 3 },
      { kind: 'geodetic', latitude: 10, longitude: 120, altitude: 0 },
    ];
    expect(fixes.map((f) => f.kind)).toEqual(['ecef', 'geodetic']);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Errors
// ═══════════════════════════════════════════════════════════════════════════════

describe('pipeline errors', () => {
  it('carry status and code', () => {
    expect(new DecryptionError('x')).toMatchObject({ status: 400, code: 'decryption_error' });
    expect(new SchemaValidationError('x')).toMatchObject({ status: 422, code: 'schema_validation_error' });
    expect(new InferenceError('x')).toMatchObject({ status: 500, code: 'inference_error' });
    expect(new NotFoundError('x')).toMatchObject({ status: 404, code: 'not_found' });
  });

  it('names the subclass', () => {
    expect(new DecryptionError('x').name).toBe('DecryptionError');
    expect(new ConnectionFault('x').name).toBe('ConnectionFault');
  });

  it('ModelNotReadyError is 202 while the model is pending and 503 after a failed load', () => {
    expect(new ModelNotReadyError('not_started', 'wait').status).toBe(202);
    expect(new ModelNotReadyError('loading', 'wait').status).toBe(202);
    expect(new ModelNotReadyError('error', 'broken').status).toBe(503);
  });

  it('SchemaValidationError keeps its issues', () => {
    const err = new SchemaValidationError('bad', [{ path: 'Svid', message: 'Expected number' }]);
    expect(err.issues).toEqual([{ path: 'Svid', message: 'Expected number' }]);
  });

  it('VehicleLocationUnavailableError names the vehicle', () => {
    const err = new VehicleLocationUnavailableError('veh-9');
    expect(err.status).toBe(400);
    expect(err.message).toBe('Vehicle veh-9 location not available');
  });

  it('GeometryUnavailable names the route', () => {
    expect(new GeometryUnavailable('route-7').message).toBe('Route geometry unavailable for route-7');
  });

  it('isPipelineError separates HTTP-mapped errors from internal ones', () => {
    expect(isPipelineError(new NotFoundError('x'))).toBe(true);
    expect(new NotFoundError('x')).toBeInstanceOf(PipelineError);
    expect(isPipelineError(new ConnectionFault('x'))).toBe(false);
    expect(isPipelineError(new Error('x'))).toBe(false);
  });
});
