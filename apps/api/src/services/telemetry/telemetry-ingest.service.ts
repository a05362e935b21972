import { PersistenceWarning } from '@transit-pulse/domain';
import type {
  ClockPort,
  CorrectedPosition,
  GeoPoint,
  GroundTruthAnalysis,
  RealtimePublisherPort,
  TelemetryEnvelope,
  TelemetryIngestionPort,
  TelemetryIngestResult,
  TelemetryReading,
  TrackingLogPort,
  Vehicle,
  VehicleRegistryPort,
} from '@transit-pulse/domain';
import { toVehicleSummary } from '@transit-pulse/domain';
import type { PositionCorrector } from '../correction/position-corrector.js';
import type { RouteSnapper } from '../routes/route-snapper.js';
import type { TelemetryDecoder } from './telemetry-decoder.js';

const METERS_PER_DEGREE = 111_320;

export interface TelemetryIngestDeps {
  decoder: TelemetryDecoder;
  corrector: PositionCorrector;
  snapper: RouteSnapper;
  vehicles: VehicleRegistryPort;
  trackingLog: TrackingLogPort;
  publisher: RealtimePublisherPort;
  clock: ClockPort;
  groundTruthAnalysis: boolean;
}

/** Planar approximation, good enough for metre-scale debug output. */
export function groundTruthError(corrected: GeoPoint, truth: GeoPoint): GroundTruthAnalysis {
  const dLat = corrected.latitude - truth.latitude;
  const dLng = (corrected.longitude - truth.longitude) * Math.cos((truth.latitude * Math.PI) / 180);
  return {
    groundTruthLatitude: truth.latitude,
    groundTruthLongitude: truth.longitude,
    errorMeters: Math.hypot(dLat, dLng) * METERS_PER_DEGREE,
  };
}

/**
 * decode → correct → snap → write back → publish → tracking log.
 * Only decode and correction failures reach the caller.
 */
export class TelemetryIngestService implements TelemetryIngestionPort {
  constructor(private readonly deps: TelemetryIngestDeps) {}

  async ingest(envelope: TelemetryEnvelope): Promise<TelemetryIngestResult> {
    const reading = this.deps.decoder.decode(envelope.encryptedData);

    const correction = await this.deps.corrector.correct(reading);
    if (!correction.ok) throw correction.error;

    const vehicle = await this.resolveVehicle(reading.deviceId);
    const position = await this.deps.snapper.snap(vehicle, correction.position);

    if (vehicle) {
      await this.writeBack(vehicle, reading, position);
    }

    const result: TelemetryIngestResult = { position, vehicleId: vehicle?.id ?? null };
    if (this.deps.groundTruthAnalysis && reading.groundTruth) {
      result.analysis = groundTruthError(position, reading.groundTruth);
    }
    return result;
  }

  private async writeBack(vehicle: Vehicle, reading: TelemetryReading, position: CorrectedPosition): Promise<void> {
    try {
      const stored = await this.deps.vehicles.updateLocation(vehicle.id, {
        latitude: position.latitude,
        longitude: position.longitude,
      });
      if (stored) {
        this.deps.publisher.publishVehicleLocation(vehicle.id, position);
        await this.publishFleet(vehicle.fleetId);
      } else {
        console.warn(`[telemetry] vehicle ${vehicle.id} vanished before its location was written`);
      }
    } catch (err) {
      const warning = new PersistenceWarning(`location write-back failed for ${vehicle.id}`, { cause: err });
      console.warn(`[telemetry] ${warning.message}`, err instanceof Error ? err.message : err);
    }

    try {
      await this.deps.trackingLog.append({
        vehicleId: vehicle.id,
        fleetId: vehicle.fleetId,
        deviceId: reading.deviceId,
        ts: this.deps.clock.now(),
        speedMps: reading.speedMps,
        raw: reading,
        corrected: position,
      });
    } catch (err) {
      const warning = new PersistenceWarning(`tracking log append failed for ${vehicle.id}`, { cause: err });
      console.warn(`[telemetry] ${warning.message}`, err instanceof Error ? err.message : err);
    }
  }

  /** The location is already stored; a failed fleet refresh only costs one broadcast. */
  private async publishFleet(fleetId: string): Promise<void> {
    try {
      const vehicles = await this.deps.vehicles.listByFleet(fleetId, { status: ['available'], withLocation: true });
      this.deps.publisher.publishFleetVehicles(fleetId, vehicles.map(toVehicleSummary));
    } catch (err) {
      console.warn(`[telemetry] fleet ${fleetId} vehicle list not published`, err instanceof Error ? err.message : err);
    }
  }

  /** A registry outage is treated like an unbound device: the fix is still returned. */
  private async resolveVehicle(deviceId: string): Promise<Vehicle | null> {
    let vehicle: Vehicle | null;
    try {
      vehicle = await this.deps.vehicles.findByDeviceId(deviceId);
    } catch (err) {
      const warning = new PersistenceWarning(`vehicle lookup failed for device ${deviceId}`, { cause: err });
      console.warn(`[telemetry] ${warning.message}; location not stored`, err instanceof Error ? err.message : err);
      return null;
    }
    if (!vehicle) {
      console.warn(`[telemetry] no vehicle bound to device ${deviceId}; location not stored`);
    }
    return vehicle;
  }
}
