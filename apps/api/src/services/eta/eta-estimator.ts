import { NotFoundError, VehicleLocationUnavailableError } from '@transit-pulse/domain';
import type {
  ClockPort,
  EtaEstimate,
  EtaQueryPort,
  EtaRequest,
  RealtimePublisherPort,
  TrackingLogPort,
  VehicleRegistryPort,
} from '@transit-pulse/domain';
import { haversineMeters } from '../geo/haversine.js';
import { averageSpeed, etaMinutes, formatEta, isStopped, selectEffectiveSpeed } from './eta-math.js';

const HISTORY_WINDOW_MS = 5 * 60 * 1000;
const HISTORY_LIMIT = 30;
/** History is ignored unless the latest sample is at most this old. */
const FRESH_SAMPLE_MS = 2 * 60 * 1000;

export interface EtaEstimatorDeps {
  vehicles: VehicleRegistryPort;
  trackingLog: TrackingLogPort;
  publisher: RealtimePublisherPort;
  clock: ClockPort;
}

export class EtaEstimator implements EtaQueryPort {
  constructor(private readonly deps: EtaEstimatorDeps) {}

  async estimate(request: EtaRequest): Promise<EtaEstimate> {
    const eta = await this.compute(request);
    this.deps.publisher.publishEta(eta.vehicleId, eta);
    return eta;
  }

  /** Same as `estimate` without publishing. */
  async compute({ vehicleId, userLocation }: EtaRequest): Promise<EtaEstimate> {
    const vehicle = await this.deps.vehicles.findById(vehicleId);
    if (!vehicle) throw new NotFoundError(`Vehicle ${vehicleId} not found`);
    if (!vehicle.location) throw new VehicleLocationUnavailableError(vehicleId);

    const distanceMeters = haversineMeters(userLocation, vehicle.location);

    let currentSpeedMps = 0;
    let history: number[] = [];
    if (vehicle.deviceId) {
      const latest = await this.deps.trackingLog.latestSample(vehicle.deviceId);
      if (latest) {
        currentSpeedMps = latest.speedMps;
        const now = this.deps.clock.now();
        if (now.getTime() - latest.ts.getTime() <= FRESH_SAMPLE_MS) {
          const samples = await this.deps.trackingLog.recentSpeedSamples({
            deviceId: vehicle.deviceId,
            since: new Date(now.getTime() - HISTORY_WINDOW_MS),
            limit: HISTORY_LIMIT,
          });
          history = samples.map((s) => s.speedMps);
        }
      }
    }

    const averageSpeedMps = averageSpeed(history);
    const stopped = isStopped(currentSpeedMps, history);
    const selection = selectEffectiveSpeed({
      currentSpeedMps,
      averageSpeedMps,
      stopped,
      statusDetail: (vehicle.statusDetail ?? '').toLowerCase(),
    });
    const minutes = etaMinutes(distanceMeters, selection.speedMps);

    return {
      vehicleId: vehicle.id,
      vehiclePlate: vehicle.plate ?? 'Unknown',
      vehicleRoute: vehicle.routeName ?? 'Unknown',
      distanceMeters,
      currentSpeedMps,
      averageSpeedMps,
      etaMinutes: minutes,
      etaFormatted: formatEta(minutes),
      confidence: selection.confidence,
      message: selection.message,
      isStopped: stopped,
      status: vehicle.status,
      vehicleLocation: vehicle.location,
      userLocation,
    };
  }
}
