import { NotFoundError, PersistenceWarning } from '@transit-pulse/domain';
import type {
  ClockPort,
  GeoPoint,
  NotificationLogPort,
  NotificationRecord,
  ProximityAlertPort,
  ProximityOutcome,
  PushGatewayPort,
  RealtimePublisherPort,
  Rider,
  RiderLocationUpdate,
  SweepSummary,
  UserDirectoryPort,
  Vehicle,
  VehicleRegistryPort,
} from '@transit-pulse/domain';
import { haversineMeters } from '../geo/haversine.js';

export const DEFAULT_PROXIMITY_RADIUS_METERS = 500;
export const DEFAULT_NOTIFICATION_COOLDOWN_MS = 5 * 60 * 1000;

export const PROXIMITY_TITLE = 'PUV Nearby!';

export interface ProximityNotifierDeps {
  vehicles: VehicleRegistryPort;
  users: UserDirectoryPort;
  notifications: NotificationLogPort;
  push: PushGatewayPort;
  publisher: RealtimePublisherPort;
  clock: ClockPort;
  radiusMeters?: number;
  cooldownMs?: number;
}

export class ProximityNotifier implements ProximityAlertPort {
  private readonly radiusMeters: number;
  private readonly cooldownMs: number;
  /** One dispatch per (rider, vehicle) at a time; keyed by `pairKey`. */
  private readonly inflight = new Map<string, Promise<ProximityOutcome>>();

  constructor(private readonly deps: ProximityNotifierDeps) {
    this.radiusMeters = deps.radiusMeters ?? DEFAULT_PROXIMITY_RADIUS_METERS;
    this.cooldownMs = deps.cooldownMs ?? DEFAULT_NOTIFICATION_COOLDOWN_MS;
  }

  /** Never rejects: every failure is folded into the outcome. */
  async checkPair(rider: Rider, vehicle: Vehicle): Promise<ProximityOutcome> {
    if (!rider.location || !vehicle.location) {
      return {
        vehicleId: vehicle.id,
        success: false,
        reason: 'missing_coordinates',
        message: 'Rider or vehicle has no coordinates',
      };
    }

    const distanceMeters = haversineMeters(rider.location, vehicle.location);
    if (distanceMeters > this.radiusMeters) {
      return {
        vehicleId: vehicle.id,
        success: false,
        reason: 'out_of_range',
        message: `Vehicle is ${Math.floor(distanceMeters)}m away`,
        distanceMeters,
      };
    }

    try {
      return await this.notify(rider, vehicle, distanceMeters);
    } catch (err) {
      console.error(`[proximity] check failed for ${rider.id}/${vehicle.id}`, err);
      return {
        vehicleId: vehicle.id,
        success: false,
        reason: 'check_failed',
        message: err instanceof Error ? err.message : String(err),
        distanceMeters,
      };
    }
  }

  async updateRiderLocation(userId: string, location: GeoPoint): Promise<RiderLocationUpdate> {
    const rider = await this.deps.users.findById(userId);
    if (!rider) throw new NotFoundError(`User ${userId} not found`);

    const updated = await this.deps.users.updateLocation(userId, location);
    if (!rider.fleetId) {
      return { updated, checks: 0, notified: 0, outcomes: [] };
    }

    const vehicles = await this.deps.vehicles.listByFleet(rider.fleetId, {
      status: ['available'],
      withLocation: true,
    });
    const moved: Rider = { ...rider, location };
    const outcomes: ProximityOutcome[] = [];
    for (const vehicle of vehicles) {
      outcomes.push(await this.checkPair(moved, vehicle));
    }
    return {
      updated,
      checks: outcomes.length,
      notified: outcomes.filter((o) => o.success).length,
      outcomes,
    };
  }

  /** One pass over every opted-in rider, grouped by fleet. */
  async sweep(): Promise<SweepSummary> {
    const riders = await this.deps.users.listNotifiable();
    const byFleet = new Map<string, Rider[]>();
    for (const rider of riders) {
      if (!rider.fleetId) continue;
      const group = byFleet.get(rider.fleetId) ?? [];
      group.push(rider);
      byFleet.set(rider.fleetId, group);
    }

    const summary: SweepSummary = { riders: riders.length, checks: 0, notified: 0 };
    for (const [fleetId, fleetRiders] of byFleet) {
      let vehicles: Vehicle[];
      try {
        vehicles = await this.deps.vehicles.listByFleet(fleetId, { status: ['available'], withLocation: true });
      } catch (err) {
        console.warn(`[proximity] skipping fleet ${fleetId}`, err instanceof Error ? err.message : err);
        continue;
      }
      for (const rider of fleetRiders) {
        for (const vehicle of vehicles) {
          const outcome = await this.checkPair(rider, vehicle);
          if (outcome.reason === 'missing_coordinates') continue;
          summary.checks += 1;
          if (outcome.success) summary.notified += 1;
        }
      }
    }
    return summary;
  }

  /**
   * The cooldown lookup and the record append straddle awaits, so a second
   * check on the same pair waits for the first instead of racing it.
   */
  private async notify(rider: Rider, vehicle: Vehicle, distanceMeters: number): Promise<ProximityOutcome> {
    const key = pairKey(rider.id, vehicle.id);
    const pending = this.inflight.get(key);
    if (pending) {
      const first = await pending;
      if (!first.success) return { ...first, distanceMeters };
      return {
        vehicleId: vehicle.id,
        success: false,
        reason: 'recent_notification',
        message: 'Recent notification exists',
        distanceMeters,
      };
    }

    const task = this.dispatch(rider, vehicle, distanceMeters).finally(() => {
      this.inflight.delete(key);
    });
    this.inflight.set(key, task);
    return task;
  }

  private async dispatch(rider: Rider, vehicle: Vehicle, distanceMeters: number): Promise<ProximityOutcome> {
    const now = this.deps.clock.now();
    const recent = await this.deps.notifications.findRecent({
      userId: rider.id,
      vehicleId: vehicle.id,
      since: new Date(now.getTime() - this.cooldownMs),
      successOnly: true,
    });
    if (recent) {
      return {
        vehicleId: vehicle.id,
        success: false,
        reason: 'recent_notification',
        message: 'Recent notification exists',
        distanceMeters,
      };
    }

    if (!rider.pushToken) {
      return {
        vehicleId: vehicle.id,
        success: false,
        reason: 'missing_token',
        message: `No push token for user ${rider.id}`,
        distanceMeters,
      };
    }

    const body = `A PUV is ${Math.floor(distanceMeters)}m away from you!`;
    let success = true;
    let failure: string | undefined;
    try {
      await this.deps.push.send({
        token: rider.pushToken,
        title: PROXIMITY_TITLE,
        body,
        data: { vehicle_id: vehicle.id, distance: String(Math.floor(distanceMeters)) },
      });
    } catch (err) {
      success = false;
      failure = err instanceof Error ? err.message : String(err);
      console.warn(`[proximity] push to ${rider.id} failed: ${failure}`);
    }

    const record: NotificationRecord = {
      userId: rider.id,
      vehicleId: vehicle.id,
      ts: now,
      success,
      distanceMeters,
      kind: 'proximity',
      message: success ? body : failure,
    };
    try {
      await this.deps.notifications.append(record);
    } catch (err) {
      const warning = new PersistenceWarning('notification log append failed', { cause: err });
      console.warn(`[proximity] ${warning.message}`, err instanceof Error ? err.message : err);
    }

    if (success) {
      this.deps.publisher.publishNotification(rider.id, record);
      console.log(`[proximity] notified ${rider.id} about ${vehicle.id} at ${Math.floor(distanceMeters)}m`);
    }

    return {
      vehicleId: vehicle.id,
      success,
      reason: success ? 'sent' : 'dispatch_failed',
      message: success ? 'Proximity notification sent' : `Push dispatch failed: ${failure ?? 'unknown error'}`,
      distanceMeters,
    };
  }
}

function pairKey(userId: string, vehicleId: string): string {
  return `${userId}\u0000${vehicleId}`;
}
