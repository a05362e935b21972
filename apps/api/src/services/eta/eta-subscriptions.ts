import type { ClockPort, GeoPoint } from '@transit-pulse/domain';
import type { EtaEstimator } from './eta-estimator.js';

export interface EtaSubscription {
  vehicleId: string;
  userId: string;
  userLocation: GeoPoint;
  touchedAt: number;
}

export interface EtaRefreshSummary {
  refreshed: number;
  expired: number;
  failed: number;
}

export const DEFAULT_SUBSCRIPTION_TTL_MS = 5 * 60 * 1000;
const ANONYMOUS_RIDER = 'anonymous';

/**
 * Riders waiting on a vehicle. Each refresh recomputes and publishes every live
 * subscription's ETA; entries not renewed within the TTL are dropped.
 */
export class EtaSubscriptions {
  private readonly entries = new Map<string, EtaSubscription>();

  constructor(
    private readonly estimator: Pick<EtaEstimator, 'estimate'>,
    private readonly clock: ClockPort,
    private readonly ttlMs: number = DEFAULT_SUBSCRIPTION_TTL_MS,
  ) {}

  subscribe(vehicleId: string, userLocation: GeoPoint, userId: string = ANONYMOUS_RIDER): EtaSubscription {
    const subscription: EtaSubscription = {
      vehicleId,
      userId,
      userLocation,
      touchedAt: this.clock.now().getTime(),
    };
    this.entries.set(keyOf(vehicleId, userId), subscription);
    return subscription;
  }

  unsubscribe(vehicleId: string, userId: string = ANONYMOUS_RIDER): boolean {
    return this.entries.delete(keyOf(vehicleId, userId));
  }

  list(): EtaSubscription[] {
    return [...this.entries.values()];
  }

  get size(): number {
    return this.entries.size;
  }

  async refresh(): Promise<EtaRefreshSummary> {
    const now = this.clock.now().getTime();
    const summary: EtaRefreshSummary = { refreshed: 0, expired: 0, failed: 0 };

    for (const [key, sub] of [...this.entries]) {
      if (now - sub.touchedAt > this.ttlMs) {
        this.entries.delete(key);
        summary.expired += 1;
        console.log(`[eta-subscriptions] expired ${sub.userId} on vehicle ${sub.vehicleId}`);
        continue;
      }
      try {
        await this.estimator.estimate({ vehicleId: sub.vehicleId, userLocation: sub.userLocation });
        summary.refreshed += 1;
      } catch (err) {
        summary.failed += 1;
        console.warn(
          `[eta-subscriptions] refresh failed for vehicle ${sub.vehicleId}`,
          err instanceof Error ? err.message : err,
        );
      }
    }
    return summary;
  }
}

function keyOf(vehicleId: string, userId: string): string {
  return `${vehicleId}\u0000${userId}`;
}
