import { GeometryUnavailable } from '@transit-pulse/domain';
import type {
  ClockPort,
  CorrectedPosition,
  GeoPoint,
  RouteDefinitionPort,
  RouteGeometryCacheEntry,
  Vehicle,
} from '@transit-pulse/domain';
import { buildRouteShape, snapToShape, type RouteShape } from './polyline.js';

export const DEFAULT_ROUTE_CACHE_TTL_MS = 60 * 60 * 1000;

export interface RouteSnapperOptions {
  enabled: boolean;
  ttlMs?: number;
  clock: ClockPort;
}

interface CachedGeometry extends RouteGeometryCacheEntry {
  shape: RouteShape | null;
}

export interface RouteCacheStats {
  enabled: boolean;
  entries: number;
  unavailable: number;
  refreshing: number;
  storeReads: number;
}

/**
 * Snaps corrected fixes onto the vehicle's declared route.
 *
 * Geometry is cached per route id for `ttlMs`. A stale or missing entry is
 * refreshed by exactly one store read no matter how many callers ask at once;
 * the others await the same promise. A miss or a store failure is cached as
 * "unavailable" so a broken route is not re-read on every fix.
 */
export class RouteSnapper {
  private readonly cache = new Map<string, CachedGeometry>();
  private readonly inflight = new Map<string, Promise<RouteShape | null>>();
  private readonly ttlMs: number;
  private storeReads = 0;

  constructor(
    private readonly store: RouteDefinitionPort,
    private readonly options: RouteSnapperOptions,
  ) {
    this.ttlMs = options.ttlMs ?? DEFAULT_ROUTE_CACHE_TTL_MS;
  }

  async snap(vehicle: Pick<Vehicle, 'routeId'> | null, point: GeoPoint): Promise<CorrectedPosition> {
    const unchanged: CorrectedPosition = { latitude: point.latitude, longitude: point.longitude, snapped: false };
    if (!this.options.enabled || !vehicle?.routeId) return unchanged;

    const shape = await this.geometryFor(vehicle.routeId);
    if (!shape) return unchanged;

    const snapped = snapToShape(shape, point);
    return { latitude: snapped.latitude, longitude: snapped.longitude, snapped: true };
  }

  geometryFor(routeKey: string): Promise<RouteShape | null> {
    const entry = this.cache.get(routeKey);
    if (entry && this.isFresh(entry)) return Promise.resolve(entry.shape);

    const pending = this.inflight.get(routeKey);
    if (pending) return pending;

    const refresh = this.refresh(routeKey).finally(() => {
      this.inflight.delete(routeKey);
    });
    this.inflight.set(routeKey, refresh);
    return refresh;
  }

  /** Drops one route's entry, or the whole cache. */
  invalidate(routeKey?: string): void {
    if (routeKey === undefined) {
      this.cache.clear();
    } else {
      this.cache.delete(routeKey);
    }
  }

  stats(): RouteCacheStats {
    let unavailable = 0;
    for (const entry of this.cache.values()) {
      if (entry.shape === null) unavailable += 1;
    }
    return {
      enabled: this.options.enabled,
      entries: this.cache.size,
      unavailable,
      refreshing: this.inflight.size,
      storeReads: this.storeReads,
    };
  }

  private isFresh(entry: CachedGeometry): boolean {
    return this.options.clock.now().getTime() - entry.refreshedAt < this.ttlMs;
  }

  private async refresh(routeKey: string): Promise<RouteShape | null> {
    let shape: RouteShape | null = null;
    this.storeReads += 1;
    try {
      const definition = await this.store.findById(routeKey);
      if (definition?.polyline && definition.polyline.length >= 2) {
        shape = buildRouteShape(definition.polyline);
      } else {
        console.warn(`[route-snapper] ${new GeometryUnavailable(routeKey).message}: no polyline`);
      }
    } catch (err) {
      const warning = new GeometryUnavailable(routeKey, { cause: err });
      console.warn(`[route-snapper] ${warning.message}`, err instanceof Error ? err.message : err);
    }

    this.cache.set(routeKey, {
      routeKey,
      polyline: shape ? shape.points : null,
      shape,
      refreshedAt: this.options.clock.now().getTime(),
    });
    return shape;
  }
}
