import type { GeoPoint } from './geo-point.js';

export interface RouteDefinition {
  readonly id: string;
  readonly name?: string;
  readonly startLocation?: string;
  readonly endLocation?: string;
  /** Ordered vertices; null when the route was declared without geometry. */
  readonly polyline: GeoPoint[] | null;
}

export interface RouteGeometryCacheEntry {
  readonly routeKey: string;
  /** `null` marks geometry as unavailable until the next refresh. */
  readonly polyline: GeoPoint[] | null;
  readonly refreshedAt: number;
}
