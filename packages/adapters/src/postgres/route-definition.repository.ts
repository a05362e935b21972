import type { GeoPoint, RouteDefinition, RouteDefinitionPort } from '@transit-pulse/domain';
import { isGeoPoint } from '@transit-pulse/domain';
import { getPool } from './pool.js';

export type RouteRow = {
  id: string;
  name: string | null;
  start_location: string | null;
  end_location: string | null;
  /** jsonb array of {latitude, longitude} */
  polyline: unknown;
};

export class PgRouteDefinitionStore implements RouteDefinitionPort {
  async findById(routeId: string): Promise<RouteDefinition | null> {
    const { rows } = await getPool().query<RouteRow>(
      `SELECT id, name, start_location, end_location, polyline
       FROM transit.routes WHERE id = $1`,
      [routeId],
    );
    return rows[0] ? mapRouteRow(rows[0]) : null;
  }
}

function parsePolyline(raw: unknown): GeoPoint[] | null {
  if (!Array.isArray(raw)) return null;
  const points: GeoPoint[] = [];
  for (const vertex of raw) {
    if (!isGeoPoint(vertex)) return null;
    points.push({ latitude: vertex.latitude, longitude: vertex.longitude });
  }
  return points.length >= 2 ? points : null;
}

export function mapRouteRow(row: RouteRow): RouteDefinition {
  return {
    id: row.id,
    name: row.name ?? undefined,
    startLocation: row.start_location ?? undefined,
    endLocation: row.end_location ?? undefined,
    polyline: parsePolyline(row.polyline),
  };
}
