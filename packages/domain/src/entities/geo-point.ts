/** The one location value type used for vehicles, riders, polylines and corrected fixes. */
export interface GeoPoint {
  readonly latitude: number;
  readonly longitude: number;
}

export function isGeoPoint(value: unknown): value is GeoPoint {
  if (typeof value !== 'object' || value === null) return false;
  if (!('latitude' in value) || !('longitude' in value)) return false;
  const { latitude, longitude } = value;
  return (
    typeof latitude === 'number' &&
    Number.isFinite(latitude) &&
    typeof longitude === 'number' &&
    Number.isFinite(longitude)
  );
}
