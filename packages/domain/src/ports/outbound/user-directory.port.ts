import type { Rider } from '../../entities/rider.js';
import type { GeoPoint } from '../../entities/geo-point.js';

export interface UserDirectoryPort {
  findById(userId: string): Promise<Rider | null>;
  updateLocation(userId: string, location: GeoPoint): Promise<boolean>;
  /** Opted-in riders with a push token, a fleet and a location. */
  listNotifiable(): Promise<Rider[]>;
  count(): Promise<number>;
}
