import type { GeoPoint } from './geo-point.js';

export interface Rider {
  readonly id: string;
  readonly fleetId?: string;
  readonly location?: GeoPoint;
  readonly pushToken?: string;
  /** Opt-in for proximity alerts. */
  readonly notify: boolean;
}
