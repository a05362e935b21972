import { GLOBAL_TOPIC } from './broadcast-hub.js';

export type Channel =
  | { kind: 'vehicle-location'; vehicleId: string }
  | { kind: 'vehicle-eta'; vehicleId: string }
  | { kind: 'fleet-vehicles'; fleetId: string }
  | { kind: 'user-notifications'; userId: string }
  | { kind: 'stats' };

export const topicKeys = {
  vehicleLocation: (vehicleId: string): string => `vehicle:${vehicleId}:location`,
  vehicleEta: (vehicleId: string): string => `vehicle:${vehicleId}:eta`,
  fleetVehicles: (fleetId: string): string => `fleet:${fleetId}:vehicles`,
  userNotifications: (userId: string): string => `user:${userId}:notifications`,
  stats: (): string => GLOBAL_TOPIC,
};

export function topicFor(channel: Channel): string {
  switch (channel.kind) {
    case 'vehicle-location':
      return topicKeys.vehicleLocation(channel.vehicleId);
    case 'vehicle-eta':
      return topicKeys.vehicleEta(channel.vehicleId);
    case 'fleet-vehicles':
      return topicKeys.fleetVehicles(channel.fleetId);
    case 'user-notifications':
      return topicKeys.userNotifications(channel.userId);
    case 'stats':
      return topicKeys.stats();
  }
}

const ROUTES: Array<[RegExp, (id: string) => Channel]> = [
  [/^\/ws\/vehicles\/([^/]+)\/location$/, (vehicleId) => ({ kind: 'vehicle-location', vehicleId })],
  [/^\/ws\/vehicles\/([^/]+)\/eta$/, (vehicleId) => ({ kind: 'vehicle-eta', vehicleId })],
  [/^\/ws\/fleets\/([^/]+)\/vehicles$/, (fleetId) => ({ kind: 'fleet-vehicles', fleetId })],
  [/^\/ws\/users\/([^/]+)\/notifications$/, (userId) => ({ kind: 'user-notifications', userId })],
];

/** Maps an upgrade request path to its channel; null for anything else. */
export function resolveChannel(url: string | undefined): Channel | null {
  if (!url) return null;
  const path = url.split('?')[0].replace(/\/+$/, '');
  if (path === '/ws/stats/count') return { kind: 'stats' };

  for (const [pattern, build] of ROUTES) {
    const match = pattern.exec(path);
    if (!match) continue;
    try {
      return build(decodeURIComponent(match[1]));
    } catch {
      return null;
    }
  }
  return null;
}
