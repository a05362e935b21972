/**
 * Channel Routing Tests
 */

import { describe, it, expect } from '@jest/globals';

import { GLOBAL_TOPIC } from '../broadcast-hub.js';
import { resolveChannel, topicFor } from '../channels.js';

describe('resolveChannel', () => {
  it.each([
    ['/ws/vehicles/veh-1/location', { kind: 'vehicle-location', vehicleId: 'veh-1' }],
    ['/ws/vehicles/veh-1/eta', { kind: 'vehicle-eta', vehicleId: 'veh-1' }],
    ['/ws/fleets/fleet-9/vehicles', { kind: 'fleet-vehicles', fleetId: 'fleet-9' }],
    ['/ws/users/u-7/notifications', { kind: 'user-notifications', userId: 'u-7' }],
    ['/ws/stats/count', { kind: 'stats' }],
  ])('maps %s', (url, channel) => {
    expect(resolveChannel(url)).toEqual(channel);
  });

  it('ignores the query string and trailing slashes', () => {
    expect(resolveChannel('/ws/vehicles/veh-1/location/?token=test-token')).toEqual({
      kind: 'vehicle-location',
      vehicleId: 'veh-1',
    });
  });

  it('decodes percent-encoded ids', () => {
    expect(resolveChannel('/ws/users/a%40b/notifications')).toEqual({ kind: 'user-notifications', userId: 'a@b' });
  });

  it('rejects unknown paths and bad encodings', () => {
    expect(resolveChannel(undefined)).toBeNull();
    expect(resolveChannel('/ws/vehicles')).toBeNull();
    expect(resolveChannel('/ws/vehicles/a/b/location')).toBeNull();
    expect(resolveChannel('/ws/users/%E0%A4%A/notifications')).toBeNull();
  });
});

describe('topicFor', () => {
  it('gives each channel its own key and stats the global topic', () => {
    expect(topicFor({ kind: 'vehicle-location', vehicleId: '1' })).toBe('vehicle:1:location');
    expect(topicFor({ kind: 'vehicle-eta', vehicleId: '1' })).toBe('vehicle:1:eta');
    expect(topicFor({ kind: 'fleet-vehicles', fleetId: 'f' })).toBe('fleet:f:vehicles');
    expect(topicFor({ kind: 'user-notifications', userId: 'u' })).toBe('user:u:notifications');
    expect(topicFor({ kind: 'stats' })).toBe(GLOBAL_TOPIC);
  });
});
