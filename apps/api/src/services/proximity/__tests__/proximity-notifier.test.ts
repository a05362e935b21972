/**
 * Proximity Notifier Tests
 *
 * Radius boundary, cooldown, push outcomes and the two entry points that
 * drive checks: a rider location update and the periodic sweep.
 */

import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { ManualClock } from '@transit-pulse/adapters';
import { NotFoundError } from '@transit-pulse/domain';
import type { GeoPoint, Rider } from '@transit-pulse/domain';

import { ProximityNotifier, PROXIMITY_TITLE } from '../proximity-notifier.js';
import {
  InMemoryNotificationLog,
  InMemoryUserDirectory,
  InMemoryVehicleRegistry,
  RecordingPublisher,
  RecordingPushGateway,
  northOf,
  vehicle,
} from '../../../__tests__/fakes.js';

// ─── Helpers ──────────────────────────────────────────────────────────────────

const NOW = Date.UTC(2026, 2, 1, 7, 30, 0);
const COOLDOWN_MS = 5 * 60_000;
const HOME: GeoPoint = { latitude: 10.3, longitude: 123.9 };

function rider(overrides: Partial<Rider> = {}): Rider {
  return { id: 'u1', fleetId: 'fleet-1', location: HOME, pushToken: 'test-token', notify: true, ...overrides };
}

function harness() {
  const clock = new ManualClock(NOW);
  const vehicles = new InMemoryVehicleRegistry([
    vehicle({ id: 'veh-near', location: northOf(HOME, 499.99) }),
    vehicle({ id: 'veh-edge', location: northOf(HOME, 500.01) }),
  ]);
  const users = new InMemoryUserDirectory([rider()]);
  const notifications = new InMemoryNotificationLog();
  const push = new RecordingPushGateway();
  const publisher = new RecordingPublisher();
  const notifier = new ProximityNotifier({
    vehicles,
    users,
    notifications,
    push,
    publisher,
    clock,
    radiusMeters: 500,
    cooldownMs: COOLDOWN_MS,
  });
  return { clock, vehicles, users, notifications, push, publisher, notifier };
}

async function nearVehicle(h: ReturnType<typeof harness>) {
  const found = await h.vehicles.findById('veh-near');
  if (!found) throw new Error('fixture missing');
  return found;
}

beforeEach(() => {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
});

// ═══════════════════════════════════════════════════════════════════════════════
// checkPair
// ═══════════════════════════════════════════════════════════════════════════════

describe('ProximityNotifier.checkPair', () => {
  it('notifies a rider inside the radius', async () => {
    const h = harness();

    const outcome = await h.notifier.checkPair(rider(), await nearVehicle(h));

    expect(outcome).toMatchObject({
      vehicleId: 'veh-near',
      success: true,
      reason: 'sent',
      message: 'Proximity notification sent',
    });
    expect(outcome.distanceMeters).toBeCloseTo(499.99, 4);
    expect(h.push.sent).toEqual([
      {
        token: 'test-token',
        title: PROXIMITY_TITLE,
        body: 'A PUV is 499m away from you!',
        data: { vehicle_id: 'veh-near', distance: '499' },
      },
    ]);
  });

  it('records and publishes a sent notification', async () => {
    const h = harness();

    await h.notifier.checkPair(rider(), await nearVehicle(h));

    expect(h.notifications.records).toHaveLength(1);
    expect(h.notifications.records[0]).toMatchObject({
      userId: 'u1',
      vehicleId: 'veh-near',
      success: true,
      kind: 'proximity',
      message: 'A PUV is 499m away from you!',
    });
    expect(h.notifications.records[0].ts.getTime()).toBe(NOW);
    const published = h.publisher.ofKind('notification');
    expect(published).toHaveLength(1);
    expect(published[0].key).toBe('u1');
  });

  it('ignores a vehicle just outside the radius', async () => {
    const h = harness();
    const edge = await h.vehicles.findById('veh-edge');
    if (!edge) throw new Error('fixture missing');

    const outcome = await h.notifier.checkPair(rider(), edge);

    expect(outcome).toMatchObject({ success: false, reason: 'out_of_range', message: 'Vehicle is 500m away' });
    expect(h.push.sent).toHaveLength(0);
    expect(h.notifications.records).toHaveLength(0);
  });

  it('reports missing coordinates', async () => {
    const h = harness();

    const outcome = await h.notifier.checkPair(rider({ location: undefined }), await nearVehicle(h));

    expect(outcome.reason).toBe('missing_coordinates');
    expect(outcome.distanceMeters).toBeUndefined();
  });

  it('suppresses a repeat alert inside the cooldown', async () => {
    const h = harness();
    const near = await nearVehicle(h);

    await h.notifier.checkPair(rider(), near);
    h.clock.advance(COOLDOWN_MS);
    const repeat = await h.notifier.checkPair(rider(), near);

    expect(repeat).toMatchObject({ success: false, reason: 'recent_notification', message: 'Recent notification exists' });
    expect(h.push.sent).toHaveLength(1);
    expect(h.notifications.records).toHaveLength(1);
  });

  it('notifies again once the cooldown has passed', async () => {
    const h = harness();
    const near = await nearVehicle(h);

    await h.notifier.checkPair(rider(), near);
    h.clock.advance(COOLDOWN_MS + 1);
    const again = await h.notifier.checkPair(rider(), near);

    expect(again.reason).toBe('sent');
    expect(h.push.sent).toHaveLength(2);
  });

  it('keeps cooldowns per vehicle', async () => {
    const h = harness();
    await h.notifier.checkPair(rider(), await nearVehicle(h));

    const other = await h.notifier.checkPair(rider(), vehicle({ id: 'veh-other', location: northOf(HOME, 50) }));

    expect(other.reason).toBe('sent');
  });

  it('skips a rider without a push token', async () => {
    const h = harness();

    const outcome = await h.notifier.checkPair(rider({ pushToken: undefined }), await nearVehicle(h));

    expect(outcome).toMatchObject({ success: false, reason: 'missing_token', message: 'No push token for user u1' });
    expect(h.notifications.records).toHaveLength(0);
  });

  it('logs a failed dispatch without starting a cooldown', async () => {
    const h = harness();
    const near = await nearVehicle(h);
    h.push.fail = true;

    const failed = await h.notifier.checkPair(rider(), near);

    expect(failed).toMatchObject({
      success: false,
      reason: 'dispatch_failed',
      message: 'Push dispatch failed: provider rejected the token',
    });
    expect(h.notifications.records[0]).toMatchObject({ success: false, message: 'provider rejected the token' });
    expect(h.publisher.events).toHaveLength(0);

    h.push.fail = false;
    expect((await h.notifier.checkPair(rider(), near)).reason).toBe('sent');
  });

  it('still reports success when the notification log write fails', async () => {
    const h = harness();
    h.notifications.failAppends = true;

    const outcome = await h.notifier.checkPair(rider(), await nearVehicle(h));

    expect(outcome.reason).toBe('sent');
    expect(h.publisher.ofKind('notification')).toHaveLength(1);
  });

  it('folds an unexpected lookup failure into the outcome', async () => {
    const h = harness();
    jest.spyOn(h.notifications, 'findRecent').mockRejectedValue(new Error('db down'));

    const outcome = await h.notifier.checkPair(rider(), await nearVehicle(h));

    expect(outcome).toMatchObject({ success: false, reason: 'check_failed', message: 'db down' });
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// overlapping checks
// ═══════════════════════════════════════════════════════════════════════════════

describe('ProximityNotifier overlapping checks', () => {
  it('sends once when the same pair is checked twice at the same time', async () => {
    const h = harness();
    const near = await nearVehicle(h);

    const outcomes = await Promise.all([h.notifier.checkPair(rider(), near), h.notifier.checkPair(rider(), near)]);

    expect(outcomes.map((o) => o.reason)).toEqual(['sent', 'recent_notification']);
    expect(h.push.sent).toHaveLength(1);
    expect(h.notifications.records).toHaveLength(1);
  });

  it('shares a failed dispatch with the waiting check without sending again', async () => {
    const h = harness();
    h.push.fail = true;
    const near = await nearVehicle(h);

    const outcomes = await Promise.all([h.notifier.checkPair(rider(), near), h.notifier.checkPair(rider(), near)]);

    expect(outcomes.map((o) => o.reason)).toEqual(['dispatch_failed', 'dispatch_failed']);
    expect(h.notifications.records).toHaveLength(1);
  });

  it('alerts once when a location update overlaps a sweep', async () => {
    const h = harness();

    const [update, summary] = await Promise.all([h.notifier.updateRiderLocation('u1', HOME), h.notifier.sweep()]);

    expect(update.notified + summary.notified).toBe(1);
    expect(h.push.sent).toHaveLength(1);
    expect(h.notifications.records.filter((r) => r.success)).toHaveLength(1);
  });

  it('checks the pair afresh once the first dispatch has settled', async () => {
    const h = harness();
    const near = await nearVehicle(h);

    await h.notifier.checkPair(rider(), near);
    h.clock.advance(COOLDOWN_MS + 1);
    const again = await h.notifier.checkPair(rider(), near);

    expect(again.reason).toBe('sent');
    expect(h.push.sent).toHaveLength(2);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// updateRiderLocation
// ═══════════════════════════════════════════════════════════════════════════════

describe('ProximityNotifier.updateRiderLocation', () => {
  it('rejects an unknown rider', async () => {
    const h = harness();
    await expect(h.notifier.updateRiderLocation('nobody', HOME)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('stores the location and checks available vehicles in the rider fleet', async () => {
    const h = harness();
    h.vehicles.vehicles.set('veh-full', vehicle({ id: 'veh-full', status: 'full', location: HOME }));
    h.vehicles.vehicles.set('veh-noloc', vehicle({ id: 'veh-noloc' }));
    h.vehicles.vehicles.set('veh-elsewhere', vehicle({ id: 'veh-elsewhere', fleetId: 'fleet-2', location: HOME }));
    h.users.riders.set('u1', rider({ location: northOf(HOME, 5_000) }));

    const result = await h.notifier.updateRiderLocation('u1', HOME);

    expect(result.updated).toBe(true);
    expect(result.checks).toBe(2);
    expect(result.notified).toBe(1);
    expect(result.outcomes.map((o) => [o.vehicleId, o.reason])).toEqual([
      ['veh-near', 'sent'],
      ['veh-edge', 'out_of_range'],
    ]);
    expect((await h.users.findById('u1'))?.location).toEqual(HOME);
  });

  it('stores the location but runs no checks for a rider without a fleet', async () => {
    const h = harness();
    h.users.riders.set('u2', rider({ id: 'u2', fleetId: undefined }));

    const result = await h.notifier.updateRiderLocation('u2', HOME);

    expect(result).toEqual({ updated: true, checks: 0, notified: 0, outcomes: [] });
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// sweep
// ═══════════════════════════════════════════════════════════════════════════════

describe('ProximityNotifier.sweep', () => {
  it('checks every notifiable rider against their own fleet', async () => {
    const h = harness();
    h.users.riders.set('u2', rider({ id: 'u2', fleetId: 'fleet-2' }));
    h.users.riders.set('u3', rider({ id: 'u3', notify: false }));
    h.vehicles.vehicles.set('veh-f2', vehicle({ id: 'veh-f2', fleetId: 'fleet-2', location: northOf(HOME, 2_000) }));

    const summary = await h.notifier.sweep();

    expect(summary).toEqual({ riders: 2, checks: 3, notified: 1 });
    expect(h.push.sent.map((m) => m.data?.['vehicle_id'])).toEqual(['veh-near']);
  });

  it('does not re-alert on the next sweep within the cooldown', async () => {
    const h = harness();

    await h.notifier.sweep();
    h.clock.advance(10_000);
    const second = await h.notifier.sweep();

    expect(second.notified).toBe(0);
    expect(h.push.sent).toHaveLength(1);
  });

  it('skips a fleet whose vehicles cannot be listed', async () => {
    const h = harness();
    jest.spyOn(h.vehicles, 'listByFleet').mockRejectedValue(new Error('timeout'));

    expect(await h.notifier.sweep()).toEqual({ riders: 1, checks: 0, notified: 0 });
  });
});
