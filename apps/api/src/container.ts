import {
  DisabledPushGateway,
  FirebasePushGateway,
  HttpModelSource,
  PgNotificationLog,
  PgRouteDefinitionStore,
  PgTrackingLog,
  PgUserDirectory,
  PgVehicleRegistry,
  SystemClock,
  parseEnvelopeKey,
} from '@transit-pulse/adapters';
import type {
  ClockPort,
  ModelSourcePort,
  NotificationLogPort,
  PushGatewayPort,
  RouteDefinitionPort,
  TrackingLogPort,
  UserDirectoryPort,
  VehicleRegistryPort,
} from '@transit-pulse/domain';
import type { AppConfig } from './config/env.js';
import { BroadcastHub } from './realtime/broadcast-hub.js';
import { HubPublisher } from './realtime/hub-publisher.js';
import { RealtimeSnapshots } from './realtime/realtime-snapshots.js';
import { PositionCorrector } from './services/correction/position-corrector.js';
import { EtaEstimator } from './services/eta/eta-estimator.js';
import { EtaSubscriptions } from './services/eta/eta-subscriptions.js';
import { ModelLoader } from './services/model/model-loader.js';
import { ProximityNotifier } from './services/proximity/proximity-notifier.js';
import { RouteSnapper } from './services/routes/route-snapper.js';
import { IntervalLoop } from './services/scheduler/interval-loop.js';
import { TelemetryDecoder } from './services/telemetry/telemetry-decoder.js';
import { TelemetryIngestService } from './services/telemetry/telemetry-ingest.service.js';

/** Everything outside the process the services talk to. */
export interface Collaborators {
  vehicles: VehicleRegistryPort;
  users: UserDirectoryPort;
  routes: RouteDefinitionPort;
  trackingLog: TrackingLogPort;
  notifications: NotificationLogPort;
  push: PushGatewayPort;
  modelSource: ModelSourcePort;
  clock: ClockPort;
}

export interface Services {
  config: AppConfig;
  hub: BroadcastHub;
  publisher: HubPublisher;
  snapshots: RealtimeSnapshots;
  modelLoader: ModelLoader;
  snapper: RouteSnapper;
  ingestion: TelemetryIngestService;
  eta: EtaEstimator;
  etaSubscriptions: EtaSubscriptions;
  proximity: ProximityNotifier;
  loops: IntervalLoop[];
}

export function createPostgresCollaborators(config: AppConfig): Collaborators {
  let push: PushGatewayPort;
  if (config.pushEnabled) {
    push = new FirebasePushGateway();
  } else {
    console.warn('[container] push notifications disabled; proximity alerts will be logged as failed');
    push = new DisabledPushGateway();
  }
  return {
    vehicles: new PgVehicleRegistry(),
    users: new PgUserDirectory(),
    routes: new PgRouteDefinitionStore(),
    trackingLog: new PgTrackingLog(),
    notifications: new PgNotificationLog(),
    push,
    modelSource: new HttpModelSource(),
    clock: new SystemClock(),
  };
}

/** Wires the long-lived service objects; nothing is started here. */
export function createServices(config: AppConfig, c: Collaborators): Services {
  const hub = new BroadcastHub();
  const publisher = new HubPublisher(hub);
  const snapshots = new RealtimeSnapshots(c.vehicles, c.users, c.notifications);
  const modelLoader = new ModelLoader(c.modelSource);
  const snapper = new RouteSnapper(c.routes, {
    enabled: config.routeSnappingEnabled,
    ttlMs: config.routeCacheTtlMs,
    clock: c.clock,
  });

  const ingestion = new TelemetryIngestService({
    decoder: new TelemetryDecoder(parseEnvelopeKey(config.telemetryKey)),
    corrector: new PositionCorrector(modelLoader),
    snapper,
    vehicles: c.vehicles,
    trackingLog: c.trackingLog,
    publisher,
    clock: c.clock,
    groundTruthAnalysis: config.groundTruthAnalysis,
  });

  const eta = new EtaEstimator({
    vehicles: c.vehicles,
    trackingLog: c.trackingLog,
    publisher,
    clock: c.clock,
  });
  const etaSubscriptions = new EtaSubscriptions(eta, c.clock, config.etaSubscriptionTtlMs);

  const proximity = new ProximityNotifier({
    vehicles: c.vehicles,
    users: c.users,
    notifications: c.notifications,
    push: c.push,
    publisher,
    clock: c.clock,
    radiusMeters: config.proximityRadiusMeters,
    cooldownMs: config.notificationCooldownMs,
  });

  const loops = [
    new IntervalLoop({
      name: 'proximity-sweep',
      intervalMs: config.proximitySweepIntervalMs,
      backoffMs: config.loopBackoffMs,
      task: async () => {
        const summary = await proximity.sweep();
        if (summary.notified > 0) {
          console.log(`[proximity-sweep] ${summary.notified} alert(s) from ${summary.checks} check(s)`);
        }
      },
    }),
    new IntervalLoop({
      name: 'stats-broadcast',
      intervalMs: config.statsIntervalMs,
      backoffMs: config.loopBackoffMs,
      task: async () => {
        if (hub.subscriberCount() === 0) return;
        publisher.publishCounts(await snapshots.counts());
      },
    }),
    new IntervalLoop({
      name: 'eta-refresh',
      intervalMs: config.etaRefreshIntervalMs,
      backoffMs: config.loopBackoffMs,
      task: () => etaSubscriptions.refresh(),
    }),
  ];

  return {
    config,
    hub,
    publisher,
    snapshots,
    modelLoader,
    snapper,
    ingestion,
    eta,
    etaSubscriptions,
    proximity,
    loops,
  };
}
