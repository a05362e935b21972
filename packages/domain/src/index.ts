// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/geo-point.js';
export * from './entities/vehicle.js';
export * from './entities/rider.js';
export * from './entities/route.js';
export * from './entities/telemetry-reading.js';
export * from './entities/tracking-log.js';
export * from './entities/notification-record.js';
export * from './entities/model-load-state.js';
export * from './entities/eta.js';

// ─── Errors ───────────────────────────────────────────────────────────────────
export * from './errors/pipeline-errors.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/telemetry-ingestion.port.js';
export * from './ports/inbound/eta-query.port.js';
export * from './ports/inbound/proximity-alert.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/vehicle-registry.port.js';
export * from './ports/outbound/user-directory.port.js';
export * from './ports/outbound/route-definition.port.js';
export * from './ports/outbound/tracking-log.port.js';
export * from './ports/outbound/notification-log.port.js';
export * from './ports/outbound/push-gateway.port.js';
export * from './ports/outbound/position-inference.port.js';
export * from './ports/outbound/realtime-publisher.port.js';
export * from './ports/outbound/clock.port.js';
