// ─── PostgreSQL Adapters ───────────────────────────────────────────────────────
export { getPool, closePool, pingDatabase } from './postgres/pool.js';
export { PgVehicleRegistry } from './postgres/vehicle-registry.repository.js';
export { PgUserDirectory } from './postgres/user-directory.repository.js';
export { PgRouteDefinitionStore } from './postgres/route-definition.repository.js';
export { PgTrackingLog } from './postgres/tracking-log.repository.js';
export { PgNotificationLog } from './postgres/notification-log.repository.js';

// ─── Envelope Cipher ──────────────────────────────────────────────────────────
export { encryptEnvelope, decryptEnvelope, parseEnvelopeKey } from './crypto/envelope-cipher.js';

// ─── Push Gateway ─────────────────────────────────────────────────────────────
export { FirebasePushGateway, DisabledPushGateway } from './firebase/firebase-push-gateway.js';

// ─── Inference Service ────────────────────────────────────────────────────────
export { HttpModelSource } from './inference/http-model-source.js';

// ─── Clock / RNG ──────────────────────────────────────────────────────────────
export { SystemClock, ManualClock, SeededRng } from './clock/deterministic-clock.js';
