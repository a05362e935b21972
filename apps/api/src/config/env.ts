/**
 * Runtime configuration, read once from the environment.
 * Adapters read their own connection settings (DATABASE_URL, ML_INFERENCE_URL,
 * FIREBASE_SERVICE_ACCOUNT_KEY); everything the services need lives here.
 */

import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  CORS_ORIGIN: z.string().default('*'),
  TELEMETRY_AES_KEY: z.string().min(1, 'TELEMETRY_AES_KEY is required'),
  ROUTE_SNAPPING_ENABLED: booleanFlag.default('false'),
  ROUTE_CACHE_TTL_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),
  GROUND_TRUTH_ANALYSIS_ENABLED: booleanFlag.default('false'),
  PROXIMITY_RADIUS_METERS: z.coerce.number().positive().default(500),
  NOTIFICATION_COOLDOWN_MS: z.coerce.number().int().nonnegative().default(5 * 60 * 1000),
  PROXIMITY_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(10_000),
  LOOP_BACKOFF_MS: z.coerce.number().int().nonnegative().default(5_000),
  STATS_INTERVAL_MS: z.coerce.number().int().positive().default(30_000),
  ETA_REFRESH_INTERVAL_MS: z.coerce.number().int().positive().default(10_000),
  ETA_SUBSCRIPTION_TTL_MS: z.coerce.number().int().positive().default(5 * 60 * 1000),
  PUSH_ENABLED: booleanFlag.default('true'),
});

export interface AppConfig {
  port: number;
  corsOrigin: string;
  telemetryKey: string;
  routeSnappingEnabled: boolean;
  routeCacheTtlMs: number;
  groundTruthAnalysis: boolean;
  proximityRadiusMeters: number;
  notificationCooldownMs: number;
  proximitySweepIntervalMs: number;
  loopBackoffMs: number;
  statsIntervalMs: number;
  etaRefreshIntervalMs: number;
  etaSubscriptionTtlMs: number;
  pushEnabled: boolean;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const env = envSchema.parse(source);
  return {
    port: env.PORT,
    corsOrigin: env.CORS_ORIGIN,
    telemetryKey: env.TELEMETRY_AES_KEY,
    routeSnappingEnabled: env.ROUTE_SNAPPING_ENABLED,
    routeCacheTtlMs: env.ROUTE_CACHE_TTL_MS,
    groundTruthAnalysis: env.GROUND_TRUTH_ANALYSIS_ENABLED,
    proximityRadiusMeters: env.PROXIMITY_RADIUS_METERS,
    notificationCooldownMs: env.NOTIFICATION_COOLDOWN_MS,
    proximitySweepIntervalMs: env.PROXIMITY_SWEEP_INTERVAL_MS,
    loopBackoffMs: env.LOOP_BACKOFF_MS,
    statsIntervalMs: env.STATS_INTERVAL_MS,
    etaRefreshIntervalMs: env.ETA_REFRESH_INTERVAL_MS,
    etaSubscriptionTtlMs: env.ETA_SUBSCRIPTION_TTL_MS,
    pushEnabled: env.PUSH_ENABLED,
  };
}
