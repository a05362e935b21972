import 'dotenv/config';
import { fetch } from 'undici';
import { SeededRng, encryptEnvelope, parseEnvelopeKey } from '@transit-pulse/adapters';
import { initialDriveState, step } from './drive-simulator.js';
import { buildSensorReading, type FixFormat } from './sensor-reading.js';

/**
 * Device emitter — one process per simulated on-board unit.
 *
 * Env vars:
 *   DEVICE_ID          — device id bound to a vehicle (required)
 *   TELEMETRY_AES_KEY  — base64 32-byte key shared with the API (required)
 *   API_BASE_URL       — Base URL of the API (default: http://api:3001)
 *   EMIT_INTERVAL_MS   — emit interval in ms (default: 2000)
 *   FIX_FORMAT         — geodetic | ecef (default: geodetic)
 *   START_LAT          — Starting latitude  (default: 10.3157)
 *   START_LNG          — Starting longitude (default: 123.8854)
 *   SEED               — RNG seed (default: derived from DEVICE_ID)
 */

const DEVICE_ID = process.env['DEVICE_ID'];
const AES_KEY = process.env['TELEMETRY_AES_KEY'];
const API_BASE_URL = process.env['API_BASE_URL'] ?? 'http://api:3001';
const EMIT_INTERVAL_MS = parseInt(process.env['EMIT_INTERVAL_MS'] ?? '2000', 10);
const FIX_FORMAT: FixFormat = process.env['FIX_FORMAT'] === 'ecef' ? 'ecef' : 'geodetic';

if (!DEVICE_ID || !AES_KEY) {
  console.error('[emitter] DEVICE_ID and TELEMETRY_AES_KEY are required');
  process.exit(1);
}

const deviceId = DEVICE_ID;
const key = parseEnvelopeKey(AES_KEY);
const seed = parseInt(process.env['SEED'] ?? '', 10);
const rng = new SeededRng(Number.isNaN(seed) ? hashSeed(deviceId) : seed);
const state = initialDriveState(
  parseFloat(process.env['START_LAT'] ?? '10.3157'),
  parseFloat(process.env['START_LNG'] ?? '123.8854'),
  rng,
);

function hashSeed(value: string): number {
  let h = 0;
  for (let i = 0; i < value.length; i++) h = (Math.imul(h, 31) + value.charCodeAt(i)) >>> 0;
  return h;
}

async function emit(): Promise<void> {
  step(state, rng, EMIT_INTERVAL_MS);
  const reading = buildSensorReading(deviceId, state, rng, FIX_FORMAT);
  const encrypted = encryptEnvelope(JSON.stringify(reading), key);

  try {
    const resp = await fetch(`${API_BASE_URL}/api/telemetry`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ encrypted_data: encrypted }),
    });

    if (resp.status === 202) {
      console.log(`[emitter:${deviceId}] model still loading, reading dropped`);
    } else if (!resp.ok) {
      const text = await resp.text();
      console.error(`[emitter:${deviceId}] telemetry rejected ${resp.status}: ${text}`);
    }
  } catch (err) {
    console.error(`[emitter:${deviceId}] network error`, err instanceof Error ? err.message : err);
  }
}

console.log(`[emitter] starting for device ${deviceId} (${FIX_FORMAT} fixes)`);
setInterval(() => void emit(), EMIT_INTERVAL_MS);
