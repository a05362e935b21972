/**
 * HTTP Model Source Tests
 *
 * The inference service is replaced by an undici MockAgent installed as the
 * global dispatcher, so nothing leaves the process.
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { MockAgent, getGlobalDispatcher, setGlobalDispatcher, type Dispatcher } from 'undici';
import type { PositionFeatures } from '@transit-pulse/domain';

import { HttpModelSource } from '../inference/http-model-source.js';

// ─── Helpers ──────────────────────────────────────────────────────────────────

const BASE_URL = 'http://inference.test';

const FEATURES: PositionFeatures = {
  cn0DbHz: 30,
  svid: 12,
  svElevationDegrees: 30,
  svAzimuthDegrees: 180,
  imuMessageType: 'UncalAccel',
  measurementX: 0.1,
  measurementY: -0.2,
  measurementZ: 9.8,
  biasX: 0,
  biasY: 0,
  biasZ: 0,
  wlsPositionXEcefMeters: 1,
  wlsPositionYEcefMeters: 2,
  wlsPositionZEcefMeters: 3,
  signalQuality: 15,
  wlsDistance: 3.74,
  speedMps: 5,
};

let agent: MockAgent;
let original: Dispatcher;

beforeEach(() => {
  original = getGlobalDispatcher();
  agent = new MockAgent();
  agent.disableNetConnect();
  setGlobalDispatcher(agent);
});

afterEach(async () => {
  setGlobalDispatcher(original);
  await agent.close();
});

// ═══════════════════════════════════════════════════════════════════════════════
// load()
// ═══════════════════════════════════════════════════════════════════════════════

describe('HttpModelSource.load', () => {
  it('returns a model named after the health report', async () => {
    agent.get(BASE_URL).intercept({ path: '/health', method: 'GET' }).reply(200, { status: 'ok', model: 'gbm-v3' });

    const model = await new HttpModelSource(BASE_URL).load();
    expect(model.modelName).toBe('gbm-v3');
  });

  it('fails while the service is unhealthy', async () => {
    agent.get(BASE_URL).intercept({ path: '/health', method: 'GET' }).reply(503, 'warming up');

    await expect(new HttpModelSource(BASE_URL).load()).rejects.toThrow('inference service unavailable (503)');
  });

  it('fails on a health payload without a model', async () => {
    agent.get(BASE_URL).intercept({ path: '/health', method: 'GET' }).reply(200, { status: 'ok' });

    await expect(new HttpModelSource(BASE_URL).load()).rejects.toThrow();
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// predictOffset()
// ═══════════════════════════════════════════════════════════════════════════════

describe('predictOffset', () => {
  it('posts the feature columns and returns the offset pair', async () => {
    const pool = agent.get(BASE_URL);
    pool.intercept({ path: '/health', method: 'GET' }).reply(200, { status: 'ok', model: 'gbm-v3' });

    let posted = '';
    pool.intercept({ path: '/predict', method: 'POST' }).reply(200, (opts) => {
      posted = typeof opts.body === 'string' ? opts.body : '';
      return { offset: [0.0001, -0.0002] };
    });

    const model = await new HttpModelSource(BASE_URL).load();
    const offset = await model.predictOffset(FEATURES);

    expect(offset).toEqual([0.0001, -0.0002]);
    const body: unknown = JSON.parse(posted);
    expect(body).toMatchObject({
      features: { Cn0DbHz: 30, IMU_MessageType: 'UncalAccel', SignalQuality: 15, WLS_Distance: 3.74 },
    });
  });

  it('rejects on a non-2xx response', async () => {
    const pool = agent.get(BASE_URL);
    pool.intercept({ path: '/health', method: 'GET' }).reply(200, { status: 'ok', model: 'gbm-v3' });
    pool.intercept({ path: '/predict', method: 'POST' }).reply(500, 'boom');

    const model = await new HttpModelSource(BASE_URL).load();
    await expect(model.predictOffset(FEATURES)).rejects.toThrow('inference service responded 500: boom');
  });
});
