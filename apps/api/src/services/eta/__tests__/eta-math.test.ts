/**
 * ETA Math Tests
 *
 * Pure helpers: percentile-anchored average, stop detection, effective-speed
 * selection, buffered minutes and the human-readable format.
 */

import { describe, it, expect } from '@jest/globals';

import {
  URBAN_DEFAULT_SPEED_MPS,
  MIN_CONGESTION_SPEED_MPS,
  averageSpeed,
  etaMinutes,
  formatEta,
  isStopped,
  round2,
  selectEffectiveSpeed,
} from '../eta-math.js';

// ═══════════════════════════════════════════════════════════════════════════════
// averageSpeed
// ═══════════════════════════════════════════════════════════════════════════════

describe('averageSpeed', () => {
  it('averages samples at or above half the 70th-percentile anchor', () => {
    // anchor = 8, kept = 4..10
    expect(averageSpeed([1, 2, 3, 4, 5, 6, 7, 8, 9, 10])).toBe(7);
  });

  it('ignores order', () => {
    expect(averageSpeed([10, 1, 9, 2, 8, 3, 7, 4, 6, 5])).toBe(7);
  });

  it('drops zero and negative samples', () => {
    expect(averageSpeed([0, 0, -1, 6])).toBe(6);
  });

  it('is zero without positive samples', () => {
    expect(averageSpeed([])).toBe(0);
    expect(averageSpeed([0, 0])).toBe(0);
  });

  it('discards crawling samples far below the anchor', () => {
    // sorted [0.5, 10, 10, 10], anchor index 2 → 10, 0.5 < 5 is dropped
    expect(averageSpeed([10, 0.5, 10, 10])).toBe(10);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// isStopped
// ═══════════════════════════════════════════════════════════════════════════════

describe('isStopped', () => {
  it('is false whenever the current speed is at or above the threshold', () => {
    expect(isStopped(0.5, [0, 0, 0, 0, 0])).toBe(false);
  });

  it('needs at least three recent samples', () => {
    expect(isStopped(0, [0, 0])).toBe(false);
    expect(isStopped(0, [0, 0, 0])).toBe(true);
  });

  it('needs strictly more than 60 % of the window stopped', () => {
    expect(isStopped(0, [0, 0, 0, 1, 1])).toBe(false);
    expect(isStopped(0, [0, 0, 0, 0, 1])).toBe(true);
  });

  it('only looks at the five newest samples', () => {
    expect(isStopped(0, [0, 0, 0, 0, 1, 5, 5, 5, 5, 5])).toBe(true);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// selectEffectiveSpeed
// ═══════════════════════════════════════════════════════════════════════════════

describe('selectEffectiveSpeed', () => {
  const base = { currentSpeedMps: 0, averageSpeedMps: 0, stopped: false, statusDetail: '' };

  it('uses the average for a temporarily stopped vehicle', () => {
    expect(selectEffectiveSpeed({ ...base, stopped: true, averageSpeedMps: 5 })).toEqual({
      speedMps: 5,
      confidence: 'medium',
      message: 'Vehicle temporarily stopped. ETA based on average speed.',
    });
  });

  it('falls back to the urban default when stopped without history', () => {
    expect(selectEffectiveSpeed({ ...base, stopped: true, averageSpeedMps: 0.8 }).speedMps).toBe(
      URBAN_DEFAULT_SPEED_MPS,
    );
  });

  it('treats a standing vehicle with low confidence', () => {
    expect(selectEffectiveSpeed({ ...base, statusDetail: 'standing', averageSpeedMps: 4 })).toEqual({
      speedMps: 4,
      confidence: 'low',
      message: 'Vehicle standing. ETA based on historical speed.',
    });
    expect(selectEffectiveSpeed({ ...base, statusDetail: 'standing' })).toEqual({
      speedMps: URBAN_DEFAULT_SPEED_MPS,
      confidence: 'low',
      message: 'Vehicle standing. ETA is estimated.',
    });
  });

  it('leans on the average in traffic when the average is higher', () => {
    const sel = selectEffectiveSpeed({ ...base, currentSpeedMps: 2, averageSpeedMps: 6 });
    expect(sel.speedMps).toBeCloseTo(4.8, 10);
    expect(sel.message).toBe('Vehicle in traffic. ETA adjusted for congestion.');
  });

  it('floors the congestion speed', () => {
    expect(selectEffectiveSpeed({ ...base, currentSpeedMps: 2, averageSpeedMps: 1 }).speedMps).toBe(
      MIN_CONGESTION_SPEED_MPS,
    );
  });

  it('blends current and average when moving freely', () => {
    const sel = selectEffectiveSpeed({ ...base, currentSpeedMps: 10, averageSpeedMps: 5 });
    expect(sel.speedMps).toBeCloseTo(8, 10);
    expect(sel.confidence).toBe('high');
  });

  it('uses the current speed alone when there is no history', () => {
    expect(selectEffectiveSpeed({ ...base, currentSpeedMps: 10 })).toEqual({
      speedMps: 10,
      confidence: 'medium',
      message: 'Vehicle moving. ETA based on current speed.',
    });
  });

  it('falls back to the urban default with no usable data', () => {
    expect(selectEffectiveSpeed({ ...base, currentSpeedMps: 0.2 })).toEqual({
      speedMps: URBAN_DEFAULT_SPEED_MPS,
      confidence: 'low',
      message: 'Limited data. ETA is estimated.',
    });
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// etaMinutes / formatEta
// ═══════════════════════════════════════════════════════════════════════════════

describe('etaMinutes', () => {
  it('adds a 15 % stop buffer', () => {
    expect(etaMinutes(600, 10)).toBeCloseTo(1.15, 10);
  });

  it('caps the buffer at five minutes', () => {
    expect(etaMinutes(60_000, 1)).toBeCloseTo(1005, 10);
  });
});

describe('formatEta', () => {
  it.each([
    [0.4, 'Less than 1 minute'],
    [1, '1 minutes'],
    [1.92, '1 minutes'],
    [59.9, '59 minutes'],
    [60, '1 hour 0 minutes'],
    [135.5, '2 hours 15 minutes'],
  ])('formats %p as %p', (minutes, text) => {
    expect(formatEta(minutes)).toBe(text);
  });
});

describe('round2', () => {
  it('rounds to two decimals', () => {
    expect(round2(1.918)).toBe(1.92);
    expect(round2(1000.754)).toBe(1000.75);
  });
});
