/**
 * Clock and RNG Tests
 */

import { describe, it, expect } from '@jest/globals';

import { ManualClock, SeededRng } from '../clock/deterministic-clock.js';

describe('SeededRng', () => {
  it('replays the same sequence for the same seed', () => {
    const a = new SeededRng(42);
    const b = new SeededRng(42);
    const seqA = Array.from({ length: 20 }, () => a.next());
    const seqB = Array.from({ length: 20 }, () => b.next());
    expect(seqA).toEqual(seqB);
  });

  it('diverges for different seeds', () => {
    const a = new SeededRng(1);
    const b = new SeededRng(2);
    expect(a.next()).not.toBe(b.next());
  });

  it('stays in [0, 1) and honours nextFloat bounds', () => {
    const rng = new SeededRng(7);
    for (let i = 0; i < 500; i++) {
      const u = rng.next();
      expect(u).toBeGreaterThanOrEqual(0);
      expect(u).toBeLessThan(1);
      const f = rng.nextFloat(15, 50);
      expect(f).toBeGreaterThanOrEqual(15);
      expect(f).toBeLessThan(50);
    }
  });

  it('produces finite gaussian samples', () => {
    const rng = new SeededRng(3);
    for (let i = 0; i < 200; i++) {
      expect(Number.isFinite(rng.nextGaussian())).toBe(true);
    }
  });
});

describe('ManualClock', () => {
  it('only moves when advanced or set', () => {
    const clock = new ManualClock(1_000);
    expect(clock.now().getTime()).toBe(1_000);
    clock.advance(250);
    expect(clock.now().getTime()).toBe(1_250);
    clock.set(5_000);
    expect(clock.now().getTime()).toBe(5_000);
  });

  it('hands out fresh Date objects', () => {
    const clock = new ManualClock(0);
    expect(clock.now()).not.toBe(clock.now());
  });
});
