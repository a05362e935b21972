import type { ClockPort } from '@transit-pulse/domain';

/**
 * Seedable pseudo-random number generator (mulberry32).
 * Drives the device emitter's simulated drive so runs are reproducible.
 */
export class SeededRng {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /** Returns a float in [0, 1). */
  next(): number {
    this.state += 0x6d2b79f5;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 0x100000000;
  }

  /** Returns a float in [min, max). */
  nextFloat(min: number, max: number): number {
    return this.next() * (max - min) + min;
  }

  /** Standard normal sample (Box-Muller). */
  nextGaussian(): number {
    const u = Math.max(this.next(), Number.EPSILON);
    const v = this.next();
    return Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
  }
}

/** Clock that only moves when told to. */
export class ManualClock implements ClockPort {
  private currentMs: number;

  constructor(epochMs: number) {
    this.currentMs = epochMs;
  }

  now(): Date {
    return new Date(this.currentMs);
  }

  advance(ms: number): void {
    this.currentMs += ms;
  }

  set(epochMs: number): void {
    this.currentMs = epochMs;
  }
}

export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }
}
