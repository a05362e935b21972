import type { EtaConfidence } from '@transit-pulse/domain';

export const URBAN_DEFAULT_SPEED_MPS = 8.33;
export const MIN_CONGESTION_SPEED_MPS = 2.78;
export const STOPPED_SPEED_MPS = 0.5;
export const FREE_FLOW_SPEED_MPS = 3.0;
export const MAX_BUFFER_MINUTES = 5;

/**
 * Percentile-anchored mean. Non-positive samples are dropped, the sample at
 * floor(0.7·n) of the sorted rest is the anchor, and every sample at or above
 * half the anchor is averaged.
 */
export function averageSpeed(samples: readonly number[], percentile = 0.7): number {
  const valid = samples.filter((s) => s > 0).sort((a, b) => a - b);
  if (valid.length === 0) return 0;

  const index = Math.min(Math.floor(valid.length * percentile), valid.length - 1);
  const anchor = valid[index];
  const moving = valid.filter((s) => s >= anchor / 2);
  if (moving.length === 0) return anchor;
  return moving.reduce((sum, s) => sum + s, 0) / moving.length;
}

/** `recent` is newest first; only its first five entries count. */
export function isStopped(currentSpeedMps: number, recent: readonly number[]): boolean {
  if (currentSpeedMps >= STOPPED_SPEED_MPS) return false;
  const window = recent.slice(0, 5);
  if (window.length < 3) return false;
  const stopped = window.filter((s) => s < STOPPED_SPEED_MPS).length;
  return stopped / window.length > 0.6;
}

export interface SpeedSelectionInput {
  currentSpeedMps: number;
  averageSpeedMps: number;
  stopped: boolean;
  /** Lower-cased keypad status detail. */
  statusDetail: string;
}

export interface SpeedSelection {
  speedMps: number;
  confidence: EtaConfidence;
  message: string;
}

export function selectEffectiveSpeed(input: SpeedSelectionInput): SpeedSelection {
  const { currentSpeedMps: current, averageSpeedMps: average } = input;

  if (input.stopped) {
    return {
      speedMps: average > 1.0 ? average : URBAN_DEFAULT_SPEED_MPS,
      confidence: 'medium',
      message: 'Vehicle temporarily stopped. ETA based on average speed.',
    };
  }

  if (input.statusDetail === 'standing') {
    return average > 1.0
      ? { speedMps: average, confidence: 'low', message: 'Vehicle standing. ETA based on historical speed.' }
      : { speedMps: URBAN_DEFAULT_SPEED_MPS, confidence: 'low', message: 'Vehicle standing. ETA is estimated.' };
  }

  if (current >= STOPPED_SPEED_MPS && current < FREE_FLOW_SPEED_MPS) {
    const blended = average > current ? current * 0.3 + average * 0.7 : current * 0.7 + average * 0.3;
    return {
      speedMps: Math.max(blended, MIN_CONGESTION_SPEED_MPS),
      confidence: 'medium',
      message: 'Vehicle in traffic. ETA adjusted for congestion.',
    };
  }

  if (current >= FREE_FLOW_SPEED_MPS) {
    return average > 1.0
      ? {
          speedMps: current * 0.6 + average * 0.4,
          confidence: 'high',
          message: 'Vehicle moving normally. Real-time ETA.',
        }
      : { speedMps: current, confidence: 'medium', message: 'Vehicle moving. ETA based on current speed.' };
  }

  return { speedMps: URBAN_DEFAULT_SPEED_MPS, confidence: 'low', message: 'Limited data. ETA is estimated.' };
}

/** Travel time plus a stop buffer of 15 %, capped at five minutes. */
export function etaMinutes(distanceMeters: number, speedMps: number): number {
  const minutes = distanceMeters / speedMps / 60;
  return minutes + Math.min(minutes * 0.15, MAX_BUFFER_MINUTES);
}

export function formatEta(minutes: number): string {
  if (minutes < 1) return 'Less than 1 minute';
  if (minutes < 60) return `${Math.floor(minutes)} minutes`;
  const hours = Math.floor(minutes / 60);
  const mins = Math.floor(minutes % 60);
  return `${hours} hour${hours > 1 ? 's' : ''} ${mins} minutes`;
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
