import type { SeededRng } from '@transit-pulse/adapters';

// ── State machine ───────────────────────────────────────────────────────────
export type DrivePhase = 'idle' | 'accel' | 'cruise' | 'decel';

export interface DriveState {
  latitude: number;
  longitude: number;
  altitude: number;
  speedKph: number;
  headingDeg: number;
  phase: DrivePhase;
  phaseTicks: number;
  cruiseTarget: number;
}

export function initialDriveState(latitude: number, longitude: number, rng: SeededRng): DriveState {
  return {
    latitude,
    longitude,
    altitude: 10,
    speedKph: 0,
    headingDeg: rng.nextFloat(0, 360),
    phase: 'idle',
    phaseTicks: 0,
    cruiseTarget: 0,
  };
}

function nextPhase(s: DriveState, rng: SeededRng): void {
  switch (s.phase) {
    case 'idle':
      s.phase = 'accel';
      s.cruiseTarget = rng.nextFloat(15, 50); // jeepney speeds, km/h
      s.phaseTicks = Math.floor(rng.nextFloat(6, 12));
      s.headingDeg = (s.headingDeg + rng.nextFloat(-15, 15) + 360) % 360;
      break;
    case 'accel':
      s.phase = 'cruise';
      s.phaseTicks = Math.floor(rng.nextFloat(10, 30));
      break;
    case 'cruise':
      // Passenger stop or slowdown
      if (rng.next() < 0.4) {
        s.phase = 'idle';
        s.phaseTicks = Math.floor(rng.nextFloat(3, 10));
      } else {
        s.phase = 'decel';
        s.phaseTicks = Math.floor(rng.nextFloat(4, 8));
      }
      break;
    case 'decel':
      s.phase = 'accel';
      s.cruiseTarget = rng.nextFloat(15, 50);
      s.phaseTicks = Math.floor(rng.nextFloat(5, 10));
      break;
  }
}

/** Advances the simulated vehicle by one tick of `tickMs`. */
export function step(s: DriveState, rng: SeededRng, tickMs: number): void {
  if (s.phaseTicks <= 0) nextPhase(s, rng);
  s.phaseTicks--;

  switch (s.phase) {
    case 'idle':
      s.speedKph = Math.max(0, s.speedKph * 0.4);
      break;
    case 'accel':
      s.speedKph += (s.cruiseTarget - s.speedKph) * 0.3;
      break;
    case 'cruise':
      s.speedKph = Math.max(5, s.cruiseTarget + rng.nextFloat(-2, 2));
      break;
    case 'decel':
      s.speedKph = Math.max(0, s.speedKph * 0.75);
      break;
  }

  if (s.speedKph > 3) {
    s.headingDeg = (s.headingDeg + rng.nextFloat(-2.5, 2.5) + 360) % 360;
  }

  const distKm = (s.speedKph / 3600) * (tickMs / 1000);
  const headingRad = (s.headingDeg * Math.PI) / 180;
  s.latitude += (distKm * Math.cos(headingRad)) / 111;
  s.longitude += (distKm * Math.sin(headingRad)) / (111 * Math.cos((s.latitude * Math.PI) / 180));
}
