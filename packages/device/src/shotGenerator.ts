/**
 * @fileoverview Sample shot generation for the launch-monitor emulator.
 */

import type { ShotId, ShotTelemetry } from '@shot-relay/shared';

export type ShotProfileName = 'driver' | '7iron' | 'wedge';

/**
 * Uniform range [min, max].
 */
export interface Range {
  readonly min: number;
  readonly max: number;
}

export interface ShotProfile {
  readonly speedMph: Range;
  readonly launchAngleDeg: Range;
  readonly azimuthDeg: Range;
  readonly totalSpinRpm: Range;
  readonly backSpinRpm: Range;
  readonly sideSpinRpm: Range;
}

/**
 * Source of uniform numbers in [0, 1).
 */
export type RandomSource = () => number;

export const SHOT_PROFILES: Readonly<Record<ShotProfileName, ShotProfile>> = {
  driver: {
    speedMph: { min: 155, max: 175 },
    launchAngleDeg: { min: 9, max: 13 },
    azimuthDeg: { min: -3, max: 3 },
    totalSpinRpm: { min: 2200, max: 3000 },
    backSpinRpm: { min: 2000, max: 2800 },
    sideSpinRpm: { min: -500, max: 500 },
  },
  '7iron': {
    speedMph: { min: 115, max: 130 },
    launchAngleDeg: { min: 15, max: 19 },
    azimuthDeg: { min: -2, max: 2 },
    totalSpinRpm: { min: 6000, max: 8000 },
    backSpinRpm: { min: 5800, max: 7800 },
    sideSpinRpm: { min: -400, max: 400 },
  },
  wedge: {
    speedMph: { min: 85, max: 105 },
    launchAngleDeg: { min: 28, max: 38 },
    azimuthDeg: { min: -2, max: 2 },
    totalSpinRpm: { min: 8000, max: 11000 },
    backSpinRpm: { min: 7800, max: 10800 },
    sideSpinRpm: { min: -300, max: 300 },
  },
};

export function isShotProfileName(value: string): value is ShotProfileName {
  return Object.hasOwn(SHOT_PROFILES, value);
}

function uniform(range: Range, random: RandomSource): number {
  return range.min + (range.max - range.min) * random();
}

/**
 * Draw a shot from a profile.
 */
export function generateShot(
  profile: ShotProfileName,
  random: RandomSource = Math.random
): ShotTelemetry {
  const ranges = SHOT_PROFILES[profile];
  return {
    speedMph: uniform(ranges.speedMph, random),
    launchAngleDeg: uniform(ranges.launchAngleDeg, random),
    azimuthDeg: uniform(ranges.azimuthDeg, random),
    totalSpinRpm: uniform(ranges.totalSpinRpm, random),
    backSpinRpm: uniform(ranges.backSpinRpm, random),
    sideSpinRpm: uniform(ranges.sideSpinRpm, random),
  };
}

/**
 * Shot whose spin encodes its id, so a receiver can tell which shot each
 * reading belongs to: back = 2500 + id, side = -200 + id.
 */
export function generateTrackedShot(
  shotId: ShotId,
  random: RandomSource = Math.random
): ShotTelemetry {
  const backSpinRpm = 2500 + shotId;
  const sideSpinRpm = -200 + shotId;
  return {
    speedMph: 150 + uniform({ min: -10, max: 10 }, random),
    launchAngleDeg: 12 + uniform({ min: -2, max: 2 }, random),
    azimuthDeg: uniform({ min: -3, max: 3 }, random),
    totalSpinRpm: backSpinRpm + Math.abs(sideSpinRpm),
    backSpinRpm,
    sideSpinRpm,
  };
}
