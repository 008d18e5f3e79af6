/**
 * @fileoverview Domain types shared across packages.
 */

/**
 * Shot identifier assigned by the launch monitor.
 */
export type ShotId = number;

/**
 * 3D position in device coordinates (millimetres from the sensor origin).
 */
export interface Position {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/**
 * Club-motion data (HMT block).
 */
export interface ClubTelemetry {
  /** Club head speed in mph */
  readonly speedMph: number;
  /** Club path in degrees (+ = in-to-out) */
  readonly pathDeg?: number;
  /** Attack angle in degrees (+ = up) */
  readonly attackAngleDeg?: number;
  /** Face angle to target in degrees (+ = open) */
  readonly faceToTargetDeg?: number;
}

/**
 * Ball-flight telemetry for one shot.
 */
export interface ShotTelemetry {
  /** Ball speed in mph */
  readonly speedMph: number;
  /** Vertical launch angle in degrees */
  readonly launchAngleDeg: number;
  /** Horizontal launch direction in degrees (+ = right) */
  readonly azimuthDeg: number;
  readonly totalSpinRpm: number;
  readonly backSpinRpm: number;
  /** Side spin in rpm (+ = fade/slice) */
  readonly sideSpinRpm: number;
  readonly club?: ClubTelemetry;
}

/**
 * Launch-monitor readiness as reported by device status messages.
 */
export interface DeviceStatus {
  /** Green light (FLAGS == 7) */
  readonly isReady: boolean;
  /** At least one ball in the tee area */
  readonly ballDetected: boolean;
}
