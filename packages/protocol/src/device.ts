/**
 * @fileoverview Launch-monitor text protocol (device → host).
 *
 * A message is a block of `KEY=VALUE` lines whose first line names its kind
 * (`0H` shot reading, `0M` device status), joined by `\n` and terminated by
 * `\n\t`. The transport delivers it in fixed-size packets, so messages are
 * reassembled before they are parsed.
 */

import { StringDecoder } from 'node:string_decoder';
import type {
  ClubTelemetry,
  DeviceStatus,
  Position,
  ShotId,
  ShotTelemetry,
} from '@shot-relay/shared';

export const SHOT_MESSAGE_PREFIX = '0H';
export const STATUS_MESSAGE_PREFIX = '0M';
export const MESSAGE_TERMINATOR = '\n\t';

/** FLAGS value of a device showing the green light */
export const FLAGS_READY = 7;
/** FLAGS value of a device that is not ready */
export const FLAGS_NOT_READY = 1;

/** Tee position reported with every emulated reading */
const WORLD_START: Position = { x: -53.53, y: 91.4, z: -477.94 };

/** Ball position reported by emulated status messages */
const STATUS_BALL_POSITION = '198,206,12';

// ============ Types ============

/**
 * One `0H` observation of a shot.
 */
export interface ShotReading {
  readonly shotId: ShotId;
  readonly msecSinceContact: number;
  /** Back/side spin are 0 when the reading does not carry them */
  readonly telemetry: ShotTelemetry;
  /** BACK_RPM and SIDE_RPM were present: this is the authoritative reading */
  readonly isFinal: boolean;
  readonly worldStart?: Position;
}

/**
 * One `0M` device status report.
 */
export interface DeviceStatusReport extends DeviceStatus {
  readonly flags: number;
  readonly balls: number;
  readonly ballPosition: Position | null;
}

export type DeviceMessage =
  | { readonly type: 'shot'; readonly reading: ShotReading }
  | { readonly type: 'status'; readonly status: DeviceStatusReport };

export interface ShotReadingFormat {
  readonly msecSinceContact: number;
  /** Include BACK_RPM/SIDE_RPM (final reading) */
  readonly includeSpinComponents: boolean;
}

// ============ Formatting ============

/**
 * Build a `0H` shot reading.
 */
export function formatShotReading(
  shotId: ShotId,
  telemetry: ShotTelemetry,
  format: ShotReadingFormat
): string {
  const lines = [
    SHOT_MESSAGE_PREFIX,
    `SHOT_ID=${shotId}`,
    'TIME_SEC=0',
    `MSEC_SINCE_CONTACT=${format.msecSinceContact}`,
    `SPEED_MPH=${telemetry.speedMph.toFixed(2)}`,
    `AZIMUTH_DEG=${telemetry.azimuthDeg.toFixed(2)}`,
    `ELEVATION_DEG=${telemetry.launchAngleDeg.toFixed(2)}`,
    `SPIN_RPM=${telemetry.totalSpinRpm.toFixed(0)}`,
  ];

  if (format.includeSpinComponents) {
    lines.push(
      `BACK_RPM=${telemetry.backSpinRpm.toFixed(0)}`,
      `SIDE_RPM=${telemetry.sideSpinRpm.toFixed(0)}`
    );
  }

  lines.push(
    'IS_LEFT=0',
    `WORLDSTART_X=${WORLD_START.x.toFixed(2)}`,
    `WORLDSTART_Y=${WORLD_START.y.toFixed(2)}`,
    `WORLDSTART_Z=${WORLD_START.z.toFixed(2)}`
  );

  const club = telemetry.club;
  if (club) {
    lines.push('HMT=1', `CLUBSPEED_MPH=${club.speedMph.toFixed(1)}`);
    if (club.pathDeg !== undefined) lines.push(`HPATH_DEG=${club.pathDeg.toFixed(1)}`);
    if (club.attackAngleDeg !== undefined) lines.push(`VPATH_DEG=${club.attackAngleDeg.toFixed(1)}`);
    if (club.faceToTargetDeg !== undefined) {
      lines.push(`FACE_T_DEG=${club.faceToTargetDeg.toFixed(1)}`);
    }
  } else {
    lines.push('HMT=0');
  }

  return lines.join('\n') + MESSAGE_TERMINATOR;
}

/**
 * Build a `0M` device status message.
 */
export function formatDeviceStatus(status: DeviceStatus): string {
  const balls = status.ballDetected ? 1 : 0;
  const lines = [
    STATUS_MESSAGE_PREFIX,
    `FLAGS=${status.isReady ? FLAGS_READY : FLAGS_NOT_READY}`,
    `BALLS=${balls}`,
  ];
  if (balls > 0) {
    lines.push(`BALL1=${STATUS_BALL_POSITION}`);
  }
  return lines.join('\n') + MESSAGE_TERMINATOR;
}

// ============ Parsing ============

function parseFields(message: string): Map<string, string> {
  const fields = new Map<string, string>();
  for (const line of message.split('\n')) {
    const trimmed = line.trim();
    const equalsIndex = trimmed.indexOf('=');
    if (equalsIndex > 0) {
      fields.set(trimmed.slice(0, equalsIndex), trimmed.slice(equalsIndex + 1));
    }
  }
  return fields;
}

function getFloat(fields: Map<string, string>, key: string): number | undefined {
  const raw = fields.get(key);
  if (raw === undefined) return undefined;
  const value = Number.parseFloat(raw);
  return Number.isFinite(value) ? value : undefined;
}

function getInt(fields: Map<string, string>, key: string, fallback = 0): number {
  const raw = fields.get(key);
  if (raw === undefined) return fallback;
  const value = Number.parseInt(raw, 10);
  return Number.isNaN(value) ? fallback : value;
}

/**
 * Parse an `x,y,z` position.
 * @returns Position or null if the value is not three numbers
 */
export function parseBallPosition(value: string): Position | null {
  const parts = value.split(',').map((part) => part.trim());
  if (parts.length !== 3 || parts.some((part) => part === '')) return null;

  const [x, y, z] = parts.map(Number);
  if (x === undefined || y === undefined || z === undefined) return null;
  if (!Number.isFinite(x) || !Number.isFinite(y) || !Number.isFinite(z)) return null;
  return { x, y, z };
}

function parseClub(fields: Map<string, string>): ClubTelemetry | undefined {
  if (getInt(fields, 'HMT') !== 1) return undefined;
  return {
    speedMph: getFloat(fields, 'CLUBSPEED_MPH') ?? 0,
    pathDeg: getFloat(fields, 'HPATH_DEG'),
    attackAngleDeg: getFloat(fields, 'VPATH_DEG'),
    faceToTargetDeg: getFloat(fields, 'FACE_T_DEG'),
  };
}

function parseShotReading(fields: Map<string, string>): ShotReading | null {
  const speedMph = getFloat(fields, 'SPEED_MPH');
  if (speedMph === undefined) return null;

  const backSpinRpm = getFloat(fields, 'BACK_RPM');
  const sideSpinRpm = getFloat(fields, 'SIDE_RPM');
  const club = parseClub(fields);

  const x = getFloat(fields, 'WORLDSTART_X');
  const y = getFloat(fields, 'WORLDSTART_Y');
  const z = getFloat(fields, 'WORLDSTART_Z');

  return {
    shotId: getInt(fields, 'SHOT_ID'),
    msecSinceContact: getInt(fields, 'MSEC_SINCE_CONTACT'),
    telemetry: {
      speedMph,
      launchAngleDeg: getFloat(fields, 'ELEVATION_DEG') ?? 0,
      azimuthDeg: getFloat(fields, 'AZIMUTH_DEG') ?? 0,
      totalSpinRpm: getFloat(fields, 'SPIN_RPM') ?? 0,
      backSpinRpm: backSpinRpm ?? 0,
      sideSpinRpm: sideSpinRpm ?? 0,
      ...(club ? { club } : {}),
    },
    isFinal: backSpinRpm !== undefined && sideSpinRpm !== undefined,
    ...(x !== undefined && y !== undefined && z !== undefined ? { worldStart: { x, y, z } } : {}),
  };
}

function parseStatus(fields: Map<string, string>): DeviceStatusReport | null {
  if (!fields.has('FLAGS')) return null;

  const flags = getInt(fields, 'FLAGS');
  const balls = getInt(fields, 'BALLS');
  const ball1 = fields.get('BALL1');

  return {
    flags,
    balls,
    isReady: flags === FLAGS_READY,
    ballDetected: balls > 0,
    ballPosition: ball1 === undefined ? null : parseBallPosition(ball1),
  };
}

/**
 * Parse one complete device message (terminator optional).
 * @returns Parsed message or null for unknown kinds and missing required fields
 */
export function parseDeviceMessage(message: string): DeviceMessage | null {
  const trimmed = message.trimStart();
  const fields = parseFields(trimmed);

  if (trimmed.startsWith(SHOT_MESSAGE_PREFIX)) {
    const reading = parseShotReading(fields);
    return reading ? { type: 'shot', reading } : null;
  }
  if (trimmed.startsWith(STATUS_MESSAGE_PREFIX)) {
    const status = parseStatus(fields);
    return status ? { type: 'status', status } : null;
  }
  return null;
}

// ============ Validation ============

/**
 * Sanity-check a reading before it is forwarded as a shot.
 * @returns Rejection reason, or null if the shot is plausible
 */
export function validateShotReading(telemetry: ShotTelemetry): string | null {
  if (telemetry.speedMph < 10 || telemetry.speedMph > 250) {
    return `ball speed ${telemetry.speedMph} mph outside 10-250`;
  }
  if (telemetry.launchAngleDeg < -10 || telemetry.launchAngleDeg > 60) {
    return `launch angle ${telemetry.launchAngleDeg} deg outside -10-60`;
  }
  if (Math.abs(telemetry.azimuthDeg) > 45) {
    return `direction ${telemetry.azimuthDeg} deg beyond 45`;
  }
  if (telemetry.totalSpinRpm === 0) {
    return 'zero spin (misread)';
  }
  if (telemetry.backSpinRpm === 2222) {
    return 'back spin 2222 (misread code)';
  }
  if (telemetry.speedMph > 80 && telemetry.totalSpinRpm < 100) {
    return `spin ${telemetry.totalSpinRpm} rpm too low for ${telemetry.speedMph} mph`;
  }
  return null;
}

// ============ Reassembly ============

/**
 * Reassembles packet payloads into complete device messages.
 */
export class DeviceMessageAssembler {
  private readonly decoder = new StringDecoder('utf8');
  private buffer = '';

  /**
   * Add one packet.
   * @returns Messages completed by this packet, without terminators
   */
  push(packet: Buffer | string): string[] {
    this.buffer += typeof packet === 'string' ? packet : this.decoder.write(packet);

    const messages: string[] = [];
    let index = this.buffer.indexOf(MESSAGE_TERMINATOR);
    while (index !== -1) {
      const message = this.buffer.slice(0, index);
      this.buffer = this.buffer.slice(index + MESSAGE_TERMINATOR.length);
      if (message.trim() !== '') {
        messages.push(message);
      }
      index = this.buffer.indexOf(MESSAGE_TERMINATOR);
    }
    return messages;
  }

  /** Text of a message still waiting for its terminator */
  get pending(): string {
    return this.buffer;
  }

  reset(): void {
    this.buffer = '';
    this.decoder.end();
  }
}
