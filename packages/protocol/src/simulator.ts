/**
 * @fileoverview Simulator (Open Connect API v1) message definitions.
 * Uses Zod for runtime validation of incoming messages.
 *
 * Every request shares one shape. Whether it is a heartbeat, a status update
 * or a shot follows from its ShotDataOptions flags alone.
 */

import {
  RESPONSE_CODE_PLAYER_INFO,
  type DeviceStatus,
  type ShotTelemetry,
} from '@shot-relay/shared';
import { z } from 'zod';

// ============ Request Schemas ============

export const BallDataSchema = z.object({
  Speed: z.number().default(0),
  SpinAxis: z.number().default(0),
  TotalSpin: z.number().default(0),
  BackSpin: z.number().default(0),
  SideSpin: z.number().default(0),
  HLA: z.number().default(0),
  VLA: z.number().default(0),
});

export const ClubDataSchema = z.object({
  Speed: z.number().default(0),
  AngleOfAttack: z.number().optional(),
  FaceToTarget: z.number().optional(),
  Lie: z.number().optional(),
  Loft: z.number().optional(),
  Path: z.number().optional(),
});

export const ShotDataOptionsSchema = z.object({
  ContainsBallData: z.boolean().default(false),
  ContainsClubData: z.boolean().default(false),
  LaunchMonitorIsReady: z.boolean().default(false),
  LaunchMonitorBallDetected: z.boolean().default(false),
  IsHeartBeat: z.boolean().default(false),
});

export const ShotMessageSchema = z.object({
  DeviceID: z.string().default(''),
  Units: z.string().default('Yards'),
  ShotNumber: z.number().int().min(0).default(0),
  APIversion: z.string().default('1'),
  BallData: BallDataSchema.optional(),
  ClubData: ClubDataSchema.optional(),
  ShotDataOptions: ShotDataOptionsSchema.default({}),
});

export type BallData = z.infer<typeof BallDataSchema>;
export type ClubData = z.infer<typeof ClubDataSchema>;
export type ShotDataOptions = z.infer<typeof ShotDataOptionsSchema>;
export type ShotMessage = z.infer<typeof ShotMessageSchema>;

// ============ Response Schemas ============

export const PlayerSchema = z.object({
  Handed: z.string().optional(),
  Club: z.string().optional(),
  DistanceToTarget: z.number().optional(),
});

export const SimulatorResponseSchema = z.object({
  Code: z.number().int(),
  Message: z.string().default(''),
  Player: PlayerSchema.optional(),
});

export type PlayerInfo = z.infer<typeof PlayerSchema>;
export type SimulatorResponse = z.infer<typeof SimulatorResponseSchema>;

/**
 * Message variant, derived from the option flags.
 */
export type MessageKind = 'heartbeat' | 'status' | 'shot';

// ============ Builders ============

export const DEFAULT_DEVICE_ID = 'shot-relay';

export interface MessageOptions {
  /** DeviceID reported to the simulator */
  readonly deviceId?: string;
}

function envelope(shotNumber: number, options: MessageOptions) {
  return {
    DeviceID: options.deviceId ?? DEFAULT_DEVICE_ID,
    Units: 'Yards',
    ShotNumber: shotNumber,
    APIversion: '1',
  };
}

/**
 * Spin axis in degrees from its back/side components, rounded to 2 decimals.
 * Positive axis tilts right (fade/slice).
 */
export function computeSpinAxis(backSpinRpm: number, sideSpinRpm: number): number {
  const degrees = (Math.atan2(sideSpinRpm, backSpinRpm) * 180) / Math.PI;
  return Math.round(degrees * 100) / 100;
}

/**
 * Keep-alive message. Never answered.
 */
export function createHeartbeatMessage(
  shotNumber: number,
  status: DeviceStatus = { isReady: true, ballDetected: false },
  options: MessageOptions = {}
): ShotMessage {
  return {
    ...envelope(shotNumber, options),
    ShotDataOptions: {
      ContainsBallData: false,
      ContainsClubData: false,
      LaunchMonitorIsReady: status.isReady,
      LaunchMonitorBallDetected: status.ballDetected,
      IsHeartBeat: true,
    },
  };
}

/**
 * Readiness update. Never answered.
 */
export function createStatusMessage(
  shotNumber: number,
  status: DeviceStatus,
  options: MessageOptions = {}
): ShotMessage {
  return {
    ...envelope(shotNumber, options),
    ShotDataOptions: {
      ContainsBallData: false,
      ContainsClubData: false,
      LaunchMonitorIsReady: status.isReady,
      LaunchMonitorBallDetected: status.ballDetected,
      IsHeartBeat: false,
    },
  };
}

/**
 * Shot message carrying ball data, plus club data when the telemetry has it.
 */
export function createShotMessage(
  shotNumber: number,
  telemetry: ShotTelemetry,
  options: MessageOptions = {}
): ShotMessage {
  const ballData: BallData = {
    Speed: telemetry.speedMph,
    SpinAxis: computeSpinAxis(telemetry.backSpinRpm, telemetry.sideSpinRpm),
    TotalSpin: telemetry.totalSpinRpm,
    BackSpin: telemetry.backSpinRpm,
    SideSpin: telemetry.sideSpinRpm,
    HLA: telemetry.azimuthDeg,
    VLA: telemetry.launchAngleDeg,
  };

  const club = telemetry.club;
  const clubData: ClubData | undefined = club
    ? {
        Speed: club.speedMph,
        AngleOfAttack: club.attackAngleDeg,
        FaceToTarget: club.faceToTargetDeg,
        Path: club.pathDeg,
      }
    : undefined;

  return {
    ...envelope(shotNumber, options),
    BallData: ballData,
    ...(clubData ? { ClubData: clubData } : {}),
    ShotDataOptions: {
      ContainsBallData: true,
      ContainsClubData: clubData !== undefined,
      LaunchMonitorIsReady: true,
      LaunchMonitorBallDetected: true,
      IsHeartBeat: false,
    },
  };
}

/**
 * Response the mock simulator sends for every shot.
 */
export function createShotResponse(player: PlayerInfo): SimulatorResponse {
  return {
    Code: RESPONSE_CODE_PLAYER_INFO,
    Message: 'Shot received',
    Player: player,
  };
}

// ============ Utilities ============

/**
 * Classify a request by its flags: heartbeat wins, then anything without ball
 * data is a status update.
 */
export function classifyMessage(message: ShotMessage): MessageKind {
  const options = message.ShotDataOptions;
  if (options.IsHeartBeat) return 'heartbeat';
  if (!options.ContainsBallData) return 'status';
  return 'shot';
}

/**
 * Parse and validate a decoded request.
 * @returns Validated message or null if invalid
 */
export function parseShotMessage(data: unknown): ShotMessage | null {
  const result = ShotMessageSchema.safeParse(data);
  return result.success ? result.data : null;
}

/**
 * Parse and validate a decoded simulator response.
 * @returns Validated response or null if invalid
 */
export function parseResponse(data: unknown): SimulatorResponse | null {
  const result = SimulatorResponseSchema.safeParse(data);
  return result.success ? result.data : null;
}

/**
 * Player record of an accepted shot, or null if the response carries none.
 */
export function playerFromResponse(response: SimulatorResponse): PlayerInfo | null {
  if (response.Code !== RESPONSE_CODE_PLAYER_INFO || !response.Player) {
    return null;
  }
  return response.Player;
}

/**
 * Serialize a request or response to its wire form.
 */
export function serializeMessage(message: ShotMessage | SimulatorResponse): string {
  return JSON.stringify(message);
}
