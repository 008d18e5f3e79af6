/**
 * @fileoverview Two-phase emission of one shot on one connection.
 *
 * The launch monitor reports ballistics first and spin later: an early reading
 * without BACK_RPM/SIDE_RPM, then the authoritative final reading for the same
 * SHOT_ID. Per shot the state moves idle → early_sent → final_sent, and the
 * final reading never starts before the early reading and the inter-phase
 * delay have completed.
 */

import { formatDeviceStatus, formatShotReading } from '@shot-relay/protocol';
import {
  type Clock,
  DEFAULT_EARLY_READING_DELAY_MS,
  DEFAULT_FINAL_READING_DELAY_MS,
  type DeviceStatus,
  EARLY_READING_MSEC_SINCE_CONTACT,
  FINAL_READING_MSEC_SINCE_CONTACT,
  type ShotId,
  type ShotTelemetry,
  systemClock,
} from '@shot-relay/shared';
import type { PacketChunker, PacketSink, SendStats } from './PacketChunker.js';

export type EmissionState = 'idle' | 'early_sent' | 'final_sent';

/**
 * When each phase of a shot was on the wire.
 */
export interface EmissionTimeline {
  readonly shotId: ShotId;
  readonly earlyStartedAt: number;
  readonly earlyCompletedAt: number;
  readonly finalStartedAt: number;
  readonly finalCompletedAt: number;
  /** Packets of both readings */
  readonly packets: number;
  /** Bytes of both readings */
  readonly bytes: number;
}

export interface ShotEmissionSequencerOptions {
  /** Wait before the early reading (default: 200ms) */
  readonly earlyReadingDelayMs?: number;
  /** Wait between the end of the early reading and the final reading (default: 800ms) */
  readonly finalReadingDelayMs?: number;
  readonly clock?: Clock;
}

/**
 * Error thrown when a shot id is emitted twice on the same connection.
 */
export class DuplicateShotError extends Error {
  constructor(shotId: ShotId) {
    super(`Shot ${shotId} has already been emitted on this connection`);
    this.name = 'DuplicateShotError';
  }
}

export class ShotEmissionSequencer {
  private readonly states = new Map<ShotId, EmissionState>();
  private readonly earlyReadingDelayMs: number;
  private readonly finalReadingDelayMs: number;
  private readonly clock: Clock;

  constructor(
    private readonly chunker: PacketChunker,
    private readonly sink: PacketSink,
    options: ShotEmissionSequencerOptions = {}
  ) {
    this.earlyReadingDelayMs = options.earlyReadingDelayMs ?? DEFAULT_EARLY_READING_DELAY_MS;
    this.finalReadingDelayMs = options.finalReadingDelayMs ?? DEFAULT_FINAL_READING_DELAY_MS;
    this.clock = options.clock ?? systemClock;
  }

  stateOf(shotId: ShotId): EmissionState {
    return this.states.get(shotId) ?? 'idle';
  }

  /**
   * Emit both readings of a shot.
   * @throws {DuplicateShotError} if the shot id was already emitted here
   * @throws {TransportError} if the connection closes; later phases are not sent
   */
  async emit(shotId: ShotId, telemetry: ShotTelemetry): Promise<EmissionTimeline> {
    if (this.states.has(shotId)) {
      throw new DuplicateShotError(shotId);
    }
    this.states.set(shotId, 'idle');

    await this.clock.sleep(this.earlyReadingDelayMs);
    const early = await this.chunker.send(
      this.sink,
      formatShotReading(shotId, telemetry, {
        msecSinceContact: EARLY_READING_MSEC_SINCE_CONTACT,
        includeSpinComponents: false,
      })
    );
    this.states.set(shotId, 'early_sent');

    await this.clock.sleep(this.finalReadingDelayMs);
    const final = await this.chunker.send(
      this.sink,
      formatShotReading(shotId, telemetry, {
        msecSinceContact: FINAL_READING_MSEC_SINCE_CONTACT,
        includeSpinComponents: true,
      })
    );
    this.states.set(shotId, 'final_sent');

    return {
      shotId,
      earlyStartedAt: early.startedAt,
      earlyCompletedAt: early.completedAt,
      finalStartedAt: final.startedAt,
      finalCompletedAt: final.completedAt,
      packets: early.packets + final.packets,
      bytes: early.bytes + final.bytes,
    };
  }

  /**
   * Send a device status message. Not part of any shot sequence.
   */
  emitStatus(status: DeviceStatus): Promise<SendStats> {
    return this.chunker.send(this.sink, formatDeviceStatus(status));
  }
}
