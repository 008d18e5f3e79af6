/**
 * @fileoverview Mock simulator runtime.
 *
 * Handles:
 * - Per-connection stream buffering and frame extraction
 * - Request validation and classification
 * - Shot responses after the configured processing delay
 * - Statistics
 *
 * Transport-agnostic: the TCP server feeds it through the {@link Connection}
 * abstraction, tests feed it mock connections.
 */

import {
  classifyMessage,
  createShotResponse,
  type MessageKind,
  type PlayerInfo,
  parseShotMessage,
  type ShotMessage,
  serializeMessage,
  StreamBuffer,
} from '@shot-relay/protocol';
import {
  type Clock,
  createLogger,
  DEFAULT_RESPONSE_DELAY_MS,
  describeError,
  type Logger,
  systemClock,
} from '@shot-relay/shared';

/**
 * Socket-like interface for connection abstraction.
 * Allows testing without real TCP connections.
 */
export interface Connection {
  readonly id: string;
  /** Send one serialized message */
  send(data: string): void;
  close(): void;
  readonly isOpen: boolean;
}

export interface RelayStats {
  readonly shots: number;
  readonly heartbeats: number;
  readonly statuses: number;
  /** Frames that were not valid JSON */
  readonly malformed: number;
  /** Objects whose fields have the wrong types */
  readonly invalid: number;
}

export interface RelayRuntimeConfig {
  /** Player record attached to every shot response */
  readonly player: PlayerInfo;
  /** Processing delay before a shot is answered (default: 50ms) */
  readonly responseDelayMs?: number;
  readonly clock?: Clock;
  readonly logger?: Logger;
}

export interface RelayEvents {
  /** Called for every valid request, in arrival order per connection */
  onMessage?: (connectionId: string, kind: MessageKind, message: ShotMessage) => void;
}

interface RelaySession {
  readonly connection: Connection;
  readonly buffer: StreamBuffer;
  /** Tail of this connection's processing chain */
  queue: Promise<void>;
  closed: boolean;
  shots: number;
  heartbeats: number;
  statuses: number;
}

type Counters = { -readonly [K in keyof RelayStats]: RelayStats[K] };

export class RelayRuntime {
  private readonly sessions = new Map<Connection, RelaySession>();
  private readonly counters: Counters = {
    shots: 0,
    heartbeats: 0,
    statuses: 0,
    malformed: 0,
    invalid: 0,
  };
  private readonly responseDelayMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(
    private readonly config: RelayRuntimeConfig,
    private readonly events: RelayEvents = {}
  ) {
    this.responseDelayMs = config.responseDelayMs ?? DEFAULT_RESPONSE_DELAY_MS;
    this.clock = config.clock ?? systemClock;
    this.logger = config.logger ?? createLogger('relay');
  }

  // ============ Connection Lifecycle ============

  handleConnection(conn: Connection): void {
    this.sessions.set(conn, {
      connection: conn,
      buffer: new StreamBuffer(),
      queue: Promise.resolve(),
      closed: false,
      shots: 0,
      heartbeats: 0,
      statuses: 0,
    });
    this.logger.info('Client connected', { connectionId: conn.id });
  }

  /**
   * Tear the session down. A partial message still buffered is discarded and
   * pending responses are not sent.
   */
  handleDisconnection(conn: Connection): void {
    const session = this.sessions.get(conn);
    if (!session) return;

    session.closed = true;
    const pendingBytes = session.buffer.pending.length;
    session.buffer.clear();
    this.sessions.delete(conn);

    this.logger.info('Client disconnected', {
      connectionId: conn.id,
      shots: session.shots,
      heartbeats: session.heartbeats,
      statuses: session.statuses,
      pendingBytes,
    });
  }

  /**
   * Close every connection. Responses still pending are not sent.
   */
  closeAll(): void {
    for (const session of this.sessions.values()) {
      session.closed = true;
      session.connection.close();
    }
  }

  /**
   * Feed bytes received on a connection.
   * @returns Resolves once every message completed by these bytes is processed; never rejects
   */
  handleData(conn: Connection, data: Buffer | string): Promise<void> {
    const session = this.sessions.get(conn);
    if (!session) {
      this.logger.warn('Data for unknown connection', { connectionId: conn.id });
      return Promise.resolve();
    }

    session.buffer.append(data);
    const { frames, malformed } = session.buffer.drain();

    if (malformed > 0) {
      this.counters.malformed += malformed;
      this.logger.warn('Skipped malformed frames', { connectionId: conn.id, malformed });
    }

    for (const frame of frames) {
      session.queue = session.queue
        .then(() => this.processFrame(session, frame))
        .catch((error: unknown) => {
          this.logger.error('Message handling failed', {
            connectionId: conn.id,
            error: describeError(error),
          });
        });
    }
    return session.queue;
  }

  // ============ Queries ============

  getStats(): RelayStats {
    return { ...this.counters };
  }

  get connectionCount(): number {
    return this.sessions.size;
  }

  // ============ Message Handling ============

  private async processFrame(session: RelaySession, frame: unknown): Promise<void> {
    const connectionId = session.connection.id;
    const message = parseShotMessage(frame);
    if (!message) {
      this.counters.invalid++;
      this.logger.warn('Dropped invalid message', { connectionId });
      return;
    }

    const kind = classifyMessage(message);
    this.events.onMessage?.(connectionId, kind, message);

    const options = message.ShotDataOptions;
    switch (kind) {
      case 'heartbeat': {
        this.counters.heartbeats++;
        session.heartbeats++;
        const data = {
          connectionId,
          count: this.counters.heartbeats,
          ready: options.LaunchMonitorIsReady,
          ballDetected: options.LaunchMonitorBallDetected,
        };
        // Every tenth heartbeat at info
        if (this.counters.heartbeats % 10 === 1) {
          this.logger.info('Heartbeat', data);
        } else {
          this.logger.debug('Heartbeat', data);
        }
        return;
      }
      case 'status':
        this.counters.statuses++;
        session.statuses++;
        this.logger.info('Status update', {
          connectionId,
          count: this.counters.statuses,
          ready: options.LaunchMonitorIsReady,
          ballDetected: options.LaunchMonitorBallDetected,
        });
        return;
      case 'shot':
        await this.handleShot(session, message);
        return;
    }
  }

  private async handleShot(session: RelaySession, message: ShotMessage): Promise<void> {
    const connectionId = session.connection.id;
    this.counters.shots++;
    session.shots++;

    const ball = message.BallData;
    this.logger.info('Shot received', {
      connectionId,
      count: this.counters.shots,
      shotNumber: message.ShotNumber,
      ...(ball
        ? {
            speedMph: ball.Speed,
            vla: ball.VLA,
            hla: ball.HLA,
            backSpin: ball.BackSpin,
            sideSpin: ball.SideSpin,
            totalSpin: ball.TotalSpin,
            spinAxis: ball.SpinAxis,
          }
        : {}),
    });

    if (ball && ball.BackSpin === 3500 && ball.SideSpin === 0) {
      this.logger.warn('Default spin detected (3500/0), spin data missing', {
        connectionId,
        shotNumber: message.ShotNumber,
      });
    } else if (ball && ball.BackSpin === 0 && ball.SideSpin === 0) {
      this.logger.warn('Zero spin detected, possible misread', {
        connectionId,
        shotNumber: message.ShotNumber,
      });
    }

    const club = message.ClubData;
    if (club) {
      this.logger.info('Club data', {
        connectionId,
        speedMph: club.Speed,
        path: club.Path,
        faceToTarget: club.FaceToTarget,
        angleOfAttack: club.AngleOfAttack,
      });
    }

    await this.clock.sleep(this.responseDelayMs);

    if (session.closed || !session.connection.isOpen) {
      this.logger.debug('Connection closed before response', { connectionId });
      return;
    }
    session.connection.send(serializeMessage(createShotResponse(this.config.player)));
  }
}
