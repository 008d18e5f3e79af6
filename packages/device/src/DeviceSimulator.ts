/**
 * @fileoverview Launch-monitor emulator.
 *
 * Accepts TCP clients on the device port and sends them shot readings and
 * device status in the packetized text protocol. Each client gets its own
 * sequencer; a fired shot is emitted to all clients concurrently.
 */

import { createServer, type Server, type Socket } from 'node:net';
import {
  type Clock,
  createLogger,
  DEFAULT_DEVICE_PORT,
  type DeviceStatus,
  describeError,
  type Logger,
  type ShotId,
  type ShotTelemetry,
  systemClock,
} from '@shot-relay/shared';
import { createSocketSink, PacketChunker } from './PacketChunker.js';
import { type EmissionTimeline, ShotEmissionSequencer } from './ShotEmissionSequencer.js';
import { generateShot, type RandomSource, type ShotProfileName } from './shotGenerator.js';

export interface DeviceSimulatorOptions {
  /** Interface to bind (default: 0.0.0.0) */
  readonly host?: string;
  /** Port to listen on; 0 picks a free port (default: 5555) */
  readonly port?: number;
  readonly packetSize?: number;
  readonly packetDelayMs?: number;
  readonly earlyReadingDelayMs?: number;
  readonly finalReadingDelayMs?: number;
  /** Status sent to every client right after it connects (default: ready, ball detected) */
  readonly initialStatus?: DeviceStatus;
  readonly clock?: Clock;
  readonly random?: RandomSource;
  readonly logger?: Logger;
}

export interface DeviceSimulatorEvents {
  onClientConnected?: (clientId: string) => void;
  onClientDisconnected?: (clientId: string) => void;
}

/**
 * Outcome of one fired shot across all clients.
 */
export interface ShotFireResult {
  readonly shotId: ShotId;
  readonly telemetry: ShotTelemetry;
  /** One timeline per client that received both readings */
  readonly timelines: EmissionTimeline[];
  /** Clients whose connection failed during the shot */
  readonly failures: number;
}

interface DeviceClient {
  readonly id: string;
  readonly socket: Socket;
  readonly sequencer: ShotEmissionSequencer;
}

const READY_WITH_BALL: DeviceStatus = { isReady: true, ballDetected: true };

export class DeviceSimulator {
  private server: Server | null = null;
  private readonly clients = new Map<string, DeviceClient>();
  private readonly chunker: PacketChunker;
  private readonly clock: Clock;
  private readonly random: RandomSource;
  private readonly logger: Logger;
  private lastShotId: ShotId = 0;
  private nextClientNumber = 1;

  constructor(
    private readonly options: DeviceSimulatorOptions = {},
    private readonly events: DeviceSimulatorEvents = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? createLogger('device');
    this.chunker = new PacketChunker({
      packetSize: options.packetSize,
      packetDelayMs: options.packetDelayMs,
      clock: this.clock,
    });
  }

  // ============ Lifecycle ============

  /**
   * Start listening.
   * @returns The bound port
   */
  start(): Promise<number> {
    const server = createServer((socket) => this.handleConnection(socket));
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.options.port ?? DEFAULT_DEVICE_PORT, this.options.host ?? '0.0.0.0', () => {
        server.off('error', reject);
        const port = this.port ?? 0;
        this.logger.info('Launch-monitor emulator listening', {
          port,
          packetSize: this.chunker.packetSize,
          packetDelayMs: this.chunker.packetDelayMs,
        });
        resolve(port);
      });
    });
  }

  /**
   * Disconnect every client and stop listening.
   */
  stop(): Promise<void> {
    const server = this.server;
    this.server = null;

    for (const client of this.clients.values()) {
      client.socket.destroy();
    }
    if (!server) return Promise.resolve();

    return new Promise((resolve) => {
      server.close(() => {
        this.logger.info('Launch-monitor emulator stopped');
        resolve();
      });
    });
  }

  get port(): number | null {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address.port : null;
  }

  get clientCount(): number {
    return this.clients.size;
  }

  get lastShot(): ShotId {
    return this.lastShotId;
  }

  // ============ Commands ============

  /**
   * Fire one shot to every connected client.
   * @param shot - Profile to draw from, or explicit telemetry
   * @returns null if no client is connected
   */
  async fireShot(shot: ShotProfileName | ShotTelemetry = 'driver'): Promise<ShotFireResult | null> {
    if (this.clients.size === 0) {
      this.logger.warn('No clients connected');
      return null;
    }

    const shotId = ++this.lastShotId;
    const telemetry = typeof shot === 'string' ? generateShot(shot, this.random) : shot;

    this.logger.info('Firing shot', {
      shotId,
      profile: typeof shot === 'string' ? shot : 'custom',
      speedMph: Number(telemetry.speedMph.toFixed(1)),
      launchAngleDeg: Number(telemetry.launchAngleDeg.toFixed(1)),
      totalSpinRpm: Math.round(telemetry.totalSpinRpm),
    });

    const clients = [...this.clients.values()];
    const outcomes = await Promise.allSettled(
      clients.map((client) => client.sequencer.emit(shotId, telemetry))
    );

    const timelines: EmissionTimeline[] = [];
    let failures = 0;
    outcomes.forEach((outcome, index) => {
      if (outcome.status === 'fulfilled') {
        timelines.push(outcome.value);
      } else {
        failures++;
        this.logger.warn('Shot emission failed', {
          shotId,
          clientId: clients[index]?.id,
          error: describeError(outcome.reason),
        });
      }
    });

    this.logger.info('Shot complete', { shotId, clients: timelines.length, failures });
    return { shotId, telemetry, timelines, failures };
  }

  /**
   * Send device status to every connected client.
   */
  async sendStatus(status: DeviceStatus = READY_WITH_BALL): Promise<void> {
    this.logger.info('Sending status', { ...status });
    await Promise.all([...this.clients.values()].map((client) => this.emitStatus(client, status)));
  }

  /**
   * Fire `count` driver shots, `gapMs` apart.
   */
  async burst(count = 5, gapMs = 500): Promise<ShotFireResult[]> {
    this.logger.info('Firing burst', { count, gapMs });
    const results: ShotFireResult[] = [];
    for (let i = 0; i < count; i++) {
      const result = await this.fireShot('driver');
      if (result) results.push(result);
      if (i < count - 1) await this.clock.sleep(gapMs);
    }
    return results;
  }

  // ============ Connections ============

  private handleConnection(socket: Socket): void {
    socket.setNoDelay(true);

    const client: DeviceClient = {
      id: `client-${this.nextClientNumber++}`,
      socket,
      sequencer: new ShotEmissionSequencer(this.chunker, createSocketSink(socket), {
        earlyReadingDelayMs: this.options.earlyReadingDelayMs,
        finalReadingDelayMs: this.options.finalReadingDelayMs,
        clock: this.clock,
      }),
    };
    this.clients.set(client.id, client);
    this.logger.info('Client connected', {
      clientId: client.id,
      remote: `${socket.remoteAddress}:${socket.remotePort}`,
    });

    socket.on('data', (data: Buffer) => {
      this.logger.debug('Ignoring inbound bytes', { clientId: client.id, bytes: data.length });
    });
    socket.on('error', (error) => {
      this.logger.warn('Client socket error', { clientId: client.id, error: error.message });
    });
    socket.on('close', () => {
      this.clients.delete(client.id);
      this.logger.info('Client disconnected', { clientId: client.id });
      this.events.onClientDisconnected?.(client.id);
    });

    this.events.onClientConnected?.(client.id);
    void this.emitStatus(client, this.options.initialStatus ?? READY_WITH_BALL);
  }

  private async emitStatus(client: DeviceClient, status: DeviceStatus): Promise<void> {
    try {
      await client.sequencer.emitStatus(status);
    } catch (error) {
      this.logger.warn('Status emission failed', {
        clientId: client.id,
        error: describeError(error),
      });
    }
  }
}
