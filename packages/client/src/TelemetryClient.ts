/**
 * @fileoverview Simulator connection for one launch monitor.
 *
 * Handles:
 * - TCP connection management (connect timeout, no Nagle)
 * - Shot, status and heartbeat messages
 * - Request/response correlation for shots
 * - Response and disconnect observers
 *
 * The simulator answers shots only, one response at a time, and responses
 * carry no correlation id. Each exchange therefore discards whatever arrived
 * before it, sends its message in one write, and takes the first object of
 * the next read as its response. Exchanges never overlap.
 */

import type { Socket } from 'node:net';
import {
  createHeartbeatMessage,
  createShotMessage,
  createStatusMessage,
  extractFrame,
  FrameDecodeError,
  type MessageOptions,
  type PlayerInfo,
  parseResponse,
  playerFromResponse,
  type ShotMessage,
  type SimulatorResponse,
  serializeMessage,
  TransportError,
} from '@shot-relay/protocol';
import {
  createLogger,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_RESPONSE_TIMEOUT_MS,
  DEFAULT_SIMULATOR_PORT,
  type DeviceStatus,
  describeError,
  type Logger,
  ObserverList,
  type ShotTelemetry,
  type SubscriptionToken,
} from '@shot-relay/shared';
import { connectSocket } from './connectSocket.js';

/**
 * Connection state for the telemetry client.
 */
export type ClientState = 'disconnected' | 'connecting' | 'connected';

/**
 * Outcome of one exchange.
 */
export type ExchangeResult =
  | { readonly kind: 'sent' }
  | { readonly kind: 'response'; readonly response: SimulatorResponse }
  | { readonly kind: 'timeout' }
  | { readonly kind: 'decode_error'; readonly error: FrameDecodeError }
  | { readonly kind: 'transport_error'; readonly error: TransportError }
  | { readonly kind: 'not_connected' };

export interface TelemetryClientOptions {
  /** Simulator host (default: 127.0.0.1) */
  readonly host?: string;
  /** Simulator port (default: 921) */
  readonly port?: number;
  /** TCP handshake timeout (default: 5000ms) */
  readonly connectTimeoutMs?: number;
  /** How long to wait for a shot response (default: 5000ms) */
  readonly responseTimeoutMs?: number;
  /** DeviceID reported in every message */
  readonly deviceId?: string;
  readonly logger?: Logger;
}

/** Heartbeat status when the caller has no device status to report */
const READY_NO_BALL: DeviceStatus = { isReady: true, ballDetected: false };

function toTransportError(error: unknown): TransportError {
  return error instanceof TransportError
    ? error
    : new TransportError(describeError(error), { cause: error });
}

interface PendingRead {
  resolve(chunk: Buffer | null): void;
  reject(error: TransportError): void;
}

export class TelemetryClient {
  private socket: Socket | null = null;
  private connectionState: ClientState = 'disconnected';
  /** Reads received while no exchange was waiting */
  private inbound: Buffer[] = [];
  private pendingRead: PendingRead | null = null;
  private exchangeTail: Promise<unknown> = Promise.resolve();
  private currentShotNumber = 0;
  private player: PlayerInfo | null = null;

  private readonly responseObservers: ObserverList<[SimulatorResponse]>;
  private readonly disconnectObservers: ObserverList<[]>;
  private readonly subscriptions = new Map<SubscriptionToken, () => boolean>();
  private nextToken: SubscriptionToken = 1;

  private readonly host: string;
  private readonly port: number;
  private readonly connectTimeoutMs: number;
  private readonly responseTimeoutMs: number;
  private readonly logger: Logger;

  constructor(private readonly options: TelemetryClientOptions = {}) {
    this.host = options.host ?? '127.0.0.1';
    this.port = options.port ?? DEFAULT_SIMULATOR_PORT;
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.responseTimeoutMs = options.responseTimeoutMs ?? DEFAULT_RESPONSE_TIMEOUT_MS;
    this.logger = options.logger ?? createLogger('client');
    this.responseObservers = new ObserverList('response', this.logger);
    this.disconnectObservers = new ObserverList('disconnect', this.logger);
  }

  // ============ Connection Management ============

  /**
   * Connect and announce the launch monitor with a heartbeat. Never retries.
   * @returns true if connected
   */
  async connect(): Promise<boolean> {
    if (this.socket) return true;

    this.connectionState = 'connecting';
    let socket: Socket;
    try {
      socket = await connectSocket(this.host, this.port, this.connectTimeoutMs);
    } catch (error) {
      this.connectionState = 'disconnected';
      this.logger.error('Failed to connect to simulator', {
        host: this.host,
        port: this.port,
        error: describeError(error),
      });
      return false;
    }

    this.attach(socket);
    this.logger.info('Connected to simulator', { host: this.host, port: this.port });

    await this.sendHeartbeat();
    return this.isConnected;
  }

  /**
   * Close the connection. Disconnect observers are not notified.
   */
  disconnect(): void {
    const socket = this.socket;
    if (!socket) return;

    this.detach(new TransportError('connection closed'));
    socket.destroy();
    this.logger.info('Disconnected from simulator');
  }

  get state(): ClientState {
    return this.connectionState;
  }

  get isConnected(): boolean {
    return this.connectionState === 'connected';
  }

  /** Number of the last shot sent (0 before the first shot) */
  get shotNumber(): number {
    return this.currentShotNumber;
  }

  /** Player record of the last accepted shot */
  get currentPlayer(): PlayerInfo | null {
    return this.player;
  }

  // ============ Outgoing Messages ============

  /**
   * Send a shot and wait for the simulator's answer.
   * @returns The response, or null on any failure
   */
  async sendShot(telemetry: ShotTelemetry): Promise<SimulatorResponse | null> {
    const result = await this.exchangeShot(telemetry);
    return result.kind === 'response' ? result.response : null;
  }

  /**
   * Like {@link sendShot}, reporting how the exchange ended.
   */
  exchangeShot(telemetry: ShotTelemetry): Promise<ExchangeResult> {
    if (!this.isConnected) {
      this.logger.error('Not connected to simulator');
      return Promise.resolve({ kind: 'not_connected' });
    }

    this.currentShotNumber++;
    const message = createShotMessage(this.currentShotNumber, telemetry, this.messageOptions());
    this.logger.info('Sending shot', {
      shotNumber: message.ShotNumber,
      speedMph: telemetry.speedMph,
      backSpinRpm: telemetry.backSpinRpm,
      sideSpinRpm: telemetry.sideSpinRpm,
    });
    return this.exchange(message, true);
  }

  /**
   * Keep-alive. Returns as soon as the message is written.
   */
  sendHeartbeat(status: DeviceStatus = READY_NO_BALL): Promise<ExchangeResult> {
    if (!this.isConnected) return Promise.resolve({ kind: 'not_connected' });
    return this.exchange(
      createHeartbeatMessage(this.currentShotNumber, status, this.messageOptions()),
      false
    );
  }

  /**
   * Report launch-monitor readiness. Returns as soon as the message is written.
   */
  sendStatus(status: DeviceStatus): Promise<ExchangeResult> {
    if (!this.isConnected) return Promise.resolve({ kind: 'not_connected' });
    this.logger.debug('Sending status', { ...status });
    return this.exchange(
      createStatusMessage(this.currentShotNumber, status, this.messageOptions()),
      false
    );
  }

  // ============ Observers ============

  onResponse(handler: (response: SimulatorResponse) => void): SubscriptionToken {
    const inner = this.responseObservers.subscribe(handler);
    return this.register(() => this.responseObservers.unsubscribe(inner));
  }

  /**
   * Called once each time an established connection is lost.
   */
  onDisconnect(handler: () => void): SubscriptionToken {
    const inner = this.disconnectObservers.subscribe(handler);
    return this.register(() => this.disconnectObservers.unsubscribe(inner));
  }

  /**
   * @returns true if a handler was registered under the token
   */
  unsubscribe(token: SubscriptionToken): boolean {
    const remove = this.subscriptions.get(token);
    if (!remove) return false;
    this.subscriptions.delete(token);
    return remove();
  }

  // ============ Private Methods ============

  private register(remove: () => boolean): SubscriptionToken {
    const token = this.nextToken++;
    this.subscriptions.set(token, remove);
    return token;
  }

  private messageOptions(): MessageOptions {
    return { deviceId: this.options.deviceId };
  }

  private attach(socket: Socket): void {
    this.socket = socket;
    this.inbound = [];
    this.connectionState = 'connected';

    socket.on('data', (chunk: Buffer) => {
      if (this.socket !== socket) return;
      if (this.pendingRead) {
        this.pendingRead.resolve(chunk);
      } else {
        this.inbound.push(chunk);
      }
    });
    socket.on('error', (error) => {
      this.handleConnectionLost(socket, new TransportError(error.message, { cause: error }));
    });
    socket.on('close', () => {
      this.handleConnectionLost(socket, new TransportError('connection closed by peer'));
    });
  }

  /**
   * Forget the current socket and fail the pending read.
   */
  private detach(error: TransportError): void {
    this.socket = null;
    this.connectionState = 'disconnected';
    this.inbound = [];
    this.pendingRead?.reject(error);
  }

  private handleConnectionLost(socket: Socket, error: TransportError): void {
    // Also reached after an explicit disconnect, once the socket has closed.
    if (this.socket !== socket) return;

    this.detach(error);
    socket.destroy();
    this.logger.error('Simulator connection lost', { error: error.message });
    this.disconnectObservers.notify();
  }

  private exchange(message: ShotMessage, expectResponse: boolean): Promise<ExchangeResult> {
    const result = this.exchangeTail.then(() => this.performExchange(message, expectResponse));
    this.exchangeTail = result;
    return result;
  }

  private async performExchange(
    message: ShotMessage,
    expectResponse: boolean
  ): Promise<ExchangeResult> {
    const socket = this.socket;
    if (!socket) return { kind: 'not_connected' };

    const stale = this.inbound.reduce((total, chunk) => total + chunk.length, 0);
    if (stale > 0) {
      this.logger.debug('Discarded stale inbound data', { bytes: stale });
      this.inbound = [];
    }

    const payload = serializeMessage(message);
    try {
      await this.write(socket, payload);
    } catch (error) {
      const transportError = toTransportError(error);
      this.handleConnectionLost(socket, transportError);
      return { kind: 'transport_error', error: transportError };
    }
    this.logger.debug('Sent message', { bytes: Buffer.byteLength(payload) });

    if (!expectResponse) return { kind: 'sent' };

    let chunk: Buffer | null;
    try {
      chunk = await this.nextRead();
    } catch (error) {
      return { kind: 'transport_error', error: toTransportError(error) };
    }

    if (chunk === null) {
      this.logger.warn('Timeout waiting for simulator response', {
        timeoutMs: this.responseTimeoutMs,
      });
      return { kind: 'timeout' };
    }
    return this.decodeResponse(chunk);
  }

  private write(socket: Socket, payload: string): Promise<void> {
    return new Promise((resolve, reject) => {
      socket.write(payload, (error) => {
        if (error) {
          reject(new TransportError(error.message, { cause: error }));
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Next chunk received from the simulator.
   * @returns null on timeout
   * @throws {TransportError} if the connection closes while waiting
   */
  private nextRead(): Promise<Buffer | null> {
    const buffered = this.inbound.shift();
    if (buffered) return Promise.resolve(buffered);

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pendingRead = null;
        resolve(null);
      }, this.responseTimeoutMs);

      this.pendingRead = {
        resolve: (chunk) => {
          clearTimeout(timer);
          this.pendingRead = null;
          resolve(chunk);
        },
        reject: (error) => {
          clearTimeout(timer);
          this.pendingRead = null;
          reject(error);
        },
      };
    });
  }

  private decodeResponse(chunk: Buffer): ExchangeResult {
    const text = chunk.toString('utf8');
    const extracted = extractFrame(text);
    const response = extracted.kind === 'frame' ? parseResponse(extracted.value) : null;

    if (!response) {
      const error = new FrameDecodeError(text);
      this.logger.error('Invalid simulator response', { error: error.message });
      return { kind: 'decode_error', error };
    }

    const player = playerFromResponse(response);
    if (player) {
      this.player = player;
      this.logger.info('Player info', { ...player });
    }

    this.responseObservers.notify(response);
    return { kind: 'response', response };
  }
}
