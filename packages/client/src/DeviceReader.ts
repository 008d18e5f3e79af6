/**
 * @fileoverview Launch-monitor connection on the host side.
 *
 * Reassembles the packetized text protocol and reports what the device says.
 * The device sends an early and a final reading per shot; only a final
 * reading (one with back and side spin) is reported as a shot, once per
 * shot id.
 */

import type { Socket } from 'node:net';
import {
  DeviceMessageAssembler,
  type DeviceStatusReport,
  parseDeviceMessage,
  type ShotReading,
} from '@shot-relay/protocol';
import {
  createLogger,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_DEVICE_PORT,
  describeError,
  type Logger,
  type ShotId,
} from '@shot-relay/shared';
import { connectSocket } from './connectSocket.js';

/**
 * Device reader event handlers.
 */
export interface DeviceReaderEvents {
  /** Called for readings without spin components */
  onEarlyReading?: (reading: ShotReading) => void;
  /** Called once per shot id with its final reading */
  onShot?: (reading: ShotReading) => void;
  onStatus?: (status: DeviceStatusReport) => void;
  /** Called when the device closes an established connection */
  onDisconnect?: () => void;
}

export interface DeviceReaderOptions {
  /** Device host (default: 127.0.0.1) */
  readonly host?: string;
  /** Device port (default: 5555) */
  readonly port?: number;
  readonly connectTimeoutMs?: number;
  readonly logger?: Logger;
}

export class DeviceReader {
  private socket: Socket | null = null;
  private readonly assembler = new DeviceMessageAssembler();
  private readonly reportedShots = new Set<ShotId>();
  private readonly logger: Logger;

  constructor(
    private readonly options: DeviceReaderOptions = {},
    private readonly events: DeviceReaderEvents = {}
  ) {
    this.logger = options.logger ?? createLogger('device-reader');
  }

  /**
   * Connect to the device. Shot ids seen on an earlier connection are forgotten.
   * @returns true if connected
   */
  async connect(): Promise<boolean> {
    if (this.socket) return true;

    const host = this.options.host ?? '127.0.0.1';
    const port = this.options.port ?? DEFAULT_DEVICE_PORT;
    let socket: Socket;
    try {
      socket = await connectSocket(
        host,
        port,
        this.options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS
      );
    } catch (error) {
      this.logger.error('Failed to connect to launch monitor', {
        host,
        port,
        error: describeError(error),
      });
      return false;
    }

    this.socket = socket;
    this.assembler.reset();
    this.reportedShots.clear();
    this.logger.info('Connected to launch monitor', { host, port });

    socket.on('data', (chunk: Buffer) => {
      for (const message of this.assembler.push(chunk)) {
        this.handleMessage(message);
      }
    });
    socket.on('error', (error) => {
      this.logger.warn('Launch monitor socket error', { error: error.message });
    });
    socket.on('close', () => {
      if (this.socket !== socket) return;
      this.socket = null;
      this.logger.warn('Launch monitor disconnected', { pending: this.assembler.pending.length });
      this.events.onDisconnect?.();
    });
    return true;
  }

  /**
   * Close the connection without reporting a disconnect.
   */
  disconnect(): void {
    const socket = this.socket;
    this.socket = null;
    socket?.destroy();
  }

  get isConnected(): boolean {
    return this.socket !== null;
  }

  private handleMessage(text: string): void {
    const message = parseDeviceMessage(text);
    if (!message) {
      this.logger.debug('Ignoring unrecognized device message', {
        firstLine: text.trimStart().split('\n', 1)[0],
      });
      return;
    }

    if (message.type === 'status') {
      this.events.onStatus?.(message.status);
      return;
    }

    const reading = message.reading;
    if (!reading.isFinal) {
      this.logger.debug('Early reading', { shotId: reading.shotId });
      this.events.onEarlyReading?.(reading);
      return;
    }
    if (this.reportedShots.has(reading.shotId)) {
      this.logger.debug('Ignoring repeated final reading', { shotId: reading.shotId });
      return;
    }

    this.reportedShots.add(reading.shotId);
    this.events.onShot?.(reading);
  }
}
