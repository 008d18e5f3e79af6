/**
 * @fileoverview Bridge from the launch monitor to the simulator.
 *
 * Handles:
 * - Forwarding device status as status messages
 * - Validating final readings and forwarding them as shots
 * - Heartbeats carrying the last known device status
 * - Reconnecting both connections with back-off
 */

import {
  type DeviceStatusReport,
  type ShotReading,
  type SimulatorResponse,
  validateShotReading,
} from '@shot-relay/protocol';
import {
  createLogger,
  DEFAULT_DEVICE_PORT,
  DEFAULT_HEARTBEAT_INTERVAL_MS,
  type DeviceStatus,
  describeError,
  type Logger,
  MAX_RECONNECT_ATTEMPTS,
  RECONNECT_DELAYS_MS,
  type SubscriptionToken,
} from '@shot-relay/shared';
import { DeviceReader } from './DeviceReader.js';
import { Reconnector } from './Reconnector.js';
import type { TelemetryClient } from './TelemetryClient.js';

export type RelayTarget = 'device' | 'simulator';

export interface ShotRelayOptions {
  readonly deviceHost?: string;
  readonly devicePort?: number;
  readonly connectTimeoutMs?: number;
  /** Heartbeat cadence while the simulator is connected (default: 2000ms) */
  readonly heartbeatIntervalMs?: number;
  /** Reconnect back-off; the last entry repeats */
  readonly reconnectDelaysMs?: readonly number[];
  readonly maxReconnectAttempts?: number;
  readonly logger?: Logger;
}

/**
 * Shot relay event handlers.
 */
export interface ShotRelayEvents {
  /** Called after a final reading was sent; response is null if none arrived */
  onShotForwarded?: (reading: ShotReading, response: SimulatorResponse | null) => void;
  /** Called for final readings that failed validation */
  onShotRejected?: (reading: ShotReading, reason: string) => void;
  /** Called when a connection could not be restored */
  onGiveUp?: (target: RelayTarget) => void;
}

export class ShotRelay {
  readonly reader: DeviceReader;
  private deviceStatus: DeviceStatus = { isReady: false, ballDetected: false };
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private disconnectToken: SubscriptionToken | null = null;
  private readonly simulatorReconnector: Reconnector;
  private readonly deviceReconnector: Reconnector;
  private readonly logger: Logger;

  constructor(
    private readonly client: TelemetryClient,
    private readonly options: ShotRelayOptions = {},
    private readonly events: ShotRelayEvents = {}
  ) {
    this.logger = options.logger ?? createLogger('bridge');

    this.reader = new DeviceReader(
      {
        host: options.deviceHost,
        port: options.devicePort ?? DEFAULT_DEVICE_PORT,
        connectTimeoutMs: options.connectTimeoutMs,
        logger: this.logger,
      },
      {
        onStatus: (status) => this.handleStatus(status),
        onShot: (reading) => {
          this.forwardShot(reading).catch((error: unknown) => {
            this.logger.error('Shot forwarding failed', {
              shotId: reading.shotId,
              error: describeError(error),
            });
          });
        },
        onDisconnect: () => this.deviceReconnector.schedule(),
      }
    );

    const reconnect = {
      delaysMs: options.reconnectDelaysMs ?? RECONNECT_DELAYS_MS,
      maxAttempts: options.maxReconnectAttempts ?? MAX_RECONNECT_ATTEMPTS,
      logger: this.logger,
    };
    this.simulatorReconnector = new Reconnector('simulator', () => this.client.connect(), {
      ...reconnect,
      onReconnected: () => this.handleSimulatorConnected(),
      onGiveUp: () => this.events.onGiveUp?.('simulator'),
    });
    this.deviceReconnector = new Reconnector('device', () => this.reader.connect(), {
      ...reconnect,
      onGiveUp: () => this.events.onGiveUp?.('device'),
    });
  }

  // ============ Lifecycle ============

  /**
   * Connect to both sides. A side that is unreachable is retried in the background.
   */
  async start(): Promise<void> {
    this.disconnectToken = this.client.onDisconnect(() => this.handleSimulatorDisconnected());

    if (await this.client.connect()) {
      this.handleSimulatorConnected();
    } else {
      this.simulatorReconnector.schedule();
    }

    if (!(await this.reader.connect())) {
      this.deviceReconnector.schedule();
    }
  }

  stop(): void {
    this.simulatorReconnector.cancel();
    this.deviceReconnector.cancel();
    this.stopHeartbeat();
    if (this.disconnectToken !== null) {
      this.client.unsubscribe(this.disconnectToken);
      this.disconnectToken = null;
    }
    this.reader.disconnect();
    this.client.disconnect();
    this.logger.info('Bridge stopped');
  }

  /** Last status reported by the device */
  get status(): DeviceStatus {
    return this.deviceStatus;
  }

  // ============ Device Events ============

  private handleStatus(report: DeviceStatusReport): void {
    this.deviceStatus = { isReady: report.isReady, ballDetected: report.ballDetected };
    this.logger.info('Device status', { ...this.deviceStatus, flags: report.flags });

    if (this.client.isConnected) {
      void this.client.sendStatus(this.deviceStatus);
    }
  }

  private async forwardShot(reading: ShotReading): Promise<void> {
    const reason = validateShotReading(reading.telemetry);
    if (reason) {
      this.logger.warn('Rejected shot', { shotId: reading.shotId, reason });
      this.events.onShotRejected?.(reading, reason);
      return;
    }

    const response = await this.client.sendShot(reading.telemetry);
    this.logger.info('Shot forwarded', {
      shotId: reading.shotId,
      shotNumber: this.client.shotNumber,
      code: response?.Code ?? null,
    });
    this.events.onShotForwarded?.(reading, response);
  }

  // ============ Simulator Connection ============

  private handleSimulatorConnected(): void {
    this.startHeartbeat();
    void this.client.sendStatus(this.deviceStatus);
  }

  private handleSimulatorDisconnected(): void {
    this.stopHeartbeat();
    this.simulatorReconnector.schedule();
  }

  private startHeartbeat(): void {
    this.stopHeartbeat();
    this.heartbeatTimer = setInterval(() => {
      void this.client.sendHeartbeat(this.deviceStatus);
    }, this.options.heartbeatIntervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }
}
