import {
  createHeartbeatMessage,
  createShotMessage,
  createStatusMessage,
  type MessageKind,
  serializeMessage,
} from '@shot-relay/protocol';
import { type ShotTelemetry, VirtualClock } from '@shot-relay/shared';
import { createMockConnection, createRecordingLogger } from '@shot-relay/testing';
import { describe, expect, it } from 'vitest';
import { type Connection, RelayRuntime } from '../src/RelayRuntime.js';

// ============ Test Helpers ============

const player = { Handed: 'RH', Club: 'DR', DistanceToTarget: 250 };

const telemetry: ShotTelemetry = {
  speedMph: 150,
  launchAngleDeg: 12,
  azimuthDeg: 1,
  totalSpinRpm: 2800,
  backSpinRpm: 2700,
  sideSpinRpm: -300,
};

const shotJson = (shotNumber: number, overrides: Partial<ShotTelemetry> = {}) =>
  serializeMessage(createShotMessage(shotNumber, { ...telemetry, ...overrides }));
const heartbeatJson = serializeMessage(createHeartbeatMessage(0));
const statusJson = serializeMessage(createStatusMessage(0, { isReady: true, ballDetected: true }));

const SHOT_RESPONSE = { Code: 201, Message: 'Shot received', Player: player };

function createRuntime() {
  const clock = new VirtualClock();
  const logger = createRecordingLogger();
  const kinds: MessageKind[] = [];
  const runtime = new RelayRuntime(
    { player, responseDelayMs: 50, clock, logger },
    { onMessage: (_connectionId, kind) => kinds.push(kind) }
  );
  return { clock, logger, kinds, runtime };
}

// ============ Tests ============

describe('RelayRuntime', () => {
  describe('classification', () => {
    it('should count heartbeats without answering', async () => {
      const { runtime } = createRuntime();
      const conn = createMockConnection();
      runtime.handleConnection(conn);

      await runtime.handleData(conn, heartbeatJson);

      expect(runtime.getStats().heartbeats).toBe(1);
      expect(conn.sentData).toEqual([]);
    });

    it('should count status updates without answering', async () => {
      const { runtime } = createRuntime();
      const conn = createMockConnection();
      runtime.handleConnection(conn);

      await runtime.handleData(conn, statusJson);

      expect(runtime.getStats().statuses).toBe(1);
      expect(conn.sentData).toEqual([]);
    });

    it('should answer a shot after the response delay', async () => {
      const { clock, runtime } = createRuntime();
      const conn = createMockConnection();
      runtime.handleConnection(conn);

      await runtime.handleData(conn, shotJson(1));

      expect(conn.getSentMessagesAsJson()).toEqual([SHOT_RESPONSE]);
      expect(clock.requestedSleeps).toEqual([50]);
      expect(runtime.getStats().shots).toBe(1);
    });

    it('should classify a message carrying only the ball data flag as status', async () => {
      const { kinds, runtime } = createRuntime();
      const conn = createMockConnection();
      runtime.handleConnection(conn);

      await runtime.handleData(conn, '{"ShotDataOptions":{"ContainsBallData":false}}');

      expect(kinds).toEqual(['status']);
      expect(runtime.getStats().statuses).toBe(1);
      expect(runtime.getStats().invalid).toBe(0);
      expect(conn.sentData).toEqual([]);
    });

    it('should answer a shot that omits ball speed and envelope fields', async () => {
      const { runtime } = createRuntime();
      const conn = createMockConnection();
      runtime.handleConnection(conn);

      await runtime.handleData(
        conn,
        '{"ShotNumber":1,"BallData":{"BackSpin":2500,"SideSpin":300},"ShotDataOptions":{"ContainsBallData":true}}'
      );

      expect(conn.getSentMessagesAsJson()).toEqual([SHOT_RESPONSE]);
      expect(runtime.getStats().shots).toBe(1);
      expect(runtime.getStats().invalid).toBe(0);
    });

    it('should treat an object without options as status', async () => {
      const { kinds, runtime } = createRuntime();
      const conn = createMockConnection();
      runtime.handleConnection(conn);

      await runtime.handleData(conn, '{"hello":"world"}');

      expect(kinds).toEqual(['status']);
      expect(conn.sentData).toEqual([]);
    });

    it('should handle concatenated messages in arrival order', async () => {
      const { kinds, runtime } = createRuntime();
      const conn = createMockConnection();
      runtime.handleConnection(conn);

      await runtime.handleData(conn, `${heartbeatJson}${shotJson(1)}${statusJson}`);

      expect(kinds).toEqual(['heartbeat', 'shot', 'status']);
      expect(runtime.getStats()).toEqual({
        shots: 1,
        heartbeats: 1,
        statuses: 1,
        malformed: 0,
        invalid: 0,
      });
      expect(conn.sentData).toHaveLength(1);
    });
  });

  describe('stream handling', () => {
    it('should reassemble a message delivered one byte at a time', async () => {
      const { runtime } = createRuntime();
      const conn = createMockConnection();
      runtime.handleConnection(conn);

      const bytes = Buffer.from(shotJson(1), 'utf8');
      for (const byte of bytes) {
        await runtime.handleData(conn, Buffer.from([byte]));
      }

      expect(conn.getSentMessagesAsJson()).toEqual([SHOT_RESPONSE]);
    });

    it('should skip noise before the first object', async () => {
      const { runtime } = createRuntime();
      const conn = createMockConnection();
      runtime.handleConnection(conn);

      await runtime.handleData(conn, `garbage${heartbeatJson}`);

      expect(runtime.getStats().heartbeats).toBe(1);
    });

    it('should skip a malformed frame and keep the connection', async () => {
      const { runtime } = createRuntime();
      const conn = createMockConnection();
      runtime.handleConnection(conn);

      await runtime.handleData(conn, `{"bad": }${heartbeatJson}`);

      expect(runtime.getStats().malformed).toBe(1);
      expect(runtime.getStats().heartbeats).toBe(1);
      expect(conn.isOpen).toBe(true);
    });

    it('should drop objects with wrongly typed fields', async () => {
      const { logger, runtime } = createRuntime();
      const conn = createMockConnection();
      runtime.handleConnection(conn);

      await runtime.handleData(
        conn,
        '{"ShotNumber":"one","ShotDataOptions":{"ContainsBallData":true}}'
      );

      expect(runtime.getStats().invalid).toBe(1);
      expect(conn.sentData).toEqual([]);
      expect(logger.messages('warn')).toEqual(['Dropped invalid message']);
    });

    it('should not let a delayed response overtake later messages', async () => {
      const { kinds, runtime } = createRuntime();
      const order: string[] = [];
      const conn: Connection = {
        id: 'ordered',
        isOpen: true,
        send: () => {
          order.push(`response after ${kinds.length} messages`);
        },
        close: () => {},
      };
      runtime.handleConnection(conn);

      await runtime.handleData(conn, `${shotJson(1)}${heartbeatJson}`);

      expect(order).toEqual(['response after 1 messages']);
      expect(kinds).toEqual(['shot', 'heartbeat']);
    });
  });

  describe('spin warnings', () => {
    it('should warn about the default spin pattern', async () => {
      const { logger, runtime } = createRuntime();
      const conn = createMockConnection();
      runtime.handleConnection(conn);

      await runtime.handleData(conn, shotJson(1, { backSpinRpm: 3500, sideSpinRpm: 0 }));

      expect(logger.messages('warn')).toEqual([
        'Default spin detected (3500/0), spin data missing',
      ]);
    });

    it('should warn about zero spin', async () => {
      const { logger, runtime } = createRuntime();
      const conn = createMockConnection();
      runtime.handleConnection(conn);

      await runtime.handleData(conn, shotJson(1, { backSpinRpm: 0, sideSpinRpm: 0 }));

      expect(logger.messages('warn')).toEqual(['Zero spin detected, possible misread']);
    });

    it('should not warn about plausible spin', async () => {
      const { logger, runtime } = createRuntime();
      const conn = createMockConnection();
      runtime.handleConnection(conn);

      await runtime.handleData(conn, shotJson(1));

      expect(logger.messages('warn')).toEqual([]);
    });
  });

  describe('connection lifecycle', () => {
    it('should track open sessions', () => {
      const { runtime } = createRuntime();
      const first = createMockConnection();
      const second = createMockConnection();

      runtime.handleConnection(first);
      runtime.handleConnection(second);
      expect(runtime.connectionCount).toBe(2);

      runtime.handleDisconnection(first);
      expect(runtime.connectionCount).toBe(1);
    });

    it('should not answer a shot whose connection closed meanwhile', async () => {
      const { runtime } = createRuntime();
      const conn = createMockConnection();
      runtime.handleConnection(conn);

      const processing = runtime.handleData(conn, shotJson(1));
      runtime.handleDisconnection(conn);
      await processing;

      expect(conn.sentData).toEqual([]);
    });

    it('should discard a partial message on disconnect', async () => {
      const { logger, runtime } = createRuntime();
      const conn = createMockConnection('conn-x');
      runtime.handleConnection(conn);

      await runtime.handleData(conn, '{"ShotNumber":');
      runtime.handleDisconnection(conn);

      const record = logger.records.find((entry) => entry.message === 'Client disconnected');
      expect(record?.data).toEqual({
        connectionId: 'conn-x',
        shots: 0,
        heartbeats: 0,
        statuses: 0,
        pendingBytes: 14,
      });
    });

    it('should close every connection and drop pending responses', async () => {
      const { runtime } = createRuntime();
      const first = createMockConnection();
      const second = createMockConnection();
      runtime.handleConnection(first);
      runtime.handleConnection(second);

      const processing = runtime.handleData(first, shotJson(1));
      runtime.closeAll();
      await processing;

      expect(first.isOpen).toBe(false);
      expect(second.isOpen).toBe(false);
      expect(first.sentData).toEqual([]);
    });

    it('should ignore data for connections it does not know', async () => {
      const { logger, runtime } = createRuntime();

      await runtime.handleData(createMockConnection(), heartbeatJson);

      expect(runtime.getStats().heartbeats).toBe(0);
      expect(logger.messages('warn')).toEqual(['Data for unknown connection']);
    });

    it('should keep sessions independent', async () => {
      const { runtime } = createRuntime();
      const first = createMockConnection();
      const second = createMockConnection();
      runtime.handleConnection(first);
      runtime.handleConnection(second);

      await runtime.handleData(first, '{"ShotNumber":1,');
      await runtime.handleData(second, shotJson(2));

      expect(first.sentData).toEqual([]);
      expect(second.getSentMessagesAsJson()).toEqual([SHOT_RESPONSE]);
    });
  });
});
