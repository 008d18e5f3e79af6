import { DeviceSimulator } from '@shot-relay/device';
import {
  type DeviceStatusReport,
  formatShotReading,
  type ShotReading,
} from '@shot-relay/protocol';
import type { ShotTelemetry } from '@shot-relay/shared';
import {
  createRecordingLogger,
  type LoopbackServer,
  startLoopbackServer,
  waitFor,
} from '@shot-relay/testing';
import { afterEach, describe, expect, it } from 'vitest';
import { DeviceReader, type DeviceReaderEvents } from '../src/DeviceReader.js';

const telemetry: ShotTelemetry = {
  speedMph: 140,
  launchAngleDeg: 14,
  azimuthDeg: -2,
  totalSpinRpm: 3100,
  backSpinRpm: 3000,
  sideSpinRpm: -250,
};

function recordEvents() {
  const early: ShotReading[] = [];
  const shots: ShotReading[] = [];
  const statuses: DeviceStatusReport[] = [];
  let disconnects = 0;
  const events: DeviceReaderEvents = {
    onEarlyReading: (reading) => early.push(reading),
    onShot: (reading) => shots.push(reading),
    onStatus: (status) => statuses.push(status),
    onDisconnect: () => {
      disconnects++;
    },
  };
  return { early, shots, statuses, events, disconnects: () => disconnects };
}

describe('DeviceReader', () => {
  let reader: DeviceReader | null = null;
  let simulator: DeviceSimulator | null = null;
  let server: LoopbackServer | null = null;

  afterEach(async () => {
    reader?.disconnect();
    reader = null;
    await simulator?.stop();
    simulator = null;
    await server?.close();
    server = null;
  });

  it('should report status and both readings from the launch-monitor emulator', async () => {
    const device = new DeviceSimulator({
      host: '127.0.0.1',
      port: 0,
      packetDelayMs: 0,
      earlyReadingDelayMs: 0,
      finalReadingDelayMs: 0,
      logger: createRecordingLogger(),
    });
    simulator = device;
    const port = await device.start();
    const recorded = recordEvents();
    reader = new DeviceReader(
      { host: '127.0.0.1', port, logger: createRecordingLogger() },
      recorded.events
    );

    expect(await reader.connect()).toBe(true);
    await waitFor(() => recorded.statuses.length === 1);
    expect(recorded.statuses[0]?.isReady).toBe(true);
    expect(recorded.statuses[0]?.ballDetected).toBe(true);

    await device.fireShot(telemetry);
    await waitFor(() => recorded.shots.length === 1);

    expect(recorded.early.map((reading) => reading.shotId)).toEqual([1]);
    expect(recorded.shots[0]?.shotId).toBe(1);
    expect(recorded.shots[0]?.telemetry.backSpinRpm).toBe(3000);
    expect(recorded.shots[0]?.telemetry.sideSpinRpm).toBe(-250);
  });

  it('should report each final reading once and ignore unknown messages', async () => {
    const loopback = await startLoopbackServer();
    server = loopback;
    const recorded = recordEvents();
    reader = new DeviceReader(
      { host: '127.0.0.1', port: loopback.port, logger: createRecordingLogger() },
      recorded.events
    );
    await reader.connect();
    const socket = await loopback.nextSocket();

    const final = formatShotReading(7, telemetry, {
      msecSinceContact: 1000,
      includeSpinComponents: true,
    });
    socket.write(`XX\nFOO=1\n\t${final}`);
    socket.write(final);
    socket.write('0M\nFLAGS=1\nBALLS=0\n\t');
    await waitFor(() => recorded.statuses.length === 1);

    expect(recorded.shots.map((reading) => reading.shotId)).toEqual([7]);
    expect(recorded.statuses[0]?.isReady).toBe(false);
  });

  it('should report a disconnect by the device', async () => {
    const loopback = await startLoopbackServer();
    server = loopback;
    const recorded = recordEvents();
    reader = new DeviceReader(
      { host: '127.0.0.1', port: loopback.port, logger: createRecordingLogger() },
      recorded.events
    );
    await reader.connect();

    const socket = await loopback.nextSocket();
    socket.destroy();
    await waitFor(() => recorded.disconnects() === 1);

    expect(reader.isConnected).toBe(false);
  });

  it('should fail to connect when nothing is listening', async () => {
    const loopback = await startLoopbackServer();
    const port = loopback.port;
    await loopback.close();

    reader = new DeviceReader({ host: '127.0.0.1', port, logger: createRecordingLogger() });

    expect(await reader.connect()).toBe(false);
    expect(reader.isConnected).toBe(false);
  });
});
