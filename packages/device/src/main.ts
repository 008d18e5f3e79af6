import { loadConfig, logger } from '@shot-relay/shared';
import { runConsole } from './console.js';
import { DeviceSimulator } from './DeviceSimulator.js';

const config = loadConfig();

logger.info('Starting launch-monitor emulator...');

const simulator = new DeviceSimulator({
  host: config.device.host,
  port: config.device.port,
  packetSize: config.device.packetSize,
  packetDelayMs: config.device.packetDelayMs,
  earlyReadingDelayMs: config.device.earlyReadingDelayMs,
  finalReadingDelayMs: config.device.finalReadingDelayMs,
});

const shutdown = async (): Promise<void> => {
  await simulator.stop();
  process.exit(0);
};

process.on('SIGTERM', () => {
  logger.info('SIGTERM received, shutting down...');
  void shutdown();
});

process.on('SIGINT', () => {
  logger.info('SIGINT received, shutting down...');
  void shutdown();
});

await simulator.start();
await runConsole(simulator, { input: process.stdin, output: process.stdout });
await shutdown();
