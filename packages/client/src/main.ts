import { loadConfig, logger } from '@shot-relay/shared';
import { ShotRelay } from './ShotRelay.js';
import { TelemetryClient } from './TelemetryClient.js';

const config = loadConfig();

logger.info('Starting shot relay bridge...');

const client = new TelemetryClient({
  host: config.simulator.host,
  port: config.simulator.port,
  connectTimeoutMs: config.simulator.connectTimeoutMs,
  responseTimeoutMs: config.simulator.responseTimeoutMs,
});

const shutdown = (code: number): void => {
  relay.stop();
  process.exit(code);
};

const relay = new ShotRelay(
  client,
  {
    deviceHost: config.bridge.deviceHost,
    devicePort: config.bridge.devicePort,
    connectTimeoutMs: config.simulator.connectTimeoutMs,
    heartbeatIntervalMs: config.simulator.heartbeatIntervalMs,
    reconnectDelaysMs: config.bridge.reconnectDelaysMs,
    maxReconnectAttempts: config.bridge.maxReconnectAttempts,
  },
  {
    onGiveUp: (target) => {
      logger.error('Connection could not be restored, exiting', { target });
      shutdown(1);
    },
  }
);

process.on('SIGTERM', () => {
  logger.info('SIGTERM received, shutting down...');
  shutdown(0);
});

process.on('SIGINT', () => {
  logger.info('SIGINT received, shutting down...');
  shutdown(0);
});

await relay.start();
