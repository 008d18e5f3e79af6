import { loadConfig, logger } from '@shot-relay/shared';
import { createRelayServer } from './RelayServer.js';

const config = loadConfig();

logger.info('Starting mock simulator...');

const server = await createRelayServer({
  host: config.relay.host,
  port: config.relay.port,
  responseDelayMs: config.relay.responseDelayMs,
  player: config.relay.player,
});

const shutdown = async (): Promise<void> => {
  logger.info('Relay statistics', { ...server.runtime.getStats() });
  await server.stop();
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
