/**
 * @fileoverview Mock simulator for exercising the telemetry client.
 */

export {
  type Connection,
  type RelayEvents,
  RelayRuntime,
  type RelayRuntimeConfig,
  type RelayStats,
} from './RelayRuntime.js';
export { createRelayServer, type RelayServer, type RelayServerConfig } from './RelayServer.js';
