/**
 * @fileoverview Main entry point for the shared package.
 * Re-exports constants, domain types, configuration and utilities.
 */

// Configuration
export type { LoadConfigOptions, ShotRelayConfig } from './config/shotRelayConfig.js';
export { clearConfigCache, InvalidConfigError, loadConfig } from './config/shotRelayConfig.js';
// Constants
export {
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_DEVICE_PORT,
  DEFAULT_EARLY_READING_DELAY_MS,
  DEFAULT_FINAL_READING_DELAY_MS,
  DEFAULT_HEARTBEAT_INTERVAL_MS,
  DEFAULT_PACKET_DELAY_MS,
  DEFAULT_PACKET_SIZE,
  DEFAULT_RESPONSE_DELAY_MS,
  DEFAULT_RESPONSE_TIMEOUT_MS,
  DEFAULT_SIMULATOR_PORT,
  EARLY_READING_MSEC_SINCE_CONTACT,
  FINAL_READING_MSEC_SINCE_CONTACT,
  MAX_RECONNECT_ATTEMPTS,
  RECONNECT_DELAYS_MS,
  RESPONSE_CODE_PLAYER_INFO,
} from './constants.js';
// Types
export type {
  ClubTelemetry,
  DeviceStatus,
  Position,
  ShotId,
  ShotTelemetry,
} from './types/index.js';
// Utilities
export type { Clock } from './utils/clock.js';
export { systemClock, VirtualClock } from './utils/clock.js';
export type { LogData, Logger, LogLevel } from './utils/logger.js';
export {
  createLogger,
  describeError,
  getLogLevel,
  isLogLevel,
  logger,
  setLogLevel,
} from './utils/logger.js';
export type { SubscriptionToken } from './utils/ObserverList.js';
export { ObserverList } from './utils/ObserverList.js';
