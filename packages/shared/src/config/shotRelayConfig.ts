/**
 * @fileoverview Configuration loading from YAML.
 * Validates and caches the settings for the device emulator, the bridge and
 * the mock simulator.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import {
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
  MAX_RECONNECT_ATTEMPTS,
  RECONNECT_DELAYS_MS,
} from '../constants.js';
import { setLogLevel } from '../utils/logger.js';

const PortSchema = z.number().int().min(0).max(65535);

const ShotRelayConfigSchema = z.object({
  device: z
    .object({
      host: z.string().default('0.0.0.0'),
      port: PortSchema.default(DEFAULT_DEVICE_PORT),
      packetSize: z.number().int().positive().default(DEFAULT_PACKET_SIZE),
      packetDelayMs: z.number().min(0).default(DEFAULT_PACKET_DELAY_MS),
      earlyReadingDelayMs: z.number().min(0).default(DEFAULT_EARLY_READING_DELAY_MS),
      finalReadingDelayMs: z.number().min(0).default(DEFAULT_FINAL_READING_DELAY_MS),
    })
    .default({}),
  simulator: z
    .object({
      host: z.string().default('127.0.0.1'),
      port: PortSchema.default(DEFAULT_SIMULATOR_PORT),
      connectTimeoutMs: z.number().int().positive().default(DEFAULT_CONNECT_TIMEOUT_MS),
      responseTimeoutMs: z.number().int().positive().default(DEFAULT_RESPONSE_TIMEOUT_MS),
      heartbeatIntervalMs: z.number().int().positive().default(DEFAULT_HEARTBEAT_INTERVAL_MS),
    })
    .default({}),
  bridge: z
    .object({
      deviceHost: z.string().default('127.0.0.1'),
      devicePort: PortSchema.default(DEFAULT_DEVICE_PORT),
      reconnectDelaysMs: z
        .array(z.number().int().positive())
        .min(1)
        .default([...RECONNECT_DELAYS_MS]),
      maxReconnectAttempts: z.number().int().min(0).default(MAX_RECONNECT_ATTEMPTS),
    })
    .default({}),
  relay: z
    .object({
      host: z.string().default('0.0.0.0'),
      port: PortSchema.default(DEFAULT_SIMULATOR_PORT),
      responseDelayMs: z.number().min(0).default(DEFAULT_RESPONSE_DELAY_MS),
      player: z
        .object({
          Handed: z.string().default('RH'),
          Club: z.string().default('DR'),
          DistanceToTarget: z.number().default(250),
        })
        .default({}),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    })
    .default({}),
});

export type ShotRelayConfig = z.infer<typeof ShotRelayConfigSchema>;

/**
 * Error thrown when the configuration file does not match the schema.
 */
export class InvalidConfigError extends Error {
  constructor(
    message: string,
    readonly issues: readonly string[] = []
  ) {
    super(`Invalid configuration: ${message}`);
    this.name = 'InvalidConfigError';
  }
}

export interface LoadConfigOptions {
  /** Explicit file path; takes precedence over CONFIG_PATH */
  readonly path?: string;
  /** Environment used for overrides (defaults to process.env) */
  readonly env?: NodeJS.ProcessEnv;
}

let cachedConfig: ShotRelayConfig | null = null;

function readConfigFile(configPath: string): unknown {
  if (!existsSync(configPath)) {
    return {};
  }
  return parseYaml(readFileSync(configPath, 'utf8')) as unknown;
}

function parsePort(value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidConfigError(`port must be an integer between 0 and 65535, got "${value}"`);
  }
  return port;
}

function applyEnvOverrides(config: ShotRelayConfig, env: NodeJS.ProcessEnv): ShotRelayConfig {
  // biome-ignore lint/complexity/useLiteralKeys: Required for noPropertyAccessFromIndexSignature
  const devicePort = parsePort(env['DEVICE_PORT']);
  // biome-ignore lint/complexity/useLiteralKeys: Required for noPropertyAccessFromIndexSignature
  const simulatorPort = parsePort(env['SIMULATOR_PORT']);
  // biome-ignore lint/complexity/useLiteralKeys: Required for noPropertyAccessFromIndexSignature
  const relayPort = parsePort(env['RELAY_PORT']);
  // biome-ignore lint/complexity/useLiteralKeys: Required for noPropertyAccessFromIndexSignature
  const simulatorHost = env['SIMULATOR_HOST'];
  // biome-ignore lint/complexity/useLiteralKeys: Required for noPropertyAccessFromIndexSignature
  const level = env['LOG_LEVEL']?.toLowerCase();

  return {
    ...config,
    device: { ...config.device, port: devicePort ?? config.device.port },
    bridge: { ...config.bridge, devicePort: devicePort ?? config.bridge.devicePort },
    simulator: {
      ...config.simulator,
      host: simulatorHost || config.simulator.host,
      port: simulatorPort ?? config.simulator.port,
    },
    relay: { ...config.relay, port: relayPort ?? config.relay.port },
    logging: {
      level:
        level === 'debug' || level === 'info' || level === 'warn' || level === 'error'
          ? level
          : config.logging.level,
    },
  };
}

/**
 * Load and validate configuration from a YAML file.
 * Caches the result for subsequent calls.
 *
 * Config file is loaded from:
 * - `options.path` if given
 * - CONFIG_PATH environment variable if set
 * - Otherwise ./config/shot-relay.yaml relative to cwd
 *
 * A missing file yields the built-in defaults.
 */
export function loadConfig(options: LoadConfigOptions = {}): ShotRelayConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const env = options.env ?? process.env;
  const configPath =
    // biome-ignore lint/complexity/useLiteralKeys: Required for noPropertyAccessFromIndexSignature
    options.path ?? env['CONFIG_PATH'] ?? join(process.cwd(), 'config/shot-relay.yaml');

  const result = ShotRelayConfigSchema.safeParse(readConfigFile(configPath) ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new InvalidConfigError(`${configPath} failed validation`, issues);
  }

  const config = applyEnvOverrides(result.data, env);
  setLogLevel(config.logging.level);
  cachedConfig = config;
  return config;
}

/**
 * Clear the cached config (useful for testing or hot-reloading)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
