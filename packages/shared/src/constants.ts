/**
 * @fileoverview Protocol constants shared by the device emulator, the bridge
 * and the mock simulator.
 */

// ============ Ports ============

/** Launch-monitor (device) text protocol port used by the emulator */
export const DEFAULT_DEVICE_PORT = 5555;

/** Simulator Open Connect API port */
export const DEFAULT_SIMULATOR_PORT = 921;

// ============ Device transport ============

/** Size of one device packet in bytes (one USB transfer unit) */
export const DEFAULT_PACKET_SIZE = 64;

/** Delay between packets of one message, in milliseconds */
export const DEFAULT_PACKET_DELAY_MS = 1.5;

/** Delay before the early reading of a shot is sent */
export const DEFAULT_EARLY_READING_DELAY_MS = 200;

/** Delay between the end of the early reading and the final reading */
export const DEFAULT_FINAL_READING_DELAY_MS = 800;

/** MSEC_SINCE_CONTACT reported by an early reading */
export const EARLY_READING_MSEC_SINCE_CONTACT = 200;

/** MSEC_SINCE_CONTACT reported by a final reading */
export const FINAL_READING_MSEC_SINCE_CONTACT = 1000;

// ============ Simulator exchange ============

/** How long the client waits for a shot response */
export const DEFAULT_RESPONSE_TIMEOUT_MS = 5000;

/** How long the client waits for the TCP handshake */
export const DEFAULT_CONNECT_TIMEOUT_MS = 5000;

/** Heartbeat cadence of the bridge while connected */
export const DEFAULT_HEARTBEAT_INTERVAL_MS = 2000;

/** Artificial processing delay of the mock simulator */
export const DEFAULT_RESPONSE_DELAY_MS = 50;

/** Response code: shot accepted, player record attached */
export const RESPONSE_CODE_PLAYER_INFO = 201;

/** Reconnect back-off used by the bridge; the last entry repeats */
export const RECONNECT_DELAYS_MS: readonly number[] = [1000, 2000, 5000, 10000];

/** Reconnect attempts before the bridge gives up */
export const MAX_RECONNECT_ATTEMPTS = 10;
