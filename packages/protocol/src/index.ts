/**
 * @fileoverview Wire protocols of the relay.
 *
 * - Device text protocol: packetized `KEY=VALUE` readings from the launch monitor
 * - Simulator protocol: one JSON object per request/response
 * - Framing of concatenated JSON objects on a TCP stream
 */

// Device protocol
export {
  type DeviceMessage,
  DeviceMessageAssembler,
  type DeviceStatusReport,
  FLAGS_NOT_READY,
  FLAGS_READY,
  formatDeviceStatus,
  formatShotReading,
  MESSAGE_TERMINATOR,
  parseBallPosition,
  parseDeviceMessage,
  SHOT_MESSAGE_PREFIX,
  STATUS_MESSAGE_PREFIX,
  type ShotReading,
  type ShotReadingFormat,
  validateShotReading,
} from './device.js';
// Errors
export { FrameDecodeError, TransportError } from './errors.js';
// Framing
export {
  type DrainResult,
  type ExtractResult,
  extractFrame,
  StreamBuffer,
  skipMalformedFrame,
} from './FrameExtractor.js';
// Simulator protocol
export {
  type BallData,
  BallDataSchema,
  type ClubData,
  ClubDataSchema,
  classifyMessage,
  computeSpinAxis,
  createHeartbeatMessage,
  createShotMessage,
  createShotResponse,
  createStatusMessage,
  DEFAULT_DEVICE_ID,
  type MessageKind,
  type MessageOptions,
  type PlayerInfo,
  PlayerSchema,
  parseResponse,
  parseShotMessage,
  playerFromResponse,
  type ShotDataOptions,
  ShotDataOptionsSchema,
  type ShotMessage,
  ShotMessageSchema,
  type SimulatorResponse,
  SimulatorResponseSchema,
  serializeMessage,
} from './simulator.js';
