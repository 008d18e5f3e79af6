/**
 * @fileoverview Host-side bridge: launch-monitor reader, simulator client
 * and the relay between them.
 */

export { connectSocket } from './connectSocket.js';
export { DeviceReader, type DeviceReaderEvents, type DeviceReaderOptions } from './DeviceReader.js';
export { Reconnector, type ReconnectorOptions, reconnectDelay } from './Reconnector.js';
export {
  type RelayTarget,
  ShotRelay,
  type ShotRelayEvents,
  type ShotRelayOptions,
} from './ShotRelay.js';
export {
  type ClientState,
  type ExchangeResult,
  TelemetryClient,
  type TelemetryClientOptions,
} from './TelemetryClient.js';
