/**
 * @fileoverview Launch-monitor emulator: packet transmission, two-phase shot
 * emission and the TCP server that drives them.
 */

export {
  BURST_GAP_MS,
  type ConsoleCommand,
  type ConsoleOptions,
  type ConsoleTarget,
  DEFAULT_BURST_COUNT,
  HELP_TEXT,
  parseCommand,
  runConsole,
} from './console.js';
export {
  DeviceSimulator,
  type DeviceSimulatorEvents,
  type DeviceSimulatorOptions,
  type ShotFireResult,
} from './DeviceSimulator.js';
export {
  chunkMessage,
  createSocketSink,
  PacketChunker,
  type PacketChunkerOptions,
  type PacketSink,
  type SendStats,
} from './PacketChunker.js';
export {
  DuplicateShotError,
  type EmissionState,
  type EmissionTimeline,
  ShotEmissionSequencer,
  type ShotEmissionSequencerOptions,
} from './ShotEmissionSequencer.js';
export {
  formatStressReport,
  type ShotTarget,
  STRESS_FINAL_READING_DELAY_MS,
  STRESS_INTER_SHOT_DELAY_MS,
  STRESS_PACKET_DELAY_MS,
  StressTest,
  type StressTestOptions,
  type StressTestStats,
} from './StressTest.js';
export {
  generateShot,
  generateTrackedShot,
  isShotProfileName,
  type RandomSource,
  type Range,
  SHOT_PROFILES,
  type ShotProfile,
  type ShotProfileName,
} from './shotGenerator.js';
