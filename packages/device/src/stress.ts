import { loadConfig, logger } from '@shot-relay/shared';
import { DeviceSimulator } from './DeviceSimulator.js';
import {
  formatStressReport,
  STRESS_FINAL_READING_DELAY_MS,
  STRESS_PACKET_DELAY_MS,
  StressTest,
} from './StressTest.js';

const DEFAULT_SHOTS = 10;
const START_DELAY_MS = 2000;
const SETTLE_DELAY_MS = 2000;

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const config = loadConfig();
const shots = Number(process.argv[2]) || DEFAULT_SHOTS;

let resolveFirstClient: () => void = () => {};
const firstClient = new Promise<void>((resolve) => {
  resolveFirstClient = resolve;
});

const simulator = new DeviceSimulator(
  {
    host: config.device.host,
    port: config.device.port,
    packetSize: config.device.packetSize,
    packetDelayMs: STRESS_PACKET_DELAY_MS,
    earlyReadingDelayMs: 0,
    finalReadingDelayMs: STRESS_FINAL_READING_DELAY_MS,
  },
  { onClientConnected: () => resolveFirstClient() }
);

await simulator.start();
logger.info('Waiting for a client to connect...', { port: config.device.port });
await firstClient;

logger.info('Client connected, starting in 2 seconds', { shots });
await sleep(START_DELAY_MS);

const stats = await new StressTest(simulator, { shots }).run();
for (const line of formatStressReport(stats)) {
  logger.info(line);
}
logger.info('Expected back spin on the receiving side', {
  from: 2500 + 1,
  to: 2500 + simulator.lastShot,
});

await sleep(SETTLE_DELAY_MS);
await simulator.stop();
