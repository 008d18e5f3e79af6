/**
 * @fileoverview Interactive operator console for the launch-monitor emulator.
 */

import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { createLogger, describeError, type Logger } from '@shot-relay/shared';
import type { DeviceSimulator } from './DeviceSimulator.js';
import type { ShotProfileName } from './shotGenerator.js';

export type ConsoleCommand =
  | { readonly kind: 'shot'; readonly profile: ShotProfileName }
  | { readonly kind: 'status' }
  | { readonly kind: 'burst'; readonly count: number }
  | { readonly kind: 'quit' }
  | { readonly kind: 'empty' }
  | { readonly kind: 'unknown'; readonly input: string };

export const DEFAULT_BURST_COUNT = 5;
export const BURST_GAP_MS = 500;

const ALIASES: ReadonlyMap<string, ConsoleCommand> = new Map<string, ConsoleCommand>([
  ['driver', { kind: 'shot', profile: 'driver' }],
  ['d', { kind: 'shot', profile: 'driver' }],
  ['7iron', { kind: 'shot', profile: '7iron' }],
  ['7', { kind: 'shot', profile: '7iron' }],
  ['wedge', { kind: 'shot', profile: 'wedge' }],
  ['w', { kind: 'shot', profile: 'wedge' }],
  ['status', { kind: 'status' }],
  ['s', { kind: 'status' }],
  ['quit', { kind: 'quit' }],
  ['q', { kind: 'quit' }],
]);

export const HELP_TEXT = [
  'Commands:',
  '  driver  - Fire a driver shot',
  '  7iron   - Fire a 7-iron shot',
  '  wedge   - Fire a wedge shot',
  '  status  - Send device status',
  '  burst N - Fire N shots rapidly',
  '  quit    - Exit',
].join('\n');

/**
 * Parse one console line (case-insensitive).
 */
export function parseCommand(line: string): ConsoleCommand {
  const input = line.trim().toLowerCase();
  if (input === '') return { kind: 'empty' };

  const alias = ALIASES.get(input);
  if (alias) return alias;

  const [word, countText, ...rest] = input.split(/\s+/);
  if (word === 'burst' && rest.length === 0) {
    if (countText === undefined) return { kind: 'burst', count: DEFAULT_BURST_COUNT };
    const count = Number(countText);
    if (Number.isInteger(count) && count > 0) return { kind: 'burst', count };
  }

  return { kind: 'unknown', input };
}

export type ConsoleTarget = Pick<DeviceSimulator, 'fireShot' | 'sendStatus' | 'burst'>;

export interface ConsoleOptions {
  readonly input: Readable;
  readonly output: Writable;
  readonly logger?: Logger;
}

/**
 * Read commands until `quit` or end of input. Commands run one at a time.
 */
export async function runConsole(target: ConsoleTarget, options: ConsoleOptions): Promise<void> {
  const logger = options.logger ?? createLogger('console');
  const lines = createInterface({ input: options.input, terminal: false });

  options.output.write(`${HELP_TEXT}\n`);

  try {
    for await (const line of lines) {
      const command = parseCommand(line);
      if (command.kind === 'quit') break;

      try {
        await execute(target, command, options.output);
      } catch (error) {
        logger.error('Command failed', { input: line, error: describeError(error) });
      }
    }
  } finally {
    lines.close();
  }
}

async function execute(
  target: ConsoleTarget,
  command: ConsoleCommand,
  output: Writable
): Promise<void> {
  switch (command.kind) {
    case 'shot':
      await target.fireShot(command.profile);
      break;
    case 'status':
      await target.sendStatus();
      break;
    case 'burst':
      await target.burst(command.count, BURST_GAP_MS);
      break;
    case 'unknown':
      output.write(`Unknown command: ${command.input}\n`);
      break;
    case 'empty':
    case 'quit':
      break;
  }
}
