export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogData = Record<string, unknown>;

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: LogData | undefined;
}

export interface Logger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
}

const LEVEL_ORDER: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: string): value is LogLevel {
  return (LEVEL_ORDER as readonly string[]).includes(value);
}

// biome-ignore lint/complexity/useLiteralKeys: Required for noPropertyAccessFromIndexSignature
const envLevel = process.env['LOG_LEVEL']?.toLowerCase() ?? 'info';
let minLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

/**
 * Set the minimum level for every logger in the process.
 */
export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(minLevel);
}

function formatLog(entry: LogEntry): string {
  const base = `[${entry.timestamp}] ${entry.level.toUpperCase()}: ${entry.message}`;
  if (entry.data) {
    return `${base} ${JSON.stringify(entry.data)}`;
  }
  return base;
}

function createLogEntry(level: LogLevel, message: string, data?: LogData): LogEntry {
  return {
    level,
    message,
    timestamp: new Date().toISOString(),
    data,
  };
}

function write(level: LogLevel, message: string, data?: LogData): void {
  if (!shouldLog(level)) return;

  const line = formatLog(createLogEntry(level, message, data));
  switch (level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
}

/**
 * Create a logger whose entries carry a `scope` field.
 */
export function createLogger(scope: string): Logger {
  const withScope = (data?: LogData): LogData => ({ scope, ...data });

  return {
    debug(message, data) {
      write('debug', message, withScope(data));
    },
    info(message, data) {
      write('info', message, withScope(data));
    },
    warn(message, data) {
      write('warn', message, withScope(data));
    },
    error(message, data) {
      write('error', message, withScope(data));
    },
  };
}

export const logger: Logger = {
  debug(message, data) {
    write('debug', message, data);
  },
  info(message, data) {
    write('info', message, data);
  },
  warn(message, data) {
    write('warn', message, data);
  },
  error(message, data) {
    write('error', message, data);
  },
};

/**
 * Reduce an unknown thrown value to something loggable.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
