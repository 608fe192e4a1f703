/**
 * Structured logging for the compiler, decompiler and HTTP service.
 *
 * Entries are emitted as one JSON object per line. Library users that embed
 * the compiler in a build step usually swap the handler for their own with
 * setLogHandler(), or collect entries with captureLogs().
 */

export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

const SEVERITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3,
};

/** JSON lines; warnings and errors go to stderr. */
const consoleHandler: LogHandler = (entry) => {
  const line = JSON.stringify({ level: entry.level, ts: entry.timestamp, msg: entry.message, ...entry.context });
  if (entry.level === LogLevel.Error) {
    console.error(line);
  } else if (entry.level === LogLevel.Warn) {
    console.warn(line);
  } else {
    console.log(line);
  }
};

let handler: LogHandler = consoleHandler;
let threshold: LogLevel = LogLevel.Info;

export function setLogHandler(next: LogHandler): void {
  handler = next;
}

export function resetLogHandler(): void {
  handler = consoleHandler;
}

/** Entries below `level` are dropped before they reach the handler. */
export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

/** Map a LOG_LEVEL value to a level; unknown names yield undefined. */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const name = value?.toLowerCase();
  return Object.values(LogLevel).find((level) => level === name);
}

export interface LogCapture {
  entries: LogEntry[];
  /** Reinstate the console handler. */
  restore(): void;
}

/** Route entries into an array until `restore` is called. */
export function captureLogs(): LogCapture {
  const entries: LogEntry[] = [];
  setLogHandler((entry) => entries.push(entry));
  return { entries, restore: resetLogHandler };
}

function emit(level: LogLevel, message: string, context: Record<string, unknown>): void {
  if (SEVERITY[level] < SEVERITY[threshold]) return;
  handler({ level, message, context, timestamp: new Date().toISOString() });
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** Logger whose entries also carry `context`, e.g. `{ module: 'compiler' }`. */
  child(context: Record<string, unknown>): Logger;
}

export function createLogger(base: Record<string, unknown> = {}): Logger {
  return {
    debug: (message, context) => emit(LogLevel.Debug, message, { ...base, ...context }),
    info: (message, context) => emit(LogLevel.Info, message, { ...base, ...context }),
    warn: (message, context) => emit(LogLevel.Warn, message, { ...base, ...context }),
    error: (message, context) => emit(LogLevel.Error, message, { ...base, ...context }),
    child: (context) => createLogger({ ...base, ...context }),
  };
}

/** Every module logs through a child of this, tagged `component: 'callflow'`. */
export const logger = createLogger({ component: 'callflow' });
