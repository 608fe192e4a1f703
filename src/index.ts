/**
 * callflow-kit — call-flow graphs compiled to and from contact-flow JSON.
 *
 * Build a flow with FlowBuilder, compile it with compileFlow, and read an
 * existing document back with decompileFlow. The HTTP server in ./server is
 * optional and started from ./main.
 */

export * from './domain';
export * from './graph';
export * from './dsl';
export * from './blocks/catalog';
export * from './io/flow-file';
export * from './storage/store';
export { createMemoryStore } from './storage/memory-store';
export { createApp, createAppContext } from './server';
export type { AppContext } from './server';
export { loadConfig, DEFAULT_CONFIG } from './config';
export type { AppConfig } from './config';
export {
  logger,
  createLogger,
  captureLogs,
  parseLogLevel,
  setLogHandler,
  resetLogHandler,
  setLogLevel,
  LogLevel,
} from './logger';
export type { Logger, LogCapture, LogEntry, LogHandler } from './logger';
