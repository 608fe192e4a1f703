/**
 * Service configuration.
 *
 * Read once from the environment at startup:
 *
 *   PORT                      HTTP port (default 5000)
 *   LOG_LEVEL                 debug | info | warn | error (default info)
 *   CALLFLOW_BODY_LIMIT       request body limit for express.json (default 10mb)
 *   CALLFLOW_COLUMN_SPACING   layout column spacing in pixels
 *   CALLFLOW_ROW_SPACING      layout row spacing in pixels
 *
 * Unparseable values fall back to the default and are logged.
 */

import { LayoutOptions } from './dsl/layout';
import { LogLevel, logger, parseLogLevel } from './logger';

export interface AppConfig {
  port: number;
  logLevel: LogLevel;
  bodyLimit: string;
  layout: LayoutOptions;
}

export const DEFAULT_CONFIG: AppConfig = {
  port: 5000,
  logLevel: LogLevel.Info,
  bodyLimit: '10mb',
  layout: {},
};

type Env = Record<string, string | undefined>;

function readPositiveInt(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    logger.warn('Ignoring invalid configuration value', { key, value: raw });
    return undefined;
  }
  return value;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const logLevel = parseLogLevel(env.LOG_LEVEL);
  if (env.LOG_LEVEL && !logLevel) {
    logger.warn('Ignoring invalid configuration value', { key: 'LOG_LEVEL', value: env.LOG_LEVEL });
  }

  const layout: LayoutOptions = {};
  const columnSpacing = readPositiveInt(env, 'CALLFLOW_COLUMN_SPACING');
  const rowSpacing = readPositiveInt(env, 'CALLFLOW_ROW_SPACING');
  if (columnSpacing !== undefined) layout.columnSpacing = columnSpacing;
  if (rowSpacing !== undefined) layout.rowSpacing = rowSpacing;

  return {
    port: readPositiveInt(env, 'PORT') ?? DEFAULT_CONFIG.port,
    logLevel: logLevel ?? DEFAULT_CONFIG.logLevel,
    bodyLimit: env.CALLFLOW_BODY_LIMIT || DEFAULT_CONFIG.bodyLimit,
    layout,
  };
}
