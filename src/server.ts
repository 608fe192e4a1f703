/**
 * Express server configuration.
 *
 * Exposes compile, decompile, validate and a small flow store over HTTP.
 * The core library has no dependency on this layer.
 */

import express from 'express';
import { Store } from './storage/store';
import { createMemoryStore } from './storage/memory-store';
import { errorHandler } from './api/middleware';
import { createFlowRoutes } from './api/flows';
import { AppConfig, DEFAULT_CONFIG } from './config';
import { DEFAULT_DOCUMENT_VERSION } from './dsl/wire';

const startTime = Date.now();

/** Application context containing all services. */
export interface AppContext {
  store: Store;
  config: AppConfig;
}

/** Create the application context with all services. */
export function createAppContext(options: { store?: Store; config?: AppConfig } = {}): AppContext {
  return {
    store: options.store ?? createMemoryStore(),
    config: options.config ?? DEFAULT_CONFIG,
  };
}

/** Create and configure the Express application. */
export function createApp(context?: AppContext): express.Application {
  const ctx = context ?? createAppContext();
  const app = express();

  // Body parsing
  app.use(express.json({ limit: ctx.config.bodyLimit }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      documentVersion: DEFAULT_DOCUMENT_VERSION,
      uptimeMs: Date.now() - startTime,
      storage: 'memory',
    });
  });

  const v1 = express.Router();
  v1.use('/flows', createFlowRoutes(ctx.store, { layout: ctx.config.layout }));
  app.use('/api/v1', v1);

  // Error handler
  app.use(errorHandler);

  return app;
}
