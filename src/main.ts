/**
 * Server entry point.
 */

import { createApp, createAppContext } from './server';
import { loadConfig } from './config';
import { logger, setLogLevel } from './logger';

const config = loadConfig();
setLogLevel(config.logLevel);

const app = createApp(createAppContext({ config }));

app.listen(config.port, () => {
  logger.info('Flow service listening', { port: config.port });
});
