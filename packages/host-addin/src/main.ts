#!/usr/bin/env node
/**
 * cad-relay host add-in
 *
 * Runs the in-host side as a standalone process: HTTP listener, main loop
 * and an in-memory CAD document. Configure through CAD_RELAY_* variables.
 */

import { startAddin } from './addin.js';
import { loadConfig } from './config.js';
import { createLogger } from './logger.js';

const config = loadConfig();
const logger = createLogger(config.logLevel);

const addin = await startAddin(config, { logger });
logger.info({ url: addin.url, allowCodeExecution: config.allowCodeExecution }, 'host add-in ready');

function shutdown(signal: NodeJS.Signals): void {
  logger.info({ signal }, 'shutting down');
  addin.stop().then(
    () => process.exit(0),
    (err: unknown) => {
      logger.error({ err }, 'shutdown failed');
      process.exit(1);
    },
  );
}

process.once('SIGINT', shutdown);
process.once('SIGTERM', shutdown);
