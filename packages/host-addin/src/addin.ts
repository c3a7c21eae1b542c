/**
 * Add-in lifecycle: wire the context, register the dispatch signal, open
 * the listener. stop() undoes all three in reverse.
 */

import type { AddinConfig } from './config.js';
import { type AddinContext, type ContextOptions, createAddinContext, serviceCommand } from './context.js';
import { type CommandListener, startListener } from './listener.js';
import { type Logger, silentLogger } from './logger.js';

export interface StartOptions extends ContextOptions {
  logger?: Logger;
}

export interface AddinHandle {
  /** Base URL of the listener, e.g. http://127.0.0.1:3000 */
  readonly url: string;
  readonly context: AddinContext;
  stop(): Promise<void>;
}

export async function startAddin(config: AddinConfig, options: StartOptions = {}): Promise<AddinHandle> {
  const logger = options.logger ?? silentLogger();
  const context = createAddinContext(config, logger, options);

  context.signal.register((event) => {
    serviceCommand(context, event);
  });

  let listener: CommandListener;
  try {
    listener = await startListener(context);
  } catch (err) {
    context.signal.unregister();
    context.loop.stop();
    throw err;
  }

  let stopped = false;
  return {
    url: listener.url,
    context,
    async stop() {
      if (stopped) return;
      stopped = true;
      context.signal.unregister();
      context.mailbox.close();
      await listener.close();
      context.loop.stop();
      logger.info('host add-in stopped');
    },
  };
}
