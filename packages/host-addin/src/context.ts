/**
 * Everything the add-in owns, in one place: the main loop, the document it
 * guards, the dispatch signal, the mailbox and the interpreter.
 */

import { CadDocument } from '@cad-relay/cad-model';
import type { CommandResponse } from '@cad-relay/protocol';
import type { AddinConfig } from './config.js';
import { COMMAND_SIGNAL_ID, type CommandEvent, DispatchSignal } from './dispatch-signal.js';
import { buildHandlerRegistry } from './handlers/index.js';
import { mm } from './handlers/format.js';
import { CommandInterpreter, type HandlerRegistry } from './interpreter.js';
import type { Logger } from './logger.js';
import { ResponseMailbox } from './mailbox.js';
import { HostMainLoop } from './main-loop.js';

export interface AddinContext {
  readonly config: AddinConfig;
  readonly logger: Logger;
  readonly loop: HostMainLoop;
  readonly document: CadDocument;
  readonly signal: DispatchSignal<CommandEvent>;
  readonly mailbox: ResponseMailbox;
  readonly interpreter: CommandInterpreter;
}

export interface ContextOptions {
  /** Replace the catalog handlers (tests). */
  handlers?: HandlerRegistry;
}

export function createAddinContext(config: AddinConfig, logger: Logger, options: ContextOptions = {}): AddinContext {
  const loop = new HostMainLoop(logger.child({ component: 'loop' }));
  const document = new CadDocument({
    assertOwner: (action) => loop.assertMainThread(`Document change "${action}"`),
    formatLength: mm,
  });
  const interpreter = new CommandInterpreter(
    options.handlers ?? buildHandlerRegistry(),
    { document, config, logger: logger.child({ component: 'interpreter' }) },
    loop,
  );
  return {
    config,
    logger,
    loop,
    document,
    signal: new DispatchSignal<CommandEvent>(COMMAND_SIGNAL_ID, loop),
    mailbox: new ResponseMailbox(logger.child({ component: 'mailbox' })),
    interpreter,
  };
}

/**
 * The signal callback: interpret on the main thread, then deliver exactly
 * once, whatever the outcome.
 */
export function serviceCommand(ctx: AddinContext, event: CommandEvent): CommandResponse {
  const response = ctx.interpreter.interpret(event.command);
  ctx.mailbox.deliver(event.requestId, response);
  return response;
}
