/**
 * Command interpreter: wire text in, CommandResponse out.
 *
 * Runs on the main thread only. Every outcome, including decode failures,
 * unknown operations and any handler exception, becomes a response;
 * interpret() itself does not throw.
 */

import type { CadDocument } from '@cad-relay/cad-model';
import {
  type CommandArgs, type CommandResponse,
  decodeCommand, describeError, failure, success,
} from '@cad-relay/protocol';
import type { AddinConfig } from './config.js';
import type { Logger } from './logger.js';
import type { HostMainLoop } from './main-loop.js';

export interface HandlerReply {
  message: string;
  data?: unknown;
}

/** A message, a message with data, or nothing for a plain "OK: <op>". */
export type HandlerResult = string | HandlerReply | undefined;

export interface HandlerContext {
  document: CadDocument;
  config: AddinConfig;
  logger: Logger;
}

export type Handler = (args: CommandArgs, ctx: HandlerContext) => HandlerResult;

export type HandlerRegistry = ReadonlyMap<string, Handler>;

export class CommandInterpreter {
  /** Own copy: later changes to the map handed in do not reach dispatch. */
  private readonly handlers: HandlerRegistry;

  constructor(
    handlers: HandlerRegistry,
    private readonly ctx: HandlerContext,
    private readonly loop: HostMainLoop,
  ) {
    this.handlers = new Map(handlers);
  }

  /** Operations this interpreter dispatches, in registration order. */
  get operations(): string[] {
    return [...this.handlers.keys()];
  }

  interpret(text: string): CommandResponse {
    const log = this.ctx.logger;
    try {
      this.loop.assertMainThread('Command interpretation');
      const command = decodeCommand(text);
      const handler = this.handlers.get(command.operation);
      if (!handler) {
        return failure(
          `Unknown operation "${command.operation}". Available operations: [${this.operations.join(', ')}]`,
        );
      }
      log.debug({ operation: command.operation, encoding: command.encoding }, 'executing command');
      return toResponse(command.operation, handler(command.args, this.ctx));
    } catch (err) {
      log.info({ command: text, reason: describeError(err) }, 'command failed');
      return failure(describeError(err));
    }
  }
}

function toResponse(operation: string, result: HandlerResult): CommandResponse {
  if (result === undefined) return success(`OK: ${operation}`);
  if (typeof result === 'string') return success(result);
  return success(result.message, result.data);
}
