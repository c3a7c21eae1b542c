/**
 * Bridge: MCP tool calls → host commands → MCP results.
 *
 * Tool names and arguments are checked locally; nothing invalid is ever
 * sent to the host. call() never throws: every failure comes back as an
 * `isError` result the agent can read.
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import {
  type CommandEncoding, type CommandResponse,
  ProtocolError, describeError, encodeCommand, findOperation, operationNames,
} from '@cad-relay/protocol';
import { BridgeError } from './errors.js';
import type { HostClient } from './host-client.js';
import type { Logger } from './logger.js';

export interface BridgeOptions {
  encoding?: CommandEncoding;
}

function text(message: string, isError = false): CallToolResult {
  const result: CallToolResult = { content: [{ type: 'text', text: message }] };
  return isError ? { ...result, isError: true } : result;
}

export class Bridge {
  readonly encoding: CommandEncoding;

  constructor(
    private readonly client: HostClient,
    private readonly logger: Logger,
    options: BridgeOptions = {},
  ) {
    this.encoding = options.encoding ?? 'structured';
  }

  /** Validate a tool call and build its command string. */
  encode(name: string, args: Readonly<Record<string, unknown>>): string {
    if (!findOperation(name)) {
      throw new BridgeError('unknown_tool', `Unknown tool "${name}". Available tools: [${operationNames().join(', ')}]`);
    }
    try {
      return encodeCommand(name, args, this.encoding);
    } catch (err) {
      if (err instanceof ProtocolError) throw new BridgeError('invalid_args', err.message);
      throw err;
    }
  }

  async call(name: string, args: Readonly<Record<string, unknown>> = {}): Promise<CallToolResult> {
    const log = this.logger.child({ tool: name });
    let response: CommandResponse;
    try {
      const command = this.encode(name, args);
      log.debug({ command }, 'sending command');
      response = await this.client.send(command);
    } catch (err) {
      const kind = err instanceof BridgeError ? err.kind : 'transport';
      log.warn({ kind, reason: describeError(err) }, 'tool call failed before the host answered');
      return text(describeError(err), true);
    }
    return toToolResult(response);
  }
}

function toToolResult(response: CommandResponse): CallToolResult {
  switch (response.status) {
    case 'success':
      return text(
        response.data === undefined
          ? response.message
          : `${response.message}\n${JSON.stringify(response.data, null, 2)}`,
      );
    case 'error':
      return text(`Host error: ${response.message}`, true);
    case 'timeout':
      return text(`Host timeout: ${response.message}`, true);
  }
}
