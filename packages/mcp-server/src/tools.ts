/**
 * MCP Tool Registrations: one tool per host operation.
 *
 * Argument shapes come from the protocol catalog, so the schema the agent
 * sees and the validation the bridge runs can never disagree. Lengths are
 * in mm; the host converts.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { BODY_NAME_PATTERN, OPERATIONS, type ParamSpec } from '@cad-relay/protocol';
import type { Bridge } from './bridge.js';

function describe(param: ParamSpec): string {
  return param.default === undefined ? param.description : `${param.description}, default ${param.default}`;
}

function baseSchema(param: ParamSpec): z.ZodTypeAny {
  switch (param.kind) {
    case 'length':
    case 'angle':
      return param.positive ? z.number().positive() : z.number();
    case 'choice':
      return param.choices ? z.enum(param.choices) : z.string();
    case 'body':
    case 'name':
      return z.string().regex(BODY_NAME_PATTERN, 'Use only letters, digits, hyphens, underscores');
    case 'text':
      return z.string();
  }
}

export function paramSchema(param: ParamSpec): z.ZodTypeAny {
  const schema = baseSchema(param).describe(describe(param));
  return param.required ? schema : schema.optional();
}

export function toolShape(params: readonly ParamSpec[]): z.ZodRawShape {
  return Object.fromEntries(params.map((p) => [p.name, paramSchema(p)]));
}

export function registerTools(server: McpServer, bridge: Bridge): void {
  for (const op of OPERATIONS) {
    server.tool(op.name, op.description, toolShape(op.params), async (args) => bridge.call(op.name, args));
  }
}
