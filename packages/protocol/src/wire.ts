/**
 * HTTP envelope between the bridge server and the host add-in.
 *
 *   POST /mcp/command  { "command": "<legacy or structured text>" }
 *                   →  { "status": "success" | "error" | "timeout", "message": "...", "data"?: ... }
 *   GET  /health    →  { "status": "ok" }
 */

import { z } from 'zod';

export const COMMAND_PATH = '/mcp/command';
export const HEALTH_PATH = '/health';

export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 3000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export const commandRequestSchema = z.object({
  command: z.string({
    required_error: 'Request body needs a "command" field',
    invalid_type_error: '"command" must be a string',
  }),
});

export type CommandRequest = z.infer<typeof commandRequestSchema>;

export const responseStatusSchema = z.enum(['success', 'error', 'timeout']);

export type ResponseStatus = z.infer<typeof responseStatusSchema>;

export const commandResponseSchema = z.object({
  status: responseStatusSchema,
  message: z.string(),
  data: z.unknown().optional(),
});

export type CommandResponse = z.infer<typeof commandResponseSchema>;

export const healthResponseSchema = z.object({ status: z.literal('ok') });

// ─── Response constructors ──────────────────────────────────

export function success(message: string, data?: unknown): CommandResponse {
  return data === undefined ? { status: 'success', message } : { status: 'success', message, data };
}

export function failure(message: string): CommandResponse {
  return { status: 'error', message };
}

export function timedOut(message: string): CommandResponse {
  return { status: 'timeout', message };
}
