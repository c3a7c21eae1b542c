/**
 * Bridge configuration, read from the environment.
 *
 *   CAD_RELAY_URL         host add-in base URL (built from host/port when unset)
 *   CAD_RELAY_HOST        127.0.0.1
 *   CAD_RELAY_PORT        3000
 *   CAD_RELAY_TIMEOUT_MS  30000, the add-in's own timeout
 *   CAD_RELAY_ENCODING    structured | legacy
 *   LOG_LEVEL             info
 */

import { z } from 'zod';
import {
  type CommandEncoding, DEFAULT_HOST, DEFAULT_PORT, DEFAULT_REQUEST_TIMEOUT_MS,
} from '@cad-relay/protocol';

const envSchema = z.object({
  CAD_RELAY_URL: z.string().url().optional(),
  CAD_RELAY_HOST: z.string().min(1).default(DEFAULT_HOST),
  CAD_RELAY_PORT: z.coerce.number().int().min(1).max(65535).default(DEFAULT_PORT),
  CAD_RELAY_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
  CAD_RELAY_ENCODING: z.enum(['structured', 'legacy']).default('structured'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export interface BridgeConfig {
  hostUrl: string;
  requestTimeoutMs: number;
  encoding: CommandEncoding;
  logLevel: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid bridge configuration: ${problems.join('; ')}`);
  }
  const e = parsed.data;
  return {
    hostUrl: (e.CAD_RELAY_URL ?? `http://${e.CAD_RELAY_HOST}:${e.CAD_RELAY_PORT}`).replace(/\/+$/, ''),
    requestTimeoutMs: e.CAD_RELAY_TIMEOUT_MS,
    encoding: e.CAD_RELAY_ENCODING,
    logLevel: e.LOG_LEVEL,
  };
}
