/**
 * Configuration for the host add-in.
 *
 * Every setting comes from the environment, with fixed defaults:
 *
 *   CAD_RELAY_HOST          listener address      (127.0.0.1)
 *   CAD_RELAY_PORT          listener port         (3000)
 *   CAD_RELAY_TIMEOUT_MS    per-request timeout   (30000)
 *   CAD_RELAY_MAX_IN_FLIGHT outstanding requests  (8)
 *   CAD_RELAY_ALLOW_CODE    execute_arbitrary_code enabled (false)
 *   LOG_LEVEL               pino level            (info)
 */

import { z } from 'zod';
import { DEFAULT_HOST, DEFAULT_PORT, DEFAULT_REQUEST_TIMEOUT_MS } from '@cad-relay/protocol';

const flag = z
  .enum(['true', 'false', '1', '0'], { errorMap: () => ({ message: 'expected true or false' }) })
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  CAD_RELAY_HOST: z.string().min(1).default(DEFAULT_HOST),
  CAD_RELAY_PORT: z.coerce.number().int().min(0).max(65535).default(DEFAULT_PORT),
  CAD_RELAY_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
  CAD_RELAY_MAX_IN_FLIGHT: z.coerce.number().int().positive().default(8),
  CAD_RELAY_ALLOW_CODE: flag.default('false'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export interface AddinConfig {
  host: string;
  port: number;
  requestTimeoutMs: number;
  maxInFlight: number;
  allowCodeExecution: boolean;
  logLevel: string;
}

export const DEFAULT_CONFIG: AddinConfig = {
  host: DEFAULT_HOST,
  port: DEFAULT_PORT,
  requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
  maxInFlight: 8,
  allowCodeExecution: false,
  logLevel: 'info',
};

/** Parse the environment; throws naming every invalid variable. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AddinConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid host add-in configuration: ${problems.join('; ')}`);
  }
  const e = parsed.data;
  return {
    host: e.CAD_RELAY_HOST,
    port: e.CAD_RELAY_PORT,
    requestTimeoutMs: e.CAD_RELAY_TIMEOUT_MS,
    maxInFlight: e.CAD_RELAY_MAX_IN_FLIGHT,
    allowCodeExecution: e.CAD_RELAY_ALLOW_CODE,
    logLevel: e.LOG_LEVEL,
  };
}
