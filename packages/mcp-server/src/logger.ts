import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

/** stdout carries the MCP stdio channel, so logs go to stderr. */
export function createLogger(level: string): Logger {
  return pino({ name: 'cad-relay-bridge', level }, process.stderr);
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
