import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

/** Process logger. Writes to stderr; stdout belongs to whoever embeds us. */
export function createLogger(level: string, name = 'cad-relay-addin'): Logger {
  return pino({ name, level }, process.stderr);
}

/** A logger that discards everything (tests, embedding). */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
