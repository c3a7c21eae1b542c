/**
 * HTTP client for the host add-in listener.
 *
 * The add-in answers a slow command with its own timeout response after
 * requestTimeoutMs; the client waits a grace period beyond that before
 * giving up and synthesizing the same kind of response itself.
 */

import {
  COMMAND_PATH, HEALTH_PATH, type CommandResponse,
  commandResponseSchema, describeError, healthResponseSchema, timedOut,
} from '@cad-relay/protocol';
import { BridgeError } from './errors.js';
import type { Logger } from './logger.js';

export const DEFAULT_GRACE_MS = 5_000;

export interface HostClientOptions {
  url: string;
  requestTimeoutMs: number;
  graceMs?: number;
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
}

/** fetch() reports "fetch failed" and hides the reason in `cause`. */
function networkReason(err: unknown): string {
  if (err instanceof Error && err.cause instanceof Error) return err.cause.message;
  return describeError(err);
}

export class HostClient {
  readonly url: string;
  readonly deadlineMs: number;

  constructor(options: HostClientOptions, private readonly logger: Logger) {
    this.url = options.url.replace(/\/+$/, '');
    this.deadlineMs = options.requestTimeoutMs + (options.graceMs ?? DEFAULT_GRACE_MS);
  }

  /** POST one command. Throws BridgeError for transport and protocol failures. */
  async send(command: string): Promise<CommandResponse> {
    const endpoint = `${this.url}${COMMAND_PATH}`;
    let text: string;
    let httpStatus: number;
    try {
      const res = await fetch(endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ command }),
        signal: AbortSignal.timeout(this.deadlineMs),
      });
      httpStatus = res.status;
      text = await res.text();
    } catch (err) {
      if (isTimeout(err)) {
        this.logger.warn({ endpoint, deadlineMs: this.deadlineMs }, 'host did not answer before the deadline');
        return timedOut(`No answer from the host add-in within ${this.deadlineMs} ms`);
      }
      throw new BridgeError('transport', `Cannot reach host add-in at ${this.url}: ${networkReason(err)}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      throw new BridgeError('protocol', `Host add-in sent a non-JSON reply (HTTP ${httpStatus})`);
    }
    const parsed = commandResponseSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at "${issue.path.join('.')}"` : '';
      throw new BridgeError(
        'protocol',
        `Host add-in reply is not a command response (HTTP ${httpStatus})${where}: ${issue?.message ?? 'invalid'}`,
      );
    }
    this.logger.debug({ status: parsed.data.status, httpStatus }, 'host replied');
    return parsed.data;
  }

  /** True when the add-in answers its health check. */
  async health(): Promise<boolean> {
    try {
      const res = await fetch(`${this.url}${HEALTH_PATH}`, { signal: AbortSignal.timeout(this.deadlineMs) });
      return healthResponseSchema.safeParse(await res.json()).success;
    } catch (err) {
      this.logger.debug({ reason: describeError(err) }, 'health check failed');
      return false;
    }
  }
}
