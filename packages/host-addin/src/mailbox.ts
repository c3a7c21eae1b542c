/**
 * Response mailbox, keyed by request id.
 *
 * A slot exists from open() until its delivery or its timeout, whichever
 * comes first. Anything delivered after that is a lost response: logged and
 * counted, never an error.
 */

import { type CommandResponse, failure, timedOut } from '@cad-relay/protocol';
import type { Logger } from './logger.js';

interface Slot {
  resolve: (response: CommandResponse) => void;
  timer: NodeJS.Timeout;
}

export class ResponseMailbox {
  private readonly slots = new Map<string, Slot>();
  private lost = 0;
  private closed = false;

  constructor(private readonly logger: Logger) {}

  /** Waiters not yet answered. */
  get pending(): number {
    return this.slots.size;
  }

  /** Deliveries that found no waiter. */
  get lostResponses(): number {
    return this.lost;
  }

  /** Wait for the response to `requestId`, or a timeout response. */
  open(requestId: string, timeoutMs: number): Promise<CommandResponse> {
    if (this.closed) return Promise.resolve(failure('host add-in stopped'));
    if (this.slots.has(requestId)) {
      throw new Error(`Mailbox slot "${requestId}" is already open`);
    }
    return new Promise<CommandResponse>((resolve) => {
      const timer = setTimeout(() => {
        this.slots.delete(requestId);
        this.logger.warn({ requestId, timeoutMs }, 'command timed out');
        resolve(timedOut(`Host did not answer within ${timeoutMs} ms; the command may still run.`));
      }, timeoutMs);
      this.slots.set(requestId, { resolve, timer });
    });
  }

  /** Hand a response to its waiter. Returns false when nobody is waiting. */
  deliver(requestId: string, response: CommandResponse): boolean {
    const slot = this.slots.get(requestId);
    if (!slot) {
      this.lost += 1;
      this.logger.warn({ requestId, status: response.status }, 'late response dropped');
      return false;
    }
    this.slots.delete(requestId);
    clearTimeout(slot.timer);
    slot.resolve(response);
    return true;
  }

  /** Forget a slot without answering it (request aborted before dispatch). */
  discard(requestId: string): void {
    const slot = this.slots.get(requestId);
    if (!slot) return;
    clearTimeout(slot.timer);
    this.slots.delete(requestId);
  }

  /** Answer every waiter with an error and refuse new slots. */
  close(reason = 'host add-in stopped'): void {
    this.closed = true;
    for (const [id, slot] of this.slots) {
      clearTimeout(slot.timer);
      slot.resolve(failure(reason));
      this.slots.delete(id);
    }
  }
}
