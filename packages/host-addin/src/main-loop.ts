/**
 * HostMainLoop: the host application's single privileged thread.
 *
 * Work items run strictly one at a time, in arrival order. Host-owned tasks
 * (UI work, modal dialogs) may be asynchronous and occupy the loop until they
 * settle; dispatch-signal notifications are only serviced in between.
 *
 * "On the main thread" means "inside the running loop item": each item runs
 * within an AsyncLocalStorage context holding its own token, and the check
 * compares that token against the item the loop is running now. Code reached
 * from the HTTP listener never passes assertMainThread(), and neither does a
 * timer an item scheduled once that item has finished.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import type { Logger } from './logger.js';

export class MainThreadViolationError extends Error {
  constructor(action: string) {
    super(`${action} must run on the host main thread`);
    this.name = 'MainThreadViolationError';
  }
}

export class LoopStoppedError extends Error {
  constructor(label: string) {
    super(`Host main loop stopped before "${label}" ran`);
    this.name = 'LoopStoppedError';
  }
}

/** Identity of one loop item while it runs. */
interface ItemToken {
  readonly label: string;
}

interface WorkItem {
  label: string;
  execute: () => Promise<void>;
  cancel: (reason: Error) => void;
}

export class HostMainLoop {
  private readonly queue: WorkItem[] = [];
  private readonly context = new AsyncLocalStorage<ItemToken>();
  private readonly idleWaiters: Array<() => void> = [];
  private pumping = false;
  private stopped = false;
  private current: string | null = null;
  private active: ItemToken | null = null;

  constructor(private readonly logger: Logger) {}

  /** Items waiting, plus the one running. */
  get backlog(): number {
    return this.queue.length + (this.current !== null ? 1 : 0);
  }

  /** Label of the running item, if any. */
  get running(): string | null {
    return this.current;
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  isMainThread(): boolean {
    const token = this.context.getStore();
    return token !== undefined && token === this.active;
  }

  assertMainThread(action: string): void {
    if (!this.isMainThread()) throw new MainThreadViolationError(action);
  }

  /**
   * Queue host-owned work. The loop stays busy until `fn` settles, so a task
   * that awaits (a modal dialog) holds every queued notification back.
   */
  runHostTask<T>(label: string, fn: () => T | Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.enqueue({
        label,
        execute: async () => {
          try {
            resolve(await fn());
          } catch (err) {
            reject(err);
          }
        },
        cancel: reject,
      });
    });
  }

  /**
   * Queue a notification callback. Never blocks and never throws back at the
   * poster; a failing callback is logged.
   */
  post(label: string, callback: () => void): void {
    this.enqueue({
      label,
      execute: async () => {
        try {
          callback();
        } catch (err) {
          this.logger.error({ err, label }, 'main-thread callback threw');
        }
      },
      cancel: (reason) => {
        this.logger.warn({ label, reason: reason.message }, 'notification dropped');
      },
    });
  }

  /** Resolves once the queue is empty and nothing is running. */
  whenIdle(): Promise<void> {
    if (this.backlog === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /** Stop servicing work. Queued items are cancelled; a running one finishes. */
  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    const dropped = this.queue.splice(0);
    for (const item of dropped) item.cancel(new LoopStoppedError(item.label));
    if (this.current === null) this.notifyIdle();
  }

  // ─── Internals ──────────────────────────────────────────────

  private enqueue(item: WorkItem): void {
    if (this.stopped) {
      item.cancel(new LoopStoppedError(item.label));
      return;
    }
    this.queue.push(item);
    if (!this.pumping) {
      this.pumping = true;
      // Always asynchronous: posting never runs work on the poster's stack.
      setImmediate(() => {
        this.pump().catch((err: unknown) => {
          this.logger.error({ err }, 'main loop pump failed');
        });
      });
    }
  }

  private async pump(): Promise<void> {
    try {
      for (let item = this.queue.shift(); item; item = this.queue.shift()) {
        const token: ItemToken = { label: item.label };
        this.current = item.label;
        this.active = token;
        this.logger.trace({ label: item.label }, 'main loop item start');
        await this.context.run(token, item.execute);
        this.active = null;
        this.current = null;
      }
    } finally {
      this.active = null;
      this.current = null;
      this.pumping = false;
      this.notifyIdle();
    }
  }

  private notifyIdle(): void {
    if (this.backlog !== 0) return;
    for (const resolve of this.idleWaiters.splice(0)) resolve();
  }
}
