/**
 * Dispatch signal: the host's "custom event" primitive.
 *
 * post() is callable from anywhere (the HTTP listener in practice), never
 * blocks, and schedules the registered callback onto the main loop. The
 * payload travels untouched.
 */

import type { HostMainLoop } from './main-loop.js';

export const COMMAND_SIGNAL_ID = 'cadRelay.commandAvailable';

export interface CommandEvent {
  readonly requestId: string;
  /** Opaque wire text; decoding happens on the main thread. */
  readonly command: string;
}

export class SignalNotRegisteredError extends Error {
  constructor(id: string) {
    super(`Dispatch signal "${id}" is not registered`);
    this.name = 'SignalNotRegisteredError';
  }
}

export class DispatchSignal<T> {
  private callback: ((payload: T) => void) | null = null;

  constructor(
    readonly id: string,
    private readonly loop: HostMainLoop,
  ) {}

  get isRegistered(): boolean {
    return this.callback !== null;
  }

  register(callback: (payload: T) => void): void {
    if (this.callback !== null) {
      throw new Error(`Dispatch signal "${this.id}" already has a handler`);
    }
    this.callback = callback;
  }

  unregister(): void {
    this.callback = null;
  }

  /** Schedule exactly one callback run with `payload`. */
  post(payload: T): void {
    const callback = this.callback;
    if (callback === null) throw new SignalNotRegisteredError(this.id);
    this.loop.post(this.id, () => callback(payload));
  }
}
