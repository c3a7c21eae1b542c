import { describe, it, expect } from 'vitest';
import {
  DispatchSignal, HostMainLoop, LoopStoppedError, SignalNotRegisteredError, silentLogger,
} from '../src/index.js';

function gate(): { wait: Promise<void>; open: () => void } {
  let open = (): void => {};
  const wait = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { wait, open };
}

// ─── Main loop ────────────────────────────────────────────────

describe('HostMainLoop', () => {
  it('runs items one at a time in arrival order', async () => {
    const loop = new HostMainLoop(silentLogger());
    const order: string[] = [];
    const first = loop.runHostTask('first', async () => {
      order.push('first:start');
      await new Promise((resolve) => setTimeout(resolve, 10));
      order.push('first:end');
    });
    loop.post('second', () => order.push('second'));
    const third = loop.runHostTask('third', () => order.push('third'));
    await Promise.all([first, third]);
    expect(order).toEqual(['first:start', 'first:end', 'second', 'third']);
  });

  it('counts as main thread only inside a loop item', async () => {
    const loop = new HostMainLoop(silentLogger());
    expect(loop.isMainThread()).toBe(false);
    expect(await loop.runHostTask('check', () => loop.isMainThread())).toBe(true);
    expect(() => loop.assertMainThread('Editing')).toThrow('Editing must run on the host main thread');
  });

  it('does not count a timer that fires after its item finished', async () => {
    const loop = new HostMainLoop(silentLogger());
    const late = new Promise<boolean>((resolve) => {
      loop.post('schedule', () => {
        setTimeout(() => resolve(loop.isMainThread()), 10);
      });
    });
    await loop.whenIdle();
    expect(await late).toBe(false);
  });

  it('does not lend an old item its standing while a later item runs', async () => {
    const loop = new HostMainLoop(silentLogger());
    const modal = gate();
    const seen: boolean[] = [];
    loop.post('schedule', () => {
      setTimeout(() => seen.push(loop.isMainThread()), 10);
    });
    const busy = loop.runHostTask('modal dialog', async () => {
      await modal.wait;
      return loop.isMainThread();
    });
    await new Promise((resolve) => setTimeout(resolve, 30));
    expect(loop.running).toBe('modal dialog');
    modal.open();
    expect(await busy).toBe(true);
    expect(seen).toEqual([false]);
  });

  it('holds notifications back while a host task is busy', async () => {
    const loop = new HostMainLoop(silentLogger());
    const modal = gate();
    const seen: string[] = [];
    const task = loop.runHostTask('modal dialog', () => modal.wait);
    loop.post('notify', () => seen.push('notified'));

    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(seen).toEqual([]);
    expect(loop.running).toBe('modal dialog');
    expect(loop.backlog).toBe(2);

    modal.open();
    await task;
    await loop.whenIdle();
    expect(seen).toEqual(['notified']);
    expect(loop.backlog).toBe(0);
  });

  it('passes host task results and failures back to the caller', async () => {
    const loop = new HostMainLoop(silentLogger());
    await expect(loop.runHostTask('value', () => 42)).resolves.toBe(42);
    await expect(loop.runHostTask('boom', () => {
      throw new Error('dialog crashed');
    })).rejects.toThrow('dialog crashed');
  });

  it('keeps running after a notification throws', async () => {
    const loop = new HostMainLoop(silentLogger());
    loop.post('bad', () => {
      throw new Error('callback failed');
    });
    await expect(loop.runHostTask('after', () => 'still alive')).resolves.toBe('still alive');
  });

  it('cancels queued work on stop', async () => {
    const loop = new HostMainLoop(silentLogger());
    const modal = gate();
    const running = loop.runHostTask('running', () => modal.wait);
    const queued = loop.runHostTask('queued', () => 'never');
    await new Promise((resolve) => setTimeout(resolve, 5));
    loop.stop();
    await expect(queued).rejects.toBeInstanceOf(LoopStoppedError);
    await expect(loop.runHostTask('late', () => 1)).rejects.toThrow('Host main loop stopped before "late" ran');
    modal.open();
    await expect(running).resolves.toBeUndefined();
  });
});

// ─── Dispatch signal ──────────────────────────────────────────

describe('DispatchSignal', () => {
  it('runs the callback once per post, on the main thread, with the payload', async () => {
    const loop = new HostMainLoop(silentLogger());
    const signal = new DispatchSignal<{ n: number }>('test.signal', loop);
    const seen: Array<{ n: number; main: boolean }> = [];
    signal.register((payload) => seen.push({ n: payload.n, main: loop.isMainThread() }));

    signal.post({ n: 1 });
    signal.post({ n: 2 });
    expect(seen).toEqual([]);
    await loop.whenIdle();
    expect(seen).toEqual([{ n: 1, main: true }, { n: 2, main: true }]);
  });

  it('refuses posts before registration', () => {
    const signal = new DispatchSignal<string>('test.signal', new HostMainLoop(silentLogger()));
    expect(() => signal.post('x')).toThrow(SignalNotRegisteredError);
    expect(() => signal.post('x')).toThrow('Dispatch signal "test.signal" is not registered');
  });

  it('allows a single registration until unregistered', () => {
    const signal = new DispatchSignal<string>('test.signal', new HostMainLoop(silentLogger()));
    signal.register(() => {});
    expect(() => signal.register(() => {})).toThrow('Dispatch signal "test.signal" already has a handler');
    signal.unregister();
    expect(signal.isRegistered).toBe(false);
    signal.register(() => {});
    expect(signal.isRegistered).toBe(true);
  });
});
