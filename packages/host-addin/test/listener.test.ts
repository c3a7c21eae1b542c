import { describe, it, expect, afterEach, vi } from 'vitest';
import { COMMAND_PATH, HEALTH_PATH } from '@cad-relay/protocol';
import { type AddinConfig, type AddinHandle, DEFAULT_CONFIG, MAX_BODY_BYTES, startAddin } from '../src/index.js';

const handles: AddinHandle[] = [];

async function start(config: Partial<AddinConfig> = {}): Promise<AddinHandle> {
  const handle = await startAddin({ ...DEFAULT_CONFIG, port: 0, requestTimeoutMs: 2000, ...config });
  handles.push(handle);
  return handle;
}

afterEach(async () => {
  await Promise.all(handles.splice(0).map((h) => h.stop()));
});

async function post(handle: AddinHandle, body: string): Promise<{ status: number; json: unknown }> {
  const res = await fetch(`${handle.url}${COMMAND_PATH}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body,
  });
  return { status: res.status, json: await res.json() };
}

function command(handle: AddinHandle, text: string): Promise<{ status: number; json: unknown }> {
  return post(handle, JSON.stringify({ command: text }));
}

/** Occupy the main loop with a host task until the returned function is called. */
function blockLoop(handle: AddinHandle): () => void {
  let release = (): void => {};
  const held = new Promise<void>((resolve) => {
    release = resolve;
  });
  void handle.context.loop.runHostTask('modal dialog', () => held);
  return release;
}

// ─── Routes ───────────────────────────────────────────────────

describe('listener routes', () => {
  it('answers the health check', async () => {
    const handle = await start();
    const res = await fetch(`${handle.url}${HEALTH_PATH}`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok' });
  });

  it('returns 404 for unknown paths', async () => {
    const handle = await start();
    const res = await fetch(`${handle.url}/nope`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ status: 'error', message: 'No route for GET /nope' });
  });

  it('rejects a malformed body without reaching the host', async () => {
    const handle = await start();
    const res = await post(handle, '{not json');
    expect(res.status).toBe(400);
    expect(res.json).toMatchObject({ status: 'error' });
    expect(handle.context.document.bodyCount).toBe(0);
  });

  it('names a missing command field', async () => {
    const handle = await start();
    const res = await post(handle, '{"cmd":"undo"}');
    expect(res).toEqual({ status: 400, json: { status: 'error', message: 'Request body needs a "command" field' } });
  });

  it('rejects oversized bodies', async () => {
    const handle = await start();
    const res = await post(handle, JSON.stringify({ command: 'x'.repeat(MAX_BODY_BYTES) }));
    expect(res).toEqual({
      status: 413,
      json: { status: 'error', message: `Request body exceeds ${MAX_BODY_BYTES} bytes` },
    });
  });

  it('answers 500 once the signal is gone', async () => {
    const handle = await start();
    handle.context.signal.unregister();
    const res = await command(handle, 'undo');
    expect(res).toEqual({
      status: 500,
      json: {
        status: 'error',
        message: 'Host add-in cannot take commands: Dispatch signal "cadRelay.commandAvailable" is not registered',
      },
    });
    expect(handle.context.mailbox.pending).toBe(0);
  });
});

// ─── Command round trips ──────────────────────────────────────

describe('command round trips', () => {
  it('creates a cube end to end', async () => {
    const handle = await start();
    const res = await command(handle, 'create_cube 10 none xy 0 0 0');
    expect(res.status).toBe(200);
    expect(res.json).toMatchObject({
      status: 'success',
      message: 'Created cube "Body1" (size 10 mm) on xy at (0, 0, 0) mm',
    });
  });

  it('reports handler failures as 200 with an error status', async () => {
    const handle = await start();
    const res = await command(handle, 'combine_selection join');
    expect(res).toEqual({
      status: 200,
      json: {
        status: 'error',
        message: 'Combine needs exactly two selected bodies (target, tool); 0 selected. Use select_bodies first.',
      },
    });
  });

  it('never swaps responses between concurrent requests', async () => {
    const handle = await start();
    const names = ['alpha', 'beta', 'gamma', 'delta'];
    const results = await Promise.all(names.map((n) => command(handle, `create_cube 10 ${n}`)));
    results.forEach((res, i) => {
      expect(res.json).toMatchObject({
        status: 'success',
        message: `Created cube "${names[i]}" (size 10 mm) on xy at (0, 0, 0) mm`,
      });
    });
  });

  it('times out while the main loop is blocked, then recovers', async () => {
    const handle = await start({ requestTimeoutMs: 100 });
    const release = blockLoop(handle);

    const started = Date.now();
    const slow = await command(handle, 'create_cube 10 late');
    expect(Date.now() - started).toBeLessThan(1500);
    expect(slow).toEqual({
      status: 200,
      json: { status: 'timeout', message: 'Host did not answer within 100 ms; the command may still run.' },
    });

    release();
    await handle.context.loop.whenIdle();
    // The timed-out command still ran; its answer had nobody to go to.
    expect(handle.context.document.hasBody('late')).toBe(true);
    expect(handle.context.mailbox.lostResponses).toBe(1);

    const next = await command(handle, 'create_cube 10 fresh');
    expect(next.json).toMatchObject({ status: 'success', message: 'Created cube "fresh" (size 10 mm) on xy at (0, 0, 0) mm' });
  });

  it('answers a waiting request when the add-in stops', async () => {
    const handle = await start();
    const release = blockLoop(handle);

    const waiting = command(handle, 'create_cube 10 unsent');
    await vi.waitFor(() => expect(handle.context.mailbox.pending).toBe(1));
    await handle.stop();

    expect(await waiting).toEqual({ status: 200, json: { status: 'error', message: 'host add-in stopped' } });
    release();
    await handle.context.loop.whenIdle();
    expect(handle.context.document.hasBody('unsent')).toBe(false);
  });

  it('refuses requests beyond the in-flight limit', async () => {
    const handle = await start({ maxInFlight: 1 });
    const release = blockLoop(handle);

    const first = command(handle, 'create_cube 10');
    await vi.waitFor(() => expect(handle.context.mailbox.pending).toBe(1));
    const second = await command(handle, 'create_cube 10');
    expect(second).toEqual({
      status: 503,
      json: { status: 'error', message: 'Host add-in busy: 1 requests already in flight. Retry later.' },
    });

    release();
    expect((await first).json).toMatchObject({ status: 'success' });
  });
});
