import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { type AddinHandle, DEFAULT_CONFIG, startAddin } from '@cad-relay/host-addin';
import { Bridge, BridgeError, HostClient, silentLogger } from '../src/lib.js';

function bridgeFor(url: string, encoding: 'structured' | 'legacy' = 'structured'): Bridge {
  const client = new HostClient({ url, requestTimeoutMs: 1000, graceMs: 500 }, silentLogger());
  return new Bridge(client, silentLogger(), { encoding });
}

// ─── Encoding (no host needed) ────────────────────────────────

describe('Bridge.encode', () => {
  const bridge = bridgeFor('http://127.0.0.1:9');

  it('encodes structured commands by default', () => {
    expect(bridge.encode('create_cube', { size: 10 })).toBe(
      '{"type":"create_cube","size":10,"plane":"xy","cx":0,"cy":0,"cz":0}',
    );
  });

  it('encodes legacy commands when configured', () => {
    const legacy = bridgeFor('http://127.0.0.1:9', 'legacy');
    expect(legacy.encode('create_cube', { size: 10 })).toBe('create_cube 10 none xy 0 0 0');
    expect(legacy.encode('get_state', {})).toBe('{"type":"get_state"}');
  });

  it('rejects unknown tools locally', () => {
    expect(() => bridge.encode('explode', {})).toThrow(BridgeError);
    try {
      bridge.encode('explode', {});
    } catch (err) {
      expect(err).toMatchObject({ kind: 'unknown_tool' });
      expect(String(err)).toContain('Unknown tool "explode". Available tools: [create_cube, ');
    }
  });

  it('rejects bad arguments locally', () => {
    expect(() => bridge.encode('create_cube', { size: -5 })).toThrow(
      'Argument "size" of create_cube must be positive, got -5',
    );
    expect(() => bridge.encode('create_cube', {})).toThrow('Missing required argument "size" for create_cube');
  });
});

// ─── Calls against an in-process host add-in ─────────────────

describe('Bridge.call', () => {
  let addin: AddinHandle;
  let bridge: Bridge;

  beforeAll(async () => {
    addin = await startAddin({ ...DEFAULT_CONFIG, port: 0 });
    bridge = bridgeFor(addin.url, 'legacy');
  });

  afterAll(async () => {
    await addin.stop();
  });

  it('returns the host message and data as text', async () => {
    const result = await bridge.call('create_cube', { size: 10, name: 'part' });
    expect(result.isError).toBeUndefined();
    expect(result.content[0]).toMatchObject({ type: 'text' });
    const first = result.content[0];
    const body = first && first.type === 'text' ? first.text : '';
    expect(body.split('\n')[0]).toBe('Created cube "part" (size 10 mm) on xy at (0, 0, 0) mm');
    expect(body).toContain('"size": [\n');
  });

  it('marks host errors', async () => {
    const result = await bridge.call('combine_by_name', { target_body: 'part', tool_body: 'ghost', operation: 'cut' });
    expect(result).toEqual({
      content: [{ type: 'text', text: 'Host error: Body "ghost" not found. Available bodies: [part]' }],
      isError: true,
    });
  });

  it('marks local validation failures without calling the host', async () => {
    const before = addin.context.document.undoDepth;
    const result = await bridge.call('create_sphere', { radius: 'big' });
    expect(result).toEqual({
      content: [{ type: 'text', text: 'Argument "radius" of create_sphere must be a finite number, got "big"' }],
      isError: true,
    });
    expect(addin.context.document.undoDepth).toBe(before);
  });
});

describe('Bridge.call with a busy host', () => {
  it('marks a host timeout', async () => {
    const addin = await startAddin({ ...DEFAULT_CONFIG, port: 0, requestTimeoutMs: 100 });
    let release = (): void => {};
    const modal = addin.context.loop.runHostTask('modal dialog', () => new Promise<void>((resolve) => {
      release = resolve;
    }));
    try {
      const result = await bridgeFor(addin.url).call('undo');
      expect(result).toEqual({
        content: [{ type: 'text', text: 'Host timeout: Host did not answer within 100 ms; the command may still run.' }],
        isError: true,
      });
    } finally {
      release();
      await modal;
      await addin.stop();
    }
  });
});

describe('Bridge.call without a host', () => {
  it('reports the transport failure instead of throwing', async () => {
    const gone = await startAddin({ ...DEFAULT_CONFIG, port: 0 });
    const url = gone.url;
    await gone.stop();

    const result = await bridgeFor(url).call('undo');
    expect(result.isError).toBe(true);
    const first = result.content[0];
    expect(first && first.type === 'text' ? first.text : '').toMatch(/^Cannot reach host add-in at http:\/\/127\.0\.0\.1:\d+: /);
  });
});
