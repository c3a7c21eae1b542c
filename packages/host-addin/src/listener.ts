/**
 * HTTP transport listener.
 *
 *   POST /mcp/command → 200 with the host's response, or its timeout
 *   GET  /health      → 200 { status: "ok" }
 *
 * Runs off the main thread: it only opens mailbox slots and posts the
 * dispatch signal, and never touches the document.
 */

import * as http from 'node:http';
import type { AddressInfo } from 'node:net';
import { randomUUID } from 'node:crypto';
import {
  COMMAND_PATH, HEALTH_PATH, type CommandResponse,
  commandRequestSchema, describeError, failure,
} from '@cad-relay/protocol';
import type { AddinContext } from './context.js';

export const MAX_BODY_BYTES = 1024 * 1024;

/** How long close() lets pending replies finish before cutting connections. */
export const CLOSE_GRACE_MS = 2000;

class HttpError extends Error {
  constructor(readonly statusCode: number, message: string) {
    super(message);
    this.name = 'HttpError';
  }
}

export interface CommandListener {
  readonly url: string;
  /** Requests currently waiting on the host. */
  readonly inFlight: number;
  close(): Promise<void>;
}

export async function startListener(ctx: AddinContext): Promise<CommandListener> {
  const { config } = ctx;
  const log = ctx.logger.child({ component: 'listener' });
  let inFlight = 0;
  const openResponses = new Set<http.ServerResponse>();
  const drainWaiters: Array<() => void> = [];

  function track(res: http.ServerResponse): void {
    openResponses.add(res);
    res.once('close', () => {
      openResponses.delete(res);
      if (openResponses.size === 0) for (const done of drainWaiters.splice(0)) done();
    });
  }

  /** Resolves once every response has been written, or after `graceMs`. */
  function drained(graceMs: number): Promise<void> {
    if (openResponses.size === 0) return Promise.resolve();
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        log.warn({ pending: openResponses.size }, 'closing with replies still pending');
        resolve();
      }, graceMs);
      drainWaiters.push(() => {
        clearTimeout(timer);
        resolve();
      });
    });
  }

  function send(res: http.ServerResponse, statusCode: number, body: CommandResponse | { status: 'ok' }): void {
    res.writeHead(statusCode, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(body));
  }

  async function handleCommand(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const text = await readBody(req);
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      throw new HttpError(400, `Malformed JSON body: ${describeError(err)}`);
    }
    const parsed = commandRequestSchema.safeParse(json);
    if (!parsed.success) {
      throw new HttpError(400, parsed.error.issues[0]?.message ?? 'Invalid request body');
    }
    if (inFlight >= config.maxInFlight) {
      throw new HttpError(503, `Host add-in busy: ${config.maxInFlight} requests already in flight. Retry later.`);
    }

    const requestId = randomUUID();
    const started = Date.now();
    inFlight += 1;
    try {
      const answer = ctx.mailbox.open(requestId, config.requestTimeoutMs);
      try {
        ctx.signal.post({ requestId, command: parsed.data.command });
      } catch (err) {
        ctx.mailbox.discard(requestId);
        throw new HttpError(500, `Host add-in cannot take commands: ${describeError(err)}`);
      }
      const response = await answer;
      log.info({ requestId, status: response.status, ms: Date.now() - started }, 'command answered');
      send(res, 200, response);
    } finally {
      inFlight -= 1;
    }
  }

  async function route(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const path = new URL(req.url ?? '/', 'http://localhost').pathname;
    if (path === HEALTH_PATH && req.method === 'GET') {
      send(res, 200, { status: 'ok' });
      return;
    }
    if (path === COMMAND_PATH && req.method === 'POST') {
      await handleCommand(req, res);
      return;
    }
    send(res, 404, failure(`No route for ${req.method ?? 'GET'} ${path}`));
  }

  const server = http.createServer((req, res) => {
    track(res);
    route(req, res).catch((err: unknown) => {
      const statusCode = err instanceof HttpError ? err.statusCode : 500;
      if (statusCode >= 500) log.error({ err }, 'request failed');
      else log.debug({ statusCode, reason: describeError(err) }, 'request rejected');
      if (!res.headersSent) send(res, statusCode, failure(describeError(err)));
    });
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(config.port, config.host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const url = `http://${formatHost(config.host)}:${boundPort(server)}`;
  log.info({ url }, 'listening');

  return {
    url,
    get inFlight() {
      return inFlight;
    },
    async close() {
      const closed = new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
      server.closeIdleConnections();
      await drained(CLOSE_GRACE_MS);
      server.closeAllConnections();
      await closed;
    },
  };
}

// ─── Utility ──────────────────────────────────────────────────

function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let tooLarge = false;
    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) tooLarge = true;
      if (!tooLarge) chunks.push(chunk);
    });
    req.on('end', () => {
      if (tooLarge) reject(new HttpError(413, `Request body exceeds ${MAX_BODY_BYTES} bytes`));
      else resolve(Buffer.concat(chunks).toString('utf8'));
    });
    req.on('error', reject);
  });
}

function boundPort(server: http.Server): number {
  const address: AddressInfo | string | null = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Listener has no TCP address');
  }
  return address.port;
}

function formatHost(host: string): string {
  return host.includes(':') ? `[${host}]` : host;
}
