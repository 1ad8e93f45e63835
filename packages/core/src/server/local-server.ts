/**
 * Local HTTP server wrapper for Node.js
 *
 * Bridges Node.js `http.createServer` to `AppServer.fetch(request)`, and
 * hands HTTP upgrade requests (WebSocket handshakes) to an optional hook.
 *
 * @internal
 */

import {
  createServer,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from 'node:http';
import type { Duplex } from 'node:stream';
import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type { AppServer } from './app-server.js';
import type { Logger } from '../types/public-api.js';
import { describeError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

export type UpgradeHandler = (req: IncomingMessage, socket: Duplex, head: Buffer) => void;

export interface LocalServerOptions {
  port?: number;
  host?: string;
  logger?: Logger;
  /** Called for `Upgrade:` requests; without it they are refused */
  onUpgrade?: UpgradeHandler;
}

export interface LocalServerHandle {
  port: number;
  server: Server;
  /** Resolves once the server is accepting connections */
  listening: Promise<void>;
  close: () => Promise<void>;
}

/**
 * Start a local HTTP server that forwards requests to an AppServer.
 *
 * @example
 * ```typescript
 * const handle = startLocalServer(server, { port: 3000 });
 * await handle.listening;
 * ```
 */
export function startLocalServer(
  app: AppServer,
  options?: LocalServerOptions
): LocalServerHandle {
  const port = options?.port ?? 3000;
  const host = options?.host ?? '127.0.0.1';
  const logger = options?.logger ?? createLogger('server');

  const httpServer = createServer((req: IncomingMessage, res: ServerResponse) => {
    handleNodeRequest(app, req, res, port).catch((err: unknown) => {
      logger.error('Request error:', describeError(err));
      if (!res.headersSent) {
        res.writeHead(500, { 'Content-Type': 'text/plain' });
      }
      res.end('Internal Server Error');
    });
  });

  httpServer.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
    if (options?.onUpgrade) {
      options.onUpgrade(req, socket, head);
    } else {
      socket.destroy();
    }
  });

  const listening = new Promise<void>((resolveListening, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(port, host, () => {
      httpServer.off('error', reject);
      logger.info(`Local server running at http://${host}:${port}`);
      resolveListening();
    });
  });

  return {
    port,
    server: httpServer,
    listening,
    close: () =>
      new Promise<void>((resolveClose, reject) => {
        httpServer.close(err => (err ? reject(err) : resolveClose()));
      }),
  };
}

async function handleNodeRequest(
  app: AppServer,
  req: IncomingMessage,
  res: ServerResponse,
  port: number
): Promise<void> {
  const request = await nodeToWebRequest(req, port);
  const response = await app.fetch(request);
  await webToNodeResponse(response, res);
}

/**
 * Convert Node.js IncomingMessage to Web API Request.
 */
async function nodeToWebRequest(req: IncomingMessage, port: number): Promise<Request> {
  const url = `http://localhost:${port}${req.url ?? '/'}`;
  const headers = new Headers();
  for (const [key, val] of Object.entries(req.headers)) {
    if (val) {
      headers.set(key, Array.isArray(val) ? val.join(', ') : val);
    }
  }

  const method = (req.method ?? 'GET').toUpperCase();
  const hasBody = method !== 'GET' && method !== 'HEAD';

  return new Request(url, {
    method,
    headers,
    body: hasBody ? await readBody(req) : undefined,
  });
}

/**
 * Buffer a request body. Simulator payloads are small JSON documents.
 */
async function readBody(req: IncomingMessage): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
}

/**
 * Write a Web API Response to a Node.js ServerResponse.
 */
async function webToNodeResponse(response: Response, res: ServerResponse): Promise<void> {
  res.writeHead(response.status, Object.fromEntries(response.headers.entries()));
  if (response.body) {
    const reader = response.body.getReader();
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      res.write(value);
    }
  }
  res.end();
}

/**
 * Load environment variables from `.dev.vars` then `.env` files.
 * Later files do NOT override earlier ones (`.dev.vars` takes priority).
 * Missing files are skipped. Returns a flat record of key-value pairs.
 */
export function loadEnvFile(...paths: string[]): Record<string, string> {
  const defaultPaths = paths.length > 0 ? paths : ['.dev.vars', '.env'];
  const env: Record<string, string> = {};

  for (const p of defaultPaths) {
    const file = resolve(p);
    if (!existsSync(file)) continue;

    const content = readFileSync(file, 'utf-8');
    for (const line of content.split('\n')) {
      const trimmed = line.trim();
      if (!trimmed || trimmed.startsWith('#')) continue;
      const eqIdx = trimmed.indexOf('=');
      if (eqIdx === -1) continue;
      const key = trimmed.slice(0, eqIdx).trim();
      let value = trimmed.slice(eqIdx + 1).trim();
      // Strip surrounding quotes
      if ((value.startsWith('"') && value.endsWith('"')) ||
          (value.startsWith("'") && value.endsWith("'"))) {
        value = value.slice(1, -1);
      }
      // First file wins
      if (!(key in env)) {
        env[key] = value;
      }
    }
  }

  return env;
}
