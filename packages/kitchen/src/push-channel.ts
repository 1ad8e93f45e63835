/**
 * Push channel
 *
 * WebSocket endpoint sharing the HTTP server. Each socket is registered as a
 * broadcaster observer; a socket that closes, errors or falls too far behind
 * is dropped by the broadcaster.
 */

import type { IncomingMessage } from 'node:http';
import type { Duplex } from 'node:stream';
import { WebSocketServer, type RawData, type WebSocket } from 'ws';
import { createLogger, describeError, type Logger } from '@kitchen-sim/core';
import type { UpgradeHandler } from '@kitchen-sim/core/node';
import type { Observer, UpdateBroadcaster } from './broadcaster.js';
import type { BroadcastEvent } from './events.js';

/** `WebSocket.OPEN` */
const OPEN = 1;

export const DEFAULT_MAX_BUFFERED_BYTES = 1024 * 1024;
export const WELCOME_MESSAGE = 'Connected to Smart Kitchen Simulator';

/**
 * The part of a WebSocket an observer writes to
 */
export interface SocketLike {
  readonly readyState: number;
  readonly bufferedAmount: number;
  send(data: string): void;
  close(): void;
}

/**
 * Wrap a socket as an observer. Delivery throws when the socket is no longer
 * open or its send buffer is past `maxBufferedBytes`, which makes the
 * broadcaster drop it.
 */
export function socketObserver(id: string, socket: SocketLike, maxBufferedBytes: number): Observer {
  return {
    id,
    deliver(event: BroadcastEvent) {
      if (socket.readyState !== OPEN) {
        throw new Error('Socket is not open');
      }
      if (socket.bufferedAmount > maxBufferedBytes) {
        throw new Error(`Send buffer over ${maxBufferedBytes} bytes`);
      }
      socket.send(JSON.stringify(event));
    },
    close() {
      socket.close();
    },
  };
}

export function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8');
  if (Buffer.isBuffer(data)) return data.toString('utf-8');
  return Buffer.from(data).toString('utf-8');
}

export interface PushChannelOptions {
  broadcaster: UpdateBroadcaster;
  /** Upgrade path (default: /ws) */
  path?: string;
  maxBufferedBytes?: number;
  logger?: Logger;
}

export class PushChannel {
  private readonly wss = new WebSocketServer({ noServer: true });
  private readonly broadcaster: UpdateBroadcaster;
  private readonly path: string;
  private readonly maxBufferedBytes: number;
  private readonly logger: Logger;
  private sequence = 0;

  constructor(options: PushChannelOptions) {
    this.broadcaster = options.broadcaster;
    this.path = options.path ?? '/ws';
    this.maxBufferedBytes = options.maxBufferedBytes ?? DEFAULT_MAX_BUFFERED_BYTES;
    this.logger = options.logger ?? createLogger('push');
  }

  /**
   * Upgrade hook for `startLocalServer`. Other paths are refused.
   */
  readonly handleUpgrade: UpgradeHandler = (req: IncomingMessage, socket: Duplex, head: Buffer) => {
    const pathname = new URL(req.url ?? '/', 'http://localhost').pathname;
    if (pathname !== this.path) {
      this.logger.warn(`Refused upgrade on ${pathname}`);
      socket.destroy();
      return;
    }
    this.wss.handleUpgrade(req, socket, head, client => this.accept(client));
  };

  private accept(socket: WebSocket): void {
    const id = `observer_${++this.sequence}`;
    const observer = socketObserver(id, socket, this.maxBufferedBytes);
    const subscription = this.broadcaster.subscribe(observer);
    this.logger.info(`Push connection opened: ${id}`);

    this.broadcaster.deliverTo(
      observer,
      this.broadcaster.createEvent('connection_established', { message: WELCOME_MESSAGE })
    );

    socket.on('message', (data: RawData) => this.handleMessage(id, data));
    socket.on('close', () => {
      subscription.unsubscribe();
      this.logger.info(`Push connection closed: ${id}`);
    });
    socket.on('error', (error: Error) => {
      this.logger.warn(`Push connection ${id} errored: ${error.message}`);
      subscription.unsubscribe();
    });
  }

  /**
   * Inbound messages carry no commands; they are only logged
   */
  private handleMessage(id: string, data: RawData): void {
    const text = rawDataToString(data);
    try {
      const parsed: unknown = JSON.parse(text);
      this.logger.debug(`Message from ${id}:`, parsed);
    } catch (error) {
      this.logger.warn(`Unparsable message from ${id}: ${describeError(error)}`);
    }
  }

  connectionCount(): number {
    return this.wss.clients.size;
  }

  /**
   * Terminate every socket and stop accepting upgrades
   */
  close(): Promise<void> {
    for (const client of this.wss.clients) {
      client.terminate();
    }
    return new Promise<void>((resolve, reject) => {
      this.wss.close(err => (err ? reject(err) : resolve()));
    });
  }
}
