/**
 * Notification Stream
 *
 * Pushes every committed notification to connected WebSocket clients as
 * JSON. Clients that fell behind send
 *   { "type": "replay", "fromSequence": n }
 * and receive the entries from n onwards in batches.
 */

import * as http from 'http';
import WebSocket from 'ws';
import { NotificationLog } from '../notifications/notification-log';
import { Notification } from '../notifications/types';
import { MetricsCollector } from '../scaling/metrics';
import { StructuredLogger } from '../scaling/structured-logger';

export const REPLAY_BATCH = 500;
const KEEPALIVE_INTERVAL_MS = 30_000;
const STALE_AFTER_MS = 120_000;

/** The part of a WebSocket the stream uses. */
export interface StreamClient {
  readonly readyState: number;
  send(data: string): void;
}

export type StreamMessage =
  | { type: 'hello'; sequence: number; headHash: string }
  | { type: 'notification'; notification: Notification }
  | { type: 'replay'; notifications: Notification[]; sequence: number; hasMore: boolean }
  | { type: 'pong' }
  | { type: 'error'; error: string };

type ClientRequest = { type: 'replay'; fromSequence: number } | { type: 'ping' };

function stringify(message: StreamMessage): string {
  return JSON.stringify(message);
}

export function parseClientRequest(raw: string): ClientRequest | null {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return null;
  }
  if (typeof data !== 'object' || data === null) return null;

  const type = 'type' in data ? data.type : undefined;
  if (type === 'ping') return { type: 'ping' };
  if (type === 'replay') {
    const fromSequence = 'fromSequence' in data ? data.fromSequence : undefined;
    if (typeof fromSequence === 'number' && Number.isSafeInteger(fromSequence) && fromSequence >= 1) {
      return { type: 'replay', fromSequence };
    }
  }
  return null;
}

export interface NotificationStreamDeps {
  notifications: NotificationLog;
  logger: StructuredLogger;
  metrics?: MetricsCollector;
}

export class NotificationStream {
  private readonly clients = new Map<StreamClient, { lastSeen: number }>();
  private readonly unsubscribe: () => void;
  private wss?: WebSocket.Server;
  private keepAliveTimer?: NodeJS.Timeout;

  constructor(private readonly deps: NotificationStreamDeps) {
    this.unsubscribe = deps.notifications.subscribe((notification) => this.broadcast(notification));
  }

  get connectionCount(): number {
    return this.clients.size;
  }

  addClient(client: StreamClient): void {
    this.clients.set(client, { lastSeen: Date.now() });
    this.deps.metrics?.setGauge('ledger_ws_connections', this.clients.size);
    this.send(client, {
      type: 'hello',
      sequence: this.deps.notifications.sequence,
      headHash: this.deps.notifications.headHash,
    });
  }

  removeClient(client: StreamClient): void {
    this.clients.delete(client);
    this.deps.metrics?.setGauge('ledger_ws_connections', this.clients.size);
  }

  handleMessage(client: StreamClient, raw: string): void {
    const meta = this.clients.get(client);
    if (meta) meta.lastSeen = Date.now();

    const request = parseClientRequest(raw);
    if (!request) {
      this.send(client, { type: 'error', error: 'Unrecognised message' });
      return;
    }

    if (request.type === 'ping') {
      this.send(client, { type: 'pong' });
      return;
    }

    const notifications = this.deps.notifications.since(request.fromSequence - 1, REPLAY_BATCH);
    const last = notifications.length ? notifications[notifications.length - 1].sequence : request.fromSequence - 1;
    this.send(client, {
      type: 'replay',
      notifications,
      sequence: this.deps.notifications.sequence,
      hasMore: last < this.deps.notifications.sequence,
    });
  }

  /** Serve the stream on an existing HTTP server. */
  attach(server: http.Server): void {
    this.wss = new WebSocket.Server({ server });

    this.wss.on('connection', (ws: WebSocket) => {
      this.addClient(ws);

      ws.on('pong', () => {
        const meta = this.clients.get(ws);
        if (meta) meta.lastSeen = Date.now();
      });
      ws.on('message', (data: WebSocket.RawData) => this.handleMessage(ws, data.toString()));
      ws.on('close', () => this.removeClient(ws));
      ws.on('error', (error: Error) => {
        this.deps.logger.warn('stream', 'Client error', { error: error.message });
      });
    });

    this.keepAliveTimer = setInterval(() => this.sweep(), KEEPALIVE_INTERVAL_MS);
    this.keepAliveTimer.unref();
  }

  close(): Promise<void> {
    this.unsubscribe();
    if (this.keepAliveTimer) clearInterval(this.keepAliveTimer);
    this.clients.clear();

    const wss = this.wss;
    if (!wss) return Promise.resolve();
    for (const ws of wss.clients) ws.terminate();
    return new Promise((resolve, reject) => {
      wss.close((error) => (error ? reject(error) : resolve()));
    });
  }

  private broadcast(notification: Notification): void {
    const payload = stringify({ type: 'notification', notification });
    for (const client of this.clients.keys()) {
      if (client.readyState === WebSocket.OPEN) client.send(payload);
    }
  }

  private send(client: StreamClient, message: StreamMessage): void {
    if (client.readyState === WebSocket.OPEN) client.send(stringify(message));
  }

  private sweep(): void {
    if (!this.wss) return;
    const now = Date.now();

    for (const ws of this.wss.clients) {
      const meta = this.clients.get(ws);
      if (!meta || now - meta.lastSeen > STALE_AFTER_MS) {
        this.removeClient(ws);
        ws.terminate();
        continue;
      }
      if (ws.readyState === WebSocket.OPEN) ws.ping();
    }
  }
}
