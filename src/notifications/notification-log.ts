/**
 * Notification Log
 *
 * Append-only, hash-chained record of every committed state transition.
 * Indexers subscribe to it (in process or through the WebSocket stream)
 * and can verify they saw an unbroken, untampered sequence.
 *
 * With a data directory, entries are appended to notifications.jsonl and
 * the head (sequence + hash) is kept in an atomically written state file.
 */

import { EventEmitter } from 'events';
import * as fs from 'fs';
import * as path from 'path';
import { sha256 } from '../crypto';
import { canonicalCborEncode } from '../crypto/canonical-cbor';
import { AtomicStorage } from '../storage/atomic-storage';
import { MetricsCollector } from '../scaling/metrics';
import { logger as defaultLogger, StructuredLogger } from '../scaling/structured-logger';
import {
  Notification,
  NotificationLogState,
  NotificationType,
  PendingNotification,
} from './types';

const HASH_DOMAIN = Buffer.from('LEDGER_NOTIFY_V1', 'utf8');
const HASH_DELIMITER = Buffer.from([0x00]);
const LOG_FILE = 'notifications.jsonl';
const STATE_FILE = 'notification-log-state.json';
const GENESIS_HASH = '';

export type NotificationListener = (notification: Notification) => void;

export interface NotificationLogOptions {
  dataDir?: string;
  logger?: StructuredLogger;
  metrics?: MetricsCollector;
}

export interface ChainVerification {
  valid: boolean;
  checked: number;
  brokenAt?: number;
  reason?: string;
}

const NOTIFICATION_TYPES = new Set<string>(Object.values(NotificationType));

function isLogState(value: unknown): value is NotificationLogState {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'headHash' in value &&
    typeof value.headHash === 'string' &&
    'sequence' in value &&
    typeof value.sequence === 'number'
  );
}

function isNotificationShape(value: unknown): value is Notification {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'sequence' in value &&
    typeof value.sequence === 'number' &&
    'type' in value &&
    typeof value.type === 'string' &&
    NOTIFICATION_TYPES.has(value.type) &&
    'payload' in value &&
    typeof value.payload === 'object' &&
    'timestamp' in value &&
    typeof value.timestamp === 'number' &&
    'prevHash' in value &&
    typeof value.prevHash === 'string' &&
    'hash' in value &&
    typeof value.hash === 'string'
  );
}

/**
 * hash = SHA-256(domain ‖ 0x00 ‖ canonicalCBOR({sequence, type, payload, timestamp, prevHash}))
 */
export function hashNotification(entry: Omit<Notification, 'hash'>): string {
  const canonical = canonicalCborEncode({
    sequence: entry.sequence,
    type: entry.type,
    payload: entry.payload,
    timestamp: entry.timestamp,
    prevHash: entry.prevHash,
  });
  return sha256(Buffer.concat([HASH_DOMAIN, HASH_DELIMITER, canonical]));
}

export class NotificationLog {
  private readonly entries: Notification[] = [];
  private readonly emitter = new EventEmitter();
  private readonly storage: AtomicStorage;
  private readonly log: StructuredLogger;
  private readonly metrics?: MetricsCollector;
  private readonly logFile?: string;
  private readonly stateFile?: string;

  constructor(opts: NotificationLogOptions = {}) {
    this.log = opts.logger ?? defaultLogger;
    this.metrics = opts.metrics;
    this.storage = new AtomicStorage(this.log);
    this.emitter.setMaxListeners(0);

    if (opts.dataDir) {
      fs.mkdirSync(opts.dataDir, { recursive: true });
      this.storage.cleanupTempFiles(opts.dataDir);
      this.logFile = path.join(opts.dataDir, LOG_FILE);
      this.stateFile = path.join(opts.dataDir, STATE_FILE);
      this.load();
    }
  }

  get headHash(): string {
    return this.entries.length ? this.entries[this.entries.length - 1].hash : GENESIS_HASH;
  }

  get sequence(): number {
    return this.entries.length;
  }

  /**
   * Sequence, chain, persist and publish a batch of notifications committed
   * together.
   */
  appendAll(pending: readonly PendingNotification[], timestamp: number): Notification[] {
    const prepared = this.prepare(pending, timestamp);
    this.write(prepared);
    this.publish(prepared);
    return prepared;
  }

  /**
   * Chains a batch onto the current head without changing the log. Throws
   * when a payload cannot be canonically encoded.
   */
  prepare(pending: readonly PendingNotification[], timestamp: number): Notification[] {
    const prepared: Notification[] = [];
    let prevHash = this.headHash;

    for (const item of pending) {
      const unsigned = {
        ...item,
        sequence: this.entries.length + prepared.length + 1,
        timestamp,
        prevHash,
      };
      const entry = { ...unsigned, hash: hashNotification(unsigned) };
      prepared.push(entry);
      prevHash = entry.hash;
    }
    return prepared;
  }

  /**
   * Appends a prepared batch to the log file in one write. On failure any
   * partial write is truncated away and the error is rethrown.
   */
  write(prepared: readonly Notification[]): void {
    if (!this.logFile || prepared.length === 0) return;
    this.requireHead(prepared[0]);

    const size = fs.existsSync(this.logFile) ? fs.statSync(this.logFile).size : 0;
    const lines = prepared.map((entry) => JSON.stringify(entry) + '\n').join('');
    try {
      fs.appendFileSync(this.logFile, lines);
    } catch (error) {
      this.discardPartialWrite(size);
      throw error;
    }
  }

  /** Adds a written batch to memory and hands it to subscribers. */
  publish(prepared: readonly Notification[]): void {
    if (prepared.length === 0) return;
    this.requireHead(prepared[0]);

    this.entries.push(...prepared);
    try {
      this.persistHead();
    } catch (error) {
      // The head file is rewritten from the log on the next load
      this.log.warn('notifications', 'Head state not written', {
        sequence: this.sequence,
        error: error instanceof Error ? error.message : String(error),
      });
    }
    this.metrics?.incCounter('ledger_notifications_total', {}, prepared.length);
    this.metrics?.setGauge('ledger_notification_sequence', this.sequence);

    for (const entry of prepared) {
      this.emitter.emit('notification', entry);
    }
  }

  /** Entries with sequence > `afterSequence`, oldest first. */
  since(afterSequence: number, limit?: number): Notification[] {
    const start = Math.max(0, Math.floor(afterSequence));
    const end = limit === undefined ? undefined : start + Math.max(0, limit);
    return this.entries.slice(start, end);
  }

  all(): readonly Notification[] {
    return this.entries;
  }

  subscribe(listener: NotificationListener): () => void {
    const guarded = (notification: Notification) => {
      try {
        listener(notification);
      } catch (error) {
        this.log.error('notifications', 'Subscriber failed', {
          sequence: notification.sequence,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    };
    this.emitter.on('notification', guarded);
    return () => {
      this.emitter.off('notification', guarded);
    };
  }

  verifyChain(entries: readonly Notification[] = this.entries): ChainVerification {
    let prevHash = GENESIS_HASH;

    for (let i = 0; i < entries.length; i++) {
      const entry = entries[i];
      if (entry.sequence !== i + 1) {
        return { valid: false, checked: i, brokenAt: entry.sequence, reason: 'sequence gap' };
      }
      if (entry.prevHash !== prevHash) {
        return { valid: false, checked: i, brokenAt: entry.sequence, reason: 'prevHash mismatch' };
      }
      if (hashNotification(entry) !== entry.hash) {
        return { valid: false, checked: i, brokenAt: entry.sequence, reason: 'hash mismatch' };
      }
      prevHash = entry.hash;
    }

    return { valid: true, checked: entries.length };
  }

  private requireHead(first: Notification): void {
    if (first.sequence !== this.sequence + 1 || first.prevHash !== this.headHash) {
      throw new Error(`Batch starting at sequence ${first.sequence} does not extend head ${this.sequence}`);
    }
  }

  private discardPartialWrite(size: number): void {
    if (!this.logFile) return;
    try {
      fs.truncateSync(this.logFile, size);
    } catch (error) {
      this.log.error('notifications', 'Could not truncate after a failed append', {
        size,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private persistHead(): void {
    if (!this.stateFile) return;
    const state: NotificationLogState = { headHash: this.headHash, sequence: this.sequence };
    this.storage.write(this.stateFile, state);
  }

  private load(): void {
    if (!this.logFile || !fs.existsSync(this.logFile)) return;

    const loaded: Notification[] = [];
    const lines = fs
      .readFileSync(this.logFile, 'utf8')
      .split('\n')
      .filter((line) => line.trim().length > 0);

    for (let i = 0; i < lines.length; i++) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(lines[i]);
      } catch {
        if (i !== lines.length - 1) {
          throw new Error(`Corrupt notification log line after sequence ${loaded.length}`);
        }
        // Torn final line from a crash mid-append
        this.log.warn('notifications', 'Dropping torn trailing log line', { sequence: loaded.length });
        fs.writeFileSync(this.logFile, lines.slice(0, i).map((l) => l + '\n').join(''));
        break;
      }
      if (!isNotificationShape(parsed)) {
        throw new Error(`Malformed notification after sequence ${loaded.length}`);
      }
      loaded.push(parsed);
    }

    const verification = this.verifyChain(loaded);
    if (!verification.valid) {
      throw new Error(
        `Notification chain broken at sequence ${verification.brokenAt}: ${verification.reason}`
      );
    }

    this.entries.push(...loaded);

    if (this.stateFile && this.storage.exists(this.stateFile)) {
      const head = this.storage.read(this.stateFile, isLogState);
      if (!head.success || head.data.headHash !== this.headHash) {
        this.log.warn('notifications', 'Head state out of date, rewriting from log', {
          sequence: this.sequence,
        });
        this.persistHead();
      }
    } else {
      this.persistHead();
    }

    this.log.info('notifications', 'Loaded notification log', {
      sequence: this.sequence,
      headHash: this.headHash,
    });
  }
}
