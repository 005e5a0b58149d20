/**
 * State Journal
 *
 * Undo log for a single ledger transaction. Every write a component makes
 * inside an operation goes through the journal, which remembers how to
 * reverse it. On abort the writes are reversed newest-first; on commit
 * the undo log is dropped and the queued notifications are handed out.
 */

import type { PendingNotification } from '../notifications/types';

type Undo = () => void;

export class StateJournal {
  private undoLog: Undo[] = [];
  private notifications: PendingNotification[] = [];
  private closed = false;

  constructor(readonly operation: string) {}

  /** Insert or replace a map entry. */
  put<K, V extends {}>(map: Map<K, V>, key: K, value: V): void {
    this.ensureOpen();
    const previous = map.get(key);
    this.undoLog.push(() => {
      if (previous === undefined) {
        map.delete(key);
      } else {
        map.set(key, previous);
      }
    });
    map.set(key, value);
  }

  remove<K, V extends {}>(map: Map<K, V>, key: K): void {
    this.ensureOpen();
    const previous = map.get(key);
    if (previous === undefined) return;
    this.undoLog.push(() => {
      map.set(key, previous);
    });
    map.delete(key);
  }

  add<T>(set: Set<T>, value: T): void {
    this.ensureOpen();
    if (set.has(value)) return;
    this.undoLog.push(() => {
      set.delete(value);
    });
    set.add(value);
  }

  discard<T>(set: Set<T>, value: T): void {
    this.ensureOpen();
    if (!set.has(value)) return;
    this.undoLog.push(() => {
      set.add(value);
    });
    set.delete(value);
  }

  append<T>(list: T[], value: T): void {
    this.ensureOpen();
    this.undoLog.push(() => {
      list.pop();
    });
    list.push(value);
  }

  /** Overwrite one field of a component-owned record. */
  assign<T extends object, K extends keyof T>(target: T, key: K, value: T[K]): void {
    this.ensureOpen();
    const previous = target[key];
    this.undoLog.push(() => {
      target[key] = previous;
    });
    target[key] = value;
  }

  emit(notification: PendingNotification): void {
    this.ensureOpen();
    this.notifications.push(notification);
  }

  /** Notifications queued so far, in emit order. */
  get pendingNotifications(): readonly PendingNotification[] {
    return this.notifications;
  }

  get writeCount(): number {
    return this.undoLog.length;
  }

  commit(): PendingNotification[] {
    this.ensureOpen();
    this.closed = true;
    this.undoLog = [];
    const out = this.notifications;
    this.notifications = [];
    return out;
  }

  rollback(): void {
    this.ensureOpen();
    this.closed = true;
    for (let i = this.undoLog.length - 1; i >= 0; i--) {
      this.undoLog[i]();
    }
    this.undoLog = [];
    this.notifications = [];
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new Error(`Journal for ${this.operation} is already closed`);
    }
  }
}
