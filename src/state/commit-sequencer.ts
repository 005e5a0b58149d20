/**
 * Commit Sequencer
 *
 * Runs every state-changing operation as one serialized transaction.
 * Calls made from inside a running operation join it, so a marketplace
 * sale that moves catalog units and value commits or aborts as a unit.
 * Notifications queued by the transaction are chained and written to
 * the log before the journal commits; a failed write rolls the operation
 * back. They reach memory and subscribers only after the commit.
 */

import { isLedgerError } from '../errors';
import { NotificationLog } from '../notifications/notification-log';
import { Notification } from '../notifications/types';
import { MetricsCollector } from '../scaling/metrics';
import { StructuredLogger } from '../scaling/structured-logger';
import { Clock } from './clock';
import { StateJournal } from './journal';

export interface CommitSequencerDeps {
  clock: Clock;
  notifications: NotificationLog;
  logger: StructuredLogger;
  metrics?: MetricsCollector;
}

export class CommitSequencer {
  private active: StateJournal | null = null;
  private activeTime = 0;

  constructor(private readonly deps: CommitSequencerDeps) {}

  get inTransaction(): boolean {
    return this.active !== null;
  }

  /** Current time; fixed for the whole of a running operation. */
  now(): number {
    return this.active ? this.activeTime : this.deps.clock.now();
  }

  atomically<T>(operation: string, body: (tx: StateJournal) => T): T {
    if (this.active) {
      return body(this.active);
    }

    const tx = new StateJournal(operation);
    this.active = tx;
    this.activeTime = this.deps.clock.now();

    let result: T;
    let prepared: Notification[];
    try {
      result = body(tx);
      // A batch that fails to chain or write aborts the operation
      prepared = this.deps.notifications.prepare(tx.pendingNotifications, this.activeTime);
      this.deps.notifications.write(prepared);
    } catch (error) {
      this.active = null;
      tx.rollback();
      this.recordAbort(operation, error);
      throw error;
    }

    this.active = null;
    tx.commit();
    this.deps.metrics?.incCounter('ledger_operations_total', { operation, outcome: 'committed' });
    this.deps.logger.debug('sequencer', 'Committed', { operation, notifications: prepared.length });

    this.deps.notifications.publish(prepared);
    return result;
  }

  private recordAbort(operation: string, error: unknown): void {
    if (isLedgerError(error)) {
      this.deps.metrics?.incCounter('ledger_operations_total', {
        operation,
        outcome: 'aborted',
        code: error.code,
      });
      this.deps.logger.debug('sequencer', 'Aborted', { operation, code: error.code, reason: error.message });
      return;
    }

    this.deps.metrics?.incCounter('ledger_operations_total', { operation, outcome: 'aborted', code: 'internal' });
    this.deps.logger.error('sequencer', 'Operation failed unexpectedly', {
      operation,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
