/**
 * Value Ledger
 *
 * Native-currency balances the marketplace settles in. Amounts are bigint
 * base units. Transfers are internal: only components running inside a
 * ledger transaction move value, so a failed leg undoes the whole sale.
 */

import { AccessControlRegistry, requireAccount } from '../access/access-control';
import { Role } from '../access/roles';
import { SettlementError, ValidationError } from '../errors';
import { Notification, NotificationType } from '../notifications/types';
import { StructuredLogger } from '../scaling/structured-logger';
import { CommitSequencer } from '../state/commit-sequencer';
import { Restorable } from '../state/state-builder';

export interface ValueLedgerDeps {
  sequencer: CommitSequencer;
  access: AccessControlRegistry;
  logger: StructuredLogger;
}

export class ValueLedger implements Restorable {
  private readonly balances = new Map<string, bigint>();
  private readonly refusing = new Set<string>();

  constructor(private readonly deps: ValueLedgerDeps) {}

  /** Credits and acceptance flags; sale legs are replayed by the marketplace. */
  restore(notification: Notification): void {
    if (notification.type === NotificationType.VALUE_CREDITED) {
      this.balances.set(notification.payload.account, BigInt(notification.payload.balance));
    } else if (notification.type === NotificationType.VALUE_ACCEPTANCE_SET) {
      if (notification.payload.accepts) {
        this.refusing.delete(notification.payload.account);
      } else {
        this.refusing.add(notification.payload.account);
      }
    }
  }

  /** Replays a committed transfer during startup; no checks, no journal. */
  restoreTransfer(from: string, to: string, amount: bigint): void {
    if (amount === 0n || from === to) return;
    this.balances.set(from, this.balanceOf(from) - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
  }

  /** Admin funding path for environments without an external payment rail. */
  credit(caller: string, account: string, amount: bigint): bigint {
    return this.deps.sequencer.atomically('credit', (tx) => {
      this.deps.access.requireRole(Role.ADMIN, caller);
      requireAccount(account);
      if (amount <= 0n) {
        throw new ValidationError('InvalidAmount', 'Credit amount must be positive', { amount: amount.toString() });
      }

      const balance = this.balanceOf(account) + amount;
      tx.put(this.balances, account, balance);
      tx.emit({
        type: NotificationType.VALUE_CREDITED,
        payload: { account, amount: amount.toString(), balance: balance.toString() },
      });
      return balance;
    });
  }

  setAcceptsValue(caller: string, accepts: boolean): void {
    requireAccount(caller);
    this.deps.sequencer.atomically('setAcceptsValue', (tx) => {
      if (accepts === !this.refusing.has(caller)) return;

      if (accepts) {
        tx.discard(this.refusing, caller);
      } else {
        tx.add(this.refusing, caller);
      }
      tx.emit({ type: NotificationType.VALUE_ACCEPTANCE_SET, payload: { account: caller, accepts } });
    });
  }

  /**
   * Moves value between two accounts. Must run inside an operation that
   * already owns a transaction; a zero amount is a no-op.
   */
  transfer(from: string, to: string, amount: bigint): void {
    if (!this.deps.sequencer.inTransaction) {
      throw new Error('Value transfers must run inside a ledger transaction');
    }

    this.deps.sequencer.atomically('valueTransfer', (tx) => {
      if (amount < 0n) {
        throw new ValidationError('InvalidAmount', 'Transfer amount must not be negative');
      }
      if (amount === 0n || from === to) return;

      const available = this.balanceOf(from);
      if (available < amount) {
        throw new SettlementError('TransferFailed', `Insufficient value in ${from}`, {
          from,
          available: available.toString(),
          required: amount.toString(),
        });
      }
      if (this.refusing.has(to)) {
        throw new SettlementError('TransferFailed', `Recipient ${to} refuses incoming value`, { to });
      }

      tx.put(this.balances, from, available - amount);
      tx.put(this.balances, to, this.balanceOf(to) + amount);
      this.deps.logger.debug('value', 'Transferred', { from, to, amount: amount.toString() });
    });
  }

  balanceOf(account: string): bigint {
    return this.balances.get(account) ?? 0n;
  }

  acceptsValue(account: string): boolean {
    return !this.refusing.has(account);
  }

  /** Sum of all balances; credits are the only way it grows. */
  totalBalance(): bigint {
    let total = 0n;
    for (const balance of this.balances.values()) {
      total += balance;
    }
    return total;
  }
}
