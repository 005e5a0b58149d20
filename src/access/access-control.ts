/**
 * Access Control Registry
 *
 * Single (role × account) capability table. Every other component checks
 * permissions through `requireRole`; none of them keeps its own lists.
 * Admin administers every role, including itself.
 */

import { AuthzCode, AuthzError, ValidationError } from '../errors';
import { Notification, NotificationType } from '../notifications/types';
import { CommitSequencer } from '../state/commit-sequencer';
import { StateJournal } from '../state/journal';
import { Restorable } from '../state/state-builder';
import { ALL_ROLES, Role } from './roles';

export class AccessControlRegistry implements Restorable {
  private readonly members = new Map<Role, Set<string>>();

  constructor(private readonly sequencer: CommitSequencer) {
    for (const role of ALL_ROLES) {
      this.members.set(role, new Set());
    }
  }

  /** Seats the first Admin of a fresh ledger. */
  bootstrapAdmin(initialAdmin: string): void {
    requireAccount(initialAdmin);
    this.sequencer.atomically('bootstrapAdmin', (tx) => {
      if (this.membersOf(Role.ADMIN).length > 0) {
        throw new Error('Admin role already has members');
      }
      tx.add(this.roleSet(Role.ADMIN), initialAdmin);
      tx.emit({
        type: NotificationType.ROLE_GRANTED,
        payload: { role: Role.ADMIN, account: initialAdmin, sender: initialAdmin },
      });
    });
  }

  restore(notification: Notification): void {
    if (notification.type === NotificationType.ROLE_GRANTED) {
      this.roleSet(notification.payload.role).add(notification.payload.account);
    } else if (notification.type === NotificationType.ROLE_REVOKED) {
      this.roleSet(notification.payload.role).delete(notification.payload.account);
    }
  }

  hasRole(role: Role, account: string): boolean {
    return this.roleSet(role).has(account);
  }

  /** Role that may grant and revoke `role`. */
  adminRoleOf(_role: Role): Role {
    return Role.ADMIN;
  }

  requireRole(role: Role, account: string, code: AuthzCode = 'Unauthorized'): void {
    if (!this.hasRole(role, account)) {
      throw new AuthzError(code, `Account ${account} does not hold ${role}`, { role, account });
    }
  }

  membersOf(role: Role): string[] {
    return Array.from(this.roleSet(role)).sort();
  }

  /**
   * Returns false when the account already held the role.
   */
  grantRole(caller: string, role: Role, account: string): boolean {
    return this.sequencer.atomically('grantRole', (tx) => {
      this.requireRole(this.adminRoleOf(role), caller);
      requireAccount(account);

      const set = this.roleSet(role);
      if (set.has(account)) return false;

      tx.add(set, account);
      tx.emit({ type: NotificationType.ROLE_GRANTED, payload: { role, account, sender: caller } });
      return true;
    });
  }

  /**
   * Returns false when the account did not hold the role.
   */
  revokeRole(caller: string, role: Role, account: string): boolean {
    return this.sequencer.atomically('revokeRole', (tx) => {
      this.requireRole(this.adminRoleOf(role), caller);
      return this.removeMember(tx, role, account, caller);
    });
  }

  renounceRole(caller: string, role: Role): boolean {
    return this.sequencer.atomically('renounceRole', (tx) => this.removeMember(tx, role, caller, caller));
  }

  private removeMember(
    tx: StateJournal,
    role: Role,
    account: string,
    sender: string
  ): boolean {
    const set = this.roleSet(role);
    if (!set.has(account)) return false;

    tx.discard(set, account);
    tx.emit({ type: NotificationType.ROLE_REVOKED, payload: { role, account, sender } });
    return true;
  }

  private roleSet(role: Role): Set<string> {
    const set = this.members.get(role);
    if (!set) {
      throw new Error(`Unknown role: ${role}`);
    }
    return set;
  }
}

export function requireAccount(account: string): void {
  if (typeof account !== 'string' || account.trim().length === 0) {
    throw new ValidationError('InvalidAccount', 'Account must be a non-empty string');
  }
}
