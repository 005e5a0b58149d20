/**
 * Authorization Verifier
 *
 * The one routine every signed operation goes through:
 *   1. deadline check
 *   2. typed digest over payload + current nonce + deadline
 *   3. signer recovery
 *   4. signer check (BackendSigner role, or the subject itself)
 *   5. nonce consumption
 *
 * The nonce is consumed before the caller applies its business rules and
 * is written outside the transaction journal: a signature is spent even
 * when the operation it authorized is then rejected. With a nonce file the
 * table is written through on every consumption, so it survives restarts.
 */

import { AccessControlRegistry } from '../access/access-control';
import { Role } from '../access/roles';
import { recoverSignerAddress } from '../crypto';
import { AuthorizationError } from '../errors';
import { Notification, NotificationType } from '../notifications/types';
import { StructuredLogger } from '../scaling/structured-logger';
import { Clock } from '../state/clock';
import { Restorable } from '../state/state-builder';
import { AtomicStorage } from '../storage/atomic-storage';
import {
  MessageDefinition,
  NONCE_NAMESPACES,
  NonceNamespace,
  SigningDomain,
  domainSeparator,
  typedDigest,
} from './typed-payloads';

/** Who must have produced the signature. */
export type AuthorizationMode = 'backend' | 'self';

export interface SignedAuthorization {
  deadline: number;
  signature: string;
}

export interface VerifiedAuthorization {
  signer: string;
  subject: string;
  /** Nonce the signature was bound to (the value before consumption) */
  nonce: number;
}

export interface AuthorizationVerifierDeps {
  access: AccessControlRegistry;
  domain: SigningDomain;
  clock: Clock;
  logger: StructuredLogger;
  /** Persist consumed nonces here; in-memory when omitted */
  nonceFile?: string;
}

/** account → namespace → next expected nonce */
export type NonceTable = Record<string, Partial<Record<NonceNamespace, number>>>;

const NAMESPACES = new Set<string>(NONCE_NAMESPACES);

function isNonceTable(value: unknown): value is NonceTable {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return Object.values(value).every(
    (entry: unknown) =>
      typeof entry === 'object' &&
      entry !== null &&
      Object.entries(entry).every(
        ([namespace, nonce]: [string, unknown]) =>
          NAMESPACES.has(namespace) && typeof nonce === 'number' && Number.isSafeInteger(nonce) && nonce >= 0
      )
  );
}

export class AuthorizationVerifier implements Restorable {
  private readonly nonces = new Map<string, Map<NonceNamespace, number>>();
  private readonly separator: Buffer;
  private readonly storage: AtomicStorage;

  constructor(private readonly deps: AuthorizationVerifierDeps) {
    this.separator = domainSeparator(deps.domain);
    this.storage = new AtomicStorage(deps.logger);
    this.loadNonces();
  }

  /** Raises nonces to one past those carried by logged authorizations. */
  restore(notification: Notification): void {
    if (notification.type === NotificationType.STATS_UPDATED) {
      const { account, nonce } = notification.payload;
      this.raiseNonce(account, 'statsUpdate', nonce + 1);
    } else if (notification.type === NotificationType.ACHIEVEMENT_CLAIMED) {
      const { account, nonce } = notification.payload;
      this.raiseNonce(account, 'claim', nonce + 1);
    }
  }

  get domain(): SigningDomain {
    return this.deps.domain;
  }

  domainSeparatorHex(): string {
    return this.separator.toString('hex');
  }

  nonceOf(account: string, namespace: NonceNamespace): number {
    return this.nonces.get(account)?.get(namespace) ?? 0;
  }

  noncesOf(account: string): Record<NonceNamespace, number> {
    const out: Record<NonceNamespace, number> = { register: 0, statsUpdate: 0, claim: 0 };
    for (const namespace of NONCE_NAMESPACES) {
      out[namespace] = this.nonceOf(account, namespace);
    }
    return out;
  }

  digestFor<F>(definition: MessageDefinition<F>, fields: F, nonce: number, deadline: number): Buffer {
    return typedDigest(this.deps.domain, definition, fields, nonce, deadline);
  }

  consume<F>(
    definition: MessageDefinition<F>,
    fields: F,
    auth: SignedAuthorization,
    mode: AuthorizationMode
  ): VerifiedAuthorization {
    if (!Number.isSafeInteger(auth.deadline) || auth.deadline < 0) {
      throw new AuthorizationError('InvalidSignature', 'Deadline must be a non-negative integer');
    }

    const now = this.deps.clock.now();
    if (now > auth.deadline) {
      throw new AuthorizationError('SignatureExpired', `Signature expired at ${auth.deadline}`, {
        deadline: auth.deadline,
        now,
      });
    }

    const subject = definition.subjectOf(fields);
    const nonce = this.nonceOf(subject, definition.namespace);
    const digest = this.digestFor(definition, fields, nonce, auth.deadline);

    const signer =
      typeof auth.signature === 'string'
        ? recoverSignerAddress(digest, auth.signature, this.deps.domain.network)
        : null;
    if (!signer) {
      throw new AuthorizationError('InvalidSignature', `Unrecoverable ${definition.type} signature`);
    }

    if (mode === 'backend' && !this.deps.access.hasRole(Role.BACKEND_SIGNER, signer)) {
      throw new AuthorizationError('InvalidSigner', `Signer ${signer} is not a backend signer`, { signer });
    }
    if (mode === 'self' && signer !== subject) {
      throw new AuthorizationError('InvalidSignature', `Signer ${signer} does not match ${subject}`, {
        signer,
        subject,
      });
    }

    this.bumpNonce(subject, definition.namespace, nonce);
    this.deps.logger.debug('auth', 'Authorization accepted', {
      type: definition.type,
      subject,
      signer,
      nonce,
    });

    return { signer, subject, nonce };
  }

  private bumpNonce(account: string, namespace: NonceNamespace, current: number): void {
    const next = current + 1;
    if (this.deps.nonceFile) {
      const table = this.nonceTable();
      const entry = table[account] ?? {};
      entry[namespace] = next;
      table[account] = entry;
      this.storage.write(this.deps.nonceFile, table);
    }
    this.setNonce(account, namespace, next);
  }

  private raiseNonce(account: string, namespace: NonceNamespace, next: number): void {
    if (next > this.nonceOf(account, namespace)) {
      this.setNonce(account, namespace, next);
    }
  }

  private setNonce(account: string, namespace: NonceNamespace, next: number): void {
    let byNamespace = this.nonces.get(account);
    if (!byNamespace) {
      byNamespace = new Map();
      this.nonces.set(account, byNamespace);
    }
    byNamespace.set(namespace, next);
  }

  private nonceTable(): NonceTable {
    const table: NonceTable = {};
    for (const [account, byNamespace] of this.nonces) {
      const entry: Partial<Record<NonceNamespace, number>> = {};
      for (const [namespace, nonce] of byNamespace) {
        entry[namespace] = nonce;
      }
      table[account] = entry;
    }
    return table;
  }

  private loadNonces(): void {
    const file = this.deps.nonceFile;
    if (!file || !this.storage.exists(file)) return;

    const result = this.storage.read(file, isNonceTable);
    if (!result.success) {
      throw new Error(`Nonce table unreadable: ${result.error}`);
    }
    for (const [account, byNamespace] of Object.entries(result.data)) {
      for (const namespace of NONCE_NAMESPACES) {
        const nonce = byNamespace[namespace];
        if (nonce !== undefined) this.setNonce(account, namespace, nonce);
      }
    }
    this.deps.logger.info('auth', 'Loaded nonce table', { accounts: this.nonces.size });
  }
}
