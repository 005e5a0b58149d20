/**
 * Achievement Ledger
 *
 * Write-once achievement records, one per (account, eventId), granted by
 * BackendSigner-signed claims. Records have no update or delete path.
 */

import { requireAccount } from '../access/access-control';
import { AuthorizationVerifier } from '../auth/authorization-verifier';
import { CLAIM_ACHIEVEMENT } from '../auth/typed-payloads';
import { canonicalCborEncode } from '../crypto/canonical-cbor';
import { isHex32, sha256 } from '../crypto';
import { StateError, ValidationError } from '../errors';
import { Notification, NotificationType } from '../notifications/types';
import { StructuredLogger } from '../scaling/structured-logger';
import { CommitSequencer } from '../state/commit-sequencer';
import { Restorable } from '../state/state-builder';

export const MIN_ACHIEVEMENT_TIER = 1;
export const MAX_ACHIEVEMENT_TIER = 5;

export interface Achievement {
  account: string;
  eventId: string;
  tier: number;
  unlockedAt: number;
  metadataHash: string;
}

export interface AchievementLedgerDeps {
  sequencer: CommitSequencer;
  verifier: AuthorizationVerifier;
  logger: StructuredLogger;
}

export function achievementKey(account: string, eventId: string): string {
  return sha256(canonicalCborEncode([account, eventId]));
}

export class AchievementLedger implements Restorable {
  private readonly records = new Map<string, Readonly<Achievement>>();
  private readonly byAccount = new Map<string, string[]>();

  constructor(private readonly deps: AchievementLedgerDeps) {}

  restore(notification: Notification): void {
    if (notification.type !== NotificationType.ACHIEVEMENT_CLAIMED) return;

    const { account, eventId, tier, unlockedAt, metadataHash } = notification.payload;
    const key = achievementKey(account, eventId);
    this.records.set(key, Object.freeze({ account, eventId, tier, unlockedAt, metadataHash }));
    const list = this.byAccount.get(account);
    if (list) {
      list.push(key);
    } else {
      this.byAccount.set(account, [key]);
    }
  }

  claim(
    to: string,
    eventId: string,
    tier: number,
    metadataHash: string,
    deadline: number,
    signature: string
  ): Achievement {
    requireAccount(to);
    if (typeof eventId !== 'string' || eventId.length === 0) {
      throw new ValidationError('InvalidIdentifier', 'eventId must be a non-empty string');
    }
    if (!Number.isSafeInteger(tier)) {
      throw new ValidationError('InvalidTier', 'Tier must be an integer', { tier });
    }
    if (typeof metadataHash !== 'string' || !isHex32(metadataHash)) {
      throw new ValidationError('InvalidMetadataHash', 'metadataHash must be 32 bytes of hex');
    }

    return this.deps.sequencer.atomically('claimAchievement', (tx) => {
      const normalizedHash = metadataHash.toLowerCase();
      const { nonce } = this.deps.verifier.consume(
        CLAIM_ACHIEVEMENT,
        { to, eventId, tier, metadataHash: normalizedHash },
        { deadline, signature },
        'backend'
      );

      const key = achievementKey(to, eventId);
      if (this.records.has(key)) {
        throw new StateError('AlreadyHasAchievement', `${to} already holds the achievement for ${eventId}`, {
          account: to,
          eventId,
        });
      }
      if (tier < MIN_ACHIEVEMENT_TIER || tier > MAX_ACHIEVEMENT_TIER) {
        throw new ValidationError(
          'InvalidTier',
          `Tier must be between ${MIN_ACHIEVEMENT_TIER} and ${MAX_ACHIEVEMENT_TIER}`,
          { tier }
        );
      }

      const record: Achievement = {
        account: to,
        eventId,
        tier,
        unlockedAt: this.deps.sequencer.now(),
        metadataHash: normalizedHash,
      };

      tx.put(this.records, key, Object.freeze(record));
      const list = this.byAccount.get(to);
      if (list) {
        tx.append(list, key);
      } else {
        tx.put(this.byAccount, to, [key]);
      }

      tx.emit({
        type: NotificationType.ACHIEVEMENT_CLAIMED,
        payload: { ...record, nonce },
      });
      this.deps.logger.debug('achievements', 'Achievement claimed', { account: to, eventId, tier });

      return { ...record };
    });
  }

  hasAchievement(account: string, eventId: string): boolean {
    return this.records.has(achievementKey(account, eventId));
  }

  getAchievement(account: string, eventId: string): Achievement | undefined {
    const record = this.records.get(achievementKey(account, eventId));
    return record ? { ...record } : undefined;
  }

  /** Achievements of `account` in the order they were claimed. */
  listForAccount(account: string): Achievement[] {
    const keys = this.byAccount.get(account) ?? [];
    const out: Achievement[] = [];
    for (const key of keys) {
      const record = this.records.get(key);
      if (record) out.push({ ...record });
    }
    return out;
  }

  countForAccount(account: string): number {
    return this.byAccount.get(account)?.length ?? 0;
  }
}
