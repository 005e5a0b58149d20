/**
 * Profile Ledger
 *
 * One profile per account. Profiles are created by the account itself
 * (directly or through a relayed self-signed registration) and changed
 * only by stats updates signed by a BackendSigner. They are never deleted.
 */

import { requireAccount } from '../access/access-control';
import { AuthorizationVerifier } from '../auth/authorization-verifier';
import { REGISTER, STATS_UPDATE, StatsUpdateFields } from '../auth/typed-payloads';
import { StateError, ValidationError } from '../errors';
import { Notification, NotificationType } from '../notifications/types';
import { StructuredLogger } from '../scaling/structured-logger';
import { CommitSequencer } from '../state/commit-sequencer';
import { StateJournal } from '../state/journal';
import { Restorable } from '../state/state-builder';
import { Tier, tierForLevel } from './tiers';

export interface Profile {
  xp: number;
  level: number;
  progressCount: number;
  achievementCount: number;
  lastUpdated: number;
  exists: true;
}

export type ProfileStats = Omit<StatsUpdateFields, 'account'>;

export interface StatsUpdateResult {
  profile: Profile;
  previousTier: Tier;
  tier: Tier;
  upgraded: boolean;
}

export interface ProfileLedgerDeps {
  sequencer: CommitSequencer;
  verifier: AuthorizationVerifier;
  logger: StructuredLogger;
}

const STAT_FIELDS: ReadonlyArray<keyof ProfileStats> = ['xp', 'level', 'progressCount', 'achievementCount'];

export function validateStats(stats: ProfileStats): void {
  for (const field of STAT_FIELDS) {
    const value = stats[field];
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new ValidationError('InvalidStats', `${field} must be a non-negative integer`, { field, value });
    }
  }
}

export class ProfileLedger implements Restorable {
  private readonly profiles = new Map<string, Profile>();

  constructor(private readonly deps: ProfileLedgerDeps) {}

  restore(notification: Notification): void {
    if (notification.type === NotificationType.PROFILE_REGISTERED) {
      this.profiles.set(notification.payload.account, {
        xp: 0,
        level: 0,
        progressCount: 0,
        achievementCount: 0,
        lastUpdated: notification.timestamp,
        exists: true,
      });
    } else if (notification.type === NotificationType.STATS_UPDATED) {
      const { account, xp, level, progressCount, achievementCount, lastUpdated } = notification.payload;
      this.profiles.set(account, { xp, level, progressCount, achievementCount, lastUpdated, exists: true });
    }
  }

  register(caller: string): Profile {
    requireAccount(caller);
    return this.deps.sequencer.atomically('register', (tx) => this.create(tx, caller, null));
  }

  /**
   * Relayed self-registration: any relayer may submit it, but the signature
   * must come from `account` itself.
   */
  registerFor(account: string, deadline: number, signature: string, relayer: string | null = null): Profile {
    requireAccount(account);
    return this.deps.sequencer.atomically('registerFor', (tx) => {
      this.deps.verifier.consume(REGISTER, { account }, { deadline, signature }, 'self');
      return this.create(tx, account, relayer);
    });
  }

  updateStats(account: string, stats: ProfileStats, deadline: number, signature: string): StatsUpdateResult {
    requireAccount(account);
    validateStats(stats);

    return this.deps.sequencer.atomically('updateStats', (tx) => {
      const fields: StatsUpdateFields = {
        account,
        xp: stats.xp,
        level: stats.level,
        progressCount: stats.progressCount,
        achievementCount: stats.achievementCount,
      };
      const { nonce } = this.deps.verifier.consume(STATS_UPDATE, fields, { deadline, signature }, 'backend');

      const current = this.profiles.get(account);
      if (!current) {
        throw new StateError('NotRegistered', `Account ${account} has no profile`, { account });
      }

      const previousTier = tierForLevel(current.level);
      const profile: Profile = {
        xp: fields.xp,
        level: fields.level,
        progressCount: fields.progressCount,
        achievementCount: fields.achievementCount,
        lastUpdated: this.deps.sequencer.now(),
        exists: true,
      };
      const tier = tierForLevel(profile.level);

      tx.put(this.profiles, account, profile);
      tx.emit({
        type: NotificationType.STATS_UPDATED,
        payload: { ...fields, lastUpdated: profile.lastUpdated, nonce },
      });

      const upgraded = tier > previousTier;
      if (upgraded) {
        tx.emit({
          type: NotificationType.TIER_UPGRADED,
          payload: { account, oldTier: previousTier, newTier: tier },
        });
        this.deps.logger.info('profiles', 'Tier upgraded', { account, from: previousTier, to: tier });
      }

      return { profile: { ...profile }, previousTier, tier, upgraded };
    });
  }

  getProfile(account: string): Profile | undefined {
    const profile = this.profiles.get(account);
    return profile ? { ...profile } : undefined;
  }

  isRegistered(account: string): boolean {
    return this.profiles.has(account);
  }

  tierOf(account: string): Tier | undefined {
    const profile = this.profiles.get(account);
    return profile ? tierForLevel(profile.level) : undefined;
  }

  get size(): number {
    return this.profiles.size;
  }

  private create(tx: StateJournal, account: string, relayedBy: string | null): Profile {
    if (this.profiles.has(account)) {
      throw new StateError('AlreadyRegistered', `Account ${account} is already registered`, { account });
    }

    const profile: Profile = {
      xp: 0,
      level: 0,
      progressCount: 0,
      achievementCount: 0,
      lastUpdated: this.deps.sequencer.now(),
      exists: true,
    };
    tx.put(this.profiles, account, profile);
    tx.emit({ type: NotificationType.PROFILE_REGISTERED, payload: { account, relayedBy } });
    return { ...profile };
  }
}
