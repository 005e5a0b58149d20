/**
 * Mirror Index
 *
 * Read model rebuilt purely by folding notifications, the way an external
 * indexer would. It never reads ledger state, so a mirror that matches the
 * ledger shows every notification carried the fields needed to apply it.
 */

import type { Role } from '../access/roles';
import type { CosmeticCategory, CosmeticItem } from '../catalog/types';
import { NotificationLog } from './notification-log';
import { Notification, NotificationType } from './types';

export interface MirroredProfile {
  xp: number;
  level: number;
  progressCount: number;
  achievementCount: number;
  lastUpdated: number;
}

export interface MirroredAchievement {
  eventId: string;
  tier: number;
  unlockedAt: number;
  metadataHash: string;
}

export interface MirroredEvent {
  id: string;
  name: string;
  startTime: number;
  endTime: number;
  maxParticipants: number;
  currentParticipants: number;
  active: boolean;
  reward: { achievementTier: number; cosmeticItemIds: string[]; xpBonus: number; hasReward: boolean } | null;
}

export interface MirroredListing {
  id: number;
  seller: string;
  itemId: string;
  amount: number;
  pricePerUnit: bigint;
  status: 'Active' | 'Sold' | 'Cancelled';
  createdAt: number;
  soldAt: number | null;
}

export class MirrorIndex {
  private lastSequence = 0;

  private readonly roles = new Map<Role, Set<string>>();
  private readonly profiles = new Map<string, MirroredProfile>();
  private readonly achievements = new Map<string, MirroredAchievement[]>();
  private readonly events = new Map<string, MirroredEvent>();
  private readonly items = new Map<string, CosmeticItem>();
  private readonly holdings = new Map<string, Map<string, number>>();
  private readonly equipped = new Map<string, Map<CosmeticCategory, string>>();
  private readonly listings = new Map<number, MirroredListing>();
  private fees = 0n;

  /** Builds a mirror from everything the log holds so far. */
  static fromLog(log: NotificationLog): MirrorIndex {
    const mirror = new MirrorIndex();
    mirror.applyAll(log.all());
    return mirror;
  }

  /** Follows `log` from the mirror's current position; returns an unsubscribe function. */
  follow(log: NotificationLog): () => void {
    this.applyAll(log.since(this.lastSequence));
    return log.subscribe((notification) => this.apply(notification));
  }

  get sequence(): number {
    return this.lastSequence;
  }

  applyAll(notifications: readonly Notification[]): void {
    for (const notification of notifications) {
      this.apply(notification);
    }
  }

  apply(notification: Notification): void {
    if (notification.sequence <= this.lastSequence) return;
    if (notification.sequence !== this.lastSequence + 1) {
      throw new Error(`Gap in notification feed: expected ${this.lastSequence + 1}, got ${notification.sequence}`);
    }

    switch (notification.type) {
      case NotificationType.ROLE_GRANTED:
        this.roleSet(notification.payload.role).add(notification.payload.account);
        break;

      case NotificationType.ROLE_REVOKED:
        this.roleSet(notification.payload.role).delete(notification.payload.account);
        break;

      case NotificationType.PROFILE_REGISTERED:
        this.profiles.set(notification.payload.account, {
          xp: 0,
          level: 0,
          progressCount: 0,
          achievementCount: 0,
          lastUpdated: notification.timestamp,
        });
        break;

      case NotificationType.STATS_UPDATED: {
        const { account, xp, level, progressCount, achievementCount, lastUpdated } = notification.payload;
        this.profiles.set(account, { xp, level, progressCount, achievementCount, lastUpdated });
        break;
      }

      case NotificationType.ACHIEVEMENT_CLAIMED: {
        const { account, eventId, tier, unlockedAt, metadataHash } = notification.payload;
        const list = this.achievements.get(account) ?? [];
        list.push({ eventId, tier, unlockedAt, metadataHash });
        this.achievements.set(account, list);
        break;
      }

      case NotificationType.EVENT_CREATED: {
        const { eventId, name, startTime, endTime, maxParticipants, active } = notification.payload;
        this.events.set(eventId, {
          id: eventId,
          name,
          startTime,
          endTime,
          maxParticipants,
          currentParticipants: 0,
          active,
          reward: null,
        });
        break;
      }

      case NotificationType.EVENT_UPDATED: {
        const event = this.requireEvent(notification.payload.eventId);
        const { name, startTime, endTime, maxParticipants, active } = notification.payload;
        Object.assign(event, { name, startTime, endTime, maxParticipants, active });
        break;
      }

      case NotificationType.EVENT_REWARD_SET: {
        const { eventId, achievementTier, cosmeticItemIds, xpBonus, hasReward } = notification.payload;
        this.requireEvent(eventId).reward = {
          achievementTier,
          cosmeticItemIds: [...cosmeticItemIds],
          xpBonus,
          hasReward,
        };
        break;
      }

      case NotificationType.PARTICIPANT_ADDED:
        this.requireEvent(notification.payload.eventId).currentParticipants = notification.payload.currentParticipants;
        break;

      case NotificationType.ITEM_CREATED: {
        const { itemId, name, category, rarity, imageHash, maxSupply, minTier } = notification.payload;
        this.items.set(itemId, { id: itemId, name, category, rarity, imageHash, maxSupply, currentSupply: 0, minTier });
        break;
      }

      case NotificationType.ITEM_MINTED: {
        const { itemId, to, amount, currentSupply } = notification.payload;
        const item = this.items.get(itemId);
        if (item) item.currentSupply = currentSupply;
        this.adjust(to, itemId, amount);
        break;
      }

      case NotificationType.ITEM_TRANSFERRED: {
        const { itemId, from, to, amount } = notification.payload;
        this.adjust(from, itemId, -amount);
        this.adjust(to, itemId, amount);
        break;
      }

      case NotificationType.ITEM_EQUIPPED: {
        const { account, category, itemId } = notification.payload;
        const slots = this.equipped.get(account) ?? new Map<CosmeticCategory, string>();
        slots.set(category, itemId);
        this.equipped.set(account, slots);
        break;
      }

      case NotificationType.ITEM_UNEQUIPPED:
        this.equipped.get(notification.payload.account)?.delete(notification.payload.category);
        break;

      case NotificationType.LISTING_CREATED: {
        const { listingId, seller, itemId, amount, pricePerUnit } = notification.payload;
        this.listings.set(listingId, {
          id: listingId,
          seller,
          itemId,
          amount,
          pricePerUnit: BigInt(pricePerUnit),
          status: 'Active',
          createdAt: notification.timestamp,
          soldAt: null,
        });
        break;
      }

      case NotificationType.LISTING_CANCELLED: {
        const listing = this.listings.get(notification.payload.listingId);
        if (listing) {
          listing.amount = 0;
          listing.status = 'Cancelled';
        }
        break;
      }

      case NotificationType.ITEM_SOLD: {
        const { listingId, remainingAmount, status, fee } = notification.payload;
        const listing = this.listings.get(listingId);
        if (listing) {
          listing.amount = remainingAmount;
          listing.status = status;
          if (status === 'Sold') listing.soldAt = notification.timestamp;
        }
        this.fees += BigInt(fee);
        break;
      }

      case NotificationType.FEES_WITHDRAWN:
        this.fees -= BigInt(notification.payload.amount);
        break;

      case NotificationType.TIER_UPGRADED:
      case NotificationType.APPROVAL_SET:
      case NotificationType.CUSTODIAN_SET:
      case NotificationType.PLATFORM_FEE_UPDATED:
      case NotificationType.VALUE_CREDITED:
      case NotificationType.VALUE_ACCEPTANCE_SET:
        // Not part of this read model
        break;
    }

    this.lastSequence = notification.sequence;
  }

  hasRole(role: Role, account: string): boolean {
    return this.roles.get(role)?.has(account) ?? false;
  }

  getProfile(account: string): MirroredProfile | undefined {
    const profile = this.profiles.get(account);
    return profile ? { ...profile } : undefined;
  }

  listAchievements(account: string): MirroredAchievement[] {
    return (this.achievements.get(account) ?? []).map((a) => ({ ...a }));
  }

  getEvent(id: string): MirroredEvent | undefined {
    const event = this.events.get(id);
    if (!event) return undefined;
    return { ...event, reward: event.reward ? { ...event.reward, cosmeticItemIds: [...event.reward.cosmeticItemIds] } : null };
  }

  getItem(itemId: string): CosmeticItem | undefined {
    const item = this.items.get(itemId);
    return item ? { ...item } : undefined;
  }

  balanceOf(account: string, itemId: string): number {
    return this.holdings.get(account)?.get(itemId) ?? 0;
  }

  getEquipped(account: string, category: CosmeticCategory): string | undefined {
    return this.equipped.get(account)?.get(category);
  }

  getListing(listingId: number): MirroredListing | undefined {
    const listing = this.listings.get(listingId);
    return listing ? { ...listing } : undefined;
  }

  get accumulatedFees(): bigint {
    return this.fees;
  }

  private roleSet(role: Role): Set<string> {
    let set = this.roles.get(role);
    if (!set) {
      set = new Set();
      this.roles.set(role, set);
    }
    return set;
  }

  private requireEvent(eventId: string): MirroredEvent {
    const event = this.events.get(eventId);
    if (!event) {
      throw new Error(`Notification references unknown event ${eventId}`);
    }
    return event;
  }

  private adjust(account: string, itemId: string, delta: number): void {
    const held = this.holdings.get(account) ?? new Map<string, number>();
    const next = (held.get(itemId) ?? 0) + delta;
    if (next === 0) {
      held.delete(itemId);
    } else {
      held.set(itemId, next);
    }
    this.holdings.set(account, held);
  }
}
