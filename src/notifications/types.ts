/**
 * Notification Types
 *
 * One notification per committed state transition. Each payload carries
 * enough fields for a mirror to apply the change without reading ledger
 * state. Value amounts travel as decimal strings.
 */

import type { Role } from '../access/roles';
import type { CosmeticCategory, CosmeticRarity } from '../catalog/types';

export enum NotificationType {
  // Access control
  ROLE_GRANTED = 'ROLE_GRANTED',
  ROLE_REVOKED = 'ROLE_REVOKED',

  // Profiles
  PROFILE_REGISTERED = 'PROFILE_REGISTERED',
  STATS_UPDATED = 'STATS_UPDATED',
  TIER_UPGRADED = 'TIER_UPGRADED',

  // Achievements
  ACHIEVEMENT_CLAIMED = 'ACHIEVEMENT_CLAIMED',

  // Events
  EVENT_CREATED = 'EVENT_CREATED',
  EVENT_UPDATED = 'EVENT_UPDATED',
  EVENT_REWARD_SET = 'EVENT_REWARD_SET',
  PARTICIPANT_ADDED = 'PARTICIPANT_ADDED',

  // Catalog
  ITEM_CREATED = 'ITEM_CREATED',
  ITEM_MINTED = 'ITEM_MINTED',
  ITEM_TRANSFERRED = 'ITEM_TRANSFERRED',
  ITEM_EQUIPPED = 'ITEM_EQUIPPED',
  ITEM_UNEQUIPPED = 'ITEM_UNEQUIPPED',
  APPROVAL_SET = 'APPROVAL_SET',
  CUSTODIAN_SET = 'CUSTODIAN_SET',

  // Marketplace
  LISTING_CREATED = 'LISTING_CREATED',
  LISTING_CANCELLED = 'LISTING_CANCELLED',
  ITEM_SOLD = 'ITEM_SOLD',
  PLATFORM_FEE_UPDATED = 'PLATFORM_FEE_UPDATED',
  FEES_WITHDRAWN = 'FEES_WITHDRAWN',

  // Value
  VALUE_CREDITED = 'VALUE_CREDITED',
  VALUE_ACCEPTANCE_SET = 'VALUE_ACCEPTANCE_SET',
}

export type RoleChangePayload = {
  role: Role;
  account: string;
  sender: string;
};

export type ProfileRegisteredPayload = {
  account: string;
  /** Relayer that submitted a signed self-registration, null for direct calls */
  relayedBy: string | null;
};

export type StatsUpdatedPayload = {
  account: string;
  xp: number;
  level: number;
  progressCount: number;
  achievementCount: number;
  lastUpdated: number;
  nonce: number;
};

export type TierUpgradedPayload = {
  account: string;
  oldTier: number;
  newTier: number;
};

export type AchievementClaimedPayload = {
  account: string;
  eventId: string;
  tier: number;
  metadataHash: string;
  unlockedAt: number;
  nonce: number;
};

export type EventConfigPayload = {
  eventId: string;
  name: string;
  startTime: number;
  endTime: number;
  maxParticipants: number;
  active: boolean;
};

export type EventCreatedPayload = EventConfigPayload & { hasReward: boolean };

export type EventRewardSetPayload = {
  eventId: string;
  achievementTier: number;
  cosmeticItemIds: string[];
  xpBonus: number;
  hasReward: boolean;
};

export type ParticipantAddedPayload = {
  eventId: string;
  currentParticipants: number;
};

export type ItemCreatedPayload = {
  itemId: string;
  name: string;
  category: CosmeticCategory;
  rarity: CosmeticRarity;
  imageHash: string;
  maxSupply: number;
  minTier: number;
};

export type ItemMintedPayload = {
  itemId: string;
  to: string;
  amount: number;
  currentSupply: number;
};

export type ItemTransferredPayload = {
  itemId: string;
  from: string;
  to: string;
  amount: number;
  operator: string;
};

export type EquipPayload = {
  account: string;
  category: CosmeticCategory;
  itemId: string;
};

export type ApprovalSetPayload = {
  owner: string;
  operator: string;
  approved: boolean;
};

export type CustodianSetPayload = {
  account: string;
  enabled: boolean;
  sender: string;
};

export type ListingCreatedPayload = {
  listingId: number;
  seller: string;
  itemId: string;
  amount: number;
  pricePerUnit: string;
};

export type ListingCancelledPayload = {
  listingId: number;
  seller: string;
  itemId: string;
  returnedAmount: number;
};

export type ItemSoldPayload = {
  listingId: number;
  seller: string;
  buyer: string;
  itemId: string;
  amount: number;
  totalPrice: string;
  fee: string;
  sellerProceeds: string;
  /** Overpayment returned to the buyer */
  refund: string;
  remainingAmount: number;
  status: 'Active' | 'Sold';
};

export type PlatformFeeUpdatedPayload = {
  oldFeeBps: number;
  newFeeBps: number;
};

export type FeesWithdrawnPayload = {
  to: string;
  amount: string;
};

export type ValueCreditedPayload = {
  account: string;
  amount: string;
  balance: string;
};

export type ValueAcceptanceSetPayload = {
  account: string;
  accepts: boolean;
};

export interface NotificationPayloads {
  [NotificationType.ROLE_GRANTED]: RoleChangePayload;
  [NotificationType.ROLE_REVOKED]: RoleChangePayload;
  [NotificationType.PROFILE_REGISTERED]: ProfileRegisteredPayload;
  [NotificationType.STATS_UPDATED]: StatsUpdatedPayload;
  [NotificationType.TIER_UPGRADED]: TierUpgradedPayload;
  [NotificationType.ACHIEVEMENT_CLAIMED]: AchievementClaimedPayload;
  [NotificationType.EVENT_CREATED]: EventCreatedPayload;
  [NotificationType.EVENT_UPDATED]: EventConfigPayload;
  [NotificationType.EVENT_REWARD_SET]: EventRewardSetPayload;
  [NotificationType.PARTICIPANT_ADDED]: ParticipantAddedPayload;
  [NotificationType.ITEM_CREATED]: ItemCreatedPayload;
  [NotificationType.ITEM_MINTED]: ItemMintedPayload;
  [NotificationType.ITEM_TRANSFERRED]: ItemTransferredPayload;
  [NotificationType.ITEM_EQUIPPED]: EquipPayload;
  [NotificationType.ITEM_UNEQUIPPED]: EquipPayload;
  [NotificationType.APPROVAL_SET]: ApprovalSetPayload;
  [NotificationType.CUSTODIAN_SET]: CustodianSetPayload;
  [NotificationType.LISTING_CREATED]: ListingCreatedPayload;
  [NotificationType.LISTING_CANCELLED]: ListingCancelledPayload;
  [NotificationType.ITEM_SOLD]: ItemSoldPayload;
  [NotificationType.PLATFORM_FEE_UPDATED]: PlatformFeeUpdatedPayload;
  [NotificationType.FEES_WITHDRAWN]: FeesWithdrawnPayload;
  [NotificationType.VALUE_CREDITED]: ValueCreditedPayload;
  [NotificationType.VALUE_ACCEPTANCE_SET]: ValueAcceptanceSetPayload;
}

/** A notification produced inside a transaction, not yet sequenced. */
export type PendingNotification = {
  [T in NotificationType]: { type: T; payload: NotificationPayloads[T] };
}[NotificationType];

export type Notification = {
  [T in NotificationType]: {
    sequence: number;
    type: T;
    payload: NotificationPayloads[T];
    /** Commit time, unix seconds */
    timestamp: number;
    prevHash: string;
    hash: string;
  };
}[NotificationType];

export interface NotificationLogState {
  headHash: string;
  sequence: number;
}
