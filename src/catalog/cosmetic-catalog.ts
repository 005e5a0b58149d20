/**
 * Cosmetic Catalog
 *
 * Item definitions, fungible per-account holdings and one equip slot per
 * category. Admin defines and mints; owners equip, transfer and approve
 * operators. Registered custodians (the marketplace escrow) may move units
 * on anyone's behalf.
 *
 * Equip pointers are not reservations: they are left in place when the
 * underlying units leave the account.
 */

import { AccessControlRegistry, requireAccount } from '../access/access-control';
import { Role } from '../access/roles';
import { AuthzError, CapacityError, StateError, ValidationError } from '../errors';
import { Tier } from '../ledger/tiers';
import { Notification, NotificationType } from '../notifications/types';
import { StructuredLogger } from '../scaling/structured-logger';
import { CommitSequencer } from '../state/commit-sequencer';
import { StateJournal } from '../state/journal';
import { Restorable } from '../state/state-builder';
import { CosmeticCategory, CosmeticItem, CreateItemInput, isCosmeticCategory, isCosmeticRarity } from './types';

export interface CosmeticCatalogDeps {
  sequencer: CommitSequencer;
  access: AccessControlRegistry;
  logger: StructuredLogger;
}

function requireQuantity(amount: number): void {
  if (!Number.isSafeInteger(amount) || amount <= 0) {
    throw new ValidationError('InvalidAmount', 'Amount must be a positive integer', { amount });
  }
}

function requireCategory(category: string): CosmeticCategory {
  if (!isCosmeticCategory(category)) {
    throw new ValidationError('InvalidCategory', `Unknown category: ${category}`, { category });
  }
  return category;
}

export class CosmeticCatalog implements Restorable {
  private readonly items = new Map<string, CosmeticItem>();
  /** account → itemId → quantity; zero quantities are removed */
  private readonly holdings = new Map<string, Map<string, number>>();
  /** account → category → itemId */
  private readonly equipped = new Map<string, Map<CosmeticCategory, string>>();
  /** owner → approved operators */
  private readonly approvals = new Map<string, Set<string>>();
  private readonly custodians = new Set<string>();

  constructor(private readonly deps: CosmeticCatalogDeps) {}

  restore(notification: Notification): void {
    switch (notification.type) {
      case NotificationType.ITEM_CREATED: {
        const { itemId, name, category, rarity, imageHash, maxSupply, minTier } = notification.payload;
        this.items.set(itemId, { id: itemId, name, category, rarity, imageHash, maxSupply, currentSupply: 0, minTier });
        break;
      }

      case NotificationType.ITEM_MINTED: {
        const { itemId, to, amount, currentSupply } = notification.payload;
        this.requireItem(itemId).currentSupply = currentSupply;
        this.restoreHolding(to, itemId, amount);
        break;
      }

      case NotificationType.ITEM_TRANSFERRED: {
        const { itemId, from, to, amount } = notification.payload;
        this.restoreHolding(from, itemId, -amount);
        this.restoreHolding(to, itemId, amount);
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

      case NotificationType.APPROVAL_SET: {
        const { owner, operator, approved } = notification.payload;
        const operators = this.approvals.get(owner) ?? new Set<string>();
        if (approved) {
          operators.add(operator);
        } else {
          operators.delete(operator);
        }
        this.approvals.set(owner, operators);
        break;
      }

      case NotificationType.CUSTODIAN_SET:
        if (notification.payload.enabled) {
          this.custodians.add(notification.payload.account);
        } else {
          this.custodians.delete(notification.payload.account);
        }
        break;
    }
  }

  createItem(caller: string, input: CreateItemInput): CosmeticItem {
    return this.deps.sequencer.atomically('createItem', (tx) => {
      this.deps.access.requireRole(Role.ADMIN, caller);

      if (typeof input.id !== 'string' || input.id.length === 0) {
        throw new ValidationError('InvalidIdentifier', 'Item id must be a non-empty string');
      }
      if (this.items.has(input.id)) {
        throw new StateError('ItemAlreadyExists', `Item ${input.id} already exists`, { itemId: input.id });
      }
      const category = requireCategory(input.category);
      if (!isCosmeticRarity(input.rarity)) {
        throw new ValidationError('InvalidRarity', `Unknown rarity: ${input.rarity}`, { rarity: input.rarity });
      }
      if (!Number.isSafeInteger(input.maxSupply) || input.maxSupply < 0) {
        throw new ValidationError('InvalidCapacity', 'maxSupply must be a non-negative integer', {
          maxSupply: input.maxSupply,
        });
      }
      if (!Number.isSafeInteger(input.minTier) || input.minTier < 0 || input.minTier > Tier.DIAMOND) {
        throw new ValidationError('InvalidTier', 'minTier must be between 0 and 5', { minTier: input.minTier });
      }

      const item: CosmeticItem = {
        id: input.id,
        name: input.name,
        category,
        rarity: input.rarity,
        imageHash: input.imageHash,
        maxSupply: input.maxSupply,
        currentSupply: 0,
        minTier: input.minTier,
      };

      tx.put(this.items, item.id, item);
      tx.emit({
        type: NotificationType.ITEM_CREATED,
        payload: {
          itemId: item.id,
          name: item.name,
          category: item.category,
          rarity: item.rarity,
          imageHash: item.imageHash,
          maxSupply: item.maxSupply,
          minTier: item.minTier,
        },
      });
      this.deps.logger.info('catalog', 'Item created', { itemId: item.id, category, rarity: item.rarity });
      return { ...item };
    });
  }

  mintItem(caller: string, to: string, itemId: string, amount: number): number {
    return this.deps.sequencer.atomically('mintItem', (tx) => {
      this.deps.access.requireRole(Role.ADMIN, caller);
      requireAccount(to);
      const item = this.requireItem(itemId);
      requireQuantity(amount);

      const currentSupply = item.currentSupply + amount;
      if (item.maxSupply !== 0 && currentSupply > item.maxSupply) {
        throw new CapacityError('MaxSupplyReached', `Minting ${amount} of ${itemId} exceeds max supply`, {
          itemId,
          maxSupply: item.maxSupply,
          currentSupply: item.currentSupply,
        });
      }

      tx.assign(item, 'currentSupply', currentSupply);
      this.adjust(tx, to, itemId, amount);
      tx.emit({ type: NotificationType.ITEM_MINTED, payload: { itemId, to, amount, currentSupply } });
      return currentSupply;
    });
  }

  equipItem(caller: string, category: string, itemId: string): void {
    requireAccount(caller);
    this.deps.sequencer.atomically('equipItem', (tx) => {
      const slot = requireCategory(category);
      const item = this.requireItem(itemId);

      if (this.balanceOf(caller, itemId) < 1) {
        throw new StateError('ItemNotOwned', `${caller} does not own ${itemId}`, { account: caller, itemId });
      }
      if (item.category !== slot) {
        throw new ValidationError('InvalidCategory', `Item ${itemId} is a ${item.category}, not a ${slot}`, {
          itemId,
          category: slot,
        });
      }

      let slots = this.equipped.get(caller);
      if (!slots) {
        slots = new Map();
        tx.put(this.equipped, caller, slots);
      }
      tx.put(slots, slot, itemId);
      tx.emit({ type: NotificationType.ITEM_EQUIPPED, payload: { account: caller, category: slot, itemId } });
    });
  }

  unequipItem(caller: string, category: string): string {
    requireAccount(caller);
    return this.deps.sequencer.atomically('unequipItem', (tx) => {
      const slot = requireCategory(category);
      const slots = this.equipped.get(caller);
      const itemId = slots?.get(slot);
      if (!slots || itemId === undefined) {
        throw new StateError('ItemNotEquipped', `Nothing equipped in ${slot}`, { account: caller, category: slot });
      }

      tx.remove(slots, slot);
      tx.emit({ type: NotificationType.ITEM_UNEQUIPPED, payload: { account: caller, category: slot, itemId } });
      return itemId;
    });
  }

  transfer(caller: string, from: string, to: string, itemId: string, amount: number): void {
    this.deps.sequencer.atomically('transferItem', (tx) => {
      if (!this.mayMove(caller, from)) {
        throw new AuthzError('Unauthorized', `${caller} may not move units held by ${from}`, { caller, from });
      }
      requireAccount(to);
      this.requireItem(itemId);
      requireQuantity(amount);

      const available = this.balanceOf(from, itemId);
      if (available < amount) {
        throw new ValidationError('InsufficientBalance', `${from} holds ${available} of ${itemId}`, {
          account: from,
          itemId,
          available,
          required: amount,
        });
      }

      this.adjust(tx, from, itemId, -amount);
      this.adjust(tx, to, itemId, amount);
      tx.emit({
        type: NotificationType.ITEM_TRANSFERRED,
        payload: { itemId, from, to, amount, operator: caller },
      });
    });
  }

  setApprovalForAll(caller: string, operator: string, approved: boolean): void {
    requireAccount(caller);
    requireAccount(operator);
    this.deps.sequencer.atomically('setApprovalForAll', (tx) => {
      let operators = this.approvals.get(caller);
      if (!operators) {
        operators = new Set();
        tx.put(this.approvals, caller, operators);
      }
      if (approved) {
        tx.add(operators, operator);
      } else {
        tx.discard(operators, operator);
      }
      tx.emit({ type: NotificationType.APPROVAL_SET, payload: { owner: caller, operator, approved } });
    });
  }

  setCustodian(caller: string, account: string, enabled: boolean): void {
    this.deps.sequencer.atomically('setCustodian', (tx) => {
      this.deps.access.requireRole(Role.ADMIN, caller);
      requireAccount(account);
      if (enabled === this.custodians.has(account)) return;

      if (enabled) {
        tx.add(this.custodians, account);
      } else {
        tx.discard(this.custodians, account);
      }
      tx.emit({ type: NotificationType.CUSTODIAN_SET, payload: { account, enabled, sender: caller } });
    });
  }

  getItem(itemId: string): CosmeticItem | undefined {
    const item = this.items.get(itemId);
    return item ? { ...item } : undefined;
  }

  listItems(): CosmeticItem[] {
    return Array.from(this.items.values(), (item) => ({ ...item }));
  }

  balanceOf(account: string, itemId: string): number {
    return this.holdings.get(account)?.get(itemId) ?? 0;
  }

  /** Non-zero holdings of `account`, keyed by item id. */
  inventoryOf(account: string): Record<string, number> {
    return Object.fromEntries(this.holdings.get(account) ?? []);
  }

  getEquipped(account: string, category: CosmeticCategory): string | undefined {
    return this.equipped.get(account)?.get(category);
  }

  isApprovedForAll(owner: string, operator: string): boolean {
    return this.approvals.get(owner)?.has(operator) ?? false;
  }

  isCustodian(account: string): boolean {
    return this.custodians.has(account);
  }

  private mayMove(caller: string, from: string): boolean {
    return caller === from || this.isApprovedForAll(from, caller) || this.custodians.has(caller);
  }

  private requireItem(itemId: string): CosmeticItem {
    const item = this.items.get(itemId);
    if (!item) {
      throw new StateError('ItemNotFound', `Item ${itemId} not found`, { itemId });
    }
    return item;
  }

  private restoreHolding(account: string, itemId: string, delta: number): void {
    const held = this.holdings.get(account) ?? new Map<string, number>();
    const next = (held.get(itemId) ?? 0) + delta;
    if (next === 0) {
      held.delete(itemId);
    } else {
      held.set(itemId, next);
    }
    this.holdings.set(account, held);
  }

  private adjust(tx: StateJournal, account: string, itemId: string, delta: number): void {
    let held = this.holdings.get(account);
    if (!held) {
      held = new Map();
      tx.put(this.holdings, account, held);
    }

    const next = (held.get(itemId) ?? 0) + delta;
    if (next === 0) {
      tx.remove(held, itemId);
    } else {
      tx.put(held, itemId, next);
    }
  }
}
