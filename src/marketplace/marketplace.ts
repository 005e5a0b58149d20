/**
 * Marketplace
 *
 * Escrow-based fixed-price listings of catalog units. Listed units sit in
 * the marketplace's own account until they are bought or the listing is
 * cancelled. Sales settle in the value ledger: the buyer pays into escrow,
 * the seller receives price minus the platform fee, the fee accumulates
 * for the Admin to withdraw, and any overpayment is refunded. All legs
 * commit together or not at all.
 */

import { AccessControlRegistry, requireAccount } from '../access/access-control';
import { Role } from '../access/roles';
import { CosmeticCatalog } from '../catalog/cosmetic-catalog';
import { AuthzError, SettlementError, StateError, ValidationError } from '../errors';
import { Notification, NotificationType } from '../notifications/types';
import { StructuredLogger } from '../scaling/structured-logger';
import { CommitSequencer } from '../state/commit-sequencer';
import { StateJournal } from '../state/journal';
import { Restorable } from '../state/state-builder';
import { ValueLedger } from './value-ledger';

export const BPS_DENOMINATOR = 10_000n;
export const DEFAULT_PLATFORM_FEE_BPS = 500;
export const DEFAULT_MAX_PLATFORM_FEE_BPS = 1000;

export type ListingStatus = 'Active' | 'Sold' | 'Cancelled';

export interface Listing {
  id: number;
  seller: string;
  itemId: string;
  /** Units still held in escrow for this listing */
  amount: number;
  pricePerUnit: bigint;
  status: ListingStatus;
  createdAt: number;
  soldAt: number | null;
}

export interface Sale {
  listingId: number;
  buyer: string;
  amount: number;
  totalPrice: bigint;
  fee: bigint;
  sellerProceeds: bigint;
  refund: bigint;
  listing: Listing;
}

export interface MarketplaceOptions {
  escrowAccount: string;
  platformFeeBps?: number;
  maxPlatformFeeBps?: number;
}

export interface MarketplaceDeps {
  sequencer: CommitSequencer;
  access: AccessControlRegistry;
  catalog: CosmeticCatalog;
  value: ValueLedger;
  logger: StructuredLogger;
}

interface FeeState {
  feeBps: number;
  accumulated: bigint;
  nextListingId: number;
}

export function platformFee(totalPrice: bigint, feeBps: number): bigint {
  return (totalPrice * BigInt(feeBps)) / BPS_DENOMINATOR;
}

function copyListing(listing: Listing): Listing {
  return { ...listing };
}

export class Marketplace implements Restorable {
  readonly escrowAccount: string;
  readonly maxPlatformFeeBps: number;

  private readonly listings = new Map<number, Listing>();
  private readonly byItem = new Map<string, number[]>();
  private readonly bySeller = new Map<string, number[]>();
  private readonly fees: FeeState;

  constructor(
    private readonly deps: MarketplaceDeps,
    options: MarketplaceOptions
  ) {
    requireAccount(options.escrowAccount);
    this.escrowAccount = options.escrowAccount;
    this.maxPlatformFeeBps = options.maxPlatformFeeBps ?? DEFAULT_MAX_PLATFORM_FEE_BPS;

    const feeBps = options.platformFeeBps ?? DEFAULT_PLATFORM_FEE_BPS;
    if (!Number.isSafeInteger(this.maxPlatformFeeBps) || this.maxPlatformFeeBps < 0 || this.maxPlatformFeeBps > 10_000) {
      throw new ValidationError('InvalidFee', 'Maximum platform fee must be between 0 and 10000 bps');
    }
    this.requireFee(feeBps);
    this.fees = { feeBps, accumulated: 0n, nextListingId: 1 };
  }

  restore(notification: Notification): void {
    switch (notification.type) {
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
        this.restoreIndex(this.byItem, itemId, listingId);
        this.restoreIndex(this.bySeller, seller, listingId);
        this.fees.nextListingId = Math.max(this.fees.nextListingId, listingId + 1);
        break;
      }

      case NotificationType.LISTING_CANCELLED: {
        const listing = this.requireListing(notification.payload.listingId);
        listing.amount = 0;
        listing.status = 'Cancelled';
        break;
      }

      case NotificationType.ITEM_SOLD: {
        const { listingId, seller, buyer, totalPrice, fee, sellerProceeds, remainingAmount, status } =
          notification.payload;
        const listing = this.requireListing(listingId);
        listing.amount = remainingAmount;
        listing.status = status;
        if (status === 'Sold') listing.soldAt = notification.timestamp;
        this.fees.accumulated += BigInt(fee);

        // Net of the refund: buyer pays the total, escrow keeps the fee
        this.deps.value.restoreTransfer(buyer, this.escrowAccount, BigInt(totalPrice));
        this.deps.value.restoreTransfer(this.escrowAccount, seller, BigInt(sellerProceeds));
        break;
      }

      case NotificationType.PLATFORM_FEE_UPDATED:
        this.fees.feeBps = notification.payload.newFeeBps;
        break;

      case NotificationType.FEES_WITHDRAWN: {
        const amount = BigInt(notification.payload.amount);
        this.fees.accumulated -= amount;
        this.deps.value.restoreTransfer(this.escrowAccount, notification.payload.to, amount);
        break;
      }
    }
  }

  createListing(caller: string, itemId: string, amount: number, pricePerUnit: bigint): Listing {
    return this.deps.sequencer.atomically('createListing', (tx) => {
      requireAccount(caller);
      if (!Number.isSafeInteger(amount) || amount <= 0) {
        throw new ValidationError('InvalidAmount', 'Listing amount must be a positive integer', { amount });
      }
      if (pricePerUnit <= 0n) {
        throw new ValidationError('InvalidPrice', 'Price per unit must be positive', {
          pricePerUnit: pricePerUnit.toString(),
        });
      }
      if (!this.deps.catalog.getItem(itemId)) {
        throw new StateError('ItemNotFound', `Item ${itemId} not found`, { itemId });
      }
      const held = this.deps.catalog.balanceOf(caller, itemId);
      if (held < amount) {
        throw new ValidationError('InsufficientBalance', `${caller} holds ${held} of ${itemId}`, {
          account: caller,
          itemId,
          available: held,
          required: amount,
        });
      }

      const id = this.fees.nextListingId;
      tx.assign(this.fees, 'nextListingId', id + 1);

      this.deps.catalog.transfer(this.escrowAccount, caller, this.escrowAccount, itemId, amount);

      const listing: Listing = {
        id,
        seller: caller,
        itemId,
        amount,
        pricePerUnit,
        status: 'Active',
        createdAt: this.deps.sequencer.now(),
        soldAt: null,
      };
      tx.put(this.listings, id, listing);
      this.index(tx, this.byItem, itemId, id);
      this.index(tx, this.bySeller, caller, id);

      tx.emit({
        type: NotificationType.LISTING_CREATED,
        payload: { listingId: id, seller: caller, itemId, amount, pricePerUnit: pricePerUnit.toString() },
      });
      this.deps.logger.info('marketplace', 'Listing created', { listingId: id, seller: caller, itemId, amount });
      return copyListing(listing);
    });
  }

  cancelListing(caller: string, listingId: number): Listing {
    return this.deps.sequencer.atomically('cancelListing', (tx) => {
      const listing = this.requireListing(listingId);
      if (listing.seller !== caller) {
        throw new AuthzError('NotSeller', `${caller} is not the seller of listing ${listingId}`, {
          listingId,
          caller,
        });
      }
      if (listing.status !== 'Active') {
        throw new StateError('ListingNotActive', `Listing ${listingId} is ${listing.status}`, {
          listingId,
          status: listing.status,
        });
      }

      const returnedAmount = listing.amount;
      this.deps.catalog.transfer(this.escrowAccount, this.escrowAccount, listing.seller, listing.itemId, returnedAmount);
      tx.assign(listing, 'amount', 0);
      tx.assign(listing, 'status', 'Cancelled');

      tx.emit({
        type: NotificationType.LISTING_CANCELLED,
        payload: { listingId, seller: listing.seller, itemId: listing.itemId, returnedAmount },
      });
      return copyListing(listing);
    });
  }

  buyItem(caller: string, listingId: number, amount: number, payment: bigint): Sale {
    return this.deps.sequencer.atomically('buyItem', (tx) => {
      requireAccount(caller);
      const listing = this.requireListing(listingId);
      if (listing.status !== 'Active') {
        throw new StateError('ListingNotActive', `Listing ${listingId} is ${listing.status}`, {
          listingId,
          status: listing.status,
        });
      }
      if (!Number.isSafeInteger(amount) || amount <= 0 || amount > listing.amount) {
        throw new ValidationError('InvalidAmount', `Amount must be between 1 and ${listing.amount}`, {
          listingId,
          amount,
        });
      }

      const totalPrice = listing.pricePerUnit * BigInt(amount);
      const fee = platformFee(totalPrice, this.fees.feeBps);
      const sellerProceeds = totalPrice - fee;
      if (payment < totalPrice) {
        throw new SettlementError('InsufficientPayment', `Payment ${payment} is below ${totalPrice}`, {
          listingId,
          payment: payment.toString(),
          totalPrice: totalPrice.toString(),
        });
      }

      const remainingAmount = listing.amount - amount;
      tx.assign(listing, 'amount', remainingAmount);
      if (remainingAmount === 0) {
        tx.assign(listing, 'status', 'Sold');
        tx.assign(listing, 'soldAt', this.deps.sequencer.now());
      }

      this.deps.catalog.transfer(this.escrowAccount, this.escrowAccount, caller, listing.itemId, amount);

      const refund = payment - totalPrice;
      this.deps.value.transfer(caller, this.escrowAccount, payment);
      this.deps.value.transfer(this.escrowAccount, listing.seller, sellerProceeds);
      tx.assign(this.fees, 'accumulated', this.fees.accumulated + fee);
      this.deps.value.transfer(this.escrowAccount, caller, refund);

      tx.emit({
        type: NotificationType.ITEM_SOLD,
        payload: {
          listingId,
          seller: listing.seller,
          buyer: caller,
          itemId: listing.itemId,
          amount,
          totalPrice: totalPrice.toString(),
          fee: fee.toString(),
          sellerProceeds: sellerProceeds.toString(),
          refund: refund.toString(),
          remainingAmount,
          status: remainingAmount === 0 ? 'Sold' : 'Active',
        },
      });
      this.deps.logger.info('marketplace', 'Item sold', {
        listingId,
        buyer: caller,
        amount,
        totalPrice: totalPrice.toString(),
      });

      return {
        listingId,
        buyer: caller,
        amount,
        totalPrice,
        fee,
        sellerProceeds,
        refund,
        listing: copyListing(listing),
      };
    });
  }

  setPlatformFee(caller: string, feeBps: number): void {
    this.deps.sequencer.atomically('setPlatformFee', (tx) => {
      this.deps.access.requireRole(Role.ADMIN, caller);
      this.requireFee(feeBps);

      const oldFeeBps = this.fees.feeBps;
      tx.assign(this.fees, 'feeBps', feeBps);
      tx.emit({ type: NotificationType.PLATFORM_FEE_UPDATED, payload: { oldFeeBps, newFeeBps: feeBps } });
    });
  }

  withdrawFees(caller: string, to: string): bigint {
    return this.deps.sequencer.atomically('withdrawFees', (tx) => {
      this.deps.access.requireRole(Role.ADMIN, caller);
      requireAccount(to);

      const amount = this.fees.accumulated;
      if (amount === 0n) {
        throw new StateError('NothingToWithdraw', 'No accumulated fees');
      }

      tx.assign(this.fees, 'accumulated', 0n);
      this.deps.value.transfer(this.escrowAccount, to, amount);
      tx.emit({ type: NotificationType.FEES_WITHDRAWN, payload: { to, amount: amount.toString() } });
      this.deps.logger.info('marketplace', 'Fees withdrawn', { to, amount: amount.toString() });
      return amount;
    });
  }

  getListing(listingId: number): Listing | undefined {
    const listing = this.listings.get(listingId);
    return listing ? copyListing(listing) : undefined;
  }

  listingsForItem(itemId: string): Listing[] {
    return this.collect(this.byItem.get(itemId));
  }

  listingsBySeller(seller: string): Listing[] {
    return this.collect(this.bySeller.get(seller));
  }

  activeListings(): Listing[] {
    const out: Listing[] = [];
    for (const listing of this.listings.values()) {
      if (listing.status === 'Active') out.push(copyListing(listing));
    }
    return out;
  }

  get platformFeeBps(): number {
    return this.fees.feeBps;
  }

  get accumulatedFees(): bigint {
    return this.fees.accumulated;
  }

  private requireFee(feeBps: number): void {
    if (!Number.isSafeInteger(feeBps) || feeBps < 0 || feeBps > this.maxPlatformFeeBps) {
      throw new ValidationError('InvalidFee', `Fee must be between 0 and ${this.maxPlatformFeeBps} bps`, {
        feeBps,
        max: this.maxPlatformFeeBps,
      });
    }
  }

  private requireListing(listingId: number): Listing {
    const listing = this.listings.get(listingId);
    if (!listing) {
      throw new StateError('ListingNotFound', `Listing ${listingId} not found`, { listingId });
    }
    return listing;
  }

  private index(tx: StateJournal, index: Map<string, number[]>, key: string, listingId: number): void {
    const ids = index.get(key);
    if (ids) {
      tx.append(ids, listingId);
    } else {
      tx.put(index, key, [listingId]);
    }
  }

  private restoreIndex(index: Map<string, number[]>, key: string, listingId: number): void {
    const ids = index.get(key);
    if (ids) {
      ids.push(listingId);
    } else {
      index.set(key, [listingId]);
    }
  }

  private collect(ids: number[] | undefined): Listing[] {
    const out: Listing[] = [];
    for (const id of ids ?? []) {
      const listing = this.listings.get(id);
      if (listing) out.push(copyListing(listing));
    }
    return out;
  }
}
