/**
 * Ledger error taxonomy.
 *
 * Every failure aborts its operation as a whole. The `code` is the
 * authoritative reason a caller uses to decide between resubmitting
 * (fresh signature) and abandoning.
 */

export type ErrorCategory =
  | 'authorization'
  | 'state'
  | 'validation'
  | 'capacity'
  | 'authz'
  | 'settlement';

export type AuthorizationCode = 'SignatureExpired' | 'InvalidSigner' | 'InvalidSignature';

export type StateCode =
  | 'AlreadyRegistered'
  | 'NotRegistered'
  | 'AlreadyHasAchievement'
  | 'EventAlreadyExists'
  | 'EventNotFound'
  | 'ItemAlreadyExists'
  | 'ItemNotFound'
  | 'ItemNotOwned'
  | 'ItemNotEquipped'
  | 'ListingNotFound'
  | 'ListingNotActive'
  | 'NothingToWithdraw';

export type ValidationCode =
  | 'InvalidTier'
  | 'InvalidRewardTier'
  | 'InvalidFee'
  | 'InvalidTimeWindow'
  | 'InvalidCategory'
  | 'InvalidRarity'
  | 'InvalidAmount'
  | 'InvalidPrice'
  | 'InvalidCapacity'
  | 'InvalidStats'
  | 'InvalidMetadataHash'
  | 'InvalidAccount'
  | 'InvalidIdentifier'
  | 'InsufficientBalance';

export type CapacityCode = 'EventFull' | 'MaxSupplyReached';

export type AuthzCode = 'Unauthorized' | 'NotSeller' | 'NotEventManager';

export type SettlementCode = 'InsufficientPayment' | 'TransferFailed';

export type LedgerErrorCode =
  | AuthorizationCode
  | StateCode
  | ValidationCode
  | CapacityCode
  | AuthzCode
  | SettlementCode;

export abstract class LedgerError extends Error {
  abstract readonly category: ErrorCategory;
  readonly code: LedgerErrorCode;
  readonly details?: Record<string, unknown>;

  protected constructor(code: LedgerErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }

  /**
   * Whether the same intent may succeed if submitted again with a fresh
   * signature. Only expiry qualifies; everything else is final.
   */
  get resubmittable(): boolean {
    return this.code === 'SignatureExpired';
  }

  toJSON(): { code: LedgerErrorCode; category: ErrorCategory; message: string } {
    return { code: this.code, category: this.category, message: this.message };
  }
}

export class AuthorizationError extends LedgerError {
  readonly category = 'authorization';

  constructor(code: AuthorizationCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
  }
}

export class StateError extends LedgerError {
  readonly category = 'state';

  constructor(code: StateCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
  }
}

export class ValidationError extends LedgerError {
  readonly category = 'validation';

  constructor(code: ValidationCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
  }
}

export class CapacityError extends LedgerError {
  readonly category = 'capacity';

  constructor(code: CapacityCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
  }
}

export class AuthzError extends LedgerError {
  readonly category = 'authz';

  constructor(code: AuthzCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
  }
}

export class SettlementError extends LedgerError {
  readonly category = 'settlement';

  constructor(code: SettlementCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
  }
}

export function isLedgerError(error: unknown): error is LedgerError {
  return error instanceof LedgerError;
}
