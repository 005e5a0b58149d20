import { isLedgerError, LedgerError } from '../errors';

/** Malformed request body or parameter, rejected before reaching the ledger. */
export class BadRequestError extends Error {
  constructor(
    readonly field: string,
    message: string
  ) {
    super(message);
    this.name = 'BadRequestError';
  }
}

export interface ErrorBody {
  success: false;
  error: string;
  code: string;
  resubmittable?: boolean;
}

const NOT_FOUND_CODES = new Set(['NotRegistered', 'EventNotFound', 'ItemNotFound', 'ListingNotFound']);

export function statusForLedgerError(error: LedgerError): number {
  switch (error.category) {
    case 'validation':
      return 400;
    case 'authorization':
      return 401;
    case 'settlement':
      return 402;
    case 'authz':
      return 403;
    case 'state':
      return NOT_FOUND_CODES.has(error.code) ? 404 : 409;
    case 'capacity':
      return 409;
  }
}

export function toHttpError(error: unknown): { status: number; body: ErrorBody } {
  if (isLedgerError(error)) {
    const body: ErrorBody = { success: false, error: error.message, code: error.code };
    if (error.resubmittable) body.resubmittable = true;
    return { status: statusForLedgerError(error), body };
  }
  if (error instanceof BadRequestError) {
    return { status: 400, body: { success: false, error: error.message, code: 'BadRequest' } };
  }
  return { status: 500, body: { success: false, error: 'Internal error', code: 'Internal' } };
}
