/**
 * Body parsing for the relay endpoints. Only shapes are checked here;
 * value rules (ranges, hashes, signatures) stay with the ledger so that
 * HTTP and in-process callers see the same errors.
 */

import type { ProfileStats } from '../ledger/profile-ledger';
import { BadRequestError } from './http-errors';

export interface SignedBody {
  deadline: number;
  signature: string;
}

export interface RegisterRelay extends SignedBody {
  account: string;
}

export interface StatsRelay extends SignedBody {
  account: string;
  stats: ProfileStats;
}

export interface ClaimRelay extends SignedBody {
  to: string;
  eventId: string;
  tier: number;
  metadataHash: string;
}

type Body = Record<string, unknown>;

function asBody(value: unknown): Body {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new BadRequestError('body', 'Request body must be a JSON object');
  }
  return Object.fromEntries(Object.entries(value));
}

function str(body: Body, field: string): string {
  const value = body[field];
  if (typeof value !== 'string' || value.length === 0) {
    throw new BadRequestError(field, `${field} must be a non-empty string`);
  }
  return value;
}

function num(body: Body, field: string): number {
  const value = body[field];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new BadRequestError(field, `${field} must be a number`);
  }
  return value;
}

function signed(body: Body): SignedBody {
  return { deadline: num(body, 'deadline'), signature: str(body, 'signature') };
}

export function parseRegisterRelay(raw: unknown): RegisterRelay {
  const body = asBody(raw);
  return { account: str(body, 'account'), ...signed(body) };
}

export function parseStatsRelay(raw: unknown): StatsRelay {
  const body = asBody(raw);
  return {
    account: str(body, 'account'),
    stats: {
      xp: num(body, 'xp'),
      level: num(body, 'level'),
      progressCount: num(body, 'progressCount'),
      achievementCount: num(body, 'achievementCount'),
    },
    ...signed(body),
  };
}

export function parseClaimRelay(raw: unknown): ClaimRelay {
  const body = asBody(raw);
  return {
    to: str(body, 'to'),
    eventId: str(body, 'eventId'),
    tier: num(body, 'tier'),
    metadataHash: str(body, 'metadataHash'),
    ...signed(body),
  };
}

export function parseListingId(raw: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new BadRequestError('id', 'Listing id must be a positive integer');
  }
  return parseInt(raw, 10);
}
