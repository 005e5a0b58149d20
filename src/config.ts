/**
 * Node configuration, read from the environment (.env via dotenv).
 */

import * as dotenv from 'dotenv';
import * as path from 'path';
import { SigningDomain } from './auth/typed-payloads';
import { NetworkName } from './crypto';
import { DEFAULT_MAX_PLATFORM_FEE_BPS, DEFAULT_PLATFORM_FEE_BPS } from './marketplace/marketplace';
import { LogLevel, parseLogLevel } from './scaling/structured-logger';

export interface LedgerConfig {
  domain: SigningDomain;
  adminAccount: string;
  backendSignerAccount?: string;
  eventManagerAccount?: string;
  marketplaceAccount: string;
  platformFeeBps: number;
  maxPlatformFeeBps: number;
  /** HTTP API and WebSocket stream share this port */
  port: number;
  dataDir: string;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(
    readonly variable: string,
    message: string
  ) {
    super(`${variable}: ${message}`);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

function optional(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function required(env: Env, name: string): string {
  const value = optional(env, name);
  if (!value) {
    throw new ConfigError(name, 'is required');
  }
  return value;
}

function integer(env: Env, name: string, fallback: number, min: number, max: number): number {
  const raw = optional(env, name);
  if (raw === undefined) return fallback;

  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(name, `expected an integer, got "${raw}"`);
  }
  const value = parseInt(raw, 10);
  if (value < min || value > max) {
    throw new ConfigError(name, `must be between ${min} and ${max}`);
  }
  return value;
}

function network(env: Env): NetworkName {
  const raw = optional(env, 'LEDGER_NETWORK') ?? 'testnet';
  switch (raw) {
    case 'mainnet':
    case 'testnet':
    case 'regtest':
      return raw;
    default:
      throw new ConfigError('LEDGER_NETWORK', `unknown network "${raw}"`);
  }
}

/** The signing domain alone; signers need nothing else. */
export function loadSigningDomain(env: Env = process.env): SigningDomain {
  return {
    name: optional(env, 'LEDGER_PROTOCOL_NAME') ?? 'RewardLedger',
    version: optional(env, 'LEDGER_PROTOCOL_VERSION') ?? '1',
    network: network(env),
    verifyingEndpoint: optional(env, 'LEDGER_VERIFYING_ENDPOINT') ?? 'ledger-node',
  };
}

export function loadConfig(env: Env = process.env): LedgerConfig {
  const maxPlatformFeeBps = integer(env, 'MAX_PLATFORM_FEE_BPS', DEFAULT_MAX_PLATFORM_FEE_BPS, 0, 10_000);
  const platformFeeBps = integer(env, 'PLATFORM_FEE_BPS', DEFAULT_PLATFORM_FEE_BPS, 0, maxPlatformFeeBps);

  const rawLevel = optional(env, 'LEDGER_LOG_LEVEL');
  const logLevel = parseLogLevel(rawLevel);
  if (rawLevel !== undefined && logLevel === undefined) {
    throw new ConfigError('LEDGER_LOG_LEVEL', `unknown level "${rawLevel}"`);
  }

  return {
    domain: loadSigningDomain(env),
    adminAccount: required(env, 'ADMIN_ACCOUNT'),
    backendSignerAccount: optional(env, 'BACKEND_SIGNER_ACCOUNT'),
    eventManagerAccount: optional(env, 'EVENT_MANAGER_ACCOUNT'),
    marketplaceAccount: optional(env, 'MARKETPLACE_ACCOUNT') ?? 'marketplace-escrow',
    platformFeeBps,
    maxPlatformFeeBps,
    port: integer(env, 'PORT', 3000, 1, 65_535),
    dataDir: path.resolve(optional(env, 'DATA_DIR') ?? './data'),
    logLevel: logLevel ?? LogLevel.INFO,
  };
}

/** Loads .env into process.env, then reads the configuration from it. */
export function loadConfigFromEnvironment(): LedgerConfig {
  dotenv.config();
  return loadConfig(process.env);
}
