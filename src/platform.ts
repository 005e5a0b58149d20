/**
 * Ledger Platform
 *
 * Composition root. Builds the components leaves-first and hands each one
 * the references it needs; nothing is looked up at call time.
 *
 * A fresh ledger is bootstrapped from the options. A ledger whose data
 * directory already holds notifications is rebuilt from them instead, and
 * consumed nonces are reloaded from their own file.
 */

import * as path from 'path';
import { AccessControlRegistry } from './access/access-control';
import { Role } from './access/roles';
import { AuthorizationVerifier } from './auth/authorization-verifier';
import { SigningDomain } from './auth/typed-payloads';
import { CosmeticCatalog } from './catalog/cosmetic-catalog';
import { EventRegistry } from './events/event-registry';
import { AchievementLedger } from './ledger/achievement-ledger';
import { ProfileLedger } from './ledger/profile-ledger';
import { Marketplace } from './marketplace/marketplace';
import { ValueLedger } from './marketplace/value-ledger';
import { NotificationLog } from './notifications/notification-log';
import { MetricsCollector } from './scaling/metrics';
import { logger as defaultLogger, StructuredLogger } from './scaling/structured-logger';
import { Clock, systemClock } from './state/clock';
import { CommitSequencer } from './state/commit-sequencer';
import { rebuildState } from './state/state-builder';

const NONCE_FILE = 'nonces.json';

export interface LedgerPlatformOptions {
  domain: SigningDomain;
  adminAccount: string;
  /** Account that holds listed units and settles sales */
  marketplaceAccount: string;
  backendSignerAccount?: string;
  eventManagerAccount?: string;
  platformFeeBps?: number;
  maxPlatformFeeBps?: number;
  /** Persist the notification log and nonce table here; in-memory when omitted */
  dataDir?: string;
  clock?: Clock;
  logger?: StructuredLogger;
  metrics?: MetricsCollector;
}

export class LedgerPlatform {
  readonly clock: Clock;
  readonly logger: StructuredLogger;
  readonly metrics: MetricsCollector;
  readonly notifications: NotificationLog;
  readonly sequencer: CommitSequencer;
  readonly access: AccessControlRegistry;
  readonly verifier: AuthorizationVerifier;
  readonly profiles: ProfileLedger;
  readonly achievements: AchievementLedger;
  readonly events: EventRegistry;
  readonly catalog: CosmeticCatalog;
  readonly value: ValueLedger;
  readonly marketplace: Marketplace;

  constructor(options: LedgerPlatformOptions) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? new MetricsCollector();

    this.notifications = new NotificationLog({
      dataDir: options.dataDir,
      logger: this.logger,
      metrics: this.metrics,
    });
    this.sequencer = new CommitSequencer({
      clock: this.clock,
      notifications: this.notifications,
      logger: this.logger,
      metrics: this.metrics,
    });

    this.access = new AccessControlRegistry(this.sequencer);
    this.verifier = new AuthorizationVerifier({
      access: this.access,
      domain: options.domain,
      clock: this.clock,
      logger: this.logger,
      nonceFile: options.dataDir ? path.join(options.dataDir, NONCE_FILE) : undefined,
    });

    const ledgerDeps = { sequencer: this.sequencer, verifier: this.verifier };
    this.profiles = new ProfileLedger({ ...ledgerDeps, logger: this.logger });
    this.achievements = new AchievementLedger({ ...ledgerDeps, logger: this.logger });

    const adminDeps = { sequencer: this.sequencer, access: this.access };
    this.events = new EventRegistry({ ...adminDeps, logger: this.logger });
    this.catalog = new CosmeticCatalog({ ...adminDeps, logger: this.logger });
    this.value = new ValueLedger({ ...adminDeps, logger: this.logger });
    this.marketplace = new Marketplace(
      { ...adminDeps, catalog: this.catalog, value: this.value, logger: this.logger },
      {
        escrowAccount: options.marketplaceAccount,
        platformFeeBps: options.platformFeeBps,
        maxPlatformFeeBps: options.maxPlatformFeeBps,
      }
    );

    if (this.notifications.sequence === 0) {
      this.bootstrap(options);
    } else {
      this.restore(options);
    }

    this.logger.info('platform', 'Ledger platform ready', {
      admin: options.adminAccount,
      marketplace: options.marketplaceAccount,
      network: options.domain.network,
      notifications: this.notifications.sequence,
    });
  }

  private bootstrap(options: LedgerPlatformOptions): void {
    const admin = options.adminAccount;

    this.sequencer.atomically('bootstrap', () => {
      this.access.bootstrapAdmin(admin);
      this.catalog.setCustodian(admin, options.marketplaceAccount, true);
      if (options.backendSignerAccount) {
        this.access.grantRole(admin, Role.BACKEND_SIGNER, options.backendSignerAccount);
      }
      if (options.eventManagerAccount) {
        this.access.grantRole(admin, Role.EVENT_MANAGER, options.eventManagerAccount);
      }
    });
  }

  private restore(options: LedgerPlatformOptions): void {
    const components = [
      this.access,
      this.verifier,
      this.profiles,
      this.achievements,
      this.events,
      this.catalog,
      this.value,
      this.marketplace,
    ];
    rebuildState(this.notifications, components, this.logger);

    // Role and custodian options only seed a fresh ledger; later changes go through Admin
    const expected: Array<[boolean, string]> = [
      [this.access.hasRole(Role.ADMIN, options.adminAccount), 'adminAccount does not hold Admin'],
      [this.catalog.isCustodian(options.marketplaceAccount), 'marketplaceAccount is not a custodian'],
    ];
    if (options.backendSignerAccount) {
      expected.push([
        this.access.hasRole(Role.BACKEND_SIGNER, options.backendSignerAccount),
        'backendSignerAccount does not hold BackendSigner',
      ]);
    }
    if (options.eventManagerAccount) {
      expected.push([
        this.access.hasRole(Role.EVENT_MANAGER, options.eventManagerAccount),
        'eventManagerAccount does not hold EventManager',
      ]);
    }
    for (const [holds, warning] of expected) {
      if (!holds) this.logger.warn('platform', `Restored state differs from options: ${warning}`);
    }
  }
}
