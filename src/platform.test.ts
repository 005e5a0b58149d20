import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Role } from './access/roles';
import { CLAIM_ACHIEVEMENT, REGISTER, STATS_UPDATE } from './auth/typed-payloads';
import { NotificationType } from './notifications/types';
import {
  ADMIN,
  caught,
  createTestPlatform,
  ESCROW,
  EVENT_MANAGER,
  HOUR,
  T0,
  TestPlatform,
  USER_KEY,
} from './testing/test-platform';

const ACCOUNT = USER_KEY.address;
const METADATA = '0a'.repeat(32);

function populate({ platform, user, backend, clock }: TestPlatform) {
  const registration = user.sign(REGISTER, { account: ACCOUNT }, 0, T0 + HOUR);
  platform.profiles.registerFor(ACCOUNT, registration.deadline, registration.signature, 'relayer-1');
  clock.advance(10);

  const stats = { account: ACCOUNT, xp: 900, level: 7, progressCount: 3, achievementCount: 1 };
  const statsAuth = backend.sign(STATS_UPDATE, stats, 0, T0 + HOUR);
  platform.profiles.updateStats(ACCOUNT, stats, statsAuth.deadline, statsAuth.signature);

  const rejectedFields = { to: ACCOUNT, eventId: 'E', tier: 6, metadataHash: METADATA };
  const rejected = backend.sign(CLAIM_ACHIEVEMENT, rejectedFields, 0, T0 + HOUR);
  const invalid = caught(() =>
    platform.achievements.claim(ACCOUNT, 'E', 6, METADATA, rejected.deadline, rejected.signature)
  );
  expect(invalid.code).toBe('InvalidTier');

  const claimFields = { to: ACCOUNT, eventId: 'E', tier: 2, metadataHash: METADATA };
  const claim = backend.sign(CLAIM_ACHIEVEMENT, claimFields, 1, T0 + HOUR);
  platform.achievements.claim(ACCOUNT, 'E', 2, METADATA, claim.deadline, claim.signature);

  platform.events.createEvent(EVENT_MANAGER, {
    id: 'E',
    name: 'Sprint',
    startTime: T0,
    endTime: T0 + HOUR,
    maxParticipants: 3,
    reward: { achievementTier: 2, cosmeticItemIds: ['halo'], xpBonus: 25, hasReward: true },
  });
  platform.events.incrementParticipants(EVENT_MANAGER, 'E');
  platform.access.grantRole(ADMIN, Role.EVENT_MANAGER, 'helper');
  platform.access.revokeRole(ADMIN, Role.EVENT_MANAGER, 'helper');

  platform.catalog.createItem(ADMIN, {
    id: 'halo',
    name: 'Halo',
    category: 'title',
    rarity: 'legendary',
    imageHash: '02'.repeat(32),
    maxSupply: 4,
    minTier: 1,
  });
  platform.catalog.mintItem(ADMIN, 'seller', 'halo', 4);
  platform.catalog.equipItem('seller', 'title', 'halo');
  platform.catalog.setApprovalForAll('seller', 'helper', true);
  platform.value.credit(ADMIN, 'buyer', 10_000n);
  platform.value.setAcceptsValue('refuser', false);

  clock.advance(5);
  platform.marketplace.createListing('seller', 'halo', 3, 400n);
  platform.marketplace.createListing('seller', 'halo', 1, 900n);
  platform.marketplace.setPlatformFee(ADMIN, 1000);
  platform.marketplace.buyItem('buyer', 1, 2, 1000n);
  platform.marketplace.cancelListing('seller', 2);
  platform.marketplace.withdrawFees(ADMIN, 'treasury');

  return { registration, statsAuth, stats };
}

describe('LedgerPlatform', () => {
  let dataDir: string;

  beforeEach(() => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ledger-platform-'));
  });

  afterEach(() => {
    fs.rmSync(dataDir, { recursive: true, force: true });
  });

  it('rebuilds every component from its data directory on restart', () => {
    const first = createTestPlatform({ dataDir });
    populate(first);
    const before = first.platform;

    const { platform } = createTestPlatform({ dataDir });

    expect(platform.notifications.sequence).toBe(before.notifications.sequence);
    expect(platform.notifications.headHash).toBe(before.notifications.headHash);

    expect(platform.access.membersOf(Role.EVENT_MANAGER)).toEqual([EVENT_MANAGER]);
    expect(platform.profiles.getProfile(ACCOUNT)).toEqual(before.profiles.getProfile(ACCOUNT));
    expect(platform.profiles.getProfile(ACCOUNT)?.lastUpdated).toBe(T0 + 10);
    expect(platform.achievements.listForAccount(ACCOUNT)).toEqual(before.achievements.listForAccount(ACCOUNT));
    expect(platform.verifier.noncesOf(ACCOUNT)).toEqual({ register: 1, statsUpdate: 1, claim: 2 });

    expect(platform.events.getEvent('E')).toEqual(before.events.getEvent('E'));
    expect(platform.events.getEvent('E')?.currentParticipants).toBe(1);
    expect(platform.events.getEventReward('E')).toEqual(before.events.getEventReward('E'));

    expect(platform.catalog.getItem('halo')).toEqual(before.catalog.getItem('halo'));
    expect(platform.catalog.inventoryOf('seller')).toEqual({ halo: 1 });
    expect(platform.catalog.inventoryOf('buyer')).toEqual({ halo: 2 });
    expect(platform.catalog.inventoryOf(ESCROW)).toEqual({ halo: 1 });
    expect(platform.catalog.getEquipped('seller', 'title')).toBe('halo');
    expect(platform.catalog.isApprovedForAll('seller', 'helper')).toBe(true);
    expect(platform.catalog.isCustodian(ESCROW)).toBe(true);

    expect(platform.value.balanceOf('buyer')).toBe(9200n);
    expect(platform.value.balanceOf('seller')).toBe(720n);
    expect(platform.value.balanceOf('treasury')).toBe(80n);
    expect(platform.value.balanceOf(ESCROW)).toBe(0n);
    expect(platform.value.acceptsValue('refuser')).toBe(false);

    expect(platform.marketplace.getListing(1)).toEqual(before.marketplace.getListing(1));
    expect(platform.marketplace.getListing(2)).toEqual(before.marketplace.getListing(2));
    expect(platform.marketplace.platformFeeBps).toBe(1000);
    expect(platform.marketplace.accumulatedFees).toBe(0n);
  });

  it('keeps operating on restored state', () => {
    populate(createTestPlatform({ dataDir }));
    const { platform } = createTestPlatform({ dataDir });

    expect(platform.marketplace.createListing('seller', 'halo', 1, 500n).id).toBe(3);
    const sale = platform.marketplace.buyItem('buyer', 1, 1, 400n);

    expect(sale.fee).toBe(40n);
    expect(sale.listing.status).toBe('Sold');
    expect(platform.value.balanceOf('buyer')).toBe(8800n);
    expect(platform.value.balanceOf('seller')).toBe(1080n);
    expect(platform.notifications.verifyChain().valid).toBe(true);
  });

  it('rejects signatures replayed after a restart', () => {
    const { registration, statsAuth, stats } = populate(createTestPlatform({ dataDir }));
    const { platform } = createTestPlatform({ dataDir });
    const before = platform.notifications.sequence;

    const register = caught(() =>
      platform.profiles.registerFor(ACCOUNT, registration.deadline, registration.signature)
    );
    expect(register.code).toBe('InvalidSignature');
    const update = caught(() => platform.profiles.updateStats(ACCOUNT, stats, statsAuth.deadline, statsAuth.signature));
    expect(update.code).toBe('InvalidSigner');
    expect(caught(() => platform.profiles.register(ACCOUNT)).code).toBe('AlreadyRegistered');

    expect(platform.notifications.sequence).toBe(before);
    const registrations = platform.notifications.all().filter((n) => n.type === NotificationType.PROFILE_REGISTERED);
    expect(registrations).toHaveLength(1);
  });

  it('bootstraps roles only on a fresh data directory', () => {
    createTestPlatform({ dataDir });
    const { platform } = createTestPlatform({ dataDir });

    expect(platform.notifications.sequence).toBe(4);
    expect(platform.access.membersOf(Role.ADMIN)).toEqual([ADMIN]);
  });
});
