import { Role } from '../access/roles';
import { CLAIM_ACHIEVEMENT, STATS_UPDATE } from '../auth/typed-payloads';
import {
  ADMIN,
  BACKEND_KEY,
  createTestPlatform,
  ESCROW,
  EVENT_MANAGER,
  HOUR,
  T0,
  TestPlatform,
  USER_KEY,
} from '../testing/test-platform';
import { MirrorIndex } from './mirror-index';

const ACCOUNT = USER_KEY.address;

function runScenario({ platform, backend, clock }: TestPlatform): void {
  platform.profiles.register(ACCOUNT);
  clock.advance(10);
  const statsFields = { account: ACCOUNT, xp: 500, level: 6, progressCount: 2, achievementCount: 1 };
  const stats = backend.sign(STATS_UPDATE, statsFields, 0, T0 + HOUR);
  platform.profiles.updateStats(ACCOUNT, statsFields, stats.deadline, stats.signature);

  const claimFields = { to: ACCOUNT, eventId: 'E', tier: 2, metadataHash: '01'.repeat(32) };
  const claim = backend.sign(CLAIM_ACHIEVEMENT, claimFields, 0, T0 + HOUR);
  platform.achievements.claim(ACCOUNT, 'E', 2, claimFields.metadataHash, claim.deadline, claim.signature);

  platform.events.createEvent(EVENT_MANAGER, {
    id: 'E',
    name: 'Sprint',
    startTime: T0,
    endTime: T0 + HOUR,
    maxParticipants: 3,
    reward: { achievementTier: 2, cosmeticItemIds: ['halo'], xpBonus: 25, hasReward: true },
  });
  platform.events.incrementParticipants(EVENT_MANAGER, 'E');
  platform.events.updateEvent(EVENT_MANAGER, 'E', {
    name: 'Sprint II',
    startTime: T0,
    endTime: T0 + 2 * HOUR,
    maxParticipants: 5,
    active: true,
  });

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
  platform.value.credit(ADMIN, 'buyer', 10_000n);

  platform.marketplace.createListing('seller', 'halo', 3, 400n);
  platform.marketplace.createListing('seller', 'halo', 1, 900n);
  clock.advance(5);
  platform.marketplace.buyItem('buyer', 1, 2, 1000n);
  platform.marketplace.cancelListing('seller', 2);
  platform.marketplace.buyItem('buyer', 1, 1, 400n);
}

describe('MirrorIndex', () => {
  it('rebuilds ledger state from notifications alone', () => {
    const context = createTestPlatform();
    const { platform } = context;
    runScenario(context);

    const mirror = MirrorIndex.fromLog(platform.notifications);

    expect(mirror.sequence).toBe(platform.notifications.sequence);
    expect(mirror.hasRole(Role.EVENT_MANAGER, EVENT_MANAGER)).toBe(true);
    expect(mirror.hasRole(Role.BACKEND_SIGNER, BACKEND_KEY.address)).toBe(true);

    const profile = platform.profiles.getProfile(ACCOUNT);
    expect(mirror.getProfile(ACCOUNT)).toEqual({
      xp: profile?.xp,
      level: profile?.level,
      progressCount: profile?.progressCount,
      achievementCount: profile?.achievementCount,
      lastUpdated: profile?.lastUpdated,
    });

    expect(mirror.listAchievements(ACCOUNT)).toEqual(
      platform.achievements.listForAccount(ACCOUNT).map(({ eventId, tier, unlockedAt, metadataHash }) => ({
        eventId,
        tier,
        unlockedAt,
        metadataHash,
      }))
    );

    expect(mirror.getEvent('E')).toEqual({
      ...platform.events.getEvent('E'),
      reward: platform.events.getEventReward('E'),
    });
    expect(mirror.getItem('halo')).toEqual(platform.catalog.getItem('halo'));

    for (const account of ['seller', 'buyer', ESCROW]) {
      expect(mirror.balanceOf(account, 'halo')).toBe(platform.catalog.balanceOf(account, 'halo'));
    }
    expect(mirror.getEquipped('seller', 'title')).toBe('halo');
    expect(mirror.getListing(1)).toEqual(platform.marketplace.getListing(1));
    expect(mirror.getListing(2)).toEqual(platform.marketplace.getListing(2));
    expect(mirror.accumulatedFees).toBe(platform.marketplace.accumulatedFees);
  });

  it('follows a live log after catching up', () => {
    const context = createTestPlatform();
    const { platform } = context;
    const mirror = new MirrorIndex();
    platform.profiles.register('early');

    const unfollow = mirror.follow(platform.notifications);
    runScenario(context);
    unfollow();

    expect(mirror.sequence).toBe(platform.notifications.sequence);
    expect(mirror.getProfile('early')?.xp).toBe(0);
    expect(mirror.getListing(1)?.status).toBe('Sold');
  });

  it('ignores replays and rejects gaps', () => {
    const { platform } = createTestPlatform();
    const [first, second, third] = platform.notifications.all();
    const mirror = new MirrorIndex();

    mirror.apply(first);
    mirror.apply(first);
    expect(mirror.sequence).toBe(1);
    expect(() => mirror.apply(third)).toThrow('Gap in notification feed: expected 2, got 3');
    mirror.apply(second);
    expect(mirror.sequence).toBe(2);
  });
});
