import { REGISTER, STATS_UPDATE, StatsUpdateFields } from '../auth/typed-payloads';
import { NotificationType } from '../notifications/types';
import { caught, createTestPlatform, HOUR, T0, USER_KEY } from '../testing/test-platform';
import { Tier, tierForLevel } from './tiers';

const ACCOUNT = USER_KEY.address;

function stats(level: number, xp = 100): StatsUpdateFields {
  return { account: ACCOUNT, xp, level, progressCount: 4, achievementCount: 0 };
}

describe('tierForLevel', () => {
  it('maps level bands to tiers', () => {
    expect([0, 2, 3, 4, 5, 6, 7, 8, 9, 40].map(tierForLevel)).toEqual([
      Tier.BRONZE,
      Tier.BRONZE,
      Tier.SILVER,
      Tier.SILVER,
      Tier.GOLD,
      Tier.GOLD,
      Tier.PLATINUM,
      Tier.PLATINUM,
      Tier.DIAMOND,
      Tier.DIAMOND,
    ]);
  });
});

describe('ProfileLedger', () => {
  it('registers a zeroed profile once', () => {
    const { platform } = createTestPlatform();

    const profile = platform.profiles.register(ACCOUNT);
    expect(profile).toEqual({
      xp: 0,
      level: 0,
      progressCount: 0,
      achievementCount: 0,
      lastUpdated: T0,
      exists: true,
    });
    expect(platform.profiles.tierOf(ACCOUNT)).toBe(Tier.BRONZE);
    expect(caught(() => platform.profiles.register(ACCOUNT)).code).toBe('AlreadyRegistered');
  });

  it('accepts a relayed self-signed registration', () => {
    const { platform, user } = createTestPlatform();
    const auth = user.sign(REGISTER, { account: ACCOUNT }, 0, T0 + HOUR);

    platform.profiles.registerFor(ACCOUNT, auth.deadline, auth.signature, 'relayer-1');

    expect(platform.profiles.isRegistered(ACCOUNT)).toBe(true);
    expect(platform.verifier.nonceOf(ACCOUNT, 'register')).toBe(1);
    const all = platform.notifications.all();
    expect(all[all.length - 1].payload).toEqual({ account: ACCOUNT, relayedBy: 'relayer-1' });
  });

  it('rejects a relayed registration replayed byte for byte', () => {
    const { platform, user } = createTestPlatform();
    const auth = user.sign(REGISTER, { account: ACCOUNT }, 0, T0 + HOUR);
    platform.profiles.registerFor(ACCOUNT, auth.deadline, auth.signature, 'relayer-1');
    const before = platform.notifications.sequence;

    const replay = caught(() => platform.profiles.registerFor(ACCOUNT, auth.deadline, auth.signature, 'relayer-2'));

    expect(replay.code).toBe('InvalidSignature');
    expect(platform.verifier.nonceOf(ACCOUNT, 'register')).toBe(1);
    expect(platform.notifications.sequence).toBe(before);
  });

  it('rejects a registration signed by someone other than the account', () => {
    const { platform, stranger } = createTestPlatform();
    const auth = stranger.sign(REGISTER, { account: ACCOUNT }, 0, T0 + HOUR);

    const error = caught(() => platform.profiles.registerFor(ACCOUNT, auth.deadline, auth.signature));
    expect(error.code).toBe('InvalidSignature');
    expect(platform.profiles.isRegistered(ACCOUNT)).toBe(false);
    expect(platform.verifier.nonceOf(ACCOUNT, 'register')).toBe(0);
  });

  it('applies a backend-signed stats update, upgrades the tier and blocks replay', () => {
    const { platform, backend } = createTestPlatform();
    platform.profiles.register(ACCOUNT);
    const fields = stats(3, 120);
    const auth = backend.sign(STATS_UPDATE, fields, 0, T0 + HOUR);
    const before = platform.notifications.sequence;

    const result = platform.profiles.updateStats(ACCOUNT, fields, auth.deadline, auth.signature);

    expect(result.upgraded).toBe(true);
    expect(result.previousTier).toBe(Tier.BRONZE);
    expect(result.tier).toBe(Tier.SILVER);
    expect(platform.profiles.getProfile(ACCOUNT)).toEqual({
      xp: 120,
      level: 3,
      progressCount: 4,
      achievementCount: 0,
      lastUpdated: T0,
      exists: true,
    });

    const emitted = platform.notifications.since(before);
    expect(emitted.map((n) => n.type)).toEqual([NotificationType.STATS_UPDATED, NotificationType.TIER_UPGRADED]);
    expect(emitted[1].payload).toEqual({ account: ACCOUNT, oldTier: 1, newTier: 2 });

    const replay = caught(() => platform.profiles.updateStats(ACCOUNT, fields, auth.deadline, auth.signature));
    expect(replay.code).toBe('InvalidSigner');
    expect(platform.verifier.nonceOf(ACCOUNT, 'statsUpdate')).toBe(1);
  });

  it('allows lowering the level without a tier notification', () => {
    const { platform, backend } = createTestPlatform();
    platform.profiles.register(ACCOUNT);
    const up = backend.sign(STATS_UPDATE, stats(5), 0, T0 + HOUR);
    platform.profiles.updateStats(ACCOUNT, stats(5), up.deadline, up.signature);

    const down = backend.sign(STATS_UPDATE, stats(1), 1, T0 + HOUR);
    const result = platform.profiles.updateStats(ACCOUNT, stats(1), down.deadline, down.signature);

    expect(result.upgraded).toBe(false);
    expect(platform.profiles.tierOf(ACCOUNT)).toBe(Tier.BRONZE);
    const all = platform.notifications.all();
    expect(all[all.length - 1].type).toBe(NotificationType.STATS_UPDATED);
  });

  it('rejects expired signatures as resubmittable without consuming the nonce', () => {
    const { platform, backend, clock } = createTestPlatform();
    platform.profiles.register(ACCOUNT);
    const auth = backend.sign(STATS_UPDATE, stats(3), 0, T0 + HOUR);
    clock.advance(HOUR + 1);

    const error = caught(() => platform.profiles.updateStats(ACCOUNT, stats(3), auth.deadline, auth.signature));
    expect(error.code).toBe('SignatureExpired');
    expect(error.resubmittable).toBe(true);
    expect(platform.verifier.nonceOf(ACCOUNT, 'statsUpdate')).toBe(0);
  });

  it('accepts a signature exactly at its deadline', () => {
    const { platform, backend, clock } = createTestPlatform();
    platform.profiles.register(ACCOUNT);
    const auth = backend.sign(STATS_UPDATE, stats(3), 0, T0 + HOUR);
    clock.set(T0 + HOUR);

    expect(platform.profiles.updateStats(ACCOUNT, stats(3), auth.deadline, auth.signature).tier).toBe(Tier.SILVER);
  });

  it('rejects stats signed by an account without the BackendSigner role', () => {
    const { platform, stranger } = createTestPlatform();
    platform.profiles.register(ACCOUNT);
    const auth = stranger.sign(STATS_UPDATE, stats(3), 0, T0 + HOUR);

    const error = caught(() => platform.profiles.updateStats(ACCOUNT, stats(3), auth.deadline, auth.signature));
    expect(error.code).toBe('InvalidSigner');
    expect(error.resubmittable).toBe(false);
  });

  it('consumes the nonce even when the account is not registered', () => {
    const { platform, backend } = createTestPlatform();
    const auth = backend.sign(STATS_UPDATE, stats(3), 0, T0 + HOUR);
    const before = platform.notifications.sequence;

    const error = caught(() => platform.profiles.updateStats(ACCOUNT, stats(3), auth.deadline, auth.signature));
    expect(error.code).toBe('NotRegistered');
    expect(platform.verifier.nonceOf(ACCOUNT, 'statsUpdate')).toBe(1);
    expect(platform.notifications.sequence).toBe(before);
  });

  it('validates stat values before looking at the signature', () => {
    const { platform, backend } = createTestPlatform();
    platform.profiles.register(ACCOUNT);
    const bad = { ...stats(3), xp: -1 };
    const auth = backend.sign(STATS_UPDATE, bad, 0, T0 + HOUR);

    expect(caught(() => platform.profiles.updateStats(ACCOUNT, bad, auth.deadline, auth.signature)).code).toBe(
      'InvalidStats'
    );
    expect(platform.verifier.nonceOf(ACCOUNT, 'statsUpdate')).toBe(0);
  });

  it('keeps nonce namespaces independent', () => {
    const { platform, backend } = createTestPlatform();
    platform.profiles.register(ACCOUNT);
    const auth = backend.sign(STATS_UPDATE, stats(3), 0, T0 + HOUR);
    platform.profiles.updateStats(ACCOUNT, stats(3), auth.deadline, auth.signature);

    expect(platform.verifier.noncesOf(ACCOUNT)).toEqual({ register: 0, statsUpdate: 1, claim: 0 });
  });
});
