import { CLAIM_ACHIEVEMENT, ClaimAchievementFields } from '../auth/typed-payloads';
import { canonicalCborEncode } from '../crypto/canonical-cbor';
import { sha256 } from '../crypto';
import { NotificationType } from '../notifications/types';
import { caught, createTestPlatform, HOUR, T0, USER_KEY } from '../testing/test-platform';
import { achievementKey } from './achievement-ledger';

const ACCOUNT = USER_KEY.address;
const METADATA = 'ab'.repeat(32);

function claimFields(overrides: Partial<ClaimAchievementFields> = {}): ClaimAchievementFields {
  return { to: ACCOUNT, eventId: 'spring-cup', tier: 3, metadataHash: METADATA, ...overrides };
}

describe('AchievementLedger', () => {
  it('records a backend-signed claim once per account and event', () => {
    const { platform, backend } = createTestPlatform();
    const fields = claimFields();
    const auth = backend.sign(CLAIM_ACHIEVEMENT, fields, 0, T0 + HOUR);

    const record = platform.achievements.claim(
      fields.to,
      fields.eventId,
      fields.tier,
      fields.metadataHash,
      auth.deadline,
      auth.signature
    );

    expect(record).toEqual({ account: ACCOUNT, eventId: 'spring-cup', tier: 3, unlockedAt: T0, metadataHash: METADATA });
    expect(platform.achievements.hasAchievement(ACCOUNT, 'spring-cup')).toBe(true);
    expect(platform.achievements.countForAccount(ACCOUNT)).toBe(1);

    const all = platform.notifications.all();
    const last = all[all.length - 1];
    expect(last.type).toBe(NotificationType.ACHIEVEMENT_CLAIMED);
    expect(last.payload).toEqual({ ...record, nonce: 0 });
  });

  it('rejects a second claim for the same event and still consumes its nonce', () => {
    const { platform, backend } = createTestPlatform();
    const fields = claimFields();
    const first = backend.sign(CLAIM_ACHIEVEMENT, fields, 0, T0 + HOUR);
    platform.achievements.claim(ACCOUNT, 'spring-cup', 3, METADATA, first.deadline, first.signature);

    const again = claimFields({ tier: 5 });
    const second = backend.sign(CLAIM_ACHIEVEMENT, again, 1, T0 + HOUR);
    const error = caught(() =>
      platform.achievements.claim(ACCOUNT, 'spring-cup', 5, METADATA, second.deadline, second.signature)
    );

    expect(error.code).toBe('AlreadyHasAchievement');
    expect(platform.verifier.nonceOf(ACCOUNT, 'claim')).toBe(2);
    expect(platform.achievements.getAchievement(ACCOUNT, 'spring-cup')?.tier).toBe(3);
  });

  it('rejects a claim replayed byte for byte', () => {
    const { platform, backend } = createTestPlatform();
    const fields = claimFields();
    const auth = backend.sign(CLAIM_ACHIEVEMENT, fields, 0, T0 + HOUR);
    const { to, eventId, tier, metadataHash } = fields;
    const submit = () => platform.achievements.claim(to, eventId, tier, metadataHash, auth.deadline, auth.signature);
    submit();
    const before = platform.notifications.sequence;

    expect(caught(submit).code).toBe('InvalidSigner');
    expect(platform.verifier.nonceOf(ACCOUNT, 'claim')).toBe(1);
    expect(platform.notifications.sequence).toBe(before);
  });

  it('rejects tiers outside 1..5 after consuming the nonce', () => {
    const { platform, backend } = createTestPlatform();
    const fields = claimFields({ tier: 6 });
    const auth = backend.sign(CLAIM_ACHIEVEMENT, fields, 0, T0 + HOUR);

    const error = caught(() =>
      platform.achievements.claim(ACCOUNT, 'spring-cup', 6, METADATA, auth.deadline, auth.signature)
    );
    expect(error.code).toBe('InvalidTier');
    expect(platform.verifier.nonceOf(ACCOUNT, 'claim')).toBe(1);
    expect(platform.achievements.hasAchievement(ACCOUNT, 'spring-cup')).toBe(false);
  });

  it('rejects a malformed metadata hash before verification', () => {
    const { platform } = createTestPlatform();

    const error = caught(() => platform.achievements.claim(ACCOUNT, 'spring-cup', 3, 'abc', T0 + HOUR, '00'));
    expect(error.code).toBe('InvalidMetadataHash');
    expect(platform.verifier.nonceOf(ACCOUNT, 'claim')).toBe(0);
  });

  it('stores the metadata hash in lower case', () => {
    const { platform, backend } = createTestPlatform();
    const upper = METADATA.toUpperCase();
    const auth = backend.sign(CLAIM_ACHIEVEMENT, claimFields({ metadataHash: upper }), 0, T0 + HOUR);

    const record = platform.achievements.claim(ACCOUNT, 'spring-cup', 3, upper, auth.deadline, auth.signature);
    expect(record.metadataHash).toBe(METADATA);
  });

  it('lists achievements in claim order', () => {
    const { platform, backend, clock } = createTestPlatform();
    const a = backend.sign(CLAIM_ACHIEVEMENT, claimFields({ eventId: 'a' }), 0, T0 + HOUR);
    platform.achievements.claim(ACCOUNT, 'a', 3, METADATA, a.deadline, a.signature);
    clock.advance(60);
    const b = backend.sign(CLAIM_ACHIEVEMENT, claimFields({ eventId: 'b', tier: 1 }), 1, T0 + HOUR);
    platform.achievements.claim(ACCOUNT, 'b', 1, METADATA, b.deadline, b.signature);

    expect(platform.achievements.listForAccount(ACCOUNT).map((r) => [r.eventId, r.unlockedAt])).toEqual([
      ['a', T0],
      ['b', T0 + 60],
    ]);
  });

  it('keys records by the hash of account and event id', () => {
    expect(achievementKey('alice', 'e1')).toBe(sha256(canonicalCborEncode(['alice', 'e1'])));
    expect(achievementKey('alice', 'e1')).not.toBe(achievementKey('alice', 'e2'));
  });
});
