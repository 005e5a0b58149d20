/**
 * Typed authorization payloads.
 *
 * digest     = SHA-256(0x19 0x01 ‖ domainSeparator ‖ structHash)
 * structHash = SHA-256(typeHash ‖ CBOR([...fields in declared order, nonce, deadline]))
 * typeHash   = SHA-256(descriptor)
 *
 * Each message type has its own descriptor, so a payload signed for one
 * type never verifies under another type's digest.
 */

import { canonicalCborEncode, CborValue } from '../crypto/canonical-cbor';
import { NetworkName, sha256Bytes } from '../crypto';

export type NonceNamespace = 'register' | 'statsUpdate' | 'claim';

export const NONCE_NAMESPACES: readonly NonceNamespace[] = ['register', 'statsUpdate', 'claim'];

export interface SigningDomain {
  name: string;
  version: string;
  network: NetworkName;
  /** Identity of the node/endpoint that verifies signatures */
  verifyingEndpoint: string;
}

export interface RegisterFields {
  account: string;
}

export interface StatsUpdateFields {
  account: string;
  xp: number;
  level: number;
  progressCount: number;
  achievementCount: number;
}

export interface ClaimAchievementFields {
  to: string;
  eventId: string;
  tier: number;
  metadataHash: string;
}

export interface MessageDefinition<F> {
  readonly type: 'Register' | 'StatsUpdate' | 'ClaimAchievement';
  readonly namespace: NonceNamespace;
  readonly descriptor: string;
  /** Account whose nonce the message consumes */
  subjectOf(fields: F): string;
  values(fields: F): CborValue[];
}

export const REGISTER: MessageDefinition<RegisterFields> = {
  type: 'Register',
  namespace: 'register',
  descriptor: 'Register(string account,uint nonce,uint deadline)',
  subjectOf: (f) => f.account,
  values: (f) => [f.account],
};

export const STATS_UPDATE: MessageDefinition<StatsUpdateFields> = {
  type: 'StatsUpdate',
  namespace: 'statsUpdate',
  descriptor:
    'StatsUpdate(string account,uint xp,uint level,uint progressCount,uint achievementCount,uint nonce,uint deadline)',
  subjectOf: (f) => f.account,
  values: (f) => [f.account, f.xp, f.level, f.progressCount, f.achievementCount],
};

export const CLAIM_ACHIEVEMENT: MessageDefinition<ClaimAchievementFields> = {
  type: 'ClaimAchievement',
  namespace: 'claim',
  descriptor: 'ClaimAchievement(string to,string eventId,uint tier,bytes32 metadataHash,uint nonce,uint deadline)',
  subjectOf: (f) => f.to,
  values: (f) => [f.to, f.eventId, f.tier, Buffer.from(f.metadataHash, 'hex')],
};

export function domainSeparator(domain: SigningDomain): Buffer {
  return sha256Bytes(
    canonicalCborEncode({
      name: domain.name,
      version: domain.version,
      network: domain.network,
      verifyingEndpoint: domain.verifyingEndpoint,
    })
  );
}

export function typeHash(definition: MessageDefinition<unknown>): Buffer {
  return sha256Bytes(Buffer.from(definition.descriptor, 'utf8'));
}

export function structHash<F>(
  definition: MessageDefinition<F>,
  fields: F,
  nonce: number,
  deadline: number
): Buffer {
  const encoded = canonicalCborEncode([...definition.values(fields), nonce, deadline]);
  return sha256Bytes(typeHash(definition), encoded);
}

export function typedDigest<F>(
  domain: SigningDomain,
  definition: MessageDefinition<F>,
  fields: F,
  nonce: number,
  deadline: number
): Buffer {
  return sha256Bytes(
    Buffer.from([0x19, 0x01]),
    domainSeparator(domain),
    structHash(definition, fields, nonce, deadline)
  );
}
