/**
 * Turns command-line arguments into a signed relay body, ready to POST to
 * /api/relay/<kind>.
 */

import { AuthorizationSigner } from '../auth/authorization-signer';
import { CLAIM_ACHIEVEMENT, REGISTER, STATS_UPDATE } from '../auth/typed-payloads';

export type RelayKind = 'register' | 'stats' | 'claim';

export interface SignedRelayRequest {
  kind: RelayKind;
  path: string;
  body: Record<string, string | number>;
}

export const USAGE = `Usage:
  ledger-sign register <account> <nonce> <deadline>
  ledger-sign stats <account> <xp> <level> <progressCount> <achievementCount> <nonce> <deadline>
  ledger-sign claim <to> <eventId> <tier> <metadataHash> <nonce> <deadline>`;

function int(value: string | undefined, name: string): number {
  if (value === undefined || !/^\d+$/.test(value)) {
    throw new Error(`${name} must be a non-negative integer`);
  }
  return parseInt(value, 10);
}

function text(value: string | undefined, name: string): string {
  if (!value) throw new Error(`${name} is required`);
  return value;
}

export function buildSignedRequest(args: readonly string[], signer: AuthorizationSigner): SignedRelayRequest {
  const [kind, ...rest] = args;

  switch (kind) {
    case 'register': {
      const account = text(rest[0], 'account');
      const nonce = int(rest[1], 'nonce');
      const deadline = int(rest[2], 'deadline');
      const { signature } = signer.sign(REGISTER, { account }, nonce, deadline);
      return { kind, path: '/api/relay/register', body: { account, deadline, signature } };
    }

    case 'stats': {
      const fields = {
        account: text(rest[0], 'account'),
        xp: int(rest[1], 'xp'),
        level: int(rest[2], 'level'),
        progressCount: int(rest[3], 'progressCount'),
        achievementCount: int(rest[4], 'achievementCount'),
      };
      const nonce = int(rest[5], 'nonce');
      const deadline = int(rest[6], 'deadline');
      const { signature } = signer.sign(STATS_UPDATE, fields, nonce, deadline);
      return { kind, path: '/api/relay/stats', body: { ...fields, deadline, signature } };
    }

    case 'claim': {
      const fields = {
        to: text(rest[0], 'to'),
        eventId: text(rest[1], 'eventId'),
        tier: int(rest[2], 'tier'),
        metadataHash: text(rest[3], 'metadataHash').toLowerCase(),
      };
      const nonce = int(rest[4], 'nonce');
      const deadline = int(rest[5], 'deadline');
      const { signature } = signer.sign(CLAIM_ACHIEVEMENT, fields, nonce, deadline);
      return { kind, path: '/api/relay/claim', body: { ...fields, deadline, signature } };
    }

    default:
      throw new Error(USAGE);
  }
}
