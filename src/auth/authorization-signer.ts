/**
 * Off-system side of the protocol: produces signatures the verifier accepts.
 * Used by the backend signing service, the signing CLI and tests.
 */

import { signDigest, SignerKey } from '../crypto';
import { SignedAuthorization } from './authorization-verifier';
import { MessageDefinition, SigningDomain, typedDigest } from './typed-payloads';

export class AuthorizationSigner {
  constructor(
    private readonly key: SignerKey,
    private readonly domain: SigningDomain
  ) {}

  get address(): string {
    return this.key.address;
  }

  sign<F>(definition: MessageDefinition<F>, fields: F, nonce: number, deadline: number): SignedAuthorization {
    const digest = typedDigest(this.domain, definition, fields, nonce, deadline);
    return { deadline, signature: signDigest(digest, this.key.privateKey) };
  }
}
