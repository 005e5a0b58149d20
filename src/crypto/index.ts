import * as crypto from 'crypto';
import * as ecc from 'tiny-secp256k1';
import { ECPairFactory, ECPairInterface } from 'ecpair';
import * as bitcoin from 'bitcoinjs-lib';

const ECPair = ECPairFactory(ecc);

export type NetworkName = 'mainnet' | 'testnet' | 'regtest';

type RecoveryId = 0 | 1 | 2 | 3;

const NETWORKS: Record<NetworkName, bitcoin.Network> = {
  mainnet: bitcoin.networks.bitcoin,
  testnet: bitcoin.networks.testnet,
  regtest: bitcoin.networks.regtest,
};

const SIGNATURE_HEX_LENGTH = 130; // 64-byte compact signature + recovery byte

export function sha256(data: string | Uint8Array): string {
  const buffer = typeof data === 'string' ? Buffer.from(data, 'utf8') : data;
  return crypto.createHash('sha256').update(buffer).digest('hex');
}

export function sha256Bytes(...parts: Uint8Array[]): Buffer {
  const hash = crypto.createHash('sha256');
  for (const part of parts) hash.update(part);
  return hash.digest();
}

export function isHex32(value: string): boolean {
  return /^[0-9a-f]{64}$/i.test(value);
}

export function networkFor(name: NetworkName): bitcoin.Network {
  return NETWORKS[name];
}

export function publicKeyToAddress(publicKey: Uint8Array, network: NetworkName): string {
  const { address } = bitcoin.payments.p2pkh({
    pubkey: Buffer.from(publicKey),
    network: networkFor(network),
  });
  if (!address) {
    throw new Error('Unable to derive address from public key');
  }
  return address;
}

export interface SignerKey {
  privateKey: string;
  publicKey: string;
  address: string;
}

function describeKeyPair(keyPair: ECPairInterface, network: NetworkName): SignerKey {
  const { privateKey } = keyPair;
  if (!privateKey) {
    throw new Error('Key pair has no private key');
  }
  return {
    privateKey: privateKey.toString('hex'),
    publicKey: keyPair.publicKey.toString('hex'),
    address: publicKeyToAddress(keyPair.publicKey, network),
  };
}

export function generateSignerKey(network: NetworkName): SignerKey {
  return describeKeyPair(ECPair.makeRandom(), network);
}

export function signerKeyFromPrivateKey(privateKeyHex: string, network: NetworkName): SignerKey {
  return describeKeyPair(ECPair.fromPrivateKey(Buffer.from(privateKeyHex, 'hex')), network);
}

/**
 * Sign a 32-byte digest so that the signer's public key can be recovered
 * from the signature alone. Output: hex(r ‖ s ‖ recoveryId).
 */
export function signDigest(digest: Uint8Array, privateKeyHex: string): string {
  const { signature, recoveryId } = ecc.signRecoverable(digest, Buffer.from(privateKeyHex, 'hex'));
  return Buffer.concat([Buffer.from(signature), Buffer.from([recoveryId])]).toString('hex');
}

function toRecoveryId(value: number): RecoveryId | undefined {
  switch (value) {
    case 0:
    case 1:
    case 2:
    case 3:
      return value;
    default:
      return undefined;
  }
}

/**
 * Recover the compressed public key that produced `signatureHex` over
 * `digest`. Returns null for anything malformed or unrecoverable.
 */
export function recoverPublicKey(digest: Uint8Array, signatureHex: string): Buffer | null {
  if (signatureHex.length !== SIGNATURE_HEX_LENGTH || !/^[0-9a-f]+$/i.test(signatureHex)) {
    return null;
  }

  const raw = Buffer.from(signatureHex, 'hex');
  const recoveryId = toRecoveryId(raw[64]);
  if (recoveryId === undefined) return null;

  try {
    const publicKey = ecc.recover(digest, raw.subarray(0, 64), recoveryId, true);
    return publicKey ? Buffer.from(publicKey) : null;
  } catch {
    return null;
  }
}

export function recoverSignerAddress(
  digest: Uint8Array,
  signatureHex: string,
  network: NetworkName
): string | null {
  const publicKey = recoverPublicKey(digest, signatureHex);
  return publicKey ? publicKeyToAddress(publicKey, network) : null;
}
