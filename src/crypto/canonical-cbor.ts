/**
 * Deterministic CBOR (RFC 8949 §4.2.1) for hashing typed payloads and
 * notifications. Floats are refused; map keys are sorted by encoded bytes
 * (length first, then lexicographic).
 */

export type CborValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | Uint8Array
  | readonly CborValue[]
  | { readonly [key: string]: CborValue };

const MAJOR_UNSIGNED = 0;
const MAJOR_NEGATIVE = 1;
const MAJOR_BYTES = 2;
const MAJOR_TEXT = 3;
const MAJOR_ARRAY = 4;
const MAJOR_MAP = 5;

const MAX_UINT64 = (1n << 64n) - 1n;

function head(major: number, length: bigint): Buffer {
  if (length < 0n || length > MAX_UINT64) {
    throw new RangeError(`CBOR argument out of range: ${length}`);
  }
  const prefix = major << 5;

  if (length < 24n) return Buffer.from([prefix | Number(length)]);
  if (length <= 0xffn) return Buffer.from([prefix | 24, Number(length)]);

  if (length <= 0xffffn) {
    const out = Buffer.alloc(3);
    out[0] = prefix | 25;
    out.writeUInt16BE(Number(length), 1);
    return out;
  }

  if (length <= 0xffffffffn) {
    const out = Buffer.alloc(5);
    out[0] = prefix | 26;
    out.writeUInt32BE(Number(length), 1);
    return out;
  }

  const out = Buffer.alloc(9);
  out[0] = prefix | 27;
  out.writeBigUInt64BE(length, 1);
  return out;
}

function integer(value: bigint): Buffer {
  return value >= 0n ? head(MAJOR_UNSIGNED, value) : head(MAJOR_NEGATIVE, -1n - value);
}

function text(value: string): Buffer {
  const bytes = Buffer.from(value, 'utf8');
  return Buffer.concat([head(MAJOR_TEXT, BigInt(bytes.length)), bytes]);
}

function isRecord(value: unknown): value is { readonly [key: string]: CborValue } {
  if (value === null || typeof value !== 'object') return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function canonicalCborEncode(value: CborValue): Buffer {
  if (value === null) return Buffer.from([0xf6]);
  if (value === true) return Buffer.from([0xf5]);
  if (value === false) return Buffer.from([0xf4]);

  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value)) {
      throw new TypeError(`Only safe integers can be encoded, got ${value}`);
    }
    return integer(BigInt(value));
  }

  if (typeof value === 'bigint') return integer(value);
  if (typeof value === 'string') return text(value);

  if (value instanceof Uint8Array) {
    return Buffer.concat([head(MAJOR_BYTES, BigInt(value.length)), Buffer.from(value)]);
  }

  if (Array.isArray(value)) {
    return Buffer.concat([head(MAJOR_ARRAY, BigInt(value.length)), ...value.map(canonicalCborEncode)]);
  }

  if (isRecord(value)) {
    const entries = Object.keys(value)
      .map((key) => ({ key: text(key), value: canonicalCborEncode(value[key]) }))
      .sort((a, b) => a.key.length - b.key.length || Buffer.compare(a.key, b.key));

    const parts: Buffer[] = [head(MAJOR_MAP, BigInt(entries.length))];
    for (const entry of entries) {
      parts.push(entry.key, entry.value);
    }
    return Buffer.concat(parts);
  }

  throw new TypeError(`Unsupported CBOR value: ${typeof value}`);
}
