/**
 * Mantle Runtime Host — ULID Generator
 *
 * Universally Unique Lexicographically Sortable Identifier.
 *
 * ULID format: 26 characters, Crockford Base32 encoded.
 *   - 10 chars: 48-bit millisecond timestamp (lexicographically sortable)
 *   - 16 chars: 80-bit cryptographic random
 *
 * Used as event_id in compiles.jsonl so that log files merged from several
 * sources can be deduplicated on read.
 *
 * @see https://github.com/ulid/spec
 */

import { randomBytes } from 'node:crypto';

/** Crockford's Base32 alphabet: no I, L, O or U. */
const CROCKFORD_ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

const BITS_PER_CHAR = 5;
const TIME_CHARS = 10;
const RANDOM_CHARS = 16;

/**
 * Encode exactly `length` characters, zero-padded on the left.
 */
export function encodeCrockford(value: bigint, length: number): string {
  let out = '';
  let v = value;
  for (let i = 0; i < length; i++) {
    out = CROCKFORD_ALPHABET.charAt(Number(v & 0x1fn)) + out;
    v >>= BigInt(BITS_PER_CHAR);
  }
  return out;
}

/**
 * Generate a ULID. The random part is not incremented within one
 * millisecond; ordering between entries written in the same millisecond is
 * informational only.
 *
 * @example
 * ulid(); // e.g. '01JDKPF8X7M4VQN3BGHST6RWYZ'
 */
export function ulid(nowMs: number = Date.now()): string {
  const timePart = encodeCrockford(BigInt(nowMs), TIME_CHARS);

  let randValue = 0n;
  for (const byte of randomBytes(10)) {
    randValue = (randValue << 8n) | BigInt(byte);
  }
  return timePart + encodeCrockford(randValue, RANDOM_CHARS);
}
