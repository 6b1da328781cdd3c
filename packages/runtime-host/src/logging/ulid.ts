/**
 * Bulwark Runtime Host — ULID Generator
 *
 * Universally Unique Lexicographically Sortable Identifier: 26 characters of
 * Crockford Base32, a 48-bit millisecond timestamp followed by 80 random bits.
 *
 * Ids minted within the same millisecond increment the random component, so
 * ids from one process sort in creation order. Audit readers rely on this to
 * break timestamp ties deterministically.
 *
 * Used as event_id in audit log entries and as the temporary-file suffix for
 * atomic writes.
 *
 * @see https://github.com/ulid/spec
 */

import { randomBytes } from 'node:crypto';

/** Crockford's Base32: no I, L, O or U. */
const CROCKFORD_ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

const TIME_CHARS = 10;
const RANDOM_CHARS = 16;
const RANDOM_MAX = (BigInt(1) << BigInt(80)) - BigInt(1);

function encodeCrockford(value: bigint, length: number): string {
  let out = '';
  let v = value;
  for (let i = 0; i < length; i++) {
    out = CROCKFORD_ALPHABET.charAt(Number(v & BigInt(0x1f))) + out;
    v >>= BigInt(5);
  }
  return out;
}

function randomComponent(): bigint {
  let value = BigInt(0);
  for (const byte of randomBytes(10)) {
    value = (value << BigInt(8)) | BigInt(byte);
  }
  return value;
}

let lastTime = -1;
let lastRandom = BigInt(0);

/**
 * Generate a new ULID string.
 *
 * @example
 * ulid(); // e.g. '01JDKPF8X7M4VQN3BGHST6RWYZ'
 */
export function ulid(now: number = Date.now()): string {
  if (now === lastTime && lastRandom < RANDOM_MAX) {
    lastRandom += BigInt(1);
  } else {
    lastTime = now;
    lastRandom = randomComponent();
  }
  return encodeCrockford(BigInt(now), TIME_CHARS) + encodeCrockford(lastRandom, RANDOM_CHARS);
}

/** Millisecond timestamp encoded in a ULID, or null if `id` is not one. */
export function decodeUlidTime(id: string): number | null {
  if (!/^[0-9A-HJKMNP-TV-Z]{26}$/.test(id)) return null;
  let value = 0;
  for (const char of id.slice(0, TIME_CHARS)) {
    value = value * 32 + CROCKFORD_ALPHABET.indexOf(char);
  }
  return value;
}
