/**
 * Bulwark Kernel — Argument Hashing
 *
 * Every audit event carries `args_hash`, a SHA-256 over the command id and
 * its argument payload in canonical JSON. Identical invocations hash the
 * same regardless of key order, so entries can be correlated without the
 * arguments themselves (file contents, environment values) entering the log.
 */

import { createHash } from 'node:crypto';

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deterministic JSON with sorted keys at every level. Two payloads with the
 * same fields in a different insertion order serialize identically.
 */
export function canonicalJson(value: unknown): string {
  if (value === null || value === undefined) return 'null';
  if (typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return '[' + value.map(canonicalJson).join(',') + ']';
  }
  if (value instanceof Uint8Array) {
    return JSON.stringify(Buffer.from(value).toString('base64'));
  }
  if (!isPlainRecord(value)) return JSON.stringify(String(value));
  const pairs = Object.keys(value)
    .sort()
    .filter((k) => value[k] !== undefined)
    .map((k) => `${JSON.stringify(k)}:${canonicalJson(value[k])}`);
  return '{' + pairs.join(',') + '}';
}

/** SHA-256 of the canonical JSON of an argument payload, for audit attribution. */
export function computeArgsHash(command: string, args: unknown): string {
  return createHash('sha256').update(canonicalJson({ command, args })).digest('hex');
}
