import { createHash } from 'node:crypto';
import { HASH_ALGORITHMS, type HashAlgorithm } from './config.ts';
import { SerializationError } from './errors.ts';
import type { Payload, UnsealedEntry } from './types.ts';

// Bumped whenever the hashed record layout changes.
export const CANONICAL_VERSION = 1;

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function encode(value: unknown, where: string, ancestors: Set<object>): string {
  if (value === null) return 'null';

  if (typeof value === 'string' || typeof value === 'boolean') return JSON.stringify(value);
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new SerializationError(`${where}: non-finite number ${String(value)}`);
    }
    return JSON.stringify(value);
  }
  if (typeof value !== 'object') {
    throw new SerializationError(`${where}: unsupported ${typeof value} value`);
  }

  if (ancestors.has(value)) {
    throw new SerializationError(`${where}: cyclic reference`);
  }
  ancestors.add(value);
  try {
    if (Array.isArray(value)) {
      const parts = value.map((v: unknown, i) => (v === undefined ? 'null' : encode(v, `${where}[${i}]`, ancestors)));
      return `[${parts.join(',')}]`;
    }

    if (!isPlainObject(value)) {
      throw new SerializationError(`${where}: ${value.constructor?.name ?? 'object'} is not a plain object`);
    }

    const parts: string[] = [];
    for (const key of Object.keys(value).sort()) {
      const v: unknown = Reflect.get(value, key);
      if (v === undefined) continue;
      parts.push(`${JSON.stringify(key)}:${encode(v, `${where}.${key}`, ancestors)}`);
    }
    return `{${parts.join(',')}}`;
  } finally {
    ancestors.delete(value);
  }
}

/**
 * Deterministic text encoding of a JSON-like value: object keys sorted,
 * undefined members dropped, undefined array items written as null.
 */
export function canonicalize(value: unknown): string {
  if (value === undefined) throw new SerializationError('$: undefined is not serializable');
  return encode(value, '$', new Set());
}

export function assertPayload(value: unknown): asserts value is Payload {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new SerializationError('payload must be a JSON object');
  }
  canonicalize(value);
}

export function isPayload(value: unknown): value is Payload {
  try {
    assertPayload(value);
    return true;
  } catch {
    return false;
  }
}

/**
 * Digest of an entry's canonical form with `prevHash` folded in. Any `hash`
 * field on the input is ignored.
 */
export function digestEntry(
  entry: Omit<UnsealedEntry, 'prev_hash'>,
  prevHash: string,
  algorithm: HashAlgorithm,
): string {
  const record = canonicalize({
    v: CANONICAL_VERSION,
    sequence: entry.sequence,
    entry_id: entry.entry_id,
    timestamp: entry.timestamp,
    event_type: entry.event_type,
    actor: entry.actor,
    sensitivity: entry.sensitivity,
    payload: entry.payload,
    prev_hash: prevHash,
  });

  return createHash(HASH_ALGORITHMS[algorithm].node).update(record, 'utf8').digest('hex');
}
