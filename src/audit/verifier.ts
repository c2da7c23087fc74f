import type { ChainConfig } from './config.ts';
import { ChainIntegrityViolation, MalformedEntryError, SerializationError } from './errors.ts';
import { digestEntry } from './hasher.ts';
import type { ChainStore } from './store.ts';
import {
  isRedacted,
  type ExportedEntry,
  type TimestampAnomaly,
  type VerificationFailure,
  type VerificationResult,
} from './types.ts';

export interface VerifyOptions {
  warn?: (message: string) => void;
}

type LinkConfig = Pick<ChainConfig, 'hash_algorithm' | 'genesis_sentinel'>;

/**
 * Walks `entries` in order and stops at the first broken invariant:
 * sequence continuity, prev_hash linkage, then the entry's own digest.
 * Redacted placeholders are linked but not re-hashed.
 */
export function verifyEntries(
  entries: Iterable<ExportedEntry>,
  config: LinkConfig,
  opts: VerifyOptions = {},
): VerificationResult {
  const warn = opts.warn ?? console.warn;
  const anomalies: TimestampAnomaly[] = [];
  const iterator = entries[Symbol.iterator]();

  let checked = 0;
  let redacted = 0;
  let expectedPrev = config.genesis_sentinel;
  let previous: { timestamp: string; time: number } | undefined;

  const finish = (failure?: VerificationFailure): VerificationResult => {
    const result: VerificationResult = { valid: failure === undefined, checked, anomalies };
    if (failure) result.firstFailure = failure;
    if (redacted > 0) result.redacted = redacted;
    return result;
  };

  const stop = (failure: VerificationFailure): VerificationResult => {
    iterator.return?.();
    return finish(failure);
  };

  for (;;) {
    let step: IteratorResult<ExportedEntry>;
    try {
      step = iterator.next();
    } catch (err) {
      if (err instanceof MalformedEntryError) {
        return finish({ sequence: err.sequence, reason: 'malformed_entry', message: err.message });
      }
      throw err;
    }
    if (step.done) break;
    const entry = step.value;

    if (entry.sequence !== checked) {
      return stop({
        sequence: entry.sequence,
        reason: 'sequence_gap',
        message: `expected sequence ${checked}, found ${entry.sequence}`,
      });
    }

    if (entry.prev_hash !== expectedPrev) {
      return stop({
        sequence: entry.sequence,
        reason: 'prev_hash_mismatch',
        message: checked === 0
          ? 'prev_hash is not the genesis sentinel'
          : `prev_hash does not match the hash of entry ${checked - 1}`,
      });
    }

    if (isRedacted(entry)) {
      redacted += 1;
    } else {
      let expected: string;
      try {
        expected = digestEntry(entry, entry.prev_hash, config.hash_algorithm);
      } catch (err) {
        if (!(err instanceof SerializationError)) throw err;
        return stop({ sequence: entry.sequence, reason: 'malformed_entry', message: err.message });
      }
      if (expected !== entry.hash) {
        return stop({
          sequence: entry.sequence,
          reason: 'hash_mismatch',
          message: 'stored hash does not match entry content',
        });
      }

      const time = Date.parse(entry.timestamp);
      if (previous && !Number.isNaN(time) && time < previous.time) {
        anomalies.push({
          sequence: entry.sequence,
          timestamp: entry.timestamp,
          previous_timestamp: previous.timestamp,
        });
        warn(`[audit] Timestamp went backwards at sequence ${entry.sequence}: ${entry.timestamp} < ${previous.timestamp}`);
      }
      if (!Number.isNaN(time)) previous = { timestamp: entry.timestamp, time };
    }

    expectedPrev = entry.hash;
    checked += 1;
  }

  return finish();
}

/**
 * Re-verifies a store from genesis on every call. Entries appended while a
 * scan runs are outside the snapshot taken when it started.
 */
export class ChainVerifier {
  private readonly store: ChainStore;
  private readonly config: LinkConfig;
  private readonly warn: (message: string) => void;

  constructor(store: ChainStore, config: LinkConfig, opts: VerifyOptions = {}) {
    this.store = store;
    this.config = config;
    this.warn = opts.warn ?? console.warn;
  }

  verify(): VerificationResult {
    return verifyEntries(this.store.readRange(0), this.config, { warn: this.warn });
  }

  assertIntact(): VerificationResult {
    const result = this.verify();
    if (result.firstFailure) throw new ChainIntegrityViolation(result.firstFailure);
    return result;
  }
}
