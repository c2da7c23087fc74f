import { isHashAlgorithm, type HashAlgorithm } from './config.ts';
import { MalformedEntryError, ValidationError, errorMessage } from './errors.ts';
import { isPayload } from './hasher.ts';
import {
  isEventType,
  isSensitivity,
  type ChainEntry,
  type ChainInfo,
  type ExportedEntry,
  type RedactedEntry,
} from './types.ts';

export const EXPORT_FORMAT = 'audit-chain-export';
export const EXPORT_VERSION = 1;

export interface ChainExportHeader {
  format: typeof EXPORT_FORMAT;
  version: typeof EXPORT_VERSION;
  chain_id: string;
  created_at: string;
  exported_at: string;
  hash_algorithm: HashAlgorithm;
  genesis_sentinel: string;
  redacted: boolean;
}

export interface ChainExport extends ChainExportHeader {
  entries: ExportedEntry[];
}

export interface ParsedExport {
  header: ChainExportHeader;
  // Lazily decoded; a bad entry throws MalformedEntryError when reached.
  entries: Iterable<ExportedEntry>;
  size: number;
}

export function redact(entry: ChainEntry): RedactedEntry {
  return { sequence: entry.sequence, prev_hash: entry.prev_hash, hash: entry.hash, redacted: true };
}

export function buildExport(
  info: ChainInfo,
  entries: Iterable<ChainEntry>,
  opts: { exportedAt: string; redactSensitive: boolean },
): ChainExport {
  if (!isHashAlgorithm(info.hash_algorithm)) {
    throw new ValidationError(`unsupported hash algorithm "${info.hash_algorithm}"`);
  }

  const exported: ExportedEntry[] = [];
  for (const entry of entries) {
    exported.push(opts.redactSensitive && entry.sensitivity === 'sensitive' ? redact(entry) : entry);
  }

  return {
    format: EXPORT_FORMAT,
    version: EXPORT_VERSION,
    chain_id: info.chain_id,
    created_at: info.created_at,
    exported_at: opts.exportedAt,
    hash_algorithm: info.hash_algorithm,
    genesis_sentinel: info.genesis_sentinel,
    redacted: opts.redactSensitive,
    entries: exported,
  };
}

function asRecord(value: unknown): Record<string, unknown> | undefined {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return undefined;
  return { ...value };
}

function parseEntry(raw: unknown, index: number, redactedExport: boolean): ExportedEntry {
  const r = asRecord(raw);
  if (!r) throw new MalformedEntryError(index, 'entry is not an object');

  const sequence = r['sequence'];
  if (typeof sequence !== 'number' || !Number.isSafeInteger(sequence) || sequence < 0) {
    throw new MalformedEntryError(index, 'field sequence must be a non-negative integer');
  }
  const text = (key: string): string => {
    const value = r[key];
    if (typeof value !== 'string') throw new MalformedEntryError(sequence, `field ${key} must be a string`);
    return value;
  };

  if (r['redacted'] === true) {
    if (!redactedExport) throw new MalformedEntryError(sequence, 'redacted placeholder in an unredacted export');
    return { sequence, prev_hash: text('prev_hash'), hash: text('hash'), redacted: true };
  }

  const eventType = r['event_type'];
  if (!isEventType(eventType)) throw new MalformedEntryError(sequence, `unknown event_type "${String(eventType)}"`);
  const sensitivity = r['sensitivity'];
  if (!isSensitivity(sensitivity)) throw new MalformedEntryError(sequence, `unknown sensitivity "${String(sensitivity)}"`);
  const payload = r['payload'];
  if (!isPayload(payload)) throw new MalformedEntryError(sequence, 'payload is not a JSON object');

  return {
    sequence,
    entry_id: text('entry_id'),
    timestamp: text('timestamp'),
    event_type: eventType,
    actor: text('actor'),
    sensitivity,
    payload,
    prev_hash: text('prev_hash'),
    hash: text('hash'),
  };
}

/**
 * Parses an export document. Header problems throw ValidationError up front;
 * entry problems surface while iterating, so a verifier can name the entry.
 */
export function parseExport(content: string): ParsedExport {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new ValidationError(`export is not valid JSON: ${errorMessage(err)}`, 'VALIDATION_FAILED', err);
  }

  const doc = asRecord(parsed);
  if (!doc) throw new ValidationError('export must be a JSON object');
  if (doc['format'] !== EXPORT_FORMAT) throw new ValidationError(`unknown export format "${String(doc['format'])}"`);
  if (doc['version'] !== EXPORT_VERSION) throw new ValidationError(`unsupported export version ${String(doc['version'])}`);

  const algorithm = doc['hash_algorithm'];
  if (!isHashAlgorithm(algorithm)) throw new ValidationError(`unsupported hash algorithm "${String(algorithm)}"`);

  const header: ChainExportHeader = {
    format: EXPORT_FORMAT,
    version: EXPORT_VERSION,
    chain_id: '',
    created_at: '',
    exported_at: '',
    hash_algorithm: algorithm,
    genesis_sentinel: '',
    redacted: doc['redacted'] === true,
  };
  for (const key of ['chain_id', 'created_at', 'exported_at', 'genesis_sentinel'] as const) {
    const value = doc[key];
    if (typeof value !== 'string') throw new ValidationError(`export field "${key}" must be a string`);
    header[key] = value;
  }

  const rawEntries = doc['entries'];
  if (!Array.isArray(rawEntries)) throw new ValidationError('export field "entries" must be an array');
  const items: unknown[] = rawEntries;

  return {
    header,
    size: items.length,
    entries: {
      *[Symbol.iterator]() {
        for (const [i, raw] of items.entries()) yield parseEntry(raw, i, header.redacted);
      },
    },
  };
}
