import * as fs from 'node:fs';
import * as path from 'node:path';
import { parse } from 'yaml';
import { ConfigError, errorMessage } from './errors.ts';

export const HASH_ALGORITHMS = {
  'SHA-256': { node: 'sha256', hexLength: 64 },
  'SHA-384': { node: 'sha384', hexLength: 96 },
  'SHA-512': { node: 'sha512', hexLength: 128 },
} as const;

export type HashAlgorithm = keyof typeof HASH_ALGORITHMS;

export type SynchronousMode = 'NORMAL' | 'FULL' | 'EXTRA';

export interface ChainConfig {
  readonly hash_algorithm: HashAlgorithm;
  readonly genesis_sentinel: string;
  readonly storage_path: string;
  readonly synchronous: SynchronousMode;
  readonly busy_timeout_ms: number;
  readonly page_size: number;
}

export const DEFAULT_CONFIG_FILE = 'audit-chain.yaml';

export function zeroDigest(algorithm: HashAlgorithm): string {
  return '0'.repeat(HASH_ALGORITHMS[algorithm].hexLength);
}

export const DEFAULT_CHAIN_CONFIG: ChainConfig = Object.freeze({
  hash_algorithm: 'SHA-256',
  genesis_sentinel: zeroDigest('SHA-256'),
  storage_path: path.join('.audit', 'chain.db'),
  synchronous: 'FULL',
  busy_timeout_ms: 5000,
  page_size: 256,
});

export function isHashAlgorithm(value: unknown): value is HashAlgorithm {
  return typeof value === 'string' && Object.hasOwn(HASH_ALGORITHMS, value);
}

function isSynchronousMode(value: unknown): value is SynchronousMode {
  return value === 'NORMAL' || value === 'FULL' || value === 'EXTRA';
}

function readInteger(raw: Record<string, unknown>, key: string, min: number, fallback: number): number {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
    throw new ConfigError(`"${key}" must be an integer >= ${min}`);
  }
  return value;
}

/**
 * Validates a parsed config document and fills defaults. Relative storage
 * paths resolve against `baseDir` when one is given.
 */
export function parseChainConfig(raw: unknown, baseDir?: string): ChainConfig {
  const source = raw ?? {};
  if (typeof source !== 'object' || Array.isArray(source)) {
    throw new ConfigError('config must be a mapping');
  }
  const r: Record<string, unknown> = { ...source };

  const algorithm = r['hash_algorithm'] ?? DEFAULT_CHAIN_CONFIG.hash_algorithm;
  if (!isHashAlgorithm(algorithm)) {
    throw new ConfigError(
      `"hash_algorithm" must be one of ${Object.keys(HASH_ALGORITHMS).join('|')}, got "${String(algorithm)}"`,
    );
  }

  const sentinel = r['genesis_sentinel'] ?? zeroDigest(algorithm);
  const hexLength = HASH_ALGORITHMS[algorithm].hexLength;
  if (typeof sentinel !== 'string' || !new RegExp(`^[0-9a-f]{${hexLength}}$`).test(sentinel)) {
    throw new ConfigError(`"genesis_sentinel" must be ${hexLength} lowercase hex characters for ${algorithm}`);
  }

  const storagePath = r['storage_path'] ?? DEFAULT_CHAIN_CONFIG.storage_path;
  if (typeof storagePath !== 'string' || storagePath.trim() === '') {
    throw new ConfigError('"storage_path" must be a non-empty string');
  }

  const synchronous = r['synchronous'] ?? DEFAULT_CHAIN_CONFIG.synchronous;
  if (!isSynchronousMode(synchronous)) {
    throw new ConfigError(`"synchronous" must be NORMAL|FULL|EXTRA, got "${String(synchronous)}"`);
  }

  const known = new Set(['hash_algorithm', 'genesis_sentinel', 'storage_path', 'synchronous', 'busy_timeout_ms', 'page_size']);
  for (const key of Object.keys(r)) {
    if (!known.has(key)) console.warn(`[config] Ignoring unknown key "${key}"`);
  }

  return Object.freeze({
    hash_algorithm: algorithm,
    genesis_sentinel: sentinel,
    storage_path: baseDir && storagePath !== ':memory:' ? path.resolve(baseDir, storagePath) : storagePath,
    synchronous,
    busy_timeout_ms: readInteger(r, 'busy_timeout_ms', 0, DEFAULT_CHAIN_CONFIG.busy_timeout_ms),
    page_size: readInteger(r, 'page_size', 1, DEFAULT_CHAIN_CONFIG.page_size),
  });
}

/**
 * Loads the chain config from a YAML file. A missing file yields the
 * defaults unless `required` is set.
 */
export function loadChainConfig(filePath: string, required = false): ChainConfig {
  if (!fs.existsSync(filePath)) {
    if (required) throw new ConfigError(`config file not found: ${filePath}`);
    return DEFAULT_CHAIN_CONFIG;
  }

  let parsed: unknown;
  try {
    parsed = parse(fs.readFileSync(filePath, 'utf8'));
  } catch (err) {
    throw new ConfigError(`failed to read ${filePath}: ${errorMessage(err)}`, err);
  }
  return parseChainConfig(parsed, path.dirname(path.resolve(filePath)));
}
