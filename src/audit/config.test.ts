import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { afterEach, describe, it, mock } from 'node:test';
import assert from 'node:assert/strict';
import {
  DEFAULT_CHAIN_CONFIG,
  loadChainConfig,
  parseChainConfig,
  zeroDigest,
} from './config.ts';
import { ConfigError } from './errors.ts';
import { cleanupTempDirs, createTempDir } from './test-utils.ts';

afterEach(() => {
  mock.restoreAll();
  cleanupTempDirs();
});

describe('audit/config', () => {
  it('fills defaults for an empty document', () => {
    const config = parseChainConfig(null);
    assert.deepEqual(config, DEFAULT_CHAIN_CONFIG);
    assert.equal(config.genesis_sentinel, '0'.repeat(64));
    assert.equal(config.synchronous, 'FULL');
  });

  it('loads YAML and resolves storage_path against the file directory', () => {
    const dir = createTempDir();
    const file = join(dir, 'audit-chain.yaml');
    writeFileSync(file, [
      'hash_algorithm: SHA-512',
      'storage_path: data/chain.db',
      'page_size: 32',
      '',
    ].join('\n'));

    const config = loadChainConfig(file);
    assert.equal(config.hash_algorithm, 'SHA-512');
    assert.equal(config.genesis_sentinel, zeroDigest('SHA-512'));
    assert.equal(config.genesis_sentinel.length, 128);
    assert.equal(config.storage_path, join(dir, 'data', 'chain.db'));
    assert.equal(config.page_size, 32);
    assert.equal(config.busy_timeout_ms, 5000);
  });

  it('returns a frozen config', () => {
    const config = parseChainConfig({ page_size: 8 });
    assert.ok(Object.isFrozen(config));
    assert.equal(Reflect.set(config, 'page_size', 9), false);
    assert.equal(config.page_size, 8);
  });

  it('keeps :memory: as is', () => {
    assert.equal(parseChainConfig({ storage_path: ':memory:' }, '/srv').storage_path, ':memory:');
  });

  it('names the offending field', () => {
    assert.throws(() => parseChainConfig({ hash_algorithm: 'MD5' }), {
      name: 'ConfigError',
      message: '"hash_algorithm" must be one of SHA-256|SHA-384|SHA-512, got "MD5"',
    });
    assert.throws(() => parseChainConfig({ hash_algorithm: 'SHA-384', genesis_sentinel: '0'.repeat(64) }), {
      message: '"genesis_sentinel" must be 96 lowercase hex characters for SHA-384',
    });
    assert.throws(() => parseChainConfig({ busy_timeout_ms: -1 }), {
      message: '"busy_timeout_ms" must be an integer >= 0',
    });
    assert.throws(() => parseChainConfig({ page_size: 0 }), {
      message: '"page_size" must be an integer >= 1',
    });
    assert.throws(() => parseChainConfig({ synchronous: 'OFF' }), {
      message: '"synchronous" must be NORMAL|FULL|EXTRA, got "OFF"',
    });
    assert.throws(() => parseChainConfig(['not', 'a', 'mapping']), ConfigError);
  });

  it('uses defaults for a missing optional file and fails for a required one', () => {
    const missing = join(createTempDir(), 'nope.yaml');
    assert.equal(loadChainConfig(missing), DEFAULT_CHAIN_CONFIG);
    assert.throws(() => loadChainConfig(missing, true), {
      name: 'ConfigError',
      message: `config file not found: ${missing}`,
    });
  });

  it('wraps YAML syntax errors', () => {
    const file = join(createTempDir(), 'broken.yaml');
    writeFileSync(file, 'hash_algorithm: [SHA-256\n');
    assert.throws(() => loadChainConfig(file), (err: unknown) => {
      assert.ok(err instanceof ConfigError);
      assert.equal(err.code, 'INVALID_CONFIG');
      assert.ok(err.message.startsWith(`failed to read ${file}: `));
      return true;
    });
  });

  it('warns about unknown keys', () => {
    const warn = mock.method(console, 'warn', () => undefined);
    parseChainConfig({ page_size: 4, retention_days: 30 });
    assert.equal(warn.mock.callCount(), 1);
    assert.deepEqual(warn.mock.calls[0]?.arguments, ['[config] Ignoring unknown key "retention_days"']);
  });
});
