import { afterEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { ChainStore } from '../audit/store.ts';
import { cleanupTempDirs, createTempDir, tamper, testConfig } from '../audit/test-utils.ts';
import type { ChainConfig } from '../audit/config.ts';
import {
  UsageError,
  describeResult,
  parseCommand,
  parseGlobalArgs,
  runCli,
  type CliIo,
} from './index.ts';

afterEach(cleanupTempDirs);

interface Captured extends CliIo {
  stdout: string[];
  stderr: string[];
}

function capture(): Captured {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: line => stdout.push(line),
    err: line => stderr.push(line),
  };
}

function seedChain(dbPath: string, config: ChainConfig = testConfig()): void {
  const store = new ChainStore(dbPath, config);
  store.append({ event_type: 'system_init', actor: 'kernel' });
  store.append({ event_type: 'security_event', actor: 'guard', sensitivity: 'sensitive', payload: { ip: '10.0.0.1' } });
  store.append({ event_type: 'kernel_op', actor: 'kernel', payload: { op: 'spawn' } });
  store.close();
}

describe('cli/index', () => {
  it('parseGlobalArgs extracts --db and --config and keeps the rest', () => {
    const parsed = parseGlobalArgs(['--db', 'x.db', 'export', 'out.json', '--config', 'c.yaml', '--public']);
    assert.equal(parsed.dbPath, 'x.db');
    assert.equal(parsed.configPath, 'c.yaml');
    assert.deepEqual(parsed.args, ['export', 'out.json', '--public']);

    assert.throws(() => parseGlobalArgs(['--db']), { name: 'UsageError', message: '--db requires a path value' });
    assert.throws(() => parseGlobalArgs(['--config', '--db', 'x']), UsageError);
  });

  it('parseCommand defaults to verify and validates arguments', () => {
    assert.deepEqual(parseCommand([]), { command: 'verify' });
    assert.deepEqual(parseCommand(['stats']), { command: 'stats' });
    assert.deepEqual(parseCommand(['export', 'a.json', '--public']), { command: 'export', outPath: 'a.json', redact: true });
    assert.deepEqual(parseCommand(['export', 'a.json']), { command: 'export', outPath: 'a.json', redact: false });
    assert.deepEqual(parseCommand(['verify-file', 'a.json']), { command: 'verify-file', filePath: 'a.json' });
    assert.deepEqual(parseCommand(['--help']), { command: 'help' });

    assert.throws(() => parseCommand(['verify', 'extra']), { message: 'Unexpected argument: extra' });
    assert.throws(() => parseCommand(['export']), { message: 'export requires exactly one <out.json>' });
    assert.throws(() => parseCommand(['export', 'a.json', '--gzip']), { message: 'Unknown export flag: --gzip' });
    assert.throws(() => parseCommand(['verify-file']), { message: 'verify-file requires exactly one <export.json>' });
    assert.throws(() => parseCommand(['frobnicate']), { message: 'Unknown command: frobnicate' });
  });

  it('describeResult summarizes both outcomes', () => {
    assert.equal(describeResult({ valid: true, checked: 7, anomalies: [] }), 'chain intact, 7 entries verified');
    assert.equal(
      describeResult({
        valid: false,
        checked: 3,
        anomalies: [],
        firstFailure: { sequence: 4, reason: 'sequence_gap', message: 'expected sequence 3, found 4' },
      }),
      'chain broken at sequence 4: sequence_gap (expected sequence 3, found 4)',
    );
  });

  it('exits 0 for an intact chain', () => {
    const dir = createTempDir();
    const dbPath = path.join(dir, 'chain.db');
    seedChain(dbPath);

    const io = capture();
    assert.equal(runCli(['--db', dbPath], io, dir), 0);
    assert.deepEqual(io.stdout, ['chain intact, 3 entries verified']);
    assert.deepEqual(io.stderr, []);
  });

  it('exits 1 and names the first broken entry', () => {
    const dir = createTempDir();
    const dbPath = path.join(dir, 'chain.db');
    seedChain(dbPath);
    tamper(dbPath, "UPDATE chain_entries SET actor = 'mallory' WHERE sequence = 1");

    const io = capture();
    assert.equal(runCli(['verify', '--db', 'chain.db'], io, dir), 1);
    assert.deepEqual(io.stdout, []);
    assert.deepEqual(io.stderr, [
      'chain broken at sequence 1: hash_mismatch (stored hash does not match entry content)',
    ]);
  });

  it('exits 1 when the store cannot be opened', () => {
    const dir = createTempDir();
    const io = capture();
    assert.equal(runCli(['--db', 'missing.db'], io, dir), 1);
    assert.equal(io.stderr.length, 1);
    assert.ok(io.stderr[0]?.startsWith(`PERSISTENCE_FAILED: cannot open chain store at ${path.join(dir, 'missing.db')}: `));
    assert.equal(fs.existsSync(path.join(dir, 'missing.db')), false);
  });

  it('exits 2 on bad usage', () => {
    const io = capture();
    assert.equal(runCli(['bogus'], io, createTempDir()), 2);
    assert.deepEqual(io.stderr, ['Unknown command: bogus', 'Run with --help for usage.']);
  });

  it('prints help', () => {
    const io = capture();
    assert.equal(runCli(['help'], io, createTempDir()), 0);
    assert.equal(io.stdout.length, 1);
    assert.ok(io.stdout[0]?.startsWith('Audit chain verification tool\n'));
  });

  it('reads the config file from the working directory', () => {
    const dir = createTempDir();
    fs.writeFileSync(path.join(dir, 'audit-chain.yaml'), 'hash_algorithm: SHA-512\nstorage_path: data/chain.db\n');
    seedChain(path.join(dir, 'data', 'chain.db'), testConfig({ hash_algorithm: 'SHA-512' }));

    const io = capture();
    assert.equal(runCli([], io, dir), 0);
    assert.deepEqual(io.stdout, ['chain intact, 3 entries verified']);
  });

  it('fails with INVALID_CONFIG for a missing --config file', () => {
    const dir = createTempDir();
    const io = capture();
    assert.equal(runCli(['--config', 'absent.yaml'], io, dir), 1);
    assert.deepEqual(io.stderr, [`INVALID_CONFIG: config file not found: ${path.join(dir, 'absent.yaml')}`]);
  });

  it('prints public statistics as JSON', () => {
    const dir = createTempDir();
    const dbPath = path.join(dir, 'chain.db');
    seedChain(dbPath);

    const io = capture();
    assert.equal(runCli(['--db', dbPath, 'stats'], io, dir), 0);
    const stats: Record<string, unknown> = JSON.parse(io.stdout[0] ?? '');
    assert.equal(stats['total_entries'], 3);
    assert.equal(stats['public_entries'], 2);
    assert.deepEqual(stats['event_counts'], { system_init: 1, kernel_op: 1 });
  });

  it('writes a public export that verify-file accepts', () => {
    const dir = createTempDir();
    const dbPath = path.join(dir, 'chain.db');
    seedChain(dbPath);
    const outPath = path.join(dir, 'public.json');

    const exportIo = capture();
    assert.equal(runCli(['--db', dbPath, 'export', 'public.json', '--public'], exportIo, dir), 0);
    assert.deepEqual(exportIo.stdout, [`exported 3 entries to ${outPath}`]);
    assert.equal(fs.readFileSync(outPath, 'utf8').includes('10.0.0.1'), false);

    const verifyIo = capture();
    assert.equal(runCli(['verify-file', 'public.json'], verifyIo, dir), 0);
    assert.deepEqual(verifyIo.stdout, ['chain intact, 3 entries verified (1 redacted)']);
  });

  it('verify-file reports tampered and missing files', () => {
    const dir = createTempDir();
    const dbPath = path.join(dir, 'chain.db');
    seedChain(dbPath);
    const outPath = path.join(dir, 'full.json');
    assert.equal(runCli(['--db', dbPath, 'export', outPath], capture(), dir), 0);

    const content = fs.readFileSync(outPath, 'utf8');
    fs.writeFileSync(outPath, content.replace('"op": "spawn"', '"op": "kill"'));

    const tamperedIo = capture();
    assert.equal(runCli(['verify-file', outPath], tamperedIo, dir), 1);
    assert.deepEqual(tamperedIo.stderr, [
      'chain broken at sequence 2: hash_mismatch (stored hash does not match entry content)',
    ]);

    const missingIo = capture();
    assert.equal(runCli(['verify-file', 'nope.json'], missingIo, dir), 1);
    assert.deepEqual(missingIo.stderr, [`export file not found: ${path.join(dir, 'nope.json')}`]);
  });

  it('verify-file checks the export against an explicit --config', () => {
    const dir = createTempDir();
    const dbPath = path.join(dir, 'chain.db');
    seedChain(dbPath);
    assert.equal(runCli(['--db', dbPath, 'export', 'full.json'], capture(), dir), 0);
    fs.writeFileSync(path.join(dir, 'sha512.yaml'), 'hash_algorithm: SHA-512\n');
    fs.writeFileSync(path.join(dir, 'default.yaml'), 'page_size: 16\n');

    const mismatchIo = capture();
    assert.equal(runCli(['--config', 'sha512.yaml', 'verify-file', 'full.json'], mismatchIo, dir), 1);
    assert.deepEqual(mismatchIo.stderr, ['INVALID_CONFIG: export uses SHA-256, config says SHA-512']);

    const missingIo = capture();
    assert.equal(runCli(['--config', 'nope.yaml', 'verify-file', 'full.json'], missingIo, dir), 1);
    assert.deepEqual(missingIo.stderr, [`INVALID_CONFIG: config file not found: ${path.join(dir, 'nope.yaml')}`]);

    const matchingIo = capture();
    assert.equal(runCli(['--config', 'default.yaml', 'verify-file', 'full.json'], matchingIo, dir), 0);
    assert.deepEqual(matchingIo.stdout, ['chain intact, 3 entries verified']);
  });

  it('verify-file rejects --db as bad usage', () => {
    const io = capture();
    assert.equal(runCli(['--db', 'chain.db', 'verify-file', 'full.json'], io, createTempDir()), 2);
    assert.deepEqual(io.stderr, ['--db does not apply to verify-file', 'Run with --help for usage.']);
  });
});
