import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import Database from 'better-sqlite3';
import { parseChainConfig, type ChainConfig } from './config.ts';

const tempDirs: string[] = [];

export function createTempDir(prefix = 'audit-chain-'): string {
  const dir = mkdtempSync(join(tmpdir(), `${prefix}${process.pid}-`));
  tempDirs.push(dir);
  return dir;
}

export function cleanupTempDirs(): void {
  for (const dir of tempDirs.splice(0, tempDirs.length)) {
    rmSync(dir, { recursive: true, force: true });
  }
}

export function testConfig(overrides: Partial<ChainConfig> = {}): ChainConfig {
  return parseChainConfig({ ...overrides });
}

/** Clock that hands out `times` in order, then keeps returning the last one. */
export function fixedClock(times: string[]): () => Date {
  const queue = [...times];
  let last = queue[queue.length - 1] ?? '2026-03-01T00:00:00.000Z';
  return () => {
    const next = queue.shift();
    if (next !== undefined) last = next;
    return new Date(last);
  };
}

/**
 * Edits the SQLite file behind a store the way someone with file access
 * would: append-only triggers dropped, rows changed directly.
 */
export function tamper(dbPath: string, sql: string, ...params: Array<string | number>): void {
  const db = new Database(dbPath);
  try {
    db.exec(`
      DROP TRIGGER IF EXISTS chain_entries_no_update;
      DROP TRIGGER IF EXISTS chain_entries_no_delete;
    `);
    db.prepare<Array<string | number>>(sql).run(...params);
  } finally {
    db.close();
  }
}
