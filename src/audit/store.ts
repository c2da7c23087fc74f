import { randomUUID } from 'node:crypto';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import type { ChainConfig } from './config.ts';
import {
  ChainError,
  ConfigError,
  MalformedEntryError,
  PersistenceError,
  ValidationError,
  errorMessage,
} from './errors.ts';
import { assertPayload, canonicalize, digestEntry, isPayload } from './hasher.ts';
import {
  isEventType,
  isSensitivity,
  type AppendInput,
  type ChainEntry,
  type ChainInfo,
  type EventType,
  type Payload,
  type SelectCriteria,
  type Sensitivity,
  type UnsealedEntry,
} from './types.ts';

// SQLite is dynamically typed; anything but the rowid may come back as anything.
interface ChainRow {
  sequence: number;
  entry_id: unknown;
  timestamp: unknown;
  event_type: unknown;
  actor: unknown;
  sensitivity: unknown;
  payload: unknown;
  prev_hash: unknown;
  hash: unknown;
}

interface TailRow {
  sequence: number;
  hash: string;
}

interface MetaRow {
  key: string;
  value: string;
}

interface ValidatedInput {
  event_type: EventType;
  actor: string;
  sensitivity: Sensitivity;
  payload: Payload;
  payloadText: string;
}

type BindParams = Record<string, string | number>;

const COLUMNS = 'sequence, entry_id, timestamp, event_type, actor, sensitivity, payload, prev_hash, hash';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS chain_meta (
    key    TEXT PRIMARY KEY,
    value  TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS chain_entries (
    sequence     INTEGER PRIMARY KEY CHECK(sequence >= 0),
    entry_id     TEXT    NOT NULL UNIQUE,
    timestamp    TEXT    NOT NULL,
    event_type   TEXT    NOT NULL,
    actor        TEXT    NOT NULL,
    sensitivity  TEXT    NOT NULL,
    payload      TEXT    NOT NULL,
    prev_hash    TEXT    NOT NULL,
    hash         TEXT    NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_chain_event_type ON chain_entries(event_type);
  CREATE INDEX IF NOT EXISTS idx_chain_actor ON chain_entries(actor);
  CREATE INDEX IF NOT EXISTS idx_chain_timestamp ON chain_entries(timestamp);

  CREATE TRIGGER IF NOT EXISTS chain_entries_no_update
  BEFORE UPDATE ON chain_entries
  BEGIN
    SELECT RAISE(ABORT, 'chain entries are append-only');
  END;

  CREATE TRIGGER IF NOT EXISTS chain_entries_no_delete
  BEFORE DELETE ON chain_entries
  BEGIN
    SELECT RAISE(ABORT, 'chain entries are append-only');
  END;
`;

function requireString(row: ChainRow, column: keyof ChainRow): string {
  const value = row[column];
  if (typeof value !== 'string') {
    throw new MalformedEntryError(row.sequence, `column ${column} is not text`);
  }
  return value;
}

function decodePayload(row: ChainRow): Payload {
  let value: unknown;
  try {
    value = JSON.parse(requireString(row, 'payload'));
  } catch (err) {
    if (err instanceof MalformedEntryError) throw err;
    throw new MalformedEntryError(row.sequence, `undecodable payload: ${errorMessage(err)}`, err);
  }
  if (!isPayload(value)) {
    throw new MalformedEntryError(row.sequence, 'payload is not a JSON object');
  }
  return value;
}

function mapRow(row: ChainRow): ChainEntry {
  const eventType = requireString(row, 'event_type');
  if (!isEventType(eventType)) {
    throw new MalformedEntryError(row.sequence, `unknown event_type "${eventType}"`);
  }
  const sensitivity = requireString(row, 'sensitivity');
  if (!isSensitivity(sensitivity)) {
    throw new MalformedEntryError(row.sequence, `unknown sensitivity "${sensitivity}"`);
  }

  const payload = decodePayload(row);

  return Object.freeze({
    sequence: row.sequence,
    entry_id: requireString(row, 'entry_id'),
    timestamp: requireString(row, 'timestamp'),
    event_type: eventType,
    actor: requireString(row, 'actor'),
    sensitivity,
    payload,
    prev_hash: requireString(row, 'prev_hash'),
    hash: requireString(row, 'hash'),
  });
}

function validateAppendInput(input: AppendInput): ValidatedInput {
  if (!isEventType(input.event_type)) {
    throw new ValidationError(`invalid event_type "${String(input.event_type)}"`);
  }
  if (typeof input.actor !== 'string' || input.actor.trim() === '') {
    throw new ValidationError('actor must be a non-empty string');
  }
  const sensitivity = input.sensitivity ?? 'public';
  if (!isSensitivity(sensitivity)) {
    throw new ValidationError(`invalid sensitivity "${String(sensitivity)}"`);
  }
  const raw: unknown = input.payload ?? {};
  assertPayload(raw);

  // Store and return a private copy so later caller mutations cannot diverge from the hash.
  const payloadText = canonicalize(raw);
  const payload: unknown = JSON.parse(payloadText);
  assertPayload(payload);

  return { event_type: input.event_type, actor: input.actor, sensitivity, payload, payloadText };
}

function assertSequence(value: number, label: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ValidationError(`${label} must be a non-negative integer`);
  }
}

export interface ChainStoreOptions {
  readonly?: boolean;
  now?: () => Date;
  newId?: () => string;
}

/**
 * Append-only, hash-linked sequence of audit entries in a SQLite file.
 *
 * Appends run in an IMMEDIATE transaction that reads the tail under the
 * write lock, so concurrent writers (including other connections to the same
 * file) serialize instead of forking the chain.
 */
export class ChainStore {
  private readonly db: Database.Database;
  private readonly dbPath: string;
  private readonly config: ChainConfig;
  private readonly now: () => Date;
  private readonly newId: () => string;
  private readonly chainInfo: ChainInfo;
  private readonly tailStmt: Database.Statement<[], TailRow>;
  private readonly readStmt: Database.Statement<[number], ChainRow>;
  private readonly insertStmt: Database.Statement<[BindParams]>;
  private readonly appendTx: Database.Transaction<(input: ValidatedInput) => ChainEntry>;
  private closed = false;

  constructor(dbPath: string, config: ChainConfig, opts: ChainStoreOptions = {}) {
    this.dbPath = dbPath;
    this.config = config;
    this.now = opts.now ?? (() => new Date());
    this.newId = opts.newId ?? randomUUID;

    try {
      if (opts.readonly) {
        this.db = new Database(dbPath, {
          readonly: true,
          fileMustExist: true,
          timeout: config.busy_timeout_ms,
        });
      } else {
        if (dbPath !== ':memory:') mkdirSync(dirname(dbPath), { recursive: true });
        this.db = new Database(dbPath, { timeout: config.busy_timeout_ms });
        if (dbPath !== ':memory:') this.db.pragma('journal_mode = WAL');
        this.db.pragma(`synchronous = ${config.synchronous}`);
        this.db.exec(SCHEMA);
      }
    } catch (err) {
      throw new PersistenceError(`cannot open chain store at ${dbPath}: ${errorMessage(err)}`, err);
    }

    try {
      if (!opts.readonly) this.initializeMeta();
      this.chainInfo = this.loadMeta();
      this.tailStmt = this.db.prepare<[], TailRow>(
        'SELECT sequence, hash FROM chain_entries ORDER BY sequence DESC LIMIT 1',
      );
      this.readStmt = this.db.prepare<[number], ChainRow>(
        `SELECT ${COLUMNS} FROM chain_entries WHERE sequence = ?`,
      );
      this.insertStmt = this.db.prepare<BindParams>(`
        INSERT INTO chain_entries (${COLUMNS})
        VALUES (@sequence, @entry_id, @timestamp, @event_type, @actor, @sensitivity, @payload, @prev_hash, @hash)
      `);
    } catch (err) {
      this.db.close();
      if (err instanceof ChainError) throw err;
      throw new PersistenceError(`not a chain store: ${dbPath}: ${errorMessage(err)}`, err);
    }

    this.appendTx = this.db.transaction((input: ValidatedInput): ChainEntry => {
      const last = this.tailStmt.get();
      const prevHash = last ? last.hash : this.config.genesis_sentinel;
      const unsealed: UnsealedEntry = {
        sequence: last ? last.sequence + 1 : 0,
        entry_id: this.newId(),
        timestamp: this.now().toISOString(),
        event_type: input.event_type,
        actor: input.actor,
        sensitivity: input.sensitivity,
        payload: input.payload,
        prev_hash: prevHash,
      };
      const hash = digestEntry(unsealed, prevHash, this.config.hash_algorithm);

      this.insertStmt.run({
        sequence: unsealed.sequence,
        entry_id: unsealed.entry_id,
        timestamp: unsealed.timestamp,
        event_type: unsealed.event_type,
        actor: unsealed.actor,
        sensitivity: unsealed.sensitivity,
        payload: input.payloadText,
        prev_hash: prevHash,
        hash,
      });

      return Object.freeze({ ...unsealed, hash });
    });
  }

  private initializeMeta(): void {
    const insert = this.db.prepare<[string, string]>('INSERT OR IGNORE INTO chain_meta (key, value) VALUES (?, ?)');
    this.db.transaction(() => {
      insert.run('chain_id', randomUUID());
      insert.run('created_at', this.now().toISOString());
      insert.run('hash_algorithm', this.config.hash_algorithm);
      insert.run('genesis_sentinel', this.config.genesis_sentinel);
    }).immediate();
  }

  private loadMeta(): ChainInfo {
    const rows = this.db.prepare<[], MetaRow>('SELECT key, value FROM chain_meta').all();
    const meta = new Map(rows.map(row => [row.key, row.value]));
    const info: ChainInfo = {
      chain_id: meta.get('chain_id') ?? '',
      created_at: meta.get('created_at') ?? '',
      hash_algorithm: meta.get('hash_algorithm') ?? '',
      genesis_sentinel: meta.get('genesis_sentinel') ?? '',
    };

    if (info.hash_algorithm !== this.config.hash_algorithm) {
      throw new ConfigError(
        `chain at ${this.dbPath} uses ${info.hash_algorithm || '(unknown)'}, config says ${this.config.hash_algorithm}`,
      );
    }
    if (info.genesis_sentinel !== this.config.genesis_sentinel) {
      throw new ConfigError(`chain at ${this.dbPath} was created with a different genesis_sentinel`);
    }
    return info;
  }

  private assertOpen(): void {
    if (this.closed) throw new PersistenceError('chain store is closed');
  }

  /**
   * Appends one entry and returns it once the commit is durable. On any
   * storage failure the tail is unchanged and PersistenceError is thrown.
   */
  append(input: AppendInput): ChainEntry {
    this.assertOpen();
    const validated = validateAppendInput(input);

    try {
      return this.appendTx.immediate(validated);
    } catch (err) {
      throw new PersistenceError(`append failed: ${errorMessage(err)}`, err);
    }
  }

  read(sequence: number): ChainEntry | null {
    this.assertOpen();
    assertSequence(sequence, 'sequence');
    const row = this.readStmt.get(sequence);
    return row ? mapRow(row) : null;
  }

  tail(): ChainEntry | null {
    this.assertOpen();
    const last = this.tailStmt.get();
    return last ? this.read(last.sequence) : null;
  }

  length(): number {
    this.assertOpen();
    const last = this.tailStmt.get();
    return last ? last.sequence + 1 : 0;
  }

  info(): ChainInfo {
    return { ...this.chainInfo };
  }

  /**
   * Lazily reads entries `from..to` in sequence order. Without `to`, the
   * range ends at the tail observed when iteration starts. Each iteration
   * starts over at `from`.
   */
  readRange(from = 0, to?: number): Iterable<ChainEntry> {
    assertSequence(from, 'from');
    if (to !== undefined) assertSequence(to, 'to');
    return { [Symbol.iterator]: () => this.scan({}, from, to) };
  }

  select(criteria: SelectCriteria): Iterable<ChainEntry> {
    return { [Symbol.iterator]: () => this.scan(criteria, 0, undefined) };
  }

  private *scan(criteria: SelectCriteria, from: number, to: number | undefined): Generator<ChainEntry, void, undefined> {
    this.assertOpen();
    const upTo = to ?? (this.tailStmt.get()?.sequence ?? -1);
    if (upTo < from) return;

    const pageSize = this.config.page_size;
    const clauses = ['sequence >= @cursor', 'sequence <= @upTo'];
    const params: BindParams = { upTo, limit: pageSize };

    if (criteria.eventTypes) {
      if (criteria.eventTypes.length === 0) return;
      const names = criteria.eventTypes.map((type, i) => {
        params[`et${i}`] = type;
        return `@et${i}`;
      });
      clauses.push(`event_type IN (${names.join(', ')})`);
    }
    if (criteria.actor !== undefined) {
      clauses.push('actor = @actor');
      params['actor'] = criteria.actor;
    }
    if (criteria.since !== undefined) {
      clauses.push('timestamp >= @since');
      params['since'] = criteria.since;
    }
    if (criteria.until !== undefined) {
      clauses.push('timestamp <= @until');
      params['until'] = criteria.until;
    }
    if (criteria.sensitivity !== undefined) {
      clauses.push('sensitivity = @sensitivity');
      params['sensitivity'] = criteria.sensitivity;
    }

    const stmt = this.db.prepare<BindParams, ChainRow>(`
      SELECT ${COLUMNS}
      FROM chain_entries
      WHERE ${clauses.join(' AND ')}
      ORDER BY sequence ASC
      LIMIT @limit
    `);

    let cursor = from;
    for (;;) {
      this.assertOpen();
      const rows = stmt.all({ ...params, cursor });
      for (const row of rows) yield mapRow(row);
      const last = rows[rows.length - 1];
      if (!last || rows.length < pageSize) return;
      cursor = last.sequence + 1;
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.db.close();
  }

  getPath(): string {
    return this.dbPath;
  }
}
