import picomatch from 'picomatch';
import { ValidationError } from './errors.ts';
import type { ChainStore } from './store.ts';
import {
  isEventType,
  isSensitivity,
  type ChainEntry,
  type ChainQueryFilter,
  type EventCounts,
  type SelectCriteria,
} from './types.ts';

function normalizeTime(value: string | Date, label: string): string {
  const time = value instanceof Date ? value.getTime() : Date.parse(value);
  if (Number.isNaN(time)) {
    throw new ValidationError(`${label} is not a valid date: ${String(value)}`);
  }
  return new Date(time).toISOString();
}

function readCount(value: number | undefined, label: string): number | undefined {
  if (value === undefined) return undefined;
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ValidationError(`${label} must be a non-negative integer`);
  }
  return value;
}

interface CompiledQuery {
  criteria: SelectCriteria;
  actorMatcher?: (actor: string) => boolean;
  offset: number;
  limit?: number;
}

function compileFilter(filter: ChainQueryFilter): CompiledQuery {
  const criteria: SelectCriteria = {};

  if (filter.eventType !== undefined) {
    const types = Array.isArray(filter.eventType) ? filter.eventType : [filter.eventType];
    for (const type of types) {
      if (!isEventType(type)) throw new ValidationError(`unknown event type "${String(type)}"`);
    }
    criteria.eventTypes = [...new Set(types)];
  }
  if (filter.actor !== undefined) criteria.actor = filter.actor;
  if (filter.since !== undefined) criteria.since = normalizeTime(filter.since, 'since');
  if (filter.until !== undefined) criteria.until = normalizeTime(filter.until, 'until');
  if (filter.sensitivity !== undefined) {
    if (!isSensitivity(filter.sensitivity)) {
      throw new ValidationError(`unknown sensitivity "${String(filter.sensitivity)}"`);
    }
    criteria.sensitivity = filter.sensitivity;
  }

  const compiled: CompiledQuery = { criteria, offset: readCount(filter.offset, 'offset') ?? 0 };
  const limit = readCount(filter.limit, 'limit');
  if (limit !== undefined) compiled.limit = limit;
  if (filter.actorGlob !== undefined) {
    if (filter.actorGlob === '') throw new ValidationError('actorGlob must not be empty');
    compiled.actorMatcher = picomatch(filter.actorGlob, { dot: true });
  }
  return compiled;
}

/**
 * Read-only filtered views over a chain store. Results always come back in
 * sequence order so offset/limit pages are stable.
 */
export class ChainQuery {
  private readonly store: ChainStore;

  constructor(store: ChainStore) {
    this.store = store;
  }

  query(filter: ChainQueryFilter = {}): Iterable<ChainEntry> {
    const compiled = compileFilter(filter);
    return { [Symbol.iterator]: () => this.run(compiled) };
  }

  count(filter: ChainQueryFilter = {}): number {
    let total = 0;
    for (const _entry of this.query(filter)) total += 1;
    return total;
  }

  countByEventType(filter: ChainQueryFilter = {}): EventCounts {
    const counts: EventCounts = {};
    for (const entry of this.query(filter)) {
      counts[entry.event_type] = (counts[entry.event_type] ?? 0) + 1;
    }
    return counts;
  }

  private *run(compiled: CompiledQuery): Generator<ChainEntry, void, undefined> {
    if (compiled.limit === 0) return;
    let skipped = 0;
    let emitted = 0;

    for (const entry of this.store.select(compiled.criteria)) {
      if (compiled.actorMatcher && !compiled.actorMatcher(entry.actor)) continue;
      if (skipped < compiled.offset) {
        skipped += 1;
        continue;
      }
      yield entry;
      emitted += 1;
      if (compiled.limit !== undefined && emitted >= compiled.limit) return;
    }
  }
}
