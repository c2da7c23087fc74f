import { ValidationError } from './errors.ts';
import { buildExport, type ChainExport } from './export.ts';
import type { ChainQuery } from './query.ts';
import type { ChainStore } from './store.ts';
import type { ChainVerifier } from './verifier.ts';
import type {
  ChainEntry,
  ChainQueryFilter,
  EventCounts,
  VerificationResult,
} from './types.ts';

const MAX_ACCESS_LOG = 10_000;

export type AccessType =
  | 'PUBLIC_REPORT'
  | 'PUBLIC_EVENTS'
  | 'STATISTICS'
  | 'AUDIT_SUMMARY'
  | 'INTEGRITY_CHECK'
  | 'PUBLIC_EXPORT'
  | 'FULL_EXPORT';

export interface AccessRecord {
  timestamp: string;
  access_type: AccessType;
  description: string;
}

export interface PublicReport {
  generated_at: string;
  chainStatus: VerificationResult;
  visibleEntries: Iterable<ChainEntry>;
  eventCounts: EventCounts;
}

export interface PublicStatistics {
  generated_at: string;
  total_entries: number;
  public_entries: number;
  event_counts: EventCounts;
  oldest_public: string | null;
  newest_public: string | null;
}

export interface AuditSummary {
  generated_at: string;
  time_window_hours: number;
  since: string;
  public_entries: number;
  event_counts: EventCounts;
  oldest_public: string | null;
  newest_public: string | null;
}

export interface IntegrityReport {
  generated_at: string;
  result: VerificationResult;
}

export interface AccessStatistics {
  total_accesses: number;
  access_by_type: Partial<Record<AccessType, number>>;
}

export interface PublicAuditOptions {
  now?: () => Date;
}

interface PublicTally {
  count: number;
  eventCounts: EventCounts;
  oldest: string | null;
  newest: string | null;
}

function tally(entries: Iterable<ChainEntry>): PublicTally {
  const result: PublicTally = { count: 0, eventCounts: {}, oldest: null, newest: null };
  for (const entry of entries) {
    result.count += 1;
    result.eventCounts[entry.event_type] = (result.eventCounts[entry.event_type] ?? 0) + 1;
    result.oldest ??= entry.timestamp;
    result.newest = entry.timestamp;
  }
  return result;
}

/**
 * The outward face of the chain. Sensitive entries stay in the chain and in
 * verification, but never leave through here except as redacted placeholders.
 */
export class PublicAuditInterface {
  private readonly store: ChainStore;
  private readonly verifier: ChainVerifier;
  private readonly query: ChainQuery;
  private readonly now: () => Date;
  private accessLog: AccessRecord[] = [];

  constructor(store: ChainStore, verifier: ChainVerifier, query: ChainQuery, opts: PublicAuditOptions = {}) {
    this.store = store;
    this.verifier = verifier;
    this.query = query;
    this.now = opts.now ?? (() => new Date());
  }

  /**
   * Status, visible entries and counts all describe the same verified
   * prefix; entries appended after the verification pass are left out.
   */
  getPublicReport(): PublicReport {
    const chainStatus = this.verifier.verify();
    const visibleEntries = this.verifiedPublicEntries(chainStatus.checked);
    const report: PublicReport = {
      generated_at: this.now().toISOString(),
      chainStatus,
      visibleEntries,
      eventCounts: tally(visibleEntries).eventCounts,
    };
    this.logAccess('PUBLIC_REPORT', 'Public audit report generated');
    return report;
  }

  queryPublicEvents(filter: ChainQueryFilter = {}): Iterable<ChainEntry> {
    this.logAccess('PUBLIC_EVENTS', `Public events queried with filter ${JSON.stringify(filter)}`);
    if (filter.sensitivity === 'sensitive') return [];
    return this.query.query({ ...filter, sensitivity: 'public' });
  }

  getStatistics(): PublicStatistics {
    const stats = tally(this.query.query({ sensitivity: 'public' }));
    this.logAccess('STATISTICS', 'Audit statistics requested');
    return {
      generated_at: this.now().toISOString(),
      total_entries: this.store.length(),
      public_entries: stats.count,
      event_counts: stats.eventCounts,
      oldest_public: stats.oldest,
      newest_public: stats.newest,
    };
  }

  // Public entries stamped within the last `windowHours` hours.
  getAuditSummary(windowHours = 24): AuditSummary {
    if (!Number.isFinite(windowHours) || windowHours <= 0) {
      throw new ValidationError('windowHours must be a positive number');
    }
    const now = this.now();
    const since = new Date(now.getTime() - windowHours * 3_600_000).toISOString();
    const stats = tally(this.query.query({ sensitivity: 'public', since }));

    this.logAccess('AUDIT_SUMMARY', `Audit summary requested for ${windowHours}h window`);
    return {
      generated_at: now.toISOString(),
      time_window_hours: windowHours,
      since,
      public_entries: stats.count,
      event_counts: stats.eventCounts,
      oldest_public: stats.oldest,
      newest_public: stats.newest,
    };
  }

  verifyIntegrity(): IntegrityReport {
    const result = this.verifier.verify();
    this.logAccess('INTEGRITY_CHECK', 'System integrity verification performed');
    return { generated_at: this.now().toISOString(), result };
  }

  /**
   * Export for outside verification. Sensitive entries become placeholders
   * that keep sequence and hashes, so linkage stays checkable end to end.
   * Throws ChainIntegrityViolation for a broken chain.
   */
  exportPublicLog(): ChainExport {
    return this.export(true);
  }

  // Operator export, nothing redacted.
  exportFullLog(): ChainExport {
    return this.export(false);
  }

  private export(redactSensitive: boolean): ChainExport {
    const status = this.verifier.assertIntact();
    // Only what was just verified; later appends wait for the next export.
    const entries = status.checked === 0 ? [] : this.store.readRange(0, status.checked - 1);
    const document = buildExport(this.store.info(), entries, {
      exportedAt: this.now().toISOString(),
      redactSensitive,
    });

    this.logAccess(
      redactSensitive ? 'PUBLIC_EXPORT' : 'FULL_EXPORT',
      `Exported ${document.entries.length} entries`,
    );
    return document;
  }

  private verifiedPublicEntries(checked: number): Iterable<ChainEntry> {
    const store = this.store;
    return {
      *[Symbol.iterator]() {
        if (checked === 0) return;
        for (const entry of store.readRange(0, checked - 1)) {
          if (entry.sensitivity === 'public') yield entry;
        }
      },
    };
  }

  getAccessLog(): AccessRecord[] {
    return [...this.accessLog];
  }

  getAccessStatistics(): AccessStatistics {
    const byType: Partial<Record<AccessType, number>> = {};
    for (const record of this.accessLog) {
      byType[record.access_type] = (byType[record.access_type] ?? 0) + 1;
    }
    return { total_accesses: this.accessLog.length, access_by_type: byType };
  }

  private logAccess(accessType: AccessType, description: string): void {
    this.accessLog.push({ timestamp: this.now().toISOString(), access_type: accessType, description });
    if (this.accessLog.length > MAX_ACCESS_LOG) {
      this.accessLog = this.accessLog.slice(-MAX_ACCESS_LOG);
    }
  }
}
