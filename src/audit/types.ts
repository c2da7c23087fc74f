export const EVENT_TYPES = [
  'system_init',
  'kernel_op',
  'ethical_decision',
  'ai_processing',
  'memory_access',
  'sentient_activity',
  'proof_verification',
  'security_event',
  'data_access',
  'config_change',
] as const;

export type EventType = (typeof EVENT_TYPES)[number];

export type Sensitivity = 'public' | 'sensitive';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

// Opaque to the chain: only its canonical form matters for hashing.
export type Payload = { [key: string]: JsonValue };

export interface ChainEntry {
  sequence: number;
  entry_id: string;
  timestamp: string;
  event_type: EventType;
  actor: string;
  sensitivity: Sensitivity;
  payload: Payload;
  prev_hash: string;
  hash: string;
}

export type UnsealedEntry = Omit<ChainEntry, 'hash'>;

/**
 * Stand-in for a hidden entry in a public export. Keeps the linkage fields so
 * an outside party can still walk the chain across it.
 */
export interface RedactedEntry {
  sequence: number;
  prev_hash: string;
  hash: string;
  redacted: true;
}

export type ExportedEntry = ChainEntry | RedactedEntry;

export interface AppendInput {
  event_type: EventType;
  actor: string;
  sensitivity?: Sensitivity;
  payload?: Payload;
}

export interface ChainInfo {
  chain_id: string;
  created_at: string;
  hash_algorithm: string;
  genesis_sentinel: string;
}

export type IntegrityViolationReason =
  | 'sequence_gap'
  | 'prev_hash_mismatch'
  | 'hash_mismatch'
  | 'malformed_entry';

export interface VerificationFailure {
  sequence: number;
  reason: IntegrityViolationReason;
  message: string;
}

export interface TimestampAnomaly {
  sequence: number;
  timestamp: string;
  previous_timestamp: string;
}

export interface VerificationResult {
  valid: boolean;
  checked: number;
  firstFailure?: VerificationFailure;
  anomalies: TimestampAnomaly[];
  redacted?: number;
}

export interface ChainQueryFilter {
  eventType?: EventType | EventType[];
  actor?: string;
  /**
   * Glob over actor names. `/` separates segments: `*` stays within one
   * segment, `**` crosses them (`svc/**` matches `svc/worker/1`).
   */
  actorGlob?: string;
  since?: string | Date;
  until?: string | Date;
  sensitivity?: Sensitivity;
  offset?: number;
  limit?: number;
}

// Already-validated filter handed to the store's SQL scan.
export interface SelectCriteria {
  eventTypes?: EventType[];
  actor?: string;
  since?: string;
  until?: string;
  sensitivity?: Sensitivity;
}

export type EventCounts = Partial<Record<EventType, number>>;

export function isEventType(value: unknown): value is EventType {
  return EVENT_TYPES.some(type => type === value);
}

export function isSensitivity(value: unknown): value is Sensitivity {
  return value === 'public' || value === 'sensitive';
}

export function isRedacted(entry: ExportedEntry): entry is RedactedEntry {
  return 'redacted' in entry && entry.redacted === true;
}
