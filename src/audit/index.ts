export { ChainStore } from './store.ts';
export type { ChainStoreOptions } from './store.ts';
export { ChainVerifier, verifyEntries } from './verifier.ts';
export type { VerifyOptions } from './verifier.ts';
export { ChainQuery } from './query.ts';
export { PublicAuditInterface } from './public.ts';
export type {
  AccessRecord,
  AccessStatistics,
  AccessType,
  AuditSummary,
  IntegrityReport,
  PublicAuditOptions,
  PublicReport,
  PublicStatistics,
} from './public.ts';
export { buildExport, parseExport, redact, EXPORT_FORMAT, EXPORT_VERSION } from './export.ts';
export type { ChainExport, ChainExportHeader, ParsedExport } from './export.ts';
export { canonicalize, digestEntry, assertPayload, isPayload, CANONICAL_VERSION } from './hasher.ts';
export {
  DEFAULT_CHAIN_CONFIG,
  DEFAULT_CONFIG_FILE,
  HASH_ALGORITHMS,
  loadChainConfig,
  parseChainConfig,
  zeroDigest,
} from './config.ts';
export type { ChainConfig, HashAlgorithm, SynchronousMode } from './config.ts';
export {
  ChainError,
  ChainIntegrityViolation,
  ConfigError,
  MalformedEntryError,
  PersistenceError,
  SerializationError,
  ValidationError,
} from './errors.ts';
export type { ChainErrorCode } from './errors.ts';
export { EVENT_TYPES, isEventType, isSensitivity, isRedacted } from './types.ts';
export type {
  AppendInput,
  ChainEntry,
  ChainInfo,
  ChainQueryFilter,
  EventCounts,
  EventType,
  ExportedEntry,
  IntegrityViolationReason,
  JsonValue,
  Payload,
  RedactedEntry,
  Sensitivity,
  TimestampAnomaly,
  VerificationFailure,
  VerificationResult,
} from './types.ts';
