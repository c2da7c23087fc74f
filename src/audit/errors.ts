import type { VerificationFailure } from './types.ts';

export type ChainErrorCode =
  | 'VALIDATION_FAILED'
  | 'SERIALIZATION_FAILED'
  | 'PERSISTENCE_FAILED'
  | 'MALFORMED_ENTRY'
  | 'CHAIN_INTEGRITY_VIOLATION'
  | 'INVALID_CONFIG';

interface ChainErrorOptions {
  retryable?: boolean;
  cause?: unknown;
}

export class ChainError extends Error {
  readonly code: ChainErrorCode;
  readonly retryable: boolean;

  constructor(code: ChainErrorCode, message: string, opts: ChainErrorOptions = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = 'ChainError';
    this.code = code;
    this.retryable = opts.retryable ?? false;
  }
}

// Bad append input. Never reaches storage.
export class ValidationError extends ChainError {
  constructor(message: string, code: ChainErrorCode = 'VALIDATION_FAILED', cause?: unknown) {
    super(code, message, { cause });
    this.name = 'ValidationError';
  }
}

export class SerializationError extends ValidationError {
  constructor(message: string, cause?: unknown) {
    super(message, 'SERIALIZATION_FAILED', cause);
    this.name = 'SerializationError';
  }
}

// The write did not take effect; the caller may retry.
export class PersistenceError extends ChainError {
  constructor(message: string, cause?: unknown) {
    super('PERSISTENCE_FAILED', message, { retryable: true, cause });
    this.name = 'PersistenceError';
  }
}

export class MalformedEntryError extends ChainError {
  readonly sequence: number;

  constructor(sequence: number, message: string, cause?: unknown) {
    super('MALFORMED_ENTRY', `entry ${sequence}: ${message}`, { cause });
    this.name = 'MalformedEntryError';
    this.sequence = sequence;
  }
}

export class ChainIntegrityViolation extends ChainError {
  readonly failure: VerificationFailure;

  constructor(failure: VerificationFailure) {
    super(
      'CHAIN_INTEGRITY_VIOLATION',
      `chain broken at sequence ${failure.sequence}: ${failure.reason} (${failure.message})`,
    );
    this.name = 'ChainIntegrityViolation';
    this.failure = failure;
  }
}

export class ConfigError extends ChainError {
  constructor(message: string, cause?: unknown) {
    super('INVALID_CONFIG', message, { cause });
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
