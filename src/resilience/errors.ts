import type { IdentityErrorKind } from '../identity/types';

// ============================================================================
// ERRORS
// ============================================================================

/** A raw identity could not be canonicalized. No session is created. */
export class ValidationError extends Error {
  readonly kind: IdentityErrorKind;
  readonly input: string;

  constructor(kind: IdentityErrorKind, input: string, detail: string) {
    super(`Invalid identity (${kind}): ${detail}`);
    this.name = 'ValidationError';
    this.kind = kind;
    this.input = input;
  }
}

/** The coordination store could not be reached or rejected the command. */
export class StoreUnavailableError extends Error {
  readonly operation: string;
  override readonly cause?: Error;

  constructor(operation: string, cause?: unknown) {
    super(`Coordination store unavailable during '${operation}': ${toErrorMessage(cause)}`);
    this.name = 'StoreUnavailableError';
    this.operation = operation;
    this.cause = cause instanceof Error ? cause : undefined;
  }
}

/** Routing configuration failed to load or validate. */
export class ConfigError extends Error {
  readonly source: string;
  readonly problems: string[];

  constructor(source: string, problems: string[]) {
    super(`Invalid configuration in ${source}: ${problems.join('; ')}`);
    this.name = 'ConfigError';
    this.source = source;
    this.problems = problems;
  }
}

export function isStoreUnavailable(error: unknown): error is StoreUnavailableError {
  return error instanceof StoreUnavailableError;
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error === undefined || error === null) {
    return 'unknown error';
  }
  try {
    const serialized = JSON.stringify(error);
    if (typeof serialized === 'string') {
      return serialized;
    }
  } catch {
    // fall through
  }
  return 'non-serializable error';
}
