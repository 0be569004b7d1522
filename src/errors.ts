/**
 * Error taxonomy.
 *
 * Degradable conditions (embedding unavailable, fingerprint failure, tier
 * timeout) are never thrown; they travel as values and `degradedReasons`.
 * Only the classes below cross API boundaries.
 */

export class RecallError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The record store rejected or failed a call. Fatal to the current operation. */
export class RecordStoreUnreachableError extends RecallError {
  readonly operation: string;

  constructor(operation: string, cause?: unknown) {
    const detail = cause instanceof Error ? cause.message : cause === undefined ? 'unknown failure' : String(cause);
    super('RECORD_STORE_UNREACHABLE', `Record store ${operation} failed: ${detail}`, { cause });
    this.operation = operation;
  }
}

/** A persisted fingerprint could not be decoded. */
export class CorruptSignatureError extends RecallError {
  constructor(message: string) {
    super('CORRUPT_SIGNATURE', message);
  }
}

export class ConfigError extends RecallError {
  readonly problems: string[];

  constructor(problems: string[], source?: string) {
    super('INVALID_CONFIG', `Invalid configuration${source ? ` (${source})` : ''}: ${problems.join('; ')}`);
    this.problems = problems;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
