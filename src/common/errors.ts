export type RecordsErrorCode =
  | 'UNIQUE_CONSTRAINT_VIOLATION'
  | 'MALFORMED_DOCUMENT'
  | 'IO_FAILURE'
  | 'INVALID_RECORD';

/**
 * Base class for every failure the records engine reports to its callers.
 * Messages are diagnostic; wording shown to an operator belongs to the
 * presentation layer, which should branch on `code`.
 */
export abstract class RecordsError extends Error {
  abstract readonly code: RecordsErrorCode;

  protected constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A natural key (student number, staff id, receipt number) is already taken.
 */
export class UniqueConstraintViolation extends RecordsError {
  readonly code = 'UNIQUE_CONSTRAINT_VIOLATION';

  constructor(
    readonly collection: string,
    readonly key: string,
    readonly value: string,
  ) {
    super(`${collection}.${key} "${value}" already exists`);
  }
}

export class MalformedDocument extends RecordsError {
  readonly code = 'MALFORMED_DOCUMENT';

  constructor(readonly reason: string, options?: ErrorOptions) {
    super(`Malformed snapshot document: ${reason}`, options);
  }
}

/**
 * The store or a backup file could not be read or written.
 */
export class IOFailure extends RecordsError {
  readonly code = 'IO_FAILURE';

  constructor(readonly operation: string, cause: unknown) {
    super(`${operation} failed: ${describeError(cause)}`, { cause });
  }
}

/**
 * The caller handed the engine a value it cannot store (blank session,
 * fee without months, payment for an unknown staff member).
 */
export class InvalidRecord extends RecordsError {
  readonly code = 'INVALID_RECORD';

  constructor(message: string) {
    super(message);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
