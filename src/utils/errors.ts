export type PrintJobErrorKind = 'EmptyPath' | 'InvalidCopies' | 'ScratchIoError' | 'SubmissionFailed';

/** Base class for print job failures; callers branch on `kind`, not on message text */
export abstract class PrintJobError extends Error {
  abstract readonly kind: PrintJobErrorKind;
}

/** A file reference was given with an empty path */
export class EmptyPathError extends PrintJobError {
  readonly kind = 'EmptyPath';

  constructor() {
    super('Content file path must not be empty');
    this.name = 'EmptyPathError';
  }
}

/** A copy count that cannot be written as decimal digits */
export class InvalidCopiesError extends PrintJobError {
  readonly kind = 'InvalidCopies';

  constructor(readonly copies: number) {
    super(`copies must be a non-negative integer, got ${copies}`);
    this.name = 'InvalidCopiesError';
  }
}

/** Creating or writing the scratch file for inline text failed */
export class ScratchIoError extends PrintJobError {
  readonly kind = 'ScratchIoError';

  constructor(readonly path: string, options?: { cause?: unknown }) {
    super(`Failed to write scratch file ${path}`, options);
    this.name = 'ScratchIoError';
  }
}

/** The print command could not be spawned or exited non-zero */
export class SubmissionFailedError extends PrintJobError {
  readonly kind = 'SubmissionFailed';

  constructor() {
    super('Print command failed');
    this.name = 'SubmissionFailedError';
  }
}

export type BuildError = EmptyPathError | InvalidCopiesError | ScratchIoError;

export type Result<T, E = Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/** Render an unknown thrown value as a message, the way route handlers report it */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
