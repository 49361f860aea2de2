import { ZodError } from 'zod';

export type ErrorCode =
  | 'PERSISTENCE_FAILURE'
  | 'CATEGORY_FILE_INVALID'
  | 'UNRESOLVED_CATEGORY'
  | 'DATE_RANGE';

export class TrackerError extends Error {
  constructor(readonly code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A log or category file could not be written (or the log could not be opened for writing). */
export class PersistenceError extends TrackerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PERSISTENCE_FAILURE', message, options);
  }
}

/** The category document exists but is not a JSON object of strings. */
export class CategoryFileError extends TrackerError {
  constructor(readonly filePath: string, message: string, options?: { cause?: unknown }) {
    super('CATEGORY_FILE_INVALID', `${filePath}: ${message}`, options);
  }
}

export class UnresolvedCategoryError extends TrackerError {
  constructor(readonly app: string, readonly attempts: number, options?: { cause?: unknown }) {
    super('UNRESOLVED_CATEGORY', `No category given for "${app}" after ${attempts} attempt(s)`, options);
  }
}

export type LogBounds = {
  firstDay: string;
  lastDay: string;
};

export class DateRangeError extends TrackerError {
  /** `available` is what the log actually covers; `null` for an empty log, omitted when unknown. */
  constructor(message: string, readonly available?: LogBounds | null, options?: { cause?: unknown }) {
    super('DATE_RANGE', DateRangeError.describe(message, available), options);
  }

  private static describe(message: string, available: LogBounds | null | undefined) {
    if (available === undefined) return message;
    if (available === null) return `${message} (log is empty)`;
    return `${message} (log covers ${available.firstDay} to ${available.lastDay})`;
  }
}

export function formatCliError(error: unknown): string {
  if (error instanceof ZodError) {
    const first = error.issues[0];
    if (!first) return 'Invalid options';
    const path = first.path.length ? first.path.join('.') : 'options';
    return `${path}: ${first.message}`;
  }
  if (error instanceof Error) return error.message;
  return 'Unknown error';
}

export function exitCodeFor(error: unknown): number {
  if (error instanceof ZodError || error instanceof DateRangeError) return 2;
  return 1;
}
