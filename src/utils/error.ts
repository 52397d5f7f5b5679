export abstract class AppError extends Error {
  constructor(
    message: string,
    public readonly is_operational: boolean,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export enum HASH_TABLE_ERROR {
  INVALID_BUCKET_COUNT = "INVALID_BUCKET_COUNT",
  CAPACITY_EXHAUSTED = "CAPACITY_EXHAUSTED",
}

// CAPACITY_EXHAUSTED means the address space itself ran out; nothing the
// caller retries will fix it.
const FATAL_CATEGORIES: ReadonlySet<HASH_TABLE_ERROR> = new Set([
  HASH_TABLE_ERROR.CAPACITY_EXHAUSTED,
]);

export class HashTableError extends AppError {
  constructor(
    public readonly category: HASH_TABLE_ERROR,
    message?: string,
    context?: Record<string, unknown>,
  ) {
    super(message ?? category, !FATAL_CATEGORIES.has(category), context);
  }
}

export function is_hash_table_error(error: unknown): error is HashTableError {
  return error instanceof HashTableError;
}
