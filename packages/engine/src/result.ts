export type BookmarkErrorCode =
  | "INDEX_OUT_OF_RANGE"
  | "NO_OP"
  | "NO_ACTIVE_VIEWPORT"
  | "INVALID_RECORD"
  | "MALFORMED_SNAPSHOT";

export interface BookmarkSuccess<T> {
  ok: true;
  value: T;
}

export interface BookmarkFailure {
  ok: false;
  code: BookmarkErrorCode;
  message: string;
}

/**
 * Outcome of a store, viewport or snapshot operation. Failures are local and
 * returned to the caller; nothing in the engine throws for them.
 */
export type BookmarkResult<T> = BookmarkSuccess<T> | BookmarkFailure;

export function succeed<T>(value: T): BookmarkSuccess<T> {
  return { ok: true, value };
}

export function fail(code: BookmarkErrorCode, message: string): BookmarkFailure {
  return { ok: false, code, message };
}

export function indexOutOfRange(index: number, count: number): BookmarkFailure {
  return fail("INDEX_OUT_OF_RANGE", `Index ${index} is outside [0, ${count}).`);
}
