import type { BookmarkErrorCode, BookmarkFailure } from "@viewmark/engine";

export type CliErrorCode = BookmarkErrorCode | "USAGE" | "IO" | "BUNDLE_INVALID";

export class CliError extends Error {
  readonly code: CliErrorCode;

  constructor(code: CliErrorCode, message: string) {
    super(message);
    this.name = "CliError";
    this.code = code;
  }
}

export function isCliError(error: unknown): error is CliError {
  return error instanceof CliError;
}

export function asCliError(error: unknown, fallbackCode: CliErrorCode, fallbackMessage: string): CliError {
  if (isCliError(error)) {
    return error;
  }
  if (error instanceof Error) {
    return new CliError(fallbackCode, error.message);
  }
  return new CliError(fallbackCode, fallbackMessage);
}

export function fromBookmarkFailure(failure: BookmarkFailure): CliError {
  return new CliError(failure.code, failure.message);
}

/** 2 for index and no-op failures, 1 for everything else. */
export function exitCodeFor(error: CliError): number {
  return error.code === "INDEX_OUT_OF_RANGE" || error.code === "NO_OP" ? 2 : 1;
}
