import type { BookId } from "./types.js";

export type ErrorCode = "NOT_FOUND" | "INVALID_QUERY" | "BACKEND_UNAVAILABLE";

export class BookIndexError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NotFoundError extends BookIndexError {
  constructor(readonly bookId: BookId) {
    super("NOT_FOUND", `book ${bookId} not found`);
  }
}

export class InvalidQueryError extends BookIndexError {
  constructor(message = "query must be non-empty") {
    super("INVALID_QUERY", message);
  }
}

/** Backend unreachable, or a backend call failed at runtime. */
export class BackendConnectionError extends BookIndexError {
  constructor(message: string, cause?: unknown) {
    super("BACKEND_UNAVAILABLE", message, { cause });
  }
}

export function errorCode(e: unknown): string {
  return e instanceof BookIndexError ? e.code : "INTERNAL";
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
