import { BackendConnectionError, InvalidQueryError, NotFoundError } from "../core/errors.js";

export interface FieldError {
  path: string;
  message: string;
}

export interface Problem {
  type: string;
  title: string;
  status: number;
  detail?: string;
  instance?: string;
  code?: string;
  requestId?: string;
  errors?: FieldError[];
}

export const PROBLEM_CONTENT_TYPE = "application/problem+json";

export function problem(params: Omit<Problem, "type" | "title"> & { code: string }): Problem {
  const type = `https://errors.book-index.local/${params.code.toLowerCase().replace(/_/g, "-")}`;
  const title = codeToTitle(params.code);
  return {
    type,
    title,
    status: params.status,
    detail: params.detail,
    instance: params.instance,
    code: params.code,
    requestId: params.requestId,
    errors: params.errors,
  };
}

/**
 * Maps a thrown error to a problem document.
 *
 * A book missing from the datalake is a server-side failure here: the caller asked
 * to index an id that ingestion was expected to have delivered.
 */
export function problemForError(e: unknown, ctx: { instance: string; requestId: string }): Problem {
  if (e instanceof InvalidQueryError) {
    return problem({ status: 400, code: e.code, detail: e.message, ...ctx });
  }
  if (e instanceof NotFoundError) {
    return problem({ status: 500, code: e.code, detail: e.message, ...ctx });
  }
  if (e instanceof BackendConnectionError) {
    return problem({ status: 503, code: e.code, detail: "storage backend unavailable", ...ctx });
  }
  return problem({ status: 500, code: "INTERNAL", detail: "internal error", ...ctx });
}

function codeToTitle(code: string): string {
  switch (code) {
    case "INVALID_ARGUMENT":
      return "Invalid argument";
    case "INVALID_QUERY":
      return "Invalid query";
    case "NOT_FOUND":
      return "Not found";
    case "BACKEND_UNAVAILABLE":
      return "Backend unavailable";
    default:
      return "Internal error";
  }
}
