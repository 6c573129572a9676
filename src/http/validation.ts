import type { FieldError } from "./problem.js";

const INT_RE = /^\d+$/;

/** Returns the trimmed parameter, or undefined when absent or blank. */
export function optionalParam(params: URLSearchParams, name: string): string | undefined {
  const v = params.get(name)?.trim();
  return v ? v : undefined;
}

export function asNonNegativeInt(v: string): number | undefined {
  if (!INT_RE.test(v)) return undefined;
  const n = Number(v);
  return Number.isSafeInteger(n) ? n : undefined;
}

export function pushErr(errors: FieldError[], path: string, message: string): void {
  errors.push({ path, message });
}
