/**
 * Error codes and the result type returned by every engine query.
 *
 * Failures inside a single file never surface here; they are skipped
 * where they happen. Only a missing project, file or symbol, or an
 * invalid configuration, turn a whole query into a failure.
 */

export const ErrorCodes = {
  PROJECT_NOT_FOUND: "PROJECT_NOT_FOUND",
  FILE_NOT_FOUND: "FILE_NOT_FOUND",
  SYMBOL_NOT_FOUND: "SYMBOL_NOT_FOUND",
  INVALID_CONFIG: "INVALID_CONFIG",
  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class RepoGraphError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = "RepoGraphError";
    this.code = code;
  }
}

export type Failure = {
  ok: false;
  error: { code: ErrorCode; message: string };
};

export type Result<T> = { ok: true; value: T } | Failure;

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail(code: ErrorCode, message: string): Failure {
  return { ok: false, error: { code, message } };
}

export function toFailure(err: unknown): Failure {
  if (err instanceof RepoGraphError) {
    return fail(err.code, err.message);
  }
  const message = err instanceof Error ? err.message : String(err);
  return fail(ErrorCodes.INTERNAL_ERROR, message);
}
