import { v4 as uuid } from "uuid";

export type OracleErrorKind = "CONFIG" | "REQUEST" | "PARSE";

export class GradingError extends Error {
  readonly code: string;
  readonly details?: unknown;

  constructor(code: string, message: string, options: { details?: unknown; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "GradingError";
    this.code = code;
    this.details = options.details;
  }
}

/**
 * Raised by a grading oracle. `PARSE` means the model answered but the answer could not be
 * read as the expected structure; callers treat it differently from transport failures.
 */
export class OracleError extends GradingError {
  readonly kind: OracleErrorKind;
  readonly status: number | null;

  constructor(
    kind: OracleErrorKind,
    message: string,
    options: { details?: unknown; cause?: unknown; status?: number | null } = {}
  ) {
    super(`ORACLE_${kind}`, message, options);
    this.name = "OracleError";
    this.kind = kind;
    this.status = options.status ?? null;
  }
}

export function isOracleError(e: unknown): e is OracleError {
  return e instanceof OracleError;
}

export function makeRunId() {
  return uuid();
}

export function toErrorMessage(cause: unknown) {
  if (!cause) return "";
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

export function errorCode(cause: unknown) {
  if (cause instanceof GradingError) return cause.code;
  return "UNEXPECTED";
}

type LogErrorInput = {
  scope: string;
  runId?: string;
  code?: string;
  message: string;
  details?: unknown;
  cause?: unknown;
};

export function logError(input: LogErrorInput) {
  console.error(
    JSON.stringify({
      level: "error",
      scope: input.scope,
      runId: input.runId || null,
      code: input.code || errorCode(input.cause),
      message: input.message,
      details: input.details ?? (input.cause instanceof GradingError ? input.cause.details ?? null : null),
      cause: toErrorMessage(input.cause),
    })
  );
}
