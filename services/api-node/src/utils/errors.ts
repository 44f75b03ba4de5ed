import type { ErrorCode } from "@rosca/shared";
import type { Failure, Result } from "./result.js";

export const ERROR_STATUS: Record<ErrorCode, number> = {
  RATE_LIMITED: 429,
  VALIDATION_ERROR: 400,
  INVALID_FEE_RATE: 400,
  UNAUTHENTICATED: 401,
  UNAUTHORIZED: 403,
  NOT_MEMBER: 403,
  NOT_FOUND: 404,
  ALREADY_MEMBER: 409,
  CIRCLE_FULL: 409,
  NOT_ACTIVE: 409,
  CIRCLE_COMPLETED: 409,
  ALREADY_CONTRIBUTED: 409,
  CYCLE_INCOMPLETE: 409,
  DEADLINE_EXPIRED: 409,
  INSUFFICIENT_VAULT: 409,
  OVERFLOW: 422,
  UNDERFLOW: 422,
  INSUFFICIENT_ALLOWANCE: 422,
  TRANSFER_FAILED: 422,
};

export class HttpError extends Error {
  status: number;
  code: ErrorCode;
  details?: unknown;

  constructor(status: number, code: ErrorCode, message: string, details?: unknown) {
    super(message);
    this.status = status;
    this.code = code;
    this.details = details;
  }

  static from(failure: Failure): HttpError {
    return new HttpError(ERROR_STATUS[failure.code], failure.code, failure.message, failure.details);
  }
}

export function assert(condition: unknown, code: ErrorCode, message: string): asserts condition {
  if (!condition) {
    throw new HttpError(ERROR_STATUS[code], code, message);
  }
}

/** Returns the value of a successful result, or throws its failure as an HttpError. */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw HttpError.from(result.error);
  }
  return result.value;
}

export class InvariantViolation extends Error {
  constructor(message: string) {
    super(`Invariant violated: ${message}`);
    this.name = "InvariantViolation";
  }
}
