import type { ErrorCode } from "@rosca/shared";

export interface Failure<C extends ErrorCode = ErrorCode> {
  code: C;
  message: string;
  details?: Record<string, string>;
}

export type Result<T, C extends ErrorCode = ErrorCode> =
  | { ok: true; value: T }
  | { ok: false; error: Failure<C> };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<C extends ErrorCode>(
  code: C,
  message: string,
  details?: Record<string, string>
): { ok: false; error: Failure<C> } {
  return { ok: false, error: { code, message, details } };
}
