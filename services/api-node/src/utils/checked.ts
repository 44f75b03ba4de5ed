import { fail, ok, type Result } from "./result.js";

export const I128_MAX = (1n << 127n) - 1n;
export const I128_MIN = -(1n << 127n);
export const U64_MAX = (1n << 64n) - 1n;

type ArithmeticResult = Result<bigint, "OVERFLOW" | "UNDERFLOW">;

function boundI128(value: bigint, operation: string): ArithmeticResult {
  if (value > I128_MAX) {
    return fail("OVERFLOW", `i128 overflow in ${operation}.`);
  }
  if (value < I128_MIN) {
    return fail("UNDERFLOW", `i128 underflow in ${operation}.`);
  }
  return ok(value);
}

export function isI128(value: bigint): boolean {
  return value >= I128_MIN && value <= I128_MAX;
}

export function checkedAdd(left: bigint, right: bigint): ArithmeticResult {
  return boundI128(left + right, "addition");
}

export function checkedSub(left: bigint, right: bigint): ArithmeticResult {
  return boundI128(left - right, "subtraction");
}

export function checkedMul(left: bigint, right: bigint): ArithmeticResult {
  return boundI128(left * right, "multiplication");
}

/** Truncating division, as integer division on the ledger's platform. */
export function checkedDiv(left: bigint, right: bigint): ArithmeticResult {
  if (right === 0n) {
    return fail("OVERFLOW", "Division by zero.");
  }
  return boundI128(left / right, "division");
}

export function checkedAddU64(left: bigint, right: bigint): Result<bigint, "OVERFLOW"> {
  const sum = left + right;
  if (left < 0n || right < 0n || sum > U64_MAX) {
    return fail("OVERFLOW", "u64 overflow in timestamp arithmetic.");
  }
  return ok(sum);
}

export function saturatingSubU64(left: bigint, right: bigint): bigint {
  return left > right ? left - right : 0n;
}
