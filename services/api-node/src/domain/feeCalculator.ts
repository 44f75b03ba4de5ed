import { BPS_DENOMINATOR } from "@rosca/shared";
import { checkedDiv, checkedMul, checkedSub, isI128 } from "../utils/checked.js";
import { fail, ok, type Result } from "../utils/result.js";

export interface FeeSplit {
  fee: bigint;
  net: bigint;
}

export type FeeResult = Result<FeeSplit, "INVALID_FEE_RATE" | "OVERFLOW" | "UNDERFLOW">;

export function isValidBps(bps: number): boolean {
  return Number.isInteger(bps) && bps >= 0 && bps <= BPS_DENOMINATOR;
}

/**
 * Splits `gross` into `fee = gross * bps / 10000` (truncating) and `net = gross - fee`.
 * Every step is checked against the signed 128-bit range.
 */
export function computeFee(gross: bigint, feeBps: number): FeeResult {
  if (!isValidBps(feeBps)) {
    return fail("INVALID_FEE_RATE", `Fee rate ${feeBps} bps is outside 0..${BPS_DENOMINATOR}.`);
  }
  if (!isI128(gross)) {
    return fail("OVERFLOW", "Gross amount exceeds the i128 range.");
  }

  const scaled = checkedMul(gross, BigInt(feeBps));
  if (!scaled.ok) {
    return scaled;
  }
  const fee = checkedDiv(scaled.value, BigInt(BPS_DENOMINATOR));
  if (!fee.ok) {
    return fee;
  }
  const net = checkedSub(gross, fee.value);
  if (!net.ok) {
    return net;
  }
  if (net.value < 0n) {
    return fail("UNDERFLOW", "Net amount would be negative.");
  }
  return ok({ fee: fee.value, net: net.value });
}
