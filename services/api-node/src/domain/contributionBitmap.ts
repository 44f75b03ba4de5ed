import { MAX_MEMBERS } from "@rosca/shared";
import { fail, ok, type Result } from "../utils/result.js";

const WORD = 64;

export function reset(): bigint {
  return 0n;
}

/** Branch-free SWAR population count of a 64-bit word. */
export function popcount(bitmap: bigint): number {
  const word = BigInt.asUintN(WORD, bitmap);
  let v = word - ((word >> 1n) & 0x5555555555555555n);
  v = (v & 0x3333333333333333n) + ((v >> 2n) & 0x3333333333333333n);
  v = (v + (v >> 4n)) & 0x0f0f0f0f0f0f0f0fn;
  return Number(BigInt.asUintN(WORD, v * 0x0101010101010101n) >> 56n);
}

export function hasContributed(bitmap: bigint, bitIndex: number): boolean {
  return ((bitmap >> BigInt(bitIndex)) & 1n) === 1n;
}

export function markContributed(
  bitmap: bigint,
  bitIndex: number
): Result<bigint, "ALREADY_CONTRIBUTED" | "VALIDATION_ERROR"> {
  if (!Number.isInteger(bitIndex) || bitIndex < 0 || bitIndex >= MAX_MEMBERS) {
    return fail("VALIDATION_ERROR", `Bit index ${bitIndex} is outside 0..${MAX_MEMBERS - 1}.`);
  }
  if (hasContributed(bitmap, bitIndex)) {
    return fail("ALREADY_CONTRIBUTED", "Member already contributed this cycle.");
  }
  return ok(BigInt.asUintN(WORD, bitmap | (1n << BigInt(bitIndex))));
}

export function isComplete(bitmap: bigint, memberCount: number): boolean {
  return popcount(bitmap) === memberCount;
}

export function contributors(bitmap: bigint): number[] {
  const indices: number[] = [];
  for (let index = 0; index < MAX_MEMBERS; index += 1) {
    if (hasContributed(bitmap, index)) {
      indices.push(index);
    }
  }
  return indices;
}
