import type { PayoutSchedule } from "@rosca/shared";
import { seededShuffle } from "../utils/crypto.js";
import { fail, ok, type Result } from "../utils/result.js";

/** True when `order` holds each of 0..memberCount-1 exactly once. */
export function isPermutation(order: readonly number[], memberCount: number): boolean {
  if (order.length !== memberCount) {
    return false;
  }
  const seen = new Set<number>();
  return order.every((index) => {
    if (!Number.isInteger(index) || index < 0 || index >= memberCount || seen.has(index)) {
      return false;
    }
    seen.add(index);
    return true;
  });
}

export function validateSchedule(
  schedule: PayoutSchedule,
  memberCount: number
): Result<void, "VALIDATION_ERROR"> {
  if (schedule.kind === "custom" && !isPermutation(schedule.order, memberCount)) {
    return fail("VALIDATION_ERROR", "Custom payout order must list every bit index exactly once.");
  }
  return ok(undefined);
}

/**
 * Fixes the payout queue when a circle activates. `drawSeed` is only called
 * for the random variant; nothing a member controls goes into the shuffle.
 */
export function buildPayoutQueue(
  schedule: PayoutSchedule,
  members: readonly string[],
  drawSeed: () => string
): Result<number[], "VALIDATION_ERROR"> {
  const joinOrder = members.map((_member, index) => index);
  let queue: number[];
  switch (schedule.kind) {
    case "join_order":
      queue = joinOrder;
      break;
    case "random":
      queue = seededShuffle(joinOrder, drawSeed());
      break;
    case "custom":
      queue = [...schedule.order];
      break;
  }
  if (!isPermutation(queue, members.length)) {
    return fail("VALIDATION_ERROR", "Payout queue is not a permutation of the membership.");
  }
  return ok(queue);
}
