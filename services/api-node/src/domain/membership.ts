import { MAX_MEMBERS } from "@rosca/shared";
import { keys, type KeyValueStore } from "../store/keyValueStore.js";
import { fail, ok, type Result } from "../utils/result.js";

export class MembershipRegistry {
  constructor(private readonly store: KeyValueStore) {}

  members(circleId: bigint): string[] {
    return this.store.get(keys.membership(circleId))?.members ?? [];
  }

  memberCount(circleId: bigint): number {
    return this.members(circleId).length;
  }

  isMember(circleId: bigint, address: string): boolean {
    return this.members(circleId).includes(address);
  }

  /** Bit index of `address`, or -1 when it is not a member. */
  indexOf(circleId: bigint, address: string): number {
    return this.members(circleId).indexOf(address);
  }

  /** Appends `address` and returns its bit index, stable for the circle's lifetime. */
  join(
    circleId: bigint,
    address: string,
    capacity: number
  ): Result<number, "ALREADY_MEMBER" | "CIRCLE_FULL"> {
    const members = this.members(circleId);
    if (members.includes(address)) {
      return fail("ALREADY_MEMBER", "Address is already a member of this circle.");
    }
    if (members.length >= Math.min(capacity, MAX_MEMBERS)) {
      return fail("CIRCLE_FULL", "Circle has reached its member count.");
    }
    const bitIndex = members.length;
    this.store.set(keys.membership(circleId), { members: [...members, address] });
    return ok(bitIndex);
  }
}
