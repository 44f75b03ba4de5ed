import { CREATION_COOLDOWN_SECONDS } from "@rosca/shared";
import { keys, type KeyValueStore } from "../store/keyValueStore.js";
import { saturatingSubU64 } from "../utils/checked.js";
import { fail, ok, type Result } from "../utils/result.js";

export interface CooldownStatus {
  allowed: boolean;
  retryAfter: bigint;
  lastCreatedAt?: bigint;
}

/** Per-creator cooldown between successful circle creations. */
export class RateLimiter {
  constructor(
    private readonly store: KeyValueStore,
    private readonly cooldownSeconds: bigint = CREATION_COOLDOWN_SECONDS
  ) {}

  status(creator: string, now: bigint): CooldownStatus {
    const lastCreatedAt = this.store.get(keys.lastCreated(creator));
    if (lastCreatedAt === undefined) {
      return { allowed: true, retryAfter: 0n };
    }
    // Saturates at zero if the clock regresses.
    const elapsed = saturatingSubU64(now, lastCreatedAt);
    if (elapsed < this.cooldownSeconds) {
      return { allowed: false, retryAfter: this.cooldownSeconds - elapsed, lastCreatedAt };
    }
    return { allowed: true, retryAfter: 0n, lastCreatedAt };
  }

  checkAndRecord(creator: string, now: bigint): Result<void, "RATE_LIMITED"> {
    const status = this.status(creator, now);
    if (!status.allowed) {
      return fail("RATE_LIMITED", `Circle creation is rate limited. Retry in ${status.retryAfter}s.`, {
        retryAfter: status.retryAfter.toString(),
      });
    }
    this.store.set(keys.lastCreated(creator), now);
    return ok(undefined);
  }
}
