import { CircleEngine } from "../src/domain/engine.js";
import type { CircleConfig, ProtocolSettings } from "../src/domain/types.js";
import { SimulatedTokenAsset } from "../src/providers/tokenAsset.js";
import { InMemoryStore } from "../src/store/memoryStore.js";
import type { RandomSource } from "../src/utils/crypto.js";
import { HttpError } from "../src/utils/errors.js";
import { ManualClock } from "../src/utils/time.js";

export const TOKEN = "USDC";

export const PROTOCOL: ProtocolSettings = {
  admin: "protocol-admin",
  treasury: "protocol-treasury",
  insurance: "protocol-insurance",
  protocolFeeBps: 50,
};

export const FIXED_SEED = "test-seed";

export function testEngine(
  protocol: Partial<ProtocolSettings> = {},
  random: RandomSource = { seed: () => FIXED_SEED }
) {
  const store = new InMemoryStore();
  const clock = new ManualClock(1_000n);
  const token = new SimulatedTokenAsset(store);
  const engine = new CircleEngine({ store, clock, token, random, protocol: { ...PROTOCOL, ...protocol } });
  return { store, clock, token, engine };
}

export function circleConfig(overrides: Partial<CircleConfig> = {}): CircleConfig {
  return {
    token: TOKEN,
    contributionAmount: 100n,
    memberCount: 3,
    cycleDurationSeconds: 604_800n,
    insuranceFeeBps: 0,
    lateFeeBps: 0,
    gracePeriodSeconds: 0n,
    payoutSchedule: { kind: "join_order" },
    ...overrides,
  };
}

export function fund(token: SimulatedTokenAsset, holder: string, amount: bigint): void {
  token.mint(TOKEN, holder, amount);
  token.approve(TOKEN, holder, amount);
}

/** Awaits a call that must fail and returns its HttpError. */
export async function failureOf(call: Promise<unknown>): Promise<HttpError> {
  try {
    await call;
  } catch (error) {
    if (error instanceof HttpError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected the call to fail.");
}
