import { env } from "../config/env.js";
import { HttpTokenAsset, SimulatedTokenAsset, type TokenAsset } from "../providers/tokenAsset.js";
import { InMemoryStore } from "../store/memoryStore.js";
import { SystemClock, type Clock } from "../utils/time.js";
import { CircleEngine } from "./engine.js";
import type { ProtocolSettings } from "./types.js";

export interface EngineOverrides {
  clock?: Clock;
  protocol?: Partial<ProtocolSettings>;
}

export interface EngineBundle {
  engine: CircleEngine;
  store: InMemoryStore;
  clock: Clock;
  token: TokenAsset;
  /** Present unless TOKEN_LIVE_MODE is on. */
  simulatedToken?: SimulatedTokenAsset;
}

export function buildEngine(overrides: EngineOverrides = {}): EngineBundle {
  const store = new InMemoryStore();
  const clock = overrides.clock ?? new SystemClock();
  const simulatedToken = env.TOKEN_LIVE_MODE ? undefined : new SimulatedTokenAsset(store);
  const token: TokenAsset =
    simulatedToken ??
    new HttpTokenAsset({ baseUrl: env.TOKEN_SERVICE_URL, apiKey: env.TOKEN_SERVICE_API_KEY });
  const engine = new CircleEngine({
    store,
    clock,
    token,
    protocol: {
      admin: env.ADMIN_ADDRESS,
      treasury: env.TREASURY_ADDRESS,
      insurance: env.INSURANCE_ADDRESS,
      protocolFeeBps: env.PROTOCOL_FEE_BPS,
      ...overrides.protocol,
    },
  });
  return { engine, store, clock, token, simulatedToken };
}

let current = buildEngine();

export function engine(): CircleEngine {
  return current.engine;
}

export function resetEngineForTests(overrides: EngineOverrides = {}): EngineBundle {
  current = buildEngine(overrides);
  return current;
}
