import type {
  CircleRecord,
  CycleRecord,
  LedgerRecord,
  MembershipRecord,
  ProtocolSettings,
} from "../domain/types.js";

/** Value type stored under each key kind. */
export interface StoreSchema {
  circleCount: bigint;
  protocol: ProtocolSettings;
  lastCreated: bigint;
  circle: CircleRecord;
  membership: MembershipRecord;
  cycle: CycleRecord;
  ledger: LedgerRecord;
  tokenBalance: bigint;
  tokenAllowance: bigint;
  transferReceipt: TransferReceipt;
}

/** A completed simulated transfer, kept under its idempotency key. */
export interface TransferReceipt {
  direction: "in" | "out";
  holder: string;
  amount: bigint;
  reference: string;
}

export type StoreKind = keyof StoreSchema;

export const STORE_KINDS: readonly StoreKind[] = [
  "circleCount",
  "protocol",
  "lastCreated",
  "circle",
  "membership",
  "cycle",
  "ledger",
  "tokenBalance",
  "tokenAllowance",
  "transferReceipt",
];

export interface StoreKey<K extends StoreKind> {
  kind: K;
  id: string;
}

export const keys = {
  circleCount: (): StoreKey<"circleCount"> => ({ kind: "circleCount", id: "" }),
  protocol: (): StoreKey<"protocol"> => ({ kind: "protocol", id: "" }),
  lastCreated: (address: string): StoreKey<"lastCreated"> => ({ kind: "lastCreated", id: address }),
  circle: (circleId: bigint): StoreKey<"circle"> => ({ kind: "circle", id: circleId.toString() }),
  membership: (circleId: bigint): StoreKey<"membership"> => ({
    kind: "membership",
    id: circleId.toString(),
  }),
  cycle: (circleId: bigint, index: number): StoreKey<"cycle"> => ({
    kind: "cycle",
    id: `${circleId}:${index}`,
  }),
  ledger: (circleId: bigint, token: string): StoreKey<"ledger"> => ({
    kind: "ledger",
    id: `${circleId}:${token}`,
  }),
  tokenBalance: (token: string, holder: string): StoreKey<"tokenBalance"> => ({
    kind: "tokenBalance",
    id: `${token}:${holder}`,
  }),
  tokenAllowance: (token: string, owner: string): StoreKey<"tokenAllowance"> => ({
    kind: "tokenAllowance",
    id: `${token}:${owner}`,
  }),
  transferReceipt: (token: string, idempotencyKey: string): StoreKey<"transferReceipt"> => ({
    kind: "transferReceipt",
    id: `${token}:${idempotencyKey}`,
  }),
};

export interface KeyValueStore {
  get<K extends StoreKind>(key: StoreKey<K>): StoreSchema[K] | undefined;
  set<K extends StoreKind>(key: StoreKey<K>, value: StoreSchema[K]): void;
  has<K extends StoreKind>(key: StoreKey<K>): boolean;
  /**
   * Runs `work` with every write staged. Staged writes are visible only
   * inside `work`, committed when it resolves and discarded when it throws.
   */
  transaction<T>(work: () => Promise<T>): Promise<T>;
}
