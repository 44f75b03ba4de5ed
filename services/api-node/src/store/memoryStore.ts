import { AsyncLocalStorage } from "node:async_hooks";
import {
  STORE_KINDS,
  type KeyValueStore,
  type StoreKey,
  type StoreKind,
  type StoreSchema,
} from "./keyValueStore.js";

type Tables = { [K in StoreKind]: Map<string, StoreSchema[K]> };

function emptyTables(): Tables {
  return {
    circleCount: new Map(),
    protocol: new Map(),
    lastCreated: new Map(),
    circle: new Map(),
    membership: new Map(),
    cycle: new Map(),
    ledger: new Map(),
    tokenBalance: new Map(),
    tokenAllowance: new Map(),
    transferReceipt: new Map(),
  };
}

/**
 * Staged writes belong to the async context of the transaction that made
 * them. Reads from anywhere else see committed state only.
 */
export class InMemoryStore implements KeyValueStore {
  private committed: Tables = emptyTables();
  private readonly context = new AsyncLocalStorage<Tables>();

  get<K extends StoreKind>(key: StoreKey<K>): StoreSchema[K] | undefined {
    const staged: Map<string, StoreSchema[K]> | undefined = this.context.getStore()?.[key.kind];
    const table: Map<string, StoreSchema[K]> =
      staged && staged.has(key.id) ? staged : this.committed[key.kind];
    const value = table.get(key.id);
    return value === undefined ? undefined : structuredClone(value);
  }

  set<K extends StoreKind>(key: StoreKey<K>, value: StoreSchema[K]): void {
    const tables = this.context.getStore() ?? this.committed;
    const table: Map<string, StoreSchema[K]> = tables[key.kind];
    table.set(key.id, structuredClone(value));
  }

  has<K extends StoreKind>(key: StoreKey<K>): boolean {
    const staged = this.context.getStore();
    return Boolean(staged?.[key.kind].has(key.id)) || this.committed[key.kind].has(key.id);
  }

  async transaction<T>(work: () => Promise<T>): Promise<T> {
    if (this.context.getStore()) {
      throw new Error("Nested store transactions are not supported.");
    }
    const staged = emptyTables();
    const result = await this.context.run(staged, work);
    this.commit(staged);
    return result;
  }

  private commit(staged: Tables): void {
    STORE_KINDS.forEach((kind) => this.commitTable(kind, staged));
  }

  private commitTable<K extends StoreKind>(kind: K, staged: Tables): void {
    const target: Map<string, StoreSchema[K]> = this.committed[kind];
    const source: Map<string, StoreSchema[K]> = staged[kind];
    source.forEach((value, id) => target.set(id, value));
  }
}
