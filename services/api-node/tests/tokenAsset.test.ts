import axios, { type InternalAxiosRequestConfig } from "axios";
import { describe, expect, it } from "vitest";
import { CircleEngine } from "../src/domain/engine.js";
import { HttpTokenAsset, IDEMPOTENCY_HEADER, SimulatedTokenAsset } from "../src/providers/tokenAsset.js";
import { InMemoryStore } from "../src/store/memoryStore.js";
import { ManualClock } from "../src/utils/time.js";
import { PROTOCOL, TOKEN, circleConfig, failureOf } from "./helpers.js";

interface RecordedRequest {
  method?: string;
  url?: string;
  key?: string;
  body: unknown;
}

function idempotencyKeyOf(config: InternalAxiosRequestConfig): string | undefined {
  const value = config.headers.get(IDEMPOTENCY_HEADER);
  return typeof value === "string" ? value : undefined;
}

function stubbedClient(reply: (config: InternalAxiosRequestConfig) => unknown) {
  const requests: RecordedRequest[] = [];
  const client = axios.create({
    baseURL: "http://token-service.test",
    adapter: async (config) => {
      requests.push({
        method: config.method,
        url: config.url,
        key: idempotencyKeyOf(config),
        body: typeof config.data === "string" ? JSON.parse(config.data) : undefined,
      });
      return { data: reply(config), status: 200, statusText: "OK", headers: {}, config };
    },
  });
  return { client, requests };
}

/**
 * In-process token service: completed transfers are remembered by key and
 * replayed, and any key matching `rejectOnce` is refused the first time.
 */
function tokenService(rejectOnce: (key: string) => boolean) {
  const completed = new Map<string, string>();
  const refused = new Set<string>();
  const paidOut: string[] = [];
  const { client } = stubbedClient((config) => {
    if (config.method === "get") {
      return { amount: "1000000" };
    }
    const key = idempotencyKeyOf(config) ?? "";
    const prior = completed.get(key);
    if (prior) {
      return { status: "completed", reference: prior };
    }
    if (rejectOnce(key) && !refused.has(key)) {
      refused.add(key);
      return { status: "rejected", reference: "", reason: "account frozen" };
    }
    const reference = `tx_${completed.size + 1}`;
    completed.set(key, reference);
    const body: { to?: string; amount: string } =
      typeof config.data === "string" ? JSON.parse(config.data) : { amount: "0" };
    if (body.to) {
      paidOut.push(`${body.to}:${body.amount}`);
    }
    return { status: "completed", reference };
  });
  return { client, paidOut };
}

describe("HttpTokenAsset", () => {
  it("reads allowances as bigint", async () => {
    const { client, requests } = stubbedClient(() => ({ amount: "18446744073709551616" }));
    const asset = new HttpTokenAsset({ baseUrl: "http://token-service.test", client });

    await expect(asset.allowance(TOKEN, "alice")).resolves.toBe(18_446_744_073_709_551_616n);
    expect(requests).toEqual([
      { method: "get", url: "/tokens/USDC/allowances/alice", key: undefined, body: undefined },
    ]);
  });

  it("posts transfers with decimal string amounts and an idempotency key", async () => {
    const { client, requests } = stubbedClient(() => ({ status: "completed", reference: "tx_1" }));
    const asset = new HttpTokenAsset({ baseUrl: "http://token-service.test", client });

    const result = await asset.transferIn(TOKEN, "alice", 250n, "1:0:deposit:0");
    expect(result).toEqual({ ok: true, mode: "live", reference: "tx_1", reason: undefined });
    await asset.transferOut(TOKEN, "bob", 100n, "1:0:payout");
    expect(requests).toEqual([
      {
        method: "post",
        url: "/tokens/USDC/transfers/in",
        key: "1:0:deposit:0",
        body: { from: "alice", amount: "250" },
      },
      { method: "post", url: "/tokens/USDC/transfers/out", key: "1:0:payout", body: { to: "bob", amount: "100" } },
    ]);
  });

  it("maps rejected transfers to a failed result", async () => {
    const { client } = stubbedClient(() => ({ status: "rejected", reference: "tx_2", reason: "frozen" }));
    const asset = new HttpTokenAsset({ baseUrl: "http://token-service.test", client });

    await expect(asset.transferOut(TOKEN, "bob", 1n, "1:0:payout")).resolves.toEqual({
      ok: false,
      mode: "live",
      reference: "tx_2",
      reason: "frozen",
    });
  });

  it("refuses a malformed allowance with TRANSFER_FAILED", async () => {
    const { client } = stubbedClient(() => ({ amount: "12.5" }));
    const asset = new HttpTokenAsset({ baseUrl: "http://token-service.test", client });

    const failure = await failureOf(asset.allowance(TOKEN, "alice"));
    expect(failure.code).toBe("TRANSFER_FAILED");
    expect(failure.status).toBe(422);
  });

  it("treats a malformed transfer response as a failed transfer", async () => {
    const { client } = stubbedClient(() => ({ status: "pending" }));
    const asset = new HttpTokenAsset({ baseUrl: "http://token-service.test", client });

    await expect(asset.transferIn(TOKEN, "alice", 1n, "1:0:deposit:0")).resolves.toEqual({
      ok: false,
      mode: "live",
      reference: "",
      reason: "malformed token service response",
    });
  });

  it("pays the recipient once when a fee transfer fails and the payout is retried", async () => {
    const { client, paidOut } = tokenService((key) => key.endsWith(":protocol-fee"));
    const engine = new CircleEngine({
      store: new InMemoryStore(),
      clock: new ManualClock(1_000n),
      token: new HttpTokenAsset({ baseUrl: "http://token-service.test", client }),
      protocol: PROTOCOL,
    });
    const circle = await engine.createCircle("creator", circleConfig());
    for (const member of ["alice", "bob", "carol"]) {
      await engine.joinCircle(member, circle.id);
    }
    for (const member of ["alice", "bob", "carol"]) {
      await engine.deposit(member, circle.id, 100n);
    }

    const failure = await failureOf(engine.triggerPayout("bob", circle.id));
    expect(failure.code).toBe("TRANSFER_FAILED");
    expect(engine.getCircle(circle.id).cycleIndex).toBe(0);

    const outcome = await engine.triggerPayout("bob", circle.id);
    expect(outcome).toMatchObject({ recipient: "alice", net: 299n, protocolFee: 1n });
    expect(paidOut).toEqual(["alice:299", "protocol-treasury:1"]);
    expect(engine.getCircle(circle.id).cycleIndex).toBe(1);
  });
});

describe("SimulatedTokenAsset", () => {
  function simulated() {
    const store = new InMemoryStore();
    return { store, token: new SimulatedTokenAsset(store) };
  }

  it("moves funds into custody within the allowance", async () => {
    const { token } = simulated();
    token.mint(TOKEN, "alice", 500n);
    token.approve(TOKEN, "alice", 300n);

    const result = await token.transferIn(TOKEN, "alice", 200n, "1:0:deposit:0");
    expect(result).toEqual({ ok: true, mode: "simulation", reference: "sim_transfer_in_1" });
    expect(token.balanceOf(TOKEN, "alice")).toBe(300n);
    expect(token.balanceOf(TOKEN, token.custody)).toBe(200n);
    await expect(token.allowance(TOKEN, "alice")).resolves.toBe(100n);
  });

  it("rejects transfers beyond the allowance or balance", async () => {
    const { token } = simulated();
    token.mint(TOKEN, "alice", 50n);
    token.approve(TOKEN, "alice", 100n);

    await expect(token.transferIn(TOKEN, "bob", 1n, "k1")).resolves.toMatchObject({
      ok: false,
      reason: "allowance below transfer amount",
    });
    await expect(token.transferIn(TOKEN, "alice", 80n, "k2")).resolves.toMatchObject({
      ok: false,
      reason: "balance below transfer amount",
    });
    await expect(token.transferOut(TOKEN, "bob", 1n, "k3")).resolves.toMatchObject({
      ok: false,
      reason: "custody balance below transfer amount",
    });
    expect(token.balanceOf(TOKEN, "alice")).toBe(50n);
  });

  it("pays out of custody", async () => {
    const { token } = simulated();
    token.mint(TOKEN, token.custody, 10n);

    const result = await token.transferOut(TOKEN, "bob", 4n, "1:0:payout");
    expect(result.reference).toBe("sim_transfer_out_1");
    expect(token.balanceOf(TOKEN, "bob")).toBe(4n);
    expect(token.balanceOf(TOKEN, token.custody)).toBe(6n);
  });

  it("replays a completed transfer under the same key without moving funds", async () => {
    const { token } = simulated();
    token.mint(TOKEN, token.custody, 10n);

    await token.transferOut(TOKEN, "bob", 4n, "1:0:payout");
    const again = await token.transferOut(TOKEN, "bob", 4n, "1:0:payout");
    expect(again).toEqual({ ok: true, mode: "simulation", reference: "sim_transfer_out_1" });
    expect(token.balanceOf(TOKEN, "bob")).toBe(4n);

    await expect(token.transferOut(TOKEN, "bob", 5n, "1:0:payout")).resolves.toMatchObject({
      ok: false,
      reason: "idempotency key reused for a different transfer",
    });
    expect(token.balanceOf(TOKEN, token.custody)).toBe(6n);
  });

  it("rolls balances back with a failed store transaction", async () => {
    const { store, token } = simulated();
    token.mint(TOKEN, "alice", 100n);
    token.approve(TOKEN, "alice", 100n);

    await expect(
      store.transaction(async () => {
        await token.transferIn(TOKEN, "alice", 60n, "1:0:deposit:0");
        throw new Error("abort");
      })
    ).rejects.toThrow("abort");
    expect(token.balanceOf(TOKEN, "alice")).toBe(100n);
    expect(token.balanceOf(TOKEN, token.custody)).toBe(0n);
  });
});
