import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import { keys, type KeyValueStore, type TransferReceipt } from "../store/keyValueStore.js";
import { checkedAdd } from "../utils/checked.js";
import { ERROR_STATUS, HttpError } from "../utils/errors.js";

export type TokenMode = "simulation" | "live";

export interface TransferResult {
  ok: boolean;
  mode: TokenMode;
  reference: string;
  reason?: string;
}

/**
 * Token collaborator. The engine is the spender of every allowance and the
 * custodian of every vault.
 *
 * Transfers carry an idempotency key naming one logical transfer. A second
 * transfer under a key that already completed moves nothing and returns the
 * first reference, so a call retried after a partial failure never pays twice.
 */
export interface TokenAsset {
  allowance(token: string, owner: string): Promise<bigint>;
  transferIn(token: string, from: string, amount: bigint, idempotencyKey: string): Promise<TransferResult>;
  transferOut(token: string, to: string, amount: bigint, idempotencyKey: string): Promise<TransferResult>;
}

export const DEFAULT_CUSTODY_ADDRESS = "rosca-vault";

/**
 * In-process token ledger kept in the engine's own store, so balances roll
 * back together with the call that moved them.
 */
export class SimulatedTokenAsset implements TokenAsset {
  private sequence = 0;

  constructor(
    private readonly store: KeyValueStore,
    readonly custody: string = DEFAULT_CUSTODY_ADDRESS
  ) {}

  balanceOf(token: string, holder: string): bigint {
    return this.store.get(keys.tokenBalance(token, holder)) ?? 0n;
  }

  async allowance(token: string, owner: string): Promise<bigint> {
    return this.store.get(keys.tokenAllowance(token, owner)) ?? 0n;
  }

  /** Test and dev fixture; the engine itself never issues tokens. */
  mint(token: string, to: string, amount: bigint): void {
    this.credit(token, to, amount);
  }

  approve(token: string, owner: string, amount: bigint): void {
    this.store.set(keys.tokenAllowance(token, owner), amount);
  }

  async transferIn(
    token: string,
    from: string,
    amount: bigint,
    idempotencyKey: string
  ): Promise<TransferResult> {
    const replay = this.replay(token, idempotencyKey, { direction: "in", holder: from, amount });
    if (replay) {
      return replay;
    }
    const allowance = await this.allowance(token, from);
    if (allowance < amount) {
      return this.rejected("allowance below transfer amount");
    }
    const balance = this.balanceOf(token, from);
    if (balance < amount) {
      return this.rejected("balance below transfer amount");
    }
    this.store.set(keys.tokenAllowance(token, from), allowance - amount);
    this.store.set(keys.tokenBalance(token, from), balance - amount);
    this.credit(token, this.custody, amount);
    return this.completed(token, idempotencyKey, { direction: "in", holder: from, amount });
  }

  async transferOut(
    token: string,
    to: string,
    amount: bigint,
    idempotencyKey: string
  ): Promise<TransferResult> {
    const replay = this.replay(token, idempotencyKey, { direction: "out", holder: to, amount });
    if (replay) {
      return replay;
    }
    const custodyBalance = this.balanceOf(token, this.custody);
    if (custodyBalance < amount) {
      return this.rejected("custody balance below transfer amount");
    }
    this.store.set(keys.tokenBalance(token, this.custody), custodyBalance - amount);
    this.credit(token, to, amount);
    return this.completed(token, idempotencyKey, { direction: "out", holder: to, amount });
  }

  private credit(token: string, holder: string, amount: bigint): void {
    const next = checkedAdd(this.balanceOf(token, holder), amount);
    if (!next.ok) {
      throw new Error(`Simulated balance overflow for ${holder}.`);
    }
    this.store.set(keys.tokenBalance(token, holder), next.value);
  }

  private replay(
    token: string,
    idempotencyKey: string,
    transfer: Omit<TransferReceipt, "reference">
  ): TransferResult | undefined {
    const receipt = this.store.get(keys.transferReceipt(token, idempotencyKey));
    if (!receipt) {
      return undefined;
    }
    if (
      receipt.direction !== transfer.direction ||
      receipt.holder !== transfer.holder ||
      receipt.amount !== transfer.amount
    ) {
      return this.rejected("idempotency key reused for a different transfer");
    }
    return { ok: true, mode: "simulation", reference: receipt.reference };
  }

  private completed(
    token: string,
    idempotencyKey: string,
    transfer: Omit<TransferReceipt, "reference">
  ): TransferResult {
    this.sequence += 1;
    const reference = `sim_transfer_${transfer.direction}_${this.sequence}`;
    this.store.set(keys.transferReceipt(token, idempotencyKey), { ...transfer, reference });
    return { ok: true, mode: "simulation", reference };
  }

  private rejected(reason: string): TransferResult {
    return { ok: false, mode: "simulation", reference: "", reason };
  }
}

const allowanceResponse = z.object({
  amount: z.string().regex(/^\d+$/),
});

const transferResponse = z.object({
  status: z.enum(["completed", "rejected"]),
  reference: z.string(),
  reason: z.string().optional(),
});

export const IDEMPOTENCY_HEADER = "Idempotency-Key";

export interface HttpTokenAssetOptions {
  baseUrl: string;
  apiKey?: string;
  client?: AxiosInstance;
}

/** Client for a remote token ledger service that honours `Idempotency-Key`. */
export class HttpTokenAsset implements TokenAsset {
  private readonly client: AxiosInstance;

  constructor(options: HttpTokenAssetOptions) {
    this.client =
      options.client ??
      axios.create({
        baseURL: options.baseUrl,
        headers: {
          "Content-Type": "application/json",
          ...(options.apiKey ? { Authorization: `Bearer ${options.apiKey}` } : {}),
        },
      });
  }

  async allowance(token: string, owner: string): Promise<bigint> {
    const response = await this.client.get<unknown>(
      `/tokens/${encodeURIComponent(token)}/allowances/${encodeURIComponent(owner)}`
    );
    const parsed = allowanceResponse.safeParse(response.data);
    if (!parsed.success) {
      throw new HttpError(
        ERROR_STATUS.TRANSFER_FAILED,
        "TRANSFER_FAILED",
        "Token service returned a malformed allowance.",
        parsed.error.issues
      );
    }
    return BigInt(parsed.data.amount);
  }

  async transferIn(
    token: string,
    from: string,
    amount: bigint,
    idempotencyKey: string
  ): Promise<TransferResult> {
    const response = await this.client.post<unknown>(
      `/tokens/${encodeURIComponent(token)}/transfers/in`,
      { from, amount: amount.toString() },
      { headers: { [IDEMPOTENCY_HEADER]: idempotencyKey } }
    );
    return toTransferResult(response.data);
  }

  async transferOut(
    token: string,
    to: string,
    amount: bigint,
    idempotencyKey: string
  ): Promise<TransferResult> {
    const response = await this.client.post<unknown>(
      `/tokens/${encodeURIComponent(token)}/transfers/out`,
      { to, amount: amount.toString() },
      { headers: { [IDEMPOTENCY_HEADER]: idempotencyKey } }
    );
    return toTransferResult(response.data);
  }
}

function toTransferResult(payload: unknown): TransferResult {
  const parsed = transferResponse.safeParse(payload);
  if (!parsed.success) {
    return { ok: false, mode: "live", reference: "", reason: "malformed token service response" };
  }
  return {
    ok: parsed.data.status === "completed",
    mode: "live",
    reference: parsed.data.reference,
    reason: parsed.data.reason,
  };
}
