import { keys, type KeyValueStore } from "../store/keyValueStore.js";
import { checkedAdd, checkedSub } from "../utils/checked.js";
import { InvariantViolation } from "../utils/errors.js";
import { fail, ok, type Result } from "../utils/result.js";
import { computeFee } from "./feeCalculator.js";
import type { LedgerRecord } from "./types.js";

export interface LedgerSnapshot extends LedgerRecord {
  vaultBalance: bigint;
}

export interface PayoutFees {
  protocolFeeBps: number;
  insuranceFeeBps: number;
}

export interface PayoutSplit {
  gross: bigint;
  protocolFee: bigint;
  insuranceFee: bigint;
  net: bigint;
}

type ArithmeticCode = "OVERFLOW" | "UNDERFLOW";

function emptyLedger(): LedgerRecord {
  return {
    totalDeposits: 0n,
    totalPayouts: 0n,
    accruedProtocolFees: 0n,
    accruedInsurance: 0n,
    accruedPenalties: 0n,
  };
}

/**
 * Cumulative deposits and payouts per (circle, token). The vault balance is
 * never stored: it is always `totalDeposits - totalPayouts`.
 */
export class BalanceLedger {
  constructor(private readonly store: KeyValueStore) {}

  snapshot(circleId: bigint, token: string): LedgerSnapshot {
    const record = this.store.get(keys.ledger(circleId, token)) ?? emptyLedger();
    return { ...record, vaultBalance: record.totalDeposits - record.totalPayouts };
  }

  vaultBalance(circleId: bigint, token: string): bigint {
    return this.snapshot(circleId, token).vaultBalance;
  }

  recordDeposit(
    circleId: bigint,
    token: string,
    amount: bigint
  ): Result<LedgerSnapshot, ArithmeticCode | "VALIDATION_ERROR"> {
    if (amount <= 0n) {
      return fail("VALIDATION_ERROR", "Deposit amount must be positive.");
    }
    const current = this.snapshot(circleId, token);
    const totalDeposits = checkedAdd(current.totalDeposits, amount);
    if (!totalDeposits.ok) {
      return totalDeposits;
    }
    return ok(this.write(circleId, token, { ...current, totalDeposits: totalDeposits.value }));
  }

  recordPayout(
    circleId: bigint,
    token: string,
    gross: bigint,
    fees: PayoutFees
  ): Result<PayoutSplit, ArithmeticCode | "INSUFFICIENT_VAULT" | "INVALID_FEE_RATE"> {
    const current = this.snapshot(circleId, token);
    if (current.vaultBalance < gross) {
      return fail("INSUFFICIENT_VAULT", "Vault balance is below the payout amount.", {
        vaultBalance: current.vaultBalance.toString(),
        gross: gross.toString(),
      });
    }

    const protocol = computeFee(gross, fees.protocolFeeBps);
    if (!protocol.ok) {
      return protocol;
    }
    const insurance = computeFee(gross, fees.insuranceFeeBps);
    if (!insurance.ok) {
      return insurance;
    }
    const net = checkedSub(protocol.value.net, insurance.value.fee);
    if (!net.ok) {
      return net;
    }
    if (net.value < 0n) {
      return fail("UNDERFLOW", "Combined fees exceed the payout amount.");
    }

    const totalPayouts = checkedAdd(current.totalPayouts, gross);
    if (!totalPayouts.ok) {
      return totalPayouts;
    }
    const accruedProtocolFees = checkedAdd(current.accruedProtocolFees, protocol.value.fee);
    if (!accruedProtocolFees.ok) {
      return accruedProtocolFees;
    }
    const accruedInsurance = checkedAdd(current.accruedInsurance, insurance.value.fee);
    if (!accruedInsurance.ok) {
      return accruedInsurance;
    }

    this.write(circleId, token, {
      ...current,
      totalPayouts: totalPayouts.value,
      accruedProtocolFees: accruedProtocolFees.value,
      accruedInsurance: accruedInsurance.value,
    });
    return ok({
      gross,
      protocolFee: protocol.value.fee,
      insuranceFee: insurance.value.fee,
      net: net.value,
    });
  }

  /** Late penalties are tracked beside the vault, never inside it. */
  recordPenalty(
    circleId: bigint,
    token: string,
    amount: bigint
  ): Result<LedgerSnapshot, ArithmeticCode | "VALIDATION_ERROR"> {
    if (amount < 0n) {
      return fail("VALIDATION_ERROR", "Penalty amount cannot be negative.");
    }
    const current = this.snapshot(circleId, token);
    const accruedPenalties = checkedAdd(current.accruedPenalties, amount);
    if (!accruedPenalties.ok) {
      return accruedPenalties;
    }
    return ok(this.write(circleId, token, { ...current, accruedPenalties: accruedPenalties.value }));
  }

  private write(circleId: bigint, token: string, next: LedgerRecord): LedgerSnapshot {
    const record: LedgerRecord = {
      totalDeposits: next.totalDeposits,
      totalPayouts: next.totalPayouts,
      accruedProtocolFees: next.accruedProtocolFees,
      accruedInsurance: next.accruedInsurance,
      accruedPenalties: next.accruedPenalties,
    };
    this.store.set(keys.ledger(circleId, token), record);
    const written = this.snapshot(circleId, token);
    assertLedgerInvariant(written);
    return written;
  }
}

export function assertLedgerInvariant(snapshot: LedgerSnapshot): void {
  if (snapshot.vaultBalance !== snapshot.totalDeposits - snapshot.totalPayouts) {
    throw new InvariantViolation("vault balance differs from deposits minus payouts");
  }
  if (snapshot.totalDeposits < 0n || snapshot.totalPayouts < 0n || snapshot.vaultBalance < 0n) {
    throw new InvariantViolation("ledger counters must be non-negative");
  }
}
