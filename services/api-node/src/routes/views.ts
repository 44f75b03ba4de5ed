import type {
  CircleView,
  CycleView,
  DepositView,
  LedgerView,
  MemberView,
  PayoutView,
  ProtocolView,
  RateLimitView,
} from "@rosca/shared";
import type { LedgerSnapshot } from "../domain/balanceLedger.js";
import * as bitmap from "../domain/contributionBitmap.js";
import type { CycleState, DepositOutcome, PayoutOutcome } from "../domain/engine.js";
import type { CooldownStatus } from "../domain/rateLimiter.js";
import type { CircleRecord, ProtocolSettings } from "../domain/types.js";

export function circleView(circle: CircleRecord, joinedCount: number): CircleView {
  return {
    id: circle.id.toString(),
    creator: circle.creator,
    token: circle.token,
    contributionAmount: circle.contributionAmount.toString(),
    memberCount: circle.memberCount,
    joinedCount,
    cycleDurationSeconds: circle.cycleDurationSeconds.toString(),
    protocolFeeBps: circle.protocolFeeBps,
    insuranceFeeBps: circle.insuranceFeeBps,
    lateFeeBps: circle.lateFeeBps,
    gracePeriodSeconds: circle.gracePeriodSeconds.toString(),
    payoutSchedule: circle.payoutSchedule.kind,
    status: circle.status,
    cycleIndex: circle.cycleIndex,
    createdAt: circle.createdAt.toString(),
    activatedAt: circle.activatedAt?.toString(),
  };
}

export function memberViews(members: string[]): MemberView[] {
  return members.map((address, bitIndex) => ({ address, bitIndex }));
}

export function cycleView(circleId: bigint, memberCount: number, cycle: CycleState): CycleView {
  const contributors = bitmap.contributors(cycle.bitmap);
  return {
    circleId: circleId.toString(),
    index: cycle.index,
    bitmap: cycle.bitmap.toString(),
    contributors,
    contributedCount: bitmap.popcount(cycle.bitmap),
    complete: bitmap.isComplete(cycle.bitmap, memberCount),
    recipient: cycle.recipient,
    startedAt: cycle.startedAt.toString(),
    deadline: cycle.deadline.toString(),
    graceDeadline: cycle.graceDeadline.toString(),
  };
}

export function ledgerView(circleId: bigint, token: string, snapshot: LedgerSnapshot): LedgerView {
  return {
    circleId: circleId.toString(),
    token,
    totalDeposits: snapshot.totalDeposits.toString(),
    totalPayouts: snapshot.totalPayouts.toString(),
    vaultBalance: snapshot.vaultBalance.toString(),
    accruedProtocolFees: snapshot.accruedProtocolFees.toString(),
    accruedInsurance: snapshot.accruedInsurance.toString(),
    accruedPenalties: snapshot.accruedPenalties.toString(),
  };
}

export function depositView(outcome: DepositOutcome): DepositView {
  return {
    circleId: outcome.circleId.toString(),
    cycleIndex: outcome.cycleIndex,
    bitIndex: outcome.bitIndex,
    amount: outcome.amount.toString(),
    penalty: outcome.penalty.toString(),
    complete: outcome.complete,
  };
}

export function payoutView(outcome: PayoutOutcome): PayoutView {
  return {
    circleId: outcome.circleId.toString(),
    cycleIndex: outcome.cycleIndex,
    recipient: outcome.recipient,
    gross: outcome.gross.toString(),
    protocolFee: outcome.protocolFee.toString(),
    insuranceFee: outcome.insuranceFee.toString(),
    net: outcome.net.toString(),
    status: outcome.status,
  };
}

export function protocolView(settings: ProtocolSettings): ProtocolView {
  return { ...settings };
}

export function rateLimitView(address: string, status: CooldownStatus): RateLimitView {
  return {
    address,
    allowed: status.allowed,
    retryAfter: status.retryAfter.toString(),
    lastCreatedAt: status.lastCreatedAt?.toString(),
  };
}
