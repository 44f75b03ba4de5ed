import type { CircleStatus, PayoutSchedule } from "@rosca/shared";

export interface CircleConfig {
  token: string;
  contributionAmount: bigint;
  memberCount: number;
  cycleDurationSeconds: bigint;
  insuranceFeeBps: number;
  lateFeeBps: number;
  gracePeriodSeconds: bigint;
  payoutSchedule: PayoutSchedule;
}

export interface CircleRecord extends CircleConfig {
  id: bigint;
  creator: string;
  protocolFeeBps: number;
  status: CircleStatus;
  cycleIndex: number;
  payoutQueue: number[];
  createdAt: bigint;
  activatedAt?: bigint;
}

export interface MembershipRecord {
  members: string[];
}

export interface CycleRecord {
  index: number;
  bitmap: bigint;
  recipientIndex: number;
  startedAt: bigint;
  deadline: bigint;
}

export interface LedgerRecord {
  totalDeposits: bigint;
  totalPayouts: bigint;
  accruedProtocolFees: bigint;
  accruedInsurance: bigint;
  accruedPenalties: bigint;
}

export interface ProtocolSettings {
  admin: string;
  treasury: string;
  insurance: string;
  protocolFeeBps: number;
}
