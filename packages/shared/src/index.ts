export const APP_NAME = "Rosca Circles";

export const MAX_MEMBERS = 64;
export const MIN_MEMBERS = 2;
export const BPS_DENOMINATOR = 10_000;
export const CREATION_COOLDOWN_SECONDS = 300n;

export const CIRCLE_STATUSES = ["open", "active", "completed"] as const;
export type CircleStatus = (typeof CIRCLE_STATUSES)[number];

export const PAYOUT_SCHEDULE_KINDS = ["join_order", "random", "custom"] as const;
export type PayoutScheduleKind = (typeof PAYOUT_SCHEDULE_KINDS)[number];

export type PayoutSchedule =
  | { kind: "join_order" }
  | { kind: "random" }
  | { kind: "custom"; order: number[] };

export const ERROR_CODES = [
  "RATE_LIMITED",
  "VALIDATION_ERROR",
  "INVALID_FEE_RATE",
  "UNAUTHENTICATED",
  "UNAUTHORIZED",
  "NOT_FOUND",
  "ALREADY_MEMBER",
  "CIRCLE_FULL",
  "NOT_MEMBER",
  "NOT_ACTIVE",
  "CIRCLE_COMPLETED",
  "ALREADY_CONTRIBUTED",
  "CYCLE_INCOMPLETE",
  "DEADLINE_EXPIRED",
  "INSUFFICIENT_VAULT",
  "OVERFLOW",
  "UNDERFLOW",
  "INSUFFICIENT_ALLOWANCE",
  "TRANSFER_FAILED",
] as const;
export type ErrorCode = (typeof ERROR_CODES)[number];

// Wire views: bigint values travel as decimal strings.

export interface CircleView {
  id: string;
  creator: string;
  token: string;
  contributionAmount: string;
  memberCount: number;
  joinedCount: number;
  cycleDurationSeconds: string;
  protocolFeeBps: number;
  insuranceFeeBps: number;
  lateFeeBps: number;
  gracePeriodSeconds: string;
  payoutSchedule: PayoutScheduleKind;
  status: CircleStatus;
  cycleIndex: number;
  createdAt: string;
  activatedAt?: string;
}

export interface MemberView {
  address: string;
  bitIndex: number;
}

export interface CycleView {
  circleId: string;
  index: number;
  bitmap: string;
  contributors: number[];
  contributedCount: number;
  complete: boolean;
  recipient: string;
  startedAt: string;
  deadline: string;
  graceDeadline: string;
}

export interface LedgerView {
  circleId: string;
  token: string;
  totalDeposits: string;
  totalPayouts: string;
  vaultBalance: string;
  accruedProtocolFees: string;
  accruedInsurance: string;
  accruedPenalties: string;
}

export interface DepositView {
  circleId: string;
  cycleIndex: number;
  bitIndex: number;
  amount: string;
  penalty: string;
  complete: boolean;
}

export interface PayoutView {
  circleId: string;
  cycleIndex: number;
  recipient: string;
  gross: string;
  protocolFee: string;
  insuranceFee: string;
  net: string;
  status: CircleStatus;
}

export interface ProtocolView {
  admin: string;
  treasury: string;
  insurance: string;
  protocolFeeBps: number;
}

export interface RateLimitView {
  address: string;
  allowed: boolean;
  retryAfter: string;
  lastCreatedAt?: string;
}

export interface ApiErrorShape {
  error: {
    code: ErrorCode | "INTERNAL_SERVER_ERROR";
    message: string;
    details?: unknown;
  };
}
