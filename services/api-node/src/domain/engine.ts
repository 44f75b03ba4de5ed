import { MAX_MEMBERS, MIN_MEMBERS, type CircleStatus } from "@rosca/shared";
import { keys, type KeyValueStore } from "../store/keyValueStore.js";
import type { TokenAsset } from "../providers/tokenAsset.js";
import { checkedAddU64, checkedMul, U64_MAX } from "../utils/checked.js";
import { HttpError, assert, unwrap } from "../utils/errors.js";
import { cryptoRandomSource, type RandomSource } from "../utils/crypto.js";
import type { Clock } from "../utils/time.js";
import { BalanceLedger, type LedgerSnapshot, type PayoutSplit } from "./balanceLedger.js";
import * as bitmap from "./contributionBitmap.js";
import { computeFee, isValidBps } from "./feeCalculator.js";
import { MembershipRegistry } from "./membership.js";
import { buildPayoutQueue, validateSchedule } from "./payoutSchedule.js";
import { RateLimiter, type CooldownStatus } from "./rateLimiter.js";
import type { CircleConfig, CircleRecord, CycleRecord, ProtocolSettings } from "./types.js";

export interface EngineDependencies {
  store: KeyValueStore;
  clock: Clock;
  token: TokenAsset;
  protocol: ProtocolSettings;
  /** Seeds random payout queues; defaults to `crypto.randomBytes`. */
  random?: RandomSource;
}

export interface JoinOutcome {
  bitIndex: number;
  circle: CircleRecord;
}

export interface DepositOutcome {
  circleId: bigint;
  cycleIndex: number;
  bitIndex: number;
  amount: bigint;
  penalty: bigint;
  complete: boolean;
}

export interface PayoutOutcome extends PayoutSplit {
  circleId: bigint;
  cycleIndex: number;
  recipient: string;
  status: CircleStatus;
}

export interface CycleState extends CycleRecord {
  recipient: string;
  graceDeadline: bigint;
}

export class CircleEngine {
  private readonly store: KeyValueStore;
  private readonly clock: Clock;
  private readonly token: TokenAsset;
  private readonly random: RandomSource;
  private readonly rateLimiter: RateLimiter;
  private readonly membership: MembershipRegistry;
  private readonly ledger: BalanceLedger;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(dependencies: EngineDependencies) {
    this.store = dependencies.store;
    this.clock = dependencies.clock;
    this.token = dependencies.token;
    this.random = dependencies.random ?? cryptoRandomSource;
    this.rateLimiter = new RateLimiter(this.store);
    this.membership = new MembershipRegistry(this.store);
    this.ledger = new BalanceLedger(this.store);
    if (!this.store.has(keys.protocol())) {
      assert(isValidBps(dependencies.protocol.protocolFeeBps), "INVALID_FEE_RATE", "Invalid protocol fee.");
      this.store.set(keys.protocol(), dependencies.protocol);
    }
  }

  protocol(): ProtocolSettings {
    return this.requireProtocol();
  }

  cooldown(creator: string): CooldownStatus {
    return this.rateLimiter.status(creator, this.clock.now());
  }

  createCircle(creator: string, config: CircleConfig): Promise<CircleRecord> {
    return this.exclusive(async () => {
      const protocol = this.requireProtocol();
      this.validateConfig(config, protocol);
      const now = this.clock.now();
      unwrap(this.rateLimiter.checkAndRecord(creator, now));

      const id = this.nextCircleId();
      const circle: CircleRecord = {
        ...config,
        payoutSchedule:
          config.payoutSchedule.kind === "custom"
            ? { kind: "custom", order: [...config.payoutSchedule.order] }
            : config.payoutSchedule,
        id,
        creator,
        protocolFeeBps: protocol.protocolFeeBps,
        status: "open",
        cycleIndex: 0,
        payoutQueue: [],
        createdAt: now,
      };
      this.store.set(keys.circle(id), circle);
      this.store.set(keys.membership(id), { members: [] });
      return circle;
    });
  }

  joinCircle(caller: string, circleId: bigint): Promise<JoinOutcome> {
    return this.exclusive(async () => {
      const circle = this.requireCircle(circleId);
      assert(circle.status !== "completed", "CIRCLE_COMPLETED", "Circle has completed all cycles.");
      // Membership is closed once the circle is active.
      assert(circle.status === "open", "CIRCLE_FULL", "Circle membership is closed.");

      const bitIndex = unwrap(this.membership.join(circleId, caller, circle.memberCount));
      if (this.membership.memberCount(circleId) < circle.memberCount) {
        return { bitIndex, circle };
      }
      return { bitIndex, circle: this.activate(circle) };
    });
  }

  deposit(caller: string, circleId: bigint, amount: bigint): Promise<DepositOutcome> {
    return this.exclusive(async () => {
      const circle = this.requireCircle(circleId);
      this.assertActive(circle);
      const bitIndex = this.membership.indexOf(circleId, caller);
      assert(bitIndex >= 0, "NOT_MEMBER", "Caller is not a member of this circle.");
      assert(
        amount === circle.contributionAmount,
        "VALIDATION_ERROR",
        `Deposit must equal the contribution amount of ${circle.contributionAmount}.`
      );

      const cycle = this.requireCycle(circle);
      const penalty = this.latePenalty(circle, cycle, this.clock.now());
      const marked = unwrap(bitmap.markContributed(cycle.bitmap, bitIndex));
      unwrap(this.ledger.recordDeposit(circleId, circle.token, amount));
      if (penalty > 0n) {
        unwrap(this.ledger.recordPenalty(circleId, circle.token, penalty));
      }
      this.store.set(keys.cycle(circleId, cycle.index), { ...cycle, bitmap: marked });

      const total = amount + penalty;
      const allowance = await this.token.allowance(circle.token, caller);
      assert(allowance >= total, "INSUFFICIENT_ALLOWANCE", "Token allowance is below the deposit amount.");
      await this.transferIn(
        circle.token,
        caller,
        total,
        transferKey(circleId, cycle.index, `deposit:${bitIndex}`)
      );
      if (penalty > 0n) {
        await this.transferOut(
          circle.token,
          this.requireProtocol().treasury,
          penalty,
          transferKey(circleId, cycle.index, `penalty:${bitIndex}`)
        );
      }

      return {
        circleId,
        cycleIndex: cycle.index,
        bitIndex,
        amount,
        penalty,
        complete: bitmap.isComplete(marked, circle.memberCount),
      };
    });
  }

  triggerPayout(_caller: string, circleId: bigint): Promise<PayoutOutcome> {
    return this.exclusive(async () => {
      const circle = this.requireCircle(circleId);
      this.assertActive(circle);
      const cycle = this.requireCycle(circle);
      assert(
        bitmap.isComplete(cycle.bitmap, circle.memberCount),
        "CYCLE_INCOMPLETE",
        `Only ${bitmap.popcount(cycle.bitmap)} of ${circle.memberCount} members contributed this cycle.`
      );

      const recipient = this.recipientOf(circle, cycle);
      const gross = unwrap(checkedMul(circle.contributionAmount, BigInt(circle.memberCount)));
      const split = unwrap(
        this.ledger.recordPayout(circleId, circle.token, gross, {
          protocolFeeBps: circle.protocolFeeBps,
          insuranceFeeBps: circle.insuranceFeeBps,
        })
      );
      this.store.set(keys.cycle(circleId, cycle.index), { ...cycle, bitmap: bitmap.reset() });

      const next = this.advance(circle);
      const protocol = this.requireProtocol();
      await this.transferOut(
        circle.token,
        recipient,
        split.net,
        transferKey(circleId, cycle.index, "payout")
      );
      if (split.protocolFee > 0n) {
        await this.transferOut(
          circle.token,
          protocol.treasury,
          split.protocolFee,
          transferKey(circleId, cycle.index, "protocol-fee")
        );
      }
      if (split.insuranceFee > 0n) {
        await this.transferOut(
          circle.token,
          protocol.insurance,
          split.insuranceFee,
          transferKey(circleId, cycle.index, "insurance-fee")
        );
      }

      return { ...split, circleId, cycleIndex: cycle.index, recipient, status: next.status };
    });
  }

  setProtocolFee(caller: string, bps: number): Promise<ProtocolSettings> {
    return this.exclusive(async () => {
      const protocol = this.requireProtocol();
      assert(caller === protocol.admin, "UNAUTHORIZED", "Only the protocol admin can change the fee.");
      assert(isValidBps(bps), "INVALID_FEE_RATE", `Fee rate ${bps} bps is outside 0..10000.`);
      const updated = { ...protocol, protocolFeeBps: bps };
      this.store.set(keys.protocol(), updated);
      return updated;
    });
  }

  getCircle(circleId: bigint): CircleRecord {
    return this.requireCircle(circleId);
  }

  members(circleId: bigint): string[] {
    this.requireCircle(circleId);
    return this.membership.members(circleId);
  }

  isMember(circleId: bigint, address: string): boolean {
    return this.membership.isMember(circleId, address);
  }

  currentCycle(circleId: bigint): CycleState {
    const circle = this.requireCircle(circleId);
    this.assertActive(circle);
    const cycle = this.requireCycle(circle);
    return {
      ...cycle,
      recipient: this.recipientOf(circle, cycle),
      graceDeadline: unwrap(checkedAddU64(cycle.deadline, circle.gracePeriodSeconds)),
    };
  }

  payoutQueue(circleId: bigint): string[] {
    const circle = this.requireCircle(circleId);
    const members = this.membership.members(circleId);
    return circle.payoutQueue.map((bitIndex) => members[bitIndex]);
  }

  ledgerFor(circleId: bigint): LedgerSnapshot {
    const circle = this.requireCircle(circleId);
    return this.ledger.snapshot(circleId, circle.token);
  }

  /** One call at a time, each inside its own store transaction. */
  private exclusive<T>(work: () => Promise<T>): Promise<T> {
    const run = this.queue.then(() => this.store.transaction(work));
    this.queue = run.catch(() => undefined);
    return run;
  }

  private validateConfig(config: CircleConfig, protocol: ProtocolSettings): void {
    assert(config.contributionAmount > 0n, "VALIDATION_ERROR", "Contribution amount must be positive.");
    assert(
      Number.isInteger(config.memberCount) &&
        config.memberCount >= MIN_MEMBERS &&
        config.memberCount <= MAX_MEMBERS,
      "VALIDATION_ERROR",
      `Member count must be between ${MIN_MEMBERS} and ${MAX_MEMBERS}.`
    );
    assert(
      config.cycleDurationSeconds > 0n && config.cycleDurationSeconds <= U64_MAX,
      "VALIDATION_ERROR",
      "Cycle duration must be a positive number of seconds."
    );
    assert(
      config.gracePeriodSeconds >= 0n && config.gracePeriodSeconds <= U64_MAX,
      "VALIDATION_ERROR",
      "Grace period cannot be negative."
    );
    assert(config.token.length > 0, "VALIDATION_ERROR", "Token is required.");
    assert(isValidBps(config.insuranceFeeBps), "VALIDATION_ERROR", "Insurance fee must be within 0..10000 bps.");
    assert(isValidBps(config.lateFeeBps), "VALIDATION_ERROR", "Late fee must be within 0..10000 bps.");
    assert(
      protocol.protocolFeeBps + config.insuranceFeeBps <= 10_000,
      "VALIDATION_ERROR",
      "Protocol and insurance fees together cannot exceed 10000 bps."
    );
    unwrap(checkedMul(config.contributionAmount, BigInt(config.memberCount)));
    unwrap(validateSchedule(config.payoutSchedule, config.memberCount));
  }

  private activate(circle: CircleRecord): CircleRecord {
    const now = this.clock.now();
    const members = this.membership.members(circle.id);
    const payoutQueue = unwrap(
      buildPayoutQueue(circle.payoutSchedule, members, () => this.random.seed())
    );
    const active: CircleRecord = { ...circle, status: "active", cycleIndex: 0, payoutQueue, activatedAt: now };
    this.store.set(keys.circle(circle.id), active);
    this.openCycle(active, now);
    return active;
  }

  private advance(circle: CircleRecord): CircleRecord {
    const cycleIndex = circle.cycleIndex + 1;
    if (cycleIndex >= circle.memberCount) {
      const completed: CircleRecord = { ...circle, cycleIndex, status: "completed" };
      this.store.set(keys.circle(circle.id), completed);
      return completed;
    }
    const next: CircleRecord = { ...circle, cycleIndex };
    this.store.set(keys.circle(circle.id), next);
    this.openCycle(next, this.clock.now());
    return next;
  }

  private openCycle(circle: CircleRecord, startedAt: bigint): void {
    const deadline = unwrap(checkedAddU64(startedAt, circle.cycleDurationSeconds));
    this.store.set(keys.cycle(circle.id, circle.cycleIndex), {
      index: circle.cycleIndex,
      bitmap: bitmap.reset(),
      recipientIndex: circle.payoutQueue[circle.cycleIndex],
      startedAt,
      deadline,
    });
  }

  /**
   * On time: no penalty. Inside the grace window: the late fee on one
   * contribution. Past the grace window, or late with no grace: rejected.
   */
  private latePenalty(circle: CircleRecord, cycle: CycleRecord, now: bigint): bigint {
    if (now <= cycle.deadline) {
      return 0n;
    }
    const graceDeadline = unwrap(checkedAddU64(cycle.deadline, circle.gracePeriodSeconds));
    assert(
      circle.gracePeriodSeconds > 0n && now <= graceDeadline,
      "DEADLINE_EXPIRED",
      `Cycle ${cycle.index} deadline has passed.`
    );
    return unwrap(computeFee(circle.contributionAmount, circle.lateFeeBps)).fee;
  }

  private recipientOf(circle: CircleRecord, cycle: CycleRecord): string {
    const recipient = this.membership.members(circle.id)[cycle.recipientIndex];
    if (recipient === undefined) {
      throw new Error(`Circle ${circle.id} has no member at bit index ${cycle.recipientIndex}.`);
    }
    return recipient;
  }

  private async transferIn(token: string, from: string, amount: bigint, key: string): Promise<void> {
    const result = await this.token.transferIn(token, from, amount, key);
    assert(result.ok, "TRANSFER_FAILED", `Token transfer in failed${result.reason ? `: ${result.reason}` : "."}`);
  }

  private async transferOut(token: string, to: string, amount: bigint, key: string): Promise<void> {
    const result = await this.token.transferOut(token, to, amount, key);
    assert(result.ok, "TRANSFER_FAILED", `Token transfer out failed${result.reason ? `: ${result.reason}` : "."}`);
  }

  private assertActive(circle: CircleRecord): void {
    assert(circle.status !== "completed", "CIRCLE_COMPLETED", "Circle has completed all cycles.");
    assert(circle.status === "active", "NOT_ACTIVE", "Circle is not active yet.");
  }

  private nextCircleId(): bigint {
    const next = (this.store.get(keys.circleCount()) ?? 0n) + 1n;
    if (next > U64_MAX) {
      throw new HttpError(422, "OVERFLOW", "Circle id space exhausted.");
    }
    this.store.set(keys.circleCount(), next);
    return next;
  }

  private requireProtocol(): ProtocolSettings {
    const protocol = this.store.get(keys.protocol());
    if (!protocol) {
      throw new Error("Protocol settings are not initialized.");
    }
    return protocol;
  }

  private requireCircle(circleId: bigint): CircleRecord {
    const circle = this.store.get(keys.circle(circleId));
    assert(circle, "NOT_FOUND", `Circle ${circleId} not found.`);
    return circle;
  }

  private requireCycle(circle: CircleRecord): CycleRecord {
    const cycle = this.store.get(keys.cycle(circle.id, circle.cycleIndex));
    if (!cycle) {
      throw new Error(`Circle ${circle.id} is missing cycle ${circle.cycleIndex}.`);
    }
    return cycle;
  }
}

/** Names one leg of one cycle, so a retried call reuses the same key. */
export function transferKey(circleId: bigint, cycleIndex: number, leg: string): string {
  return `${circleId}:${cycleIndex}:${leg}`;
}
