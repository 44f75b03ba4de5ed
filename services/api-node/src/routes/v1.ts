import { Router } from "express";
import { z } from "zod";
import { MAX_MEMBERS, MIN_MEMBERS } from "@rosca/shared";
import { engine } from "../domain/index.js";
import { callerOf, requireCaller } from "../middleware/auth.js";
import {
  circleView,
  cycleView,
  depositView,
  ledgerView,
  memberViews,
  payoutView,
  protocolView,
  rateLimitView,
} from "./views.js";

export const v1Router = Router();

const amount = z
  .string()
  .regex(/^\d+$/, "Amounts are base-unit integers written as decimal strings.")
  .transform((value) => BigInt(value));

const seconds = z
  .union([z.string().regex(/^\d+$/), z.number().int().nonnegative()])
  .transform((value) => BigInt(value));

const bps = z.number().int().min(0).max(10_000);

const payoutSchedule = z
  .discriminatedUnion("kind", [
    z.object({ kind: z.literal("join_order") }),
    z.object({ kind: z.literal("random") }),
    z.object({ kind: z.literal("custom"), order: z.array(z.number().int().nonnegative()) }),
  ])
  .default({ kind: "join_order" });

const circleId = z
  .string()
  .regex(/^\d+$/, "Circle ids are unsigned integers.")
  .transform((value) => BigInt(value));

v1Router.get("/health", (_request, response) => {
  response.json({
    data: {
      service: "rosca-api-node",
      status: "ok",
      timestamp: new Date().toISOString(),
    },
  });
});

v1Router.get("/protocol", (_request, response) => {
  response.json({ data: protocolView(engine().protocol()) });
});

v1Router.put("/admin/protocol-fee", requireCaller, async (request, response) => {
  const payload = z.object({ bps }).parse(request.body);
  const settings = await engine().setProtocolFee(callerOf(request), payload.bps);
  response.json({ data: protocolView(settings) });
});

v1Router.get("/rate-limit/:address", (request, response) => {
  const address = request.params.address;
  response.json({ data: rateLimitView(address, engine().cooldown(address)) });
});

v1Router.post("/circles", requireCaller, async (request, response) => {
  const payload = z
    .object({
      token: z.string().min(1).max(128),
      contributionAmount: amount,
      memberCount: z.number().int().min(MIN_MEMBERS).max(MAX_MEMBERS),
      cycleDurationSeconds: seconds,
      insuranceFeeBps: bps.default(0),
      lateFeeBps: bps.default(0),
      gracePeriodSeconds: seconds.default(0),
      payoutSchedule,
    })
    .parse(request.body);
  const circle = await engine().createCircle(callerOf(request), payload);
  response.status(201).json({ data: circleView(circle, 0) });
});

v1Router.get("/circles/:circleId", (request, response) => {
  const id = circleId.parse(request.params.circleId);
  const circle = engine().getCircle(id);
  response.json({ data: circleView(circle, engine().members(id).length) });
});

v1Router.post("/circles/:circleId/join", requireCaller, async (request, response) => {
  const id = circleId.parse(request.params.circleId);
  const result = await engine().joinCircle(callerOf(request), id);
  response.json({
    data: {
      bitIndex: result.bitIndex,
      circle: circleView(result.circle, engine().members(id).length),
    },
  });
});

v1Router.get("/circles/:circleId/members", (request, response) => {
  const id = circleId.parse(request.params.circleId);
  response.json({ data: memberViews(engine().members(id)) });
});

v1Router.get("/circles/:circleId/cycle", (request, response) => {
  const id = circleId.parse(request.params.circleId);
  const circle = engine().getCircle(id);
  response.json({ data: cycleView(id, circle.memberCount, engine().currentCycle(id)) });
});

v1Router.get("/circles/:circleId/payout-queue", (request, response) => {
  const id = circleId.parse(request.params.circleId);
  response.json({ data: engine().payoutQueue(id) });
});

v1Router.post("/circles/:circleId/deposits", requireCaller, async (request, response) => {
  const id = circleId.parse(request.params.circleId);
  const payload = z.object({ amount }).parse(request.body);
  const outcome = await engine().deposit(callerOf(request), id, payload.amount);
  response.status(201).json({ data: depositView(outcome) });
});

v1Router.post("/circles/:circleId/payouts", requireCaller, async (request, response) => {
  const id = circleId.parse(request.params.circleId);
  const outcome = await engine().triggerPayout(callerOf(request), id);
  response.status(201).json({ data: payoutView(outcome) });
});

v1Router.get("/circles/:circleId/ledger", (request, response) => {
  const id = circleId.parse(request.params.circleId);
  const circle = engine().getCircle(id);
  response.json({ data: ledgerView(id, circle.token, engine().ledgerFor(id)) });
});
