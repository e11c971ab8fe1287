/**
 * Token routes.
 *
 * Queries:
 * GET  /api/v1/token                              — Metadata, phase, height, counters
 * GET  /api/v1/token/balances/:address            — Balance and send count
 * GET  /api/v1/token/allowances/:owner/:spender   — Allowance
 * GET  /api/v1/token/vesting/:address             — Grant and claimable amount
 * GET  /api/v1/token/mission-log                  — Entries (cursor pagination)
 * GET  /api/v1/token/mission-log/:index           — One entry
 *
 * Calls (caller required):
 * POST /api/v1/token/transfer
 * POST /api/v1/token/approve
 * POST /api/v1/token/transfer-from
 * POST /api/v1/token/launch/commit
 * POST /api/v1/token/launch/burn
 * POST /api/v1/token/vesting/schedule
 * POST /api/v1/token/vesting/claim
 * POST /api/v1/token/mission-log
 */

import { Hono } from "hono";
import { UINT256_MAX } from "@ignition/ledger";
import type { AppEnv } from "../types/api-contract.js";
import {
  ApproveSchema,
  BurnSchema,
  LogMissionSchema,
  MissionLogIndexSchema,
  PaginationQuerySchema,
  ScheduleVestingSchema,
  TransferFromSchema,
  TransferSchema,
} from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { paginate } from "../types/pagination.js";
import {
  toAllocationView,
  toBurnView,
  toGrantView,
  toMissionLogEntryView,
  toReceiptView,
  toStatusView,
  toVestingView,
} from "../types/views.js";
import { validateBody } from "../middleware/validate.js";
import { requireCaller } from "../middleware/caller.js";

const noResult = (): null => null;

export function createTokenRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // ─── Queries ─────────────────────────────────────────────────────

  routes.get("/", (c) => {
    const service = c.get("service");
    const height = service.height();

    return c.json({
      data: toStatusView(service.status(), height, service.isLaunchUnlocked(height)),
    });
  });

  routes.get("/balances/:address", (c) => {
    const service = c.get("service");
    const address = c.req.param("address");

    return c.json({
      data: {
        address: address.toLowerCase(),
        balance: service.balanceOf(address).toString(),
        transferCount: service.transferCountOf(address),
      },
    });
  });

  routes.get("/allowances/:owner/:spender", (c) => {
    const service = c.get("service");
    const owner = c.req.param("owner");
    const spender = c.req.param("spender");
    const allowance = service.allowance(owner, spender);

    return c.json({
      data: {
        owner: owner.toLowerCase(),
        spender: spender.toLowerCase(),
        allowance: allowance.toString(),
        unlimited: allowance === UINT256_MAX,
      },
    });
  });

  routes.get("/vesting/:address", (c) => {
    const service = c.get("service");
    return c.json({ data: toVestingView(service.vesting(c.req.param("address"))) });
  });

  routes.get("/mission-log", (c) => {
    const service = c.get("service");

    const queryResult = PaginationQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"),
        400,
      );
    }

    const page = paginate(
      service.missionLog(),
      queryResult.data,
      (entry) => entry.index,
      "index",
    );

    return c.json({
      data: page.data.map(toMissionLogEntryView),
      pagination: page.pagination,
    });
  });

  routes.get("/mission-log/:index", (c) => {
    const service = c.get("service");

    const index = MissionLogIndexSchema.safeParse(c.req.param("index"));
    if (!index.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Index must be a non-negative integer"),
        400,
      );
    }

    return c.json({ data: toMissionLogEntryView(service.missionLogEntry(index.data)) });
  });

  // ─── Ledger Calls ────────────────────────────────────────────────

  routes.post("/transfer", requireCaller(), validateBody(TransferSchema), (c) => {
    const body = c.get("validatedBody");
    const receipt = c.get("service").transfer(c.get("actor"), body.to, body.amount);
    return c.json({ data: toReceiptView(receipt, noResult) });
  });

  routes.post("/approve", requireCaller(), validateBody(ApproveSchema), (c) => {
    const body = c.get("validatedBody");
    const receipt = c.get("service").approve(c.get("actor"), body.spender, body.amount);
    return c.json({ data: toReceiptView(receipt, noResult) });
  });

  routes.post("/transfer-from", requireCaller(), validateBody(TransferFromSchema), (c) => {
    const body = c.get("validatedBody");
    const receipt = c
      .get("service")
      .transferFrom(c.get("actor"), body.from, body.to, body.amount);
    return c.json({ data: toReceiptView(receipt, noResult) });
  });

  // ─── Launch Calls ────────────────────────────────────────────────

  routes.post("/launch/commit", requireCaller(), (c) => {
    const receipt = c.get("service").commitTrajectory(c.get("actor"));
    return c.json({ data: toReceiptView(receipt, toAllocationView) });
  });

  routes.post("/launch/burn", requireCaller(), validateBody(BurnSchema), (c) => {
    const body = c.get("validatedBody");
    const receipt = c.get("service").executeIgnitionBurn(c.get("actor"), body.amount);
    return c.json({ data: toReceiptView(receipt, toBurnView) });
  });

  // ─── Vesting Calls ───────────────────────────────────────────────

  routes.post("/vesting/schedule", requireCaller(), validateBody(ScheduleVestingSchema), (c) => {
    const body = c.get("validatedBody");
    const receipt = c
      .get("service")
      .scheduleVesting(c.get("actor"), body.beneficiary, body.amount);
    return c.json({ data: toReceiptView(receipt, toGrantView) });
  });

  routes.post("/vesting/claim", requireCaller(), (c) => {
    const receipt = c.get("service").claimVested(c.get("actor"));
    return c.json({
      data: toReceiptView(receipt, (amount) => ({ amount: amount.toString() })),
    });
  });

  // ─── Mission Log Calls ───────────────────────────────────────────

  routes.post("/mission-log", requireCaller(), validateBody(LogMissionSchema), (c) => {
    const body = c.get("validatedBody");
    const receipt = c.get("service").logMission(c.get("actor"), body.value, body.tag);
    return c.json({ data: toReceiptView(receipt, (index) => ({ index })) }, 201);
  });

  return routes;
}
