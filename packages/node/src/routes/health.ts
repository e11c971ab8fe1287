/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (supply balances and the event chain verifies)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { TokenService } from "../services/token-service.js";

interface SubsystemStatus {
  readonly status: "ok" | "down";
  readonly detail?: string | undefined;
}

export function createHealthRoutes(service: TokenService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const { ready, supply, integrity } = service.checkHealth();

    const subsystems: Record<"ledger" | "eventStore", SubsystemStatus> = {
      ledger: supply.balanced
        ? { status: "ok" }
        : {
            status: "down",
            detail: `sumOfBalances=${supply.sumOfBalances.toString()}, totalSupply=${supply.totalSupply.toString()}`,
          },
      eventStore: integrity.valid
        ? { status: "ok" }
        : { status: "down", detail: `chainValid=false, errors=${integrity.errors.length}` },
    };

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        height: service.height(),
        events: service.eventStore.globalPosition(),
        subsystems,
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
