// src/modules/health/health.controller.ts
// Service and store health. Health endpoints never throw; a failed probe is a 503.

import { Router, type Request, type Response } from "express";
import { errorMeta, log } from "@/lib/observability/logger";
import type { Clock } from "@/lib/clock";
import type { WarrantyStore } from "@/lib/store/store.types";

export type HealthDeps = {
  store: Pick<WarrantyStore, "ping">;
  clock: Clock;
  mode: "MOCK" | "LIVE";
};

async function probeStore(store: HealthDeps["store"]): Promise<boolean> {
  try {
    return await store.ping();
  } catch (err) {
    log("WARN", "HEALTH_STORE_PROBE_FAILED", errorMeta(err));
    return false;
  }
}

export function createHealthRoutes(deps: HealthDeps): Router {
  const router: Router = Router();

  ////////////////////////////////////////////////////////////////
  // Service Health
  ////////////////////////////////////////////////////////////////

  router.get("/health", async (_req: Request, res: Response) => {
    const storeUp = await probeStore(deps.store);

    res.status(storeUp ? 200 : 503).json({
      ok: storeUp,
      status: storeUp ? "online" : "degraded",
      mode: deps.mode,
      store: storeUp ? "up" : "down",
      uptime: process.uptime(),
      checkedAt: deps.clock.now().toISOString(),
    });
  });

  return router;
}
