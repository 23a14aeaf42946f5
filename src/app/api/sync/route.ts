import { Hono } from "hono";
import { SYNC_DIRECTIONS, type PassStatus } from "@/lib/sync/types";
import type { AppDeps } from "../../types";

const RECENT_RUNS = 20;

const HTTP_STATUS = {
  completed: 200,
  dropped: 409,
  aborted: 502,
} as const satisfies Record<PassStatus, number>;

export function syncRoutes(deps: AppDeps) {
  const app = new Hono();

  app.post("/sheet-to-crm", async (c) => {
    const report = await deps.engine.run("SHEET_TO_CRM");
    return c.json(report, HTTP_STATUS[report.status]);
  });

  app.post("/crm-to-sheet", async (c) => {
    const report = await deps.engine.run("CRM_TO_SHEET");
    return c.json(report, HTTP_STATUS[report.status]);
  });

  app.get("/status", async (c) => {
    const directions = Object.fromEntries(
      SYNC_DIRECTIONS.map((direction) => [
        direction,
        { ...deps.engine.getStatus(direction), running: deps.engine.isRunning(direction) },
      ])
    );
    const runs = deps.runs ? await deps.runs.recent(RECENT_RUNS) : [];
    return c.json({ directions, runs });
  });

  return app;
}
