import { Hono } from "hono";
import type { SyncRecord } from "@/lib/sync/types";
import type { AppDeps } from "../../types";

const PREVIEW_ROWS = 10;

function preview(records: SyncRecord[]) {
  return { rowsPreview: records.slice(0, PREVIEW_ROWS), count: records.length };
}

/** Read-through diagnostics: what each side currently returns, nothing written. */
export function sourceRoutes(deps: AppDeps) {
  const app = new Hono();

  app.get("/sheet", async (c) => {
    const records = await deps.sheet.read(deps.sheetRange);
    return c.json(preview(records));
  });

  app.get("/crm", async (c) => {
    const records = await deps.crm.read(deps.crmFilter);
    return c.json(preview(records));
  });

  return app;
}
