import "dotenv/config";
import { serve } from "@hono/node-server";
import { createApp } from "@/app/app";
import { loadConfig } from "@/lib/config";
import { errorMessage } from "@/lib/errors";
import { createSyncContext } from "@/lib/sync/context";
import { syncLogger } from "@/lib/sync/logger";
import { ScheduleDriver } from "@/lib/sync/scheduler";

const config = loadConfig();
const ctx = createSyncContext(config);
const driver = new ScheduleDriver(ctx.engine, config.intervals);

const app = createApp({
  engine: ctx.engine,
  runs: ctx.runs,
  sheet: ctx.sheet,
  crm: ctx.crm,
  sheetRange: ctx.sheetRange,
  crmFilter: ctx.crmFilter,
});

const server = serve({ fetch: app.fetch, port: config.server.port, hostname: config.server.host }, (info) => {
  syncLogger.info("server", `Listening on http://${info.address}:${info.port}`);
});

driver.start();
syncLogger.info(
  "server",
  `Scheduler started: SHEET_TO_CRM every ${config.intervals.SHEET_TO_CRM / 60_000}m, ` +
    `CRM_TO_SHEET every ${config.intervals.CRM_TO_SHEET / 60_000}m`
);

let stopping = false;

async function shutdown(signal: string) {
  if (stopping) return;
  stopping = true;
  syncLogger.info("server", `${signal} received, draining running passes`);

  driver.stop();
  server.close();
  await ctx.engine.shutdown();
  ctx.db.close();
  syncLogger.info("server", "Stopped");
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err) => {
      syncLogger.error("server", `Shutdown failed: ${errorMessage(err)}`);
      process.exitCode = 1;
    });
  });
}
