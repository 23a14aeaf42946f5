import { Hono } from "hono";
import { logger } from "hono/logger";
import { syncLogger } from "@/lib/sync/logger";
import { sourceRoutes } from "./api/sources/route";
import { syncRoutes } from "./api/sync/route";
import { errorHandler, notFoundHandler } from "./middleware";
import type { AppDeps } from "./types";

const INDEX_TEXT = [
  "sheet-crm-sync",
  "",
  "POST /api/sync/sheet-to-crm",
  "POST /api/sync/crm-to-sheet",
  "GET  /api/sync/status",
  "GET  /api/sources/sheet",
  "GET  /api/sources/crm",
].join("\n");

export function createApp(deps: AppDeps) {
  const log = deps.logger ?? syncLogger;
  const app = new Hono();

  app.use("*", logger((message, ...rest) => log.info("http", [message, ...rest].join(" "))));

  app.get("/", (c) => c.text(INDEX_TEXT));
  app.route("/api/sync", syncRoutes(deps));
  app.route("/api/sources", sourceRoutes(deps));

  app.onError(errorHandler(log));
  app.notFound(notFoundHandler);

  return app;
}
