import type { Context, ErrorHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import { AuthError, SyncError, errorMessage } from "@/lib/errors";
import type { SyncLogger } from "@/lib/sync/logger";

interface ErrorBody {
  error: string;
  message: string;
}

function statusFor(err: unknown): 401 | 404 | 500 | 502 {
  if (err instanceof HTTPException && err.status === 404) return 404;
  if (err instanceof AuthError) return 401;
  // Failures of the sheet or CRM behind the request
  if (err instanceof SyncError) return 502;
  return 500;
}

function codeFor(err: unknown): string {
  if (err instanceof SyncError) return err.kind;
  if (err instanceof HTTPException && err.status === 404) return "NOT_FOUND";
  return "INTERNAL_SERVER_ERROR";
}

export function errorHandler(logger: SyncLogger): ErrorHandler {
  return (err, c) => {
    const status = statusFor(err);
    if (status >= 500) {
      logger.error("http", `${c.req.method} ${c.req.path} failed: ${errorMessage(err)}`);
    }
    const body: ErrorBody = { error: codeFor(err), message: errorMessage(err) };
    return c.json(body, status);
  };
}

export function notFoundHandler(c: Context) {
  const body: ErrorBody = {
    error: "NOT_FOUND",
    message: `Route not found: ${c.req.method} ${c.req.path}`,
  };
  return c.json(body, 404);
}
