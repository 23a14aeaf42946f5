import { differenceInMilliseconds } from "date-fns";
import {
  AuthError,
  RateLimitExceeded,
  RequestRejected,
  TransientWriteError,
  errorMessage,
  type SyncError,
} from "@/lib/errors";
import type { Backend, WriteResult } from "@/lib/sync/types";

const DEFAULT_RATE_LIMIT_BACKOFF_MS = 1000;

/** Retry-After is either delta-seconds or an HTTP date. */
export function parseRetryAfter(value: string | null | undefined, now = new Date()): number | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(parseFloat(trimmed) * 1000);
  }
  const date = new Date(trimmed);
  if (isNaN(date.getTime())) return undefined;
  return Math.max(0, differenceInMilliseconds(date, now));
}

export function errorForStatus(
  backend: Backend,
  status: number,
  message: string,
  retryAfterMs?: number
): SyncError {
  if (status === 429 || message.includes("RATE_LIMIT_EXCEEDED")) {
    return new RateLimitExceeded(backend, retryAfterMs ?? DEFAULT_RATE_LIMIT_BACKOFF_MS, message);
  }
  if (status === 401 || status === 403) {
    return new AuthError(backend, message);
  }
  if (status === 408 || status >= 500) {
    return new TransientWriteError(backend, message, retryAfterMs);
  }
  return new RequestRejected(backend, message, status);
}

/**
 * Turn a failed batch request into per-record results. Auth and unknown
 * errors propagate; transient ones are left to the caller's retry loop.
 */
export function batchFailure(err: unknown, size: number): WriteResult[] {
  if (err instanceof RateLimitExceeded) {
    return Array.from({ length: size }, (): WriteResult => ({
      ok: false,
      kind: "RATE_LIMITED",
      message: err.message,
      retryAfterMs: err.retryAfterMs,
    }));
  }
  if (err instanceof RequestRejected) {
    return Array.from({ length: size }, (): WriteResult => ({
      ok: false,
      kind: "REJECTED",
      message: err.message,
    }));
  }
  throw err;
}

export interface RetryOptions {
  attempts?: number;
  baseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Retries reads on 429, 5xx and network errors with exponential backoff,
 * honoring the server's Retry-After when it sent one.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const attempts = options.attempts ?? 3;
  const baseDelayMs = options.baseDelayMs ?? 500;
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!(err instanceof TransientWriteError || err instanceof RateLimitExceeded) || attempt >= attempts) {
        throw err;
      }
      const backoff = baseDelayMs * 2 ** (attempt - 1);
      await sleep(Math.max(backoff, err.retryAfterMs ?? 0));
    }
  }
}

/** fetch() rejections (DNS, reset, timeout) are transient by nature. */
export function networkFailure(backend: Backend, err: unknown): TransientWriteError {
  return new TransientWriteError(backend, `${backend} request failed: ${errorMessage(err)}`);
}
