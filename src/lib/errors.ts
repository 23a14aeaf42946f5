import type { Backend } from "@/lib/sync/types";

export type SyncErrorKind =
  | "AUTH"
  | "RATE_LIMITED"
  | "TRANSIENT"
  | "REJECTED"
  | "CONTRACT";

export class SyncError extends Error {
  constructor(
    readonly kind: SyncErrorKind,
    message: string,
    readonly backend?: Backend
  ) {
    super(message);
    this.name = "SyncError";
  }
}

/** Credential missing, expired or revoked. Aborts the pass. */
export class AuthError extends SyncError {
  constructor(backend: Backend, message = `${backend} credentials rejected`) {
    super("AUTH", message, backend);
    this.name = "AuthError";
  }
}

export class RateLimitExceeded extends SyncError {
  constructor(
    backend: Backend,
    readonly retryAfterMs: number,
    message = `${backend} rate limit exceeded, retry in ${Math.ceil(retryAfterMs)}ms`
  ) {
    super("RATE_LIMITED", message, backend);
    this.name = "RateLimitExceeded";
  }
}

export class TransientWriteError extends SyncError {
  constructor(
    backend: Backend,
    message: string,
    readonly retryAfterMs?: number
  ) {
    super("TRANSIENT", message, backend);
    this.name = "TransientWriteError";
  }
}

/** The backend refused the request as invalid; retrying will not help. */
export class RequestRejected extends SyncError {
  constructor(
    backend: Backend,
    message: string,
    readonly status?: number
  ) {
    super("REJECTED", message, backend);
    this.name = "RequestRejected";
  }
}

/** A capability returned data that breaks its contract. Aborts the pass. */
export class CapabilityContractError extends SyncError {
  constructor(backend: Backend, message: string) {
    super("CONTRACT", message, backend);
    this.name = "CapabilityContractError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isFatal(err: unknown): boolean {
  return err instanceof AuthError || err instanceof CapabilityContractError;
}
