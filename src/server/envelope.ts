/**
 * API Envelope
 *
 * Every JSON response has the same shape:
 *   { ok, data?, error?: { code, message, correlationId, recoverable }, meta }
 * and carries an `x-correlation-id` header that also appears in the logs.
 */

import type { Response } from "express";
import { ZodError } from "zod";

import { httpStatusForError, isFillEngineError } from "@/lib/fill/errors";

export type ApiEnvelope<T = unknown> = {
  ok: boolean;
  data?: T;
  error?: {
    code: string;
    message: string;
    correlationId: string;
    recoverable: boolean;
  };
  meta: {
    correlationId: string;
    ts: string;
  };
};

/** Format: {prefix}-{timestamp_base36}-{random_6chars} */
export function makeCorrelationId(prefix: string = "fill"): string {
  return `${prefix}-${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 8)}`;
}

export function correlationIdOf(res: Response): string {
  const id: unknown = res.locals.correlationId;
  return typeof id === "string" ? id : "unknown";
}

export function respond<T>(res: Response, status: number, data: T): void {
  const correlationId = correlationIdOf(res);
  const envelope: ApiEnvelope<T> = {
    ok: true,
    data,
    meta: { correlationId, ts: new Date().toISOString() },
  };
  res.status(status).set("cache-control", "no-store, max-age=0").json(envelope);
}

/** body-parser errors carry their own 4xx status (malformed JSON, body too large). */
function clientErrorStatus(err: unknown): number | null {
  if (!(err instanceof Error) || !("status" in err)) return null;
  const status = err.status;
  return typeof status === "number" && status >= 400 && status < 500 ? status : null;
}

/** Map an error to status + client-safe body. Stack traces never leave the process. */
export function describeError(err: unknown): {
  status: number;
  code: string;
  message: string;
  recoverable: boolean;
} {
  if (err instanceof ZodError) {
    const first = err.issues[0];
    const where = first?.path.length ? `${first.path.join(".")}: ` : "";
    return {
      status: 400,
      code: "INVALID_REQUEST",
      message: `${where}${first?.message ?? "invalid request"}`,
      recoverable: false,
    };
  }
  if (isFillEngineError(err)) {
    return {
      status: httpStatusForError(err),
      code: err.code,
      message: err.message,
      recoverable: err.recoverable,
    };
  }
  const clientStatus = clientErrorStatus(err);
  if (clientStatus !== null && err instanceof Error) {
    return { status: clientStatus, code: "INVALID_REQUEST", message: err.message, recoverable: false };
  }
  return {
    status: 500,
    code: "INTERNAL_ERROR",
    message: "An unexpected error occurred",
    recoverable: false,
  };
}

export function respondError(res: Response, err: unknown): void {
  const correlationId = correlationIdOf(res);
  const { status, code, message, recoverable } = describeError(err);

  if (status >= 500) {
    console.error(`[api/envelope] correlationId=${correlationId} code=${code}`, err);
  }

  const envelope: ApiEnvelope<never> = {
    ok: false,
    error: { code, message, correlationId, recoverable },
    meta: { correlationId, ts: new Date().toISOString() },
  };
  res.status(status).set("cache-control", "no-store, max-age=0").json(envelope);
}
