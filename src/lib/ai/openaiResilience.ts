/**
 * OpenAI Resilience Layer: Trace IDs + Retry + Circuit Breaker
 *
 * Every model call made by the fill engine (placeholder classification,
 * answer interpretation) goes through `withOpenAIResilience`.
 *
 * Invariants:
 * - Every attempt carries a fresh attemptId; the traceId is stable per operation
 * - Retry: bounded backoff [250, 500, 1000, 2000, 4000] ms with ±20% jitter
 * - Circuit breaker: per-instance, opens after 10 consecutive retryable failures, 45s cooldown
 * - SDK retry disabled; this loop owns retries
 * - Timeouts are never retried here: the caller's deadline already elapsed
 */

import crypto from "node:crypto";

import { ModelTimeoutError, ModelUnavailableError } from "@/lib/fill/errors";

// ─── Constants ───────────────────────────────────────────────────────────────

const BACKOFF_SCHEDULE_MS = [250, 500, 1000, 2000, 4000];
const JITTER_FACTOR = 0.2; // ±20%
const DEFAULT_MAX_RETRIES = 2;

const RETRYABLE_STATUSES = new Set([500, 502, 503, 504]);

const NETWORK_ERROR_PATTERNS = [
  "econnreset",
  "econnrefused",
  "etimedout",
  "timed out",
  "socket hang up",
  "network",
  "fetch failed",
];

// ─── Trace IDs ───────────────────────────────────────────────────────────────

export type TraceIds = {
  /** Stable per logical operation; same across retries. */
  traceId: string;
  /** Fresh per attempt. */
  attemptId: string;
};

// ─── Error Classification ────────────────────────────────────────────────────

function errorField(err: unknown, key: string): unknown {
  if (typeof err !== "object" || err === null) return undefined;
  return key in err ? Reflect.get(err, key) : undefined;
}

export function errorStatus(err: unknown): number | null {
  const status = errorField(err, "status") ?? errorField(err, "statusCode");
  return typeof status === "number" ? status : null;
}

/**
 * Retryable: 500, 502, 503, 504, network errors (no status).
 * Non-retryable: 4xx, schema errors, our own timeouts.
 */
export function isRetryableOpenAIError(err: unknown): boolean {
  if (!err || err instanceof ModelTimeoutError) return false;

  const status = errorStatus(err);
  if (status !== null) return RETRYABLE_STATUSES.has(status);

  const message = errorField(err, "message") ?? errorField(err, "code") ?? "";
  const msg = String(message).toLowerCase();
  return NETWORK_ERROR_PATTERNS.some((p) => msg.includes(p));
}

// ─── Circuit Breaker (per-instance) ──────────────────────────────────────────

export type BreakerState = "closed" | "open" | "half-open";

export class OpenAICircuitBreaker {
  private consecutiveFailures = 0;
  private openUntil = 0;
  private readonly threshold: number;
  private readonly cooldownMs: number;

  constructor(threshold = 10, cooldownMs = 45_000) {
    this.threshold = threshold;
    this.cooldownMs = cooldownMs;
  }

  get state(): BreakerState {
    if (Date.now() < this.openUntil) return "open";
    if (this.consecutiveFailures >= this.threshold) return "half-open";
    return "closed";
  }

  /**
   * Throws ModelUnavailableError while open.
   * Half-open lets one probe request through.
   */
  check(): void {
    if (this.state === "open") {
      const remainingSec = Math.ceil((this.openUntil - Date.now()) / 1000);
      throw new ModelUnavailableError(`OpenAI circuit breaker OPEN: ${remainingSec}s remaining`);
    }
  }

  recordSuccess(): void {
    this.consecutiveFailures = 0;
    this.openUntil = 0;
  }

  recordFailure(): void {
    this.consecutiveFailures++;
    if (this.consecutiveFailures >= this.threshold && this.state !== "open") {
      this.openUntil = Date.now() + this.cooldownMs;
      console.error(
        `[OpenAI] Circuit breaker OPENED after ${this.consecutiveFailures} consecutive failures. Cooldown: ${this.cooldownMs}ms.`,
      );
    }
  }

  /** Reset for testing. */
  _reset(): void {
    this.consecutiveFailures = 0;
    this.openUntil = 0;
  }
}

/** Per-instance singleton breaker for all OpenAI calls. */
export const openAICircuitBreaker = new OpenAICircuitBreaker();

/** Per-request headers: X-Client-Request-Id per attempt, X-Fill-Trace-Id per operation. */
export function traceHeaders(ids: TraceIds): Record<string, string> {
  return {
    "X-Client-Request-Id": ids.attemptId,
    "X-Fill-Trace-Id": ids.traceId,
  };
}

// ─── Timeout ─────────────────────────────────────────────────────────────────

/**
 * Race `fn` against a deadline. The AbortSignal is fired on expiry so the
 * underlying request is cancelled instead of finishing in the background.
 */
export async function withTimeout<T>(
  tag: string,
  ms: number,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new ModelTimeoutError(tag, ms));
    }, ms);
  });

  try {
    return await Promise.race([fn(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

// ─── Retry Wrapper ───────────────────────────────────────────────────────────

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export type ResilienceOptions = {
  maxRetries?: number;
  breaker?: OpenAICircuitBreaker;
  /** Test hook; defaults to real backoff sleeps. */
  sleep?: (ms: number) => Promise<void>;
};

/**
 * - Generates a stable traceId once per call
 * - Each attempt: fresh attemptId, check breaker, call fn, record outcome
 * - Retries only on isRetryableOpenAIError with bounded backoff + jitter
 * - Exhausted retryable failures surface as ModelUnavailableError
 */
export async function withOpenAIResilience<T>(
  tag: string,
  fn: (ids: TraceIds) => Promise<T>,
  opts?: ResilienceOptions,
): Promise<T> {
  const maxRetries = opts?.maxRetries ?? DEFAULT_MAX_RETRIES;
  const breaker = opts?.breaker ?? openAICircuitBreaker;
  const pause = opts?.sleep ?? sleep;
  const traceId = crypto.randomUUID();

  for (let attempt = 0; ; attempt++) {
    const attemptId = crypto.randomUUID();

    // Breaker open → propagate immediately, no retry
    breaker.check();

    try {
      const result = await fn({ traceId, attemptId });
      breaker.recordSuccess();
      return result;
    } catch (err) {
      const retryable = isRetryableOpenAIError(err);
      const status = errorStatus(err) ?? "N/A";

      if (!retryable || attempt >= maxRetries) {
        if (retryable) breaker.recordFailure();

        console.error(`[OpenAI] ${tag} FAILED (attempt ${attempt + 1}/${maxRetries + 1})`, {
          status,
          message: err instanceof Error ? err.message : String(err),
          traceId,
          attemptId,
          breakerState: breaker.state,
          retryable,
        });

        if (retryable) {
          throw new ModelUnavailableError(`${tag} failed after ${attempt + 1} attempts`, err);
        }
        throw err;
      }

      breaker.recordFailure();

      const scheduleIdx = Math.min(attempt, BACKOFF_SCHEDULE_MS.length - 1);
      const baseMs = BACKOFF_SCHEDULE_MS[scheduleIdx] ?? 250;
      const jitter = baseMs * JITTER_FACTOR * (2 * Math.random() - 1);
      const delayMs = Math.max(0, Math.round(baseMs + jitter));

      console.warn(
        `[OpenAI] ${tag} attempt ${attempt + 1}/${maxRetries + 1} failed (${status}), retrying in ${delayMs}ms`,
        { traceId, attemptId, breakerState: breaker.state },
      );

      await pause(delayMs);
    }
  }
}
