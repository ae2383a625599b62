/**
 * Shared error handling for upstream generation calls.
 *
 * Provider SDK failures are first captured as UpstreamTimeoutError /
 * UpstreamHTTPError (kept as `cause` for logs) and then surfaced to the
 * pipeline as a GenerationError with a machine-readable reason.
 */

import { GenerationError } from "../../orchestrator/errors.js";
import { log } from "../../utils/telemetry.js";
import type { CallOpts } from "./types.js";

/**
 * Upstream timeout error - the call outlived its per-step timeout
 */
export class UpstreamTimeoutError extends Error {
  readonly name = "UpstreamTimeoutError";

  constructor(
    message: string,
    public readonly provider: string,
    public readonly operation: string,
    public readonly elapsedMs: number,
    public readonly cause?: unknown
  ) {
    super(message);
    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UpstreamTimeoutError);
    }
  }
}

/**
 * Upstream HTTP error - the provider API returned a non-2xx status
 *
 * Captures the HTTP status code, provider-specific error code, and request ID
 * for cross-referencing with provider logs.
 */
export class UpstreamHTTPError extends Error {
  readonly name = "UpstreamHTTPError";

  constructor(
    message: string,
    public readonly provider: string,
    public readonly status: number,
    public readonly code: string | undefined,
    public readonly requestId: string | undefined,
    public readonly elapsedMs: number,
    public readonly cause?: unknown
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UpstreamHTTPError);
    }
  }
}

function stringProp(error: Error, key: "code" | "type" | "request_id"): string | undefined {
  if (key in error) {
    const value: unknown = Reflect.get(error, key);
    return typeof value === "string" ? value : undefined;
  }
  return undefined;
}

interface UpstreamContext {
  provider: string;
  operation: string;
  opts: CallOpts;
  timedOut: boolean;
  elapsedMs: number;
}

/**
 * Map an SDK failure to a GenerationError
 */
export function classifyUpstreamError(error: unknown, ctx: UpstreamContext): GenerationError {
  const { provider, operation, opts, elapsedMs } = ctx;

  if (error instanceof GenerationError) {
    return error;
  }

  if (opts.abortSignal?.aborted) {
    log.warn({ provider, operation, request_id: opts.requestId, elapsed_ms: elapsedMs }, "Generation call cancelled by caller");
    return new GenerationError(`${provider} ${operation} cancelled`, "cancelled", provider, error);
  }

  if (ctx.timedOut) {
    log.error(
      { provider, operation, request_id: opts.requestId, timeout_ms: opts.timeoutMs, elapsed_ms: elapsedMs },
      "Generation call timed out"
    );
    const timeout = new UpstreamTimeoutError(`${provider} ${operation} timed out`, provider, operation, elapsedMs, error);
    return new GenerationError(timeout.message, "timeout", provider, timeout);
  }

  if (error instanceof Error) {
    // SDK API errors carry the HTTP status
    if ("status" in error && typeof error.status === "number") {
      const status = error.status;
      const upstream = new UpstreamHTTPError(
        `${provider} ${operation} failed with status ${status}`,
        provider,
        status,
        stringProp(error, "code") ?? stringProp(error, "type"),
        stringProp(error, "request_id"),
        elapsedMs,
        error
      );
      log.error(
        { provider, operation, status, upstream_code: upstream.code, upstream_request_id: upstream.requestId, elapsed_ms: elapsedMs },
        "Provider API returned non-2xx status"
      );
      return new GenerationError(
        upstream.message,
        status === 429 ? "rate_limited" : "upstream_http",
        provider,
        upstream
      );
    }
  }

  log.error({ provider, operation, elapsed_ms: elapsedMs, error_name: error instanceof Error ? error.name : typeof error }, "Generation call failed");
  return new GenerationError(`${provider} ${operation} transport failure`, "transport", provider, error);
}

/**
 * Run one upstream call under a per-step timeout and the caller's signal.
 *
 * The SDK receives a signal that fires on either; the failure is classified
 * as `cancelled` when the caller aborted and `timeout` when the timer fired.
 */
export async function callUpstream<T>(
  provider: string,
  operation: string,
  opts: CallOpts,
  fn: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  if (opts.abortSignal?.aborted) {
    throw new GenerationError(`${provider} ${operation} cancelled`, "cancelled", provider);
  }

  const abortController = new AbortController();
  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    abortController.abort();
  }, opts.timeoutMs);
  const onCallerAbort = () => abortController.abort();
  opts.abortSignal?.addEventListener("abort", onCallerAbort, { once: true });

  const startTime = Date.now();
  try {
    return await fn(abortController.signal);
  } catch (error) {
    throw classifyUpstreamError(error, {
      provider,
      operation,
      opts,
      timedOut,
      elapsedMs: Date.now() - startTime,
    });
  } finally {
    clearTimeout(timeoutId);
    opts.abortSignal?.removeEventListener("abort", onCallerAbort);
  }
}
