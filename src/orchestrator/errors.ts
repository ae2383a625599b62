/**
 * Review pipeline error taxonomy
 *
 * Only GenerationError and ValidationError are recovered locally (retry with
 * corrective feedback). ConfigurationError and ToolError always propagate.
 */

export type ReviewErrorKind = "configuration" | "generation" | "validation" | "tool";

export interface ReviewErrorJSON {
  kind: ReviewErrorKind;
  message: string;
  details?: Record<string, unknown>;
}

export abstract class ReviewError extends Error {
  abstract readonly kind: ReviewErrorKind;

  /** Structured details safe to show a caller (no stack, no raw provider payloads) */
  abstract details(): Record<string, unknown> | undefined;

  toJSON(): ReviewErrorJSON {
    const details = this.details();
    return {
      kind: this.kind,
      message: this.message,
      ...(details ? { details } : {}),
    };
  }
}

/**
 * Missing or invalid credentials / settings. Raised at startup, never retried.
 */
export class ConfigurationError extends ReviewError {
  readonly name = "ConfigurationError";
  readonly kind = "configuration" as const;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigurationError);
    }
  }

  details(): Record<string, unknown> | undefined {
    return this.context;
  }
}

export type GenerationFailureReason =
  | "timeout"
  | "rate_limited"
  | "upstream_http"
  | "transport"
  | "empty_response"
  | "unparseable_response"
  | "non_object_response"
  | "tool_loop_exceeded"
  | "cancelled";

/**
 * The generation step failed outright: transport, timeout, rate limit, or a
 * response that does not parse into any record shape.
 */
export class GenerationError extends ReviewError {
  readonly name = "GenerationError";
  readonly kind = "generation" as const;

  constructor(
    message: string,
    public readonly reason: GenerationFailureReason,
    public readonly provider: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GenerationError);
    }
  }

  /** Cancellation ends the request; every other reason may be retried. */
  get retryable(): boolean {
    return this.reason !== "cancelled";
  }

  details(): Record<string, unknown> {
    return { reason: this.reason, provider: this.provider };
  }
}

export interface ValidationIssue {
  /** Dotted path of the offending field, e.g. "scores.clarity" */
  field: string;
  /** Human-readable reason, phrased so it can be fed back to the model */
  reason: string;
}

/**
 * A parseable candidate record could not be coerced into the contract.
 */
export class ValidationError extends ReviewError {
  readonly name = "ValidationError";
  readonly kind = "validation" as const;

  constructor(public readonly issues: readonly ValidationIssue[]) {
    super(`Candidate review failed validation: ${issues.map((i) => i.field).join(", ")}`);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ValidationError);
    }
  }

  get fields(): string[] {
    return this.issues.map((i) => i.field);
  }

  details(): Record<string, unknown> {
    return { fields: this.fields, issues: this.issues.map((i) => ({ ...i })) };
  }
}

/**
 * The deterministic scanner threw. It is infallible by construction, so this
 * indicates a defect and is never retried.
 */
export class ToolError extends ReviewError {
  readonly name = "ToolError";
  readonly kind = "tool" as const;

  constructor(
    message: string,
    public readonly tool: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ToolError);
    }
  }

  details(): Record<string, unknown> {
    return { tool: this.tool };
  }
}

export function isReviewError(error: unknown): error is ReviewError {
  return error instanceof ReviewError;
}
