/**
 * Review Orchestrator
 *
 * Drives one review request through
 *
 *   INIT → SCAN → GENERATE → VALIDATE → MERGE → DONE
 *
 * with a RETRY edge from GENERATE/VALIDATE failures back to GENERATE and a
 * terminal FAILED state. One instance per request: `run()` may be called once.
 *
 * The scan result is retained whatever happens later, so the final flags are
 * always a superset of the deterministic findings. No partially valid record
 * is ever returned.
 */

import type { Config } from "../config/index.js";
import type {
  CallOpts,
  GenerationGateway,
  GenerationSettings,
  TranscriptEntry,
} from "../adapters/llm/types.js";
import {
  QuestionReviewSchema,
  type GenerationOverridesT,
  type PIIFlag,
  type QuestionReview,
} from "../schemas/review.js";
import { mergeFlags } from "../services/flag-merger.js";
import { validateCandidate } from "../validators/review-validator.js";
import { scanForPII } from "../utils/pii-scanner.js";
import { generateRequestId } from "../utils/request-id.js";
import { calculateBackoffDelay, DEFAULT_RETRY_CONFIG, sleep as defaultSleep } from "../utils/retry.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";
import { GenerationError, ToolError, ValidationError, isReviewError } from "./errors.js";
import { assembleInstructions, formatGenerationFeedback, formatValidationFeedback } from "./prompt-assembly.js";
import { dispatchTool, type Scanner } from "./tools/dispatch.js";
import { getToolDefinitions } from "./tools/registry.js";

// ============================================================================
// Types
// ============================================================================

export type ReviewState = "INIT" | "SCAN" | "GENERATE" | "VALIDATE" | "MERGE" | "DONE" | "RETRY" | "FAILED";

export interface ReviewPolicy {
  /** Attempts beyond the first */
  retryBudget: number;
  retryBaseDelayMs: number;
  /** Tool rounds allowed within one generation attempt */
  maxToolRounds: number;
  /** Timeout for each generation step */
  stepTimeoutMs: number;
}

export interface ReviewOrchestratorDeps {
  gateway: GenerationGateway;
  settings: GenerationSettings;
  policy: ReviewPolicy;
  scanner?: Scanner;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
}

export interface RunOptions {
  requestId?: string;
  signal?: AbortSignal;
}

type Candidate = Record<string, unknown>;

// ============================================================================
// Config helpers
// ============================================================================

export function reviewPolicyFromConfig(cfg: Config): ReviewPolicy {
  return {
    retryBudget: cfg.review.retryBudget,
    retryBaseDelayMs: cfg.review.retryBaseDelayMs,
    maxToolRounds: cfg.review.maxToolRounds,
    stepTimeoutMs: cfg.llm.timeoutMs,
  };
}

export function generationSettingsFromConfig(
  cfg: Config,
  overrides: GenerationOverridesT = {}
): GenerationSettings {
  const seed = overrides.seed ?? cfg.llm.seed;
  return {
    temperature: overrides.temperature ?? cfg.llm.temperature,
    maxTokens: cfg.llm.maxTokens,
    ...(seed !== undefined ? { seed } : {}),
  };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

// ============================================================================
// Orchestrator
// ============================================================================

export class ReviewOrchestrator {
  private readonly gateway: GenerationGateway;
  private readonly settings: GenerationSettings;
  private readonly policy: ReviewPolicy;
  private readonly scanner: Scanner;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly random: () => number;

  private currentState: ReviewState = "INIT";
  private readonly stateHistory: ReviewState[] = ["INIT"];
  private scanned: PIIFlag[] = [];
  private attemptCount = 0;
  private started = false;

  constructor(deps: ReviewOrchestratorDeps) {
    this.gateway = deps.gateway;
    this.settings = deps.settings;
    this.policy = deps.policy;
    this.scanner = deps.scanner ?? scanForPII;
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
  }

  get state(): ReviewState {
    return this.currentState;
  }

  /** Every state entered, in order, starting with INIT */
  get history(): readonly ReviewState[] {
    return [...this.stateHistory];
  }

  /** Generation attempts made so far */
  get attempts(): number {
    return this.attemptCount;
  }

  /** Deterministic scan findings for the question */
  get localFlags(): readonly PIIFlag[] {
    return [...this.scanned];
  }

  /**
   * Review `question` end to end.
   *
   * @throws GenerationError | ValidationError after the retry budget is spent
   * @throws ToolError when the scanner fails
   */
  async run(question: string, opts: RunOptions = {}): Promise<QuestionReview> {
    if (this.started) {
      throw new Error("ReviewOrchestrator.run() may only be called once per instance");
    }
    this.started = true;

    const requestId = opts.requestId ?? generateRequestId();
    const { signal } = opts;
    const startTime = Date.now();
    const maxAttempts = this.policy.retryBudget + 1;

    emit(TelemetryEvents.ReviewRequested, {
      request_id: requestId,
      question_chars: question.length,
      provider: this.gateway.name,
      model: this.gateway.model,
    });

    this.transition("SCAN");
    try {
      this.scanned = this.scanner(question);
    } catch (error) {
      return this.fail(new ToolError("PII scan failed", "pii_scan", error), requestId);
    }

    const corrections: string[] = [];
    let lastError: GenerationError | ValidationError | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (signal?.aborted) {
        return this.fail(this.cancelled(), requestId);
      }

      this.attemptCount = attempt;
      this.transition("GENERATE");

      let candidate: Candidate;
      try {
        candidate = await this.generate(question, assembleInstructions(corrections), { requestId, signal });
      } catch (error) {
        if (signal?.aborted) {
          return this.fail(this.cancelled(error), requestId);
        }
        if (!(error instanceof GenerationError) || !error.retryable) {
          return this.fail(error, requestId);
        }

        lastError = error;
        corrections.push(formatGenerationFeedback(error));
        emit(TelemetryEvents.ReviewAttemptFailed, {
          request_id: requestId,
          attempt,
          kind: error.kind,
          reason: error.reason,
        });

        if (attempt < maxAttempts) {
          this.transition("RETRY");
          const delayMs = calculateBackoffDelay(
            attempt,
            { ...DEFAULT_RETRY_CONFIG, baseDelayMs: this.policy.retryBaseDelayMs },
            this.random
          );
          emit(TelemetryEvents.ReviewRetry, { request_id: requestId, next_attempt: attempt + 1, delay_ms: delayMs });
          await this.sleep(delayMs, signal);
        }
        continue;
      }

      this.transition("VALIDATE");
      const result = validateCandidate(candidate, question);
      if (!result.success) {
        lastError = result.error;
        corrections.push(formatValidationFeedback(result.error));
        emit(TelemetryEvents.ReviewAttemptFailed, {
          request_id: requestId,
          attempt,
          kind: result.error.kind,
          fields: result.error.fields,
        });

        if (attempt < maxAttempts) {
          this.transition("RETRY");
          emit(TelemetryEvents.ReviewRetry, { request_id: requestId, next_attempt: attempt + 1, delay_ms: 0 });
        }
        continue;
      }

      if (result.repairs.length > 0) {
        log.debug({ request_id: requestId, attempt, repairs: result.repairs }, "Candidate review repaired");
      }

      this.transition("MERGE");
      const review: QuestionReview = {
        ...result.data,
        flags: mergeFlags(result.data.flags, this.scanned),
      };

      const checked = QuestionReviewSchema.safeParse(review);
      if (!checked.success) {
        return this.fail(
          new ValidationError(
            checked.error.issues.map((issue) => ({ field: issue.path.join(".") || "record", reason: issue.message }))
          ),
          requestId
        );
      }

      this.transition("DONE");
      emit(TelemetryEvents.ReviewSucceeded, {
        request_id: requestId,
        attempts: attempt,
        flags: review.flags,
        elapsed_ms: Date.now() - startTime,
      });
      return deepFreeze(review);
    }

    return this.fail(
      lastError ?? new GenerationError("No generation attempt was made", "transport", this.gateway.name),
      requestId
    );
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private transition(next: ReviewState): void {
    this.currentState = next;
    this.stateHistory.push(next);
  }

  private cancelled(cause?: unknown): GenerationError {
    if (cause instanceof GenerationError && cause.reason === "cancelled") {
      return cause;
    }
    return new GenerationError("Review cancelled", "cancelled", this.gateway.name, cause);
  }

  private fail(error: unknown, requestId: string): never {
    this.transition("FAILED");
    emit(TelemetryEvents.ReviewFailed, {
      request_id: requestId,
      attempts: this.attemptCount,
      kind: isReviewError(error) ? error.kind : "internal",
      ...(error instanceof GenerationError ? { reason: error.reason } : {}),
    });
    throw error;
  }

  /**
   * One generation attempt: step the gateway, dispatching tool calls between
   * steps, until it returns a final candidate.
   */
  private async generate(
    question: string,
    instructions: string,
    ctx: { requestId: string; signal?: AbortSignal }
  ): Promise<Candidate> {
    const transcript: TranscriptEntry[] = [{ role: "user", content: question }];
    const callOpts: CallOpts = {
      requestId: ctx.requestId,
      timeoutMs: this.policy.stepTimeoutMs,
      ...(ctx.signal ? { abortSignal: ctx.signal } : {}),
    };

    for (let round = 0; ; round++) {
      const turn = await this.gateway.step(
        { instructions, transcript: [...transcript], tools: getToolDefinitions(), settings: this.settings },
        callOpts
      );

      if (turn.kind === "final") {
        return turn.candidate;
      }

      if (round >= this.policy.maxToolRounds) {
        throw new GenerationError(
          `Generation requested tools for more than ${this.policy.maxToolRounds} rounds`,
          "tool_loop_exceeded",
          this.gateway.name
        );
      }

      transcript.push({ role: "assistant", tool_calls: turn.calls });
      for (const call of turn.calls) {
        const { output } = dispatchTool(call, this.scanner);
        emit(TelemetryEvents.ToolInvoked, {
          request_id: ctx.requestId,
          tool: call.name,
          ok: output.ok,
          round: round + 1,
        });
        transcript.push({ role: "tool", tool_call_id: call.id, name: call.name, content: JSON.stringify(output) });
      }
    }
  }
}
