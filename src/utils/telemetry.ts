import { env } from "node:process";
import pino from "pino";
import { createLoggerConfig } from "./logger-config.js";

/**
 * Pino logger with secret/PII redaction
 *
 * Redaction paths centralized in src/utils/logger-config.ts so the Fastify
 * logger and this standalone logger stay in sync. Writes to stderr so the
 * CLI's stdout carries only the review document.
 */
export const log = pino(createLoggerConfig(env.LOG_LEVEL || "info"), pino.destination(2));

type TelemetrySink = (eventName: string, data: Record<string, unknown>) => void;

/**
 * Test sink for capturing telemetry events in tests
 * Only used when NODE_ENV=test or VITEST=true
 */
let testSink: TelemetrySink | null = null;

export function setTestSink(sink: TelemetrySink | null): void {
  // Direct env check avoids a circular import with the config module
  const isTestEnv = env.NODE_ENV === "test" || Boolean(env.VITEST);
  if (!isTestEnv) {
    throw new Error("setTestSink() can only be used in test environment");
  }
  testSink = sink;
}

/**
 * Frozen telemetry event names
 * DO NOT modify these names without updating dashboards
 */
export const TelemetryEvents = {
  // Review lifecycle
  ReviewRequested: "review.requested",
  ReviewSucceeded: "review.succeeded",
  ReviewFailed: "review.failed",

  // Attempt-level events
  ReviewAttemptFailed: "review.attempt_failed",
  ReviewRetry: "review.retry",

  // Tool calls made by the generation step
  ToolInvoked: "review.tool_invoked",

  // Upstream generation
  GenerationStepCompleted: "llm.generation.step_completed",
  JsonExtractionRequired: "llm.json_extraction.required",
} as const;

export type TelemetryEventName = (typeof TelemetryEvents)[keyof typeof TelemetryEvents];

/**
 * Emit a telemetry event
 *
 * Events are structured debug log lines tagged with `event`; a registered
 * test sink receives them as well.
 */
export function emit(event: TelemetryEventName, data: Record<string, unknown>): void {
  log.debug({ event, ...data }, event);
  if (testSink) {
    testSink(event, data);
  }
}
