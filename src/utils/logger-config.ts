/**
 * Centralized Logger Configuration
 *
 * Single source of truth for Pino logger redaction paths.
 * Used by both server.ts (Fastify) and telemetry.ts (standalone Pino).
 *
 * SECURITY: The reviewed question may itself carry PII (that is what the
 * scanner looks for), so question text is redacted alongside secrets.
 * Log its length and the resulting flags instead.
 */

import type { LoggerOptions } from "pino";

/**
 * Paths to redact from all log output.
 * Uses Pino's path syntax with wildcards.
 */
export const REDACT_PATHS = [
  // Auth secrets (at any depth)
  "*.secret",
  "*.token",
  "*.apiKey",
  "*.api_key",
  "*.authorization",
  "*.credentials",

  // Provider credentials carried in config snapshots
  "*.openaiApiKey",
  "*.anthropicApiKey",

  // Common header names - authentication
  "*.headers.authorization",
  '*.headers["x-api-key"]',
  "*.headers.cookie",

  // PII fields
  "*.email",
  "*.phone",
  "*.question",
  "*.original_question",
] as const;

/**
 * Redaction censor string
 */
export const REDACT_CENSOR = "[REDACTED]";

export function createRedactConfig() {
  return {
    paths: [...REDACT_PATHS],
    censor: REDACT_CENSOR,
  };
}

/**
 * Create full Pino logger options
 */
export function createLoggerConfig(level: string): LoggerOptions {
  return {
    level,
    redact: createRedactConfig(),
  };
}
