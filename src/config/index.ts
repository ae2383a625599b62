/**
 * Centralized Configuration Module
 *
 * Provides type-safe, validated access to all environment variables.
 * Parsed once on first access and treated as immutable afterwards; the
 * parsed value is threaded into the orchestrator and gateways explicitly.
 */

import { z } from "zod";
import { ConfigurationError } from "../orchestrator/errors.js";
import { clampTimeout, DEFAULT_GENERATION_TIMEOUT_MS, DEFAULT_ROUTE_TIMEOUT_MS } from "./timeouts.js";

/**
 * Optional number that treats empty strings as absent
 */
const optionalNumber = z
  .union([z.string(), z.number(), z.undefined()])
  .transform((val, ctx) => {
    if (val === undefined || val === "") return undefined;
    const n = typeof val === "number" ? val : Number(val.trim());
    if (!Number.isFinite(n)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Expected a number" });
      return z.NEVER;
    }
    return n;
  });

/**
 * Optional secret that treats blank strings as absent
 */
const optionalSecret = z
  .union([z.string(), z.undefined()])
  .transform((val) => {
    const trimmed = val?.trim();
    return trimmed ? trimmed : undefined;
  });

const Environment = z.enum(["development", "test", "production"]);

export const LLMProvider = z.enum(["openai", "anthropic", "fixtures"]);
export type LLMProviderT = z.infer<typeof LLMProvider>;

const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

const ConfigSchema = z.object({
  server: z.object({
    port: z.coerce.number().int().positive().default(3000),
    host: z.string().default("0.0.0.0"),
    nodeEnv: Environment.default("development"),
    logLevel: LogLevel.default("info"),
    bodyLimitBytes: z.coerce.number().int().positive().default(64 * 1024),
  }),

  llm: z.object({
    provider: LLMProvider.default("openai"),
    model: z.string().optional(),
    openaiApiKey: optionalSecret,
    anthropicApiKey: optionalSecret,
    temperature: z.coerce.number().min(0).max(2).default(0),
    seed: optionalNumber.pipe(z.number().int().optional()),
    maxTokens: z.coerce.number().int().positive().default(1200),
    timeoutMs: z.coerce.number().positive().default(DEFAULT_GENERATION_TIMEOUT_MS).transform(clampTimeout),
  }),

  review: z.object({
    maxQuestionChars: z.coerce.number().int().positive().default(4000),
    retryBudget: z.coerce.number().int().min(0).max(5).default(2),
    retryBaseDelayMs: z.coerce.number().int().min(0).default(250),
    maxToolRounds: z.coerce.number().int().min(1).max(10).default(3),
    deadlineMs: z.coerce.number().positive().default(DEFAULT_ROUTE_TIMEOUT_MS).transform(clampTimeout),
  }),

  rateLimits: z.object({
    defaultRpm: z.coerce.number().int().positive().default(60),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Drop empty strings so zod defaults apply to `FOO=` the same as an unset FOO
 */
function envValue(raw: string | undefined): string | undefined {
  return raw === undefined || raw.trim() === "" ? undefined : raw;
}

/**
 * Parse configuration from an environment map
 *
 * @throws ConfigurationError listing each invalid variable
 */
export function parseConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig = {
    server: {
      port: envValue(env.PORT),
      host: envValue(env.HOST),
      nodeEnv: envValue(env.NODE_ENV),
      logLevel: envValue(env.LOG_LEVEL),
      bodyLimitBytes: envValue(env.BODY_LIMIT_BYTES),
    },
    llm: {
      provider: envValue(env.LLM_PROVIDER)?.toLowerCase(),
      model: envValue(env.LLM_MODEL),
      openaiApiKey: env.OPENAI_API_KEY,
      anthropicApiKey: env.ANTHROPIC_API_KEY,
      temperature: envValue(env.LLM_TEMPERATURE),
      seed: envValue(env.LLM_SEED),
      maxTokens: envValue(env.LLM_MAX_TOKENS),
      timeoutMs: envValue(env.LLM_TIMEOUT_MS),
    },
    review: {
      maxQuestionChars: envValue(env.REVIEW_MAX_QUESTION_CHARS),
      retryBudget: envValue(env.REVIEW_RETRY_BUDGET),
      retryBaseDelayMs: envValue(env.REVIEW_RETRY_BASE_DELAY_MS),
      maxToolRounds: envValue(env.REVIEW_MAX_TOOL_ROUNDS),
      deadlineMs: envValue(env.REVIEW_DEADLINE_MS),
    },
    rateLimits: {
      defaultRpm: envValue(env.GLOBAL_RATE_LIMIT_RPM),
    },
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(
      `Invalid configuration. Please check environment variables (${problems.join("; ")})`,
      { issues: problems },
    );
  }
  return result.data;
}

/**
 * Fail fast when the selected provider has no credentials.
 *
 * Runs at startup (server build, CLI launch), never per request.
 */
export function assertProviderCredentials(cfg: Config): void {
  if (cfg.llm.provider === "openai" && !cfg.llm.openaiApiKey) {
    throw new ConfigurationError("LLM_PROVIDER=openai but OPENAI_API_KEY is not set", {
      provider: "openai",
    });
  }
  if (cfg.llm.provider === "anthropic" && !cfg.llm.anthropicApiKey) {
    throw new ConfigurationError("LLM_PROVIDER=anthropic but ANTHROPIC_API_KEY is not set", {
      provider: "anthropic",
    });
  }
}

/**
 * Lazily parsed, cached configuration.
 *
 * Defers parsing until first call so tests can stub environment
 * variables before the config is read.
 */
let _cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (_cachedConfig === null) {
    _cachedConfig = parseConfig();
  }
  return _cachedConfig;
}

/**
 * Reset cached configuration (for testing only)
 *
 * @internal
 */
export function _resetConfigCache(): void {
  _cachedConfig = null;
}
