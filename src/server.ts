import Fastify, { type FastifyInstance } from "fastify";
import rateLimit from "@fastify/rate-limit";
import { config as loadDotenv } from "dotenv";
import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { assertProviderCredentials, getConfig, type Config } from "./config/index.js";
import { resolveModel } from "./adapters/llm/router.js";
import { defaultGatewayFactory, type GatewayFactory } from "./services/review-service.js";
import reviewQuestionRoute from "./routes/assist.v1.review-question.js";
import healthzRoute from "./routes/healthz.js";
import { RateLimitExceededError, getStatusCodeForErrorCode, toErrorV1 } from "./utils/errors.js";
import { createLoggerConfig } from "./utils/logger-config.js";
import { REQUEST_ID_HEADER, resolveRequestId } from "./utils/request-id.js";
import { SERVICE_NAME, SERVICE_VERSION } from "./version.js";

export interface BuildOptions {
  /** Defaults to the environment configuration */
  config?: Config;
  /** Defaults to the provider router; tests inject scripted gateways */
  gatewayFor?: GatewayFactory;
}

export async function build(options: BuildOptions = {}): Promise<FastifyInstance> {
  const cfg = options.config ?? getConfig();

  // Fail-fast: missing credentials are a startup failure, never a per-request one
  assertProviderCredentials(cfg);

  const gatewayFor = options.gatewayFor ?? defaultGatewayFactory(cfg);

  const app = Fastify({
    logger: createLoggerConfig(cfg.server.logLevel),
    bodyLimit: cfg.server.bodyLimitBytes,
    // Request ID from a safe X-Request-Id header, else a fresh UUID
    requestIdHeader: false,
    genReqId: (req) => resolveRequestId(req.headers),
  });

  // Centralized error handler: structured error.v1 responses with request_id.
  // Set before routes are registered so every plugin context inherits it.
  app.setErrorHandler((error, request, reply) => {
    const errorV1 = toErrorV1(error, request.id);
    const statusCode = getStatusCodeForErrorCode(errorV1.code);

    // Log errors with context (redaction handled by logger)
    if (statusCode >= 500) {
      app.log.error({
        error,
        request_id: errorV1.request_id,
        method: request.method,
        url: request.url,
      }, `[${errorV1.code}] ${errorV1.message}`);
    } else {
      app.log.warn({
        request_id: errorV1.request_id,
        code: errorV1.code,
        method: request.method,
        url: request.url,
      }, `[${errorV1.code}] ${errorV1.message}`);
    }

    return reply.status(statusCode).send(errorV1);
  });

  // Rate limiting: per-IP, global
  await app.register(rateLimit, {
    global: true,
    max: cfg.rateLimits.defaultRpm,
    timeWindow: "1 minute",
    errorResponseBuilder: (req, context) => {
      const retryAfter = Math.max(1, Math.ceil(context.ttl / 1000));
      app.log.warn({
        event: "rate_limit_hit",
        max: context.max,
        request_id: req.id,
      }, "Rate limit exceeded");

      // Thrown by the plugin, so it is rendered by the central error handler
      return new RateLimitExceededError(retryAfter);
    },
  });

  // Response hook: Add X-Request-Id header to every response
  app.addHook("onSend", async (request, reply, payload) => {
    reply.header(REQUEST_ID_HEADER, request.id);
    return payload;
  });

  await app.register(healthzRoute, { config: cfg });
  await app.register(reviewQuestionRoute, { config: cfg, gatewayFor });

  return app;
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

// If running directly (not imported), start the server
if (isMainModule()) {
  loadDotenv();

  build()
    .then(async (app) => {
      const cfg = getConfig();

      // Boot summary: Log configuration before starting server
      app.log.info({
        service: SERVICE_NAME,
        version: SERVICE_VERSION,
        provider: cfg.llm.provider,
        model: resolveModel(cfg),
        global_rate_limit_rpm: cfg.rateLimits.defaultRpm,
        body_limit_bytes: cfg.server.bodyLimitBytes,
        retry_budget: cfg.review.retryBudget,
        request_deadline_ms: cfg.review.deadlineMs,
      }, "Question review service starting");

      await app.listen({ port: cfg.server.port, host: cfg.server.host });
    })
    .catch((err: unknown) => {
      console.error("Failed to start server:", err);
      process.exit(1);
    });
}
