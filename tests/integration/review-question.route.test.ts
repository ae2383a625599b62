import { describe, it, expect, beforeAll, afterAll, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";
import { build } from "../../src/server.js";
import { parseConfig } from "../../src/config/index.js";
import { resetGatewayCache } from "../../src/adapters/llm/router.js";
import { ConfigurationError, GenerationError } from "../../src/orchestrator/errors.js";
import { SERVICE_VERSION } from "../../src/version.js";
import { ScriptedGateway, final, validCandidate, type ScriptedStep } from "../helpers/scripted-gateway.js";

const BASE_ENV = { LLM_PROVIDER: "fixtures", LOG_LEVEL: "silent", NODE_ENV: "test" };

async function buildApp(env: Record<string, string> = {}, steps?: ScriptedStep[]): Promise<FastifyInstance> {
  const config = parseConfig({ ...BASE_ENV, ...env });
  const app = await build(steps ? { config, gatewayFor: () => new ScriptedGateway(steps) } : { config });
  await app.ready();
  return app;
}

describe("POST /assist/v1/review-question", () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = await buildApp();
  });

  afterAll(async () => {
    await app.close();
    resetGatewayCache();
  });

  it("returns a review from the fixtures provider", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/assist/v1/review-question",
      payload: { question: "  Fix this SQL?  " },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      original_question: "Fix this SQL?",
      classification: { domain: "coding", type: "debug" },
      scores: { clarity: 6, specificity: 4, answerability: 5, safety: 10 },
      missing_info: [
        "The exact SQL query text",
        "Which database engine and version is in use",
        "The full error message or the unexpected behaviour observed",
        "The expected result",
      ],
      assumptions: [
        "The query runs against a relational database",
        "Something that used to work, or should work, is failing",
      ],
      followups: [
        "Can you paste the full query?",
        "Which database engine are you using?",
        "What error or output do you see?",
        "What did you expect to happen instead?",
      ],
      rewrites: {
        minimal: "Fix this SQL?",
        ideal:
          "Fix this SQL? Details: the exact SQL query text; which database engine and version is in use; the full error message or the unexpected behaviour observed.",
      },
      flags: [],
    });
  });

  it("always reports PII found by the scanner", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/assist/v1/review-question",
      payload: { question: "My card 4111 1111 1111 1111 was charged twice, how do I get a refund?" },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json().flags).toEqual(["card-ish"]);
    expect(res.json().rewrites.minimal).toBe("My card [card-ish] was charged twice, how do I get a refund?");
  });

  it("accepts a model override", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/assist/v1/review-question",
      payload: { question: "Fix this SQL?", options: { model: "fixtures-alt", temperature: 0.2, seed: 1 } },
    });
    expect(res.statusCode).toBe(200);
  });

  it("echoes a caller-supplied request id", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/assist/v1/review-question",
      headers: { "x-request-id": "trace-abc" },
      payload: { question: "Fix this SQL?" },
    });
    expect(res.headers["x-request-id"]).toBe("trace-abc");
  });

  it("rejects an empty question", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/assist/v1/review-question",
      headers: { "x-request-id": "trace-empty" },
      payload: { question: "   " },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({
      schema: "error.v1",
      code: "BAD_INPUT",
      message: "Validation failed",
      request_id: "trace-empty",
    });
  });

  it("rejects unknown fields, including a provider switch", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/assist/v1/review-question",
      payload: { question: "Fix this SQL?", options: { provider: "openai" } },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().code).toBe("BAD_INPUT");
  });

  it("rejects malformed JSON", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/assist/v1/review-question",
      headers: { "content-type": "application/json" },
      payload: "{not json",
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().code).toBe("BAD_INPUT");
  });
});

describe("GET /healthz", () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = await buildApp();
  });

  afterAll(async () => {
    await app.close();
  });

  it("reports service, version, provider and model", async () => {
    const res = await app.inject({ method: "GET", url: "/healthz" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      ok: true,
      service: "question-review-service",
      version: SERVICE_VERSION,
      provider: "fixtures",
      model: "fixtures-v1",
    });
    expect(typeof res.headers["x-request-id"]).toBe("string");
  });
});

describe("error responses", () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  it("maps an exhausted generation budget to 502", async () => {
    app = await buildApp({ REVIEW_RETRY_BUDGET: "0" }, [
      new GenerationError("scripted review_step timed out", "timeout", "scripted"),
    ]);

    const res = await app.inject({
      method: "POST",
      url: "/assist/v1/review-question",
      headers: { "x-request-id": "trace-502" },
      payload: { question: "Fix this SQL?" },
    });

    expect(res.statusCode).toBe(502);
    expect(res.json()).toEqual({
      schema: "error.v1",
      code: "GENERATION_FAILED",
      message: "scripted review_step timed out",
      details: { kind: "generation", reason: "timeout", provider: "scripted" },
      request_id: "trace-502",
    });
  });

  it("maps a record that never validates to 502", async () => {
    app = await buildApp({ REVIEW_RETRY_BUDGET: "1" }, [
      final(validCandidate({ scores: "great" })),
      final(validCandidate({ scores: "great" })),
    ]);

    const res = await app.inject({
      method: "POST",
      url: "/assist/v1/review-question",
      payload: { question: "Fix this SQL?" },
    });

    expect(res.statusCode).toBe(502);
    expect(res.json()).toMatchObject({
      code: "VALIDATION_FAILED",
      details: { kind: "validation", fields: ["scores"] },
    });
  });

  it("rejects bodies over the size limit", async () => {
    app = await buildApp({ BODY_LIMIT_BYTES: "100" });

    const res = await app.inject({
      method: "POST",
      url: "/assist/v1/review-question",
      payload: { question: "x ".repeat(100) },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ code: "BAD_INPUT", message: "Request body too large" });
  });

  it("rate limits per client", async () => {
    app = await buildApp({ GLOBAL_RATE_LIMIT_RPM: "2" });

    const first = await app.inject({ method: "GET", url: "/healthz" });
    const second = await app.inject({ method: "GET", url: "/healthz" });
    const third = await app.inject({ method: "GET", url: "/healthz" });

    expect(first.statusCode).toBe(200);
    expect(second.statusCode).toBe(200);
    expect(third.statusCode).toBe(429);
    expect(third.json().code).toBe("RATE_LIMITED");
    expect(third.json().details.retry_after_seconds).toBeGreaterThan(0);
  });

  it("refuses to start without provider credentials", async () => {
    await expect(build({ config: parseConfig({ LLM_PROVIDER: "openai" }) })).rejects.toBeInstanceOf(
      ConfigurationError
    );
  });
});
