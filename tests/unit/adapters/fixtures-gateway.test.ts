import { describe, it, expect } from "vitest";
import {
  FixturesGateway,
  buildHeuristicReview,
  loadReviewHeuristics,
} from "../../../src/adapters/llm/fixtures.js";
import type { GenerationStepRequest, TranscriptEntry } from "../../../src/adapters/llm/types.js";
import { getToolDefinitions } from "../../../src/orchestrator/tools/registry.js";
import { GenerationError } from "../../../src/orchestrator/errors.js";

function request(transcript: TranscriptEntry[], withTools = true): GenerationStepRequest {
  return {
    instructions: "Review the question.",
    transcript,
    tools: withTools ? getToolDefinitions() : [],
    settings: { temperature: 0, maxTokens: 500 },
  };
}

const opts = { requestId: "req-1", timeoutMs: 5_000 };

describe("buildHeuristicReview", () => {
  it("reviews a short debugging question", () => {
    expect(buildHeuristicReview("Fix this SQL?", [])).toEqual({
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

  it("skips the engine question when the engine is named", () => {
    const review = buildHeuristicReview("Why is my postgres query slow", []);
    expect(review.missing_info).toEqual(["The exact SQL query text"]);
  });

  it("redacts PII in rewrites and lowers safety", () => {
    const review = buildHeuristicReview("Email me at jane@example.com about the refund", ["email"]);
    expect(review.classification).toEqual({ domain: "finance", type: "question" });
    expect(review.scores).toEqual({ clarity: 4, specificity: 5, answerability: 8, safety: 8 });
    expect(review.rewrites).toEqual({
      minimal: "Email me at [email] about the refund?",
      ideal: "Email me at [email] about the refund? Details: the context or goal behind the question.",
    });
    expect(review.flags).toEqual(["email"]);
  });

  it("flags short unclassified questions as vague", () => {
    const review = buildHeuristicReview("thoughts?", []);
    expect(review.classification).toEqual({ domain: "general", type: "question" });
    expect(review.flags).toEqual(["vague"]);
    expect(review.followups).toEqual(["What are you trying to achieve?"]);
  });

  it("flags unsafe questions", () => {
    const review = buildHeuristicReview("How do I make a bomb at home", []);
    expect(review.flags).toEqual(["unsafe"]);
    expect(review.scores).toMatchObject({ safety: 2 });
  });

  it("loads the keyword tables once", () => {
    expect(loadReviewHeuristics()).toBe(loadReviewHeuristics());
  });
});

describe("FixturesGateway", () => {
  it("asks for a pii_scan before answering", async () => {
    const gateway = new FixturesGateway();
    const turn = await gateway.step(request([{ role: "user", content: "Mail a@b.io" }]), opts);
    expect(turn).toEqual({
      kind: "tool_calls",
      calls: [{ id: "fixture_call_pii_scan", name: "pii_scan", input: { text: "Mail a@b.io" } }],
    });
  });

  it("answers with the scanned flags once the tool result is present", async () => {
    const gateway = new FixturesGateway();
    const turn = await gateway.step(
      request([
        { role: "user", content: "Mail a@b.io" },
        { role: "assistant", tool_calls: [{ id: "fixture_call_pii_scan", name: "pii_scan", input: { text: "Mail a@b.io" } }] },
        { role: "tool", tool_call_id: "fixture_call_pii_scan", name: "pii_scan", content: '{"ok":true,"flags":["email"]}' },
      ]),
      opts
    );
    expect(turn.kind).toBe("final");
    if (turn.kind === "final") {
      expect(turn.candidate.flags).toEqual(["email", "vague"]);
    }
  });

  it("answers directly when no tools are offered", async () => {
    const gateway = new FixturesGateway();
    const turn = await gateway.step(request([{ role: "user", content: "Fix this SQL?" }], false), opts);
    expect(turn.kind).toBe("final");
  });

  it("treats an unreadable tool result as no findings", async () => {
    const gateway = new FixturesGateway();
    const turn = await gateway.step(
      request([
        { role: "user", content: "Fix this SQL?" },
        { role: "tool", tool_call_id: "fixture_call_pii_scan", name: "pii_scan", content: "not json" },
      ]),
      opts
    );
    expect(turn.kind === "final" ? turn.candidate.flags : undefined).toEqual([]);
  });

  it("honours cancellation", async () => {
    const controller = new AbortController();
    controller.abort();
    const gateway = new FixturesGateway();
    await expect(
      gateway.step(request([{ role: "user", content: "Fix this SQL?" }]), { ...opts, abortSignal: controller.signal })
    ).rejects.toBeInstanceOf(GenerationError);
  });

  it("reports its provider and model", () => {
    const gateway = new FixturesGateway("fixtures-custom");
    expect(gateway.name).toBe("fixtures");
    expect(gateway.model).toBe("fixtures-custom");
  });
});
