import { describe, it, expect } from "vitest";
import { decodeToolArguments, parseCandidateContent } from "../../../src/adapters/llm/candidate.js";
import { GenerationError } from "../../../src/orchestrator/errors.js";

const ctx = { provider: "openai", model: "gpt-test", requestId: "req-1" };

function reasonOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return error instanceof GenerationError ? error.reason : undefined;
  }
  return undefined;
}

describe("parseCandidateContent", () => {
  it("parses a bare JSON object", () => {
    expect(parseCandidateContent('{"classification":{"domain":"coding"}}', ctx)).toEqual({
      classification: { domain: "coding" },
    });
  });

  it("extracts an object wrapped in prose", () => {
    expect(parseCandidateContent('Here you go: {"a":1} Thanks', ctx)).toEqual({ a: 1 });
  });

  it("rejects empty content", () => {
    expect(reasonOf(() => parseCandidateContent("   ", ctx))).toBe("empty_response");
    expect(reasonOf(() => parseCandidateContent(null, ctx))).toBe("empty_response");
    expect(() => parseCandidateContent(undefined, ctx)).toThrow("openai returned empty content");
  });

  it("rejects content without JSON", () => {
    expect(reasonOf(() => parseCandidateContent("I cannot help with that.", ctx))).toBe("unparseable_response");
  });

  it("rejects JSON that is not an object", () => {
    expect(reasonOf(() => parseCandidateContent("[1, 2]", ctx))).toBe("non_object_response");
    expect(reasonOf(() => parseCandidateContent('"just a string"', ctx))).toBe("non_object_response");
  });
});

describe("decodeToolArguments", () => {
  it("decodes JSON arguments", () => {
    expect(decodeToolArguments('{"text":"hello"}')).toEqual({ text: "hello" });
  });

  it("treats empty arguments as an empty object", () => {
    expect(decodeToolArguments("")).toEqual({});
  });

  it("passes undecodable arguments through as the raw string", () => {
    expect(decodeToolArguments("{text: hello")).toBe("{text: hello");
  });
});
