import { describe, it, expect } from "vitest";
import {
  assembleInstructions,
  formatGenerationFeedback,
  formatValidationFeedback,
} from "../../../src/orchestrator/prompt-assembly.js";
import { GenerationError, ValidationError } from "../../../src/orchestrator/errors.js";
import { REVIEW_RUBRIC } from "../../../src/prompts/review-rubric.js";

describe("prompt assembly", () => {
  it("uses the rubric alone on the first attempt", () => {
    expect(assembleInstructions([])).toBe(REVIEW_RUBRIC);
  });

  it("appends numbered corrections in order", () => {
    expect(assembleInstructions(["first", "second"])).toBe(
      `${REVIEW_RUBRIC}\n\nCorrection 1:\nfirst\n\nCorrection 2:\nsecond`
    );
  });

  it("lists every rejected field", () => {
    const error = new ValidationError([
      { field: "scores.clarity", reason: "must be a number between 0 and 10, got string" },
      { field: "rewrites", reason: "expected an object" },
    ]);
    expect(formatValidationFeedback(error)).toBe(
      "Your previous response was rejected. Fix these fields:\n" +
        "- scores.clarity: must be a number between 0 and 10, got string\n" +
        "- rewrites: expected an object"
    );
  });

  it("describes generation failures with a hint where one applies", () => {
    expect(formatGenerationFeedback(new GenerationError("empty", "empty_response", "openai"))).toBe(
      "Your previous attempt failed (empty_response). It was empty. Respond with the JSON object."
    );
    expect(formatGenerationFeedback(new GenerationError("slow", "timeout", "openai"))).toBe(
      "Your previous attempt failed (timeout)."
    );
  });

  it("states the contract bounds in the rubric", () => {
    expect(REVIEW_RUBRIC).toContain("at most 280 characters");
    expect(REVIEW_RUBRIC).toContain("flags uses only: email, phone, card-ish, vague, unsafe.");
  });
});
