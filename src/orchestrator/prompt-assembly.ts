/**
 * Prompt Assembly for the review orchestrator
 *
 * Instructions are the static rubric followed by one corrective note per
 * failed attempt, oldest first, so each retry carries everything learned so
 * far.
 */

import { REVIEW_RUBRIC } from "../prompts/review-rubric.js";
import type { GenerationError, ValidationError } from "./errors.js";

// ============================================================================
// Corrective Feedback
// ============================================================================

/**
 * Describe a validation failure as an instruction to the model.
 */
export function formatValidationFeedback(error: ValidationError): string {
  const lines = error.issues.map((issue) => `- ${issue.field}: ${issue.reason}`);
  return `Your previous response was rejected. Fix these fields:\n${lines.join("\n")}`;
}

const GENERATION_HINTS: Partial<Record<GenerationError["reason"], string>> = {
  empty_response: "It was empty. Respond with the JSON object.",
  unparseable_response: "It contained no JSON object. Respond with the JSON object only.",
  non_object_response: "It was JSON but not an object. Respond with a single JSON object.",
  tool_loop_exceeded: "It made too many tool calls. Call pii_scan at most once, then answer.",
};

/**
 * Describe a generation failure as an instruction to the model.
 */
export function formatGenerationFeedback(error: GenerationError): string {
  const hint = GENERATION_HINTS[error.reason];
  return `Your previous attempt failed (${error.reason}).${hint ? ` ${hint}` : ""}`;
}

// ============================================================================
// Instructions Assembly
// ============================================================================

/**
 * Assemble the instructions for one generation attempt.
 */
export function assembleInstructions(corrections: readonly string[]): string {
  if (corrections.length === 0) {
    return REVIEW_RUBRIC;
  }
  const notes = corrections.map((note, i) => `Correction ${i + 1}:\n${note}`);
  return `${REVIEW_RUBRIC}\n\n${notes.join("\n\n")}`;
}
