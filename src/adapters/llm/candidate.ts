import { GenerationError } from "../../orchestrator/errors.js";
import { extractJsonFromResponse, JsonExtractionError } from "../../utils/json-extractor.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

export interface CandidateContext {
  provider: string;
  model: string;
  requestId: string;
}

/**
 * Turn the model's final text into an untrusted candidate object.
 *
 * Only the outer shape is checked here (an object at all); field-level
 * problems are left to the validator.
 */
export function parseCandidateContent(
  content: string | null | undefined,
  ctx: CandidateContext
): Record<string, unknown> {
  const trimmed = content?.trim() ?? "";
  if (trimmed.length === 0) {
    throw new GenerationError(`${ctx.provider} returned empty content`, "empty_response", ctx.provider);
  }

  // Bare JSON scalars and arrays parse cleanly but are not records
  const direct = tryParseJson(trimmed);
  let value: unknown;
  if (direct.ok) {
    value = direct.value;
  } else {
    try {
      value = extractJsonFromResponse(trimmed, {
        provider: ctx.provider,
        model: ctx.model,
        requestId: ctx.requestId,
      }).json;
    } catch (error) {
      if (error instanceof JsonExtractionError) {
        throw new GenerationError(
          `${ctx.provider} response contained no JSON object`,
          "unparseable_response",
          ctx.provider,
          error
        );
      }
      throw error;
    }
  }

  if (!isRecord(value)) {
    throw new GenerationError(
      `${ctx.provider} response was JSON but not an object`,
      "non_object_response",
      ctx.provider
    );
  }
  return value;
}

/**
 * Decode a tool call's JSON-encoded arguments. Undecodable arguments are
 * passed through as the raw string so the dispatcher can report them.
 */
export function decodeToolArguments(raw: string): unknown {
  if (raw.trim() === "") return {};
  const parsed = tryParseJson(raw);
  return parsed.ok ? parsed.value : raw;
}
