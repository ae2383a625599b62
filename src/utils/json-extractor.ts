/**
 * JSON Extractor Utility
 *
 * Extracts valid JSON from generation responses that may contain
 * conversational preamble, suffix text, or markdown code blocks.
 *
 * Anthropic models in particular may add text like "Here is the review..."
 * before the JSON output, even when instructed to output only JSON.
 */

import { log, emit, TelemetryEvents } from "./telemetry.js";

export type ExtractionMethod = "fast_path" | "code_block" | "boundary" | "bracket_matching";

/**
 * Result of JSON extraction
 */
export interface JsonExtractionResult {
  /** The extracted and parsed JSON */
  json: unknown;
  /** Whether extraction was needed (true if raw content wasn't valid JSON) */
  wasExtracted: boolean;
  extractionMethod: ExtractionMethod;
  /** Characters of preamble text that was stripped */
  preambleLength: number;
  /** Characters of suffix text that was stripped */
  suffixLength: number;
}

/**
 * Options for JSON extraction
 */
export interface JsonExtractionOptions {
  /** Provider name for telemetry */
  provider?: string;
  /** Model name for telemetry */
  model?: string;
  /** Correlation ID for logging */
  requestId?: string;
}

/**
 * Raised when the content holds no parseable JSON value at all
 */
export class JsonExtractionError extends Error {
  readonly name = "JsonExtractionError";

  constructor(
    message: string,
    public readonly candidatesTried: number,
  ) {
    super(message);
  }
}

function recordExtraction(
  result: JsonExtractionResult,
  options: JsonExtractionOptions
): JsonExtractionResult {
  if (result.wasExtracted) {
    const { provider, model, requestId } = options;
    log.warn(
      {
        provider,
        model,
        request_id: requestId,
        extraction_method: result.extractionMethod,
        preamble_length: result.preambleLength,
        suffix_length: result.suffixLength,
      },
      "JSON extraction required - model returned text around the JSON"
    );
    emit(TelemetryEvents.JsonExtractionRequired, {
      provider,
      model,
      preamble_length: result.preambleLength,
      suffix_length: result.suffixLength,
      extraction_method: result.extractionMethod,
    });
  }
  return result;
}

/**
 * Extract JSON from a response that may contain conversational preamble/suffix.
 *
 * Strategy (in order):
 * 1. Parse the trimmed content as-is (fast path for json_object mode)
 * 2. Parse each markdown code block (```json ... ```) until one is valid
 * 3. Bracket-match from each `{` or `[` position until valid JSON is found
 *
 * @throws JsonExtractionError if no valid JSON can be extracted
 */
export function extractJsonFromResponse(
  content: string,
  options: JsonExtractionOptions = {}
): JsonExtractionResult {
  const trimmed = content.trim();

  // === Fast path: Already valid JSON ===
  // Trailing text after a leading JSON value falls through to bracket matching
  if (trimmed.startsWith("{") || trimmed.startsWith("[")) {
    const parsed = tryParse(trimmed);
    if (parsed.ok) {
      return { json: parsed.value, wasExtracted: false, extractionMethod: "fast_path", preambleLength: 0, suffixLength: 0 };
    }
  }

  // === Markdown code blocks ===
  const codeBlockRegex = /```(?:json)?\s*([\s\S]*?)```/g;
  for (const block of trimmed.matchAll(codeBlockRegex)) {
    const blockContent = (block[1] ?? "").trim();
    const parsed = tryParse(blockContent);
    if (parsed.ok) {
      const preambleLength = block.index ?? 0;
      const suffixLength = trimmed.length - (preambleLength + block[0].length);
      return recordExtraction(
        { json: parsed.value, wasExtracted: true, extractionMethod: "code_block", preambleLength, suffixLength },
        options
      );
    }
  }

  // === Bracket matching from each candidate start ===
  // Preamble may itself contain braces (e.g. "Use `{field}` for..."), so every
  // candidate is tried in order.
  const candidates: number[] = [];
  for (let i = 0; i < trimmed.length; i++) {
    if (trimmed[i] === "{" || trimmed[i] === "[") {
      candidates.push(i);
    }
  }

  if (candidates.length === 0) {
    throw new JsonExtractionError("No JSON structure found in response: missing opening delimiter", 0);
  }

  for (const [position, start] of candidates.entries()) {
    const match = extractJsonWithBracketMatching(trimmed, start);
    if (match) {
      const suffixLength = trimmed.length - (start + match.content.length);
      return recordExtraction(
        {
          json: match.json,
          wasExtracted: start > 0 || suffixLength > 0,
          extractionMethod: position === 0 ? "boundary" : "bracket_matching",
          preambleLength: start,
          suffixLength,
        },
        options
      );
    }
  }

  throw new JsonExtractionError(
    `Failed to extract valid JSON from response: tried ${candidates.length} candidate position(s)`,
    candidates.length
  );
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

/**
 * Extract JSON using bracket matching (handles nested structures and trailing text).
 *
 * Scans from a starting position, counting brackets to find the complete
 * JSON structure, handling strings and escape sequences.
 */
function extractJsonWithBracketMatching(
  content: string,
  startIndex: number
): { json: unknown; content: string } | null {
  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = startIndex; i < content.length; i++) {
    const char = content[i];

    if (escape) {
      escape = false;
      continue;
    }

    if (char === "\\") {
      escape = true;
      continue;
    }

    if (char === '"') {
      inString = !inString;
      continue;
    }

    if (inString) continue;

    if (char === "{" || char === "[") depth++;
    if (char === "}" || char === "]") depth--;

    if (depth === 0) {
      const jsonStr = content.slice(startIndex, i + 1);
      const parsed = tryParse(jsonStr);
      return parsed.ok ? { json: parsed.value, content: jsonStr } : null;
    }
  }

  // Unbalanced brackets
  return null;
}
