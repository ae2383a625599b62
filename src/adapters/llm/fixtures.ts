/**
 * Fixtures gateway
 *
 * Offline, deterministic stand-in for a generation provider. The first step
 * asks for a `pii_scan` of the question (exercising the tool loop); the next
 * step answers with a heuristic review built from the keyword tables in
 * data/fixtures/review-heuristics.json. Needs no credentials.
 */

import { existsSync, readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ConfigurationError, GenerationError } from "../../orchestrator/errors.js";
import { isPIIFlag, isReviewFlag, type PIIFlag, type ReviewFlag } from "../../schemas/review.js";
import { detectPII } from "../../utils/pii-scanner.js";
import { log } from "../../utils/telemetry.js";
import type { CallOpts, GenerationGateway, GenerationStepRequest, GenerationTurn, TranscriptEntry } from "./types.js";

export const FIXTURES_DEFAULT_MODEL = "fixtures-v1";

const SCAN_TOOL_NAME = "pii_scan";

// ============================================================================
// Heuristic tables
// ============================================================================

const KeywordGroupSchema = z.object({
  name: z.string().min(1),
  keywords: z.array(z.string().min(1)),
});

const RuleSchema = z.object({
  keywords: z.array(z.string().min(1)).min(1),
  unless: z.array(z.string().min(1)).default([]),
  missing_info: z.array(z.string()).default([]),
  assumptions: z.array(z.string()).default([]),
  followups: z.array(z.string()).default([]),
});

export const ReviewHeuristicsSchema = z.object({
  defaultDomain: z.string().min(1),
  defaultType: z.string().min(1),
  domains: z.array(KeywordGroupSchema),
  types: z.array(KeywordGroupSchema),
  rules: z.array(RuleSchema),
  unsafeKeywords: z.array(z.string().min(1)),
  genericMissingInfo: z.array(z.string()),
  genericFollowups: z.array(z.string()),
});

export type ReviewHeuristics = z.infer<typeof ReviewHeuristicsSchema>;

const HEURISTICS_FILE = "data/fixtures/review-heuristics.json";

let heuristicsCache: ReviewHeuristics | undefined;

/**
 * Load and validate the keyword tables. Looked up relative to this module so
 * it resolves from both src/ and dist/src/.
 */
export function loadReviewHeuristics(): ReviewHeuristics {
  if (heuristicsCache) return heuristicsCache;

  for (const prefix of ["../../../", "../../../../"]) {
    const filePath = fileURLToPath(new URL(prefix + HEURISTICS_FILE, import.meta.url));
    if (!existsSync(filePath)) continue;

    const parsed: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
    const result = ReviewHeuristicsSchema.safeParse(parsed);
    if (!result.success) {
      throw new ConfigurationError("Fixture heuristics file is invalid", {
        file: HEURISTICS_FILE,
        issues: result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      });
    }
    log.debug({ file: HEURISTICS_FILE, rules: result.data.rules.length }, "Loaded fixture review heuristics");
    heuristicsCache = result.data;
    return heuristicsCache;
  }

  throw new ConfigurationError("Fixture heuristics file not found", { file: HEURISTICS_FILE });
}

// ============================================================================
// Heuristic review
// ============================================================================

function keywordMatcher(text: string): (keyword: string) => boolean {
  const haystack = ` ${(text.toLowerCase().match(/[a-z0-9+#]+/g) ?? []).join(" ")} `;
  return (keyword) => haystack.includes(` ${keyword.toLowerCase()} `);
}

function pushUnique(target: string[], items: readonly string[]): void {
  for (const item of items) {
    if (!target.includes(item)) target.push(item);
  }
}

function lowerFirst(text: string): string {
  return text.charAt(0).toLowerCase() + text.slice(1);
}

function redactPII(text: string): string {
  let out = text;
  const matches = detectPII(text).sort((a, b) => b.start - a.start);
  for (const match of matches) {
    out = `${out.slice(0, match.start)}[${match.type}]${out.slice(match.end)}`;
  }
  return out;
}

/**
 * Build a candidate review from keyword heuristics. Lists are not capped and
 * rewrites are not truncated here: that is the validator's job.
 */
export function buildHeuristicReview(
  question: string,
  piiFlags: readonly PIIFlag[],
  heuristics: ReviewHeuristics = loadReviewHeuristics()
): Record<string, unknown> {
  const matches = keywordMatcher(question);
  const wordCount = (question.match(/\S+/g) ?? []).length;

  const domain = heuristics.domains.find((d) => d.keywords.some(matches))?.name ?? heuristics.defaultDomain;
  const type = heuristics.types.find((t) => t.keywords.some(matches))?.name ?? heuristics.defaultType;

  const missingInfo: string[] = [];
  const assumptions: string[] = [];
  const followups: string[] = [];
  for (const rule of heuristics.rules) {
    if (!rule.keywords.some(matches) || rule.unless.some(matches)) continue;
    pushUnique(missingInfo, rule.missing_info);
    pushUnique(assumptions, rule.assumptions);
    pushUnique(followups, rule.followups);
  }
  if (missingInfo.length === 0) pushUnique(missingInfo, heuristics.genericMissingInfo);
  if (followups.length === 0) pushUnique(followups, heuristics.genericFollowups);

  const unsafe = heuristics.unsafeKeywords.some(matches);
  const vague = domain === heuristics.defaultDomain && wordCount < 6;

  const clarity =
    3 +
    (type !== heuristics.defaultType ? 2 : 0) +
    (question.trim().endsWith("?") ? 1 : 0) +
    Math.min(4, Math.floor(wordCount / 4));
  const specificity =
    2 +
    Math.min(6, Math.floor(wordCount / 3)) +
    (/\d/.test(question) ? 1 : 0) +
    (domain !== heuristics.defaultDomain ? 1 : 0);
  const answerability = Math.max(1, 9 - missingInfo.length);
  const safety = unsafe ? 2 : Math.max(4, 10 - 2 * piiFlags.length);

  const base = redactPII(question).replace(/\s+/g, " ").trim();
  const minimal = /[?.!]$/.test(base) ? base : `${base}?`;
  const ideal =
    missingInfo.length > 0
      ? `${minimal} Details: ${missingInfo.slice(0, 3).map(lowerFirst).join("; ")}.`
      : `${minimal} Please include any relevant context.`;

  const flags: ReviewFlag[] = [...piiFlags];
  if (vague) flags.push("vague");
  if (unsafe) flags.push("unsafe");

  return {
    original_question: question,
    classification: { domain, type },
    scores: {
      clarity: Math.min(10, clarity),
      specificity: Math.min(10, specificity),
      answerability,
      safety,
    },
    missing_info: missingInfo,
    assumptions,
    followups,
    rewrites: { minimal, ideal },
    flags,
  };
}

// ============================================================================
// Gateway
// ============================================================================

function questionOf(transcript: readonly TranscriptEntry[]): string {
  for (const entry of transcript) {
    if (entry.role === "user") return entry.content;
  }
  return "";
}

function scannedFlags(transcript: readonly TranscriptEntry[]): PIIFlag[] | undefined {
  for (const entry of transcript) {
    if (entry.role !== "tool" || entry.name !== SCAN_TOOL_NAME) continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(entry.content);
    } catch (error) {
      log.warn(
        { tool: SCAN_TOOL_NAME, error: error instanceof Error ? error.message : String(error) },
        "Unreadable scan result, treating as no findings"
      );
      return [];
    }

    const flags: PIIFlag[] = [];
    if (typeof parsed === "object" && parsed !== null && "flags" in parsed && Array.isArray(parsed.flags)) {
      for (const flag of parsed.flags) {
        if (typeof flag === "string" && isReviewFlag(flag) && isPIIFlag(flag)) flags.push(flag);
      }
    }
    return flags;
  }
  return undefined;
}

export class FixturesGateway implements GenerationGateway {
  readonly name = "fixtures";

  constructor(readonly model: string = FIXTURES_DEFAULT_MODEL) {}

  async step(request: GenerationStepRequest, opts: CallOpts): Promise<GenerationTurn> {
    if (opts.abortSignal?.aborted) {
      throw new GenerationError("fixtures review_step cancelled", "cancelled", this.name);
    }

    const question = questionOf(request.transcript);
    const flags = scannedFlags(request.transcript);

    if (flags === undefined && request.tools.some((t) => t.name === SCAN_TOOL_NAME)) {
      return {
        kind: "tool_calls",
        calls: [{ id: "fixture_call_pii_scan", name: SCAN_TOOL_NAME, input: { text: question } }],
      };
    }

    return { kind: "final", candidate: buildHeuristicReview(question, flags ?? []) };
  }
}
