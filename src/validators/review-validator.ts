/**
 * Review Validator
 *
 * Coerces an untrusted candidate record into the QuestionReview contract,
 * field by field. Repairable problems (out-of-range scores, overlong
 * rewrites, oversized or duplicated lists, unknown flags) are fixed and noted;
 * anything that cannot be coerced is collected as a ValidationIssue so the
 * next generation attempt can be told exactly what to fix.
 *
 * @module validators/review-validator
 */

import {
  LIST_CAPS,
  REVIEW_LIST_FIELDS,
  REWRITE_MAX_CHARS,
  SCORE_FIELDS,
  SCORE_MAX,
  SCORE_MIN,
  isReviewFlag,
  type QuestionReview,
  type ReviewFlag,
  type ReviewListField,
  type ScoreField,
} from "../schemas/review.js";
import { ValidationError, type ValidationIssue } from "../orchestrator/errors.js";

export type ValidationResult =
  | { success: true; data: QuestionReview; repairs: string[] }
  | { success: false; error: ValidationError };

interface FieldContext {
  issues: ValidationIssue[];
  repairs: string[];
}

// =============================================================================
// Helpers
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isAbsent(value: unknown): boolean {
  return value === undefined || value === null;
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

/**
 * Cut `text` to at most `max` characters at the last whitespace at or before
 * position `max`. Returns undefined when no such boundary exists (a single
 * word longer than the cap).
 */
export function truncateAtWordBoundary(text: string, max: number = REWRITE_MAX_CHARS): string | undefined {
  if (text.length <= max) return text;

  for (let i = max; i > 0; i--) {
    if (/\s/.test(text.charAt(i))) {
      const cut = text.slice(0, i).trimEnd();
      return cut.length > 0 ? cut : undefined;
    }
  }
  return undefined;
}

// =============================================================================
// Field Coercion
// =============================================================================

function coerceClassification(raw: unknown, ctx: FieldContext): QuestionReview["classification"] | undefined {
  if (!isRecord(raw)) {
    ctx.issues.push({
      field: "classification",
      reason: `expected an object with non-empty "domain" and "type" strings, got ${describe(raw)}`,
    });
    return undefined;
  }

  const parts: { domain?: string; type?: string } = {};
  for (const key of ["domain", "type"] as const) {
    const value = raw[key];
    const normalized = typeof value === "string" ? value.trim().toLowerCase() : "";
    if (normalized.length === 0) {
      ctx.issues.push({ field: `classification.${key}`, reason: "must be a non-empty string" });
      continue;
    }
    if (normalized !== value) ctx.repairs.push(`classification.${key}: normalized`);
    parts[key] = normalized;
  }

  if (parts.domain === undefined || parts.type === undefined) return undefined;
  return { domain: parts.domain, type: parts.type };
}

function coerceScore(raw: unknown): number | undefined {
  let value = Number.NaN;
  if (typeof raw === "number") {
    value = raw;
  } else if (typeof raw === "string" && raw.trim() !== "") {
    value = Number(raw.trim());
  }
  if (!Number.isFinite(value)) return undefined;
  return Math.min(SCORE_MAX, Math.max(SCORE_MIN, Math.round(value)));
}

function coerceScores(raw: unknown, ctx: FieldContext): QuestionReview["scores"] | undefined {
  if (!isRecord(raw)) {
    ctx.issues.push({
      field: "scores",
      reason: `expected an object with ${SCORE_FIELDS.join(", ")} as integers ${SCORE_MIN}-${SCORE_MAX}, got ${describe(raw)}`,
    });
    return undefined;
  }

  const scores: Record<ScoreField, number> = { clarity: 0, specificity: 0, answerability: 0, safety: 0 };
  let complete = true;

  for (const field of SCORE_FIELDS) {
    const value = coerceScore(raw[field]);
    if (value === undefined) {
      ctx.issues.push({
        field: `scores.${field}`,
        reason: `must be a number between ${SCORE_MIN} and ${SCORE_MAX}, got ${describe(raw[field])}`,
      });
      complete = false;
      continue;
    }
    if (value !== raw[field]) ctx.repairs.push(`scores.${field}: coerced to ${value}`);
    scores[field] = value;
  }

  return complete ? scores : undefined;
}

function coerceRewrite(raw: unknown, field: string, ctx: FieldContext): string | undefined {
  if (typeof raw !== "string" || raw.trim().length === 0) {
    ctx.issues.push({ field, reason: `must be a non-empty string of at most ${REWRITE_MAX_CHARS} characters` });
    return undefined;
  }

  const trimmed = raw.trim();
  const truncated = truncateAtWordBoundary(trimmed);
  if (truncated === undefined) {
    ctx.issues.push({
      field,
      reason: `exceeds ${REWRITE_MAX_CHARS} characters with no word boundary to truncate at`,
    });
    return undefined;
  }
  if (truncated.length < trimmed.length) {
    ctx.repairs.push(`${field}: truncated from ${trimmed.length} to ${truncated.length} characters`);
  }
  return truncated;
}

function coerceRewrites(raw: unknown, ctx: FieldContext): QuestionReview["rewrites"] | undefined {
  if (!isRecord(raw)) {
    ctx.issues.push({
      field: "rewrites",
      reason: `expected an object with "minimal" and "ideal" strings, got ${describe(raw)}`,
    });
    return undefined;
  }

  const minimal = coerceRewrite(raw.minimal, "rewrites.minimal", ctx);
  const ideal = coerceRewrite(raw.ideal, "rewrites.ideal", ctx);
  if (minimal === undefined || ideal === undefined) return undefined;
  return { minimal, ideal };
}

function dedupeKey(entry: string): string {
  return entry.replace(/\s+/g, " ").toLowerCase();
}

function coerceList(raw: unknown, field: ReviewListField, ctx: FieldContext): string[] | undefined {
  if (isAbsent(raw)) return [];

  let entries: unknown[];
  if (typeof raw === "string") {
    entries = [raw];
  } else if (Array.isArray(raw)) {
    entries = raw;
  } else {
    ctx.issues.push({ field, reason: `expected a list of strings, got ${describe(raw)}` });
    return undefined;
  }

  const seen = new Set<string>();
  const items: string[] = [];
  for (const entry of entries) {
    if (typeof entry !== "string") continue;
    const trimmed = entry.trim();
    if (trimmed.length === 0) continue;
    const key = dedupeKey(trimmed);
    if (seen.has(key)) continue;
    seen.add(key);
    items.push(trimmed);
  }

  const cap = LIST_CAPS[field];
  const kept = items.slice(0, cap);
  if (kept.length !== entries.length) {
    ctx.repairs.push(`${field}: kept ${kept.length} of ${entries.length} entries`);
  }
  return kept;
}

/**
 * Normalize generated flags: lower-case, `_` and spaces to `-`, known
 * vocabulary only. Never a defect.
 */
export function normalizeFlags(raw: unknown): ReviewFlag[] {
  const entries: unknown[] = Array.isArray(raw) ? raw : typeof raw === "string" ? [raw] : [];
  const flags: ReviewFlag[] = [];
  for (const entry of entries) {
    if (typeof entry !== "string") continue;
    const normalized = entry.trim().toLowerCase().replace(/[_\s]+/g, "-");
    if (isReviewFlag(normalized) && !flags.includes(normalized)) {
      flags.push(normalized);
    }
  }
  return flags;
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Validate and normalize a candidate record.
 *
 * `original_question` is always taken from the caller. Every defect is
 * collected before failing so the error names all offending fields.
 */
export function validateCandidate(candidate: unknown, originalQuestion: string): ValidationResult {
  if (!isRecord(candidate)) {
    return {
      success: false,
      error: new ValidationError([
        { field: "record", reason: `expected a JSON object, got ${describe(candidate)}` },
      ]),
    };
  }

  const ctx: FieldContext = { issues: [], repairs: [] };

  if (candidate.original_question !== originalQuestion) {
    ctx.repairs.push("original_question: replaced with caller text");
  }

  const classification = coerceClassification(candidate.classification, ctx);
  const scores = coerceScores(candidate.scores, ctx);

  const lists: Partial<Record<ReviewListField, string[]>> = {};
  for (const field of REVIEW_LIST_FIELDS) {
    lists[field] = coerceList(candidate[field], field, ctx);
  }

  const rewrites = coerceRewrites(candidate.rewrites, ctx);

  const flags = normalizeFlags(candidate.flags);
  const rawFlagCount = Array.isArray(candidate.flags) ? candidate.flags.length : isAbsent(candidate.flags) ? 0 : 1;
  if (flags.length !== rawFlagCount) {
    ctx.repairs.push(`flags: kept ${flags.length} of ${rawFlagCount} entries`);
  }

  const { missing_info, assumptions, followups } = lists;
  if (
    ctx.issues.length > 0 ||
    classification === undefined ||
    scores === undefined ||
    rewrites === undefined ||
    missing_info === undefined ||
    assumptions === undefined ||
    followups === undefined
  ) {
    return { success: false, error: new ValidationError(ctx.issues) };
  }

  return {
    success: true,
    data: {
      original_question: originalQuestion,
      classification,
      scores,
      missing_info,
      assumptions,
      followups,
      rewrites,
      flags,
    },
    repairs: ctx.repairs,
  };
}
