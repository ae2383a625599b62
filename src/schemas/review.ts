/**
 * Question review schemas
 *
 * The QuestionReview record is the compatibility contract for every consumer
 * (CLI, /assist/v1/review-question, library callers). Bounds declared here are
 * enforced field-by-field in validators/review-validator.ts and re-checked on
 * the finalized record with QuestionReviewSchema.
 */

import { z } from "zod";

// =============================================================================
// Contract Bounds
// =============================================================================

export const SCORE_MIN = 0;
export const SCORE_MAX = 10;

export const REWRITE_MAX_CHARS = 280;

export const LIST_CAPS = {
  missing_info: 6,
  assumptions: 6,
  followups: 5,
} as const;

export type ReviewListField = keyof typeof LIST_CAPS;

export const REVIEW_LIST_FIELDS: readonly ReviewListField[] = ["missing_info", "assumptions", "followups"];

export const SCORE_FIELDS = ["clarity", "specificity", "answerability", "safety"] as const;

export type ScoreField = (typeof SCORE_FIELDS)[number];

// =============================================================================
// Flag Vocabulary
// =============================================================================

/** Flags the deterministic scanner can raise. Listed in canonical order. */
export const PII_FLAGS = ["email", "phone", "card-ish"] as const;

/** Flags only the generation step asserts. */
export const ADVISORY_FLAGS = ["vague", "unsafe"] as const;

export const REVIEW_FLAGS = [...PII_FLAGS, ...ADVISORY_FLAGS] as const;

export type PIIFlag = (typeof PII_FLAGS)[number];
export type AdvisoryFlag = (typeof ADVISORY_FLAGS)[number];
export type ReviewFlag = (typeof REVIEW_FLAGS)[number];

const REVIEW_FLAG_SET: ReadonlySet<string> = new Set(REVIEW_FLAGS);
const PII_FLAG_SET: ReadonlySet<string> = new Set(PII_FLAGS);

export function isReviewFlag(value: string): value is ReviewFlag {
  return REVIEW_FLAG_SET.has(value);
}

export function isPIIFlag(flag: ReviewFlag): flag is PIIFlag {
  return PII_FLAG_SET.has(flag);
}

// =============================================================================
// QuestionReview
// =============================================================================

export interface QuestionReview {
  readonly original_question: string;
  readonly classification: {
    readonly domain: string;
    readonly type: string;
  };
  readonly scores: Readonly<Record<ScoreField, number>>;
  readonly missing_info: readonly string[];
  readonly assumptions: readonly string[];
  readonly followups: readonly string[];
  readonly rewrites: {
    readonly minimal: string;
    readonly ideal: string;
  };
  readonly flags: readonly ReviewFlag[];
}

const Score = z.number().int().min(SCORE_MIN).max(SCORE_MAX);

const Rewrite = z.string().min(1).max(REWRITE_MAX_CHARS);

function uniqueList(cap: number) {
  return z
    .array(z.string().min(1))
    .max(cap)
    .refine((items) => new Set(items.map((i) => i.toLowerCase())).size === items.length, {
      message: "List entries must be unique",
    });
}

export const QuestionReviewSchema = z.object({
  original_question: z.string().min(1),
  classification: z.object({
    domain: z.string().min(1),
    type: z.string().min(1),
  }),
  scores: z.object({
    clarity: Score,
    specificity: Score,
    answerability: Score,
    safety: Score,
  }),
  missing_info: uniqueList(LIST_CAPS.missing_info),
  assumptions: uniqueList(LIST_CAPS.assumptions),
  followups: uniqueList(LIST_CAPS.followups),
  rewrites: z.object({
    minimal: Rewrite,
    ideal: Rewrite,
  }),
  flags: z
    .array(z.enum(REVIEW_FLAGS))
    .refine((flags) => new Set(flags).size === flags.length, {
      message: "Flags must be unique",
    }),
});

export type QuestionReviewT = z.infer<typeof QuestionReviewSchema>;

// =============================================================================
// Request Schemas
// =============================================================================

/**
 * Per-request generation overrides. Provider selection is process-wide
 * (credentials are checked at startup), so only model and determinism
 * controls are accepted here.
 */
export const GenerationOverrides = z
  .object({
    model: z.string().trim().min(1).max(100).optional(),
    temperature: z.number().min(0).max(2).optional(),
    seed: z.number().int().optional(),
  })
  .strict();

export type GenerationOverridesT = z.infer<typeof GenerationOverrides>;

export function buildReviewQuestionRequest(maxQuestionChars: number) {
  return z
    .object({
      question: z
        .string()
        .trim()
        .min(1, { message: "Question must not be empty" })
        .max(maxQuestionChars, { message: `Question must be at most ${maxQuestionChars} characters` }),
      options: GenerationOverrides.optional(),
    })
    .strict();
}

export type ReviewQuestionRequestT = z.infer<ReturnType<typeof buildReviewQuestionRequest>>;
