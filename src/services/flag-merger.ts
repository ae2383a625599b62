import { REVIEW_FLAGS, type PIIFlag, type ReviewFlag } from "../schemas/review.js";

/**
 * Union generated and locally scanned flags.
 *
 * PII flags (email, phone, card-ish) come first, then advisory flags
 * (vague, unsafe), each group in vocabulary order, so consumers can treat the
 * head of the list as safety-critical.
 */
export function mergeFlags(generated: Iterable<ReviewFlag>, local: Iterable<PIIFlag>): ReviewFlag[] {
  const present = new Set<ReviewFlag>([...local, ...generated]);
  return REVIEW_FLAGS.filter((flag) => present.has(flag));
}
