/**
 * PII Scanner
 *
 * Deterministic detection of email-, phone- and card-like substrings.
 * Pure and idempotent: the same text always yields the same flags, and no
 * input is an error.
 *
 * Patterns run in a fixed order (emails, cards, then phones). Each matched
 * span is masked before the next pattern runs, so one substring yields one
 * flag: a 16-digit card number is never also reported as a phone.
 */

import { PII_FLAGS, type PIIFlag } from "../schemas/review.js";

export interface PIIMatch {
  type: PIIFlag;
  /** Inclusive start offset in the scanned text */
  start: number;
  /** Exclusive end offset */
  end: number;
}

interface Span {
  start: number;
  end: number;
}

interface PatternSpec {
  type: PIIFlag;
  pattern: RegExp;
  /** Span to report within the matched text, or undefined to reject it */
  select?: (match: string) => Span | undefined;
}

const CARD_MIN_DIGITS = 13;
const CARD_MAX_DIGITS = 19;
const PHONE_MIN_DIGITS = 7;
const PHONE_MAX_DIGITS = 15;

const MASK_CHAR = "#";

function countDigits(text: string): number {
  let count = 0;
  for (const char of text) {
    if (char >= "0" && char <= "9") count++;
  }
  return count;
}

/**
 * Luhn (mod-10) checksum over the digits of `text`
 */
export function passesLuhn(text: string): boolean {
  const digits = text.replace(/\D/g, "");
  if (digits.length === 0) return false;

  let sum = 0;
  let double = false;
  for (let i = digits.length - 1; i >= 0; i--) {
    let d = digits.charCodeAt(i) - 48;
    if (double) {
      d *= 2;
      if (d > 9) d -= 9;
    }
    sum += d;
    double = !double;
  }
  return sum % 10 === 0;
}

function isCardLike(match: string): boolean {
  const digits = countDigits(match);
  return digits >= CARD_MIN_DIGITS && digits <= CARD_MAX_DIGITS && passesLuhn(match);
}

/**
 * A digit run that is itself card-like, or else the first card-like window
 * of its digit groups (a card number followed by an expiry date or CVV).
 */
function selectCard(match: string): Span | undefined {
  if (isCardLike(match)) return { start: 0, end: match.length };

  const groups: Span[] = [];
  for (const g of match.matchAll(/\d+/g)) {
    const start = g.index ?? 0;
    groups.push({ start, end: start + g[0].length });
  }
  for (const [i, first] of groups.entries()) {
    for (let j = groups.length - 1; j >= i; j--) {
      const last = groups[j];
      if (last && isCardLike(match.slice(first.start, last.end))) {
        return { start: first.start, end: last.end };
      }
    }
  }
  return undefined;
}

function selectPhone(match: string): Span | undefined {
  const digits = countDigits(match);
  return digits >= PHONE_MIN_DIGITS && digits <= PHONE_MAX_DIGITS ? { start: 0, end: match.length } : undefined;
}

/**
 * Detection patterns in masking order
 */
const PATTERNS: readonly PatternSpec[] = [
  {
    type: "email",
    pattern: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g,
  },
  {
    // Maximal digit runs, optionally grouped by a single space or hyphen
    type: "card-ish",
    pattern: /(?<!\d[ -]?)\d(?:[ -]?\d){12,}(?![ -]?\d)/g,
    select: selectCard,
  },
  {
    // North American: +1 (555) 123-4567, 555.123.4567, 1-555-123-4567
    type: "phone",
    pattern: /(?<![\w+])(?:\+?1[-.\s]?)?(?:\(\d{3}\)|\d{3})[-.\s]?\d{3}[-.\s]?\d{4}(?!\w)/g,
    select: selectPhone,
  },
  {
    // UK mobile: 07700 900123, +44 7700 900123
    type: "phone",
    pattern: /(?<![\w+])(?:\+44\s?7\d{3}|\(?07\d{3}\)?)\s?\d{3}\s?\d{3}(?!\w)/g,
    select: selectPhone,
  },
  {
    // International: +49 30 1234 5678
    type: "phone",
    pattern: /(?<![\w+])\+\d{1,3}[\s.-]?\(?\d{1,4}\)?(?:[\s.-]?\d{1,4}){1,4}(?!\w)/g,
    select: selectPhone,
  },
  {
    // National with trunk prefix: 020 7946 0958, (03) 9876 5432, 0412 345 678
    type: "phone",
    pattern: /(?<![\w+])(?:\(0\d{1,4}\)|0\d{1,4})(?:[\s.-]?\d{2,4}){2,3}(?!\w)/g,
    select: selectPhone,
  },
  {
    // Local without area code: 555-1234, 555 1234
    type: "phone",
    pattern: /(?<![\w+-])\d{3}[-.\s]\d{4}(?![\w-])/g,
    select: selectPhone,
  },
];

function mask(text: string, start: number, end: number): string {
  return text.slice(0, start) + MASK_CHAR.repeat(end - start) + text.slice(end);
}

/**
 * Locate every PII span in `text`, ordered by position
 */
export function detectPII(text: string): PIIMatch[] {
  const matches: PIIMatch[] = [];
  let working = text;

  for (const detector of PATTERNS) {
    const found: PIIMatch[] = [];
    for (const m of working.matchAll(detector.pattern)) {
      const offset = m.index ?? 0;
      const value = m[0];
      const span = detector.select ? detector.select(value) : { start: 0, end: value.length };
      if (!span) continue;
      found.push({ type: detector.type, start: offset + span.start, end: offset + span.end });
    }
    for (const match of found) {
      working = mask(working, match.start, match.end);
    }
    matches.push(...found);
  }

  return matches.sort((a, b) => a.start - b.start);
}

/**
 * Scan text for PII and return the flag set in canonical order
 * (email, phone, card-ish)
 */
export function scanForPII(text: string): PIIFlag[] {
  const present = new Set(detectPII(text).map((m) => m.type));
  return PII_FLAGS.filter((flag) => present.has(flag));
}
