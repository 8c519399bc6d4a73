/**
 * ORDERED EXTRACTION RULES
 *
 * Priority lists of (pattern, extractor) pairs evaluated in order; the
 * first rule whose pattern matches and whose extractor yields a value wins.
 * Patterns must not be global so that exec() carries no lastIndex state.
 */

import { wholeWordPattern } from "../schemas/lexicon";

export interface ExtractionRule<A> {
  readonly name: string;
  readonly pattern: RegExp;
  readonly extract: (match: RegExpExecArray) => A | null;
}

export const firstMatch = <A>(
  rules: ReadonlyArray<ExtractionRule<A>>,
  text: string
): A | null => {
  for (const rule of rules) {
    const match = rule.pattern.exec(text);
    if (!match) continue;
    const value = rule.extract(match);
    if (value !== null) return value;
  }
  return null;
};

/**
 * Rule returning a trimmed capture group; an empty capture is no match.
 */
export const captureRule = (
  name: string,
  source: string,
  group = 1,
  flags = "i"
): ExtractionRule<string> => ({
  name,
  pattern: new RegExp(source, flags),
  extract: (match) => {
    const value = match[group]?.trim() ?? "";
    return value.length > 0 ? value : null;
  },
});

// ============================================================================
// KEYWORD SCANS
// ============================================================================

/**
 * Substring test against lower-cased text; keywords are lower-case.
 */
export const containsAny = (text: string, keywords: ReadonlyArray<string>): boolean => {
  const lower = text.toLowerCase();
  return keywords.some((keyword) => lower.includes(keyword));
};

/**
 * Whole-word, case-insensitive test: "serious" does not match "seriously".
 */
export const containsAnyWord = (text: string, keywords: ReadonlyArray<string>): boolean =>
  keywords.some((keyword) => wholeWordPattern(keyword, "i").test(text));

export const firstContaining = (
  statements: ReadonlyArray<string>,
  keywords: ReadonlyArray<string>
): string | null => statements.find((statement) => containsAny(statement, keywords)) ?? null;

export const allContaining = (
  statements: ReadonlyArray<string>,
  keywords: ReadonlyArray<string>
): string[] => statements.filter((statement) => containsAny(statement, keywords));
