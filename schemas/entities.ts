/**
 * MEDICAL ENTITY SCHEMA
 *
 * Entities are plain canonical strings grouped by category. Categories are
 * open-ended; the rule-based extractor fills symptoms, treatments,
 * diagnoses and anatomy.
 */

import { Schema as S } from "effect";

// ============================================================================
// CATEGORIES
// ============================================================================

export const ENTITY_CATEGORIES = ["symptoms", "treatments", "diagnoses", "anatomy"] as const;
export type EntityCategory = (typeof ENTITY_CATEGORIES)[number];

export const EntityCategoriesSchema = S.Record({ key: S.String, value: S.Array(S.String) });
export type EntityCategories = S.Schema.Type<typeof EntityCategoriesSchema>;

export const emptyEntityCategories = (): Record<EntityCategory, string[]> => ({
  symptoms: [],
  treatments: [],
  diagnoses: [],
  anatomy: [],
});

/**
 * Rule labels attached to spans, one per category.
 */
export const ENTITY_LABELS: Readonly<Record<EntityCategory, string>> = {
  symptoms: "SIGN_SYMPTOM",
  treatments: "THERAPEUTIC_PROCEDURE",
  diagnoses: "DISEASE_DISORDER",
  anatomy: "BODY_PART_ORGAN",
};

export const ScoredEntitySchema = S.Struct({
  text: S.String,
  label: S.String,
  start: S.Int,
  end: S.Int,
  confidence: S.Number,
});
export type ScoredEntity = S.Schema.Type<typeof ScoredEntitySchema>;

// ============================================================================
// CURATION CONFIG
// ============================================================================

/**
 * Bounds come from the validated PipelineConfig
 * (entityMinLength, entityMaxLength, similarityThreshold).
 */
export interface CuratorConfig {
  readonly minLength: number;
  readonly maxLength: number;
  readonly similarityThreshold: number;
}

export const defaultCuratorConfig: CuratorConfig = {
  minLength: 2,
  maxLength: 100,
  similarityThreshold: 0.8,
};

// ============================================================================
// TOKEN UTILITIES
// ============================================================================

export const tokenSet = (text: string): Set<string> =>
  new Set(text.toLowerCase().split(/\s+/).filter((token) => token.length > 0));

/**
 * Jaccard similarity of the whitespace token sets of two strings.
 * Identical strings score 1; an empty token set scores 0.
 */
export const jaccardSimilarity = (a: string, b: string): number => {
  if (a === b) return 1;

  const left = tokenSet(a);
  const right = tokenSet(b);
  if (left.size === 0 || right.size === 0) return 0;

  let intersection = 0;
  for (const token of left) {
    if (right.has(token)) intersection++;
  }
  const union = left.size + right.size - intersection;

  return intersection / union;
};

/**
 * Deduplication key: lower-cased content tokens in sorted order, so that
 * case, filler words and word order do not distinguish two entries.
 * "Pain in the neck" and "neck pain" share the key "neck pain".
 */
export const canonicalEntityKey = (
  entity: string,
  stopWords: ReadonlySet<string>
): string => {
  const tokens = entity.toLowerCase().split(/\s+/).filter((token) => token.length > 0);
  const content = tokens.filter((token) => !stopWords.has(token));
  const keyTokens = content.length > 0 ? content : tokens;
  return [...keyTokens].sort().join(" ");
};
