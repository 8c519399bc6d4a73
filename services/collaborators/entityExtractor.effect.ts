/**
 * ENTITY EXTRACTOR SERVICE - EFFECT-TS
 *
 * Capability interface for medical entity recognition plus the default
 * rule-based implementation. A learned recognizer plugs in by providing
 * another Layer for the same tag.
 *
 * Default rules:
 * - lexicon symptom / treatment / anatomy terms on word boundaries
 * - "<anatomy> pain|ache|stiffness|discomfort" phrases as symptoms
 * - "<n> sessions of <therapy>" phrases as treatments
 * - the diagnosis phrase, when one is stated
 */

import { Context, Effect, Layer } from "effect";
import {
  ENTITY_LABELS,
  emptyEntityCategories,
  type EntityCategory,
  type ScoredEntity,
} from "../../schemas/entities";
import { escapeRegExp, wholeWordPattern, type ClinicalLexicon } from "../../schemas/lexicon";
import { defaultPipelineConfig, type PipelineConfig } from "../../schemas/pipeline";
import { captureRule, firstMatch, type ExtractionRule } from "../rules";
import { CollaboratorError, describeCause } from "../errors";

// ============================================================================
// SERVICE INTERFACE
// ============================================================================

export interface EntityExtractor {
  readonly extractEntities: (
    text: string
  ) => Effect.Effect<Record<string, string[]>, CollaboratorError>;

  readonly extractWithConfidence: (
    text: string
  ) => Effect.Effect<ScoredEntity[], CollaboratorError>;

  readonly extractDiagnosis: (text: string) => Effect.Effect<string | null, CollaboratorError>;

  readonly extractPrognosis: (text: string) => Effect.Effect<string | null, CollaboratorError>;
}

export const EntityExtractor = Context.GenericTag<EntityExtractor>("EntityExtractor");

// ============================================================================
// RULE TABLES
// ============================================================================

export const NER_DIAGNOSIS_RULES: ReadonlyArray<ExtractionRule<string>> = [
  captureRule("diagnosed-with", "diagnosed with\\s+([^,.]+)"),
  captureRule("diagnosis-label", "diagnosis[:\\s]+([^,.]+)"),
  captureRule("it-was-injury", "it was (?:a|an)\\s+([^,.]+?\\s+injury)\\b"),
  captureRule("consistent-with", "consistent with\\s+([^,.]+)"),
];

export const NER_PROGNOSIS_RULES: ReadonlyArray<ExtractionRule<string>> = [
  captureRule("full-recovery", "(full recovery[^.]*)"),
  captureRule("expect-recovery", "(expect[^.]*recovery[^.]*)"),
  captureRule("no-foresight", "(don't foresee[^.]*)"),
  captureRule("prognosis", "(prognosis[^.]*)"),
];

const SESSIONS_OF = /\b\w+\s+sessions?\s+of\s+\w+/gi;

interface Hit {
  readonly category: EntityCategory;
  readonly text: string;
  readonly start: number;
  readonly end: number;
}

// ============================================================================
// RULE-BASED IMPLEMENTATION
// ============================================================================

export type EntityRuleConfig = Pick<PipelineConfig, "maxEntitiesPerCategory" | "ruleConfidence">;

class RuleEntityExtractorImpl implements EntityExtractor {
  private readonly termPatterns: ReadonlyArray<{ category: EntityCategory; pattern: RegExp }>;
  private readonly anatomicalSymptom: RegExp;

  constructor(
    lexicon: ClinicalLexicon,
    private readonly config: EntityRuleConfig
  ) {
    const terms = (category: EntityCategory, list: ReadonlyArray<string>) =>
      list.map((term) => ({ category, pattern: wholeWordPattern(term) }));

    this.termPatterns = [
      ...terms("symptoms", lexicon.symptomKeywords),
      ...terms("treatments", lexicon.treatmentKeywords),
      ...terms("anatomy", lexicon.anatomyTerms),
    ];

    const alternation = (list: ReadonlyArray<string>) => list.map(escapeRegExp).join("|");
    this.anatomicalSymptom = new RegExp(
      `\\b(?:${alternation(lexicon.anatomyTerms)})\\s+(?:${alternation(lexicon.anatomicalSymptomTerms)})\\b`,
      "gi"
    );
  }

  private collectHits(text: string): Hit[] {
    const hits: Hit[] = [];
    const push = (category: EntityCategory, match: RegExpMatchArray) => {
      const start = match.index ?? 0;
      hits.push({ category, text: match[0], start, end: start + match[0].length });
    };

    for (const { category, pattern } of this.termPatterns) {
      for (const match of text.matchAll(pattern)) push(category, match);
    }
    for (const match of text.matchAll(this.anatomicalSymptom)) push("symptoms", match);
    for (const match of text.matchAll(SESSIONS_OF)) push("treatments", match);

    const diagnosis = firstMatch(NER_DIAGNOSIS_RULES, text);
    if (diagnosis !== null) {
      const start = Math.max(0, text.toLowerCase().indexOf(diagnosis.toLowerCase()));
      hits.push({ category: "diagnoses", text: diagnosis, start, end: start + diagnosis.length });
    }

    return hits;
  }

  /**
   * Lower-cased and deduplicated, entries of two characters or fewer
   * dropped, longest first, capped per category.
   */
  private cleanCategory(entries: ReadonlyArray<string>): string[] {
    const seen = new Set<string>();
    const kept: string[] = [];

    for (const entry of entries) {
      const normalized = entry.toLowerCase().trim();
      if (normalized.length <= 2 || seen.has(normalized)) continue;
      seen.add(normalized);
      kept.push(normalized);
    }

    return kept
      .sort((a, b) => b.length - a.length)
      .slice(0, this.config.maxEntitiesPerCategory);
  }

  private guard<A>(operation: string, run: () => A): Effect.Effect<A, CollaboratorError> {
    return Effect.try({
      try: run,
      catch: (cause) =>
        new CollaboratorError({
          collaborator: "EntityExtractor",
          operation,
          reason: describeCause(cause),
        }),
    });
  }

  readonly extractEntities = (text: string) =>
    this.guard("extractEntities", () => {
      const raw = emptyEntityCategories();
      for (const hit of this.collectHits(text)) raw[hit.category].push(hit.text);

      const cleaned: Record<string, string[]> = {};
      for (const [category, entries] of Object.entries(raw)) {
        cleaned[category] = this.cleanCategory(entries);
      }
      return cleaned;
    });

  readonly extractWithConfidence = (text: string) =>
    this.guard("extractWithConfidence", () =>
      this.collectHits(text)
        .sort((a, b) => a.start - b.start)
        .map(
          (hit): ScoredEntity => ({
            text: hit.text,
            label: ENTITY_LABELS[hit.category],
            start: hit.start,
            end: hit.end,
            confidence: this.config.ruleConfidence,
          })
        )
    );

  readonly extractDiagnosis = (text: string) =>
    this.guard("extractDiagnosis", () => firstMatch(NER_DIAGNOSIS_RULES, text));

  readonly extractPrognosis = (text: string) =>
    this.guard("extractPrognosis", () => firstMatch(NER_PROGNOSIS_RULES, text));
}

export const createRuleEntityExtractor = (
  lexicon: ClinicalLexicon,
  config: EntityRuleConfig = defaultPipelineConfig
): EntityExtractor => new RuleEntityExtractorImpl(lexicon, config);

export const RuleEntityExtractorLive = (
  lexicon: ClinicalLexicon,
  config: EntityRuleConfig = defaultPipelineConfig
) => Layer.succeed(EntityExtractor, createRuleEntityExtractor(lexicon, config));
