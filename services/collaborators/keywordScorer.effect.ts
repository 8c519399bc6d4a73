/**
 * KEYWORD SCORER SERVICE - EFFECT-TS
 *
 * Capability interface for keyphrase scoring, with a deterministic
 * frequency scorer as the default, plus pure views over scored phrases.
 *
 * Default algorithm:
 * 1. Split lower-cased text at punctuation
 * 2. Break each chunk into runs at stop words, noise words and bare numbers
 * 3. Emit every 1..ngramMax word n-gram of each run
 * 4. score = occurrences * words in phrase, normalized by the best score
 * 5. Highest score first, earlier first occurrence on ties
 */

import { Context, Effect, Layer } from "effect";
import { round3, type KeywordCategoryGroups, type ScoredPhrase } from "../../schemas/analysis";
import type { ClinicalLexicon } from "../../schemas/lexicon";
import { defaultPipelineConfig, type PipelineConfig } from "../../schemas/pipeline";
import { CollaboratorError, describeCause } from "../errors";

// ============================================================================
// SERVICE INTERFACE
// ============================================================================

export interface KeywordScorer {
  readonly extractKeywords: (
    text: string,
    topN: number
  ) => Effect.Effect<ScoredPhrase[], CollaboratorError>;
}

export const KeywordScorer = Context.GenericTag<KeywordScorer>("KeywordScorer");

// ============================================================================
// FREQUENCY IMPLEMENTATION
// ============================================================================

interface PhraseStats {
  count: number;
  readonly words: number;
  readonly first: number;
}

class FrequencyKeywordScorerImpl implements KeywordScorer {
  private readonly breakers: ReadonlySet<string>;

  constructor(
    stopWords: ReadonlyArray<string>,
    noiseWords: ReadonlyArray<string>,
    private readonly ngramMax: number
  ) {
    this.breakers = new Set([...stopWords, ...noiseWords].map((word) => word.toLowerCase()));
  }

  private runs(text: string): string[][] {
    const runs: string[][] = [];

    for (const chunk of text.toLowerCase().split(/[^\p{L}\p{N}'\s-]+/u)) {
      let current: string[] = [];
      const words = chunk
        .split(/\s+/)
        .map((word) => word.replace(/^['-]+|['-]+$/g, ""))
        .filter((word) => word.length > 0);

      for (const word of words) {
        if (this.breakers.has(word) || /^\d+$/.test(word)) {
          if (current.length > 0) runs.push(current);
          current = [];
        } else {
          current.push(word);
        }
      }
      if (current.length > 0) runs.push(current);
    }

    return runs;
  }

  score(text: string, topN: number): ScoredPhrase[] {
    const stats = new Map<string, PhraseStats>();
    let order = 0;

    for (const run of this.runs(text)) {
      for (let size = 1; size <= this.ngramMax; size++) {
        for (let start = 0; start + size <= run.length; start++) {
          const phrase = run.slice(start, start + size).join(" ");
          const existing = stats.get(phrase);
          if (existing) {
            existing.count++;
          } else {
            stats.set(phrase, { count: 1, words: size, first: order++ });
          }
        }
      }
    }

    const raw = [...stats.entries()].map(([phrase, { count, words, first }]) => ({
      phrase,
      value: count * words,
      first,
    }));
    const best = raw.reduce((max, entry) => Math.max(max, entry.value), 0);
    if (best === 0) return [];

    return raw
      .sort((a, b) => b.value - a.value || a.first - b.first)
      .slice(0, topN)
      .map((entry): ScoredPhrase => [entry.phrase, round3(entry.value / best)]);
  }

  readonly extractKeywords = (text: string, topN: number) =>
    Effect.try({
      try: () => this.score(text, topN),
      catch: (cause) =>
        new CollaboratorError({
          collaborator: "KeywordScorer",
          operation: "extractKeywords",
          reason: describeCause(cause),
        }),
    });
}

export const createFrequencyKeywordScorer = (
  stopWords: ReadonlyArray<string>,
  lexicon: Pick<ClinicalLexicon, "keywordNoiseWords">,
  config: Pick<PipelineConfig, "keywordNgramMax"> = defaultPipelineConfig
): KeywordScorer =>
  new FrequencyKeywordScorerImpl(stopWords, lexicon.keywordNoiseWords, config.keywordNgramMax);

export const FrequencyKeywordScorerLive = (
  stopWords: ReadonlyArray<string>,
  lexicon: Pick<ClinicalLexicon, "keywordNoiseWords">,
  config: Pick<PipelineConfig, "keywordNgramMax"> = defaultPipelineConfig
) => Layer.succeed(KeywordScorer, createFrequencyKeywordScorer(stopWords, lexicon, config));

// ============================================================================
// VIEWS
// ============================================================================

const mentionsAny = (phrase: string, terms: ReadonlyArray<string>): boolean => {
  const lower = phrase.toLowerCase();
  return terms.some((term) => lower.includes(term));
};

/**
 * Keywords naming something clinical (an injury, a therapy, a symptom...).
 */
export const extractMedicalPhrases = (
  keywords: ReadonlyArray<ScoredPhrase>,
  lexicon: Pick<ClinicalLexicon, "medicalIndicators">
): string[] =>
  keywords
    .filter(([phrase]) => mentionsAny(phrase, lexicon.medicalIndicators))
    .map(([phrase]) => phrase);

/**
 * A phrase can land in several categories; "general" holds the rest.
 */
export const categorizeKeywords = (
  keywords: ReadonlyArray<ScoredPhrase>,
  lexicon: Pick<ClinicalLexicon, "keywordCategories">
): KeywordCategoryGroups => {
  const groups: KeywordCategoryGroups = { symptoms: [], treatments: [], conditions: [], general: [] };
  const { symptoms, treatments, conditions } = lexicon.keywordCategories;

  for (const keyword of keywords) {
    const [phrase] = keyword;
    let categorized = false;

    if (mentionsAny(phrase, symptoms)) {
      groups.symptoms.push(keyword);
      categorized = true;
    }
    if (mentionsAny(phrase, treatments)) {
      groups.treatments.push(keyword);
      categorized = true;
    }
    if (mentionsAny(phrase, conditions)) {
      groups.conditions.push(keyword);
      categorized = true;
    }
    if (!categorized) groups.general.push(keyword);
  }

  return groups;
};

export const topKeywordsSummary = (keywords: ReadonlyArray<ScoredPhrase>, n = 5): string =>
  keywords
    .slice(0, n)
    .map(([phrase]) => phrase)
    .join(", ");
