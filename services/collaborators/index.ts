/**
 * COLLABORATORS - PUBLIC API
 *
 * Capability interfaces consumed by the pipeline and the default
 * deterministic Layers that satisfy them.
 */

import { Layer } from "effect";
import type { ClinicalLexicon } from "../../schemas/lexicon";
import { defaultPipelineConfig, type PipelineConfig } from "../../schemas/pipeline";
import { defaultKeywordStopWords, defaultLexicon } from "../config";
import { RuleEntityExtractorLive } from "./entityExtractor.effect";
import { CueSentimentAnalyzerLive } from "./sentimentAnalyzer.effect";
import { CueIntentClassifierLive } from "./intentClassifier.effect";
import { FrequencyKeywordScorerLive } from "./keywordScorer.effect";

export * from "./entityExtractor.effect";
export * from "./sentimentAnalyzer.effect";
export * from "./intentClassifier.effect";
export * from "./keywordScorer.effect";

export interface CollaboratorOptions {
  readonly lexicon?: ClinicalLexicon;
  readonly config?: PipelineConfig;
  readonly keywordStopWords?: ReadonlyArray<string>;
}

/**
 * Every collaborator tag satisfied by its rule/cue/frequency default.
 */
export const DefaultCollaboratorsLive = (options: CollaboratorOptions = {}) => {
  const lexicon = options.lexicon ?? defaultLexicon;
  const config = options.config ?? defaultPipelineConfig;

  return Layer.mergeAll(
    RuleEntityExtractorLive(lexicon, config),
    CueSentimentAnalyzerLive(lexicon, config),
    CueIntentClassifierLive(lexicon),
    FrequencyKeywordScorerLive(options.keywordStopWords ?? defaultKeywordStopWords, lexicon, config)
  );
};
