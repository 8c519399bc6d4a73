/**
 * SENTIMENT ANALYZER SERVICE - EFFECT-TS
 *
 * Capability interface for per-statement patient sentiment, with a
 * deterministic cue-counting default.
 *
 * Default scoring over word tokens:
 *   a = anxious cues, r = reassured cues
 *   polarity   = POSITIVE if r > a, NEGATIVE if a > r, else NEUTRAL
 *   confidence = 0.5 + 0.5 * |r - a| / (r + a + 1)
 * Polarity maps to Reassured / Anxious; below the confidence threshold
 * the statement reads as Neutral.
 */

import { Context, Effect, Layer } from "effect";
import {
  POLARITY_TO_SENTIMENT,
  round3,
  type Polarity,
  type SentimentScore,
} from "../../schemas/analysis";
import type { ClinicalLexicon } from "../../schemas/lexicon";
import { defaultPipelineConfig, type PipelineConfig } from "../../schemas/pipeline";
import { CollaboratorError, describeCause } from "../errors";

// ============================================================================
// SERVICE INTERFACE
// ============================================================================

export interface SentimentAnalyzer {
  readonly analyzeSentiment: (statement: string) => Effect.Effect<SentimentScore, CollaboratorError>;
}

export const SentimentAnalyzer = Context.GenericTag<SentimentAnalyzer>("SentimentAnalyzer");

// ============================================================================
// CUE-BASED IMPLEMENTATION
// ============================================================================

export const wordTokens = (text: string): string[] => text.toLowerCase().match(/[a-z']+/g) ?? [];

class CueSentimentAnalyzerImpl implements SentimentAnalyzer {
  private readonly anxious: ReadonlySet<string>;
  private readonly reassured: ReadonlySet<string>;

  constructor(
    lexicon: Pick<ClinicalLexicon, "sentimentCues">,
    private readonly threshold: number
  ) {
    this.anxious = new Set(lexicon.sentimentCues.anxious);
    this.reassured = new Set(lexicon.sentimentCues.reassured);
  }

  private score(statement: string): SentimentScore {
    let anxious = 0;
    let reassured = 0;
    for (const token of wordTokens(statement)) {
      if (this.anxious.has(token)) anxious++;
      if (this.reassured.has(token)) reassured++;
    }

    const polarity: Polarity =
      reassured > anxious ? "POSITIVE" : anxious > reassured ? "NEGATIVE" : "NEUTRAL";
    const confidence = round3(0.5 + (0.5 * Math.abs(reassured - anxious)) / (reassured + anxious + 1));

    return {
      sentiment: confidence < this.threshold ? "Neutral" : POLARITY_TO_SENTIMENT[polarity],
      confidence,
      raw_label: polarity,
    };
  }

  readonly analyzeSentiment = (statement: string) =>
    Effect.try({
      try: () => this.score(statement),
      catch: (cause) =>
        new CollaboratorError({
          collaborator: "SentimentAnalyzer",
          operation: "analyzeSentiment",
          reason: describeCause(cause),
        }),
    });
}

export const createCueSentimentAnalyzer = (
  lexicon: Pick<ClinicalLexicon, "sentimentCues">,
  config: Pick<PipelineConfig, "sentimentConfidenceThreshold"> = defaultPipelineConfig
): SentimentAnalyzer => new CueSentimentAnalyzerImpl(lexicon, config.sentimentConfidenceThreshold);

export const CueSentimentAnalyzerLive = (
  lexicon: Pick<ClinicalLexicon, "sentimentCues">,
  config: Pick<PipelineConfig, "sentimentConfidenceThreshold"> = defaultPipelineConfig
) => Layer.succeed(SentimentAnalyzer, createCueSentimentAnalyzer(lexicon, config));
