/**
 * CONVERSATION ANALYSIS SCHEMA
 *
 * Per-statement sentiment and intent results, their conversation-level
 * aggregates, and scored keyword phrases.
 */

import { Schema as S } from "effect";

// ============================================================================
// SENTIMENT
// ============================================================================

export const SentimentLabelSchema = S.Literal("Anxious", "Neutral", "Reassured");
export type SentimentLabel = S.Schema.Type<typeof SentimentLabelSchema>;

export const SENTIMENT_LABELS: ReadonlyArray<SentimentLabel> = ["Anxious", "Neutral", "Reassured"];

export const SENTIMENT_SCORES: Readonly<Record<SentimentLabel, number>> = {
  Anxious: -1,
  Neutral: 0,
  Reassured: 1,
};

export const PolaritySchema = S.Literal("POSITIVE", "NEGATIVE", "NEUTRAL");
export type Polarity = S.Schema.Type<typeof PolaritySchema>;

/**
 * Raw polarity labels mapped to the consultation vocabulary.
 */
export const POLARITY_TO_SENTIMENT: Readonly<Record<Polarity, SentimentLabel>> = {
  POSITIVE: "Reassured",
  NEGATIVE: "Anxious",
  NEUTRAL: "Neutral",
};

export const SentimentScoreSchema = S.Struct({
  sentiment: SentimentLabelSchema,
  confidence: S.Number,
  raw_label: S.String,
});
export type SentimentScore = S.Schema.Type<typeof SentimentScoreSchema>;

export const SentimentResultSchema = S.Struct({
  text: S.String,
  ...SentimentScoreSchema.fields,
});
export type SentimentResult = S.Schema.Type<typeof SentimentResultSchema>;

export const OverallSentimentSchema = S.Struct({
  distribution: S.Struct({
    Anxious: S.Int,
    Neutral: S.Int,
    Reassured: S.Int,
  }),
  dominant_sentiment: SentimentLabelSchema,
  total_statements: S.Int,
  avg_confidence: S.Number,
});
export type OverallSentiment = S.Schema.Type<typeof OverallSentimentSchema>;

export const TimelinePointSchema = S.Struct({
  position: S.Int,
  sentiment: SentimentLabelSchema,
  score: S.Number,
  confidence: S.Number,
});
export type TimelinePoint = S.Schema.Type<typeof TimelinePointSchema>;

// ============================================================================
// INTENT
// ============================================================================

export const UNKNOWN_INTENT = "unknown";

export const IntentScoreSchema = S.Struct({
  intent: S.String,
  confidence: S.Number,
  all_scores: S.Record({ key: S.String, value: S.Number }),
});
export type IntentScore = S.Schema.Type<typeof IntentScoreSchema>;

export const IntentResultSchema = S.Struct({
  text: S.String,
  ...IntentScoreSchema.fields,
});
export type IntentResult = S.Schema.Type<typeof IntentResultSchema>;

// ============================================================================
// KEYWORDS
// ============================================================================

export type ScoredPhrase = readonly [phrase: string, score: number];

export const KeywordEntrySchema = S.Struct({
  keyword: S.String,
  score: S.Number,
});
export type KeywordEntry = S.Schema.Type<typeof KeywordEntrySchema>;

export interface KeywordCategoryGroups {
  symptoms: ScoredPhrase[];
  treatments: ScoredPhrase[];
  conditions: ScoredPhrase[];
  general: ScoredPhrase[];
}

/**
 * Round to three decimal places, the precision every reported score uses.
 */
export const round3 = (value: number): number => Math.round(value * 1000) / 1000;
