/**
 * CONVERSATION ANALYSIS
 *
 * Deterministic aggregation of per-statement sentiment and intent results.
 * Results are positional: result i belongs to scorable statement i.
 */

import {
  SENTIMENT_LABELS,
  SENTIMENT_SCORES,
  UNKNOWN_INTENT,
  round3,
  type IntentResult,
  type OverallSentiment,
  type SentimentLabel,
  type SentimentResult,
  type TimelinePoint,
} from "../schemas/analysis";
import { countWords } from "../schemas/transcript";

/**
 * Statements long enough to score. Shorter ones ("Yes.", "Thank you.")
 * carry little signal and are skipped before any collaborator call.
 */
export const selectScorableStatements = (
  statements: ReadonlyArray<string>,
  minWords: number
): string[] => statements.filter((statement) => countWords(statement) >= minWords);

// ============================================================================
// SENTIMENT
// ============================================================================

export const getOverallSentiment = (results: ReadonlyArray<SentimentResult>): OverallSentiment => {
  const distribution: Record<SentimentLabel, number> = { Anxious: 0, Neutral: 0, Reassured: 0 };
  for (const result of results) distribution[result.sentiment]++;

  // first maximum in label order; Neutral when nothing was scored
  let dominant: SentimentLabel = "Neutral";
  let best = 0;
  for (const label of SENTIMENT_LABELS) {
    if (distribution[label] > best) {
      best = distribution[label];
      dominant = label;
    }
  }

  const totalConfidence = results.reduce((sum, result) => sum + result.confidence, 0);

  return {
    distribution,
    dominant_sentiment: dominant,
    total_statements: results.length,
    avg_confidence: results.length === 0 ? 0 : round3(totalConfidence / results.length),
  };
};

export const getSentimentTimeline = (results: ReadonlyArray<SentimentResult>): TimelinePoint[] =>
  results.map((result, index) => ({
    position: index + 1,
    sentiment: result.sentiment,
    score: SENTIMENT_SCORES[result.sentiment],
    confidence: result.confidence,
  }));

// ============================================================================
// INTENT
// ============================================================================

/**
 * Count per configured label, zero included. Results carrying a label
 * outside the list (the failure fallback "unknown") are not counted.
 */
export const getIntentDistribution = (
  results: ReadonlyArray<IntentResult>,
  labels: ReadonlyArray<string>
): Record<string, number> => {
  const distribution = new Map<string, number>(labels.map((label) => [label, 0]));
  for (const { intent } of results) {
    const count = distribution.get(intent);
    if (count !== undefined) distribution.set(intent, count + 1);
  }
  return Object.fromEntries(distribution);
};

export const getDominantIntent = (distribution: Readonly<Record<string, number>>): string => {
  let dominant = UNKNOWN_INTENT;
  let best = 0;
  for (const [label, count] of Object.entries(distribution)) {
    if (count > best) {
      best = count;
      dominant = label;
    }
  }
  return dominant;
};
