/**
 * CONVERSATION ANALYSIS - TEST SUITE
 */

import { describe, it, expect } from "vitest";
import type { IntentResult, SentimentResult } from "../schemas/analysis";
import {
  getDominantIntent,
  getIntentDistribution,
  getOverallSentiment,
  getSentimentTimeline,
  selectScorableStatements,
} from "../services/conversationAnalysis";

const sentiment = (label: SentimentResult["sentiment"], confidence: number): SentimentResult => ({
  text: `${label} statement`,
  sentiment: label,
  confidence,
  raw_label: "test",
});

const intent = (label: string): IntentResult => ({
  text: `${label} statement`,
  intent: label,
  confidence: 0.5,
  all_scores: {},
});

describe("selectScorableStatements", () => {
  it("skips statements under the word minimum", () => {
    expect(selectScorableStatements(["Yes.", "It still aches.", "Thank you."], 3)).toEqual([
      "It still aches.",
    ]);
  });
});

describe("getOverallSentiment", () => {
  it("counts labels and averages confidence", () => {
    expect(
      getOverallSentiment([
        sentiment("Anxious", 0.8),
        sentiment("Reassured", 0.9),
        sentiment("Anxious", 0.75),
      ])
    ).toEqual({
      distribution: { Anxious: 2, Neutral: 0, Reassured: 1 },
      dominant_sentiment: "Anxious",
      total_statements: 3,
      avg_confidence: 0.817,
    });
  });

  it("resolves ties to the earlier label", () => {
    const overall = getOverallSentiment([sentiment("Reassured", 1), sentiment("Neutral", 1)]);
    expect(overall.dominant_sentiment).toBe("Neutral");
  });

  it("defaults to neutral with nothing scored", () => {
    expect(getOverallSentiment([])).toEqual({
      distribution: { Anxious: 0, Neutral: 0, Reassured: 0 },
      dominant_sentiment: "Neutral",
      total_statements: 0,
      avg_confidence: 0,
    });
  });
});

describe("getSentimentTimeline", () => {
  it("numbers statements from one and scores each label", () => {
    expect(getSentimentTimeline([sentiment("Anxious", 0.8), sentiment("Reassured", 0.9)])).toEqual([
      { position: 1, sentiment: "Anxious", score: -1, confidence: 0.8 },
      { position: 2, sentiment: "Reassured", score: 1, confidence: 0.9 },
    ]);
  });
});

describe("Intent distribution", () => {
  const labels = ["asking questions", "expressing relief"];

  it("counts every configured label and ignores others", () => {
    expect(
      getIntentDistribution(
        [intent("expressing relief"), intent("unknown"), intent("expressing relief")],
        labels
      )
    ).toEqual({ "asking questions": 0, "expressing relief": 2 });
  });

  it("picks the first most frequent intent", () => {
    expect(getDominantIntent({ "asking questions": 1, "expressing relief": 1 })).toBe("asking questions");
  });

  it("reports unknown when nothing was classified", () => {
    expect(getDominantIntent(getIntentDistribution([], labels))).toBe("unknown");
  });
});
