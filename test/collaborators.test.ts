/**
 * COLLABORATOR SERVICES - TEST SUITE
 *
 * Default entity extractor, sentiment analyzer, intent classifier and
 * keyword scorer, exercised through their Effect interfaces and Layers.
 */

import { describe, it, expect } from "vitest";
import { Effect, Either, pipe } from "effect";
import {
  EntityExtractor,
  IntentClassifier,
  KeywordScorer,
  SentimentAnalyzer,
  DefaultCollaboratorsLive,
  categorizeKeywords,
  createCueIntentClassifier,
  createCueSentimentAnalyzer,
  createFrequencyKeywordScorer,
  createRuleEntityExtractor,
  extractMedicalPhrases,
  topKeywordsSummary,
  wordTokens,
} from "../services/collaborators";
import { defaultKeywordStopWords, defaultLexicon } from "../services/config";

const LUMBAR_NOTE =
  "My lower back pain started after lifting. I did four sessions of physiotherapy. It was a lumbar strain injury.";

// ============================================================================
// 1. ENTITY EXTRACTOR
// ============================================================================

describe("Rule entity extractor", () => {
  const extractor = createRuleEntityExtractor(defaultLexicon);

  it("categorizes terms, anatomical symptoms and session phrases", () => {
    const entities = Effect.runSync(extractor.extractEntities(LUMBAR_NOTE));

    expect(entities).toEqual({
      symptoms: ["lower back pain", "pain"],
      treatments: ["four sessions of physiotherapy", "physiotherapy", "sessions"],
      diagnoses: ["lumbar strain injury"],
      anatomy: ["lower back", "back"],
    });
  });

  it("caps each category", () => {
    const capped = createRuleEntityExtractor(defaultLexicon, {
      maxEntitiesPerCategory: 1,
      ruleConfidence: 0.5,
    });
    const entities = Effect.runSync(capped.extractEntities(LUMBAR_NOTE));

    expect(entities["symptoms"]).toEqual(["lower back pain"]);
    expect(entities["treatments"]).toEqual(["four sessions of physiotherapy"]);
  });

  it("reports spans in text order with the rule confidence", () => {
    const scored = Effect.runSync(extractor.extractWithConfidence(LUMBAR_NOTE));

    expect(scored[0]).toEqual({
      text: "lower back",
      label: "BODY_PART_ORGAN",
      start: 3,
      end: 13,
      confidence: 0.85,
    });
    expect(scored[1]?.text).toBe("lower back pain");
    expect(scored.every((entity) => entity.confidence === 0.85)).toBe(true);
  });

  it("extracts diagnosis and prognosis phrases", () => {
    expect(Effect.runSync(extractor.extractDiagnosis(LUMBAR_NOTE))).toBe("lumbar strain injury");
    expect(Effect.runSync(extractor.extractPrognosis("Full recovery expected."))).toBe(
      "Full recovery expected"
    );
    expect(Effect.runSync(extractor.extractPrognosis(LUMBAR_NOTE))).toBeNull();
  });
});

// ============================================================================
// 2. SENTIMENT ANALYZER
// ============================================================================

describe("Cue sentiment analyzer", () => {
  const analyzer = createCueSentimentAnalyzer(defaultLexicon);
  const analyze = (statement: string) => Effect.runSync(analyzer.analyzeSentiment(statement));

  it("tokenizes words with apostrophes", () => {
    expect(wordTokens("I'm worried, 2 days!")).toEqual(["i'm", "worried", "days"]);
  });

  it("reads anxious statements", () => {
    expect(analyze("I'm worried the pain will get worse.")).toEqual({
      sentiment: "Anxious",
      confidence: 0.833,
      raw_label: "NEGATIVE",
    });
  });

  it("reads reassured statements", () => {
    expect(analyze("Thanks, that's good to hear.")).toEqual({
      sentiment: "Reassured",
      confidence: 0.833,
      raw_label: "POSITIVE",
    });
  });

  it("reads balanced or cue-free statements as neutral", () => {
    expect(analyze("I feel better but still stiff.")).toEqual({
      sentiment: "Neutral",
      confidence: 0.5,
      raw_label: "NEUTRAL",
    });
    expect(analyze("")).toEqual({ sentiment: "Neutral", confidence: 0.5, raw_label: "NEUTRAL" });
  });

  it("maps low-confidence polarity to neutral", () => {
    const cautious = createCueSentimentAnalyzer(defaultLexicon, { sentimentConfidenceThreshold: 0.9 });
    expect(Effect.runSync(cautious.analyzeSentiment("The pain is there."))).toEqual({
      sentiment: "Neutral",
      confidence: 0.75,
      raw_label: "NEGATIVE",
    });
  });
});

// ============================================================================
// 3. INTENT CLASSIFIER
// ============================================================================

describe("Cue intent classifier", () => {
  const classifier = createCueIntentClassifier(defaultLexicon);

  it("ranks every label with smoothed cue counts", () => {
    const result = Effect.runSync(
      classifier.classifyIntent("That's a relief. Will it affect me in the future?")
    );

    expect(result.intent).toBe("seeking reassurance");
    expect(result.confidence).toBe(0.544);
    expect(Object.keys(result.all_scores)).toEqual([
      "seeking reassurance",
      "asking questions",
      "expressing relief",
      "reporting symptoms",
      "expressing concern",
      "describing history",
      "confirming understanding",
    ]);
    expect(result.all_scores["asking questions"]).toBe(0.193);
    expect(result.all_scores["reporting symptoms"]).toBe(0.018);
  });

  it("breaks ties by declaration order", () => {
    const result = Effect.runSync(classifier.classifyIntent("The weather is mild."));

    expect(result.intent).toBe("seeking reassurance");
    expect(result.confidence).toBe(0.143);
  });

  it("fails with a collaborator error when no labels are configured", () => {
    const empty = createCueIntentClassifier({ intentCues: [] });
    const result = Effect.runSync(Effect.either(empty.classifyIntent("Anything?")));

    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left.reason).toBe("no intent labels configured");
      expect(result.left.message).toBe(
        "IntentClassifier.classifyIntent failed: no intent labels configured"
      );
    }
  });
});

// ============================================================================
// 4. KEYWORD SCORER
// ============================================================================

describe("Frequency keyword scorer", () => {
  const scorer = createFrequencyKeywordScorer(defaultKeywordStopWords, defaultLexicon);
  const text = "Neck pain and neck stiffness. The neck pain is better.";
  const all = Effect.runSync(scorer.extractKeywords(text, 10));

  it("scores phrases by frequency times length", () => {
    expect(all).toEqual([
      ["neck pain", 1],
      ["neck", 0.75],
      ["pain", 0.5],
      ["neck stiffness", 0.5],
      ["stiffness", 0.25],
      ["better", 0.25],
    ]);
  });

  it("returns the top N", () => {
    expect(Effect.runSync(scorer.extractKeywords(text, 2))).toEqual([
      ["neck pain", 1],
      ["neck", 0.75],
    ]);
  });

  it("breaks runs at numbers and stop words", () => {
    expect(Effect.runSync(scorer.extractKeywords("2 weeks of pain", 5))).toEqual([
      ["weeks", 1],
      ["pain", 1],
    ]);
  });

  it("returns nothing for text without content words", () => {
    expect(Effect.runSync(scorer.extractKeywords("", 5))).toEqual([]);
    expect(Effect.runSync(scorer.extractKeywords("Yes. Okay, thank you.", 5))).toEqual([]);
  });

  it("filters medical phrases", () => {
    expect(extractMedicalPhrases(all, defaultLexicon)).toEqual([
      "neck pain",
      "pain",
      "neck stiffness",
      "stiffness",
    ]);
  });

  it("groups keywords by category", () => {
    const groups = categorizeKeywords(all, defaultLexicon);

    expect(groups.symptoms.map(([phrase]) => phrase)).toEqual([
      "neck pain",
      "pain",
      "neck stiffness",
      "stiffness",
    ]);
    expect(groups.treatments).toEqual([]);
    expect(groups.general.map(([phrase]) => phrase)).toEqual(["neck", "better"]);
  });

  it("summarizes the top keywords", () => {
    expect(topKeywordsSummary(all, 2)).toBe("neck pain, neck");
  });
});

// ============================================================================
// 5. DEFAULT LAYER
// ============================================================================

describe("DefaultCollaboratorsLive", () => {
  it("provides every collaborator tag", async () => {
    const program = Effect.gen(function* (_) {
      const entities = yield* _(EntityExtractor);
      const sentiment = yield* _(SentimentAnalyzer);
      const intent = yield* _(IntentClassifier);
      const keywords = yield* _(KeywordScorer);

      return {
        diagnosis: yield* _(entities.extractDiagnosis("Diagnosis: tennis elbow.")),
        sentiment: (yield* _(sentiment.analyzeSentiment("I am so relieved."))).sentiment,
        intent: (yield* _(intent.classifyIntent("How long will this take?"))).intent,
        keywords: yield* _(keywords.extractKeywords("tennis elbow", 1)),
      };
    });

    const result = await Effect.runPromise(pipe(program, Effect.provide(DefaultCollaboratorsLive())));

    expect(result).toEqual({
      diagnosis: "tennis elbow",
      sentiment: "Reassured",
      intent: "asking questions",
      keywords: [["tennis elbow", 1]],
    });
  });
});
