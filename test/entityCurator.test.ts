/**
 * ENTITY CURATION - TEST SUITE
 *
 * Cleaning, validation, case/filler/order-insensitive dedup, substring
 * collapse and optional similarity merge.
 */

import { describe, it, expect } from "vitest";
import { canonicalEntityKey, jaccardSimilarity, tokenSet } from "../schemas/entities";
import { defaultLexicon } from "../services/config";
import { EntityCurator } from "../services/entityCurator";

const curator = new EntityCurator(defaultLexicon);
const stopWords = new Set(defaultLexicon.entityStopWords);

// ============================================================================
// 1. TOKEN UTILITIES
// ============================================================================

describe("Token utilities", () => {
  it("builds lower-cased token sets", () => {
    expect([...tokenSet("Neck  NECK pain")]).toEqual(["neck", "pain"]);
  });

  it("scores token overlap", () => {
    expect(jaccardSimilarity("a b", "b c")).toBeCloseTo(1 / 3, 10);
    expect(jaccardSimilarity("same", "same")).toBe(1);
    expect(jaccardSimilarity("", "pain")).toBe(0);
  });

  it("ignores case, filler words and order in the canonical key", () => {
    expect(canonicalEntityKey("Pain in the Neck", stopWords)).toBe("neck pain");
    expect(canonicalEntityKey("neck pain", stopWords)).toBe("neck pain");
  });

  it("falls back to every token when all are filler", () => {
    expect(canonicalEntityKey("the of", stopWords)).toBe("of the");
  });
});

// ============================================================================
// 2. CLEANING & VALIDATION
// ============================================================================

describe("cleanEntity / validateEntity", () => {
  it("strips edge punctuation and collapses whitespace", () => {
    expect(curator.cleanEntity("  ...back   pain!! ")).toBe("back pain");
  });

  it("rejects short, stop-word, numeric and punctuation-only entries", () => {
    expect(curator.validateEntity("a")).toBe(false);
    expect(curator.validateEntity("The")).toBe(false);
    expect(curator.validateEntity("42")).toBe(false);
    expect(curator.validateEntity("--")).toBe(false);
    expect(curator.validateEntity("x".repeat(101))).toBe(false);
    expect(curator.validateEntity("sore knee")).toBe(true);
  });

  it("honours configured length bounds", () => {
    const strict = new EntityCurator(defaultLexicon, { minLength: 5 });
    expect(strict.validateEntity("knee")).toBe(false);
    expect(strict.validateEntity("ankle")).toBe(true);
  });

  it("cleans before validating and deduplicating", () => {
    expect(curator.filterValidEntities(["(neck)", "neck", "the", "7"])).toEqual(["neck"]);
  });
});

// ============================================================================
// 3. CURATION
// ============================================================================

describe("curate", () => {
  it("keeps the first form of duplicates and collapses substrings", () => {
    expect(curator.curate(["neck pain", "NECK PAIN", "neck", "pain in neck"])).toEqual(["neck pain"]);
  });

  it("orders by length with ties in input order", () => {
    expect(curator.removeSubstrings(["arm", "leg", "left arm"])).toEqual(["left arm", "leg"]);
  });

  it("curates every category independently", () => {
    expect(
      curator.validateEntitiesDict({
        symptoms: ["pain", "neck pain"],
        anatomy: ["Neck", "neck"],
      })
    ).toEqual({
      symptoms: ["neck pain"],
      anatomy: ["Neck"],
    });
  });
});

// ============================================================================
// 4. SIMILARITY MERGE
// ============================================================================

describe("mergeSimilarEntities", () => {
  it("drops entries above the configured similarity", () => {
    expect(curator.mergeSimilarEntities(["lower back pain", "back pain lower", "neck"])).toEqual([
      "lower back pain",
      "neck",
    ]);
  });

  it("keeps partial overlaps under the default threshold", () => {
    expect(curator.mergeSimilarEntities(["lower back pain", "back pain"])).toEqual([
      "lower back pain",
      "back pain",
    ]);
  });

  it("accepts an explicit threshold", () => {
    expect(curator.mergeSimilarEntities(["lower back pain", "back pain"], 0.5)).toEqual([
      "lower back pain",
    ]);
  });
});
