/**
 * ENTITY CURATOR
 *
 * Turns a raw per-category entity list into a clean, non-redundant one:
 * 1. validate + clean (length bounds, stop words, bare numbers, bare punctuation)
 * 2. deduplicate on a case-, filler- and order-insensitive key, first occurrence wins
 * 3. collapse entries contained in a longer kept entry
 * 4. optionally merge near-duplicates by token Jaccard similarity
 *
 * After curation no two entries in a category are case-insensitively equal
 * and none is a case-insensitive substring of another.
 */

import {
  canonicalEntityKey,
  defaultCuratorConfig,
  jaccardSimilarity,
  type CuratorConfig,
  type EntityCategories,
} from "../schemas/entities";
import type { ClinicalLexicon } from "../schemas/lexicon";

const EDGE_PUNCTUATION = /^[\p{P}\p{S}]+|[\p{P}\p{S}]+$/gu;

export class EntityCurator {
  private readonly stopWords: ReadonlySet<string>;
  private readonly config: CuratorConfig;

  constructor(
    lexicon: Pick<ClinicalLexicon, "entityStopWords">,
    config: Partial<CuratorConfig> = {}
  ) {
    this.stopWords = new Set(lexicon.entityStopWords.map((word) => word.toLowerCase()));
    this.config = { ...defaultCuratorConfig, ...config };
  }

  /**
   * Trim, collapse internal whitespace and strip punctuation at both ends.
   */
  cleanEntity(entity: string): string {
    return entity.trim().replace(/\s+/g, " ").replace(EDGE_PUNCTUATION, "").trim();
  }

  validateEntity(entity: string): boolean {
    const trimmed = entity.trim();

    if (trimmed.length < this.config.minLength || trimmed.length > this.config.maxLength) {
      return false;
    }
    if (this.stopWords.has(trimmed.toLowerCase())) return false;
    if (/^\d+$/.test(trimmed)) return false;
    if (/^[^\w\s]+$/.test(trimmed)) return false;

    return true;
  }

  /**
   * Clean, validate, then deduplicate. Cleaning runs first so that an
   * entity wrapped in punctuation is judged on its content.
   */
  filterValidEntities(entities: ReadonlyArray<string>): string[] {
    const kept: string[] = [];
    const seen = new Set<string>();

    for (const entity of entities) {
      const cleaned = this.cleanEntity(entity);
      if (!this.validateEntity(cleaned)) continue;

      const key = canonicalEntityKey(cleaned, this.stopWords);
      if (seen.has(key)) continue;

      seen.add(key);
      kept.push(cleaned);
    }

    return kept;
  }

  /**
   * Longest first; an entry contained in an already-kept entry is dropped.
   * Array.prototype.sort is stable, so equal lengths keep input order.
   */
  removeSubstrings(entities: ReadonlyArray<string>): string[] {
    const sorted = [...entities].sort((a, b) => b.length - a.length);
    const kept: string[] = [];

    for (const entity of sorted) {
      const lower = entity.toLowerCase();
      const subsumed = kept.some((existing) => {
        const existingLower = existing.toLowerCase();
        return existingLower !== lower && existingLower.includes(lower);
      });
      if (!subsumed) kept.push(entity);
    }

    return kept;
  }

  curate(entities: ReadonlyArray<string>): string[] {
    return this.removeSubstrings(this.filterValidEntities(entities));
  }

  validateEntitiesDict(categories: EntityCategories): Record<string, string[]> {
    const curated: Record<string, string[]> = {};
    for (const [category, entities] of Object.entries(categories)) {
      curated[category] = this.curate(entities);
    }
    return curated;
  }

  /**
   * Drop entries whose token-set similarity to an already-kept entry
   * exceeds the threshold.
   */
  mergeSimilarEntities(
    entities: ReadonlyArray<string>,
    threshold: number = this.config.similarityThreshold
  ): string[] {
    const kept: string[] = [];
    const seen = new Set<string>();

    for (const entity of entities) {
      const lower = entity.toLowerCase();
      if (seen.has(lower)) continue;

      const similar = kept.some(
        (existing) => jaccardSimilarity(lower, existing.toLowerCase()) > threshold
      );
      if (similar) continue;

      kept.push(entity);
      seen.add(lower);
    }

    return kept;
  }
}
