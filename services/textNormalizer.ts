/**
 * TEXT NORMALIZER
 *
 * Total, idempotent cleanup applied to every transcript and turn:
 * 1. remove emphasis markers (runs of `*`)
 * 2. collapse whitespace, newlines included, to one space
 * 3. ASCII dashes, ellipses and quotes
 * 4. expand clinical abbreviations, whole word, case-insensitive, in table order
 *
 * No expansion contains another table key as a whole word, which keeps
 * normalize(normalize(x)) === normalize(x).
 */

import { wholeWordPattern, type ClinicalLexicon } from "../schemas/lexicon";

const PUNCTUATION_VARIANTS: ReadonlyArray<readonly [RegExp, string]> = [
  [/[‒–—―]/g, "-"],
  [/…/g, "..."],
  [/[“”„]/g, '"'],
  [/[‘’‚]/g, "'"],
];

interface CompiledAbbreviation {
  readonly pattern: RegExp;
  readonly expansion: string;
}

export class TextNormalizer {
  private readonly abbreviations: ReadonlyArray<CompiledAbbreviation>;

  constructor(lexicon: Pick<ClinicalLexicon, "abbreviations">) {
    this.abbreviations = lexicon.abbreviations.map(({ abbreviation, expansion }) => ({
      pattern: wholeWordPattern(abbreviation),
      expansion,
    }));
  }

  normalize(text: string): string {
    if (text.trim().length === 0) return "";

    let result = text.replace(/\*+/g, "");
    result = result.replace(/\s+/g, " ");

    for (const [pattern, replacement] of PUNCTUATION_VARIANTS) {
      result = result.replace(pattern, replacement);
    }

    for (const { pattern, expansion } of this.abbreviations) {
      result = result.replace(pattern, () => expansion);
    }

    return result.trim();
  }

  /**
   * Normalized text cut to `maxLength` characters, with "..." appended when cut.
   */
  cleanForDisplay(text: string, maxLength = 100): string {
    const cleaned = this.normalize(text);
    return cleaned.length > maxLength ? `${cleaned.slice(0, maxLength)}...` : cleaned;
  }
}
