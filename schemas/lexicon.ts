/**
 * CLINICAL LEXICON SCHEMA
 *
 * Every fixed lookup table the pipeline reads: abbreviation expansions,
 * stop words, keyword lists for entity rules and SOAP sections, cue lists
 * for the default sentiment and intent scorers.
 *
 * The lexicon is decoded once from data/clinical-lexicon.json and then
 * passed by reference into each component's constructor.
 */

import { Schema as S } from "effect";

// ============================================================================
// BUILDING BLOCKS
// ============================================================================

const Term = S.String.pipe(S.minLength(1));
const TermList = S.Array(Term);

export const AbbreviationSchema = S.Struct({
  abbreviation: Term,
  expansion: S.String,
});
export type Abbreviation = S.Schema.Type<typeof AbbreviationSchema>;

export const IntentCueSchema = S.Struct({
  label: Term,
  cues: TermList,
});
export type IntentCue = S.Schema.Type<typeof IntentCueSchema>;

// ============================================================================
// SOAP SECTION KEYWORDS
// ============================================================================

export const SoapKeywordsSchema = S.Struct({
  complaint: TermList,
  history: TermList,
  reviewOfSystems: TermList,
  exam: TermList,
  examFollowUp: TermList, // doctor remark appended to a bracketed exam
  vitalSigns: TermList,
  observation: TermList,
  treatment: TermList,
  medication: TermList,
  followUp: TermList,
  education: TermList,
  status: TermList,
  severe: TermList,
  moderate: TermList,
  mild: TermList,
});
export type SoapKeywords = S.Schema.Type<typeof SoapKeywordsSchema>;

// ============================================================================
// LEXICON
// ============================================================================

export const ClinicalLexiconSchema = S.Struct({
  abbreviations: S.Array(AbbreviationSchema),
  entityStopWords: TermList,
  symptomKeywords: TermList,
  treatmentKeywords: TermList,
  anatomyTerms: TermList,
  anatomicalSymptomTerms: TermList,
  soapKeywords: SoapKeywordsSchema,
  medicalIndicators: TermList,
  keywordNoiseWords: TermList,
  keywordCategories: S.Struct({
    symptoms: TermList,
    treatments: TermList,
    conditions: TermList,
  }),
  intentCues: S.Array(IntentCueSchema).pipe(S.minItems(1)),
  sentimentCues: S.Struct({
    anxious: TermList,
    reassured: TermList,
  }),
});
export type ClinicalLexicon = S.Schema.Type<typeof ClinicalLexiconSchema>;

export const StopWordListSchema = TermList;

/**
 * Intent labels in declaration order; ties between scores resolve to the
 * earlier label.
 */
export const intentLabels = (lexicon: ClinicalLexicon): string[] =>
  lexicon.intentCues.map((entry) => entry.label);

/**
 * Escape a literal term for embedding in a RegExp source.
 */
export const escapeRegExp = (term: string): string =>
  term.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/**
 * Whole-word, case-insensitive matcher for a literal term.
 */
export const wholeWordPattern = (term: string, flags = "gi"): RegExp =>
  new RegExp(`\\b${escapeRegExp(term)}\\b`, flags);
