/**
 * PIPELINE SCHEMA
 *
 * Run configuration and the output envelope consumed by renderers and the
 * JSON export. Output field names are snake_case and fixed.
 */

import { Schema as S } from "effect";
import { DialogueTurnSchema } from "./transcript";
import { EntityCategoriesSchema } from "./entities";
import { SummarySchema } from "./summary";
import {
  IntentResultSchema,
  KeywordEntrySchema,
  OverallSentimentSchema,
  SentimentResultSchema,
  TimelinePointSchema,
} from "./analysis";
import type { SOAPNote } from "./soapNote";

// ============================================================================
// CONFIGURATION
// ============================================================================

const PositiveInt = S.Int.pipe(S.positive());
const UnitInterval = S.Number.pipe(S.between(0, 1));

export const PipelineConfigSchema = S.Struct({
  pipelineVersion: S.String.pipe(S.minLength(1)),

  // Statement filter for sentiment/intent scoring
  minStatementWords: PositiveInt,

  // Entity extraction and curation
  maxEntitiesPerCategory: PositiveInt,
  ruleConfidence: UnitInterval, // attached to every rule-derived span
  entityMinLength: PositiveInt,
  entityMaxLength: PositiveInt,
  similarityThreshold: UnitInterval,
  applySimilarityMerge: S.Boolean,

  // Collaborator calls
  collaboratorTimeoutMs: PositiveInt,

  // Keywords
  maxKeywords: PositiveInt,
  keywordNgramMax: PositiveInt,
  medicalPhraseCount: PositiveInt,

  // Sentiment below this confidence reads as Neutral
  sentimentConfidenceThreshold: UnitInterval,

  // Medication fragments keep duplicates unless set
  dedupeMedications: S.Boolean,
});
export type PipelineConfig = S.Schema.Type<typeof PipelineConfigSchema>;

export const defaultPipelineConfig: PipelineConfig = {
  pipelineVersion: "1.0.0",
  minStatementWords: 3,
  maxEntitiesPerCategory: 20,
  ruleConfidence: 0.85,
  entityMinLength: 2,
  entityMaxLength: 100,
  similarityThreshold: 0.8,
  applySimilarityMerge: false,
  collaboratorTimeoutMs: 30_000,
  maxKeywords: 15,
  keywordNgramMax: 3,
  medicalPhraseCount: 15,
  sentimentConfidenceThreshold: 0.7,
  dedupeMedications: false,
};

// ============================================================================
// OUTPUT
// ============================================================================

export const PipelineMetadataSchema = S.Struct({
  processed_at: S.String,
  pipeline_version: S.String,
  total_dialogues: S.Int,
  doctor_turns: S.Int,
  patient_turns: S.Int,
});
export type PipelineMetadata = S.Schema.Type<typeof PipelineMetadataSchema>;

export const PipelineOutputSchema = S.Struct({
  metadata: PipelineMetadataSchema,
  summary: SummarySchema,
  entities: EntityCategoriesSchema,
  temporal_info: S.Struct({
    dates: S.Array(S.String),
    times: S.Array(S.String),
    durations: S.Array(S.String),
  }),
  sentiment_analysis: S.Struct({
    overall: OverallSentimentSchema,
    timeline: S.Array(TimelinePointSchema),
    per_statement: S.Array(SentimentResultSchema),
  }),
  intent_analysis: S.Struct({
    distribution: S.Record({ key: S.String, value: S.Int }),
    per_statement: S.Array(IntentResultSchema),
  }),
  keywords: S.Struct({
    top_keywords: S.Array(KeywordEntrySchema),
    medical_phrases: S.Array(S.String),
  }),
  dialogues: S.Array(DialogueTurnSchema),
});
export type PipelineOutput = S.Schema.Type<typeof PipelineOutputSchema>;

export const EMPTY_INPUT_MESSAGE = "Empty input text";

export const PipelineErrorEnvelopeSchema = S.Struct({
  error: S.String,
});
export type PipelineErrorEnvelope = S.Schema.Type<typeof PipelineErrorEnvelopeSchema>;

export type PipelineResponse = PipelineOutput | PipelineErrorEnvelope;

export const isErrorEnvelope = (
  response: PipelineResponse
): response is PipelineErrorEnvelope => "error" in response;

/**
 * Recoverable problem absorbed during a run, in serialized form.
 */
export type PipelineDiagnostic = Record<string, unknown>;

export interface PipelineRun {
  readonly output: PipelineOutput;
  readonly note: SOAPNote;
  readonly diagnostics: ReadonlyArray<PipelineDiagnostic>;
}
