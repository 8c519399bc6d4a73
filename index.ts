/**
 * CLINICAL TRANSCRIPT PIPELINE - PUBLIC API
 *
 * Turns a doctor/patient conversation into a structured summary, SOAP
 * note, entities, temporal mentions, sentiment, intent and keywords.
 *
 * Usage:
 * ```typescript
 * import { processTranscript, isErrorEnvelope, serializeOutput } from 'clinical-transcript-pipeline';
 *
 * const response = await processTranscript(transcript);
 * if (!isErrorEnvelope(response)) {
 *   console.log(serializeOutput(response));
 * }
 * ```
 */

// Schemas
export * from "./schemas/analysis";
export * from "./schemas/entities";
export * from "./schemas/lexicon";
export * from "./schemas/pipeline";
export * from "./schemas/soapNote";
export * from "./schemas/summary";
export * from "./schemas/temporal";
export * from "./schemas/transcript";

// Errors & runtime
export * from "./services/errors";
export { runPromise, runSyncResult, isRecoverable, serializeError, AppLayer } from "./services/runtime";
export { appLogger } from "./services/appLogger";

// Configuration
export {
  defaultKeywordStopWords,
  defaultLexicon,
  loadLexicon,
  loadStopWords,
  resolvePipelineConfig,
} from "./services/config";

// Stages
export { TextNormalizer } from "./services/textNormalizer";
export {
  Diarizer,
  getDialogueStats,
  getDoctorStatements,
  getPatientStatements,
  getTurnsBySpeaker,
} from "./services/diarizer";
export { TemporalRecognizer, mentionTexts } from "./services/temporalRecognizer";
export { EntityCurator } from "./services/entityCurator";
export { ClinicalNoteBuilder, type NoteInput } from "./services/clinicalNoteBuilder";
export { SummaryAssembler, generateShortSummary, type SummaryInput } from "./services/summaryAssembler";
export * from "./services/conversationAnalysis";

// Collaborators
export * from "./services/collaborators";

// Pipeline
export {
  TranscriptPipeline,
  makeTranscriptPipeline,
  processTranscript,
  runTranscriptPipeline,
  attemptCollaborator,
  withFallback,
  SENTIMENT_FALLBACK,
  INTENT_FALLBACK,
  type CollaboratorResult,
  type PipelineCollaborators,
  type PipelineOptions,
} from "./services/pipeline.effect";

// Rendering
export { formatSoapNote, serializeOutput } from "./services/noteFormatter";
