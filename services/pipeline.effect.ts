/**
 * TRANSCRIPT PIPELINE - EFFECT-TS
 *
 * Normalize -> Diarize -> { Temporal, Entities, Keywords, Sentiment,
 * Intent, Note } -> Summary -> Output
 *
 * The branches read the same normalized transcript and turn list and run
 * concurrently. Collaborator calls carry a timeout and come back as
 * explicit Either results; a Left is recorded as a diagnostic and replaced
 * by the stage default. Empty input is the only failure a caller sees.
 */

import { Duration, Effect, Either, Layer, pipe } from "effect";
import {
  UNKNOWN_INTENT,
  round3,
  type IntentResult,
  type IntentScore,
  type ScoredPhrase,
  type SentimentResult,
  type SentimentScore,
} from "../schemas/analysis";
import { emptyEntityCategories } from "../schemas/entities";
import { intentLabels, type ClinicalLexicon } from "../schemas/lexicon";
import {
  EMPTY_INPUT_MESSAGE,
  type PipelineConfig,
  type PipelineOutput,
  type PipelineResponse,
  type PipelineRun,
} from "../schemas/pipeline";
import {
  DefaultCollaboratorsLive,
  EntityExtractor,
  IntentClassifier,
  KeywordScorer,
  SentimentAnalyzer,
  extractMedicalPhrases,
} from "./collaborators";
import { defaultLexicon, resolvePipelineConfig } from "./config";
import {
  getDominantIntent,
  getIntentDistribution,
  getOverallSentiment,
  getSentimentTimeline,
  selectScorableStatements,
} from "./conversationAnalysis";
import { ClinicalNoteBuilder } from "./clinicalNoteBuilder";
import { Diarizer, getDialogueStats, getDoctorStatements, getPatientStatements } from "./diarizer";
import { EntityCurator } from "./entityCurator";
import {
  CollaboratorError,
  ConfigValidationError,
  EmptyInputError,
  ErrorCollector,
  describeCause,
} from "./errors";
import { runPromise } from "./runtime";
import { SummaryAssembler } from "./summaryAssembler";
import { TemporalRecognizer, mentionTexts } from "./temporalRecognizer";
import { TextNormalizer } from "./textNormalizer";

export type PipelineCollaborators =
  | EntityExtractor
  | SentimentAnalyzer
  | IntentClassifier
  | KeywordScorer;

export interface PipelineOptions {
  readonly config?: Partial<PipelineConfig>;
  readonly lexicon?: ClinicalLexicon;
  readonly collaborators?: Layer.Layer<PipelineCollaborators>;
  readonly now?: () => Date;
}

// ============================================================================
// COLLABORATOR CALLS
// ============================================================================

export type CollaboratorResult<A> = Either.Either<A, CollaboratorError>;

export const SENTIMENT_FALLBACK: SentimentScore = {
  sentiment: "Neutral",
  confidence: 0,
  raw_label: "ERROR",
};

export const INTENT_FALLBACK: IntentScore = {
  intent: UNKNOWN_INTENT,
  confidence: 0,
  all_scores: {},
};

/**
 * Run one collaborator call under a timeout. Failures, timeouts and
 * thrown defects all come back as a Left.
 */
export const attemptCollaborator = <A>(
  collaborator: string,
  operation: string,
  timeoutMs: number,
  call: () => Effect.Effect<A, CollaboratorError>
): Effect.Effect<CollaboratorResult<A>> =>
  pipe(
    Effect.suspend(call),
    Effect.timeoutFail({
      duration: Duration.millis(timeoutMs),
      onTimeout: () =>
        new CollaboratorError({ collaborator, operation, reason: `timeout after ${timeoutMs}ms` }),
    }),
    Effect.catchAllDefect((defect) =>
      Effect.fail(new CollaboratorError({ collaborator, operation, reason: describeCause(defect) }))
    ),
    Effect.either
  );

/**
 * Unwrap a collaborator result, recording a Left and substituting the
 * stage default.
 */
export const withFallback = <A>(
  result: CollaboratorResult<A>,
  fallback: A,
  collector: ErrorCollector
): Effect.Effect<A> =>
  Either.match(result, {
    onRight: (value) => Effect.succeed(value),
    onLeft: (error) => {
      collector.add(error);
      return pipe(
        Effect.logWarning("collaborator_fallback"),
        Effect.annotateLogs({
          collaborator: error.collaborator,
          operation: error.operation,
          reason: error.reason,
        }),
        Effect.as(fallback)
      );
    },
  });

// ============================================================================
// PIPELINE
// ============================================================================

export class TranscriptPipeline {
  private readonly normalizer: TextNormalizer;
  private readonly diarizer: Diarizer;
  private readonly temporal: TemporalRecognizer;
  private readonly curator: EntityCurator;
  private readonly noteBuilder: ClinicalNoteBuilder;
  private readonly summaryAssembler: SummaryAssembler;
  private readonly labels: ReadonlyArray<string>;

  constructor(
    readonly config: PipelineConfig,
    readonly lexicon: ClinicalLexicon,
    private readonly now: () => Date = () => new Date()
  ) {
    this.normalizer = new TextNormalizer(lexicon);
    this.diarizer = new Diarizer(this.normalizer);
    this.temporal = new TemporalRecognizer();
    this.curator = new EntityCurator(lexicon, {
      minLength: config.entityMinLength,
      maxLength: config.entityMaxLength,
      similarityThreshold: config.similarityThreshold,
    });
    this.noteBuilder = new ClinicalNoteBuilder(lexicon, {
      dedupeMedications: config.dedupeMedications,
    });
    this.summaryAssembler = new SummaryAssembler(lexicon);
    this.labels = intentLabels(lexicon);
  }

  private curateEntities(raw: Record<string, string[]>): Record<string, string[]> {
    const curated = this.curator.validateEntitiesDict(raw);
    if (!this.config.applySimilarityMerge) return curated;

    const merged: Record<string, string[]> = {};
    for (const [category, entities] of Object.entries(curated)) {
      merged[category] = this.curator.mergeSimilarEntities(entities);
    }
    return merged;
  }

  /**
   * Full run: wire output, SOAP note and the diagnostics of any absorbed
   * collaborator failure.
   */
  run(rawText: string): Effect.Effect<PipelineRun, EmptyInputError, PipelineCollaborators> {
    return Effect.gen(this, function* (_) {
      if (rawText.trim().length === 0) {
        yield* _(Effect.logWarning("pipeline_rejected_empty_input"));
        return yield* _(Effect.fail(new EmptyInputError({ message: EMPTY_INPUT_MESSAGE })));
      }

      const config = this.config;
      const collector = new ErrorCollector();
      const timeoutMs = config.collaboratorTimeoutMs;

      const transcript = this.normalizer.normalize(rawText);
      const turns = this.diarizer.parse(rawText);
      const stats = getDialogueStats(turns);
      const patientStatements = getPatientStatements(turns);
      const doctorStatements = getDoctorStatements(turns);
      const scorable = selectScorableStatements(patientStatements, config.minStatementWords);

      yield* _(
        pipe(
          Effect.logDebug("pipeline_diarized"),
          Effect.annotateLogs({
            total_turns: stats.total_turns,
            doctor_turns: stats.doctor_turns,
            patient_turns: stats.patient_turns,
            scorable_turns: scorable.length,
          })
        )
      );

      const entityExtractor = yield* _(EntityExtractor);
      const sentimentAnalyzer = yield* _(SentimentAnalyzer);
      const intentClassifier = yield* _(IntentClassifier);
      const keywordScorer = yield* _(KeywordScorer);

      const call = <A>(
        collaborator: string,
        operation: string,
        effect: () => Effect.Effect<A, CollaboratorError>,
        fallback: A
      ): Effect.Effect<A> =>
        pipe(
          attemptCollaborator(collaborator, operation, timeoutMs, effect),
          Effect.flatMap((result) => withFallback(result, fallback, collector))
        );

      const keywordCount = Math.max(config.maxKeywords, config.medicalPhraseCount);
      const emptyKeywords: ScoredPhrase[] = [];

      const [temporal, entities, diagnosis, prognosis, keywords, sentiment, intents, note] = yield* _(
        Effect.all(
          [
            Effect.sync(() => this.temporal.extractAll(transcript)),
            pipe(
              call<Record<string, string[]>>(
                "EntityExtractor",
                "extractEntities",
                () => entityExtractor.extractEntities(transcript),
                emptyEntityCategories()
              ),
              Effect.map((raw) => this.curateEntities(raw))
            ),
            call<string | null>(
              "EntityExtractor",
              "extractDiagnosis",
              () => entityExtractor.extractDiagnosis(transcript),
              null
            ),
            call<string | null>(
              "EntityExtractor",
              "extractPrognosis",
              () => entityExtractor.extractPrognosis(transcript),
              null
            ),
            call(
              "KeywordScorer",
              "extractKeywords",
              () => keywordScorer.extractKeywords(transcript, keywordCount),
              emptyKeywords
            ),
            Effect.all(
              scorable.map((statement) =>
                pipe(
                  call(
                    "SentimentAnalyzer",
                    "analyzeSentiment",
                    () => sentimentAnalyzer.analyzeSentiment(statement),
                    SENTIMENT_FALLBACK
                  ),
                  Effect.map((score): SentimentResult => ({ text: statement, ...score }))
                )
              ),
              { concurrency: "unbounded" }
            ),
            Effect.all(
              scorable.map((statement) =>
                pipe(
                  call(
                    "IntentClassifier",
                    "classifyIntent",
                    () => intentClassifier.classifyIntent(statement),
                    INTENT_FALLBACK
                  ),
                  Effect.map((score): IntentResult => ({ text: statement, ...score }))
                )
              ),
              { concurrency: "unbounded" }
            ),
            Effect.sync(() =>
              this.noteBuilder.build({ patientStatements, doctorStatements, transcript })
            ),
          ],
          { concurrency: "unbounded" }
        )
      );

      const medicalPhrases = extractMedicalPhrases(
        keywords.slice(0, config.medicalPhraseCount),
        this.lexicon
      );

      const summary = this.summaryAssembler.assemble({
        transcript,
        patientStatements,
        entities,
        diagnosis,
        prognosis,
        temporal,
        medicalKeywords: medicalPhrases,
      });

      const distribution = getIntentDistribution(intents, this.labels);

      const output: PipelineOutput = {
        metadata: {
          processed_at: this.now().toISOString(),
          pipeline_version: config.pipelineVersion,
          total_dialogues: stats.total_turns,
          doctor_turns: stats.doctor_turns,
          patient_turns: stats.patient_turns,
        },
        summary,
        entities,
        temporal_info: {
          dates: mentionTexts(temporal.dates),
          times: mentionTexts(temporal.times),
          durations: mentionTexts(temporal.durations),
        },
        sentiment_analysis: {
          overall: getOverallSentiment(sentiment),
          timeline: getSentimentTimeline(sentiment),
          per_statement: sentiment,
        },
        intent_analysis: {
          distribution,
          per_statement: intents,
        },
        keywords: {
          top_keywords: keywords
            .slice(0, config.maxKeywords)
            .map(([keyword, score]) => ({ keyword, score: round3(score) })),
          medical_phrases: medicalPhrases,
        },
        dialogues: turns,
      };

      yield* _(
        pipe(
          Effect.logInfo("pipeline_completed"),
          Effect.annotateLogs({
            total_turns: stats.total_turns,
            total_entities: summary.metadata.total_entities,
            dominant_intent: getDominantIntent(distribution),
            fallbacks: collector.count(),
          })
        )
      );

      return { output, note, diagnostics: collector.toJSON() };
    });
  }

  /**
   * Wire response: the output, or the error envelope for empty input.
   */
  process(rawText: string): Effect.Effect<PipelineResponse, never, PipelineCollaborators> {
    return pipe(
      this.run(rawText),
      Effect.map((result): PipelineResponse => result.output),
      Effect.catchTag("EmptyInputError", (error) => Effect.succeed({ error: error.message }))
    );
  }
}

// ============================================================================
// CONSTRUCTION & CONVENIENCE RUNNERS
// ============================================================================

export const makeTranscriptPipeline = (
  options: PipelineOptions = {}
): Effect.Effect<TranscriptPipeline, ConfigValidationError> =>
  pipe(
    resolvePipelineConfig(options.config),
    Effect.map(
      (config) => new TranscriptPipeline(config, options.lexicon ?? defaultLexicon, options.now)
    )
  );

const collaboratorsFor = (pipeline: TranscriptPipeline, options: PipelineOptions) =>
  options.collaborators ??
  DefaultCollaboratorsLive({ lexicon: pipeline.lexicon, config: pipeline.config });

/**
 * Run the pipeline with the default (or supplied) collaborators.
 */
export const runTranscriptPipeline = (rawText: string, options: PipelineOptions = {}) =>
  runPromise(
    pipe(
      makeTranscriptPipeline(options),
      Effect.flatMap((pipeline) =>
        pipe(pipeline.run(rawText), Effect.provide(collaboratorsFor(pipeline, options)))
      )
    )
  );

/**
 * Process a transcript into the wire response. Rejects only when the
 * supplied configuration is invalid.
 */
export const processTranscript = async (
  rawText: string,
  options: PipelineOptions = {}
): Promise<PipelineResponse> => {
  const result = await runPromise(
    pipe(
      makeTranscriptPipeline(options),
      Effect.flatMap((pipeline) =>
        pipe(pipeline.process(rawText), Effect.provide(collaboratorsFor(pipeline, options)))
      )
    )
  );

  if (!result.success) {
    throw result.error;
  }
  return result.data;
};
