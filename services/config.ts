/**
 * CONFIGURATION LOADING
 *
 * Decodes the bundled lexicon tables and validates pipeline config
 * overrides. Decoding failures are ConfigValidationError values.
 */

import { Effect, ParseResult, Schema as S, pipe } from "effect";
import lexiconData from "../data/clinical-lexicon.json";
import stopWordData from "../data/english-stopwords.json";
import { ClinicalLexiconSchema, StopWordListSchema, type ClinicalLexicon } from "../schemas/lexicon";
import {
  PipelineConfigSchema,
  defaultPipelineConfig,
  type PipelineConfig,
} from "../schemas/pipeline";
import { ConfigValidationError } from "./errors";
import { runSyncResult } from "./runtime";

const decodeWith =
  <A, I>(schema: S.Schema<A, I>, source: string) =>
  (input: unknown): Effect.Effect<A, ConfigValidationError> =>
    pipe(
      S.decodeUnknown(schema)(input),
      Effect.mapError(
        (error) =>
          new ConfigValidationError({
            message: ParseResult.TreeFormatter.formatErrorSync(error),
            source,
          })
      )
    );

/**
 * Decode a lexicon from untrusted JSON.
 */
export const loadLexicon = (input: unknown): Effect.Effect<ClinicalLexicon, ConfigValidationError> =>
  decodeWith(ClinicalLexiconSchema, "clinical-lexicon")(input);

export const loadStopWords = (
  input: unknown
): Effect.Effect<ReadonlyArray<string>, ConfigValidationError> =>
  decodeWith(StopWordListSchema, "english-stopwords")(input);

/**
 * Merge overrides over the defaults and validate the result.
 */
export const resolvePipelineConfig = (
  overrides: Partial<PipelineConfig> = {}
): Effect.Effect<PipelineConfig, ConfigValidationError> =>
  pipe(
    decodeWith(PipelineConfigSchema, "pipeline-config")({ ...defaultPipelineConfig, ...overrides }),
    Effect.flatMap((config) =>
      config.entityMinLength > config.entityMaxLength
        ? Effect.fail(
            new ConfigValidationError({
              message: "entityMinLength must not exceed entityMaxLength",
              source: "pipeline-config",
              context: {
                entityMinLength: config.entityMinLength,
                entityMaxLength: config.entityMaxLength,
              },
            })
          )
        : Effect.succeed(config)
    )
  );

// ============================================================================
// BUNDLED TABLES
// ============================================================================

const loadBundled = <A>(effect: Effect.Effect<A, ConfigValidationError>): A => {
  const result = runSyncResult(effect);
  if (!result.success) {
    throw new Error(`Bundled table is invalid (${result.error.source}): ${result.error.message}`);
  }
  return result.data;
};

export const defaultLexicon: ClinicalLexicon = loadBundled(loadLexicon(lexiconData));

export const defaultKeywordStopWords: ReadonlyArray<string> = loadBundled(loadStopWords(stopWordData));
