/**
 * EFFECT RUNTIME - CENTRALIZED RUNTIME CONFIGURATION
 *
 * Routes Effect's logger through the app's structured JSON logger and
 * provides the helpers that run pipeline programs at the edge.
 *
 * Architecture:
 * - Effect.runPromise for the async pipeline (collaborator calls)
 * - Effect.runSync for pure computations (lexicon and config decoding)
 * - Level filtering happens in appLogger, so LOG_LEVEL changes apply
 *   without rebuilding the layer
 */

import { Effect, Layer, Logger, LogLevel } from "effect";
import { emitLogEntry, type LogLevel as AppLogLevel } from "./appLogger";
import type { ServiceError } from "./errors";

// ============================================================================
// RUNTIME CONFIGURATION
// ============================================================================

const toAppLevel = (level: LogLevel.LogLevel): AppLogLevel => {
  switch (level._tag) {
    case "Fatal":
    case "Error":
      return "error";
    case "Warning":
      return "warn";
    case "Info":
      return "info";
    default:
      return "debug";
  }
};

const renderMessage = (message: unknown): string =>
  Array.isArray(message) ? message.map((part) => String(part)).join(" ") : String(message);

/**
 * Structured logger: Effect.log* calls become JSON lines with annotations
 * as metadata.
 */
const AppLogger = Logger.make(({ logLevel, message, annotations }) => {
  const metadata: Record<string, unknown> = Object.fromEntries(annotations);
  emitLogEntry(
    toAppLevel(logLevel),
    renderMessage(message),
    Object.keys(metadata).length > 0 ? metadata : undefined
  );
});

/**
 * Base runtime layer: structured logger, every level forwarded.
 */
const AppLayer = Layer.merge(
  Logger.replace(Logger.defaultLogger, AppLogger),
  Logger.minimumLogLevel(LogLevel.All)
);

// ============================================================================
// RUNTIME HELPERS
// ============================================================================

/**
 * Run Effect as Promise with error handling
 *
 * @example
 * const result = await runPromise(pipeline.process(transcript));
 * if (result.success) {
 *   render(result.data);
 * }
 */
export const runPromise = <A, E>(
  effect: Effect.Effect<A, E, never>
): Promise<{ success: true; data: A } | { success: false; error: E }> => {
  return Effect.runPromise(
    effect.pipe(
      Effect.provide(AppLayer),
      Effect.map((data) => ({ success: true as const, data })),
      Effect.catchAll((error) =>
        Effect.succeed({ success: false as const, error })
      )
    )
  );
};

/**
 * Run Effect with Result type (no exceptions)
 *
 * @example
 * const result = runSyncResult(resolvePipelineConfig({ maxKeywords: 10 }));
 */
export const runSyncResult = <A, E>(
  effect: Effect.Effect<A, E, never>
): { success: true; data: A } | { success: false; error: E } => {
  return Effect.runSync(
    effect.pipe(
      Effect.provide(AppLayer),
      Effect.map((data) => ({ success: true as const, data })),
      Effect.catchAll((error) =>
        Effect.succeed({ success: false as const, error })
      )
    )
  );
};

// ============================================================================
// SERVICE ERROR HELPERS
// ============================================================================

export const isRecoverable = (error: ServiceError): boolean => {
  return error.recoverable;
};

export const serializeError = (error: ServiceError): Record<string, unknown> => {
  return error.toJSON();
};

// ============================================================================
// EXPORTS
// ============================================================================

export { AppLayer, AppLogger };
