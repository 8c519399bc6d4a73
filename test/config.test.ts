/**
 * CONFIGURATION, ERRORS & LOGGING - TEST SUITE
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { Effect, Either, pipe } from "effect";
import { intentLabels } from "../schemas/lexicon";
import { defaultPipelineConfig } from "../schemas/pipeline";
import {
  defaultKeywordStopWords,
  defaultLexicon,
  loadLexicon,
  loadStopWords,
  resolvePipelineConfig,
} from "../services/config";
import {
  CollaboratorError,
  ConfigValidationError,
  EmptyInputError,
  ErrorCollector,
  describeCause,
} from "../services/errors";
import { appLogger, resolveLogThreshold } from "../services/appLogger";
import { isRecoverable, runPromise, runSyncResult, serializeError } from "../services/runtime";

afterEach(() => {
  vi.unstubAllEnvs();
});

const parseLogLine = (spy: { mock: { calls: unknown[][] } }, call = 0): unknown => {
  const line = spy.mock.calls[call]?.[0];
  return typeof line === "string" ? JSON.parse(line) : undefined;
};

// ============================================================================
// 1. BUNDLED TABLES
// ============================================================================

describe("Bundled lexicon", () => {
  it("decodes the clinical lexicon", () => {
    expect(intentLabels(defaultLexicon)).toEqual([
      "seeking reassurance",
      "reporting symptoms",
      "expressing concern",
      "asking questions",
      "describing history",
      "confirming understanding",
      "expressing relief",
    ]);
    expect(defaultLexicon.abbreviations[0]).toEqual({
      abbreviation: "A&E",
      expansion: "Accident and Emergency",
    });
  });

  it("decodes the keyword stop words", () => {
    expect(defaultKeywordStopWords).toContain("the");
    expect(defaultKeywordStopWords).not.toContain("pain");
  });

  it("rejects a malformed lexicon", () => {
    const result = Effect.runSync(Effect.either(loadLexicon({ abbreviations: "none" })));

    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left).toBeInstanceOf(ConfigValidationError);
      expect(result.left.source).toBe("clinical-lexicon");
    }
  });

  it("rejects empty stop words", () => {
    const result = runSyncResult(loadStopWords(["a", ""]));
    expect(result.success).toBe(false);
  });
});

// ============================================================================
// 2. PIPELINE CONFIG
// ============================================================================

describe("resolvePipelineConfig", () => {
  it("returns the defaults without overrides", () => {
    expect(Effect.runSync(resolvePipelineConfig())).toEqual(defaultPipelineConfig);
  });

  it("merges overrides", () => {
    const config = Effect.runSync(resolvePipelineConfig({ maxKeywords: 5, dedupeMedications: true }));
    expect(config.maxKeywords).toBe(5);
    expect(config.dedupeMedications).toBe(true);
    expect(config.minStatementWords).toBe(3);
  });

  it("rejects out-of-range values", () => {
    const result = runSyncResult(resolvePipelineConfig({ maxKeywords: 0 }));

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.source).toBe("pipeline-config");
    }
  });

  it("rejects inverted entity length bounds", () => {
    const result = runSyncResult(resolvePipelineConfig({ entityMinLength: 50, entityMaxLength: 10 }));

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe("entityMinLength must not exceed entityMaxLength");
      expect(result.error.context).toEqual({ entityMinLength: 50, entityMaxLength: 10 });
    }
  });
});

// ============================================================================
// 3. ERRORS
// ============================================================================

describe("Service errors", () => {
  const collaboratorError = new CollaboratorError({
    collaborator: "SentimentAnalyzer",
    operation: "analyzeSentiment",
    reason: "model offline",
  });
  const emptyInput = new EmptyInputError({ message: "Empty input text" });

  it("flags recoverability", () => {
    expect(isRecoverable(collaboratorError)).toBe(true);
    expect(isRecoverable(emptyInput)).toBe(false);
  });

  it("serializes with tag and message", () => {
    const json = serializeError(collaboratorError);

    expect(json._tag).toBe("CollaboratorError");
    expect(json.message).toBe("SentimentAnalyzer.analyzeSentiment failed: model offline");
    expect(json.recoverable).toBe(true);
    expect(typeof json.timestamp).toBe("string");
  });

  it("describes thrown values", () => {
    expect(describeCause(new Error("boom"))).toBe("boom");
    expect(describeCause(42)).toBe("42");
  });

  it("collects errors in the order they were added", () => {
    const collector = new ErrorCollector();
    expect(collector.count()).toBe(0);

    collector.add(collaboratorError);
    collector.add(emptyInput);

    expect(collector.count()).toBe(2);
    expect(collector.toJSON().map((entry) => [entry._tag, entry.recoverable])).toEqual([
      ["CollaboratorError", true],
      ["EmptyInputError", false],
    ]);
  });
});

// ============================================================================
// 4. LOGGING & RUNTIME
// ============================================================================

describe("appLogger", () => {
  it("writes JSON lines with redacted content", () => {
    vi.stubEnv("LOG_LEVEL", "info");
    const spy = vi.spyOn(console, "info").mockImplementation(() => undefined);

    appLogger.info("stage_done", { turns: 3, statement_text: "my knee hurts", note: "x".repeat(121) });

    expect(parseLogLine(spy)).toMatchObject({
      level: "info",
      message: "stage_done",
      metadata: { turns: 3, statement_text: "[REDACTED]", note: "[REDACTED]" },
    });
  });

  it("drops entries under the threshold", () => {
    vi.stubEnv("LOG_LEVEL", "warn");
    const spy = vi.spyOn(console, "info").mockImplementation(() => undefined);

    appLogger.info("hidden");

    expect(spy).not.toHaveBeenCalled();
  });

  it("derives the threshold from the environment", () => {
    vi.stubEnv("LOG_LEVEL", "");
    vi.stubEnv("NODE_ENV", "production");
    expect(resolveLogThreshold()).toBe("warn");

    vi.stubEnv("NODE_ENV", "development");
    expect(resolveLogThreshold()).toBe("debug");

    vi.stubEnv("LOG_LEVEL", "ERROR");
    expect(resolveLogThreshold()).toBe("error");
  });
});

describe("Effect runtime", () => {
  it("routes Effect logs through the structured logger", () => {
    vi.stubEnv("LOG_LEVEL", "debug");
    const spy = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    runSyncResult(pipe(Effect.logWarning("fallback_used"), Effect.annotateLogs({ stage: "intent" })));

    expect(parseLogLine(spy)).toMatchObject({
      level: "warn",
      message: "fallback_used",
      metadata: { stage: "intent" },
    });
  });

  it("returns failures as values", async () => {
    const result = await runPromise(Effect.fail(new EmptyInputError({ message: "Empty input text" })));

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error._tag).toBe("EmptyInputError");
    }
  });

  it("returns successes as values", async () => {
    expect(await runPromise(Effect.succeed(7))).toEqual({ success: true, data: 7 });
  });
});
