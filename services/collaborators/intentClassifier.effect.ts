/**
 * INTENT CLASSIFIER SERVICE - EFFECT-TS
 *
 * Capability interface for labelling a patient statement with one of the
 * configured intents, with a deterministic cue-matching default that
 * reports a score for every label, like a zero-shot classifier would.
 */

import { Context, Effect, Layer } from "effect";
import { round3, type IntentScore } from "../../schemas/analysis";
import type { ClinicalLexicon, IntentCue } from "../../schemas/lexicon";
import { CollaboratorError, describeCause } from "../errors";

// ============================================================================
// SERVICE INTERFACE
// ============================================================================

export interface IntentClassifier {
  readonly classifyIntent: (statement: string) => Effect.Effect<IntentScore, CollaboratorError>;
}

export const IntentClassifier = Context.GenericTag<IntentClassifier>("IntentClassifier");

// ============================================================================
// CUE-BASED IMPLEMENTATION
// ============================================================================

// Keeps every label above zero so the distribution never collapses.
const SMOOTHING = 0.1;

class CueIntentClassifierImpl implements IntentClassifier {
  constructor(private readonly cues: ReadonlyArray<IntentCue>) {}

  /**
   * Labels ranked by (matched cues + smoothing) / total. Ties keep
   * declaration order.
   */
  private rank(statement: string): Array<{ label: string; score: number }> {
    const lower = statement.toLowerCase();
    const counts = this.cues.map(({ label, cues }) => ({
      label,
      count: cues.filter((cue) => lower.includes(cue)).length,
    }));
    const total = counts.reduce((sum, { count }) => sum + count + SMOOTHING, 0);

    return counts
      .map(({ label, count }) => ({ label, score: round3((count + SMOOTHING) / total) }))
      .sort((a, b) => b.score - a.score);
  }

  readonly classifyIntent = (statement: string) =>
    Effect.try({
      try: (): IntentScore => {
        const ranked = this.rank(statement);
        const top = ranked[0];
        if (top === undefined) {
          throw new Error("no intent labels configured");
        }
        return {
          intent: top.label,
          confidence: top.score,
          all_scores: Object.fromEntries(ranked.map(({ label, score }) => [label, score])),
        };
      },
      catch: (cause) =>
        new CollaboratorError({
          collaborator: "IntentClassifier",
          operation: "classifyIntent",
          reason: describeCause(cause),
        }),
    });
}

export const createCueIntentClassifier = (
  lexicon: Pick<ClinicalLexicon, "intentCues">
): IntentClassifier => new CueIntentClassifierImpl(lexicon.intentCues);

export const CueIntentClassifierLive = (lexicon: Pick<ClinicalLexicon, "intentCues">) =>
  Layer.succeed(IntentClassifier, createCueIntentClassifier(lexicon));
