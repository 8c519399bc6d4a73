/**
 * SPEAKER DIARIZER
 *
 * Line-oriented state machine that turns a labelled transcript into
 * speaker-attributed turns.
 *
 * States: no speaker yet | in a turn for some speaker.
 * - blank lines and bracketed stage directions change nothing
 * - a speaker label flushes the open turn and starts a new one, seeded
 *   with whatever follows the label on the same line
 * - any other line extends the open turn, or is dropped before the first label
 *
 * Lines are split from the raw text because normalization collapses the
 * newlines that separate turns; each finished turn is normalized on flush.
 */

import {
  SPEAKER_LABEL_PATTERN,
  countWords,
  isStageDirection,
  normalizeRole,
  type DialogueStats,
  type DialogueTurn,
  type Role,
} from "../schemas/transcript";
import type { TextNormalizer } from "./textNormalizer";

export class Diarizer {
  constructor(private readonly normalizer: TextNormalizer) {}

  parse(transcript: string): DialogueTurn[] {
    const turns: DialogueTurn[] = [];
    let speaker: Role | null = null;
    let buffer: string[] = [];

    const flush = (): void => {
      if (speaker === null || buffer.length === 0) return;
      const text = this.normalizer.normalize(buffer.join(" "));
      if (text.length > 0) {
        turns.push({ speaker, text });
      }
    };

    for (const rawLine of transcript.split(/\r?\n/)) {
      const line = rawLine.replace(/\*+/g, "").trim();

      if (line.length === 0 || isStageDirection(line)) continue;

      const label = SPEAKER_LABEL_PATTERN.exec(line);
      if (label) {
        flush();
        speaker = normalizeRole(label[1] ?? "");
        buffer = [];
        const rest = line.slice(label[0].length).trim();
        if (rest.length > 0) buffer.push(rest);
        continue;
      }

      if (speaker !== null) {
        buffer.push(line);
      }
    }

    flush();
    return turns;
  }
}

// ============================================================================
// DERIVED VIEWS
// ============================================================================

export const getTurnsBySpeaker = (
  turns: ReadonlyArray<DialogueTurn>,
  speaker: Role
): DialogueTurn[] => turns.filter((turn) => turn.speaker === speaker);

const statementsFor = (turns: ReadonlyArray<DialogueTurn>, speaker: Role): string[] =>
  getTurnsBySpeaker(turns, speaker)
    .map((turn) => turn.text)
    .filter((text) => text.trim().length > 0);

export const getPatientStatements = (turns: ReadonlyArray<DialogueTurn>): string[] =>
  statementsFor(turns, "patient");

export const getDoctorStatements = (turns: ReadonlyArray<DialogueTurn>): string[] =>
  statementsFor(turns, "doctor");

export const getDialogueStats = (turns: ReadonlyArray<DialogueTurn>): DialogueStats => {
  const totalWords = turns.reduce((sum, turn) => sum + countWords(turn.text), 0);

  return {
    total_turns: turns.length,
    doctor_turns: getTurnsBySpeaker(turns, "doctor").length,
    patient_turns: getTurnsBySpeaker(turns, "patient").length,
    total_words: totalWords,
    avg_words_per_turn: turns.length === 0 ? 0 : totalWords / turns.length,
  };
};
