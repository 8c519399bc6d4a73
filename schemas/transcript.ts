/**
 * TRANSCRIPT SCHEMA
 *
 * Speaker-attributed dialogue turns and the aggregate statistics derived
 * from them.
 */

import { Schema as S } from "effect";

// ============================================================================
// ROLES & TURNS
// ============================================================================

export const RoleSchema = S.Literal("doctor", "patient", "unknown");
export type Role = S.Schema.Type<typeof RoleSchema>;

export const DialogueTurnSchema = S.Struct({
  speaker: RoleSchema,
  text: S.String, // non-empty, normalized
});
export type DialogueTurn = S.Schema.Type<typeof DialogueTurnSchema>;

export const DialogueStatsSchema = S.Struct({
  total_turns: S.Int,
  doctor_turns: S.Int,
  patient_turns: S.Int,
  total_words: S.Int,
  avg_words_per_turn: S.Number,
});
export type DialogueStats = S.Schema.Type<typeof DialogueStatsSchema>;

// ============================================================================
// SPEAKER LABELS
// ============================================================================

/**
 * A turn opens with one of these labels at the start of a line, followed by
 * whitespace and/or a colon. Trailing text on the same line seeds the turn.
 */
export const SPEAKER_LABEL_PATTERN = /^(Physician|Patient|Doctor|Dr\.?|Pt\.?)[\s:]+/i;

const ROLE_ALIASES: ReadonlyMap<string, Role> = new Map<string, Role>([
  ["physician", "doctor"],
  ["doctor", "doctor"],
  ["dr", "doctor"],
  ["patient", "patient"],
  ["pt", "patient"],
]);

/**
 * Map a raw speaker label to a Role. Labels outside the alias table map to
 * "unknown" rather than failing.
 */
export const normalizeRole = (label: string): Role => {
  const key = label.trim().toLowerCase().replace(/[.:]+$/, "");
  return ROLE_ALIASES.get(key) ?? "unknown";
};

/**
 * Stage directions occupy a whole line inside square brackets.
 */
export const isStageDirection = (line: string): boolean =>
  line.startsWith("[") && line.endsWith("]");

export const countWords = (text: string): number =>
  text.split(/\s+/).filter((word) => word.length > 0).length;
