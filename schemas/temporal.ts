/**
 * TEMPORAL MENTION SCHEMA
 *
 * Dates, times and durations recovered from transcript text, each with the
 * character span of its first occurrence.
 *
 * Pattern families are ordered. Within a family every pattern scans the
 * whole text before the next one runs, so mention order is
 * pattern-then-position.
 */

import { Schema as S } from "effect";

// ============================================================================
// MENTIONS
// ============================================================================

export const TemporalKindSchema = S.Literal("date", "time", "duration");
export type TemporalKind = S.Schema.Type<typeof TemporalKindSchema>;

export const TemporalMentionSchema = S.Struct({
  text: S.String,
  span: S.Tuple(S.Int, S.Int), // [start, end)
  kind: TemporalKindSchema,
});
export type TemporalMention = S.Schema.Type<typeof TemporalMentionSchema>;

export const TemporalExtractionSchema = S.Struct({
  dates: S.Array(TemporalMentionSchema),
  times: S.Array(TemporalMentionSchema),
  durations: S.Array(TemporalMentionSchema),
});
export type TemporalExtraction = S.Schema.Type<typeof TemporalExtractionSchema>;

export const TemporalSummarySchema = S.Struct({
  total_dates: S.Int,
  total_times: S.Int,
  total_durations: S.Int,
  first_date: S.NullOr(S.String),
  first_time: S.NullOr(S.String),
  first_duration: S.NullOr(S.String),
});
export type TemporalSummary = S.Schema.Type<typeof TemporalSummarySchema>;

// ============================================================================
// PATTERN FAMILIES
// ============================================================================

// Initial letter of either case; "May" only capitalised, which keeps the
// modal verb ("you may 2 ...") out of dates.
const MONTH =
  "(?:[Jj]an(?:uary)?|[Ff]eb(?:ruary)?|[Mm]ar(?:ch)?|[Aa]pr(?:il)?|May|[Jj]une?|[Jj]uly?|[Aa]ug(?:ust)?|[Ss]ep(?:t(?:ember)?)?|[Oo]ct(?:ober)?|[Nn]ov(?:ember)?|[Dd]ec(?:ember)?)";

const RELATIVE_UNIT =
  "(?:week|month|year|weekend|monday|tuesday|wednesday|thursday|friday|saturday|sunday)";

/**
 * Counts are digits or a spelled-out number, so both "4 weeks" and
 * "four weeks" are durations.
 */
export const COUNT =
  "(?:\\d+|one|two|three|four|five|six|seven|eight|nine|ten|eleven|twelve|twenty|thirty)";

export type TemporalPatternFamilies = Readonly<Record<TemporalKind, ReadonlyArray<RegExp>>>;

export const DEFAULT_TEMPORAL_PATTERNS: TemporalPatternFamilies = {
  date: [
    new RegExp(`\\b${MONTH}\\s+\\d{1,2}(?:st|nd|rd|th)?(?:,?\\s+\\d{4})?\\b`, "g"),
    /\b\d{1,2}\/\d{1,2}\/\d{2,4}\b/gi,
    /\b\d{4}-\d{2}-\d{2}\b/gi,
    new RegExp(`\\blast\\s+${RELATIVE_UNIT}\\b`, "gi"),
    new RegExp(`\\b(?:this|next)\\s+${RELATIVE_UNIT}\\b`, "gi"),
  ],
  time: [
    /\b\d{1,2}:\d{2}(?::\d{2})?(?:\s*(?:am|pm)\b)?/gi,
    /\b(?:morning|afternoon|evening|night)\b/gi,
    // a bare hour never continues a clock time ("12:30 pm" is not "30 pm")
    /(?<![\d:])\b\d{1,2}\s*(?:am|pm)\b/gi,
  ],
  duration: [
    new RegExp(`\\b${COUNT}\\s*(?:week|month|day|year|hour|minute)s?\\b`, "gi"),
    new RegExp(`\\b(?:first|last|past)\\s+${COUNT}\\s*(?:week|month|day|year)s?\\b`, "gi"),
    new RegExp(`\\b${COUNT}\\s*sessions?\\b`, "gi"),
    new RegExp(`\\b${COUNT}\\s*times?\\b`, "gi"),
  ],
};

/**
 * Treatment length as quoted in summaries: the first session/week/month
 * count written in digits. Spelled-out counts stay durations only.
 */
export const TREATMENT_DURATION_PATTERN = /\b\d+\s*(?:session|week|month)s?\b/i;
