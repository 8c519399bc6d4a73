/**
 * TEMPORAL RECOGNIZER
 *
 * Scans text with the ordered date, time and duration pattern families.
 * Within a kind, mentions are deduplicated on lower-cased text: the first
 * occurrence wins and later identical text is dropped. Kinds are never
 * deduplicated against each other.
 */

import {
  DEFAULT_TEMPORAL_PATTERNS,
  type TemporalExtraction,
  type TemporalKind,
  type TemporalMention,
  type TemporalPatternFamilies,
  type TemporalSummary,
} from "../schemas/temporal";

export class TemporalRecognizer {
  constructor(private readonly families: TemporalPatternFamilies = DEFAULT_TEMPORAL_PATTERNS) {}

  private extractKind(text: string, kind: TemporalKind): TemporalMention[] {
    const seen = new Set<string>();
    const mentions: TemporalMention[] = [];

    for (const pattern of this.families[kind]) {
      for (const match of text.matchAll(pattern)) {
        const key = match[0].toLowerCase();
        if (seen.has(key)) continue;
        seen.add(key);

        const start = match.index ?? 0;
        mentions.push({ text: match[0], span: [start, start + match[0].length], kind });
      }
    }

    return mentions;
  }

  extractDates(text: string): TemporalMention[] {
    return this.extractKind(text, "date");
  }

  extractTimes(text: string): TemporalMention[] {
    return this.extractKind(text, "time");
  }

  extractDurations(text: string): TemporalMention[] {
    return this.extractKind(text, "duration");
  }

  extractAll(text: string): TemporalExtraction {
    return {
      dates: this.extractDates(text),
      times: this.extractTimes(text),
      durations: this.extractDurations(text),
    };
  }

  /**
   * First date mentioned, taken as the incident date.
   */
  extractIncidentDate(text: string): string | null {
    return this.extractDates(text)[0]?.text ?? null;
  }

  extractTreatmentDuration(text: string): string | null {
    return this.extractDurations(text)[0]?.text ?? null;
  }

  getTemporalSummary(text: string): TemporalSummary {
    const { dates, times, durations } = this.extractAll(text);

    return {
      total_dates: dates.length,
      total_times: times.length,
      total_durations: durations.length,
      first_date: dates[0]?.text ?? null,
      first_time: times[0]?.text ?? null,
      first_duration: durations[0]?.text ?? null,
    };
  }
}

export const mentionTexts = (mentions: ReadonlyArray<TemporalMention>): string[] =>
  mentions.map((mention) => mention.text);
