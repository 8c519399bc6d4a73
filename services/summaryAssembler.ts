/**
 * SUMMARY ASSEMBLER
 *
 * Folds curated entities, diagnosis/prognosis, temporal mentions and
 * keyword phrases into one Summary, adding the patient name and current
 * status read straight from the transcript.
 */

import type { ClinicalLexicon } from "../schemas/lexicon";
import { SUMMARY_DEFAULTS, type Summary } from "../schemas/summary";
import { TREATMENT_DURATION_PATTERN, type TemporalExtraction } from "../schemas/temporal";
import { captureRule, containsAny, firstMatch, type ExtractionRule } from "./rules";
import { mentionTexts } from "./temporalRecognizer";

export interface SummaryInput {
  readonly transcript: string;
  readonly patientStatements: ReadonlyArray<string>;
  readonly entities: Readonly<Record<string, ReadonlyArray<string>>>;
  readonly diagnosis: string | null;
  readonly prognosis: string | null;
  readonly temporal: TemporalExtraction;
  readonly medicalKeywords: ReadonlyArray<string>;
}

// ============================================================================
// RULE TABLES
// ============================================================================

// Case-sensitive: names are capitalized. The whole match ("Ms. Rivera") is kept.
export const PATIENT_NAME_RULES: ReadonlyArray<ExtractionRule<string>> = [
  captureRule("ms", "Ms\\.\\s+[A-Z][a-z]+", 0, ""),
  captureRule("mr", "Mr\\.\\s+[A-Z][a-z]+", 0, ""),
  captureRule("mrs", "Mrs\\.\\s+[A-Z][a-z]+", 0, ""),
  captureRule("patient-full-name", "Patient\\s+[A-Z][a-z]+\\s+[A-Z][a-z]+", 0, ""),
];

export const STATUS_RULES: ReadonlyArray<ExtractionRule<string>> = [
  captureRule("currently", "(currently[^.]*)"),
  captureRule("now-pain", "(now[^.]*pain[^.]*)"),
  captureRule("occasional", "(occasional[^.]*)"),
];

// ============================================================================
// ASSEMBLER
// ============================================================================

export class SummaryAssembler {
  private readonly statusKeywords: ReadonlyArray<string>;

  constructor(lexicon: Pick<ClinicalLexicon, "soapKeywords">) {
    this.statusKeywords = lexicon.soapKeywords.status;
  }

  assemble(input: SummaryInput): Summary {
    const { entities, temporal } = input;
    const totalEntities = Object.values(entities).reduce((sum, list) => sum + list.length, 0);

    return {
      patient_name: this.extractPatientName(input.transcript),
      symptoms: [...(entities["symptoms"] ?? [])],
      diagnosis: input.diagnosis,
      treatments: [...(entities["treatments"] ?? [])],
      current_status: this.extractCurrentStatus(input.transcript, input.patientStatements),
      prognosis: input.prognosis,
      temporal_info: {
        incident_date: temporal.dates[0]?.text ?? null,
        treatment_duration: this.extractTreatmentDuration(input.transcript),
        dates: mentionTexts(temporal.dates),
        durations: mentionTexts(temporal.durations),
      },
      medical_keywords: [...input.medicalKeywords],
      anatomy_mentioned: [...(entities["anatomy"] ?? [])],
      metadata: {
        total_entities: totalEntities,
        has_diagnosis: input.diagnosis !== null,
        has_prognosis: input.prognosis !== null,
      },
    };
  }

  extractPatientName(transcript: string): string {
    return firstMatch(PATIENT_NAME_RULES, transcript) ?? SUMMARY_DEFAULTS.patientName;
  }

  /**
   * Latest patient statement carrying a status keyword, else a
   * transcript-wide status phrase.
   */
  extractCurrentStatus(transcript: string, patientStatements: ReadonlyArray<string>): string {
    for (let i = patientStatements.length - 1; i >= 0; i--) {
      const statement = patientStatements[i];
      if (statement !== undefined && containsAny(statement, this.statusKeywords)) {
        return statement;
      }
    }

    return firstMatch(STATUS_RULES, transcript) ?? SUMMARY_DEFAULTS.currentStatus;
  }

  extractTreatmentDuration(transcript: string): string | null {
    return TREATMENT_DURATION_PATTERN.exec(transcript)?.[0] ?? null;
  }
}

/**
 * One-line digest, e.g. "Patient: Mr. Okafor. Diagnosis: whiplash injury."
 * Empty parts are left out.
 */
export const generateShortSummary = (summary: Summary): string => {
  const parts: string[] = [];

  if (summary.patient_name) parts.push(`Patient: ${summary.patient_name}`);
  if (summary.diagnosis) parts.push(`Diagnosis: ${summary.diagnosis}`);
  if (summary.symptoms.length > 0) parts.push(`Symptoms: ${summary.symptoms.slice(0, 3).join(", ")}`);
  if (summary.treatments.length > 0) {
    parts.push(`Treatment: ${summary.treatments.slice(0, 2).join(", ")}`);
  }
  if (summary.prognosis) parts.push(`Prognosis: ${summary.prognosis}`);

  return `${parts.join(". ")}.`;
};
