/**
 * CLINICAL NOTE BUILDER (SOAP)
 *
 * Derives Subjective / Objective / Assessment / Plan from patient and
 * doctor statements plus the transcript. Statement scans are keyword
 * substring checks; transcript scans are ordered extraction rules, and
 * severity terms match as whole words. Every section falls back to fixed
 * text when nothing matches.
 */

import { escapeRegExp, type ClinicalLexicon, type SoapKeywords } from "../schemas/lexicon";
import {
  SOAP_FALLBACKS,
  type Assessment,
  type Objective,
  type Plan,
  type SOAPNote,
  type Severity,
  type Subjective,
} from "../schemas/soapNote";
import {
  allContaining,
  captureRule,
  containsAnyWord,
  firstContaining,
  firstMatch,
  type ExtractionRule,
} from "./rules";

export interface NoteInput {
  readonly patientStatements: ReadonlyArray<string>;
  readonly doctorStatements: ReadonlyArray<string>;
  readonly transcript: string;
}

export interface NoteBuilderOptions {
  readonly dedupeMedications?: boolean;
}

// ============================================================================
// RULE TABLES
// ============================================================================

export const DIAGNOSIS_RULES: ReadonlyArray<ExtractionRule<string>> = [
  captureRule("diagnosed-with", "diagnosed with\\s+([^.,]+)"),
  captureRule("diagnosis-label", "diagnosis[:\\s]+([^.,]+)"),
  captureRule("it-was-injury", "it was (?:a|an)\\s+([^.,]*?\\binjury)\\b"),
  captureRule("whiplash", "(whiplash[^.,]*)"),
];

export const PROGNOSIS_RULES: ReadonlyArray<ExtractionRule<string>> = [
  captureRule("full-recovery", "(full recovery[^.]*)"),
  captureRule("expect-recovery", "(expect[^.]*recovery[^.]*)"),
  captureRule("no-foresight", "(don't foresee[^.]*)"),
  captureRule("no-long-term", "(\\bno\\b[^.]*long.term[^.]*)"),
];

export const TREATMENT_RULES: ReadonlyArray<ExtractionRule<string>> = [
  captureRule("physiotherapy", "(physiotherapy[^.]*)"),
  captureRule("treatment", "(treatment[^.]*)"),
];

const EXAM_STAGE_DIRECTION = /\[[^\]]*exam[^\]]*\]/i;

// ============================================================================
// BUILDER
// ============================================================================

export class ClinicalNoteBuilder {
  private readonly keywords: SoapKeywords;
  private readonly dedupeMedications: boolean;

  constructor(lexicon: Pick<ClinicalLexicon, "soapKeywords">, options: NoteBuilderOptions = {}) {
    this.keywords = lexicon.soapKeywords;
    this.dedupeMedications = options.dedupeMedications ?? false;
  }

  build(input: NoteInput): SOAPNote {
    return {
      subjective: this.buildSubjective(input.patientStatements),
      objective: this.buildObjective(input.doctorStatements, input.transcript),
      assessment: this.buildAssessment(input.transcript),
      plan: this.buildPlan(input.doctorStatements, input.transcript),
    };
  }

  // --------------------------------------------------------------------------
  // Subjective
  // --------------------------------------------------------------------------

  buildSubjective(patientStatements: ReadonlyArray<string>): Subjective {
    return {
      chief_complaint: this.extractChiefComplaint(patientStatements),
      history_of_present_illness:
        allContaining(patientStatements, this.keywords.history).join(" ") ||
        SOAP_FALLBACKS.history,
      review_of_systems:
        allContaining(patientStatements, this.keywords.reviewOfSystems).join(" ") ||
        SOAP_FALLBACKS.reviewOfSystems,
      patient_statements: [...patientStatements],
    };
  }

  /**
   * The complaint is expected early: only the first three statements are scanned.
   */
  extractChiefComplaint(patientStatements: ReadonlyArray<string>): string {
    return (
      firstContaining(patientStatements.slice(0, 3), this.keywords.complaint) ??
      patientStatements[0] ??
      SOAP_FALLBACKS.chiefComplaint
    );
  }

  // --------------------------------------------------------------------------
  // Objective
  // --------------------------------------------------------------------------

  buildObjective(doctorStatements: ReadonlyArray<string>, transcript: string): Objective {
    const observations = allContaining(doctorStatements, this.keywords.observation);

    return {
      physical_examination: this.extractPhysicalExamination(doctorStatements, transcript),
      vital_signs: this.extractVitalSigns(transcript),
      observations: observations.length > 0 ? observations : [SOAP_FALLBACKS.observations],
    };
  }

  extractPhysicalExamination(doctorStatements: ReadonlyArray<string>, transcript: string): string {
    const examStatement = firstContaining(doctorStatements, this.keywords.exam);
    if (examStatement !== null) return examStatement;

    if (EXAM_STAGE_DIRECTION.test(transcript)) {
      const finding =
        firstContaining(doctorStatements, this.keywords.examFollowUp) ??
        SOAP_FALLBACKS.examinationFindings;
      return `${SOAP_FALLBACKS.examinationConducted} ${finding}`;
    }

    return SOAP_FALLBACKS.physicalExamination;
  }

  /**
   * First listed vital sign present in the transcript, quoted up to the
   * next sentence delimiter.
   */
  extractVitalSigns(transcript: string): string {
    const lower = transcript.toLowerCase();

    for (const phrase of this.keywords.vitalSigns) {
      if (!lower.includes(phrase)) continue;
      const match = new RegExp(`${escapeRegExp(phrase)}[:\\s]+[^.,]*`, "i").exec(transcript);
      if (match) return match[0].trim();
    }

    return SOAP_FALLBACKS.vitalSigns;
  }

  // --------------------------------------------------------------------------
  // Assessment
  // --------------------------------------------------------------------------

  buildAssessment(transcript: string): Assessment {
    return {
      primary_diagnosis: firstMatch(DIAGNOSIS_RULES, transcript) ?? SOAP_FALLBACKS.diagnosis,
      severity: this.assessSeverity(transcript),
      prognosis: firstMatch(PROGNOSIS_RULES, transcript) ?? SOAP_FALLBACKS.prognosis,
    };
  }

  assessSeverity(transcript: string): Severity {
    if (containsAnyWord(transcript, this.keywords.severe)) return "Severe";
    if (containsAnyWord(transcript, this.keywords.moderate)) return "Moderate";
    if (containsAnyWord(transcript, this.keywords.mild)) return "Mild";
    return "Not specified";
  }

  // --------------------------------------------------------------------------
  // Plan
  // --------------------------------------------------------------------------

  buildPlan(doctorStatements: ReadonlyArray<string>, transcript: string): Plan {
    const education = allContaining(doctorStatements, this.keywords.education);

    return {
      treatment_plan:
        firstContaining(doctorStatements, this.keywords.treatment) ??
        firstMatch(TREATMENT_RULES, transcript) ??
        SOAP_FALLBACKS.treatmentPlan,
      medications: this.extractMedications(transcript),
      follow_up: firstContaining(doctorStatements, this.keywords.followUp) ?? SOAP_FALLBACKS.followUp,
      patient_education: education.length > 0 ? education : [SOAP_FALLBACKS.education],
    };
  }

  /**
   * One fragment per medication keyword present: the text between sentence
   * delimiters around its first occurrence. Two keywords in one sentence
   * yield the same fragment twice unless dedupeMedications is set.
   */
  extractMedications(transcript: string): string[] {
    const lower = transcript.toLowerCase();
    const fragments: string[] = [];

    for (const keyword of this.keywords.medication) {
      if (!lower.includes(keyword)) continue;
      const match = new RegExp(`[^.,!?]*${escapeRegExp(keyword)}[^.,!?]*`, "i").exec(transcript);
      if (!match) continue;

      const fragment = match[0].trim();
      if (this.dedupeMedications && fragments.includes(fragment)) continue;
      fragments.push(fragment);
    }

    return fragments.length > 0 ? fragments : [SOAP_FALLBACKS.medications];
  }
}
