/**
 * SOAP NOTE SCHEMA
 *
 * Subjective / Objective / Assessment / Plan sections derived from a
 * diarized consultation. Every field is always populated; sections that
 * the transcript does not support carry the fallback text below.
 */

import { Schema as S } from "effect";

// ============================================================================
// SECTIONS
// ============================================================================

export const SubjectiveSchema = S.Struct({
  chief_complaint: S.String,
  history_of_present_illness: S.String,
  review_of_systems: S.String,
  patient_statements: S.Array(S.String),
});
export type Subjective = S.Schema.Type<typeof SubjectiveSchema>;

export const ObjectiveSchema = S.Struct({
  physical_examination: S.String,
  vital_signs: S.String,
  observations: S.Array(S.String),
});
export type Objective = S.Schema.Type<typeof ObjectiveSchema>;

export const SeveritySchema = S.Literal("Severe", "Moderate", "Mild", "Not specified");
export type Severity = S.Schema.Type<typeof SeveritySchema>;

export const AssessmentSchema = S.Struct({
  primary_diagnosis: S.String,
  severity: SeveritySchema,
  prognosis: S.String,
});
export type Assessment = S.Schema.Type<typeof AssessmentSchema>;

export const PlanSchema = S.Struct({
  treatment_plan: S.String,
  medications: S.Array(S.String),
  follow_up: S.String,
  patient_education: S.Array(S.String),
});
export type Plan = S.Schema.Type<typeof PlanSchema>;

export const SOAPNoteSchema = S.Struct({
  subjective: SubjectiveSchema,
  objective: ObjectiveSchema,
  assessment: AssessmentSchema,
  plan: PlanSchema,
});
export type SOAPNote = S.Schema.Type<typeof SOAPNoteSchema>;

// ============================================================================
// FALLBACKS
// ============================================================================

export const SOAP_FALLBACKS = {
  chiefComplaint: "Not reported",
  history: "History not explicitly described",
  reviewOfSystems: "No additional systems reported",
  physicalExamination: "Examination findings not documented",
  examinationConducted: "Physical examination was conducted.",
  examinationFindings: "Findings documented",
  vitalSigns: "Vital signs not recorded in transcript",
  observations: "No specific observations documented",
  diagnosis: "Diagnosis not explicitly stated",
  prognosis: "Prognosis not explicitly stated",
  treatmentPlan: "Treatment plan not explicitly stated",
  medications: "No specific medications documented",
  followUp: "Follow-up as needed if symptoms worsen",
  education: "General health maintenance advised",
} as const;
