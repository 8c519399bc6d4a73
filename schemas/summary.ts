/**
 * CLINICAL SUMMARY SCHEMA
 *
 * One structured record combining curated entities, rule-based diagnosis
 * and prognosis, temporal mentions and keyword phrases.
 */

import { Schema as S } from "effect";

export const SummaryTemporalInfoSchema = S.Struct({
  incident_date: S.NullOr(S.String),
  treatment_duration: S.NullOr(S.String),
  dates: S.Array(S.String),
  durations: S.Array(S.String),
});
export type SummaryTemporalInfo = S.Schema.Type<typeof SummaryTemporalInfoSchema>;

export const SummaryMetadataSchema = S.Struct({
  total_entities: S.Int,
  has_diagnosis: S.Boolean,
  has_prognosis: S.Boolean,
});

export const SummarySchema = S.Struct({
  patient_name: S.String,
  symptoms: S.Array(S.String),
  diagnosis: S.NullOr(S.String),
  treatments: S.Array(S.String),
  current_status: S.String,
  prognosis: S.NullOr(S.String),
  temporal_info: SummaryTemporalInfoSchema,
  medical_keywords: S.Array(S.String),
  anatomy_mentioned: S.Array(S.String),
  metadata: SummaryMetadataSchema,
});
export type Summary = S.Schema.Type<typeof SummarySchema>;

export const SUMMARY_DEFAULTS = {
  patientName: "Patient",
  currentStatus: "Status not explicitly mentioned",
} as const;
