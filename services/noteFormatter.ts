/**
 * EXPORT FORMATTERS
 *
 * Plain-text SOAP note and JSON pipeline output, both pure functions of
 * their input.
 */

import type { SOAPNote } from "../schemas/soapNote";
import type { PipelineOutput } from "../schemas/pipeline";

const RULE = "=".repeat(60);
const SECTION_RULE = "-".repeat(40);
const BULLET = "  • ";

const bullets = (items: ReadonlyArray<string>): string[] => items.map((item) => `${BULLET}${item}`);

export const formatSoapNote = (note: SOAPNote): string => {
  const { subjective, objective, assessment, plan } = note;

  const lines = [
    RULE,
    "CLINICAL SOAP NOTE",
    RULE,

    "\nSUBJECTIVE",
    SECTION_RULE,
    `Chief Complaint: ${subjective.chief_complaint}`,
    `\nHistory: ${subjective.history_of_present_illness}`,
    `\nReview of Systems: ${subjective.review_of_systems}`,

    "\n\nOBJECTIVE",
    SECTION_RULE,
    `Physical Exam: ${objective.physical_examination}`,
    `\nVital Signs: ${objective.vital_signs}`,
    "\nObservations:",
    ...bullets(objective.observations),

    "\n\nASSESSMENT",
    SECTION_RULE,
    `Diagnosis: ${assessment.primary_diagnosis}`,
    `Severity: ${assessment.severity}`,
    `Prognosis: ${assessment.prognosis}`,

    "\n\nPLAN",
    SECTION_RULE,
    `Treatment: ${plan.treatment_plan}`,
    "\nMedications:",
    ...bullets(plan.medications),
    `\nFollow-up: ${plan.follow_up}`,
    "\nPatient Education:",
    ...bullets(plan.patient_education),

    `\n${RULE}`,
  ];

  return lines.join("\n");
};

export const serializeOutput = (output: PipelineOutput): string => JSON.stringify(output, null, 2);
