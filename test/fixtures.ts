/**
 * Shared transcripts for pipeline-level tests. All content is invented.
 */

export const KNEE_SPRAIN_CONSULT = [
  "Physician: Good afternoon, Mr. Okafor. What brings you in today?",
  "Patient: My knee pain started when I fell off my bike on March 3rd.",
  "Physician: How have things been since then?",
  "Patient: The first two weeks were rough, but I had six sessions of physiotherapy and now it only aches occasionally.",
  "[Physical examination conducted]",
  "Physician: Your knee has full range of movement and there is no sign of swelling.",
  "Patient: That's a relief. Will it affect me in the future?",
  "Physician: You were diagnosed with a knee sprain, and I expect a full recovery within three months. Take painkillers if needed and return if anything changes.",
  "Patient: Thank you, doctor.",
].join("\n");

export const KNEE_SPRAIN_PATIENT_STATEMENTS = [
  "My knee pain started when I fell off my bike on March 3rd.",
  "The first two weeks were rough, but I had six sessions of physiotherapy and now it only aches occasionally.",
  "That's a relief. Will it affect me in the future?",
  "Thank you, doctor.",
];

export const KNEE_SPRAIN_DOCTOR_STATEMENTS = [
  "Good afternoon, Mr. Okafor. What brings you in today?",
  "How have things been since then?",
  "Your knee has full range of movement and there is no sign of swelling.",
  "You were diagnosed with a knee sprain, and I expect a full recovery within three months. Take painkillers if needed and return if anything changes.",
];

export const SHORT_EXCHANGE = "Physician: Hello.\nPatient: I have pain.\nPhysician: I see.";
