// =============================================================================
// Calmpoint API — Post-filter for generated chat replies
//
// Deterministic, independent of the risk detector. Checks run in order:
//   1. escalation language   → redirect to crisis resources
//   2. diagnostic claims     → boundary reminder
//   3. treatment/medication  → boundary reminder
// Phrases match as substrings, so plurals and inflections are caught too
// ("disorders", "prescribed"). Empty output returns null; the caller
// substitutes GENERIC_FALLBACK_REPLY.
// =============================================================================

import { normalizeForMatching } from './patterns.js';

const ESCALATION = [
  'suicide',
  'suicidal',
  'self-harm',
  'self harm',
  'kill yourself',
  'end it all',
  'hurt yourself',
  'hurt myself',
];

const DIAGNOSTIC = [
  'you are suffering from',
  'you exhibit symptoms of',
  'i diagnose',
  'diagnosis',
  'diagnose',
  'diagnosed',
  'disorder',
  'clinical depression',
  'clinical anxiety',
  'pathological',
  'psychiatric condition',
];

const TREATMENT = [
  'you should take',
  'you need to take',
  'prescribe',
  'prescription',
  'medication',
  'medications',
  'dosage',
  'treatment plan',
  'medical treatment',
  'therapy regimen',
];

export const ESCALATION_REDIRECT_REPLY =
  "It sounds like something serious may be going on, and your safety matters most. Please reach out to a crisis line or your local emergency number now. You can find contacts any time in the app's crisis support section.";

export const DIAGNOSTIC_BOUNDARY_REPLY =
  "I'm here to listen and support you, but I can't offer diagnoses or clinical assessments. A healthcare professional can give you personal guidance. What's been weighing on you most?";

export const TREATMENT_BOUNDARY_REPLY =
  "I'm here for emotional support, but I can't recommend treatments or medications. A healthcare professional is the right person to talk those options through with. Is there something else on your mind?";

export const GENERIC_FALLBACK_REPLY =
  "I'm sorry, I couldn't put together a helpful response just now. How else can I support you today?";

export const UNAVAILABLE_FALLBACK_REPLY =
  "I'm having trouble connecting right now. Could we try again in a moment?";

export function validateGeneratedText(text: string): string | null {
  const trimmed = text.trim();
  if (!trimmed) return null;

  const normalized = normalizeForMatching(trimmed).replace(/\s+/g, ' ');
  const mentions = (phrases: readonly string[]) => phrases.some((p) => normalized.includes(p));

  if (mentions(ESCALATION)) return ESCALATION_REDIRECT_REPLY;
  if (mentions(DIAGNOSTIC)) return DIAGNOSTIC_BOUNDARY_REPLY;
  if (mentions(TREATMENT)) return TREATMENT_BOUNDARY_REPLY;
  return trimmed;
}
