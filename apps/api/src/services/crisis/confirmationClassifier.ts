// =============================================================================
// Calmpoint API — Confirmation-intent classifier
// Maps a short reply to the "do you want resources now?" prompt onto
// affirmative / negative / unclear. Affirmative words are checked first, so
// "not sure" is affirmative because of "sure".
// =============================================================================

import type { ConfirmationIntent } from '@calmpoint/shared';
import { matchesAny, normalizeForMatching, phrasePattern } from './patterns.js';

const AFFIRMATIVE = ['yes', 'sure', 'okay', 'ok', 'please', 'help', 'need'].map(phrasePattern);

const NEGATIVE = ['no', 'not', "don't", 'later', 'maybe'].map(phrasePattern);

export function classifyConfirmation(reply: string): ConfirmationIntent {
  const normalized = normalizeForMatching(reply);
  if (matchesAny(normalized, AFFIRMATIVE)) return 'affirmative';
  if (matchesAny(normalized, NEGATIVE)) return 'negative';
  return 'unclear';
}
