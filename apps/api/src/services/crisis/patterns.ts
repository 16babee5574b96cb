// =============================================================================
// Calmpoint API — Word-boundary phrase matching shared by the crisis services
// =============================================================================

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Compile a phrase into a case-insensitive, word-boundary-delimited pattern.
 * Runs of whitespace inside the phrase match any whitespace run.
 */
export function phrasePattern(phrase: string): RegExp {
  const body = phrase
    .trim()
    .split(/\s+/)
    .map(escapeRegExp)
    .join('\\s+');
  return new RegExp(`\\b${body}\\b`, 'i');
}

/** Lower-case and fold typographic apostrophes so "can’t" matches "can't". */
export function normalizeForMatching(text: string): string {
  return text.toLowerCase().replace(/[‘’ʼ]/g, "'");
}

export function matchesAny(text: string, patterns: readonly RegExp[]): boolean {
  return patterns.some((re) => re.test(text));
}
