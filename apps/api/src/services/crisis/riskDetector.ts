// =============================================================================
// Calmpoint API — Pattern-based risk detector
//
// Lexical screening of user messages, not classification. Categories are
// tested in declaration order and the first match wins:
//   suicide → self_harm → general
// =============================================================================

import type { RiskCategory, RiskDetectionResult } from '@calmpoint/shared';
import { matchesAny, normalizeForMatching, phrasePattern } from './patterns.js';

const RISK_PHRASES: ReadonlyArray<readonly [RiskCategory, readonly string[]]> = [
  [
    'suicide',
    [
      'suicide',
      'suicidal',
      'kill myself',
      'killing myself',
      'end my life',
      'ending my life',
      'take my own life',
      'want to die',
      'wanna die',
      'better off dead',
      'no reason to live',
      'end it all',
    ],
  ],
  [
    'self_harm',
    [
      'self harm',
      'self-harm',
      'self harming',
      'self-harming',
      'hurt myself',
      'hurting myself',
      'harm myself',
      'cut myself',
      'cutting myself',
      'burn myself',
    ],
  ],
  [
    'general',
    [
      'hopeless',
      'worthless',
      "can't go on",
      "can't take it anymore",
      'no way out',
      'nothing matters',
      'give up on everything',
      'falling apart',
      'breaking down',
    ],
  ],
];

const COMPILED: ReadonlyArray<readonly [RiskCategory, readonly RegExp[]]> = RISK_PHRASES.map(
  ([category, phrases]) => [category, phrases.map(phrasePattern)] as const,
);

export function detectRisk(text: string): RiskDetectionResult {
  const normalized = normalizeForMatching(text);
  for (const [category, patterns] of COMPILED) {
    if (matchesAny(normalized, patterns)) {
      return { is_risk: true, category };
    }
  }
  return { is_risk: false, category: 'none' };
}
