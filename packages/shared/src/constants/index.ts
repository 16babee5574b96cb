// =============================================================================
// Calmpoint — Shared Constants
// =============================================================================

import type { CrisisContact, QuestionId } from '../types/index.js';

// ---------------------------------------------------------------------------
// Daily mood quiz
// ---------------------------------------------------------------------------

export const QUIZ_LIMITS = {
  /** Every quiz answer is a 1–5 Likert score */
  SCORE_MIN: 1,
  SCORE_MAX: 5,
  ROTATING_QUESTION_COUNT: 5,
  DOMAIN_NAME_MAX_CHARS: 100,
  NOTES_MAX_CHARS: 2000,
} as const;

/**
 * Fixed 12-slot ordering used for high/low point detection:
 * 4 core, 5 rotating, 3 DASS. Ties resolve to the lowest slot.
 */
export const QUIZ_QUESTION_IDS: readonly QuestionId[] = [
  'q1', 'q2', 'q3', 'q4',
  'q5', 'q6', 'q7', 'q8', 'q9',
  'q10', 'q11', 'q12',
] as const;

// ---------------------------------------------------------------------------
// Weekly DASS aggregation
// ---------------------------------------------------------------------------

export const WEEKLY_BLOCK_SIZE = 7;

/**
 * 1–5 self-report → 0–3 severity. The 7-day sum is doubled to land on the
 * 0–42 DASS-21 subscale range. Inferred convention, not clinically validated.
 */
export const DASS_RESCALE: Readonly<Record<number, number>> = {
  1: 0,
  2: 1,
  3: 1,
  4: 2,
  5: 3,
} as const;

export const DASS_TOTAL_MULTIPLIER = 2;

// ---------------------------------------------------------------------------
// Chat
// ---------------------------------------------------------------------------

export const CHAT_LIMITS = {
  MESSAGE_MAX_CHARS: 1000,
  TITLE_MAX_CHARS: 50,
} as const;

// ---------------------------------------------------------------------------
// Crisis contact catalog
// Static, never generated. Ordered by priority.
// ---------------------------------------------------------------------------

export const CRISIS_CONTACTS: readonly CrisisContact[] = [
  {
    id: 'us_emergency',
    type: 'emergency',
    name: 'Emergency Services',
    number: '911',
    description: 'Call if you or someone else is in immediate danger.',
    availability: '24/7',
    country: 'United States',
    priority: 1,
  },
  {
    id: 'us_988_lifeline',
    type: 'crisis_hotline',
    name: '988 Suicide & Crisis Lifeline',
    number: '988',
    website: 'https://988lifeline.org',
    description: 'Free, confidential support for people in distress. Call or text 988.',
    availability: '24/7',
    country: 'United States',
    priority: 2,
  },
  {
    id: 'us_crisis_text_line',
    type: 'crisis_hotline',
    name: 'Crisis Text Line',
    number: '741741',
    website: 'https://www.crisistextline.org',
    description: 'Text HOME to 741741 to reach a trained crisis counselor.',
    availability: '24/7',
    country: 'United States',
    priority: 3,
  },
  {
    id: 'in_emergency',
    type: 'emergency',
    name: 'National Emergency Number',
    number: '112',
    description: 'Single emergency number for police, fire and ambulance.',
    availability: '24/7',
    country: 'India',
    priority: 4,
  },
  {
    id: 'in_tele_manas',
    type: 'crisis_hotline',
    name: 'Tele MANAS',
    number: '14416',
    website: 'https://telemanas.mohfw.gov.in',
    description: 'Government mental health helpline offering free counselling in multiple languages.',
    availability: '24/7',
    country: 'India',
    priority: 5,
  },
  {
    id: 'intl_find_a_helpline',
    type: 'online_resource',
    name: 'Find A Helpline',
    website: 'https://findahelpline.com',
    description: 'Directory of free, confidential helplines in over 130 countries.',
    availability: 'Always online',
    country: 'International',
    priority: 6,
  },
];

export const SAFETY_DISCLAIMER =
  'If you are in immediate danger, call your local emergency number or go to your nearest emergency room.';

// ---------------------------------------------------------------------------
// API versioning
// ---------------------------------------------------------------------------

export const API_VERSION = 'v1' as const;
export const API_PREFIX = `/api/${API_VERSION}` as const;
