// =============================================================================
// Calmpoint — Zod Validation Schemas
// Used for API request validation in apps/api and for checking generated
// output before it is cached.
// =============================================================================

import { z } from 'zod';
import { CHAT_LIMITS, QUIZ_LIMITS } from '../constants/index.js';

// ---------------------------------------------------------------------------
// Primitives
// ---------------------------------------------------------------------------

export const UuidSchema = z.string().uuid();

export const IsoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be a date in YYYY-MM-DD format')
  .refine((value) => {
    // Round-trip rejects days that roll over, e.g. 2026-02-30
    const parsed = new Date(`${value}T00:00:00.000Z`);
    return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
  }, 'Must be a valid calendar date');

export const QuizScoreSchema = z
  .number({ invalid_type_error: 'Scores must be integers between 1 and 5' })
  .int('Scores must be integers between 1 and 5')
  .min(QUIZ_LIMITS.SCORE_MIN, 'Scores must be integers between 1 and 5')
  .max(QUIZ_LIMITS.SCORE_MAX, 'Scores must be integers between 1 and 5');

// ---------------------------------------------------------------------------
// Daily mood quiz
// ---------------------------------------------------------------------------

export const CoreScoresSchema = z
  .object({
    mood: QuizScoreSchema,
    energy: QuizScoreSchema,
    sleep: QuizScoreSchema,
    stress: QuizScoreSchema,
  })
  .strict();

export const RotatingScoresSchema = z
  .object({
    domain_name: z.string().trim().min(1).max(QUIZ_LIMITS.DOMAIN_NAME_MAX_CHARS),
    scores: z
      .array(QuizScoreSchema)
      .length(QUIZ_LIMITS.ROTATING_QUESTION_COUNT, 'scores must be a list of 5 integers'),
  })
  .strict();

export const DassTodaySchema = z
  .object({
    depression: QuizScoreSchema,
    anxiety: QuizScoreSchema,
    stress: QuizScoreSchema,
  })
  .strict();

export const DailyQuizSchema = z.object({
  core_scores: CoreScoresSchema,
  rotating_scores: RotatingScoresSchema,
  dass_today: DassTodaySchema,
  date: IsoDateSchema.nullable().optional(),
  additional_notes: z.string().max(QUIZ_LIMITS.NOTES_MAX_CHARS).nullable().optional(),
});
export type DailyQuizInput = z.infer<typeof DailyQuizSchema>;

// ---------------------------------------------------------------------------
// Chat
// ---------------------------------------------------------------------------

export const ChatMessageSchema = z.object({
  message: z
    .string({ required_error: 'message is required' })
    .trim()
    .min(1, 'Message cannot be empty')
    .max(CHAT_LIMITS.MESSAGE_MAX_CHARS, 'Message must be 1000 characters or less'),
  // Blank or missing ids start a new session
  session_id: z
    .string()
    .trim()
    .max(128)
    .nullable()
    .optional()
    .transform((v) => (v ? v : null)),
});
export type ChatMessageInput = z.infer<typeof ChatMessageSchema>;

export const SessionIdSchema = z.object({
  session_id: z.string({ required_error: 'session_id is required' }).trim().min(1, 'session_id is required').max(128),
});
export type SessionIdInput = z.infer<typeof SessionIdSchema>;

// ---------------------------------------------------------------------------
// Crisis resources
// ---------------------------------------------------------------------------

const ContactBaseShape = {
  id: z.string().min(1).max(100),
  name: z.string().min(1).max(200),
  description: z.string().min(1).max(500),
  availability: z.string().min(1).max(100),
  country: z.string().min(1).max(100),
  priority: z.number().int().min(1),
};

export const CrisisContactSchema = z.discriminatedUnion('type', [
  z.object({ ...ContactBaseShape, type: z.literal('emergency'), number: z.string().min(1).max(40) }),
  z.object({
    ...ContactBaseShape,
    type: z.literal('crisis_hotline'),
    number: z.string().min(1).max(40),
    website: z.string().url().optional(),
  }),
  z.object({ ...ContactBaseShape, type: z.literal('online_resource'), website: z.string().url() }),
]);

export const CountryQuerySchema = z.object({
  country: z.string().trim().max(100).optional(),
});

// ---------------------------------------------------------------------------
// Pagination
// ---------------------------------------------------------------------------

export const PaginationSchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});
export type PaginationInput = z.infer<typeof PaginationSchema>;

export const WeeklyHistoryQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(52).default(12),
});
