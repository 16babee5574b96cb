// =============================================================================
// Calmpoint API — Daily mood quiz validation and scoring
//
// The quiz has 12 fixed slots, in this order:
//   q1–q4   core       mood, energy, sleep, stress
//   q5–q9   rotating   five answers for today's domain
//   q10–q12 DASS       depression, anxiety, stress
// =============================================================================

import {
  DailyQuizSchema,
  QUIZ_QUESTION_IDS,
  type DailyQuizInput,
  type ScorePoint,
} from '@calmpoint/shared';
import type { ZodIssue } from 'zod';

export type QuizValidationResult =
  | { ok: true; value: DailyQuizInput }
  | { ok: false; error: { field: string; message: string } };

export interface QuizScore {
  high_point: ScorePoint;
  low_point: ScorePoint;
  core_avg: number;
  rotating_avg: number;
}

function describeIssue(issue: ZodIssue): string {
  if (issue.code === 'invalid_type' && issue.received === 'undefined') {
    return `${issue.path.join('.')} is required`;
  }
  return issue.message;
}

/**
 * Check a raw payload. On failure `field` is the top-level key at fault
 * (core_scores, rotating_scores, dass_today, date or additional_notes).
 */
export function validateDailyQuiz(payload: unknown): QuizValidationResult {
  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
    return { ok: false, error: { field: 'body', message: 'JSON body required' } };
  }

  const parsed = DailyQuizSchema.safeParse(payload);
  if (parsed.success) return { ok: true, value: parsed.data };

  const [issue] = parsed.error.issues;
  if (!issue) {
    return { ok: false, error: { field: 'body', message: 'Invalid quiz payload' } };
  }
  const head = issue.path[0];
  return {
    ok: false,
    error: { field: head === undefined ? 'body' : String(head), message: describeIssue(issue) },
  };
}

function mean(values: readonly number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Flatten answers into q1..q12 order. */
export function quizVector(quiz: DailyQuizInput): number[] {
  const { core_scores: c, rotating_scores: r, dass_today: d } = quiz;
  return [c.mood, c.energy, c.sleep, c.stress, ...r.scores, d.depression, d.anxiety, d.stress];
}

/**
 * Derive high/low points and averages. Ties go to the lowest-numbered
 * question.
 */
export function scoreDailyQuiz(quiz: DailyQuizInput): QuizScore {
  const vector = quizVector(quiz);

  let hi = 0;
  let lo = 0;
  vector.forEach((score, i) => {
    if (score > (vector[hi] ?? score)) hi = i;
    if (score < (vector[lo] ?? score)) lo = i;
  });

  const point = (i: number): ScorePoint => ({
    question_id: QUIZ_QUESTION_IDS[i] ?? 'q1',
    score: vector[i] ?? 0,
  });

  const { core_scores: c } = quiz;
  return {
    high_point: point(hi),
    low_point: point(lo),
    core_avg: mean([c.mood, c.energy, c.sleep, c.stress]),
    rotating_avg: mean(quiz.rotating_scores.scores),
  };
}
