// =============================================================================
// Calmpoint API — Mood routes
// POST /api/v1/mood/quiz/daily  — submit the 12-question daily quiz
// GET  /api/v1/mood/quiz/daily  — paginated quiz history, newest first
// GET  /api/v1/mood/weekly      — stored weekly DASS totals, newest first
// =============================================================================

import type { FastifyInstance } from 'fastify';
import { PaginationSchema, WeeklyHistoryQuerySchema } from '@calmpoint/shared';
import type { MoodLogStore } from '@calmpoint/db';
import { InputValidationError, UpstreamStorageError } from '../../errors.js';
import { scoreDailyQuiz, validateDailyQuiz } from '../../services/mood/dailyQuiz.js';
import { maybeAggregateWeek } from '../../services/mood/weeklyAggregation.js';

export interface MoodRouteOptions {
  store: MoodLogStore;
}

export default async function moodRoutes(fastify: FastifyInstance, opts: MoodRouteOptions): Promise<void> {
  const auth = { preHandler: [fastify.authenticate] };

  // ---------------------------------------------------------------------------
  // POST /mood/quiz/daily
  // ---------------------------------------------------------------------------
  fastify.post('/quiz/daily', auth, async (request, reply) => {
    const checked = validateDailyQuiz(request.body);
    if (!checked.ok) {
      throw new InputValidationError(checked.error.field, checked.error.message);
    }

    const quiz = checked.value;
    const userId = request.user.sub;
    const score = scoreDailyQuiz(quiz);

    let logId: string;
    try {
      const saved = await opts.store.saveDailyLog({
        user_id: userId,
        date: quiz.date ?? null,
        core_scores: quiz.core_scores,
        rotating_scores: quiz.rotating_scores,
        dass_today: quiz.dass_today,
        high_point: score.high_point,
        low_point: score.low_point,
        core_avg: score.core_avg,
        rotating_avg: score.rotating_avg,
        additional_notes: quiz.additional_notes?.trim() ? quiz.additional_notes : null,
      });
      logId = saved.id;
    } catch (err) {
      throw new UpstreamStorageError('Failed to save daily mood log', { cause: err });
    }

    // Never fails the submission
    const weekly_dass = await maybeAggregateWeek(userId, { store: opts.store, log: request.log });

    return reply.status(201).send({
      success: true,
      message: 'Daily mood quiz saved successfully',
      log_id: logId,
      high_point: score.high_point,
      low_point: score.low_point,
      weekly_dass,
    });
  });

  // ---------------------------------------------------------------------------
  // GET /mood/quiz/daily?page=&limit=
  // ---------------------------------------------------------------------------
  fastify.get('/quiz/daily', auth, async (request, reply) => {
    const query = PaginationSchema.parse(request.query);
    const userId = request.user.sub;
    const limit = query.limit;
    const offset = (query.page - 1) * limit;

    const [items, total] = await Promise.all([
      opts.store.listDailyLogs(userId, { limit, offset }),
      opts.store.countDailyLogs(userId),
    ]);

    return reply.send({
      success: true,
      data: { items, total, page: query.page, limit, has_next: offset + items.length < total },
    });
  });

  // ---------------------------------------------------------------------------
  // GET /mood/weekly?limit=
  // ---------------------------------------------------------------------------
  fastify.get('/weekly', auth, async (request, reply) => {
    const { limit } = WeeklyHistoryQuerySchema.parse(request.query);
    const items = await opts.store.listWeeklyTotals(request.user.sub, limit);
    return reply.send({ success: true, data: { items } });
  });
}
