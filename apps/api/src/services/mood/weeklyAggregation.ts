// =============================================================================
// Calmpoint API — Weekly DASS aggregation
//
// Runs after every saved daily log. When the user's log count closes a
// 7-entry block, the last 7 logs are rescaled 1–5 → 0–3, summed and doubled
// into 0–42 sub-scale totals and stored once per (user, week_start, week_end).
//
// Best-effort: nothing here fails the daily submission. Skips and storage
// errors are logged and the caller gets null.
// =============================================================================

import type { FastifyBaseLogger } from 'fastify';
import {
  DASS_RESCALE,
  DASS_TOTAL_MULTIPLIER,
  WEEKLY_BLOCK_SIZE,
  type DailyMoodLog,
  type DassSubscale,
  type WeeklyDassSummary,
} from '@calmpoint/shared';
import type { MoodLogStore } from '@calmpoint/db';
import { captureException } from '../../sentry.js';

export interface WeeklyAggregationDeps {
  store: MoodLogStore;
  log: FastifyBaseLogger;
  today?: () => Date;
}

export interface WeeklyTotals {
  depression_total: number;
  anxiety_total: number;
  stress_total: number;
}

export function shouldAggregate(count: number): boolean {
  return count >= WEEKLY_BLOCK_SIZE && count % WEEKLY_BLOCK_SIZE === 0;
}

export function rescaleDass(score: number): number {
  return DASS_RESCALE[score] ?? 0;
}

function subscaleTotal(entries: readonly DailyMoodLog[], subscale: DassSubscale): number {
  const sum = entries.reduce((acc, e) => acc + rescaleDass(e.dass_today[subscale]), 0);
  return sum * DASS_TOTAL_MULTIPLIER;
}

export function computeWeeklyTotals(entries: readonly DailyMoodLog[]): WeeklyTotals {
  return {
    depression_total: subscaleTotal(entries, 'depression'),
    anxiety_total: subscaleTotal(entries, 'anxiety'),
    stress_total: subscaleTotal(entries, 'stress'),
  };
}

/** An entry's calendar day: its client date, else the day it was submitted. */
function entryDay(entry: DailyMoodLog): string | null {
  if (entry.date) return entry.date;
  if (entry.submitted_at) return entry.submitted_at.slice(0, 10);
  return null;
}

export function resolveWeekWindow(
  entries: readonly DailyMoodLog[],
  today: Date,
): { week_start: string; week_end: string } {
  const days = entries.map(entryDay).filter((d): d is string => d !== null).sort();
  const first = days[0];
  const last = days[days.length - 1];
  if (first === undefined || last === undefined) {
    const day = today.toISOString().slice(0, 10);
    return { week_start: day, week_end: day };
  }
  return { week_start: first, week_end: last };
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

function average(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return round2(values.reduce((a, b) => a + b, 0) / values.length);
}

/** Mean of the per-day averages; reported with the summary, never stored. */
export function weeklyAverages(entries: readonly DailyMoodLog[]): {
  weekly_core_avg: number | null;
  weekly_rotating_avg: number | null;
} {
  return {
    weekly_core_avg: average(entries.map((e) => e.core_avg)),
    weekly_rotating_avg: average(entries.map((e) => e.rotating_avg)),
  };
}

/**
 * Aggregate the block the latest log just closed, if any. Resolves to the
 * summary only when a new weekly record was written.
 */
export async function maybeAggregateWeek(
  userId: string,
  deps: WeeklyAggregationDeps,
): Promise<WeeklyDassSummary | null> {
  const today = deps.today ?? (() => new Date());

  try {
    const count = await deps.store.countDailyLogs(userId);
    if (!shouldAggregate(count)) return null;

    const lastWeek = await deps.store.lastDailyLogs(userId, WEEKLY_BLOCK_SIZE);
    if (lastWeek.length < WEEKLY_BLOCK_SIZE) {
      deps.log.warn({ userId, count, fetched: lastWeek.length }, 'Weekly aggregation skipped: incomplete block');
      return null;
    }

    const range = resolveWeekWindow(lastWeek, today());
    if (await deps.store.weeklyTotalsExist(userId, range.week_start, range.week_end)) {
      deps.log.info({ userId, ...range }, 'Weekly DASS totals already stored for range');
      return null;
    }

    const totals = computeWeeklyTotals(lastWeek);
    const saved = await deps.store.saveWeeklyTotals({ user_id: userId, ...range, ...totals });
    if (!saved) {
      // Lost the race to a concurrent submission for the same range
      deps.log.info({ userId, ...range }, 'Weekly DASS totals written concurrently');
      return null;
    }

    deps.log.info({ userId, weeklyId: saved.id, ...range }, 'Weekly DASS totals stored');
    return {
      weekly_id: saved.id,
      week_start: saved.week_start,
      week_end: saved.week_end,
      depression_total: saved.depression_total,
      anxiety_total: saved.anxiety_total,
      stress_total: saved.stress_total,
      ...weeklyAverages(lastWeek),
    };
  } catch (err) {
    deps.log.warn({ err, userId }, 'Weekly DASS aggregation failed');
    captureException(err, { userId, stage: 'weekly_dass' });
    return null;
  }
}
