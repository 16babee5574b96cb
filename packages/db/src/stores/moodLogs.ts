// =============================================================================
// Calmpoint — Postgres mood log store
// daily_mood_logs + weekly_dass_totals
// =============================================================================

import type {
  CoreScores,
  DailyMoodLog,
  DassToday,
  RotatingScores,
  ScorePoint,
  WeeklyDassTotals,
} from '@calmpoint/shared';
import type { Sql } from '../client.js';
import type { MoodLogStore, NewDailyMoodLog, NewWeeklyDassTotals, PageRequest } from './types.js';

interface DailyLogRow {
  id: string;
  user_id: string;
  entry_date: string | null;
  core_scores: CoreScores;
  rotating_scores: RotatingScores;
  dass_today: DassToday;
  high_point: ScorePoint;
  low_point: ScorePoint;
  core_avg: number;
  rotating_avg: number;
  additional_notes: string | null;
  submitted_at: Date | null;
}

interface WeeklyRow {
  id: string;
  user_id: string;
  week_start: string;
  week_end: string;
  depression_total: number;
  anxiety_total: number;
  stress_total: number;
  computed_at: Date;
}

function toDailyLog(row: DailyLogRow): DailyMoodLog {
  return {
    id: row.id,
    user_id: row.user_id,
    date: row.entry_date,
    core_scores: row.core_scores,
    rotating_scores: row.rotating_scores,
    dass_today: row.dass_today,
    high_point: row.high_point,
    low_point: row.low_point,
    core_avg: row.core_avg,
    rotating_avg: row.rotating_avg,
    additional_notes: row.additional_notes,
    submitted_at: row.submitted_at ? row.submitted_at.toISOString() : null,
  };
}

function toWeekly(row: WeeklyRow): WeeklyDassTotals {
  return { ...row, computed_at: row.computed_at.toISOString() };
}

export class PgMoodLogStore implements MoodLogStore {
  constructor(private readonly sql: Sql) {}

  private dailyColumns() {
    return this.sql`
      id, user_id, entry_date, core_scores, rotating_scores, dass_today,
      high_point, low_point, core_avg, rotating_avg, additional_notes, submitted_at
    `;
  }

  private weeklyColumns() {
    return this.sql`
      id, user_id, week_start, week_end,
      depression_total, anxiety_total, stress_total, computed_at
    `;
  }

  async saveDailyLog(log: NewDailyMoodLog): Promise<DailyMoodLog> {
    const [row] = await this.sql<DailyLogRow[]>`
      INSERT INTO daily_mood_logs (
        user_id, entry_date, core_scores, rotating_scores, dass_today,
        high_point, low_point, core_avg, rotating_avg, additional_notes
      )
      VALUES (
        ${log.user_id}, ${log.date},
        ${JSON.stringify(log.core_scores)}::JSONB,
        ${JSON.stringify(log.rotating_scores)}::JSONB,
        ${JSON.stringify(log.dass_today)}::JSONB,
        ${JSON.stringify(log.high_point)}::JSONB,
        ${JSON.stringify(log.low_point)}::JSONB,
        ${log.core_avg}, ${log.rotating_avg}, ${log.additional_notes}
      )
      RETURNING ${this.dailyColumns()}
    `;
    if (!row) throw new Error('Failed to insert daily mood log');
    return toDailyLog(row);
  }

  async countDailyLogs(userId: string): Promise<number> {
    const [row] = await this.sql<{ count: number }[]>`
      SELECT COUNT(*)::int AS count FROM daily_mood_logs WHERE user_id = ${userId}
    `;
    return row?.count ?? 0;
  }

  async lastDailyLogs(userId: string, limit: number): Promise<DailyMoodLog[]> {
    return this.listDailyLogs(userId, { limit, offset: 0 });
  }

  async listDailyLogs(userId: string, page: PageRequest): Promise<DailyMoodLog[]> {
    const rows = await this.sql<DailyLogRow[]>`
      SELECT ${this.dailyColumns()}
      FROM daily_mood_logs
      WHERE user_id = ${userId}
      ORDER BY submitted_at DESC, id DESC
      LIMIT ${page.limit} OFFSET ${page.offset}
    `;
    return rows.map(toDailyLog);
  }

  async weeklyTotalsExist(userId: string, weekStart: string, weekEnd: string): Promise<boolean> {
    const [row] = await this.sql<{ id: string }[]>`
      SELECT id FROM weekly_dass_totals
      WHERE user_id    = ${userId}
        AND week_start = ${weekStart}::date
        AND week_end   = ${weekEnd}::date
      LIMIT 1
    `;
    return row !== undefined;
  }

  async saveWeeklyTotals(totals: NewWeeklyDassTotals): Promise<WeeklyDassTotals | null> {
    const [row] = await this.sql<WeeklyRow[]>`
      INSERT INTO weekly_dass_totals (
        user_id, week_start, week_end, depression_total, anxiety_total, stress_total
      )
      VALUES (
        ${totals.user_id}, ${totals.week_start}::date, ${totals.week_end}::date,
        ${totals.depression_total}, ${totals.anxiety_total}, ${totals.stress_total}
      )
      ON CONFLICT ON CONSTRAINT weekly_dass_totals_window_key DO NOTHING
      RETURNING ${this.weeklyColumns()}
    `;
    return row ? toWeekly(row) : null;
  }

  async listWeeklyTotals(userId: string, limit: number): Promise<WeeklyDassTotals[]> {
    const rows = await this.sql<WeeklyRow[]>`
      SELECT ${this.weeklyColumns()}
      FROM weekly_dass_totals
      WHERE user_id = ${userId}
      ORDER BY week_end DESC, computed_at DESC
      LIMIT ${limit}
    `;
    return rows.map(toWeekly);
  }
}
