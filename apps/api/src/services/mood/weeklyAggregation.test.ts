import { beforeEach, describe, expect, it } from 'vitest';
import type { DailyMoodLog } from '@calmpoint/shared';
import type { NewDailyMoodLog } from '@calmpoint/db';
import { MemoryMoodLogStore } from '@calmpoint/db/testing';
import { silentLogger } from '../../testing/index.js';
import {
  computeWeeklyTotals,
  maybeAggregateWeek,
  rescaleDass,
  resolveWeekWindow,
  shouldAggregate,
} from './weeklyAggregation.js';

const USER = 'user-1';

function log(
  dass: { depression: number; anxiety: number; stress: number },
  extra: Partial<NewDailyMoodLog> = {},
): NewDailyMoodLog {
  return {
    user_id: USER,
    date: null,
    core_scores: { mood: 3, energy: 3, sleep: 3, stress: 3 },
    rotating_scores: { domain_name: 'social', scores: [3, 3, 3, 3, 3] },
    dass_today: dass,
    high_point: { question_id: 'q1', score: 3 },
    low_point: { question_id: 'q1', score: 3 },
    core_avg: 3,
    rotating_avg: 3,
    additional_notes: null,
    ...extra,
  };
}

const FLAT = { depression: 1, anxiety: 1, stress: 1 };

describe('shouldAggregate', () => {
  it.each([
    [0, false],
    [6, false],
    [7, true],
    [8, false],
    [13, false],
    [14, true],
  ])('count %i → %s', (count, expected) => {
    expect(shouldAggregate(count)).toBe(expected);
  });
});

describe('rescaleDass', () => {
  it('maps 1–5 onto 0–3', () => {
    expect([1, 2, 3, 4, 5].map(rescaleDass)).toEqual([0, 1, 1, 2, 3]);
  });
});

describe('computeWeeklyTotals', () => {
  it('rescales, sums and doubles each sub-scale', () => {
    const depression = [1, 2, 3, 4, 5, 1, 2];
    const entries = depression.map((d, i) => ({
      ...log({ depression: d, anxiety: 5, stress: 1 }),
      id: `log-${i}`,
      submitted_at: null,
    }));
    expect(computeWeeklyTotals(entries)).toEqual({
      depression_total: 16,
      anxiety_total: 42,
      stress_total: 0,
    });
  });
});

describe('resolveWeekWindow', () => {
  const today = new Date('2026-03-10T12:00:00.000Z');

  function stored(date: string | null, submitted_at: string | null): DailyMoodLog {
    return { ...log(FLAT, { date }), id: 'x', submitted_at };
  }

  it('uses the earliest and latest client dates', () => {
    const entries = [
      stored('2026-03-04', null),
      stored('2026-03-01', null),
      stored('2026-03-07', null),
    ];
    expect(resolveWeekWindow(entries, today)).toEqual({ week_start: '2026-03-01', week_end: '2026-03-07' });
  });

  it('falls back to the submission day', () => {
    const entries = [stored(null, '2026-03-03T23:10:00.000Z'), stored('2026-03-05', null)];
    expect(resolveWeekWindow(entries, today)).toEqual({ week_start: '2026-03-03', week_end: '2026-03-05' });
  });

  it('falls back to today when no entry carries a date', () => {
    expect(resolveWeekWindow([stored(null, null)], today)).toEqual({
      week_start: '2026-03-10',
      week_end: '2026-03-10',
    });
  });
});

describe('maybeAggregateWeek', () => {
  let store: MemoryMoodLogStore;
  const deps = () => ({ store, log: silentLogger });

  beforeEach(() => {
    store = new MemoryMoodLogStore(() => new Date('2026-03-09T08:00:00.000Z'));
  });

  async function submitDays(days: number, startDay = 1): Promise<void> {
    for (let i = 0; i < days; i++) {
      const day = String(startDay + i).padStart(2, '0');
      await store.saveDailyLog(log({ depression: 3, anxiety: 2, stress: 4 }, { date: `2026-03-${day}` }));
    }
  }

  it('does nothing before the seventh entry', async () => {
    await submitDays(6);
    await expect(maybeAggregateWeek(USER, deps())).resolves.toBeNull();
    expect(store.weeklyTotals).toHaveLength(0);
  });

  it('stores totals when the seventh entry lands', async () => {
    await submitDays(7);
    const summary = await maybeAggregateWeek(USER, deps());

    expect(summary).toEqual({
      weekly_id: store.weeklyTotals[0]?.id,
      week_start: '2026-03-01',
      week_end: '2026-03-07',
      depression_total: 14,
      anxiety_total: 14,
      stress_total: 28,
      weekly_core_avg: 3,
      weekly_rotating_avg: 3,
    });
    expect(store.weeklyTotals).toHaveLength(1);
  });

  it('is idempotent for the same block', async () => {
    await submitDays(7);
    await maybeAggregateWeek(USER, deps());
    await expect(maybeAggregateWeek(USER, deps())).resolves.toBeNull();
    expect(store.weeklyTotals).toHaveLength(1);
  });

  it('skips the eighth entry and aggregates again at fourteen', async () => {
    await submitDays(7);
    await maybeAggregateWeek(USER, deps());

    await submitDays(1, 8);
    await expect(maybeAggregateWeek(USER, deps())).resolves.toBeNull();

    await submitDays(6, 9);
    const second = await maybeAggregateWeek(USER, deps());
    expect(second).toMatchObject({ week_start: '2026-03-08', week_end: '2026-03-14' });
    expect(store.weeklyTotals).toHaveLength(2);
  });

  it('uses only the last seven entries', async () => {
    for (let i = 0; i < 7; i++) {
      await store.saveDailyLog(log({ depression: 5, anxiety: 5, stress: 5 }, { date: `2026-02-0${i + 1}` }));
    }
    for (let i = 0; i < 7; i++) {
      await store.saveDailyLog(log(FLAT, { date: `2026-02-1${i}` }));
    }
    const summary = await maybeAggregateWeek(USER, deps());
    expect(summary).toMatchObject({
      week_start: '2026-02-10',
      week_end: '2026-02-16',
      depression_total: 0,
      anxiety_total: 0,
      stress_total: 0,
    });
  });

  it('uses submission days when the client sent no dates', async () => {
    for (let i = 0; i < 7; i++) await store.saveDailyLog(log(FLAT));
    const summary = await maybeAggregateWeek(USER, deps());
    expect(summary).toMatchObject({ week_start: '2026-03-09', week_end: '2026-03-09' });
  });

  it('rounds weekly averages to two decimals', async () => {
    for (let i = 0; i < 7; i++) {
      await store.saveDailyLog(
        log(FLAT, { date: `2026-03-0${i + 1}`, core_avg: i === 6 ? 4 : 3, rotating_avg: 2.6 }),
      );
    }
    const summary = await maybeAggregateWeek(USER, deps());
    expect(summary?.weekly_core_avg).toBe(3.14);
    expect(summary?.weekly_rotating_avg).toBe(2.6);
  });

  it('swallows storage failures', async () => {
    store.countDailyLogs = async () => {
      throw new Error('connection refused');
    };
    await expect(maybeAggregateWeek(USER, deps())).resolves.toBeNull();
  });

  it('ignores other users', async () => {
    await submitDays(6);
    await store.saveDailyLog({ ...log(FLAT), user_id: 'user-2' });
    await expect(maybeAggregateWeek(USER, deps())).resolves.toBeNull();
    await expect(maybeAggregateWeek('user-2', deps())).resolves.toBeNull();
  });
});
