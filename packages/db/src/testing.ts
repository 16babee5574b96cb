// =============================================================================
// Calmpoint — In-memory store implementations
// Stand-ins for the Postgres stores in tests. They mirror the SQL semantics
// the API relies on: newest-first ordering and insert-if-absent for weekly
// windows.
// =============================================================================

import { randomUUID } from 'node:crypto';
import type { ChatSummary, CrisisContact, DailyMoodLog, WeeklyDassTotals } from '@calmpoint/shared';
import type {
  ChatArchiveStore,
  CrisisResourceCache,
  MoodLogStore,
  NewChatSummary,
  NewDailyMoodLog,
  NewWeeklyDassTotals,
  PageRequest,
} from './stores/types.js';

type Clock = () => Date;

export class MemoryMoodLogStore implements MoodLogStore {
  readonly dailyLogs: DailyMoodLog[] = [];
  readonly weeklyTotals: WeeklyDassTotals[] = [];

  constructor(private readonly now: Clock = () => new Date()) {}

  async saveDailyLog(log: NewDailyMoodLog): Promise<DailyMoodLog> {
    const saved: DailyMoodLog = { ...log, id: randomUUID(), submitted_at: this.now().toISOString() };
    this.dailyLogs.push(saved);
    return saved;
  }

  async countDailyLogs(userId: string): Promise<number> {
    return this.forUser(userId).length;
  }

  async lastDailyLogs(userId: string, limit: number): Promise<DailyMoodLog[]> {
    return this.listDailyLogs(userId, { limit, offset: 0 });
  }

  async listDailyLogs(userId: string, page: PageRequest): Promise<DailyMoodLog[]> {
    return this.forUser(userId)
      .reverse()
      .slice(page.offset, page.offset + page.limit);
  }

  async weeklyTotalsExist(userId: string, weekStart: string, weekEnd: string): Promise<boolean> {
    return this.weeklyTotals.some(
      (w) => w.user_id === userId && w.week_start === weekStart && w.week_end === weekEnd,
    );
  }

  async saveWeeklyTotals(totals: NewWeeklyDassTotals): Promise<WeeklyDassTotals | null> {
    if (await this.weeklyTotalsExist(totals.user_id, totals.week_start, totals.week_end)) {
      return null;
    }
    const saved: WeeklyDassTotals = { ...totals, id: randomUUID(), computed_at: this.now().toISOString() };
    this.weeklyTotals.push(saved);
    return saved;
  }

  async listWeeklyTotals(userId: string, limit: number): Promise<WeeklyDassTotals[]> {
    return this.weeklyTotals
      .filter((w) => w.user_id === userId)
      .sort((a, b) => b.week_end.localeCompare(a.week_end))
      .slice(0, limit);
  }

  // Insertion order stands in for submitted_at, which can tie within a millisecond
  private forUser(userId: string): DailyMoodLog[] {
    return this.dailyLogs.filter((l) => l.user_id === userId);
  }
}

export class MemoryChatArchiveStore implements ChatArchiveStore {
  readonly summaries: ChatSummary[] = [];

  async saveChatSummary(summary: NewChatSummary): Promise<ChatSummary> {
    const saved: ChatSummary = { ...summary, id: randomUUID(), created_at: new Date().toISOString() };
    this.summaries.push(saved);
    return saved;
  }
}

export class MemoryCrisisResourceCache implements CrisisResourceCache {
  readonly entries = new Map<string, { country: string; resources: CrisisContact[] }>();

  async get(countryKey: string): Promise<CrisisContact[] | null> {
    return this.entries.get(countryKey)?.resources ?? null;
  }

  async put(countryKey: string, country: string, resources: CrisisContact[]): Promise<void> {
    this.entries.set(countryKey, { country, resources });
  }
}
