// =============================================================================
// Calmpoint — Storage interfaces
// Routes and services depend on these, never on postgres.js directly, so the
// API can be exercised against in-memory stores.
// =============================================================================

import type {
  ChatSummary,
  CrisisContact,
  DailyMoodLog,
  WeeklyDassTotals,
} from '@calmpoint/shared';

export type NewDailyMoodLog = Omit<DailyMoodLog, 'id' | 'submitted_at'>;

export type NewWeeklyDassTotals = Omit<WeeklyDassTotals, 'id' | 'computed_at'>;

export type NewChatSummary = Omit<ChatSummary, 'id' | 'created_at'>;

export interface PageRequest {
  limit: number;
  offset: number;
}

export interface MoodLogStore {
  saveDailyLog(log: NewDailyMoodLog): Promise<DailyMoodLog>;
  countDailyLogs(userId: string): Promise<number>;
  /** Most recent first, by submission time. */
  lastDailyLogs(userId: string, limit: number): Promise<DailyMoodLog[]>;
  listDailyLogs(userId: string, page: PageRequest): Promise<DailyMoodLog[]>;
  weeklyTotalsExist(userId: string, weekStart: string, weekEnd: string): Promise<boolean>;
  /**
   * Insert-if-absent on (user_id, week_start, week_end).
   * Resolves to null when the window is already stored.
   */
  saveWeeklyTotals(totals: NewWeeklyDassTotals): Promise<WeeklyDassTotals | null>;
  /** Most recent window first. */
  listWeeklyTotals(userId: string, limit: number): Promise<WeeklyDassTotals[]>;
}

export interface ChatArchiveStore {
  saveChatSummary(summary: NewChatSummary): Promise<ChatSummary>;
}

export interface CrisisResourceCache {
  /** Resolves to null on a miss, or when the cached row no longer parses. */
  get(countryKey: string): Promise<CrisisContact[] | null>;
  put(countryKey: string, country: string, resources: CrisisContact[]): Promise<void>;
}
