// =============================================================================
// Calmpoint — Shared Entity Types
// Derived from packages/db/migrations. Keep in sync with DB migrations.
// =============================================================================

// ---------------------------------------------------------------------------
// Crisis detection
// ---------------------------------------------------------------------------

export type RiskCategory = 'suicide' | 'self_harm' | 'general';

export type RiskDetectionResult =
  | { is_risk: true; category: RiskCategory }
  | { is_risk: false; category: 'none' };

export type ConfirmationIntent = 'affirmative' | 'negative' | 'unclear';

/**
 * Per-session crisis handshake. `resolved` behaves like `not_offered` for
 * the next message; it only records how the last offer ended.
 */
export type CrisisOfferState =
  | { status: 'not_offered' }
  | { status: 'offered_pending_confirmation'; category: RiskCategory; offered_at: string }
  | { status: 'resolved'; intent: ConfirmationIntent; resolved_at: string };

export type CrisisOfferStatus = CrisisOfferState['status'];

// ---------------------------------------------------------------------------
// Crisis contact catalog — closed variants, each carrying only its own fields
// ---------------------------------------------------------------------------

interface CrisisContactBase {
  id: string;
  name: string;
  description: string;
  availability: string;
  country: string;
  priority: number;
}

export interface EmergencyContact extends CrisisContactBase {
  type: 'emergency';
  number: string;
}

export interface CrisisHotlineContact extends CrisisContactBase {
  type: 'crisis_hotline';
  number: string;
  website?: string;
}

export interface OnlineResourceContact extends CrisisContactBase {
  type: 'online_resource';
  website: string;
}

export type CrisisContact = EmergencyContact | CrisisHotlineContact | OnlineResourceContact;

export type CrisisContactType = CrisisContact['type'];

// ---------------------------------------------------------------------------
// Chat
// ---------------------------------------------------------------------------

export type ChatRole = 'user' | 'assistant';

export interface ChatTurn {
  role: ChatRole;
  content: string;
}

export interface ChatMessageEnvelope {
  content: string;
  timestamp: string; // ISO 8601
  role: ChatRole;
}

export interface ChatSummary {
  id: string;
  user_id: string;
  session_id: string;
  title: string;
  summary: string;
  message_count: number;
  created_at: string;
}

// ---------------------------------------------------------------------------
// Daily mood quiz
// ---------------------------------------------------------------------------

export type QuestionId =
  | 'q1' | 'q2' | 'q3' | 'q4'
  | 'q5' | 'q6' | 'q7' | 'q8' | 'q9'
  | 'q10' | 'q11' | 'q12';

export interface ScorePoint {
  question_id: QuestionId;
  score: number;
}

export interface CoreScores {
  mood: number;
  energy: number;
  sleep: number;
  stress: number;
}

export interface RotatingScores {
  domain_name: string;
  scores: number[]; // always 5 entries once validated
}

export interface DassToday {
  depression: number;
  anxiety: number;
  stress: number;
}

export type DassSubscale = keyof DassToday;

/** Row shape of daily_mood_logs. Immutable once written. */
export interface DailyMoodLog {
  id: string;
  user_id: string;
  date: string | null; // ISO 8601 date, as supplied by the client
  core_scores: CoreScores;
  rotating_scores: RotatingScores;
  dass_today: DassToday;
  high_point: ScorePoint;
  low_point: ScorePoint;
  core_avg: number;
  rotating_avg: number;
  additional_notes: string | null;
  submitted_at: string | null; // ISO 8601 timestamp
}

/** Row shape of weekly_dass_totals. Unique per (user_id, week_start, week_end). */
export interface WeeklyDassTotals {
  id: string;
  user_id: string;
  week_start: string;
  week_end: string;
  depression_total: number;
  anxiety_total: number;
  stress_total: number;
  computed_at: string;
}

/** Returned with the daily quiz response when a 7-entry block closes. */
export interface WeeklyDassSummary {
  weekly_id: string;
  week_start: string;
  week_end: string;
  depression_total: number;
  anxiety_total: number;
  stress_total: number;
  weekly_core_avg: number | null;
  weekly_rotating_avg: number | null;
}

// ---------------------------------------------------------------------------
// API envelope
// ---------------------------------------------------------------------------

export interface ApiErrorBody {
  success: false;
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}
