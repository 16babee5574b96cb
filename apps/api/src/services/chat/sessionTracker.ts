// =============================================================================
// Calmpoint API — Conversation session tracker
//
// Per-session crisis handshake:
//
//   not_offered | resolved ──risk──▶ offered_pending_confirmation
//          │                                   │
//          └──no risk: generated reply         └──any reply: classify,
//             (validated, state unchanged)        reveal catalog ──▶ resolved
//
// Every message for a session runs under that session's lock, and the
// session record is replaced only after the reply is fully computed.
// =============================================================================

import { randomUUID } from 'node:crypto';
import type { FastifyBaseLogger } from 'fastify';
import type {
  ChatMessageEnvelope,
  CrisisContact,
  CrisisOfferState,
  RiskCategory,
} from '@calmpoint/shared';
import { SessionStateError } from '../../errors.js';
import { captureException } from '../../sentry.js';
import type { TextGenerator } from '../llmClient.js';
import { classifyConfirmation } from '../crisis/confirmationClassifier.js';
import {
  composeConfirmationPrompt,
  composeCrisisReply,
  composeResourceRevealReply,
} from '../crisis/responseComposer.js';
import {
  GENERIC_FALLBACK_REPLY,
  UNAVAILABLE_FALLBACK_REPLY,
  validateGeneratedText,
} from '../crisis/responseValidator.js';
import { detectRisk } from '../crisis/riskDetector.js';
import { Dialogue } from './dialogue.js';
import { KeyedLock } from './keyedLock.js';
import type { ChatSession, SessionStore } from './sessionStore.js';

export interface ChatReply {
  session_id: string;
  user_message: ChatMessageEnvelope;
  ai_response: ChatMessageEnvelope;
  crisis_detected?: boolean;
  crisis_category?: RiskCategory;
  confirmation_required?: boolean;
  show_resources?: boolean;
  crisis_resources?: CrisisContact[];
}

type TurnFlags = Omit<ChatReply, 'session_id' | 'user_message' | 'ai_response'>;

interface TurnOutcome {
  text: string;
  crisis: CrisisOfferState;
  flags: TurnFlags;
}

export interface SessionTrackerOptions {
  store: SessionStore;
  generator: TextGenerator;
  log: FastifyBaseLogger;
  idleTimeoutMs: number;
  now?: () => Date;
  newId?: () => string;
}

export class SessionTracker {
  private readonly store: SessionStore;
  private readonly generator: TextGenerator;
  private readonly log: FastifyBaseLogger;
  private readonly idleTimeoutMs: number;
  private readonly now: () => Date;
  private readonly newId: () => string;
  private readonly lock = new KeyedLock();

  constructor(opts: SessionTrackerOptions) {
    this.store = opts.store;
    this.generator = opts.generator;
    this.log = opts.log;
    this.idleTimeoutMs = opts.idleTimeoutMs;
    this.now = opts.now ?? (() => new Date());
    this.newId = opts.newId ?? randomUUID;
  }

  /**
   * Handle one user message. A null session id starts a new session; an id
   * that is unknown, ended, swept or owned by someone else is rejected with
   * SessionStateError.
   */
  async handleMessage(userId: string, sessionId: string | null, message: string): Promise<ChatReply> {
    if (sessionId === null) {
      const session = this.createSession(userId);
      this.log.info({ sessionId: session.id }, 'Chat session started');
      return this.lock.run(session.id, () => this.processTurn(session, message, true));
    }

    return this.lock.run(sessionId, () => {
      const session = this.requireOwned(userId, sessionId);
      return this.processTurn(session, message, false);
    });
  }

  /** Removes the session if the caller owns it. Returns how many entries were removed. */
  async endSession(userId: string, sessionId: string): Promise<number> {
    return this.lock.run(sessionId, async () => {
      const session = this.store.get(sessionId);
      if (!session || session.user_id !== userId) return 0;
      const removed = this.store.compareAndDelete(sessionId, session) ? 1 : 0;
      this.log.info({ sessionId, removed }, 'Chat session ended');
      return removed;
    });
  }

  /**
   * Run `work` against an owned session while holding its lock. No message
   * for the same session can interleave.
   */
  async withSession<T>(
    userId: string,
    sessionId: string,
    work: (session: ChatSession) => Promise<T>,
  ): Promise<T> {
    return this.lock.run(sessionId, () => work(this.requireOwned(userId, sessionId)));
  }

  /** Drop a session previously handed out by withSession. */
  discard(session: ChatSession): boolean {
    return this.store.compareAndDelete(session.id, session);
  }

  /** Evict sessions idle longer than the configured timeout. */
  sweepIdle(): number {
    const cutoff = new Date(this.now().getTime() - this.idleTimeoutMs);
    const removed = this.store.sweepIdle(cutoff);
    if (removed.length > 0) {
      this.log.info({ count: removed.length }, 'Swept idle chat sessions');
    }
    return removed.length;
  }

  get activeSessions(): number {
    return this.store.size;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private createSession(userId: string): ChatSession {
    const ts = this.now().toISOString();
    return {
      id: this.newId(),
      user_id: userId,
      dialogue: new Dialogue(this.generator),
      transcript: [],
      crisis: { status: 'not_offered' },
      created_at: ts,
      last_active_at: ts,
    };
  }

  private requireOwned(userId: string, sessionId: string): ChatSession {
    const session = this.store.get(sessionId);
    // Another user's session is reported exactly like a missing one
    if (!session || session.user_id !== userId) throw new SessionStateError(sessionId);
    return session;
  }

  private async processTurn(session: ChatSession, message: string, isNew: boolean): Promise<ChatReply> {
    const user_message: ChatMessageEnvelope = {
      content: message,
      timestamp: this.now().toISOString(),
      role: 'user',
    };

    const outcome = await this.decide(session, message);

    const ai_response: ChatMessageEnvelope = {
      content: outcome.text,
      timestamp: this.now().toISOString(),
      role: 'assistant',
    };

    const next: ChatSession = {
      ...session,
      crisis: outcome.crisis,
      transcript: [...session.transcript, user_message, ai_response],
      last_active_at: ai_response.timestamp,
    };

    if (isNew || this.store.get(session.id) === session) {
      this.store.put(next);
    } else {
      // Swept while the reply was being generated
      this.log.debug({ sessionId: session.id }, 'Session vanished mid-turn; state not saved');
    }

    return { session_id: session.id, user_message, ai_response, ...outcome.flags };
  }

  private async decide(session: ChatSession, message: string): Promise<TurnOutcome> {
    const ts = this.now().toISOString();

    if (session.crisis.status === 'offered_pending_confirmation') {
      const intent = classifyConfirmation(message);
      const reveal = composeResourceRevealReply(intent);
      this.log.info({ sessionId: session.id, intent }, 'Crisis resources revealed');
      return {
        text: reveal.text,
        crisis: { status: 'resolved', intent, resolved_at: ts },
        flags: { show_resources: true, crisis_resources: reveal.resources },
      };
    }

    const risk = detectRisk(message);
    if (risk.is_risk) {
      this.log.warn({ sessionId: session.id, category: risk.category }, 'Crisis language detected');
      return {
        text: `${composeCrisisReply(risk.category)}\n\n${composeConfirmationPrompt()}`,
        crisis: { status: 'offered_pending_confirmation', category: risk.category, offered_at: ts },
        flags: { crisis_detected: true, crisis_category: risk.category, confirmation_required: true },
      };
    }

    return { text: await this.generateReply(session, message), crisis: session.crisis, flags: {} };
  }

  private async generateReply(session: ChatSession, message: string): Promise<string> {
    let raw: string;
    try {
      raw = await session.dialogue.reply(message);
    } catch (err) {
      this.log.warn({ err, sessionId: session.id }, 'Chat generation failed; using fallback reply');
      captureException(err, { sessionId: session.id });
      return UNAVAILABLE_FALLBACK_REPLY;
    }

    const validated = validateGeneratedText(raw);
    if (validated === null) {
      this.log.warn({ sessionId: session.id }, 'Empty generated reply; using fallback');
      return GENERIC_FALLBACK_REPLY;
    }
    if (validated !== raw.trim()) {
      this.log.info({ sessionId: session.id }, 'Generated reply replaced by boundary template');
    }

    session.dialogue.record(message, validated);
    return validated;
  }
}
