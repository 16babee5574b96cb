// =============================================================================
// Calmpoint API — Chat session table
//
// Sessions live in process memory only. The store is constructed once per app
// instance and injected into the tracker; nothing reaches it through module
// state. All methods are synchronous, so a check followed by a write in the
// same tick cannot interleave with another request.
// =============================================================================

import type { ChatMessageEnvelope, CrisisOfferState } from '@calmpoint/shared';
import type { Dialogue } from './dialogue.js';

export interface ChatSession {
  readonly id: string;
  readonly user_id: string;
  /** Owned by this session alone; dropped with it. */
  readonly dialogue: Dialogue;
  /** Every turn shown to the user, crisis turns included. */
  readonly transcript: readonly ChatMessageEnvelope[];
  readonly crisis: CrisisOfferState;
  readonly created_at: string;
  readonly last_active_at: string;
}

export interface SessionStore {
  get(id: string): ChatSession | undefined;
  put(session: ChatSession): void;
  /** Resolves to true when an entry was removed. */
  delete(id: string): boolean;
  /** Remove `id` only if it still maps to `expected`. */
  compareAndDelete(id: string, expected: ChatSession): boolean;
  /** Remove sessions idle since before `cutoff`; returns the removed ids. */
  sweepIdle(cutoff: Date): string[];
  readonly size: number;
}

export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, ChatSession>();

  get(id: string): ChatSession | undefined {
    return this.sessions.get(id);
  }

  put(session: ChatSession): void {
    this.sessions.set(session.id, session);
  }

  delete(id: string): boolean {
    return this.sessions.delete(id);
  }

  compareAndDelete(id: string, expected: ChatSession): boolean {
    if (this.sessions.get(id) !== expected) return false;
    return this.sessions.delete(id);
  }

  sweepIdle(cutoff: Date): string[] {
    const limit = cutoff.getTime();
    const removed: string[] = [];
    for (const [id, session] of this.sessions) {
      if (Date.parse(session.last_active_at) < limit) {
        this.sessions.delete(id);
        removed.push(id);
      }
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }
}
