// =============================================================================
// Calmpoint — Postgres chat archive (summaries of ended conversations)
// =============================================================================

import type { ChatSummary } from '@calmpoint/shared';
import type { Sql } from '../client.js';
import type { ChatArchiveStore, NewChatSummary } from './types.js';

interface ChatSummaryRow extends Omit<ChatSummary, 'created_at'> {
  created_at: Date;
}

export class PgChatArchiveStore implements ChatArchiveStore {
  constructor(private readonly sql: Sql) {}

  async saveChatSummary(summary: NewChatSummary): Promise<ChatSummary> {
    const [row] = await this.sql<ChatSummaryRow[]>`
      INSERT INTO chat_summaries (user_id, session_id, title, summary, message_count)
      VALUES (
        ${summary.user_id}, ${summary.session_id}, ${summary.title},
        ${summary.summary}, ${summary.message_count}
      )
      RETURNING id, user_id, session_id, title, summary, message_count, created_at
    `;
    if (!row) throw new Error('Failed to insert chat summary');
    return { ...row, created_at: row.created_at.toISOString() };
  }
}
