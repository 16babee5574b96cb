// =============================================================================
// Calmpoint API — Chat session archiving
// Generates a short title and a journal summary for a finished session,
// stores them, then drops the live session.
// =============================================================================

import type { FastifyBaseLogger } from 'fastify';
import { CHAT_LIMITS, type ChatSummary } from '@calmpoint/shared';
import type { ChatArchiveStore } from '@calmpoint/db';
import { UpstreamGenerationError, UpstreamStorageError } from '../../errors.js';
import type { TextGenerator } from '../llmClient.js';
import { buildSummaryPrompt, buildTitlePrompt, renderTranscript } from '../prompts.js';
import type { SessionTracker } from './sessionTracker.js';

export const DEFAULT_CHAT_TITLE = 'Chat Session';

export interface SummarizerDeps {
  tracker: SessionTracker;
  archive: ChatArchiveStore;
  generator: TextGenerator;
  log: FastifyBaseLogger;
}

/** Strip wrapping quotes and trailing punctuation, collapse whitespace, cap length. */
export function cleanTitle(raw: string): string {
  const title = raw
    .replace(/["“”]/g, '')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/^['‘’`]+|['‘’`]+$/g, '')
    .replace(/[.!?:;,]+$/, '')
    .slice(0, CHAT_LIMITS.TITLE_MAX_CHARS)
    .trim();
  return title || DEFAULT_CHAT_TITLE;
}

/**
 * Archive an owned session. The session stays live if summary generation or
 * the archive write fails, so the caller can retry.
 */
export async function summarizeSession(
  userId: string,
  sessionId: string,
  deps: SummarizerDeps,
): Promise<ChatSummary> {
  return deps.tracker.withSession(userId, sessionId, async (session) => {
    const transcript = renderTranscript(session.transcript);

    let title = DEFAULT_CHAT_TITLE;
    try {
      const result = await deps.generator.generateCompletion(buildTitlePrompt(transcript), {
        maxTokens: 30,
        temperature: 0.3,
      });
      title = cleanTitle(result.text);
    } catch (err) {
      deps.log.warn({ err, sessionId }, 'Title generation failed; using default title');
    }

    const summaryResult = await deps.generator.generateCompletion(buildSummaryPrompt(transcript), {
      maxTokens: 400,
      temperature: 0.3,
    });
    const summary = summaryResult.text.trim();
    if (!summary) {
      throw new UpstreamGenerationError('Summary generation returned no text');
    }

    let saved: ChatSummary;
    try {
      saved = await deps.archive.saveChatSummary({
        user_id: userId,
        session_id: sessionId,
        title,
        summary,
        message_count: session.transcript.length,
      });
    } catch (err) {
      throw new UpstreamStorageError('Failed to archive chat session', { cause: err });
    }

    deps.tracker.discard(session);
    deps.log.info({ sessionId, summaryId: saved.id }, 'Chat session archived');
    return saved;
  });
}
