// =============================================================================
// Calmpoint API — Chat routes
// POST /api/v1/chat/message      — send a message (creates a session when session_id is null)
// POST /api/v1/chat/end-session  — drop a live session
// POST /api/v1/chat/summarize    — archive a session as title + summary, then drop it
//
// Chat history itself lives on the device; the server keeps only the live
// dialogue for each session.
// =============================================================================

import type { FastifyInstance } from 'fastify';
import { ChatMessageSchema, SessionIdSchema } from '@calmpoint/shared';
import type { ChatArchiveStore } from '@calmpoint/db';
import type { TextGenerator } from '../../services/llmClient.js';
import type { SessionTracker } from '../../services/chat/sessionTracker.js';
import { summarizeSession } from '../../services/chat/summarizer.js';

export interface ChatRouteOptions {
  tracker: SessionTracker;
  archive: ChatArchiveStore;
  generator: TextGenerator;
}

export default async function chatRoutes(fastify: FastifyInstance, opts: ChatRouteOptions): Promise<void> {
  const auth = { preHandler: [fastify.authenticate] };

  // ---------------------------------------------------------------------------
  // POST /chat/message
  // ---------------------------------------------------------------------------
  fastify.post('/message', auth, async (request, reply) => {
    const body = ChatMessageSchema.parse(request.body);
    const result = await opts.tracker.handleMessage(request.user.sub, body.session_id, body.message);
    return reply.status(201).send({ success: true, ...result });
  });

  // ---------------------------------------------------------------------------
  // POST /chat/end-session — unknown ids are not an error; cleanup_count is 0
  // ---------------------------------------------------------------------------
  fastify.post('/end-session', auth, async (request, reply) => {
    const { session_id } = SessionIdSchema.parse(request.body);
    const cleanup_count = await opts.tracker.endSession(request.user.sub, session_id);
    return reply.send({ success: true, message: 'Session ended successfully', cleanup_count });
  });

  // ---------------------------------------------------------------------------
  // POST /chat/summarize
  // ---------------------------------------------------------------------------
  fastify.post('/summarize', auth, async (request, reply) => {
    const { session_id } = SessionIdSchema.parse(request.body);
    const saved = await summarizeSession(request.user.sub, session_id, {
      tracker: opts.tracker,
      archive: opts.archive,
      generator: opts.generator,
      log: request.log,
    });
    return reply.status(201).send({
      success: true,
      summary_id: saved.id,
      title: saved.title,
      summary: saved.summary,
      message_count: saved.message_count,
    });
  });
}
