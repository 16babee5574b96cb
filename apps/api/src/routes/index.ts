// =============================================================================
// Calmpoint API — Route registry
// =============================================================================

import type { FastifyInstance } from 'fastify';
import { API_PREFIX } from '@calmpoint/shared';
import type { ChatArchiveStore, CrisisResourceCache, MoodLogStore } from '@calmpoint/db';
import type { TextGenerator } from '../services/llmClient.js';
import type { SessionTracker } from '../services/chat/sessionTracker.js';
import healthRoutes from './health.js';
import chatRoutes from './chat/index.js';
import moodRoutes from './mood/index.js';
import safetyRoutes from './safety/index.js';

export interface RouteDeps {
  tracker: SessionTracker;
  generator: TextGenerator;
  moodLogs: MoodLogStore;
  chatArchive: ChatArchiveStore;
  crisisCache: CrisisResourceCache;
  defaultCountry: string;
  checkDb: () => Promise<unknown>;
}

export async function registerRoutes(fastify: FastifyInstance, deps: RouteDeps): Promise<void> {
  // Health check — no prefix, no auth
  await fastify.register(healthRoutes, { checkDb: deps.checkDb });

  // Versioned API routes
  await fastify.register(
    async (api) => {
      await api.register(chatRoutes, {
        prefix: '/chat',
        tracker: deps.tracker,
        archive: deps.chatArchive,
        generator: deps.generator,
      });
      await api.register(moodRoutes, { prefix: '/mood', store: deps.moodLogs });
      await api.register(safetyRoutes, {
        prefix: '/safety',
        cache: deps.crisisCache,
        generator: deps.generator,
        defaultCountry: deps.defaultCountry,
      });
    },
    { prefix: API_PREFIX },
  );
}
