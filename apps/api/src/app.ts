// =============================================================================
// Calmpoint API — Fastify application factory
// Separated from server.ts to enable testing without starting a server.
// Storage and the text generator are injected so tests can swap in
// in-memory stand-ins.
// =============================================================================

import Fastify from 'fastify';
import fastifyCors from '@fastify/cors';
import fastifyHelmet from '@fastify/helmet';
import fastifyRateLimit from '@fastify/rate-limit';
import type { ChatArchiveStore, CrisisResourceCache, MoodLogStore } from '@calmpoint/db';
import { config } from './config.js';
import authPlugin from './plugins/auth.js';
import errorHandlerPlugin from './plugins/error-handler.js';
import { registerRoutes } from './routes/index.js';
import type { TextGenerator } from './services/llmClient.js';
import { InMemorySessionStore, type SessionStore } from './services/chat/sessionStore.js';
import { SessionTracker } from './services/chat/sessionTracker.js';

export interface AppDeps {
  moodLogs: MoodLogStore;
  chatArchive: ChatArchiveStore;
  crisisCache: CrisisResourceCache;
  generator: TextGenerator;
  /** Resolves when the datastore answers; used by GET /health. */
  checkDb: () => Promise<unknown>;
  sessions?: SessionStore;
  now?: () => Date;
}

const SWEEP_INTERVAL_MS = 60_000;

export async function buildApp(deps: AppDeps) {
  const fastify = Fastify({
    logger: {
      level: config.isTest ? 'silent' : config.isDev ? 'debug' : 'info',
      // Pino pretty-print in development
      ...(config.isDev
        ? {
            transport: {
              target: 'pino-pretty',
              options: { colorize: true, translateTime: 'SYS:HH:MM:ss' },
            },
          }
        : {
            // Production: chat text and quiz notes never reach the logs
            redact: {
              paths: [
                'req.headers.authorization',
                'req.headers.cookie',
                'req.body.message',
                'req.body.additional_notes',
              ],
              censor: '[Redacted]',
            },
          }),
    },
    // Trust X-Forwarded-For in production (behind load balancer)
    trustProxy: config.isProd,
  });

  // ------------------------------------------------------------------
  // Security headers
  // ------------------------------------------------------------------
  await fastify.register(fastifyHelmet, {
    hsts: config.isProd
      ? { maxAge: 31536000, includeSubDomains: true, preload: true }
      : false,
    noSniff: true,
    frameguard: { action: 'deny' },
    hidePoweredBy: true,
    contentSecurityPolicy: false, // JSON API only
    referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
  });

  await fastify.register(fastifyCors, {
    origin: config.corsOrigin,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
    credentials: true,
  });

  // ------------------------------------------------------------------
  // Global rate limiting
  // ------------------------------------------------------------------
  await fastify.register(fastifyRateLimit, {
    global: true,
    max: 200,
    timeWindow: '1 minute',
    // Thrown into the error handler, which wraps it in the standard envelope
    errorResponseBuilder: (_request, context) => ({
      statusCode: 429,
      message: `Too many requests. Retry after ${String(context.after)}.`,
    }),
  });

  // ------------------------------------------------------------------
  // Plugins
  // ------------------------------------------------------------------
  await fastify.register(errorHandlerPlugin);
  await fastify.register(authPlugin, { secret: config.jwtSecret });

  // ------------------------------------------------------------------
  // Chat sessions — in memory, one table per app instance
  // ------------------------------------------------------------------
  const tracker = new SessionTracker({
    store: deps.sessions ?? new InMemorySessionStore(),
    generator: deps.generator,
    log: fastify.log.child({ component: 'chat-sessions' }),
    idleTimeoutMs: config.chatSessionIdleMinutes * 60_000,
    ...(deps.now ? { now: deps.now } : {}),
  });

  const sweepTimer = setInterval(() => tracker.sweepIdle(), SWEEP_INTERVAL_MS);
  sweepTimer.unref();
  fastify.addHook('onClose', async () => {
    clearInterval(sweepTimer);
  });

  // ------------------------------------------------------------------
  // Routes
  // ------------------------------------------------------------------
  await registerRoutes(fastify, {
    tracker,
    generator: deps.generator,
    moodLogs: deps.moodLogs,
    chatArchive: deps.chatArchive,
    crisisCache: deps.crisisCache,
    defaultCountry: config.crisisDefaultCountry,
    checkDb: deps.checkDb,
  });

  return fastify;
}
