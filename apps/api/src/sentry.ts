// =============================================================================
// Calmpoint API — Sentry initialisation
// Call initSentry() before building the app in server.ts.
//
// • Only active when SENTRY_DSN is set (skipped in dev/test).
// • Chat text and quiz notes never leave the process: request bodies and
//   auth headers are scrubbed before events are sent.
// =============================================================================

import * as Sentry from '@sentry/node';
import { config } from './config.js';

// Fields whose values must never appear in Sentry events
const SCRUB_KEYS = new Set([
  'authorization', 'cookie', 'message', 'content', 'additional_notes',
  'summary', 'transcript', 'user_message', 'ai_response',
]);

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function scrubObject(obj: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(obj)) {
    if (SCRUB_KEYS.has(k.toLowerCase())) {
      out[k] = '[Filtered]';
    } else if (isRecord(v)) {
      out[k] = scrubObject(v);
    } else {
      out[k] = v;
    }
  }
  return out;
}

function scrubHeaders(headers: Record<string, string>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(headers)) {
    out[k] = SCRUB_KEYS.has(k.toLowerCase()) ? '[Filtered]' : v;
  }
  return out;
}

export function initSentry(): void {
  if (!config.sentryDsn) return;

  const sentryRelease = process.env['SENTRY_RELEASE'];
  Sentry.init({
    dsn: config.sentryDsn,
    environment: config.nodeEnv,
    ...(sentryRelease ? { release: sentryRelease } : {}),
    tracesSampleRate: config.isProd ? 0.1 : 1.0,

    beforeSend(event) {
      if (event.request?.headers) {
        event.request.headers = scrubHeaders(event.request.headers);
      }
      if (event.request?.data) {
        event.request.data = '[Filtered]';
      }
      return event;
    },
  });
}

/** Capture an exception with an optional extra context map. */
export function captureException(
  err: unknown,
  context?: Record<string, unknown>,
): void {
  if (!config.sentryDsn) return;
  Sentry.withScope((scope) => {
    if (context) scope.setContext('context', scrubObject(context));
    Sentry.captureException(err);
  });
}
