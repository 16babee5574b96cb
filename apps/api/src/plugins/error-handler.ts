// =============================================================================
// Calmpoint API — Global error handler plugin
// Every failure leaves as { success: false, error: { code, message, details? } }.
// =============================================================================

import type { FastifyInstance, FastifyError } from 'fastify';
import fp from 'fastify-plugin';
import { ZodError } from 'zod';
import { AppError } from '../errors.js';
import { captureException } from '../sentry.js';

async function errorHandlerPlugin(fastify: FastifyInstance): Promise<void> {
  fastify.setErrorHandler((error: FastifyError | ZodError | AppError | Error, request, reply) => {
    const log = request.log;

    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        log.error({ err: error, code: error.code }, 'Request failed');
        captureException(error, { method: request.method, url: request.url, code: error.code });
      }
      return reply.status(error.statusCode).send({
        success: false,
        error: {
          code: error.code,
          message: error.message,
          ...(error.details ? { details: error.details } : {}),
        },
      });
    }

    // Zod validation errors → 400, field named by the first issue
    if (error instanceof ZodError) {
      const [first] = error.issues;
      return reply.status(400).send({
        success: false,
        error: {
          code: 'VALIDATION_ERROR',
          message: first?.message ?? 'Request validation failed',
          details: {
            ...(first && first.path.length > 0 ? { field: first.path.join('.') } : {}),
            ...error.flatten(),
          },
        },
      });
    }

    // Fastify validation errors (e.g. malformed JSON body) → 400
    if ('validation' in error && error.validation) {
      return reply.status(400).send({
        success: false,
        error: {
          code: 'BAD_REQUEST',
          message: error.message,
          details: error.validation,
        },
      });
    }

    // Known HTTP errors (statusCode set by Fastify)
    const statusCode = 'statusCode' in error && error.statusCode ? error.statusCode : 500;
    if (statusCode < 500) {
      return reply.status(statusCode).send({
        success: false,
        error: {
          code: statusCode === 429 ? 'RATE_LIMITED' : 'CLIENT_ERROR',
          message: error.message,
        },
      });
    }

    // Unexpected server errors — log + send to Sentry, return generic message
    log.error({ err: error, req: { method: request.method, url: request.url } }, 'Unhandled error');
    captureException(error, { method: request.method, url: request.url });

    return reply.status(500).send({
      success: false,
      error: {
        code: 'INTERNAL_SERVER_ERROR',
        message: 'An unexpected error occurred',
      },
    });
  });

  fastify.setNotFoundHandler((request, reply) =>
    reply.status(404).send({
      success: false,
      error: { code: 'NOT_FOUND', message: `Route ${request.method} ${request.url} not found` },
    }),
  );
}

export default fp(errorHandlerPlugin, { name: 'error-handler' });
