// =============================================================================
// Calmpoint API — Safety routes
//
// Public:
//   GET  /safety/resources           — static crisis contact catalog
//
// Authenticated:
//   GET  /safety/resources/regional  — generated, cached contacts for a country
// =============================================================================

import type { FastifyInstance } from 'fastify';
import { CountryQuerySchema, SAFETY_DISCLAIMER } from '@calmpoint/shared';
import type { CrisisResourceCache } from '@calmpoint/db';
import { NotFoundError } from '../../errors.js';
import type { TextGenerator } from '../../services/llmClient.js';
import { crisisCatalog } from '../../services/crisis/responseComposer.js';
import { lookupRegionalResources } from '../../services/crisis/regionalResources.js';

export interface SafetyRouteOptions {
  cache: CrisisResourceCache;
  generator: TextGenerator;
  defaultCountry: string;
}

export default async function safetyRoutes(fastify: FastifyInstance, opts: SafetyRouteOptions): Promise<void> {
  const auth = { preHandler: [fastify.authenticate] };

  // ── GET /safety/resources — Public ───────────────────────────────────────
  // No authentication needed so contacts stay reachable when a token expires.
  fastify.get('/resources', async (_request, reply) => {
    return reply.send({
      success: true,
      data: {
        resources: crisisCatalog(),
        disclaimer: SAFETY_DISCLAIMER,
      },
    });
  });

  // ── GET /safety/resources/regional?country= ──────────────────────────────
  fastify.get('/resources/regional', auth, async (request, reply) => {
    const query = CountryQuerySchema.parse(request.query);
    const country = query.country || opts.defaultCountry;

    const result = await lookupRegionalResources(country, {
      cache: opts.cache,
      generator: opts.generator,
      log: request.log,
    });
    if (!result) {
      throw new NotFoundError(`Could not find crisis resources for ${country}`);
    }

    return reply.send({ success: true, data: result });
  });
}
