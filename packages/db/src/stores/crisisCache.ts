// =============================================================================
// Calmpoint — Postgres cache for AI-generated regional crisis resources
// =============================================================================

import { z } from 'zod';
import { CrisisContactSchema, type CrisisContact } from '@calmpoint/shared';
import type { Sql } from '../client.js';
import type { CrisisResourceCache } from './types.js';

const CachedResourcesSchema = z.array(CrisisContactSchema).min(1);

export class PgCrisisResourceCache implements CrisisResourceCache {
  constructor(private readonly sql: Sql) {}

  async get(countryKey: string): Promise<CrisisContact[] | null> {
    const [row] = await this.sql<{ resources: unknown }[]>`
      SELECT resources FROM crisis_resource_cache
      WHERE country_key = ${countryKey}
      LIMIT 1
    `;
    if (!row) return null;

    const parsed = CachedResourcesSchema.safeParse(row.resources);
    return parsed.success ? parsed.data : null;
  }

  async put(countryKey: string, country: string, resources: CrisisContact[]): Promise<void> {
    await this.sql`
      INSERT INTO crisis_resource_cache (country_key, country, resources)
      VALUES (${countryKey}, ${country}, ${JSON.stringify(resources)}::JSONB)
      ON CONFLICT (country_key) DO UPDATE
        SET resources  = EXCLUDED.resources,
            country    = EXCLUDED.country,
            created_at = NOW()
    `;
  }
}
