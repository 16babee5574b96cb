// =============================================================================
// Calmpoint API — Regional crisis-resource lookup
//
// Cache-aside by normalized country key. On a miss the generative
// collaborator is asked for a JSON list; only entries that pass the shape
// check are kept, stamped with ids, priority and the country, and cached.
// Everything returned from here is labelled ai_generated.
// =============================================================================

import type { FastifyBaseLogger } from 'fastify';
import { z } from 'zod';
import type { CrisisContact } from '@calmpoint/shared';
import type { CrisisResourceCache } from '@calmpoint/db';
import { buildRegionalResourcesPrompt } from '../prompts.js';
import type { TextGenerator } from '../llmClient.js';
import { captureException } from '../../sentry.js';

const MAX_RESOURCES = 8;

const GeneratedEntrySchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('emergency'),
    name: z.string().trim().min(1).max(200),
    number: z.string().trim().min(1).max(40),
    description: z.string().trim().min(1).max(500),
    availability: z.string().trim().min(1).max(100),
  }),
  z.object({
    type: z.literal('crisis_hotline'),
    name: z.string().trim().min(1).max(200),
    number: z.string().trim().min(1).max(40),
    website: z.string().url().optional(),
    description: z.string().trim().min(1).max(500),
    availability: z.string().trim().min(1).max(100),
  }),
  z.object({
    type: z.literal('online_resource'),
    name: z.string().trim().min(1).max(200),
    website: z.string().url(),
    description: z.string().trim().min(1).max(500),
    availability: z.string().trim().min(1).max(100),
  }),
]);
type GeneratedEntry = z.infer<typeof GeneratedEntrySchema>;

const GeneratedPayloadSchema = z.object({ resources: z.array(z.unknown()) });

export interface RegionalResources {
  country: string;
  resources: CrisisContact[];
  source: 'cache' | 'generated';
  cached: boolean;
  ai_generated: true;
}

export interface RegionalLookupDeps {
  cache: CrisisResourceCache;
  generator: TextGenerator;
  log: FastifyBaseLogger;
}

/** "  United   States " → "united states" */
export function normalizeCountryKey(country: string): string {
  return country.trim().replace(/\s+/g, ' ').toLowerCase();
}

function slug(s: string): string {
  return s
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

/** Pull the first {...} block out of a reply that may carry prose or fences. */
export function extractJsonObject(text: string): unknown {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) return null;
  try {
    return JSON.parse(text.slice(start, end + 1));
  } catch {
    return null;
  }
}

function toContact(entry: GeneratedEntry, country: string, index: number): CrisisContact {
  const id = `${slug(country)}_${index + 1}_${slug(entry.name)}`.slice(0, 100);
  return { ...entry, id, country, priority: index + 1 };
}

/**
 * Parse generated output into contacts. Invalid entries are dropped; the
 * result is empty when nothing usable came back.
 */
export function parseGeneratedResources(text: string, country: string): CrisisContact[] {
  const payload = GeneratedPayloadSchema.safeParse(extractJsonObject(text));
  if (!payload.success) return [];

  const entries: GeneratedEntry[] = [];
  for (const raw of payload.data.resources) {
    const parsed = GeneratedEntrySchema.safeParse(raw);
    if (parsed.success) entries.push(parsed.data);
    if (entries.length === MAX_RESOURCES) break;
  }
  return entries.map((entry, i) => toContact(entry, country, i));
}

/**
 * Resolves to null when the country is blank after trimming, or when
 * generation produced nothing usable. Generation failures propagate as
 * UpstreamGenerationError.
 */
export async function lookupRegionalResources(
  rawCountry: string,
  deps: RegionalLookupDeps,
): Promise<RegionalResources | null> {
  const country = rawCountry.trim().replace(/\s+/g, ' ');
  if (!country) return null;
  const key = normalizeCountryKey(country);

  const cached = await deps.cache.get(key);
  if (cached && cached.length > 0) {
    return { country, resources: cached, source: 'cache', cached: true, ai_generated: true };
  }

  const result = await deps.generator.generateCompletion(buildRegionalResourcesPrompt(country), {
    maxTokens: 1500,
    temperature: 0.2,
    jsonMode: true,
  });

  const resources = parseGeneratedResources(result.text, country);
  if (resources.length === 0) {
    deps.log.warn({ countryKey: key, provider: result.provider }, 'Regional lookup produced no usable resources');
    return null;
  }

  try {
    await deps.cache.put(key, country, resources);
  } catch (err) {
    // Served uncached; the next request retries the write
    deps.log.warn({ err, countryKey: key }, 'Failed to cache regional crisis resources');
    captureException(err, { countryKey: key });
  }

  return { country, resources, source: 'generated', cached: false, ai_generated: true };
}
