import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SAFETY_DISCLAIMER } from '@calmpoint/shared';
import { UpstreamGenerationError } from '../../errors.js';
import { buildTestApp, type TestApp } from '../../testing/app.js';

const URL_RESOURCES = '/api/v1/safety/resources';
const URL_REGIONAL = '/api/v1/safety/resources/regional';

const GENERATED = JSON.stringify({
  resources: [
    {
      type: 'emergency',
      name: 'Emergency Line',
      number: '133',
      description: 'Police emergency number.',
      availability: '24/7',
    },
  ],
});

let t: TestApp;

beforeEach(async () => {
  t = await buildTestApp();
});

afterEach(async () => {
  await t.app.close();
});

function regional(query: Record<string, string> = {}) {
  return t.app.inject({
    method: 'GET',
    url: URL_REGIONAL,
    headers: { authorization: t.bearer('user-1') },
    query,
  });
}

describe('GET /safety/resources', () => {
  it('is public and returns the static catalog', async () => {
    const res = await t.app.inject({ method: 'GET', url: URL_RESOURCES });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.data.disclaimer).toBe(SAFETY_DISCLAIMER);
    expect(body.data.resources).toHaveLength(6);
    expect(body.data.resources[0]).toMatchObject({ id: 'us_emergency', type: 'emergency', number: '911' });
  });
});

describe('GET /safety/resources/regional', () => {
  it('requires authentication', async () => {
    const res = await t.app.inject({ method: 'GET', url: URL_REGIONAL, query: { country: 'Chile' } });
    expect(res.statusCode).toBe(401);
  });

  it('generates on a miss and serves the cache afterwards', async () => {
    t.generator.enqueue(GENERATED);

    const first = await regional({ country: 'Chile' });
    expect(first.statusCode).toBe(200);
    expect(first.json().data).toMatchObject({
      country: 'Chile',
      source: 'generated',
      cached: false,
      ai_generated: true,
    });
    expect(first.json().data.resources[0]).toMatchObject({
      id: 'chile_1_emergency_line',
      number: '133',
      priority: 1,
      country: 'Chile',
    });

    const second = await regional({ country: ' chile ' });
    expect(second.json().data).toMatchObject({ source: 'cache', cached: true, ai_generated: true });
    expect(t.generator.completionCalls).toHaveLength(1);
  });

  it('defaults to India when no country is given', async () => {
    t.generator.enqueue(GENERATED);
    const res = await regional();
    expect(res.json().data.country).toBe('India');
    expect(t.generator.completionCalls[0]?.prompt).toContain('for people in India.');
  });

  it('answers 404 when nothing usable comes back', async () => {
    t.generator.enqueue('I am not able to list services.');
    const res = await regional({ country: 'Chile' });
    expect(res.statusCode).toBe(404);
    expect(res.json().error).toEqual({ code: 'NOT_FOUND', message: 'Could not find crisis resources for Chile' });
  });

  it('answers 502 when generation fails', async () => {
    t.generator.enqueue(new UpstreamGenerationError('Generation timed out after 20000ms'));
    const res = await regional({ country: 'Chile' });
    expect(res.statusCode).toBe(502);
    expect(res.json().error.code).toBe('GENERATION_FAILED');
  });
});
