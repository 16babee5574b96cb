import { describe, expect, it } from 'vitest';
import { CRISIS_CONTACTS } from '@calmpoint/shared';
import {
  composeConfirmationPrompt,
  composeCrisisReply,
  composeResourceRevealReply,
  crisisCatalog,
} from './responseComposer.js';

describe('composeCrisisReply', () => {
  it('has a distinct template per category', () => {
    const replies = new Set([
      composeCrisisReply('suicide'),
      composeCrisisReply('self_harm'),
      composeCrisisReply('general'),
    ]);
    expect(replies.size).toBe(3);
  });

  it('falls back to the general template', () => {
    expect(composeCrisisReply('unknown')).toBe(composeCrisisReply('general'));
  });
});

describe('composeConfirmationPrompt', () => {
  it('asks a yes/no question', () => {
    expect(composeConfirmationPrompt()).toMatch(/yes or no/);
  });
});

describe('composeResourceRevealReply', () => {
  it('always attaches the full catalog in priority order', () => {
    for (const intent of ['affirmative', 'negative', 'unclear'] as const) {
      const reveal = composeResourceRevealReply(intent);
      expect(reveal.resources.map((c) => c.priority)).toEqual([1, 2, 3, 4, 5, 6]);
      expect(reveal.resources).toHaveLength(CRISIS_CONTACTS.length);
    }
  });

  it('frames declined and unclear replies the same way', () => {
    expect(composeResourceRevealReply('negative').text).toBe(composeResourceRevealReply('unclear').text);
    expect(composeResourceRevealReply('affirmative').text).not.toBe(composeResourceRevealReply('negative').text);
  });
});

describe('crisisCatalog', () => {
  it('returns a copy', () => {
    const catalog = crisisCatalog();
    catalog.pop();
    expect(crisisCatalog()).toHaveLength(6);
  });

  it('carries only the fields of each contact variant', () => {
    const online = crisisCatalog().find((c) => c.type === 'online_resource');
    expect(online).toBeDefined();
    expect(online && 'number' in online).toBe(false);
  });
});
