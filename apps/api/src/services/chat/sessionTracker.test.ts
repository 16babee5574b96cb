import { beforeEach, describe, expect, it } from 'vitest';
import { SessionStateError } from '../../errors.js';
import { ScriptedGenerator, silentLogger } from '../../testing/index.js';
import { COMPANION_SYSTEM_PROMPT } from '../prompts.js';
import {
  composeConfirmationPrompt,
  composeCrisisReply,
  composeResourceRevealReply,
} from '../crisis/responseComposer.js';
import {
  DIAGNOSTIC_BOUNDARY_REPLY,
  GENERIC_FALLBACK_REPLY,
  UNAVAILABLE_FALLBACK_REPLY,
} from '../crisis/responseValidator.js';
import { InMemorySessionStore } from './sessionStore.js';
import { SessionTracker } from './sessionTracker.js';

const USER = 'user-1';
const OTHER_USER = 'user-2';
const HOUR_MS = 60 * 60_000;

let store: InMemorySessionStore;
let generator: ScriptedGenerator;
let tracker: SessionTracker;
let clock: Date;

function advance(ms: number): void {
  clock = new Date(clock.getTime() + ms);
}

beforeEach(() => {
  store = new InMemorySessionStore();
  generator = new ScriptedGenerator();
  clock = new Date('2026-03-02T09:00:00.000Z');
  let seq = 0;
  tracker = new SessionTracker({
    store,
    generator,
    log: silentLogger,
    idleTimeoutMs: HOUR_MS,
    now: () => clock,
    newId: () => `session-${++seq}`,
  });
});

describe('SessionTracker — normal conversation', () => {
  it('creates a session when no id is given', async () => {
    generator.enqueue('That sounds draining. What happened?');

    const reply = await tracker.handleMessage(USER, null, 'I had a long day');

    expect(reply).toEqual({
      session_id: 'session-1',
      user_message: { content: 'I had a long day', timestamp: '2026-03-02T09:00:00.000Z', role: 'user' },
      ai_response: {
        content: 'That sounds draining. What happened?',
        timestamp: '2026-03-02T09:00:00.000Z',
        role: 'assistant',
      },
    });
    expect(store.size).toBe(1);
    expect(store.get('session-1')?.crisis).toEqual({ status: 'not_offered' });
    expect(generator.chatCalls[0]).toEqual({
      systemPrompt: COMPANION_SYSTEM_PROMPT,
      messages: [{ role: 'user', content: 'I had a long day' }],
    });
  });

  it('sends prior turns with each new message', async () => {
    generator.enqueue('First reply.', 'Second reply.');
    const { session_id } = await tracker.handleMessage(USER, null, 'hello');
    await tracker.handleMessage(USER, session_id, 'still here');

    expect(generator.chatCalls[1]?.messages).toEqual([
      { role: 'user', content: 'hello' },
      { role: 'assistant', content: 'First reply.' },
      { role: 'user', content: 'still here' },
    ]);
    expect(store.get(session_id)?.transcript).toHaveLength(4);
  });

  it('replaces unsafe generated text and records the replacement', async () => {
    generator.enqueue('You might be dealing with a panic disorder.');
    const { session_id, ai_response } = await tracker.handleMessage(USER, null, 'my heart races at night');

    expect(ai_response.content).toBe(DIAGNOSTIC_BOUNDARY_REPLY);
    expect(store.get(session_id)?.dialogue.history[1]).toEqual({
      role: 'assistant',
      content: DIAGNOSTIC_BOUNDARY_REPLY,
    });
  });

  it('substitutes the generic fallback for an empty reply', async () => {
    generator.enqueue('   ');
    const reply = await tracker.handleMessage(USER, null, 'hi');
    expect(reply.ai_response.content).toBe(GENERIC_FALLBACK_REPLY);
  });

  it('recovers from a generator failure without touching history', async () => {
    generator.enqueue(new Error('timeout'), 'Back again.');
    const { session_id, ai_response } = await tracker.handleMessage(USER, null, 'are you there?');

    expect(ai_response.content).toBe(UNAVAILABLE_FALLBACK_REPLY);
    expect(store.get(session_id)?.dialogue.history).toEqual([]);

    await tracker.handleMessage(USER, session_id, 'trying again');
    expect(generator.chatCalls[1]?.messages).toEqual([{ role: 'user', content: 'trying again' }]);
  });

  it('serializes concurrent messages for one session', async () => {
    generator.enqueue('one', 'two', 'three');
    const { session_id } = await tracker.handleMessage(USER, null, 'start');

    await Promise.all([
      tracker.handleMessage(USER, session_id, 'a'),
      tracker.handleMessage(USER, session_id, 'b'),
    ]);

    expect(generator.chatCalls[2]?.messages).toEqual([
      { role: 'user', content: 'start' },
      { role: 'assistant', content: 'one' },
      { role: 'user', content: 'a' },
      { role: 'assistant', content: 'two' },
      { role: 'user', content: 'b' },
    ]);
    expect(store.get(session_id)?.transcript).toHaveLength(6);
  });
});

describe('SessionTracker — crisis handshake', () => {
  it('interrupts with a crisis reply and asks for confirmation', async () => {
    const reply = await tracker.handleMessage(USER, null, 'I want to end my life');

    expect(reply.crisis_detected).toBe(true);
    expect(reply.crisis_category).toBe('suicide');
    expect(reply.confirmation_required).toBe(true);
    expect(reply.show_resources).toBeUndefined();
    expect(reply.ai_response.content).toBe(`${composeCrisisReply('suicide')}\n\n${composeConfirmationPrompt()}`);
    expect(generator.chatCalls).toHaveLength(0);
    expect(store.get(reply.session_id)?.crisis).toEqual({
      status: 'offered_pending_confirmation',
      category: 'suicide',
      offered_at: '2026-03-02T09:00:00.000Z',
    });
  });

  it('reveals the catalog on an affirmative reply', async () => {
    const { session_id } = await tracker.handleMessage(USER, null, 'I keep hurting myself');
    advance(30_000);
    const reply = await tracker.handleMessage(USER, session_id, 'yes please');

    expect(reply.show_resources).toBe(true);
    expect(reply.crisis_resources?.map((c) => c.id)).toEqual([
      'us_emergency',
      'us_988_lifeline',
      'us_crisis_text_line',
      'in_emergency',
      'in_tele_manas',
      'intl_find_a_helpline',
    ]);
    expect(reply.ai_response.content).toBe(composeResourceRevealReply('affirmative').text);
    expect(store.get(session_id)?.crisis).toEqual({
      status: 'resolved',
      intent: 'affirmative',
      resolved_at: '2026-03-02T09:00:30.000Z',
    });
  });

  it('classifies the pending reply even when it contains risk words', async () => {
    const { session_id } = await tracker.handleMessage(USER, null, 'everything feels hopeless');
    const reply = await tracker.handleMessage(USER, session_id, 'no, I just want to die');

    expect(reply.crisis_detected).toBeUndefined();
    expect(reply.show_resources).toBe(true);
    expect(reply.ai_response.content).toBe(composeResourceRevealReply('negative').text);
  });

  it('can offer again after the handshake resolves', async () => {
    const { session_id } = await tracker.handleMessage(USER, null, 'I feel worthless');
    await tracker.handleMessage(USER, session_id, 'hmm');
    expect(store.get(session_id)?.crisis).toMatchObject({ status: 'resolved', intent: 'unclear' });

    const reply = await tracker.handleMessage(USER, session_id, 'I feel worthless again');
    expect(reply.crisis_category).toBe('general');
    expect(store.get(session_id)?.crisis.status).toBe('offered_pending_confirmation');
  });

  it('offers resources once when risk messages arrive together', async () => {
    generator.enqueue('Hi, I am here.');
    const { session_id } = await tracker.handleMessage(USER, null, 'hello');

    const [first, second] = await Promise.all([
      tracker.handleMessage(USER, session_id, 'I want to die'),
      tracker.handleMessage(USER, session_id, 'I want to end my life'),
    ]);

    expect(first.crisis_detected).toBe(true);
    expect(first.confirmation_required).toBe(true);
    expect(first.show_resources).toBeUndefined();
    expect(second.crisis_detected).toBeUndefined();
    expect(second.confirmation_required).toBeUndefined();
    expect(second.show_resources).toBe(true);
    expect(store.get(session_id)?.crisis).toMatchObject({ status: 'resolved', intent: 'unclear' });
    expect(generator.chatCalls).toHaveLength(1);
  });

  it('keeps crisis turns out of the generated dialogue', async () => {
    generator.enqueue('Glad you are still talking to me.');
    const { session_id } = await tracker.handleMessage(USER, null, 'I want to die');
    await tracker.handleMessage(USER, session_id, 'ok');
    await tracker.handleMessage(USER, session_id, 'thanks for listening');

    expect(generator.chatCalls).toHaveLength(1);
    expect(generator.chatCalls[0]?.messages).toEqual([{ role: 'user', content: 'thanks for listening' }]);
    expect(store.get(session_id)?.transcript).toHaveLength(6);
  });
});

describe('SessionTracker — session lifecycle', () => {
  it('rejects unknown session ids', async () => {
    await expect(tracker.handleMessage(USER, 'missing', 'hello')).rejects.toBeInstanceOf(SessionStateError);
  });

  it("treats another user's session as expired", async () => {
    const { session_id } = await tracker.handleMessage(USER, null, 'hello');
    await expect(tracker.handleMessage(OTHER_USER, session_id, 'hi')).rejects.toBeInstanceOf(SessionStateError);
  });

  it('ends a session exactly once', async () => {
    const { session_id } = await tracker.handleMessage(USER, null, 'hello');

    await expect(tracker.endSession(OTHER_USER, session_id)).resolves.toBe(0);
    await expect(tracker.endSession(USER, session_id)).resolves.toBe(1);
    await expect(tracker.endSession(USER, session_id)).resolves.toBe(0);
    await expect(tracker.handleMessage(USER, session_id, 'back')).rejects.toBeInstanceOf(SessionStateError);
  });

  it('sweeps sessions idle past the timeout', async () => {
    const { session_id: stale } = await tracker.handleMessage(USER, null, 'hello');
    advance(HOUR_MS - 1_000);
    const { session_id: fresh } = await tracker.handleMessage(USER, null, 'hi there');
    advance(2_000);

    expect(tracker.sweepIdle()).toBe(1);
    expect(store.get(fresh)).toBeDefined();
    await expect(tracker.handleMessage(USER, stale, 'still there?')).rejects.toBeInstanceOf(SessionStateError);
  });
});
