// =============================================================================
// Calmpoint API — Generative dialogue handle
// One per chat session. Holds the companion system prompt and the turns the
// model has seen; a turn is only recorded once it was actually shown.
// =============================================================================

import type { ChatTurn } from '@calmpoint/shared';
import type { TextGenerator } from '../llmClient.js';
import { COMPANION_SYSTEM_PROMPT } from '../prompts.js';

// Turns kept per session; older ones are dropped as new ones arrive
export const MAX_HISTORY_TURNS = 40;

export class Dialogue {
  private readonly turns: ChatTurn[] = [];

  constructor(
    private readonly generator: TextGenerator,
    private readonly systemPrompt: string = COMPANION_SYSTEM_PROMPT,
  ) {}

  /** Ask for the next assistant reply. Does not touch history. */
  async reply(userText: string): Promise<string> {
    const messages: ChatTurn[] = [
      ...this.turns,
      { role: 'user', content: userText },
    ];
    const result = await this.generator.generateChat(this.systemPrompt, messages);
    return result.text;
  }

  record(userText: string, assistantText: string): void {
    this.turns.push({ role: 'user', content: userText }, { role: 'assistant', content: assistantText });
    if (this.turns.length > MAX_HISTORY_TURNS) {
      this.turns.splice(0, this.turns.length - MAX_HISTORY_TURNS);
    }
  }

  get history(): readonly ChatTurn[] {
    return this.turns;
  }
}
