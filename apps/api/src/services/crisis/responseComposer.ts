// =============================================================================
// Calmpoint API — Crisis response composer
//
// Fixed, human-reviewed wording for the two-step crisis flow:
//   1. composeCrisisReply(category) + composeConfirmationPrompt()
//   2. composeResourceRevealReply(intent) + the full static contact catalog
// Nothing here is generated.
// =============================================================================

import { CRISIS_CONTACTS, type ConfirmationIntent, type CrisisContact, type RiskCategory } from '@calmpoint/shared';

const CRISIS_REPLIES: Readonly<Record<RiskCategory, string>> = {
  suicide:
    "I'm really sorry you're feeling this much pain, and I'm glad you told me. Your life matters, and you don't have to carry this alone. Talking to a trained crisis counselor right now can make a real difference.",
  self_harm:
    "Thank you for trusting me with something this hard. Wanting to hurt yourself is a sign of how much you're going through, and you deserve support and care right now. A crisis counselor can help you get through this moment safely.",
  general:
    "It sounds like things feel overwhelming right now, and I'm glad you reached out. You don't have to work through this on your own. Talking with someone trained to help can make this moment a little lighter.",
};

const CONFIRMATION_PROMPT =
  'Would you like me to share crisis support contacts you can reach right now? Just reply yes or no.';

const REVEAL_AFFIRMATIVE =
  "Here are people you can reach right now. They're trained, caring, and available to talk. If you're in immediate danger, please call your local emergency number. I'm still here with you too.";

const REVEAL_DECLINED =
  "That's okay, there's no pressure. I'll leave these contacts here in case you want them later. If things get harder, please reach out to one of them or your local emergency number. I'm still here to listen.";

export function composeCrisisReply(category: RiskCategory | string): string {
  switch (category) {
    case 'suicide':
      return CRISIS_REPLIES.suicide;
    case 'self_harm':
      return CRISIS_REPLIES.self_harm;
    default:
      return CRISIS_REPLIES.general;
  }
}

export function composeConfirmationPrompt(): string {
  return CONFIRMATION_PROMPT;
}

export interface ResourceReveal {
  text: string;
  resources: CrisisContact[];
}

/** Negative and unclear replies share the gentler framing; both get the catalog. */
export function composeResourceRevealReply(intent: ConfirmationIntent): ResourceReveal {
  return {
    text: intent === 'affirmative' ? REVEAL_AFFIRMATIVE : REVEAL_DECLINED,
    resources: crisisCatalog(),
  };
}

/** Full static catalog, ordered by priority. Returns a fresh copy. */
export function crisisCatalog(): CrisisContact[] {
  return [...CRISIS_CONTACTS].sort((a, b) => a.priority - b.priority);
}
