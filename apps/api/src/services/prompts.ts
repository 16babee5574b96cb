// =============================================================================
// Calmpoint API — Prompt templates for the generative-text collaborator
// =============================================================================

import { CHAT_LIMITS } from '@calmpoint/shared';

export const COMPANION_SYSTEM_PROMPT = `You are a supportive companion inside a mental-wellness app. You give people a calm, non-judgmental space to talk through stress and difficult feelings.

TONE
- Warm, patient and plain-spoken. No clinical jargon.
- Acknowledge the feeling first ("That sounds really heavy"), then offer gentle guidance.
- Keep replies to 2–4 sentences. End with an open question when it helps the person reflect.

BOUNDARIES
You are not a therapist, psychologist, psychiatrist or doctor. Never:
- name, suggest or imply a diagnosis or disorder
- recommend, name or dose any medication or treatment plan
- present yourself as giving clinical advice
You are a supportive peer. Encourage professional help when it seems warranted.

SAFETY
If the person mentions self-harm, suicide or being in danger, respond briefly and kindly, encourage them to contact a crisis line or a professional now, and remind them the app's crisis support section lists numbers they can call.`;

/** Render a dialogue as "Role: text" lines for summarization prompts. */
export function renderTranscript(turns: ReadonlyArray<{ role: string; content: string }>): string {
  return turns
    .map((t) => `${t.role === 'assistant' ? 'Companion' : 'User'}: ${t.content}`)
    .join('\n');
}

export function buildTitlePrompt(transcript: string): string {
  return `Read this conversation and write a short, descriptive title of 3 to 5 words.
Examples: "Struggling With Work Stress", "A Calmer Evening", "Worried About Exams".
Reply with the title only — no quotes, no punctuation at the end, at most ${CHAT_LIMITS.TITLE_MAX_CHARS} characters.

Conversation:
${transcript}

Title:`;
}

export function buildSummaryPrompt(transcript: string): string {
  return `Summarize this wellness conversation in one paragraph for the user's private journal. Cover:
- the main concerns the user shared
- how their feelings changed over the conversation
- any coping ideas or strategies that came up
- the overall tone at the end
Do not add diagnoses, medication advice or anything that was not said.

Conversation:
${transcript}

Summary:`;
}

export function buildRegionalResourcesPrompt(country: string): string {
  return `List verified crisis and mental-health support contacts for people in ${country}.

Respond with JSON only, in exactly this shape:
{
  "resources": [
    {
      "type": "emergency" | "crisis_hotline" | "online_resource",
      "name": "<organisation or service name>",
      "number": "<phone or SMS number; required for emergency and crisis_hotline, omit for online_resource>",
      "website": "<https URL; required for online_resource, optional otherwise>",
      "description": "<one sentence on what the service offers>",
      "availability": "<e.g. 24/7, or opening hours>"
    }
  ]
}

Rules:
- Include the national emergency number first.
- Include between 2 and 8 entries.
- Only include services you are confident exist. Never invent phone numbers.`;
}
