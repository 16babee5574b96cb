// =============================================================================
// Calmpoint API — Provider-agnostic LLM client
//
// Dispatches to Anthropic (cloud) or Ollama (local) based on AI_PROVIDER.
// Ollama uses the OpenAI-compatible API at /v1.
//
// Generated text is untrusted: callers run it through responseValidator
// before it reaches a user. Every call is bounded by a timeout.
// =============================================================================

import type { ChatTurn } from '@calmpoint/shared';
import { UpstreamGenerationError } from '../errors.js';

export interface LlmResult {
  text:         string;
  inputTokens:  number;
  outputTokens: number;
  modelId:      string;
  provider:     'anthropic' | 'ollama';
}

export interface CompletionOptions {
  maxTokens?:   number;
  temperature?: number;
  jsonMode?:    boolean;
}

/** The generative-text collaborator. */
export interface TextGenerator {
  generateCompletion(prompt: string, options?: CompletionOptions): Promise<LlmResult>;
  generateChat(systemPrompt: string, messages: ChatTurn[], options?: CompletionOptions): Promise<LlmResult>;
}

export interface LlmClientConfig {
  aiProvider:      'anthropic' | 'ollama';
  anthropicApiKey: string;
  anthropicModel:  string;
  ollamaBaseUrl:   string;
  ollamaModel:     string;
  llmTimeoutMs:    number;
}

/**
 * Reject with UpstreamGenerationError if `work` has not settled after `ms`.
 * The abort signal is handed to the SDK so the HTTP request is cancelled too.
 */
export async function withTimeout<T>(
  ms: number,
  work: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new UpstreamGenerationError(`Generation timed out after ${ms}ms`));
    }, ms);
  });

  try {
    return await Promise.race([work(controller.signal), timeout]);
  } catch (err) {
    if (err instanceof UpstreamGenerationError) throw err;
    throw new UpstreamGenerationError('Generation request failed', { cause: err });
  } finally {
    clearTimeout(timer);
  }
}

export class LlmClient implements TextGenerator {
  constructor(private readonly cfg: LlmClientConfig) {}

  /**
   * Send a single prompt to the configured provider and return the completion.
   */
  async generateCompletion(prompt: string, options: CompletionOptions = {}): Promise<LlmResult> {
    const { maxTokens = 1024, temperature = 0.3, jsonMode = false } = options;

    return withTimeout(this.cfg.llmTimeoutMs, (signal) =>
      this.cfg.aiProvider === 'ollama'
        ? this.runOllama(null, [{ role: 'user', content: prompt }], maxTokens, temperature, jsonMode, signal)
        : this.runAnthropic(null, [{ role: 'user', content: prompt }], maxTokens, temperature, signal),
    );
  }

  /**
   * Send a multi-turn conversation with a system prompt.
   */
  async generateChat(
    systemPrompt: string,
    messages:     ChatTurn[],
    options:      CompletionOptions = {},
  ): Promise<LlmResult> {
    const { maxTokens = 512, temperature = 0.7 } = options;

    return withTimeout(this.cfg.llmTimeoutMs, (signal) =>
      this.cfg.aiProvider === 'ollama'
        ? this.runOllama(systemPrompt, messages, maxTokens, temperature, false, signal)
        : this.runAnthropic(systemPrompt, messages, maxTokens, temperature, signal),
    );
  }

  // ---------------------------------------------------------------------------
  // Anthropic path
  // ---------------------------------------------------------------------------

  private async runAnthropic(
    systemPrompt: string | null,
    messages:     ChatTurn[],
    maxTokens:    number,
    temperature:  number,
    signal:       AbortSignal,
  ): Promise<LlmResult> {
    const { default: Anthropic } = await import('@anthropic-ai/sdk');
    const client = new Anthropic({ apiKey: this.cfg.anthropicApiKey, maxRetries: 0 });

    const message = await client.messages.create(
      {
        model:       this.cfg.anthropicModel,
        max_tokens:  maxTokens,
        temperature,
        ...(systemPrompt ? { system: systemPrompt } : {}),
        messages:    messages.map((m) => ({ role: m.role, content: m.content })),
      },
      { signal },
    );

    const first = message.content[0];
    const text = first?.type === 'text' ? first.text : '';

    return {
      text,
      inputTokens:  message.usage.input_tokens,
      outputTokens: message.usage.output_tokens,
      modelId:      this.cfg.anthropicModel,
      provider:     'anthropic',
    };
  }

  // ---------------------------------------------------------------------------
  // Ollama path (OpenAI-compatible /v1 endpoint, system prompt as first message)
  // ---------------------------------------------------------------------------

  private async runOllama(
    systemPrompt: string | null,
    messages:     ChatTurn[],
    maxTokens:    number,
    temperature:  number,
    jsonMode:     boolean,
    signal:       AbortSignal,
  ): Promise<LlmResult> {
    const { default: OpenAI } = await import('openai');
    const client = new OpenAI({
      baseURL:    `${this.cfg.ollamaBaseUrl}/v1`,
      apiKey:     'ollama', // Ollama ignores this but the SDK requires it
      maxRetries: 0,
    });

    const response = await client.chat.completions.create(
      {
        model:       this.cfg.ollamaModel,
        max_tokens:  maxTokens,
        temperature,
        messages: [
          ...(systemPrompt ? [{ role: 'system' as const, content: systemPrompt }] : []),
          ...messages.map((m) => ({ role: m.role, content: m.content })),
        ],
        ...(jsonMode ? { response_format: { type: 'json_object' as const } } : {}),
      },
      { signal },
    );

    const text = response.choices[0]?.message?.content ?? '';

    return {
      text,
      inputTokens:  response.usage?.prompt_tokens ?? 0,
      outputTokens: response.usage?.completion_tokens ?? 0,
      modelId:      this.cfg.ollamaModel,
      provider:     'ollama',
    };
  }
}
