/**
 * Chat completion client for the LLM-backed filler and topic namer
 *
 * Talks to the provider's HTTP API with fetch; no SDK. Responses are
 * validated with zod before any field is read.
 */

import { z } from 'zod';

export type LlmProvider = 'openai' | 'anthropic';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

const OPENAI_URL = 'https://api.openai.com/v1/chat/completions';
const ANTHROPIC_URL = 'https://api.anthropic.com/v1/messages';
const ANTHROPIC_VERSION = '2023-06-01';

export const DEFAULT_MODELS: Record<LlmProvider, string> = {
  openai: 'gpt-4o-mini',
  anthropic: 'claude-3-5-haiku-latest',
};

/** Default request timeout (30 seconds) */
export const DEFAULT_LLM_TIMEOUT_MS = 30_000;

const OpenAIResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({ content: z.string().nullable() }),
    })
  ).min(1),
});

const AnthropicResponseSchema = z.object({
  content: z.array(
    z.object({ type: z.string(), text: z.string().optional() })
  ),
});

export interface ChatRequest {
  system: string;
  prompt: string;
  maxTokens: number;
  temperature?: number;
}

export interface ChatClient {
  readonly provider: LlmProvider;
  readonly model: string;
  complete(request: ChatRequest): Promise<string>;
}

export interface ChatClientOptions {
  provider: LlmProvider;
  apiKey: string;
  model?: string;
  timeoutMs?: number;
  fetch?: FetchLike;
}

/**
 * Create a ChatClient for the given provider.
 */
export function createChatClient(options: ChatClientOptions): ChatClient {
  const {
    provider,
    apiKey,
    model = DEFAULT_MODELS[provider],
    timeoutMs = DEFAULT_LLM_TIMEOUT_MS,
    fetch: fetchImpl = fetch,
  } = options;

  async function post(url: string, headers: Record<string, string>, body: unknown): Promise<unknown> {
    const response = await fetchImpl(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(timeoutMs),
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`${provider} request failed (${response.status}): ${text.slice(0, 200)}`);
    }

    return response.json();
  }

  return {
    provider,
    model,

    async complete({ system, prompt, maxTokens, temperature = 0.7 }: ChatRequest): Promise<string> {
      if (provider === 'openai') {
        const json = await post(OPENAI_URL, { Authorization: `Bearer ${apiKey}` }, {
          model,
          messages: [
            { role: 'system', content: system },
            { role: 'user', content: prompt },
          ],
          temperature,
          max_tokens: maxTokens,
        });
        const parsed = OpenAIResponseSchema.parse(json);
        return (parsed.choices[0].message.content ?? '').trim();
      }

      const json = await post(ANTHROPIC_URL, { 'x-api-key': apiKey, 'anthropic-version': ANTHROPIC_VERSION }, {
        model,
        system,
        max_tokens: maxTokens,
        temperature,
        messages: [{ role: 'user', content: prompt }],
      });
      const parsed = AnthropicResponseSchema.parse(json);
      return parsed.content
        .filter(block => block.type === 'text')
        .map(block => block.text ?? '')
        .join('')
        .trim();
    },
  };
}

const TopicListSchema = z.array(z.string());

/**
 * Parse a JSON array of strings from a model reply, which may wrap it in
 * a markdown code fence or surround it with prose.
 */
export function parseTopicList(reply: string): string[] {
  const match = reply.match(/\[[\s\S]*\]/);
  if (!match) {
    throw new Error('Reply contains no JSON array');
  }
  return TopicListSchema.parse(JSON.parse(match[0]));
}
