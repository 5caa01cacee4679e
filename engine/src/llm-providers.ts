import OpenAI from 'openai';
import Anthropic from '@anthropic-ai/sdk';
import { Provider } from '@forgeloop/shared';
import { getApiKey } from './config';

/**
 * One structured-output request: system and user prompt in, the model's
 * whole reply text out. `signal` aborts the underlying HTTP request.
 */
export interface LLMProvider {
  complete(systemPrompt: string, userPrompt: string, signal?: AbortSignal): Promise<string>;
}

export class OpenAIProvider implements LLMProvider {
  private client: OpenAI;

  constructor(apiKey: string, private model: string) {
    this.client = new OpenAI({ apiKey });
  }

  async complete(systemPrompt: string, userPrompt: string, signal?: AbortSignal): Promise<string> {
    const completion = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userPrompt },
        ],
        response_format: { type: 'json_object' },
        temperature: 0.2,
      },
      { signal }
    );

    return completion.choices[0]?.message?.content ?? '';
  }
}

export class AnthropicProvider implements LLMProvider {
  private client: Anthropic;

  constructor(apiKey: string, private model: string) {
    this.client = new Anthropic({ apiKey });
  }

  async complete(systemPrompt: string, userPrompt: string, signal?: AbortSignal): Promise<string> {
    const message = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: 4096,
        temperature: 0.2,
        system: systemPrompt,
        messages: [{ role: 'user', content: userPrompt }],
      },
      { signal }
    );

    // Only text blocks carry the JSON reply
    return message.content.map((block) => (block.type === 'text' ? block.text : '')).join('');
  }
}

/**
 * Provider used when no model is configured. Every call fails, so each
 * agent runs on its static fallback.
 */
export class OfflineProvider implements LLMProvider {
  async complete(): Promise<string> {
    throw new Error('offline provider: no model configured');
  }
}

export function createProvider(provider: Provider, model: string): LLMProvider {
  if (provider === 'offline') {
    return new OfflineProvider();
  }

  const apiKey = getApiKey(provider);
  if (provider === 'openai') {
    return new OpenAIProvider(apiKey, model);
  } else {
    return new AnthropicProvider(apiKey, model);
  }
}
