/**
 * Completion service backed by an OpenAI-compatible chat completions endpoint.
 * Every failure (network, timeout, non-2xx, empty body) resolves to '' so
 * callers only ever see text.
 */

import type { CompletionService } from '../types/feed';
import { logger } from '../utils/logger';

interface ChatCompletionRequest {
  model: string;
  messages: Array<{ role: 'user'; content: string }>;
  temperature: number;
  stream: false;
}

interface ChatCompletionResponse {
  choices: Array<{ message: { content: string | null } }>;
}

// The slice of the OpenAI client this service calls; an OpenAI instance satisfies it
export interface ChatClient {
  chat: {
    completions: {
      create(body: ChatCompletionRequest): PromiseLike<ChatCompletionResponse>;
    };
  };
}

export class OpenAICompletionService implements CompletionService {
  constructor(private readonly client: ChatClient) {}

  async complete(prompt: string, model: string): Promise<string> {
    const startTime = Date.now();
    try {
      const response = await this.client.chat.completions.create({
        model,
        messages: [{ role: 'user', content: prompt }],
        temperature: 0.0,
        stream: false
      });

      const content = response.choices[0]?.message.content ?? '';
      logger.debug(`Completion received in ${Date.now() - startTime}ms`, { model, length: content.length });
      return content.trim();
    } catch (error) {
      logger.error(`Completion request to ${model} failed:`, error instanceof Error ? error.message : error);
      return '';
    }
  }
}
