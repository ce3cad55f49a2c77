/**
 * OpenAI-compatible client utility
 * Provides a lazily created OpenAI client pointed at the configured endpoint
 * (a local Ollama server by default)
 */

import OpenAI from 'openai';
import { loadEnvironmentConfig, type EnvironmentConfig } from '../config/environment';

/**
 * LLM Client Singleton
 * Manages a single instance of the OpenAI client with lazy initialization
 */
class LLMClient {
  private static instance: OpenAI | null = null;

  /**
   * Get the singleton client, creating it on first access
   */
  static get(config: EnvironmentConfig['llm'] = loadEnvironmentConfig().llm): OpenAI {
    if (!this.instance) {
      this.instance = createLLMClient(config);
    }
    return this.instance;
  }

  /**
   * Reset the singleton instance (useful for testing)
   */
  static reset(): void {
    this.instance = null;
  }

  static isInitialized(): boolean {
    return this.instance !== null;
  }
}

/**
 * One attempt per call, bounded by the configured timeout
 */
export function createLLMClient(config: EnvironmentConfig['llm']): OpenAI {
  return new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseUrl,
    timeout: config.timeoutMs,
    maxRetries: 0
  });
}

export { LLMClient };
