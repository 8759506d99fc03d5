/**
 * Chat completion client
 * Uses the OpenAI SDK against an OpenAI-compatible endpoint (Groq by default)
 */

import OpenAI from 'openai';
import { errorMessage } from '@/lib/errors';

// ============================================================================
// Types
// ============================================================================

export interface CompletionResult {
  /** Generated text, or null when the call failed */
  text: string | null;
  error?: string;
}

/**
 * Opaque request/response call used by documentation generation.
 * Implementations report failures in the result instead of throwing.
 */
export interface CompletionClient {
  complete(systemPrompt: string, userPrompt: string): Promise<CompletionResult>;
}

export interface OpenAICompletionOptions {
  apiKey: string;
  baseURL: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
}

// ============================================================================
// OpenAI-compatible Client
// ============================================================================

export class OpenAICompletionClient implements CompletionClient {
  private readonly client: OpenAI;

  constructor(
    private readonly options: OpenAICompletionOptions,
    client?: OpenAI
  ) {
    this.client = client ?? new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL });
  }

  get model(): string {
    return this.options.model;
  }

  /**
   * Generate a chat completion
   */
  async complete(systemPrompt: string, userPrompt: string): Promise<CompletionResult> {
    try {
      const response = await this.client.chat.completions.create({
        model: this.options.model,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userPrompt },
        ],
        temperature: this.options.temperature ?? 0.2,
        max_tokens: this.options.maxTokens ?? 4096,
      });

      const content = response.choices[0]?.message?.content;
      if (!content) {
        return { text: null, error: 'Empty response from LLM' };
      }

      return { text: content };
    } catch (error) {
      const message = errorMessage(error);
      console.error('[LLM] API error:', message);
      return { text: null, error: `LLM API error: ${message}` };
    }
  }
}
