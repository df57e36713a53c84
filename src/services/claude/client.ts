/**
 * Claude API Client
 *
 * Uses native fetch to call Anthropic's Messages API (no SDK dependency).
 * Exposed to the pipeline as a GenerationCapability: prompt in, raw text out.
 *
 * Follows the embeddings.ts pattern: explicit config, withRetry, typed responses.
 */

import type { GenerationCapability, GenerationParams } from '../../types/rag.js';

const CLAUDE_API_URL = 'https://api.anthropic.com/v1/messages';
export const DEFAULT_GENERATION_MODEL = 'claude-sonnet-4-20250514';
const API_VERSION = '2023-06-01';

const DEFAULT_SYSTEM_PROMPT = 'Answer the question at the end using the context that precedes it. If the context does not contain the answer, say so.';

export interface ClaudeGeneratorOptions {
  apiKey: string;
  model?: string;
  systemPrompt?: string;
  maxRetries?: number;
}

interface ClaudeMessageResponse {
  content: { type: string; text?: string }[];
}

/**
 * Retry a function with exponential backoff on 429/529 (rate limit / overloaded) errors
 */
async function withRetry<T>(fn: () => Promise<T>, maxRetries: number): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      const msg = err instanceof Error ? err.message : '';
      const isRetryable = msg.includes('429') || msg.includes('529');
      if (!isRetryable || attempt >= maxRetries) {
        throw err;
      }
      const delay = Math.pow(2, attempt) * 1000; // 1s, 2s, 4s
      console.warn(`[Claude] Rate limited, retrying in ${delay}ms (attempt ${attempt + 1}/${maxRetries})`);
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
}

/**
 * Create a GenerationCapability backed by Claude.
 */
export function createClaudeGenerator(options: ClaudeGeneratorOptions): GenerationCapability {
  const {
    apiKey,
    model = DEFAULT_GENERATION_MODEL,
    systemPrompt = DEFAULT_SYSTEM_PROMPT,
    maxRetries = 3,
  } = options;

  if (!apiKey) {
    throw new Error('ANTHROPIC_API_KEY is required for generation');
  }

  return {
    model,

    async generate(prompt: string, params: GenerationParams): Promise<string> {
      const { temperature = 0.3, max_tokens = 1024 } = params;

      const response = await withRetry(async () => {
        const res = await fetch(CLAUDE_API_URL, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            'x-api-key': apiKey,
            'anthropic-version': API_VERSION,
          },
          body: JSON.stringify({
            model,
            max_tokens,
            temperature,
            system: systemPrompt,
            messages: [{ role: 'user', content: prompt }],
          }),
        });

        if (!res.ok) {
          const errorText = await res.text();
          throw new Error(`Claude API ${res.status}: ${errorText.substring(0, 200)}`);
        }

        return res;
      }, maxRetries);

      const result = await response.json() as ClaudeMessageResponse;

      const textBlock = result.content.find((b) => b.type === 'text');
      return textBlock?.text ?? '';
    },
  };
}
