/**
 * OpenAI Embeddings Service
 *
 * Uses native fetch to call OpenAI's embedding API (no SDK dependency).
 * Default model: text-embedding-3-small (1536 dimensions)
 */

import type { EmbeddingCapability } from '../../types/rag.js';

const OPENAI_EMBEDDINGS_URL = 'https://api.openai.com/v1/embeddings';
export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';
const MAX_BATCH_SIZE = 100;
// Safety: truncate any input to ~6000 tokens worth of characters (8191 limit)
// cl100k_base worst case is ~3 chars/token, so 18000 chars ≈ 6000 tokens
const MAX_INPUT_CHARS = 18000;

export interface OpenAIEmbedderOptions {
  apiKey: string;
  model?: string;
  maxRetries?: number;
}

interface OpenAIEmbeddingResponse {
  data: { embedding: number[]; index: number }[];
  usage: { prompt_tokens: number; total_tokens: number };
}

/**
 * Retry a function with exponential backoff on 429 (rate limit) errors
 */
async function withRetry<T>(fn: () => Promise<T>, maxRetries: number): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      const isRateLimit = err instanceof Error && err.message.includes('429');
      if (!isRateLimit || attempt >= maxRetries) {
        throw err;
      }
      const delay = Math.pow(2, attempt) * 1000; // 1s, 2s, 4s
      console.warn(`[Embeddings] Rate limited, retrying in ${delay}ms (attempt ${attempt + 1}/${maxRetries})`);
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
}

/**
 * Call OpenAI embeddings API for one or more texts
 */
async function callEmbeddingsApi(apiKey: string, model: string, texts: string[]): Promise<number[][]> {
  const safeTexts = texts.map((t) =>
    t.length > MAX_INPUT_CHARS ? t.substring(0, MAX_INPUT_CHARS) : t
  );

  const response = await fetch(OPENAI_EMBEDDINGS_URL, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      'Authorization': `Bearer ${apiKey}`,
    },
    body: JSON.stringify({
      model,
      input: safeTexts,
    }),
  });

  if (!response.ok) {
    const errorText = await response.text();
    throw new Error(`OpenAI embeddings API ${response.status}: ${errorText.substring(0, 200)}`);
  }

  const result = await response.json() as OpenAIEmbeddingResponse;

  if (result.data.length !== texts.length) {
    throw new Error(`OpenAI embeddings API returned ${result.data.length} vectors for ${texts.length} inputs`);
  }

  // Sort by index to match input order
  return [...result.data]
    .sort((a, b) => a.index - b.index)
    .map((item) => item.embedding);
}

/**
 * Create an EmbeddingCapability backed by the OpenAI embeddings API.
 */
export function createOpenAIEmbedder(options: OpenAIEmbedderOptions): EmbeddingCapability {
  const { apiKey, model = DEFAULT_EMBEDDING_MODEL, maxRetries = 3 } = options;

  if (!apiKey) {
    throw new Error('OPENAI_API_KEY is required for embeddings');
  }

  return {
    model,

    async embed(text: string): Promise<number[]> {
      const [embedding] = await withRetry(() => callEmbeddingsApi(apiKey, model, [text]), maxRetries);
      return embedding;
    },

    /**
     * Embed many texts (batched, up to 100 per API call)
     */
    async embedBatch(texts: string[]): Promise<number[][]> {
      const all: number[][] = [];

      for (let i = 0; i < texts.length; i += MAX_BATCH_SIZE) {
        const batch = texts.slice(i, i + MAX_BATCH_SIZE);
        all.push(...await withRetry(() => callEmbeddingsApi(apiKey, model, batch), maxRetries));
      }

      return all;
    },
  };
}

/**
 * Embed texts in input order, batching when the capability supports it.
 */
export async function embedTexts(capability: EmbeddingCapability, texts: string[]): Promise<number[][]> {
  if (texts.length === 0) {
    return [];
  }
  if (capability.embedBatch) {
    return capability.embedBatch(texts);
  }

  const vectors: number[][] = [];
  for (const text of texts) {
    vectors.push(await capability.embed(text));
  }
  return vectors;
}

/**
 * Cosine similarity in [-1, 1]; 0 when either vector has no magnitude
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / Math.sqrt(normA * normB);
}
