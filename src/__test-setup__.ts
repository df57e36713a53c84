/**
 * Shared test utilities.
 *
 * A deterministic letter-frequency embedder, a scripted generator, an
 * in-memory pipeline context, gates for holding work mid-flight and fetch
 * response factories.
 */

import type { EmbeddingCapability, GenerationCapability, GenerationParams } from './types/rag.js';
import type { RagContext } from './services/rag/context.js';
import { createTextExtractor } from './services/rag/extractor.js';
import { IndexLifecycle } from './services/rag/index-state.js';
import { InMemoryTabularStore, InMemoryVectorIndex } from './services/rag/stores/memory.js';

export const TEST_EMBEDDING_MODEL = 'test-letters';

/**
 * Embeds text as counts of the letters a-z (case-insensitive).
 * "A." and "A" map to the same direction; "A." and "B." are orthogonal.
 */
export function letterEmbedder(model: string = TEST_EMBEDDING_MODEL): EmbeddingCapability {
  const embed = async (text: string): Promise<number[]> => {
    const vector = new Array<number>(26).fill(0);
    for (const ch of text.toLowerCase()) {
      const code = ch.charCodeAt(0) - 97;
      if (code >= 0 && code < 26) {
        vector[code] += 1;
      }
    }
    return vector;
  };

  return {
    model,
    embed,
    async embedBatch(texts: string[]) {
      return Promise.all(texts.map(embed));
    },
  };
}

/** An embedder whose endpoint is unreachable. */
export function unreachableEmbedder(model: string = TEST_EMBEDDING_MODEL): EmbeddingCapability {
  return {
    model,
    async embed() {
      throw new Error('connect ECONNREFUSED 127.0.0.1:443');
    },
  };
}

export interface Gate {
  /** Resolves once something is waiting at the gate. */
  entered: Promise<void>;
  wait(): Promise<void>;
  release(): void;
}

/** Holds callers of wait() until release(); later callers pass straight through. */
export function createGate(): Gate {
  let open = () => {};
  let markEntered = () => {};
  const opened = new Promise<void>((resolve) => {
    open = () => resolve();
  });
  const entered = new Promise<void>((resolve) => {
    markEntered = () => resolve();
  });

  return {
    entered,
    async wait() {
      markEntered();
      await opened;
    },
    release() {
      open();
    },
  };
}

/** A letter embedder whose batch calls wait at `gate`. */
export function gatedEmbedder(gate: Gate, model: string = TEST_EMBEDDING_MODEL): EmbeddingCapability {
  const inner = letterEmbedder(model);
  return {
    model,
    embed: inner.embed,
    async embedBatch(texts: string[]) {
      await gate.wait();
      return Promise.all(texts.map(inner.embed));
    },
  };
}

export interface ScriptedGenerator extends GenerationCapability {
  calls: { prompt: string; params: GenerationParams }[];
}

/** A generator that records prompts and replies with `answer` (or throws `error`). */
export function scriptedGenerator(answer: string, error?: Error): ScriptedGenerator {
  const calls: { prompt: string; params: GenerationParams }[] = [];
  return {
    model: 'test-generator',
    calls,
    async generate(prompt: string, params: GenerationParams) {
      calls.push({ prompt, params });
      if (error) {
        throw error;
      }
      return answer;
    },
  };
}

/** A fresh in-memory pipeline context. */
export function createTestContext(overrides: Partial<RagContext> = {}): RagContext {
  const store = new InMemoryTabularStore();
  return {
    store,
    index: new InMemoryVectorIndex(store),
    embedding: letterEmbedder(),
    generation: scriptedGenerator('Grounded answer'),
    extractor: createTextExtractor(),
    lifecycle: new IndexLifecycle(),
    ...overrides,
  };
}

/** A JSON response with the given status. */
export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/** A plain-text error response. */
export function errorResponse(status: number, body: string): Response {
  return new Response(body, { status });
}
