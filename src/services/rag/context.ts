/**
 * RAG Context
 *
 * Everything a pipeline call needs, built once from configuration and
 * passed explicitly. Two contexts never share a client or lifecycle.
 */

import type {
  EmbeddingCapability,
  GenerationCapability,
  IndexTarget,
  TabularStore,
  VectorIndexClient,
} from '../../types/rag.js';
import type { RagConfig } from '../../config/rag-config.js';
import { createServiceClient } from '../../utils/supabase.js';
import { createClaudeGenerator } from '../claude/client.js';
import { createOpenAIEmbedder } from './embeddings.js';
import { createTextExtractor } from './extractor.js';
import type { Extractor } from './extractor.js';
import { IndexLifecycle } from './index-state.js';
import { InMemoryTabularStore, InMemoryVectorIndex } from './stores/memory.js';
import { SupabaseTabularStore, SupabaseVectorIndex } from './stores/supabase.js';

export interface RagContext {
  store: TabularStore;
  index: VectorIndexClient;
  embedding: EmbeddingCapability;
  generation: GenerationCapability;
  extractor: Extractor;
  lifecycle: IndexLifecycle;
}

export function createRagContext(config: RagConfig): RagContext {
  const embedding = createOpenAIEmbedder({
    apiKey: config.openai.apiKey ?? '',
    model: config.openai.embeddingModel,
  });
  const generation = createClaudeGenerator({
    apiKey: config.anthropic.apiKey ?? '',
    model: config.anthropic.model,
  });

  let store: TabularStore;
  let index: VectorIndexClient;

  if (config.backend === 'memory') {
    store = new InMemoryTabularStore();
    index = new InMemoryVectorIndex(store);
  } else {
    const { url, serviceRoleKey } = config.supabase;
    if (!url || !serviceRoleKey) {
      throw new Error('SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required for the supabase backend');
    }
    const client = createServiceClient(url, serviceRoleKey);
    store = new SupabaseTabularStore(client);
    index = new SupabaseVectorIndex(client, store);
  }

  console.log(`[RAG] Using ${config.backend} backend, embeddings ${embedding.model}, generation ${generation.model}`);

  return {
    store,
    index,
    embedding,
    generation,
    extractor: createTextExtractor(),
    lifecycle: new IndexLifecycle(),
  };
}

export function indexTarget(config: RagConfig, ctx: RagContext): IndexTarget {
  return {
    store_location: config.storeLocation,
    index_name: config.indexName,
    embedding: ctx.embedding,
  };
}
