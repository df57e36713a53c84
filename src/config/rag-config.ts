/**
 * RAG Configuration
 * Settings for the store/index backend, capabilities, chunking and generation
 */

import { DEFAULT_CHUNK_OVERLAP, DEFAULT_CHUNK_SIZE } from '../services/rag/chunking.js';
import { DEFAULT_EMBEDDING_MODEL } from '../services/rag/embeddings.js';
import { DEFAULT_GENERATION_MODEL } from '../services/claude/client.js';

export type RagBackend = 'supabase' | 'memory';

export interface RagConfig {
  port: number;
  frontendUrls: string[];
  backendApiKey: string | undefined;

  backend: RagBackend;
  supabase: {
    url: string | undefined;
    serviceRoleKey: string | undefined;
  };

  openai: {
    apiKey: string | undefined;
    embeddingModel: string;
  };

  anthropic: {
    apiKey: string | undefined;
    model: string;
  };

  storeLocation: string;
  indexName: string;

  chunking: {
    chunkSize: number;
    overlap: number;
  };

  retrieval: {
    topK: number;
  };

  generation: {
    temperature: number;
    maxTokens: number;
  };
}

type Env = Record<string, string | undefined>;

function numericEnv(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (Number.isNaN(parsed)) {
    throw new Error(`Environment variable ${name} must be a number, got: ${raw}`);
  }
  return parsed;
}

function parseBackend(raw: string | undefined): RagBackend {
  if (!raw || raw === 'supabase') return 'supabase';
  if (raw === 'memory') return 'memory';
  throw new Error(`RAG_BACKEND must be "supabase" or "memory", got: ${raw}`);
}

/**
 * Parse comma-separated origins, adding https:// where no protocol is given
 */
function parseOrigins(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw.split(',').map((url) => {
    url = url.trim();
    if (!url.startsWith('http://') && !url.startsWith('https://')) {
      url = `https://${url}`;
    }
    return url;
  });
}

export function loadRagConfig(env: Env = process.env): RagConfig {
  return {
    port: numericEnv(env, 'PORT', 3001),
    frontendUrls: parseOrigins(env.FRONTEND_URL),
    backendApiKey: env.BACKEND_API_KEY,

    backend: parseBackend(env.RAG_BACKEND),
    supabase: {
      url: env.SUPABASE_URL,
      serviceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY,
    },

    openai: {
      apiKey: env.OPENAI_API_KEY,
      embeddingModel: env.EMBEDDING_MODEL || DEFAULT_EMBEDDING_MODEL,
    },

    anthropic: {
      apiKey: env.ANTHROPIC_API_KEY,
      model: env.GENERATION_MODEL || DEFAULT_GENERATION_MODEL,
    },

    storeLocation: env.RAG_STORE_LOCATION || 'rag_documents',
    indexName: env.RAG_INDEX_NAME || 'rag_documents_index',

    chunking: {
      chunkSize: numericEnv(env, 'RAG_CHUNK_SIZE', DEFAULT_CHUNK_SIZE),
      overlap: numericEnv(env, 'RAG_CHUNK_OVERLAP', DEFAULT_CHUNK_OVERLAP),
    },

    retrieval: {
      topK: numericEnv(env, 'RAG_TOP_K', 5),
    },

    generation: {
      temperature: numericEnv(env, 'RAG_TEMPERATURE', 0.3),
      maxTokens: numericEnv(env, 'RAG_MAX_TOKENS', 1024),
    },
  };
}

/**
 * Validate required settings are present
 */
export function validateRagConfig(config: RagConfig): void {
  if (!config.backendApiKey) {
    throw new Error('BACKEND_API_KEY is required');
  }
  if (!config.openai.apiKey) {
    throw new Error('OPENAI_API_KEY is required');
  }
  if (!config.anthropic.apiKey) {
    throw new Error('ANTHROPIC_API_KEY is required');
  }
  if (config.backend === 'supabase') {
    if (!config.supabase.url) {
      throw new Error('SUPABASE_URL is required when RAG_BACKEND=supabase');
    }
    if (!config.supabase.serviceRoleKey) {
      throw new Error('SUPABASE_SERVICE_ROLE_KEY is required when RAG_BACKEND=supabase');
    }
  }
}
