/**
 * RAG Routes
 *
 * POST /api/rag/ingest      Replace the indexed document
 * POST /api/rag/search      Top-k similarity search
 * POST /api/rag/query       Grounded answer
 * GET  /api/rag/index       Index status and convergence
 * POST /api/rag/index/sync  Manually re-converge the index with the store
 *
 * Auth: requireBackendKey (applied at mount in app.ts)
 */

import { Router, Request, Response } from 'express';
import type { RagConfig } from '../config/rag-config.js';
import type { IndexHandle } from '../types/rag.js';
import type { RagContext } from '../services/rag/context.js';
import { indexTarget } from '../services/rag/context.js';
import { ingestDocument } from '../services/rag/ingestion.js';
import { getIndexStatus, openIndexHandle, triggerIndexSync } from '../services/rag/sync.js';
import { DEFAULT_SEARCH_COLUMNS, searchIndex } from '../services/rag/search.js';
import { askQuestion } from '../services/rag/chat.js';
import { ConfigurationError, GenerationError, IndexUnavailableError } from '../services/rag/errors.js';

function isOptionalNumber(value: unknown): value is number | undefined {
  return value === undefined || (typeof value === 'number' && Number.isFinite(value));
}

function sendError(res: Response, err: unknown, tag: string): void {
  if (err instanceof ConfigurationError) {
    res.status(400).json({ error: err.message, code: 'CONFIGURATION_ERROR' });
    return;
  }
  if (err instanceof IndexUnavailableError) {
    console.warn(`[${tag}] Index unavailable:`, err.message);
    res.status(503).json({ error: err.message, code: 'INDEX_UNAVAILABLE' });
    return;
  }
  if (err instanceof GenerationError) {
    res.status(502).json({
      error: err.message,
      code: 'GENERATION_ERROR',
      question: err.question,
      context_present: err.contextPresent,
    });
    return;
  }
  console.error(`[${tag}] Unhandled error:`, err);
  res.status(500).json({ error: 'Internal server error' });
}

export function createRagRouter(ctx: RagContext, config: RagConfig): Router {
  const router = Router();
  const target = indexTarget(config, ctx);

  // Single writer: one ingestion or manual sync at a time
  let writing = false;
  let handle: IndexHandle | null = null;

  async function currentHandle(): Promise<IndexHandle> {
    if (handle) {
      return handle;
    }
    if (writing) {
      throw new IndexUnavailableError(target.index_name, `Index ${target.index_name} is being rebuilt`);
    }

    const opened = await openIndexHandle(target, ctx);
    // A write that started while opening owns the handle
    if (!handle && !writing) {
      handle = opened;
    }
    return opened;
  }

  // ── Ingest ──────────────────────────────────────────────────────────
  router.post('/ingest', async (req: Request, res: Response): Promise<void> => {
    const { text, chunk_size, overlap } = req.body ?? {};

    if (typeof text !== 'string') {
      res.status(400).json({ error: 'text is required and must be a string' });
      return;
    }
    if (!isOptionalNumber(chunk_size) || !isOptionalNumber(overlap)) {
      res.status(400).json({ error: 'chunk_size and overlap must be numbers' });
      return;
    }
    if (writing) {
      res.status(409).json({ error: 'An ingestion is already running', code: 'INGESTION_IN_PROGRESS' });
      return;
    }

    writing = true;
    handle = null;
    try {
      const result = await ingestDocument(
        { type: 'text', text },
        {
          chunk_size: chunk_size ?? config.chunking.chunkSize,
          overlap: overlap ?? config.chunking.overlap,
        },
        target,
        ctx
      );
      handle = result.handle;
      res.json({
        segments: result.segments,
        index_name: result.handle.index_name,
        generation: result.handle.generation,
        state: result.handle.state,
      });
    } catch (err) {
      sendError(res, err, 'Ingestion');
    } finally {
      writing = false;
    }
  });

  // ── Search ──────────────────────────────────────────────────────────
  router.post('/search', async (req: Request, res: Response): Promise<void> => {
    const { query, k, columns } = req.body ?? {};

    if (!query || typeof query !== 'string' || query.trim().length === 0) {
      res.status(400).json({ error: 'query is required and must be a non-empty string' });
      return;
    }
    if (!isOptionalNumber(k)) {
      res.status(400).json({ error: 'k must be a number' });
      return;
    }
    if (columns !== undefined && (!Array.isArray(columns) || !columns.every((c) => typeof c === 'string'))) {
      res.status(400).json({ error: 'columns must be an array of field names' });
      return;
    }

    try {
      const active = await currentHandle();
      const results = await searchIndex(
        active,
        query.trim(),
        k ?? config.retrieval.topK,
        columns ?? DEFAULT_SEARCH_COLUMNS,
        ctx
      );
      const status = await getIndexStatus(active, ctx);
      res.json({ results, converged: status.converged });
    } catch (err) {
      sendError(res, err, 'Search');
    }
  });

  // ── Query ───────────────────────────────────────────────────────────
  router.post('/query', async (req: Request, res: Response): Promise<void> => {
    const { question, k, temperature, max_tokens } = req.body ?? {};

    if (!question || typeof question !== 'string' || question.trim().length === 0) {
      res.status(400).json({ error: 'question is required and must be a non-empty string' });
      return;
    }
    if (!isOptionalNumber(k) || !isOptionalNumber(temperature) || !isOptionalNumber(max_tokens)) {
      res.status(400).json({ error: 'k, temperature and max_tokens must be numbers' });
      return;
    }

    try {
      const active = await currentHandle();
      const { answer, sources } = await askQuestion(
        question.trim(),
        active,
        ctx.generation,
        {
          k: k ?? config.retrieval.topK,
          params: {
            temperature: temperature ?? config.generation.temperature,
            max_tokens: max_tokens ?? config.generation.maxTokens,
          },
        },
        ctx
      );
      const status = await getIndexStatus(active, ctx);
      res.json({ answer, sources, converged: status.converged });
    } catch (err) {
      sendError(res, err, 'RAG Chat');
    }
  });

  // ── Index status ────────────────────────────────────────────────────
  router.get('/index', async (_req: Request, res: Response): Promise<void> => {
    try {
      const description = await ctx.index.describe(target.index_name);
      if (!description) {
        handle = null;
        res.status(404).json({ error: `Index ${target.index_name} not found` });
        return;
      }
      const status = await getIndexStatus(await currentHandle(), ctx);
      res.json(status);
    } catch (err) {
      sendError(res, err, 'Index');
    }
  });

  // ── Manual sync ─────────────────────────────────────────────────────
  router.post('/index/sync', async (_req: Request, res: Response): Promise<void> => {
    if (writing) {
      res.status(409).json({ error: 'An ingestion is already running', code: 'INGESTION_IN_PROGRESS' });
      return;
    }

    writing = true;
    try {
      const active = handle ?? await openIndexHandle(target, ctx);
      handle = await triggerIndexSync(active, ctx);
      res.json(await getIndexStatus(handle, ctx));
    } catch (err) {
      sendError(res, err, 'Index');
    } finally {
      writing = false;
    }
  });

  return router;
}
