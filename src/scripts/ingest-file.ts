/**
 * One-off ingestion of a text or Markdown file.
 *
 * Usage: npm run ingest -- <path> [chunk_size] [overlap]
 *
 * Run one at a time: the store and index have a single writer.
 */

import 'dotenv/config';
import { loadRagConfig, validateRagConfig } from '../config/rag-config.js';
import { createRagContext, indexTarget } from '../services/rag/context.js';
import { ingestDocument } from '../services/rag/ingestion.js';
import { errorMessage } from '../services/rag/errors.js';

async function main(args: string[]): Promise<void> {
  const [path, chunkSizeArg, overlapArg] = args;
  if (!path) {
    throw new Error('Usage: ingest-file <path> [chunk_size] [overlap]');
  }

  const config = loadRagConfig();
  validateRagConfig(config);
  if (config.backend === 'memory') {
    throw new Error('RAG_BACKEND=memory keeps nothing after this process exits; use the API instead');
  }

  const ctx = createRagContext(config);
  const result = await ingestDocument(
    { type: 'file', path },
    {
      chunk_size: chunkSizeArg ? Number(chunkSizeArg) : config.chunking.chunkSize,
      overlap: overlapArg ? Number(overlapArg) : config.chunking.overlap,
    },
    indexTarget(config, ctx),
    ctx
  );

  console.log(`[Ingestion] Done: ${result.segments} segments, generation ${result.handle.generation}`);
}

main(process.argv.slice(2)).catch((err: unknown) => {
  console.error('[Ingestion] Failed:', errorMessage(err));
  process.exitCode = 1;
});
