/**
 * Document Ingestion Service
 *
 * Straight-line pipeline: extract → chunk → assign ids → persist + index.
 * Any failure aborts the run; a retry re-runs the whole pipeline as a full
 * overwrite.
 */

import type { ChunkingOptions, IndexHandle, IndexTarget } from '../../types/rag.js';
import { chunkText } from './chunking.js';
import { assignIds } from './identity.js';
import { syncIndex } from './sync.js';
import type { SyncDeps } from './sync.js';
import type { DocumentSource, Extractor } from './extractor.js';

export interface IngestDeps extends SyncDeps {
  extractor: Extractor;
}

export interface IngestResult {
  segments: number;
  handle: IndexHandle;
}

export async function ingestDocument(
  source: DocumentSource,
  chunking: ChunkingOptions,
  target: IndexTarget,
  deps: IngestDeps
): Promise<IngestResult> {
  const label = source.type === 'file' ? source.path : 'inline text';

  // 1. Extract
  const text = await deps.extractor.extract(source);

  // 2. Chunk (validates chunk_size / overlap before anything is written)
  const pieces = chunkText(text, chunking);
  console.log(`[Ingestion] Chunked ${label} (${text.length} chars) into ${pieces.length} segments`);

  // 3. Assign ids
  const segments = assignIds(pieces);

  // 4. Persist and index
  const handle = await syncIndex(segments, target, deps);

  console.log(`[Ingestion] Indexed ${segments.length} segments into ${target.index_name} (generation ${handle.generation})`);

  return { segments: segments.length, handle };
}
