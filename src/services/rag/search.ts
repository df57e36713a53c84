/**
 * Vector Similarity Search Service
 *
 * Embeds the query with the handle's embedding capability and runs a
 * nearest-neighbour query against the index.
 */

import type {
  IndexDescription,
  IndexHandle,
  IndexQueryRow,
  RetrievedSegment,
  SegmentColumn,
  VectorIndexClient,
} from '../../types/rag.js';
import { SEGMENT_COLUMNS } from '../../types/rag.js';
import { ConfigurationError, IndexUnavailableError, errorMessage } from './errors.js';

export const DEFAULT_SEARCH_COLUMNS: SegmentColumn[] = ['id', 'content'];

export interface SearchDeps {
  index: VectorIndexClient;
}

function validateSearch(k: number, columns: readonly string[]): SegmentColumn[] {
  if (!Number.isInteger(k) || k <= 0) {
    throw new ConfigurationError(`k must be a positive integer, got ${k}`);
  }
  if (columns.length === 0) {
    throw new ConfigurationError('columns must name at least one field');
  }

  const selected: SegmentColumn[] = [];
  for (const name of columns) {
    const column = SEGMENT_COLUMNS.find((c) => c === name);
    if (!column) {
      throw new ConfigurationError(`Unknown column "${name}" (expected one of: ${SEGMENT_COLUMNS.join(', ')})`);
    }
    if (!selected.includes(column)) {
      selected.push(column);
    }
  }
  return selected;
}

/**
 * Search the index for the segments most similar to `query`
 *
 * 1. Check the index exists, has been synced and was built in the same embedding space
 * 2. Embed the query
 * 3. Query top-k, dedupe by id, order by descending score
 *
 * Never waits for convergence: results during a pending sync are best-effort.
 */
export async function searchIndex(
  handle: IndexHandle,
  query: string,
  k: number,
  columns: readonly string[],
  deps: SearchDeps
): Promise<RetrievedSegment[]> {
  const { index_name, embedding } = handle;
  const fields = validateSearch(k, columns);

  // 1. Index must exist
  let description: IndexDescription | null;
  try {
    description = await deps.index.describe(index_name);
  } catch (err) {
    throw err instanceof IndexUnavailableError
      ? err
      : new IndexUnavailableError(index_name, `Index ${index_name} unreachable: ${errorMessage(err)}`, err);
  }
  if (!description) {
    throw new IndexUnavailableError(index_name, `Index ${index_name} does not exist`);
  }
  if (description.synced_version === null) {
    throw new IndexUnavailableError(index_name, `Index ${index_name} has not been synced`);
  }
  if (description.embedding_model !== embedding.model) {
    throw new ConfigurationError(
      `Index ${index_name} embeds with ${description.embedding_model}, query would use ${embedding.model}`
    );
  }
  if (description.synced_version !== handle.generation) {
    console.warn(`[Search] ${index_name} is at version ${description.synced_version}, handle expects ${handle.generation}; results may be stale`);
  }

  // 2. Embed the query
  let vector: number[];
  try {
    vector = await embedding.embed(query);
  } catch (err) {
    throw new IndexUnavailableError(index_name, `Embedding query failed: ${errorMessage(err)}`, err);
  }

  // 3. Query
  let rows: IndexQueryRow[];
  try {
    rows = await deps.index.query(index_name, vector, k, fields);
  } catch (err) {
    throw err instanceof IndexUnavailableError
      ? err
      : new IndexUnavailableError(index_name, `Query against ${index_name} failed: ${errorMessage(err)}`, err);
  }

  const seen = new Set<number>();
  const results: RetrievedSegment[] = [];
  for (const row of [...rows].sort((a, b) => b.score - a.score || a.id - b.id)) {
    if (seen.has(row.id)) continue;
    seen.add(row.id);
    results.push(fields.includes('content') && row.content !== undefined
      ? { id: row.id, content: row.content, score: row.score }
      : { id: row.id, score: row.score });
  }

  return results.slice(0, k);
}
