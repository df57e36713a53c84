/**
 * Supabase-backed store and vector index.
 *
 * All operations go through RPC functions (supabase/migrations), so each
 * overwrite and each index swap commits in a single transaction.
 * Embeddings are sent as JSON strings and cast to pgvector server-side.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type {
  EmbeddingCapability,
  IndexDefinition,
  IndexDescription,
  IndexQueryRow,
  Segment,
  SegmentColumn,
  StoreSnapshot,
  TabularStore,
  VectorIndexClient,
  WriteMode,
} from '../../../types/rag.js';
import { ConfigurationError, IndexUnavailableError, errorMessage } from '../errors.js';
import { embedTexts } from '../embeddings.js';

// ============================================================================
// Row parsing
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toNumber(value: unknown, field: string): number {
  const n = typeof value === 'string' ? Number(value) : value;
  if (typeof n !== 'number' || Number.isNaN(n)) {
    throw new Error(`Unexpected ${field} in RPC response: ${JSON.stringify(value)}`);
  }
  return n;
}

function toColumn(value: unknown, field: string): SegmentColumn {
  if (value === 'id' || value === 'content') {
    return value;
  }
  throw new Error(`Unexpected ${field} in RPC response: ${JSON.stringify(value)}`);
}

function parseSegment(value: unknown): Segment {
  const content = isRecord(value) ? value.content : undefined;
  if (!isRecord(value) || typeof content !== 'string') {
    throw new Error(`Unexpected segment row: ${JSON.stringify(value)}`);
  }
  return { id: toNumber(value.id, 'id'), content };
}

function parseSnapshot(location: string, value: unknown): StoreSnapshot | null {
  if (value === null || value === undefined) {
    return null;
  }
  const rows: unknown = isRecord(value) ? value.rows : undefined;
  if (!isRecord(value) || !Array.isArray(rows)) {
    throw new Error(`Unexpected read_rag_segments response for ${location}`);
  }
  return {
    location,
    version: toNumber(value.version, 'version'),
    change_tracking: value.change_tracking === true,
    rows: rows.map(parseSegment),
  };
}

function parseDescription(value: unknown): IndexDescription | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (!isRecord(value)) {
    throw new Error(`Unexpected index description: ${JSON.stringify(value)}`);
  }
  const { index_name, source_location, sync_mode } = value;
  if (typeof index_name !== 'string' || typeof source_location !== 'string') {
    throw new Error(`Unexpected index description: ${JSON.stringify(value)}`);
  }
  if (sync_mode !== 'triggered') {
    throw new Error(`Unsupported sync mode: ${JSON.stringify(sync_mode)}`);
  }
  return {
    index_name,
    source_location,
    embedding_field: toColumn(value.embedding_field, 'embedding_field'),
    primary_key: toColumn(value.primary_key, 'primary_key'),
    sync_mode,
    embedding_model: String(value.embedding_model),
    synced_version: value.synced_version === null || value.synced_version === undefined
      ? null
      : toNumber(value.synced_version, 'synced_version'),
    row_count: toNumber(value.row_count ?? 0, 'row_count'),
    last_synced_at: typeof value.last_synced_at === 'string' ? value.last_synced_at : null,
  };
}

function parseMatch(value: unknown, includeContent: boolean): IndexQueryRow {
  if (!isRecord(value)) {
    throw new Error(`Unexpected match row: ${JSON.stringify(value)}`);
  }
  const id = toNumber(value.row_id, 'row_id');
  const score = toNumber(value.similarity, 'similarity');
  const content = value.content;
  return includeContent && typeof content === 'string'
    ? { id, content, score }
    : { id, score };
}

// ============================================================================
// Tabular store
// ============================================================================

export class SupabaseTabularStore implements TabularStore {
  constructor(private readonly client: SupabaseClient) {}

  async write(location: string, rows: Segment[], mode: WriteMode): Promise<number> {
    if (mode !== 'overwrite') {
      throw new ConfigurationError(`Unsupported write mode: ${mode}`);
    }

    const { data, error } = await this.client.rpc('replace_rag_segments', {
      p_location: location,
      p_rows: rows.map((r) => ({ id: r.id, content: r.content })),
    });

    if (error) {
      throw new Error(`Failed to write ${rows.length} rows to ${location}: ${error.message}`);
    }
    return toNumber(data, 'version');
  }

  async enableChangeTracking(location: string): Promise<void> {
    const { error } = await this.client.rpc('enable_rag_change_tracking', {
      p_location: location,
    });

    if (error) {
      throw new Error(`Failed to enable change tracking on ${location}: ${error.message}`);
    }
  }

  async read(location: string): Promise<StoreSnapshot | null> {
    const { data, error } = await this.client.rpc('read_rag_segments', {
      p_location: location,
    });

    if (error) {
      throw new Error(`Failed to read ${location}: ${error.message}`);
    }
    return parseSnapshot(location, data);
  }
}

// ============================================================================
// Vector index
// ============================================================================

export class SupabaseVectorIndex implements VectorIndexClient {
  constructor(
    private readonly client: SupabaseClient,
    private readonly store: TabularStore
  ) {}

  async create(definition: IndexDefinition): Promise<IndexDescription> {
    const { data, error } = await this.client.rpc('create_rag_index', {
      p_index_name: definition.index_name,
      p_source_location: definition.source_location,
      p_embedding_field: definition.embedding_field,
      p_primary_key: definition.primary_key,
      p_sync_mode: definition.sync_mode,
      p_embedding_model: definition.embedding.model,
    });

    if (error) {
      throw new IndexUnavailableError(
        definition.index_name,
        `Failed to create index ${definition.index_name}: ${error.message}`,
        error
      );
    }
    return this.requireDescription(definition.index_name, data);
  }

  async delete(indexName: string): Promise<boolean> {
    const { data, error } = await this.client.rpc('drop_rag_index', {
      p_index_name: indexName,
    });

    if (error) {
      throw new IndexUnavailableError(indexName, `Failed to delete index ${indexName}: ${error.message}`, error);
    }
    return data === true;
  }

  async describe(indexName: string): Promise<IndexDescription | null> {
    const { data, error } = await this.client.rpc('describe_rag_index', {
      p_index_name: indexName,
    });

    if (error) {
      throw new IndexUnavailableError(indexName, `Failed to describe index ${indexName}: ${error.message}`, error);
    }
    return parseDescription(data);
  }

  async triggerSync(indexName: string, embedding: EmbeddingCapability): Promise<IndexDescription> {
    const description = await this.describe(indexName);
    if (!description) {
      throw new IndexUnavailableError(indexName, `Index ${indexName} does not exist`);
    }
    if (embedding.model !== description.embedding_model) {
      throw new ConfigurationError(
        `Index ${indexName} embeds with ${description.embedding_model}, got ${embedding.model}`
      );
    }

    const snapshot = await this.store.read(description.source_location);
    if (!snapshot) {
      throw new IndexUnavailableError(indexName, `Source location ${description.source_location} is gone`);
    }

    let vectors: number[][];
    try {
      vectors = await embedTexts(
        embedding,
        snapshot.rows.map((row) => String(row[description.embedding_field]))
      );
    } catch (err) {
      throw new IndexUnavailableError(indexName, `Embedding failed during sync: ${errorMessage(err)}`, err);
    }

    const entries = snapshot.rows.map((row, i) => ({
      row_id: row[description.primary_key],
      content: row.content,
      embedding: JSON.stringify(vectors[i]),
    }));

    const { data, error } = await this.client.rpc('write_rag_index_entries', {
      p_index_name: indexName,
      p_source_version: snapshot.version,
      p_entries: entries,
    });

    if (error) {
      throw new IndexUnavailableError(indexName, `Failed to write index entries for ${indexName}: ${error.message}`, error);
    }

    console.log(`[IndexSync] Wrote ${entries.length} entries to ${indexName} (version ${snapshot.version})`);
    return this.requireDescription(indexName, data);
  }

  async query(
    indexName: string,
    queryVector: number[],
    k: number,
    fields: SegmentColumn[]
  ): Promise<IndexQueryRow[]> {
    const { data, error } = await this.client.rpc('match_rag_index_entries', {
      p_index_name: indexName,
      query_embedding: JSON.stringify(queryVector),
      match_count: k,
    });

    if (error) {
      throw new IndexUnavailableError(indexName, `Query against ${indexName} failed: ${error.message}`, error);
    }
    if (!Array.isArray(data)) {
      return [];
    }

    const includeContent = fields.includes('content');
    return data.map((row: unknown) => parseMatch(row, includeContent));
  }

  private requireDescription(indexName: string, data: unknown): IndexDescription {
    const description = parseDescription(data);
    if (!description) {
      throw new IndexUnavailableError(indexName, `Index ${indexName} does not exist`);
    }
    return description;
  }
}
