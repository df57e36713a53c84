// RAG pipeline types: segments, capabilities, store and vector index contracts

// ============================================================================
// Segments
// ============================================================================

export interface Segment {
  id: number;
  content: string;
}

export type SegmentColumn = keyof Segment;

export const SEGMENT_COLUMNS: SegmentColumn[] = ['id', 'content'];

// ============================================================================
// Chunking
// ============================================================================

export interface ChunkingOptions {
  chunk_size: number;
  overlap: number;
}

// ============================================================================
// Capabilities (external services)
// ============================================================================

export interface EmbeddingCapability {
  /** Identifier of the embedding space; index and query must share it. */
  readonly model: string;
  embed(text: string): Promise<number[]>;
  embedBatch?(texts: string[]): Promise<number[][]>;
}

export interface GenerationParams {
  temperature?: number;
  max_tokens?: number;
}

export interface GenerationCapability {
  readonly model: string;
  generate(prompt: string, params: GenerationParams): Promise<string>;
}

// ============================================================================
// Tabular store
// ============================================================================

export type WriteMode = 'overwrite';

export interface StoreSnapshot {
  location: string;
  version: number;
  change_tracking: boolean;
  rows: Segment[];
}

export interface TabularStore {
  /** Replaces the location's rows in one change batch and returns the new version. */
  write(location: string, rows: Segment[], mode: WriteMode): Promise<number>;
  enableChangeTracking(location: string): Promise<void>;
  read(location: string): Promise<StoreSnapshot | null>;
}

// ============================================================================
// Vector index
// ============================================================================

export type IndexSyncMode = 'triggered';

export interface IndexDefinition {
  index_name: string;
  source_location: string;
  embedding_field: SegmentColumn;
  primary_key: SegmentColumn;
  sync_mode: IndexSyncMode;
  embedding: EmbeddingCapability;
}

export interface IndexDescription {
  index_name: string;
  source_location: string;
  embedding_field: SegmentColumn;
  primary_key: SegmentColumn;
  sync_mode: IndexSyncMode;
  embedding_model: string;
  synced_version: number | null;
  row_count: number;
  last_synced_at: string | null;
}

export interface IndexQueryRow {
  id: number;
  content?: string;
  score: number;
}

export interface VectorIndexClient {
  /** Fails if an index with the same name already exists. */
  create(definition: IndexDefinition): Promise<IndexDescription>;
  /** Resolves false when there was nothing to delete. */
  delete(indexName: string): Promise<boolean>;
  describe(indexName: string): Promise<IndexDescription | null>;
  /** Re-embeds the source location's current rows and swaps them in. */
  triggerSync(indexName: string, embedding: EmbeddingCapability): Promise<IndexDescription>;
  query(indexName: string, queryVector: number[], k: number, fields: SegmentColumn[]): Promise<IndexQueryRow[]>;
}

// ============================================================================
// Index lifecycle
// ============================================================================

export type IndexState = 'absent' | 'building' | 'ready' | 'stale';

export type IndexEvent =
  | 'sync_started'
  | 'sync_completed'
  | 'sync_failed'
  | 'store_changed'
  | 'index_deleted';

export interface IndexTarget {
  store_location: string;
  index_name: string;
  embedding: EmbeddingCapability;
}

export interface IndexHandle extends IndexTarget {
  /** Store version the index was synced from. */
  generation: number;
  state: IndexState;
}

export interface IndexStatus {
  index_name: string;
  state: IndexState;
  converged: boolean;
  synced_version: number | null;
  store_version: number | null;
  row_count: number;
  last_synced_at: string | null;
}

// ============================================================================
// Retrieval
// ============================================================================

export interface RetrievedSegment {
  id: number;
  content?: string;
  score: number;
}

export type RetrievalResult = RetrievedSegment[];
