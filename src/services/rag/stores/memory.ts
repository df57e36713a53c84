/**
 * In-process store and vector index.
 *
 * Same contracts as the Supabase implementations: overwrite writes bump the
 * location version once, the index only moves when triggerSync is called,
 * and a sync swaps the whole entry set in one assignment.
 */

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
import { cosineSimilarity, embedTexts } from '../embeddings.js';

interface StoredLocation {
  version: number;
  change_tracking: boolean;
  rows: Segment[];
}

export class InMemoryTabularStore implements TabularStore {
  private locations = new Map<string, StoredLocation>();

  async write(location: string, rows: Segment[], mode: WriteMode): Promise<number> {
    if (mode !== 'overwrite') {
      throw new ConfigurationError(`Unsupported write mode: ${mode}`);
    }

    const seen = new Set<number>();
    for (const row of rows) {
      if (seen.has(row.id)) {
        throw new Error(`Duplicate primary key ${row.id} for ${location}`);
      }
      seen.add(row.id);
    }

    const previous = this.locations.get(location);
    const version = (previous?.version ?? 0) + 1;
    this.locations.set(location, {
      version,
      change_tracking: previous?.change_tracking ?? false,
      rows: rows.map((r) => ({ id: r.id, content: r.content })),
    });
    return version;
  }

  async enableChangeTracking(location: string): Promise<void> {
    const existing = this.locations.get(location);
    this.locations.set(location, {
      version: existing?.version ?? 0,
      rows: existing?.rows ?? [],
      change_tracking: true,
    });
  }

  async read(location: string): Promise<StoreSnapshot | null> {
    const stored = this.locations.get(location);
    if (!stored) {
      return null;
    }
    return {
      location,
      version: stored.version,
      change_tracking: stored.change_tracking,
      rows: stored.rows.map((r) => ({ ...r })),
    };
  }
}

interface IndexEntry {
  id: number;
  content: string;
  embedding: number[];
}

interface StoredIndex {
  description: IndexDescription;
  entries: IndexEntry[];
}

export class InMemoryVectorIndex implements VectorIndexClient {
  private indexes = new Map<string, StoredIndex>();

  constructor(private readonly store: TabularStore) {}

  async create(definition: IndexDefinition): Promise<IndexDescription> {
    const { index_name, source_location } = definition;

    if (this.indexes.has(index_name)) {
      throw new Error(`Index ${index_name} already exists`);
    }

    const source = await this.store.read(source_location);
    if (!source) {
      throw new ConfigurationError(`Source location ${source_location} does not exist`);
    }
    if (!source.change_tracking) {
      throw new ConfigurationError(`Change tracking is not enabled on ${source_location}`);
    }

    const description: IndexDescription = {
      index_name,
      source_location,
      embedding_field: definition.embedding_field,
      primary_key: definition.primary_key,
      sync_mode: definition.sync_mode,
      embedding_model: definition.embedding.model,
      synced_version: null,
      row_count: 0,
      last_synced_at: null,
    };
    this.indexes.set(index_name, { description, entries: [] });
    return { ...description };
  }

  async delete(indexName: string): Promise<boolean> {
    return this.indexes.delete(indexName);
  }

  async describe(indexName: string): Promise<IndexDescription | null> {
    const stored = this.indexes.get(indexName);
    return stored ? { ...stored.description } : null;
  }

  async triggerSync(indexName: string, embedding: EmbeddingCapability): Promise<IndexDescription> {
    const stored = this.requireIndex(indexName);
    const { description } = stored;

    if (embedding.model !== description.embedding_model) {
      throw new ConfigurationError(
        `Index ${indexName} embeds with ${description.embedding_model}, got ${embedding.model}`
      );
    }

    const snapshot = await this.store.read(description.source_location);
    if (!snapshot) {
      throw new IndexUnavailableError(indexName, `Source location ${description.source_location} is gone`);
    }

    const keys = snapshot.rows.map((row) => row[description.primary_key]);
    const texts = snapshot.rows.map((row) => String(row[description.embedding_field]));

    let vectors: number[][];
    try {
      vectors = await embedTexts(embedding, texts);
    } catch (err) {
      throw new IndexUnavailableError(indexName, `Embedding failed during sync: ${errorMessage(err)}`, err);
    }

    const entries: IndexEntry[] = snapshot.rows.map((row, i) => ({
      id: Number(keys[i]),
      content: row.content,
      embedding: vectors[i],
    }));

    const synced: IndexDescription = {
      ...description,
      synced_version: snapshot.version,
      row_count: entries.length,
      last_synced_at: new Date().toISOString(),
    };

    // The index may have been deleted while embedding
    if (this.indexes.get(indexName) !== stored) {
      throw new IndexUnavailableError(indexName, `Index ${indexName} was dropped during sync`);
    }
    this.indexes.set(indexName, { description: synced, entries });
    return { ...synced };
  }

  async query(
    indexName: string,
    queryVector: number[],
    k: number,
    fields: SegmentColumn[]
  ): Promise<IndexQueryRow[]> {
    const { entries } = this.requireIndex(indexName);
    const includeContent = fields.includes('content');

    return entries
      .map((entry) => ({ entry, score: cosineSimilarity(queryVector, entry.embedding) }))
      .sort((a, b) => b.score - a.score || a.entry.id - b.entry.id)
      .slice(0, k)
      .map(({ entry, score }) => (includeContent
        ? { id: entry.id, content: entry.content, score }
        : { id: entry.id, score }));
  }

  private requireIndex(indexName: string): StoredIndex {
    const stored = this.indexes.get(indexName);
    if (!stored) {
      throw new IndexUnavailableError(indexName, `Index ${indexName} does not exist`);
    }
    return stored;
  }
}
