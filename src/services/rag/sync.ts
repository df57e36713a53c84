/**
 * Index Synchronization Service
 *
 * Full-overwrite pipeline: persist segments → enable change tracking →
 * drop any existing index → create a triggered-sync index → trigger sync.
 *
 * The store write is never rolled back: if indexing fails the segments stay
 * persisted, the half-built index is dropped and the caller retries syncIndex.
 */

import type {
  IndexDescription,
  IndexHandle,
  IndexStatus,
  IndexTarget,
  Segment,
  StoreSnapshot,
  TabularStore,
  VectorIndexClient,
} from '../../types/rag.js';
import { ConfigurationError, IndexUnavailableError, errorMessage } from './errors.js';
import { assertContiguousIds } from './identity.js';
import type { IndexLifecycle } from './index-state.js';

export interface SyncDeps {
  store: TabularStore;
  index: VectorIndexClient;
  lifecycle: IndexLifecycle;
}

/**
 * Wrap anything other than our own taxonomy as IndexUnavailableError
 */
function asIndexError(indexName: string, step: string, err: unknown): Error {
  if (err instanceof IndexUnavailableError || err instanceof ConfigurationError) {
    return err;
  }
  return new IndexUnavailableError(indexName, `${step} failed for ${indexName}: ${errorMessage(err)}`, err);
}

/**
 * Drop an index whose sync failed so nothing can query it.
 * The original failure is what the caller sees; a failed drop is only logged.
 */
async function dropFailedIndex(
  index: VectorIndexClient,
  indexName: string,
  lifecycle: IndexLifecycle
): Promise<void> {
  try {
    if (await index.delete(indexName)) {
      console.log(`[IndexSync] Dropped unsynced index ${indexName}`);
    }
    lifecycle.apply(indexName, 'index_deleted');
  } catch (err) {
    console.error(`[IndexSync] Could not drop unsynced index ${indexName}:`, errorMessage(err));
  }
}

async function inspect(
  indexName: string,
  storeLocation: string,
  deps: SyncDeps,
  step: string
): Promise<{ description: IndexDescription | null; snapshot: StoreSnapshot | null }> {
  try {
    const description = await deps.index.describe(indexName);
    const snapshot = await deps.store.read(storeLocation);
    return { description, snapshot };
  } catch (err) {
    throw asIndexError(indexName, step, err);
  }
}

/**
 * Persist segments and rebuild the vector index over them.
 *
 * 1. Overwrite the store location (one change batch)
 * 2. Enable change tracking on the location
 * 3. Delete the index if it exists, then recreate it (triggered sync mode)
 * 4. Trigger convergence and wait for it
 */
export async function syncIndex(
  segments: Segment[],
  target: IndexTarget,
  deps: SyncDeps
): Promise<IndexHandle> {
  const { store_location, index_name, embedding } = target;
  const { store, index, lifecycle } = deps;

  assertContiguousIds(segments);

  lifecycle.apply(index_name, 'sync_started');

  // 1. Persist rows (replaces the previous generation)
  let version: number;
  try {
    version = await store.write(store_location, segments, 'overwrite');
    await store.enableChangeTracking(store_location);
  } catch (err) {
    lifecycle.apply(index_name, 'sync_failed');
    throw err;
  }

  console.log(`[IndexSync] Persisted ${segments.length} segments to ${store_location} (version ${version})`);

  // 2. Drop and recreate the index, then converge it
  try {
    const existed = await index.delete(index_name);
    if (existed) {
      console.log(`[IndexSync] Deleted existing index ${index_name}`);
    }

    await index.create({
      index_name,
      source_location: store_location,
      embedding_field: 'content',
      primary_key: 'id',
      sync_mode: 'triggered',
      embedding,
    });

    const description = await index.triggerSync(index_name, embedding);
    const state = lifecycle.apply(index_name, 'sync_completed');

    console.log(`[IndexSync] Index ${index_name} ready with ${description.row_count} rows`);

    return {
      store_location,
      index_name,
      embedding,
      generation: description.synced_version ?? version,
      state,
    };
  } catch (err) {
    lifecycle.apply(index_name, 'sync_failed');
    console.error(`[IndexSync] Indexing failed for ${index_name}; ${segments.length} segments remain persisted:`, errorMessage(err));
    await dropFailedIndex(index, index_name, lifecycle);
    throw asIndexError(index_name, 'Index sync', err);
  }
}

/**
 * Manually re-converge an existing index with its store location.
 */
export async function triggerIndexSync(
  handle: IndexHandle,
  deps: Pick<SyncDeps, 'index' | 'lifecycle'>
): Promise<IndexHandle> {
  const { index, lifecycle } = deps;
  const { index_name, embedding } = handle;

  // A handle may outlive the process state that produced it
  if (lifecycle.get(index_name) === 'absent') {
    lifecycle.restore(index_name, 'stale');
  }
  lifecycle.apply(index_name, 'sync_started');

  try {
    const description = await index.triggerSync(index_name, embedding);
    const state = lifecycle.apply(index_name, 'sync_completed');
    return {
      ...handle,
      generation: description.synced_version ?? handle.generation,
      state,
    };
  } catch (err) {
    lifecycle.apply(index_name, 'sync_failed');
    throw asIndexError(index_name, 'Triggered sync', err);
  }
}

/**
 * Build a handle for an index that already exists (e.g. after a restart).
 */
export async function openIndexHandle(
  target: IndexTarget,
  deps: SyncDeps
): Promise<IndexHandle> {
  const { index_name, store_location, embedding } = target;
  const { description, snapshot } = await inspect(index_name, store_location, deps, 'Open index');

  if (!description) {
    throw new IndexUnavailableError(index_name, `Index ${index_name} does not exist`);
  }
  if (description.synced_version === null) {
    throw new IndexUnavailableError(index_name, `Index ${index_name} has not been synced`);
  }
  if (description.embedding_model !== embedding.model) {
    throw new ConfigurationError(
      `Index ${index_name} embeds with ${description.embedding_model}, configured ${embedding.model}`
    );
  }

  const converged = description.synced_version === snapshot?.version;
  const state = converged ? 'ready' : 'stale';

  // Never overrides a sync in progress; a ready index only moves on store_changed
  const current = deps.lifecycle.get(index_name);
  if (current === 'absent' || (current === 'stale' && converged)) {
    deps.lifecycle.restore(index_name, state);
  } else if (!converged && current === 'ready') {
    deps.lifecycle.apply(index_name, 'store_changed');
  }

  return {
    index_name,
    store_location,
    embedding,
    generation: description.synced_version,
    state,
  };
}

/**
 * Report whether the index has caught up with its store location.
 */
export async function getIndexStatus(
  handle: IndexHandle,
  deps: SyncDeps
): Promise<IndexStatus> {
  const { index_name, store_location } = handle;
  const { description, snapshot } = await inspect(index_name, store_location, deps, 'Index status');

  if (!description) {
    // Mid-sync the index is briefly gone between delete and create
    const current = deps.lifecycle.get(index_name);
    if (current !== 'absent' && current !== 'building') {
      deps.lifecycle.apply(index_name, 'index_deleted');
    }
    return {
      index_name,
      state: deps.lifecycle.get(index_name),
      converged: false,
      synced_version: null,
      store_version: snapshot?.version ?? null,
      row_count: 0,
      last_synced_at: null,
    };
  }

  const storeVersion = snapshot?.version ?? null;
  const converged = description.synced_version !== null && description.synced_version === storeVersion;

  const current = deps.lifecycle.get(index_name);
  if (current === 'absent') {
    deps.lifecycle.restore(index_name, converged ? 'ready' : 'stale');
  } else if (!converged && current === 'ready') {
    deps.lifecycle.apply(index_name, 'store_changed');
  }

  return {
    index_name,
    state: deps.lifecycle.get(index_name),
    converged,
    synced_version: description.synced_version,
    store_version: storeVersion,
    row_count: description.row_count,
    last_synced_at: description.last_synced_at,
  };
}
