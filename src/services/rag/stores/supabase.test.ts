import { describe, expect, it } from 'vitest';
import { jsonResponse, letterEmbedder } from '../../../__test-setup__.js';
import { createServiceClient } from '../../../utils/supabase.js';
import { IndexUnavailableError } from '../errors.js';
import { SupabaseTabularStore, SupabaseVectorIndex } from './supabase.js';

interface RpcCall {
  fn: string;
  args: unknown;
}

type RpcReply = { status?: number; body: unknown };

/**
 * A Supabase client whose fetch answers RPC calls from `replies`
 * and records every call made.
 */
function stubClient(replies: Record<string, RpcReply>) {
  const calls: RpcCall[] = [];

  const fetchImpl = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const match = /\/rest\/v1\/rpc\/([a-z_]+)/.exec(String(input));
    if (!match) {
      return jsonResponse({ message: `Unexpected request ${String(input)}` }, 404);
    }
    const fn = match[1];
    calls.push({ fn, args: JSON.parse(String(init?.body)) });

    const reply = replies[fn];
    if (!reply) {
      return jsonResponse({ message: `No stub for ${fn}` }, 404);
    }
    return jsonResponse(reply.body, reply.status ?? 200);
  };

  const client = createServiceClient('http://localhost:54321', 'test-key', fetchImpl);
  return { client, calls };
}

const DESCRIPTION_ROW = {
  index_name: 'docs_index',
  source_location: 'docs',
  embedding_field: 'content',
  primary_key: 'id',
  sync_mode: 'triggered',
  embedding_model: 'test-letters',
  synced_version: null,
  row_count: 0,
  last_synced_at: null,
};

function letterVector(letter: string): number[] {
  const vector = new Array<number>(26).fill(0);
  vector[letter.charCodeAt(0) - 97] = 1;
  return vector;
}

describe('SupabaseTabularStore', () => {
  it('overwrites a location and returns the new version', async () => {
    const { client, calls } = stubClient({ replace_rag_segments: { body: 3 } });
    const store = new SupabaseTabularStore(client);

    const version = await store.write('docs', [{ id: 1, content: 'A.' }, { id: 2, content: 'B.' }], 'overwrite');

    expect(version).toBe(3);
    expect(calls).toEqual([{
      fn: 'replace_rag_segments',
      args: { p_location: 'docs', p_rows: [{ id: 1, content: 'A.' }, { id: 2, content: 'B.' }] },
    }]);
  });

  it('reports write failures', async () => {
    const { client } = stubClient({
      replace_rag_segments: { status: 400, body: { message: 'duplicate key value', code: '23505' } },
    });

    await expect(new SupabaseTabularStore(client).write('docs', [{ id: 1, content: 'A.' }], 'overwrite'))
      .rejects.toThrow('Failed to write 1 rows to docs: duplicate key value');
  });

  it('enables change tracking', async () => {
    const { client, calls } = stubClient({ enable_rag_change_tracking: { body: null } });

    await new SupabaseTabularStore(client).enableChangeTracking('docs');

    expect(calls).toEqual([{ fn: 'enable_rag_change_tracking', args: { p_location: 'docs' } }]);
  });

  it('reads a snapshot', async () => {
    const { client } = stubClient({
      read_rag_segments: {
        body: { version: '2', change_tracking: true, rows: [{ id: 1, content: 'A.' }] },
      },
    });

    expect(await new SupabaseTabularStore(client).read('docs')).toEqual({
      location: 'docs',
      version: 2,
      change_tracking: true,
      rows: [{ id: 1, content: 'A.' }],
    });
  });

  it('reads null for an unknown location', async () => {
    const { client } = stubClient({ read_rag_segments: { body: null } });
    expect(await new SupabaseTabularStore(client).read('missing')).toBeNull();
  });
});

describe('SupabaseVectorIndex', () => {
  it('creates an index from its definition', async () => {
    const { client, calls } = stubClient({ create_rag_index: { body: DESCRIPTION_ROW } });
    const index = new SupabaseVectorIndex(client, new SupabaseTabularStore(client));

    const description = await index.create({
      index_name: 'docs_index',
      source_location: 'docs',
      embedding_field: 'content',
      primary_key: 'id',
      sync_mode: 'triggered',
      embedding: letterEmbedder(),
    });

    expect(description).toEqual(DESCRIPTION_ROW);
    expect(calls[0].args).toEqual({
      p_index_name: 'docs_index',
      p_source_location: 'docs',
      p_embedding_field: 'content',
      p_primary_key: 'id',
      p_sync_mode: 'triggered',
      p_embedding_model: 'test-letters',
    });
  });

  it('reports whether a delete removed anything', async () => {
    const { client } = stubClient({ drop_rag_index: { body: false } });
    const index = new SupabaseVectorIndex(client, new SupabaseTabularStore(client));

    expect(await index.delete('docs_index')).toBe(false);
  });

  it('describes a missing index as null', async () => {
    const { client } = stubClient({ describe_rag_index: { body: null } });
    const index = new SupabaseVectorIndex(client, new SupabaseTabularStore(client));

    expect(await index.describe('docs_index')).toBeNull();
  });

  it('wraps RPC failures in IndexUnavailableError', async () => {
    const { client } = stubClient({ describe_rag_index: { status: 500, body: { message: 'connection refused' } } });
    const index = new SupabaseVectorIndex(client, new SupabaseTabularStore(client));

    const err = await index.describe('docs_index').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(IndexUnavailableError);
    expect(err).toMatchObject({ message: 'Failed to describe index docs_index: connection refused' });
  });

  it('embeds the current store rows on sync', async () => {
    const { client, calls } = stubClient({
      describe_rag_index: { body: DESCRIPTION_ROW },
      read_rag_segments: {
        body: { version: 4, change_tracking: true, rows: [{ id: 1, content: 'a' }, { id: 2, content: 'b' }] },
      },
      write_rag_index_entries: {
        body: { ...DESCRIPTION_ROW, synced_version: 4, row_count: 2, last_synced_at: '2026-01-01T00:00:00Z' },
      },
    });
    const index = new SupabaseVectorIndex(client, new SupabaseTabularStore(client));

    const description = await index.triggerSync('docs_index', letterEmbedder());

    expect(description).toMatchObject({ synced_version: 4, row_count: 2 });
    expect(calls.map((c) => c.fn)).toEqual(['describe_rag_index', 'read_rag_segments', 'write_rag_index_entries']);
    expect(calls[2].args).toEqual({
      p_index_name: 'docs_index',
      p_source_version: 4,
      p_entries: [
        { row_id: 1, content: 'a', embedding: JSON.stringify(letterVector('a')) },
        { row_id: 2, content: 'b', embedding: JSON.stringify(letterVector('b')) },
      ],
    });
  });

  it('refuses to sync with a different embedding model', async () => {
    const { client, calls } = stubClient({ describe_rag_index: { body: DESCRIPTION_ROW } });
    const index = new SupabaseVectorIndex(client, new SupabaseTabularStore(client));

    await expect(index.triggerSync('docs_index', letterEmbedder('other-model'))).rejects.toThrow(
      'Index docs_index embeds with test-letters, got other-model'
    );
    expect(calls).toHaveLength(1);
  });

  it('queries with a serialized vector and maps match rows', async () => {
    const { client, calls } = stubClient({
      match_rag_index_entries: {
        body: [
          { row_id: 2, content: 'B.', similarity: 0.75 },
          { row_id: 1, content: 'A.', similarity: 0.5 },
        ],
      },
    });
    const index = new SupabaseVectorIndex(client, new SupabaseTabularStore(client));

    const rows = await index.query('docs_index', [0.1, 0.2], 2, ['id']);

    expect(rows).toEqual([{ id: 2, score: 0.75 }, { id: 1, score: 0.5 }]);
    expect(calls[0].args).toEqual({ p_index_name: 'docs_index', query_embedding: '[0.1,0.2]', match_count: 2 });
  });
});
