import { describe, expect, it } from 'vitest';
import { createTestContext } from '../../__test-setup__.js';
import { ConfigurationError } from './errors.js';
import { ingestDocument } from './ingestion.js';
import { searchIndex } from './search.js';

describe('ingestDocument', () => {
  it('chunks, numbers, persists and indexes a document', async () => {
    const ctx = createTestContext();
    const target = { store_location: 'docs', index_name: 'docs_index', embedding: ctx.embedding };

    const { segments, handle } = await ingestDocument(
      { type: 'text', text: 'A.\n\nB.\n\nC.' },
      { chunk_size: 5, overlap: 0 },
      target,
      ctx
    );

    expect(segments).toBe(3);
    expect((await ctx.store.read('docs'))?.rows).toEqual([
      { id: 1, content: 'A.' },
      { id: 2, content: 'B.' },
      { id: 3, content: 'C.' },
    ]);
    expect(await searchIndex(handle, 'A', 1, ['id', 'content'], ctx)).toEqual([{ id: 1, content: 'A.', score: 1 }]);
  });

  it('indexes nothing for an empty document', async () => {
    const ctx = createTestContext();
    const target = { store_location: 'docs', index_name: 'docs_index', embedding: ctx.embedding };

    const { segments, handle } = await ingestDocument({ type: 'text', text: '' }, { chunk_size: 10, overlap: 0 }, target, ctx);

    expect(segments).toBe(0);
    expect(await searchIndex(handle, 'anything', 5, ['id'], ctx)).toEqual([]);
  });

  it('rejects invalid chunking before writing anything', async () => {
    const ctx = createTestContext();
    const target = { store_location: 'docs', index_name: 'docs_index', embedding: ctx.embedding };

    await expect(
      ingestDocument({ type: 'text', text: 'A.' }, { chunk_size: 5, overlap: 5 }, target, ctx)
    ).rejects.toBeInstanceOf(ConfigurationError);
    expect(await ctx.store.read('docs')).toBeNull();
  });
});
