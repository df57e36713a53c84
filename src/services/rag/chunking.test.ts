import { describe, expect, it } from 'vitest';
import { chunkText, validateChunkingOptions } from './chunking.js';
import { ConfigurationError } from './errors.js';

const stripWhitespace = (s: string) => s.replace(/\s+/g, '');

const WORDS = ['river', 'stone', 'lantern', 'orbit', 'maple', 'signal', 'harbor', 'quartz', 'meadow', 'cipher'];

/** Deterministic multi-paragraph text with some long lines. */
function sampleText(): string {
  const paragraphs: string[] = [];
  for (let p = 0; p < 6; p++) {
    const lines: string[] = [];
    for (let l = 0; l < 3; l++) {
      const words: string[] = [];
      for (let w = 0; w < 7 + p; w++) {
        words.push(WORDS[(p * 7 + l * 3 + w) % WORDS.length]);
      }
      lines.push(words.join(' '));
    }
    paragraphs.push(lines.join('\n'));
  }
  return paragraphs.join('\n\n');
}

describe('chunkText', () => {
  it('splits short paragraphs into one segment each', () => {
    expect(chunkText('A.\n\nB.\n\nC.', { chunk_size: 5, overlap: 0 })).toEqual(['A.', 'B.', 'C.']);
  });

  it('returns an empty sequence for empty input', () => {
    expect(chunkText('', { chunk_size: 10, overlap: 0 })).toEqual([]);
    expect(chunkText('  \n\n \n', { chunk_size: 10, overlap: 0 })).toEqual([]);
  });

  it('keeps text that fits in one segment whole', () => {
    expect(chunkText('short text', { chunk_size: 50, overlap: 10 })).toEqual(['short text']);
  });

  it('merges words up to chunk_size', () => {
    expect(chunkText('one two three four five', { chunk_size: 10, overlap: 0 }))
      .toEqual(['one two', 'three four', 'five']);
  });

  it('carries trailing words into the next segment as overlap', () => {
    expect(chunkText('one two three four five', { chunk_size: 10, overlap: 4 }))
      .toEqual(['one two', 'two three', 'four five']);
  });

  it('falls back to character boundaries when no whitespace exists', () => {
    expect(chunkText('abcdefgh', { chunk_size: 5, overlap: 0 })).toEqual(['abcde', 'fgh']);
  });

  it('splits an oversized paragraph on word boundaries', () => {
    expect(chunkText('Hello world\n\nfoo', { chunk_size: 8, overlap: 0 })).toEqual(['Hello', 'world', 'foo']);
  });

  it('emits an oversized segment for a character it cannot split', () => {
    expect(chunkText('😀', { chunk_size: 1, overlap: 0 })).toEqual(['😀']);
  });

  it('is deterministic', () => {
    const text = sampleText();
    const options = { chunk_size: 40, overlap: 10 };
    expect(chunkText(text, options)).toEqual(chunkText(text, options));
  });

  it.each([8, 20, 45, 120, 1000])('reconstructs the text without overlap (chunk_size=%i)', (chunk_size) => {
    const text = sampleText();
    const segments = chunkText(text, { chunk_size, overlap: 0 });

    expect(stripWhitespace(segments.join(''))).toBe(stripWhitespace(text));
    for (const segment of segments) {
      expect(segment.length).toBeLessThanOrEqual(chunk_size);
    }
  });

  it('keeps every segment in document order when overlapping', () => {
    const text = sampleText();
    const flat = stripWhitespace(text);
    const segments = chunkText(text, { chunk_size: 40, overlap: 15 });

    let cursor = 0;
    for (const segment of segments) {
      expect(segment.length).toBeLessThanOrEqual(40);
      const at = flat.indexOf(stripWhitespace(segment), Math.max(0, cursor - 15));
      expect(at).toBeGreaterThanOrEqual(0);
      cursor = at + stripWhitespace(segment).length;
    }
    expect(cursor).toBe(flat.length);
    expect(flat.startsWith(stripWhitespace(segments[0]))).toBe(true);
  });

  it('shares content between consecutive segments when overlapping', () => {
    const segments = chunkText('alpha beta gamma delta epsilon zeta', { chunk_size: 16, overlap: 6 });
    expect(segments).toEqual(['alpha beta gamma', 'gamma delta', 'delta epsilon', 'zeta']);
  });
});

describe('validateChunkingOptions', () => {
  it.each([
    [{ chunk_size: 0, overlap: 0 }],
    [{ chunk_size: -5, overlap: 0 }],
    [{ chunk_size: 10, overlap: 10 }],
    [{ chunk_size: 10, overlap: 12 }],
    [{ chunk_size: 10, overlap: -1 }],
    [{ chunk_size: 2.5, overlap: 0 }],
  ])('rejects %j', (options) => {
    expect(() => validateChunkingOptions(options)).toThrow(ConfigurationError);
    expect(() => chunkText('text', options)).toThrow(ConfigurationError);
  });

  it('accepts overlap just below chunk_size', () => {
    expect(() => validateChunkingOptions({ chunk_size: 10, overlap: 9 })).not.toThrow();
  });
});
