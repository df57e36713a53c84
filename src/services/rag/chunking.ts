/**
 * Content Chunking Service
 *
 * Splits text into overlapping segments of at most chunk_size characters.
 *
 * Separators are tried in priority order: paragraph breaks, line breaks,
 * word boundaries, then single characters. A region that cannot be split
 * by any separator is emitted oversized rather than rejected.
 */

import type { ChunkingOptions } from '../../types/rag.js';
import { ConfigurationError } from './errors.js';

const SEPARATORS = ['\n\n', '\n', ' ', ''];

export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_CHUNK_OVERLAP = 200;

export function validateChunkingOptions(options: ChunkingOptions): void {
  const { chunk_size, overlap } = options;

  if (!Number.isInteger(chunk_size) || chunk_size <= 0) {
    throw new ConfigurationError(`chunk_size must be a positive integer, got ${chunk_size}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ConfigurationError(`overlap must be a non-negative integer, got ${overlap}`);
  }
  if (overlap >= chunk_size) {
    throw new ConfigurationError(`overlap (${overlap}) must be smaller than chunk_size (${chunk_size})`);
  }
}

function joinPieces(pieces: string[], separator: string): string | null {
  const text = pieces.join(separator).trim();
  return text.length > 0 ? text : null;
}

/**
 * Greedily merge small pieces into segments, carrying up to `overlap`
 * characters of trailing pieces into the next segment.
 */
function mergePieces(pieces: string[], separator: string, options: ChunkingOptions): string[] {
  const { chunk_size, overlap } = options;
  const segments: string[] = [];
  let window: string[] = [];
  let total = 0;

  for (const piece of pieces) {
    const joinCost = window.length > 0 ? separator.length : 0;

    if (total + piece.length + joinCost > chunk_size && window.length > 0) {
      const segment = joinPieces(window, separator);
      if (segment !== null) {
        segments.push(segment);
      }

      // Keep only what fits in the overlap and still leaves room for this piece
      while (
        total > overlap ||
        (total > 0 && total + piece.length + (window.length > 0 ? separator.length : 0) > chunk_size)
      ) {
        total -= window[0].length + (window.length > 1 ? separator.length : 0);
        window = window.slice(1);
      }
    }

    window.push(piece);
    total += piece.length + (window.length > 1 ? separator.length : 0);
  }

  const last = joinPieces(window, separator);
  if (last !== null) {
    segments.push(last);
  }

  return segments;
}

function splitRecursive(text: string, separators: string[], options: ChunkingOptions): string[] {
  let separator = '';
  let remaining: string[] = [];

  for (let i = 0; i < separators.length; i++) {
    const candidate = separators[i];
    if (candidate === '' || text.includes(candidate)) {
      separator = candidate;
      remaining = separators.slice(i + 1);
      break;
    }
  }

  // Array.from keeps surrogate pairs together on the character split
  const pieces = (separator === '' ? Array.from(text) : text.split(separator))
    .filter((p) => p.length > 0);

  const segments: string[] = [];
  let fitting: string[] = [];

  for (const piece of pieces) {
    if (piece.length <= options.chunk_size) {
      fitting.push(piece);
      continue;
    }

    if (fitting.length > 0) {
      segments.push(...mergePieces(fitting, separator, options));
      fitting = [];
    }

    if (remaining.length === 0) {
      const oversized = piece.trim();
      if (oversized) {
        segments.push(oversized);
      }
    } else {
      segments.push(...splitRecursive(piece, remaining, options));
    }
  }

  if (fitting.length > 0) {
    segments.push(...mergePieces(fitting, separator, options));
  }

  return segments;
}

/**
 * Chunk text into ordered, overlapping segments.
 *
 * Pure: the same (text, chunk_size, overlap) always yields the same output.
 */
export function chunkText(text: string, options: ChunkingOptions): string[] {
  validateChunkingOptions(options);

  if (!text || text.trim().length === 0) {
    return [];
  }

  return splitRecursive(text, SEPARATORS, options);
}
