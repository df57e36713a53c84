import type { Segment } from '../../types/rag.js';
import { ConfigurationError } from './errors.js';

/**
 * Assign sequential ids 1..N in input order.
 */
export function assignIds(segments: readonly string[]): Segment[] {
  return segments.map((content, i) => ({ id: i + 1, content }));
}

/**
 * Reject a segment collection whose ids are not exactly 1..N in order
 */
export function assertContiguousIds(segments: readonly Segment[]): void {
  segments.forEach((segment, i) => {
    if (segment.id !== i + 1) {
      throw new ConfigurationError(
        `Segment ids must be contiguous from 1: expected ${i + 1} at position ${i}, got ${segment.id}`
      );
    }
  });
}
