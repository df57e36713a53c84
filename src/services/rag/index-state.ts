/**
 * Index Lifecycle
 *
 * absent ──sync_started──▶ building ──sync_completed──▶ ready
 *                             │                           │
 *                        sync_failed                store_changed
 *                             ▼                           ▼
 *                           stale ◀───────────────────────┘
 *
 * ready and stale go back to building on the next sync_started;
 * index_deleted returns any state to absent.
 */

import type { IndexEvent, IndexState } from '../../types/rag.js';

const TRANSITIONS: Record<IndexState, Partial<Record<IndexEvent, IndexState>>> = {
  absent: { sync_started: 'building', index_deleted: 'absent' },
  building: { sync_completed: 'ready', sync_failed: 'stale', index_deleted: 'absent' },
  ready: { sync_started: 'building', store_changed: 'stale', index_deleted: 'absent' },
  stale: { sync_started: 'building', store_changed: 'stale', index_deleted: 'absent' },
};

export function transitionIndexState(state: IndexState, event: IndexEvent): IndexState {
  const next = TRANSITIONS[state][event];
  if (next === undefined) {
    throw new Error(`Illegal index transition: ${event} while ${state}`);
  }
  return next;
}

/**
 * Tracks lifecycle state per index name for one pipeline context.
 */
export class IndexLifecycle {
  private states = new Map<string, IndexState>();

  get(indexName: string): IndexState {
    return this.states.get(indexName) ?? 'absent';
  }

  apply(indexName: string, event: IndexEvent): IndexState {
    const from = this.get(indexName);
    const to = transitionIndexState(from, event);
    this.states.set(indexName, to);
    if (from !== to) {
      console.log(`[IndexSync] ${indexName}: ${from} -> ${to} (${event})`);
    }
    return to;
  }

  /**
   * Adopt a state observed on the backing index (e.g. after a restart)
   */
  restore(indexName: string, state: IndexState): void {
    this.states.set(indexName, state);
  }
}
