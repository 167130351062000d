/**
 * History Buffer
 *
 * Bounded, ordered log of conversation turns. When an append pushes the
 * buffer over capacity, the oldest non-pinned turns are dropped first.
 * The optional pinned system turn stays at index 0 and counts toward
 * capacity.
 *
 * The most recent user turn is never evicted: it is the request the model
 * is still answering. Once everything older is gone, the oldest tool
 * result after it goes next, then the oldest turn of any kind after it.
 *
 * The buffer is deliberately lossy and lives only in memory. Facts that
 * must survive belong in the store.
 */

import type { Turn } from './types.js';

export const DEFAULT_HISTORY_CAPACITY = 20;

export interface HistoryBufferOptions {
  /** Maximum number of turns, pinned turn included */
  capacity?: number;
  /** Instruction text kept as a system turn at index 0 */
  pinnedInstruction?: string;
}

export class HistoryBuffer {
  readonly capacity: number;
  private readonly pinned: Turn | null;
  private turns: Turn[] = [];

  constructor(options: HistoryBufferOptions = {}) {
    const capacity = options.capacity ?? DEFAULT_HISTORY_CAPACITY;
    if (options.pinnedInstruction !== undefined) {
      const pinned: Turn = { role: 'system', content: options.pinnedInstruction, toolName: null };
      this.pinned = Object.freeze(pinned);
    } else {
      this.pinned = null;
    }

    const minimum = this.pinned ? 2 : 1;
    if (!Number.isInteger(capacity) || capacity < minimum) {
      throw new RangeError(`History capacity must be an integer >= ${minimum}, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  /** Number of turns held, pinned turn included. */
  get size(): number {
    return this.turns.length + (this.pinned ? 1 : 0);
  }

  /**
   * Add a turn at the end, then evict until the buffer fits its capacity.
   */
  append(turn: Turn): void {
    if (turn.role === 'system') {
      throw new Error('System turns can only be pinned at construction');
    }
    this.turns.push(Object.freeze({ ...turn }));

    const room = this.capacity - (this.pinned ? 1 : 0);
    while (this.turns.length > room) {
      this.turns.splice(this.evictionIndex(), 1);
    }
  }

  private evictionIndex(): number {
    let latestUser = -1;
    for (let i = this.turns.length - 1; i >= 0; i--) {
      if (this.turns[i].role === 'user') {
        latestUser = i;
        break;
      }
    }
    if (latestUser !== 0) return 0;

    const oldestResult = this.turns.findIndex((turn) => turn.role === 'tool');
    return oldestResult > 0 ? oldestResult : 1;
  }

  /**
   * Read-only view in insertion order, pinned turn first.
   */
  snapshot(): readonly Turn[] {
    return Object.freeze(this.pinned ? [this.pinned, ...this.turns] : [...this.turns]);
  }

  /** Drop every non-pinned turn. */
  clear(): void {
    this.turns = [];
  }
}
