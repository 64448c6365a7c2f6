import type { HistoryRow } from './types.js';

/**
 * Fixed-capacity, newest-first history backed by a ring buffer. Pushing at
 * the head is O(1); once full, each push overwrites the oldest row.
 */
export class HistoryStore {
  private slots: Array<HistoryRow | undefined>;
  private start = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<HistoryRow | undefined>(capacity).fill(undefined);
  }

  get size(): number {
    return this.count;
  }

  pushFront(row: HistoryRow): void {
    this.start = (this.start - 1 + this.capacity) % this.capacity;
    this.slots[this.start] = row;
    if (this.count < this.capacity) {
      this.count += 1;
    }
  }

  /** Newest first. */
  all(): HistoryRow[] {
    const out: HistoryRow[] = [];
    for (let i = 0; i < this.count; i += 1) {
      const row = this.slots[(this.start + i) % this.capacity];
      if (row) out.push(row);
    }
    return out;
  }

  /** Most recent row. */
  peek(): HistoryRow | undefined {
    return this.count > 0 ? this.slots[this.start] : undefined;
  }

  countWhere(predicate: (row: HistoryRow) => boolean): number {
    let matched = 0;
    for (let i = 0; i < this.count; i += 1) {
      const row = this.slots[(this.start + i) % this.capacity];
      if (row && predicate(row)) matched += 1;
    }
    return matched;
  }

  /** Replaces the contents with `rows` (newest first), keeping at most `capacity`. */
  replace(rows: readonly HistoryRow[]): void {
    this.slots.fill(undefined);
    this.start = 0;
    this.count = 0;
    const kept = rows.slice(0, this.capacity);
    for (let i = kept.length - 1; i >= 0; i -= 1) {
      const row = kept[i];
      if (row) this.pushFront(row);
    }
  }
}
