/**
 * Row Focus Engine - Row Collator
 *
 * In-memory data source that filters, sorts and pages a keyed collection
 * into CollatedView snapshots.
 *
 * Design:
 * - Deterministic: same inputs produce the same snapshot
 * - Stable: rows that compare equal keep insertion order
 * - Row ids are assigned per key and survive re-sorts and re-filters for as
 *   long as the key stays in the collection
 */

import { ROW_ID_STRIDE, type RowId } from '../types/index.js';
import { createCollatedView, type CollatedView } from './CollatedView.js';

// =============================================================================
// Types
// =============================================================================

export type RowPredicate<K, D> = (key: K, data: D) => boolean;

export type RowComparator<K, D> = (
  a: { key: K; data: D },
  b: { key: K; data: D }
) => number;

export interface RowWindow {
  /** First logical index to materialize */
  start: number;
  /** Maximum number of rows to materialize */
  length: number;
}

const DEFAULT_WINDOW: RowWindow = { start: 0, length: Number.MAX_SAFE_INTEGER };

// =============================================================================
// RowCollator
// =============================================================================

export class RowCollator<K, D> {
  private readonly source = new Map<K, D>();
  private readonly ids = new Map<K, RowId>();
  private nextId: RowId = 0;

  private filter: RowPredicate<K, D> | null = null;
  private comparator: RowComparator<K, D> | null = null;
  private window: RowWindow = DEFAULT_WINDOW;

  constructor(entries: Iterable<readonly [K, D]> = []) {
    for (const [key, data] of entries) {
      this.set(key, data);
    }
  }

  // ===========================================================================
  // Mutation
  // ===========================================================================

  set(key: K, data: D): void {
    if (!this.ids.has(key)) {
      this.ids.set(key, this.nextId);
      this.nextId += ROW_ID_STRIDE;
    }
    this.source.set(key, data);
  }

  remove(key: K): boolean {
    this.ids.delete(key);
    return this.source.delete(key);
  }

  has(key: K): boolean {
    return this.source.has(key);
  }

  get(key: K): D | undefined {
    return this.source.get(key);
  }

  clear(): void {
    this.source.clear();
    this.ids.clear();
    this.nextId = 0;
  }

  get size(): number {
    return this.source.size;
  }

  // ===========================================================================
  // View Configuration
  // ===========================================================================

  setFilter(filter: RowPredicate<K, D> | null): void {
    this.filter = filter;
  }

  setComparator(comparator: RowComparator<K, D> | null): void {
    this.comparator = comparator;
  }

  setWindow(start: number, length: number): void {
    if (!Number.isInteger(start) || start < 0) {
      throw new Error(`Invalid window start: ${start}`);
    }
    if (!Number.isInteger(length) || length < 0) {
      throw new Error(`Invalid window length: ${length}`);
    }
    this.window = { start, length };
  }

  getWindow(): Readonly<RowWindow> {
    return this.window;
  }

  // ===========================================================================
  // Collation
  // ===========================================================================

  /**
   * Number of rows that pass the current filter.
   */
  getTotalRows(): number {
    return this.ordered().length;
  }

  /**
   * Materialize the current window.
   * O(n log n) for the sort; the result is an immutable snapshot.
   */
  collate(): CollatedView<K, D> {
    const ordered = this.ordered();
    const start = Math.min(this.window.start, ordered.length);
    const end = Math.min(ordered.length, start + this.window.length);

    const entries: Array<readonly [RowId, K, D]> = [];
    for (let i = start; i < end; i++) {
      const row = ordered[i];
      if (row === undefined) break;
      entries.push([row.id, row.key, row.data]);
    }

    return createCollatedView(entries, {
      windowStart: start,
      rowsAfter: ordered.length - end,
    });
  }

  private ordered(): Array<{ id: RowId; key: K; data: D }> {
    const rows: Array<{ id: RowId; key: K; data: D }> = [];
    const filter = this.filter;

    for (const [key, data] of this.source) {
      if (filter && !filter(key, data)) continue;
      const id = this.ids.get(key);
      if (id === undefined) continue;
      rows.push({ id, key, data });
    }

    const comparator = this.comparator;
    if (comparator) {
      // Array.prototype.sort is stable since ES2019
      rows.sort((a, b) => comparator(a, b));
    }

    return rows;
  }
}

export function createRowCollator<K, D>(
  entries?: Iterable<readonly [K, D]>
): RowCollator<K, D> {
  return new RowCollator(entries);
}
