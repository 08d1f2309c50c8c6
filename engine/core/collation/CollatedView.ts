/**
 * Row Focus Engine - Collated View
 *
 * Read-only snapshot of the materialized window of a filtered/sorted
 * collection. The data source that pages the full collection owns the
 * snapshot; the focus engine only reads it.
 *
 * Logical index of a row = windowStart + rank of the row within `rows`.
 */

import type { RowId } from '../types/index.js';

// =============================================================================
// Types
// =============================================================================

export interface CollatedEntry<K, D> {
  readonly key: K;
  readonly data: D;
}

export interface CollatedView<K, D> {
  /** Rows of the collection before the window */
  readonly windowStart: number;
  /** Rows inside the window */
  readonly windowLength: number;
  /** Rows of the collection after the window */
  readonly rowsAfter: number;
  /** Window rows; iteration order is display order */
  readonly rows: ReadonlyMap<RowId, CollatedEntry<K, D>>;
}

export interface CollatedViewOptions {
  windowStart?: number;
  rowsAfter?: number;
}

// =============================================================================
// Factories
// =============================================================================

function assertCount(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`Invalid ${name}: ${value}`);
  }
}

/**
 * Build a snapshot from ordered `[rowId, key, data]` entries.
 */
export function createCollatedView<K, D>(
  entries: Iterable<readonly [RowId, K, D]>,
  options: CollatedViewOptions = {}
): CollatedView<K, D> {
  const windowStart = options.windowStart ?? 0;
  const rowsAfter = options.rowsAfter ?? 0;
  assertCount('windowStart', windowStart);
  assertCount('rowsAfter', rowsAfter);

  const rows = new Map<RowId, CollatedEntry<K, D>>();
  for (const [id, key, data] of entries) {
    if (rows.has(id)) {
      throw new Error(`Duplicate row id: ${id}`);
    }
    rows.set(id, Object.freeze({ key, data }));
  }

  return Object.freeze({
    windowStart,
    windowLength: rows.size,
    rowsAfter,
    rows,
  });
}

export function emptyCollatedView<K, D>(): CollatedView<K, D> {
  return createCollatedView<K, D>([]);
}

/** Total logical rows the snapshot knows about */
export function totalRows(view: CollatedView<unknown, unknown>): number {
  return view.windowStart + view.windowLength + view.rowsAfter;
}
