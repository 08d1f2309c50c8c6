/**
 * Row Focus Engine - Row Locator
 *
 * Pure lookups that find a row in a CollatedView by key, by logical index
 * or by window-local id, plus the composite resolver that reconciles a stale
 * identity against the visible range.
 *
 * A row can be referenced three ways and each goes stale independently:
 * - key: survives re-sorts and window moves
 * - index: survives as long as the data has not moved
 * - id: only valid within the materialization it came from
 *
 * findInRange tries them in exactly that order. Changing the order changes
 * which row wins when the three disagree after a mutation.
 *
 * Performance:
 * - findByKey / findById: O(window length)
 * - findByIndex: O(target - windowStart), stops once past the target
 */

import type { CollatedView } from '../collation/CollatedView.js';
import {
  defaultKeyEqual,
  isValidRange,
  type FocusLogger,
  type KeyEqual,
  type RowId,
  type Triple,
  type VisibleRange,
} from '../types/index.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Result of reconciling a stale identity against the visible range.
 */
export type RangeResponse<K> =
  | { kind: 'yes' }
  | { kind: 'noButThisOneIs'; triple: Triple<K> }
  | { kind: 'indeterminate' };

export interface FindInRangeParams<K> {
  range: VisibleRange;
  view: CollatedView<K, unknown>;
  key: K;
  id: RowId;
  index: number;
  keyEqual?: KeyEqual<K>;
  logger?: FocusLogger;
}

const YES: RangeResponse<never> = Object.freeze({ kind: 'yes' });
const INDETERMINATE: RangeResponse<never> = Object.freeze({ kind: 'indeterminate' });

// =============================================================================
// Lookups
// =============================================================================

/**
 * Half-open logical bounds `[start, end)` of the materialized window.
 */
export function windowBounds(view: CollatedView<unknown, unknown>): [number, number] {
  return [view.windowStart, view.windowStart + view.windowLength];
}

type RowVisitor<K> = (key: K, id: RowId, index: number) => 'match' | 'skip' | 'stop';

function findBy<K>(view: CollatedView<K, unknown>, visit: RowVisitor<K>): Triple<K> | null {
  let index = view.windowStart;
  for (const [id, entry] of view.rows) {
    const verdict = visit(entry.key, id, index);
    if (verdict === 'match') {
      return { key: entry.key, id, index };
    }
    if (verdict === 'stop') {
      return null;
    }
    index++;
  }
  return null;
}

/**
 * Find the row carrying `key`. Keys are unique across the collection, so the
 * first match is the only one.
 */
export function findByKey<K>(
  view: CollatedView<K, unknown>,
  key: K,
  keyEqual: KeyEqual<K> = defaultKeyEqual
): Triple<K> | null {
  return findBy(view, (candidate) => (keyEqual(candidate, key) ? 'match' : 'skip'));
}

/**
 * Find the row at a logical index, or null when it is outside the window.
 */
export function findByIndex<K>(
  view: CollatedView<K, unknown>,
  index: number
): Triple<K> | null {
  const [start, end] = windowBounds(view);
  if (!Number.isInteger(index) || index < start || index >= end) {
    return null;
  }
  return findBy(view, (_key, _id, at) => {
    if (at > index) return 'stop';
    return at === index ? 'match' : 'skip';
  });
}

/**
 * Find a row by its window-local id.
 */
export function findById<K>(view: CollatedView<K, unknown>, id: RowId): Triple<K> | null {
  const entry = view.rows.get(id);
  if (entry === undefined) return null;

  let rank = 0;
  for (const candidate of view.rows.keys()) {
    if (candidate === id) {
      return { key: entry.key, id, index: view.windowStart + rank };
    }
    rank++;
  }
  return null;
}

// =============================================================================
// Range Reconciliation
// =============================================================================

function clampIntoWindow(view: CollatedView<unknown, unknown>, index: number): number {
  const [start, end] = windowBounds(view);
  return Math.min(Math.max(index, start), end - 1);
}

function fetchOrFail<K>(
  view: CollatedView<K, unknown>,
  index: number,
  logger: FocusLogger
): RangeResponse<K> {
  const triple = findByIndex(view, clampIntoWindow(view, index));
  if (triple) {
    return { kind: 'noButThisOneIs', triple };
  }
  logger.warn('Row expected in window was not found', {
    index,
    windowStart: view.windowStart,
    windowLength: view.windowLength,
    rows: view.rows.size,
  });
  return INDETERMINATE;
}

/**
 * Decide whether a previously known row is inside the visible range, or which
 * boundary row should stand in for it.
 */
export function findInRange<K>(params: FindInRangeParams<K>): RangeResponse<K> {
  const { range, view, key, id, index } = params;
  const keyEqual = params.keyEqual ?? defaultKeyEqual;
  const logger = params.logger ?? console;

  if (!isValidRange(range)) {
    return INDETERMINATE;
  }

  const [windowStart, windowEnd] = windowBounds(view);
  if (view.windowLength === 0 || view.rows.size === 0) {
    return INDETERMINATE;
  }
  if (windowStart > range.end || windowEnd <= range.start) {
    return INDETERMINATE;
  }

  const resolved =
    findByKey(view, key, keyEqual) ?? findByIndex(view, index) ?? findById(view, id);

  if (resolved === null) {
    const fallback = findByIndex(view, range.start);
    return fallback ? { kind: 'noButThisOneIs', triple: fallback } : INDETERMINATE;
  }

  if (resolved.index < range.start) {
    return fetchOrFail(view, range.start, logger);
  }
  if (resolved.index > range.end) {
    return fetchOrFail(view, range.end, logger);
  }
  return YES;
}
