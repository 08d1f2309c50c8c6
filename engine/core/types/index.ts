/**
 * Row Focus Engine - Core Type Definitions
 */

// ============================================================================
// Row Identity
// ============================================================================

/**
 * Window-local row identifier.
 * Only meaningful for the materialization that produced it.
 */
export type RowId = number;

/**
 * A fully resolved identity of one row at one point in time.
 *
 * Focus identity is compared by `key` only; `id` and `index` exist so a
 * stale reference can still be re-resolved after the window moves.
 */
export interface Triple<K> {
  key: K;
  id: RowId;
  /** Logical index within the whole (unmaterialized) collection */
  index: number;
}

/** Domain-level key equality */
export type KeyEqual<K> = (a: K, b: K) => boolean;

// ============================================================================
// Viewport Types
// ============================================================================

/**
 * Visible range of logical row indices. Both ends are inclusive.
 */
export interface VisibleRange {
  start: number;
  end: number;
}

export type ScrollAnchor = 'top' | 'bottom';

/**
 * Directive for the host viewport. Produced, never executed, by the engine.
 */
export interface ScrollIntent {
  /** Horizontal pixel to keep while scrolling (container midpoint) */
  x: number;
  /** Vertical pixel to bring to the anchor edge */
  y: number;
  anchor: ScrollAnchor;
  /** Logical index of the row being revealed */
  index: number;
}

// ============================================================================
// Diagnostics
// ============================================================================

/**
 * Sink for recoverable engine diagnostics. `console` satisfies it.
 */
export interface FocusLogger {
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_ROW_HEIGHT = 21;
export const HEADER_HEIGHT = 24;
/** Spacing between consecutive row ids handed out by RowCollator */
export const ROW_ID_STRIDE = 100;

export function defaultKeyEqual<K>(a: K, b: K): boolean {
  return Object.is(a, b);
}

export function isValidRange(range: VisibleRange): boolean {
  return (
    Number.isInteger(range.start) &&
    Number.isInteger(range.end) &&
    range.end >= range.start
  );
}
