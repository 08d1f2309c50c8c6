/**
 * Row Focus Engine
 *
 * Keyboard focus tracking for virtualized, filtered and sorted row lists:
 * - Three-way row identity (key, logical index, window-local id)
 * - Focus survives inserts, removals, re-sorts and re-filters
 * - Scroll intents for rows that left the visible range
 *
 * @example
 * ```typescript
 * import { RowCollator, createRowFocusManager } from 'row-focus-engine';
 *
 * const rows = new RowCollator<string, string>([
 *   ['k0', 'hello'],
 *   ['k1', 'there'],
 *   ['k4', 'world'],
 * ]);
 *
 * const focus = createRowFocusManager<string>({ rowHeight: 20, headerHeight: 30 });
 * focus.setView(rows.collate());
 * focus.setVisibleRange({ start: 0, end: 2 });
 *
 * focus.focusDown();
 * console.log(focus.visuallyFocusedKey); // "k0"
 * ```
 */

export * from './core/index.js';
