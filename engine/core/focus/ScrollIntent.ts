/**
 * Row Focus Engine - Scroll Intent Emitter
 *
 * Turns a resolved row into a "scroll this pixel to that edge" directive for
 * the host viewport. Intents are idempotent; reissuing one is harmless.
 */

import type { ScrollAnchor, ScrollIntent, Triple, VisibleRange } from '../types/index.js';

export interface ScrollIntentParams {
  range: VisibleRange;
  rowHeight: number;
  headerHeight: number;
  midpointOfContainer: number;
  /** Edge to anchor to regardless of visibility (page navigation) */
  force?: ScrollAnchor | null;
}

/**
 * Compute the scroll needed to reveal `triple`, or null if it is already
 * fully visible.
 *
 * - top: the row's top lands just below the header
 * - bottom: a one-pixel target just below the row lands on the bottom edge
 */
export function computeScrollIntent(
  triple: Triple<unknown> | null,
  params: ScrollIntentParams
): ScrollIntent | null {
  if (triple === null) return null;

  const { range, rowHeight, headerHeight, midpointOfContainer } = params;
  const force = params.force ?? null;
  const { index } = triple;

  const toTop = (): ScrollIntent => ({
    x: midpointOfContainer,
    y: rowHeight * index - headerHeight,
    anchor: 'top',
    index,
  });
  const toBottom = (): ScrollIntent => ({
    x: midpointOfContainer,
    y: rowHeight * (index + 1),
    anchor: 'bottom',
    index,
  });

  if (force === 'top') return toTop();
  if (force === null && index <= range.start) return toTop();
  if (force === 'bottom') return toBottom();
  if (force === null && index >= range.end) return toBottom();
  return null;
}
