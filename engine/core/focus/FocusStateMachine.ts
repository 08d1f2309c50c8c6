/**
 * Row Focus Engine - Focus State Machine
 *
 * Pure transition function over `{ current, shadow }`. Each action is applied
 * against one immutable snapshot of the collated window and visible range;
 * side effects (scroll intent, focus-changed notification) come back as
 * values for the host to consume.
 *
 * `shadow` remembers the row that was focused before an explicit unfocus. It
 * seeds exactly one following up/down and is cleared by every other action.
 */

import type { CollatedView } from '../collation/CollatedView.js';
import {
  isValidRange,
  type KeyEqual,
  type ScrollAnchor,
  type ScrollIntent,
  type Triple,
  type VisibleRange,
} from '../types/index.js';
import { findByIndex, findByKey } from './RowLocator.js';
import { computeScrollIntent } from './ScrollIntent.js';

// =============================================================================
// Types
// =============================================================================

export interface FocusModel<K> {
  /** Actively focused row */
  readonly current: Triple<K> | null;
  /** Last focused row after an unfocus */
  readonly shadow: Triple<K> | null;
}

export type FocusAction<K> =
  | { type: 'unfocus' }
  | { type: 'up' }
  | { type: 'down' }
  | { type: 'pageUp' }
  | { type: 'pageDown' }
  | { type: 'select'; key: K };

export type FocusActionType = FocusAction<unknown>['type'];

/**
 * Snapshot a transition runs against.
 */
export interface FocusInput<K> {
  view: CollatedView<K, unknown>;
  range: VisibleRange;
  keyEqual: KeyEqual<K>;
  rowHeight: number;
  headerHeight: number;
  midpointOfContainer: number;
}

export interface FocusChange<K> {
  key: K | null;
}

export interface FocusTransition<K> {
  model: FocusModel<K>;
  /** Scroll the host should perform, if any */
  scrollIntent: ScrollIntent | null;
  /** Present only when the focused key actually changed */
  focusChange: FocusChange<K> | null;
}

export const EMPTY_FOCUS_MODEL: FocusModel<never> = Object.freeze({
  current: null,
  shadow: null,
});

// =============================================================================
// Helpers
// =============================================================================

function firstOf<T>(...attempts: Array<() => T | null>): T | null {
  for (const attempt of attempts) {
    const result = attempt();
    if (result !== null) return result;
  }
  return null;
}

function keysEqual<K>(a: K | null, b: K | null, keyEqual: KeyEqual<K>): boolean {
  if (a === null || b === null) return a === b;
  return keyEqual(a, b);
}

interface Target<K> {
  triple: Triple<K> | null;
  /** Whether a scroll should be considered at all */
  scroll: boolean;
  force: ScrollAnchor | null;
}

function stepDown<K>(model: FocusModel<K>, input: FocusInput<K>): Triple<K> | null {
  const { view, range, keyEqual } = input;
  const { current, shadow } = model;

  if (current === null) {
    if (shadow !== null) {
      return firstOf(
        () => findByIndex(view, shadow.index + 1),
        () => findByIndex(view, shadow.index)
      );
    }
    // from nothing, start at the top of the visible range
    return findByIndex(view, range.start);
  }

  const found = findByKey(view, current.key, keyEqual);
  if (found === null) {
    // row is gone; land on whatever now occupies its slot
    return findByIndex(view, current.index);
  }
  return findByIndex(view, found.index + 1) ?? current;
}

function stepUp<K>(model: FocusModel<K>, input: FocusInput<K>): Triple<K> | null {
  const { view, range, keyEqual } = input;
  const { current, shadow } = model;

  if (current === null) {
    if (shadow !== null) {
      return firstOf(
        () => findByIndex(view, shadow.index - 1),
        () => findByIndex(view, shadow.index)
      );
    }
    // range.end may run past the end of a short collection
    const bottom = Math.min(range.end, view.rowsAfter + view.windowLength);
    return firstOf(
      () => findByIndex(view, bottom - 1),
      () => findByIndex(view, bottom)
    );
  }

  const found = findByKey(view, current.key, keyEqual);
  if (found === null) {
    return findByIndex(view, current.index - 1);
  }
  return findByIndex(view, found.index - 1) ?? current;
}

function resolveTarget<K>(
  model: FocusModel<K>,
  action: FocusAction<K>,
  input: FocusInput<K>
): Target<K> {
  switch (action.type) {
    case 'select':
      return {
        triple: findByKey(input.view, action.key, input.keyEqual),
        scroll: true,
        force: null,
      };
    case 'unfocus':
      return { triple: null, scroll: false, force: null };
    case 'down':
      return { triple: stepDown(model, input), scroll: true, force: null };
    case 'up':
      return { triple: stepUp(model, input), scroll: true, force: null };
    case 'pageDown':
      return {
        triple: findByIndex(input.view, input.range.end),
        scroll: true,
        force: 'top',
      };
    case 'pageUp':
      return {
        triple: findByIndex(input.view, input.range.start),
        scroll: true,
        force: 'bottom',
      };
  }
}

// =============================================================================
// Transition
// =============================================================================

/**
 * Apply one action. Never throws for data that moved or vanished; focus
 * degrades to null instead. Navigation against an inverted range leaves the
 * model untouched.
 */
export function applyFocusAction<K>(
  model: FocusModel<K>,
  action: FocusAction<K>,
  input: FocusInput<K>
): FocusTransition<K> {
  if (!isValidRange(input.range) && action.type !== 'select' && action.type !== 'unfocus') {
    return { model, scrollIntent: null, focusChange: null };
  }

  const target = resolveTarget(model, action, input);

  const scrollIntent = target.scroll
    ? computeScrollIntent(target.triple, {
        range: input.range,
        rowHeight: input.rowHeight,
        headerHeight: input.headerHeight,
        midpointOfContainer: input.midpointOfContainer,
        force: target.force,
      })
    : null;

  let shadow: Triple<K> | null = null;
  if (action.type === 'unfocus') {
    shadow = model.current ?? model.shadow;
  }

  const prevKey = model.current?.key ?? null;
  const nextKey = target.triple?.key ?? null;
  const focusChange = keysEqual(prevKey, nextKey, input.keyEqual)
    ? null
    : { key: nextKey };

  return {
    model: { current: target.triple, shadow },
    scrollIntent,
    focusChange,
  };
}

export function focusedKey<K>(model: FocusModel<K>): K | null {
  return model.current?.key ?? null;
}
