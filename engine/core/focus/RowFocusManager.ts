/**
 * Row Focus Engine - Row Focus Manager
 *
 * Host-facing wrapper around the focus state machine. The host threads the
 * current CollatedView and visible range in; the manager owns only the
 * FocusModel.
 *
 * Architecture:
 * - Every operation enqueues one action
 * - Actions run one at a time; calls made from inside an event handler are
 *   queued and drained after the running transition
 * - Side effects are emitted after the model is committed
 *
 * Usage:
 * ```typescript
 * const focus = new RowFocusManager(createKeyPresence((key: string) => store.has(key)), {
 *   rowHeight: 30,
 *   headerHeight: 24,
 * });
 * focus.setEventHandlers({
 *   onFocusChange: (key) => statusBar.show(key),
 *   onScrollIntent: (intent) => viewport.scrollTo(intent),
 * });
 *
 * focus.setView(collator.collate());
 * focus.setVisibleRange({ start: 0, end: 20 });
 * focus.focusDown();
 * ```
 */

import {
  emptyCollatedView,
  type CollatedView,
} from '../collation/CollatedView.js';
import {
  DEFAULT_ROW_HEIGHT,
  HEADER_HEIGHT,
  defaultKeyEqual,
  isValidRange,
  type FocusLogger,
  type KeyEqual,
  type ScrollIntent,
  type VisibleRange,
} from '../types/index.js';
import {
  EMPTY_FOCUS_MODEL,
  applyFocusAction,
  focusedKey,
  type FocusAction,
  type FocusModel,
  type FocusTransition,
} from './FocusStateMachine.js';
import { findInRange, type RangeResponse } from './RowLocator.js';
import { identityPresence, type PresenceProjector } from './presence.js';

// =============================================================================
// Types
// =============================================================================

export interface RowFocusConfig<K> {
  /** Fixed row height in pixels. Default: 21 */
  rowHeight: number;
  /** Header height in pixels, subtracted when anchoring a row to the top. Default: 24 */
  headerHeight: number;
  /** Horizontal pixel kept while scrolling. Default: 0 */
  midpointOfContainer: number;
  /** Key equality. Default: Object.is */
  keyEqual: KeyEqual<K>;
  /** Diagnostics sink. Default: console */
  logger: FocusLogger;
}

export interface RowFocusEvents<K> {
  /** Called once per transition that changed the focused key. */
  onFocusChange?: (key: K | null) => void;

  /** Called when a row must be scrolled into view. */
  onScrollIntent?: (intent: ScrollIntent) => void;

  /** Called after every transition, changed or not. */
  onTransition?: (action: FocusAction<K>, transition: FocusTransition<K>) => void;
}

export interface RowFocusLayout {
  rowHeight?: number;
  headerHeight?: number;
  midpointOfContainer?: number;
}

// =============================================================================
// Default Configuration
// =============================================================================

const DEFAULT_CONFIG: RowFocusConfig<unknown> = {
  rowHeight: DEFAULT_ROW_HEIGHT,
  headerHeight: HEADER_HEIGHT,
  midpointOfContainer: 0,
  keyEqual: defaultKeyEqual,
  logger: console,
};

/** Explicit `undefined` entries keep their default. */
function withDefaults<K>(config: Partial<RowFocusConfig<K>>): RowFocusConfig<K> {
  return {
    rowHeight: config.rowHeight ?? DEFAULT_CONFIG.rowHeight,
    headerHeight: config.headerHeight ?? DEFAULT_CONFIG.headerHeight,
    midpointOfContainer: config.midpointOfContainer ?? DEFAULT_CONFIG.midpointOfContainer,
    keyEqual: config.keyEqual ?? DEFAULT_CONFIG.keyEqual,
    logger: config.logger ?? DEFAULT_CONFIG.logger,
  };
}

function validateLayout(layout: RowFocusLayout): void {
  const { rowHeight, headerHeight, midpointOfContainer } = layout;
  if (rowHeight !== undefined && !(Number.isFinite(rowHeight) && rowHeight > 0)) {
    throw new Error(`Invalid rowHeight: ${rowHeight}`);
  }
  if (headerHeight !== undefined && !(Number.isFinite(headerHeight) && headerHeight >= 0)) {
    throw new Error(`Invalid headerHeight: ${headerHeight}`);
  }
  if (midpointOfContainer !== undefined && !Number.isFinite(midpointOfContainer)) {
    throw new Error(`Invalid midpointOfContainer: ${midpointOfContainer}`);
  }
}

// =============================================================================
// RowFocusManager Class
// =============================================================================

export class RowFocusManager<K, P> {
  private config: RowFocusConfig<K>;
  private readonly presence: PresenceProjector<K, P>;
  private events: RowFocusEvents<K> = {};

  private model: FocusModel<K> = EMPTY_FOCUS_MODEL;
  private view: CollatedView<K, unknown> = emptyCollatedView();
  private range: VisibleRange = { start: 0, end: 0 };

  private readonly queue: FocusAction<K>[] = [];
  private draining = false;

  /**
   * @param presence - Maps the focused key to the application's presence value
   * @param config - Layout, key equality and logger overrides
   */
  constructor(presence: PresenceProjector<K, P>, config: Partial<RowFocusConfig<K>> = {}) {
    validateLayout(config);
    this.presence = presence;
    this.config = withDefaults(config);
  }

  // ===========================================================================
  // Configuration
  // ===========================================================================

  setEventHandlers(events: RowFocusEvents<K>): void {
    this.events = { ...this.events, ...events };
  }

  getConfig(): Readonly<RowFocusConfig<K>> {
    return this.config;
  }

  setLayout(layout: RowFocusLayout): void {
    validateLayout(layout);
    this.config = {
      ...this.config,
      rowHeight: layout.rowHeight ?? this.config.rowHeight,
      headerHeight: layout.headerHeight ?? this.config.headerHeight,
      midpointOfContainer: layout.midpointOfContainer ?? this.config.midpointOfContainer,
    };
  }

  // ===========================================================================
  // Inputs
  // ===========================================================================

  /**
   * Replace the collated window snapshot. Does not move focus by itself.
   */
  setView(view: CollatedView<K, unknown>): void {
    this.view = view;
  }

  getView(): CollatedView<K, unknown> {
    return this.view;
  }

  setVisibleRange(range: VisibleRange): void {
    if (!isValidRange(range)) {
      throw new Error(`Invalid visible range: [${range.start}, ${range.end}]`);
    }
    this.range = { start: range.start, end: range.end };
  }

  getVisibleRange(): Readonly<VisibleRange> {
    return this.range;
  }

  // ===========================================================================
  // Operations
  // ===========================================================================

  unfocus(): void {
    this.dispatch({ type: 'unfocus' });
  }

  focusUp(): void {
    this.dispatch({ type: 'up' });
  }

  focusDown(): void {
    this.dispatch({ type: 'down' });
  }

  pageUp(): void {
    this.dispatch({ type: 'pageUp' });
  }

  pageDown(): void {
    this.dispatch({ type: 'pageDown' });
  }

  focus(key: K): void {
    this.dispatch({ type: 'select', key });
  }

  /**
   * Enqueue an action and drain the queue unless a drain is already running.
   */
  dispatch(action: FocusAction<K>): void {
    this.queue.push(action);
    if (this.draining) return;

    this.draining = true;
    try {
      let next = this.queue.shift();
      while (next !== undefined) {
        this.run(next);
        next = this.queue.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  // ===========================================================================
  // Read-outs
  // ===========================================================================

  /** Key the state machine considers focused, independent of presence. */
  get visuallyFocusedKey(): K | null {
    return focusedKey(this.model);
  }

  /** Presence projection of the focused key. */
  get focusedPresence(): P {
    return this.presence(this.visuallyFocusedKey);
  }

  getModel(): FocusModel<K> {
    return this.model;
  }

  /**
   * Reconcile the focused row against the current visible range.
   * Indeterminate when nothing is focused.
   */
  resolveFocusInRange(): RangeResponse<K> {
    const current = this.model.current;
    if (current === null) {
      return { kind: 'indeterminate' };
    }
    return findInRange({
      range: this.range,
      view: this.view,
      key: current.key,
      id: current.id,
      index: current.index,
      keyEqual: this.config.keyEqual,
      logger: this.config.logger,
    });
  }

  /**
   * Forget focus and shadow without notifying.
   */
  reset(): void {
    this.queue.length = 0;
    this.model = EMPTY_FOCUS_MODEL;
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private run(action: FocusAction<K>): void {
    const transition = applyFocusAction(this.model, action, {
      view: this.view,
      range: this.range,
      keyEqual: this.config.keyEqual,
      rowHeight: this.config.rowHeight,
      headerHeight: this.config.headerHeight,
      midpointOfContainer: this.config.midpointOfContainer,
    });
    this.model = transition.model;

    const { onScrollIntent, onFocusChange, onTransition } = this.events;
    if (transition.scrollIntent && onScrollIntent) {
      const intent = transition.scrollIntent;
      this.notify('onScrollIntent', () => onScrollIntent(intent));
    }
    if (transition.focusChange && onFocusChange) {
      const { key } = transition.focusChange;
      this.notify('onFocusChange', () => onFocusChange(key));
    }
    if (onTransition) {
      this.notify('onTransition', () => onTransition(action, transition));
    }
  }

  private notify(handler: keyof RowFocusEvents<K>, call: () => void): void {
    try {
      call();
    } catch (error) {
      this.config.logger.error(`Focus ${handler} handler error:`, error);
    }
  }
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Manager whose presence is the focused key itself.
 */
export function createRowFocusManager<K>(
  config?: Partial<RowFocusConfig<K>>
): RowFocusManager<K, K | null> {
  return new RowFocusManager<K, K | null>(identityPresence, config);
}
