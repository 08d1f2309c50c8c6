/**
 * Row Focus Engine - Focus Module Exports
 */

// Row Locator
export {
  findByKey,
  findByIndex,
  findById,
  findInRange,
  windowBounds,
} from './RowLocator.js';
export type { RangeResponse, FindInRangeParams } from './RowLocator.js';

// State Machine
export {
  applyFocusAction,
  focusedKey,
  EMPTY_FOCUS_MODEL,
} from './FocusStateMachine.js';
export type {
  FocusModel,
  FocusAction,
  FocusActionType,
  FocusInput,
  FocusChange,
  FocusTransition,
} from './FocusStateMachine.js';

// Scroll Intent
export { computeScrollIntent } from './ScrollIntent.js';
export type { ScrollIntentParams } from './ScrollIntent.js';

// Presence
export { identityPresence, createKeyPresence } from './presence.js';
export type { PresenceProjector } from './presence.js';

// Manager
export { RowFocusManager, createRowFocusManager } from './RowFocusManager.js';
export type {
  RowFocusConfig,
  RowFocusEvents,
  RowFocusLayout,
} from './RowFocusManager.js';
