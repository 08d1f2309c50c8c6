/**
 * Row Focus Headless Harness - Types
 *
 * Command protocol and output types for stdin/stdout focus sessions.
 */

import {
  DEFAULT_ROW_HEIGHT,
  HEADER_HEIGHT,
  type ScrollIntent,
} from '../core/types/index.js';

// =============================================================================
// Command Types
// =============================================================================

export type CommandType =
  // Data
  | 'ROWS'          // ROWS k0:hello k1:there k4:world (replaces all rows)
  | 'SET'           // SET k2 "some data"
  | 'REMOVE'        // REMOVE k1
  | 'SORT'          // SORT asc | SORT desc | SORT none
  | 'FILTER'        // FILTER k (keep keys starting with prefix)
  | 'CLEAR_FILTER'  // CLEAR_FILTER
  | 'WINDOW'        // WINDOW 10 50 (materialize 50 rows from index 10)

  // Viewport
  | 'RANGE'         // RANGE 0 20 (visible logical rows, inclusive)

  // Focus
  | 'DOWN'
  | 'UP'
  | 'PAGE_UP'
  | 'PAGE_DOWN'
  | 'UNFOCUS'
  | 'FOCUS'         // FOCUS k4

  // State inspection
  | 'GET_FOCUS'     // GET_FOCUS
  | 'STATE'         // STATE (focus model and view counters)
  | 'IN_RANGE'      // IN_RANGE (reconcile focus against the visible range)
  | 'DUMP'          // DUMP (materialized window as table)

  // Assertions
  | 'ASSERT_FOCUS'  // ASSERT_FOCUS k1 | ASSERT_FOCUS none
  | 'ASSERT_ERROR'  // ASSERT_ERROR (next command should fail)

  // Utility
  | 'ECHO'          // ECHO message

  // Control
  | 'RESET'         // RESET (clear all state)
  | 'QUIT';         // QUIT

export interface ParsedCommand {
  type: CommandType;
  args: string[];
  raw: string;
  lineNumber: number;
}

// =============================================================================
// Output Types
// =============================================================================

export type OutputType =
  | 'result'    // Command result
  | 'focus'     // Focus transition or read-out
  | 'state'     // Model snapshot
  | 'error'     // Error message
  | 'info'      // Info message
  | 'table'     // Tabular data dump
  | 'assert'    // Assertion result
  | 'echo';     // Echo output

export interface OutputBase {
  type: OutputType;
  timestamp: number;
  command?: string;
  lineNumber?: number;
}

export interface ResultOutput extends OutputBase {
  type: 'result';
  success: boolean;
  data?: unknown;
}

export interface FocusOutput extends OutputBase {
  type: 'focus';
  /** Focused key after the command, null when unfocused */
  focused: string | null;
  /** Whether the command changed the focused key */
  changed: boolean;
  scroll: ScrollIntent | null;
}

export interface TripleSnapshot {
  key: string;
  id: number;
  index: number;
}

export interface StateOutput extends OutputBase {
  type: 'state';
  current: TripleSnapshot | null;
  shadow: TripleSnapshot | null;
  range: { start: number; end: number };
  window: { windowStart: number; windowLength: number; rowsAfter: number };
}

export interface ErrorOutput extends OutputBase {
  type: 'error';
  message: string;
  stack?: string;
}

export interface InfoOutput extends OutputBase {
  type: 'info';
  message: string;
}

export interface TableOutput extends OutputBase {
  type: 'table';
  headers: string[];
  rows: string[][];
}

export interface AssertOutput extends OutputBase {
  type: 'assert';
  passed: boolean;
  expected: unknown;
  actual: unknown;
  message?: string;
}

export interface EchoOutput extends OutputBase {
  type: 'echo';
  message: string;
}

export type Output =
  | ResultOutput
  | FocusOutput
  | StateOutput
  | ErrorOutput
  | InfoOutput
  | TableOutput
  | AssertOutput
  | EchoOutput;

// =============================================================================
// Harness Configuration
// =============================================================================

export interface HarnessConfig {
  /** Output format: 'json' (one JSON per line) or 'pretty' (human readable) */
  outputFormat: 'json' | 'pretty';
  /** Include timestamps in pretty output */
  includeTimestamps: boolean;
  /** Stop on first error */
  stopOnError: boolean;
  /** Echo commands before executing */
  echoCommands: boolean;
  /** Verbose mode (extra logging) */
  verbose: boolean;
  /** Maximum commands per script execution (default: 10000) */
  maxStepsPerScript: number;
  /** Row height used for scroll intents */
  rowHeight: number;
  /** Header height used for scroll intents */
  headerHeight: number;
}

export const DEFAULT_CONFIG: HarnessConfig = {
  outputFormat: 'json',
  includeTimestamps: true,
  stopOnError: false,
  echoCommands: false,
  verbose: false,
  maxStepsPerScript: 10000,
  rowHeight: DEFAULT_ROW_HEIGHT,
  headerHeight: HEADER_HEIGHT,
};

// =============================================================================
// Safety Error Types
// =============================================================================

export interface StepLimitErrorOutput extends OutputBase {
  type: 'error';
  message: string;
  errorType: 'StepLimitExceeded';
  stepCount: number;
  maxSteps: number;
}

export interface AbortErrorOutput extends OutputBase {
  type: 'error';
  message: string;
  errorType: 'ScriptAborted';
  reason: string;
}
