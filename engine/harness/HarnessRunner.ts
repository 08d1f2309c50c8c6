/**
 * Row Focus Headless Harness - Runner
 *
 * Executes parsed commands against a RowCollator and a RowFocusManager
 * and produces structured output.
 */

import {
  DEFAULT_CONFIG,
  type AbortErrorOutput,
  type AssertOutput,
  type EchoOutput,
  type ErrorOutput,
  type FocusOutput,
  type HarnessConfig,
  type InfoOutput,
  type Output,
  type ParsedCommand,
  type ResultOutput,
  type StateOutput,
  type StepLimitErrorOutput,
  type TableOutput,
  type TripleSnapshot,
} from './types.js';
import { CommandParser, parseCount, parseRowSpec } from './CommandParser.js';
import { RowCollator } from '../core/collation/RowCollator.js';
import { RowFocusManager } from '../core/focus/RowFocusManager.js';
import { createKeyPresence } from '../core/focus/presence.js';
import type { FocusTransition } from '../core/focus/FocusStateMachine.js';
import type { Triple } from '../core/types/index.js';

type SortOrder = 'asc' | 'desc' | 'none';

function snapshotOf(triple: Triple<string> | null): TripleSnapshot | null {
  return triple === null ? null : { key: triple.key, id: triple.id, index: triple.index };
}

// =============================================================================
// Harness Runner
// =============================================================================

export class HarnessRunner {
  private config: HarnessConfig;
  private collator: RowCollator<string, string>;
  private focus: RowFocusManager<string, string | null>;
  private parser = new CommandParser();

  // Collation settings, reported by getCollation()
  private sortOrder: SortOrder = 'none';
  private filterPrefix: string | null = null;

  private lastTransition: FocusTransition<string> | null = null;
  private expectError: boolean = false;

  // === Safety state ===
  /** Abort controller for cancellation */
  private abortController: AbortController | null = null;
  /** Current step count in script execution */
  private stepCount: number = 0;
  /** Whether the runner is currently executing */
  private isExecuting: boolean = false;

  // Output handler
  private outputHandler: (output: Output) => void;

  constructor(
    config: Partial<HarnessConfig> = {},
    outputHandler?: (output: Output) => void
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.outputHandler = outputHandler ?? this.defaultOutputHandler.bind(this);

    this.collator = new RowCollator<string, string>();
    this.focus = this.createFocus();
  }

  private createFocus(): RowFocusManager<string, string | null> {
    const focus = new RowFocusManager(
      createKeyPresence((key: string) => this.collator.has(key)),
      {
        rowHeight: this.config.rowHeight,
        headerHeight: this.config.headerHeight,
      }
    );
    focus.setEventHandlers({
      onTransition: (_action, transition) => {
        this.lastTransition = transition;
      },
    });
    return focus;
  }

  // ===========================================================================
  // Command Execution
  // ===========================================================================

  /**
   * Execute a single command.
   * Thrown errors become error outputs, or a passing result after ASSERT_ERROR.
   */
  async execute(cmd: ParsedCommand): Promise<Output> {
    // Check for abort
    if (this.abortController?.signal.aborted) {
      return this.createAbortError('Script was aborted', cmd);
    }

    try {
      if (this.config.echoCommands) {
        this.emit(this.createEcho(cmd.raw, cmd));
      }

      const result = this.executeCommand(cmd);

      // Check if we expected an error but didn't get one
      if (this.expectError && cmd.type !== 'ASSERT_ERROR') {
        this.expectError = false;
        return this.createError('Expected error but command succeeded', cmd);
      }

      return result;
    } catch (error) {
      // Check if error was expected
      if (this.expectError) {
        this.expectError = false;
        return this.createResult(true, { expectedError: true }, cmd);
      }

      const err = error instanceof Error ? error : new Error(String(error));
      return this.createError(err.message, cmd, err.stack);
    }
  }

  /**
   * Execute multiple commands with step limit protection.
   */
  async executeAll(commands: ParsedCommand[]): Promise<Output[]> {
    const outputs: Output[] = [];
    this.stepCount = 0;
    this.abortController = new AbortController();
    this.isExecuting = true;

    try {
      for (const cmd of commands) {
        // Check abort signal
        if (this.abortController.signal.aborted) {
          const aborted = this.createAbortError('Script was aborted', cmd);
          outputs.push(aborted);
          this.emit(aborted);
          break;
        }

        // Check step limit
        this.stepCount++;
        if (this.stepCount > this.config.maxStepsPerScript) {
          const exceeded = this.createStepLimitError(this.stepCount, this.config.maxStepsPerScript, cmd);
          outputs.push(exceeded);
          this.emit(exceeded);
          break;
        }

        const output = await this.execute(cmd);
        outputs.push(output);
        this.emit(output);

        if (output.type === 'error' && this.config.stopOnError) {
          break;
        }

        if (cmd.type === 'QUIT') {
          break;
        }
      }
    } finally {
      this.isExecuting = false;
      this.abortController = null;
    }

    return outputs;
  }

  /**
   * Route command to appropriate handler.
   */
  private executeCommand(cmd: ParsedCommand): Output {
    switch (cmd.type) {
      // Data
      case 'ROWS': return this.cmdRows(cmd);
      case 'SET': return this.cmdSet(cmd);
      case 'REMOVE': return this.cmdRemove(cmd);
      case 'SORT': return this.cmdSort(cmd);
      case 'FILTER': return this.cmdFilter(cmd);
      case 'CLEAR_FILTER': return this.cmdClearFilter(cmd);
      case 'WINDOW': return this.cmdWindow(cmd);

      // Viewport
      case 'RANGE': return this.cmdRange(cmd);

      // Focus
      case 'DOWN': return this.runFocus(cmd, () => this.focus.focusDown());
      case 'UP': return this.runFocus(cmd, () => this.focus.focusUp());
      case 'PAGE_UP': return this.runFocus(cmd, () => this.focus.pageUp());
      case 'PAGE_DOWN': return this.runFocus(cmd, () => this.focus.pageDown());
      case 'UNFOCUS': return this.runFocus(cmd, () => this.focus.unfocus());
      case 'FOCUS': return this.cmdFocus(cmd);

      // State inspection
      case 'GET_FOCUS': return this.cmdGetFocus(cmd);
      case 'STATE': return this.cmdState(cmd);
      case 'IN_RANGE': return this.createResult(true, this.focus.resolveFocusInRange(), cmd);
      case 'DUMP': return this.cmdDump(cmd);

      // Assertions
      case 'ASSERT_FOCUS': return this.cmdAssertFocus(cmd);
      case 'ASSERT_ERROR': return this.cmdAssertError(cmd);

      // Utility
      case 'ECHO': return this.createEcho(cmd.args.join(' '), cmd);

      // Control
      case 'RESET': return this.cmdReset(cmd);
      case 'QUIT': return this.createInfo('Quitting', cmd);
    }
  }

  // ===========================================================================
  // Data Commands
  // ===========================================================================

  private cmdRows(cmd: ParsedCommand): Output {
    const rows = cmd.args.map((spec) => {
      const row = parseRowSpec(spec);
      if (!row) throw new Error(`Invalid row spec: ${spec}`);
      return row;
    });

    this.collator.clear();
    for (const { key, data } of rows) {
      this.collator.set(key, data);
    }
    this.refreshView();

    return this.createResult(true, { rows: this.collator.size }, cmd);
  }

  private cmdSet(cmd: ParsedCommand): Output {
    const [key, ...dataParts] = cmd.args;
    if (!key) throw new Error('SET requires a key');

    this.collator.set(key, dataParts.join(' '));
    this.refreshView();

    return this.createResult(true, { key }, cmd);
  }

  private cmdRemove(cmd: ParsedCommand): Output {
    const [key] = cmd.args;
    if (!key) throw new Error('REMOVE requires a key');
    if (!this.collator.remove(key)) throw new Error(`Row not found: ${key}`);

    this.refreshView();
    return this.createResult(true, { key }, cmd);
  }

  private cmdSort(cmd: ParsedCommand): Output {
    const order = (cmd.args[0] ?? '').toLowerCase();
    switch (order) {
      case 'asc':
        this.collator.setComparator((a, b) => a.key.localeCompare(b.key));
        this.sortOrder = 'asc';
        break;
      case 'desc':
        this.collator.setComparator((a, b) => b.key.localeCompare(a.key));
        this.sortOrder = 'desc';
        break;
      case 'none':
        this.collator.setComparator(null);
        this.sortOrder = 'none';
        break;
      default:
        throw new Error(`SORT requires asc, desc or none, got: ${cmd.args[0] ?? ''}`);
    }

    this.refreshView();
    return this.createResult(true, { sort: this.sortOrder }, cmd);
  }

  private cmdFilter(cmd: ParsedCommand): Output {
    const [prefix] = cmd.args;
    if (prefix === undefined) throw new Error('FILTER requires a key prefix');

    this.collator.setFilter((key) => key.startsWith(prefix));
    this.filterPrefix = prefix;
    this.refreshView();

    return this.createResult(true, { prefix, rows: this.collator.getTotalRows() }, cmd);
  }

  private cmdClearFilter(cmd: ParsedCommand): Output {
    this.collator.setFilter(null);
    this.filterPrefix = null;
    this.refreshView();

    return this.createResult(true, { rows: this.collator.getTotalRows() }, cmd);
  }

  private cmdWindow(cmd: ParsedCommand): Output {
    const start = parseCount(cmd.args[0]);
    const length = parseCount(cmd.args[1]);
    if (start === null || length === null) {
      throw new Error('WINDOW requires a start and a length');
    }

    this.collator.setWindow(start, length);
    this.refreshView();

    const view = this.focus.getView();
    return this.createResult(true, {
      windowStart: view.windowStart,
      windowLength: view.windowLength,
      rowsAfter: view.rowsAfter,
    }, cmd);
  }

  private refreshView(): void {
    this.focus.setView(this.collator.collate());
  }

  // ===========================================================================
  // Viewport & Focus Commands
  // ===========================================================================

  private cmdRange(cmd: ParsedCommand): Output {
    const start = parseCount(cmd.args[0]);
    const end = parseCount(cmd.args[1]);
    if (start === null || end === null) {
      throw new Error('RANGE requires a start and an end');
    }

    this.focus.setVisibleRange({ start, end });
    return this.createResult(true, { start, end }, cmd);
  }

  private cmdFocus(cmd: ParsedCommand): Output {
    const [key] = cmd.args;
    if (!key) throw new Error('FOCUS requires a key');
    return this.runFocus(cmd, () => this.focus.focus(key));
  }

  private runFocus(cmd: ParsedCommand, operation: () => void): FocusOutput {
    this.lastTransition = null;
    operation();
    const transition = this.takeTransition();

    return this.createFocusOutput(
      cmd,
      Boolean(transition?.focusChange),
      transition?.scrollIntent ?? null
    );
  }

  private takeTransition(): FocusTransition<string> | null {
    const transition = this.lastTransition;
    this.lastTransition = null;
    return transition;
  }

  // ===========================================================================
  // State Inspection
  // ===========================================================================

  private cmdGetFocus(cmd: ParsedCommand): Output {
    return this.createFocusOutput(cmd, false, null);
  }

  private cmdState(cmd: ParsedCommand): Output {
    const model = this.focus.getModel();
    const view = this.focus.getView();
    const range = this.focus.getVisibleRange();

    const output: StateOutput = {
      type: 'state',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      current: snapshotOf(model.current),
      shadow: snapshotOf(model.shadow),
      range: { start: range.start, end: range.end },
      window: {
        windowStart: view.windowStart,
        windowLength: view.windowLength,
        rowsAfter: view.rowsAfter,
      },
    };
    return output;
  }

  private cmdDump(cmd: ParsedCommand): Output {
    const view = this.focus.getView();
    const focused = this.focus.visuallyFocusedKey;
    const rows: string[][] = [];

    let index = view.windowStart;
    for (const [id, entry] of view.rows) {
      rows.push([
        String(index),
        String(id),
        entry.key,
        String(entry.data),
        entry.key === focused ? '*' : '',
      ]);
      index++;
    }

    const output: TableOutput = {
      type: 'table',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      headers: ['index', 'id', 'key', 'data', 'focus'],
      rows,
    };
    return output;
  }

  // ===========================================================================
  // Assertions
  // ===========================================================================

  private cmdAssertFocus(cmd: ParsedCommand): Output {
    const [expectedArg] = cmd.args;
    if (expectedArg === undefined) throw new Error('ASSERT_FOCUS requires a key or none');

    const expected = expectedArg === 'none' ? null : expectedArg;
    const actual = this.focus.visuallyFocusedKey;
    const passed = actual === expected;

    const output: AssertOutput = {
      type: 'assert',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      passed,
      expected,
      actual,
      message: passed ? undefined : `Assertion failed: focus is ${actual ?? 'none'}, expected ${expectedArg}`,
    };
    return output;
  }

  private cmdAssertError(cmd: ParsedCommand): Output {
    this.expectError = true;
    return this.createInfo('Expecting error on next command', cmd);
  }

  // ===========================================================================
  // Control Commands
  // ===========================================================================

  private cmdReset(cmd: ParsedCommand): Output {
    this.collator = new RowCollator<string, string>();
    this.focus = this.createFocus();
    this.sortOrder = 'none';
    this.filterPrefix = null;
    this.lastTransition = null;

    return this.createResult(true, { reset: true }, cmd);
  }

  // ===========================================================================
  // Output Helpers
  // ===========================================================================

  private createResult(success: boolean, data: unknown, cmd: ParsedCommand): ResultOutput {
    return {
      type: 'result',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      success,
      data,
    };
  }

  private createFocusOutput(
    cmd: ParsedCommand,
    changed: boolean,
    scroll: FocusOutput['scroll']
  ): FocusOutput {
    return {
      type: 'focus',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      focused: this.focus.visuallyFocusedKey,
      changed,
      scroll,
    };
  }

  private createError(message: string, cmd: ParsedCommand, stack?: string): ErrorOutput {
    return {
      type: 'error',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      message,
      stack,
    };
  }

  private createInfo(message: string, cmd: ParsedCommand): InfoOutput {
    return {
      type: 'info',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      message,
    };
  }

  private createEcho(message: string, cmd: ParsedCommand): EchoOutput {
    return {
      type: 'echo',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      message,
    };
  }

  // ===========================================================================
  // Safety Error Helpers
  // ===========================================================================

  private createStepLimitError(stepCount: number, maxSteps: number, cmd: ParsedCommand): StepLimitErrorOutput {
    return {
      type: 'error',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      message: `Step limit exceeded: ${stepCount} steps (max: ${maxSteps})`,
      errorType: 'StepLimitExceeded',
      stepCount,
      maxSteps,
    };
  }

  private createAbortError(reason: string, cmd: ParsedCommand): AbortErrorOutput {
    return {
      type: 'error',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      message: `Script aborted: ${reason}`,
      errorType: 'ScriptAborted',
      reason,
    };
  }

  private emit(output: Output): void {
    this.outputHandler(output);
  }

  private defaultOutputHandler(output: Output): void {
    if (this.config.outputFormat === 'json') {
      console.log(JSON.stringify(output));
    } else {
      this.prettyPrint(output);
    }
  }

  private prettyPrint(output: Output): void {
    const line = output.lineNumber ? `[${output.lineNumber}] ` : '';
    const time = this.config.includeTimestamps
      ? `${new Date(output.timestamp).toISOString()} `
      : '';
    const prefix = time + line;

    switch (output.type) {
      case 'result':
        console.log(`${prefix}${output.success ? 'OK' : 'FAILED'} ${output.command ?? ''}`);
        if (output.data !== undefined && this.config.verbose) {
          console.log(`   ${JSON.stringify(output.data)}`);
        }
        break;

      case 'focus': {
        const marker = output.changed ? '->' : '==';
        console.log(`${prefix}FOCUS ${marker} ${output.focused ?? 'none'}`);
        if (output.scroll) {
          const { anchor, index, x, y } = output.scroll;
          console.log(`   scroll ${anchor} to row ${index} at (${x}, ${y})`);
        }
        break;
      }

      case 'state': {
        const current = output.current ? `${output.current.key}@${output.current.index}` : 'none';
        const shadow = output.shadow ? `${output.shadow.key}@${output.shadow.index}` : 'none';
        const { windowStart, windowLength, rowsAfter } = output.window;
        console.log(`${prefix}STATE current=${current} shadow=${shadow}`);
        console.log(`   range [${output.range.start}, ${output.range.end}] window ${windowStart}+${windowLength} (${rowsAfter} after)`);
        break;
      }

      case 'error':
        console.error(`${prefix}ERROR: ${output.message}`);
        break;

      case 'info':
        console.log(`${prefix}INFO: ${output.message}`);
        break;

      case 'echo':
        console.log(`${prefix}${output.message}`);
        break;

      case 'assert':
        if (output.passed) {
          console.log(`${prefix}ASSERT passed`);
        } else {
          console.log(`${prefix}ASSERT failed: expected ${String(output.expected)}, got ${String(output.actual)}`);
        }
        break;

      case 'table':
        console.log(`${prefix}TABLE:`);
        console.log('  ' + output.headers.join('\t'));
        for (const row of output.rows) {
          console.log('  ' + row.join('\t'));
        }
        break;
    }
  }

  // ===========================================================================
  // CLI Interface Methods
  // ===========================================================================

  /**
   * Set a custom output handler.
   */
  onOutput(handler: (output: Output) => void): void {
    this.outputHandler = handler;
  }

  /**
   * Execute a single line of input (for interactive mode).
   * Returns false if QUIT command was executed.
   */
  async executeLine(line: string): Promise<boolean> {
    const cmd = this.parser.parse(line, 0);
    if (!cmd) {
      return true;
    }

    const output = await this.execute(cmd);
    this.emit(output);

    if (cmd.type === 'QUIT') {
      return false;
    }

    if (output.type === 'error' && this.config.stopOnError) {
      throw new Error(output.message);
    }

    return true;
  }

  /**
   * Execute a script (multiple lines) with step limit and abort handling.
   */
  async executeScript(script: string): Promise<Output[]> {
    return this.executeAll(this.parser.parseScript(script));
  }

  /**
   * Request abort of running script.
   * Can be called from signal handlers (e.g., SIGINT).
   */
  abort(reason: string = 'User requested abort'): void {
    if (this.abortController && this.isExecuting) {
      this.abortController.abort();
      if (this.config.verbose) {
        console.log(`[Abort] ${reason}`);
      }
    }
  }

  /**
   * Check if the runner is currently executing a script.
   */
  isRunning(): boolean {
    return this.isExecuting;
  }

  /**
   * Get current step count (for monitoring/progress).
   */
  getStepCount(): number {
    return this.stepCount;
  }

  /**
   * Current collation settings.
   */
  getCollation(): { sort: SortOrder; filter: string | null; totalRows: number } {
    return {
      sort: this.sortOrder,
      filter: this.filterPrefix,
      totalRows: this.collator.getTotalRows(),
    };
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createHarnessRunner(
  config?: Partial<HarnessConfig>,
  outputHandler?: (output: Output) => void
): HarnessRunner {
  return new HarnessRunner(config, outputHandler);
}
