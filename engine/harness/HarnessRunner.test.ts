/**
 * Row Focus Headless Harness - Runner Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { HarnessRunner } from './HarnessRunner.js';
import { ParseError } from './CommandParser.js';
import type { HarnessConfig, Output } from './types.js';

const THREE_ROWS = 'ROWS k0:hello k1:there k4:world\nRANGE 0 2';

function createRunner(config: Partial<HarnessConfig> = {}): {
  runner: HarnessRunner;
  emitted: Output[];
} {
  const emitted: Output[] = [];
  const runner = new HarnessRunner(config, (output) => emitted.push(output));
  return { runner, emitted };
}

describe('HarnessRunner', () => {
  let runner: HarnessRunner;
  let emitted: Output[];

  beforeEach(() => {
    ({ runner, emitted } = createRunner());
  });

  // ===========================================================================
  // Focus sessions
  // ===========================================================================

  describe('focus commands', () => {
    it('should walk down the rows and report scroll intents', async () => {
      const outputs = await runner.executeScript(`${THREE_ROWS}\nDOWN\nDOWN\nDOWN\nDOWN`);

      expect(outputs.slice(2)).toMatchObject([
        { type: 'focus', focused: 'k0', changed: true, scroll: { x: 0, y: -24, anchor: 'top', index: 0 } },
        { type: 'focus', focused: 'k1', changed: true, scroll: null },
        { type: 'focus', focused: 'k4', changed: true, scroll: { x: 0, y: 63, anchor: 'bottom', index: 2 } },
        { type: 'focus', focused: 'k4', changed: false, scroll: { x: 0, y: 63, anchor: 'bottom', index: 2 } },
      ]);
    });

    it('should page to the edges of the visible range', async () => {
      const outputs = await runner.executeScript(`${THREE_ROWS}\nPAGE_DOWN\nPAGE_UP`);

      expect(outputs.slice(2)).toMatchObject([
        { type: 'focus', focused: 'k4', scroll: { x: 0, y: 18, anchor: 'top', index: 2 } },
        { type: 'focus', focused: 'k0', scroll: { x: 0, y: 21, anchor: 'bottom', index: 0 } },
      ]);
    });

    it('should use the configured layout', async () => {
      ({ runner } = createRunner({ rowHeight: 10, headerHeight: 5 }));
      const outputs = await runner.executeScript(`${THREE_ROWS}\nDOWN`);

      expect(outputs[2]).toMatchObject({ scroll: { x: 0, y: -5, anchor: 'top', index: 0 } });
    });

    it('should move past a removed row', async () => {
      const outputs = await runner.executeScript(
        `${THREE_ROWS}\nFOCUS k1\nREMOVE k1\nDOWN\nASSERT_FOCUS k4`
      );

      expect(outputs[5]).toMatchObject({ type: 'assert', passed: true, expected: 'k4', actual: 'k4' });
    });

    it('should follow the focused key across a re-sort', async () => {
      const outputs = await runner.executeScript(
        `${THREE_ROWS}\nFOCUS k4\nSORT desc\nDOWN\nASSERT_FOCUS k1`
      );

      expect(outputs[5]).toMatchObject({ type: 'assert', passed: true });
    });

    it('should resume below the row that was unfocused', async () => {
      const outputs = await runner.executeScript(
        `${THREE_ROWS}\nFOCUS k0\nUNFOCUS\nASSERT_FOCUS none\nDOWN\nASSERT_FOCUS k1`
      );

      expect(outputs[3]).toMatchObject({ type: 'focus', focused: null, changed: true, scroll: null });
      expect(outputs[4]).toMatchObject({ type: 'assert', passed: true, expected: null, actual: null });
      expect(outputs[6]).toMatchObject({ type: 'assert', passed: true });
    });

    it('should report a failed focus assertion', async () => {
      const outputs = await runner.executeScript(`${THREE_ROWS}\nDOWN\nASSERT_FOCUS k4`);

      expect(outputs[3]).toMatchObject({
        type: 'assert',
        passed: false,
        expected: 'k4',
        actual: 'k0',
        message: 'Assertion failed: focus is k0, expected k4',
      });
    });

    it('should clear focus when selecting an unknown key', async () => {
      const outputs = await runner.executeScript(`${THREE_ROWS}\nFOCUS k1\nFOCUS nope`);

      expect(outputs[3]).toMatchObject({ type: 'focus', focused: null, changed: true, scroll: null });
    });
  });

  // ===========================================================================
  // Data commands
  // ===========================================================================

  describe('data commands', () => {
    it('should dump the materialized rows with the focus marker', async () => {
      const outputs = await runner.executeScript(`${THREE_ROWS}\nFOCUS k1\nDUMP`);

      expect(outputs[3]).toMatchObject({
        type: 'table',
        headers: ['index', 'id', 'key', 'data', 'focus'],
        rows: [
          ['0', '0', 'k0', 'hello', ''],
          ['1', '100', 'k1', 'there', '*'],
          ['2', '200', 'k4', 'world', ''],
        ],
      });
    });

    it('should filter by key prefix and clear the filter', async () => {
      const outputs = await runner.executeScript(
        'ROWS a1:x b1:y a2:z\nFILTER a\nDUMP\nCLEAR_FILTER'
      );

      expect(outputs[1]).toMatchObject({ type: 'result', data: { prefix: 'a', rows: 2 } });
      expect(outputs[2]).toMatchObject({
        rows: [
          ['0', '0', 'a1', 'x', ''],
          ['1', '200', 'a2', 'z', ''],
        ],
      });
      expect(outputs[3]).toMatchObject({ type: 'result', data: { rows: 3 } });
      expect(runner.getCollation()).toEqual({ sort: 'none', filter: null, totalRows: 3 });
    });

    it('should materialize a window of rows', async () => {
      const outputs = await runner.executeScript('ROWS r0 r1 r2 r3 r4\nWINDOW 1 2\nDUMP');

      expect(outputs[1]).toMatchObject({
        type: 'result',
        data: { windowStart: 1, windowLength: 2, rowsAfter: 2 },
      });
      expect(outputs[2]).toMatchObject({
        rows: [
          ['1', '100', 'r1', 'r1', ''],
          ['2', '200', 'r2', 'r2', ''],
        ],
      });
    });

    it('should set row data from the remaining arguments', async () => {
      const outputs = await runner.executeScript('SET k7 more "row data"\nDUMP');

      expect(outputs[1]).toMatchObject({ rows: [['0', '0', 'k7', 'more row data', '']] });
    });

    it('should store key=value shaped data verbatim', async () => {
      const outputs = await runner.executeScript('ROWS k0:a=b\nSET k1 x=1\nDUMP');

      expect(outputs[2]).toMatchObject({
        rows: [
          ['0', '0', 'k0', 'a=b', ''],
          ['1', '100', 'k1', 'x=1', ''],
        ],
      });
    });
  });

  // ===========================================================================
  // State inspection
  // ===========================================================================

  describe('state inspection', () => {
    it('should report the focus model and window counters', async () => {
      const outputs = await runner.executeScript(`${THREE_ROWS}\nFOCUS k4\nUNFOCUS\nSTATE`);

      expect(outputs[4]).toMatchObject({
        type: 'state',
        current: null,
        shadow: { key: 'k4', id: 200, index: 2 },
        range: { start: 0, end: 2 },
        window: { windowStart: 0, windowLength: 3, rowsAfter: 0 },
      });
    });

    it('should read the focused key without moving it', async () => {
      const outputs = await runner.executeScript(`${THREE_ROWS}\nFOCUS k1\nGET_FOCUS`);

      expect(outputs[3]).toMatchObject({ type: 'focus', focused: 'k1', changed: false, scroll: null });
    });

    it('should reconcile focus against the visible range', async () => {
      const outputs = await runner.executeScript(`${THREE_ROWS}\nFOCUS k4\nRANGE 0 1\nIN_RANGE`);

      expect(outputs[4]).toMatchObject({
        type: 'result',
        data: { kind: 'noButThisOneIs', triple: { key: 'k1', id: 100, index: 1 } },
      });
    });
  });

  // ===========================================================================
  // Errors and assertions
  // ===========================================================================

  describe('errors', () => {
    it('should turn failures into error outputs', async () => {
      const outputs = await runner.executeScript(
        'REMOVE missing\nRANGE 3 1\nSORT sideways\nWINDOW 1\nROWS :bad'
      );

      expect(outputs.map((output) => (output.type === 'error' ? output.message : output.type))).toEqual([
        'Row not found: missing',
        'Invalid visible range: [3, 1]',
        'SORT requires asc, desc or none, got: sideways',
        'WINDOW requires a start and a length',
        'Invalid row spec: :bad',
      ]);
    });

    it('should pass a command that fails after ASSERT_ERROR', async () => {
      const outputs = await runner.executeScript('ASSERT_ERROR\nREMOVE missing');

      expect(outputs[0]).toMatchObject({ type: 'info', message: 'Expecting error on next command' });
      expect(outputs[1]).toMatchObject({ type: 'result', success: true, data: { expectedError: true } });
    });

    it('should fail a command that succeeds after ASSERT_ERROR', async () => {
      const outputs = await runner.executeScript('ASSERT_ERROR\nECHO fine');

      expect(outputs[1]).toMatchObject({ type: 'error', message: 'Expected error but command succeeded' });
    });

    it('should stop on the first error when configured', async () => {
      ({ runner } = createRunner({ stopOnError: true }));
      const outputs = await runner.executeScript('REMOVE missing\nECHO after');

      expect(outputs).toHaveLength(1);
    });
  });

  // ===========================================================================
  // Script control
  // ===========================================================================

  describe('script control', () => {
    it('should emit every output it returns', async () => {
      const outputs = await runner.executeScript('ECHO "hello world" again\nECHO done');

      expect(emitted).toEqual(outputs);
      expect(outputs[0]).toMatchObject({ type: 'echo', message: 'hello world again', lineNumber: 1 });
    });

    it('should stop at QUIT', async () => {
      const outputs = await runner.executeScript('ECHO a\nQUIT\nECHO b');

      expect(outputs).toHaveLength(2);
      expect(outputs[1]).toMatchObject({ type: 'info', message: 'Quitting' });
    });

    it('should report the script line of an unterminated string', async () => {
      await expect(runner.executeScript('ECHO a\nECHO "b')).rejects.toThrow(
        'Parse error at line 2: Unterminated string'
      );
    });

    it('should enforce the step limit', async () => {
      ({ runner } = createRunner({ maxStepsPerScript: 2 }));
      const outputs = await runner.executeScript('ECHO a\nECHO b\nECHO c');

      expect(outputs).toHaveLength(3);
      expect(outputs[2]).toMatchObject({
        type: 'error',
        message: 'Step limit exceeded: 3 steps (max: 2)',
        errorType: 'StepLimitExceeded',
        stepCount: 3,
        maxSteps: 2,
      });
      expect(runner.getStepCount()).toBe(3);
    });

    it('should abort between commands', async () => {
      const aborting = new HarnessRunner({}, (output) => {
        if (output.type === 'echo' && output.message === 'stop') {
          aborting.abort();
        }
      });

      const outputs = await aborting.executeScript('ECHO stop\nECHO never');

      expect(outputs).toHaveLength(2);
      expect(outputs[1]).toMatchObject({
        type: 'error',
        message: 'Script aborted: Script was aborted',
        errorType: 'ScriptAborted',
      });
      expect(aborting.isRunning()).toBe(false);
    });

    it('should echo commands when configured', async () => {
      ({ runner, emitted } = createRunner({ echoCommands: true }));
      await runner.executeScript('DOWN');

      expect(emitted.map((output) => output.type)).toEqual(['echo', 'focus']);
      expect(emitted[0]).toMatchObject({ message: 'DOWN' });
    });

    it('should clear rows and focus on RESET', async () => {
      const outputs = await runner.executeScript(`${THREE_ROWS}\nFOCUS k1\nRESET\nSTATE`);

      expect(outputs[4]).toMatchObject({
        type: 'state',
        current: null,
        shadow: null,
        range: { start: 0, end: 0 },
        window: { windowStart: 0, windowLength: 0, rowsAfter: 0 },
      });
    });
  });

  describe('executeLine()', () => {
    it('should return false after QUIT', async () => {
      await expect(runner.executeLine('ECHO hi')).resolves.toBe(true);
      await expect(runner.executeLine('# comment')).resolves.toBe(true);
      await expect(runner.executeLine('quit')).resolves.toBe(false);
      expect(emitted.map((output) => output.type)).toEqual(['echo', 'info']);
    });

    it('should reject an unparseable line', async () => {
      await expect(runner.executeLine('JUMP')).rejects.toThrow(ParseError);
    });

    it('should throw on error when stopping on errors', async () => {
      ({ runner } = createRunner({ stopOnError: true }));
      await expect(runner.executeLine('REMOVE missing')).rejects.toThrow('Row not found: missing');
    });
  });
});
