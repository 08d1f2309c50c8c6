/**
 * Row Focus Engine - RowLocator Unit Tests
 *
 * Covers:
 * - Key / index / id lookups and their index arithmetic
 * - Window bounds
 * - findInRange tie-break order, boundary substitution and degenerate inputs
 */

import { describe, it, expect, vi } from 'vitest';
import {
  findByKey,
  findByIndex,
  findById,
  findInRange,
  windowBounds,
} from './RowLocator.js';
import { createCollatedView, type CollatedView } from '../collation/CollatedView.js';
import type { FocusLogger, RowId } from '../types/index.js';

// =============================================================================
// Fixtures
// =============================================================================

function sampleView(windowStart = 0, rowsAfter = 0): CollatedView<string, string> {
  return createCollatedView<string, string>(
    [
      [0, 'k0', 'hello'],
      [100, 'k1', 'there'],
      [200, 'k4', 'world'],
    ],
    { windowStart, rowsAfter }
  );
}

function abcView(): CollatedView<string, number> {
  return createCollatedView<string, number>([
    [10, 'a', 1],
    [20, 'b', 2],
    [30, 'c', 3],
  ]);
}

/**
 * A view whose metadata claims more rows than it carries.
 */
function inconsistentView(): CollatedView<string, string> {
  const rows = new Map<RowId, { key: string; data: string }>([
    [0, { key: 'k0', data: 'hello' }],
    [100, { key: 'k1', data: 'there' }],
    [200, { key: 'k4', data: 'world' }],
  ]);
  return { windowStart: 0, windowLength: 5, rowsAfter: 0, rows };
}

function silentLogger(): FocusLogger {
  return { warn: vi.fn(), error: vi.fn() };
}

// =============================================================================
// Lookups
// =============================================================================

describe('RowLocator', () => {
  describe('windowBounds()', () => {
    it('should return half-open bounds of the window', () => {
      expect(windowBounds(sampleView())).toEqual([0, 3]);
      expect(windowBounds(sampleView(10, 4))).toEqual([10, 13]);
    });
  });

  describe('findByKey()', () => {
    it('should find a row and compute its logical index', () => {
      expect(findByKey(sampleView(), 'k1')).toEqual({ key: 'k1', id: 100, index: 1 });
    });

    it('should offset the index by rows before the window', () => {
      expect(findByKey(sampleView(10), 'k4')).toEqual({ key: 'k4', id: 200, index: 12 });
    });

    it('should return null for a missing key', () => {
      expect(findByKey(sampleView(), 'k2')).toBeNull();
    });

    it('should use the supplied key equality', () => {
      const caseless = (a: string, b: string) => a.toLowerCase() === b.toLowerCase();
      expect(findByKey(sampleView(), 'K4', caseless)).toEqual({ key: 'k4', id: 200, index: 2 });
    });
  });

  describe('findByIndex()', () => {
    it('should return a triple whose index equals the requested index', () => {
      const view = sampleView(7, 2);
      for (let i = 7; i < 10; i++) {
        expect(findByIndex(view, i)?.index).toBe(i);
      }
    });

    it('should return the row at that position', () => {
      expect(findByIndex(sampleView(), 2)).toEqual({ key: 'k4', id: 200, index: 2 });
    });

    it('should return null outside the window', () => {
      const view = sampleView(5);
      expect(findByIndex(view, 4)).toBeNull();
      expect(findByIndex(view, 8)).toBeNull();
      expect(findByIndex(view, -1)).toBeNull();
    });

    it('should return null for a non-integer index', () => {
      expect(findByIndex(sampleView(), 1.5)).toBeNull();
    });

    it('should return null on an empty window', () => {
      expect(findByIndex(createCollatedView<string, string>([]), 0)).toBeNull();
    });
  });

  describe('findById()', () => {
    it('should find a row by id', () => {
      expect(findById(sampleView(), 200)).toEqual({ key: 'k4', id: 200, index: 2 });
    });

    it('should return null for an unknown id', () => {
      expect(findById(sampleView(), 300)).toBeNull();
    });

    it('should agree with findByKey on the index', () => {
      const view = sampleView(3, 1);
      for (const [id, entry] of view.rows) {
        expect(findById(view, id)?.index).toBe(findByKey(view, entry.key)?.index);
      }
    });
  });

  // ===========================================================================
  // findInRange
  // ===========================================================================

  describe('findInRange()', () => {
    it('should answer yes when the row is inside the range', () => {
      const result = findInRange({
        range: { start: 0, end: 2 },
        view: abcView(),
        key: 'b',
        id: 20,
        index: 1,
      });
      expect(result).toEqual({ kind: 'yes' });
    });

    it('should treat both range ends as inclusive', () => {
      const view = abcView();
      expect(findInRange({ range: { start: 1, end: 2 }, view, key: 'b', id: 20, index: 1 }))
        .toEqual({ kind: 'yes' });
      expect(findInRange({ range: { start: 1, end: 2 }, view, key: 'c', id: 30, index: 2 }))
        .toEqual({ kind: 'yes' });
    });

    it('should substitute the range start when the row is above it', () => {
      const result = findInRange({
        range: { start: 1, end: 2 },
        view: abcView(),
        key: 'a',
        id: 10,
        index: 0,
      });
      expect(result).toEqual({ kind: 'noButThisOneIs', triple: { key: 'b', id: 20, index: 1 } });
    });

    it('should substitute the range end when the row is below it', () => {
      const result = findInRange({
        range: { start: 0, end: 1 },
        view: abcView(),
        key: 'c',
        id: 30,
        index: 2,
      });
      expect(result).toEqual({ kind: 'noButThisOneIs', triple: { key: 'b', id: 20, index: 1 } });
    });

    describe('tie-break order', () => {
      // key -> c (index 2), index -> b (index 1), id -> a (index 0)
      it('should prefer the key over the index and the id', () => {
        const result = findInRange({
          range: { start: 0, end: 1 },
          view: abcView(),
          key: 'c',
          id: 10,
          index: 1,
        });
        // index or id would have answered yes
        expect(result).toEqual({ kind: 'noButThisOneIs', triple: { key: 'b', id: 20, index: 1 } });
      });

      it('should prefer the index over the id when the key is gone', () => {
        const result = findInRange({
          range: { start: 0, end: 1 },
          view: abcView(),
          key: 'gone',
          id: 10,
          index: 2,
        });
        expect(result).toEqual({ kind: 'noButThisOneIs', triple: { key: 'b', id: 20, index: 1 } });
      });

      it('should fall back to the id when key and index both miss', () => {
        const result = findInRange({
          range: { start: 0, end: 1 },
          view: abcView(),
          key: 'gone',
          id: 10,
          index: 9,
        });
        expect(result).toEqual({ kind: 'yes' });
      });

      it('should use the row at the range start when nothing resolves', () => {
        const result = findInRange({
          range: { start: 1, end: 2 },
          view: abcView(),
          key: 'gone',
          id: 99,
          index: 9,
        });
        expect(result).toEqual({ kind: 'noButThisOneIs', triple: { key: 'b', id: 20, index: 1 } });
      });
    });

    describe('degenerate inputs', () => {
      it('should be indeterminate for an empty window', () => {
        const result = findInRange({
          range: { start: 0, end: 5 },
          view: createCollatedView<string, number>([]),
          key: 'a',
          id: 10,
          index: 0,
        });
        expect(result).toEqual({ kind: 'indeterminate' });
      });

      it('should be indeterminate when the range is inverted', () => {
        const result = findInRange({
          range: { start: 2, end: 1 },
          view: abcView(),
          key: 'a',
          id: 10,
          index: 0,
        });
        expect(result).toEqual({ kind: 'indeterminate' });
      });

      it('should be indeterminate when the window starts after the range', () => {
        const result = findInRange({
          range: { start: 0, end: 5 },
          view: sampleView(10),
          key: 'k0',
          id: 0,
          index: 10,
        });
        expect(result).toEqual({ kind: 'indeterminate' });
      });

      it('should be indeterminate when the window ends before the range', () => {
        const result = findInRange({
          range: { start: 3, end: 8 },
          view: sampleView(),
          key: 'k0',
          id: 0,
          index: 0,
        });
        expect(result).toEqual({ kind: 'indeterminate' });
      });

      it('should log and degrade when an in-window row is missing', () => {
        const logger = silentLogger();
        const result = findInRange({
          range: { start: 4, end: 4 },
          view: inconsistentView(),
          key: 'k0',
          id: 0,
          index: 0,
          logger,
        });
        expect(result).toEqual({ kind: 'indeterminate' });
        expect(logger.warn).toHaveBeenCalledTimes(1);
      });

      it('should be indeterminate when the fallback lookup misses', () => {
        const logger = silentLogger();
        const result = findInRange({
          range: { start: 4, end: 6 },
          view: inconsistentView(),
          key: 'gone',
          id: 999,
          index: 9,
          logger,
        });
        expect(result).toEqual({ kind: 'indeterminate' });
        expect(logger.warn).not.toHaveBeenCalled();
      });
    });

    it('should not mutate the view', () => {
      const view = abcView();
      const before = [...view.rows.entries()];
      findInRange({ range: { start: 0, end: 1 }, view, key: 'c', id: 30, index: 2 });
      expect([...view.rows.entries()]).toEqual(before);
    });
  });
});
