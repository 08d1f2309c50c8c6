/**
 * Row Focus Engine - Collation Module Exports
 */

export {
  createCollatedView,
  emptyCollatedView,
  totalRows,
} from './CollatedView.js';
export type {
  CollatedEntry,
  CollatedView,
  CollatedViewOptions,
} from './CollatedView.js';

export { RowCollator, createRowCollator } from './RowCollator.js';
export type {
  RowPredicate,
  RowComparator,
  RowWindow,
} from './RowCollator.js';
