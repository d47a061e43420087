/**
 * Action creator functions for the position tracker.
 * Provides type-safe factory functions for creating tracker actions.
 */

import type { CaretEntry, CaretSelection, RangePlacement } from '../../types/state.ts';
import type {
  TrackerAction,
  ApplyEditAction,
  AddCaretAction,
  RemoveCaretAction,
  ResetCaretsAction,
  SetCaretsAction,
  InsertRangeAction,
  EraseRangeAction,
  ClearRangesAction,
  SetSegmentAction,
  ClearSegmentsAction,
  TransactionStartAction,
  TransactionCommitAction,
  TransactionRollbackAction,
} from '../../types/actions.ts';
import { isTrackerAction } from '../../types/actions.ts';

/**
 * Action creators for tracker mutations.
 * All functions return serializable action objects.
 */
export const TrackerActions = {
  /**
   * Report an edit to the underlying document.
   * @param position - Where the edit happened
   * @param erasedLength - Units removed at `position`
   * @param insertedLength - Units inserted at `position`
   */
  applyEdit(position: number, erasedLength: number, insertedLength: number): ApplyEditAction {
    return Object.freeze({ type: 'APPLY_EDIT', position, erasedLength, insertedLength });
  },

  /**
   * Add a caret with an optional selection around it.
   */
  addCaret<C>(selection: CaretSelection, data: C): AddCaretAction<C> {
    return Object.freeze({
      type: 'ADD_CARET',
      selection: Object.freeze({
        begin: selection.begin,
        length: selection.length,
        caretOffset: selection.caretOffset,
      }),
      data,
    });
  },

  removeCaret(index: number): RemoveCaretAction {
    return Object.freeze({ type: 'REMOVE_CARET', index });
  },

  resetCarets(): ResetCaretsAction {
    return Object.freeze({ type: 'RESET_CARETS' });
  },

  setCarets<C>(carets: readonly CaretEntry<C>[]): SetCaretsAction<C> {
    return Object.freeze({ type: 'SET_CARETS', carets: Object.freeze([...carets]) });
  },

  /**
   * Register a range.
   * @param placement - Order among ranges starting at the same position
   */
  insertRange<R>(start: number, length: number, value: R, placement?: RangePlacement): InsertRangeAction<R> {
    const action: InsertRangeAction<R> = placement === undefined
      ? { type: 'INSERT_RANGE', start, length, value }
      : { type: 'INSERT_RANGE', start, length, value, placement };
    return Object.freeze(action);
  },

  eraseRange(index: number): EraseRangeAction {
    return Object.freeze({ type: 'ERASE_RANGE', index });
  },

  clearRanges(): ClearRangesAction {
    return Object.freeze({ type: 'CLEAR_RANGES' });
  },

  /**
   * Set positions [start, end) to a segment value.
   */
  setSegment<S>(start: number, end: number, value: S): SetSegmentAction<S> {
    return Object.freeze({ type: 'SET_SEGMENT', start, end, value });
  },

  clearSegments<S>(value: S): ClearSegmentsAction<S> {
    return Object.freeze({ type: 'CLEAR_SEGMENTS', value });
  },

  /**
   * Start a transaction.
   * Changes are not visible to listeners until commit.
   */
  transactionStart(): TransactionStartAction {
    return Object.freeze({ type: 'TRANSACTION_START' });
  },

  transactionCommit(): TransactionCommitAction {
    return Object.freeze({ type: 'TRANSACTION_COMMIT' });
  },

  transactionRollback(): TransactionRollbackAction {
    return Object.freeze({ type: 'TRANSACTION_ROLLBACK' });
  },
} as const;

/**
 * Serialize an action to JSON string.
 * Caret data, range and segment values must be JSON-serializable.
 */
export function serializeAction<C, R, S>(action: TrackerAction<C, R, S>): string {
  return JSON.stringify(action);
}

/**
 * Deserialize an action from JSON string.
 * Useful for replaying actions from logs. Payload values are not checked.
 */
export function deserializeAction(json: string): TrackerAction<unknown, unknown, unknown> {
  const parsed: unknown = JSON.parse(json);
  if (!isTrackerAction(parsed)) {
    throw new Error(`Invalid deserialized action: ${JSON.stringify(parsed)}`);
  }
  return parsed;
}
