/**
 * Tests for action creators, validation and serialization.
 */

import { describe, it, expect } from 'vitest';
import { TrackerActions, serializeAction, deserializeAction } from './actions.ts';
import {
  isCaretAction,
  isTrackerAction,
  isTransactionAction,
  validateAction,
} from '../../types/actions.ts';

describe('Tracker Actions', () => {
  describe('action creators', () => {
    it('should create frozen edit actions', () => {
      const action = TrackerActions.applyEdit(4, 2, 7);
      expect(action).toEqual({ type: 'APPLY_EDIT', position: 4, erasedLength: 2, insertedLength: 7 });
      expect(Object.isFrozen(action)).toBe(true);
    });

    it('should copy the selection of a caret action', () => {
      const selection = { begin: 3, length: 4, caretOffset: 4 };
      const action = TrackerActions.addCaret(selection, 'secondary');
      expect(action.selection).not.toBe(selection);
      expect(action.selection).toEqual(selection);
      expect(action.data).toBe('secondary');
    });

    it('should omit an unspecified placement', () => {
      expect(TrackerActions.insertRange(1, 2, 'x')).toEqual({ type: 'INSERT_RANGE', start: 1, length: 2, value: 'x' });
      expect(TrackerActions.insertRange(1, 2, 'x', 'before').placement).toBe('before');
    });

    it('should create segment and transaction actions', () => {
      expect(TrackerActions.setSegment(0, 4, 'bold')).toEqual({ type: 'SET_SEGMENT', start: 0, end: 4, value: 'bold' });
      expect(TrackerActions.clearSegments('plain')).toEqual({ type: 'CLEAR_SEGMENTS', value: 'plain' });
      expect(TrackerActions.transactionStart().type).toBe('TRANSACTION_START');
      expect(TrackerActions.transactionCommit().type).toBe('TRANSACTION_COMMIT');
      expect(TrackerActions.transactionRollback().type).toBe('TRANSACTION_ROLLBACK');
    });
  });

  describe('type guards', () => {
    it('should classify caret and transaction actions', () => {
      expect(isCaretAction(TrackerActions.resetCarets())).toBe(true);
      expect(isCaretAction(TrackerActions.clearRanges())).toBe(false);
      expect(isTransactionAction(TrackerActions.transactionCommit())).toBe(true);
      expect(isTransactionAction(TrackerActions.applyEdit(0, 0, 1))).toBe(false);
    });
  });

  describe('validateAction', () => {
    it('should accept every created action', () => {
      const actions = [
        TrackerActions.applyEdit(0, 1, 2),
        TrackerActions.addCaret({ begin: 0, length: 2, caretOffset: 1 }, null),
        TrackerActions.removeCaret(0),
        TrackerActions.resetCarets(),
        TrackerActions.setCarets([{ begin: 1, length: 0, caretOffset: 0, data: 1 }]),
        TrackerActions.insertRange(0, 3, 'r', 'after'),
        TrackerActions.eraseRange(2),
        TrackerActions.clearRanges(),
        TrackerActions.setSegment(1, 3, 's'),
        TrackerActions.clearSegments('s'),
        TrackerActions.transactionStart(),
      ];
      for (const action of actions) {
        expect(validateAction(action)).toEqual({ valid: true, errors: [] });
      }
    });

    it('should reject non-objects and missing types', () => {
      expect(validateAction(null).errors).toEqual(['Action must be a non-null object']);
      expect(validateAction({}).errors).toEqual(['Action must have a string "type" property']);
    });

    it('should reject unknown action types', () => {
      expect(validateAction({ type: 'INSERT' }).errors).toEqual(['Unknown action type: "INSERT"']);
    });

    it('should report invalid positions', () => {
      expect(validateAction({ type: 'APPLY_EDIT', position: -1, erasedLength: 0, insertedLength: 'x' }).errors).toEqual([
        'APPLY_EDIT position cannot be negative: -1',
        'APPLY_EDIT action requires a numeric "insertedLength" property',
      ]);
    });

    it('should report inverted segment ranges and missing values', () => {
      expect(validateAction({ type: 'SET_SEGMENT', start: 5, end: 2 }).errors).toEqual([
        'SET_SEGMENT start (5) cannot be greater than end (2)',
        'SET_SEGMENT action requires a "value" property',
      ]);
    });

    it('should check caret selections', () => {
      const result = validateAction({
        type: 'ADD_CARET',
        selection: { begin: 0, length: 1, caretOffset: 2 },
        data: null,
      });
      expect(result.errors).toEqual(['ADD_CARET selection caretOffset (2) cannot exceed length (1)']);
    });

    it('should reject fractional indices and unknown placements', () => {
      expect(validateAction({ type: 'ERASE_RANGE', index: 1.5 }).errors).toEqual([
        'ERASE_RANGE index must be an integer: 1.5',
      ]);
      expect(validateAction({ type: 'INSERT_RANGE', start: 0, length: 1, value: 1, placement: 'middle' }).errors).toEqual([
        'INSERT_RANGE placement must be "before" or "after": middle',
      ]);
    });

    it('should back isTrackerAction', () => {
      expect(isTrackerAction({ type: 'CLEAR_RANGES' })).toBe(true);
      expect(isTrackerAction({ type: 'REMOVE_CARET' })).toBe(false);
    });
  });

  describe('serialization', () => {
    it('should round-trip an action through JSON', () => {
      const action = TrackerActions.insertRange(3, 4, { severity: 'error' }, 'before');
      expect(deserializeAction(serializeAction(action))).toEqual(action);
    });

    it('should reject invalid JSON actions', () => {
      expect(() => deserializeAction('{"type":"NOPE"}')).toThrow('Invalid deserialized action: {"type":"NOPE"}');
    });
  });
});
