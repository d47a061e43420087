/**
 * Tracker reducer.
 * Pure reducer function for tracker state transitions.
 * No side effects - produces new state from old state + action.
 */

import type { PositionTrackerConfig, TrackerState } from '../../types/state.ts';
import type { TrackerAction } from '../../types/actions.ts';
import type { TrackerReducer } from '../../types/store.ts';
import { withTrackerState } from '../core/state.ts';
import {
  caretSetAdd,
  caretSetFromEntries,
  caretSetRemove,
  caretSetReset,
} from '../core/caret-set.ts';
import {
  rangeRegistryClear,
  rangeRegistryCount,
  rangeRegistryErase,
  rangeRegistryInsert,
  rangeRegistryOnModification,
} from '../core/range-registry.ts';
import {
  segmentMapClear,
  segmentMapOnModification,
  segmentMapSetRange,
} from '../core/segment-map.ts';

// =============================================================================
// Index Validation
// =============================================================================

/**
 * Check an index against a collection size.
 * Out-of-range indices are reported and the action becomes a no-op.
 */
function isValidIndex(kind: string, index: number, count: number): boolean {
  if (!Number.isInteger(index) || index < 0 || index >= count) {
    console.warn(`Invalid ${kind} index: ${index}, expected [0, ${count})`);
    return false;
  }
  return true;
}

/**
 * Replace the changed registries and bump the version.
 * Returns the same state when nothing changed.
 */
function commitChanges<C, R, S>(
  state: TrackerState<C, R, S>,
  changes: Partial<Pick<TrackerState<C, R, S>, 'carets' | 'ranges' | 'segments'>>
): TrackerState<C, R, S> {
  const changed =
    (changes.carets !== undefined && changes.carets !== state.carets) ||
    (changes.ranges !== undefined && changes.ranges !== state.ranges) ||
    (changes.segments !== undefined && changes.segments !== state.segments);
  if (!changed) return state;
  return withTrackerState(state, { ...changes, version: state.version + 1 });
}

// =============================================================================
// Reducer
// =============================================================================

/**
 * Apply one action to tracker state.
 * Transaction actions are handled by the store and leave state unchanged here.
 */
export function trackerReducer<C, R, S>(
  state: TrackerState<C, R, S>,
  action: TrackerAction<C, R, S>,
  config: PositionTrackerConfig<C, S>
): TrackerState<C, R, S> {
  switch (action.type) {
    case 'APPLY_EDIT': {
      const { position, erasedLength, insertedLength } = action;
      return commitChanges(state, {
        ranges: rangeRegistryOnModification(state.ranges, position, erasedLength, insertedLength),
        segments: segmentMapOnModification(state.segments, position, erasedLength, insertedLength),
      });
    }

    case 'ADD_CARET':
      return commitChanges(state, {
        carets: caretSetAdd(state.carets, action.selection, action.data).state,
      });

    case 'REMOVE_CARET': {
      if (!isValidIndex('caret', action.index, state.carets.count)) return state;
      return commitChanges(state, { carets: caretSetRemove(state.carets, action.index) });
    }

    case 'RESET_CARETS':
      return commitChanges(state, { carets: caretSetReset(state.carets, config.defaultCaretData) });

    case 'SET_CARETS':
      return commitChanges(state, { carets: caretSetFromEntries(action.carets) });

    case 'INSERT_RANGE':
      return commitChanges(state, {
        ranges: rangeRegistryInsert(state.ranges, action.start, action.length, action.value, action.placement),
      });

    case 'ERASE_RANGE': {
      if (!isValidIndex('range', action.index, rangeRegistryCount(state.ranges))) return state;
      return commitChanges(state, { ranges: rangeRegistryErase(state.ranges, action.index) });
    }

    case 'CLEAR_RANGES':
      if (state.ranges.root === null) return state;
      return commitChanges(state, { ranges: rangeRegistryClear<R>() });

    case 'SET_SEGMENT':
      return commitChanges(state, {
        segments: segmentMapSetRange(state.segments, action.start, action.end, action.value),
      });

    case 'CLEAR_SEGMENTS':
      return commitChanges(state, { segments: segmentMapClear(state.segments, action.value) });

    case 'TRANSACTION_START':
    case 'TRANSACTION_COMMIT':
    case 'TRANSACTION_ROLLBACK':
      // Transaction handling is done in the store, not the reducer
      return state;

    default: {
      // Exhaustive at compile time; actions from untyped sources still reach here
      const unknownAction: never = action;
      console.warn('Ignoring unknown tracker action:', unknownAction);
      return state;
    }
  }
}

/**
 * Bind a reducer to a tracker configuration.
 */
export function createTrackerReducer<C, R, S>(
  config: PositionTrackerConfig<C, S>
): TrackerReducer<C, R, S> {
  return (state, action) => trackerReducer(state, action, config);
}
