/**
 * Position tracker store.
 * Framework-agnostic store holding carets, ranges and segments, with
 * nested transactions and typed change events.
 */

import type { PositionTrackerConfig, TrackerState } from '../../types/state.ts';
import type { TrackerAction } from '../../types/actions.ts';
import type {
  PositionTracker,
  StoreListener,
  TrackerStore,
  Unsubscribe,
} from '../../types/store.ts';
import { createInitialTrackerState, DEFAULT_TRACKER_OPTIONS } from '../core/state.ts';
import { caretSetCheckIntegrity } from '../core/caret-set.ts';
import { rangeRegistryCheckIntegrity } from '../core/range-registry.ts';
import { segmentMapCheckIntegrity } from '../core/segment-map.ts';
import { trackerReducer } from './reducer.ts';
import { createTransactionManager, type AppliedAction } from './transaction.ts';
import {
  createEventEmitter,
  createEditEvent,
  createRegistryChangeEvent,
  type TrackerEventEmitter,
} from './events.ts';

/**
 * Name of the first registry whose integrity check fails, or null.
 */
export function findIntegrityViolation<C, R, S>(state: TrackerState<C, R, S>): string | null {
  if (!caretSetCheckIntegrity(state.carets)) return 'carets';
  if (!rangeRegistryCheckIntegrity(state.ranges)) return 'ranges';
  if (!segmentMapCheckIntegrity(state.segments)) return 'segments';
  return null;
}

/**
 * Build a tracker store that hands every published batch of applied actions
 * to `onPublish` after notifying subscribers.
 */
function createStoreCore<C, R, S>(
  config: PositionTrackerConfig<C, S>,
  onPublish?: (applied: readonly AppliedAction<C, R, S>[]) => void
): TrackerStore<C, R, S> {
  const validateIntegrity = config.validateIntegrity ?? DEFAULT_TRACKER_OPTIONS.validateIntegrity;
  let state = createInitialTrackerState<C, R, S>(config);
  const listeners = new Set<StoreListener>();
  const transaction = createTransactionManager<C, R, S>();

  /**
   * Notify all listeners of state change.
   * Only called when not in a transaction.
   */
  function notifyListeners(): void {
    for (const listener of listeners) {
      try {
        listener();
      } catch (error) {
        // Don't let one listener's error affect others
        console.error('Store listener threw an error:', error);
      }
    }
  }

  function publish(applied: readonly AppliedAction<C, R, S>[]): void {
    if (applied.some((entry) => entry.prevState !== entry.nextState)) {
      notifyListeners();
    }
    onPublish?.(applied);
  }

  function subscribe(listener: StoreListener): Unsubscribe {
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  }

  function getSnapshot(): TrackerState<C, R, S> {
    return state;
  }

  function getServerSnapshot(): TrackerState<C, R, S> {
    return state;
  }

  function dispatch(action: TrackerAction<C, R, S>): TrackerState<C, R, S> {
    switch (action.type) {
      case 'TRANSACTION_START':
        transaction.begin(state);
        return state;

      case 'TRANSACTION_COMMIT': {
        const applied = transaction.commit();
        if (applied !== null) {
          publish(applied);
        }
        return state;
      }

      case 'TRANSACTION_ROLLBACK': {
        // Nothing since the matching start was published, so there is nobody to notify
        state = transaction.rollback() ?? state;
        return state;
      }
    }

    const prevState = state;
    const nextState = trackerReducer(state, action, config);
    if (nextState === prevState && action.type !== 'APPLY_EDIT') {
      return state;
    }

    if (validateIntegrity && nextState !== prevState) {
      const violation = findIntegrityViolation(nextState);
      if (violation !== null) {
        throw new Error(
          `Position tracker integrity check failed after ${action.type}: ${violation} are inconsistent`
        );
      }
    }

    state = nextState;
    const applied: AppliedAction<C, R, S> = Object.freeze({ action, prevState, nextState });
    if (transaction.isActive) {
      transaction.record(applied);
    } else {
      publish([applied]);
    }
    return state;
  }

  function batch(actions: readonly TrackerAction<C, R, S>[]): TrackerState<C, R, S> {
    if (actions.length === 0) {
      return state;
    }

    const outerDepth = transaction.depth;
    dispatch({ type: 'TRANSACTION_START' });

    let success = false;
    try {
      for (const action of actions) {
        dispatch(action);
      }
      // Also closes any transaction the actions left open
      while (transaction.depth > outerDepth) {
        dispatch({ type: 'TRANSACTION_COMMIT' });
      }
      success = true;
    } finally {
      if (!success) {
        while (transaction.depth > outerDepth) {
          dispatch({ type: 'TRANSACTION_ROLLBACK' });
        }
      }
    }

    return state;
  }

  return {
    subscribe,
    getSnapshot,
    getServerSnapshot,
    dispatch,
    batch,
  };
}

/**
 * Create a tracker store without events.
 *
 * Inside a transaction, subscribers hear nothing until the outermost
 * commit. A rollback restores the state its transaction started from.
 *
 * @example
 * ```typescript
 * const store = createTrackerStore({ defaultCaretData: null, segmentValue: 'plain' });
 * store.dispatch(TrackerActions.insertRange(4, 6, 'warning'));
 * store.dispatch(TrackerActions.applyEdit(0, 0, 2));
 * ```
 */
export function createTrackerStore<C, R, S>(
  config: PositionTrackerConfig<C, S>
): TrackerStore<C, R, S> {
  return createStoreCore<C, R, S>(config);
}

/**
 * Emit the events describing one applied action.
 */
function emitEventsForAction<C, R, S>(
  emitter: TrackerEventEmitter<C, R, S>,
  { action, prevState, nextState }: AppliedAction<C, R, S>
): void {
  if (action.type === 'APPLY_EDIT') {
    emitter.emit('edit', createEditEvent(action, prevState, nextState));
  }
  if (prevState.carets !== nextState.carets) {
    emitter.emit('carets-change', createRegistryChangeEvent('carets-change', action, prevState, nextState));
  }
  if (prevState.ranges !== nextState.ranges) {
    emitter.emit('ranges-change', createRegistryChangeEvent('ranges-change', action, prevState, nextState));
  }
  if (prevState.segments !== nextState.segments) {
    emitter.emit('segments-change', createRegistryChangeEvent('segments-change', action, prevState, nextState));
  }
}

/**
 * Create a position tracker: a tracker store that also emits events.
 *
 * Every `APPLY_EDIT` emits `edit`, even when nothing tracked moved; the
 * `*-change` events fire only for the registries an action replaced.
 * Events for actions inside a transaction are held back until the
 * outermost commit and dropped on rollback.
 *
 * @example
 * ```typescript
 * const tracker = createPositionTracker({
 *   defaultCaretData: { primary: true },
 *   segmentValue: 'plain',
 * });
 * tracker.addEventListener('edit', (event) => {
 *   console.log('Edited', event.affectedRange);
 * });
 * tracker.dispatch(TrackerActions.applyEdit(10, 3, 5));
 * ```
 */
export function createPositionTracker<C, R, S>(
  config: PositionTrackerConfig<C, S>
): PositionTracker<C, R, S> {
  const emitter = createEventEmitter<C, R, S>();
  const baseStore = createStoreCore<C, R, S>(config, (applied) => {
    for (const entry of applied) {
      emitEventsForAction(emitter, entry);
    }
  });

  return {
    ...baseStore,
    addEventListener: emitter.addEventListener,
    removeEventListener: emitter.removeEventListener,
    events: emitter,
  };
}
