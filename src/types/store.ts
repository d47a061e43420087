/**
 * PositionTracker store interface.
 * Framework-agnostic store interface compatible with React's useSyncExternalStore,
 * Redux, Zustand, Vue, Svelte, and vanilla JavaScript.
 */

import type { TrackerState } from './state.ts';
import type { TrackerAction } from './actions.ts';
import type {
  TrackerEventEmitter,
  TrackerEventMap,
  EventHandler,
} from '../store/features/events.ts';

/**
 * Listener function type for store subscriptions.
 */
export type StoreListener = () => void;

/**
 * Unsubscribe function returned by subscribe.
 */
export type Unsubscribe = () => void;

/**
 * Core framework-agnostic store interface.
 */
export interface TrackerStore<C, R, S> {
  /**
   * Subscribe to state changes.
   * @returns Unsubscribe function to remove the listener
   */
  subscribe(listener: StoreListener): Unsubscribe;

  /**
   * Get current immutable state snapshot.
   * Returns the same reference while the state is unchanged.
   */
  getSnapshot(): TrackerState<C, R, S>;

  /**
   * Get server-side snapshot (for SSR/hydration).
   */
  getServerSnapshot(): TrackerState<C, R, S>;

  /**
   * Dispatch an action to modify state.
   * @returns New state after applying the action
   */
  dispatch(action: TrackerAction<C, R, S>): TrackerState<C, R, S>;

  /**
   * Apply several actions as one update.
   * Listeners are notified once; if an action throws, every change made by
   * the batch is rolled back and the error rethrown.
   */
  batch(actions: readonly TrackerAction<C, R, S>[]): TrackerState<C, R, S>;
}

/**
 * Type for the tracker reducer function.
 * Pure function that produces new state from old state + action.
 */
export type TrackerReducer<C, R, S> = (
  state: TrackerState<C, R, S>,
  action: TrackerAction<C, R, S>
) => TrackerState<C, R, S>;

/**
 * Store that also emits typed events describing what changed.
 *
 * @example
 * ```typescript
 * tracker.addEventListener('ranges-change', (event) => {
 *   console.log('Ranges after', event.action.type, event.nextState.ranges);
 * });
 * ```
 */
export interface PositionTracker<C, R, S> extends TrackerStore<C, R, S> {
  addEventListener<K extends keyof TrackerEventMap<C, R, S>>(
    type: K,
    handler: EventHandler<TrackerEventMap<C, R, S>[K]>
  ): Unsubscribe;

  removeEventListener<K extends keyof TrackerEventMap<C, R, S>>(
    type: K,
    handler: EventHandler<TrackerEventMap<C, R, S>[K]>
  ): void;

  /**
   * Access the underlying event emitter for advanced use cases.
   */
  readonly events: TrackerEventEmitter<C, R, S>;
}
