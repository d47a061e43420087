/**
 * Event system for the position tracker.
 * Provides a pub/sub mechanism describing which registries an action changed.
 */

import type { TrackerState } from '../../types/state.ts';
import type { ApplyEditAction, TrackerAction } from '../../types/actions.ts';

// =============================================================================
// Event Types
// =============================================================================

/**
 * Base event interface.
 */
export interface TrackerEvent {
  readonly type: string;
  readonly timestamp: number;
}

/**
 * Fired after an edit has been applied to the registries.
 */
export interface EditEvent<C, R, S> extends TrackerEvent {
  readonly type: 'edit';
  readonly action: ApplyEditAction;
  readonly prevState: TrackerState<C, R, S>;
  readonly nextState: TrackerState<C, R, S>;
  /** Range of positions affected after the edit [position, position + insertedLength) */
  readonly affectedRange: readonly [number, number];
}

/**
 * Fired when a registry's contents changed.
 */
export interface RegistryChangeEvent<T extends string, C, R, S> extends TrackerEvent {
  readonly type: T;
  readonly action: TrackerAction<C, R, S>;
  readonly prevState: TrackerState<C, R, S>;
  readonly nextState: TrackerState<C, R, S>;
}

export type CaretsChangeEvent<C, R, S> = RegistryChangeEvent<'carets-change', C, R, S>;
export type RangesChangeEvent<C, R, S> = RegistryChangeEvent<'ranges-change', C, R, S>;
export type SegmentsChangeEvent<C, R, S> = RegistryChangeEvent<'segments-change', C, R, S>;

/**
 * Union of all tracker events.
 */
export type AnyTrackerEvent<C, R, S> =
  | EditEvent<C, R, S>
  | CaretsChangeEvent<C, R, S>
  | RangesChangeEvent<C, R, S>
  | SegmentsChangeEvent<C, R, S>;

/**
 * Event type to event mapping.
 */
export interface TrackerEventMap<C, R, S> {
  'edit': EditEvent<C, R, S>;
  'carets-change': CaretsChangeEvent<C, R, S>;
  'ranges-change': RangesChangeEvent<C, R, S>;
  'segments-change': SegmentsChangeEvent<C, R, S>;
}

// =============================================================================
// Event Handler Types
// =============================================================================

/**
 * Handler function for a specific event type.
 */
export type EventHandler<T extends TrackerEvent> = (event: T) => void;

/**
 * Unsubscribe function returned by addEventListener.
 */
export type Unsubscribe = () => void;

// =============================================================================
// Event Emitter
// =============================================================================

/**
 * Type-safe pub/sub for tracker events.
 */
export interface TrackerEventEmitter<C, R, S> {
  /**
   * Add an event listener for a specific event type.
   * @returns Unsubscribe function
   */
  addEventListener<K extends keyof TrackerEventMap<C, R, S>>(
    type: K,
    handler: EventHandler<TrackerEventMap<C, R, S>[K]>
  ): Unsubscribe;

  removeEventListener<K extends keyof TrackerEventMap<C, R, S>>(
    type: K,
    handler: EventHandler<TrackerEventMap<C, R, S>[K]>
  ): void;

  /**
   * Emit an event to all registered handlers.
   * A handler that throws is reported and does not stop the others.
   */
  emit<K extends keyof TrackerEventMap<C, R, S>>(
    type: K,
    event: TrackerEventMap<C, R, S>[K]
  ): void;

  /** Number of handlers registered for an event type. */
  listenerCount(type: keyof TrackerEventMap<C, R, S>): number;

  removeAllListeners(): void;
}

/**
 * Create a new tracker event emitter.
 */
export function createEventEmitter<C, R, S>(): TrackerEventEmitter<C, R, S> {
  type HandlerMap = { [K in keyof TrackerEventMap<C, R, S>]: Set<EventHandler<TrackerEventMap<C, R, S>[K]>> };
  const handlers: HandlerMap = {
    'edit': new Set(),
    'carets-change': new Set(),
    'ranges-change': new Set(),
    'segments-change': new Set(),
  };

  return {
    addEventListener(type, handler) {
      handlers[type].add(handler);
      return () => {
        handlers[type].delete(handler);
      };
    },

    removeEventListener(type, handler) {
      handlers[type].delete(handler);
    },

    emit(type, event) {
      for (const handler of handlers[type]) {
        try {
          handler(event);
        } catch (error) {
          console.error(`Event handler error for '${type}':`, error);
        }
      }
    },

    listenerCount(type) {
      return handlers[type].size;
    },

    removeAllListeners() {
      for (const set of Object.values(handlers)) {
        set.clear();
      }
    },
  };
}

// =============================================================================
// Event Helpers
// =============================================================================

/**
 * Create an edit event.
 */
export function createEditEvent<C, R, S>(
  action: ApplyEditAction,
  prevState: TrackerState<C, R, S>,
  nextState: TrackerState<C, R, S>
): EditEvent<C, R, S> {
  return Object.freeze({
    type: 'edit' as const,
    timestamp: Date.now(),
    action,
    prevState,
    nextState,
    affectedRange: getAffectedRange(action),
  });
}

/**
 * Create a registry change event.
 */
export function createRegistryChangeEvent<T extends 'carets-change' | 'ranges-change' | 'segments-change', C, R, S>(
  type: T,
  action: TrackerAction<C, R, S>,
  prevState: TrackerState<C, R, S>,
  nextState: TrackerState<C, R, S>
): RegistryChangeEvent<T, C, R, S> {
  return Object.freeze({
    type,
    timestamp: Date.now(),
    action,
    prevState,
    nextState,
  });
}

/**
 * Positions covered by the inserted text after an edit.
 */
export function getAffectedRange(action: ApplyEditAction): readonly [number, number] {
  return [action.position, action.position + action.insertedLength];
}
