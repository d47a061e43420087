/**
 * Nested transactions for the position tracker store.
 *
 * Each level keeps the state it started from and the actions applied while
 * it was open. Committing an inner level hands its actions to the level
 * around it; rolling one back drops them. Only the outermost commit yields
 * actions to publish, so subscribers never hear about work that was undone.
 */

import type { TrackerState } from '../../types/state.ts';
import type { TrackerAction } from '../../types/actions.ts';

/**
 * An action together with the states on either side of it.
 * `prevState === nextState` for an edit that touched nothing tracked.
 */
export interface AppliedAction<C, R, S> {
  readonly action: TrackerAction<C, R, S>;
  readonly prevState: TrackerState<C, R, S>;
  readonly nextState: TrackerState<C, R, S>;
}

interface TransactionFrame<C, R, S> {
  readonly snapshot: TrackerState<C, R, S>;
  readonly applied: AppliedAction<C, R, S>[];
}

export interface TransactionManager<C, R, S> {
  /** Open a level that rolls back to `state`. */
  begin(state: TrackerState<C, R, S>): void;

  /** Record an action applied inside the innermost open level. */
  record(applied: AppliedAction<C, R, S>): void;

  /**
   * Close the innermost level, keeping its changes.
   * @returns The actions to publish when this closed the outermost level,
   * otherwise null
   */
  commit(): readonly AppliedAction<C, R, S>[] | null;

  /**
   * Close the innermost level, discarding its changes.
   * @returns The state to restore, or null when no level is open
   */
  rollback(): TrackerState<C, R, S> | null;

  /** Number of open levels. */
  readonly depth: number;

  readonly isActive: boolean;
}

export function createTransactionManager<C, R, S>(): TransactionManager<C, R, S> {
  const frames: TransactionFrame<C, R, S>[] = [];

  function innermost(): TransactionFrame<C, R, S> | null {
    return frames.length > 0 ? frames[frames.length - 1] : null;
  }

  return {
    begin(state) {
      frames.push({ snapshot: state, applied: [] });
    },

    record(applied) {
      const frame = innermost();
      if (frame === null) {
        throw new Error(`Cannot record ${applied.action.type} outside a transaction`);
      }
      frame.applied.push(applied);
    },

    commit() {
      const closed = frames.pop();
      if (closed === undefined) return null;
      const outer = innermost();
      if (outer === null) return closed.applied;
      outer.applied.push(...closed.applied);
      return null;
    },

    rollback() {
      return frames.pop()?.snapshot ?? null;
    },

    get depth() {
      return frames.length;
    },

    get isActive() {
      return frames.length > 0;
    },
  };
}
