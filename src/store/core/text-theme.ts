/**
 * Text theme: color, style and weight of every position in a document.
 * Each parameter lives in its own segment map, so a change to one never
 * splits the runs of the others.
 */

import type {
  SegmentLocation,
  SegmentMapState,
  TextThemeMember,
  TextThemeSpec,
  TextThemeState,
} from '../../types/state.ts';
import { withTextThemeState } from './state.ts';
import {
  segmentMapCheckIntegrity,
  segmentMapClear,
  segmentMapGetValueAt,
  segmentMapOnModification,
  segmentMapRunsFrom,
  segmentMapSetRange,
} from './segment-map.ts';

// =============================================================================
// Operations
// =============================================================================

/**
 * Theme of the text at a position.
 */
export function textThemeGetAt<C, S, W>(
  state: TextThemeState<C, S, W>,
  position: number
): TextThemeSpec<C, S, W> {
  return Object.freeze({
    color: segmentMapGetValueAt(state.color, position),
    style: segmentMapGetValueAt(state.style, position),
    weight: segmentMapGetValueAt(state.weight, position),
  });
}

/**
 * Give every position in [begin, end) the theme `spec`.
 */
export function textThemeSetRange<C, S, W>(
  state: TextThemeState<C, S, W>,
  begin: number,
  end: number,
  spec: TextThemeSpec<C, S, W>
): TextThemeState<C, S, W> {
  return withTextThemeState(state, {
    color: segmentMapSetRange(state.color, begin, end, spec.color),
    style: segmentMapSetRange(state.style, begin, end, spec.style),
    weight: segmentMapSetRange(state.weight, begin, end, spec.weight),
  });
}

/**
 * Adjust every parameter for an edit, as segmentMapOnModification does.
 */
export function textThemeOnModification<C, S, W>(
  state: TextThemeState<C, S, W>,
  position: number,
  erasedLength: number,
  insertedLength: number
): TextThemeState<C, S, W> {
  return withTextThemeState(state, {
    color: segmentMapOnModification(state.color, position, erasedLength, insertedLength),
    style: segmentMapOnModification(state.style, position, erasedLength, insertedLength),
    weight: segmentMapOnModification(state.weight, position, erasedLength, insertedLength),
  });
}

/**
 * Give all text the theme `spec`.
 */
export function textThemeClear<C, S, W>(
  state: TextThemeState<C, S, W>,
  spec: TextThemeSpec<C, S, W>
): TextThemeState<C, S, W> {
  return withTextThemeState(state, {
    color: segmentMapClear(state.color, spec.color),
    style: segmentMapClear(state.style, spec.style),
    weight: segmentMapClear(state.weight, spec.weight),
  });
}

export function textThemeCheckIntegrity<C, S, W>(state: TextThemeState<C, S, W>): boolean {
  return (
    segmentMapCheckIntegrity(state.color) &&
    segmentMapCheckIntegrity(state.style) &&
    segmentMapCheckIntegrity(state.weight)
  );
}

// =============================================================================
// Position Iterator
// =============================================================================

/**
 * Walks a theme forward, reporting which parameters change on the way.
 * Used by renderers that draw text run by run.
 */
export interface ThemePositionIterator<C, S, W> {
  /** Theme at the current position */
  readonly current: TextThemeSpec<C, S, W>;
  readonly position: number;

  /**
   * Move to `position`, which must not be before the current one.
   * @returns The parameters whose value differs from before the move
   */
  moveForward(position: number): TextThemeMember[];

  /**
   * Distance from the current position to the next change of any
   * parameter, or Infinity when none changes again.
   */
  forecast(): number;
}

interface ParameterCursor<V> {
  readonly value: () => V;
  /** Move to `position`; true when the value changed */
  readonly advance: (position: number) => boolean;
  /** Where the run holding the current value ends, Infinity for the tail */
  readonly nextChange: () => number;
}

function createParameterCursor<V>(map: SegmentMapState<V>, position: number): ParameterCursor<V> {
  let runs = segmentMapRunsFrom(map, position);
  let value = map.tailValue;
  let nextPosition = Infinity;

  function enter(run: SegmentLocation<V>): void {
    value = run.value;
    // Only the tail sentinel has length 0
    nextPosition = run.length === 0 ? Infinity : run.start + run.length;
  }

  function restart(at: number): void {
    runs = segmentMapRunsFrom(map, at);
    const first = runs.next();
    if (!first.done) {
      enter(first.value);
    }
  }

  restart(position);

  return {
    value: () => value,

    advance(target) {
      if (target < nextPosition) {
        return false;
      }
      const previous = value;
      // Usually the target lies in the very next run
      const next = runs.next();
      if (!next.done && next.value.length > 0 && target < next.value.start + next.value.length) {
        enter(next.value);
      } else {
        restart(target);
      }
      return !map.equals(previous, value);
    },

    nextChange: () => nextPosition,
  };
}

/**
 * Create an iterator over `state` starting at `position`.
 *
 * @example
 * ```typescript
 * const iterator = createThemePositionIterator(theme, 0);
 * while (iterator.forecast() !== Infinity) {
 *   const changed = iterator.moveForward(iterator.position + iterator.forecast());
 *   console.log(iterator.position, changed, iterator.current);
 * }
 * ```
 */
export function createThemePositionIterator<C, S, W>(
  state: TextThemeState<C, S, W>,
  position: number
): ThemePositionIterator<C, S, W> {
  const color = createParameterCursor(state.color, position);
  const style = createParameterCursor(state.style, position);
  const weight = createParameterCursor(state.weight, position);
  let current = textThemeGetAt(state, position);
  let at = position;

  return {
    get current() {
      return current;
    },

    get position() {
      return at;
    },

    moveForward(target) {
      if (target < at) {
        throw new Error(`moveForward: cannot move back from ${at} to ${target}`);
      }
      const changed: TextThemeMember[] = [];
      if (color.advance(target)) changed.push('color');
      if (style.advance(target)) changed.push('style');
      if (weight.advance(target)) changed.push('weight');
      at = target;
      if (changed.length > 0) {
        current = Object.freeze({ color: color.value(), style: style.value(), weight: weight.value() });
      }
      return changed;
    },

    forecast() {
      return Math.min(color.nextChange(), style.nextChange(), weight.nextChange()) - at;
    },
  };
}
