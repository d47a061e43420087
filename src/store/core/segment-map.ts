/**
 * Run-length segment map.
 * Classifies every position in [0, infinity) with a value, stored as
 * (value, length) runs followed by an implicit tail run. Neighbouring runs
 * always hold different values and the last run never holds the tail value.
 */

import type {
  SegmentLocation,
  SegmentMapState,
  SegmentNode,
  SegmentRun,
} from '../../types/state.ts';
import { createSegmentNode, withSegmentMapState, withSegmentNode } from './state.ts';
import {
  buildFromLeaves,
  checkIntegrity,
  countOf,
  findCustom,
  inOrder,
  inOrderFrom,
  nodeAt,
  replaceRange,
} from './rb-tree.ts';

// =============================================================================
// Lookup Helpers
// =============================================================================

interface RunPosition {
  readonly index: number;
  readonly start: number;
}

function assertPosition(operation: string, name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`${operation}: ${name} must be a non-negative number, got ${value}`);
  }
}

/**
 * First run whose end is > position, or with `inclusiveEnd` >= position.
 * Returns the run count and the covered length when there is none.
 */
function locateRun<V>(
  root: SegmentNode<V> | null,
  position: number,
  inclusiveEnd: boolean
): RunPosition {
  // `base` is the length covered before the current subtree
  const found = findCustom<SegmentNode<V>, { readonly base: number; readonly start: number }>(
    root,
    (node, { base, start }) => {
      const runStart = base + (node.left?.subtreeLength ?? 0);
      const runEnd = runStart + node.length;
      if (inclusiveEnd ? runEnd >= position : runEnd > position) {
        return { branch: -1, target: { base, start: runStart } };
      }
      return { branch: 1, target: { base: runEnd, start } };
    },
    { base: 0, start: root?.subtreeLength ?? 0 }
  );
  return { index: found.index, start: found.target.start };
}

function runAt<V>(root: SegmentNode<V> | null, index: number): SegmentNode<V> {
  const node = nodeAt(root, index);
  if (node === null) {
    throw new Error(`Segment index ${index} is out of range [0, ${countOf(root)})`);
  }
  return node;
}

function toRun<V>(node: SegmentNode<V>): SegmentRun<V> {
  return { value: node.value, length: node.length };
}

/**
 * Replace runs [lo, hi) with `runs`, dropping empty runs, coalescing equal
 * neighbours and folding a trailing tail-valued run into the tail.
 * The window must include the unchanged neighbours on both sides so that
 * the result never leaves two equal runs adjacent.
 */
function replaceWindow<V>(
  state: SegmentMapState<V>,
  lo: number,
  hi: number,
  runs: readonly SegmentRun<V>[]
): SegmentMapState<V> {
  const coalesced: SegmentRun<V>[] = [];
  for (const run of runs) {
    if (run.length <= 0) continue;
    const last = coalesced.length > 0 ? coalesced[coalesced.length - 1] : null;
    if (last !== null && state.equals(last.value, run.value)) {
      coalesced[coalesced.length - 1] = { value: last.value, length: last.length + run.length };
    } else {
      coalesced.push(run);
    }
  }

  if (hi === countOf(state.root) && coalesced.length > 0) {
    const last = coalesced[coalesced.length - 1];
    if (state.equals(last.value, state.tailValue)) {
      coalesced.pop();
    }
  }

  const replacement = buildFromLeaves(
    coalesced.map((run) => createSegmentNode(run.value, run.length)),
    withSegmentNode
  );
  return withSegmentMapState(state, {
    root: replaceRange(state.root, lo, hi, replacement, withSegmentNode),
  });
}

// =============================================================================
// Queries
// =============================================================================

/**
 * Length covered by stored runs. Every position at or past it holds the
 * tail value.
 */
export function segmentMapLength<V>(state: SegmentMapState<V>): number {
  return state.root?.subtreeLength ?? 0;
}

/**
 * Number of stored runs (the tail is not counted).
 */
export function segmentMapRunCount<V>(state: SegmentMapState<V>): number {
  return countOf(state.root);
}

/**
 * The run covering a position. Positions past the stored runs resolve to
 * the zero-length tail sentinel, whose index is the run count.
 */
export function segmentMapGetSegmentAt<V>(
  state: SegmentMapState<V>,
  position: number
): SegmentLocation<V> {
  const { index, start } = locateRun(state.root, position, false);
  const node = nodeAt(state.root, index);
  if (node === null) {
    return Object.freeze({ index, start, value: state.tailValue, length: 0 });
  }
  return Object.freeze({ index, start, value: node.value, length: node.length });
}

/**
 * Value at a position.
 */
export function segmentMapGetValueAt<V>(state: SegmentMapState<V>, position: number): V {
  return segmentMapGetSegmentAt(state, position).value;
}

/**
 * Iterate all runs in order, ending with the zero-length tail sentinel.
 */
export function* segmentMapRuns<V>(state: SegmentMapState<V>): Generator<SegmentRun<V>, void, undefined> {
  for (const node of inOrder(state.root)) {
    yield toRun(node);
  }
  yield { value: state.tailValue, length: 0 };
}

/**
 * Iterate runs starting with the one covering `position`, ending with the
 * tail sentinel.
 */
export function* segmentMapRunsFrom<V>(
  state: SegmentMapState<V>,
  position: number
): Generator<SegmentLocation<V>, void, undefined> {
  let { index, start } = locateRun(state.root, position, false);
  for (const node of inOrderFrom(state.root, index)) {
    yield { index, start, value: node.value, length: node.length };
    start += node.length;
    index++;
  }
  yield { index, start, value: state.tailValue, length: 0 };
}

// =============================================================================
// Mutations
// =============================================================================

/**
 * Set every position in [begin, end) to `value`.
 *
 * Runs straddling either bound are split and equal neighbours coalesced.
 * Writing past the stored length fills the gap with the tail value and
 * stores runs only up to `end`, so writing the tail value there stores
 * nothing. An empty range changes nothing.
 */
export function segmentMapSetRange<V>(
  state: SegmentMapState<V>,
  begin: number,
  end: number,
  value: V
): SegmentMapState<V> {
  assertPosition('segmentMapSetRange', 'begin', begin);
  assertPosition('segmentMapSetRange', 'end', end);
  if (begin > end) {
    throw new Error(`segmentMapSetRange: begin (${begin}) cannot be greater than end (${end})`);
  }
  if (begin === end) {
    return state;
  }

  const root = state.root;
  const count = countOf(root);
  const first = locateRun(root, begin, false);
  const last = locateRun(root, end, true);

  // Already covered by one run of the same value
  if (first.index === last.index) {
    const covering = nodeAt(root, first.index);
    const current = covering === null ? state.tailValue : covering.value;
    if (state.equals(current, value)) {
      return state;
    }
  }

  const runs: SegmentRun<V>[] = [];
  if (first.index > 0) {
    runs.push(toRun(runAt(root, first.index - 1)));
  }
  if (first.index < count) {
    runs.push({ value: runAt(root, first.index).value, length: begin - first.start });
  } else {
    runs.push({ value: state.tailValue, length: begin - first.start });
  }
  runs.push({ value, length: end - begin });
  if (last.index < count) {
    const node = runAt(root, last.index);
    runs.push({ value: node.value, length: last.start + node.length - end });
    if (last.index + 1 < count) {
      runs.push(toRun(runAt(root, last.index + 1)));
    }
  }

  return replaceWindow(state, Math.max(first.index - 1, 0), Math.min(last.index + 2, count), runs);
}

/**
 * Adjust runs for an edit that replaced `erasedLength` units at `position`
 * with `insertedLength` new ones. The erased units are removed and the
 * inserted ones take the value that covered `position` before the edit.
 */
export function segmentMapOnModification<V>(
  state: SegmentMapState<V>,
  position: number,
  erasedLength: number,
  insertedLength: number
): SegmentMapState<V> {
  assertPosition('segmentMapOnModification', 'position', position);
  assertPosition('segmentMapOnModification', 'erasedLength', erasedLength);
  assertPosition('segmentMapOnModification', 'insertedLength', insertedLength);

  if (erasedLength === 0 && insertedLength === 0) {
    return state;
  }

  const root = state.root;
  const count = countOf(root);
  const first = locateRun(root, position, false);
  // Edits past the stored runs only touch the tail
  if (first.index === count) {
    return state;
  }

  const eraseEnd = position + erasedLength;
  const last = erasedLength > 0 ? locateRun(root, eraseEnd, true) : first;
  const covering = runAt(root, first.index);

  const runs: SegmentRun<V>[] = [];
  if (first.index > 0) {
    runs.push(toRun(runAt(root, first.index - 1)));
  }
  runs.push({ value: covering.value, length: position - first.start });
  runs.push({ value: covering.value, length: insertedLength });
  if (last.index < count) {
    const node = runAt(root, last.index);
    runs.push({ value: node.value, length: last.start + node.length - eraseEnd });
    if (last.index + 1 < count) {
      runs.push(toRun(runAt(root, last.index + 1)));
    }
  }

  return replaceWindow(state, Math.max(first.index - 1, 0), Math.min(last.index + 2, count), runs);
}

/**
 * Drop every run; all positions take `value`.
 */
export function segmentMapClear<V>(state: SegmentMapState<V>, value: V): SegmentMapState<V> {
  if (state.root === null && state.equals(state.tailValue, value)) {
    return state;
  }
  return withSegmentMapState(state, { root: null, tailValue: value });
}

// =============================================================================
// Integrity
// =============================================================================

/**
 * Verify tree balance, cached aggregates and run normalization.
 */
export function segmentMapCheckIntegrity<V>(state: SegmentMapState<V>): boolean {
  if (!checkIntegrity(state.root, withSegmentNode)) return false;

  let previous: SegmentNode<V> | null = null;
  for (const node of inOrder(state.root)) {
    if (!(node.length > 0)) return false;
    if (previous !== null && state.equals(previous.value, node.value)) return false;
    previous = node;
  }
  return previous === null || !state.equals(previous.value, state.tailValue);
}
