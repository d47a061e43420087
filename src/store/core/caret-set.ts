/**
 * Caret set operations.
 * Keeps carets and their selections sorted by position and merged, so the set
 * never holds two overlapping entries.
 */

import type {
  CaretEntry,
  CaretNode,
  CaretSelection,
  CaretSetState,
} from '../../types/state.ts';
import {
  createCaretNode,
  createCaretSetState,
  createEmptyCaretSetState,
  withCaretNode,
  withCaretSetState,
} from './state.ts';
import {
  checkIntegrity,
  findFirstIndex,
  inOrder,
  inOrderFrom,
  insertAt,
  nodeAt,
  removeAt,
  replaceRange,
} from './rb-tree.ts';

// =============================================================================
// Types
// =============================================================================

/**
 * Result of adding a caret.
 */
export interface CaretAddResult<D> {
  readonly state: CaretSetState<D>;
  /** Index of the inserted (possibly merged) caret */
  readonly index: number;
  /** Whether existing carets were absorbed */
  readonly merged: boolean;
}

// =============================================================================
// Selection Helpers
// =============================================================================

/**
 * End of the selected region (inclusive).
 */
export function getSelectionEnd(selection: CaretSelection): number {
  return selection.begin + selection.length;
}

/**
 * Absolute position of the caret.
 */
export function getCaretPosition(selection: CaretSelection): number {
  return selection.begin + selection.caretOffset;
}

/**
 * Build a selection from the caret position and the other end of the
 * selected region, in either order.
 */
export function selectionFromCaret(caret: number, anchor: number): CaretSelection {
  const begin = Math.min(caret, anchor);
  return Object.freeze({
    begin,
    length: Math.abs(caret - anchor),
    caretOffset: caret - begin,
  });
}

function assertSelection(selection: CaretSelection): void {
  const { begin, length, caretOffset } = selection;
  if (!Number.isFinite(begin) || begin < 0) {
    throw new Error(`Invalid caret selection begin: ${begin}`);
  }
  if (!Number.isFinite(length) || length < 0) {
    throw new Error(`Invalid caret selection length: ${length}`);
  }
  if (!Number.isFinite(caretOffset) || caretOffset < 0 || caretOffset > length) {
    throw new Error(`Caret offset ${caretOffset} is outside a selection of length ${length}`);
  }
}

/**
 * Try to merge two selections. The master decides where the caret ends up.
 * Returns the merged selection, or null when the two stay separate.
 *
 * A pure caret merges with any selection it touches. Two non-empty
 * selections merge only when they overlap; sharing an endpoint is not enough.
 */
export function mergeCaretSelections(
  master: CaretSelection,
  slave: CaretSelection
): CaretSelection | null {
  const masterEnd = getSelectionEnd(master);
  const slaveEnd = getSelectionEnd(slave);

  if (master.length === 0 && master.begin >= slave.begin && master.begin <= slaveEnd) {
    return { begin: slave.begin, length: slave.length, caretOffset: slave.caretOffset };
  }
  if (slave.length === 0 && slave.begin >= master.begin && slave.begin <= masterEnd) {
    return { begin: master.begin, length: master.length, caretOffset: master.caretOffset };
  }
  if (masterEnd <= slave.begin || master.begin >= slaveEnd) {
    return null;
  }

  const begin = Math.min(master.begin, slave.begin);
  const end = Math.max(masterEnd, slaveEnd);
  return { begin, length: end - begin, caretOffset: getCaretPosition(master) - begin };
}

function toEntry<D>(node: CaretNode<D>): CaretEntry<D> {
  return Object.freeze({
    begin: node.begin,
    length: node.length,
    caretOffset: node.caretOffset,
    data: node.data,
  });
}

// =============================================================================
// Queries
// =============================================================================

/**
 * Index of the first caret whose selection ends at or after `position`,
 * or the caret count when there is none.
 * Selections never overlap, so their ends grow with the index.
 */
export function caretSetFindFirstEndingAtOrAfter<D>(
  state: CaretSetState<D>,
  position: number
): number {
  return findFirstIndex(state.root, (node) => getSelectionEnd(node) >= position);
}

/**
 * Get the caret at an index, or null when the index is past the end.
 */
export function caretSetGet<D>(state: CaretSetState<D>, index: number): CaretEntry<D> | null {
  const node = nodeAt(state.root, index);
  return node === null ? null : toEntry(node);
}

/**
 * Iterate carets in position order.
 */
export function* caretSetEntries<D>(state: CaretSetState<D>): Generator<CaretEntry<D>, void, undefined> {
  for (const node of inOrder(state.root)) {
    yield toEntry(node);
  }
}

/**
 * Whether a position lies inside a non-empty selection.
 * Pure carets are ignored. With `inclusive` the selection's endpoints count
 * as inside.
 */
export function caretSetIsInSelection<D>(
  state: CaretSetState<D>,
  position: number,
  inclusive: boolean = true
): boolean {
  const first = caretSetFindFirstEndingAtOrAfter(state, position);
  for (const node of inOrderFrom(state.root, first)) {
    if (node.begin > position) return false;
    if (node.length > 0) {
      const end = getSelectionEnd(node);
      const inside = inclusive
        ? node.begin <= position && position <= end
        : node.begin < position && position < end;
      if (inside) return true;
    }
  }
  return false;
}

// =============================================================================
// Mutations
// =============================================================================

/**
 * Add a caret, merging it with every caret it overlaps.
 * The new caret acts as the merge master and its data is kept.
 * O(log n + k) where k is the number of absorbed carets.
 */
export function caretSetAdd<D>(
  state: CaretSetState<D>,
  selection: CaretSelection,
  data: D
): CaretAddResult<D> {
  assertSelection(selection);

  let merged: CaretSelection = {
    begin: selection.begin,
    length: selection.length,
    caretOffset: selection.caretOffset,
  };
  let mergeFrom = -1;
  let mergeTo = -1;
  let index = caretSetFindFirstEndingAtOrAfter(state, selection.begin);

  for (const node of inOrderFrom(state.root, index)) {
    if (node.begin > getSelectionEnd(merged)) break;
    const result = mergeCaretSelections(merged, node);
    if (result === null) {
      if (mergeFrom >= 0) break;
    } else {
      if (mergeFrom < 0) mergeFrom = index;
      mergeTo = index + 1;
      merged = result;
    }
    index++;
  }

  const leaf = createCaretNode(merged.begin, merged.length, merged.caretOffset, data);

  if (mergeFrom < 0) {
    const insertIndex = findFirstIndex(state.root, (node) => node.begin >= merged.begin);
    return {
      state: withCaretSetState(insertAt(state.root, insertIndex, leaf, withCaretNode)),
      index: insertIndex,
      merged: false,
    };
  }

  return {
    state: withCaretSetState(replaceRange(state.root, mergeFrom, mergeTo, leaf, withCaretNode)),
    index: mergeFrom,
    merged: true,
  };
}

/**
 * Remove the caret at an index.
 */
export function caretSetRemove<D>(state: CaretSetState<D>, index: number): CaretSetState<D> {
  return withCaretSetState(removeAt(state.root, index, withCaretNode));
}

/**
 * Reset to a single caret at position 0 with no selection.
 * Returns the same state when it already holds exactly that caret.
 */
export function caretSetReset<D>(state: CaretSetState<D>, data: D): CaretSetState<D> {
  const only = state.count === 1 ? state.root : null;
  if (only !== null && only.begin === 0 && only.length === 0 && Object.is(only.data, data)) {
    return state;
  }
  return createCaretSetState(data);
}

/**
 * Build a caret set by adding every entry in order.
 */
export function caretSetFromEntries<D>(entries: Iterable<CaretEntry<D>>): CaretSetState<D> {
  let state = createEmptyCaretSetState<D>();
  for (const entry of entries) {
    state = caretSetAdd(state, entry, entry.data).state;
  }
  return state;
}

// =============================================================================
// Integrity
// =============================================================================

/**
 * Verify tree balance, cached counts and the ordering of carets.
 */
export function caretSetCheckIntegrity<D>(state: CaretSetState<D>): boolean {
  if (!checkIntegrity(state.root, withCaretNode)) return false;
  if (state.count !== (state.root?.subtreeCount ?? 0)) return false;

  let previous: CaretNode<D> | null = null;
  for (const node of inOrder(state.root)) {
    if (node.length < 0 || node.caretOffset < 0 || node.caretOffset > node.length) return false;
    if (previous !== null) {
      const previousEnd = getSelectionEnd(previous);
      if (node.begin < previousEnd) return false;
      if (node.begin === previousEnd && (node.length === 0 || previous.length === 0)) return false;
    }
    previous = node;
  }
  return true;
}
