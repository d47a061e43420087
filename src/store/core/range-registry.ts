/**
 * Overlapping range registry.
 *
 * Ranges may overlap freely. Each node stores its start relative to the
 * start of the previous range in tree order, so an edit re-encodes a single
 * offset instead of shifting every later range. Absolute starts are
 * reconstructed from subtreeOffset prefix sums during descent, and
 * subtreeMaxEnd lets "ends at or after" searches skip whole subtrees.
 */

import type {
  RangeCursor,
  RangeEntry,
  RangeMatch,
  RangeNode,
  RangePlacement,
  RangeRegistryState,
} from '../../types/state.ts';
import {
  createRangeNode,
  createRangeRegistryState,
  withRangeNode,
  withRangeRegistryState,
} from './state.ts';
import {
  buildFromLeaves,
  checkIntegrity,
  concat,
  countOf,
  findCustom,
  inOrder,
  inOrderFrom,
  insertAt,
  nodeAt,
  removeAt,
  splitBefore,
  updateAt,
} from './rb-tree.ts';

// =============================================================================
// Types
// =============================================================================

/**
 * Cursors bounding the ranges that contain a point.
 * Every intersecting range has an index in [begin.index, end.index).
 */
export interface PointIntersection {
  /** First range ending at or after the point */
  readonly begin: RangeCursor;
  /** First range starting after the point */
  readonly end: RangeCursor;
}

/**
 * Cursors bounding the ranges that intersect [begin, end].
 * Ranges in [begin.index, end.index) all intersect. Ranges in
 * [beforeBegin.index, begin.index) start before the query and intersect only
 * if they end at or after its begin.
 */
export interface RangeIntersection {
  readonly beforeBegin: RangeCursor;
  readonly begin: RangeCursor;
  readonly end: RangeCursor;
}

// =============================================================================
// Aggregate Helpers
// =============================================================================

function offsetOf<V>(node: RangeNode<V> | null): number {
  return node === null ? 0 : node.subtreeOffset;
}

function assertPosition(operation: string, name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`${operation}: ${name} must be a non-negative number, got ${value}`);
  }
}

/**
 * Running offset sum threaded through a descent: the absolute start of the
 * range preceding the current subtree.
 */
interface StartScan {
  readonly base: number;
  /** Start of the last range the descent turned left at */
  readonly start: number;
}

/**
 * Sum of the offsets of the first `count` ranges, which is the absolute
 * start of range `count - 1` (0 when count is 0).
 */
function prefixOffset<V>(root: RangeNode<V> | null, count: number): number {
  if (count <= 0) return 0;
  const found = findCustom<RangeNode<V>, { readonly remaining: number; readonly sum: number }>(
    root,
    (node, { remaining, sum }) => {
      const leftCount = countOf(node.left);
      if (remaining <= leftCount) return { branch: -1, target: { remaining, sum } };
      const next = { remaining: remaining - leftCount - 1, sum: sum + offsetOf(node.left) + node.offset };
      return { branch: next.remaining === 0 ? 0 : 1, target: next };
    },
    { remaining: count, sum: 0 }
  );
  return found.target.sum;
}

function endCursor<V>(root: RangeNode<V> | null): RangeCursor {
  return { index: countOf(root), start: offsetOf(root) };
}

/**
 * First range whose start is > position (strict) or >= position.
 */
function findFirstStarting<V>(
  root: RangeNode<V> | null,
  position: number,
  strict: boolean
): RangeCursor {
  const found = findCustom<RangeNode<V>, StartScan>(
    root,
    (node, { base, start }) => {
      const nodeStart = base + offsetOf(node.left) + node.offset;
      if (strict ? nodeStart > position : nodeStart >= position) {
        return { branch: -1, target: { base, start: nodeStart } };
      }
      return { branch: 1, target: { base: nodeStart, start } };
    },
    { base: 0, start: offsetOf(root) }
  );
  return { index: found.index, start: found.target.start };
}

/**
 * First range in the tree whose end is > position (strict) or >= position.
 * `base` is the absolute start of the range preceding the tree. Indices are
 * relative to the tree. subtreeMaxEnd tells at every node whether the left
 * subtree holds a match, so the descent never backtracks.
 */
function findFirstEnding<V>(
  root: RangeNode<V> | null,
  base: number,
  position: number,
  strict: boolean
): RangeCursor | null {
  const reaches = (end: number): boolean => (strict ? end > position : end >= position);
  if (root === null || !reaches(base + root.subtreeMaxEnd)) return null;

  const found = findCustom<RangeNode<V>, number>(
    root,
    (node, subtreeBase) => {
      if (node.left !== null && reaches(subtreeBase + node.left.subtreeMaxEnd)) {
        return { branch: -1, target: subtreeBase };
      }
      const nodeStart = subtreeBase + offsetOf(node.left) + node.offset;
      if (reaches(nodeStart + node.length)) {
        return { branch: 0, target: nodeStart };
      }
      return { branch: 1, target: nodeStart };
    },
    base
  );
  return found.node === null ? null : { index: found.index, start: found.target };
}

/**
 * First range with index >= minIndex that ends after (or at) position.
 * The ranges before minIndex are split off so the descent only sees the
 * suffix; its first offset is relative to the start of range minIndex - 1.
 */
function findFirstEndingFrom<V>(
  root: RangeNode<V> | null,
  minIndex: number,
  position: number,
  strict: boolean
): RangeCursor {
  if (minIndex <= 0) {
    return findFirstEnding(root, 0, position, strict) ?? endCursor(root);
  }
  if (minIndex >= countOf(root)) {
    return endCursor(root);
  }
  const [, suffix] = splitBefore(root, minIndex, withRangeNode);
  const found = findFirstEnding(suffix, prefixOffset(root, minIndex), position, strict);
  return found === null ? endCursor(root) : { index: found.index + minIndex, start: found.start };
}

// =============================================================================
// Queries
// =============================================================================

/**
 * Number of ranges in the registry.
 */
export function rangeRegistryCount<V>(state: RangeRegistryState<V>): number {
  return countOf(state.root);
}

/**
 * Absolute start of the range at an index.
 */
export function rangeRegistryStartOf<V>(state: RangeRegistryState<V>, index: number): number {
  const count = countOf(state.root);
  if (!Number.isInteger(index) || index < 0 || index >= count) {
    throw new Error(`rangeRegistryStartOf: index ${index} is out of range [0, ${count})`);
  }
  return prefixOffset(state.root, index + 1);
}

/**
 * Get the range at an index with its absolute start, or null past the end.
 */
export function rangeRegistryGet<V>(state: RangeRegistryState<V>, index: number): RangeMatch<V> | null {
  const node = nodeAt(state.root, index);
  if (node === null) return null;
  return Object.freeze({
    index,
    start: prefixOffset(state.root, index + 1),
    length: node.length,
    value: node.value,
  });
}

/**
 * Iterate all ranges in start order with absolute starts.
 */
export function* rangeRegistryEntries<V>(state: RangeRegistryState<V>): Generator<RangeMatch<V>, void, undefined> {
  let start = 0;
  let index = 0;
  for (const node of inOrder(state.root)) {
    start += node.offset;
    yield Object.freeze({ index, start, length: node.length, value: node.value });
    index++;
  }
}

/**
 * First range that ends strictly after `position`.
 */
export function rangeRegistryFindFirstEndingAfter<V>(
  state: RangeRegistryState<V>,
  position: number
): RangeCursor {
  return findFirstEndingFrom(state.root, 0, position, true);
}

/**
 * First range that ends at or after `position`.
 */
export function rangeRegistryFindFirstEndingAtOrAfter<V>(
  state: RangeRegistryState<V>,
  position: number
): RangeCursor {
  return findFirstEndingFrom(state.root, 0, position, false);
}

/**
 * First range at index >= fromIndex that ends at or after `position`.
 * Pass `cursor.index + 1` to advance past a range already visited.
 */
export function rangeRegistryFindNextEndingAtOrAfter<V>(
  state: RangeRegistryState<V>,
  position: number,
  fromIndex: number
): RangeCursor {
  return findFirstEndingFrom(state.root, fromIndex, position, false);
}

/**
 * Cursors bounding the ranges that contain `position` (endpoints included).
 */
export function rangeRegistryFindIntersecting<V>(
  state: RangeRegistryState<V>,
  position: number
): PointIntersection {
  return {
    begin: rangeRegistryFindFirstEndingAtOrAfter(state, position),
    end: findFirstStarting(state.root, position, true),
  };
}

/**
 * Cursors bounding the ranges that intersect the closed interval [begin, end].
 */
export function rangeRegistryFindIntersectingRange<V>(
  state: RangeRegistryState<V>,
  begin: number,
  end: number
): RangeIntersection {
  if (begin > end) {
    throw new Error(`rangeRegistryFindIntersectingRange: begin (${begin}) cannot be greater than end (${end})`);
  }
  return {
    beforeBegin: rangeRegistryFindFirstEndingAtOrAfter(state, begin),
    begin: findFirstStarting(state.root, begin, false),
    end: findFirstStarting(state.root, end, true),
  };
}

/**
 * All ranges containing `position`, in index order.
 * O(log n + k log n) for k results.
 */
export function rangeRegistryCollectIntersecting<V>(
  state: RangeRegistryState<V>,
  position: number
): RangeMatch<V>[] {
  const { begin, end } = rangeRegistryFindIntersecting(state, position);
  const result: RangeMatch<V>[] = [];
  let cursor = begin;
  while (cursor.index < end.index) {
    const node = nodeAt(state.root, cursor.index);
    if (node === null) break;
    result.push(Object.freeze({ index: cursor.index, start: cursor.start, length: node.length, value: node.value }));
    cursor = rangeRegistryFindNextEndingAtOrAfter(state, position, cursor.index + 1);
  }
  return result;
}

/**
 * All ranges intersecting [begin, end], in index order.
 */
export function rangeRegistryCollectIntersectingRange<V>(
  state: RangeRegistryState<V>,
  begin: number,
  end: number
): RangeMatch<V>[] {
  const bounds = rangeRegistryFindIntersectingRange(state, begin, end);
  const result: RangeMatch<V>[] = [];

  let cursor = bounds.beforeBegin;
  while (cursor.index < bounds.begin.index) {
    const node = nodeAt(state.root, cursor.index);
    if (node === null) break;
    result.push(Object.freeze({ index: cursor.index, start: cursor.start, length: node.length, value: node.value }));
    cursor = rangeRegistryFindNextEndingAtOrAfter(state, begin, cursor.index + 1);
  }

  let index = bounds.begin.index;
  let start = bounds.begin.start;
  for (const node of inOrderFrom(state.root, index)) {
    if (index >= bounds.end.index) break;
    if (index > bounds.begin.index) start += node.offset;
    result.push(Object.freeze({ index, start, length: node.length, value: node.value }));
    index++;
  }
  return result;
}

// =============================================================================
// Mutations
// =============================================================================

/**
 * Insert a range. With placement 'after' it goes after every range with the
 * same start, with 'before' ahead of them. The successor's offset is
 * re-encoded against the new range. O(log n).
 */
export function rangeRegistryInsert<V>(
  state: RangeRegistryState<V>,
  start: number,
  length: number,
  value: V,
  placement: RangePlacement = 'after'
): RangeRegistryState<V> {
  assertPosition('rangeRegistryInsert', 'start', start);
  assertPosition('rangeRegistryInsert', 'length', length);

  const { index } = findFirstStarting(state.root, start, placement === 'after');
  const offset = start - prefixOffset(state.root, index);

  let root = state.root;
  if (index < countOf(root)) {
    root = updateAt(root, index, (node) => withRangeNode(node, { offset: node.offset - offset }), withRangeNode);
  }
  return withRangeRegistryState(insertAt(root, index, createRangeNode(offset, length, value), withRangeNode));
}

/**
 * Remove the range at an index. Its offset is folded into the successor.
 */
export function rangeRegistryErase<V>(state: RangeRegistryState<V>, index: number): RangeRegistryState<V> {
  const erased = nodeAt(state.root, index);
  if (erased === null) {
    throw new Error(`rangeRegistryErase: index ${index} is out of range [0, ${countOf(state.root)})`);
  }

  let root = state.root;
  if (index + 1 < countOf(root)) {
    root = updateAt(root, index + 1, (node) => withRangeNode(node, { offset: node.offset + erased.offset }), withRangeNode);
  }
  return withRangeRegistryState(removeAt(root, index, withRangeNode));
}

/**
 * Remove every range.
 */
export function rangeRegistryClear<V>(): RangeRegistryState<V> {
  return createRangeRegistryState<V>();
}

/**
 * Adjust ranges for an edit that replaced `erasedLength` units at
 * `position` with `insertedLength` new ones.
 *
 * - Ranges starting before the edit keep their start. Those ending after
 *   the erased window grow or shrink with the edit, those ending inside it
 *   are cut off at `position`.
 * - Ranges starting inside [position, position + erasedLength] are dropped
 *   when the erase covers them entirely; the rest lose the erased part and
 *   restart at position + insertedLength.
 * - Ranges starting after the window shift with the edit; only the first
 *   one's offset changes.
 *
 * O(log n + m log n) where m is the number of ranges touching the window.
 */
export function rangeRegistryOnModification<V>(
  state: RangeRegistryState<V>,
  position: number,
  erasedLength: number,
  insertedLength: number
): RangeRegistryState<V> {
  assertPosition('rangeRegistryOnModification', 'position', position);
  assertPosition('rangeRegistryOnModification', 'erasedLength', erasedLength);
  assertPosition('rangeRegistryOnModification', 'insertedLength', insertedLength);

  if (state.root === null || (erasedLength === 0 && insertedLength === 0)) {
    return state;
  }

  const eraseEnd = position + erasedLength;
  const delta = insertedLength - erasedLength;
  const insertEnd = position + insertedLength;

  const firstInside = findFirstStarting(state.root, position, false).index;
  const firstAfter = findFirstStarting(state.root, eraseEnd, true).index;
  const [beforeTree, rest] = splitBefore(state.root, firstInside, withRangeNode);
  const [insideTree, afterTree] = splitBefore(rest, firstAfter - firstInside, withRangeNode);

  // Ranges starting before the edit
  const beforeSum = offsetOf(beforeTree);
  const beforeCount = countOf(beforeTree);
  let before = beforeTree;
  let cursor = findFirstEndingFrom(before, 0, position, true);
  while (cursor.index < beforeCount) {
    const rangeStart = cursor.start;
    before = updateAt(before, cursor.index, (node) => {
      const end = rangeStart + node.length;
      return withRangeNode(node, { length: end > eraseEnd ? node.length + delta : position - rangeStart });
    }, withRangeNode);
    cursor = findFirstEndingFrom(before, cursor.index + 1, position, true);
  }

  // Ranges starting inside the erased window
  const survivors: RangeNode<V>[] = [];
  let start = beforeSum;
  for (const node of inOrder(insideTree)) {
    start += node.offset;
    const end = start + node.length;
    if (erasedLength > 0 && end <= eraseEnd) continue;
    const length = start < eraseEnd ? node.length - (eraseEnd - start) : node.length;
    const offset = survivors.length === 0 ? insertEnd - beforeSum : 0;
    survivors.push(createRangeNode(offset, length, node.value));
  }
  const inside = buildFromLeaves(survivors, withRangeNode);

  // Ranges starting after the window
  let after = afterTree;
  if (after !== null) {
    const oldPreviousStart = beforeSum + offsetOf(insideTree);
    const newPreviousStart = survivors.length > 0 ? insertEnd : beforeSum;
    after = updateAt(after, 0, (node) => withRangeNode(node, {
      offset: oldPreviousStart + node.offset + delta - newPreviousStart,
    }), withRangeNode);
  }

  return withRangeRegistryState(concat(concat(before, inside, withRangeNode), after, withRangeNode));
}

/**
 * Rebuild a registry from absolute ranges in any order.
 */
export function rangeRegistryFromEntries<V>(entries: Iterable<RangeEntry<V>>): RangeRegistryState<V> {
  let state = createRangeRegistryState<V>();
  for (const entry of entries) {
    state = rangeRegistryInsert(state, entry.start, entry.length, entry.value);
  }
  return state;
}

// =============================================================================
// Integrity
// =============================================================================

/**
 * Verify tree balance, cached aggregates and non-negative offsets/lengths.
 */
export function rangeRegistryCheckIntegrity<V>(state: RangeRegistryState<V>): boolean {
  if (!checkIntegrity(state.root, withRangeNode)) return false;
  for (const node of inOrder(state.root)) {
    if (node.offset < 0 || node.length < 0) return false;
  }
  return true;
}
