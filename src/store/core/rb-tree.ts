/**
 * Generic Red-Black tree utilities.
 * Provides immutable balancing, order-statistic, split and join operations
 * for any R-B tree node type that caches its subtree size.
 *
 * Nodes never point to their parent. Insertion fix-up walks the recorded
 * descent path; split and join recurse along a single spine.
 */

import type { NodeColor, RBNode, CountedNode } from '../../types/state.ts';

// Re-export node types for consumers that import from rb-tree
export type { RBNode, CountedNode };

// =============================================================================
// Types
// =============================================================================

/**
 * Function type for creating a new node with updated properties.
 * Each concrete node type provides its own implementation that handles
 * recalculating aggregate values (subtreeCount, subtreeLength, etc).
 */
export type WithNodeFn<N extends RBNode<N>> = (
  node: N,
  updates: Partial<{ color: NodeColor; left: N | null; right: N | null }>
) => N;

/**
 * Result of splitting a tree at an index.
 * `node` is the detached element at the split index, with no children,
 * or null when the index equals the tree size.
 */
export interface SplitResult<N> {
  readonly left: N | null;
  readonly node: N | null;
  readonly right: N | null;
}

/**
 * A subtree root paired with its black height.
 */
interface HeightedTree<N> {
  readonly root: N | null;
  readonly height: number;
}

/**
 * A non-empty tree produced by a join.
 */
interface JoinedTree<N> {
  readonly root: N;
  readonly height: number;
}

const EMPTY_TREE: HeightedTree<never> = Object.freeze({ root: null, height: 0 });

// =============================================================================
// Color Utilities
// =============================================================================

/**
 * Check if a node is red.
 * Returns false for null/undefined nodes (they're treated as black).
 */
export function isRed<N extends RBNode<N>>(node: N | null | undefined): boolean {
  return node != null && node.color === 'red';
}

/**
 * Number of black nodes on the path from this node down to a null child,
 * counting the node itself when it is black.
 */
export function blackHeight<N extends RBNode<N>>(root: N | null): number {
  let height = 0;
  let current = root;
  while (current !== null) {
    if (current.color === 'black') height++;
    current = current.left;
  }
  return height;
}

// =============================================================================
// Size Utilities
// =============================================================================

/**
 * Number of nodes in a (possibly empty) subtree.
 */
export function countOf<N extends CountedNode<N>>(node: N | null): number {
  return node === null ? 0 : node.subtreeCount;
}

function assertIndexInRange(operation: string, index: number, size: number): void {
  if (!Number.isInteger(index) || index < 0 || index > size) {
    throw new Error(`${operation}: index ${index} is out of range [0, ${size}]`);
  }
}

function assertElementIndex(operation: string, index: number, size: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= size) {
    throw new Error(`${operation}: index ${index} is out of range [0, ${size})`);
  }
}

// =============================================================================
// Rotations
// =============================================================================

/**
 * Rotate left at the given node. Returns the new subtree root.
 * Immutable - creates new nodes using the provided withNode function.
 *
 *       x                y
 *      / \              / \
 *     a   y    =>      x   c
 *        / \          / \
 *       b   c        a   b
 */
export function rotateLeft<N extends RBNode<N>>(
  node: N,
  withNode: WithNodeFn<N>
): N {
  const right = node.right;
  if (right === null) return node;

  const newNode = withNode(node, { right: right.left });
  return withNode(right, { left: newNode });
}

/**
 * Rotate right at the given node. Returns the new subtree root.
 *
 *         y            x
 *        / \          / \
 *       x   c   =>   a   y
 *      / \              / \
 *     a   b            b   c
 */
export function rotateRight<N extends RBNode<N>>(
  node: N,
  withNode: WithNodeFn<N>
): N {
  const left = node.left;
  if (left === null) return node;

  const newNode = withNode(node, { left: left.right });
  return withNode(left, { right: newNode });
}

// =============================================================================
// Balancing
// =============================================================================

/**
 * Ensure the root is black.
 */
export function ensureBlackRoot<N extends RBNode<N>>(
  node: N,
  withNode: WithNodeFn<N>
): N {
  if (node.color === 'red') {
    return withNode(node, { color: 'black' });
  }
  return node;
}

/**
 * Fix red-red violations below a black node.
 * Implements the four rotation cases of Red-Black tree balancing.
 */
export function fixRedViolations<N extends RBNode<N>>(
  node: N,
  withNode: WithNodeFn<N>
): N {
  const left = node.left;
  const right = node.right;

  // Left-Left
  if (left !== null && isRed(left) && isRed(left.left)) {
    const rotated = rotateRight(node, withNode);
    return recolorAfterRotation(rotated, 'right', withNode);
  }
  // Left-Right
  if (left !== null && isRed(left) && isRed(left.right)) {
    const rotated = rotateRight(withNode(node, { left: rotateLeft(left, withNode) }), withNode);
    return recolorAfterRotation(rotated, 'right', withNode);
  }
  // Right-Right
  if (right !== null && isRed(right) && isRed(right.right)) {
    const rotated = rotateLeft(node, withNode);
    return recolorAfterRotation(rotated, 'left', withNode);
  }
  // Right-Left
  if (right !== null && isRed(right) && isRed(right.left)) {
    const rotated = rotateLeft(withNode(node, { right: rotateRight(right, withNode) }), withNode);
    return recolorAfterRotation(rotated, 'left', withNode);
  }

  return node;
}

/**
 * After a rotation the new subtree root turns black and the demoted
 * grandparent (on `side`) turns red.
 */
function recolorAfterRotation<N extends RBNode<N>>(
  node: N,
  side: 'left' | 'right',
  withNode: WithNodeFn<N>
): N {
  const demoted = side === 'left' ? node.left : node.right;
  if (demoted === null) {
    return withNode(node, { color: 'black' });
  }
  const red = withNode(demoted, { color: 'red' });
  return side === 'left'
    ? withNode(node, { color: 'black', left: red })
    : withNode(node, { color: 'black', right: red });
}

// =============================================================================
// Path-based Insert Fix (O(log n))
// =============================================================================

/**
 * An entry in the insertion path: a node on the descent and the direction
 * taken from it to reach the next node in the path.
 */
export interface InsertionPathEntry<N extends RBNode<N>> {
  node: N;
  direction: 'left' | 'right';
}

/**
 * Fix a red-red violation among the children of a node during insertion.
 * Color flip when both children are red (uncle-red case), otherwise a
 * terminal rotation.
 */
function fixInsertViolation<N extends RBNode<N>>(
  node: N,
  withNode: WithNodeFn<N>
): N {
  const left = node.left;
  const right = node.right;
  const hasLeftViolation = left !== null && isRed(left) && (isRed(left.left) || isRed(left.right));
  const hasRightViolation = right !== null && isRed(right) && (isRed(right.left) || isRed(right.right));

  if (!hasLeftViolation && !hasRightViolation) {
    return node;
  }

  if (left !== null && right !== null && isRed(left) && isRed(right)) {
    return withNode(node, {
      color: 'red',
      left: withNode(left, { color: 'black' }),
      right: withNode(right, { color: 'black' }),
    });
  }

  return fixRedViolations(node, withNode);
}

/**
 * Fix Red-Black violations after insert using only the insertion path.
 * Walks from the leaf-parent to the root, syncing child references and
 * applying fix-up (color flips or rotations) at each level.
 *
 * @param insertPath - Nodes from root (index 0) to leaf-parent (last index),
 *                     each annotated with the direction taken to reach the next level.
 * @returns The balanced root node.
 */
export function fixInsertWithPath<N extends RBNode<N>>(
  insertPath: InsertionPathEntry<N>[],
  withNode: WithNodeFn<N>
): N {
  for (let i = insertPath.length - 1; i >= 0; i--) {
    const entry = insertPath[i];
    if (i < insertPath.length - 1) {
      const childBelow = insertPath[i + 1].node;
      const current = entry.direction === 'left' ? entry.node.left : entry.node.right;
      if (current !== childBelow) {
        entry.node = entry.direction === 'left'
          ? withNode(entry.node, { left: childBelow })
          : withNode(entry.node, { right: childBelow });
      }
    }
    entry.node = fixInsertViolation(entry.node, withNode);
  }

  return ensureBlackRoot(insertPath[0].node, withNode);
}

// =============================================================================
// Aggregate Descent
// =============================================================================

/**
 * Branch chosen by a find selector: -1 descends left, 1 descends right and 0
 * stops at the current node.
 */
export type FindBranch = -1 | 0 | 1;

/**
 * One step of a find descent. `target` is handed to the selector at the
 * next node, so it can carry a running prefix of the synthesized aggregates.
 */
export interface FindStep<T> {
  readonly branch: FindBranch;
  readonly target: T;
}

export type FindSelector<N, T> = (node: N, target: T) => FindStep<T>;

/**
 * Outcome of a find descent.
 * When the descent falls off the tree, `node` is null and `index` is the
 * position it fell off at: the index of the last node it turned left at,
 * or the tree size when it never turned left.
 */
export interface FindResult<N, T> {
  readonly node: N | null;
  readonly index: number;
  readonly target: T;
}

/**
 * Descend from the root, letting `select` pick a branch at every node from
 * the node's cached aggregates and the target accumulated so far.
 * Runs in O(log n) selector calls.
 *
 * @example
 * ```typescript
 * // Element covering offset 12, given a subtreeLength aggregate
 * findCustom(root, (node, remaining: number) => {
 *   const leftLength = node.left?.subtreeLength ?? 0;
 *   if (remaining < leftLength) return { branch: -1, target: remaining };
 *   if (remaining < leftLength + node.length) return { branch: 0, target: remaining - leftLength };
 *   return { branch: 1, target: remaining - leftLength - node.length };
 * }, 12);
 * ```
 */
export function findCustom<N extends CountedNode<N>, T>(
  root: N | null,
  select: FindSelector<N, T>,
  target: T
): FindResult<N, T> {
  let current = root;
  let index = 0;
  let carried = target;
  while (current !== null) {
    const step = select(current, carried);
    carried = step.target;
    const leftCount = countOf(current.left);
    if (step.branch === 0) {
      return { node: current, index: index + leftCount, target: carried };
    }
    if (step.branch < 0) {
      current = current.left;
    } else {
      index += leftCount + 1;
      current = current.right;
    }
  }
  return { node: null, index, target: carried };
}

// =============================================================================
// Order Statistics
// =============================================================================

function selectByIndex<N extends CountedNode<N>>(node: N, remaining: number): FindStep<number> {
  const leftCount = countOf(node.left);
  if (remaining < leftCount) return { branch: -1, target: remaining };
  if (remaining === leftCount) return { branch: 0, target: 0 };
  return { branch: 1, target: remaining - leftCount - 1 };
}

/**
 * Get the node at an in-order index, or null when the index is past the end.
 */
export function nodeAt<N extends CountedNode<N>>(root: N | null, index: number): N | null {
  return findCustom(root, selectByIndex, index).node;
}

/**
 * Index of the first node satisfying a predicate that is monotone over the
 * in-order sequence (false...false, true...true). Returns the tree size when
 * no node satisfies it.
 */
export function findFirstIndex<N extends CountedNode<N>>(
  root: N | null,
  predicate: (node: N) => boolean
): number {
  return findCustom<N, null>(
    root,
    (node) => ({ branch: predicate(node) ? -1 : 1, target: null }),
    null
  ).index;
}

// =============================================================================
// Traversal
// =============================================================================

/**
 * Iterate nodes in order.
 */
export function* inOrder<N extends RBNode<N>>(root: N | null): Generator<N, void, undefined> {
  const stack: N[] = [];
  let current = root;
  while (current !== null || stack.length > 0) {
    while (current !== null) {
      stack.push(current);
      current = current.left;
    }
    const node = stack.pop();
    if (node === undefined) return;
    yield node;
    current = node.right;
  }
}

/**
 * Iterate nodes in order starting at an in-order index.
 * O(log n) to position, then amortized O(1) per node.
 */
export function* inOrderFrom<N extends CountedNode<N>>(
  root: N | null,
  index: number
): Generator<N, void, undefined> {
  const stack: N[] = [];
  let current = root;
  let remaining = index;
  while (current !== null) {
    const leftCount = countOf(current.left);
    if (remaining <= leftCount) {
      stack.push(current);
      if (remaining === leftCount) break;
      current = current.left;
    } else {
      remaining -= leftCount + 1;
      current = current.right;
    }
  }

  for (;;) {
    const node = stack.pop();
    if (node === undefined) return;
    yield node;
    let next = node.right;
    while (next !== null) {
      stack.push(next);
      next = next.left;
    }
  }
}

// =============================================================================
// Construction
// =============================================================================

/**
 * Build a balanced tree from nodes already in order.
 * Their children and colors are replaced. Every level is black except a
 * partially filled deepest level, which is red.
 */
export function buildFromLeaves<N extends CountedNode<N>>(
  leaves: readonly N[],
  withNode: WithNodeFn<N>
): N | null {
  const redDepth = Math.floor(Math.log2(leaves.length + 1));

  function build(lo: number, hi: number, depth: number): N | null {
    if (lo >= hi) return null;
    const mid = (lo + hi) >>> 1;
    const left = build(lo, mid, depth + 1);
    const right = build(mid + 1, hi, depth + 1);
    return withNode(leaves[mid], {
      color: depth === redDepth ? 'red' : 'black',
      left,
      right,
    });
  }

  return build(0, leaves.length, 0);
}

/**
 * Insert a single node before the given in-order index.
 * `index` equal to the tree size appends.
 */
export function insertAt<N extends CountedNode<N>>(
  root: N | null,
  index: number,
  leaf: N,
  withNode: WithNodeFn<N>
): N {
  assertIndexInRange('insertAt', index, countOf(root));
  const fresh = withNode(leaf, { color: 'red', left: null, right: null });
  if (root === null) {
    return withNode(fresh, { color: 'black' });
  }

  const path: InsertionPathEntry<N>[] = [];
  let current: N | null = root;
  let remaining = index;
  while (current !== null) {
    const leftCount = countOf(current.left);
    if (remaining <= leftCount) {
      path.push({ node: current, direction: 'left' });
      current = current.left;
    } else {
      path.push({ node: current, direction: 'right' });
      remaining -= leftCount + 1;
      current = current.right;
    }
  }

  const parent = path[path.length - 1];
  parent.node = parent.direction === 'left'
    ? withNode(parent.node, { left: fresh })
    : withNode(parent.node, { right: fresh });

  return fixInsertWithPath(path, withNode);
}

/**
 * Replace the node at an index with `update(node)`.
 * The update must keep the node's children and color.
 */
export function updateAt<N extends CountedNode<N>>(
  root: N | null,
  index: number,
  update: (node: N) => N,
  withNode: WithNodeFn<N>
): N {
  if (root === null) {
    throw new Error(`updateAt: index ${index} is out of range [0, 0)`);
  }
  assertElementIndex('updateAt', index, root.subtreeCount);
  return updateNode(root, index, update, withNode);
}

function updateNode<N extends CountedNode<N>>(
  node: N,
  index: number,
  update: (node: N) => N,
  withNode: WithNodeFn<N>
): N {
  const leftCount = countOf(node.left);
  if (index < leftCount && node.left !== null) {
    return withNode(node, { left: updateNode(node.left, index, update, withNode) });
  }
  if (index === leftCount) {
    return update(node);
  }
  if (node.right === null) {
    throw new Error(`updateAt: subtree counts are inconsistent at index ${index}`);
  }
  return withNode(node, {
    right: updateNode(node.right, index - leftCount - 1, update, withNode),
  });
}

// =============================================================================
// Join
// =============================================================================

function blackenTree<N extends RBNode<N>>(
  tree: HeightedTree<N>,
  withNode: WithNodeFn<N>
): HeightedTree<N> {
  if (tree.root !== null && tree.root.color === 'red') {
    return { root: withNode(tree.root, { color: 'black' }), height: tree.height + 1 };
  }
  return tree;
}

/**
 * Descend the right spine of `left` to a black node of the same black height
 * as `right` and hang `middle` there as a red node.
 */
function joinRight<N extends RBNode<N>>(
  left: N | null,
  leftHeight: number,
  middle: N,
  right: N | null,
  rightHeight: number,
  withNode: WithNodeFn<N>
): N {
  if (left === null || (left.color === 'black' && leftHeight === rightHeight)) {
    return withNode(middle, { color: 'red', left, right });
  }

  const childHeight = left.color === 'black' ? leftHeight - 1 : leftHeight;
  const joined = joinRight(left.right, childHeight, middle, right, rightHeight, withNode);

  if (left.color === 'black' && isRed(joined) && joined.right !== null && isRed(joined.right)) {
    const recolored = withNode(joined, { right: withNode(joined.right, { color: 'black' }) });
    return rotateLeft(withNode(left, { right: recolored }), withNode);
  }
  return withNode(left, { right: joined });
}

/**
 * Mirror of joinRight along the left spine of `right`.
 */
function joinLeft<N extends RBNode<N>>(
  left: N | null,
  leftHeight: number,
  middle: N,
  right: N | null,
  rightHeight: number,
  withNode: WithNodeFn<N>
): N {
  if (right === null || (right.color === 'black' && rightHeight === leftHeight)) {
    return withNode(middle, { color: 'red', left, right });
  }

  const childHeight = right.color === 'black' ? rightHeight - 1 : rightHeight;
  const joined = joinLeft(left, leftHeight, middle, right.left, childHeight, withNode);

  if (right.color === 'black' && isRed(joined) && joined.left !== null && isRed(joined.left)) {
    const recolored = withNode(joined, { left: withNode(joined.left, { color: 'black' }) });
    return rotateRight(withNode(right, { left: recolored }), withNode);
  }
  return withNode(right, { left: joined });
}

function blackenRoot<N extends RBNode<N>>(
  root: N,
  height: number,
  withNode: WithNodeFn<N>
): JoinedTree<N> {
  if (root.color === 'red') {
    return { root: withNode(root, { color: 'black' }), height: height + 1 };
  }
  return { root, height };
}

function joinTrees<N extends RBNode<N>>(
  leftTree: HeightedTree<N>,
  middle: N,
  rightTree: HeightedTree<N>,
  withNode: WithNodeFn<N>
): JoinedTree<N> {
  const left = blackenTree(leftTree, withNode);
  const right = blackenTree(rightTree, withNode);

  if (left.height > right.height) {
    const root = joinRight(left.root, left.height, middle, right.root, right.height, withNode);
    return blackenRoot(root, left.height, withNode);
  }
  if (right.height > left.height) {
    const root = joinLeft(left.root, left.height, middle, right.root, right.height, withNode);
    return blackenRoot(root, right.height, withNode);
  }
  return {
    root: withNode(middle, { color: 'black', left: left.root, right: right.root }),
    height: left.height + 1,
  };
}

/**
 * Join two trees around a middle node: every element of `left`, then
 * `middle`, then every element of `right`.
 * O(log |left| + log |right|).
 */
export function join<N extends RBNode<N>>(
  left: N | null,
  middle: N,
  right: N | null,
  withNode: WithNodeFn<N>
): N {
  return joinTrees(
    { root: left, height: blackHeight(left) },
    middle,
    { root: right, height: blackHeight(right) },
    withNode
  ).root;
}

// =============================================================================
// Split
// =============================================================================

function splitTracked<N extends CountedNode<N>>(
  root: N | null,
  height: number,
  index: number,
  withNode: WithNodeFn<N>
): { left: HeightedTree<N>; node: N | null; right: HeightedTree<N> } {
  if (root === null) {
    return { left: EMPTY_TREE, node: null, right: EMPTY_TREE };
  }

  const childHeight = root.color === 'black' ? height - 1 : height;
  const leftTree: HeightedTree<N> = { root: root.left, height: childHeight };
  const rightTree: HeightedTree<N> = { root: root.right, height: childHeight };
  const leftCount = countOf(root.left);

  if (index === leftCount) {
    return { left: leftTree, node: withNode(root, { left: null, right: null }), right: rightTree };
  }

  const detached = withNode(root, { left: null, right: null });
  if (index < leftCount) {
    const inner = splitTracked(root.left, childHeight, index, withNode);
    return {
      left: inner.left,
      node: inner.node,
      right: joinTrees(inner.right, detached, rightTree, withNode),
    };
  }

  const inner = splitTracked(root.right, childHeight, index - leftCount - 1, withNode);
  return {
    left: joinTrees(leftTree, detached, inner.left, withNode),
    node: inner.node,
    right: inner.right,
  };
}

/**
 * Split a tree into the elements before `index`, the element at `index`
 * (detached, no children) and the elements after it. Both trees have black roots.
 * O(log n): the pieces are recombined with joins along the search path.
 */
export function splitAt<N extends CountedNode<N>>(
  root: N | null,
  index: number,
  withNode: WithNodeFn<N>
): SplitResult<N> {
  const size = countOf(root);
  assertIndexInRange('splitAt', index, size);
  if (index === size) {
    return { left: root, node: null, right: null };
  }

  const result = splitTracked(root, blackHeight(root), index, withNode);
  return {
    left: blackenTree(result.left, withNode).root,
    node: result.node,
    right: blackenTree(result.right, withNode).root,
  };
}

/**
 * Split a tree into its first `index` elements and the rest.
 */
export function splitBefore<N extends CountedNode<N>>(
  root: N | null,
  index: number,
  withNode: WithNodeFn<N>
): readonly [N | null, N | null] {
  const { left, node, right } = splitAt(root, index, withNode);
  if (node === null) {
    return [left, null];
  }
  return [left, join(null, node, right, withNode)];
}

/**
 * Concatenate two trees.
 */
export function concat<N extends CountedNode<N>>(
  left: N | null,
  right: N | null,
  withNode: WithNodeFn<N>
): N | null {
  if (left === null) return right;
  if (right === null) return left;

  const first = splitAt(right, 0, withNode);
  if (first.node === null) return left;
  return join(left, first.node, first.right, withNode);
}

// =============================================================================
// Removal and Splicing
// =============================================================================

/**
 * Remove the element at an index.
 */
export function removeAt<N extends CountedNode<N>>(
  root: N | null,
  index: number,
  withNode: WithNodeFn<N>
): N | null {
  assertElementIndex('removeAt', index, countOf(root));
  const { left, right } = splitAt(root, index, withNode);
  return concat(left, right, withNode);
}

/**
 * Remove every element in [from, to).
 */
export function eraseRange<N extends CountedNode<N>>(
  root: N | null,
  from: number,
  to: number,
  withNode: WithNodeFn<N>
): N | null {
  return replaceRange(root, from, to, null, withNode);
}

/**
 * Splice a whole tree in as a contiguous block before `index`.
 */
export function insertTreeAt<N extends CountedNode<N>>(
  root: N | null,
  index: number,
  other: N | null,
  withNode: WithNodeFn<N>
): N | null {
  return replaceRange(root, index, index, other, withNode);
}

/**
 * Replace the elements in [from, to) with every element of `replacement`.
 */
export function replaceRange<N extends CountedNode<N>>(
  root: N | null,
  from: number,
  to: number,
  replacement: N | null,
  withNode: WithNodeFn<N>
): N | null {
  const size = countOf(root);
  if (!Number.isInteger(from) || !Number.isInteger(to) || from < 0 || to > size || from > to) {
    throw new Error(`replaceRange: [${from}, ${to}) is not a valid range of [0, ${size})`);
  }
  if (from === to && replacement === null) {
    return root;
  }

  const [head, rest] = splitBefore(root, from, withNode);
  const [, tail] = splitBefore(rest, to - from, withNode);
  return concat(concat(head, replacement, withNode), tail, withNode);
}

// =============================================================================
// Integrity
// =============================================================================

function sameFields(a: object, b: object): boolean {
  const expected = new Map<string, unknown>(Object.entries(b));
  const actual = Object.entries(a);
  if (actual.length !== expected.size) return false;
  return actual.every(([key, value]) => expected.has(key) && Object.is(value, expected.get(key)));
}

/**
 * Returns the black height of a valid subtree, or -1 on any violation.
 */
function verifySubtree<N extends CountedNode<N>>(
  node: N | null,
  withNode: WithNodeFn<N>
): number {
  if (node === null) return 0;
  if (node.color === 'red' && (isRed(node.left) || isRed(node.right))) return -1;

  const leftHeight = verifySubtree(node.left, withNode);
  if (leftHeight < 0) return -1;
  const rightHeight = verifySubtree(node.right, withNode);
  if (rightHeight !== leftHeight) return -1;

  const recomputed = withNode(node, { left: node.left, right: node.right });
  if (!sameFields(node, recomputed)) return -1;

  return leftHeight + (node.color === 'black' ? 1 : 0);
}

/**
 * Verify red-black balance and cached aggregates of a whole tree.
 * Recomputes every node through `withNode` and compares it with the live node.
 * O(n); meant for tests and debug checks.
 */
export function checkIntegrity<N extends CountedNode<N>>(
  root: N | null,
  withNode: WithNodeFn<N>
): boolean {
  if (root === null) return true;
  if (root.color !== 'black') return false;
  return verifySubtree(root, withNode) >= 0;
}
