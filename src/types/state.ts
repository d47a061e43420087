/**
 * Core immutable state types for the position tracker.
 * All state structures are read-only and use structural sharing for efficiency.
 */

// =============================================================================
// Tree Nodes
// =============================================================================

/**
 * Red-Black tree node color.
 */
export type NodeColor = 'red' | 'black';

/**
 * Generic base interface for Red-Black tree nodes.
 * Provides the common structure (color, left, right) that all RB-tree nodes share.
 * Uses F-bounded polymorphism for type-safe self-referential children.
 *
 * @template T - The concrete node type extending this interface
 */
export interface RBNode<T extends RBNode<T>> {
  readonly color: NodeColor;
  readonly left: T | null;
  readonly right: T | null;
}

/**
 * Red-Black node that caches the number of nodes in its subtree.
 * Every tracker tree is indexed by in-order position through this count.
 */
export interface CountedNode<T extends CountedNode<T>> extends RBNode<T> {
  /** Number of nodes in this subtree (including this node) */
  readonly subtreeCount: number;
}

// =============================================================================
// Caret Set
// =============================================================================

/**
 * A caret together with its selected region.
 * The selection covers the closed interval [begin, begin + length] and the
 * caret sits at begin + caretOffset.
 */
export interface CaretSelection {
  readonly begin: number;
  readonly length: number;
  readonly caretOffset: number;
}

/**
 * A caret selection with the owner's payload attached.
 */
export interface CaretEntry<D> extends CaretSelection {
  readonly data: D;
}

/**
 * Immutable caret node. Positions are absolute; entries never overlap, so both
 * begin and end grow monotonically in tree order.
 */
export interface CaretNode<D> extends CountedNode<CaretNode<D>>, CaretEntry<D> {}

/**
 * Sorted, merged set of carets.
 */
export interface CaretSetState<D> {
  readonly root: CaretNode<D> | null;
  /** Number of carets */
  readonly count: number;
}

// =============================================================================
// Range Registry
// =============================================================================

/**
 * Immutable node of the overlapping range registry.
 * The start of a range is stored relative to the start of the previous range
 * in tree order, so shifting every range after an edit touches one node.
 */
export interface RangeNode<V> extends CountedNode<RangeNode<V>> {
  /** Distance from the previous range's start (from 0 for the first range) */
  readonly offset: number;
  readonly length: number;
  readonly value: V;
  /** Sum of offsets in this subtree */
  readonly subtreeOffset: number;
  /**
   * Largest range end in this subtree, relative to the start of the range
   * preceding the subtree. -Infinity for subtrees that hold no ranges.
   */
  readonly subtreeMaxEnd: number;
}

/**
 * Overlapping ranges keyed by relative start.
 */
export interface RangeRegistryState<V> {
  readonly root: RangeNode<V> | null;
}

/**
 * A range with its absolute start reconstructed.
 */
export interface RangeEntry<V> {
  readonly start: number;
  readonly length: number;
  readonly value: V;
}

/**
 * A range entry together with its position in the registry.
 */
export interface RangeMatch<V> extends RangeEntry<V> {
  readonly index: number;
}

/**
 * Position in the registry plus the absolute start of the range at that index.
 * For the end cursor (index === count) start is the last range's start.
 */
export interface RangeCursor {
  readonly index: number;
  readonly start: number;
}

/**
 * Where a new range goes relative to ranges with the same start.
 */
export type RangePlacement = 'before' | 'after';

// =============================================================================
// Segment Map
// =============================================================================

/**
 * Immutable run of the segment map.
 */
export interface SegmentNode<V> extends CountedNode<SegmentNode<V>> {
  readonly value: V;
  /** Length of this run (always positive) */
  readonly length: number;
  /** Total length of all runs in this subtree */
  readonly subtreeLength: number;
}

/**
 * Equality used to coalesce neighbouring runs.
 */
export type ValueEquals<V> = (a: V, b: V) => boolean;

/**
 * Run-length map covering [0, infinity).
 * Runs cover [0, total) and every position past that takes the tail value.
 */
export interface SegmentMapState<V> {
  readonly root: SegmentNode<V> | null;
  /** Value of the implicit run that extends past the last stored run */
  readonly tailValue: V;
  readonly equals: ValueEquals<V>;
}

/**
 * A single (value, length) run.
 */
export interface SegmentRun<V> {
  readonly value: V;
  readonly length: number;
}

/**
 * A run together with its index and absolute start.
 */
export interface SegmentLocation<V> extends SegmentRun<V> {
  readonly index: number;
  readonly start: number;
}

// =============================================================================
// Text Theme
// =============================================================================

/**
 * Theme of the text at one position.
 */
export interface TextThemeSpec<C, S, W> {
  readonly color: C;
  readonly style: S;
  readonly weight: W;
}

/**
 * Text theme across a whole document, one segment map per parameter.
 */
export interface TextThemeState<C, S, W> {
  readonly color: SegmentMapState<C>;
  readonly style: SegmentMapState<S>;
  readonly weight: SegmentMapState<W>;
}

export type TextThemeMember = keyof TextThemeSpec<unknown, unknown, unknown>;

// =============================================================================
// Tracker State
// =============================================================================

/**
 * Complete tracker state snapshot.
 * Immutable: all updates produce new state objects.
 */
export interface TrackerState<C, R, S> {
  /** Monotonically increasing version number */
  readonly version: number;
  readonly carets: CaretSetState<C>;
  readonly ranges: RangeRegistryState<R>;
  readonly segments: SegmentMapState<S>;
}

/**
 * Configuration for creating a position tracker.
 */
export interface PositionTrackerConfig<C, S> {
  /** Payload of the caret created on reset */
  readonly defaultCaretData: C;
  /** Value of positions no segment has been written to */
  readonly segmentValue: S;
  /** Equality for coalescing segment values (default: Object.is) */
  readonly segmentEquals?: ValueEquals<S>;
  /** Run integrity checks after every change and throw on failure */
  readonly validateIntegrity?: boolean;
}
