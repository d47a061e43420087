/**
 * State factory functions for the position tracker.
 * Creates immutable nodes and initial registry state.
 */

import type {
  NodeColor,
  CaretNode,
  CaretSetState,
  RangeNode,
  RangeRegistryState,
  SegmentNode,
  SegmentMapState,
  TextThemeSpec,
  TextThemeState,
  TrackerState,
  PositionTrackerConfig,
  ValueEquals,
} from '../../types/state.ts';

/**
 * Default values for the optional tracker options.
 */
export const DEFAULT_TRACKER_OPTIONS = Object.freeze({
  validateIntegrity: false,
});

// =============================================================================
// Caret Nodes
// =============================================================================

/**
 * Create a caret node. Used internally by caret set operations.
 */
export function createCaretNode<D>(
  begin: number,
  length: number,
  caretOffset: number,
  data: D,
  color: NodeColor = 'black',
  left: CaretNode<D> | null = null,
  right: CaretNode<D> | null = null
): CaretNode<D> {
  return Object.freeze({
    color,
    left,
    right,
    begin,
    length,
    caretOffset,
    data,
    subtreeCount: 1 + (left?.subtreeCount ?? 0) + (right?.subtreeCount ?? 0),
  });
}

/**
 * Settable fields on a CaretNode.
 * subtreeCount is always recomputed from the children.
 */
export type CaretNodeUpdates<D> = Partial<
  Pick<CaretNode<D>, 'color' | 'left' | 'right' | 'begin' | 'length' | 'caretOffset' | 'data'>
>;

/**
 * Helper to create a modified caret node with structural sharing.
 */
export function withCaretNode<D>(node: CaretNode<D>, changes: CaretNodeUpdates<D>): CaretNode<D> {
  const next = { ...node, ...changes };
  return createCaretNode(
    next.begin,
    next.length,
    next.caretOffset,
    next.data,
    next.color,
    next.left,
    next.right
  );
}

/**
 * Create a caret set holding a single caret at position 0.
 */
export function createCaretSetState<D>(data: D): CaretSetState<D> {
  return Object.freeze({
    root: createCaretNode(0, 0, 0, data),
    count: 1,
  });
}

/**
 * Create a caret set with no carets.
 */
export function createEmptyCaretSetState<D>(): CaretSetState<D> {
  return Object.freeze({ root: null, count: 0 });
}

/**
 * Helper to create modified caret set state.
 */
export function withCaretSetState<D>(root: CaretNode<D> | null): CaretSetState<D> {
  return Object.freeze({ root, count: root?.subtreeCount ?? 0 });
}

// =============================================================================
// Range Nodes
// =============================================================================

/**
 * Create a range node, computing its subtree aggregates.
 *
 * subtreeMaxEnd is measured from the start of the range that precedes the
 * subtree, so a parent can combine it with its own prefix offset.
 */
export function createRangeNode<V>(
  offset: number,
  length: number,
  value: V,
  color: NodeColor = 'black',
  left: RangeNode<V> | null = null,
  right: RangeNode<V> | null = null
): RangeNode<V> {
  const leftOffset = left?.subtreeOffset ?? 0;
  const selfStart = leftOffset + offset;

  return Object.freeze({
    color,
    left,
    right,
    offset,
    length,
    value,
    subtreeCount: 1 + (left?.subtreeCount ?? 0) + (right?.subtreeCount ?? 0),
    subtreeOffset: selfStart + (right?.subtreeOffset ?? 0),
    subtreeMaxEnd: Math.max(
      left?.subtreeMaxEnd ?? -Infinity,
      selfStart + length,
      selfStart + (right?.subtreeMaxEnd ?? -Infinity)
    ),
  });
}

/**
 * Settable fields on a RangeNode.
 * Aggregates are always recomputed from the children.
 */
export type RangeNodeUpdates<V> = Partial<
  Pick<RangeNode<V>, 'color' | 'left' | 'right' | 'offset' | 'length' | 'value'>
>;

/**
 * Helper to create a modified range node with structural sharing.
 */
export function withRangeNode<V>(node: RangeNode<V>, changes: RangeNodeUpdates<V>): RangeNode<V> {
  const next = { ...node, ...changes };
  return createRangeNode(next.offset, next.length, next.value, next.color, next.left, next.right);
}

/**
 * Create an empty range registry.
 */
export function createRangeRegistryState<V>(): RangeRegistryState<V> {
  return Object.freeze({ root: null });
}

/**
 * Helper to create modified range registry state.
 */
export function withRangeRegistryState<V>(root: RangeNode<V> | null): RangeRegistryState<V> {
  return Object.freeze({ root });
}

// =============================================================================
// Segment Nodes
// =============================================================================

/**
 * Create a segment node, computing its subtree aggregates.
 */
export function createSegmentNode<V>(
  value: V,
  length: number,
  color: NodeColor = 'black',
  left: SegmentNode<V> | null = null,
  right: SegmentNode<V> | null = null
): SegmentNode<V> {
  return Object.freeze({
    color,
    left,
    right,
    value,
    length,
    subtreeCount: 1 + (left?.subtreeCount ?? 0) + (right?.subtreeCount ?? 0),
    subtreeLength: length + (left?.subtreeLength ?? 0) + (right?.subtreeLength ?? 0),
  });
}

/**
 * Settable fields on a SegmentNode.
 */
export type SegmentNodeUpdates<V> = Partial<
  Pick<SegmentNode<V>, 'color' | 'left' | 'right' | 'value' | 'length'>
>;

/**
 * Helper to create a modified segment node with structural sharing.
 */
export function withSegmentNode<V>(node: SegmentNode<V>, changes: SegmentNodeUpdates<V>): SegmentNode<V> {
  const next = { ...node, ...changes };
  return createSegmentNode(next.value, next.length, next.color, next.left, next.right);
}

/**
 * Create an empty segment map: every position holds `tailValue`.
 */
export function createSegmentMapState<V>(
  tailValue: V,
  equals: ValueEquals<V> = Object.is
): SegmentMapState<V> {
  return Object.freeze({ root: null, tailValue, equals });
}

/**
 * Helper to create modified segment map state.
 */
export function withSegmentMapState<V>(
  state: SegmentMapState<V>,
  changes: Partial<SegmentMapState<V>>
): SegmentMapState<V> {
  return Object.freeze({ ...state, ...changes });
}

// =============================================================================
// Text Theme
// =============================================================================

/**
 * Equalities for the theme parameters (default: Object.is for each).
 */
export interface TextThemeEquals<C, S, W> {
  readonly color?: ValueEquals<C>;
  readonly style?: ValueEquals<S>;
  readonly weight?: ValueEquals<W>;
}

/**
 * Create a text theme where every position holds `initial`.
 */
export function createTextThemeState<C, S, W>(
  initial: TextThemeSpec<C, S, W>,
  equals: TextThemeEquals<C, S, W> = {}
): TextThemeState<C, S, W> {
  return Object.freeze({
    color: createSegmentMapState(initial.color, equals.color ?? Object.is),
    style: createSegmentMapState(initial.style, equals.style ?? Object.is),
    weight: createSegmentMapState(initial.weight, equals.weight ?? Object.is),
  });
}

/**
 * Helper to create modified text theme state. Returns `state` itself when
 * no parameter map changed.
 */
export function withTextThemeState<C, S, W>(
  state: TextThemeState<C, S, W>,
  changes: Partial<TextThemeState<C, S, W>>
): TextThemeState<C, S, W> {
  const next = { ...state, ...changes };
  if (next.color === state.color && next.style === state.style && next.weight === state.weight) {
    return state;
  }
  return Object.freeze(next);
}

// =============================================================================
// Tracker State
// =============================================================================

/**
 * Create initial tracker state from configuration.
 */
export function createInitialTrackerState<C, R, S>(
  config: PositionTrackerConfig<C, S>
): TrackerState<C, R, S> {
  return Object.freeze({
    version: 0,
    carets: createCaretSetState(config.defaultCaretData),
    ranges: createRangeRegistryState<R>(),
    segments: createSegmentMapState(config.segmentValue, config.segmentEquals ?? Object.is),
  });
}

/**
 * Helper to create modified tracker state with structural sharing.
 */
export function withTrackerState<C, R, S>(
  state: TrackerState<C, R, S>,
  changes: Partial<TrackerState<C, R, S>>
): TrackerState<C, R, S> {
  return Object.freeze({ ...state, ...changes });
}
