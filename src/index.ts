/**
 * Position tracking for text editors.
 *
 * Keeps carets, overlapping ranges and run-length segments in step with
 * edits to a document, each backed by an immutable red-black tree.
 */

// =============================================================================
// Types
// =============================================================================

export type {
  NodeColor,
  RBNode,
  CountedNode,
  CaretSelection,
  CaretEntry,
  CaretNode,
  CaretSetState,
  RangeNode,
  RangeRegistryState,
  RangeEntry,
  RangeMatch,
  RangeCursor,
  RangePlacement,
  SegmentNode,
  ValueEquals,
  SegmentMapState,
  SegmentRun,
  SegmentLocation,
  TextThemeSpec,
  TextThemeState,
  TextThemeMember,
  TrackerState,
  PositionTrackerConfig,
} from './types/index.ts';

export type {
  ApplyEditAction,
  AddCaretAction,
  RemoveCaretAction,
  ResetCaretsAction,
  SetCaretsAction,
  InsertRangeAction,
  EraseRangeAction,
  ClearRangesAction,
  SetSegmentAction,
  ClearSegmentsAction,
  TransactionStartAction,
  TransactionCommitAction,
  TransactionRollbackAction,
  TrackerAction,
  TrackerActionType,
  ActionValidationResult,
} from './types/index.ts';

export type {
  StoreListener,
  Unsubscribe,
  TrackerStore,
  TrackerReducer,
  PositionTracker,
} from './types/index.ts';

// =============================================================================
// Type Guards
// =============================================================================

export {
  isCaretAction,
  isTransactionAction,
  isTrackerAction,
  validateAction,
} from './types/index.ts';

// =============================================================================
// Store, Registries and Tree Engine
// =============================================================================

export * from './store/index.ts';

// =============================================================================
// Complexity-Stratified API
// =============================================================================

export { query, scan } from './api/index.ts';
