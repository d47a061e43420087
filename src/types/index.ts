/**
 * Type exports for the position tracker.
 */

// State types
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
} from './state.ts';

// Action types
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
} from './actions.ts';

export {
  isCaretAction,
  isTransactionAction,
  isTrackerAction,
  validateAction,
} from './actions.ts';

// Store types
export type {
  StoreListener,
  Unsubscribe,
  TrackerStore,
  TrackerReducer,
  PositionTracker,
} from './store.ts';
