/**
 * Store exports for the position tracker.
 */

// Store factories
export { createTrackerStore, createPositionTracker, findIntegrityViolation } from './features/store.ts';

// Action creators
export { TrackerActions, serializeAction, deserializeAction } from './features/actions.ts';

// Reducer
export { trackerReducer, createTrackerReducer } from './features/reducer.ts';

// Transactions
export { createTransactionManager } from './features/transaction.ts';
export type { TransactionManager, AppliedAction } from './features/transaction.ts';

// Events
export {
  createEventEmitter,
  createEditEvent,
  createRegistryChangeEvent,
  getAffectedRange,
} from './features/events.ts';
export type {
  TrackerEvent,
  EditEvent,
  RegistryChangeEvent,
  CaretsChangeEvent,
  RangesChangeEvent,
  SegmentsChangeEvent,
  AnyTrackerEvent,
  TrackerEventMap,
  EventHandler,
  TrackerEventEmitter,
} from './features/events.ts';

// State factories
export {
  DEFAULT_TRACKER_OPTIONS,
  createCaretNode,
  createCaretSetState,
  createEmptyCaretSetState,
  createRangeNode,
  createRangeRegistryState,
  createSegmentNode,
  createSegmentMapState,
  createTextThemeState,
  createInitialTrackerState,
  withCaretNode,
  withRangeNode,
  withSegmentNode,
  withTextThemeState,
  withTrackerState,
} from './core/state.ts';
export type { TextThemeEquals } from './core/state.ts';

// Caret set
export {
  getSelectionEnd,
  getCaretPosition,
  selectionFromCaret,
  mergeCaretSelections,
  caretSetAdd,
  caretSetRemove,
  caretSetReset,
  caretSetFromEntries,
  caretSetGet,
  caretSetEntries,
  caretSetIsInSelection,
  caretSetFindFirstEndingAtOrAfter,
  caretSetCheckIntegrity,
} from './core/caret-set.ts';
export type { CaretAddResult } from './core/caret-set.ts';

// Range registry
export {
  rangeRegistryCount,
  rangeRegistryStartOf,
  rangeRegistryGet,
  rangeRegistryEntries,
  rangeRegistryFindFirstEndingAfter,
  rangeRegistryFindFirstEndingAtOrAfter,
  rangeRegistryFindNextEndingAtOrAfter,
  rangeRegistryFindIntersecting,
  rangeRegistryFindIntersectingRange,
  rangeRegistryCollectIntersecting,
  rangeRegistryCollectIntersectingRange,
  rangeRegistryInsert,
  rangeRegistryErase,
  rangeRegistryClear,
  rangeRegistryOnModification,
  rangeRegistryFromEntries,
  rangeRegistryCheckIntegrity,
} from './core/range-registry.ts';
export type { PointIntersection, RangeIntersection } from './core/range-registry.ts';

// Segment map
export {
  segmentMapLength,
  segmentMapRunCount,
  segmentMapGetSegmentAt,
  segmentMapGetValueAt,
  segmentMapRuns,
  segmentMapRunsFrom,
  segmentMapSetRange,
  segmentMapOnModification,
  segmentMapClear,
  segmentMapCheckIntegrity,
} from './core/segment-map.ts';

// Text theme
export {
  textThemeGetAt,
  textThemeSetRange,
  textThemeOnModification,
  textThemeClear,
  textThemeCheckIntegrity,
  createThemePositionIterator,
} from './core/text-theme.ts';
export type { ThemePositionIterator } from './core/text-theme.ts';

// Generic red-black tree engine
export {
  isRed,
  blackHeight,
  countOf,
  nodeAt,
  findCustom,
  findFirstIndex,
  inOrder,
  inOrderFrom,
  buildFromLeaves,
  insertAt,
  updateAt,
  removeAt,
  eraseRange,
  insertTreeAt,
  replaceRange,
  splitAt,
  splitBefore,
  join,
  concat,
  checkIntegrity,
} from './core/rb-tree.ts';
export type {
  WithNodeFn,
  SplitResult,
  FindBranch,
  FindStep,
  FindSelector,
  FindResult,
} from './core/rb-tree.ts';
