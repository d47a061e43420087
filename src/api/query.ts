/**
 * Query namespace - O(1) and O(log n) operations.
 * Functions here are read-only selectors over immutable registry state.
 */

import {
  caretSetFindFirstEndingAtOrAfter,
  caretSetGet,
  caretSetIsInSelection,
  getCaretPosition,
  getSelectionEnd,
} from '../store/core/caret-set.ts';
import {
  rangeRegistryCount,
  rangeRegistryFindFirstEndingAfter,
  rangeRegistryFindFirstEndingAtOrAfter,
  rangeRegistryFindIntersecting,
  rangeRegistryFindIntersectingRange,
  rangeRegistryFindNextEndingAtOrAfter,
  rangeRegistryGet,
  rangeRegistryStartOf,
} from '../store/core/range-registry.ts';
import {
  segmentMapGetSegmentAt,
  segmentMapGetValueAt,
  segmentMapLength,
  segmentMapRunCount,
} from '../store/core/segment-map.ts';

export const query = {
  /** @complexity O(1) - absolute caret position of a selection */
  getCaretPosition,
  /** @complexity O(1) - end of a selection */
  getSelectionEnd,
  /** @complexity O(log n) - index walk */
  getCaret: caretSetGet,
  /** @complexity O(log n) - descent on begin + length */
  findFirstCaretEndingAtOrAfter: caretSetFindFirstEndingAtOrAfter,
  /** @complexity O(log n) - one descent plus a neighbour check */
  isInSelection: caretSetIsInSelection,
  /** @complexity O(1) - cached subtreeCount */
  getRangeCount: rangeRegistryCount,
  /** @complexity O(log n) - prefix sum of relative offsets */
  getRangeStart: rangeRegistryStartOf,
  /** @complexity O(log n) - index walk with prefix sum */
  getRange: rangeRegistryGet,
  /** @complexity O(log n) - descent pruned by subtreeMaxEnd */
  findFirstRangeEndingAfter: rangeRegistryFindFirstEndingAfter,
  /** @complexity O(log n) - descent pruned by subtreeMaxEnd */
  findFirstRangeEndingAtOrAfter: rangeRegistryFindFirstEndingAtOrAfter,
  /** @complexity O(log n) - descent pruned by subtreeMaxEnd, from an index */
  findNextRangeEndingAtOrAfter: rangeRegistryFindNextEndingAtOrAfter,
  /** @complexity O(log n) - two descents returning an index window */
  findIntersecting: rangeRegistryFindIntersecting,
  /** @complexity O(log n) - three descents returning an index window */
  findIntersectingRange: rangeRegistryFindIntersectingRange,
  /** @complexity O(1) - cached subtreeLength */
  getSegmentMapLength: segmentMapLength,
  /** @complexity O(1) - cached subtreeCount */
  getSegmentRunCount: segmentMapRunCount,
  /** @complexity O(log n) - descent on subtreeLength */
  getSegmentAt: segmentMapGetSegmentAt,
  /** @complexity O(log n) - descent on subtreeLength */
  getValueAt: segmentMapGetValueAt,
} as const;
