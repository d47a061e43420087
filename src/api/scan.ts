/**
 * Scan namespace - O(n) operations.
 * Functions here walk a whole registry, or every match of a query.
 * Use `query.*` for lookups when possible.
 */

import { caretSetEntries } from '../store/core/caret-set.ts';
import {
  rangeRegistryCollectIntersecting,
  rangeRegistryCollectIntersectingRange,
  rangeRegistryEntries,
} from '../store/core/range-registry.ts';
import { segmentMapRuns, segmentMapRunsFrom } from '../store/core/segment-map.ts';
import { findIntegrityViolation } from '../store/features/store.ts';

export const scan = {
  /** @complexity O(n) - in-order walk of all carets */
  carets: caretSetEntries,
  /** @complexity O(n) - in-order walk of all ranges with absolute starts */
  ranges: rangeRegistryEntries,
  /** @complexity O(log n + k * log n) - k ranges intersecting a position */
  collectIntersecting: rangeRegistryCollectIntersecting,
  /** @complexity O(log n + k * log n) - k ranges intersecting a span */
  collectIntersectingRange: rangeRegistryCollectIntersectingRange,
  /** @complexity O(n) - all runs ending with the tail sentinel */
  segmentRuns: segmentMapRuns,
  /** @complexity O(log n + k) - runs from a position onwards */
  segmentRunsFrom: segmentMapRunsFrom,
  /** @complexity O(n) - recomputes every node of every registry */
  findIntegrityViolation,
} as const;
