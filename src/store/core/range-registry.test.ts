/**
 * Tests for the overlapping range registry.
 */

import { describe, it, expect } from 'vitest';
import type { RangeEntry, RangeRegistryState } from '../../types/state.ts';
import { createRangeRegistryState } from './state.ts';
import {
  rangeRegistryCheckIntegrity,
  rangeRegistryClear,
  rangeRegistryCollectIntersecting,
  rangeRegistryCollectIntersectingRange,
  rangeRegistryCount,
  rangeRegistryEntries,
  rangeRegistryErase,
  rangeRegistryFindFirstEndingAfter,
  rangeRegistryFindFirstEndingAtOrAfter,
  rangeRegistryFindIntersecting,
  rangeRegistryFindIntersectingRange,
  rangeRegistryFindNextEndingAtOrAfter,
  rangeRegistryFromEntries,
  rangeRegistryGet,
  rangeRegistryInsert,
  rangeRegistryOnModification,
  rangeRegistryStartOf,
} from './range-registry.ts';

function entries<V>(state: RangeRegistryState<V>): [number, number, V][] {
  return [...rangeRegistryEntries(state)].map((match) => [match.start, match.length, match.value]);
}

function registry(ranges: readonly [number, number, string][]): RangeRegistryState<string> {
  return ranges.reduce(
    (state, [start, length, value]) => rangeRegistryInsert(state, start, length, value),
    createRangeRegistryState<string>()
  );
}

/** Small deterministic PRNG so failures reproduce. */
function mulberry32(seed: number): () => number {
  let a = seed;
  return () => {
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function randomInt(random: () => number, maxInclusive: number): number {
  return Math.floor(random() * (maxInclusive + 1));
}

/**
 * Plain-array model of the edit rules.
 */
function modelOnModification(
  model: RangeEntry<number>[],
  position: number,
  erasedLength: number,
  insertedLength: number
): RangeEntry<number>[] {
  const eraseEnd = position + erasedLength;
  const delta = insertedLength - erasedLength;
  const result: RangeEntry<number>[] = [];
  for (const range of model) {
    const end = range.start + range.length;
    if (range.start < position) {
      if (end <= position) {
        result.push(range);
      } else if (end > eraseEnd) {
        result.push({ ...range, length: range.length + delta });
      } else {
        result.push({ ...range, length: position - range.start });
      }
    } else if (range.start <= eraseEnd) {
      if (erasedLength > 0 && end <= eraseEnd) continue;
      const length = range.start < eraseEnd ? range.length - (eraseEnd - range.start) : range.length;
      result.push({ start: position + insertedLength, length, value: range.value });
    } else {
      result.push({ ...range, start: range.start + delta });
    }
  }
  return result;
}

describe('Range Registry Operations', () => {
  describe('rangeRegistryInsert', () => {
    it('should keep ranges sorted by start', () => {
      const state = registry([
        [20, 5, 'c'],
        [0, 10, 'a'],
        [5, 10, 'b'],
      ]);
      expect(entries(state)).toEqual([
        [0, 10, 'a'],
        [5, 10, 'b'],
        [20, 5, 'c'],
      ]);
      expect(rangeRegistryCount(state)).toBe(3);
      expect(rangeRegistryCheckIntegrity(state)).toBe(true);
    });

    it('should store each start relative to the previous range', () => {
      const state = registry([
        [20, 5, 'c'],
        [0, 10, 'a'],
        [5, 10, 'b'],
      ]);
      const offsets = [0, 1, 2].map((index) => {
        const match = rangeRegistryGet(state, index);
        return match === null ? null : match.start;
      });
      expect(offsets).toEqual([0, 5, 20]);
      expect(rangeRegistryStartOf(state, 2)).toBe(20);
    });

    it('should order equal starts by placement', () => {
      let state = registry([[10, 1, 'first']]);
      state = rangeRegistryInsert(state, 10, 2, 'after');
      state = rangeRegistryInsert(state, 10, 3, 'before', 'before');
      expect(entries(state).map(([, , value]) => value)).toEqual(['before', 'first', 'after']);
    });

    it('should reject negative starts', () => {
      expect(() => rangeRegistryInsert(createRangeRegistryState<string>(), -1, 2, 'x')).toThrow(
        'rangeRegistryInsert: start must be a non-negative number, got -1'
      );
    });
  });

  describe('rangeRegistryErase', () => {
    it('should keep later starts when erasing', () => {
      const state = rangeRegistryErase(
        registry([
          [0, 10, 'a'],
          [5, 10, 'b'],
          [20, 5, 'c'],
        ]),
        1
      );
      expect(entries(state)).toEqual([
        [0, 10, 'a'],
        [20, 5, 'c'],
      ]);
      expect(rangeRegistryCheckIntegrity(state)).toBe(true);
    });

    it('should throw for an index past the end', () => {
      expect(() => rangeRegistryErase(registry([[0, 1, 'a']]), 1)).toThrow(
        'rangeRegistryErase: index 1 is out of range [0, 1)'
      );
    });

    it('should clear every range', () => {
      expect(rangeRegistryCount(rangeRegistryClear<string>())).toBe(0);
    });
  });

  describe('queries', () => {
    const state = registry([
      [0, 10, 'a'],
      [5, 10, 'b'],
      [20, 5, 'c'],
    ]);

    it('should find the first range ending after a position', () => {
      expect(rangeRegistryFindFirstEndingAfter(state, 10)).toEqual({ index: 1, start: 5 });
      expect(rangeRegistryFindFirstEndingAtOrAfter(state, 10)).toEqual({ index: 0, start: 0 });
      expect(rangeRegistryFindFirstEndingAfter(state, 25)).toEqual({ index: 3, start: 20 });
    });

    it('should continue the search from an index', () => {
      expect(rangeRegistryFindNextEndingAtOrAfter(state, 12, 2)).toEqual({ index: 2, start: 20 });
      expect(rangeRegistryFindNextEndingAtOrAfter(state, 16, 0)).toEqual({ index: 2, start: 20 });
    });

    it('should bound the ranges containing a point', () => {
      expect(rangeRegistryFindIntersecting(state, 12)).toEqual({
        begin: { index: 1, start: 5 },
        end: { index: 2, start: 20 },
      });
      expect(rangeRegistryCollectIntersecting(state, 12).map((match) => match.value)).toEqual(['b']);
      expect(rangeRegistryCollectIntersecting(state, 10).map((match) => match.value)).toEqual(['a', 'b']);
      expect(rangeRegistryCollectIntersecting(state, 17)).toEqual([]);
    });

    it('should bound the ranges intersecting a span', () => {
      expect(rangeRegistryFindIntersectingRange(state, 12, 22)).toEqual({
        beforeBegin: { index: 1, start: 5 },
        begin: { index: 2, start: 20 },
        end: { index: 3, start: 20 },
      });
      expect(rangeRegistryCollectIntersectingRange(state, 12, 22)).toEqual([
        { index: 1, start: 5, length: 10, value: 'b' },
        { index: 2, start: 20, length: 5, value: 'c' },
      ]);
    });

    it('should reject an inverted span', () => {
      expect(() => rangeRegistryFindIntersectingRange(state, 5, 4)).toThrow(
        'rangeRegistryFindIntersectingRange: begin (5) cannot be greater than end (4)'
      );
    });

    it('should return end cursors on an empty registry', () => {
      const empty = createRangeRegistryState<string>();
      expect(rangeRegistryFindFirstEndingAfter(empty, 0)).toEqual({ index: 0, start: 0 });
      expect(rangeRegistryCollectIntersecting(empty, 0)).toEqual([]);
      expect(rangeRegistryGet(empty, 0)).toBeNull();
    });
  });

  describe('rangeRegistryOnModification', () => {
    it('should grow, shrink and truncate ranges around an edit', () => {
      const state = rangeRegistryOnModification(
        registry([
          [0, 10, 'a'],
          [5, 10, 'b'],
          [20, 5, 'c'],
        ]),
        8,
        4,
        1
      );
      expect(entries(state)).toEqual([
        [0, 8, 'a'],
        [5, 7, 'b'],
        [17, 5, 'c'],
      ]);
      expect(rangeRegistryCheckIntegrity(state)).toBe(true);
    });

    it('should shift ranges starting at an insertion point', () => {
      const state = rangeRegistryOnModification(
        registry([
          [5, 5, 'y'],
          [10, 0, 'z'],
        ]),
        10,
        0,
        3
      );
      expect(entries(state)).toEqual([
        [5, 5, 'y'],
        [13, 0, 'z'],
      ]);
    });

    it('should drop erased ranges and cut partially erased ones', () => {
      const state = rangeRegistryOnModification(
        registry([
          [3, 2, 'w'],
          [4, 10, 'v'],
          [30, 1, 'u'],
        ]),
        2,
        5,
        1
      );
      expect(entries(state)).toEqual([
        [3, 7, 'v'],
        [26, 1, 'u'],
      ]);
      expect(rangeRegistryCheckIntegrity(state)).toBe(true);
    });

    it('should return the same state for an empty edit', () => {
      const state = registry([[1, 2, 'a']]);
      expect(rangeRegistryOnModification(state, 1, 0, 0)).toBe(state);
    });

    it('should ignore edits after every range', () => {
      const state = registry([[1, 2, 'a']]);
      expect(entries(rangeRegistryOnModification(state, 50, 3, 9))).toEqual([[1, 2, 'a']]);
    });
  });

  describe('rangeRegistryFromEntries', () => {
    it('should build from unordered entries', () => {
      const state = rangeRegistryFromEntries([
        { start: 9, length: 1, value: 'late' },
        { start: 2, length: 4, value: 'early' },
      ]);
      expect(entries(state)).toEqual([
        [2, 4, 'early'],
        [9, 1, 'late'],
      ]);
    });
  });

  describe('randomized operations', () => {
    it('should answer point and span queries like a plain array', () => {
      const random = mulberry32(42);
      let state = createRangeRegistryState<number>();
      let model: RangeEntry<number>[] = [];
      let nextValue = 0;

      for (let step = 0; step < 400; step++) {
        const op = randomInt(random, 5);
        if (op <= 2 || model.length === 0) {
          const start = randomInt(random, 60);
          const length = randomInt(random, 15);
          state = rangeRegistryInsert(state, start, length, nextValue);
          const index = model.findIndex((range) => range.start > start);
          model.splice(index < 0 ? model.length : index, 0, { start, length, value: nextValue });
          nextValue++;
        } else if (op === 3) {
          const index = randomInt(random, model.length - 1);
          state = rangeRegistryErase(state, index);
          model.splice(index, 1);
        } else {
          const position = randomInt(random, 70);
          const erasedLength = randomInt(random, 8);
          const insertedLength = randomInt(random, 8);
          state = rangeRegistryOnModification(state, position, erasedLength, insertedLength);
          model = modelOnModification(model, position, erasedLength, insertedLength);
        }

        expect(rangeRegistryCheckIntegrity(state)).toBe(true);
        expect(entries(state)).toEqual(model.map((range) => [range.start, range.length, range.value]));

        const point = randomInt(random, 80);
        const expectedAtPoint = model
          .map((range, index) => ({ index, ...range }))
          .filter((range) => range.start <= point && point <= range.start + range.length);
        expect(rangeRegistryCollectIntersecting(state, point)).toEqual(expectedAtPoint);

        const spanBegin = randomInt(random, 80);
        const spanEnd = spanBegin + randomInt(random, 10);
        const expectedInSpan = model
          .map((range, index) => ({ index, ...range }))
          .filter((range) => range.start <= spanEnd && range.start + range.length >= spanBegin);
        expect(rangeRegistryCollectIntersectingRange(state, spanBegin, spanEnd)).toEqual(expectedInSpan);
      }
    });
  });
});
