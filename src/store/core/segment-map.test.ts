/**
 * Tests for the run-length segment map.
 */

import { describe, it, expect } from 'vitest';
import type { SegmentMapState } from '../../types/state.ts';
import { createSegmentMapState } from './state.ts';
import {
  segmentMapCheckIntegrity,
  segmentMapClear,
  segmentMapGetSegmentAt,
  segmentMapGetValueAt,
  segmentMapLength,
  segmentMapOnModification,
  segmentMapRunCount,
  segmentMapRuns,
  segmentMapRunsFrom,
  segmentMapSetRange,
} from './segment-map.ts';

function runs<V>(state: SegmentMapState<V>): [V, number][] {
  return [...segmentMapRuns(state)].map((run) => [run.value, run.length]);
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

/** (1,10) (2,5) (3,10) (2,15), tail 0 */
function themed(): SegmentMapState<number> {
  let state = createSegmentMapState(0);
  state = segmentMapSetRange(state, 0, 10, 1);
  state = segmentMapSetRange(state, 10, 15, 2);
  state = segmentMapSetRange(state, 15, 25, 3);
  state = segmentMapSetRange(state, 25, 40, 2);
  return state;
}

describe('Segment Map Operations', () => {
  describe('segmentMapSetRange', () => {
    it('should start with only the tail', () => {
      const state = createSegmentMapState('plain');
      expect(runs(state)).toEqual([['plain', 0]]);
      expect(segmentMapLength(state)).toBe(0);
    });

    it('should append runs and split a run on overwrite', () => {
      const state = themed();
      expect(runs(state)).toEqual([
        [1, 10],
        [2, 5],
        [3, 10],
        [2, 15],
        [0, 0],
      ]);

      const next = segmentMapSetRange(state, 0, 5, 2);
      expect(runs(next)).toEqual([
        [2, 5],
        [1, 5],
        [2, 5],
        [3, 10],
        [2, 15],
        [0, 0],
      ]);
      expect(segmentMapCheckIntegrity(next)).toBe(true);
    });

    it('should return the same state when the value is already set', () => {
      const state = segmentMapSetRange(themed(), 0, 5, 2);
      expect(segmentMapSetRange(state, 0, 5, 2)).toBe(state);
      expect(segmentMapSetRange(state, 16, 20, 3)).toBe(state);
    });

    it('should coalesce with equal neighbours', () => {
      const state = segmentMapSetRange(themed(), 15, 25, 2);
      expect(runs(state)).toEqual([
        [1, 10],
        [2, 30],
        [0, 0],
      ]);
    });

    it('should fill a gap past the end with the tail value', () => {
      const state = segmentMapSetRange(segmentMapSetRange(createSegmentMapState(0), 0, 10, 1), 30, 35, 5);
      expect(runs(state)).toEqual([
        [1, 10],
        [0, 20],
        [5, 5],
        [0, 0],
      ]);
    });

    it('should not store the tail value past the end', () => {
      const state = segmentMapSetRange(createSegmentMapState(0), 0, 10, 1);
      expect(segmentMapSetRange(state, 30, 35, 0)).toBe(state);
    });

    it('should fold a trailing tail-valued run into the tail', () => {
      let state = segmentMapSetRange(createSegmentMapState(0), 0, 10, 1);
      state = segmentMapSetRange(state, 10, 20, 2);
      state = segmentMapSetRange(state, 10, 20, 0);
      expect(runs(state)).toEqual([
        [1, 10],
        [0, 0],
      ]);
      expect(segmentMapLength(state)).toBe(10);
      expect(segmentMapCheckIntegrity(state)).toBe(true);
    });

    it('should treat an empty range as a no-op', () => {
      const state = themed();
      expect(segmentMapSetRange(state, 7, 7, 9)).toBe(state);
    });

    it('should reject an inverted range', () => {
      expect(() => segmentMapSetRange(themed(), 8, 7, 9)).toThrow(
        'segmentMapSetRange: begin (8) cannot be greater than end (7)'
      );
    });

    it('should use a custom equality to coalesce', () => {
      let state = createSegmentMapState<{ id: string }>({ id: 'none' }, (a, b) => a.id === b.id);
      state = segmentMapSetRange(state, 0, 4, { id: 'x' });
      state = segmentMapSetRange(state, 4, 8, { id: 'x' });
      expect(segmentMapRunCount(state)).toBe(1);
      expect(segmentMapLength(state)).toBe(8);
    });
  });

  describe('lookups', () => {
    const state = segmentMapSetRange(segmentMapSetRange(createSegmentMapState(0), 0, 10, 1), 30, 35, 5);

    it('should locate the run covering a position', () => {
      expect(segmentMapGetSegmentAt(state, 12)).toEqual({ index: 1, start: 10, value: 0, length: 20 });
      expect(segmentMapGetSegmentAt(state, 10)).toEqual({ index: 1, start: 10, value: 0, length: 20 });
      expect(segmentMapGetValueAt(state, 9)).toBe(1);
      expect(segmentMapGetValueAt(state, 34)).toBe(5);
    });

    it('should resolve positions past the end to the tail sentinel', () => {
      expect(segmentMapGetSegmentAt(state, 40)).toEqual({ index: 3, start: 35, value: 0, length: 0 });
    });

    it('should iterate runs from a position', () => {
      expect([...segmentMapRunsFrom(state, 31)]).toEqual([
        { index: 2, start: 30, value: 5, length: 5 },
        { index: 3, start: 35, value: 0, length: 0 },
      ]);
    });
  });

  describe('segmentMapOnModification', () => {
    it('should give inserted units the value at the position', () => {
      const state = segmentMapOnModification(segmentMapSetRange(themed(), 0, 5, 2), 7, 0, 3);
      expect(runs(state)).toEqual([
        [2, 5],
        [1, 8],
        [2, 5],
        [3, 10],
        [2, 15],
        [0, 0],
      ]);
    });

    it('should give units inserted at a boundary the following value', () => {
      const state = segmentMapOnModification(segmentMapSetRange(themed(), 0, 5, 2), 10, 0, 4);
      expect(runs(state)).toEqual([
        [2, 5],
        [1, 5],
        [2, 9],
        [3, 10],
        [2, 15],
        [0, 0],
      ]);
    });

    it('should erase across runs', () => {
      const state = segmentMapOnModification(segmentMapSetRange(themed(), 0, 5, 2), 8, 10, 0);
      expect(runs(state)).toEqual([
        [2, 5],
        [1, 3],
        [3, 7],
        [2, 15],
        [0, 0],
      ]);
      expect(segmentMapCheckIntegrity(state)).toBe(true);
    });

    it('should coalesce neighbours joined by an erase', () => {
      const state = segmentMapOnModification(segmentMapSetRange(themed(), 0, 5, 2), 5, 5, 0);
      expect(runs(state)).toEqual([
        [2, 10],
        [3, 10],
        [2, 15],
        [0, 0],
      ]);
      expect(segmentMapCheckIntegrity(state)).toBe(true);
    });

    it('should change nothing for an empty edit or an edit past the end', () => {
      const state = themed();
      expect(segmentMapOnModification(state, 12, 0, 0)).toBe(state);
      expect(segmentMapOnModification(state, 50, 0, 5)).toBe(state);
    });
  });

  describe('randomized operations', () => {
    it('should hold the same values as a per-position array', () => {
      for (const seed of [1, 7, 19, 42, 1234]) {
        const random = mulberry32(seed);
        const tail = 0;
        let state = createSegmentMapState(tail);
        const model: number[] = [];
        const valueAt = (position: number): number => (position < model.length ? model[position] : tail);

        for (let step = 0; step < 150; step++) {
          if (random() < 0.6) {
            const begin = randomInt(random, 50);
            const end = begin + randomInt(random, 12);
            const value = randomInt(random, 3);
            state = segmentMapSetRange(state, begin, end, value);
            while (model.length < end) model.push(tail);
            model.fill(value, begin, end);

            // Writing the same range again changes nothing
            expect(segmentMapSetRange(state, begin, end, value)).toBe(state);
          } else {
            const position = randomInt(random, 55);
            const erased = randomInt(random, 6);
            const inserted = randomInt(random, 6);
            const value = valueAt(position);
            state = segmentMapOnModification(state, position, erased, inserted);
            while (model.length < position + erased) model.push(tail);
            model.splice(position, erased, ...new Array<number>(inserted).fill(value));
          }

          expect(segmentMapCheckIntegrity(state)).toBe(true);
          for (let position = 0; position < model.length + 3; position++) {
            expect(segmentMapGetValueAt(state, position)).toBe(valueAt(position));
          }
        }
      }
    });
  });

  describe('segmentMapClear', () => {
    it('should drop every run and change the tail', () => {
      const state = segmentMapClear(themed(), 7);
      expect(runs(state)).toEqual([[7, 0]]);
      expect(segmentMapGetValueAt(state, 3)).toBe(7);
    });

    it('should return the same state when already cleared to the value', () => {
      const state = segmentMapClear(themed(), 7);
      expect(segmentMapClear(state, 7)).toBe(state);
      expect(segmentMapClear(state, 8)).not.toBe(state);
    });
  });
});
