/**
 * Tests for the tracker event emitter and event helpers.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  createEventEmitter,
  createEditEvent,
  createRegistryChangeEvent,
  getAffectedRange,
} from './events.ts';
import { TrackerActions } from './actions.ts';
import { createInitialTrackerState } from '../core/state.ts';

const state = createInitialTrackerState<null, string, string>({ defaultCaretData: null, segmentValue: 'plain' });

afterEach(() => {
  vi.restoreAllMocks();
});

describe('Event Emitter', () => {
  it('should deliver events to handlers of the matching type', () => {
    const emitter = createEventEmitter<null, string, string>();
    const ranges = vi.fn();
    const segments = vi.fn();
    emitter.addEventListener('ranges-change', ranges);
    emitter.addEventListener('segments-change', segments);

    const event = createRegistryChangeEvent('ranges-change', TrackerActions.clearRanges(), state, state);
    emitter.emit('ranges-change', event);

    expect(ranges).toHaveBeenCalledWith(event);
    expect(segments).not.toHaveBeenCalled();
  });

  it('should unsubscribe through the returned function', () => {
    const emitter = createEventEmitter<null, string, string>();
    const handler = vi.fn();
    const unsubscribe = emitter.addEventListener('edit', handler);
    expect(emitter.listenerCount('edit')).toBe(1);

    unsubscribe();
    emitter.emit('edit', createEditEvent(TrackerActions.applyEdit(0, 0, 1), state, state));
    expect(handler).not.toHaveBeenCalled();
    expect(emitter.listenerCount('edit')).toBe(0);
  });

  it('should remove every handler with removeAllListeners', () => {
    const emitter = createEventEmitter<null, string, string>();
    emitter.addEventListener('edit', vi.fn());
    emitter.addEventListener('carets-change', vi.fn());
    emitter.removeAllListeners();
    expect(emitter.listenerCount('edit')).toBe(0);
    expect(emitter.listenerCount('carets-change')).toBe(0);
  });

  it('should report a throwing handler and call the rest', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const emitter = createEventEmitter<null, string, string>();
    const failure = new Error('boom');
    const healthy = vi.fn();
    emitter.addEventListener('carets-change', () => {
      throw failure;
    });
    emitter.addEventListener('carets-change', healthy);

    emitter.emit('carets-change', createRegistryChangeEvent('carets-change', TrackerActions.resetCarets(), state, state));
    expect(healthy).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledWith("Event handler error for 'carets-change':", failure);
  });
});

describe('Event Helpers', () => {
  it('should compute the inserted span of an edit', () => {
    expect(getAffectedRange(TrackerActions.applyEdit(7, 3, 5))).toEqual([7, 12]);
    expect(getAffectedRange(TrackerActions.applyEdit(7, 3, 0))).toEqual([7, 7]);
  });

  it('should build frozen edit events', () => {
    const action = TrackerActions.applyEdit(2, 1, 4);
    const event = createEditEvent(action, state, state);
    expect(event.type).toBe('edit');
    expect(event.action).toBe(action);
    expect(event.affectedRange).toEqual([2, 6]);
    expect(typeof event.timestamp).toBe('number');
    expect(Object.isFrozen(event)).toBe(true);
  });
});
