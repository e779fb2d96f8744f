import { describe, expect, it } from 'vitest';
import { AtomicFlag } from '../src/audio/atomicFlag.js';
import { CombinedStreak, MIN_STREAK } from '../src/orchestrator/streak.js';
import { CaptureWindow } from '../src/orchestrator/window.js';

describe('CombinedStreak', () => {
  it('adds one per channel for every fully matching window', () => {
    const streak = new CombinedStreak(2);

    expect(streak.target).toBe(MIN_STREAK * 2);
    expect(streak.record([true, true])).toBe(false);
    expect(streak.count).toBe(2);
    streak.record([true, true]);
    expect(streak.record([true, true])).toBe(true);
    expect(streak.count).toBe(6);
  });

  it('drops a long streak after a single miss', () => {
    const streak = new CombinedStreak(2);
    for (let index = 0; index < 10; index += 1) {
      streak.record([true, true]);
    }
    expect(streak.count).toBe(20);

    expect(streak.record([true, false])).toBe(false);
    expect(streak.count).toBe(0);
    expect(streak.reached).toBe(false);
  });

  it('treats a window missing channels as a miss', () => {
    const streak = new CombinedStreak(2);
    streak.record([true, true]);
    streak.record([true]);

    expect(streak.count).toBe(0);
  });
});

describe('CaptureWindow', () => {
  it('carries samples past a full window into the next one', () => {
    const window = new CaptureWindow(2, 4);

    expect(Array.from(window.append(Int32Array.from([1, 2, 3, 4, 5, 6])))).toHaveLength(0);
    expect(window.pendingFrames).toBe(3);

    const completed = Array.from(window.append(Int32Array.from([7, 8, 9, 10])), samples => Array.from(samples));
    expect(completed).toEqual([[1, 2, 3, 4, 5, 6, 7, 8]]);
    expect(window.pendingFrames).toBe(1);

    const next = Array.from(window.append(Int32Array.from([11, 12, 13, 14, 15, 16])), samples => Array.from(samples));
    expect(next).toEqual([[9, 10, 11, 12, 13, 14, 15, 16]]);
    expect(window.pendingFrames).toBe(0);
  });

  it('yields several windows from one large page', () => {
    const window = new CaptureWindow(1, 2);
    const completed = Array.from(window.append(Int32Array.from([1, 2, 3, 4, 5])), samples => Array.from(samples));

    expect(completed).toEqual([
      [1, 2],
      [3, 4]
    ]);
    expect(window.pendingFrames).toBe(1);
  });

  it('rejects pages that split a frame', () => {
    const window = new CaptureWindow(2, 4);

    expect(() => Array.from(window.append(Int32Array.from([1, 2, 3])))).toThrow(
      'Page of 3 sample(s) does not fit 2 channel(s)'
    );
  });
});

describe('AtomicFlag', () => {
  it('starts cleared unless asked otherwise', () => {
    expect(new AtomicFlag().isSet()).toBe(false);
    expect(new AtomicFlag(true).isSet()).toBe(true);
  });

  it('shares state with flags over the same buffer', () => {
    const flag = new AtomicFlag();
    const view = new AtomicFlag(false, flag.buffer);

    flag.set();
    expect(view.isSet()).toBe(true);
    view.clear();
    expect(flag.isSet()).toBe(false);
  });
});
