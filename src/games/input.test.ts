import { describe, it, expect } from 'vitest';
import { InputTracker, inputFrame, isHeld, wasPressed } from './input';

describe('InputTracker', () => {
  it('reports presses once and clears them', () => {
    const tracker = new InputTracker(80);
    tracker.keyDown('A', 0);
    tracker.keyDown('ArrowUp', 5);
    const frame = tracker.frame(0.016, 10);
    expect(frame.pressed).toEqual(['a', 'ArrowUp']);
    expect(frame.dt).toBe(0.016);
    expect(tracker.frame(0.016, 20).pressed).toEqual([]);
  });

  it('keeps a key held until the hold time runs out', () => {
    const tracker = new InputTracker(80);
    tracker.keyDown('w', 0);
    expect(tracker.frame(0.016, 79).held.has('w')).toBe(true);
    expect(tracker.frame(0.016, 80).held.has('w')).toBe(false);
  });

  it('extends the hold on repeat', () => {
    const tracker = new InputTracker(80);
    tracker.keyDown('w', 0);
    tracker.keyDown('w', 60);
    expect(tracker.frame(0.016, 120).held.has('w')).toBe(true);
  });

  it('drops held keys on release', () => {
    const tracker = new InputTracker(80);
    tracker.keyDown('w', 0);
    tracker.releaseAll();
    expect(tracker.frame(0.016, 10).held.size).toBe(0);
  });

  it('collects clicks per frame', () => {
    const tracker = new InputTracker();
    tracker.click({ x: 3, y: 4, button: 'right' });
    expect(tracker.frame(0, 0).clicks).toEqual([{ x: 3, y: 4, button: 'right' }]);
    expect(tracker.frame(0, 0).clicks).toEqual([]);
  });
});

describe('input helpers', () => {
  it('matches single characters without case', () => {
    const frame = inputFrame(['S'], { held: new Set(['d']) });
    expect(wasPressed(frame, 's')).toBe(true);
    expect(isHeld(frame, 'D')).toBe(true);
    expect(isHeld(frame, 'a', 'ArrowLeft')).toBe(false);
  });
});
