import { describe, it, expect } from 'vitest';
import { MAX_FRAME_MS, advanceFrameClock, createFrameClock } from './timestep';

describe('frame clock', () => {
  it('reports the real delta in seconds', () => {
    const { clock, deltaTime } = advanceFrameClock(createFrameClock(1000), 1016);
    expect(deltaTime).toBeCloseTo(0.016);
    expect(clock).toEqual({ lastTimestamp: 1016, frame: 1 });
  });

  it('caps a stall at five frames', () => {
    const { deltaTime } = advanceFrameClock(createFrameClock(1000), 4000);
    expect(deltaTime).toBeCloseTo(MAX_FRAME_MS / 1000);
    expect(deltaTime).toBeCloseTo(5 / 60);
  });

  it('never goes backwards', () => {
    expect(advanceFrameClock(createFrameClock(1000), 900).deltaTime).toBe(0);
  });
});
