import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG } from '@/types/game';
import { addScore, roundHalfEven } from './scoring';
import { createPlayingState } from './testHelpers';

const config = DEFAULT_CONFIG;

describe('roundHalfEven', () => {
  it('sends exact halves to the even neighbour', () => {
    expect(roundHalfEven(12.5)).toBe(12);
    expect(roundHalfEven(13.5)).toBe(14);
    expect(roundHalfEven(0.5)).toBe(0);
  });

  it('rounds everything else to nearest', () => {
    expect(roundHalfEven(12.4)).toBe(12);
    expect(roundHalfEven(12.6)).toBe(13);
    expect(roundHalfEven(11)).toBe(11);
  });
});

describe('addScore', () => {
  it('builds a combo on quick kills and resets after a gap', () => {
    let state = { ...createPlayingState(), elapsed: 5 };

    let result = addScore(state, 10, config);
    expect(result.awarded).toBe(10);
    expect(result.state.comboMultiplier).toBe(0);
    expect(result.state.lastKillTime).toBe(5);

    state = { ...result.state, elapsed: 5.5 };
    result = addScore(state, 10, config);
    expect(result.awarded).toBe(11);
    expect(result.state.comboMultiplier).toBeCloseTo(0.1);

    // Exactly one window later still counts
    state = { ...result.state, elapsed: 6.5 };
    result = addScore(state, 10, config);
    expect(result.awarded).toBe(12);
    expect(result.state.score).toBe(33);

    state = { ...result.state, elapsed: 8 };
    result = addScore(state, 30, config);
    expect(result.awarded).toBe(30);
    expect(result.state.comboMultiplier).toBe(0);
    expect(result.state.score).toBe(63);
  });
});
