import type { GameConfig, GameState } from '@/types/game';

// Banker's rounding: exact halves go to the even neighbour
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (Math.abs(diff - 0.5) > 1e-9) return Math.round(value);
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Award points for a kill. Kills within the combo window grow the multiplier
 * by one step; a gap resets it to zero before the award is computed.
 */
export function addScore(
  state: GameState,
  basePoints: number,
  config: GameConfig
): { state: GameState; awarded: number } {
  const withinWindow = state.elapsed - state.lastKillTime <= config.comboWindow;
  const comboMultiplier = withinWindow ? state.comboMultiplier + config.comboStep : 0;
  const awarded = roundHalfEven(basePoints * (1 + comboMultiplier));

  return {
    state: {
      ...state,
      comboMultiplier,
      lastKillTime: state.elapsed,
      score: state.score + awarded,
    },
    awarded,
  };
}
