import type { GameState, InputState } from '@/types/game';
import { rectCenterX } from './engine/geometry';
import { columnShooters } from './engine/enemies';

const DEAD_ZONE = 4;

/**
 * Attract-mode pilot: chase the boss if one is up, otherwise the lowest
 * invader closest to the ship, and keep the trigger held.
 */
export function autopilotInput(state: GameState): InputState {
  const shipX = rectCenterX(state.player.rect);

  let targetX: number | null = null;
  if (state.boss) {
    targetX = rectCenterX(state.boss.rect);
  } else {
    let best = Infinity;
    for (const enemy of columnShooters(state.grid)) {
      const x = rectCenterX(enemy.rect);
      const distance = Math.abs(x - shipX);
      if (distance < best) {
        best = distance;
        targetX = x;
      }
    }
  }

  if (targetX === null) {
    return { left: false, right: false, shoot: false };
  }

  return {
    left: targetX < shipX - DEAD_ZONE,
    right: targetX > shipX + DEAD_ZONE,
    shoot: true,
  };
}
