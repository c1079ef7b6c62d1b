import { type Boss, type GameConfig, BOSS_SIZE } from '@/types/game';
import { randomRange } from './context';

export function spawnBoss(config: GameConfig): Boss {
  return {
    rect: { x: -80, y: config.bossY, width: BOSS_SIZE.width, height: BOSS_SIZE.height },
    speed: config.bossSpeed,
    alive: true,
  };
}

/** Seconds until the next fly-by, uniform in [min, max). */
export function rollBossCountdown(config: GameConfig, random: () => number = Math.random): number {
  return randomRange(random, config.bossCooldownMin, config.bossCooldownMax);
}

/** Move right; the boss is gone once it clears the right edge by 40px. */
export function updateBoss(boss: Boss, deltaTime: number, config: GameConfig): Boss {
  const x = boss.rect.x + Math.trunc(boss.speed * deltaTime);
  return {
    ...boss,
    rect: { ...boss.rect, x },
    alive: boss.alive && x <= config.width + 40,
  };
}

/**
 * Advance the spawn countdown and the live boss for one frame.
 * The countdown only runs while no boss is on screen.
 */
export function stepBoss(
  boss: Boss | null,
  countdown: number,
  deltaTime: number,
  config: GameConfig,
  random: () => number = Math.random
): { boss: Boss | null; countdown: number } {
  let next = boss;
  let remaining = countdown;

  if (!next) {
    remaining -= deltaTime;
    if (remaining <= 0) {
      next = spawnBoss(config);
      remaining = rollBossCountdown(config, random);
    }
  }

  if (next) {
    next = updateBoss(next, deltaTime, config);
    if (!next.alive) next = null;
  }

  return { boss: next, countdown: remaining };
}
