import type { Player, Bullet, GameConfig, InputState } from '@/types/game';
import type { ObjectPool } from '../objectPool';
import { clamp, rectCenterX } from './geometry';
import { spawnBullet } from './bullets';

export function createPlayer(config: GameConfig): Player {
  const { width, height } = config.playerSize;
  return {
    rect: {
      x: Math.floor(config.width / 2) - Math.floor(width / 2),
      y: config.height - 30 - height,
      width,
      height,
    },
    speed: config.playerSpeed,
    shootCooldown: config.playerCooldown,
    shootTimer: 0,
    lives: config.playerLives,
    invulnerableTimer: 0,
  };
}

export function resetPlayerPosition(player: Player, config: GameConfig): Player {
  const start = createPlayer(config);
  return {
    ...player,
    rect: { ...player.rect, x: start.rect.x, y: start.rect.y },
  };
}

export function updatePlayer(
  player: Player,
  deltaTime: number,
  input: InputState,
  config: GameConfig
): Player {
  let move = 0;
  if (input.left) move -= 1;
  if (input.right) move += 1;

  // Whole-pixel steps, truncated toward zero
  const step = Math.trunc(move * player.speed * deltaTime);
  const minX = config.playerMargin;
  const maxX = config.width - config.playerMargin - player.rect.width;
  const x = clamp(player.rect.x + step, minX, maxX);

  return {
    ...player,
    rect: { ...player.rect, x },
    shootTimer: Math.max(0, player.shootTimer - deltaTime),
    invulnerableTimer: Math.max(0, player.invulnerableTimer - deltaTime),
  };
}

export function canShoot(player: Player, activePlayerBullets: number, config: GameConfig): boolean {
  return player.shootTimer <= 0 && activePlayerBullets < config.playerMaxBullets;
}

/** Fire from the ship's nose. The bullet is acquired from the pool. */
export function shoot(
  player: Player,
  bullets: ObjectPool<Bullet>,
  config: GameConfig
): { player: Player; bullet: Bullet } {
  const bullet = spawnBullet(
    bullets,
    rectCenterX(player.rect),
    player.rect.y - 6,
    config.playerBulletSpeed,
    true
  );
  return {
    player: { ...player, shootTimer: player.shootCooldown },
    bullet,
  };
}

/**
 * Apply one hit. Returns damaged=false, and the player unchanged,
 * while invulnerable or in god-mode.
 */
export function hitPlayer(
  player: Player,
  godMode: boolean,
  config: GameConfig
): { player: Player; damaged: boolean } {
  if (player.invulnerableTimer > 0 || godMode) {
    return { player, damaged: false };
  }
  return {
    player: {
      ...player,
      lives: player.lives - 1,
      invulnerableTimer: config.playerInvulnerability,
    },
    damaged: true,
  };
}
