import type { GameConfig, GameState } from '@/types/game';
import { COLORS } from '../colors';
import { type EngineContext, emitCue } from './context';
import { rectBottom, rectCenterX, rectCenterY, rectsIntersect } from './geometry';
import { collideShieldBullet } from './shields';
import { damageEnemy, removeEnemy } from './enemies';
import { hitPlayer } from './player';
import { addScore } from './scoring';
import { spawnHitEffect, triggerShake } from './effects';
import { gameOver, regenerateWave } from './state';

const BULLET_HIT_SHAKE = 10;
const BREACH_SHAKE = 12;

/**
 * Player bullets against shields, the boss, then the grid.
 * The first thing a bullet touches consumes it.
 */
export function checkPlayerBulletCollisions(
  state: GameState,
  config: GameConfig,
  ctx: EngineContext
): GameState {
  let s = state;

  s.bullets.forEach(bullet => {
    if (!bullet.isPlayer) return true; // keep

    if (collideShieldBullet(s.shields, bullet)) return false;

    const boss = s.boss;
    if (boss && rectsIntersect(bullet.rect, boss.rect)) {
      s = addScore(s, config.bossPoints, config).state;
      spawnHitEffect(s, { x: rectCenterX(boss.rect), y: rectCenterY(boss.rect) }, COLORS.boss, config, ctx.random);
      s = { ...s, boss: null };
      emitCue(ctx, s.soundEnabled, 'explosion');
      return false;
    }

    const enemy = s.grid.enemies.find(e => rectsIntersect(e.rect, bullet.rect));
    if (enemy) {
      const dead = damageEnemy(enemy, bullet.damage);
      spawnHitEffect(s, { x: rectCenterX(bullet.rect), y: rectCenterY(bullet.rect) }, enemy.color, config, ctx.random);
      if (dead) {
        removeEnemy(s.grid, enemy);
        s = addScore(s, enemy.points, config).state;
        emitCue(ctx, s.soundEnabled, 'explosion');
      }
      return false;
    }

    return true; // keep
  });

  return s;
}

/** Enemy bullets against shields, then the ship. */
export function checkEnemyBulletCollisions(
  state: GameState,
  config: GameConfig
): GameState {
  let s = state;

  s.bullets.forEach(bullet => {
    if (bullet.isPlayer) return true; // keep

    if (collideShieldBullet(s.shields, bullet)) return false;

    if (rectsIntersect(bullet.rect, s.player.rect)) {
      const hit = hitPlayer(s.player, s.godMode, config);
      s = { ...s, player: hit.player };
      if (hit.damaged) s = triggerShake(s, BULLET_HIT_SHAKE);
      return false;
    }

    return true; // keep
  });

  return s;
}

/**
 * An enemy touching the ship or crossing the breach line costs a life and
 * restarts the whole wave.
 */
export function checkEnemyBreach(
  state: GameState,
  config: GameConfig,
  ctx: EngineContext
): GameState {
  const player = state.player;
  const breach = state.grid.enemies.some(
    e => rectsIntersect(e.rect, player.rect) || rectBottom(e.rect) >= config.enemyBreachLine
  );
  if (!breach) return state;

  const hit = hitPlayer(player, state.godMode, config);
  let s: GameState = { ...state, player: hit.player };
  if (hit.damaged) s = triggerShake(s, BREACH_SHAKE);
  return regenerateWave(s, config, ctx.random);
}

export function isOutOfLives(state: GameState): boolean {
  return state.player.lives <= 0 && !state.godMode;
}

/** Runs once per frame, after every entity has moved. */
export function resolveCollisions(
  state: GameState,
  config: GameConfig,
  ctx: EngineContext
): GameState {
  let s = checkPlayerBulletCollisions(state, config, ctx);
  s = checkEnemyBulletCollisions(s, config);
  s = checkEnemyBreach(s, config, ctx);

  if (s.scene === 'PLAYING' && isOutOfLives(s)) {
    s = gameOver(s, config, ctx);
  }
  return s;
}
