import { type GameState, type GameConfig, type InputState, DEFAULT_CONFIG } from '@/types/game';
import { type EngineContext, emitCue } from './context';
import { updatePlayer, canShoot, shoot } from './player';
import { advanceBullets, countBullets } from './bullets';
import { updateEnemyGrid, tryEnemyShot, aliveCount } from './enemies';
import { stepBoss } from './boss';
import { resolveCollisions } from './collision';
import { decayShake, updateParticles } from './effects';
import { nextWave } from './state';

/**
 * Advance one frame of play. Scenes other than PLAYING are returned untouched,
 * so nothing moves while paused or on a menu.
 */
export function updateGameState(
  state: GameState,
  deltaTime: number,
  input: InputState,
  ctx: EngineContext,
  config: GameConfig = DEFAULT_CONFIG
): GameState {
  if (state.scene !== 'PLAYING') {
    return state;
  }

  let s: GameState = { ...state, elapsed: state.elapsed + deltaTime };

  // 1) Input -> player
  s.player = updatePlayer(s.player, deltaTime, input, config);
  if (input.shoot && canShoot(s.player, countBullets(s.bullets, true), config)) {
    s.player = shoot(s.player, s.bullets, config).player;
    emitCue(ctx, s.soundEnabled, 'shoot');
  }

  // 2) Formation march and return fire
  updateEnemyGrid(s.grid, deltaTime, config);
  const enemyShot = tryEnemyShot(s.grid, s.bullets, countBullets(s.bullets, false), config, ctx.random);
  if (enemyShot) {
    emitCue(ctx, s.soundEnabled, 'enemy_shoot');
  }

  // 3) Boss fly-by
  const { boss, countdown } = stepBoss(s.boss, s.bossCountdown, deltaTime, config, ctx.random);
  s.boss = boss;
  s.bossCountdown = countdown;

  // 4) Bullets
  advanceBullets(s.bullets, deltaTime, config.height);

  // 5) Collisions
  s = resolveCollisions(s, config, ctx);
  if (s.scene !== 'PLAYING') {
    return s;
  }

  // 6) Effects
  s = decayShake(s, deltaTime);
  if (config.enableParticles) {
    updateParticles(s.particles, deltaTime);
  }

  // 7) End-of-wave check
  if (aliveCount(s.grid) === 0) {
    s = nextWave(s, config, ctx.random);
  }

  return s;
}
