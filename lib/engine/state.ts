import { type GameState, type GameConfig, type HighscoreTable, DEFAULT_CONFIG } from '@/types/game';
import { createBulletPool, createParticlePool } from '../objectPool';
import { type EngineContext, emitCue } from './context';
import { createPlayer, resetPlayerPosition } from './player';
import { createEnemyGrid } from './enemies';
import { createShields } from './shields';
import { rollBossCountdown } from './boss';
import { formatTimestamp, insertScore } from '../highscores';

export function createInitialGameState(
  highscores: HighscoreTable,
  config: GameConfig = DEFAULT_CONFIG,
  random: () => number = Math.random
): GameState {
  return {
    scene: 'MENU',
    player: createPlayer(config),
    grid: createEnemyGrid(1, config, random),
    boss: null,
    bossCountdown: rollBossCountdown(config, random),
    shields: createShields(config),
    bullets: createBulletPool(),
    particles: createParticlePool(),
    wave: 1,
    score: 0,
    comboMultiplier: 0,
    lastKillTime: -Infinity,
    elapsed: 0,
    shakeTimer: 0,
    shakeMagnitude: 0,
    godMode: false,
    soundEnabled: true,
    highscores,
    madeHighscore: false,
  };
}

/** Fresh run: new ship, shields, grid and score. Session flags carry over. */
export function startNewGame(
  state: GameState,
  config: GameConfig = DEFAULT_CONFIG,
  random: () => number = Math.random
): GameState {
  state.bullets.clear();
  state.particles.clear();

  return {
    ...state,
    scene: 'PLAYING',
    player: createPlayer(config),
    grid: createEnemyGrid(1, config, random),
    boss: null,
    bossCountdown: rollBossCountdown(config, random),
    shields: createShields(config),
    wave: 1,
    score: 0,
    comboMultiplier: 0,
    lastKillTime: -Infinity,
    elapsed: 0,
    shakeTimer: 0,
    shakeMagnitude: 0,
    madeHighscore: false,
  };
}

/** Shields persist between waves. */
export function nextWave(
  state: GameState,
  config: GameConfig = DEFAULT_CONFIG,
  random: () => number = Math.random
): GameState {
  state.bullets.clear();
  const wave = state.wave + 1;
  return {
    ...state,
    wave,
    grid: createEnemyGrid(wave, config, random),
  };
}

/**
 * Penalty for an enemy breaching the line or ramming the ship: the whole wave
 * starts over at the same number and the ship returns to its start position.
 */
export function regenerateWave(
  state: GameState,
  config: GameConfig = DEFAULT_CONFIG,
  random: () => number = Math.random
): GameState {
  state.bullets.clear();
  return {
    ...state,
    grid: createEnemyGrid(Math.max(1, state.wave), config, random),
    player: resetPlayerPosition(state.player, config),
  };
}

export function gameOver(
  state: GameState,
  config: GameConfig,
  ctx: EngineContext
): GameState {
  const previous = state.highscores.top;
  const top = insertScore(previous, state.score, config.highscoreSlots);
  const madeHighscore = top.includes(state.score) && !previous.includes(state.score);

  ctx.persistHighscores(top);
  if (madeHighscore) {
    emitCue(ctx, state.soundEnabled, 'highscore');
  }

  return {
    ...state,
    scene: 'GAME_OVER',
    highscores: { top, lastUpdated: formatTimestamp(new Date()) },
    madeHighscore,
  };
}
