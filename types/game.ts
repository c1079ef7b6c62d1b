// Game types for Space Invader

import type { ObjectPool } from '@/lib/objectPool';

export interface Vector2 {
  x: number;
  y: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export type Scene = 'MENU' | 'PLAYING' | 'PAUSED' | 'GAME_OVER';

export type SceneAction =
  | 'confirm'
  | 'back'
  | 'pause'
  | 'toggleSound'
  | 'dumpDiagnostics'
  | 'toggleGodMode'
  | 'skipWave';

export interface InputState {
  left: boolean;
  right: boolean;
  shoot: boolean;
}

export interface Bullet {
  _active: boolean;
  _poolIndex: number;
  rect: Rect;
  vy: number;
  damage: number;
  isPlayer: boolean;
}

export interface Particle {
  _active: boolean;
  _poolIndex: number;
  position: Vector2;
  velocity: Vector2;
  life: number;
  maxLife: number;
  size: number;
  color: string;
}

export interface Player {
  rect: Rect;
  speed: number;
  shootCooldown: number;
  shootTimer: number;
  lives: number;
  invulnerableTimer: number;
}

export type EnemyType = 'common' | 'tough' | 'shooter';

export interface Enemy {
  id: number;
  rect: Rect;
  type: EnemyType;
  health: number;
  points: number;
  color: string;
  hitFlash: number;
}

export interface EnemyGrid {
  enemies: Enemy[];
  direction: -1 | 1;
  speed: number;
  fireRate: number;
}

export interface Boss {
  rect: Rect;
  speed: number;
  alive: boolean;
}

export interface ShieldPiece {
  rect: Rect;
  health: number;
}

export interface Shields {
  pieces: ShieldPiece[];
}

export interface HighscoreTable {
  top: number[];
  lastUpdated: string;
}

export type AudioCue = 'shoot' | 'enemy_shoot' | 'explosion' | 'highscore';

export interface GameState {
  scene: Scene;
  player: Player;
  grid: EnemyGrid;
  boss: Boss | null;
  bossCountdown: number;
  shields: Shields;
  bullets: ObjectPool<Bullet>;
  particles: ObjectPool<Particle>;
  wave: number;
  score: number;
  comboMultiplier: number;
  lastKillTime: number;
  // Simulated seconds spent in PLAYING; drives the combo window
  elapsed: number;
  shakeTimer: number;
  shakeMagnitude: number;
  godMode: boolean;
  soundEnabled: boolean;
  highscores: HighscoreTable;
  madeHighscore: boolean;
}

export interface GameConfig {
  width: number;
  height: number;
  fps: number;
  hardMode: boolean;
  enableParticles: boolean;
  playerSpeed: number;
  playerSize: { width: number; height: number };
  playerCooldown: number;
  playerMaxBullets: number;
  playerLives: number;
  playerInvulnerability: number;
  playerMargin: number;
  enemyRows: number;
  enemyCols: number;
  enemyStartSpeed: number;
  enemyStepDown: number;
  enemyFireRate: number;
  enemyMaxBullets: number;
  enemyEdgeMargin: number;
  enemyBreachLine: number;
  waveSpeedMultiplier: number;
  waveFireMultiplier: number;
  bossCooldownMin: number;
  bossCooldownMax: number;
  bossSpeed: number;
  bossY: number;
  bossPoints: number;
  playerBulletSpeed: number;
  enemyBulletSpeed: number;
  shieldCount: number;
  shieldRows: number;
  shieldCols: number;
  shieldSegmentSize: number;
  shieldSegmentHealth: number;
  comboWindow: number;
  comboStep: number;
  highscoreSlots: number;
}

export const DEFAULT_CONFIG: GameConfig = {
  width: 800,
  height: 600,
  fps: 60,
  hardMode: false,
  enableParticles: true,
  playerSpeed: 300,
  playerSize: { width: 50, height: 30 },
  playerCooldown: 0.25,
  playerMaxBullets: 3,
  playerLives: 3,
  playerInvulnerability: 1.5,
  playerMargin: 10,
  enemyRows: 6,
  enemyCols: 8,
  enemyStartSpeed: 72,      // px/sec
  enemyStepDown: 20,
  enemyFireRate: 0.28,      // shots/sec baseline
  enemyMaxBullets: 6,
  enemyEdgeMargin: 20,
  enemyBreachLine: 550,
  waveSpeedMultiplier: 1.1,
  waveFireMultiplier: 1.05,
  bossCooldownMin: 20,
  bossCooldownMax: 30,
  bossSpeed: 200,
  bossY: 50,
  bossPoints: 100,
  playerBulletSpeed: -500,
  enemyBulletSpeed: 300,
  shieldCount: 4,
  shieldRows: 3,
  shieldCols: 6,
  shieldSegmentSize: 12,
  shieldSegmentHealth: 3,
  comboWindow: 1.0,
  comboStep: 0.1,
  highscoreSlots: 5,
};

export const HARD_MODE_CONFIG: GameConfig = {
  ...DEFAULT_CONFIG,
  hardMode: true,
  playerSpeed: DEFAULT_CONFIG.playerSpeed * 1.2,
  playerCooldown: Math.floor(250 * 0.8) / 1000,
  playerMaxBullets: DEFAULT_CONFIG.playerMaxBullets + 1,
  enemyStartSpeed: DEFAULT_CONFIG.enemyStartSpeed * 1.2,
  enemyFireRate: DEFAULT_CONFIG.enemyFireRate * 1.2,
  enemyMaxBullets: 7,
};

/**
 * Pick the config for this process from environment flags.
 * SPACE_INVADER_HARD_MODE=1 selects hard mode, SPACE_INVADER_PARTICLES=0 turns particles off.
 */
export function resolveGameConfig(env: Record<string, string | undefined>): GameConfig {
  const base = env.SPACE_INVADER_HARD_MODE === '1' ? HARD_MODE_CONFIG : DEFAULT_CONFIG;
  return {
    ...base,
    enableParticles: env.SPACE_INVADER_PARTICLES !== '0',
  };
}

export const ENEMY_CONFIGS: Record<EnemyType, {
  health: number;
  points: number;
  color: string;
}> = {
  common: {
    health: 1,
    points: 10,
    color: '#78c8ff',
  },
  tough: {
    health: 2,
    points: 20,
    color: '#ffa078',
  },
  shooter: {
    health: 1,
    points: 30,
    color: '#b4ffa0',
  },
};

export const ENEMY_SIZE = { width: 44, height: 28 };
export const BOSS_SIZE = { width: 60, height: 24 };
export const BULLET_SIZE = { width: 4, height: 12 };
