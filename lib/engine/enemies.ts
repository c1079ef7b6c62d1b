import { type Bullet, type Enemy, type EnemyGrid, type EnemyType, type GameConfig, type Rect, ENEMY_CONFIGS, ENEMY_SIZE } from '@/types/game';
import type { ObjectPool } from '../objectPool';
import { generateId } from './context';
import { boundsOf, rectBottom, rectCenterX, rectRight } from './geometry';
import { spawnBullet } from './bullets';

const GRID_START_X = 60;
const GRID_START_Y = 70;
const GRID_SPACING_X = 70;
const GRID_SPACING_Y = 50;

// Cumulative thresholds on a uniform [0, 1) draw
const SHOOTER_CHANCE = 0.05;
const TOUGH_CHANCE = 0.30;

export function pickEnemyType(roll: number): EnemyType {
  if (roll < SHOOTER_CHANCE) return 'shooter';
  if (roll < TOUGH_CHANCE) return 'tough';
  return 'common';
}

export function createEnemy(x: number, y: number, type: EnemyType): Enemy {
  const stats = ENEMY_CONFIGS[type];
  return {
    id: generateId(),
    rect: { x, y, width: ENEMY_SIZE.width, height: ENEMY_SIZE.height },
    type,
    health: stats.health,
    points: stats.points,
    color: stats.color,
    hitFlash: 0,
  };
}

/**
 * Lay out a fresh formation for the given wave.
 * Speed and fire rate compound per wave: base * multiplier^(wave - 1).
 */
export function createEnemyGrid(
  wave: number,
  config: GameConfig,
  random: () => number = Math.random
): EnemyGrid {
  const enemies: Enemy[] = [];
  for (let row = 0; row < config.enemyRows; row++) {
    for (let col = 0; col < config.enemyCols; col++) {
      const type = pickEnemyType(random());
      enemies.push(createEnemy(
        GRID_START_X + col * GRID_SPACING_X,
        GRID_START_Y + row * GRID_SPACING_Y,
        type
      ));
    }
  }

  return {
    enemies,
    direction: 1,
    speed: config.enemyStartSpeed * Math.pow(config.waveSpeedMultiplier, wave - 1),
    fireRate: config.enemyFireRate * Math.pow(config.waveFireMultiplier, wave - 1),
  };
}

export function aliveCount(grid: EnemyGrid): number {
  return grid.enemies.length;
}

export function gridBounds(grid: EnemyGrid): Rect {
  return boundsOf(grid.enemies.map(e => e.rect));
}

/**
 * March the formation. Enemies speed up as the grid thins out; touching a side
 * margin flips direction and steps the whole grid down once.
 */
export function updateEnemyGrid(grid: EnemyGrid, deltaTime: number, config: GameConfig): void {
  const capacity = config.enemyRows * config.enemyCols;
  const accel = 1 + 0.6 * (1 - aliveCount(grid) / capacity);
  const dx = Math.trunc(grid.direction * grid.speed * accel * deltaTime);

  for (const e of grid.enemies) {
    e.rect.x += dx;
    if (e.hitFlash > 0) {
      e.hitFlash = Math.max(0, e.hitFlash - deltaTime);
    }
  }

  const b = gridBounds(grid);
  const margin = config.enemyEdgeMargin;
  const hitEdge =
    (b.x <= margin && grid.direction < 0) ||
    (rectRight(b) >= config.width - margin && grid.direction > 0);

  if (hitEdge) {
    grid.direction = grid.direction > 0 ? -1 : 1;
    for (const e of grid.enemies) {
      e.rect.y += config.enemyStepDown;
    }
  }
}

/** Bottom-most enemy of every column bucket; these are the only ones allowed to fire. */
export function columnShooters(grid: EnemyGrid): Enemy[] {
  const cols = new Map<number, Enemy>();
  for (const e of grid.enemies) {
    const col = Math.floor(rectCenterX(e.rect) / GRID_SPACING_X);
    const current = cols.get(col);
    if (!current || rectBottom(e.rect) > rectBottom(current.rect)) {
      cols.set(col, e);
    }
  }
  return Array.from(cols.values());
}

/**
 * One shot attempt per frame. The chance is fireRate / fps, so it assumes
 * the loop runs at the configured tick rate.
 */
export function tryEnemyShot(
  grid: EnemyGrid,
  bullets: ObjectPool<Bullet>,
  activeEnemyBullets: number,
  config: GameConfig,
  random: () => number = Math.random
): Bullet | null {
  if (activeEnemyBullets >= config.enemyMaxBullets || aliveCount(grid) === 0) return null;

  const shooters = columnShooters(grid);
  if (shooters.length === 0) return null;

  if (random() < grid.fireRate / config.fps) {
    const shooter = shooters[Math.floor(random() * shooters.length)];
    return spawnBullet(
      bullets,
      rectCenterX(shooter.rect),
      rectBottom(shooter.rect) + 6,
      config.enemyBulletSpeed,
      false
    );
  }
  return null;
}

/** Returns true when the hit destroys the enemy. */
export function damageEnemy(enemy: Enemy, damage: number): boolean {
  if (enemy.health <= 0) {
    throw new Error('enemy already destroyed');
  }
  enemy.health -= damage;
  enemy.hitFlash = 0.1;
  return enemy.health <= 0;
}

export function removeEnemy(grid: EnemyGrid, enemy: Enemy): void {
  grid.enemies = grid.enemies.filter(e => e.id !== enemy.id);
}
