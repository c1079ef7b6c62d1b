import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, HARD_MODE_CONFIG } from '@/types/game';
import { createBulletPool } from '../objectPool';
import {
  aliveCount,
  columnShooters,
  createEnemy,
  createEnemyGrid,
  damageEnemy,
  gridBounds,
  pickEnemyType,
  removeEnemy,
  tryEnemyShot,
  updateEnemyGrid,
} from './enemies';

const config = DEFAULT_CONFIG;
const commonOnly = () => 0.99;

function sequence(...values: number[]): () => number {
  let i = 0;
  return () => values[i++ % values.length];
}

describe('pickEnemyType', () => {
  it('splits the roll into shooter, tough and common bands', () => {
    expect(pickEnemyType(0)).toBe('shooter');
    expect(pickEnemyType(0.049)).toBe('shooter');
    expect(pickEnemyType(0.05)).toBe('tough');
    expect(pickEnemyType(0.299)).toBe('tough');
    expect(pickEnemyType(0.3)).toBe('common');
  });
});

describe('createEnemyGrid', () => {
  it('lays out six rows of eight', () => {
    const grid = createEnemyGrid(1, config, commonOnly);
    expect(aliveCount(grid)).toBe(48);
    expect(grid.enemies[0].rect).toEqual({ x: 60, y: 70, width: 44, height: 28 });
    expect(grid.enemies[47].rect).toEqual({ x: 550, y: 320, width: 44, height: 28 });
    expect(gridBounds(grid)).toEqual({ x: 60, y: 70, width: 534, height: 278 });
    expect(grid.direction).toBe(1);
  });

  it('gives each type its stats', () => {
    const tough = createEnemyGrid(1, config, () => 0.1).enemies[0];
    expect([tough.type, tough.health, tough.points]).toEqual(['tough', 2, 20]);
    const shooter = createEnemyGrid(1, config, () => 0).enemies[0];
    expect([shooter.type, shooter.health, shooter.points]).toEqual(['shooter', 1, 30]);
  });

  it('scales speed and fire rate per wave', () => {
    const first = createEnemyGrid(1, config, commonOnly);
    const second = createEnemyGrid(2, config, commonOnly);
    const fourth = createEnemyGrid(4, config, commonOnly);
    expect(first.speed).toBe(72);
    expect(first.fireRate).toBe(0.28);
    expect(second.speed).toBeCloseTo(79.2);
    expect(second.fireRate).toBeCloseTo(0.294);
    expect(fourth.speed).toBeCloseTo(72 * 1.331);
  });

  it('is faster in hard mode', () => {
    const grid = createEnemyGrid(1, HARD_MODE_CONFIG, commonOnly);
    expect(grid.speed).toBeCloseTo(86.4);
    expect(grid.fireRate).toBeCloseTo(0.336);
  });
});

describe('updateEnemyGrid', () => {
  it('marches sideways at base speed while full', () => {
    const grid = createEnemyGrid(1, config, commonOnly);
    updateEnemyGrid(grid, 0.5, config);
    expect(grid.enemies[0].rect.x).toBe(96);
    expect(grid.enemies[0].rect.y).toBe(70);
    expect(grid.direction).toBe(1);
  });

  it('turns and steps down once at the edge', () => {
    const grid = createEnemyGrid(1, config, commonOnly);
    grid.enemies = [createEnemy(740, 100, 'common')];

    updateEnemyGrid(grid, 0.1, config);
    expect(grid.enemies[0].rect).toMatchObject({ x: 751, y: 120 });
    expect(grid.direction).toBe(-1);

    // Still past the margin, but already heading away from it
    updateEnemyGrid(grid, 0.1, config);
    expect(grid.enemies[0].rect).toMatchObject({ x: 740, y: 120 });
    expect(grid.direction).toBe(-1);
  });

  it('fades the hit flash', () => {
    const grid = createEnemyGrid(1, config, commonOnly);
    grid.enemies[3].hitFlash = 0.1;
    updateEnemyGrid(grid, 0.5, config);
    expect(grid.enemies[3].hitFlash).toBe(0);
  });
});

describe('enemy fire', () => {
  it('only lets the lowest enemy of each column shoot', () => {
    const grid = createEnemyGrid(1, config, commonOnly);
    const shooters = columnShooters(grid);
    expect(shooters).toHaveLength(8);
    expect(shooters.every(e => e.rect.y === 320)).toBe(true);

    removeEnemy(grid, shooters[0]);
    expect(columnShooters(grid)[0].rect).toMatchObject({ x: 60, y: 270 });
  });

  it('spawns a bullet under the chosen shooter', () => {
    const grid = createEnemyGrid(1, config, commonOnly);
    const pool = createBulletPool();
    const bullet = tryEnemyShot(grid, pool, 0, config, () => 0);
    expect(bullet).not.toBeNull();
    expect(bullet?.rect).toEqual({ x: 80, y: 346, width: 4, height: 12 });
    expect(bullet?.vy).toBe(300);
    expect(bullet?.isPlayer).toBe(false);
  });

  it('holds fire when the roll misses', () => {
    const grid = createEnemyGrid(1, config, commonOnly);
    expect(tryEnemyShot(grid, createBulletPool(), 0, config, sequence(0.5))).toBeNull();
  });

  it('holds fire at the bullet cap or with no enemies left', () => {
    const grid = createEnemyGrid(1, config, commonOnly);
    const pool = createBulletPool();
    expect(tryEnemyShot(grid, pool, 6, config, () => 0)).toBeNull();
    grid.enemies = [];
    expect(tryEnemyShot(grid, pool, 0, config, () => 0)).toBeNull();
    expect(pool.activeCount).toBe(0);
  });
});

describe('damageEnemy', () => {
  it('reports the killing blow and refuses to hit a dead enemy', () => {
    const enemy = createEnemy(0, 0, 'tough');
    expect(damageEnemy(enemy, 1)).toBe(false);
    expect(enemy.health).toBe(1);
    expect(enemy.hitFlash).toBe(0.1);
    expect(damageEnemy(enemy, 1)).toBe(true);
    expect(() => damageEnemy(enemy, 1)).toThrow('enemy already destroyed');
  });

  it('removes by identity', () => {
    const grid = createEnemyGrid(1, config, commonOnly);
    const target = grid.enemies[10];
    removeEnemy(grid, target);
    expect(aliveCount(grid)).toBe(47);
    expect(grid.enemies).not.toContain(target);
  });
});
