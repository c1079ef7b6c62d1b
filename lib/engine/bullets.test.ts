import { describe, it, expect } from 'vitest';
import { createBulletPool } from '../objectPool';
import { advanceBullets, countBullets, isBulletAlive, spawnBullet } from './bullets';

describe('bullets', () => {
  it('spawns centred on x and 8px above y', () => {
    const pool = createBulletPool();
    const b = spawnBullet(pool, 100.7, 50.9, 300, false);
    expect(b.rect).toEqual({ x: 98, y: 42, width: 4, height: 12 });
    expect(b.damage).toBe(1);
  });

  it('stays alive while any part is on screen', () => {
    const pool = createBulletPool();
    const b = spawnBullet(pool, 10, 0, -500, true);
    b.rect.y = -12;
    expect(isBulletAlive(b, 600)).toBe(true);
    b.rect.y = -13;
    expect(isBulletAlive(b, 600)).toBe(false);
    b.rect.y = 600;
    expect(isBulletAlive(b, 600)).toBe(true);
    b.rect.y = 601;
    expect(isBulletAlive(b, 600)).toBe(false);
  });

  it('moves bullets and drops the ones that leave the screen', () => {
    const pool = createBulletPool();
    const kept = spawnBullet(pool, 400, 534, -500, true);
    spawnBullet(pool, 100, 20, -500, true);
    spawnBullet(pool, 100, 598, 300, false);

    advanceBullets(pool, 0.5, 600);

    expect(pool.activeCount).toBe(1);
    expect(pool.active()[0]).toBe(kept);
    expect(kept.rect.y).toBe(276);
  });

  it('counts by owner', () => {
    const pool = createBulletPool();
    spawnBullet(pool, 0, 100, -500, true);
    spawnBullet(pool, 0, 100, 300, false);
    spawnBullet(pool, 0, 100, 300, false);
    expect(countBullets(pool, true)).toBe(1);
    expect(countBullets(pool, false)).toBe(2);
  });
});
