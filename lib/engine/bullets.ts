import { type Bullet, BULLET_SIZE } from '@/types/game';
import type { ObjectPool } from '../objectPool';
import { rectBottom } from './geometry';

/** Acquire a bullet centred horizontally on x, its body starting 8px above y. */
export function spawnBullet(
  pool: ObjectPool<Bullet>,
  x: number,
  y: number,
  vy: number,
  isPlayer: boolean,
  damage = 1
): Bullet {
  const b = pool.acquire();
  b.rect.x = Math.trunc(x) - BULLET_SIZE.width / 2;
  b.rect.y = Math.trunc(y) - 8;
  b.rect.width = BULLET_SIZE.width;
  b.rect.height = BULLET_SIZE.height;
  b.vy = vy;
  b.damage = damage;
  b.isPlayer = isPlayer;
  return b;
}

export function updateBulletInPlace(bullet: Bullet, deltaTime: number): void {
  bullet.rect.y += Math.trunc(bullet.vy * deltaTime);
}

export function isBulletAlive(bullet: Bullet, height: number): boolean {
  return rectBottom(bullet.rect) >= 0 && bullet.rect.y <= height;
}

/** Move every bullet and release the ones that left the screen. */
export function advanceBullets(pool: ObjectPool<Bullet>, deltaTime: number, height: number): void {
  pool.forEach(bullet => {
    updateBulletInPlace(bullet, deltaTime);
    if (!isBulletAlive(bullet, height)) return false; // release
    return true; // keep
  });
}

export function countBullets(pool: ObjectPool<Bullet>, isPlayer: boolean): number {
  return pool.count(b => b.isPlayer === isPlayer);
}
