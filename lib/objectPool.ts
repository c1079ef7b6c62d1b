import type { Bullet, Particle } from '@/types/game';

export class ObjectPool<T extends { _active: boolean; _poolIndex: number }> {
  items: T[];
  activeCount: number;
  private factory: () => T;
  private resetFn: (item: T) => void;

  constructor(capacity: number, factory: () => T, resetFn: (item: T) => void) {
    this.items = [];
    this.activeCount = 0;
    this.factory = factory;
    this.resetFn = resetFn;

    for (let i = 0; i < capacity; i++) {
      const item = factory();
      item._active = false;
      item._poolIndex = i;
      this.items.push(item);
    }
  }

  acquire(): T {
    if (this.activeCount >= this.items.length) {
      const growBy = Math.max(1, Math.floor(this.items.length * 0.5));
      for (let i = 0; i < growBy; i++) {
        const item = this.factory();
        item._active = false;
        item._poolIndex = this.items.length;
        this.items.push(item);
      }
    }

    const item = this.items[this.activeCount];
    this.resetFn(item);
    item._active = true;
    item._poolIndex = this.activeCount;
    this.activeCount++;
    return item;
  }

  release(item: T): void {
    if (!item._active) return;

    const index = item._poolIndex;
    const lastIndex = this.activeCount - 1;

    if (index !== lastIndex) {
      const lastItem = this.items[lastIndex];
      this.items[index] = lastItem;
      this.items[lastIndex] = item;
      lastItem._poolIndex = index;
      item._poolIndex = lastIndex;
    }

    item._active = false;
    this.activeCount--;
  }

  /** Iterate active items in reverse. Return false from cb to release the item. */
  forEach(cb: (item: T) => boolean | void): void {
    for (let i = this.activeCount - 1; i >= 0; i--) {
      const result = cb(this.items[i]);
      if (result === false) {
        this.release(this.items[i]);
      }
    }
  }

  /** Active items in pool order, as a fresh array. */
  active(): T[] {
    return this.items.slice(0, this.activeCount);
  }

  count(predicate: (item: T) => boolean): number {
    let n = 0;
    for (let i = 0; i < this.activeCount; i++) {
      if (predicate(this.items[i])) n++;
    }
    return n;
  }

  clear(): void {
    for (let i = 0; i < this.activeCount; i++) {
      this.items[i]._active = false;
    }
    this.activeCount = 0;
  }
}

export function createBulletPool(capacity = 32) {
  return new ObjectPool<Bullet>(
    capacity,
    () => ({
      _active: false,
      _poolIndex: 0,
      rect: { x: 0, y: 0, width: 0, height: 0 },
      vy: 0,
      damage: 0,
      isPlayer: false,
    }),
    (b) => {
      b.rect.x = 0;
      b.rect.y = 0;
      b.rect.width = 0;
      b.rect.height = 0;
      b.vy = 0;
      b.damage = 0;
      b.isPlayer = false;
    }
  );
}

export function createParticlePool(capacity = 256) {
  return new ObjectPool<Particle>(
    capacity,
    () => ({
      _active: false,
      _poolIndex: 0,
      position: { x: 0, y: 0 },
      velocity: { x: 0, y: 0 },
      life: 0,
      maxLife: 0,
      size: 0,
      color: '',
    }),
    (p) => {
      p.position.x = 0;
      p.position.y = 0;
      p.velocity.x = 0;
      p.velocity.y = 0;
      p.life = 0;
      p.maxLife = 0;
      p.size = 0;
      p.color = '';
    }
  );
}
