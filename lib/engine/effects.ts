import type { GameConfig, GameState, Particle, Vector2 } from '@/types/game';
import type { ObjectPool } from '../objectPool';
import { randomInt, randomRange } from './context';

const SHAKE_DURATION = 0.28;
const SHAKE_DECAY = 60; // magnitude lost per second
const PARTICLE_GRAVITY = 180;

export function createExplosion(
  particles: ObjectPool<Particle>,
  position: Vector2,
  color: string,
  random: () => number = Math.random
): void {
  const count = randomInt(random, 6, 12);
  for (let i = 0; i < count; i++) {
    const angle = randomRange(random, 0, Math.PI * 2);
    const speed = randomRange(random, 80, 220);
    const life = randomRange(random, 0.08, 0.22);

    const p = particles.acquire();
    p.position.x = position.x;
    p.position.y = position.y;
    p.velocity.x = Math.cos(angle) * speed;
    p.velocity.y = Math.sin(angle) * speed;
    p.life = life;
    p.maxLife = life;
    p.size = randomInt(random, 1, 3);
    p.color = color;
  }
}

/** Hit sparks, skipped entirely when particles are off. */
export function spawnHitEffect(
  state: GameState,
  position: Vector2,
  color: string,
  config: GameConfig,
  random: () => number = Math.random
): void {
  if (!config.enableParticles) return;
  createExplosion(state.particles, position, color, random);
}

// Update particles in-place and release dead ones
export function updateParticles(particles: ObjectPool<Particle>, deltaTime: number): void {
  particles.forEach(p => {
    p.life -= deltaTime;
    p.position.x += p.velocity.x * deltaTime;
    p.position.y += p.velocity.y * deltaTime;
    p.velocity.y += PARTICLE_GRAVITY * deltaTime;
    if (p.life <= 0) return false; // release
    return true; // keep
  });
}

export function triggerShake(state: GameState, amount: number): GameState {
  return {
    ...state,
    shakeTimer: SHAKE_DURATION,
    shakeMagnitude: Math.max(state.shakeMagnitude, amount),
  };
}

export function decayShake(state: GameState, deltaTime: number): GameState {
  if (state.shakeTimer <= 0) return state;
  return {
    ...state,
    shakeTimer: Math.max(0, state.shakeTimer - deltaTime),
    shakeMagnitude: Math.max(0, state.shakeMagnitude - SHAKE_DECAY * deltaTime),
  };
}

/** Render-only camera offset; whole pixels in [-magnitude, magnitude]. */
export function shakeOffset(state: GameState, random: () => number = Math.random): Vector2 {
  if (state.shakeTimer <= 0) return { x: 0, y: 0 };
  const m = Math.trunc(state.shakeMagnitude);
  return {
    x: randomInt(random, -m, m),
    y: randomInt(random, -m, m),
  };
}
