import { describe, it, expect, vi } from 'vitest';
import { DEFAULT_CONFIG } from '@/types/game';
import { spawnBullet, countBullets } from './bullets';
import { createEnemy } from './enemies';
import { applyAction } from './scene';
import { updateGameState } from './update';
import { createPlayingState, createTestContext } from './testHelpers';

const config = DEFAULT_CONFIG;
const idle = { left: false, right: false, shoot: false };

describe('updateGameState', () => {
  it('freezes every scene except PLAYING', () => {
    const ctx = createTestContext();
    const paused = { ...createPlayingState(), scene: 'PAUSED' as const };
    expect(updateGameState(paused, 0.1, { ...idle, right: true }, ctx, config)).toBe(paused);
    const menu = { ...createPlayingState(), scene: 'MENU' as const };
    expect(updateGameState(menu, 0.1, idle, ctx, config)).toBe(menu);
  });

  it('moves, fires and marches in one frame', () => {
    const playCue = vi.fn();
    const next = updateGameState(createPlayingState(), 0.1, { left: false, right: true, shoot: true }, createTestContext({ playCue }), config);

    expect(next.elapsed).toBeCloseTo(0.1);
    expect(next.player.rect.x).toBe(405);
    expect(next.player.shootTimer).toBe(0.25);
    expect(next.grid.enemies[0].rect.x).toBe(67);
    expect(next.bossCountdown).toBeCloseTo(29.8);
    expect(playCue).toHaveBeenCalledWith('shoot');

    const [bullet] = next.bullets.active();
    expect(bullet.rect).toEqual({ x: 428, y: 476, width: 4, height: 12 });
  });

  it('will not fire past the bullet cap', () => {
    const state = createPlayingState();
    for (let i = 0; i < 3; i++) spawnBullet(state.bullets, 700 + i * 10, 400, -500, true);
    const playCue = vi.fn();

    const next = updateGameState(state, 0.016, { ...idle, shoot: true }, createTestContext({ playCue }), config);

    expect(countBullets(next.bullets, true)).toBe(3);
    expect(playCue).not.toHaveBeenCalled();
  });

  it('starts the next wave harder once the grid is cleared', () => {
    const ctx = createTestContext();
    const state = applyAction(createPlayingState(), 'skipWave', ctx, config).state;
    const first = state.grid;

    const next = updateGameState(state, 0.016, idle, ctx, config);

    expect(next.wave).toBe(2);
    expect(next.grid.enemies).toHaveLength(48);
    expect(next.grid.speed / first.speed).toBeCloseTo(1.1);
    expect(next.grid.fireRate / first.fireRate).toBeCloseTo(1.05);
    expect(next.shields.pieces).toHaveLength(64);
  });

  it('moves to the next wave when the last enemy is shot down', () => {
    const base = createPlayingState();
    const first = base.grid;
    const state = { ...base, grid: { ...first, enemies: [createEnemy(300, 200, 'common')] } };
    spawnBullet(state.bullets, 320, 240, -500, true);

    const next = updateGameState(state, 0.016, idle, createTestContext(), config);

    expect(next.score).toBe(10);
    expect(next.wave).toBe(2);
    expect(next.grid.enemies).toHaveLength(48);
    expect(next.grid.speed / first.speed).toBeCloseTo(1.1);
    expect(next.grid.fireRate / first.fireRate).toBeCloseTo(1.05);
    expect(next.bullets.activeCount).toBe(0);
  });

  it('stops the frame at game over', () => {
    const base = createPlayingState();
    const state = { ...base, player: { ...base.player, lives: 1 } };
    spawnBullet(state.bullets, 400, 550, 300, false);
    const persistHighscores = vi.fn();

    const next = updateGameState(state, 0.01, idle, createTestContext({ persistHighscores }), config);

    expect(next.scene).toBe('GAME_OVER');
    expect(next.player.lives).toBe(0);
    expect(persistHighscores).toHaveBeenCalledWith([0]);
  });

  it('keeps a wave in play when a life is lost to a breach', () => {
    const state = createPlayingState();
    for (const enemy of state.grid.enemies) enemy.rect.y += 460;

    const next = updateGameState(state, 0.016, idle, createTestContext(), config);

    expect(next.scene).toBe('PLAYING');
    expect(next.wave).toBe(1);
    expect(next.player.lives).toBe(2);
    expect(next.grid.enemies[0].rect.y).toBe(70);
  });
});
