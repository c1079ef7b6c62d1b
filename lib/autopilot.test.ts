import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG } from '@/types/game';
import { autopilotInput } from './autopilot';
import { spawnBoss } from './engine/boss';
import { createPlayingState } from './engine/testHelpers';

describe('autopilotInput', () => {
  it('steers toward the nearest column shooter', () => {
    expect(autopilotInput(createPlayingState())).toEqual({ left: false, right: true, shoot: true });
  });

  it('holds still once lined up', () => {
    const base = createPlayingState();
    const state = { ...base, player: { ...base.player, rect: { ...base.player.rect, x: 409 } } };
    expect(autopilotInput(state)).toEqual({ left: false, right: false, shoot: true });
  });

  it('chases the boss first', () => {
    const state = { ...createPlayingState(), boss: { ...spawnBoss(DEFAULT_CONFIG), rect: { x: 100, y: 50, width: 60, height: 24 } } };
    expect(autopilotInput(state)).toEqual({ left: true, right: false, shoot: true });
  });

  it('idles with nothing to shoot at', () => {
    const base = createPlayingState();
    const state = { ...base, grid: { ...base.grid, enemies: [] } };
    expect(autopilotInput(state)).toEqual({ left: false, right: false, shoot: false });
  });
});
