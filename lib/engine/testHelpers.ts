import { DEFAULT_CONFIG, type GameConfig, type GameState, type HighscoreTable } from '@/types/game';
import { type EngineContext, createEngineContext } from './context';
import { createInitialGameState } from './state';

/** Never passes a fire or spawn roll, and every rolled enemy comes out common. */
export const quietRandom = () => 0.99;

export function createTestTable(top: number[] = []): HighscoreTable {
  return { top, lastUpdated: '2024-01-01T00:00:00Z' };
}

export function createPlayingState(top: number[] = [], config: GameConfig = DEFAULT_CONFIG): GameState {
  return { ...createInitialGameState(createTestTable(top), config, quietRandom), scene: 'PLAYING' };
}

export function createTestContext(overrides: Partial<EngineContext> = {}): EngineContext {
  return createEngineContext({ random: quietRandom, ...overrides });
}
