import { type GameState, type GameConfig, type SceneAction, DEFAULT_CONFIG } from '@/types/game';
import type { EngineContext } from './context';
import { aliveCount, gridBounds } from './enemies';
import { startNewGame } from './state';

export interface SceneTransition {
  state: GameState;
  quit: boolean;
}

/** One-line wave report for the F1 debug key. */
export function describeWave(state: GameState): string {
  const b = gridBounds(state.grid);
  return (
    `Wave ${state.wave} | Enemies ${aliveCount(state.grid)} | ` +
    `Speed ${state.grid.speed.toFixed(1)} | Fire ${state.grid.fireRate.toFixed(2)} | ` +
    `Bounds ${b.x},${b.y},${b.width},${b.height}`
  );
}

function applyDebugAction(state: GameState, action: SceneAction): GameState {
  switch (action) {
    case 'dumpDiagnostics':
      console.log(describeWave(state));
      return state;
    case 'toggleGodMode': {
      const godMode = !state.godMode;
      console.log(`GODMODE: ${godMode}`);
      return { ...state, godMode };
    }
    case 'skipWave':
      if (state.scene !== 'PLAYING') return state;
      // The next frame sees an empty grid and advances the wave
      return { ...state, grid: { ...state.grid, enemies: [] } };
    default:
      return state;
  }
}

/**
 * Scene state machine.
 *
 * MENU      confirm -> PLAYING (new game), back -> quit, toggleSound
 * PLAYING   back | pause -> PAUSED
 * PAUSED    confirm | pause -> PLAYING, back -> quit
 * GAME_OVER confirm | back -> MENU
 */
export function applyAction(
  state: GameState,
  action: SceneAction,
  ctx: EngineContext,
  config: GameConfig = DEFAULT_CONFIG
): SceneTransition {
  const stay = (next: GameState): SceneTransition => ({ state: next, quit: false });

  switch (action) {
    case 'dumpDiagnostics':
    case 'toggleGodMode':
    case 'skipWave':
      return stay(applyDebugAction(state, action));
    default:
      break;
  }

  switch (state.scene) {
    case 'MENU':
      if (action === 'confirm') return stay(startNewGame(state, config, ctx.random));
      if (action === 'back') return { state, quit: true };
      if (action === 'toggleSound') return stay({ ...state, soundEnabled: !state.soundEnabled });
      return stay(state);

    case 'PLAYING':
      if (action === 'back' || action === 'pause') return stay({ ...state, scene: 'PAUSED' });
      return stay(state);

    case 'PAUSED':
      if (action === 'confirm' || action === 'pause') return stay({ ...state, scene: 'PLAYING' });
      if (action === 'back') return { state, quit: true };
      return stay(state);

    case 'GAME_OVER':
      if (action === 'confirm' || action === 'back') return stay({ ...state, scene: 'MENU' });
      return stay(state);
  }
}
