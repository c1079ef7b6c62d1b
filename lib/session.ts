import { type GameConfig, type GameState, type InputState, type SceneAction, DEFAULT_CONFIG } from '@/types/game';
import { SoundManager, type AudioSink } from './audio';
import type { HighscoreStore } from './highscores';
import { type EngineContext, createEngineContext } from './engine/context';
import { createInitialGameState } from './engine/state';
import { updateGameState } from './engine/update';
import { applyAction } from './engine/scene';
import { type RenderState, serializeForRender } from './engine/serialize';

export interface SessionOptions {
  store: HighscoreStore;
  sink?: AudioSink | null;
  config?: GameConfig;
  random?: () => number;
}

/**
 * A running game: state plus the collaborators wired into the engine.
 * Highscores are read once here and written on every game over.
 */
export class GameSession {
  state: GameState;
  quitRequested = false;
  readonly config: GameConfig;
  readonly sound: SoundManager;
  private readonly ctx: EngineContext;

  private constructor(state: GameState, config: GameConfig, sound: SoundManager, ctx: EngineContext) {
    this.state = state;
    this.config = config;
    this.sound = sound;
    this.ctx = ctx;
  }

  static async create(options: SessionOptions): Promise<GameSession> {
    const config = options.config ?? DEFAULT_CONFIG;
    const random = options.random ?? Math.random;
    const sound = new SoundManager(options.sink ?? null);
    const store = options.store;

    const ctx = createEngineContext({
      random,
      playCue: cue => sound.play(cue),
      persistHighscores: top => {
        // save() logs and swallows its own failures
        void store.save(top);
      },
    });

    const highscores = await store.load();
    const state = createInitialGameState(highscores, config, random);
    return new GameSession(state, config, sound, ctx);
  }

  dispatch(action: SceneAction): void {
    const transition = applyAction(this.state, action, this.ctx, this.config);
    this.state = transition.state;
    if (transition.quit) this.quitRequested = true;
  }

  tick(deltaTime: number, input: InputState): void {
    this.state = updateGameState(this.state, deltaTime, input, this.ctx, this.config);
  }

  frame(): RenderState {
    // Shake draws from its own random stream
    return serializeForRender(this.state, this.config, Math.random);
  }
}
