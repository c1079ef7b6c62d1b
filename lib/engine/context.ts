import type { AudioCue } from '@/types/game';

/**
 * Collaborators the engine reaches outside the simulation.
 * All of them are fire-and-forget from the frame's point of view.
 */
export interface EngineContext {
  random: () => number;
  playCue: (cue: AudioCue) => void;
  persistHighscores: (top: number[]) => void;
}

export function createEngineContext(overrides: Partial<EngineContext> = {}): EngineContext {
  return {
    random: Math.random,
    playCue: () => {},
    persistHighscores: () => {},
    ...overrides,
  };
}

export function emitCue(ctx: EngineContext, soundEnabled: boolean, cue: AudioCue): void {
  if (soundEnabled) ctx.playCue(cue);
}

let nextId = 0;
export const generateId = () => nextId++;

/** Uniform float in [min, max). */
export function randomRange(random: () => number, min: number, max: number): number {
  return min + random() * (max - min);
}

/** Uniform integer in [min, max], both ends included. */
export function randomInt(random: () => number, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}
