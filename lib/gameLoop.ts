import { performance } from 'node:perf_hooks';
import { FRAME_MS, type FrameClock, advanceFrameClock, createFrameClock } from './engine/timestep';

export interface GameLoopCallbacks {
  update: (deltaTime: number) => void;
  render: () => void;
}

export interface GameLoop {
  start(): void;
  stop(): void;
  readonly running: boolean;
  readonly frames: number;
}

/**
 * Timer-driven loop: one update and one render per tick at the target rate.
 * `now` is injectable for tests.
 */
export function createGameLoop(
  callbacks: GameLoopCallbacks,
  now: () => number = () => performance.now(),
): GameLoop {
  let timer: ReturnType<typeof setInterval> | null = null;
  let clock: FrameClock = createFrameClock(now());

  const tick = () => {
    const advanced = advanceFrameClock(clock, now());
    clock = advanced.clock;
    callbacks.update(advanced.deltaTime);
    callbacks.render();
  };

  return {
    start() {
      if (timer) return;
      clock = createFrameClock(now());
      timer = setInterval(tick, FRAME_MS);
    },
    stop() {
      if (!timer) return;
      clearInterval(timer);
      timer = null;
    },
    get running() {
      return timer !== null;
    },
    get frames() {
      return clock.frame;
    },
  };
}
