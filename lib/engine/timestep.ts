// Frame clock for the variable-dt loop.
// The loop ticks at a fixed target rate; each tick measures the real time
// elapsed since the previous one and hands that to the simulation in seconds.

export const TARGET_FPS = 60;
export const FRAME_MS = 1000 / TARGET_FPS;
export const MAX_FRAME_MS = FRAME_MS * 5; // spiral-of-death cap

export interface FrameClock {
  lastTimestamp: number;
  frame: number;
}

export function createFrameClock(timestamp: number): FrameClock {
  return {
    lastTimestamp: timestamp,
    frame: 0,
  };
}

/**
 * Advance the clock to `timestamp` (ms). Returns the frame's delta in seconds,
 * capped so a stalled process does not teleport every entity.
 */
export function advanceFrameClock(
  clock: FrameClock,
  timestamp: number,
): { clock: FrameClock; deltaTime: number } {
  let elapsed = timestamp - clock.lastTimestamp;
  if (elapsed < 0) elapsed = 0;
  // Cap to prevent spiral of death
  if (elapsed > MAX_FRAME_MS) elapsed = MAX_FRAME_MS;

  return {
    clock: { lastTimestamp: timestamp, frame: clock.frame + 1 },
    deltaTime: elapsed / 1000,
  };
}
