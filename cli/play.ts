import { writeFile } from 'node:fs/promises';
import { parseArgs } from 'node:util';
import { resolveGameConfig } from '@/types/game';
import { GameSession } from '@/lib/session';
import { createFileHighscoreStore, defaultHighscorePath } from '@/lib/highscores';
import { autopilotInput } from '@/lib/autopilot';
import { createGameLoop } from '@/lib/gameLoop';
import { FRAME_MS } from '@/lib/engine/timestep';
import { describeWave } from '@/lib/engine/scene';
import { renderFrameToSvg } from '@/components/GameView';

// Attract mode: the autopilot plays one run headless, then the highscore
// table is saved and, optionally, the last frame is written as SVG.

const { values } = parseArgs({
  options: {
    seconds: { type: 'string', default: '60' },
    svg: { type: 'string' },
    hard: { type: 'boolean', default: false },
    fast: { type: 'boolean', default: false },
  },
});

async function main(): Promise<void> {
  const seconds = Number(values.seconds);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new Error(`--seconds must be a positive number, got "${values.seconds}"`);
  }

  const config = resolveGameConfig({
    ...process.env,
    ...(values.hard ? { SPACE_INVADER_HARD_MODE: '1' } : {}),
  });
  const path = defaultHighscorePath(process.env);
  const session = await GameSession.create({ store: createFileHighscoreStore(path, config.highscoreSlots), config });

  console.log(`Highscores: ${session.state.highscores.top.join(', ') || '(none)'}`);
  session.dispatch('confirm');

  let lastWave = session.state.wave;
  const step = (deltaTime: number) => {
    session.tick(deltaTime, autopilotInput(session.state));
    if (session.state.wave !== lastWave) {
      lastWave = session.state.wave;
      console.log(describeWave(session.state));
    }
  };

  const maxFrames = Math.ceil(seconds * config.fps);
  if (values.fast) {
    for (let i = 0; i < maxFrames && session.state.scene === 'PLAYING'; i++) {
      step(1 / config.fps);
    }
  } else {
    await new Promise<void>(resolve => {
      const loop = createGameLoop({
        update: step,
        render: () => {
          if (session.state.scene !== 'PLAYING' || loop.frames >= maxFrames) {
            loop.stop();
            resolve();
          }
        },
      });
      loop.start();
      console.log(`Running for up to ${seconds}s at ${Math.round(1000 / FRAME_MS)} fps...`);
    });
  }

  const { score, wave, scene, madeHighscore } = session.state;
  console.log(`${scene === 'GAME_OVER' ? 'Game over' : 'Time up'}: score ${score}, wave ${wave}`);
  if (madeHighscore) console.log('New highscore!');

  if (values.svg) {
    await writeFile(values.svg, renderFrameToSvg(session.frame()), 'utf-8');
    console.log(`Wrote ${values.svg}`);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal:', error);
  process.exitCode = 1;
});
