import { renderToStaticMarkup } from 'react-dom/server';
import type { RenderState } from '@/lib/engine/serialize';
import { COLORS } from '@/lib/colors';
import { Playfield } from './svg/Playfield';
import { HUD } from './svg/HUD';
import { MenuOverlay, PausedOverlay, GameOverOverlay } from './svg/Overlays';

interface GameViewProps {
  frame: RenderState;
}

/**
 * One frame as an SVG document in logical canvas units.
 * The playfield is drawn while playing or paused; overlays sit on top.
 */
export function GameView({ frame }: GameViewProps) {
  const showPlayfield = frame.scene === 'PLAYING' || frame.scene === 'PAUSED';

  return (
    <svg
      xmlns="http://www.w3.org/2000/svg"
      width={frame.width}
      height={frame.height}
      viewBox={`0 0 ${frame.width} ${frame.height}`}
    >
      <rect width={frame.width} height={frame.height} fill={COLORS.background} />
      {showPlayfield && (
        <>
          <Playfield frame={frame} />
          <HUD frame={frame} />
        </>
      )}
      {frame.scene === 'MENU' && <MenuOverlay frame={frame} />}
      {frame.scene === 'PAUSED' && <PausedOverlay frame={frame} />}
      {frame.scene === 'GAME_OVER' && <GameOverOverlay frame={frame} />}
    </svg>
  );
}

export function renderFrameToSvg(frame: RenderState): string {
  return renderToStaticMarkup(<GameView frame={frame} />);
}
