import type { ReactNode } from 'react';
import type { RenderState } from '@/lib/engine/serialize';
import { COLORS, toRgba } from '@/lib/colors';

export const TITLE = 'Space Invader';

const CONTROLS = [
  'Controls:',
  'Left/Right or A/D - Move',
  'Space - Shoot',
  'P or Esc - Pause',
  'Esc in Menu - Quit',
  'S - Toggle Sound (menu)',
];

interface OverlayProps {
  frame: RenderState;
}

function Centered({ y, size, color, children }: { y: number; size: number; color: string; children: ReactNode }) {
  return (
    <text x="50%" y={y} textAnchor="middle" fontSize={size} fill={color}>
      {children}
    </text>
  );
}

export function MenuOverlay({ frame }: OverlayProps) {
  return (
    <g className="menu" fontFamily="monospace">
      <Centered y={150} size={48} color={COLORS.ui}>{TITLE}</Centered>
      <Centered y={232} size={20} color={COLORS.highlight}>Press Enter to Start</Centered>

      <Centered y={258} size={18} color={COLORS.ui}>Top-5 Highscores:</Centered>
      {frame.highscores.map((score, i) => (
        <text key={i} className="highscore" x={frame.width / 2 - 60} y={280 + i * 22} fontSize={18} fill={COLORS.ui}>
          {`${i + 1}. ${score}`}
        </text>
      ))}

      {CONTROLS.map((line, i) => (
        <text key={line} x={frame.width / 2 - 180} y={410 + i * 22} fontSize={16} fill={COLORS.dim}>
          {line}
        </text>
      ))}
      <text x={frame.width / 2 - 180} y={410 + CONTROLS.length * 22} fontSize={16} fill={COLORS.dim}>
        {`Sound: ${frame.soundEnabled ? 'on' : 'off'}`}
      </text>
    </g>
  );
}

export function PausedOverlay({ frame }: OverlayProps) {
  const mid = frame.height / 2;
  return (
    <g className="paused" fontFamily="monospace">
      <rect width={frame.width} height={frame.height} fill={toRgba('#000000', 0.47)} />
      <Centered y={mid - 10} size={48} color={COLORS.ui}>Paused</Centered>
      <Centered y={mid + 26} size={20} color={COLORS.highlight}>Press P or Enter to continue</Centered>
    </g>
  );
}

export function GameOverOverlay({ frame }: OverlayProps) {
  const mid = frame.height / 2;
  return (
    <g className="game-over" fontFamily="monospace">
      <rect width={frame.width} height={frame.height} fill={toRgba('#000000', 0.55)} />
      <Centered y={mid - 70} size={48} color={COLORS.ui}>Game Over</Centered>
      <Centered y={mid - 36} size={20} color={COLORS.ui}>{`Your score: ${frame.score}`}</Centered>
      {frame.madeHighscore && (
        <Centered y={mid - 6} size={20} color={COLORS.highlight}>New Highscore!</Centered>
      )}
      <Centered y={mid + 34} size={18} color={COLORS.dim}>Press Enter for Menu</Centered>
    </g>
  );
}
