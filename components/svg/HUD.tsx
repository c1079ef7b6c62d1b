import type { RenderState } from '@/lib/engine/serialize';
import { COLORS } from '@/lib/colors';

const PAD = 8;

export function HUD({ frame }: { frame: RenderState }) {
  const { score, highscore, wave, lives, godMode, hardMode, width } = frame;

  return (
    <g className="hud" fontFamily="monospace" fontSize={18} fill={COLORS.ui}>
      <text x={PAD} y={PAD + 14}>{`Score: ${score}`}</text>
      <text x={PAD} y={PAD + 36}>{`High: ${highscore}`}</text>
      <text x={width / 2 - 40} y={PAD + 14}>{`Wave: ${wave}`}</text>
      {hardMode && (
        <text x={width / 2 - 40} y={PAD + 36} fill={COLORS.heart}>HARD MODE</text>
      )}

      {/* Lives as triangles, right to left */}
      {Array.from({ length: lives }, (_, i) => {
        const cx = width - 20 - i * 24;
        const cy = PAD + 12;
        return (
          <polygon
            key={i}
            className="life"
            points={`${cx},${cy - 6} ${cx - 8},${cy + 6} ${cx + 8},${cy + 6}`}
            fill={COLORS.heart}
          />
        );
      })}

      {godMode && (
        <text x={width - 120} y={PAD + 36} fill={COLORS.godMode}>GODMODE</text>
      )}
    </g>
  );
}
