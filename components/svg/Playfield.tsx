import type { RenderRect, RenderState } from '@/lib/engine/serialize';
import { COLORS } from '@/lib/colors';

function Block({ rect, rx }: { rect: RenderRect; rx?: number }) {
  return <rect x={rect.x} y={rect.y} width={rect.width} height={rect.height} fill={rect.color} rx={rx} />;
}

function Ship({ player }: { player: RenderState['player'] }) {
  const { x, y, width, height } = player;
  const cx = x + Math.floor(width / 2);
  // Body inset 5px each side, 4px top and bottom
  const nose = `${cx},${y - 8} ${x + 8},${y + 8} ${x + width - 8},${y + 8}`;
  return (
    <g className="player">
      <rect x={x + 5} y={y + 4} width={width - 10} height={height - 8} fill={player.color} />
      <polygon points={nose} fill={player.color} />
      {player.blink && (
        <rect x={x - 2} y={y - 2} width={width + 4} height={height + 4} fill="none" stroke={COLORS.white} strokeWidth={2} />
      )}
    </g>
  );
}

function Invader({ enemy }: { enemy: RenderState['enemies'][number] }) {
  const eyeY = enemy.y + Math.floor(enemy.height / 2) - 4;
  return (
    <g className={`enemy enemy-${enemy.type}`}>
      <Block rect={enemy} />
      <rect x={enemy.x + 8} y={eyeY} width={6} height={6} fill={COLORS.background} />
      <rect x={enemy.x + enemy.width - 14} y={eyeY} width={6} height={6} fill={COLORS.background} />
    </g>
  );
}

function Mothership({ boss }: { boss: RenderRect }) {
  return (
    <g className="boss">
      <Block rect={boss} rx={6} />
      <rect x={boss.x + 15} y={boss.y + 6} width={boss.width - 30} height={boss.height - 12} fill={COLORS.background} />
    </g>
  );
}

/** Shields, enemies, boss, bullets, ship and particles, back to front. */
export function Playfield({ frame }: { frame: RenderState }) {
  return (
    <g className="playfield">
      {frame.shields.map((piece, i) => <Block key={`s${i}`} rect={piece} />)}
      {frame.enemies.map((enemy, i) => <Invader key={`e${i}`} enemy={enemy} />)}
      {frame.boss && <Mothership boss={frame.boss} />}
      {frame.bullets.map((bullet, i) => <Block key={`b${i}`} rect={bullet} />)}
      <Ship player={frame.player} />
      {frame.particles.map((p, i) => <Block key={`p${i}`} rect={p} />)}
    </g>
  );
}
