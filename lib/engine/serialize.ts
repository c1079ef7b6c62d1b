import { type GameState, type GameConfig, type Rect, type Scene, type Vector2, type EnemyType, DEFAULT_CONFIG } from '@/types/game';
import { COLORS } from '../colors';
import { clamp, offsetRect } from './geometry';
import { shakeOffset } from './effects';

export interface RenderRect extends Rect {
  color: string;
}

export interface RenderState {
  scene: Scene;
  width: number;
  height: number;
  offset: Vector2;
  shields: RenderRect[];
  enemies: Array<RenderRect & { type: EnemyType }>;
  boss: RenderRect | null;
  bullets: RenderRect[];
  player: RenderRect & { blink: boolean };
  particles: RenderRect[];
  score: number;
  highscore: number;
  highscores: number[];
  wave: number;
  lives: number;
  godMode: boolean;
  hardMode: boolean;
  soundEnabled: boolean;
  madeHighscore: boolean;
}

/**
 * Snapshot a frame for drawing. Every playfield rect already carries the
 * camera-shake offset; collision geometry in the state is left alone.
 */
export function serializeForRender(
  state: GameState,
  config: GameConfig = DEFAULT_CONFIG,
  random: () => number = Math.random
): RenderState {
  const offset = shakeOffset(state, random);
  const place = (r: Rect, color: string): RenderRect => ({ ...offsetRect(r, offset.x, offset.y), color });

  const shields: RenderState['shields'] = [];
  for (const piece of state.shields.pieces) {
    shields.push(place(piece.rect, piece.health >= 2 ? COLORS.shield : COLORS.shieldDamaged));
  }

  const enemies: RenderState['enemies'] = [];
  for (const e of state.grid.enemies) {
    enemies.push({ ...place(e.rect, e.hitFlash > 0 ? COLORS.white : e.color), type: e.type });
  }

  const bullets: RenderState['bullets'] = [];
  state.bullets.forEach(b => {
    bullets.push(place(b.rect, b.isPlayer ? COLORS.playerBullet : COLORS.enemyBullet));
  });

  const particles: RenderState['particles'] = [];
  if (config.enableParticles) {
    state.particles.forEach(p => {
      if (p.life <= 0) return;
      const alpha = clamp(p.life / p.maxLife, 0, 1);
      const s = Math.max(1, Math.trunc(p.size * alpha * 2));
      const r = {
        x: Math.trunc(p.position.x) - Math.floor(s / 2),
        y: Math.trunc(p.position.y) - Math.floor(s / 2),
        width: s,
        height: s,
      };
      particles.push(place(r, p.color));
    });
  }

  const invulnerable = state.player.invulnerableTimer;

  return {
    scene: state.scene,
    width: config.width,
    height: config.height,
    offset,
    shields,
    enemies,
    boss: state.boss ? place(state.boss.rect, COLORS.boss) : null,
    bullets,
    player: {
      ...place(state.player.rect, COLORS.player),
      blink: invulnerable > 0 && Math.trunc(invulnerable * 10) % 2 === 0,
    },
    particles,
    score: state.score,
    highscore: state.highscores.top[0] ?? 0,
    highscores: state.highscores.top.slice(0, config.highscoreSlots),
    wave: state.wave,
    lives: state.player.lives,
    godMode: state.godMode,
    hardMode: config.hardMode,
    soundEnabled: state.soundEnabled,
    madeHighscore: state.madeHighscore,
  };
}
