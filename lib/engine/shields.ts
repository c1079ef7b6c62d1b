import type { Bullet, GameConfig, ShieldPiece, Shields } from '@/types/game';
import { rectsIntersect } from './geometry';

const SHIELD_MARGIN_X = 80;

/**
 * Four clusters of 12px pieces. The corners of the bottom row are left out
 * to carve a small arch.
 */
export function createShields(config: GameConfig): Shields {
  const pieces: ShieldPiece[] = [];
  const size = config.shieldSegmentSize;
  const spacing = Math.floor((config.width - 2 * SHIELD_MARGIN_X) / (config.shieldCount - 1));
  const top = config.height - 180;

  for (let i = 0; i < config.shieldCount; i++) {
    const left = SHIELD_MARGIN_X + i * spacing - Math.floor((config.shieldCols * size) / 2);
    for (let r = 0; r < config.shieldRows; r++) {
      for (let c = 0; c < config.shieldCols; c++) {
        const bottomRow = r === config.shieldRows - 1;
        if (bottomRow && (c === 0 || c === config.shieldCols - 1)) continue;
        pieces.push({
          rect: { x: left + c * size, y: top + r * size, width: size, height: size },
          health: config.shieldSegmentHealth,
        });
      }
    }
  }

  return { pieces };
}

/**
 * The first piece the bullet overlaps loses one hit point and is dropped at zero.
 * Returns true whenever a piece was touched: the bullet is spent either way.
 */
export function collideShieldBullet(shields: Shields, bullet: Bullet): boolean {
  const index = shields.pieces.findIndex(p => rectsIntersect(p.rect, bullet.rect));
  if (index < 0) return false;

  const piece = shields.pieces[index];
  piece.health -= 1;
  if (piece.health <= 0) {
    shields.pieces.splice(index, 1);
  }
  return true;
}
