import * as THREE from 'three';

// Night-sky palette
export const COLORS = {
  background: '#0d1021',
  ui: '#e6ebff',
  player: '#f0f0ff',
  boss: '#ff508c',
  playerBullet: '#ffffb4',
  enemyBullet: '#ff7878',
  shield: '#5ac8a0',
  shieldDamaged: '#b46e6e',
  dim: '#505a78',
  highlight: '#a0c8ff',
  heart: '#ff6478',
  godMode: '#ffc8c8',
  white: '#ffffff',
};

// Cache THREE.Color instances for reuse
const colorCache = new Map<string, THREE.Color>();

export function getThreeColor(hex: string): THREE.Color {
  let cached = colorCache.get(hex);
  if (!cached) {
    cached = new THREE.Color(hex);
    colorCache.set(hex, cached);
  }
  return cached;
}

/** CSS rgba() string for a palette color at the given opacity. */
export function toRgba(hex: string, alpha: number): string {
  // getHex() converts back out of the linear working space
  const packed = getThreeColor(hex).getHex();
  const r = (packed >> 16) & 255;
  const g = (packed >> 8) & 255;
  const b = packed & 255;
  return `rgba(${r}, ${g}, ${b}, ${alpha})`;
}

// Pre-cache common colors
Object.values(COLORS).forEach(getThreeColor);
