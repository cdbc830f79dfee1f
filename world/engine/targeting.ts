// ============================================================================
// TARGETING - Nearest living enemy to the player
// ============================================================================

import type { Enemy } from '../entities/enemy';
import type { Point } from '../map/gridDef';

// ============================================================================
// DISTANCE UTILITIES
// ============================================================================

export function getDistanceSquared(a: Point, b: Point): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return dx * dx + dy * dy;
}

export function getDistance(a: Point, b: Point): number {
  return Math.sqrt(getDistanceSquared(a, b));
}

/**
 * Index of the nearest living enemy, or undefined when none is alive.
 * Equidistant enemies resolve to the lowest index (earliest spawned).
 */
export function findNearestEnemy(
  position: Point,
  enemies: readonly Enemy[]
): number | undefined {
  let nearestIndex: number | undefined;
  let minDist2 = Number.POSITIVE_INFINITY;

  for (let i = 0; i < enemies.length; i++) {
    const enemy = enemies[i];
    if (!enemy.alive) continue;

    const dist2 = getDistanceSquared(position, enemy);
    // Strict comparison keeps the first of equal candidates
    if (dist2 < minDist2) {
      minDist2 = dist2;
      nearestIndex = i;
    }
  }

  return nearestIndex;
}
