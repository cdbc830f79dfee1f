// ============================================================================
// ENEMY POPULATION - Builds a fresh wave
// ============================================================================

import type { Enemy } from '../entities/enemy';
import type { GridDef } from '../map/gridDef';
import type { Rng } from '../utils/rng';
import { createEnemy } from '../entities/enemy';
import { randomInt } from '../utils/rng';

/**
 * Create `count` enemies with ids 0..count-1 on random integer cells.
 * Draws x then y per enemy, in id order. A non-positive count yields an
 * empty wave.
 */
export function spawnEnemies(count: number, grid: GridDef, rng: Rng): Enemy[] {
  const total = Number.isFinite(count) ? Math.max(0, Math.floor(count)) : 0;
  const enemies: Enemy[] = [];

  for (let id = 0; id < total; id++) {
    const x = randomInt(rng, grid.size);
    const y = randomInt(rng, grid.size);
    enemies.push(createEnemy(id, x, y));
  }

  return enemies;
}
