// Enemy Movement Processing Module
// Random-walk step for every living enemy, scaled by the level's speed

import type { Enemy } from '../entities/enemy';
import type { GridDef } from '../map/gridDef';
import type { Rng } from '../utils/rng';
import type { KernelConfig } from './config';
import { clampToBounds } from '../map/gridDef';
import { randomRange } from '../utils/rng';

/**
 * Max per-axis displacement for a level.
 * Grows linearly so later waves close in faster.
 */
export function enemySpeedForLevel(level: number, config: KernelConfig): number {
  return config.BASE_ENEMY_SPEED + config.ENEMY_SPEED_SCALING * level;
}

/**
 * Displaces each living enemy by dx, dy in [-speed, speed) and clamps the
 * result to the grid. Draws dx then dy per living enemy, in wave order.
 * Dead enemies keep their last position and consume no draws.
 */
export function stepEnemies(
  enemies: Enemy[],
  speed: number,
  grid: GridDef,
  rng: Rng
): void {
  if (!Number.isFinite(speed) || speed <= 0) return;

  for (let i = 0; i < enemies.length; i++) {
    const enemy = enemies[i];
    if (!enemy.alive) continue;

    const dx = randomRange(rng, -speed, speed);
    const dy = randomRange(rng, -speed, speed);
    const next = clampToBounds(grid, enemy.x + dx, enemy.y + dy);

    enemies[i] = { ...enemy, x: next.x, y: next.y };
  }
}
