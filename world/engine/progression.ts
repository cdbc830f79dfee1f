// ============================================================================
// PROGRESSION - Wave clearance and the next, larger wave
// ============================================================================

import type { WorldState } from '../state/worldState';
import type { Rng } from '../utils/rng';
import type { KernelConfig } from './config';
import { isWaveCleared } from '../state/worldState';
import { spawnEnemies } from './population';

export interface WaveInfo {
  readonly level: number;
  readonly enemyCount: number;
}

export function enemyCountForLevel(level: number, config: KernelConfig): number {
  return config.BASE_ENEMY_COUNT + level * config.ENEMY_COUNT_SCALING;
}

/**
 * When every enemy is dead, advance the level and replace the wave.
 * Must run after combat so a kill this tick counts towards clearance.
 * Leaves state untouched and returns undefined while any enemy lives.
 */
export function checkAndAdvance(
  state: WorldState,
  config: KernelConfig,
  rng: Rng
): WaveInfo | undefined {
  if (!isWaveCleared(state)) {
    return undefined;
  }

  state.level += 1;
  const enemyCount = enemyCountForLevel(state.level, config);
  state.enemies = spawnEnemies(enemyCount, state.grid, rng);

  return { level: state.level, enemyCount: state.enemies.length };
}
