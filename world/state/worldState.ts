// ============================================================================
// WORLD STATE - The single source of truth for the simulation
// ============================================================================

import type { Enemy } from '../entities/enemy';
import type { Player } from '../entities/player';
import type { GridDef } from '../map/gridDef';
import { createPlayer } from '../entities/player';
import { gridCenter } from '../map/gridDef';

export interface WorldState {
  readonly grid: GridDef;
  player: Player;
  /** Current wave in spawn order. Replaced wholesale on respawn. */
  enemies: Enemy[];
  score: number;
  level: number;
  multiplier: number;
  /** Best score loaded at session start */
  highScore: number;
}

export interface WorldStateOptions {
  readonly health: number;
  readonly highScore?: number;
}

/** Create initial world state with the player centred and no enemies */
export function createWorldState(grid: GridDef, options: WorldStateOptions): WorldState {
  const start = gridCenter(grid);
  return {
    grid,
    player: createPlayer(start.x, start.y, options.health),
    enemies: [],
    score: 0,
    level: 1,
    multiplier: 1,
    highScore: Math.max(0, options.highScore ?? 0),
  };
}

/** Get enemy by wave index (returns undefined if out of range) */
export function getEnemy(state: WorldState, index: number): Enemy | undefined {
  return state.enemies[index];
}

export function getLivingEnemies(state: WorldState): Enemy[] {
  return state.enemies.filter(e => e.alive);
}

/** True when no enemy of the current wave is alive (an empty wave counts) */
export function isWaveCleared(state: WorldState): boolean {
  return getLivingEnemies(state).length === 0;
}

export function isPlayerDefeated(state: WorldState): boolean {
  return state.player.health <= 0;
}
