// ============================================================================
// COMBAT - Resolves the tick's shot or collision against the nearest enemy
// ============================================================================

import { getEnemy, type WorldState } from '../state/worldState';
import type { PlayerAction, WorldEvent } from '../actions/types';
import type { KernelConfig } from './config';
import { killEnemy } from '../entities/enemy';

export type CombatOutcome = 'HIT' | 'COLLISION' | 'NONE';

export interface CombatResult {
  readonly outcome: CombatOutcome;
  readonly events: WorldEvent[];
}

const NO_EFFECT: CombatResult = { outcome: 'NONE', events: [] };

/**
 * Decide what happens between the player and the nearest enemy.
 *
 * Priority:
 * 1. No target: nothing.
 * 2. SHOOT within SHOOT_RANGE: the enemy dies, score += HIT_SCORE * multiplier,
 *    multiplier + 1. A successful shot prevents collision damage this tick.
 * 3. Within COLLISION_DISTANCE: the enemy dies on contact, health - 1,
 *    multiplier back to 1.
 * 4. Otherwise nothing.
 *
 * `targetIndex` must come from findNearestEnemy over the same wave.
 */
export function resolveCombat(
  state: WorldState,
  action: PlayerAction,
  targetIndex: number | undefined,
  distance: number,
  config: KernelConfig
): CombatResult {
  if (targetIndex === undefined) {
    return NO_EFFECT;
  }
  const target = getEnemy(state, targetIndex);
  if (!target || !target.alive) {
    return NO_EFFECT;
  }

  if (action.type === 'SHOOT' && distance <= config.SHOOT_RANGE) {
    const points = config.HIT_SCORE * state.multiplier;
    state.enemies[targetIndex] = killEnemy(target);
    state.score += points;
    state.multiplier += 1;

    return {
      outcome: 'HIT',
      events: [{
        type: 'ENEMY_SHOT',
        enemyId: target.id,
        points,
        multiplier: state.multiplier,
      }],
    };
  }

  if (distance <= config.COLLISION_DISTANCE) {
    state.enemies[targetIndex] = killEnemy(target);
    state.player = { ...state.player, health: Math.max(0, state.player.health - 1) };
    state.multiplier = 1;

    return {
      outcome: 'COLLISION',
      events: [{
        type: 'PLAYER_DAMAGED',
        enemyId: target.id,
        health: state.player.health,
      }],
    };
  }

  return NO_EFFECT;
}
