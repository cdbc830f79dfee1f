// ============================================================================
// TICK - One full simulation step
// ============================================================================

import type { WorldState } from '../state/worldState';
import type { PlayerAction, WorldEvent, Result } from '../actions/types';
import type { Rng } from '../utils/rng';
import type { KernelConfig } from './config';
import { ok } from '../actions/types';
import { validateAction, applyAction } from '../actions/pipeline';
import { isPlayerDefeated } from '../state/worldState';
import { enemySpeedForLevel, stepEnemies } from './enemyMovement';
import { findNearestEnemy, getDistance } from './targeting';
import { resolveCombat } from './combat';
import { checkAndAdvance } from './progression';

export interface TickContext {
  readonly config: KernelConfig;
  readonly rng: Rng;
}

/**
 * Run one tick: player action -> enemy movement -> targeting -> combat ->
 * progression -> defeat check. Every stage completes before the next reads
 * the state.
 *
 * QUIT ends the session without processing anything else.
 */
export function runTick(
  state: WorldState,
  action: PlayerAction,
  context: TickContext
): Result<WorldEvent[]> {
  const { config, rng } = context;

  const validationResult = validateAction(state, action);
  if (!validationResult.ok) {
    return validationResult;
  }

  if (action.type === 'QUIT') {
    return ok([{ type: 'SESSION_ENDED', reason: 'QUIT', finalScore: state.score }]);
  }

  const events: WorldEvent[] = applyAction(state, action, config);

  stepEnemies(state.enemies, enemySpeedForLevel(state.level, config), state.grid, rng);

  const targetIndex = findNearestEnemy(state.player, state.enemies);
  const target = targetIndex === undefined ? undefined : state.enemies[targetIndex];
  const distance = target ? getDistance(state.player, target) : Number.POSITIVE_INFINITY;

  const combat = resolveCombat(state, action, targetIndex, distance, config);
  events.push(...combat.events);

  const wave = checkAndAdvance(state, config, rng);
  if (wave) {
    events.push({ type: 'LEVEL_STARTED', level: wave.level, enemyCount: wave.enemyCount });
  }

  if (isPlayerDefeated(state)) {
    events.push({ type: 'SESSION_ENDED', reason: 'DEFEATED', finalScore: state.score });
  }

  return ok(events);
}
