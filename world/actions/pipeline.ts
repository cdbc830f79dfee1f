// ============================================================================
// ACTION PIPELINE - Every player action goes through this pipeline
// ============================================================================

import type { WorldState } from '../state/worldState';
import type { KernelConfig } from '../engine/config';
import type { MoveDirection, PlayerAction, WorldEvent, Result } from './types';
import { ok, err } from './types';
import { clampToBounds } from '../map/gridDef';
import { isPlayerDefeated } from '../state/worldState';

const DIRECTION_VECTORS: Record<MoveDirection, { dx: 0 | 1 | -1; dy: 0 | 1 | -1 }> = {
  UP: { dx: 0, dy: -1 },
  DOWN: { dx: 0, dy: 1 },
  LEFT: { dx: -1, dy: 0 },
  RIGHT: { dx: 1, dy: 0 },
};

// ============================================================================
// VALIDATION
// ============================================================================

export function validateAction(
  state: WorldState,
  action: PlayerAction
): Result<void> {
  if (isPlayerDefeated(state)) {
    return err('SESSION_OVER', 'The player has no health left');
  }

  switch (action.type) {
    case 'MOVE':
      if (!Object.prototype.hasOwnProperty.call(DIRECTION_VECTORS, action.direction)) {
        return err('INVALID_DIRECTION', `Unknown direction ${String(action.direction)}`);
      }
      return ok(undefined);
    case 'SHOOT':
    case 'QUIT':
    case 'IDLE':
      return ok(undefined);
    default:
      // Actions built from untyped input
      return err('INVALID_ACTION', 'Unknown action type');
  }
}

// ============================================================================
// APPLICATION
// ============================================================================

export function applyAction(
  state: WorldState,
  action: PlayerAction,
  config: KernelConfig
): WorldEvent[] {
  switch (action.type) {
    case 'MOVE':
      return applyMove(state, action.direction, config.PLAYER_SPEED);
    case 'SHOOT':
    case 'QUIT':
    case 'IDLE':
      // Shooting is resolved in the combat phase, quitting by the tick
      return [];
  }
}

function applyMove(
  state: WorldState,
  direction: MoveDirection,
  speed: number
): WorldEvent[] {
  const { dx, dy } = DIRECTION_VECTORS[direction];
  const { player } = state;
  const next = clampToBounds(state.grid, player.x + dx * speed, player.y + dy * speed);

  // Pushing against the edge is not a move
  if (next.x === player.x && next.y === player.y) {
    return [];
  }

  state.player = { ...player, x: next.x, y: next.y };

  return [
    {
      type: 'PLAYER_MOVED',
      x: next.x,
      y: next.y,
    },
  ];
}

// ============================================================================
// UNIFIED PIPELINE ENTRY POINT
// ============================================================================

export function processAction(
  state: WorldState,
  action: PlayerAction,
  config: KernelConfig
): Result<WorldEvent[]> {
  const validationResult = validateAction(state, action);
  if (!validationResult.ok) {
    return validationResult;
  }
  return ok(applyAction(state, action, config));
}
