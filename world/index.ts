// ============================================================================
// WORLD MODULE - Single source of truth for the grid combat simulation
// ============================================================================

// Core engine
export { World } from './engine';
export type { WorldSnapshot, WorldOptions } from './engine';
export { KERNEL_CONFIG, createKernelConfig } from './engine/config';
export type { KernelConfig } from './engine/config';

// Entities
export { createEnemy, killEnemy } from './entities/enemy';
export { createPlayer } from './entities/player';
export type { Enemy } from './entities/enemy';
export type { Player } from './entities/player';

// Grid
export { createGridDef, isInBounds, clampToBounds, toCell, gridCenter } from './map';
export type { GridDef, Point } from './map';

// Actions & Events
export type {
  PlayerAction,
  MoveAction,
  MoveDirection,
  ShootAction,
  QuitAction,
  IdleAction,
  WorldEvent,
  PlayerMovedEvent,
  EnemyShotEvent,
  PlayerDamagedEvent,
  LevelStartedEvent,
  SessionEndedEvent,
  SessionEndReason,
  WorldErrorCode,
  Result,
  ResultOk,
  ResultErr,
} from './actions';
export { ok, err } from './actions';

// Pipeline (exposed for testing/advanced use)
export { validateAction, applyAction, processAction } from './actions';

// Simulation stages (exposed for testing/advanced use)
export { spawnEnemies } from './engine/population';
export { stepEnemies, enemySpeedForLevel } from './engine/enemyMovement';
export { findNearestEnemy, getDistance, getDistanceSquared } from './engine/targeting';
export { resolveCombat } from './engine/combat';
export type { CombatOutcome, CombatResult } from './engine/combat';
export { checkAndAdvance, enemyCountForLevel } from './engine/progression';
export type { WaveInfo } from './engine/progression';
export { runTick } from './engine/tick';
export type { TickContext } from './engine/tick';
export { summarizeSession } from './engine/session';
export type { SessionSummary } from './engine/session';

// State (exposed for testing/advanced use)
export type { WorldState, WorldStateOptions } from './state';
export { createWorldState, getEnemy, getLivingEnemies, isWaveCleared, isPlayerDefeated } from './state';

// Random source
export { createSeededRng, systemRng, randomInt, randomRange } from './utils/rng';
export type { Rng } from './utils/rng';
