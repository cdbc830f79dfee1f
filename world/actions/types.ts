import type { Enemy } from '../entities/enemy';

// ============================================================================
// PLAYER ACTIONS - The ONLY way the driver mutates world state
// ============================================================================

export type MoveDirection = 'UP' | 'DOWN' | 'LEFT' | 'RIGHT';

/** Step the player by PLAYER_SPEED along one axis */
export interface MoveAction {
  readonly type: 'MOVE';
  readonly direction: MoveDirection;
}

/** Fire at the nearest living enemy */
export interface ShootAction {
  readonly type: 'SHOOT';
}

/** End the session without processing the tick */
export interface QuitAction {
  readonly type: 'QUIT';
}

/** Do nothing this tick (enemies still move) */
export interface IdleAction {
  readonly type: 'IDLE';
}

/** Discriminated union of all possible actions */
export type PlayerAction =
  | MoveAction
  | ShootAction
  | QuitAction
  | IdleAction;

// ============================================================================
// WORLD EVENTS - Outputs returned by the world (never mutate external systems)
// ============================================================================

/** Emitted when a move action changed the player's position */
export interface PlayerMovedEvent {
  readonly type: 'PLAYER_MOVED';
  readonly x: number;
  readonly y: number;
}

/** Emitted when the player shoots an enemy */
export interface EnemyShotEvent {
  readonly type: 'ENEMY_SHOT';
  readonly enemyId: Enemy['id'];
  readonly points: number;
  /** Multiplier after the hit */
  readonly multiplier: number;
}

/** Emitted when an enemy reaches the player */
export interface PlayerDamagedEvent {
  readonly type: 'PLAYER_DAMAGED';
  readonly enemyId: Enemy['id'];
  readonly health: number;
}

/** Emitted when a cleared wave is replaced by the next one */
export interface LevelStartedEvent {
  readonly type: 'LEVEL_STARTED';
  readonly level: number;
  readonly enemyCount: number;
}

export type SessionEndReason = 'QUIT' | 'DEFEATED';

export interface SessionEndedEvent {
  readonly type: 'SESSION_ENDED';
  readonly reason: SessionEndReason;
  readonly finalScore: number;
}

/** Discriminated union of all world events */
export type WorldEvent =
  | PlayerMovedEvent
  | EnemyShotEvent
  | PlayerDamagedEvent
  | LevelStartedEvent
  | SessionEndedEvent;

// ============================================================================
// RESULT TYPE - World never throws, returns Result instead
// ============================================================================

export type WorldErrorCode = 'SESSION_OVER' | 'INVALID_DIRECTION' | 'INVALID_ACTION';

export interface ResultOk<T> {
  readonly ok: true;
  readonly value: T;
}

export interface ResultErr {
  readonly ok: false;
  readonly error: {
    readonly code: WorldErrorCode;
    readonly message: string;
  };
}

export type Result<T> = ResultOk<T> | ResultErr;

/** Helper to create success result */
export function ok<T>(value: T): ResultOk<T> {
  return { ok: true, value };
}

/** Helper to create error result */
export function err(code: WorldErrorCode, message: string): ResultErr {
  return { ok: false, error: { code, message } };
}
