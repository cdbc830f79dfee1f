// ============================================================================
// WORLD ENGINE - The main API for driving the simulation
// ============================================================================

import type { Enemy } from '../entities/enemy';
import type { Player } from '../entities/player';
import type { GridDef } from '../map/gridDef';
import type { WorldState } from '../state/worldState';
import type { PlayerAction, WorldEvent, Result } from '../actions/types';
import type { Rng } from '../utils/rng';
import type { KernelConfig } from './config';
import type { SessionSummary } from './session';
import { err } from '../actions/types';
import { createWorldState, isPlayerDefeated } from '../state/worldState';
import { createGridDef } from '../map/gridDef';
import { systemRng } from '../utils/rng';
import { createKernelConfig } from './config';
import { spawnEnemies } from './population';
import { runTick } from './tick';
import { summarizeSession } from './session';

// ============================================================================
// SNAPSHOT TYPE
// ============================================================================

export interface WorldSnapshot {
  readonly grid: GridDef;
  readonly player: Player;
  readonly enemies: readonly Enemy[];
  readonly score: number;
  readonly level: number;
  readonly multiplier: number;
  readonly highScore: number;
}

export interface WorldOptions {
  readonly config?: Partial<KernelConfig>;
  /** Random source for spawns and enemy movement */
  readonly rng?: Rng;
  /** Best score loaded by the persistence collaborator */
  readonly highScore?: number;
}

// ============================================================================
// WORLD CLASS
// ============================================================================

/**
 * World is the SINGLE SOURCE OF TRUTH for one session.
 *
 * Invariants:
 * - All operations are synchronous
 * - All operations are deterministic for a given random source
 * - The world never throws - errors are returned as Result
 */
export class World {
  private state: WorldState;
  private readonly config: KernelConfig;
  private readonly rng: Rng;
  private quit = false;
  private summary: SessionSummary | undefined;

  constructor(options: WorldOptions = {}) {
    this.config = createKernelConfig(options.config);
    this.rng = options.rng ?? systemRng;
    this.state = createWorldState(createGridDef(this.config.GRID_SIZE), {
      health: this.config.STARTING_HEALTH,
      highScore: options.highScore,
    });
    this.state.enemies = spawnEnemies(this.config.BASE_ENEMY_COUNT, this.state.grid, this.rng);
  }

  /**
   * Advance the simulation by one tick with the player's action.
   * Returns the tick's events, or SESSION_OVER once the session has ended.
   */
  tick(action: PlayerAction): Result<WorldEvent[]> {
    if (this.isSessionOver()) {
      return err('SESSION_OVER', 'The session has already ended');
    }

    const result = runTick(this.state, action, { config: this.config, rng: this.rng });
    if (result.ok && action.type === 'QUIT') {
      this.quit = true;
    }
    return result;
  }

  /** True after a QUIT action or once health reaches 0 */
  isSessionOver(): boolean {
    return this.quit || this.summary !== undefined || isPlayerDefeated(this.state);
  }

  /**
   * Close the session and compare the final score with the loaded high score.
   * Repeated calls return the same summary.
   */
  endSession(): SessionSummary {
    if (!this.summary) {
      this.summary = summarizeSession(this.state);
      if (this.summary.isNewHighScore) {
        this.state.highScore = this.summary.finalScore;
      }
    }
    return this.summary;
  }

  /** Get a read-only copy of the current state for rendering */
  getSnapshot(): WorldSnapshot {
    const { grid, player, enemies, score, level, multiplier, highScore } = this.state;
    return {
      grid,
      player: { ...player },
      enemies: enemies.map(e => ({ ...e })),
      score,
      level,
      multiplier,
      highScore,
    };
  }
}
