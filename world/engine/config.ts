// Kernel constants. Fixed for a session; World accepts overrides for tests.
export interface KernelConfig {
  readonly GRID_SIZE: number;
  readonly PLAYER_SPEED: number;
  readonly SHOOT_RANGE: number;
  readonly COLLISION_DISTANCE: number;
  readonly BASE_ENEMY_COUNT: number;
  readonly ENEMY_COUNT_SCALING: number;
  readonly BASE_ENEMY_SPEED: number;
  readonly ENEMY_SPEED_SCALING: number;
  readonly STARTING_HEALTH: number;
  readonly HIT_SCORE: number;
}

export const KERNEL_CONFIG: KernelConfig = {
  GRID_SIZE: 20,
  PLAYER_SPEED: 2,
  SHOOT_RANGE: 50,
  COLLISION_DISTANCE: 1,   // Enemies this close hit the player
  BASE_ENEMY_COUNT: 10,
  ENEMY_COUNT_SCALING: 5,  // Extra enemies per level
  BASE_ENEMY_SPEED: 0.5,
  ENEMY_SPEED_SCALING: 0.2, // Extra max step per level
  STARTING_HEALTH: 10,
  HIT_SCORE: 10,           // Multiplied by the current multiplier
};

export function createKernelConfig(overrides: Partial<KernelConfig> = {}): KernelConfig {
  return { ...KERNEL_CONFIG, ...overrides };
}
