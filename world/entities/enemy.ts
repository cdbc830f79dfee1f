export interface Enemy {
  /** Unique within a wave, contiguous from 0, equal to spawn order */
  readonly id: number;
  readonly x: number;
  readonly y: number;
  // Goes false once per wave and never back
  readonly alive: boolean;
}

export function createEnemy(id: number, x: number, y: number): Enemy {
  return {
    id,
    x,
    y,
    alive: true,
  };
}

/** Copy of the enemy marked dead. Already-dead enemies are returned as-is. */
export function killEnemy(enemy: Enemy): Enemy {
  return enemy.alive ? { ...enemy, alive: false } : enemy;
}
