export interface Player {
  readonly x: number;
  readonly y: number;
  readonly health: number;
}

/** Create the player with validated fields */
export function createPlayer(x: number, y: number, health: number): Player {
  return {
    x,
    y,
    health: Math.max(0, Math.floor(health)),
  };
}
