import type { Rng } from '../utils/rng';
import type { WorldState } from '../state/worldState';
import { createWorldState } from '../state/worldState';
import { createGridDef } from '../map/gridDef';

/** Replays `values` in order, wrapping around */
export function sequenceRng(values: number[]): Rng & { calls: () => number } {
  let i = 0;
  const rng = () => values[i++ % values.length];
  return Object.assign(rng, { calls: () => i });
}

/** Always 0.5: spawns land on the centre cell and enemies do not drift */
export const stillRng: Rng = () => 0.5;

export function makeState(health = 10): WorldState {
  return createWorldState(createGridDef(20), { health });
}
