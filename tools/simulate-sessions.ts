/**
 * HEADLESS SESSION SIMULATION
 *
 * Plays seeded sessions against the kernel with a random policy and prints
 * how far each one got. Usage: tsx tools/simulate-sessions.ts [sessions] [shootChance]
 */

import { World, createSeededRng, type PlayerAction, type Rng } from '../world/index';

const MAX_TICKS = 2000;

const MOVES: PlayerAction[] = [
  { type: 'MOVE', direction: 'UP' },
  { type: 'MOVE', direction: 'DOWN' },
  { type: 'MOVE', direction: 'LEFT' },
  { type: 'MOVE', direction: 'RIGHT' },
  { type: 'IDLE' },
];

function pickAction(policyRng: Rng, shootChance: number): PlayerAction {
  if (policyRng() < shootChance) return { type: 'SHOOT' };
  return MOVES[Math.floor(policyRng() * MOVES.length) % MOVES.length];
}

function simulate(seed: number, shootChance: number) {
  const world = new World({ rng: createSeededRng(seed) });
  const policyRng = createSeededRng(seed + 1_000_000);
  let ticks = 0;
  let hits = 0;
  let collisions = 0;

  while (!world.isSessionOver() && ticks < MAX_TICKS) {
    const result = world.tick(pickAction(policyRng, shootChance));
    ticks++;
    if (!result.ok) {
      console.log(`  ❌ seed ${seed}: ${result.error.code} after ${ticks} ticks`);
      break;
    }
    for (const event of result.value) {
      if (event.type === 'ENEMY_SHOT') hits++;
      if (event.type === 'PLAYER_DAMAGED') collisions++;
    }
  }

  const snapshot = world.getSnapshot();
  const status = snapshot.player.health > 0 ? 'ALIVE' : 'DEFEATED';
  console.log(
    `${seed.toString().padStart(4, ' ')} | ${ticks.toString().padStart(5, ' ')} | `
    + `${snapshot.level.toString().padStart(5, ' ')} | ${snapshot.score.toString().padStart(7, ' ')} | `
    + `${hits.toString().padStart(4, ' ')} | ${collisions.toString().padStart(4, ' ')} | ${status}`
  );
}

function main() {
  const sessions = Number.parseInt(process.argv[2] ?? '10', 10) || 10;
  const shootChance = Number.parseFloat(process.argv[3] ?? '0.2');

  console.log('==========================================');
  console.log(`SIMULATING ${sessions} SESSIONS (shoot chance ${shootChance})`);
  console.log('==========================================\n');
  console.log('Seed | Ticks | Level |   Score | Hits | Dmg  | Status');
  console.log('-----|-------|-------|---------|------|------|--------');

  for (let seed = 1; seed <= sessions; seed++) {
    simulate(seed, shootChance);
  }
}

main();
