import { describe, it, expect } from 'vitest';
import { enemySpeedForLevel, stepEnemies } from '../engine/enemyMovement';
import { KERNEL_CONFIG } from '../engine/config';
import { createEnemy, killEnemy, type Enemy } from '../entities/enemy';
import { createGridDef } from '../map/gridDef';
import { createSeededRng } from '../utils/rng';
import { sequenceRng } from './helpers';

const grid = createGridDef(20);

describe('stepEnemies', () => {
  it('displaces living enemies by (2r - 1) * speed on each axis', () => {
    const enemies: Enemy[] = [
      createEnemy(0, 5, 5),
      killEnemy(createEnemy(1, 10, 10)),
      createEnemy(2, 0, 19),
    ];
    const rng = sequenceRng([0.75, 0.25, 0, 0.5]);

    stepEnemies(enemies, 1, grid, rng);

    expect(enemies).toEqual([
      { id: 0, x: 5.5, y: 4.5, alive: true },
      { id: 1, x: 10, y: 10, alive: false },
      { id: 2, x: 0, y: 19, alive: true },
    ]);
    // dead enemies consume no draws
    expect(rng.calls()).toBe(4);
  });

  it('clamps to the far edge', () => {
    const enemies = [createEnemy(0, 19, 19)];
    stepEnemies(enemies, 2, grid, () => 0.99);
    expect(enemies[0]).toEqual({ id: 0, x: 19, y: 19, alive: true });
  });

  it('does nothing for a non-positive speed', () => {
    const enemies = [createEnemy(0, 3, 4)];
    const rng = sequenceRng([0.9]);
    stepEnemies(enemies, 0, grid, rng);
    stepEnemies(enemies, -1, grid, rng);
    expect(enemies[0]).toEqual({ id: 0, x: 3, y: 4, alive: true });
    expect(rng.calls()).toBe(0);
  });

  it('is repeatable with the same random sequence', () => {
    const run = () => {
      const enemies = [createEnemy(0, 4, 4), createEnemy(1, 12, 7), createEnemy(2, 18, 1)];
      const rng = createSeededRng(99);
      for (let i = 0; i < 20; i++) stepEnemies(enemies, 0.9, grid, rng);
      return enemies;
    };
    expect(run()).toEqual(run());
  });

  it('never leaves the grid', () => {
    const enemies = Array.from({ length: 30 }, (_, i) => createEnemy(i, i % 20, (i * 7) % 20));
    const rng = createSeededRng(5);
    for (let tick = 0; tick < 200; tick++) {
      stepEnemies(enemies, 3, grid, rng);
      for (const e of enemies) {
        expect(e.x).toBeGreaterThanOrEqual(0);
        expect(e.x).toBeLessThanOrEqual(19);
        expect(e.y).toBeGreaterThanOrEqual(0);
        expect(e.y).toBeLessThanOrEqual(19);
      }
    }
  });
});

describe('enemySpeedForLevel', () => {
  it('grows by the scaling factor per level', () => {
    expect(enemySpeedForLevel(1, KERNEL_CONFIG)).toBeCloseTo(0.7);
    expect(enemySpeedForLevel(5, KERNEL_CONFIG)).toBeCloseTo(1.5);
  });
});
