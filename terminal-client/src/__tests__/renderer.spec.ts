import { describe, it, expect } from 'vitest';
import { createGridDef, type WorldSnapshot } from '../../../world/index';
import { describeEvents, paint, renderFrame, renderGameOver, renderGrid, renderHud } from '../renderer';

const snapshot: WorldSnapshot = {
  grid: createGridDef(3),
  player: { x: 1.7, y: 0.2, health: 3 },
  enemies: [
    { id: 0, x: 2.9, y: 2.1, alive: true },
    { id: 1, x: 0, y: 0, alive: false },
    { id: 2, x: 1.2, y: 0.9, alive: true },
  ],
  score: 40,
  level: 2,
  multiplier: 3,
  highScore: 100,
};

describe('renderHud', () => {
  it('lists the session counters', () => {
    expect(renderHud(snapshot, false)).toBe('Level: 2  Health: 3  Score: 40  Multiplier: x3  High Score: 100');
  });
});

describe('renderGrid', () => {
  it('draws truncated cells, skips dead enemies and draws the player on top', () => {
    expect(renderGrid(snapshot, false)).toEqual(['.P.', '...', '..E']);
  });

  it('wraps cells in ANSI colours when enabled', () => {
    const rows = renderGrid(snapshot, true);
    expect(rows[0]).toBe(`${paint('.', 'YELLOW', true)}\x1b[32mP\x1b[0m${paint('.', 'YELLOW', true)}`);
    expect(rows[2].endsWith('\x1b[31mE\x1b[0m')).toBe(true);
  });
});

describe('renderFrame', () => {
  it('stacks HUD, grid and messages', () => {
    expect(renderFrame(snapshot, ['Shot enemy id: 4!'], false)).toEqual([
      'Level: 2  Health: 3  Score: 40  Multiplier: x3  High Score: 100',
      '.P.',
      '...',
      '..E',
      'Shot enemy id: 4!',
    ]);
  });
});

describe('describeEvents', () => {
  it('turns combat and level events into messages', () => {
    expect(describeEvents([
      { type: 'PLAYER_MOVED', x: 3, y: 4 },
      { type: 'ENEMY_SHOT', enemyId: 4, points: 10, multiplier: 2 },
      { type: 'PLAYER_DAMAGED', enemyId: 1, health: 8 },
      { type: 'LEVEL_STARTED', level: 3, enemyCount: 25 },
      { type: 'SESSION_ENDED', reason: 'QUIT', finalScore: 0 },
    ], false)).toEqual([
      'Shot enemy id: 4!',
      'Enemy 1 hit you! Health -1',
      'Level 3 starts with 25 enemies!',
    ]);
  });
});

describe('renderGameOver', () => {
  it('announces a new high score', () => {
    expect(renderGameOver({ finalScore: 42, previousHighScore: 30, isNewHighScore: true }, false)).toEqual([
      '',
      'Game Over! Final Score: 42',
      'New High Score: 42!',
    ]);
  });

  it('keeps the old high score otherwise', () => {
    expect(renderGameOver({ finalScore: 12, previousHighScore: 50, isNewHighScore: false }, false)).toEqual([
      '',
      'Game Over! Final Score: 12',
      'High Score remains: 50',
    ]);
  });
});
