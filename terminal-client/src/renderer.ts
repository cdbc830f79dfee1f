import { toCell, type SessionSummary, type WorldEvent, type WorldSnapshot } from '../../world/index';
import type { Display } from './types';

// ANSI colors
export const ANSI = {
  RESET: '\x1b[0m',
  RED: '\x1b[31m',
  GREEN: '\x1b[32m',
  YELLOW: '\x1b[33m',
  MAGENTA: '\x1b[35m',
  CYAN: '\x1b[36m',
} as const;

export type AnsiColor = Exclude<keyof typeof ANSI, 'RESET'>;

const CLEAR_SCREEN = '\x1b[2J\x1b[1;1H';

export function paint(text: string, color: AnsiColor, enabled: boolean): string {
  return enabled ? `${ANSI[color]}${text}${ANSI.RESET}` : text;
}

export function renderHud(snapshot: WorldSnapshot, color: boolean): string {
  const hud = `Level: ${snapshot.level}  Health: ${snapshot.player.health}  Score: ${snapshot.score}`
    + `  Multiplier: x${snapshot.multiplier}  High Score: ${snapshot.highScore}`;
  return paint(hud, 'CYAN', color);
}

/**
 * One line per grid row. The player is drawn over an enemy in the same cell;
 * dead enemies are not drawn.
 */
export function renderGrid(snapshot: WorldSnapshot, color: boolean): string[] {
  const size = snapshot.grid.size;
  const enemyCells = new Set<string>();
  for (const e of snapshot.enemies) {
    if (e.alive) enemyCells.add(`${toCell(e.x)},${toCell(e.y)}`);
  }
  const playerX = toCell(snapshot.player.x);
  const playerY = toCell(snapshot.player.y);

  const rows: string[] = [];
  for (let y = 0; y < size; y++) {
    let row = '';
    for (let x = 0; x < size; x++) {
      if (x === playerX && y === playerY) {
        row += paint('P', 'GREEN', color);
      } else if (enemyCells.has(`${x},${y}`)) {
        row += paint('E', 'RED', color);
      } else {
        row += paint('.', 'YELLOW', color);
      }
    }
    rows.push(row);
  }
  return rows;
}

/** Message line for an event, or undefined when the event is silent */
export function describeEvent(event: WorldEvent, color: boolean): string | undefined {
  switch (event.type) {
    case 'ENEMY_SHOT':
      return paint(`Shot enemy id: ${event.enemyId}!`, 'GREEN', color);
    case 'PLAYER_DAMAGED':
      return paint(`Enemy ${event.enemyId} hit you! Health -1`, 'RED', color);
    case 'LEVEL_STARTED':
      return paint(`Level ${event.level} starts with ${event.enemyCount} enemies!`, 'YELLOW', color);
    case 'PLAYER_MOVED':
    case 'SESSION_ENDED':
      return undefined;
  }
}

export function describeEvents(events: readonly WorldEvent[], color: boolean): string[] {
  const lines: string[] = [];
  for (const event of events) {
    const line = describeEvent(event, color);
    if (line !== undefined) lines.push(line);
  }
  return lines;
}

export function renderFrame(snapshot: WorldSnapshot, messages: readonly string[], color: boolean): string[] {
  return [renderHud(snapshot, color), ...renderGrid(snapshot, color), ...messages];
}

export function renderGameOver(summary: SessionSummary, color: boolean): string[] {
  const lines = ['', paint(`Game Over! Final Score: ${summary.finalScore}`, 'RED', color)];
  if (summary.isNewHighScore) {
    lines.push(paint(`New High Score: ${summary.finalScore}!`, 'GREEN', color));
  } else {
    lines.push(paint(`High Score remains: ${summary.previousHighScore}`, 'CYAN', color));
  }
  return lines;
}

export function createTerminalDisplay(): Display {
  return {
    clear() {
      process.stdout.write(CLEAR_SCREEN);
    },
    write(lines) {
      process.stdout.write(lines.map(line => `${line}\n`).join(''));
    },
  };
}
