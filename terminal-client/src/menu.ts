import { setTimeout as delay } from 'node:timers/promises';
import { MENU_ERROR_DELAY_MS } from './config';
import { playSession, RETURN_PROMPT } from './game';
import { paint } from './renderer';
import type { SessionDeps } from './types';

export type MenuChoice = 'START' | 'HIGH_SCORE' | 'QUIT';

export const MENU_PROMPT = 'Enter your choice: ';

export function parseMenuChoice(line: string): MenuChoice | undefined {
  switch (line.trim().toLowerCase()) {
    case '1':
      return 'START';
    case '2':
      return 'HIGH_SCORE';
    case '3':
    case 'q': // also what a closed stdin reads as
      return 'QUIT';
    default:
      return undefined;
  }
}

export function renderMenu(color: boolean): string[] {
  return [
    paint('================ Gridfire ================', 'MAGENTA', color),
    paint('1. Start Game', 'CYAN', color),
    paint('2. View High Score', 'CYAN', color),
    paint('3. Quit', 'CYAN', color),
  ];
}

/** Menu loop; resolves when the player chooses to quit */
export async function runMenu(deps: SessionDeps): Promise<void> {
  const { input, display, store, color } = deps;
  const sleep = deps.sleep ?? ((ms: number) => delay(ms));

  for (;;) {
    display.clear();
    display.write(renderMenu(color));

    const choice = parseMenuChoice(await input.nextLine(MENU_PROMPT));
    switch (choice) {
      case 'START':
        await playSession(deps);
        break;
      case 'HIGH_SCORE': {
        const highScore = await store.load();
        display.write([paint(`Current High Score: ${highScore}`, 'GREEN', color)]);
        await input.nextLine(RETURN_PROMPT);
        break;
      }
      case 'QUIT':
        display.write(['Thanks for playing Gridfire!']);
        return;
      case undefined:
        display.write(['Invalid choice! Try again.']);
        await sleep(MENU_ERROR_DELAY_MS);
        break;
    }
  }
}
