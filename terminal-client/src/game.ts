import { setTimeout as delay } from 'node:timers/promises';
import { World, type SessionSummary } from '../../world/index';
import { CONTROLS_PROMPT, parseCommand } from './input';
import { describeEvents, renderFrame, renderGameOver } from './renderer';
import { recordHighScore } from './highScore';
import type { SessionDeps } from './types';

export const RETURN_PROMPT = 'Press enter to return to menu...';

/**
 * Play one session: load the high score, tick the world with one input line
 * per tick until the player quits or runs out of health, then save the score
 * if it beat the loaded one.
 */
export async function playSession(deps: SessionDeps): Promise<SessionSummary> {
  const { store, input, display, color } = deps;
  const sleep = deps.sleep ?? ((ms: number) => delay(ms));

  const highScore = await store.load();
  const world = new World({ rng: deps.rng, highScore });
  let messages: string[] = [];

  while (!world.isSessionOver()) {
    display.clear();
    display.write(renderFrame(world.getSnapshot(), messages, color));

    const line = await input.nextLine(CONTROLS_PROMPT);
    const result = world.tick(parseCommand(line));
    if (!result.ok) {
      console.warn(`[Game] Action rejected (${result.error.code}): ${result.error.message}`);
      messages = [];
      continue;
    }
    messages = describeEvents(result.value, color);

    if (!world.isSessionOver()) {
      await sleep(Math.max(0, deps.tickDelayMs));
    }
  }

  const summary = world.endSession();
  display.write([...messages, ...renderGameOver(summary, color)]);
  await recordHighScore(store, summary);

  await input.nextLine(RETURN_PROMPT);
  return summary;
}
