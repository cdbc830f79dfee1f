import { createInterface } from 'node:readline';
import type { PlayerAction } from '../../world/index';
import type { InputSource } from './types';

export const QUIT_KEY = 'q';
export const CONTROLS_PROMPT = 'Move: W/A/S/D, Shoot: F, Quit: Q >> ';

/**
 * Map a typed line to an action using its first character.
 * Unknown keys and empty lines are an idle tick.
 */
export function parseCommand(line: string): PlayerAction {
  const key = line.trim().charAt(0).toLowerCase();
  switch (key) {
    case 'w':
      return { type: 'MOVE', direction: 'UP' };
    case 's':
      return { type: 'MOVE', direction: 'DOWN' };
    case 'a':
      return { type: 'MOVE', direction: 'LEFT' };
    case 'd':
      return { type: 'MOVE', direction: 'RIGHT' };
    case 'f':
      return { type: 'SHOOT' };
    case QUIT_KEY:
      return { type: 'QUIT' };
    default:
      return { type: 'IDLE' };
  }
}

/**
 * Line input over a terminal. Lines typed ahead of a prompt are queued and
 * handed out in order; once the input closes and the queue is drained every
 * read answers with the quit key.
 */
export function createTerminalInput(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): InputSource {
  const rl = createInterface({ input, output });
  const buffered: string[] = [];
  const waiting: Array<(line: string) => void> = [];
  let closed = false;

  rl.on('line', line => {
    const resolve = waiting.shift();
    if (resolve) resolve(line);
    else buffered.push(line);
  });
  rl.once('close', () => {
    closed = true;
    for (const resolve of waiting.splice(0)) resolve(QUIT_KEY);
  });

  return {
    nextLine(prompt: string): Promise<string> {
      if (!closed) {
        rl.setPrompt(prompt);
        rl.prompt();
      }
      const line = buffered.shift();
      if (line !== undefined) return Promise.resolve(line);
      if (closed) return Promise.resolve(QUIT_KEY);
      return new Promise(resolve => waiting.push(resolve));
    },
    close() {
      rl.close();
    },
  };
}
