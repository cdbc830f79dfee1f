import type { Rng } from '../../world/index';
import type { HighScoreStore } from './highScore';

/** Line-based input; resolves with the raw line the user typed */
export interface InputSource {
  nextLine(prompt: string): Promise<string>;
  close(): void;
}

export interface Display {
  clear(): void;
  write(lines: readonly string[]): void;
}

export interface SessionDeps {
  store: HighScoreStore;
  input: InputSource;
  display: Display;
  rng?: Rng;
  tickDelayMs: number;
  color: boolean;
  /** Inter-tick pause; replaced in tests */
  sleep?: (ms: number) => Promise<void>;
}
