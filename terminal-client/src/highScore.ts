import { readFile, writeFile } from 'node:fs/promises';
import type { SessionSummary } from '../../world/index';

/**
 * Durable storage for the single best score.
 * Implementations log I/O failures and degrade to 0 / no-op instead of throwing.
 */
export interface HighScoreStore {
  load(): Promise<number>;
  save(score: number): Promise<void>;
}

/** Leading integer of the stored text; anything else reads as 0 */
export function parseHighScore(raw: string): number {
  const value = Number.parseInt(raw.trim(), 10);
  return Number.isFinite(value) && value > 0 ? value : 0;
}

function isMissingFile(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}

export class FileHighScoreStore implements HighScoreStore {
  constructor(private readonly path: string) {}

  async load(): Promise<number> {
    try {
      const raw = await readFile(this.path, 'utf8');
      return parseHighScore(raw);
    } catch (e) {
      if (!isMissingFile(e)) {
        console.warn(`[HighScore] Could not read ${this.path}, using 0:`, e);
      }
      return 0;
    }
  }

  async save(score: number): Promise<void> {
    try {
      await writeFile(this.path, String(Math.max(0, Math.floor(score))), 'utf8');
    } catch (e) {
      console.error(`[HighScore] Could not write ${this.path}:`, e);
    }
  }
}

/**
 * Persist the final score when it beats the one loaded at session start.
 * Returns true when a save was made.
 */
export async function recordHighScore(store: HighScoreStore, summary: SessionSummary): Promise<boolean> {
  if (!summary.isNewHighScore) {
    return false;
  }
  await store.save(summary.finalScore);
  return true;
}
