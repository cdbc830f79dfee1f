import 'dotenv/config';

export const TICK_DELAY_MS = readInt(process.env.TICK_DELAY_MS, 150);
export const MENU_ERROR_DELAY_MS = 500;
export const HIGH_SCORE_FILE = process.env.HIGH_SCORE_FILE || 'highscore.txt';

// Seeds the world for reproducible sessions; unset means Math.random
export const RNG_SEED = readOptionalInt(process.env.RNG_SEED);

export const PLAYER_NAME = process.env.PLAYER_NAME || 'player';
export const USE_COLOR = !process.env.NO_COLOR;

// Optional remote high score; the local file is used when either is missing
export const SUPABASE_URL = process.env.SUPABASE_URL || '';
export const SUPABASE_SERVICE_KEY = process.env.SUPABASE_SERVICE_KEY || '';

function readOptionalInt(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number.parseInt(raw, 10);
  return Number.isFinite(value) ? value : undefined;
}

function readInt(raw: string | undefined, fallback: number): number {
  return readOptionalInt(raw) ?? fallback;
}
