import { createSeededRng } from '../../world/index';
import {
  HIGH_SCORE_FILE,
  PLAYER_NAME,
  RNG_SEED,
  SUPABASE_SERVICE_KEY,
  SUPABASE_URL,
  TICK_DELAY_MS,
  USE_COLOR,
} from './config';
import { FileHighScoreStore, type HighScoreStore } from './highScore';
import { SupabaseHighScoreStore, createSupabase } from './db';
import { createTerminalInput } from './input';
import { createTerminalDisplay } from './renderer';
import { runMenu } from './menu';

function createHighScoreStore(): HighScoreStore {
  if (SUPABASE_URL && SUPABASE_SERVICE_KEY) {
    console.log(`[HighScore] Using Supabase table for player "${PLAYER_NAME}"`);
    return new SupabaseHighScoreStore(createSupabase(SUPABASE_URL, SUPABASE_SERVICE_KEY), PLAYER_NAME);
  }
  return new FileHighScoreStore(HIGH_SCORE_FILE);
}

async function main() {
  const input = createTerminalInput();
  try {
    await runMenu({
      store: createHighScoreStore(),
      input,
      display: createTerminalDisplay(),
      rng: RNG_SEED === undefined ? undefined : createSeededRng(RNG_SEED),
      tickDelayMs: TICK_DELAY_MS,
      color: USE_COLOR,
    });
  } finally {
    input.close();
  }
}

main().catch(err => {
  console.error('Failed to run game:', err);
  process.exit(1);
});
