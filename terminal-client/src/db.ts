import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { HighScoreStore } from './highScore';

const HIGH_SCORES_TABLE = 'high_scores';

export interface QueryError {
  message: string;
}

export interface QueryResult<T> {
  data: T | null;
  error: QueryError | null;
}

// Create Supabase client for a short-lived CLI process
export function createSupabase(url: string, serviceKey: string, fetchImpl?: typeof fetch): SupabaseClient {
  return createClient(url, serviceKey, {
    db: {
      schema: 'public'
    },
    auth: {
      persistSession: false,
      autoRefreshToken: false
    },
    global: {
      fetch: fetchImpl
    }
  });
}

// Retry wrapper for Supabase queries
export async function withRetry<T>(
  operation: () => PromiseLike<QueryResult<T>>,
  maxRetries: number = 3,
  delayMs: number = 1000
): Promise<QueryResult<T>> {
  let lastError: QueryError | null = null;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    const result = await operation();

    if (!result.error) {
      return result;
    }

    lastError = result.error;
    console.warn(`[DB] Query attempt ${attempt}/${maxRetries} failed:`, result.error.message);

    if (attempt < maxRetries) {
      await new Promise(resolve => setTimeout(resolve, delayMs * attempt));
    }
  }

  return { data: null, error: lastError };
}

// Score column of a high_scores row, 0 for anything unexpected
export function readScoreRow(row: unknown): number {
  if (typeof row !== 'object' || row === null || !('score' in row)) {
    return 0;
  }
  const { score } = row;
  return typeof score === 'number' && Number.isFinite(score) && score > 0 ? Math.floor(score) : 0;
}

export interface RetryOptions {
  maxRetries: number;
  delayMs: number;
}

/**
 * High score kept in the `high_scores` table, one row per player name.
 * See sql/high_scores.sql for the schema.
 */
export class SupabaseHighScoreStore implements HighScoreStore {
  constructor(
    private readonly client: SupabaseClient,
    private readonly playerName: string,
    private readonly retry: RetryOptions = { maxRetries: 3, delayMs: 1000 }
  ) {}

  async load(): Promise<number> {
    try {
      const { data, error } = await withRetry<unknown>(() =>
        this.client
          .from(HIGH_SCORES_TABLE)
          .select('score')
          .eq('player_name', this.playerName)
          .maybeSingle(),
        this.retry.maxRetries,
        this.retry.delayMs
      );

      if (error) {
        console.error('[DB] loadHighScore error:', error.message);
        return 0;
      }
      return readScoreRow(data);
    } catch (e) {
      console.error('[DB] loadHighScore failed:', e);
      return 0;
    }
  }

  async save(score: number): Promise<void> {
    try {
      const { error } = await withRetry<unknown>(() =>
        this.client
          .from(HIGH_SCORES_TABLE)
          .upsert(
            { player_name: this.playerName, score, updated_at: new Date().toISOString() },
            { onConflict: 'player_name' }
          ),
        this.retry.maxRetries,
        this.retry.delayMs
      );

      if (error) {
        console.error('[DB] saveHighScore error:', error.message);
      }
    } catch (e) {
      console.error('[DB] saveHighScore failed:', e);
    }
  }
}
