import { afterEach, describe, it, expect, vi } from 'vitest';
import {
  SupabaseHighScoreStore,
  createSupabase,
  readScoreRow,
  withRetry,
  type QueryResult,
  type RetryOptions,
} from '../db';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('withRetry', () => {
  it('returns the first successful result', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const results: QueryResult<number>[] = [
      { data: null, error: { message: 'timeout' } },
      { data: 7, error: null },
    ];
    const operation = vi.fn(async (): Promise<QueryResult<number>> => results.shift() ?? { data: null, error: { message: 'exhausted' } });

    await expect(withRetry(operation, 3, 0)).resolves.toEqual({ data: 7, error: null });
    expect(operation).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenCalledWith('[DB] Query attempt 1/3 failed:', 'timeout');
  });

  it('gives up after the last attempt with the last error', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    let attempt = 0;
    const operation = vi.fn(async (): Promise<QueryResult<number>> => {
      attempt++;
      return { data: null, error: { message: `failure ${attempt}` } };
    });

    await expect(withRetry(operation, 2, 0)).resolves.toEqual({ data: null, error: { message: 'failure 2' } });
    expect(operation).toHaveBeenCalledTimes(2);
  });
});

describe('readScoreRow', () => {
  it('reads a positive score', () => {
    expect(readScoreRow({ score: 42 })).toBe(42);
  });

  it('treats missing or malformed rows as 0', () => {
    expect(readScoreRow(null)).toBe(0);
    expect(readScoreRow({})).toBe(0);
    expect(readScoreRow({ score: '42' })).toBe(0);
    expect(readScoreRow({ score: -3 })).toBe(0);
  });
});

const TEST_URL = 'http://localhost:54321';
const NO_WAIT: RetryOptions = { maxRetries: 2, delayMs: 0 };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function storeWith(fetchImpl: typeof fetch): SupabaseHighScoreStore {
  return new SupabaseHighScoreStore(createSupabase(TEST_URL, 'test-secret', fetchImpl), 'ada', NO_WAIT);
}

describe('SupabaseHighScoreStore', () => {
  it('loads the score row of the player', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse([{ score: 42 }]));

    await expect(storeWith(fetchMock).load()).resolves.toBe(42);
    const url = String(fetchMock.mock.calls[0][0]);
    expect(url).toContain('/rest/v1/high_scores?');
    expect(url).toContain('player_name=eq.ada');
  });

  it('loads 0 when the player has no row yet', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse([]));
    await expect(storeWith(fetchMock).load()).resolves.toBe(0);
  });

  it('loads 0 when the query fails', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const fetchMock = vi.fn<typeof fetch>(async () =>
      jsonResponse({ message: 'permission denied', code: '42501', details: null, hint: null }, 400)
    );

    await expect(storeWith(fetchMock).load()).resolves.toBe(0);
    expect(error).toHaveBeenCalledWith('[DB] loadHighScore error:', 'permission denied');
  });

  it('loads 0 when the client throws', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse([{ score: 42 }]));
    const client = createSupabase(TEST_URL, 'test-secret', fetchMock);
    vi.spyOn(client, 'from').mockImplementation(() => {
      throw new Error('client unavailable');
    });

    await expect(new SupabaseHighScoreStore(client, 'ada', NO_WAIT).load()).resolves.toBe(0);
    expect(error).toHaveBeenCalledTimes(1);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('upserts the score keyed on the player name', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => new Response(null, { status: 201 }));

    await expect(storeWith(fetchMock).save(42)).resolves.toBeUndefined();
    const [input, init] = fetchMock.mock.calls[0];
    expect(String(input)).toContain('on_conflict=player_name');
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({ player_name: 'ada', score: 42, updated_at: expect.any(String) });
  });

  it('logs and carries on when the upsert fails', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const fetchMock = vi.fn<typeof fetch>(async () =>
      jsonResponse({ message: 'table missing', code: '42P01', details: null, hint: null }, 400)
    );

    await expect(storeWith(fetchMock).save(42)).resolves.toBeUndefined();
    expect(error).toHaveBeenCalledWith('[DB] saveHighScore error:', 'table missing');
  });
});
