import { loadConfig } from '../../config';

export const TEST_ENV: Record<string, string> = {
  NODE_ENV: 'test',
  API_BASE_URL: 'http://localhost:3000',
  DATABASE_URL: 'postgres://localhost:5432/assistme_test',
  ENCRYPTION_KEY: 'test-encryption-key',
  JWT_SECRET: 'test-secret',
  GOOGLE_CLIENT_ID: 'test-client-id',
  GOOGLE_CLIENT_SECRET: 'test-client-secret',
  HTTP_TIMEOUT_MS: '2000',
  HTTP_RETRIES: '0',
  HTTP_RETRY_BACKOFF_MS: '0',
};

export const testConfig = loadConfig(TEST_ENV);

export const CALLBACK_URL = 'http://localhost:3000/api/v1/integrations/callback';

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export type FetchSpy = jest.SpyInstance<ReturnType<typeof fetch>, Parameters<typeof fetch>>;

/**
 * URL and form body of the nth request a fetch spy saw
 */
export function tokenRequest(fetchMock: FetchSpy, call = 0): { url: string; body: URLSearchParams } {
  const [url, init] = fetchMock.mock.calls[call];
  return { url: String(url), body: new URLSearchParams(String(init?.body)) };
}

/**
 * A controllable clock for TTL and expiry checks
 */
export class TestClock {
  private current: Date;

  constructor(start = '2026-03-02T09:00:00.000Z') {
    this.current = new Date(start);
  }

  now = (): Date => new Date(this.current.getTime());

  advance(seconds: number): void {
    this.current = new Date(this.current.getTime() + seconds * 1000);
  }
}
