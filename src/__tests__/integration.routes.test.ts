/**
 * Tests for the HTTP surface: auth, OAuth redirects and the
 * {success, data, error} execute envelope
 */

import { Server } from 'http';
import { createApp } from '../app';
import { createContainer } from '../bootstrap';
import { SummaryRequest, SummaryResponse } from '../services/ai/email-summary.service';
import { AuthService } from '../services/auth/auth.service';
import { GMAIL_TOKEN_ENDPOINT } from '../services/integrations/gmail.provider';
import { FakeGmailApi } from './helpers/fake-gmail.api';
import {
  InMemoryIntegrationRepository,
  InMemoryOAuthStateRepository,
} from './helpers/in-memory.repositories';
import { jsonResponse, testConfig } from './helpers/fixtures';

const REDIRECT = 'https://app.example.com/settings/integrations';

async function readObject(response: Response): Promise<Record<string, unknown>> {
  const body: unknown = await response.json();
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new Error(`expected a JSON object, got ${JSON.stringify(body)}`);
  }
  return Object.fromEntries(Object.entries(body));
}

describe('Integration routes', () => {
  const realFetch = global.fetch;
  const auth = new AuthService('test-secret');
  const ownerToken = auth.signToken('owner-1', 'owner@example.com');
  const otherToken = auth.signToken('owner-2', 'other@example.com');

  let server: Server;
  let baseUrl: string;
  let gmailApi: FakeGmailApi;
  let redisUp: boolean;
  const tokenEndpoint = jest.fn<Response, [URLSearchParams]>();
  const summarize = jest.fn<Promise<SummaryResponse>, [SummaryRequest, { signal?: AbortSignal }?]>();

  beforeAll(async () => {
    gmailApi = new FakeGmailApi().add({
      id: 'm1',
      subject: 'Quarterly plan',
      from: 'boss@example.com',
      body: 'Please review the plan before Friday.',
    });
    redisUp = true;

    const container = createContainer(testConfig, {
      integrations: new InMemoryIntegrationRepository(),
      oauthStates: new InMemoryOAuthStateRepository(),
      probes: {
        database: { query: async () => ({ rows: [] }) },
        redis: {
          ping: async () => {
            if (!redisUp) throw new Error('connection refused');
            return 'PONG';
          },
        },
      },
      providers: { gmailApi },
      summaryClient: { messages: { create: summarize } },
    });

    server = createApp(container.appDeps).listen(0);
    await new Promise<void>((resolve) => server.once('listening', () => resolve()));
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('server has no port');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  beforeEach(() => {
    tokenEndpoint.mockReset();
    tokenEndpoint.mockImplementation(() =>
      jsonResponse({ access_token: 'A', refresh_token: 'R', expires_in: 3600, token_type: 'Bearer' })
    );
    summarize.mockReset();
    summarize.mockImplementation(async (request) => ({
      content: [{ type: 'text', text: `Summary: ${request.messages[0].content.split('\n')[0]}` }],
    }));

    // Local requests reach the test server; the token endpoint is answered in-process
    jest.spyOn(global, 'fetch').mockImplementation(async (input, init) => {
      const url = input instanceof Request ? input.url : input.toString();
      if (url === GMAIL_TOKEN_ENDPOINT) {
        return tokenEndpoint(new URLSearchParams(String(init?.body)));
      }
      return realFetch(input, init);
    });
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  function api(path: string, init: RequestInit = {}, token: string | null = ownerToken): Promise<Response> {
    const headers = new Headers(init.headers);
    if (token) headers.set('Authorization', `Bearer ${token}`);
    if (init.body) headers.set('Content-Type', 'application/json');
    return fetch(`${baseUrl}${path}`, { ...init, headers, redirect: 'manual' });
  }

  async function connectAndAuthorize(token = ownerToken): Promise<string> {
    const connect = await api(
      '/api/v1/integrations/gmail/connect',
      { method: 'POST', body: JSON.stringify({ redirect_uri: REDIRECT }) },
      token
    );
    const { state } = await readObject(connect);

    const callback = await api(`/api/v1/integrations/callback?state=${state}&code=auth-code`, {}, null);
    const location = new URL(callback.headers.get('location') ?? '');
    return location.searchParams.get('integration_id') ?? '';
  }

  describe('health', () => {
    test('GET /health answers ok', async () => {
      const response = await api('/health', {}, null);

      expect(response.status).toBe(200);
      await expect(response.json()).resolves.toMatchObject({ status: 'ok' });
    });

    test('GET /health/dependencies reports a degraded dependency', async () => {
      redisUp = false;
      const response = await api('/health/dependencies', {}, null);
      redisUp = true;

      expect(response.status).toBe(503);
      await expect(response.json()).resolves.toMatchObject({
        status: 'degraded',
        dependencies: { database: 'ok', redis: 'error' },
      });
    });
  });

  describe('auth', () => {
    test('rejects requests without a token', async () => {
      const response = await api('/api/v1/integrations', {}, null);

      expect(response.status).toBe(401);
      await expect(response.json()).resolves.toEqual({ error: 'Not authenticated' });
    });

    test('rejects a token signed with another secret', async () => {
      const forged = new AuthService('another-secret').signToken('owner-1', 'owner@example.com');
      const response = await api('/api/v1/integrations', {}, forged);

      expect(response.status).toBe(401);
      await expect(response.json()).resolves.toEqual({ error: 'Invalid or expired token' });
    });

    test('accepts the session cookie', async () => {
      const response = await api('/api/v1/integrations', { headers: { Cookie: `assistme_token=${ownerToken}` } }, null);

      expect(response.status).toBe(200);
    });

    test('the provider catalogue is public', async () => {
      const response = await api('/api/v1/integrations/available', {}, null);

      expect(response.status).toBe(200);
      await expect(response.json()).resolves.toEqual([
        expect.objectContaining({ provider_type: 'gmail', name: 'Gmail' }),
      ]);
    });
  });

  describe('connect and callback', () => {
    test('connect returns the consent URL and state', async () => {
      const response = await api('/api/v1/integrations/gmail/connect', {
        method: 'POST',
        body: JSON.stringify({ redirect_uri: REDIRECT }),
      });

      expect(response.status).toBe(200);
      const body = await readObject(response);
      expect(new URL(String(body.authorization_url)).searchParams.get('state')).toBe(body.state);
    });

    test('connect validates the body', async () => {
      const response = await api('/api/v1/integrations/gmail/connect', {
        method: 'POST',
        body: JSON.stringify({ redirect_uri: 'not a url' }),
      });

      expect(response.status).toBe(400);
      await expect(response.json()).resolves.toMatchObject({ code: 'invalid_params' });
    });

    test('connect to an unknown provider is a 400', async () => {
      const response = await api('/api/v1/integrations/outlook/connect', {
        method: 'POST',
        body: JSON.stringify({ redirect_uri: REDIRECT }),
      });

      expect(response.status).toBe(400);
      await expect(response.json()).resolves.toEqual({
        error: 'Unknown or unavailable provider',
        code: 'unknown_provider',
      });
    });

    test('a successful callback redirects back with the integration id', async () => {
      const connect = await api('/api/v1/integrations/gmail/connect', {
        method: 'POST',
        body: JSON.stringify({ redirect_uri: REDIRECT }),
      });
      const { state } = await readObject(connect);

      const response = await api(`/api/v1/integrations/callback?state=${state}&code=auth-code`, {}, null);

      expect(response.status).toBe(302);
      const location = new URL(response.headers.get('location') ?? '');
      expect(`${location.origin}${location.pathname}`).toBe(REDIRECT);
      expect(location.searchParams.get('integration_status')).toBe('success');
      expect(location.searchParams.get('provider')).toBe('gmail');
      expect(location.searchParams.get('integration_id')).toMatch(/^[0-9a-f-]{36}$/);
      expect(tokenEndpoint.mock.calls[0][0].get('code')).toBe('auth-code');
    });

    test('a provider error redirects back with a sanitized code', async () => {
      const connect = await api('/api/v1/integrations/gmail/connect', {
        method: 'POST',
        body: JSON.stringify({ redirect_uri: REDIRECT }),
      });
      const { state } = await readObject(connect);

      const response = await api(`/api/v1/integrations/callback?state=${state}&error=access_denied`, {}, null);

      expect(response.status).toBe(302);
      const location = new URL(response.headers.get('location') ?? '');
      expect(location.searchParams.get('integration_status')).toBe('error');
      expect(location.searchParams.get('error')).toBe('access_denied');
      expect(tokenEndpoint).not.toHaveBeenCalled();
    });

    test('a failed exchange redirects back with token_exchange_failed', async () => {
      tokenEndpoint.mockImplementation(() => jsonResponse({ error: 'invalid_grant' }, 400));
      const connect = await api('/api/v1/integrations/gmail/connect', {
        method: 'POST',
        body: JSON.stringify({ redirect_uri: REDIRECT }),
      });
      const { state } = await readObject(connect);

      const response = await api(`/api/v1/integrations/callback?state=${state}&code=bad-code`, {}, null);

      expect(response.status).toBe(302);
      const location = new URL(response.headers.get('location') ?? '');
      expect(location.searchParams.get('integration_status')).toBe('error');
      expect(location.searchParams.get('error')).toBe('token_exchange_failed');
    });

    test('an unknown state is a 400 without a redirect', async () => {
      const response = await api('/api/v1/integrations/callback?state=never-issued&code=auth-code', {}, null);

      expect(response.status).toBe(400);
      await expect(response.json()).resolves.toEqual({
        error: 'Authorization request is invalid or has expired',
        code: 'invalid_state',
      });
    });

    test('a missing state is a 400', async () => {
      const response = await api('/api/v1/integrations/callback?code=auth-code', {}, null);

      expect(response.status).toBe(400);
      await expect(response.json()).resolves.toMatchObject({ code: 'invalid_state' });
    });
  });

  describe('integration endpoints', () => {
    let integrationId: string;

    beforeEach(async () => {
      integrationId = await connectAndAuthorize();
    });

    test('lists the owner integrations without token material', async () => {
      const response = await api('/api/v1/integrations');
      const body = await readObject(response);

      expect(response.status).toBe(200);
      expect(body.items).toEqual([
        {
          id: integrationId,
          provider_type: 'gmail',
          status: 'active',
          config: {},
          created_at: expect.any(String),
          updated_at: expect.any(String),
        },
      ]);
    });

    test('execute wraps the result in the envelope', async () => {
      const response = await api(`/api/v1/integrations/${integrationId}/execute`, {
        method: 'POST',
        body: JSON.stringify({ action: 'list_emails', params: { max_results: 5 } }),
      });

      expect(response.status).toBe(200);
      await expect(response.json()).resolves.toEqual({
        success: true,
        data: [expect.objectContaining({ id: 'm1', subject: 'Quarterly plan' })],
        error: null,
      });
    });

    test('execute reports failures in the envelope', async () => {
      const response = await api(`/api/v1/integrations/${integrationId}/execute`, {
        method: 'POST',
        body: JSON.stringify({ action: 'send_email', params: {} }),
      });

      expect(response.status).toBe(400);
      await expect(response.json()).resolves.toEqual({
        success: false,
        data: null,
        error: 'Unsupported action: send_email',
      });
    });

    test('execute without an action is a 400', async () => {
      const response = await api(`/api/v1/integrations/${integrationId}/execute`, {
        method: 'POST',
        body: JSON.stringify({ params: {} }),
      });

      expect(response.status).toBe(400);
      await expect(response.json()).resolves.toEqual({
        success: false,
        data: null,
        error: 'Invalid request body',
      });
    });

    test('emails combine the filter with the configured query', async () => {
      const patch = await api(`/api/v1/integrations/${integrationId}`, {
        method: 'PATCH',
        body: JSON.stringify({ config: { query: 'from:boss@example.com', label_ids: ['INBOX'] } }),
      });
      expect(patch.status).toBe(200);
      gmailApi.listCalls.length = 0;

      const response = await api(`/api/v1/integrations/${integrationId}/emails?filter=unread&max_results=3`);

      expect(response.status).toBe(200);
      await expect(response.json()).resolves.toEqual({
        items: [expect.objectContaining({ id: 'm1' })],
        next_page_token: null,
      });
      expect(gmailApi.listCalls[0].query).toEqual({
        maxResults: 3,
        q: 'is:unread from:boss@example.com',
        labelIds: ['INBOX'],
        pageToken: undefined,
      });
    });

    test('emails carry a summary per message', async () => {
      const response = await api(`/api/v1/integrations/${integrationId}/emails`);

      expect(response.status).toBe(200);
      await expect(response.json()).resolves.toEqual({
        items: [expect.objectContaining({ id: 'm1', summary: 'Summary: Subject: Quarterly plan' })],
        next_page_token: null,
      });
      expect(summarize).toHaveBeenCalledTimes(1);
      expect(summarize.mock.calls[0][0].model).toBe(testConfig.anthropic.model);
    });

    test('summarize=false skips the summaries', async () => {
      const response = await api(`/api/v1/integrations/${integrationId}/emails?summarize=false`);

      expect(response.status).toBe(200);
      await expect(response.json()).resolves.toEqual({
        items: [expect.objectContaining({ id: 'm1', summary: null })],
        next_page_token: null,
      });
      expect(summarize).not.toHaveBeenCalled();
    });

    test('a failed summary leaves the email listed with a null summary', async () => {
      summarize.mockRejectedValueOnce(new Error('overloaded'));

      const response = await api(`/api/v1/integrations/${integrationId}/emails`);

      expect(response.status).toBe(200);
      await expect(response.json()).resolves.toEqual({
        items: [expect.objectContaining({ id: 'm1', subject: 'Quarterly plan', summary: null })],
        next_page_token: null,
      });
    });

    test('emails reject a summarize value other than true or false', async () => {
      const response = await api(`/api/v1/integrations/${integrationId}/emails?summarize=maybe`);

      expect(response.status).toBe(400);
      expect(summarize).not.toHaveBeenCalled();
    });

    test('emails reject an unknown filter', async () => {
      const response = await api(`/api/v1/integrations/${integrationId}/emails?filter=starred`);

      expect(response.status).toBe(400);
    });

    test('another owner gets a 404', async () => {
      const response = await api(`/api/v1/integrations/${integrationId}/emails`, {}, otherToken);

      expect(response.status).toBe(404);
      await expect(response.json()).resolves.toEqual({ error: 'Integration not found', code: 'not_found' });
    });

    test('an empty update is rejected', async () => {
      const response = await api(`/api/v1/integrations/${integrationId}`, {
        method: 'PATCH',
        body: JSON.stringify({}),
      });

      expect(response.status).toBe(400);
    });

    test('delete disconnects and later executes are refused', async () => {
      const removed = await api(`/api/v1/integrations/${integrationId}`, { method: 'DELETE' });
      expect(removed.status).toBe(204);

      const response = await api(`/api/v1/integrations/${integrationId}/execute`, {
        method: 'POST',
        body: JSON.stringify({ action: 'list_emails' }),
      });

      expect(response.status).toBe(409);
      await expect(response.json()).resolves.toEqual({
        success: false,
        data: null,
        error: 'Integration is not active',
      });
    });

    test('a malformed JSON body is a 400', async () => {
      const response = await api(`/api/v1/integrations/${integrationId}/execute`, {
        method: 'POST',
        body: '{"action":',
      });

      expect(response.status).toBe(400);
    });
  });

  test('unknown routes are a 404', async () => {
    const response = await api('/api/v1/nothing-here', {}, null);

    expect(response.status).toBe(404);
  });
});
