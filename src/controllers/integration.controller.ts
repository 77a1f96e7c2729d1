import { Request, Response } from 'express';
import { z } from 'zod';
import {
  ExecuteResponse,
  Integration,
  IntegrationSummary,
} from '../types/integration.types';
import { EmailSummaryService } from '../services/ai/email-summary.service';
import { IntegrationManager } from '../services/integrations/integration-manager.service';
import { IntegrationError, TokenExchangeError } from '../services/integrations/integration.errors';
import { isRecord } from '../services/integrations/provider.service';
import { sanitizeErrorCode } from '../utils/sanitize.util';

const connectBody = z.object({
  redirect_uri: z.string().url().max(2048),
  scopes: z.array(z.string().min(1).max(256)).max(20).optional(),
});

const updateBody = z
  .object({
    status: z.enum(['active', 'disconnected']).optional(),
    config: z.record(z.unknown()).optional(),
  })
  .refine((body) => body.status !== undefined || body.config !== undefined, {
    message: 'Nothing to update',
  });

const executeBody = z.object({
  action: z.string().min(1).max(64),
  params: z.record(z.unknown()).default({}),
});

const emailsQuery = z.object({
  query: z.string().max(500).optional(),
  filter: z.enum(['all', 'unread', 'tasks']).optional(),
  label_ids: z.union([z.string(), z.array(z.string())]).optional(),
  max_results: z.coerce.number().int().min(1).max(100).optional(),
  page_token: z.string().max(512).optional(),
  summarize: z
    .enum(['true', 'false'])
    .default('true')
    .transform((value) => value === 'true'),
});

const emailItems = z.array(
  z
    .object({
      subject: z.string(),
      from: z.string(),
      to: z.string(),
      date: z.string(),
      snippet: z.string(),
      body: z.string(),
    })
    .passthrough()
);

const EMAIL_FILTERS: Record<'all' | 'unread' | 'tasks', string> = {
  all: '',
  unread: 'is:unread',
  tasks: 'label:tasks',
};

export function toIntegrationSummary(integration: Integration): IntegrationSummary {
  return {
    id: integration.id,
    provider_type: integration.provider_type,
    status: integration.status,
    config: integration.config || {},
    created_at: new Date(integration.created_at).toISOString(),
    updated_at: new Date(integration.updated_at).toISOString(),
  };
}

function appendParams(uri: string, params: Record<string, string>): string {
  const url = new URL(uri);
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, value);
  }
  return url.toString();
}

/**
 * Aborted when the client goes away before we answer
 */
function abortOnDisconnect(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) controller.abort();
  });
  return controller.signal;
}

function sendError(res: Response, error: unknown, context: string): void {
  if (res.headersSent) return;

  if (error instanceof IntegrationError) {
    res.status(error.statusCode).json({ error: error.message, code: error.code });
    return;
  }

  console.error(`${context} failed:`, error);
  res.status(500).json({ error: 'Internal Server Error' });
}

function stringList(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const items = value.filter((item): item is string => typeof item === 'string' && item !== '');
  return items.length > 0 ? items : undefined;
}

/**
 * Integration endpoints: provider catalogue, OAuth connect/callback,
 * listing, updates, disconnection and action execution.
 */
export class IntegrationController {
  constructor(
    private readonly manager: IntegrationManager,
    private readonly summaries: EmailSummaryService
  ) {}

  /**
   * GET /api/v1/integrations/available
   */
  async listAvailable(_req: Request, res: Response): Promise<void> {
    res.json(this.manager.listAvailable());
  }

  /**
   * GET /api/v1/integrations
   */
  async list(req: Request, res: Response): Promise<void> {
    const ownerId = req.user?.userId;
    if (!ownerId) {
      res.status(401).json({ error: 'Not authenticated' });
      return;
    }

    try {
      const integrations = await this.manager.list(ownerId);
      res.json({ items: integrations.map(toIntegrationSummary) });
    } catch (error) {
      sendError(res, error, 'List integrations');
    }
  }

  /**
   * POST /api/v1/integrations/:provider/connect
   */
  async connect(req: Request, res: Response): Promise<void> {
    const ownerId = req.user?.userId;
    if (!ownerId) {
      res.status(401).json({ error: 'Not authenticated' });
      return;
    }

    const body = connectBody.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: 'redirect_uri must be a valid URL', code: 'invalid_params' });
      return;
    }

    try {
      const { authorizationUrl, stateToken } = await this.manager.connect(
        ownerId,
        req.params.provider,
        body.data.redirect_uri,
        { scopes: body.data.scopes }
      );
      res.json({ authorization_url: authorizationUrl, state: stateToken });
    } catch (error) {
      sendError(res, error, 'OAuth connect');
    }
  }

  /**
   * GET /api/v1/integrations/callback?state=...&code=... (or &error=...)
   * Redirects back to the redirect_uri given at connect time.
   */
  async callback(req: Request, res: Response): Promise<void> {
    const { state, code, error } = req.query;

    if (typeof state !== 'string' || state === '') {
      res.status(400).json({ error: 'Missing state parameter', code: 'invalid_state' });
      return;
    }

    try {
      if (typeof error === 'string' && error !== '') {
        const redirectUri = await this.manager.handleCallbackError(state);
        res.redirect(
          302,
          appendParams(redirectUri, { integration_status: 'error', error: sanitizeErrorCode(error) })
        );
        return;
      }

      const { integration, redirectUri } = await this.manager.handleCallback(
        state,
        typeof code === 'string' ? code : '',
        { signal: abortOnDisconnect(res) }
      );

      res.redirect(
        302,
        appendParams(redirectUri, {
          integration_status: 'success',
          provider: integration.provider_type,
          integration_id: integration.id,
        })
      );
    } catch (err) {
      if (err instanceof TokenExchangeError && err.redirectUri) {
        res.redirect(302, appendParams(err.redirectUri, { integration_status: 'error', error: err.code }));
        return;
      }
      sendError(res, err, 'OAuth callback');
    }
  }

  /**
   * PATCH /api/v1/integrations/:id
   */
  async update(req: Request, res: Response): Promise<void> {
    const ownerId = req.user?.userId;
    if (!ownerId) {
      res.status(401).json({ error: 'Not authenticated' });
      return;
    }

    const body = updateBody.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: 'Invalid update', code: 'invalid_params' });
      return;
    }

    try {
      const integration = await this.manager.update(ownerId, req.params.id, body.data);
      res.json(toIntegrationSummary(integration));
    } catch (error) {
      sendError(res, error, 'Update integration');
    }
  }

  /**
   * DELETE /api/v1/integrations/:id
   */
  async disconnect(req: Request, res: Response): Promise<void> {
    const ownerId = req.user?.userId;
    if (!ownerId) {
      res.status(401).json({ error: 'Not authenticated' });
      return;
    }

    try {
      await this.manager.disconnect(ownerId, req.params.id);
      res.status(204).end();
    } catch (error) {
      sendError(res, error, 'Disconnect integration');
    }
  }

  /**
   * POST /api/v1/integrations/:id/execute
   * Always answers {success, data, error}; error is a short caller-safe string.
   */
  async execute(req: Request, res: Response): Promise<void> {
    const ownerId = req.user?.userId;
    if (!ownerId) {
      res.status(401).json({ error: 'Not authenticated' });
      return;
    }

    const body = executeBody.safeParse(req.body);
    if (!body.success) {
      const response: ExecuteResponse = { success: false, data: null, error: 'Invalid request body' };
      res.status(400).json(response);
      return;
    }

    try {
      const data = await this.manager.execute(
        ownerId,
        req.params.id,
        body.data.action,
        body.data.params,
        { signal: abortOnDisconnect(res) }
      );
      const response: ExecuteResponse = { success: true, data, error: null };
      res.json(response);
    } catch (error) {
      if (res.headersSent) return;

      if (error instanceof IntegrationError) {
        const response: ExecuteResponse = { success: false, data: null, error: error.message };
        res.status(error.statusCode).json(response);
        return;
      }

      console.error('Execute action failed:', error);
      const response: ExecuteResponse = { success: false, data: null, error: 'Internal Server Error' };
      res.status(500).json(response);
    }
  }

  /**
   * GET /api/v1/integrations/:id/emails
   * Integration config supplies defaults for query, label_ids and max_results.
   * Each item carries a Claude summary unless summarize=false; it is null when
   * summaries are off or the summary could not be produced.
   */
  async listEmails(req: Request, res: Response): Promise<void> {
    const ownerId = req.user?.userId;
    if (!ownerId) {
      res.status(401).json({ error: 'Not authenticated' });
      return;
    }

    const query = emailsQuery.safeParse(req.query);
    if (!query.success) {
      res.status(400).json({ error: 'Invalid query parameters', code: 'invalid_params' });
      return;
    }

    try {
      const integration = await this.manager.get(ownerId, req.params.id);
      const config = integration.config || {};

      const configQuery = typeof config.query === 'string' ? config.query : undefined;
      const searchText = (query.data.query ?? configQuery ?? '').trim();
      const filterText = EMAIL_FILTERS[query.data.filter ?? 'all'];
      const combined = [filterText, searchText].filter(Boolean).join(' ');

      const labelIds =
        query.data.label_ids !== undefined
          ? stringList([query.data.label_ids].flat())
          : stringList(config.label_ids);

      const maxResults =
        query.data.max_results ??
        (typeof config.max_results === 'number' ? config.max_results : undefined);

      const params: Record<string, unknown> = {};
      if (combined) params.query = combined;
      if (labelIds) params.label_ids = labelIds;
      if (maxResults !== undefined) params.max_results = maxResults;
      if (query.data.page_token) params.page_token = query.data.page_token;

      const signal = abortOnDisconnect(res);
      const page = await this.manager.execute(ownerId, integration.id, 'list_emails_page', params, { signal });

      const parsed = emailItems.safeParse(isRecord(page) ? page.emails : undefined);
      const emails = parsed.success ? parsed.data : [];
      const items = query.data.summarize
        ? await this.summaries.summarizeAll(emails, signal)
        : emails.map((email) => ({ ...email, summary: null }));

      res.json({
        items,
        next_page_token: isRecord(page) && typeof page.next_page_token === 'string' ? page.next_page_token : null,
      });
    } catch (error) {
      sendError(res, error, 'List emails');
    }
  }
}
