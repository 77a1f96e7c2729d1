import { google, gmail_v1 } from 'googleapis';
import { z } from 'zod';
import { AppConfig } from '../../config';
import { DecryptedTokens, ProviderDescriptor } from '../../types/integration.types';
import { mapWithConcurrency } from '../../utils/concurrency.util';
import { GmailApi, GoogleGmailApi, ListMessagesQuery } from './gmail.client';
import {
  InvalidParamsError,
  IntegrationError,
  RequestCancelledError,
  UnsupportedActionError,
  UpstreamActionError,
} from './integration.errors';
import { ActionParams, CallOptions, OAuth2ProviderService, isRecord } from './provider.service';
import type { ProviderRegistryBuilder } from './provider.registry';

export const GMAIL_AUTHORIZE_ENDPOINT = 'https://accounts.google.com/o/oauth2/v2/auth';
export const GMAIL_TOKEN_ENDPOINT = 'https://oauth2.googleapis.com/token';
export const GMAIL_OAUTH_SCOPES = ['https://www.googleapis.com/auth/gmail.readonly'];

// messages.get calls in flight per listing
export const GMAIL_FETCH_CONCURRENCY = 5;

export interface EmailSummary {
  id: string;
  thread_id: string | null;
  subject: string;
  from: string;
  to: string;
  date: string;
  snippet: string;
  body: string;
  labels: string[];
}

export interface EmailPage {
  emails: EmailSummary[];
  next_page_token: string | null;
}

export interface ThreadSummary {
  id: string;
  history_id: string | null;
  messages: EmailSummary[];
}

const listParams = z
  .object({
    max_results: z.coerce.number().int().min(1).max(100).default(10),
    query: z.string().max(500).optional(),
    label_ids: z.array(z.string().min(1)).max(20).optional(),
    page_token: z.string().max(512).optional(),
  })
  .strict();

const searchParams = listParams.extend({
  query: z.string().trim().min(1).max(500),
});

const getEmailParams = z.object({ message_id: z.string().min(1).max(256) }).strict();
const getThreadParams = z.object({ thread_id: z.string().min(1).max(256) }).strict();

type ListParams = z.infer<typeof listParams>;

const GMAIL_ACTIONS = ['list_emails', 'list_emails_page', 'search', 'get_email', 'get_threads'] as const;
type GmailAction = (typeof GMAIL_ACTIONS)[number];

function isGmailAction(action: string): action is GmailAction {
  return GMAIL_ACTIONS.some((known) => known === action);
}

function parseParams<T extends z.ZodTypeAny>(schema: T, params: ActionParams): z.infer<T> {
  const parsed = schema.safeParse(params);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.') || 'params');
    throw new InvalidParamsError(`Invalid parameters: ${Array.from(new Set(fields)).join(', ')}`);
  }
  return parsed.data;
}

/**
 * Extract body from message payload: first text/plain part, else text/html
 */
export function extractBody(payload: gmail_v1.Schema$MessagePart | undefined): string {
  if (!payload) return '';

  if (payload.body?.data && !payload.parts) {
    return Buffer.from(payload.body.data, 'base64url').toString('utf-8');
  }

  let html = '';
  for (const part of payload.parts || []) {
    if (part.mimeType === 'text/plain' && part.body?.data) {
      return Buffer.from(part.body.data, 'base64url').toString('utf-8');
    }
    if (part.mimeType === 'text/html' && part.body?.data && !html) {
      html = Buffer.from(part.body.data, 'base64url').toString('utf-8');
    }
    if (part.parts) {
      const nested = extractBody(part);
      if (nested) return nested;
    }
  }

  return html;
}

export function toEmailSummary(message: gmail_v1.Schema$Message): EmailSummary {
  const headers = message.payload?.headers || [];
  const getHeader = (name: string) =>
    headers.find((h) => h.name?.toLowerCase() === name)?.value || '';

  return {
    id: message.id || '',
    thread_id: message.threadId || null,
    subject: getHeader('subject'),
    from: getHeader('from'),
    to: getHeader('to'),
    date: getHeader('date'),
    snippet: message.snippet || '',
    body: extractBody(message.payload),
    labels: message.labelIds || [],
  };
}

function upstreamStatus(error: unknown): number | null {
  if (!isRecord(error)) return null;
  const status = isRecord(error.response) ? error.response.status : error.status;
  return typeof status === 'number' ? status : null;
}

export interface GmailProviderOptions {
  clientId: string;
  clientSecret: string;
  refreshMarginSeconds: number;
  http: AppConfig['http'];
  api?: GmailApi;
}

/**
 * Gmail integration: Google OAuth2 plus read-only mailbox actions
 */
export class GmailProvider extends OAuth2ProviderService {
  readonly providerType = 'gmail' as const;
  readonly descriptor: ProviderDescriptor = {
    provider_type: 'gmail',
    name: 'Gmail',
    description: 'Connect to Gmail',
    actions: [...GMAIL_ACTIONS],
    default_scopes: GMAIL_OAUTH_SCOPES,
  };

  private readonly api: GmailApi;

  constructor(options: GmailProviderOptions) {
    super({
      clientId: options.clientId,
      clientSecret: options.clientSecret,
      tokenEndpoint: GMAIL_TOKEN_ENDPOINT,
      defaultScopes: GMAIL_OAUTH_SCOPES,
      refreshMarginSeconds: options.refreshMarginSeconds,
      http: options.http,
    });
    this.api = options.api ?? new GoogleGmailApi(options.http);
  }

  buildAuthorizationUrl(stateToken: string, callbackUrl: string, scopes?: string[]): string {
    const client = new google.auth.OAuth2(this.settings.clientId, undefined, callbackUrl);
    return client.generateAuthUrl({
      access_type: 'offline', // Get refresh token
      prompt: 'consent', // Force consent to ensure refresh token
      include_granted_scopes: true,
      scope: scopes && scopes.length > 0 ? scopes : GMAIL_OAUTH_SCOPES,
      state: stateToken,
    });
  }

  async execute(
    tokens: DecryptedTokens,
    action: string,
    params: ActionParams,
    options: CallOptions = {}
  ): Promise<unknown> {
    if (!isGmailAction(action)) {
      throw new UnsupportedActionError(action);
    }

    const accessToken = tokens.accessToken;
    const { signal } = options;

    try {
      switch (action) {
        case 'list_emails':
          return (await this.listEmails(accessToken, parseParams(listParams, params), signal)).emails;
        case 'list_emails_page':
          return await this.listEmails(accessToken, parseParams(listParams, params), signal);
        case 'search':
          return (await this.listEmails(accessToken, parseParams(searchParams, params), signal)).emails;
        case 'get_email': {
          const { message_id } = parseParams(getEmailParams, params);
          return toEmailSummary(await this.api.getMessage(accessToken, message_id, signal));
        }
        case 'get_threads': {
          const { thread_id } = parseParams(getThreadParams, params);
          const thread = await this.api.getThread(accessToken, thread_id, signal);
          const summary: ThreadSummary = {
            id: thread.id || thread_id,
            history_id: thread.historyId || null,
            messages: (thread.messages || []).map(toEmailSummary),
          };
          return summary;
        }
      }
    } catch (error) {
      if (error instanceof IntegrationError) throw error;
      if (signal?.aborted) throw new RequestCancelledError();

      const status = upstreamStatus(error);
      console.error(`Gmail ${action} failed${status ? ` (HTTP ${status})` : ''}`);
      throw new UpstreamActionError(status, error instanceof Error ? error.name : undefined);
    }
  }

  private async listEmails(accessToken: string, params: ListParams, signal?: AbortSignal): Promise<EmailPage> {
    const query: ListMessagesQuery = {
      maxResults: params.max_results,
      q: params.query?.trim() || undefined,
      labelIds: params.label_ids,
      pageToken: params.page_token,
    };

    const page = await this.api.listMessages(accessToken, query, signal);
    const messages = await mapWithConcurrency(
      page.ids.slice(0, params.max_results),
      GMAIL_FETCH_CONCURRENCY,
      (id) => this.api.getMessage(accessToken, id, signal)
    );

    return {
      emails: messages.map(toEmailSummary),
      next_page_token: page.nextPageToken,
    };
  }
}

/**
 * Registers Gmail unless it is disabled or its OAuth client is not configured
 */
export function registerGmailProvider(
  builder: ProviderRegistryBuilder,
  config: Pick<AppConfig, 'google' | 'oauth' | 'http'>,
  api?: GmailApi
): void {
  const { clientId, clientSecret, gmailEnabled } = config.google;

  if (!gmailEnabled) {
    console.log('ℹ Gmail integration disabled');
    return;
  }
  if (!clientId || !clientSecret) {
    console.warn('⚠️  Gmail integration skipped: GOOGLE_CLIENT_ID / GOOGLE_CLIENT_SECRET not set');
    return;
  }

  builder.register(
    new GmailProvider({
      clientId,
      clientSecret,
      refreshMarginSeconds: config.oauth.refreshMarginSeconds,
      http: config.http,
      api,
    })
  );
}
