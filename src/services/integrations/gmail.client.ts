import { google, gmail_v1 } from 'googleapis';
import { RetryPolicy } from '../../utils/http.util';

export interface ListMessagesQuery {
  maxResults: number;
  q?: string;
  labelIds?: string[];
  pageToken?: string;
}

export interface MessagePage {
  ids: string[];
  nextPageToken: string | null;
}

/**
 * The slice of the Gmail REST API the provider uses. Every call takes the
 * caller's access token and abort signal.
 */
export interface GmailApi {
  listMessages(accessToken: string, query: ListMessagesQuery, signal?: AbortSignal): Promise<MessagePage>;
  getMessage(accessToken: string, messageId: string, signal?: AbortSignal): Promise<gmail_v1.Schema$Message>;
  getThread(accessToken: string, threadId: string, signal?: AbortSignal): Promise<gmail_v1.Schema$Thread>;
}

/**
 * googleapis-backed Gmail client
 */
export class GoogleGmailApi implements GmailApi {
  constructor(private readonly http: RetryPolicy) {}

  async listMessages(accessToken: string, query: ListMessagesQuery, signal?: AbortSignal): Promise<MessagePage> {
    const response = await this.client(accessToken).users.messages.list(
      {
        userId: 'me',
        maxResults: query.maxResults,
        q: query.q,
        labelIds: query.labelIds,
        pageToken: query.pageToken,
      },
      this.requestOptions(signal)
    );

    const messages = response.data.messages || [];
    return {
      ids: messages.map((msg) => msg.id).filter((id): id is string => Boolean(id)),
      nextPageToken: response.data.nextPageToken || null,
    };
  }

  async getMessage(accessToken: string, messageId: string, signal?: AbortSignal): Promise<gmail_v1.Schema$Message> {
    const response = await this.client(accessToken).users.messages.get(
      { userId: 'me', id: messageId, format: 'full' },
      this.requestOptions(signal)
    );
    return response.data;
  }

  async getThread(accessToken: string, threadId: string, signal?: AbortSignal): Promise<gmail_v1.Schema$Thread> {
    const response = await this.client(accessToken).users.threads.get(
      { userId: 'me', id: threadId, format: 'full' },
      this.requestOptions(signal)
    );
    return response.data;
  }

  private client(accessToken: string): gmail_v1.Gmail {
    const auth = new google.auth.OAuth2();
    auth.setCredentials({ access_token: accessToken });
    return google.gmail({ version: 'v1', auth });
  }

  private requestOptions(signal?: AbortSignal) {
    return {
      signal,
      timeout: this.http.timeoutMs,
      retryConfig: {
        retry: this.http.retries,
        retryDelay: this.http.retryBackoffMs,
        statusCodesToRetry: [[429, 429], [500, 599]],
      },
    };
  }
}
