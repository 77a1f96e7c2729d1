import { gmail_v1 } from 'googleapis';
import { GmailApi, ListMessagesQuery, MessagePage } from '../../services/integrations/gmail.client';

export interface MessageFixture {
  id: string;
  threadId?: string;
  subject: string;
  from: string;
  to?: string;
  body: string;
  labels?: string[];
}

function encode(text: string): string {
  return Buffer.from(text, 'utf-8').toString('base64url');
}

export function buildMessage(fixture: MessageFixture): gmail_v1.Schema$Message {
  return {
    id: fixture.id,
    threadId: fixture.threadId ?? `thread-${fixture.id}`,
    snippet: fixture.body.slice(0, 40),
    labelIds: fixture.labels ?? ['INBOX'],
    payload: {
      mimeType: 'multipart/alternative',
      headers: [
        { name: 'Subject', value: fixture.subject },
        { name: 'From', value: fixture.from },
        { name: 'To', value: fixture.to ?? 'owner@example.com' },
        { name: 'Date', value: 'Mon, 2 Mar 2026 09:00:00 +0000' },
      ],
      parts: [
        { mimeType: 'text/html', body: { data: encode(`<p>${fixture.body}</p>`) } },
        { mimeType: 'text/plain', body: { data: encode(fixture.body) } },
      ],
    },
  };
}

/**
 * In-process mailbox standing in for the Gmail REST API
 */
export class FakeGmailApi implements GmailApi {
  readonly messages = new Map<string, gmail_v1.Schema$Message>();
  readonly listCalls: Array<{ accessToken: string; query: ListMessagesQuery }> = [];
  readonly accessTokens: string[] = [];
  nextPageToken: string | null = null;
  failure: unknown = null;
  inFlight = 0;
  maxInFlight = 0;
  private gate: Promise<void> | null = null;
  private onEnter: (() => void) | null = null;

  /**
   * Parks every call until `release` runs; `entered` resolves once the
   * first call is parked.
   */
  hold(): { entered: Promise<void>; release: () => void } {
    let release: () => void = () => undefined;
    this.gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const entered = new Promise<void>((resolve) => {
      this.onEnter = resolve;
    });
    return {
      entered,
      release: () => {
        this.gate = null;
        release();
      },
    };
  }

  add(...fixtures: MessageFixture[]): this {
    for (const fixture of fixtures) {
      this.messages.set(fixture.id, buildMessage(fixture));
    }
    return this;
  }

  async listMessages(accessToken: string, query: ListMessagesQuery): Promise<MessagePage> {
    this.accessTokens.push(accessToken);
    this.listCalls.push({ accessToken, query });
    await this.waitAtGate();
    this.throwIfFailing();
    return {
      ids: Array.from(this.messages.keys()).slice(0, query.maxResults),
      nextPageToken: this.nextPageToken,
    };
  }

  async getMessage(accessToken: string, messageId: string): Promise<gmail_v1.Schema$Message> {
    this.accessTokens.push(accessToken);
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      await this.waitAtGate();
      // let sibling requests start before this one settles
      await new Promise<void>((resolve) => setImmediate(resolve));
      this.throwIfFailing();
      const message = this.messages.get(messageId);
      if (!message) {
        throw Object.assign(new Error('Requested entity was not found.'), { response: { status: 404 } });
      }
      return message;
    } finally {
      this.inFlight -= 1;
    }
  }

  async getThread(accessToken: string, threadId: string): Promise<gmail_v1.Schema$Thread> {
    this.accessTokens.push(accessToken);
    await this.waitAtGate();
    this.throwIfFailing();
    const messages = Array.from(this.messages.values()).filter((message) => message.threadId === threadId);
    return { id: threadId, historyId: '42', messages };
  }

  private async waitAtGate(): Promise<void> {
    if (!this.gate) return;
    const gate = this.gate;
    this.onEnter?.();
    this.onEnter = null;
    await gate;
  }

  private throwIfFailing(): void {
    if (this.failure !== null) {
      throw this.failure;
    }
  }
}
