import Anthropic from '@anthropic-ai/sdk';
import { AnthropicSettings } from '../../config';
import { mapWithConcurrency } from '../../utils/concurrency.util';

// Claude calls in flight per email listing
export const SUMMARY_CONCURRENCY = 3;

const MAX_SUMMARY_TOKENS = 200;
const MAX_CONTENT_CHARS = 6_000;

const SYSTEM_PROMPT =
  'You summarize emails into 1-2 concise sentences. ' +
  'Focus on the main request, decision, or next step. ' +
  'Do not include sensitive details or signatures.';

export interface SummarizableEmail {
  subject: string;
  from: string;
  to: string;
  date: string;
  snippet: string;
  body: string;
}

export interface SummaryRequest {
  model: string;
  max_tokens: number;
  system: string;
  messages: Array<{ role: 'user'; content: string }>;
}

export interface SummaryResponse {
  content: Array<{ type: string; text?: string }>;
}

/**
 * The part of the Anthropic client the summarizer uses
 */
export interface SummaryClient {
  messages: {
    create(request: SummaryRequest, options?: { signal?: AbortSignal }): Promise<SummaryResponse>;
  };
}

export function createSummaryClient(settings: AnthropicSettings): SummaryClient | null {
  if (!settings.apiKey) {
    console.log('ℹ Email summaries disabled: ANTHROPIC_API_KEY not set');
    return null;
  }

  return new Anthropic({
    apiKey: settings.apiKey,
    timeout: settings.timeoutMs,
    maxRetries: settings.maxRetries,
  });
}

function buildPrompt(email: SummarizableEmail, content: string): string {
  return [
    `Subject: ${email.subject}`,
    `From: ${email.from}`,
    `To: ${email.to}`,
    `Date: ${email.date}`,
    '',
    'Email content:',
    content.slice(0, MAX_CONTENT_CHARS),
  ].join('\n');
}

/**
 * One- or two-sentence email summaries from Claude. Summaries are best
 * effort: without a client, or when a call fails, the summary is null.
 */
export class EmailSummaryService {
  constructor(
    private readonly client: SummaryClient | null,
    private readonly settings: Pick<AnthropicSettings, 'model'>
  ) {}

  async summarize(email: SummarizableEmail, signal?: AbortSignal): Promise<string | null> {
    if (!this.client) return null;

    const content = email.body.trim() || email.snippet.trim();
    if (!content) return null;

    try {
      const response = await this.client.messages.create(
        {
          model: this.settings.model,
          max_tokens: MAX_SUMMARY_TOKENS,
          system: SYSTEM_PROMPT,
          messages: [{ role: 'user', content: buildPrompt(email, content) }],
        },
        { signal }
      );

      const text = response.content.find((block) => block.type === 'text')?.text?.trim();
      return text || null;
    } catch (error) {
      if (!signal?.aborted) {
        console.warn(`⚠️  Email summary failed: ${error instanceof Error ? error.name : 'unknown error'}`);
      }
      return null;
    }
  }

  async summarizeAll<T extends SummarizableEmail>(
    emails: T[],
    signal?: AbortSignal
  ): Promise<Array<T & { summary: string | null }>> {
    return mapWithConcurrency(emails, SUMMARY_CONCURRENCY, async (email) => ({
      ...email,
      summary: await this.summarize(email, signal),
    }));
  }
}
