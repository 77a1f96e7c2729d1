export interface RetryPolicy {
  timeoutMs: number;
  retries: number;
  retryBackoffMs: number;
}

export interface HttpRequestOptions {
  policy: RetryPolicy;
  // Aborted when the inbound request goes away
  signal?: AbortSignal;
}

const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);

export class HttpTimeoutError extends Error {
  constructor(readonly url: string, readonly timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = 'HttpTimeoutError';
  }
}

export class HttpAbortedError extends Error {
  constructor() {
    super('Request aborted by caller');
    this.name = 'HttpAbortedError';
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function attempt(url: string, init: RequestInit, options: HttpRequestOptions): Promise<Response> {
  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.policy.timeoutMs);

  const onAbort = () => controller.abort();
  options.signal?.addEventListener('abort', onAbort, { once: true });

  try {
    return await fetch(url, { ...init, signal: controller.signal });
  } catch (error) {
    if (options.signal?.aborted) throw new HttpAbortedError();
    if (timedOut) throw new HttpTimeoutError(url, options.policy.timeoutMs);
    throw error;
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener('abort', onAbort);
  }
}

/**
 * fetch with a per-attempt timeout and exponential backoff on 429/5xx,
 * timeouts and network errors. Caller aborts are never retried.
 */
export async function requestWithRetries(
  url: string,
  init: RequestInit,
  options: HttpRequestOptions
): Promise<Response> {
  const { retries, retryBackoffMs } = options.policy;

  for (let tries = 0; ; tries++) {
    if (options.signal?.aborted) throw new HttpAbortedError();

    try {
      const response = await attempt(url, init, options);
      if (RETRYABLE_STATUSES.has(response.status) && tries < retries) {
        await response.body?.cancel();
        await sleep(retryBackoffMs * 2 ** tries);
        continue;
      }
      return response;
    } catch (error) {
      if (error instanceof HttpAbortedError || tries >= retries) throw error;
      await sleep(retryBackoffMs * 2 ** tries);
    }
  }
}
