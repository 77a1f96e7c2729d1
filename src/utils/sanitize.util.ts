const MAX_DETAIL_LENGTH = 200;
const SENSITIVE_PATTERNS =
  /("?(?:access_token|refresh_token|id_token|client_secret|code|api_key|secret|password|token)"?\s*[:=]\s*"?)([^"&\s]{4})[^"&\s]*/gi;
const OAUTH_ERROR_CODE = /^[a-z][a-z0-9_]{0,63}$/;

/**
 * Truncate and redact a provider response body. The result is only fit for
 * logs, never for a caller.
 */
export function sanitizeProviderResponse(body: string): string {
  const truncated =
    body.length > MAX_DETAIL_LENGTH ? `${body.slice(0, MAX_DETAIL_LENGTH)}...[truncated]` : body;
  return truncated.replace(SENSITIVE_PATTERNS, '$1$2***REDACTED***');
}

/**
 * Pull the RFC 6749 `error` code (e.g. "invalid_grant") out of a token
 * endpoint response. Anything that isn't a plain identifier is dropped.
 */
export function extractOAuthErrorCode(body: string): string | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return null;
  }

  if (!parsed || typeof parsed !== 'object' || !('error' in parsed)) return null;
  const code = parsed.error;
  return typeof code === 'string' && OAUTH_ERROR_CODE.test(code) ? code : null;
}

/**
 * Same rule for error codes a provider sends back on the callback redirect.
 */
export function sanitizeErrorCode(raw: unknown): string {
  return typeof raw === 'string' && OAUTH_ERROR_CODE.test(raw) ? raw : 'authorization_failed';
}
