import type { AppError } from '../../middleware/error-handler';

/**
 * Base class for every failure the integration gateway reports.
 *
 * `message` is the caller-facing text: short, generic, and free of tokens,
 * codes or upstream payloads. Internal detail, when there is any, goes in
 * `detail` and is only ever logged.
 */
export abstract class IntegrationError extends Error implements AppError {
  abstract readonly code: string;
  abstract readonly statusCode: number;
  readonly isOperational = true;
  readonly detail?: string;

  constructor(message: string, detail?: string) {
    super(message);
    this.name = new.target.name;
    this.detail = detail;
  }
}

export class UnknownProviderError extends IntegrationError {
  readonly code = 'unknown_provider';
  readonly statusCode = 400;

  constructor(readonly providerType: string) {
    super('Unknown or unavailable provider');
  }
}

export class InvalidOrExpiredStateError extends IntegrationError {
  readonly code = 'invalid_state';
  readonly statusCode = 400;

  constructor() {
    super('Authorization request is invalid or has expired');
  }
}

export class TokenExchangeError extends IntegrationError {
  readonly code = 'token_exchange_failed';
  readonly statusCode = 502;
  // Where the caller asked to land after the flow; set once the state is known
  readonly redirectUri?: string;

  constructor(detail?: string, redirectUri?: string) {
    super('Could not complete authorization with the provider', detail);
    this.redirectUri = redirectUri;
  }

  withRedirect(redirectUri: string): TokenExchangeError {
    return new TokenExchangeError(this.detail, redirectUri);
  }
}

export class DecryptionError extends IntegrationError {
  readonly code = 'decryption_failed';
  readonly statusCode = 502;

  constructor(detail?: string) {
    super('Stored credentials are unreadable; reconnect the integration', detail);
  }
}

export type RefreshFailureKind = 'transient' | 'terminal';

export class RefreshError extends IntegrationError {
  readonly code = 'refresh_failed';
  readonly statusCode: number;

  constructor(readonly kind: RefreshFailureKind, detail?: string) {
    super(
      kind === 'terminal'
        ? 'Provider access was revoked; reconnect required'
        : 'Provider is temporarily unavailable; try again',
      detail
    );
    this.statusCode = kind === 'terminal' ? 401 : 503;
  }

  get isTerminal(): boolean {
    return this.kind === 'terminal';
  }
}

export class IntegrationExpiredError extends IntegrationError {
  readonly code = 'integration_expired';
  readonly statusCode = 401;

  constructor() {
    super('Integration expired; reconnect required');
  }
}

export class IntegrationInactiveError extends IntegrationError {
  readonly code = 'integration_inactive';
  readonly statusCode = 409;

  constructor() {
    super('Integration is not active');
  }
}

export class UnsupportedActionError extends IntegrationError {
  readonly code = 'unsupported_action';
  readonly statusCode = 400;

  constructor(readonly action: string) {
    super(`Unsupported action: ${action.slice(0, 64)}`);
  }
}

export class InvalidParamsError extends IntegrationError {
  readonly code = 'invalid_params';
  readonly statusCode = 400;

  constructor(message = 'Invalid parameters') {
    super(message);
  }
}

export class UpstreamActionError extends IntegrationError {
  readonly code = 'upstream_error';
  readonly statusCode = 502;

  constructor(readonly upstreamStatus: number | null, detail?: string) {
    super(
      upstreamStatus
        ? `Provider request failed (HTTP ${upstreamStatus})`
        : 'Provider request failed',
      detail
    );
  }
}

export class NotFoundError extends IntegrationError {
  readonly code = 'not_found';
  readonly statusCode = 404;

  constructor() {
    super('Integration not found');
  }
}

export class RequestCancelledError extends IntegrationError {
  readonly code = 'request_cancelled';
  readonly statusCode = 499;

  constructor() {
    super('Request was cancelled');
  }
}
