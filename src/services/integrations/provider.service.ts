import {
  DecryptedTokens,
  ProviderDescriptor,
  ProviderType,
  TokenBundle,
} from '../../types/integration.types';
import { HttpAbortedError, RetryPolicy, requestWithRetries } from '../../utils/http.util';
import { extractOAuthErrorCode, sanitizeProviderResponse } from '../../utils/sanitize.util';
import {
  RefreshError,
  RequestCancelledError,
  TokenExchangeError,
} from './integration.errors';

export interface CallOptions {
  signal?: AbortSignal;
}

export type ActionParams = Record<string, unknown>;

/**
 * What every provider implementation exposes to the integration manager.
 * All network failures leave through the error taxonomy; no raw upstream
 * error, stack or body crosses this boundary.
 */
export interface ProviderService {
  readonly providerType: ProviderType;
  readonly descriptor: ProviderDescriptor;

  buildAuthorizationUrl(stateToken: string, callbackUrl: string, scopes?: string[]): string;
  exchangeCode(code: string, callbackUrl: string, options?: CallOptions): Promise<TokenBundle>;
  needsRefresh(token: { expiresAt: Date | null }, now: Date): boolean;
  refresh(tokens: DecryptedTokens, options?: CallOptions): Promise<TokenBundle>;
  execute(
    tokens: DecryptedTokens,
    action: string,
    params: ActionParams,
    options?: CallOptions
  ): Promise<unknown>;
}

export interface OAuth2ClientSettings {
  clientId: string;
  clientSecret: string;
  tokenEndpoint: string;
  defaultScopes: string[];
  refreshMarginSeconds: number;
  http: RetryPolicy;
}

// Token endpoint answers that mean the grant itself is dead
const TERMINAL_REFRESH_ERRORS = new Set([
  'invalid_grant',
  'invalid_client',
  'unauthorized_client',
  'invalid_token',
]);

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseExpiresIn(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value) && value > 0) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    if (Number.isFinite(parsed) && parsed > 0) return parsed;
  }
  return undefined;
}

type TokenEndpointResult =
  | { kind: 'ok'; payload: Record<string, unknown> }
  | { kind: 'rejected'; status: number; errorCode: string | null }
  | { kind: 'unreachable'; reason: string };

/**
 * Standard OAuth2 authorization-code and refresh-token grants against a
 * form-encoded token endpoint. Providers supply the consent URL and actions.
 */
export abstract class OAuth2ProviderService implements ProviderService {
  abstract readonly providerType: ProviderType;
  abstract readonly descriptor: ProviderDescriptor;

  constructor(protected readonly settings: OAuth2ClientSettings) {}

  abstract buildAuthorizationUrl(stateToken: string, callbackUrl: string, scopes?: string[]): string;

  abstract execute(
    tokens: DecryptedTokens,
    action: string,
    params: ActionParams,
    options?: CallOptions
  ): Promise<unknown>;

  async exchangeCode(code: string, callbackUrl: string, options: CallOptions = {}): Promise<TokenBundle> {
    const result = await this.postTokenEndpoint(
      {
        grant_type: 'authorization_code',
        code,
        redirect_uri: callbackUrl,
      },
      options
    );

    if (result.kind === 'unreachable') {
      throw new TokenExchangeError(result.reason);
    }
    if (result.kind === 'rejected') {
      throw new TokenExchangeError(`HTTP ${result.status}${result.errorCode ? ` ${result.errorCode}` : ''}`);
    }

    const bundle = this.parseTokenBundle(result.payload, this.settings.defaultScopes);
    if (!bundle) {
      throw new TokenExchangeError('token response missing access_token');
    }
    return bundle;
  }

  needsRefresh(token: { expiresAt: Date | null }, now: Date): boolean {
    if (!token.expiresAt) return false;
    const remainingMs = new Date(token.expiresAt).getTime() - now.getTime();
    return remainingMs <= this.settings.refreshMarginSeconds * 1000;
  }

  async refresh(tokens: DecryptedTokens, options: CallOptions = {}): Promise<TokenBundle> {
    if (!tokens.refreshToken) {
      throw new RefreshError('terminal', 'no refresh token stored');
    }

    const result = await this.postTokenEndpoint(
      {
        grant_type: 'refresh_token',
        refresh_token: tokens.refreshToken,
      },
      options
    );

    if (result.kind === 'unreachable') {
      throw new RefreshError('transient', result.reason);
    }
    if (result.kind === 'rejected') {
      const detail = `HTTP ${result.status}${result.errorCode ? ` ${result.errorCode}` : ''}`;
      const terminal =
        (result.errorCode !== null && TERMINAL_REFRESH_ERRORS.has(result.errorCode)) ||
        result.status === 400 ||
        result.status === 401 ||
        result.status === 403;
      throw new RefreshError(terminal ? 'terminal' : 'transient', detail);
    }

    const bundle = this.parseTokenBundle(result.payload, tokens.scopes);
    if (!bundle) {
      throw new RefreshError('transient', 'refresh response missing access_token');
    }
    return bundle;
  }

  protected parseTokenBundle(payload: Record<string, unknown>, fallbackScopes: string[]): TokenBundle | null {
    const accessToken = payload.access_token;
    if (typeof accessToken !== 'string' || accessToken.length === 0) {
      return null;
    }

    const scope = payload.scope;
    const scopes =
      typeof scope === 'string' && scope.trim() !== ''
        ? scope.split(' ').filter(Boolean)
        : fallbackScopes;

    return {
      accessToken,
      refreshToken:
        typeof payload.refresh_token === 'string' && payload.refresh_token !== ''
          ? payload.refresh_token
          : undefined,
      expiresIn: parseExpiresIn(payload.expires_in),
      tokenType: typeof payload.token_type === 'string' ? payload.token_type : 'Bearer',
      scopes,
    };
  }

  private async postTokenEndpoint(
    grant: Record<string, string>,
    options: CallOptions
  ): Promise<TokenEndpointResult> {
    const body = new URLSearchParams({
      ...grant,
      client_id: this.settings.clientId,
      client_secret: this.settings.clientSecret,
    });

    let response: Response;
    try {
      response = await requestWithRetries(
        this.settings.tokenEndpoint,
        {
          method: 'POST',
          headers: {
            'Content-Type': 'application/x-www-form-urlencoded',
            Accept: 'application/json',
          },
          body: body.toString(),
        },
        { policy: this.settings.http, signal: options.signal }
      );
    } catch (error) {
      if (error instanceof HttpAbortedError) throw new RequestCancelledError();
      return { kind: 'unreachable', reason: error instanceof Error ? error.name : 'network error' };
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      console.error(
        `${this.providerType} token endpoint rejected ${grant.grant_type} (${response.status}):`,
        sanitizeProviderResponse(text)
      );
      return { kind: 'rejected', status: response.status, errorCode: extractOAuthErrorCode(text) };
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch {
      return { kind: 'unreachable', reason: 'token response is not JSON' };
    }

    if (!isRecord(payload)) {
      return { kind: 'unreachable', reason: 'token response is not an object' };
    }
    return { kind: 'ok', payload };
  }
}
