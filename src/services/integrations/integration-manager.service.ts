import { OAuthSettings } from '../../config';
import { IntegrationRepository } from '../../repositories/integration.repository';
import {
  DecryptedTokens,
  EncryptedTokenWrite,
  Integration,
  IntegrationConfig,
  IntegrationStatus,
  IntegrationToken,
  ProviderDescriptor,
  TokenBundle,
} from '../../types/integration.types';
import { TokenCipher } from '../../utils/encryption.util';
import {
  DecryptionError,
  IntegrationExpiredError,
  IntegrationInactiveError,
  InvalidParamsError,
  NotFoundError,
  RefreshError,
  TokenExchangeError,
  UpstreamActionError,
} from './integration.errors';
import { OAuthStateStore } from './oauth-state.store';
import { ActionParams, CallOptions, ProviderService } from './provider.service';
import { ProviderRegistry } from './provider.registry';

export interface IntegrationManagerDeps {
  registry: ProviderRegistry;
  stateStore: OAuthStateStore;
  integrations: IntegrationRepository;
  cipher: TokenCipher;
  oauth: Pick<OAuthSettings, 'callbackUrl' | 'allowedRedirectOrigins'>;
  now?: () => Date;
}

export interface ConnectResult {
  authorizationUrl: string;
  stateToken: string;
}

export interface CallbackResult {
  integration: Integration;
  redirectUri: string;
}

export interface IntegrationUpdate {
  status?: Extract<IntegrationStatus, 'active' | 'disconnected'>;
  // null values remove the key
  config?: Record<string, unknown>;
}

/**
 * Orchestrates the integration lifecycle: connect, callback, list, update,
 * disconnect, and action execution with transparent token refresh.
 */
export class IntegrationManager {
  private readonly registry: ProviderRegistry;
  private readonly stateStore: OAuthStateStore;
  private readonly integrations: IntegrationRepository;
  private readonly cipher: TokenCipher;
  private readonly oauth: IntegrationManagerDeps['oauth'];
  private readonly now: () => Date;

  constructor(deps: IntegrationManagerDeps) {
    this.registry = deps.registry;
    this.stateStore = deps.stateStore;
    this.integrations = deps.integrations;
    this.cipher = deps.cipher;
    this.oauth = deps.oauth;
    this.now = deps.now ?? (() => new Date());
  }

  listAvailable(): ProviderDescriptor[] {
    return this.registry.listAvailable();
  }

  async connect(
    ownerId: string,
    providerType: string,
    redirectUri: string,
    options: { scopes?: string[] } = {}
  ): Promise<ConnectResult> {
    const provider = this.registry.get(providerType);
    this.assertRedirectAllowed(redirectUri);

    const scopes = options.scopes && options.scopes.length > 0
      ? options.scopes
      : provider.descriptor.default_scopes;

    const stateToken = await this.stateStore.create(ownerId, provider.providerType, redirectUri, scopes);
    const authorizationUrl = provider.buildAuthorizationUrl(stateToken, this.oauth.callbackUrl, scopes);

    return { authorizationUrl, stateToken };
  }

  /**
   * The integration always belongs to the owner recorded in the state, never
   * to whoever happens to hit the callback.
   */
  async handleCallback(stateToken: string, code: string, options: CallOptions = {}): Promise<CallbackResult> {
    const state = await this.stateStore.consume(stateToken);
    const provider = this.registry.get(state.provider_type);

    if (!code) {
      throw new TokenExchangeError('callback without code', state.redirect_uri);
    }

    let bundle: TokenBundle;
    try {
      bundle = await provider.exchangeCode(code, this.oauth.callbackUrl, options);
    } catch (error) {
      if (error instanceof TokenExchangeError) throw error.withRedirect(state.redirect_uri);
      throw error;
    }

    const integration = await this.integrations.upsertConnected(
      state.owner_id,
      provider.providerType,
      this.encryptBundle(bundle)
    );

    console.log(`✓ ${provider.providerType} connected for owner ${state.owner_id} (${integration.id})`);
    return { integration, redirectUri: state.redirect_uri };
  }

  /**
   * The provider redirected back with `error=` (e.g. the user denied consent).
   * Burns the state and returns where the caller wanted to land.
   */
  async handleCallbackError(stateToken: string): Promise<string> {
    const state = await this.stateStore.consume(stateToken);
    return state.redirect_uri;
  }

  async list(ownerId: string): Promise<Integration[]> {
    return this.integrations.listByOwner(ownerId);
  }

  async get(ownerId: string, integrationId: string): Promise<Integration> {
    return this.requireOwned(ownerId, integrationId);
  }

  async update(ownerId: string, integrationId: string, update: IntegrationUpdate): Promise<Integration> {
    const integration = await this.requireOwned(ownerId, integrationId);

    if (update.status === 'disconnected' && integration.status !== 'disconnected') {
      await this.integrations.disconnect(integration.id);
    } else if (update.status === 'active' && integration.status !== 'active') {
      const token = await this.integrations.findToken(integration.id);
      if (!token) throw new IntegrationExpiredError();
      await this.integrations.updateStatus(integration.id, 'active');
    }

    if (update.config) {
      const merged: IntegrationConfig = { ...integration.config };
      for (const [key, value] of Object.entries(update.config)) {
        if (value === null || value === undefined) {
          delete merged[key];
        } else {
          merged[key] = value;
        }
      }
      await this.integrations.updateConfig(integration.id, merged);
    }

    return this.requireOwned(ownerId, integrationId);
  }

  /**
   * Tokens are deleted and the row is kept as `disconnected`. Calling it
   * again is a no-op.
   */
  async disconnect(ownerId: string, integrationId: string): Promise<void> {
    const integration = await this.requireOwned(ownerId, integrationId);
    await this.integrations.disconnect(integration.id);
    console.log(`✓ Integration ${integration.id} disconnected`);
  }

  async execute(
    ownerId: string,
    integrationId: string,
    action: string,
    params: ActionParams,
    options: CallOptions = {}
  ): Promise<unknown> {
    const integration = await this.requireOwned(ownerId, integrationId);

    if (integration.status === 'disconnected') throw new IntegrationInactiveError();
    if (integration.status === 'expired') throw new IntegrationExpiredError();

    const provider = this.registry.get(integration.provider_type);
    const tokens = await this.obtainTokens(integration, provider, options);

    try {
      const data = await provider.execute(tokens, action, params, options);
      await this.markStatus(integration, 'active');
      return data;
    } catch (error) {
      if (error instanceof UpstreamActionError) {
        await this.markStatus(integration, 'error');
      }
      throw error;
    }
  }

  /**
   * Read -> maybe refresh -> write happens under the token row lock, so two
   * requests never both spend the same refresh token and the stored bundle is
   * never replaced by an older one. Status changes are written after the lock
   * is released so they survive the rollback of a failed refresh.
   */
  private async obtainTokens(
    integration: Integration,
    provider: ProviderService,
    options: CallOptions
  ): Promise<DecryptedTokens> {
    try {
      return await this.integrations.withTokenLock(integration.id, async (record, tx) => {
        if (!record) throw new IntegrationExpiredError();

        const current = this.decryptRecord(record);
        if (!provider.needsRefresh(current, this.now())) {
          return current;
        }

        const bundle = await this.refreshWithRetry(provider, current, options);
        const write = this.encryptBundle(bundle);
        await tx.saveTokens(write);

        console.log(`🔄 Tokens refreshed for integration ${integration.id}`);
        return {
          accessToken: bundle.accessToken,
          refreshToken: bundle.refreshToken ?? current.refreshToken,
          tokenType: bundle.tokenType,
          scopes: bundle.scopes,
          expiresAt: write.expires_at,
        };
      });
    } catch (error) {
      if (error instanceof DecryptionError) {
        console.error(`Token decryption failed for integration ${integration.id}: ${error.detail}`);
        await this.markStatus(integration, 'error');
        throw error;
      }
      if (error instanceof RefreshError && error.isTerminal) {
        console.warn(`Refresh rejected for integration ${integration.id}: ${error.detail}`);
        await this.markStatus(integration, 'expired');
        throw new IntegrationExpiredError();
      }
      if (error instanceof IntegrationExpiredError) {
        await this.markStatus(integration, 'expired');
      }
      throw error;
    }
  }

  private async refreshWithRetry(
    provider: ProviderService,
    tokens: DecryptedTokens,
    options: CallOptions
  ): Promise<TokenBundle> {
    try {
      return await provider.refresh(tokens, options);
    } catch (error) {
      if (!(error instanceof RefreshError) || error.isTerminal || options.signal?.aborted) {
        throw error;
      }
      console.warn(`Transient ${provider.providerType} refresh failure (${error.detail}), retrying once`);
      return provider.refresh(tokens, options);
    }
  }

  private decryptRecord(record: IntegrationToken): DecryptedTokens {
    return {
      accessToken: this.cipher.decrypt(record.access_token_encrypted),
      refreshToken: record.refresh_token_encrypted
        ? this.cipher.decrypt(record.refresh_token_encrypted)
        : null,
      tokenType: record.token_type,
      scopes: record.scopes,
      expiresAt: record.expires_at ? new Date(record.expires_at) : null,
    };
  }

  private encryptBundle(bundle: TokenBundle): EncryptedTokenWrite {
    return {
      access_token_encrypted: this.cipher.encrypt(bundle.accessToken),
      refresh_token_encrypted: bundle.refreshToken ? this.cipher.encrypt(bundle.refreshToken) : null,
      token_type: bundle.tokenType,
      scopes: bundle.scopes,
      expires_at: bundle.expiresIn
        ? new Date(this.now().getTime() + bundle.expiresIn * 1000)
        : null,
    };
  }

  private async markStatus(integration: Integration, status: IntegrationStatus): Promise<void> {
    if (integration.status === status) return;
    await this.integrations.updateStatus(integration.id, status);
  }

  private async requireOwned(ownerId: string, integrationId: string): Promise<Integration> {
    const integration = await this.integrations.findOwned(ownerId, integrationId);
    if (!integration) throw new NotFoundError();
    return integration;
  }

  private assertRedirectAllowed(redirectUri: string): void {
    let url: URL;
    try {
      url = new URL(redirectUri);
    } catch {
      throw new InvalidParamsError('redirect_uri must be an absolute URL');
    }

    if (url.protocol !== 'https:' && url.protocol !== 'http:') {
      throw new InvalidParamsError('redirect_uri must use http or https');
    }

    const allowed = this.oauth.allowedRedirectOrigins;
    if (allowed.length > 0 && !allowed.includes(url.origin)) {
      throw new InvalidParamsError('redirect_uri origin is not allowed');
    }
  }
}
