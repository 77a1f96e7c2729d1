import { AppConfig } from '../../config';
import { GmailApi } from './gmail.client';
import { registerGmailProvider } from './gmail.provider';
import { ProviderRegistry } from './provider.registry';

export interface ProviderOverrides {
  gmailApi?: GmailApi;
}

/**
 * Every provider module's registration function, called once before the
 * server starts taking traffic.
 */
export function createProviderRegistry(
  config: Pick<AppConfig, 'google' | 'oauth' | 'http'>,
  overrides: ProviderOverrides = {}
): ProviderRegistry {
  const builder = ProviderRegistry.builder();

  registerGmailProvider(builder, config, overrides.gmailApi);

  return builder.build();
}

export { ProviderRegistry, ProviderRegistryBuilder } from './provider.registry';
export { IntegrationManager } from './integration-manager.service';
export { OAuthStateStore } from './oauth-state.store';
export * from './integration.errors';
