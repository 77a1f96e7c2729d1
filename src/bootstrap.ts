import { Pool } from 'pg';
import { AppConfig } from './config';
import { HealthController, HealthProbes } from './controllers/health.controller';
import { IntegrationController } from './controllers/integration.controller';
import { createAuthMiddleware } from './middleware/auth.middleware';
import { IntegrationRepository, PgIntegrationRepository } from './repositories/integration.repository';
import { OAuthStateRepository, PgOAuthStateRepository } from './repositories/oauth-state.repository';
import { EmailSummaryService, SummaryClient, createSummaryClient } from './services/ai/email-summary.service';
import { AuthService } from './services/auth/auth.service';
import {
  IntegrationManager,
  OAuthStateStore,
  ProviderOverrides,
  createProviderRegistry,
} from './services/integrations';
import { TokenCipher } from './utils/encryption.util';
import { AppDeps } from './app';

export interface Container {
  manager: IntegrationManager;
  stateStore: OAuthStateStore;
  authService: AuthService;
  appDeps: AppDeps;
}

export interface ContainerOptions {
  integrations: IntegrationRepository;
  oauthStates: OAuthStateRepository;
  probes: HealthProbes;
  providers?: ProviderOverrides;
  // Defaults to an Anthropic client when ANTHROPIC_API_KEY is set
  summaryClient?: SummaryClient | null;
  now?: () => Date;
}

/**
 * Wires every component from the configuration. Storage and health probes are
 * passed in so tests can run the same graph against in-memory stand-ins.
 */
export function createContainer(config: Readonly<AppConfig>, options: ContainerOptions): Container {
  const registry = createProviderRegistry(config, options.providers);
  const stateStore = new OAuthStateStore(options.oauthStates, {
    ttlSeconds: config.oauth.stateTtlSeconds,
    now: options.now,
  });

  const manager = new IntegrationManager({
    registry,
    stateStore,
    integrations: options.integrations,
    cipher: new TokenCipher(config.encryptionKey),
    oauth: config.oauth,
    now: options.now,
  });

  const authService = new AuthService(config.jwtSecret);
  const summaries = new EmailSummaryService(
    options.summaryClient !== undefined ? options.summaryClient : createSummaryClient(config.anthropic),
    config.anthropic
  );

  return {
    manager,
    stateStore,
    authService,
    appDeps: {
      healthController: new HealthController(options.probes),
      integrationController: new IntegrationController(manager, summaries),
      requireAuth: createAuthMiddleware(authService),
      corsOrigins: config.corsOrigins,
    },
  };
}

export function createPgContainer(
  config: Readonly<AppConfig>,
  pool: Pool,
  probes: Omit<HealthProbes, 'database'>
): Container {
  return createContainer(config, {
    integrations: new PgIntegrationRepository(pool),
    oauthStates: new PgOAuthStateRepository(pool),
    probes: { database: pool, redis: probes.redis },
  });
}
