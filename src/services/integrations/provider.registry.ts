import { ProviderDescriptor } from '../../types/integration.types';
import { UnknownProviderError } from './integration.errors';
import { ProviderService } from './provider.service';

/**
 * Collects providers during startup. `build()` hands out the read-only
 * registry; the builder refuses further registrations after that.
 */
export class ProviderRegistryBuilder {
  private readonly providers = new Map<string, ProviderService>();
  private built = false;

  register(provider: ProviderService): this {
    if (this.built) {
      throw new Error('Provider registry is already built');
    }
    if (this.providers.has(provider.providerType)) {
      throw new Error(`Provider "${provider.providerType}" is registered twice`);
    }

    this.providers.set(provider.providerType, provider);
    return this;
  }

  build(): ProviderRegistry {
    this.built = true;
    return new ProviderRegistry(new Map(this.providers));
  }
}

/**
 * Immutable provider table assembled once at process start
 */
export class ProviderRegistry {
  constructor(private readonly providers: ReadonlyMap<string, ProviderService>) {}

  static builder(): ProviderRegistryBuilder {
    return new ProviderRegistryBuilder();
  }

  get(providerType: string): ProviderService {
    const provider = this.providers.get(providerType);
    if (!provider) {
      throw new UnknownProviderError(providerType);
    }
    return provider;
  }

  has(providerType: string): boolean {
    return this.providers.has(providerType);
  }

  listAvailable(): ProviderDescriptor[] {
    return Array.from(this.providers.values()).map((provider) => ({
      ...provider.descriptor,
      actions: [...provider.descriptor.actions],
      default_scopes: [...provider.descriptor.default_scopes],
    }));
  }
}
