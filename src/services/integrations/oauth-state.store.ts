import crypto from 'crypto';
import { OAuthStateRepository } from '../../repositories/oauth-state.repository';
import { OAuthStateRecord } from '../../types/integration.types';
import { InvalidOrExpiredStateError } from './integration.errors';

export interface OAuthStateStoreOptions {
  ttlSeconds: number;
  now?: () => Date;
}

/**
 * Short-lived, single-use records binding a state token to a pending
 * authorization request.
 */
export class OAuthStateStore {
  private readonly ttlMs: number;
  private readonly now: () => Date;

  constructor(private readonly repository: OAuthStateRepository, options: OAuthStateStoreOptions) {
    this.ttlMs = options.ttlSeconds * 1000;
    this.now = options.now ?? (() => new Date());
  }

  async create(ownerId: string, providerType: string, redirectUri: string, scopes: string[] = []): Promise<string> {
    const state = crypto.randomBytes(32).toString('base64url');

    await this.repository.replace({
      state,
      owner_id: ownerId,
      provider_type: providerType,
      redirect_uri: redirectUri,
      scopes,
      created_at: this.now(),
    });

    return state;
  }

  /**
   * The row is deleted before the TTL is checked, so an expired token is
   * also gone after this call.
   */
  async consume(state: string): Promise<OAuthStateRecord> {
    if (!state) throw new InvalidOrExpiredStateError();

    const record = await this.repository.take(state);
    if (!record || this.isExpired(record)) {
      throw new InvalidOrExpiredStateError();
    }

    return record;
  }

  async purgeExpired(): Promise<number> {
    const cutoff = new Date(this.now().getTime() - this.ttlMs);
    return this.repository.deleteCreatedBefore(cutoff);
  }

  private isExpired(record: OAuthStateRecord): boolean {
    return this.now().getTime() - new Date(record.created_at).getTime() > this.ttlMs;
  }
}
