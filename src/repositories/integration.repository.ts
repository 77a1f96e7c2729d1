import { Pool, PoolClient } from 'pg';
import {
  EncryptedTokenWrite,
  Integration,
  IntegrationConfig,
  IntegrationStatus,
  IntegrationToken,
  ProviderType,
} from '../types/integration.types';

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Writes allowed while the token row is locked
 */
export interface TokenTransaction {
  saveTokens(write: EncryptedTokenWrite): Promise<IntegrationToken>;
}

export interface IntegrationRepository {
  findOwned(ownerId: string, integrationId: string): Promise<Integration | null>;
  listByOwner(ownerId: string): Promise<Integration[]>;

  /**
   * Create or revive the (owner, provider) integration as active and store its
   * tokens, all in one transaction.
   */
  upsertConnected(
    ownerId: string,
    providerType: ProviderType,
    tokens: EncryptedTokenWrite
  ): Promise<Integration>;

  /**
   * Never moves a `disconnected` integration; only a new connect revives it.
   * Returns null when nothing was updated.
   */
  updateStatus(integrationId: string, status: IntegrationStatus): Promise<Integration | null>;
  updateConfig(integrationId: string, config: IntegrationConfig): Promise<Integration | null>;

  /**
   * Delete the tokens and mark the integration disconnected, atomically
   */
  disconnect(integrationId: string): Promise<void>;

  findToken(integrationId: string): Promise<IntegrationToken | null>;

  /**
   * Run `fn` holding an exclusive lock on the integration's token row.
   * Writes made through `tx` commit only if `fn` resolves.
   */
  withTokenLock<T>(
    integrationId: string,
    fn: (token: IntegrationToken | null, tx: TokenTransaction) => Promise<T>
  ): Promise<T>;
}

const UPSERT_TOKEN_SQL = `
  INSERT INTO integration_tokens (
    integration_id, access_token_encrypted, refresh_token_encrypted,
    token_type, scopes, expires_at
  ) VALUES ($1, $2, $3, $4, $5, $6)
  ON CONFLICT (integration_id)
  DO UPDATE SET
    access_token_encrypted = EXCLUDED.access_token_encrypted,
    refresh_token_encrypted = COALESCE(EXCLUDED.refresh_token_encrypted, integration_tokens.refresh_token_encrypted),
    token_type = EXCLUDED.token_type,
    scopes = EXCLUDED.scopes,
    expires_at = EXCLUDED.expires_at,
    updated_at = NOW()
  RETURNING *`;

function tokenParams(integrationId: string, write: EncryptedTokenWrite): unknown[] {
  return [
    integrationId,
    write.access_token_encrypted,
    write.refresh_token_encrypted,
    write.token_type,
    write.scopes,
    write.expires_at,
  ];
}

/**
 * Repository for integrations and their encrypted tokens
 */
export class PgIntegrationRepository implements IntegrationRepository {
  constructor(private readonly pool: Pool) {}

  async findOwned(ownerId: string, integrationId: string): Promise<Integration | null> {
    if (!UUID.test(integrationId)) return null;

    const result = await this.pool.query<Integration>(
      'SELECT * FROM integrations WHERE id = $1 AND owner_id = $2',
      [integrationId, ownerId]
    );
    return result.rows[0] || null;
  }

  async listByOwner(ownerId: string): Promise<Integration[]> {
    const result = await this.pool.query<Integration>(
      'SELECT * FROM integrations WHERE owner_id = $1 ORDER BY created_at ASC, id ASC',
      [ownerId]
    );
    return result.rows;
  }

  async upsertConnected(
    ownerId: string,
    providerType: ProviderType,
    tokens: EncryptedTokenWrite
  ): Promise<Integration> {
    return this.transaction(async (client) => {
      const integration = await client.query<Integration>(
        `INSERT INTO integrations (owner_id, provider_type, status, config)
         VALUES ($1, $2, 'active', '{}'::jsonb)
         ON CONFLICT (owner_id, provider_type)
         DO UPDATE SET status = 'active', updated_at = NOW()
         RETURNING *`,
        [ownerId, providerType]
      );
      const row = integration.rows[0];

      await client.query(UPSERT_TOKEN_SQL, tokenParams(row.id, tokens));
      return row;
    });
  }

  async updateStatus(integrationId: string, status: IntegrationStatus): Promise<Integration | null> {
    const result = await this.pool.query<Integration>(
      `UPDATE integrations SET status = $1, updated_at = NOW()
       WHERE id = $2 AND status <> 'disconnected'
       RETURNING *`,
      [status, integrationId]
    );
    return result.rows[0] || null;
  }

  async updateConfig(integrationId: string, config: IntegrationConfig): Promise<Integration | null> {
    const result = await this.pool.query<Integration>(
      'UPDATE integrations SET config = $1::jsonb, updated_at = NOW() WHERE id = $2 RETURNING *',
      [JSON.stringify(config), integrationId]
    );
    return result.rows[0] || null;
  }

  async disconnect(integrationId: string): Promise<void> {
    await this.transaction(async (client) => {
      await client.query('DELETE FROM integration_tokens WHERE integration_id = $1', [integrationId]);
      await client.query(
        `UPDATE integrations SET status = 'disconnected', updated_at = NOW() WHERE id = $1`,
        [integrationId]
      );
    });
  }

  async findToken(integrationId: string): Promise<IntegrationToken | null> {
    const result = await this.pool.query<IntegrationToken>(
      'SELECT * FROM integration_tokens WHERE integration_id = $1',
      [integrationId]
    );
    return result.rows[0] || null;
  }

  async withTokenLock<T>(
    integrationId: string,
    fn: (token: IntegrationToken | null, tx: TokenTransaction) => Promise<T>
  ): Promise<T> {
    return this.transaction(async (client) => {
      // Row lock serializes read -> refresh -> write per integration
      const locked = await client.query<IntegrationToken>(
        'SELECT * FROM integration_tokens WHERE integration_id = $1 FOR UPDATE',
        [integrationId]
      );

      const tx: TokenTransaction = {
        saveTokens: async (write) => {
          const saved = await client.query<IntegrationToken>(UPSERT_TOKEN_SQL, tokenParams(integrationId, write));
          return saved.rows[0];
        },
      };

      return fn(locked.rows[0] || null, tx);
    });
  }

  private async transaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await fn(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }
}
