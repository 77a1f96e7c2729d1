import { Pool } from 'pg';
import { OAuthStateRecord } from '../types/integration.types';

export interface OAuthStateRepository {
  /**
   * Insert a new state row, dropping any pending one for the same owner/provider
   */
  replace(record: OAuthStateRecord): Promise<void>;

  /**
   * Delete and return the row in one step; null if it was not there.
   * Two concurrent calls for the same state never both get the row.
   */
  take(state: string): Promise<OAuthStateRecord | null>;

  deleteCreatedBefore(cutoff: Date): Promise<number>;
}

/**
 * PostgreSQL-backed state rows
 */
export class PgOAuthStateRepository implements OAuthStateRepository {
  constructor(private readonly pool: Pool) {}

  async replace(record: OAuthStateRecord): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      await client.query(
        'DELETE FROM oauth_states WHERE owner_id = $1 AND provider_type = $2',
        [record.owner_id, record.provider_type]
      );
      await client.query(
        `INSERT INTO oauth_states (state, owner_id, provider_type, redirect_uri, scopes, created_at)
         VALUES ($1, $2, $3, $4, $5, $6)`,
        [
          record.state,
          record.owner_id,
          record.provider_type,
          record.redirect_uri,
          record.scopes,
          record.created_at,
        ]
      );
      await client.query('COMMIT');
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  async take(state: string): Promise<OAuthStateRecord | null> {
    const result = await this.pool.query<OAuthStateRecord>(
      `DELETE FROM oauth_states
       WHERE state = $1
       RETURNING state, owner_id, provider_type, redirect_uri, scopes, created_at`,
      [state]
    );
    return result.rows[0] || null;
  }

  async deleteCreatedBefore(cutoff: Date): Promise<number> {
    const result = await this.pool.query('DELETE FROM oauth_states WHERE created_at < $1', [cutoff]);
    return result.rowCount ?? 0;
  }
}
