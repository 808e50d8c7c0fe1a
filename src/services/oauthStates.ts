import type { SqlExecutor } from '../db/pool.js';
import { isProvider, type Provider } from '../shared/types.js';

export const OAUTH_STATE_TTL_MS = 10 * 60_000;

export interface OAuthStateEntry {
  state: string;
  userId: string;
  provider: Provider;
  expiresAt: Date;
}

/** Pending authorization flows, keyed by the opaque `state` round-tripped through the provider. */
export interface OAuthStateStore {
  create(entry: OAuthStateEntry): Promise<void>;
  /** Removes and returns the entry; a second consume of the same state returns null. */
  consume(state: string): Promise<OAuthStateEntry | null>;
}

interface OAuthStateRow {
  state: string;
  user_id: string;
  provider: string;
  expires_at: Date | string;
}

export class PgOAuthStateStore implements OAuthStateStore {
  constructor(private readonly db: SqlExecutor) {}

  async create(entry: OAuthStateEntry) {
    await this.db.query('DELETE FROM oauth_states WHERE expires_at < NOW()');
    await this.db.query(
      'INSERT INTO oauth_states (state, user_id, provider, expires_at) VALUES ($1, $2, $3, $4)',
      [entry.state, entry.userId, entry.provider, entry.expiresAt],
    );
  }

  async consume(state: string) {
    const result = await this.db.query<OAuthStateRow>(
      'DELETE FROM oauth_states WHERE state = $1 RETURNING state, user_id, provider, expires_at',
      [state],
    );
    const row = result.rows[0];
    if (!row || !isProvider(row.provider)) {
      return null;
    }
    return {
      state: row.state,
      userId: row.user_id,
      provider: row.provider,
      expiresAt: row.expires_at instanceof Date ? row.expires_at : new Date(row.expires_at),
    };
  }
}
