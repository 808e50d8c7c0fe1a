import { randomUUID } from 'node:crypto';
import type { SqlExecutor } from '../db/pool.js';

export interface SyncLease {
  readonly accountId: string;
  readonly owner: string;
  release(): Promise<void>;
}

/** Per-account mutual exclusion with a timeout, so a crashed worker cannot hold an account forever. */
export interface LeaseStore {
  /** Resolves null when another live holder has the lease. */
  acquire(accountId: string, ttlMs: number): Promise<SyncLease | null>;
}

export class PgLeaseStore implements LeaseStore {
  constructor(private readonly db: SqlExecutor) {}

  async acquire(accountId: string, ttlMs: number): Promise<SyncLease | null> {
    const owner = randomUUID();
    const result = await this.db.query<{ owner: string }>(
      `INSERT INTO sync_leases (account_id, owner, expires_at)
       VALUES ($1, $2, NOW() + ($3::double precision * INTERVAL '1 millisecond'))
       ON CONFLICT (account_id) DO UPDATE
         SET owner = EXCLUDED.owner,
             expires_at = EXCLUDED.expires_at
       WHERE sync_leases.expires_at <= NOW()
       RETURNING owner`,
      [accountId, owner, ttlMs],
    );
    if (result.rows[0]?.owner !== owner) {
      return null;
    }
    return {
      accountId,
      owner,
      release: async () => {
        await this.db.query(
          'DELETE FROM sync_leases WHERE account_id = $1 AND owner = $2',
          [accountId, owner],
        );
      },
    };
  }
}
