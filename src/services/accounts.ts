import { z } from 'zod';
import type { SqlExecutor } from '../db/pool.js';
import {
  isProvider,
  type AccountRecord,
  type Provider,
  type SyncCursor,
} from '../shared/types.js';

export interface CredentialUpdate {
  accessToken: string;
  tokenExpiresAt: Date;
  /** Only present when the provider rotated the refresh credential. */
  encryptedRefreshToken?: string;
}

export interface ConnectedAccountInput {
  userId: string;
  provider: Provider;
  emailAddress: string;
  displayName: string | null;
  accessToken: string;
  tokenExpiresAt: Date;
  encryptedRefreshToken: string | null;
}

export interface AccountRepository {
  getAccount(accountId: string): Promise<AccountRecord | null>;
  listActiveAccountIds(): Promise<string[]>;
  listAccountsForUser(userId: string): Promise<AccountRecord[]>;
  updateCredentials(accountId: string, update: CredentialUpdate): Promise<void>;
  deactivateAccount(accountId: string, reason: string): Promise<void>;
  recordSyncError(accountId: string, message: string): Promise<void>;
  /**
   * Creates the account, or reactivates it on re-authorization. A null refresh
   * credential keeps whatever ciphertext is already stored.
   */
  upsertConnectedAccount(input: ConnectedAccountInput): Promise<AccountRecord>;
  deleteAccount(accountId: string): Promise<boolean>;
}

export const syncCursorSchema = z.discriminatedUnion('provider', [
  z.object({ provider: z.literal('gmail'), historyId: z.string().min(1) }),
  z.object({ provider: z.literal('outlook'), deltaLink: z.string().min(1) }),
]);

export interface AccountRow {
  id: string;
  user_id: string;
  provider: string;
  email_address: string;
  display_name: string | null;
  access_token: string | null;
  encrypted_refresh_token: string | null;
  token_expires_at: Date | string | null;
  sync_cursor: unknown;
  last_synced_at: Date | string | null;
  is_active: boolean;
  sync_error: string | null;
  deactivated_reason: string | null;
}

const toDate = (value: Date | string | null): Date | null => {
  if (value === null) {
    return null;
  }
  const date = value instanceof Date ? value : new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
};

// An unreadable cursor is treated as absent: the next sync does a full fetch.
const toCursor = (value: unknown): SyncCursor | null => {
  const parsed = syncCursorSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
};

export const mapAccountRow = (row: AccountRow): AccountRecord => {
  if (!isProvider(row.provider)) {
    throw new Error(`account ${row.id} has unknown provider ${row.provider}`);
  }
  return {
    id: row.id,
    userId: row.user_id,
    provider: row.provider,
    emailAddress: row.email_address,
    displayName: row.display_name,
    accessToken: row.access_token,
    encryptedRefreshToken: row.encrypted_refresh_token,
    tokenExpiresAt: toDate(row.token_expires_at),
    cursor: toCursor(row.sync_cursor),
    lastSyncedAt: toDate(row.last_synced_at),
    active: row.is_active,
    syncError: row.sync_error,
    deactivatedReason: row.deactivated_reason,
  };
};

const ACCOUNT_COLUMNS = `id, user_id, provider, email_address, display_name, access_token,
  encrypted_refresh_token, token_expires_at, sync_cursor, last_synced_at, is_active,
  sync_error, deactivated_reason`;

export class PgAccountRepository implements AccountRepository {
  constructor(private readonly db: SqlExecutor) {}

  async getAccount(accountId: string) {
    const result = await this.db.query<AccountRow>(
      `SELECT ${ACCOUNT_COLUMNS} FROM accounts WHERE id = $1`,
      [accountId],
    );
    const row = result.rows[0];
    return row ? mapAccountRow(row) : null;
  }

  async listActiveAccountIds() {
    const result = await this.db.query<{ id: string }>(
      'SELECT id FROM accounts WHERE is_active = TRUE ORDER BY last_synced_at ASC NULLS FIRST, id ASC',
    );
    return result.rows.map((row) => row.id);
  }

  async listAccountsForUser(userId: string) {
    const result = await this.db.query<AccountRow>(
      `SELECT ${ACCOUNT_COLUMNS} FROM accounts WHERE user_id = $1 ORDER BY created_at ASC`,
      [userId],
    );
    return result.rows.map(mapAccountRow);
  }

  async updateCredentials(accountId: string, update: CredentialUpdate) {
    await this.db.query(
      `UPDATE accounts
          SET access_token = $2,
              token_expires_at = $3,
              encrypted_refresh_token = COALESCE($4, encrypted_refresh_token),
              updated_at = NOW()
        WHERE id = $1`,
      [accountId, update.accessToken, update.tokenExpiresAt, update.encryptedRefreshToken ?? null],
    );
  }

  async deactivateAccount(accountId: string, reason: string) {
    await this.db.query(
      `UPDATE accounts
          SET is_active = FALSE,
              deactivated_reason = $2,
              sync_error = $2,
              updated_at = NOW()
        WHERE id = $1`,
      [accountId, reason],
    );
  }

  async recordSyncError(accountId: string, message: string) {
    await this.db.query(
      'UPDATE accounts SET sync_error = $2, updated_at = NOW() WHERE id = $1',
      [accountId, message],
    );
  }

  async upsertConnectedAccount(input: ConnectedAccountInput) {
    const result = await this.db.query<AccountRow>(
      `INSERT INTO accounts
         (user_id, provider, email_address, display_name, access_token, token_expires_at,
          encrypted_refresh_token, is_active, sync_error, deactivated_reason)
       VALUES ($1, $2, $3, $4, $5, $6, $7, TRUE, NULL, NULL)
       ON CONFLICT (user_id, provider, email_address) DO UPDATE
         SET display_name = COALESCE(EXCLUDED.display_name, accounts.display_name),
             access_token = EXCLUDED.access_token,
             token_expires_at = EXCLUDED.token_expires_at,
             encrypted_refresh_token = COALESCE(EXCLUDED.encrypted_refresh_token, accounts.encrypted_refresh_token),
             is_active = TRUE,
             sync_error = NULL,
             deactivated_reason = NULL,
             updated_at = NOW()
       RETURNING ${ACCOUNT_COLUMNS}`,
      [
        input.userId,
        input.provider,
        input.emailAddress,
        input.displayName,
        input.accessToken,
        input.tokenExpiresAt,
        input.encryptedRefreshToken,
      ],
    );
    const row = result.rows[0];
    if (!row) {
      throw new Error('account upsert returned no row');
    }
    return mapAccountRow(row);
  }

  async deleteAccount(accountId: string) {
    const result = await this.db.query('DELETE FROM accounts WHERE id = $1', [accountId]);
    return result.rowCount > 0;
  }
}
