import type { Database, SqlExecutor } from '../db/pool.js';
import type {
  AttachmentMeta,
  CanonicalMessage,
  SyncCursor,
  ThreadRecord,
} from '../shared/types.js';

/**
 * Writes for one sync batch. Everything done through a transaction lands
 * together with the cursor, or not at all.
 */
export interface MailTransaction {
  /** Runs `fn` so that, if it throws, only its own writes are undone. */
  isolate<T>(fn: () => Promise<T>): Promise<T>;
  messageExists(providerMessageId: string): Promise<boolean>;
  findThread(accountId: string, providerThreadId: string): Promise<ThreadRecord | null>;
  insertThread(accountId: string, message: CanonicalMessage): Promise<ThreadRecord>;
  /** Moves `last_message_at` forward to `date` if later; the snippet follows only then. */
  updateThreadActivity(threadId: string, date: Date, snippet: string): Promise<void>;
  /** Returns the new row id, or null when the provider message id is already stored. */
  insertMessage(threadId: string, message: CanonicalMessage): Promise<string | null>;
  insertAttachment(messageId: string, attachment: AttachmentMeta): Promise<void>;
  saveSyncState(accountId: string, cursor: SyncCursor, syncedAt: Date): Promise<void>;
}

export interface MailStore {
  unitOfWork<T>(fn: (tx: MailTransaction) => Promise<T>): Promise<T>;
}

interface ThreadRow {
  id: string;
  account_id: string;
  provider_thread_id: string;
  subject: string;
  snippet: string;
  last_message_at: Date | string;
}

const mapThreadRow = (row: ThreadRow): ThreadRecord => ({
  id: row.id,
  accountId: row.account_id,
  providerThreadId: row.provider_thread_id,
  subject: row.subject,
  snippet: row.snippet,
  lastMessageAt: row.last_message_at instanceof Date ? row.last_message_at : new Date(row.last_message_at),
});

const THREAD_COLUMNS = 'id, account_id, provider_thread_id, subject, snippet, last_message_at';

export class PgMailTransaction implements MailTransaction {
  private savepointSeq = 0;

  constructor(private readonly tx: SqlExecutor) {}

  async isolate<T>(fn: () => Promise<T>): Promise<T> {
    this.savepointSeq += 1;
    const name = `record_${this.savepointSeq}`;
    await this.tx.query(`SAVEPOINT ${name}`);
    try {
      const result = await fn();
      await this.tx.query(`RELEASE SAVEPOINT ${name}`);
      return result;
    } catch (error) {
      await this.tx.query(`ROLLBACK TO SAVEPOINT ${name}`);
      await this.tx.query(`RELEASE SAVEPOINT ${name}`);
      throw error;
    }
  }

  async messageExists(providerMessageId: string) {
    const result = await this.tx.query(
      'SELECT 1 FROM messages WHERE provider_message_id = $1 LIMIT 1',
      [providerMessageId],
    );
    return result.rows.length > 0;
  }

  async findThread(accountId: string, providerThreadId: string) {
    const result = await this.tx.query<ThreadRow>(
      `SELECT ${THREAD_COLUMNS} FROM threads WHERE account_id = $1 AND provider_thread_id = $2`,
      [accountId, providerThreadId],
    );
    const row = result.rows[0];
    return row ? mapThreadRow(row) : null;
  }

  async insertThread(accountId: string, message: CanonicalMessage) {
    const result = await this.tx.query<ThreadRow>(
      `INSERT INTO threads (account_id, provider_thread_id, subject, snippet, last_message_at)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING ${THREAD_COLUMNS}`,
      [accountId, message.providerThreadId, message.subject, message.snippet, message.date],
    );
    const row = result.rows[0];
    if (!row) {
      throw new Error('thread insert returned no row');
    }
    return mapThreadRow(row);
  }

  async updateThreadActivity(threadId: string, date: Date, snippet: string) {
    await this.tx.query(
      `UPDATE threads
          SET snippet = CASE WHEN $2::timestamptz > last_message_at THEN $3 ELSE snippet END,
              last_message_at = GREATEST(last_message_at, $2::timestamptz)
        WHERE id = $1`,
      [threadId, date, snippet],
    );
  }

  async insertMessage(threadId: string, message: CanonicalMessage) {
    const result = await this.tx.query<{ id: string }>(
      `INSERT INTO messages
         (thread_id, provider_message_id, from_address, to_addresses, cc_addresses, bcc_addresses,
          subject, sent_at, body_text, body_html, snippet, has_attachments)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
       ON CONFLICT (provider_message_id) DO NOTHING
       RETURNING id`,
      [
        threadId,
        message.providerMessageId,
        message.from,
        message.to,
        message.cc,
        message.bcc,
        message.subject,
        message.date,
        message.bodyText,
        message.bodyHtml,
        message.snippet,
        message.hasAttachments,
      ],
    );
    return result.rows[0]?.id ?? null;
  }

  async insertAttachment(messageId: string, attachment: AttachmentMeta) {
    await this.tx.query(
      `INSERT INTO attachments (message_id, provider_attachment_id, filename, mime_type, size_bytes)
       VALUES ($1, $2, $3, $4, $5)`,
      [messageId, attachment.providerAttachmentId, attachment.filename, attachment.mimeType, attachment.size],
    );
  }

  async saveSyncState(accountId: string, cursor: SyncCursor, syncedAt: Date) {
    await this.tx.query(
      `UPDATE accounts
          SET sync_cursor = $2::jsonb,
              last_synced_at = $3,
              sync_error = NULL,
              updated_at = NOW()
        WHERE id = $1`,
      [accountId, JSON.stringify(cursor), syncedAt],
    );
  }
}

export class PgMailStore implements MailStore {
  constructor(private readonly db: Database) {}

  unitOfWork<T>(fn: (tx: MailTransaction) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) => fn(new PgMailTransaction(tx)));
  }
}
