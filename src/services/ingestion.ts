import type { Logger } from '../logger.js';
import {
  AccessTokenRejectedError,
  AuthExpiredError,
  classifyFailure,
  DuplicateMessageError,
  errorMessage,
  MalformedRecordError,
  SyncTimeoutError,
} from '../shared/errors.js';
import {
  isCursorFor,
  type AccessCredential,
  type AccountRecord,
  type CanonicalMessage,
  type Provider,
  type SyncCursor,
  type SyncResult,
} from '../shared/types.js';
import type { AccountRepository } from './accounts.js';
import type { CredentialManager } from './credentials.js';
import type { MailStore, MailTransaction } from './mailStore.js';
import { throwIfAborted } from './providers/http.js';
import { adapterFor, type DeltaResult, type ProviderAdapter, type ProviderAdapters } from './providers/types.js';
import type { RetryController } from './retryPolicy.js';
import type { LeaseStore } from './syncLease.js';

export interface SyncPipelineDeps {
  accounts: AccountRepository;
  mailStore: MailStore;
  leases: LeaseStore;
  credentials: CredentialManager;
  adapters: ProviderAdapters;
  retry: RetryController;
  logger: Logger;
  timeBudgetMs: number;
  leaseTtlMs: number;
  now?: () => Date;
}

export interface SyncOptions {
  /** 0 for a scheduled or on-demand run, n for the n-th retry. */
  attempt?: number;
}

type RecordOutcome = 'ingested' | 'duplicate';

interface BatchCounts {
  messagesIngested: number;
  duplicatesSkipped: number;
}

export class SyncPipeline {
  private readonly now: () => Date;

  constructor(private readonly deps: SyncPipelineDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async sync(accountId: string, options: SyncOptions = {}): Promise<SyncResult> {
    const lease = await this.deps.leases.acquire(accountId, this.deps.leaseTtlMs);
    if (!lease) {
      this.deps.logger.debug({ accountId }, 'sync already in progress; skipping');
      return { status: 'skipped', reason: 'in progress', messagesIngested: 0 };
    }
    try {
      return await this.runLeased(accountId, options.attempt ?? 0);
    } finally {
      await lease.release().catch((error: unknown) => {
        this.deps.logger.warn({ accountId, err: error }, 'failed to release sync lease; it will expire');
      });
    }
  }

  private async runLeased(accountId: string, attempt: number): Promise<SyncResult> {
    const account = await this.deps.accounts.getAccount(accountId);
    if (!account) {
      return { status: 'skipped', reason: 'account not found', messagesIngested: 0 };
    }
    if (!account.active) {
      return { status: 'skipped', reason: 'account inactive', messagesIngested: 0 };
    }

    try {
      const adapter = adapterFor(this.deps.adapters, account.provider);
      const delta = await this.fetchWithinBudget(adapter, account);
      const { messages, rejected } = this.parseAll(adapter, account, delta);

      const counts = await this.deps.mailStore.unitOfWork(async (tx) => {
        const batch: BatchCounts = { messagesIngested: 0, duplicatesSkipped: 0 };
        for (const message of messages) {
          const outcome = await this.storeRecord(tx, account.id, message);
          if (outcome === 'ingested') {
            batch.messagesIngested += 1;
          } else {
            batch.duplicatesSkipped += 1;
          }
        }
        await tx.saveSyncState(account.id, delta.nextCursor, this.now());
        return batch;
      });

      this.deps.logger.info(
        {
          accountId,
          provider: account.provider,
          mode: delta.mode,
          ingested: counts.messagesIngested,
          duplicates: counts.duplicatesSkipped,
          rejected,
        },
        'sync complete',
      );
      return {
        status: 'success',
        messagesIngested: counts.messagesIngested,
        duplicatesSkipped: counts.duplicatesSkipped,
        recordsRejected: rejected,
        mode: delta.mode,
      };
    } catch (error) {
      return this.fail(account, error, attempt);
    }
  }

  /** Credential check and fetch, both bounded by the sync time budget. */
  private async fetchWithinBudget(
    adapter: ProviderAdapter<Provider>,
    account: AccountRecord,
  ): Promise<DeltaResult<Provider>> {
    const controller = new AbortController();
    const budgetMs = this.deps.timeBudgetMs;
    const timer = setTimeout(() => controller.abort(new SyncTimeoutError(budgetMs)), budgetMs);
    const { signal } = controller;
    try {
      const valid = await this.deps.credentials.ensureValid(account, { signal });
      const cursor = account.cursor && isCursorFor(adapter.provider, account.cursor) ? account.cursor : null;
      const delta = await this.fetchWithReauth(adapter, valid.account, valid.credential, cursor, signal);
      // Never start the write after the budget is spent.
      throwIfAborted(signal);
      return delta;
    } finally {
      clearTimeout(timer);
    }
  }

  private async fetchWithReauth(
    adapter: ProviderAdapter<Provider>,
    account: AccountRecord,
    credential: AccessCredential,
    cursor: SyncCursor | null,
    signal: AbortSignal,
  ) {
    try {
      return await adapter.fetchDelta(credential, cursor, { signal });
    } catch (error) {
      if (!(error instanceof AccessTokenRejectedError)) {
        throw error;
      }
      this.deps.logger.info({ accountId: account.id }, 'access credential rejected; forcing refresh');
    }

    const refreshed = await this.deps.credentials.ensureValid(account, { signal, forceRefresh: true });
    try {
      return await adapter.fetchDelta(refreshed.credential, cursor, { signal });
    } catch (error) {
      if (!(error instanceof AccessTokenRejectedError)) {
        throw error;
      }
      const expired = new AuthExpiredError(account.provider, 'access credential rejected after refresh', {
        status: 401,
        cause: error,
      });
      await this.deps.credentials.deactivate(account, expired);
      throw expired;
    }
  }

  private parseAll(adapter: ProviderAdapter<Provider>, account: AccountRecord, delta: DeltaResult<Provider>) {
    const messages: CanonicalMessage[] = [];
    let rejected = 0;
    for (const raw of delta.records) {
      try {
        messages.push(adapter.parseRecord(raw));
      } catch (error) {
        if (!(error instanceof MalformedRecordError)) {
          throw error;
        }
        rejected += 1;
        this.deps.logger.warn({ accountId: account.id, err: error }, 'rejected malformed record');
      }
    }
    // Oldest first, so a thread's snippet ends on its newest message.
    messages.sort((left, right) => left.date.getTime() - right.date.getTime());
    return { messages, rejected };
  }

  private async storeRecord(tx: MailTransaction, accountId: string, message: CanonicalMessage): Promise<RecordOutcome> {
    try {
      return await tx.isolate<RecordOutcome>(async () => {
        if (await tx.messageExists(message.providerMessageId)) {
          return 'duplicate';
        }
        const existing = await tx.findThread(accountId, message.providerThreadId);
        const thread = existing ?? await tx.insertThread(accountId, message);
        if (existing) {
          await tx.updateThreadActivity(existing.id, message.date, message.snippet);
        }
        const messageId = await tx.insertMessage(thread.id, message);
        if (messageId === null) {
          // Inserted by another account's sync since the existence check.
          throw new DuplicateMessageError(message.providerMessageId);
        }
        for (const attachment of message.attachments) {
          await tx.insertAttachment(messageId, attachment);
        }
        return 'ingested';
      });
    } catch (error) {
      if (error instanceof DuplicateMessageError) {
        return 'duplicate';
      }
      throw error;
    }
  }

  private async fail(account: AccountRecord, error: unknown, attempt: number): Promise<SyncResult> {
    const failure = classifyFailure(error);
    const message = errorMessage(error);

    // Deactivation already recorded the reason for auth failures.
    if (failure !== 'auth') {
      await this.deps.accounts.recordSyncError(account.id, message).catch((recordError: unknown) => {
        this.deps.logger.warn({ accountId: account.id, err: recordError }, 'failed to record sync error');
      });
    }

    const retry = await this.deps.retry.handleFailure(account.id, error, attempt);
    this.deps.logger.warn(
      { accountId: account.id, provider: account.provider, failure, retry, attempt, err: error },
      'sync failed',
    );
    return { status: 'failed', failure, error: message, retry, messagesIngested: 0 };
  }
}
