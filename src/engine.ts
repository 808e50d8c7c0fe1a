import type { Settings } from './config/settings.js';
import { createDatabase, createPool } from './db/pool.js';
import type { Logger } from './logger.js';
import { PgAccountRepository, type AccountRepository } from './services/accounts.js';
import { CredentialManager } from './services/credentials.js';
import { createCredentialCipher, type CredentialCipher } from './services/encryption.js';
import { SyncPipeline } from './services/ingestion.js';
import { PgMailStore, type MailStore } from './services/mailStore.js';
import { AccountConnector } from './services/oauthConnect.js';
import { PgOAuthStateStore, type OAuthStateStore } from './services/oauthStates.js';
import { createProviderAdapters, type AdapterOverrides } from './services/providers/index.js';
import type { ProviderAdapters } from './services/providers/types.js';
import { createWorkerUtils, GraphileSyncQueue, type SyncQueue } from './services/queue.js';
import { RetryController } from './services/retryPolicy.js';
import { SyncScheduler } from './services/scheduler.js';
import { PgLeaseStore, type LeaseStore } from './services/syncLease.js';

export interface EngineStores {
  accounts: AccountRepository;
  mailStore: MailStore;
  leases: LeaseStore;
  states: OAuthStateStore;
  queue: SyncQueue;
}

export interface EngineContext {
  logger: Logger;
  cipher: CredentialCipher;
  adapters: ProviderAdapters;
  now?: () => Date;
}

export interface Engine {
  accounts: AccountRepository;
  credentials: CredentialManager;
  pipeline: SyncPipeline;
  retry: RetryController;
  scheduler: SyncScheduler;
  connector: AccountConnector;
  logger: Logger;
}

export const buildEngine = (
  sync: Settings['sync'],
  stores: EngineStores,
  context: EngineContext,
): Engine => {
  const { logger, cipher, adapters, now } = context;
  const credentials = new CredentialManager({
    accounts: stores.accounts,
    adapters,
    cipher,
    logger,
    safetyMarginMs: sync.tokenSafetyMarginMs,
    now,
  });
  const retry = new RetryController({
    scheduler: stores.queue,
    logger,
    baseDelayMs: sync.retryBaseDelayMs,
    maxAttempts: sync.maxRetryAttempts,
    now,
  });
  const pipeline = new SyncPipeline({
    accounts: stores.accounts,
    mailStore: stores.mailStore,
    leases: stores.leases,
    credentials,
    adapters,
    retry,
    logger,
    timeBudgetMs: sync.timeBudgetMs,
    leaseTtlMs: sync.leaseTtlMs,
    now,
  });
  const scheduler = new SyncScheduler(stores.accounts, stores.queue, logger);
  const connector = new AccountConnector({
    accounts: stores.accounts,
    states: stores.states,
    adapters,
    cipher,
    triggerSync: (accountId) => scheduler.trigger(accountId),
    logger,
    now,
  });

  return { accounts: stores.accounts, credentials, pipeline, retry, scheduler, connector, logger };
};

/** Postgres-backed engine for the server and worker processes. */
export const createEngine = async (
  settings: Settings,
  logger: Logger,
  overrides: AdapterOverrides = {},
) => {
  if (settings.sync.leaseTtlMs <= settings.sync.timeBudgetMs) {
    logger.warn(
      { leaseTtlMs: settings.sync.leaseTtlMs, timeBudgetMs: settings.sync.timeBudgetMs },
      'SYNC_LEASE_TTL_MS should exceed SYNC_TIME_BUDGET_MS',
    );
  }

  const db = createDatabase(createPool(settings.databaseUrl));
  const workerUtils = await createWorkerUtils(settings.databaseUrl);
  const engine = buildEngine(
    settings.sync,
    {
      accounts: new PgAccountRepository(db),
      mailStore: new PgMailStore(db),
      leases: new PgLeaseStore(db),
      states: new PgOAuthStateStore(db),
      queue: new GraphileSyncQueue(workerUtils),
    },
    {
      logger,
      cipher: createCredentialCipher(settings.credentialEncryptionKey),
      adapters: createProviderAdapters(settings, overrides),
    },
  );

  return {
    ...engine,
    close: async () => {
      await workerUtils.release();
      await db.end();
    },
  };
};
