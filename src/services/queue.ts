import { makeWorkerUtils } from 'graphile-worker';
import type { TaskSpec } from 'graphile-worker';
import type { RetryScheduler } from './retryPolicy.js';

export const SYNC_ACCOUNT_TASK = 'syncAccount';
export const SYNC_ALL_ACCOUNTS_TASK = 'syncAllAccounts';

export interface SyncAccountPayload {
  accountId: string;
  attempt: number;
}

export interface SyncQueue extends RetryScheduler {
  enqueueSync(accountId: string): Promise<void>;
}

/** The slice of graphile-worker's WorkerUtils the queue needs. */
export interface JobAdder {
  addJob(identifier: string, payload: unknown, spec?: TaskSpec): Promise<unknown>;
}

export class GraphileSyncQueue implements SyncQueue {
  constructor(private readonly utils: JobAdder) {}

  // preserve_run_at: repeated triggers collapse into the pending job; one
  // arriving while the job runs is kept and runs after it.
  async enqueueSync(accountId: string) {
    const payload: SyncAccountPayload = { accountId, attempt: 0 };
    const spec: TaskSpec = {
      jobKey: `sync:${accountId}`,
      jobKeyMode: 'preserve_run_at',
      maxAttempts: 1,
    };
    await this.utils.addJob(SYNC_ACCOUNT_TASK, payload, spec);
  }

  async enqueueRetry(accountId: string, attempt: number, runAt: Date) {
    const payload: SyncAccountPayload = { accountId, attempt };
    await this.utils.addJob(SYNC_ACCOUNT_TASK, payload, {
      jobKey: `sync-retry:${accountId}`,
      jobKeyMode: 'replace',
      runAt,
      maxAttempts: 1,
    });
  }
}

export const createWorkerUtils = (connectionString: string) => makeWorkerUtils({ connectionString });

/** One crontab line running the periodic tick every `minutes`. */
export const buildSyncCrontab = (minutes: number) => {
  const interval = Math.max(1, Math.floor(minutes));
  let schedule: string;
  if (interval < 60) {
    schedule = interval === 1 ? '* * * * *' : `*/${interval} * * * *`;
  } else if (interval % 60 === 0 && interval < 24 * 60) {
    const hours = interval / 60;
    schedule = hours === 1 ? '0 * * * *' : `0 */${hours} * * *`;
  } else {
    schedule = '0 0 * * *';
  }
  return `${schedule} ${SYNC_ALL_ACCOUNTS_TASK} ?max=1`;
};
