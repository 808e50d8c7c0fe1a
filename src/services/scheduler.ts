import type { Logger } from '../logger.js';
import type { AccountRepository } from './accounts.js';
import type { SyncQueue } from './queue.js';

export interface TickResult {
  enqueued: number;
  failed: number;
}

/**
 * Both trigger sources end in the same queued `syncAccount` job; the lease taken by
 * the pipeline is what actually keeps one account to one run.
 */
export class SyncScheduler {
  constructor(
    private readonly accounts: AccountRepository,
    private readonly queue: SyncQueue,
    private readonly logger: Logger,
  ) {}

  async tick(): Promise<TickResult> {
    const accountIds = await this.accounts.listActiveAccountIds();
    const result: TickResult = { enqueued: 0, failed: 0 };
    for (const accountId of accountIds) {
      try {
        await this.queue.enqueueSync(accountId);
        result.enqueued += 1;
      } catch (error) {
        result.failed += 1;
        this.logger.warn({ accountId, err: error }, 'failed to enqueue periodic sync');
      }
    }
    this.logger.info(result, 'sync tick');
    return result;
  }

  async trigger(accountId: string) {
    await this.queue.enqueueSync(accountId);
    this.logger.debug({ accountId }, 'on-demand sync enqueued');
  }
}
