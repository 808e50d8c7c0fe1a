import type { TaskList } from 'graphile-worker';
import { z } from 'zod';
import type { Engine } from '../engine.js';
import { SYNC_ACCOUNT_TASK, SYNC_ALL_ACCOUNTS_TASK } from '../services/queue.js';

const syncAccountPayloadSchema = z.object({
  accountId: z.string().uuid(),
  attempt: z.number().int().min(0).default(0),
});

export const createTaskList = (engine: Pick<Engine, 'pipeline' | 'scheduler' | 'logger'>) => ({
  [SYNC_ACCOUNT_TASK]: async (payload: unknown) => {
    const parsed = syncAccountPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      engine.logger.warn({ payload }, 'dropping syncAccount job with invalid payload');
      return;
    }
    // Failures are handled by the retry controller; the job itself never fails on them.
    await engine.pipeline.sync(parsed.data.accountId, { attempt: parsed.data.attempt });
  },
  [SYNC_ALL_ACCOUNTS_TASK]: async () => {
    await engine.scheduler.tick();
  },
}) satisfies TaskList;
