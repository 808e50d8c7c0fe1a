import type { Logger } from '../logger.js';
import { classifyFailure, TransientProviderError } from '../shared/errors.js';
import type { RetryDecision } from '../shared/types.js';

export interface RetryScheduler {
  enqueueRetry(accountId: string, attempt: number, runAt: Date): Promise<void>;
}

export interface RetryControllerDeps {
  scheduler: RetryScheduler;
  logger: Logger;
  baseDelayMs: number;
  maxAttempts: number;
  now?: () => Date;
}

export class RetryController {
  private readonly now: () => Date;

  constructor(private readonly deps: RetryControllerDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  delayFor(attempt: number) {
    return this.deps.baseDelayMs * 2 ** attempt;
  }

  /** `attempt` is 0 for the first try of a cycle. */
  decide(error: unknown, attempt: number): RetryDecision {
    const failure = classifyFailure(error);
    if (failure === 'auth') {
      return { action: 'deactivate' };
    }
    if (failure === 'permanent') {
      return { action: 'abandon', reason: 'permanent failure' };
    }
    if (attempt >= this.deps.maxAttempts) {
      return { action: 'abandon', reason: 'retries exhausted' };
    }
    const retryAfterMs = error instanceof TransientProviderError ? error.retryAfterMs ?? 0 : 0;
    return {
      action: 'retry',
      attempt: attempt + 1,
      delayMs: Math.max(this.delayFor(attempt), retryAfterMs),
    };
  }

  /** Decides, and for a retry enqueues the delayed re-trigger. */
  async handleFailure(accountId: string, error: unknown, attempt: number): Promise<RetryDecision> {
    const decision = this.decide(error, attempt);
    if (decision.action !== 'retry') {
      return decision;
    }
    const runAt = new Date(this.now().getTime() + decision.delayMs);
    try {
      await this.deps.scheduler.enqueueRetry(accountId, decision.attempt, runAt);
    } catch (scheduleError) {
      this.deps.logger.error({ accountId, err: scheduleError }, 'failed to schedule sync retry');
      return { action: 'abandon', reason: 'retry scheduling failed' };
    }
    return decision;
  }
}
