import { getLogger, type Logger } from '../monitoring/logger.js';
import { errorMessage } from '../errors.js';
import type { TextGenerator } from './types.js';

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  exponentialBase: number;
}

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/** Delay before retry number `attempt` (0-based): base * exp^attempt, capped at max. */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.baseDelayMs * policy.exponentialBase ** attempt, policy.maxDelayMs);
}

/**
 * Wraps any generator with exponential backoff. The last error is rethrown
 * unchanged once `maxRetries` is exhausted.
 */
export class RetryingGenerator implements TextGenerator {
  private readonly logger: Logger;
  private readonly sleep: Sleep;

  constructor(
    private readonly inner: TextGenerator,
    private readonly policy: RetryPolicy,
    opts: { logger?: Logger; sleep?: Sleep } = {},
  ) {
    this.logger = opts.logger ?? getLogger().child({ component: 'RetryingGenerator' });
    this.sleep = opts.sleep ?? defaultSleep;
  }

  get provider(): string {
    return this.inner.provider;
  }

  get model(): string {
    return this.inner.model;
  }

  async generate(prompt: string): Promise<string> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.inner.generate(prompt);
      } catch (err) {
        if (attempt >= this.policy.maxRetries) throw err;
        const delay = backoffDelay(this.policy, attempt);
        this.logger.warn('Model call failed, retrying', {
          provider: this.provider,
          model: this.model,
          attempt: attempt + 1,
          maxRetries: this.policy.maxRetries,
          delayMs: delay,
          error: errorMessage(err),
        });
        await this.sleep(delay);
      }
    }
  }
}
