// src/core/http/RetryHandler.ts

import type { RetryPolicy, Sleep } from './types';
import type { Logger } from '../../observability/Logger';
import { toError } from '../../utils/errors';

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export class RetryHandler {
  constructor(
    private logger: Logger,
    private wait: Sleep = sleep
  ) {}

  async execute<T>(task: () => Promise<T>, policy: RetryPolicy, label: string): Promise<T> {
    let lastError: Error = new Error(`${label}: no attempts made`);

    for (let attempt = 0; attempt < policy.maxAttempts; attempt++) {
      try {
        return await task();
      } catch (error: unknown) {
        lastError = toError(error);

        if (attempt === policy.maxAttempts - 1) {
          throw lastError;
        }

        const delay = policy.delayFor(lastError, attempt);
        if (delay === null) {
          throw lastError;
        }

        this.logger.warn('Retrying request', {
          label,
          attempt: attempt + 1,
          maxAttempts: policy.maxAttempts,
          delay,
          error: lastError.message,
        });

        await this.wait(delay);
      }
    }

    throw lastError;
  }

  /** Plain wait through the injected sleep, for waits outside a retry. */
  async pause(ms: number): Promise<void> {
    await this.wait(ms);
  }
}
