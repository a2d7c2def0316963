// src/connectors/BaseConnector.ts

import type { Connector, CoreDeps } from './types';
import type { RetryPolicy, ServiceName } from '../core/http/types';

export abstract class BaseConnector implements Connector {
  abstract readonly name: ServiceName;

  constructor(protected deps: CoreDeps) {}

  /**
   * Runs one logical call under the connector's retry policy
   */
  protected withRetry<T>(label: string, policy: RetryPolicy, task: () => Promise<T>): Promise<T> {
    return this.deps.retry.execute(task, policy, `${this.name}:${label}`);
  }

  /** `baseMs * 2^attempt`, attempt zero-based */
  protected backoff(attempt: number, baseMs: number): number {
    return baseMs * 2 ** attempt;
  }
}
