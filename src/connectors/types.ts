// src/connectors/types.ts

import type { HttpCore } from '../core/http/HttpCore';
import type { RetryHandler } from '../core/http/RetryHandler';
import type { ServiceName } from '../core/http/types';
import type { Normalizer } from '../core/normalizer/Normalizer';
import type { Logger } from '../observability/Logger';
import type { MetricsCollector } from '../observability/MetricsCollector';

export interface Connector {
  readonly name: ServiceName;
}

export interface CoreDeps {
  http: HttpCore;
  retry: RetryHandler;
  normalizer: Normalizer;
  logger: Logger;
  metrics: MetricsCollector;
}
