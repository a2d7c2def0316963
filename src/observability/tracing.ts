/**
 * OpenTelemetry tracing (opt-in)
 *
 * HTTP calls and sync cycles run inside spans when enabled; otherwise every
 * helper calls straight through.
 *
 * Enable via environment variables:
 * - OTEL_ENABLED=1
 * - OTEL_SERVICE_NAME=bookmark-mirror
 * - OTEL_EXPORTER_OTLP_ENDPOINT=http://localhost:4318/v1/traces
 */

import { trace, SpanStatusCode, SpanKind } from '@opentelemetry/api';
import type { Span, Tracer } from '@opentelemetry/api';
import type { Logger } from './Logger';
import { toError } from '../utils/errors';

const TRACER_NAME = 'bookmark-mirror';

export function isOTelEnabled(): boolean {
  return process.env.OTEL_ENABLED === '1' || process.env.OTEL_ENABLED === 'true';
}

export function getTracer(): Tracer | null {
  if (!isOTelEnabled()) {
    return null;
  }
  return trace.getTracer(TRACER_NAME);
}

/** Runs `fn` inside an active span, or directly with `null` when tracing is off. */
export async function withSpan<T>(
  name: string,
  fn: (span: Span | null) => Promise<T>,
  attributes?: Record<string, string | number | boolean>
): Promise<T> {
  const tracer = getTracer();

  if (!tracer) {
    return fn(null);
  }

  return tracer.startActiveSpan(name, async (span) => {
    try {
      if (attributes) {
        for (const [key, value] of Object.entries(attributes)) {
          span.setAttribute(key, value);
        }
      }

      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error: unknown) {
      const err = toError(error);
      span.recordException(err);
      span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
      throw error;
    } finally {
      span.end();
    }
  });
}

/** Query strings carry cursors and search terms; spans keep origin and path. */
export function spanUrl(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.origin}${parsed.pathname}`;
  } catch {
    return url.split('?')[0];
  }
}

export async function withHttpSpan<T>(
  method: string,
  url: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`HTTP ${method}`, fn, {
    'http.method': method,
    'http.url': spanUrl(url),
    'span.kind': SpanKind.CLIENT,
  });
}

/**
 * Span around one sync pass
 *
 * @param mode - 'cycle' or 'backfill'
 */
export async function withCycleSpan<T>(
  mode: 'cycle' | 'backfill',
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`Sync ${mode}`, fn, { 'sync.mode': mode });
}

export interface TracingHandle {
  /** Flushes pending spans and stops the SDK */
  shutdown(): Promise<void>;
}

/**
 * Starts the OpenTelemetry Node SDK. Call once at startup, before any request;
 * null when tracing is off or the SDK could not start.
 */
export async function initializeTracing(logger: Logger): Promise<TracingHandle | null> {
  if (!isOTelEnabled()) {
    return null;
  }

  try {
    const { NodeSDK } = await import('@opentelemetry/sdk-node');
    const { OTLPTraceExporter } = await import('@opentelemetry/exporter-trace-otlp-http');
    const { getNodeAutoInstrumentations } = await import(
      '@opentelemetry/auto-instrumentations-node'
    );

    const serviceName = process.env.OTEL_SERVICE_NAME || TRACER_NAME;
    const otlpEndpoint =
      process.env.OTEL_EXPORTER_OTLP_ENDPOINT || 'http://localhost:4318/v1/traces';

    const sdk = new NodeSDK({
      serviceName,
      traceExporter: new OTLPTraceExporter({ url: otlpEndpoint }),
      instrumentations: [
        getNodeAutoInstrumentations({
          // HTTP spans come from HttpCore
          '@opentelemetry/instrumentation-http': { enabled: false },
          '@opentelemetry/instrumentation-fs': { enabled: false },
        }),
      ],
    });

    sdk.start();
    logger.info('Tracing initialized', { serviceName, otlpEndpoint });

    return {
      shutdown: async () => {
        try {
          await sdk.shutdown();
          logger.info('Tracing terminated');
        } catch (error: unknown) {
          logger.error('Error terminating tracing', { error: toError(error).message });
        }
      },
    };
  } catch (error: unknown) {
    logger.error('Failed to initialize tracing', { error: toError(error).message });
    return null;
  }
}
