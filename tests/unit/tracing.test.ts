// tests/unit/tracing.test.ts
// OpenTelemetry itself is mocked.

import { describe, it, expect, beforeEach, vi } from 'vitest';
import * as tracing from '../../src/observability/tracing';
import { Logger } from '../../src/observability/Logger';

vi.mock('@opentelemetry/api', () => ({
  trace: {
    getTracer: vi.fn(),
  },
  SpanStatusCode: {
    OK: 1,
    ERROR: 2,
  },
  SpanKind: {
    CLIENT: 2,
  },
}));

const { sdkStart, sdkShutdown } = vi.hoisted(() => ({
  sdkStart: vi.fn(),
  sdkShutdown: vi.fn(),
}));

vi.mock('@opentelemetry/sdk-node', () => ({
  NodeSDK: vi.fn().mockImplementation(() => ({
    start: sdkStart,
    shutdown: sdkShutdown,
  })),
}));

vi.mock('@opentelemetry/exporter-trace-otlp-http', () => ({
  OTLPTraceExporter: vi.fn(),
}));

vi.mock('@opentelemetry/auto-instrumentations-node', () => ({
  getNodeAutoInstrumentations: vi.fn().mockReturnValue([]),
}));

describe('Tracing', () => {
  const mockSpan = {
    setAttribute: vi.fn(),
    recordException: vi.fn(),
    setStatus: vi.fn(),
    end: vi.fn(),
  };

  const mockTracer = {
    startActiveSpan: vi.fn((_name: string, fn: (span: typeof mockSpan) => unknown) => fn(mockSpan)),
  };

  beforeEach(async () => {
    vi.clearAllMocks();
    delete process.env.OTEL_ENABLED;

    const { trace } = await import('@opentelemetry/api');
    vi.mocked(trace.getTracer).mockReturnValue(mockTracer as never);
  });

  describe('Tracing State', () => {
    it('should be disabled by default', () => {
      expect(tracing.isOTelEnabled()).toBe(false);
      expect(tracing.getTracer()).toBeNull();
    });

    it('should be enabled when OTEL_ENABLED=1 or true', () => {
      process.env.OTEL_ENABLED = '1';
      expect(tracing.isOTelEnabled()).toBe(true);
      process.env.OTEL_ENABLED = 'true';
      expect(tracing.isOTelEnabled()).toBe(true);
    });

    it('should be disabled when OTEL_ENABLED=0', () => {
      process.env.OTEL_ENABLED = '0';
      expect(tracing.isOTelEnabled()).toBe(false);
    });
  });

  describe('Span Operations', () => {
    it('should call through without a span when disabled', async () => {
      const seen: unknown[] = [];
      const result = await tracing.withSpan('test-span', async (span) => {
        seen.push(span);
        return 'test-result';
      });

      expect(result).toBe('test-result');
      expect(seen).toEqual([null]);
      expect(mockTracer.startActiveSpan).not.toHaveBeenCalled();
    });

    it('should run inside an active span when enabled', async () => {
      process.env.OTEL_ENABLED = '1';

      const result = await tracing.withSpan('test-span', async () => 'test-result', {
        'test.attr': 'value',
      });

      expect(result).toBe('test-result');
      expect(mockTracer.startActiveSpan).toHaveBeenCalledWith('test-span', expect.any(Function));
      expect(mockSpan.setAttribute).toHaveBeenCalledWith('test.attr', 'value');
      expect(mockSpan.setStatus).toHaveBeenCalledWith({ code: 1 });
      expect(mockSpan.end).toHaveBeenCalledTimes(1);
    });

    it('should record failures and rethrow', async () => {
      process.env.OTEL_ENABLED = '1';

      await expect(
        tracing.withSpan('test-span', async () => {
          throw new Error('Test error');
        })
      ).rejects.toThrow('Test error');

      expect(mockSpan.recordException).toHaveBeenCalledWith(expect.any(Error));
      expect(mockSpan.setStatus).toHaveBeenCalledWith({ code: 2, message: 'Test error' });
      expect(mockSpan.end).toHaveBeenCalledTimes(1);
    });

    it('should name HTTP spans by method', async () => {
      process.env.OTEL_ENABLED = '1';

      await tracing.withHttpSpan('GET', 'https://api.notion.com/v1/pages', async () => 'ok');

      expect(mockTracer.startActiveSpan).toHaveBeenCalledWith('HTTP GET', expect.any(Function));
      expect(mockSpan.setAttribute).toHaveBeenCalledWith('http.method', 'GET');
      expect(mockSpan.setAttribute).toHaveBeenCalledWith(
        'http.url',
        'https://api.notion.com/v1/pages'
      );
    });

    it('should leave query strings out of HTTP spans', async () => {
      process.env.OTEL_ENABLED = '1';

      await tracing.withHttpSpan(
        'GET',
        'https://api.twitter.com/2/users/42/bookmarks?pagination_token=abc',
        async () => 'ok'
      );

      expect(mockSpan.setAttribute).toHaveBeenCalledWith(
        'http.url',
        'https://api.twitter.com/2/users/42/bookmarks'
      );
    });

    it('should tag cycle spans with the mode', async () => {
      process.env.OTEL_ENABLED = '1';

      await tracing.withCycleSpan('backfill', async () => undefined);

      expect(mockTracer.startActiveSpan).toHaveBeenCalledWith('Sync backfill', expect.any(Function));
      expect(mockSpan.setAttribute).toHaveBeenCalledWith('sync.mode', 'backfill');
    });
  });

  describe('initializeTracing', () => {
    const logger = new Logger({ silent: true });

    it('should do nothing when disabled', async () => {
      expect(await tracing.initializeTracing(logger)).toBeNull();
      expect(sdkStart).not.toHaveBeenCalled();
    });

    it('should start the SDK and hand back its shutdown', async () => {
      process.env.OTEL_ENABLED = '1';
      sdkShutdown.mockResolvedValue(undefined);

      const handle = await tracing.initializeTracing(logger);

      expect(sdkStart).toHaveBeenCalledTimes(1);
      expect(handle).not.toBeNull();
      await handle?.shutdown();
      expect(sdkShutdown).toHaveBeenCalledTimes(1);
    });

    it('should log rather than throw when shutdown fails', async () => {
      process.env.OTEL_ENABLED = '1';
      sdkShutdown.mockRejectedValue(new Error('exporter down'));

      const handle = await tracing.initializeTracing(logger);

      await expect(handle?.shutdown()).resolves.toBeUndefined();
    });
  });

  describe('spanUrl', () => {
    it('should keep origin and path', () => {
      expect(tracing.spanUrl('https://api.notion.com/v1/pages?x=1')).toBe('https://api.notion.com/v1/pages');
      expect(tracing.spanUrl('/relative?x=1')).toBe('/relative');
    });
  });
});
