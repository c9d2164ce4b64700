import { trace, metrics, SpanStatusCode, type Span, type Counter } from '@opentelemetry/api';
import { Resource } from '@opentelemetry/resources';
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions';
import { BasicTracerProvider, SimpleSpanProcessor } from '@opentelemetry/sdk-trace-base';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { MeterProvider, PeriodicExportingMetricReader } from '@opentelemetry/sdk-metrics';
import { OTLPMetricExporter } from '@opentelemetry/exporter-metrics-otlp-http';
import type { Config } from './config.js';

const TRACER_NAME = 'sp-list-export';

let tracerProvider: BasicTracerProvider | null = null;
let meterProvider: MeterProvider | null = null;
let initialized = false;

// Metrics
let pageRequestCounter: Counter | null = null;
let recordCounter: Counter | null = null;

/**
 * Initialize OpenTelemetry tracing and metrics
 */
export function initTelemetry(config: Config): void {
  if (!config.otelEnabled || initialized) {
    return;
  }

  const resource = new Resource({
    [ATTR_SERVICE_NAME]: config.otelServiceName,
    [ATTR_SERVICE_VERSION]: '1.0.0',
  });

  if (config.otelEndpoint) {
    const traceExporter = new OTLPTraceExporter({
      url: `${config.otelEndpoint}/v1/traces`,
    });

    tracerProvider = new BasicTracerProvider({ resource });
    tracerProvider.addSpanProcessor(new SimpleSpanProcessor(traceExporter));
    tracerProvider.register();

    const metricExporter = new OTLPMetricExporter({
      url: `${config.otelEndpoint}/v1/metrics`,
    });

    meterProvider = new MeterProvider({
      resource,
      readers: [
        new PeriodicExportingMetricReader({
          exporter: metricExporter,
          exportIntervalMillis: 60000,
        }),
      ],
    });

    metrics.setGlobalMeterProvider(meterProvider);
  }

  const meter = metrics.getMeter(config.otelServiceName);

  pageRequestCounter = meter.createCounter('list.page.requests', {
    description: 'Number of list page requests',
  });

  recordCounter = meter.createCounter('list.records', {
    description: 'Number of list records retrieved',
  });

  initialized = true;
}

/**
 * Flush and shut down telemetry providers
 */
export async function shutdownTelemetry(): Promise<void> {
  if (tracerProvider) {
    await tracerProvider.shutdown();
    tracerProvider = null;
  }
  if (meterProvider) {
    await meterProvider.shutdown();
    meterProvider = null;
  }
  pageRequestCounter = null;
  recordCounter = null;
  initialized = false;
}

/**
 * Run an operation inside an active span
 */
export function withSpan<T>(
  name: string,
  attributes: Record<string, string | number | boolean>,
  fn: (span: Span) => Promise<T>
): Promise<T> {
  const tracer = trace.getTracer(TRACER_NAME);
  return tracer.startActiveSpan(name, async (span) => {
    try {
      Object.entries(attributes).forEach(([key, value]) => {
        span.setAttribute(key, value);
      });
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : 'Unknown error',
      });
      throw error;
    } finally {
      span.end();
    }
  });
}

/**
 * Record one page request and the records it contributed
 */
export function recordPageRequest(listTitle: string, success: boolean, records: number): void {
  if (pageRequestCounter) {
    pageRequestCounter.add(1, {
      list: listTitle,
      success: success.toString(),
    });
  }
  if (success && recordCounter) {
    recordCounter.add(records, { list: listTitle });
  }
}
