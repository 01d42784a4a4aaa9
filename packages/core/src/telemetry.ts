import { NodeSDK } from '@opentelemetry/sdk-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-grpc';
import { OTLPMetricExporter } from '@opentelemetry/exporter-metrics-otlp-grpc';
import { PeriodicExportingMetricReader } from '@opentelemetry/sdk-metrics';
import { SpanStatusCode, metrics, trace } from '@opentelemetry/api';
import type { Attributes, Meter, Tracer } from '@opentelemetry/api';

let sdk: NodeSDK | undefined;

/**
 * Start the OpenTelemetry SDK with OTLP gRPC exporters.
 *
 * No-op unless an endpoint is passed or `OTEL_EXPORTER_OTLP_ENDPOINT` is set; the API then
 * hands out no-op tracers and meters.
 */
export function initTelemetry(opts: { serviceName: string; otlpEndpoint?: string }): void {
  if (sdk) {
    throw new Error('initTelemetry() has already been called. Call shutdownTelemetry() first.');
  }

  const endpoint = opts.otlpEndpoint ?? process.env['OTEL_EXPORTER_OTLP_ENDPOINT'];
  if (!endpoint) return;

  sdk = new NodeSDK({
    serviceName: opts.serviceName,
    traceExporter: new OTLPTraceExporter({ url: endpoint }),
    metricReader: new PeriodicExportingMetricReader({
      exporter: new OTLPMetricExporter({ url: endpoint }),
    }),
  });
  sdk.start();
}

/** Flush and stop the SDK. Resolves immediately if it was never started. */
export async function shutdownTelemetry(): Promise<void> {
  const instance = sdk;
  sdk = undefined;
  await instance?.shutdown();
}

export function getTracer(name: string): Tracer {
  return trace.getTracer(name);
}

export function getMeter(name: string): Meter {
  return metrics.getMeter(name);
}

/**
 * Run `fn` inside a span. The span is marked ERROR and the error rethrown when `fn` rejects.
 */
export async function withSpan<T>(
  tracer: Tracer,
  name: string,
  attributes: Attributes,
  fn: () => Promise<T>,
): Promise<T> {
  const span = tracer.startSpan(name, { attributes });
  try {
    const result = await fn();
    span.setStatus({ code: SpanStatusCode.OK });
    return result;
  } catch (err) {
    span.setStatus({ code: SpanStatusCode.ERROR, message: String(err) });
    throw err;
  } finally {
    span.end();
  }
}
