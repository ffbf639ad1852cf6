/**
 * OpenTelemetry Tracing (Opt-in)
 *
 * Wraps pipeline stages, outbound HTTP calls and the Gemini call in spans.
 * No-op by default; the CLI starts the SDK with an OTLP HTTP exporter when
 * tracing is enabled.
 *
 * Enable via environment variables:
 * - OTEL_ENABLED=1
 * - OTEL_SERVICE_NAME=reddit-persona
 * - OTEL_EXPORTER_OTLP_ENDPOINT=http://localhost:4318/v1/traces
 */

import { trace, SpanStatusCode, SpanKind, Span } from '@opentelemetry/api';
import { v4 as uuidv4 } from 'uuid';
import type { Logger } from './Logger';
import { errorMessage } from '../utils/errors';

const TRACER_NAME = 'reddit-persona';
const DEFAULT_OTLP_ENDPOINT = 'http://localhost:4318/v1/traces';

export interface TracingHandle {
  /** Flush pending spans and stop the SDK */
  shutdown(): Promise<void>;
}

/**
 * Check if OpenTelemetry is enabled
 */
export function isOTelEnabled(): boolean {
  return process.env.OTEL_ENABLED === '1' || process.env.OTEL_ENABLED === 'true';
}

/**
 * Get the global tracer instance
 */
export function getTracer() {
  if (!isOTelEnabled()) {
    return null;
  }
  return trace.getTracer(TRACER_NAME);
}

/**
 * Generate a unique correlation ID for one pipeline run
 */
export function generateCorrelationId(): string {
  return uuidv4();
}

/**
 * Execute a function within a span
 *
 * @param name - Span name
 * @param fn - Function to execute
 * @param attributes - Optional span attributes
 * @returns Result of fn
 */
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
        Object.entries(attributes).forEach(([key, value]) => {
          span.setAttribute(key, value);
        });
      }

      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error: unknown) {
      const exception = error instanceof Error ? error : new Error(String(error));
      span.recordException(exception);
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: exception.message,
      });

      throw error;
    } finally {
      span.end();
    }
  });
}

/**
 * Create a span for HTTP requests
 */
export async function withHttpSpan<T>(
  method: string,
  url: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`HTTP ${method}`, fn, {
    'http.method': method,
    'http.url': url,
    'span.kind': SpanKind.CLIENT,
  });
}

/**
 * Create a span for one pipeline stage (collect, synthesize, write)
 */
export async function withStageSpan<T>(
  stage: string,
  runId: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`Persona ${stage}`, fn, {
    'persona.stage': stage,
    'persona.run_id': runId,
  });
}

/**
 * Initialize OpenTelemetry SDK (call once at startup, before the pipeline runs)
 *
 * Reads configuration from environment variables:
 * - OTEL_ENABLED: Enable tracing (default: false)
 * - OTEL_SERVICE_NAME: Service name (default: reddit-persona)
 * - OTEL_EXPORTER_OTLP_ENDPOINT: OTLP endpoint (default: http://localhost:4318/v1/traces)
 *
 * @returns A handle to flush and stop the SDK, or null if tracing is disabled or failed to start
 */
export async function initializeTracing(logger: Logger): Promise<TracingHandle | null> {
  if (!isOTelEnabled()) {
    return null;
  }

  try {
    // Dynamic import to avoid loading the SDK when tracing is off
    const { NodeSDK } = await import('@opentelemetry/sdk-node');
    const { OTLPTraceExporter } = await import('@opentelemetry/exporter-trace-otlp-http');

    const serviceName = process.env.OTEL_SERVICE_NAME || TRACER_NAME;
    const otlpEndpoint = process.env.OTEL_EXPORTER_OTLP_ENDPOINT || DEFAULT_OTLP_ENDPOINT;

    const sdk = new NodeSDK({
      serviceName,
      traceExporter: new OTLPTraceExporter({ url: otlpEndpoint }),
    });

    sdk.start();
    logger.info('Tracing initialized', { serviceName, otlpEndpoint });

    return { shutdown: () => sdk.shutdown() };
  } catch (error: unknown) {
    logger.warn('Failed to initialize tracing', { error: errorMessage(error) });
    return null;
  }
}
