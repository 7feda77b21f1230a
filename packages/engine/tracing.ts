import { createRequire } from 'node:module';

type OtelApi = typeof import('@opentelemetry/api');

let cachedApi: OtelApi | null | undefined;

function getApi(): OtelApi | null {
  if (cachedApi !== undefined) return cachedApi;
  try {
    const require = createRequire(import.meta.url);
    cachedApi = require('@opentelemetry/api') as OtelApi;
  } catch {
    cachedApi = null;
  }
  return cachedApi;
}

/**
 * Runs `fn` inside a span when the OpenTelemetry API is available. Engine
 * operations are synchronous, so the span closes before this returns.
 */
export function withSpan<T>(name: string, attributes: Record<string, string | number | boolean> | undefined, fn: () => T): T {
  const api = getApi();
  if (!api) {
    return fn();
  }
  const tracer = api.trace.getTracer('canopy');
  const span = tracer.startSpan(name, { attributes });
  try {
    const result = fn();
    span.setStatus({ code: api.SpanStatusCode.OK });
    return result;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    span.recordException(err instanceof Error ? err : message);
    span.setStatus({ code: api.SpanStatusCode.ERROR, message });
    throw err;
  } finally {
    span.end();
  }
}
