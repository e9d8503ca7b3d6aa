import { SpanStatusCode, metrics, trace, type Attributes } from "@opentelemetry/api";

const otelTracer = trace.getTracer("caddyfile-engine");
const otelMeter = metrics.getMeter("caddyfile-engine");

export const validationCounter = otelMeter.createCounter("caddyfile.validations", {
  description: "Validation runs by outcome",
});
export const adminRequestCounter = otelMeter.createCounter("caddyfile.admin.requests", {
  description: "Requests sent to the Caddy admin API",
});
export const adminErrorCounter = otelMeter.createCounter("caddyfile.admin.errors", {
  description: "Admin API requests that failed or returned a non-2xx status",
});
export const adminDurationHistogram = otelMeter.createHistogram("caddyfile.admin.duration", {
  description: "Admin API request duration in milliseconds",
  unit: "ms",
});

/** Round milliseconds to 2 decimal places */
export function roundMs(ms: number): number {
  return Math.round(ms * 100) / 100;
}

/**
 * Run `fn` inside an active span; a thrown error is recorded on the span and
 * rethrown unchanged.
 */
export function withSpan<T>(name: string, attributes: Attributes, fn: () => Promise<T>): Promise<T> {
  return otelTracer.startActiveSpan(name, { attributes }, async (span) => {
    try {
      return await fn();
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      span.recordException(error);
      span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
      throw err;
    } finally {
      span.end();
    }
  });
}
