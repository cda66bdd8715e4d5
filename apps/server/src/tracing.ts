import { SpanStatusCode, trace, type Tracer } from "@opentelemetry/api";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { resourceFromAttributes } from "@opentelemetry/resources";
import { NodeSDK } from "@opentelemetry/sdk-node";
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from "@opentelemetry/semantic-conventions";
import type { FastifyBaseLogger } from "fastify";
import type { AppConfig } from "./config.js";

export type SpanAttributes = Record<string, string | number | boolean>;

export interface SpanHandle {
  setAttributes(attributes: SpanAttributes): void;
  recordError(error: unknown): void;
}

/**
 * Span sink injected into the storage services. `trace` runs `fn` inside a
 * named span and ends it when `fn` settles; nested calls become child spans.
 */
export interface Instrumentation {
  trace<T>(name: string, attributes: SpanAttributes, fn: (span: SpanHandle) => Promise<T>): Promise<T>;
}

const noopSpan: SpanHandle = {
  setAttributes: () => undefined,
  recordError: () => undefined
};

export const noopInstrumentation: Instrumentation = {
  trace: (_name, _attributes, fn) => fn(noopSpan)
};

export class OtelInstrumentation implements Instrumentation {
  constructor(private readonly tracer: Tracer = trace.getTracer("segvault")) {}

  trace<T>(name: string, attributes: SpanAttributes, fn: (span: SpanHandle) => Promise<T>): Promise<T> {
    return this.tracer.startActiveSpan(name, { attributes }, async (span) => {
      const handle: SpanHandle = {
        setAttributes: (extra) => {
          span.setAttributes(extra);
        },
        recordError: (error) => {
          span.recordException(error instanceof Error ? error : String(error));
        }
      };

      try {
        return await fn(handle);
      } catch (error) {
        handle.recordError(error);
        span.setStatus({ code: SpanStatusCode.ERROR, message: error instanceof Error ? error.message : String(error) });
        throw error;
      } finally {
        span.end();
      }
    });
  }
}

export interface TracingHandle {
  instrumentation: Instrumentation;
  shutdown(): Promise<void>;
}

export function startTracing(config: AppConfig, logger: FastifyBaseLogger): TracingHandle {
  if (!config.otlpEndpoint) {
    logger.info("tracing disabled: OTEL_EXPORTER_OTLP_ENDPOINT is not set");
    return { instrumentation: noopInstrumentation, shutdown: async () => undefined };
  }

  const sdk = new NodeSDK({
    resource: resourceFromAttributes({
      [ATTR_SERVICE_NAME]: config.serviceName,
      [ATTR_SERVICE_VERSION]: "0.1.0",
      "deployment.environment": config.nodeEnv
    }),
    traceExporter: new OTLPTraceExporter({ url: `${config.otlpEndpoint.replace(/\/$/, "")}/v1/traces` })
  });
  sdk.start();
  logger.info({ endpoint: config.otlpEndpoint }, "tracing initialized");

  return {
    instrumentation: new OtelInstrumentation(trace.getTracer(config.serviceName, "0.1.0")),
    shutdown: () => sdk.shutdown()
  };
}
