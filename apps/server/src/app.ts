import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import { z } from "zod";
import type { WriteResponse } from "@segvault/shared";
import type { BlobStore } from "./blobStore.js";
import type { AppConfig } from "./config.js";
import { RequestAbortedError, StorageError, ValidationError, sendError } from "./errors.js";
import type { MetadataCache } from "./metadataCache.js";
import type { MetadataStore } from "./metadataStore.js";
import { createMetrics, type ServerMetrics } from "./metrics.js";
import { ReadService } from "./readService.js";
import type { Instrumentation } from "./tracing.js";
import { WriteService } from "./writeService.js";

export interface AppDeps {
  config: Pick<AppConfig, "segmentSizeBytes" | "maxInFlightFetches" | "cacheTtlSeconds">;
  blobStore: BlobStore;
  metadataStore: MetadataStore;
  metadataCache: MetadataCache;
  instrumentation?: Instrumentation;
  metrics?: ServerMetrics;
  logger?: FastifyServerOptions["logger"];
}

const WriteQuerySchema = z.object({
  name: z.string().optional()
});

const ReadParamsSchema = z.object({
  fileId: z.string().min(1)
});

export function loggerOptions(nodeEnv: string): FastifyServerOptions["logger"] {
  return {
    level: nodeEnv === "development" ? "debug" : "info",
    redact: {
      paths: ["req.headers.authorization"],
      censor: "[REDACTED]"
    },
    transport:
      nodeEnv === "development"
        ? {
            target: "pino-pretty"
          }
        : undefined
  };
}

function encodeExtValue(value: string): string {
  return encodeURIComponent(value).replace(
    /['()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

/** Printable ASCII fallback plus the UTF-8 `filename*` form for any stored name. */
export function attachmentHeader(name: string): string {
  const fallback = name.replace(/[^\x20-\x7e]|["\\]/g, "_");
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeExtValue(name)}`;
}

export function buildServer(deps: AppDeps): FastifyInstance {
  const server = Fastify({ logger: deps.logger ?? false });
  const metrics = deps.metrics ?? createMetrics();

  const writer = new WriteService({
    blobStore: deps.blobStore,
    metadataStore: deps.metadataStore,
    metadataCache: deps.metadataCache,
    logger: server.log.child({ component: "write" }),
    segmentSizeBytes: deps.config.segmentSizeBytes,
    instrumentation: deps.instrumentation
  });
  const reader = new ReadService({
    blobStore: deps.blobStore,
    metadataStore: deps.metadataStore,
    metadataCache: deps.metadataCache,
    logger: server.log.child({ component: "read" }),
    maxInFlightFetches: deps.config.maxInFlightFetches,
    cacheTtlSeconds: deps.config.cacheTtlSeconds,
    instrumentation: deps.instrumentation,
    metrics: metrics.pipeline
  });

  // Upload bodies are streamed straight into the segmenter, whatever their content type.
  server.removeAllContentTypeParsers();
  server.addContentTypeParser("*", (_request, _payload, done) => {
    done(null);
  });

  const requestStartTimes = new WeakMap<object, number>();

  server.addHook("onRequest", (request, _reply, done) => {
    requestStartTimes.set(request, Date.now());
    done();
  });

  server.addHook("onResponse", (request, reply, done) => {
    const startedAt = requestStartTimes.get(request) ?? Date.now();
    const durationSeconds = Math.max(0, Date.now() - startedAt) / 1000;
    const route = request.routeOptions.url ?? request.url.split("?")[0];
    const labels = {
      method: request.method,
      route,
      status_code: String(reply.statusCode)
    };
    metrics.httpRequestsTotal.inc(labels);
    metrics.httpRequestDuration.observe(labels, durationSeconds);
    done();
  });

  server.setErrorHandler((error, request, reply) => {
    if (error instanceof StorageError) {
      if (error.statusCode >= 500) {
        request.log.error({ err: error }, error.message);
      } else {
        request.log.info({ code: error.code }, error.message);
      }
      return sendError(reply, error.statusCode, error.toEnvelope());
    }

    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return sendError(reply, error.statusCode, { code: error.code, message: error.message });
    }

    request.log.error(error);
    return sendError(reply, 500, {
      code: "INTERNAL_ERROR",
      message: "Unexpected server error",
      remediation: "Retry and inspect server logs"
    });
  });

  server.put("/write", async (request, reply) => {
    const query = WriteQuerySchema.safeParse(request.query);
    if (!query.success) {
      throw new ValidationError("name must be given once as a query parameter");
    }

    const result = await writer.write(query.data.name ?? "", request.raw);
    const response: WriteResponse = {
      file_id: result.fileId,
      name: result.name,
      size: result.size,
      segment_count: result.segmentCount,
      message: "File uploaded successfully"
    };
    return reply.status(201).send(response);
  });

  server.get("/read/:fileId", async (request, reply) => {
    const params = ReadParamsSchema.safeParse(request.params);
    if (!params.success) {
      throw new ValidationError("file id is required");
    }

    const controller = new AbortController();
    reply.raw.once("close", () => {
      if (!reply.raw.writableFinished) {
        controller.abort(new RequestAbortedError());
      }
    });

    const { file, content } = await reader.read(params.data.fileId, { signal: controller.signal });
    return reply
      .status(200)
      .header("content-type", "application/octet-stream")
      .header("content-disposition", attachmentHeader(file.name))
      .header("content-length", String(content.length))
      .send(content);
  });

  server.get("/health", async (_request, reply) => {
    return reply.type("text/plain").send("OK");
  });

  server.get("/metrics", async (_request, reply) => {
    reply.header("content-type", metrics.registry.contentType);
    return reply.send(await metrics.registry.metrics());
  });

  return server;
}
