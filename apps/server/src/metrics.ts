import { Counter, Histogram, Registry, collectDefaultMetrics } from "prom-client";

export type CacheLookupResult = "hit" | "miss" | "error";
export type SegmentFetchOutcome = "ok" | "integrity_failure" | "error" | "cancelled";

/** Counters the read path reports into. */
export interface PipelineMetrics {
  cacheLookup(result: CacheLookupResult): void;
  segmentFetched(outcome: SegmentFetchOutcome): void;
}

export const noopPipelineMetrics: PipelineMetrics = {
  cacheLookup: () => undefined,
  segmentFetched: () => undefined
};

export interface ServerMetrics {
  registry: Registry;
  httpRequestsTotal: Counter<"method" | "route" | "status_code">;
  httpRequestDuration: Histogram<"method" | "route" | "status_code">;
  pipeline: PipelineMetrics;
}

export function createMetrics(options: { collectDefaults?: boolean } = {}): ServerMetrics {
  const registry = new Registry();
  if (options.collectDefaults ?? true) {
    collectDefaultMetrics({ register: registry });
  }

  const httpRequestsTotal = new Counter({
    name: "segvault_http_requests_total",
    help: "Count of HTTP requests handled by the segvault server.",
    labelNames: ["method", "route", "status_code"] as const,
    registers: [registry]
  });
  const httpRequestDuration = new Histogram({
    name: "segvault_http_request_duration_seconds",
    help: "Request duration in seconds for segvault endpoints.",
    labelNames: ["method", "route", "status_code"] as const,
    buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
    registers: [registry]
  });
  const cacheLookups = new Counter({
    name: "segvault_cache_lookups_total",
    help: "Metadata cache lookups by result.",
    labelNames: ["result"] as const,
    registers: [registry]
  });
  const segmentFetches = new Counter({
    name: "segvault_segment_fetches_total",
    help: "Segment fetch-and-verify units by outcome.",
    labelNames: ["outcome"] as const,
    registers: [registry]
  });

  return {
    registry,
    httpRequestsTotal,
    httpRequestDuration,
    pipeline: {
      cacheLookup: (result) => cacheLookups.inc({ result }),
      segmentFetched: (outcome) => segmentFetches.inc({ outcome })
    }
  };
}
