import type { FastifyBaseLogger } from "fastify";
import { sha256Hex, verifySegmentHash, type FileRecord, type SegmentRecord } from "@segvault/shared";
import type { BlobStore } from "./blobStore.js";
import { FileNotFoundError, IntegrityError, ValidationError, callDependency } from "./errors.js";
import { fanOut } from "./fanOut.js";
import { DEFAULT_CACHE_TTL_SECONDS, type MetadataCache } from "./metadataCache.js";
import type { MetadataStore } from "./metadataStore.js";
import { noopPipelineMetrics, type PipelineMetrics } from "./metrics.js";
import { noopInstrumentation, type Instrumentation } from "./tracing.js";

export interface ReadServiceDeps {
  blobStore: BlobStore;
  metadataStore: MetadataStore;
  metadataCache: MetadataCache;
  logger: FastifyBaseLogger;
  maxInFlightFetches: number;
  cacheTtlSeconds?: number;
  instrumentation?: Instrumentation;
  metrics?: PipelineMetrics;
}

export interface ReadOptions {
  signal?: AbortSignal;
}

export interface ReadResult {
  file: FileRecord;
  content: Buffer;
}

export class ReadService {
  private readonly instrumentation: Instrumentation;
  private readonly metrics: PipelineMetrics;
  private readonly cacheTtlSeconds: number;

  constructor(private readonly deps: ReadServiceDeps) {
    this.instrumentation = deps.instrumentation ?? noopInstrumentation;
    this.metrics = deps.metrics ?? noopPipelineMetrics;
    this.cacheTtlSeconds = deps.cacheTtlSeconds ?? DEFAULT_CACHE_TTL_SECONDS;
  }

  /**
   * Resolves the file through the cache, fetches and verifies every segment
   * concurrently and returns the reassembled content. Either the whole file is
   * returned or the call rejects.
   */
  async read(fileId: string, options: ReadOptions = {}): Promise<ReadResult> {
    if (!fileId.trim()) {
      throw new ValidationError("file id is required");
    }

    return this.instrumentation.trace("read_file", { file_id: fileId }, async (span) => {
      const file = await this.resolveFile(fileId);
      span.setAttributes({ file_name: file.name, file_size: file.size, segment_count: file.segmentCount });

      const plan = await this.loadSegmentPlan(file);
      this.deps.logger.debug({ fileId, segmentCount: plan.length }, "fetching segments");
      const slots = await this.fetchSegments(plan, options.signal);
      const content = await this.reassemble(file, slots);

      this.deps.logger.info({ fileId, size: content.length }, "file read completed");
      return { file, content };
    });
  }

  async resolveFile(fileId: string): Promise<FileRecord> {
    const cached = await this.instrumentation.trace("cache_lookup", { file_id: fileId }, async (span) => {
      try {
        const hit = await this.deps.metadataCache.get(fileId);
        span.setAttributes({ cache_hit: hit !== null });
        return hit;
      } catch (error) {
        span.recordError(error);
        this.metrics.cacheLookup("error");
        this.deps.logger.warn({ fileId, err: error }, "cache lookup failed, falling back to metadata store");
        return undefined;
      }
    });

    if (cached) {
      this.metrics.cacheLookup("hit");
      this.deps.logger.debug({ fileId }, "cache hit");
      return cached;
    }
    if (cached === null) {
      this.metrics.cacheLookup("miss");
      this.deps.logger.debug({ fileId }, "cache miss");
    }

    // Concurrent misses for one id may each query and each repopulate. Files are
    // immutable once written, so every writer stores the same record.
    return this.instrumentation.trace("db_lookup", { file_id: fileId }, async (span) => {
      const file = await callDependency("metadata_store", "failed to load file record", () =>
        this.deps.metadataStore.getFile(fileId)
      );
      if (!file) {
        span.setAttributes({ found: false });
        throw new FileNotFoundError(fileId);
      }

      try {
        await this.deps.metadataCache.set(fileId, file, this.cacheTtlSeconds);
      } catch (error) {
        span.recordError(error);
        this.deps.logger.warn({ fileId, err: error }, "failed to populate cache");
      }
      return file;
    });
  }

  private loadSegmentPlan(file: FileRecord): Promise<SegmentRecord[]> {
    return this.instrumentation.trace("fetch_segment_metadata", { file_id: file.id }, async () => {
      const segments = await callDependency("metadata_store", "failed to load segment records", () =>
        this.deps.metadataStore.getSegments(file.id)
      );

      if (segments.length !== file.segmentCount) {
        throw new IntegrityError(`file ${file.id} has ${segments.length} of ${file.segmentCount} segments`, {
          fileId: file.id,
          expectedSegments: file.segmentCount,
          actualSegments: segments.length
        });
      }
      segments.forEach((segment, position) => {
        if (segment.orderIndex !== position) {
          throw new IntegrityError(`file ${file.id} has a gap in segment order at ${position}`, {
            fileId: file.id,
            position,
            orderIndex: segment.orderIndex
          });
        }
      });
      return segments;
    });
  }

  private fetchSegments(plan: SegmentRecord[], signal?: AbortSignal): Promise<Buffer[]> {
    const concurrency = this.deps.maxInFlightFetches;
    return this.instrumentation.trace(
      "fetch_segments",
      { segment_count: plan.length, max_in_flight: concurrency },
      async (span) => {
        const slots = await fanOut(plan, (segment, _index, unitSignal) => this.fetchSegment(segment, unitSignal), {
          concurrency,
          signal
        });
        span.setAttributes({ all_segments_fetched: true });
        return slots;
      }
    );
  }

  private fetchSegment(segment: SegmentRecord, signal: AbortSignal): Promise<Buffer> {
    return this.instrumentation.trace(
      "fetch_segment",
      { segment_index: segment.orderIndex, object_key: segment.blobKey, segment_size: segment.size },
      async () => {
        try {
          const data = await callDependency(
            "blob_store",
            `failed to fetch segment ${segment.orderIndex}`,
            () => this.deps.blobStore.get(segment.blobKey, { signal }),
            { orderIndex: segment.orderIndex, blobKey: segment.blobKey }
          );

          if (!verifySegmentHash(data, segment.hash)) {
            this.metrics.segmentFetched("integrity_failure");
            throw new IntegrityError(`hash mismatch for segment ${segment.orderIndex}`, {
              fileId: segment.fileId,
              orderIndex: segment.orderIndex,
              blobKey: segment.blobKey,
              expectedHash: segment.hash,
              actualHash: sha256Hex(data)
            });
          }

          this.metrics.segmentFetched("ok");
          return data;
        } catch (error) {
          if (error instanceof IntegrityError) {
            this.deps.logger.error({ err: error, orderIndex: segment.orderIndex }, "segment failed verification");
          } else if (signal.aborted) {
            this.metrics.segmentFetched("cancelled");
          } else {
            this.metrics.segmentFetched("error");
            this.deps.logger.warn({ err: error, orderIndex: segment.orderIndex }, "segment fetch failed");
          }
          throw error;
        }
      }
    );
  }

  private reassemble(file: FileRecord, slots: Buffer[]): Promise<Buffer> {
    return this.instrumentation.trace("reassemble_segments", { segment_count: slots.length }, async () => {
      const content = Buffer.concat(slots);
      if (content.length !== file.size) {
        throw new IntegrityError(`file ${file.id} reassembled to ${content.length} of ${file.size} bytes`, {
          fileId: file.id,
          expectedSize: file.size,
          actualSize: content.length
        });
      }
      return content;
    });
  }
}
