import type { FastifyBaseLogger } from "fastify";
import { v4 as uuidv4 } from "uuid";
import {
  segmentStream,
  type FileRecord,
  type Segment,
  type SegmentRecord,
  type WriteResult
} from "@segvault/shared";
import { segmentKey, type BlobStore } from "./blobStore.js";
import { InputStreamError, ValidationError, callDependency } from "./errors.js";
import type { MetadataCache } from "./metadataCache.js";
import type { MetadataStore } from "./metadataStore.js";
import { noopInstrumentation, type Instrumentation } from "./tracing.js";

const MAX_NAME_LENGTH = 512;

export interface WriteServiceDeps {
  blobStore: BlobStore;
  metadataStore: MetadataStore;
  metadataCache: MetadataCache;
  logger: FastifyBaseLogger;
  segmentSizeBytes: number;
  instrumentation?: Instrumentation;
}

interface WriteProgress {
  uploadedKeys: string[];
  fileRowAttempted: boolean;
}

export class WriteService {
  private readonly instrumentation: Instrumentation;

  constructor(private readonly deps: WriteServiceDeps) {
    this.instrumentation = deps.instrumentation ?? noopInstrumentation;
  }

  async write(name: string, source: AsyncIterable<Uint8Array>): Promise<WriteResult> {
    const trimmed = name.trim();
    if (!trimmed) {
      throw new ValidationError("name is required");
    }
    if (trimmed.length > MAX_NAME_LENGTH) {
      throw new ValidationError(`name must be at most ${MAX_NAME_LENGTH} characters`, {
        length: trimmed.length
      });
    }

    const fileId = uuidv4();
    return this.instrumentation.trace("write_file", { file_id: fileId, file_name: trimmed }, async (span) => {
      const progress: WriteProgress = { uploadedKeys: [], fileRowAttempted: false };
      try {
        const segments = await this.uploadSegments(fileId, source, progress);
        const size = segments.reduce((total, segment) => total + segment.size, 0);
        span.setAttributes({ file_size: size, segment_count: segments.length });
        this.deps.logger.info({ fileId, size, segmentCount: segments.length }, "segments uploaded");

        const file: FileRecord = {
          id: fileId,
          name: trimmed,
          size,
          segmentCount: segments.length,
          createdAt: new Date()
        };
        await this.saveMetadata(file, segments, progress);
        await this.invalidateCache(fileId);

        this.deps.logger.info({ fileId, name: trimmed }, "file write completed");
        return { fileId, name: trimmed, size, segmentCount: segments.length };
      } catch (error) {
        await this.compensate(fileId, progress);
        throw error;
      }
    });
  }

  private uploadSegments(
    fileId: string,
    source: AsyncIterable<Uint8Array>,
    progress: WriteProgress
  ): Promise<SegmentRecord[]> {
    return this.instrumentation.trace("segment_stream", { file_id: fileId }, async (span) => {
      const records: SegmentRecord[] = [];
      const segments = segmentStream(source, this.deps.segmentSizeBytes);

      try {
        while (true) {
          let step: IteratorResult<Segment, void>;
          try {
            step = await segments.next();
          } catch (error) {
            throw new InputStreamError(error);
          }
          if (step.done) {
            break;
          }

          const segment = step.value;
          const blobKey = segmentKey(fileId, segment.orderIndex);
          await this.instrumentation.trace(
            "upload_segment",
            { segment_index: segment.orderIndex, object_key: blobKey, segment_size: segment.size },
            () =>
              callDependency(
                "blob_store",
                `failed to upload segment ${segment.orderIndex}`,
                () => this.deps.blobStore.put(blobKey, segment.data),
                { orderIndex: segment.orderIndex, blobKey }
              )
          );
          progress.uploadedKeys.push(blobKey);

          records.push({
            id: uuidv4(),
            fileId,
            orderIndex: segment.orderIndex,
            hash: segment.hash,
            blobKey,
            size: segment.size
          });
        }
      } finally {
        // releases the source when an upload fails mid-stream
        await segments.return(undefined);
      }

      span.setAttributes({ segments_uploaded: records.length });
      return records;
    });
  }

  private saveMetadata(file: FileRecord, segments: SegmentRecord[], progress: WriteProgress): Promise<void> {
    return this.instrumentation.trace("save_metadata", { file_id: file.id }, async () => {
      progress.fileRowAttempted = true;
      await callDependency("metadata_store", "failed to create file record", () =>
        this.deps.metadataStore.createFile(file)
      );
      for (const segment of segments) {
        await callDependency(
          "metadata_store",
          `failed to create segment record ${segment.orderIndex}`,
          () => this.deps.metadataStore.createSegment(segment),
          { orderIndex: segment.orderIndex }
        );
      }
    });
  }

  private invalidateCache(fileId: string): Promise<void> {
    return this.instrumentation.trace("invalidate_cache", { file_id: fileId }, async (span) => {
      try {
        await this.deps.metadataCache.delete(fileId);
      } catch (error) {
        span.recordError(error);
        this.deps.logger.warn({ fileId, err: error }, "failed to invalidate cache entry");
      }
    });
  }

  /**
   * Best-effort removal of what a failed write left behind: the file row (its
   * segment rows cascade) and every blob uploaded so far. Failures here are
   * logged and never replace the error that triggered the cleanup.
   */
  private async compensate(fileId: string, progress: WriteProgress): Promise<void> {
    if (progress.fileRowAttempted) {
      try {
        await this.deps.metadataStore.deleteFile(fileId);
      } catch (error) {
        this.deps.logger.error({ fileId, err: error }, "failed to remove partial file metadata");
      }
    }

    const orphaned: string[] = [];
    for (const key of progress.uploadedKeys) {
      try {
        await this.deps.blobStore.delete(key);
      } catch (error) {
        orphaned.push(key);
        this.deps.logger.error({ fileId, key, err: error }, "failed to remove uploaded segment");
      }
    }

    if (progress.fileRowAttempted || progress.uploadedKeys.length > 0) {
      this.deps.logger.warn(
        { fileId, removedBlobs: progress.uploadedKeys.length - orphaned.length, orphanedBlobs: orphaned },
        "rolled back failed write"
      );
    }
  }
}
