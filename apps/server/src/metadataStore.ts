import { z } from "zod";
import { SEGMENT_HASH_PATTERN, type FileRecord, type SegmentRecord } from "@segvault/shared";
import { many, one, type Queryable } from "./db.js";

/**
 * Durable file and segment records. There is no cross-record transaction: a
 * file row is written before its segment rows, and `deleteFile` cascades.
 */
export interface MetadataStore {
  createFile(file: FileRecord): Promise<void>;
  createSegment(segment: SegmentRecord): Promise<void>;
  getFile(fileId: string): Promise<FileRecord | null>;
  /** Segments of a file ordered by `orderIndex` ascending. */
  getSegments(fileId: string): Promise<SegmentRecord[]>;
  deleteFile(fileId: string): Promise<void>;
}

// BIGINT columns arrive as strings.
const FileRowSchema = z.object({
  id: z.string(),
  name: z.string(),
  size: z.coerce.number().int().nonnegative(),
  segment_count: z.coerce.number().int().nonnegative(),
  created_at: z.coerce.date()
});

const SegmentRowSchema = z.object({
  id: z.string(),
  file_id: z.string(),
  order_index: z.coerce.number().int().nonnegative(),
  hash: z.string().regex(SEGMENT_HASH_PATTERN),
  blob_key: z.string(),
  size: z.coerce.number().int().nonnegative()
});

export class PgMetadataStore implements MetadataStore {
  constructor(private readonly pool: Queryable) {}

  async createFile(file: FileRecord): Promise<void> {
    await this.pool.query(
      `INSERT INTO files(id, name, size, segment_count, created_at)
       VALUES($1, $2, $3, $4, $5)`,
      [file.id, file.name, file.size, file.segmentCount, file.createdAt]
    );
  }

  async createSegment(segment: SegmentRecord): Promise<void> {
    await this.pool.query(
      `INSERT INTO segments(id, file_id, order_index, hash, blob_key, size)
       VALUES($1, $2, $3, $4, $5, $6)`,
      [segment.id, segment.fileId, segment.orderIndex, segment.hash, segment.blobKey, segment.size]
    );
  }

  async getFile(fileId: string): Promise<FileRecord | null> {
    const row = await one(
      this.pool,
      FileRowSchema,
      `SELECT id, name, size::text, segment_count, created_at
       FROM files
       WHERE id = $1`,
      [fileId]
    );
    if (!row) {
      return null;
    }

    return {
      id: row.id,
      name: row.name,
      size: row.size,
      segmentCount: row.segment_count,
      createdAt: row.created_at
    };
  }

  async getSegments(fileId: string): Promise<SegmentRecord[]> {
    const rows = await many(
      this.pool,
      SegmentRowSchema,
      `SELECT id, file_id, order_index, hash, blob_key, size::text
       FROM segments
       WHERE file_id = $1
       ORDER BY order_index ASC`,
      [fileId]
    );

    return rows.map((row) => ({
      id: row.id,
      fileId: row.file_id,
      orderIndex: row.order_index,
      hash: row.hash,
      blobKey: row.blob_key,
      size: row.size
    }));
  }

  async deleteFile(fileId: string): Promise<void> {
    await this.pool.query("DELETE FROM files WHERE id = $1", [fileId]);
  }
}
