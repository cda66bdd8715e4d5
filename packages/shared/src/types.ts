import { z } from "zod";

/** Lowercase hex SHA-256 digest. */
export const SEGMENT_HASH_PATTERN = /^[0-9a-f]{64}$/;

export const FileRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1).max(512),
  size: z.number().int().nonnegative(),
  segmentCount: z.number().int().nonnegative(),
  createdAt: z.coerce.date()
});

export const SegmentRecordSchema = z.object({
  id: z.string().min(1),
  fileId: z.string().min(1),
  orderIndex: z.number().int().nonnegative(),
  hash: z.string().regex(SEGMENT_HASH_PATTERN),
  blobKey: z.string().min(1),
  size: z.number().int().nonnegative()
});

export const WriteResultSchema = z.object({
  fileId: z.string().min(1),
  name: z.string().min(1),
  size: z.number().int().nonnegative(),
  segmentCount: z.number().int().nonnegative()
});

/** Body of `PUT /write` responses. */
export const WriteResponseSchema = z.object({
  file_id: z.string(),
  name: z.string(),
  size: z.number().int().nonnegative(),
  segment_count: z.number().int().nonnegative(),
  message: z.string()
});

export const ErrorEnvelopeSchema = z.object({
  code: z.string(),
  message: z.string(),
  remediation: z.string().optional(),
  details: z.record(z.unknown()).optional()
});

export type FileRecord = z.infer<typeof FileRecordSchema>;
export type SegmentRecord = z.infer<typeof SegmentRecordSchema>;
export type WriteResult = z.infer<typeof WriteResultSchema>;
export type WriteResponse = z.infer<typeof WriteResponseSchema>;
export type ErrorEnvelope = z.infer<typeof ErrorEnvelopeSchema>;
