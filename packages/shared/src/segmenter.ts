import { sha256Hex } from "./digest.js";

export const DEFAULT_SEGMENT_SIZE_BYTES = 1024 * 1024;

export interface Segment {
  orderIndex: number;
  data: Buffer;
  hash: string;
  size: number;
}

export interface SplitResult {
  segments: Segment[];
  totalSize: number;
}

function assertSegmentSize(segmentSize: number): void {
  if (!Number.isInteger(segmentSize) || segmentSize <= 0) {
    throw new RangeError("segmentSize must be a positive integer");
  }
}

function toSegment(data: Buffer, orderIndex: number): Segment {
  return {
    orderIndex,
    data,
    hash: sha256Hex(data),
    size: data.length
  };
}

/**
 * Splits `source` into consecutive segments of exactly `segmentSize` bytes; the
 * last one may be shorter but is never empty. Segments are yielded as soon as
 * they fill, so a consumer can upload while the source is still being read.
 *
 * The source is consumed once. Errors from it propagate to the consumer, which
 * owns discarding whatever was already yielded.
 */
export async function* segmentStream(
  source: AsyncIterable<Uint8Array>,
  segmentSize = DEFAULT_SEGMENT_SIZE_BYTES
): AsyncGenerator<Segment, void, undefined> {
  assertSegmentSize(segmentSize);

  let pending: Buffer[] = [];
  let pendingBytes = 0;
  let orderIndex = 0;

  for await (const piece of source) {
    let rest = Buffer.from(piece.buffer, piece.byteOffset, piece.byteLength);
    while (rest.length > 0) {
      const take = Math.min(segmentSize - pendingBytes, rest.length);
      // copied: sources may refill the same buffer for their next piece
      pending.push(Buffer.from(rest.subarray(0, take)));
      pendingBytes += take;
      rest = rest.subarray(take);

      if (pendingBytes === segmentSize) {
        yield toSegment(Buffer.concat(pending, pendingBytes), orderIndex);
        orderIndex += 1;
        pending = [];
        pendingBytes = 0;
      }
    }
  }

  if (pendingBytes > 0) {
    yield toSegment(Buffer.concat(pending, pendingBytes), orderIndex);
  }
}

export async function splitStream(
  source: AsyncIterable<Uint8Array>,
  segmentSize = DEFAULT_SEGMENT_SIZE_BYTES
): Promise<SplitResult> {
  const segments: Segment[] = [];
  let totalSize = 0;
  for await (const segment of segmentStream(source, segmentSize)) {
    segments.push(segment);
    totalSize += segment.size;
  }
  return { segments, totalSize };
}

export function segmentCountFor(totalSize: number, segmentSize: number): number {
  assertSegmentSize(segmentSize);
  return totalSize === 0 ? 0 : Math.ceil(totalSize / segmentSize);
}

export function joinSegments(segments: Pick<Segment, "orderIndex" | "data">[]): Buffer {
  const ordered = [...segments].sort((a, b) => a.orderIndex - b.orderIndex);
  return Buffer.concat(ordered.map((segment) => segment.data));
}
