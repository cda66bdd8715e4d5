import { createHash } from "node:crypto";

export const SEGMENT_HASH_ALGORITHM = "sha256";

export function sha256Hex(input: Uint8Array | string): string {
  return createHash(SEGMENT_HASH_ALGORITHM).update(input).digest("hex");
}

/**
 * Recomputes the digest of `bytes` with the algorithm used at write time and
 * compares it with the recorded hash.
 */
export function verifySegmentHash(bytes: Uint8Array, expectedHash: string): boolean {
  return sha256Hex(bytes) === expectedHash;
}
