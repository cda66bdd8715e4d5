import {
  CreateBucketCommand,
  DeleteObjectCommand,
  GetObjectCommand,
  HeadBucketCommand,
  PutObjectCommand
} from "@aws-sdk/client-s3";
import { describe, expect, it, vi } from "vitest";
import { BlobNotFoundError } from "./errors.js";
import { S3BlobStore } from "./s3BlobStore.js";

const options = {
  endpoint: "http://localhost:9000",
  bucket: "segvault-test",
  accessKeyId: "test-access",
  secretAccessKey: "test-secret",
  region: "us-east-1"
};

function namedError(name: string, message = name): Error {
  const error = new Error(message);
  error.name = name;
  return error;
}

describe("S3BlobStore", () => {
  it("puts objects with their length and an abort signal", async () => {
    const send = vi.fn().mockResolvedValue({});
    const store = new S3BlobStore(options, { send });
    const controller = new AbortController();

    await store.put("segments/f/0", Buffer.from("abcd"), { signal: controller.signal });

    const [command, sendOptions] = send.mock.calls[0];
    expect(command).toBeInstanceOf(PutObjectCommand);
    expect(command.input).toMatchObject({
      Bucket: "segvault-test",
      Key: "segments/f/0",
      ContentLength: 4,
      ContentType: "application/octet-stream"
    });
    expect(sendOptions).toEqual({ abortSignal: controller.signal });
  });

  it("reads the object body into a buffer", async () => {
    const send = vi.fn().mockResolvedValue({
      Body: { transformToByteArray: async () => new Uint8Array([104, 105]) }
    });
    const store = new S3BlobStore(options, { send });

    const bytes = await store.get("segments/f/1");

    expect(bytes.toString("utf8")).toBe("hi");
    expect(send.mock.calls[0][0]).toBeInstanceOf(GetObjectCommand);
    expect(send.mock.calls[0][0].input).toEqual({ Bucket: "segvault-test", Key: "segments/f/1" });
  });

  it("maps a missing key to BlobNotFoundError", async () => {
    const send = vi.fn().mockRejectedValue(namedError("NoSuchKey"));
    const store = new S3BlobStore(options, { send });

    await expect(store.get("segments/f/2")).rejects.toBeInstanceOf(BlobNotFoundError);
  });

  it("passes other failures through unchanged", async () => {
    const failure = namedError("SlowDown", "please reduce your request rate");
    const store = new S3BlobStore(options, { send: vi.fn().mockRejectedValue(failure) });

    await expect(store.get("segments/f/3")).rejects.toBe(failure);
  });

  it("fails when the response has no body", async () => {
    const store = new S3BlobStore(options, { send: vi.fn().mockResolvedValue({}) });

    await expect(store.get("segments/f/4")).rejects.toThrow("Missing object body for segments/f/4");
  });

  it("deletes objects by key", async () => {
    const send = vi.fn().mockResolvedValue({});
    const store = new S3BlobStore(options, { send });

    await store.delete("segments/f/5");

    expect(send.mock.calls[0][0]).toBeInstanceOf(DeleteObjectCommand);
    expect(send.mock.calls[0][0].input).toEqual({ Bucket: "segvault-test", Key: "segments/f/5" });
  });

  it("creates the bucket only when it is missing", async () => {
    const send = vi
      .fn()
      .mockRejectedValueOnce(Object.assign(namedError("Unknown"), { $metadata: { httpStatusCode: 404 } }))
      .mockResolvedValueOnce({});
    const store = new S3BlobStore(options, { send });

    await expect(store.ensureBucket()).resolves.toBe(true);
    expect(send.mock.calls[0][0]).toBeInstanceOf(HeadBucketCommand);
    expect(send.mock.calls[1][0]).toBeInstanceOf(CreateBucketCommand);

    const existing = new S3BlobStore(options, { send: vi.fn().mockResolvedValue({}) });
    await expect(existing.ensureBucket()).resolves.toBe(false);
  });
});
