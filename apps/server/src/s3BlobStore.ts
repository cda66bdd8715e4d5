import {
  CreateBucketCommand,
  DeleteObjectCommand,
  GetObjectCommand,
  HeadBucketCommand,
  PutObjectCommand,
  S3Client
} from "@aws-sdk/client-s3";
import type { BlobCallOptions, BlobStore } from "./blobStore.js";
import { BlobNotFoundError } from "./errors.js";

export interface S3BlobStoreOptions {
  endpoint: string;
  bucket: string;
  accessKeyId: string;
  secretAccessKey: string;
  region: string;
}

export type S3Sender = Pick<S3Client, "send">;

function errorName(error: unknown): string | undefined {
  return error instanceof Error ? error.name : undefined;
}

function httpStatus(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null || !("$metadata" in error)) {
    return undefined;
  }
  const metadata = error.$metadata;
  if (typeof metadata !== "object" || metadata === null || !("httpStatusCode" in metadata)) {
    return undefined;
  }
  return typeof metadata.httpStatusCode === "number" ? metadata.httpStatusCode : undefined;
}

function isNotFound(error: unknown): boolean {
  const name = errorName(error);
  return name === "NoSuchKey" || name === "NotFound" || name === "NoSuchBucket" || httpStatus(error) === 404;
}

export class S3BlobStore implements BlobStore {
  private readonly client: S3Sender;

  constructor(
    private readonly options: S3BlobStoreOptions,
    client?: S3Sender
  ) {
    this.client =
      client ??
      new S3Client({
        endpoint: options.endpoint,
        region: options.region,
        forcePathStyle: true,
        credentials: {
          accessKeyId: options.accessKeyId,
          secretAccessKey: options.secretAccessKey
        }
      });
  }

  /** Creates the bucket when it does not exist yet. Returns true if it was created. */
  async ensureBucket(): Promise<boolean> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.options.bucket }));
      return false;
    } catch (error) {
      if (!isNotFound(error)) {
        throw error;
      }
    }

    await this.client.send(new CreateBucketCommand({ Bucket: this.options.bucket }));
    return true;
  }

  async put(key: string, bytes: Buffer, options: BlobCallOptions = {}): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.options.bucket,
        Key: key,
        Body: bytes,
        ContentLength: bytes.length,
        ContentType: "application/octet-stream"
      }),
      { abortSignal: options.signal }
    );
  }

  async get(key: string, options: BlobCallOptions = {}): Promise<Buffer> {
    const response = await this.client
      .send(
        new GetObjectCommand({
          Bucket: this.options.bucket,
          Key: key
        }),
        { abortSignal: options.signal }
      )
      .catch((error: unknown) => {
        if (isNotFound(error)) {
          throw new BlobNotFoundError(key, { cause: error });
        }
        throw error;
      });

    const body = response.Body;
    if (!body) {
      throw new Error(`Missing object body for ${key}`);
    }
    return Buffer.from(await body.transformToByteArray());
  }

  async delete(key: string): Promise<void> {
    await this.client.send(
      new DeleteObjectCommand({
        Bucket: this.options.bucket,
        Key: key
      })
    );
  }
}
