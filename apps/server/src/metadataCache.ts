import type { FastifyBaseLogger } from "fastify";
import { Redis, type RedisOptions } from "ioredis";
import { FileRecordSchema, type FileRecord } from "@segvault/shared";

export const DEFAULT_CACHE_TTL_SECONDS = 300;

/** Disposable shadow of durable file records. A miss is never an error. */
export interface MetadataCache {
  get(fileId: string): Promise<FileRecord | null>;
  set(fileId: string, file: FileRecord, ttlSeconds: number): Promise<void>;
  delete(fileId: string): Promise<void>;
}

/** The ioredis commands the cache issues. */
export interface RedisCommands {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, secondsToken: "EX", seconds: number): Promise<unknown>;
  del(key: string): Promise<number>;
}

export function cacheKey(fileId: string): string {
  return `file:${fileId}`;
}

/** ioredis client whose connection errors go to the logger while it reconnects. */
export function createRedis(
  redisUrl: string,
  logger: Pick<FastifyBaseLogger, "warn">,
  options: RedisOptions = {}
): Redis {
  const redis = new Redis(redisUrl, { maxRetriesPerRequest: 2, ...options });
  redis.on("error", (error: Error) => {
    logger.warn({ err: error }, "redis connection error");
  });
  return redis;
}

export class RedisMetadataCache implements MetadataCache {
  constructor(private readonly redis: RedisCommands) {}

  async get(fileId: string): Promise<FileRecord | null> {
    const raw = await this.redis.get(cacheKey(fileId));
    if (raw === null) {
      return null;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch {
      return null;
    }

    // An entry written by an incompatible release reads as a miss.
    const parsed = FileRecordSchema.safeParse(payload);
    return parsed.success ? parsed.data : null;
  }

  async set(fileId: string, file: FileRecord, ttlSeconds: number): Promise<void> {
    await this.redis.set(cacheKey(fileId), JSON.stringify(file), "EX", ttlSeconds);
  }

  async delete(fileId: string): Promise<void> {
    await this.redis.del(cacheKey(fileId));
  }
}
