import { mkdir } from "node:fs/promises";
import { pino } from "pino";
import { buildServer, loggerOptions } from "./app.js";
import { LocalBlobStore, type BlobStore } from "./blobStore.js";
import { readConfig } from "./config.js";
import { createPool, runMigrations } from "./db.js";
import { RedisMetadataCache, createRedis } from "./metadataCache.js";
import { PgMetadataStore } from "./metadataStore.js";
import { S3BlobStore } from "./s3BlobStore.js";
import { startTracing } from "./tracing.js";

const config = readConfig();
const bootLogger = pino({ level: config.nodeEnv === "development" ? "debug" : "info" });
const tracing = startTracing(config, bootLogger);

const pool = createPool(config.databaseUrl, bootLogger);
const redis = createRedis(config.redisUrl, bootLogger);

let blobStore: BlobStore;
if (config.blobStoreMode === "minio") {
  const s3 = new S3BlobStore({
    endpoint: config.minioEndpoint,
    bucket: config.minioBucket,
    accessKeyId: config.minioAccessKey,
    secretAccessKey: config.minioSecretKey,
    region: config.minioRegion
  });
  if (await s3.ensureBucket()) {
    bootLogger.info({ bucket: config.minioBucket }, "created bucket");
  }
  blobStore = s3;
} else {
  await mkdir(config.dataDir, { recursive: true });
  blobStore = new LocalBlobStore(config.dataDir);
}

if (config.runMigrations) {
  await runMigrations(pool);
}

const server = buildServer({
  config,
  blobStore,
  metadataStore: new PgMetadataStore(pool),
  metadataCache: new RedisMetadataCache(redis),
  instrumentation: tracing.instrumentation,
  logger: loggerOptions(config.nodeEnv)
});

async function shutdown(signal: string): Promise<void> {
  server.log.info({ signal }, "shutting down");
  await server.close();
  await Promise.allSettled([pool.end(), redis.quit(), tracing.shutdown()]);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        server.log.error(error);
        process.exit(1);
      });
  });
}

async function start(): Promise<void> {
  try {
    await server.listen({ port: config.port, host: config.host });
    server.log.info(
      { port: config.port, blobStoreMode: config.blobStoreMode, segmentSizeBytes: config.segmentSizeBytes },
      "segvault server started"
    );
  } catch (error) {
    server.log.error(error);
    await pool.end();
    redis.disconnect();
    process.exit(1);
  }
}

await start();
