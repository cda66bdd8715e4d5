import { describe, expect, it, vi } from "vitest";
import { RedisMetadataCache, cacheKey, createRedis, type RedisCommands } from "./metadataCache.js";

function fakeRedis(stored: string | null = null) {
  const get = vi.fn(async (_key: string) => stored);
  const set = vi.fn(async (_key: string, _value: string, _token: "EX", _seconds: number) => "OK");
  const del = vi.fn(async (_key: string) => 1);
  const redis: RedisCommands = { get, set, del };
  return { redis, get, set, del };
}

const file = {
  id: "file-1",
  name: "a.bin",
  size: 12,
  segmentCount: 3,
  createdAt: new Date("2024-05-01T12:00:00.000Z")
};

describe("RedisMetadataCache", () => {
  it("keys entries by file id", () => {
    expect(cacheKey("file-1")).toBe("file:file-1");
  });

  it("writes JSON with an expiry", async () => {
    const { redis, set } = fakeRedis();

    await new RedisMetadataCache(redis).set("file-1", file, 300);

    expect(set).toHaveBeenCalledWith(
      "file:file-1",
      '{"id":"file-1","name":"a.bin","size":12,"segmentCount":3,"createdAt":"2024-05-01T12:00:00.000Z"}',
      "EX",
      300
    );
  });

  it("decodes a stored entry back into a file record", async () => {
    const { redis, get } = fakeRedis(JSON.stringify(file));

    await expect(new RedisMetadataCache(redis).get("file-1")).resolves.toEqual(file);
    expect(get).toHaveBeenCalledWith("file:file-1");
  });

  it("treats a missing entry as a miss", async () => {
    const { redis } = fakeRedis(null);
    await expect(new RedisMetadataCache(redis).get("file-1")).resolves.toBeNull();
  });

  it("treats unreadable entries as a miss", async () => {
    await expect(new RedisMetadataCache(fakeRedis("{not json").redis).get("file-1")).resolves.toBeNull();
    await expect(
      new RedisMetadataCache(fakeRedis(JSON.stringify({ id: "file-1" })).redis).get("file-1")
    ).resolves.toBeNull();
  });

  it("propagates connection failures to the caller", async () => {
    const { redis, get } = fakeRedis();
    get.mockRejectedValueOnce(new Error("ECONNREFUSED"));

    await expect(new RedisMetadataCache(redis).get("file-1")).rejects.toThrow("ECONNREFUSED");
  });

  it("deletes entries", async () => {
    const { redis, del } = fakeRedis();

    await new RedisMetadataCache(redis).delete("file-1");

    expect(del).toHaveBeenCalledWith("file:file-1");
  });
});

describe("createRedis", () => {
  it("logs connection errors instead of leaving them unhandled", () => {
    const warn = vi.fn();
    const redis = createRedis("redis://localhost:6379/0", { warn }, { lazyConnect: true });
    const failure = new Error("connect ECONNREFUSED 127.0.0.1:6379");

    redis.emit("error", failure);

    expect(warn).toHaveBeenCalledWith({ err: failure }, "redis connection error");
    redis.disconnect();
  });
});
