import { existsSync } from "fs";
import { mkdtemp, rm } from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CacheMiss } from "@bucket-cache/engine";
import { PROPERTY_DATABASE, startCacheRuntime } from "../src/runtime";

describe("startCacheRuntime", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "bucket-cache-host-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const envFor = (extra: NodeJS.ProcessEnv = {}): NodeJS.ProcessEnv => ({
    BUCKET_CACHE_DATA_PATH: dir,
    BUCKET_CACHE_LOG_LEVEL: "silent",
    ...extra
  });

  it("prepares the data directory and the property database", async () => {
    const runtime = await startCacheRuntime({ env: envFor() });

    expect(existsSync(path.join(dir, "cache", "common"))).toBe(true);
    expect(existsSync(path.join(dir, PROPERTY_DATABASE))).toBe(true);

    await runtime.shutdown();
  });

  it("carries committed buckets across a restart", async () => {
    const first = await startCacheRuntime({ env: envFor() });
    await first.engine.add("seasons", "80018499", { seasons: 2 });
    await first.shutdown();
    await first.shutdown();

    const second = await startCacheRuntime({ env: envFor() });
    await expect(second.engine.get("seasons", "80018499")).resolves.toEqual({ seasons: 2 });

    await second.engine.invalidateCache();
    await second.shutdown();

    const third = await startCacheRuntime({ env: envFor() });
    await expect(third.engine.get("seasons", "80018499")).rejects.toBeInstanceOf(CacheMiss);
    await third.shutdown();
  });

  it("forgets memory-only buckets when the process-scoped store is selected", async () => {
    const first = await startCacheRuntime({ env: envFor({ BUCKET_CACHE_PROPERTY_STORE: "memory" }) });
    await first.engine.add("metadata", "1", "m");
    await first.shutdown();

    const second = await startCacheRuntime({ env: envFor({ BUCKET_CACHE_PROPERTY_STORE: "memory" }) });
    await expect(second.engine.get("metadata", "1")).rejects.toBeInstanceOf(CacheMiss);
    await second.shutdown();
  });
});
