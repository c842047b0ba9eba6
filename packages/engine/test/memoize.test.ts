import { existsSync } from "fs";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { CacheConfigurationError, CacheMiss } from "../src";
import { createTempDir, createTestCache, FIXED_DATE, removeTempDir, type TestCache } from "./helpers/workspace";

describe("memoize", () => {
  let dir: string;
  let cache: TestCache;

  beforeEach(async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date(FIXED_DATE));
    dir = await createTempDir();
    cache = createTestCache(dir);
  });

  afterEach(async () => {
    vi.useRealTimers();
    await removeTempDir(dir);
  });

  it("runs the producer once per identifier until the entry expires", async () => {
    const producer = vi.fn(async (showId: string) => ({ showId, seasons: 3 }));
    const fetchSeasons = cache.engine.memoize("seasons", { ttl: 10 })(producer);

    await expect(fetchSeasons("80")).resolves.toEqual({ showId: "80", seasons: 3 });
    await expect(fetchSeasons("80")).resolves.toEqual({ showId: "80", seasons: 3 });
    expect(producer).toHaveBeenCalledTimes(1);

    await fetchSeasons("81");
    expect(producer).toHaveBeenCalledTimes(2);

    vi.setSystemTime(new Date(Date.parse(FIXED_DATE) + 10_000));
    await fetchSeasons("80");
    expect(producer).toHaveBeenCalledTimes(3);
  });

  it("recomputes after the entry is invalidated", async () => {
    const producer = vi.fn((listId: string) => `list:${listId}`);
    const fetchList = cache.engine.memoize("video_list")(producer);

    await fetchList("L1");
    await cache.engine.invalidateEntry("video_list", "L1");
    await expect(fetchList("L1")).resolves.toBe("list:L1");

    expect(producer).toHaveBeenCalledTimes(2);
  });

  it("uses a fixed identifier regardless of the arguments", async () => {
    const producer = vi.fn((locale: string) => ["drama", locale]);
    const fetchGenres = cache.engine.memoize("common", { fixedIdentifier: "genres" })(producer);

    await fetchGenres("en");
    await expect(fetchGenres("de")).resolves.toEqual(["drama", "en"]);

    expect(producer).toHaveBeenCalledTimes(1);
    await expect(cache.engine.get("common", "genres")).resolves.toEqual(["drama", "en"]);
  });

  it("prefers a named argument over the positional one", async () => {
    const producer = vi.fn((context: string, options?: { listId?: string }) => `${context}:${options?.listId ?? "-"}`);
    const fetchList = cache.engine.memoize("video_list", { identifierIndex: 0, identifierName: "listId" })(producer);

    await fetchList("menu", { listId: "L7" });
    await expect(cache.engine.get("video_list", "L7")).resolves.toBe("menu:L7");

    await fetchList("L8");
    await expect(cache.engine.get("video_list", "L8")).resolves.toBe("L8:-");
  });

  it("stores numeric identifiers under their decimal string", async () => {
    const fetchEpisodes = cache.engine.memoize("episodes")((seasonId: number) => [`${seasonId}-1`]);

    await fetchEpisodes(7);

    await expect(cache.engine.get("episodes", "7")).resolves.toEqual(["7-1"]);
  });

  it("reports an unresolvable identifier before touching the producer", async () => {
    const producer = vi.fn((first: string) => first);
    const misconfigured = cache.engine.memoize("metadata", { identifierIndex: 2 })(producer);
    const objectKeyed = cache.engine.memoize("metadata")((options: { id: string }) => options.id);

    await expect(misconfigured("a")).rejects.toBeInstanceOf(CacheConfigurationError);
    await expect(objectKeyed({ id: "x" })).rejects.toBeInstanceOf(CacheConfigurationError);
    expect(producer).not.toHaveBeenCalled();
    expect(cache.engine.residentBuckets()).toEqual([]);
  });

  it("caches nothing when the producer fails", async () => {
    const producer = vi
      .fn<[string], Promise<string>>()
      .mockRejectedValueOnce(new Error("boom"))
      .mockResolvedValueOnce("fresh");
    const fetchMetadata = cache.engine.memoize("metadata")(producer);

    await expect(fetchMetadata("1")).rejects.toThrow("boom");
    await expect(cache.engine.get("metadata", "1")).rejects.toBeInstanceOf(CacheMiss);

    await expect(fetchMetadata("1")).resolves.toBe("fresh");
    expect(producer).toHaveBeenCalledTimes(2);
  });

  it("writes through to disk when asked to", async () => {
    const fetchArt = cache.engine.memoize("artinfo", { toDisk: true })((videoId: string) => ({ videoId }));

    await fetchArt("99");

    expect(existsSync(cache.disk.pathFor("artinfo", "99"))).toBe(true);
  });
});

describe("injectCached", () => {
  let dir: string;
  let cache: TestCache;

  beforeEach(async () => {
    dir = await createTempDir();
    cache = createTestCache(dir);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("hands the previous value to the producer and stores its result", async () => {
    const producer = vi.fn((cached: string[] | undefined, listId: string, page: string) => [
      ...(cached ?? []),
      `${listId}/${page}`
    ]);
    const appendPage = cache.engine.injectCached("video_list")(producer);

    await expect(appendPage("L", "p1")).resolves.toEqual(["L/p1"]);
    await expect(appendPage("L", "p2")).resolves.toEqual(["L/p1", "L/p2"]);

    expect(producer).toHaveBeenNthCalledWith(1, undefined, "L", "p1");
    expect(producer).toHaveBeenNthCalledWith(2, ["L/p1"], "L", "p2");
    await expect(cache.engine.get("video_list", "L")).resolves.toEqual(["L/p1", "L/p2"]);
  });
});
