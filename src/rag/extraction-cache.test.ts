import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ExtractionCache, FileExtractionStore } from "./extraction-cache.js";
import { extractedText, silentLogger } from "./test-helpers.js";

const FP_OLD = "1".repeat(64);
const FP_NEW = "2".repeat(64);

describe("ExtractionCache", () => {
  it("should compute once and serve later calls from the cache", async () => {
    const cache = new ExtractionCache();
    const compute = vi.fn(async () => extractedText("lib:a.pdf", ["one"], FP_OLD));

    const first = await cache.getOrCompute("lib:a.pdf", FP_OLD, compute);
    const second = await cache.getOrCompute("lib:a.pdf", FP_OLD, compute);

    expect(second).toEqual(first);
    expect(compute).toHaveBeenCalledTimes(1);
    expect(cache.stats).toEqual({ hits: 1, misses: 1, joined: 0 });
  });

  it("should share one computation between concurrent callers", async () => {
    const cache = new ExtractionCache();
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const compute = vi.fn(async () => {
      await gate;
      return extractedText("lib:a.pdf", ["one"], FP_OLD);
    });

    const calls = Array.from({ length: 5 }, () => cache.getOrCompute("lib:a.pdf", FP_OLD, compute));
    release();
    const results = await Promise.all(calls);

    expect(compute).toHaveBeenCalledTimes(1);
    expect(new Set(results.map((r) => r.pages[0]))).toEqual(new Set(["one"]));
    expect(cache.stats.joined).toBe(4);
  });

  it("should not cache a failed computation", async () => {
    const cache = new ExtractionCache();
    const failing = vi.fn(async () => {
      throw new Error("ocr down");
    });

    await expect(cache.getOrCompute("lib:a.pdf", FP_OLD, failing)).rejects.toThrow("ocr down");
    expect(cache.size).toBe(0);

    const text = await cache.getOrCompute("lib:a.pdf", FP_OLD, async () => extractedText("lib:a.pdf", ["ok"], FP_OLD));
    expect(text.pages).toEqual(["ok"]);
  });

  it("should let one caller abort without cancelling the others", async () => {
    const cache = new ExtractionCache();
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const compute = vi.fn(async () => {
      await gate;
      return extractedText("lib:a.pdf", ["one"], FP_OLD);
    });

    const controller = new AbortController();
    const aborted = cache.getOrCompute("lib:a.pdf", FP_OLD, compute, controller.signal);
    const kept = cache.getOrCompute("lib:a.pdf", FP_OLD, compute);
    controller.abort(new Error("caller gave up"));
    release();

    await expect(aborted).rejects.toThrow("caller gave up");
    await expect(kept).resolves.toMatchObject({ pages: ["one"] });
    expect(cache.get("lib:a.pdf", FP_OLD)?.pages).toEqual(["one"]);
  });

  it("should not serve text for a stale fingerprint", async () => {
    const cache = new ExtractionCache();
    await cache.put("lib:a.pdf", FP_OLD, extractedText("lib:a.pdf", ["old"], FP_OLD));

    cache.markCurrent("lib:a.pdf", FP_NEW);

    expect(cache.get("lib:a.pdf", FP_OLD)).toBeUndefined();
    expect(cache.size).toBe(1);
    expect(await cache.purgeStale()).toBe(1);
    expect(cache.size).toBe(0);
  });

  it("should reject text stored under the wrong key", async () => {
    const cache = new ExtractionCache();
    await expect(cache.put("lib:a.pdf", FP_NEW, extractedText("lib:a.pdf", ["x"], FP_OLD))).rejects.toThrow(
      "cannot be stored under",
    );
  });
});

describe("FileExtractionStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "folio-cache-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should load an empty cache when nothing has been written", async () => {
    expect(await new FileExtractionStore(dir).load()).toEqual([]);
  });

  it("should persist entries across instances and keep the latest as current", async () => {
    const store = new FileExtractionStore(dir, silentLogger);
    const cache = new ExtractionCache(store, silentLogger);
    await cache.put("lib:a.pdf", FP_OLD, { ...extractedText("lib:a.pdf", ["old"], FP_OLD), extractedAt: "2024-01-01T00:00:00.000Z" });
    await cache.put("lib:a.pdf", FP_NEW, { ...extractedText("lib:a.pdf", ["new"], FP_NEW), extractedAt: "2024-02-01T00:00:00.000Z" });

    const reopened = await ExtractionCache.open(new FileExtractionStore(dir, silentLogger), silentLogger);

    expect(reopened.size).toBe(2);
    expect(reopened.currentFingerprint("lib:a.pdf")).toBe(FP_NEW);
    expect(reopened.get("lib:a.pdf", FP_NEW)?.pages).toEqual(["new"]);
    expect(reopened.get("lib:a.pdf", FP_OLD)).toBeUndefined();

    expect(await reopened.purgeStale()).toBe(1);
    expect(await readdir(store.dir)).toHaveLength(1);
  });

  it("should skip corrupted files", async () => {
    const store = new FileExtractionStore(dir, silentLogger);
    await store.save(extractedText("lib:a.pdf", ["ok"], FP_OLD));
    await writeFile(path.join(store.dir, "broken.json"), "{not json");

    const loaded = await store.load();

    expect(loaded.map((t) => t.pages)).toEqual([["ok"]]);
  });
});
