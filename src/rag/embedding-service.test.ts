import { describe, expect, it } from "vitest";
import type { RetryPolicy } from "./concurrency.js";
import { EmbeddingService } from "./embedding-service.js";
import { EmbeddingUnavailable, ProviderHttpError } from "./errors.js";
import { FAST_RETRY, FakeEmbedder, NO_RETRY, silentLogger } from "./test-helpers.js";
import type { EmbeddingProvider } from "./types.js";

function service(provider: EmbeddingProvider, retry: RetryPolicy = FAST_RETRY, batchSize = 2, concurrency = 2) {
  return new EmbeddingService(provider, {
    batchSize,
    concurrency,
    timeoutMs: 5_000,
    retry,
    queryPrefix: "query: ",
    logger: silentLogger,
  });
}

const byCharCode = (text: string) => [text.charCodeAt(0)];

describe("EmbeddingService", () => {
  it("should batch texts and keep input order", async () => {
    const embedder = new FakeEmbedder(byCharCode);
    const progress: number[] = [];

    const vectors = await service(embedder).embedTexts(["a", "b", "c", "d", "e"], {
      onProgress: (done) => progress.push(done),
    });

    expect(vectors).toEqual([[97], [98], [99], [100], [101]]);
    expect(embedder.calls.map((batch) => batch.length).sort()).toEqual([1, 2, 2]);
    expect(progress.at(-1)).toBe(5);
  });

  it("should not call the provider for no texts", async () => {
    const embedder = new FakeEmbedder(byCharCode);
    expect(await service(embedder).embedTexts([])).toEqual([]);
    expect(embedder.calls).toHaveLength(0);
  });

  it("should prefix queries", async () => {
    const embedder = new FakeEmbedder(byCharCode);

    expect(await service(embedder).embedQuery("hi")).toEqual([113]);
    expect(embedder.calls).toEqual([["query: hi"]]);
  });

  it("should retry transient failures", async () => {
    const embedder = new FakeEmbedder(byCharCode);
    embedder.failuresLeft = 1;

    expect(await service(embedder).embedTexts(["x"])).toEqual([[120]]);
    expect(embedder.calls).toHaveLength(2);
  });

  it("should report EmbeddingUnavailable once retries run out", async () => {
    const embedder = new FakeEmbedder(byCharCode);
    embedder.failuresLeft = 10;

    const result = service(embedder).embedTexts(["x"]);

    await expect(result).rejects.toBeInstanceOf(EmbeddingUnavailable);
    await expect(result).rejects.toThrow("Embedding failed: embedding backend unavailable");
    expect(embedder.calls).toHaveLength(3);
  });

  it("should not retry client errors", async () => {
    let calls = 0;
    const provider: EmbeddingProvider = {
      model: "strict",
      embed: async () => {
        calls++;
        throw new ProviderHttpError("OpenRouter", 401, "bad key");
      },
    };

    await expect(service(provider).embedTexts(["x"])).rejects.toThrow(
      "Embedding failed: OpenRouter request failed (401): bad key",
    );
    expect(calls).toBe(1);
  });

  it("should reject a response with the wrong number of vectors", async () => {
    const provider: EmbeddingProvider = { model: "short", embed: async () => [[1]] };

    await expect(service(provider).embedTexts(["x", "y"])).rejects.toThrow(
      "Embedding failed: Embedding provider returned 1 vectors for 2 inputs",
    );
  });

  it("should stop sending queued batches after the first failure", async () => {
    const embedder = new FakeEmbedder(byCharCode);
    embedder.failuresLeft = 100;

    const result = service(embedder, NO_RETRY, 1, 1).embedTexts(["a", "b", "c", "d", "e"]);

    await expect(result).rejects.toThrow("Embedding failed: embedding backend unavailable");
    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(embedder.calls).toEqual([["a"]]);
  });

  it("should pass caller cancellation through unchanged", async () => {
    const controller = new AbortController();
    controller.abort(new Error("caller gave up"));

    await expect(service(new FakeEmbedder(byCharCode)).embedTexts(["x"], { signal: controller.signal })).rejects.toThrow(
      "caller gave up",
    );
  });
});
