import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { RAG_CONFIG, type RagConfig } from "./config.js";
import { FetchError } from "./errors.js";
import { RagPipeline, createEmbeddingService, initRagPipeline } from "./pipeline.js";
import {
  FakeEmbedder,
  FakeGenerator,
  FakeOcr,
  InMemorySource,
  decodeImageText,
  fakePng,
  silentLogger,
} from "./test-helpers.js";

const QUESTION = "Which policy applies to teams?";

const VECTORS: Record<string, number[]> = {
  "Policy A applies to teams": [1, 0],
  "Policy B applies to teams": [1, 0],
  "Cafeteria opens at noon": [-1, 0],
  [QUESTION]: [0.91, Math.sqrt(1 - 0.91 * 0.91)],
};

const config: RagConfig = {
  ...RAG_CONFIG,
  queryPrefix: "",
  retries: 0,
  retryMinTimeoutMs: 1,
  retryMaxTimeoutMs: 1,
};

function setup() {
  const source = new InMemorySource();
  source.set("lib", "policy.txt", "Policy A applies to teams");
  source.set("lib", "scan.png", fakePng("Cafeteria opens at noon"));
  source.set("lib", "broken.png", fakePng("FAIL"));
  source.set("lib", "notes.docx", "PK\u0003\u0004");

  const ocr = new FakeOcr((image) => {
    const text = decodeImageText(image);
    if (text === "FAIL") throw new Error("unreadable scan");
    return text;
  });
  const generator = new FakeGenerator(() => "Policy A applies to teams [1].");
  const embedder = new FakeEmbedder((text) => VECTORS[text], [0, 1]);
  const pipeline = new RagPipeline({
    config,
    source,
    ocr,
    embeddings: createEmbeddingService(embedder, config, silentLogger),
    generator,
    logger: silentLogger,
  });
  return { pipeline, source, ocr, generator, embedder };
}

describe("RagPipeline", () => {
  it("should report every document of a library without stopping at failures", async () => {
    const { pipeline } = setup();

    const report = await pipeline.ingestLibrary("lib");

    expect(report.succeeded).toEqual([
      { identity: "lib:policy.txt", source: "policy.txt", pages: 1, chunks: 1, warnings: [] },
      { identity: "lib:scan.png", source: "scan.png", pages: 1, chunks: 1, warnings: [] },
    ]);
    expect(report.failed).toEqual([
      {
        identity: "lib:broken.png",
        source: "broken.png",
        stage: "extract",
        code: "EXTRACTION_ERROR",
        reason: "engine_failure",
        message: "No page of broken.png could be read: page 1 failed: unreadable scan",
      },
      {
        identity: "lib:notes.docx",
        source: "notes.docx",
        stage: "extract",
        code: "EXTRACTION_ERROR",
        reason: "unsupported_format",
        message: "Unsupported document format: notes.docx",
      },
    ]);
    expect(report.unchanged).toEqual([]);
    expect(report.removed).toEqual([]);
    expect(pipeline.stats()).toEqual({ documentCount: 2, chunkCount: 2 });
  });

  it("should skip unchanged documents and drop vanished ones", async () => {
    const { pipeline, source, ocr } = setup();
    await pipeline.ingestLibrary("lib");
    expect(ocr.calls).toBe(2);

    const again = await pipeline.ingestLibrary("lib");
    expect(again.unchanged).toEqual(["lib:policy.txt", "lib:scan.png"]);
    expect(again.succeeded).toEqual([]);
    expect(ocr.calls).toBe(3);

    source.delete("lib", "scan.png");
    source.set("lib", "policy.txt", "Policy B applies to teams");
    const changed = await pipeline.ingestLibrary("lib");

    expect(changed.succeeded.map((d) => d.identity)).toEqual(["lib:policy.txt"]);
    expect(changed.removed).toEqual(["lib:scan.png"]);
    expect(pipeline.index.chunksOf("lib:policy.txt").map((c) => c.text)).toEqual(["Policy B applies to teams"]);
    expect(pipeline.stats()).toEqual({ documentCount: 1, chunkCount: 1 });
  });

  it("should fail the whole call when the library cannot be listed", async () => {
    const { pipeline } = setup();
    await expect(pipeline.ingestLibrary("missing")).rejects.toBeInstanceOf(FetchError);
  });

  it("should answer questions over the ingested library", async () => {
    const { pipeline, generator } = setup();
    await pipeline.ingestLibrary("lib");

    const record = await pipeline.ask(QUESTION);

    expect(record.answer).toBe("Policy A applies to teams [1].");
    expect(record.citations.map((c) => c.identity)).toEqual(["lib:policy.txt"]);
    expect(generator.prompts).toHaveLength(1);
  });

  it("should embed documents and questions through one service", async () => {
    const { pipeline, embedder } = setup();
    await pipeline.ingestLibrary("lib");
    embedder.calls.length = 0;

    await pipeline.ask(QUESTION);

    expect(pipeline.index.embeddings).toBe(pipeline.embeddings);
    expect(embedder.calls).toEqual([[QUESTION]]);
  });

  it("should refuse an index built on another embedding service", () => {
    const embedder = new FakeEmbedder(() => [1, 0]);
    const other = new RagPipeline({
      config,
      source: new InMemorySource(),
      ocr: new FakeOcr(),
      embeddings: createEmbeddingService(embedder, config, silentLogger),
      generator: new FakeGenerator(),
      logger: silentLogger,
    });

    expect(
      () =>
        new RagPipeline({
          config,
          source: new InMemorySource(),
          ocr: new FakeOcr(),
          embeddings: createEmbeddingService(embedder, config, silentLogger),
          generator: new FakeGenerator(),
          index: other.index,
          logger: silentLogger,
        }),
    ).toThrow("The index must embed through the pipeline's embedding service");
  });

  it("should share the embedding service when wired from configuration", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "folio-pipeline-"));
    try {
      const pipeline = await initRagPipeline("test-secret", { ...config, cacheDir: dir, dataDir: dir }, silentLogger);

      expect(pipeline.index.embeddings).toBe(pipeline.embeddings);
      expect(pipeline.stats()).toEqual({ documentCount: 0, chunkCount: 0 });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
