import path from "node:path";
import { describe, expect, it } from "vitest";
import { RAG_CONFIG, loadRagConfig } from "./config.js";

describe("loadRagConfig", () => {
  it("should return the defaults without RAG_ variables", () => {
    expect(loadRagConfig({ HOME: "/home/test" })).toEqual(RAG_CONFIG);
  });

  it("should overlay and coerce environment values", () => {
    const config = loadRagConfig({
      RAG_TOP_K: "8",
      RAG_MIN_SIMILARITY: "0.45",
      RAG_DATA_DIR: "library",
      RAG_CHUNKING_STRATEGY: "document-chunker",
      RAG_CHUNK_OVERLAP: "",
    });

    expect(config.topK).toBe(8);
    expect(config.minSimilarity).toBe(0.45);
    expect(config.dataDir).toBe(path.resolve("library"));
    expect(config.defaultChunkingStrategy).toBe("document-chunker");
    expect(config.chunkOverlap).toBe(RAG_CONFIG.chunkOverlap);
  });

  it("should name the variable that failed validation", () => {
    expect(() => loadRagConfig({ RAG_TOP_K: "many" })).toThrow("Invalid configuration value for RAG_TOP_K");
    expect(() => loadRagConfig({ RAG_MIN_SIMILARITY: "3" })).toThrow(
      "Invalid configuration value for RAG_MIN_SIMILARITY",
    );
  });

  it("should reject a backoff ceiling below its floor", () => {
    expect(() => loadRagConfig({ RAG_RETRY_MIN_TIMEOUT_MS: "2000", RAG_RETRY_MAX_TIMEOUT_MS: "100" })).toThrow(
      "RAG_RETRY_MAX_TIMEOUT_MS must not be lower than RAG_RETRY_MIN_TIMEOUT_MS",
    );
  });
});
