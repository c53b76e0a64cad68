import path from "node:path";
import { z } from "zod";

export const RAG_CONFIG = {
  dataDir: path.resolve("data"),
  cacheDir: path.resolve(".rag-cache"),
  defaultLibrary: "default",

  embeddingModel: "qwen/qwen3-embedding-8b",
  embeddingBatchSize: 20,
  embeddingConcurrency: 5,
  queryPrefix: "Instruct: Retrieve relevant document passages\nQuery: ",

  chatModel: "qwen/qwen3.5-122b-a10b",
  chatTemperature: 0.2,
  ocrModel: "qwen/qwen2.5-vl-72b-instruct",

  topK: 5,
  minSimilarity: 0.3,
  maxContextSize: 12_000,

  maxChunkLength: 2000,
  chunkOverlap: 100,
  defaultChunkingStrategy: "page-chunker",

  minTextLayerChars: 20,
  renderScale: 2,

  workerConcurrency: 4,
  documentConcurrency: 2,

  retries: 4,
  retryMinTimeoutMs: 500,
  retryMaxTimeoutMs: 8000,
  ocrTimeoutMs: 120_000,
  embeddingTimeoutMs: 60_000,
  generationTimeoutMs: 120_000,
} as const;

type Widen<T> = T extends string ? string : T extends number ? number : T;

export type RagConfig = { -readonly [K in keyof typeof RAG_CONFIG]: Widen<(typeof RAG_CONFIG)[K]> };

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();

const envSchema = z.object({
  RAG_DATA_DIR: z.string().min(1).optional(),
  RAG_CACHE_DIR: z.string().min(1).optional(),
  RAG_DEFAULT_LIBRARY: z.string().min(1).optional(),
  RAG_EMBEDDING_MODEL: z.string().min(1).optional(),
  RAG_EMBEDDING_BATCH_SIZE: positiveInt.optional(),
  RAG_EMBEDDING_CONCURRENCY: positiveInt.optional(),
  RAG_CHAT_MODEL: z.string().min(1).optional(),
  RAG_CHAT_TEMPERATURE: z.coerce.number().min(0).max(2).optional(),
  RAG_OCR_MODEL: z.string().min(1).optional(),
  RAG_TOP_K: positiveInt.optional(),
  RAG_MIN_SIMILARITY: z.coerce.number().min(-1).max(1).optional(),
  RAG_MAX_CONTEXT_SIZE: positiveInt.optional(),
  RAG_CHUNK_SIZE: positiveInt.optional(),
  RAG_CHUNK_OVERLAP: nonNegativeInt.optional(),
  RAG_CHUNKING_STRATEGY: z.string().min(1).optional(),
  RAG_WORKER_CONCURRENCY: positiveInt.optional(),
  RAG_DOCUMENT_CONCURRENCY: positiveInt.optional(),
  RAG_RETRIES: nonNegativeInt.optional(),
  RAG_RETRY_MIN_TIMEOUT_MS: nonNegativeInt.optional(),
  RAG_RETRY_MAX_TIMEOUT_MS: nonNegativeInt.optional(),
});

/**
 * Overlays `RAG_*` environment variables on top of {@link RAG_CONFIG}.
 * Empty variables are ignored; malformed ones throw naming the variable.
 */
export function loadRagConfig(
  env: Record<string, string | undefined> = process.env,
): RagConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith("RAG_") && value !== ""),
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue?.path.join(".") ?? "environment";
    throw new Error(`Invalid configuration value for ${variable}: ${issue?.message ?? "unknown error"}`);
  }

  const e = parsed.data;
  const config: RagConfig = {
    ...RAG_CONFIG,
    dataDir: e.RAG_DATA_DIR ? path.resolve(e.RAG_DATA_DIR) : RAG_CONFIG.dataDir,
    cacheDir: e.RAG_CACHE_DIR ? path.resolve(e.RAG_CACHE_DIR) : RAG_CONFIG.cacheDir,
    defaultLibrary: e.RAG_DEFAULT_LIBRARY ?? RAG_CONFIG.defaultLibrary,
    embeddingModel: e.RAG_EMBEDDING_MODEL ?? RAG_CONFIG.embeddingModel,
    embeddingBatchSize: e.RAG_EMBEDDING_BATCH_SIZE ?? RAG_CONFIG.embeddingBatchSize,
    embeddingConcurrency: e.RAG_EMBEDDING_CONCURRENCY ?? RAG_CONFIG.embeddingConcurrency,
    chatModel: e.RAG_CHAT_MODEL ?? RAG_CONFIG.chatModel,
    chatTemperature: e.RAG_CHAT_TEMPERATURE ?? RAG_CONFIG.chatTemperature,
    ocrModel: e.RAG_OCR_MODEL ?? RAG_CONFIG.ocrModel,
    topK: e.RAG_TOP_K ?? RAG_CONFIG.topK,
    minSimilarity: e.RAG_MIN_SIMILARITY ?? RAG_CONFIG.minSimilarity,
    maxContextSize: e.RAG_MAX_CONTEXT_SIZE ?? RAG_CONFIG.maxContextSize,
    maxChunkLength: e.RAG_CHUNK_SIZE ?? RAG_CONFIG.maxChunkLength,
    chunkOverlap: e.RAG_CHUNK_OVERLAP ?? RAG_CONFIG.chunkOverlap,
    defaultChunkingStrategy: e.RAG_CHUNKING_STRATEGY ?? RAG_CONFIG.defaultChunkingStrategy,
    workerConcurrency: e.RAG_WORKER_CONCURRENCY ?? RAG_CONFIG.workerConcurrency,
    documentConcurrency: e.RAG_DOCUMENT_CONCURRENCY ?? RAG_CONFIG.documentConcurrency,
    retries: e.RAG_RETRIES ?? RAG_CONFIG.retries,
    retryMinTimeoutMs: e.RAG_RETRY_MIN_TIMEOUT_MS ?? RAG_CONFIG.retryMinTimeoutMs,
    retryMaxTimeoutMs: e.RAG_RETRY_MAX_TIMEOUT_MS ?? RAG_CONFIG.retryMaxTimeoutMs,
  };

  if (config.retryMaxTimeoutMs < config.retryMinTimeoutMs) {
    throw new Error("RAG_RETRY_MAX_TIMEOUT_MS must not be lower than RAG_RETRY_MIN_TIMEOUT_MS");
  }

  return config;
}
