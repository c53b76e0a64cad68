import path from "node:path";
import type { Logger } from "pino";
import { getLogger, moduleLogger } from "../utils/logger.js";
import { Answerer } from "./answerer.js";
import { getChunkingStrategy, type ChunkingStrategy } from "./chunking/index.js";
import { createWorkerPool, type RetryPolicy } from "./concurrency.js";
import type { RagConfig } from "./config.js";
import { LocalDirectorySource } from "./document-source.js";
import { EmbeddingService, OpenRouterEmbeddingProvider } from "./embedding-service.js";
import { RagError, errorMessage } from "./errors.js";
import { ExtractionCache, FileExtractionStore } from "./extraction-cache.js";
import { OpenRouterChatProvider } from "./generation-service.js";
import { OpenRouterVisionOcr } from "./ocr-service.js";
import { TextExtractor } from "./text-extractor.js";
import {
  documentIdentity,
  type AnswerRecord,
  type DocumentRef,
  type DocumentSource,
  type EmbeddingProvider,
  type ExtractionWarning,
  type GenerationProvider,
  type OcrEngine,
} from "./types.js";
import { EmbeddingIndex, VectraIndexStore } from "./vector-store.js";

export type IngestionStage = "fetch" | "extract" | "chunk" | "index";

export interface IngestedDocument {
  identity: string;
  source: string;
  pages: number;
  chunks: number;
  warnings: ExtractionWarning[];
}

export interface FailedDocument {
  identity: string;
  source: string;
  stage: IngestionStage;
  /** `code` of the domain error, or `UNEXPECTED`. */
  code: string;
  reason?: string;
  message: string;
}

export interface IngestionReport {
  libraryId: string;
  succeeded: IngestedDocument[];
  unchanged: string[];
  failed: FailedDocument[];
  removed: string[];
}

export interface AskOptions {
  k?: number;
  maxContextSize?: number;
  signal?: AbortSignal;
}

export interface RagPipelineDeps {
  config: RagConfig;
  source: DocumentSource;
  ocr: OcrEngine;
  embeddings: EmbeddingService;
  generator: GenerationProvider;
  cache?: ExtractionCache;
  index?: EmbeddingIndex;
  logger?: Logger;
}

class StageError extends Error {
  constructor(
    readonly stage: IngestionStage,
    readonly original: unknown,
  ) {
    super(errorMessage(original));
  }
}

async function stage<T>(name: IngestionStage, task: () => Promise<T> | T): Promise<T> {
  try {
    return await task();
  } catch (error) {
    throw new StageError(name, error);
  }
}

export function retryPolicy(config: RagConfig): RetryPolicy {
  return {
    retries: config.retries,
    minTimeoutMs: config.retryMinTimeoutMs,
    maxTimeoutMs: config.retryMaxTimeoutMs,
  };
}

/** The one embedding service a pipeline and its index share. */
export function createEmbeddingService(embedder: EmbeddingProvider, config: RagConfig, logger?: Logger): EmbeddingService {
  return new EmbeddingService(embedder, {
    batchSize: config.embeddingBatchSize,
    concurrency: config.embeddingConcurrency,
    timeoutMs: config.embeddingTimeoutMs,
    retry: retryPolicy(config),
    queryPrefix: config.queryPrefix,
    logger,
  });
}

export class RagPipeline {
  readonly embeddings: EmbeddingService;
  readonly cache: ExtractionCache;
  readonly index: EmbeddingIndex;
  readonly extractor: TextExtractor;
  readonly answerer: Answerer;
  private readonly strategy: ChunkingStrategy;
  private readonly logger: Logger;

  constructor(private readonly deps: RagPipelineDeps) {
    const { config } = deps;
    this.logger = moduleLogger("rag", deps.logger);
    this.strategy = getChunkingStrategy(config.defaultChunkingStrategy);

    this.embeddings = deps.embeddings;
    if (deps.index && deps.index.embeddings !== deps.embeddings) {
      throw new Error("The index must embed through the pipeline's embedding service");
    }

    this.cache = deps.cache ?? new ExtractionCache(undefined, this.logger);
    this.index = deps.index ?? new EmbeddingIndex(this.embeddings, undefined, this.logger);
    this.extractor = new TextExtractor({
      ocr: deps.ocr,
      cache: this.cache,
      pool: createWorkerPool(config.workerConcurrency),
      retry: retryPolicy(config),
      ocrTimeoutMs: config.ocrTimeoutMs,
      minTextLayerChars: config.minTextLayerChars,
      logger: this.logger,
    });
    this.answerer = new Answerer({
      index: this.index,
      embeddings: this.embeddings,
      generator: deps.generator,
      minSimilarity: config.minSimilarity,
      retry: retryPolicy(config),
      generationTimeoutMs: config.generationTimeoutMs,
      logger: this.logger,
    });
  }

  /**
   * Brings the index in line with a library: new and changed documents are
   * extracted, chunked and indexed, unchanged ones skipped, vanished ones
   * removed. One document failing never stops the others.
   */
  async ingestLibrary(libraryId: string, options: { signal?: AbortSignal } = {}): Promise<IngestionReport> {
    const { signal } = options;
    const libraryLogger = this.logger.child({ library: libraryId });

    libraryLogger.info("Listing documents.");
    const refs = await this.deps.source.listDocuments(libraryId, { signal });
    libraryLogger.info(`Found ${refs.length} document${refs.length === 1 ? "" : "s"}.`);

    const report: IngestionReport = { libraryId, succeeded: [], unchanged: [], failed: [], removed: [] };
    const limit = createWorkerPool(this.deps.config.documentConcurrency);

    await Promise.all(
      refs.map((ref) =>
        limit(async () => {
          try {
            const outcome = await this.ingestDocument(ref, { signal });
            if (outcome === "unchanged") report.unchanged.push(documentIdentity(ref));
            else report.succeeded.push(outcome);
          } catch (error) {
            signal?.throwIfAborted();
            const failure = this.describeFailure(ref, error);
            libraryLogger.error({ identity: failure.identity, stage: failure.stage, error: failure.message }, "Document failed.");
            report.failed.push(failure);
          }
        }),
      ),
    );

    const listed = new Set(refs.map((ref) => documentIdentity(ref)));
    for (const identity of this.index.identities()) {
      if (!identity.startsWith(`${libraryId}:`) || listed.has(identity)) continue;
      signal?.throwIfAborted();
      await this.index.remove(identity);
      report.removed.push(identity);
    }

    for (const list of [report.unchanged, report.removed]) list.sort();
    report.succeeded.sort((a, b) => a.identity.localeCompare(b.identity));
    report.failed.sort((a, b) => a.identity.localeCompare(b.identity));

    libraryLogger.info(
      {
        succeeded: report.succeeded.length,
        unchanged: report.unchanged.length,
        failed: report.failed.length,
        removed: report.removed.length,
      },
      `RAG ready: ${this.index.documentCount} document(s), ${this.index.chunkCount} chunks`,
    );
    return report;
  }

  async ingestDocument(
    ref: DocumentRef,
    options: { signal?: AbortSignal } = {},
  ): Promise<IngestedDocument | "unchanged"> {
    const { signal } = options;
    const { config } = this.deps;

    const document = await stage("fetch", () => this.deps.source.fetch(ref, { signal }));
    if (this.index.fingerprintOf(document.identity) === document.fingerprint) {
      this.cache.markCurrent(document.identity, document.fingerprint);
      return "unchanged";
    }

    const extracted = await stage("extract", () => this.extractor.extract(document, { signal }));
    const chunks = await stage("chunk", () =>
      this.strategy.chunk(extracted, config.maxChunkLength, config.chunkOverlap),
    );
    await stage("index", () => this.index.upsert(document.identity, chunks, { signal }));

    this.logger.info({ identity: document.identity, chunks: chunks.length }, `${ref.name} done`);
    return {
      identity: document.identity,
      source: ref.name,
      pages: extracted.pageCount,
      chunks: chunks.length,
      warnings: extracted.warnings,
    };
  }

  ask(question: string, options: AskOptions = {}): Promise<AnswerRecord> {
    return this.answerer.answer(question, {
      k: options.k ?? this.deps.config.topK,
      maxContextSize: options.maxContextSize ?? this.deps.config.maxContextSize,
      signal: options.signal,
    });
  }

  stats(): { documentCount: number; chunkCount: number } {
    return { documentCount: this.index.documentCount, chunkCount: this.index.chunkCount };
  }

  private describeFailure(ref: DocumentRef, error: unknown): FailedDocument {
    const stageName = error instanceof StageError ? error.stage : "fetch";
    const cause = error instanceof StageError ? error.original : error;
    return {
      identity: documentIdentity(ref),
      source: ref.name,
      stage: stageName,
      code: cause instanceof RagError ? cause.code : "UNEXPECTED",
      reason: cause instanceof RagError && "reason" in cause && typeof cause.reason === "string" ? cause.reason : undefined,
      message: errorMessage(cause),
    };
  }
}

/** Wires the OpenRouter adapters, the local library and on-disk caches. */
export async function initRagPipeline(
  apiKey: string,
  config: RagConfig,
  logger: Logger = getLogger(),
): Promise<RagPipeline> {
  const openRouter = { apiKey };
  const embeddings = createEmbeddingService(
    new OpenRouterEmbeddingProvider(openRouter, config.embeddingModel),
    config,
    logger,
  );

  const cache = await ExtractionCache.open(new FileExtractionStore(config.cacheDir, logger), logger);
  const index = await EmbeddingIndex.open(
    embeddings,
    new VectraIndexStore(path.join(config.cacheDir, "vectra-index"), logger),
    logger,
  );

  return new RagPipeline({
    config,
    source: new LocalDirectorySource(config.dataDir, logger),
    ocr: new OpenRouterVisionOcr(openRouter, config.ocrModel),
    embeddings,
    generator: new OpenRouterChatProvider(openRouter, config.chatModel, config.chatTemperature),
    cache,
    index,
    logger,
  });
}
