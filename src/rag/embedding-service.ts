import type { Logger } from "pino";
import { z } from "zod";
import { RAG_CONFIG } from "./config.js";
import {
  callSignal,
  createWorkerPool,
  withRetry,
  type LimitFunction,
  type RetryPolicy,
} from "./concurrency.js";
import { EmbeddingUnavailable, errorMessage } from "./errors.js";
import { postOpenRouter, type OpenRouterOptions } from "./openrouter.js";
import type { CallOptions, EmbeddingProvider } from "./types.js";

const embeddingResponseSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()) })),
});

export class OpenRouterEmbeddingProvider implements EmbeddingProvider {
  constructor(
    private readonly options: OpenRouterOptions,
    readonly model: string = RAG_CONFIG.embeddingModel,
  ) {}

  async embed(texts: string[], options?: CallOptions): Promise<number[][]> {
    const json = await postOpenRouter(
      "embeddings",
      { model: this.model, input: texts },
      embeddingResponseSchema,
      { ...this.options, signal: options?.signal },
    );
    if (json.data.length !== texts.length) {
      throw new Error(`Embedding API returned ${json.data.length} vectors for ${texts.length} inputs`);
    }
    return json.data.map((item) => item.embedding);
  }
}

export interface EmbeddingServiceOptions {
  batchSize: number;
  concurrency: number;
  timeoutMs: number;
  retry: RetryPolicy;
  queryPrefix: string;
  logger?: Logger;
}

/**
 * Batches texts for the embedding provider, bounds concurrent requests and
 * retries transient failures. Anything left after the retries is reported as
 * {@link EmbeddingUnavailable}; cancellation passes through untouched.
 */
export class EmbeddingService {
  private readonly limit: LimitFunction;

  constructor(
    readonly provider: EmbeddingProvider,
    private readonly options: EmbeddingServiceOptions,
  ) {
    this.limit = createWorkerPool(options.concurrency);
  }

  async embedTexts(
    texts: string[],
    options: CallOptions & { onProgress?: (done: number, total: number) => void } = {},
  ): Promise<number[][]> {
    if (texts.length === 0) return [];

    const batches: { texts: string[]; startIdx: number }[] = [];
    for (let i = 0; i < texts.length; i += this.options.batchSize) {
      batches.push({ texts: texts.slice(i, i + this.options.batchSize), startIdx: i });
    }

    const results: number[][] = new Array(texts.length);
    let completed = 0;
    // The first failed batch stops the queued ones and cancels those in flight.
    const failed = new AbortController();
    const signal = options.signal ? AbortSignal.any([options.signal, failed.signal]) : failed.signal;

    await Promise.all(
      batches.map((batch) =>
        this.limit(async () => {
          if (failed.signal.aborted) return;
          try {
            const embeddings = await this.embedBatch(batch.texts, signal, options.signal);
            embeddings.forEach((vector, j) => {
              results[batch.startIdx + j] = vector;
            });
            completed += batch.texts.length;
            options.onProgress?.(completed, texts.length);
          } catch (error) {
            failed.abort(error);
            throw error;
          }
        }),
      ),
    );

    return results;
  }

  async embedQuery(query: string, options: CallOptions = {}): Promise<number[]> {
    const [embedding] = await this.embedTexts([this.options.queryPrefix + query], options);
    if (!embedding) {
      throw new EmbeddingUnavailable("Embedding provider returned no vector for the query.");
    }
    return embedding;
  }

  private async embedBatch(batch: string[], signal: AbortSignal, callerSignal?: AbortSignal): Promise<number[][]> {
    signal.throwIfAborted();
    try {
      const vectors = await withRetry(
        () => this.provider.embed(batch, { signal: callSignal(this.options.timeoutMs, signal) }),
        {
          ...this.options.retry,
          label: `${this.provider.model}:embed`,
          signal,
          logger: this.options.logger,
        },
      );
      if (vectors.length !== batch.length) {
        throw new Error(`Embedding provider returned ${vectors.length} vectors for ${batch.length} inputs`);
      }
      return vectors;
    } catch (error) {
      callerSignal?.throwIfAborted();
      throw new EmbeddingUnavailable(`Embedding failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
