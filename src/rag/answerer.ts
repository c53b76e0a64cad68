import type { Logger } from "pino";
import { moduleLogger } from "../utils/logger.js";
import { callSignal, withRetry, type RetryPolicy } from "./concurrency.js";
import { buildPrompt, packContext } from "./context-builder.js";
import type { EmbeddingService } from "./embedding-service.js";
import { GenerationUnavailable, InvalidQuestion, NoRelevantContent, errorMessage } from "./errors.js";
import { retrieve } from "./retriever.js";
import type { AnswerRecord, GenerationProvider } from "./types.js";
import type { EmbeddingIndex } from "./vector-store.js";

export interface AnswererOptions {
  index: EmbeddingIndex;
  embeddings: EmbeddingService;
  generator: GenerationProvider;
  minSimilarity: number;
  retry: RetryPolicy;
  generationTimeoutMs: number;
  logger?: Logger;
  now?: () => Date;
}

export interface AnswerOptions {
  k: number;
  maxContextSize: number;
  signal?: AbortSignal;
}

export class Answerer {
  private readonly logger: Logger;

  constructor(private readonly options: AnswererOptions) {
    this.logger = moduleLogger("answer", options.logger);
  }

  /**
   * Answers from the top-k indexed chunks. Fails with `NoRelevantContent`
   * rather than calling the model when nothing clears the similarity
   * threshold; citations cover exactly the chunks placed in the prompt.
   */
  async answer(question: string, options: AnswerOptions): Promise<AnswerRecord> {
    const { signal } = options;
    const trimmedQuestion = question.trim();
    if (!trimmedQuestion) {
      throw new InvalidQuestion("Question cannot be empty.");
    }

    this.logger.info({ question: trimmedQuestion }, "Retrieving context.");
    const { retrieved, relevant } = await retrieve(trimmedQuestion, this.options.index, this.options.embeddings, {
      k: options.k,
      minSimilarity: this.options.minSimilarity,
      signal,
    });

    if (relevant.length === 0) {
      const best = retrieved[0]?.score ?? null;
      this.logger.warn({ bestScore: best }, "No chunk cleared the similarity threshold.");
      throw new NoRelevantContent(best, this.options.minSimilarity);
    }

    const context = packContext(relevant, options.maxContextSize);
    this.logger.info(
      { retrieved: retrieved.length, relevant: relevant.length, packed: context.citations.length },
      "Generating answer with retrieved context.",
    );

    const prompt = buildPrompt(trimmedQuestion, context.text);
    let answer: string;
    try {
      answer = await withRetry(
        () =>
          this.options.generator.generate(prompt, {
            signal: callSignal(this.options.generationTimeoutMs, signal),
          }),
        { ...this.options.retry, label: `${this.options.generator.model}:generate`, signal, logger: this.logger },
      );
    } catch (error) {
      signal?.throwIfAborted();
      throw new GenerationUnavailable(`Answer generation failed: ${errorMessage(error)}`, { cause: error });
    }
    signal?.throwIfAborted();

    const trimmedAnswer = answer.trim();
    if (!trimmedAnswer) {
      throw new GenerationUnavailable("The model returned an empty answer.");
    }

    return {
      question: trimmedQuestion,
      retrieved: retrieved.map(({ chunk, score }) => ({ chunkId: chunk.id, identity: chunk.identity, score })),
      answer: trimmedAnswer,
      citations: context.citations,
      createdAt: (this.options.now?.() ?? new Date()).toISOString(),
    };
  }
}
