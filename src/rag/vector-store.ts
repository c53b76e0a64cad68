import type { Logger } from "pino";
import { LocalIndex } from "vectra";
import { z } from "zod";
import { moduleLogger } from "../utils/logger.js";
import { KeyedMutex, createWorkerPool, type LimitFunction } from "./concurrency.js";
import type { EmbeddingService } from "./embedding-service.js";
import { IndexError, errorMessage } from "./errors.js";
import type { Chunk, IndexedChunk, ScoredChunk } from "./types.js";

export interface IndexPersistence {
  load(): Promise<IndexedChunk[]>;
  /** Replaces every stored entry of `identity`; an empty list removes it. */
  replace(identity: string, entries: IndexedChunk[]): Promise<void>;
}

interface IndexSnapshot {
  readonly documents: ReadonlyMap<string, readonly IndexedChunk[]>;
  readonly chunkCount: number;
}

const EMPTY_SNAPSHOT: IndexSnapshot = { documents: new Map(), chunkCount: 0 };

export function vectorNorm(vector: readonly number[]): number {
  let sum = 0;
  for (const x of vector) sum += x * x;
  return Math.sqrt(sum);
}

export function cosineSimilarity(
  a: readonly number[],
  aNorm: number,
  b: readonly number[],
  bNorm: number,
): number {
  if (aNorm === 0 || bNorm === 0) return 0;
  let dot = 0;
  for (let i = 0; i < a.length; i++) dot += (a[i] ?? 0) * (b[i] ?? 0);
  return dot / (aNorm * bNorm);
}

export interface UpsertOptions {
  signal?: AbortSignal;
  onProgress?: (done: number, total: number) => void;
}

/**
 * (Chunk, embedding) pairs grouped by document identity. Readers always see a
 * whole snapshot: an upsert builds its entries aside and swaps them in with a
 * single assignment, after any persistence has succeeded.
 */
export class EmbeddingIndex {
  private snapshot: IndexSnapshot = EMPTY_SNAPSHOT;
  private readonly documentOrder = new Map<string, number>();
  private nextDocumentOrder = 0;
  private readonly locks = new KeyedMutex();
  private readonly commits: LimitFunction = createWorkerPool(1);
  private readonly logger: Logger;

  constructor(
    readonly embeddings: EmbeddingService,
    private readonly persistence?: IndexPersistence,
    logger?: Logger,
  ) {
    this.logger = moduleLogger("index", logger);
  }

  static async open(
    embeddings: EmbeddingService,
    persistence: IndexPersistence,
    logger?: Logger,
  ): Promise<EmbeddingIndex> {
    const index = new EmbeddingIndex(embeddings, persistence, logger);
    const stored = await persistence.load();

    const grouped = new Map<string, IndexedChunk[]>();
    for (const entry of stored) {
      const list = grouped.get(entry.chunk.identity) ?? [];
      list.push(entry);
      grouped.set(entry.chunk.identity, list);
    }
    const byOrder = [...grouped.entries()].sort(
      ([, a], [, b]) => (a[0]?.order ?? 0) - (b[0]?.order ?? 0),
    );
    for (const [identity, entries] of byOrder) {
      entries.sort((a, b) => a.chunk.index - b.chunk.index);
      index.documentOrder.set(identity, entries[0]?.order ?? 0);
      index.nextDocumentOrder = Math.max(index.nextDocumentOrder, (entries[0]?.order ?? 0) + 1);
      index.commit(identity, entries);
    }

    index.logger.debug(
      { documents: index.documentCount, chunks: index.chunkCount },
      "Index loaded from disk.",
    );
    return index;
  }

  /**
   * Embeds `chunks` and replaces every entry of `identity` with them. Upserts
   * of one identity run one at a time; cancelling before the swap leaves the
   * index untouched.
   */
  async upsert(identity: string, chunks: Chunk[], options: UpsertOptions = {}): Promise<void> {
    const foreign = chunks.find((chunk) => chunk.identity !== identity);
    if (foreign) {
      throw new Error(`Chunk ${foreign.id} does not belong to ${identity}`);
    }

    await this.locks.run(identity, async () => {
      options.signal?.throwIfAborted();
      const vectors = await this.vectorsFor(identity, chunks, options);
      options.signal?.throwIfAborted();

      await this.commits(async () => {
        options.signal?.throwIfAborted();
        const order = this.documentOrder.get(identity) ?? this.nextDocumentOrder;
        const entries: IndexedChunk[] = chunks.map((chunk) => {
          const vector = vectors.get(chunk.text) ?? [];
          return { chunk, vector, norm: vectorNorm(vector), order };
        });
        this.assertDimensions(identity, entries);
        await this.persistence?.replace(identity, entries);
        if (entries.length > 0 && !this.documentOrder.has(identity)) {
          this.documentOrder.set(identity, order);
          this.nextDocumentOrder = order + 1;
        }
        this.commit(identity, entries);
      });
    });

    this.logger.debug({ identity, chunks: chunks.length }, "Document indexed.");
  }

  /**
   * Vectors for every distinct chunk text. Texts the identity already has
   * indexed keep their vectors; only the rest go to the embedding service.
   */
  private async vectorsFor(identity: string, chunks: Chunk[], options: UpsertOptions): Promise<Map<string, number[]>> {
    const vectors = new Map<string, number[]>();
    for (const entry of this.snapshot.documents.get(identity) ?? []) {
      vectors.set(entry.chunk.text, entry.vector);
    }
    const missing = [...new Set(chunks.map((chunk) => chunk.text))].filter((text) => !vectors.has(text));
    const embedded = await this.embeddings.embedTexts(missing, {
      signal: options.signal,
      onProgress: options.onProgress,
    });
    missing.forEach((text, i) => {
      const vector = embedded[i];
      if (vector) vectors.set(text, vector);
    });

    if (missing.length < chunks.length) {
      this.logger.debug({ identity, chunks: chunks.length, embedded: missing.length }, "Reused vectors of unchanged chunks.");
    }
    return vectors;
  }

  async remove(identity: string): Promise<void> {
    await this.locks.run(identity, () =>
      this.commits(async () => {
        if (!this.snapshot.documents.has(identity)) return;
        await this.persistence?.replace(identity, []);
        this.commit(identity, []);
      }),
    );
  }

  /** Top `k` chunks by cosine similarity; equal scores keep indexing order. */
  query(vector: readonly number[], k: number): ScoredChunk[] {
    const snapshot = this.snapshot;
    if (snapshot.chunkCount === 0) {
      throw new IndexError("empty_index", "Nothing has been indexed yet.");
    }
    const dimensions = this.dimensionsOf(snapshot);
    if (dimensions !== null && vector.length !== dimensions) {
      throw new IndexError(
        "dimension_mismatch",
        `Query vector has ${vector.length} dimensions, the index holds ${dimensions}.`,
      );
    }
    if (k <= 0) return [];

    const queryNorm = vectorNorm(vector);
    const scored: Array<{ entry: IndexedChunk; score: number }> = [];
    for (const entries of snapshot.documents.values()) {
      for (const entry of entries) {
        scored.push({ entry, score: cosineSimilarity(vector, queryNorm, entry.vector, entry.norm) });
      }
    }

    scored.sort(
      (a, b) =>
        b.score - a.score ||
        a.entry.order - b.entry.order ||
        a.entry.chunk.index - b.entry.chunk.index,
    );

    return scored.slice(0, k).map(({ entry, score }) => ({ chunk: entry.chunk, score }));
  }

  fingerprintOf(identity: string): string | undefined {
    return this.snapshot.documents.get(identity)?.[0]?.chunk.fingerprint;
  }

  chunksOf(identity: string): Chunk[] {
    return (this.snapshot.documents.get(identity) ?? []).map((entry) => entry.chunk);
  }

  identities(): string[] {
    return [...this.snapshot.documents.keys()];
  }

  get documentCount(): number {
    return this.snapshot.documents.size;
  }

  get chunkCount(): number {
    return this.snapshot.chunkCount;
  }

  get dimensions(): number | null {
    return this.dimensionsOf(this.snapshot);
  }

  private dimensionsOf(snapshot: IndexSnapshot, excluding?: string): number | null {
    for (const [identity, entries] of snapshot.documents) {
      if (identity === excluding) continue;
      const first = entries[0];
      if (first) return first.vector.length;
    }
    return null;
  }

  private assertDimensions(identity: string, entries: IndexedChunk[]): void {
    const expected = this.dimensionsOf(this.snapshot, identity) ?? entries[0]?.vector.length;
    const bad = entries.find((entry) => entry.vector.length !== expected || entry.vector.length === 0);
    if (bad) {
      throw new IndexError(
        "dimension_mismatch",
        `Embedding for ${bad.chunk.id} has ${bad.vector.length} dimensions, expected ${expected ?? "a non-empty vector"}.`,
      );
    }
  }

  private commit(identity: string, entries: readonly IndexedChunk[]): void {
    const documents = new Map(this.snapshot.documents);
    const previous = documents.get(identity)?.length ?? 0;
    if (entries.length > 0) {
      documents.set(identity, Object.freeze([...entries]));
    } else {
      documents.delete(identity);
      this.documentOrder.delete(identity);
    }
    this.snapshot = {
      documents,
      chunkCount: this.snapshot.chunkCount - previous + entries.length,
    };
  }
}

const storedChunkSchema = z.object({
  identity: z.string(),
  fingerprint: z.string(),
  source: z.string(),
  index: z.number().int(),
  pageStart: z.number().int(),
  pageEnd: z.number().int(),
  start: z.number().int(),
  end: z.number().int(),
  text: z.string(),
  order: z.number().int(),
});

/** Persists index entries in a vectra `LocalIndex` folder. */
export class VectraIndexStore implements IndexPersistence {
  private readonly index: LocalIndex;

  constructor(
    folderPath: string,
    private readonly logger?: Logger,
  ) {
    this.index = new LocalIndex(folderPath);
  }

  async load(): Promise<IndexedChunk[]> {
    if (!(await this.index.isIndexCreated())) return [];

    const entries: IndexedChunk[] = [];
    for (const item of await this.index.listItems()) {
      const parsed = storedChunkSchema.safeParse(item.metadata);
      if (!parsed.success) {
        this.logger?.warn({ id: item.id, error: parsed.error.message }, "Skipping malformed index entry.");
        continue;
      }
      const { order, ...meta } = parsed.data;
      entries.push({
        chunk: { id: item.id, ...meta },
        vector: item.vector,
        norm: vectorNorm(item.vector),
        order,
      });
    }
    return entries;
  }

  async replace(identity: string, entries: IndexedChunk[]): Promise<void> {
    if (!(await this.index.isIndexCreated())) {
      if (entries.length === 0) return;
      await this.index.createIndex();
    }

    const existing = (await this.index.listItems()).filter((item) => item.metadata["identity"] === identity);

    await this.index.beginUpdate();
    try {
      for (const item of existing) {
        await this.index.deleteItem(item.id);
      }
      for (const { chunk, vector, order } of entries) {
        await this.index.insertItem({
          id: chunk.id,
          vector,
          metadata: {
            identity: chunk.identity,
            fingerprint: chunk.fingerprint,
            source: chunk.source,
            index: chunk.index,
            pageStart: chunk.pageStart,
            pageEnd: chunk.pageEnd,
            start: chunk.start,
            end: chunk.end,
            text: chunk.text,
            order,
          },
        });
      }
      await this.index.endUpdate();
    } catch (error) {
      this.index.cancelUpdate();
      this.logger?.error({ identity, error: errorMessage(error) }, "Failed to persist index entries.");
      throw error;
    }
  }
}
