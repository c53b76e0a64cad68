import { createHash } from "node:crypto";
import { mkdir, readdir, readFile, rename, unlink, writeFile } from "node:fs/promises";
import path from "node:path";
import type { Logger } from "pino";
import { z } from "zod";
import { moduleLogger } from "../utils/logger.js";
import { KeyedMutex, SingleFlight } from "./concurrency.js";
import { errorMessage, hasErrorCode } from "./errors.js";
import type { ExtractedText } from "./types.js";

export interface ExtractionStore {
  load(): Promise<ExtractedText[]>;
  save(text: ExtractedText): Promise<void>;
  remove(identity: string, fingerprint: string): Promise<void>;
}

export interface ExtractionCacheStats {
  hits: number;
  misses: number;
  joined: number;
}

function cacheKey(identity: string, fingerprint: string): string {
  return `${identity}\u0000${fingerprint}`;
}

/**
 * Extracted text keyed by (identity, fingerprint). Entries for a fingerprint
 * that is no longer an identity's current one stay on record but are never
 * served, until {@link ExtractionCache.purgeStale}.
 */
export class ExtractionCache {
  private readonly entries = new Map<string, ExtractedText>();
  private readonly current = new Map<string, string>();
  private readonly flights = new SingleFlight<ExtractedText>();
  private readonly writes = new KeyedMutex();
  readonly stats: ExtractionCacheStats = { hits: 0, misses: 0, joined: 0 };

  private readonly logger: Logger;

  constructor(
    private readonly store?: ExtractionStore,
    logger?: Logger,
  ) {
    this.logger = moduleLogger("cache", logger);
  }

  static async open(store: ExtractionStore, logger?: Logger): Promise<ExtractionCache> {
    const cache = new ExtractionCache(store, logger);
    const loaded = await store.load();
    const sorted = [...loaded].sort((a, b) => a.extractedAt.localeCompare(b.extractedAt));
    for (const text of sorted) {
      cache.entries.set(cacheKey(text.identity, text.fingerprint), text);
      cache.current.set(text.identity, text.fingerprint);
    }
    cache.logger.debug({ entries: cache.entries.size }, "Extraction cache loaded.");
    return cache;
  }

  /** Records the fingerprint an identity was last fetched with. */
  markCurrent(identity: string, fingerprint: string): void {
    this.current.set(identity, fingerprint);
  }

  currentFingerprint(identity: string): string | undefined {
    return this.current.get(identity);
  }

  get(identity: string, fingerprint: string): ExtractedText | undefined {
    const current = this.current.get(identity);
    if (current !== undefined && current !== fingerprint) return undefined;
    return this.entries.get(cacheKey(identity, fingerprint));
  }

  async put(identity: string, fingerprint: string, text: ExtractedText): Promise<void> {
    if (text.identity !== identity || text.fingerprint !== fingerprint) {
      throw new Error(`Extracted text for ${text.identity}@${text.fingerprint} cannot be stored under ${identity}@${fingerprint}`);
    }
    const key = cacheKey(identity, fingerprint);
    await this.writes.run(key, async () => {
      await this.store?.save(text);
      this.entries.set(key, text);
      // A newer fetch may already have moved the identity on; do not move it back.
      if (!this.current.has(identity)) this.current.set(identity, fingerprint);
    });
  }

  /**
   * Returns the cached text or runs `compute` once for the key, however many
   * callers ask concurrently. The result is stored only if the computation
   * completed without being cancelled.
   */
  async getOrCompute(
    identity: string,
    fingerprint: string,
    compute: (signal: AbortSignal) => Promise<ExtractedText>,
    signal?: AbortSignal,
  ): Promise<ExtractedText> {
    const cached = this.get(identity, fingerprint);
    if (cached) {
      this.stats.hits++;
      return cached;
    }

    const { value, shared } = await this.flights.do(
      cacheKey(identity, fingerprint),
      async (flightSignal) => {
        const landed = this.get(identity, fingerprint);
        if (landed) return landed;

        this.stats.misses++;
        const result = await compute(flightSignal);
        flightSignal.throwIfAborted();
        await this.put(identity, fingerprint, result);
        return result;
      },
      signal,
    );

    if (shared) this.stats.joined++;
    return value;
  }

  async purgeStale(): Promise<number> {
    let purged = 0;
    for (const [key, text] of [...this.entries]) {
      const current = this.current.get(text.identity);
      if (current === undefined || current === text.fingerprint) continue;

      await this.writes.run(key, async () => {
        await this.store?.remove(text.identity, text.fingerprint);
        this.entries.delete(key);
      });
      purged++;
    }
    if (purged > 0) this.logger.info({ purged }, "Purged stale extraction cache entries.");
    return purged;
  }

  get size(): number {
    return this.entries.size;
  }
}

const extractedTextSchema = z.object({
  identity: z.string(),
  fingerprint: z.string(),
  source: z.string(),
  pages: z.array(z.string()),
  pageCount: z.number().int().nonnegative(),
  warnings: z.array(z.object({ page: z.number().int(), message: z.string() })),
  extractedAt: z.string(),
});

/** One JSON file per (identity, fingerprint) under `<cacheDir>/extracted`. */
export class FileExtractionStore implements ExtractionStore {
  readonly dir: string;

  constructor(
    cacheDir: string,
    private readonly logger?: Logger,
  ) {
    this.dir = path.join(cacheDir, "extracted");
  }

  private filePath(identity: string, fingerprint: string): string {
    const identityHash = createHash("sha256").update(identity).digest("hex").slice(0, 16);
    return path.join(this.dir, `${identityHash}-${fingerprint.slice(0, 16)}.json`);
  }

  async load(): Promise<ExtractedText[]> {
    let files: string[];
    try {
      files = (await readdir(this.dir)).filter((f) => f.endsWith(".json"));
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) return [];
      throw error;
    }

    const texts: ExtractedText[] = [];
    for (const file of files.sort()) {
      try {
        const raw: unknown = JSON.parse(await readFile(path.join(this.dir, file), "utf-8"));
        texts.push(extractedTextSchema.parse(raw));
      } catch (error) {
        this.logger?.warn({ file, error: errorMessage(error) }, "Skipping corrupted extraction cache entry.");
      }
    }
    return texts;
  }

  async save(text: ExtractedText): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    const target = this.filePath(text.identity, text.fingerprint);
    const tmp = `${target}.${process.pid}.tmp`;
    await writeFile(tmp, JSON.stringify(text));
    await rename(tmp, target);
  }

  async remove(identity: string, fingerprint: string): Promise<void> {
    try {
      await unlink(this.filePath(identity, fingerprint));
    } catch (error) {
      if (!hasErrorCode(error, "ENOENT")) throw error;
    }
  }
}
