import type { Stats } from "node:fs";
import { readdir, readFile, stat } from "node:fs/promises";
import path from "node:path";
import type { Logger } from "pino";
import { moduleLogger } from "../utils/logger.js";
import { fingerprintBytes, isSupportedFile } from "./documents.js";
import { FetchError, errorMessage, hasErrorCode, type FetchErrorReason } from "./errors.js";
import { documentIdentity, type CallOptions, type DocumentRef, type DocumentSource, type FetchedDocument } from "./types.js";

function reasonFor(error: unknown): FetchErrorReason {
  if (hasErrorCode(error, "ENOENT") || hasErrorCode(error, "ENOTDIR")) return "not_found";
  if (hasErrorCode(error, "EACCES") || hasErrorCode(error, "EPERM")) return "auth";
  return "unreachable";
}

/**
 * A library per sub-directory of `rootDir`; every supported file below it,
 * at any depth, is a document.
 */
export class LocalDirectorySource implements DocumentSource {
  private readonly logger: Logger;

  constructor(
    readonly rootDir: string,
    logger?: Logger,
  ) {
    this.logger = moduleLogger("source", logger);
  }

  private resolveInside(...segments: string[]): string {
    const root = path.resolve(this.rootDir);
    const resolved = path.resolve(root, ...segments);
    if (resolved !== root && !resolved.startsWith(root + path.sep)) {
      throw new FetchError("not_found", segments.join("/"), `Path escapes the library root: ${segments.join("/")}`);
    }
    return resolved;
  }

  async listDocuments(libraryId: string, options?: CallOptions): Promise<DocumentRef[]> {
    options?.signal?.throwIfAborted();
    const dir = this.resolveInside(libraryId);

    let entries: string[];
    try {
      entries = await readdir(dir, { recursive: true });
    } catch (error) {
      throw new FetchError(reasonFor(error), libraryId, `Cannot list library ${libraryId}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const refs: DocumentRef[] = [];
    for (const entry of entries.sort()) {
      if (!isSupportedFile(entry)) continue;
      const fileStat = await this.statEntry(libraryId, dir, entry);
      if (!fileStat?.isFile()) continue;
      const relative = entry.split(path.sep).join("/");
      refs.push({ libraryId, path: relative, name: path.basename(entry) });
    }
    return refs;
  }

  /** `null` for entries that vanished after listing or point nowhere. */
  private async statEntry(libraryId: string, dir: string, entry: string): Promise<Stats | null> {
    try {
      return await stat(path.join(dir, entry));
    } catch (error) {
      if (hasErrorCode(error, "ENOENT") || hasErrorCode(error, "ENOTDIR") || hasErrorCode(error, "ELOOP")) {
        this.logger.warn({ libraryId, entry, error: errorMessage(error) }, "Skipping unreadable library entry.");
        return null;
      }
      const target = `${libraryId}:${entry.split(path.sep).join("/")}`;
      throw new FetchError(reasonFor(error), target, `Cannot inspect ${target}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  async fetch(ref: DocumentRef, options?: CallOptions): Promise<FetchedDocument> {
    options?.signal?.throwIfAborted();
    const identity = documentIdentity(ref);
    const filePath = this.resolveInside(ref.libraryId, ...ref.path.split("/"));

    let buffer: Buffer;
    try {
      buffer = await readFile(filePath, { signal: options?.signal });
    } catch (error) {
      options?.signal?.throwIfAborted();
      throw new FetchError(reasonFor(error), identity, `Cannot read ${identity}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const bytes = new Uint8Array(buffer);
    return { ref, identity, fingerprint: fingerprintBytes(bytes), bytes };
  }
}
