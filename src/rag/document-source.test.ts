import { mkdir, mkdtemp, rm, symlink, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { LocalDirectorySource } from "./document-source.js";
import { fingerprintBytes } from "./documents.js";
import { FetchError } from "./errors.js";
import { silentLogger } from "./test-helpers.js";

describe("LocalDirectorySource", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), "folio-library-"));
    await mkdir(path.join(root, "lib", "sub"), { recursive: true });
    await writeFile(path.join(root, "lib", "a.txt"), "Alpha notes");
    await writeFile(path.join(root, "lib", "sub", "b.png"), "not really a png");
    await writeFile(path.join(root, "lib", "setup.exe"), "binary");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("should list supported files at any depth", async () => {
    const refs = await new LocalDirectorySource(root).listDocuments("lib");

    expect(refs).toEqual([
      { libraryId: "lib", path: "a.txt", name: "a.txt" },
      { libraryId: "lib", path: "sub/b.png", name: "b.png" },
    ]);
  });

  it("should skip entries that point nowhere", async () => {
    await symlink(path.join(root, "lib", "missing-target.txt"), path.join(root, "lib", "ghost.txt"));

    const refs = await new LocalDirectorySource(root, silentLogger).listDocuments("lib");

    expect(refs.map((ref) => ref.path)).toEqual(["a.txt", "sub/b.png"]);
  });

  it("should fetch bytes with their fingerprint", async () => {
    const source = new LocalDirectorySource(root);
    const document = await source.fetch({ libraryId: "lib", path: "a.txt", name: "a.txt" });

    expect(document.identity).toBe("lib:a.txt");
    expect(new TextDecoder().decode(document.bytes)).toBe("Alpha notes");
    expect(document.fingerprint).toBe(fingerprintBytes(new TextEncoder().encode("Alpha notes")));
  });

  it("should report missing documents and libraries as not_found", async () => {
    const source = new LocalDirectorySource(root);

    await expect(source.fetch({ libraryId: "lib", path: "gone.txt", name: "gone.txt" })).rejects.toMatchObject({
      reason: "not_found",
      target: "lib:gone.txt",
    });
    await expect(source.listDocuments("missing")).rejects.toBeInstanceOf(FetchError);
  });

  it("should refuse paths outside the library root", async () => {
    const source = new LocalDirectorySource(root);

    await expect(
      source.fetch({ libraryId: "lib", path: "../../outside.txt", name: "outside.txt" }),
    ).rejects.toThrow("Path escapes the library root");
  });
});
