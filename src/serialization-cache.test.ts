/**
 * Unit tests for serialization-cache.ts
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { SerializationCache, modelFingerprint } from "./serialization-cache.js";

describe("modelFingerprint", () => {
  it("is the sha256 hex digest of the payload", () => {
    expect(modelFingerprint(new Uint8Array([]))).toBe(
      "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855",
    );
  });

  it("changes when the payload changes", () => {
    expect(modelFingerprint(new Uint8Array([1]))).not.toBe(modelFingerprint(new Uint8Array([2])));
  });
});

describe("SerializationCache", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "emotion-serial-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("creates the directory and reports a miss", async () => {
    const cache = new SerializationCache(join(dir, "nested", "cache"));
    const entry = await cache.prepare("abc");

    expect(entry).toEqual({ optimizedModelPath: join(dir, "nested", "cache", "abc.optimized.onnx"), cachedModel: null });
  });

  it("returns the stored bytes for the matching fingerprint", async () => {
    const cache = new SerializationCache(dir);
    await writeFile(cache.entryPath("abc"), Buffer.from([4, 5, 6]));

    const entry = await cache.prepare("abc");
    expect(entry.cachedModel).toEqual(new Uint8Array([4, 5, 6]));
  });

  it("treats an empty entry as a miss", async () => {
    const cache = new SerializationCache(dir);
    await writeFile(cache.entryPath("abc"), Buffer.alloc(0));
    expect((await cache.prepare("abc")).cachedModel).toBeNull();
  });

  it("silently removes entries for other fingerprints", async () => {
    const cache = new SerializationCache(dir);
    await writeFile(cache.entryPath("old"), Buffer.from([1]));
    await writeFile(join(dir, "notes.txt"), "keep");

    await cache.prepare("new");

    expect((await readdir(dir)).sort()).toEqual(["notes.txt"]);
  });

  it("invalidate() removes the entry and tolerates a missing one", async () => {
    const cache = new SerializationCache(dir);
    await writeFile(cache.entryPath("abc"), Buffer.from([1]));

    await cache.invalidate("abc");
    await cache.invalidate("abc");

    expect(await readdir(dir)).toEqual([]);
  });
});
