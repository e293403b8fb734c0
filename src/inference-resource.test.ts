/**
 * Unit tests for inference-resource.ts
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { InferenceResource } from "./inference-resource.js";
import { SerializationCache, modelFingerprint } from "./serialization-cache.js";
import { FakeBackend, TEST_INPUT_DIMS, TEST_MODEL, silentLogger } from "./test-helpers.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

const TENSOR_LENGTH = 3 * 224 * 224;
const FINGERPRINT = modelFingerprint(TEST_MODEL);

function makeResource(backend: FakeBackend, cache?: SerializationCache): InferenceResource {
  return new InferenceResource({
    backend,
    inputDims: TEST_INPUT_DIMS,
    classCount: 8,
    cache,
    logger: silentLogger(),
  });
}

describe("InferenceResource", () => {
  let backend: FakeBackend;

  beforeEach(() => {
    backend = new FakeBackend();
  });

  // ─── load ─────────────────────────────────────────────────────────────────────

  describe("load", () => {
    it("binds the accelerated path first and warms up once", async () => {
      const resource = makeResource(backend);
      const result = await resource.load(TEST_MODEL);

      expect(result).toEqual({
        ok: true,
        value: { accelerator: "accelerated", fingerprint: FINGERPRINT, fromCache: false },
      });
      expect(resource.state).toEqual({ status: "ready", accelerator: "accelerated" });
      expect(backend.binds).toEqual([{ accelerator: "accelerated" }]);
      expect(backend.runCount).toBe(1);
      expect(resource.modelFingerprint).toBe(FINGERPRINT);
      expect(resource.accelerator).toBe("accelerated");
    });

    it("falls back and reports degraded when the accelerated bind fails", async () => {
      backend.bindFailure = (options) => (options.accelerator === "accelerated" ? new Error("no adapter") : null);
      const resource = makeResource(backend);

      const result = await resource.load(TEST_MODEL);

      expect(result.ok).toBe(true);
      expect(resource.state).toEqual({
        status: "degraded",
        accelerator: "fallback",
        reason: "Accelerated binding failed: no adapter",
      });
      expect(backend.binds.map((b) => b.accelerator)).toEqual(["accelerated", "fallback"]);
      expect(resource.isReady).toBe(true);
      expect(resource.accelerator).toBe("fallback");
    });

    it("uses the fallback path directly when no accelerator is present", async () => {
      backend.supported = false;
      const resource = makeResource(backend);

      await resource.load(TEST_MODEL);

      expect(resource.state).toEqual({ status: "ready", accelerator: "fallback" });
      expect(backend.binds).toEqual([{ accelerator: "fallback" }]);
    });

    it("fails with accelerator_unavailable when acceleration is required but absent", async () => {
      backend.supported = false;
      const resource = makeResource(backend);

      const result = await resource.load(TEST_MODEL, "accelerated");

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.kind).toBe("accelerator_unavailable");
      expect(resource.state.status).toBe("failed");
      expect(resource.accelerator).toBeNull();
      expect(backend.binds).toHaveLength(0);
    });

    it("never tries the accelerator with the fallback hint", async () => {
      const resource = makeResource(backend);
      await resource.load(TEST_MODEL, "fallback");
      expect(backend.binds).toEqual([{ accelerator: "fallback" }]);
    });

    it("reports bind_failed when every attempt fails", async () => {
      backend.bindFailure = () => new Error("corrupt payload");
      const resource = makeResource(backend);

      const result = await resource.load(TEST_MODEL);

      expect(result).toEqual({
        ok: false,
        error: {
          kind: "bind_failed",
          message: "All bind attempts failed: corrupt payload",
          cause: new Error("corrupt payload"),
        },
      });
      expect(resource.state).toEqual({ status: "failed", reason: "All bind attempts failed: corrupt payload" });
    });

    it("rejects a model whose output does not have 8 classes and releases it", async () => {
      backend.outputDims = [1, 7];
      const resource = makeResource(backend);

      const result = await resource.load(TEST_MODEL);

      expect(result).toEqual({
        ok: false,
        error: { kind: "invalid_model", message: "Output has 7 values, expected 8" },
      });
      expect(backend.liveSessions).toHaveLength(0);
    });

    it("still succeeds when the warm-up inference fails", async () => {
      backend.runImpl = () => {
        throw new Error("kernel missing");
      };
      const resource = makeResource(backend);

      const result = await resource.load(TEST_MODEL);

      expect(result.ok).toBe(true);
      expect(resource.state).toEqual({ status: "ready", accelerator: "accelerated" });
    });

    it("moves to the fallback path when the warm-up hits an accelerator fault", async () => {
      backend.runImpl = (_input, session) => {
        if (session.accelerator === "accelerated") throw new Error("GPU device lost");
        return new Float32Array(8);
      };
      const resource = makeResource(backend);

      const result = await resource.load(TEST_MODEL);

      expect(result.ok).toBe(true);
      if (result.ok) expect(result.value.accelerator).toBe("fallback");
      expect(resource.state.status).toBe("degraded");
      expect(backend.sessions[0].released).toBe(true);
      expect(backend.liveSessions).toHaveLength(1);
    });

    it("releases the previous session before binding again", async () => {
      const resource = makeResource(backend);
      await resource.load(TEST_MODEL);
      await resource.load(TEST_MODEL);

      expect(backend.sessions).toHaveLength(2);
      expect(backend.sessions[0].released).toBe(true);
      expect(backend.liveSessions).toHaveLength(1);
    });
  });

  // ─── run ──────────────────────────────────────────────────────────────────────

  describe("run", () => {
    it("fails fast with not_loaded before load", async () => {
      const resource = makeResource(backend);
      const result = await resource.run(new Float32Array(TENSOR_LENGTH));

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.kind).toBe("not_loaded");
      expect(backend.runCount).toBe(0);
    });

    it("returns the raw scores", async () => {
      backend.scores = [0.1, 0.1, 0.1, 0.1, 0.1, 0.1, 0.1, 2];
      const resource = makeResource(backend);
      await resource.load(TEST_MODEL);

      const result = await resource.run(new Float32Array(TENSOR_LENGTH));

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value).toHaveLength(8);
        expect(result.value[7]).toBe(2);
      }
    });

    it("rejects a tensor of the wrong length", async () => {
      const resource = makeResource(backend);
      await resource.load(TEST_MODEL);

      const result = await resource.run(new Float32Array(10));

      expect(result).toEqual({
        ok: false,
        error: { kind: "runtime_failure", message: `Input tensor has 10 values, expected ${TENSOR_LENGTH}` },
      });
    });

    it("treats an accelerator fault as fatal for the binding", async () => {
      const resource = makeResource(backend);
      await resource.load(TEST_MODEL);
      backend.runImpl = () => {
        throw new Error("WebGPU device was lost");
      };

      const first = await resource.run(new Float32Array(TENSOR_LENGTH));
      const second = await resource.run(new Float32Array(TENSOR_LENGTH));

      expect(first.ok).toBe(false);
      if (!first.ok) expect(first.error.kind).toBe("accelerator_fault");
      expect(resource.state).toEqual({ status: "failed", reason: "Accelerator fault: WebGPU device was lost" });
      expect(backend.sessions[0].released).toBe(true);
      expect(second.ok).toBe(false);
      if (!second.ok) expect(second.error.kind).toBe("not_loaded");
    });

    it("keeps the binding on other runtime failures", async () => {
      const resource = makeResource(backend);
      await resource.load(TEST_MODEL);
      backend.runImpl = () => {
        throw new Error("shape inference error");
      };

      const result = await resource.run(new Float32Array(TENSOR_LENGTH));

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.kind).toBe("runtime_failure");
      expect(resource.state).toEqual({ status: "ready", accelerator: "accelerated" });
    });

    it("rejects non-finite scores", async () => {
      const resource = makeResource(backend);
      await resource.load(TEST_MODEL);
      backend.scores = [0, 0, 0, Number.NaN, 0, 0, 0, 0];

      const result = await resource.run(new Float32Array(TENSOR_LENGTH));
      expect(result).toEqual({ ok: false, error: { kind: "runtime_failure", message: "Model returned non-finite scores" } });
    });

    it("runs queued calls after a pending load", async () => {
      const resource = makeResource(backend);
      const loading = resource.load(TEST_MODEL);
      const running = resource.run(new Float32Array(TENSOR_LENGTH));

      await loading;
      const result = await running;
      expect(result.ok).toBe(true);
    });
  });

  // ─── healthCheck / unload / forceReload ───────────────────────────────────────

  describe("healthCheck", () => {
    it("is false before load and true when ready", async () => {
      const resource = makeResource(backend);
      expect(resource.healthCheck()).toBe(false);
      await resource.load(TEST_MODEL);
      expect(resource.healthCheck()).toBe(true);
    });

    it("is false when the descriptors cannot be read", async () => {
      const resource = makeResource(backend);
      await resource.load(TEST_MODEL);
      backend.sessions[0].descriptorError = new Error("session closed");
      expect(resource.healthCheck()).toBe(false);
    });
  });

  describe("unload", () => {
    it("is idempotent and releases the session", async () => {
      const resource = makeResource(backend);
      await resource.unload();
      await resource.load(TEST_MODEL);
      await resource.unload();
      await resource.unload();

      expect(resource.state).toEqual({ status: "unloaded" });
      expect(backend.liveSessions).toHaveLength(0);
    });
  });

  describe("forceReload", () => {
    it("fails when nothing was loaded before", async () => {
      const resource = makeResource(backend);
      const result = await resource.forceReload();
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.kind).toBe("bind_failed");
    });

    it("unloads and loads the last model again", async () => {
      const resource = makeResource(backend);
      await resource.load(TEST_MODEL, "fallback");

      const result = await resource.forceReload();

      expect(result.ok).toBe(true);
      expect(backend.binds).toEqual([{ accelerator: "fallback" }, { accelerator: "fallback" }]);
      expect(backend.sessions[0].released).toBe(true);
      expect(backend.liveSessions).toHaveLength(1);
    });
  });

  // ─── Serialization cache ──────────────────────────────────────────────────────

  describe("with a serialization cache", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), "emotion-cache-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("passes serialization options on the first accelerated attempt", async () => {
      const cache = new SerializationCache(dir);
      const resource = makeResource(backend, cache);

      const result = await resource.load(TEST_MODEL);

      expect(backend.binds).toEqual([
        {
          accelerator: "accelerated",
          serialization: { optimizedModelPath: cache.entryPath(FINGERPRINT), cachedModel: null },
        },
      ]);
      if (result.ok) expect(result.value.fromCache).toBe(false);
    });

    it("reports a cache hit when an entry exists", async () => {
      const cache = new SerializationCache(dir);
      await writeFile(cache.entryPath(FINGERPRINT), Buffer.from([9, 9, 9]));
      const resource = makeResource(backend, cache);

      const result = await resource.load(TEST_MODEL);

      expect(result.ok && result.value.fromCache).toBe(true);
      expect(backend.binds[0].serialization?.cachedModel).toEqual(new Uint8Array([9, 9, 9]));
    });

    it("retries once without serialization and drops the entry", async () => {
      const cache = new SerializationCache(dir);
      await writeFile(cache.entryPath(FINGERPRINT), Buffer.from([9, 9, 9]));
      backend.bindFailure = (options) => (options.serialization ? new Error("stale cache") : null);
      const resource = makeResource(backend, cache);

      const result = await resource.load(TEST_MODEL);

      expect(result).toEqual({
        ok: true,
        value: { accelerator: "accelerated", fingerprint: FINGERPRINT, fromCache: false },
      });
      expect(backend.binds[1]).toEqual({ accelerator: "accelerated" });
      expect((await cache.prepare(FINGERPRINT)).cachedModel).toBeNull();
    });
  });
});
