/**
 * InferenceResource: Lifecycle manager for the classifier session.
 *
 * States: unloaded → loading → ready | degraded | failed. Every public
 * operation except healthCheck() is serialized on one SerialExecutor so the
 * session handle is never touched by two callers at once, and a failed bind
 * attempt is always torn down before the next attempt begins.
 */

import type {
  AccelerationHint,
  AcceleratorKind,
  InferenceError,
  InferenceState,
  LoadError,
  ReadyInfo,
  Result,
  ScoreVector,
} from "./types.js";
import type { BindOptions, InferenceBackend, ModelSession } from "./inference-backend.js";
import { SerialExecutor } from "./serial-executor.js";
import { modelFingerprint, type SerializationCache } from "./serialization-cache.js";
import { createLogger, errorMessage, type Logger } from "./logger.js";

/** Error messages matching this pattern on the accelerated path are treated as accelerator faults. */
export const ACCELERATOR_FAULT_PATTERN = /gpu|webgpu|accelerat|delegate|device (was )?lost/i;

export interface InferenceResourceOptions {
  backend: InferenceBackend;
  /** Expected input dims, e.g. [1, 3, 224, 224]. */
  inputDims: readonly number[];
  /** Number of class scores the model must emit. */
  classCount: number;
  /** Serialization cache for the accelerated path. Omit to never pass serialization options. */
  cache?: SerializationCache;
  executor?: SerialExecutor;
  logger?: Logger;
}

interface BindAttempt {
  accelerator: AcceleratorKind;
  serialized: boolean;
}

function sameDims(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((d, i) => d === b[i]);
}

export class InferenceResource {
  private readonly backend: InferenceBackend;
  private readonly cache: SerializationCache | null;
  private readonly executor: SerialExecutor;
  private readonly logger: Logger;
  private readonly inputDims: readonly number[];
  private readonly inputLength: number;
  private readonly classCount: number;

  private session: ModelSession | null = null;
  private current: InferenceState = { status: "unloaded" };
  private lastModel: { bytes: Uint8Array; hint: AccelerationHint } | null = null;
  private fingerprint: string | null = null;

  constructor(options: InferenceResourceOptions) {
    this.backend = options.backend;
    this.cache = options.cache ?? null;
    this.executor = options.executor ?? new SerialExecutor();
    this.logger = options.logger ?? createLogger("InferenceResource");
    this.inputDims = options.inputDims;
    this.inputLength = options.inputDims.reduce((acc, d) => acc * d, 1);
    this.classCount = options.classCount;
  }

  get state(): InferenceState {
    return this.current;
  }

  /** Fingerprint of the last model passed to load(), if any. */
  get modelFingerprint(): string | null {
    return this.fingerprint;
  }

  /** Compute path of the bound session, or null when nothing is bound. */
  get accelerator(): AcceleratorKind | null {
    return this.current.status === "ready" || this.current.status === "degraded" ? this.current.accelerator : null;
  }

  get isReady(): boolean {
    return this.current.status === "ready" || this.current.status === "degraded";
  }

  // ─── Public operations ────────────────────────────────────────────────────────

  load(modelBytes: Uint8Array, hint: AccelerationHint = "auto"): Promise<Result<ReadyInfo, LoadError>> {
    return this.executor.run(() => this.loadInternal(modelBytes, hint));
  }

  run(tensor: Float32Array): Promise<Result<ScoreVector, InferenceError>> {
    return this.executor.run(() => this.runInternal(tensor));
  }

  /** Idempotent. Safe in every state; always ends in "unloaded". */
  unload(): Promise<void> {
    return this.executor.run(async () => {
      await this.releaseSession();
      this.current = { status: "unloaded" };
    });
  }

  /**
   * Full unload followed by a load of the last model with the last hint.
   * Fails with bind_failed when load() was never called.
   */
  forceReload(): Promise<Result<ReadyInfo, LoadError>> {
    return this.executor.run(async () => {
      this.logger.info("Forcing full reload");
      await this.releaseSession();
      this.current = { status: "unloaded" };
      if (!this.lastModel) {
        return {
          ok: false,
          error: { kind: "bind_failed", message: "No model has been loaded yet" },
        };
      }
      return this.loadInternal(this.lastModel.bytes, this.lastModel.hint);
    });
  }

  /**
   * True only when a session is bound and both tensor descriptors can be read.
   * Catches a session that was closed or corrupted between calls.
   */
  healthCheck(): boolean {
    if (!this.isReady || !this.session) return false;
    try {
      this.session.inputDescriptor();
      this.session.outputDescriptor();
      return true;
    } catch (err) {
      this.logger.warn(`Health check failed: ${errorMessage(err)}`);
      return false;
    }
  }

  // ─── Load ─────────────────────────────────────────────────────────────────────

  private async loadInternal(
    modelBytes: Uint8Array,
    hint: AccelerationHint,
  ): Promise<Result<ReadyInfo, LoadError>> {
    await this.releaseSession();
    this.current = { status: "loading" };
    this.lastModel = { bytes: modelBytes, hint };
    const fingerprint = modelFingerprint(modelBytes);
    this.fingerprint = fingerprint;

    const attempts: BindAttempt[] = [];
    if (hint !== "fallback") {
      const supported = await this.acceleratorSupported();
      if (supported) {
        if (this.cache) attempts.push({ accelerator: "accelerated", serialized: true });
        attempts.push({ accelerator: "accelerated", serialized: false });
      } else if (hint === "accelerated") {
        return this.failLoad({
          kind: "accelerator_unavailable",
          message: `Backend ${this.backend.name} reports no accelerator on this host`,
        });
      } else {
        this.logger.info("Accelerator not supported on this host, using fallback path");
      }
    }
    if (hint !== "accelerated") {
      attempts.push({ accelerator: "fallback", serialized: false });
    }

    let lastError: unknown = null;
    let acceleratedFailed = false;

    for (const attempt of attempts) {
      let session: ModelSession | null = null;
      let fromCache = false;
      try {
        const options: BindOptions = { accelerator: attempt.accelerator };
        if (attempt.serialized && this.cache) {
          const entry = await this.cache.prepare(fingerprint);
          fromCache = entry.cachedModel !== null;
          options.serialization = entry;
          this.logger.debug(`Serialization cache ${fromCache ? "hit" : "miss"} at ${entry.optimizedModelPath}`);
        }

        session = await this.backend.bind(modelBytes, options);
      } catch (err) {
        lastError = err;
        if (attempt.accelerator === "accelerated") acceleratedFailed = true;
        this.logger.warn(
          `Bind failed (${attempt.accelerator}${attempt.serialized ? ", serialized" : ""}): ${errorMessage(err)}`,
        );
        if (attempt.serialized && this.cache) {
          await this.dropCacheEntry(fingerprint);
        }
        continue;
      }

      const mismatch = this.describeMismatch(session);
      if (mismatch !== null) {
        await this.safeRelease(session);
        return this.failLoad({ kind: "invalid_model", message: mismatch });
      }

      this.session = session;
      this.current =
        attempt.accelerator === "fallback" && acceleratedFailed
          ? {
              status: "degraded",
              accelerator: "fallback",
              reason: `Accelerated binding failed: ${errorMessage(lastError)}`,
            }
          : { status: "ready", accelerator: attempt.accelerator };

      this.logger.info(
        `Model ${fingerprint.slice(0, 12)} bound on ${attempt.accelerator} path` +
          (fromCache ? " (from serialization cache)" : ""),
      );
      const warmUpError = await this.warmUp();
      if (warmUpError?.kind === "accelerator_fault") {
        lastError = new Error(warmUpError.message);
        acceleratedFailed = true;
        if (attempt.serialized) await this.dropCacheEntry(fingerprint);
        continue;
      }
      return { ok: true, value: { accelerator: attempt.accelerator, fingerprint, fromCache } };
    }

    return this.failLoad({
      kind: hint === "accelerated" ? "accelerator_unavailable" : "bind_failed",
      message: `All bind attempts failed: ${errorMessage(lastError)}`,
      cause: lastError,
    });
  }

  private async acceleratorSupported(): Promise<boolean> {
    try {
      return await this.backend.acceleratorSupported();
    } catch (err) {
      this.logger.warn(`Accelerator probe failed: ${errorMessage(err)}`);
      return false;
    }
  }

  /** Returns a description of the first descriptor mismatch, or null when the session fits. */
  private describeMismatch(session: ModelSession): string | null {
    try {
      const input = session.inputDescriptor();
      const output = session.outputDescriptor();
      if (!sameDims(input.dims, this.inputDims)) {
        return `Input dims [${input.dims.join(",")}] do not match [${this.inputDims.join(",")}]`;
      }
      const outputCount = output.dims.reduce((acc, d) => acc * d, 1);
      if (outputCount !== this.classCount) {
        return `Output has ${outputCount} values, expected ${this.classCount}`;
      }
      return null;
    } catch (err) {
      return `Tensor descriptors unreadable: ${errorMessage(err)}`;
    }
  }

  /**
   * One inference on a zero tensor. A failure is logged and returned; only an
   * accelerator fault (which has already released the binding) stops the load
   * from using this session.
   */
  private async warmUp(): Promise<InferenceError | null> {
    const started = Date.now();
    const result = await this.runInternal(new Float32Array(this.inputLength));
    if (result.ok) {
      this.logger.debug(`Warm-up completed in ${Date.now() - started}ms`);
      return null;
    }
    this.logger.warn(`Warm-up failed, continuing: ${result.error.message}`);
    return result.error;
  }

  private failLoad(error: LoadError): Result<ReadyInfo, LoadError> {
    this.current = { status: "failed", reason: error.message };
    this.logger.error(`Model load failed: ${error.message}`);
    return { ok: false, error };
  }

  private async dropCacheEntry(fingerprint: string): Promise<void> {
    if (!this.cache) return;
    try {
      await this.cache.invalidate(fingerprint);
    } catch (err) {
      this.logger.warn(`Could not invalidate serialization cache entry: ${errorMessage(err)}`);
    }
  }

  // ─── Run ──────────────────────────────────────────────────────────────────────

  private async runInternal(tensor: Float32Array): Promise<Result<ScoreVector, InferenceError>> {
    const session = this.session;
    if (!session || !this.isReady) {
      return {
        ok: false,
        error: { kind: "not_loaded", message: `Inference requested in state "${this.current.status}"` },
      };
    }
    if (tensor.length !== this.inputLength) {
      return {
        ok: false,
        error: {
          kind: "runtime_failure",
          message: `Input tensor has ${tensor.length} values, expected ${this.inputLength}`,
        },
      };
    }

    let output: Float32Array;
    try {
      output = await session.run(tensor);
    } catch (err) {
      const message = errorMessage(err);
      if (session.accelerator === "accelerated" && ACCELERATOR_FAULT_PATTERN.test(message)) {
        this.logger.error(`Accelerator fault, releasing binding: ${message}`);
        await this.releaseSession();
        this.current = { status: "failed", reason: `Accelerator fault: ${message}` };
        return { ok: false, error: { kind: "accelerator_fault", message, cause: err } };
      }
      return { ok: false, error: { kind: "runtime_failure", message, cause: err } };
    }

    if (output.length !== this.classCount) {
      return {
        ok: false,
        error: {
          kind: "runtime_failure",
          message: `Model returned ${output.length} scores, expected ${this.classCount}`,
        },
      };
    }
    const scores = Array.from(output);
    if (!scores.every(Number.isFinite)) {
      return { ok: false, error: { kind: "runtime_failure", message: "Model returned non-finite scores" } };
    }
    return { ok: true, value: scores };
  }

  // ─── Teardown ─────────────────────────────────────────────────────────────────

  private async releaseSession(): Promise<void> {
    const session = this.session;
    this.session = null;
    if (session) {
      await this.safeRelease(session);
    }
  }

  private async safeRelease(session: ModelSession): Promise<void> {
    try {
      await session.release();
    } catch (err) {
      this.logger.warn(`Error releasing session: ${errorMessage(err)}`);
    }
  }
}
