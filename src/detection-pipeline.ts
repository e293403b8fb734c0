/**
 * DetectionPipeline: One end-to-end classification of one frame.
 *
 * classify() never throws. Every buffer it allocates is released before it
 * returns, except the buffer referenced by the returned result (the
 * visualization on success). The caller keeps ownership of the input frame.
 */

import type {
  AccelerationHint,
  BoundingRegion,
  DetectionEvent,
  InferenceError,
  PipelineErrorKind,
  PipelineResult,
} from "./types.js";
import type { FaceLocator } from "./face-locator.js";
import type { InferenceResource } from "./inference-resource.js";
import { cropImage, type ImageBuffer, type TensorBuffer } from "./image-buffer.js";
import { FramePreprocessor, argMax, softmax } from "./frame-preprocessor.js";
import { annotateRegions, FACE_CROP_PADDING, paddedCropRect, selectLargestRegion } from "./face-regions.js";
import { labelAt } from "./emotion-labels.js";
import { createLogger, errorMessage, type Logger } from "./logger.js";

/** Consecutive inference failures that trigger a forced full reload. */
export const CONSECUTIVE_FAILURE_THRESHOLD = 2;

export const RELOADED_MESSAGE = "Multiple failures detected, model reloaded. Please try again.";

export interface ModelSource {
  bytes: Uint8Array;
  acceleration: AccelerationHint;
}

export interface DetectionPipelineDeps {
  resource: InferenceResource;
  locator: FaceLocator;
  model: ModelSource;
  preprocessor?: FramePreprocessor;
  logger?: Logger;
  failureThreshold?: number;
  cropPadding?: number;
}

function errorResult(kind: PipelineErrorKind, message: string, cause?: unknown): PipelineResult {
  return cause === undefined
    ? { status: "error", kind, message }
    : { status: "error", kind, message, cause };
}

export class DetectionPipeline {
  private readonly resource: InferenceResource;
  private readonly locator: FaceLocator;
  private readonly model: ModelSource;
  private readonly preprocessor: FramePreprocessor;
  private readonly logger: Logger;
  private readonly failureThreshold: number;
  private readonly cropPadding: number;

  private consecutiveFailures = 0;

  constructor(deps: DetectionPipelineDeps) {
    this.resource = deps.resource;
    this.locator = deps.locator;
    this.model = deps.model;
    this.preprocessor = deps.preprocessor ?? new FramePreprocessor();
    this.logger = deps.logger ?? createLogger("DetectionPipeline");
    this.failureThreshold = deps.failureThreshold ?? CONSECUTIVE_FAILURE_THRESHOLD;
    this.cropPadding = deps.cropPadding ?? FACE_CROP_PADDING;
  }

  /** Consecutive inference failures since the last success or forced reload. */
  get failureCount(): number {
    return this.consecutiveFailures;
  }

  /** Loads the model ahead of the first frame so the first classification is not slow. */
  async warmStart(): Promise<boolean> {
    const result = await this.resource.load(this.model.bytes, this.model.acceleration);
    return result.ok;
  }

  /** Remediation path for a persistent model error. */
  async forceReload(): Promise<boolean> {
    this.consecutiveFailures = 0;
    const result = await this.resource.forceReload();
    if (!result.ok) {
      return (await this.resource.load(this.model.bytes, this.model.acceleration)).ok;
    }
    return true;
  }

  async dispose(): Promise<void> {
    await this.resource.unload();
  }

  async classify(frame: ImageBuffer | null | undefined): Promise<PipelineResult> {
    if (!frame || frame.released) {
      return errorResult("invalid_input", frame ? "Frame has already been released" : "No frame provided");
    }

    if (this.resource.state.status === "loading") {
      return { status: "loading", message: "Model is loading" };
    }
    const modelReady = await this.ensureModel();
    if (!modelReady.ok) {
      return errorResult("model_unavailable", modelReady.message);
    }

    const regions = await this.locateFaces(frame);
    if (regions.length === 0) {
      return { status: "no_face", originalFrame: frame };
    }

    let stage: PipelineErrorKind = "face_extraction_failed";
    let visualization: ImageBuffer | null = null;
    let face: ImageBuffer | null = null;
    let tensor: TensorBuffer | null = null;
    let handedOff = false;

    try {
      visualization = annotateRegions(frame, regions);

      const target = selectLargestRegion(regions);
      const rect = target ? paddedCropRect(target, frame.width, frame.height, this.cropPadding) : null;
      if (!rect) {
        return errorResult("face_extraction_failed", "Selected face region is empty after clamping to the frame");
      }
      face = cropImage(frame, rect, "face-crop");

      stage = "preprocessing_failed";
      tensor = this.preprocessor.preprocess(face);
      face.release();
      face = null;

      stage = "inference_failed";
      const scores = await this.resource.run(tensor.data);
      tensor.release();
      tensor = null;

      if (!scores.ok) {
        return await this.onInferenceFailure(scores.error);
      }

      const probabilities = softmax(scores.value);
      const index = argMax(probabilities);
      const label = labelAt(index);
      if (label === null) {
        return errorResult("inference_failed", `Classifier produced no usable class (index ${index})`);
      }

      this.consecutiveFailures = 0;
      const confidence = Math.min(1, Math.max(0, probabilities[index]));
      this.logger.debug(`Emotion ${label} (${Math.round(confidence * 100)}%)`);

      handedOff = true;
      return { status: "success", label, confidence, visualization };
    } catch (err) {
      this.logger.error(`Pipeline ${stage}: ${errorMessage(err)}`);
      if (stage === "inference_failed") {
        return await this.onInferenceFailure({ kind: "runtime_failure", message: errorMessage(err), cause: err });
      }
      return errorResult(stage, errorMessage(err), err);
    } finally {
      face?.release();
      tensor?.release();
      if (!handedOff) visualization?.release();
    }
  }

  // ─── Steps ────────────────────────────────────────────────────────────────────

  private async ensureModel(): Promise<{ ok: true } | { ok: false; message: string }> {
    if (this.resource.isReady && this.resource.healthCheck()) {
      return { ok: true };
    }
    this.logger.info(`Model not ready (${this.resource.state.status}), loading`);
    try {
      const loaded = await this.resource.load(this.model.bytes, this.model.acceleration);
      return loaded.ok ? { ok: true } : { ok: false, message: `Cannot load model: ${loaded.error.message}` };
    } catch (err) {
      return { ok: false, message: `Cannot load model: ${errorMessage(err)}` };
    }
  }

  private async locateFaces(frame: ImageBuffer): Promise<readonly BoundingRegion[]> {
    try {
      return await this.locator.locate(frame);
    } catch (err) {
      this.logger.warn(`Face locator failed, treating frame as face-less: ${errorMessage(err)}`);
      return [];
    }
  }

  private async onInferenceFailure(error: InferenceError): Promise<PipelineResult> {
    this.consecutiveFailures++;
    this.logger.warn(`Inference failed (${error.kind}, consecutive: ${this.consecutiveFailures}): ${error.message}`);

    if (this.consecutiveFailures < this.failureThreshold) {
      return errorResult("inference_failed", `Model inference failed: ${error.message}`, error);
    }

    this.logger.warn("Too many consecutive inference failures, forcing full reload");
    this.consecutiveFailures = 0;
    try {
      const reloaded = await this.resource.forceReload();
      if (!reloaded.ok) {
        this.logger.error(`Forced reload failed: ${reloaded.error.message}`);
      }
    } catch (err) {
      this.logger.error(`Forced reload threw: ${errorMessage(err)}`);
    }
    return { status: "error", kind: "inference_failed", message: RELOADED_MESSAGE, cause: error, reloaded: true };
  }
}

/** Display event for an error result. Diagnostic causes stay server-side. */
export function errorEvent(result: Extract<PipelineResult, { status: "error" }>): DetectionEvent {
  return result.reloaded
    ? { type: "error", kind: result.kind, message: result.message, reloaded: true }
    : { type: "error", kind: result.kind, message: result.message };
}

/** True for an inference_failed result caused by a lost or faulted accelerator. */
export function isAcceleratorFault(result: PipelineResult): boolean {
  if (result.status !== "error" || result.kind !== "inference_failed") return false;
  const cause = result.cause;
  return typeof cause === "object" && cause !== null && "kind" in cause && cause.kind === "accelerator_fault";
}
