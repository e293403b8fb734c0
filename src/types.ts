// Emotion Cadence - Shared TypeScript interfaces and types
// Runtime helpers live in their own modules; this file only declares shapes.

import type { EmotionLabel } from "./emotion-labels.js";
import type { ImageBuffer } from "./image-buffer.js";

export type { EmotionLabel } from "./emotion-labels.js";

// ─── Result ─────────────────────────────────────────────────────────────────────

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

// ─── Geometry ───────────────────────────────────────────────────────────────────

/** Axis-aligned face region in frame pixel coordinates. */
export interface BoundingRegion {
  x: number;
  y: number;
  width: number;
  height: number;
}

// ─── Inference Resource ─────────────────────────────────────────────────────────

/** Which compute path a bound model session runs on. */
export type AcceleratorKind = "accelerated" | "fallback";

/**
 * Caller preference for binding.
 * "auto" tries the accelerated path first and falls back; the other two pin a path.
 */
export type AccelerationHint = "auto" | AcceleratorKind;

export type InferenceState =
  | { status: "unloaded" }
  | { status: "loading" }
  | { status: "ready"; accelerator: AcceleratorKind }
  /** Ready on the fallback path after the accelerated path could not be bound. */
  | { status: "degraded"; accelerator: "fallback"; reason: string }
  | { status: "failed"; reason: string };

export interface ReadyInfo {
  accelerator: AcceleratorKind;
  /** SHA-256 of the model payload, hex. */
  fingerprint: string;
  /** True when the accelerated binding was restored from the serialization cache. */
  fromCache: boolean;
}

export type LoadErrorKind = "accelerator_unavailable" | "bind_failed" | "invalid_model";

export interface LoadError {
  kind: LoadErrorKind;
  message: string;
  cause?: unknown;
}

export type InferenceErrorKind = "not_loaded" | "accelerator_fault" | "runtime_failure";

export interface InferenceError {
  kind: InferenceErrorKind;
  message: string;
  cause?: unknown;
}

/** Raw, unnormalized class scores in label index order. */
export type ScoreVector = readonly number[];

// ─── Detection Pipeline ─────────────────────────────────────────────────────────

export type PipelineErrorKind =
  | "invalid_input"
  | "model_unavailable"
  | "face_extraction_failed"
  | "preprocessing_failed"
  | "inference_failed";

export type PipelineResult =
  | {
      status: "success";
      label: EmotionLabel;
      confidence: number;
      /** Copy of the frame with every detected region outlined. Owned by the caller. */
      visualization: ImageBuffer;
    }
  | {
      status: "no_face";
      /** The frame that was passed in, returned unchanged. */
      originalFrame: ImageBuffer;
    }
  | {
      status: "error";
      kind: PipelineErrorKind;
      message: string;
      cause?: unknown;
      /** Set when repeated inference failures forced a full model reload. */
      reloaded?: true;
    }
  | {
      status: "loading";
      message: string;
    };

// ─── Temporal Aggregation ───────────────────────────────────────────────────────

export interface ClassificationSample {
  readonly label: EmotionLabel;
  readonly confidence: number;
  /** Milliseconds, same clock as the `now` passed to the aggregator. */
  readonly timestamp: number;
}

export interface WindowSummary {
  topLabel: EmotionLabel;
  topShare: number;
  totalSamples: number;
}

// ─── Cadence ────────────────────────────────────────────────────────────────────

export type CadenceState =
  | { kind: "idle" }
  | { kind: "detection_window"; startedAt: number }
  | {
      kind: "playback";
      startedAt: number;
      emotion: EmotionLabel;
      usesPrimarySet: boolean;
    }
  | { kind: "awaiting_restart" };

export interface CadenceConfig {
  /** Duration of one detection window in ms. Default: 10000 */
  detectionWindowMs: number;
  /** How long a selected track plays in ms. Default: 30000 */
  playbackDurationMs: number;
  /** How long a lost face is hidden from the display surface in ms. Default: 1200 */
  noFaceDebounceMs: number;
  /** topShare at or above which the primary track set is chosen. Default: 0.5 */
  primarySetShare: number;
}

/** A decision taken at the end of a detection window. */
export interface CadenceDecision {
  emotion: EmotionLabel;
  usesPrimarySet: boolean;
  source: "window" | "displayed" | "last_recognized";
  summary: WindowSummary | null;
}

// ─── Playback ───────────────────────────────────────────────────────────────────

/**
 * Playback status notification.
 * `isGenerated` is true for a track from an emotion set, false for the default
 * fallback track, and null when nothing is playing.
 */
export interface PlaybackStatus {
  isGenerated: boolean | null;
  emotion: string;
}

export interface PlaybackCapability {
  /** Returns false when nothing playable was found for the label. */
  play(
    label: EmotionLabel,
    usesPrimarySet: boolean,
    durationMs: number,
    onFinished: () => void,
  ): boolean;
  stop(triggerCallback: boolean): void;
}

// ─── Display Events ─────────────────────────────────────────────────────────────

export type DetectionEvent =
  | { type: "emotion"; label: EmotionLabel; confidence: number }
  | { type: "no_face" }
  | { type: "error"; kind: PipelineErrorKind; message: string; reloaded?: true };

export type ServiceHealth =
  | { state: "ok" }
  | { state: "model_error"; message: string; remediation: "reload_model" };

// ─── Wire Format ────────────────────────────────────────────────────────────────

export interface FrameHeader {
  timestamp: number;
  seq: number;
  width: number;
  height: number;
  /** Face regions found by a detector running next to the camera, if any. */
  regions?: BoundingRegion[];
  /** A single picked image (gallery) classified outside the cadence. */
  manual?: boolean;
}

export type ClientMessage =
  | { type: "start_monitoring" }
  | { type: "stop_monitoring" }
  | { type: "reset" }
  | { type: "permission_revoked" }
  | { type: "playback_ended" }
  | { type: "reload_model" };

export type ServerMessage =
  | { type: "cadence_state"; state: CadenceState }
  | {
      type: "detection_result";
      result: DetectionEvent;
      visualization: { width: number; height: number } | null;
    }
  | { type: "playback_start"; emotion: EmotionLabel; trackUrl: string; durationMs: number }
  | { type: "playback_stop" }
  | { type: "playback_status"; status: PlaybackStatus }
  | { type: "status"; health: ServiceHealth }
  | { type: "error"; message: string; recoverable: boolean };
