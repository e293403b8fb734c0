// Emotion Cadence - Monitoring Session
// One per connected client. Gates incoming frames (throttle + single in-flight
// classification), feeds results to the cadence scheduler and turns everything
// into ServerMessages for the wire.
//
// Buffer ownership: frames handed to submitFrame()/classifyOnce() belong to the
// session from that point on. Dropped frames are released immediately; accepted
// frames and the result's visualization are released once the event is sent.

import { v4 as uuidv4 } from "uuid";
import type {
  CadenceConfig,
  DetectionEvent,
  PipelineResult,
  ServerMessage,
  ServiceHealth,
} from "./types.js";
import { errorEvent, isAcceleratorFault, type DetectionPipeline } from "./detection-pipeline.js";
import type { ImageBuffer } from "./image-buffer.js";
import type { TimerHost } from "./timer-host.js";
import { CadenceScheduler } from "./cadence-scheduler.js";
import { FrameThrottle } from "./frame-throttle.js";
import { RemotePlayback, type TrackResolver } from "./remote-playback.js";
import { TemporalAggregator, type AggregatorConfig } from "./temporal-aggregator.js";
import { DEFAULT_FRAME_INTERVAL_MS } from "./config.js";
import { createLogger, errorMessage, type Logger } from "./logger.js";

/** Consecutive model_unavailable results before the client sees a persistent model error. */
export const MODEL_ERROR_THRESHOLD = 3;

export type SubmitOutcome = "accepted" | "throttled" | "busy" | "inactive";

export type FrameClassifier = Pick<DetectionPipeline, "classify" | "forceReload">;

export interface MonitoringSessionDeps {
  pipeline: FrameClassifier;
  tracks: TrackResolver;
  timers: TimerHost;
  send: (message: ServerMessage) => void;
  cadence?: Partial<CadenceConfig>;
  aggregator?: Partial<AggregatorConfig>;
  frameIntervalMs?: number;
  logger?: Logger;
}

const OK_HEALTH: ServiceHealth = { state: "ok" };

export class MonitoringSession {
  readonly id: string = uuidv4();
  readonly scheduler: CadenceScheduler;
  readonly playback: RemotePlayback;
  readonly aggregator: TemporalAggregator;

  private readonly pipeline: FrameClassifier;
  private readonly timers: TimerHost;
  private readonly send: (message: ServerMessage) => void;
  private readonly throttle: FrameThrottle;
  private readonly logger: Logger;

  private inFlight: Promise<void> | null = null;
  /** Bumped on stop() and reset(); results from an earlier epoch are dropped. */
  private epoch = 0;
  private modelUnavailableStreak = 0;
  private currentHealth: ServiceHealth = OK_HEALTH;

  constructor(deps: MonitoringSessionDeps) {
    this.pipeline = deps.pipeline;
    this.timers = deps.timers;
    this.send = deps.send;
    this.throttle = new FrameThrottle(deps.frameIntervalMs ?? DEFAULT_FRAME_INTERVAL_MS);
    this.logger = deps.logger ?? createLogger("MonitoringSession");

    this.playback = new RemotePlayback({
      tracks: deps.tracks,
      timers: deps.timers,
      send: deps.send,
      logger: this.logger,
    });

    // Samples are trimmed to the detection window unless the aggregator is tuned on its own.
    const windowMs = deps.aggregator?.windowMs ?? deps.cadence?.detectionWindowMs;
    this.aggregator = new TemporalAggregator(
      windowMs === undefined ? deps.aggregator : { ...deps.aggregator, windowMs },
    );

    this.scheduler = new CadenceScheduler({
      aggregator: this.aggregator,
      playback: this.playback,
      timers: deps.timers,
      config: deps.cadence,
      logger: this.logger,
      listeners: {
        onStateChange: (state) => this.send({ type: "cadence_state", state }),
        onDecision: (decision) =>
          this.logger.info(
            `[${this.id}] Decided ${decision.emotion} from ${decision.source}` +
              (decision.summary ? ` (share ${decision.summary.topShare.toFixed(2)})` : ""),
          ),
      },
    });
  }

  get health(): ServiceHealth {
    return this.currentHealth;
  }

  get active(): boolean {
    return this.scheduler.state.kind !== "idle";
  }

  get busy(): boolean {
    return this.inFlight !== null;
  }

  // ─── Lifecycle ────────────────────────────────────────────────────────────────

  start(): void {
    if (this.active) return;
    this.throttle.reset();
    this.logger.info(`[${this.id}] Monitoring started`);
    this.scheduler.start();
  }

  stop(): void {
    this.epoch++;
    this.scheduler.stop();
    this.throttle.reset();
  }

  reset(): void {
    this.epoch++;
    this.scheduler.reset();
    this.throttle.reset();
  }

  revokePermission(): void {
    this.logger.warn(`[${this.id}] Camera permission revoked, stopping monitoring`);
    this.stop();
  }

  acceleratorFailed(): void {
    if (!this.active) return;
    this.logger.error(`[${this.id}] Accelerator failed, stopping monitoring`);
    this.stop();
    this.send({ type: "error", message: "Accelerator failed; monitoring stopped", recoverable: true });
  }

  /** Client reports that the current track finished on its side. */
  playbackEnded(): void {
    this.playback.clientEnded();
  }

  /** Remediation for a persistent model error. */
  async reloadModel(): Promise<boolean> {
    this.logger.info(`[${this.id}] Forcing model reload`);
    const reloaded = await this.pipeline.forceReload();
    if (reloaded) {
      this.modelUnavailableStreak = 0;
      this.setHealth(OK_HEALTH);
    } else {
      this.logger.error(`[${this.id}] Model reload failed`);
    }
    return reloaded;
  }

  /** Resolves once the in-flight classification (if any) has been handled. */
  async whenIdle(): Promise<void> {
    while (this.inFlight) {
      await this.inFlight;
    }
  }

  // ─── Frames ───────────────────────────────────────────────────────────────────

  submitFrame(frame: ImageBuffer, now: number = this.timers.now()): SubmitOutcome {
    let outcome: SubmitOutcome = "accepted";
    if (!this.active) {
      outcome = "inactive";
    } else if (this.inFlight) {
      outcome = "busy";
    } else if (!this.throttle.shouldAccept(now)) {
      outcome = "throttled";
    }

    if (outcome !== "accepted") {
      frame.release();
      return outcome;
    }

    this.inFlight = this.process(frame, now, this.epoch).finally(() => {
      this.inFlight = null;
    });
    return outcome;
  }

  /**
   * Classify one image outside the cadence. The result becomes the displayed
   * label but is not counted in the detection window.
   */
  async classifyOnce(frame: ImageBuffer): Promise<DetectionEvent | null> {
    let result: PipelineResult | null = null;
    try {
      result = await this.pipeline.classify(frame);
      this.trackHealth(result);
      const event = toDetectionEvent(result);
      if (result.status === "success") {
        this.scheduler.observeExternalLabel(result.label);
      }
      if (event) this.emitDetection(event, result);
      return event;
    } finally {
      releaseResult(result);
      if (!frame.released) frame.release();
    }
  }

  private async process(frame: ImageBuffer, now: number, epoch: number): Promise<void> {
    let result: PipelineResult | null = null;
    try {
      result = await this.pipeline.classify(frame);
      if (epoch !== this.epoch || !this.active) {
        this.logger.debug(`[${this.id}] Dropping result from a stopped or reset session`);
        return;
      }
      this.trackHealth(result);
      const event = this.scheduler.onPipelineResult(result, now);
      if (event) this.emitDetection(event, result);
      if (isAcceleratorFault(result)) {
        this.acceleratorFailed();
      }
    } catch (err) {
      this.logger.error(`[${this.id}] Frame processing failed: ${errorMessage(err)}`);
      this.send({ type: "error", message: errorMessage(err), recoverable: true });
    } finally {
      releaseResult(result);
      if (!frame.released) frame.release();
    }
  }

  // ─── Events ───────────────────────────────────────────────────────────────────

  private emitDetection(event: DetectionEvent, result: PipelineResult): void {
    this.send({
      type: "detection_result",
      result: event,
      visualization:
        result.status === "success"
          ? { width: result.visualization.width, height: result.visualization.height }
          : null,
    });
  }

  private trackHealth(result: PipelineResult): void {
    if (result.status === "error" && result.kind === "model_unavailable") {
      this.modelUnavailableStreak++;
      if (this.modelUnavailableStreak === MODEL_ERROR_THRESHOLD) {
        this.logger.error(`[${this.id}] Model unavailable ${MODEL_ERROR_THRESHOLD} times in a row`);
        this.setHealth({ state: "model_error", message: result.message, remediation: "reload_model" });
      }
      return;
    }
    if (result.status === "loading") return;

    this.modelUnavailableStreak = 0;
    if (result.status === "success" && this.currentHealth.state !== "ok") {
      this.setHealth(OK_HEALTH);
    }
  }

  private setHealth(health: ServiceHealth): void {
    this.currentHealth = health;
    this.send({ type: "status", health });
  }
}

function toDetectionEvent(result: PipelineResult): DetectionEvent | null {
  switch (result.status) {
    case "success":
      return { type: "emotion", label: result.label, confidence: result.confidence };
    case "no_face":
      return { type: "no_face" };
    case "error":
      return errorEvent(result);
    case "loading":
      return null;
    default: {
      const exhaustiveCheck: never = result;
      throw new Error(`Unhandled pipeline result: ${JSON.stringify(exhaustiveCheck)}`);
    }
  }
}

function releaseResult(result: PipelineResult | null): void {
  if (result?.status === "success" && !result.visualization.released) {
    result.visualization.release();
  }
}
