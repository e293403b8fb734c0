/**
 * CadenceScheduler: The detect → decide → play → re-detect state machine.
 *
 *   idle ──start()──▶ detection_window ──window timer──▶ decide()
 *                          ▲                                │
 *                          │  no candidate / play refused   │ candidate
 *                          └──── awaiting_restart ◀─────────┤
 *                          │                                ▼
 *                          └──── re-entry timer ───────── playback
 *
 * The re-entry timer fires `window` ms before playback ends, so the next
 * decision is ready when the current track finishes. stop() and reset() are
 * valid from every state and always end in idle.
 *
 * Timer discipline: each state owns at most one timer. Leaving a state cancels
 * the timer it owns before the next state schedules anything.
 */

import type {
  CadenceConfig,
  CadenceDecision,
  CadenceState,
  DetectionEvent,
  EmotionLabel,
  PipelineResult,
  PlaybackCapability,
} from "./types.js";
import type { TemporalAggregator } from "./temporal-aggregator.js";
import type { TimerHandle, TimerHost } from "./timer-host.js";
import { errorEvent } from "./detection-pipeline.js";
import { isEmotionLabel } from "./emotion-labels.js";
import { DEFAULT_CADENCE_CONFIG } from "./config.js";
import { createLogger, type Logger } from "./logger.js";

export interface CadenceListeners {
  onStateChange?: (state: CadenceState) => void;
  onDecision?: (decision: CadenceDecision) => void;
}

export interface CadenceSchedulerDeps {
  aggregator: TemporalAggregator;
  playback: PlaybackCapability;
  timers: TimerHost;
  config?: Partial<CadenceConfig>;
  listeners?: CadenceListeners;
  logger?: Logger;
}

export class CadenceScheduler {
  readonly config: CadenceConfig;
  private readonly aggregator: TemporalAggregator;
  private readonly playback: PlaybackCapability;
  private readonly timers: TimerHost;
  private readonly listeners: CadenceListeners;
  private readonly logger: Logger;

  private current: CadenceState = { kind: "idle" };
  /** Timer owned by the current state, if any. */
  private stateTimer: TimerHandle | null = null;
  /** Incremented per playback start; stale completion callbacks compare against it. */
  private playbackCycle = 0;

  private displayedLabel: EmotionLabel | null = null;
  private lastRecognizedEmotion: EmotionLabel | null = null;
  private lastPositiveAt: number | null = null;
  private noFaceShown = false;

  constructor(deps: CadenceSchedulerDeps) {
    this.config = { ...DEFAULT_CADENCE_CONFIG, ...deps.config };
    this.aggregator = deps.aggregator;
    this.playback = deps.playback;
    this.timers = deps.timers;
    this.listeners = deps.listeners ?? {};
    this.logger = deps.logger ?? createLogger("CadenceScheduler");
  }

  get state(): CadenceState {
    return this.current;
  }

  /** Label most recently recognized above the aggregator's confidence gate. */
  get lastRecognized(): EmotionLabel | null {
    return this.lastRecognizedEmotion;
  }

  // ─── Lifecycle ────────────────────────────────────────────────────────────────

  /** Opens the first detection window. No-op unless idle. */
  start(): void {
    if (this.current.kind !== "idle") return;
    this.enterDetectionWindow();
  }

  /** Cancels timers, silences playback without its completion callback, clears the window, goes idle. */
  stop(): void {
    this.cancelStateTimer();
    this.playbackCycle++;
    this.playback.stop(false);
    this.aggregator.reset();
    this.lastPositiveAt = null;
    this.noFaceShown = false;
    if (this.current.kind !== "idle") {
      this.transition({ kind: "idle" });
    }
  }

  /** stop() plus forgetting every label seen in this session. */
  reset(): void {
    this.stop();
    this.displayedLabel = null;
    this.lastRecognizedEmotion = null;
  }

  // ─── Inputs ───────────────────────────────────────────────────────────────────

  /**
   * Feed one pipeline result. Returns what the display surface should show,
   * or null when nothing should change (loading, or a face lost for less than
   * the debounce interval).
   */
  onPipelineResult(result: PipelineResult, now: number): DetectionEvent | null {
    switch (result.status) {
      case "success": {
        if (result.confidence >= this.aggregator.config.confidenceThreshold) {
          this.lastRecognizedEmotion = result.label;
          if (this.current.kind === "detection_window") {
            this.aggregator.add(result.label, result.confidence, now);
          }
        }
        this.displayedLabel = result.label;
        this.lastPositiveAt = now;
        this.noFaceShown = false;
        return { type: "emotion", label: result.label, confidence: result.confidence };
      }
      case "no_face": {
        this.lastRecognizedEmotion = null;
        const sincePositive = this.lastPositiveAt === null ? Infinity : now - this.lastPositiveAt;
        if (this.noFaceShown || sincePositive < this.config.noFaceDebounceMs) {
          return null;
        }
        this.noFaceShown = true;
        this.displayedLabel = null;
        this.lastPositiveAt = null;
        return { type: "no_face" };
      }
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

  /** Record the label currently shown on an external surface (e.g. a manual classification). */
  observeExternalLabel(label: string | null): void {
    this.displayedLabel = isEmotionLabel(label) ? label : null;
  }

  // ─── Decision ─────────────────────────────────────────────────────────────────

  /** Window timer callback. Public so the surface can force an early decision. */
  decide(): void {
    if (this.current.kind !== "detection_window") return;
    this.cancelStateTimer();

    const now = this.timers.now();
    const summary = this.aggregator.windowSummary(now);

    let decision: CadenceDecision | null = null;
    if (summary) {
      decision = { emotion: summary.topLabel, usesPrimarySet: false, source: "window", summary };
    } else if (this.displayedLabel) {
      decision = { emotion: this.displayedLabel, usesPrimarySet: false, source: "displayed", summary: null };
    } else if (this.lastRecognizedEmotion) {
      decision = { emotion: this.lastRecognizedEmotion, usesPrimarySet: false, source: "last_recognized", summary: null };
    }

    if (!decision) {
      this.logger.debug("Detection window ended with no playable emotion; retrying detection");
      this.restartDetection();
      return;
    }
    decision.usesPrimarySet = summary !== null && summary.topShare >= this.config.primarySetShare;

    this.listeners.onDecision?.(decision);

    const cycle = ++this.playbackCycle;
    const started = this.playback.play(
      decision.emotion,
      decision.usesPrimarySet,
      this.config.playbackDurationMs,
      () => this.onPlaybackFinished(cycle),
    );

    if (!started) {
      this.logger.warn(`Playback unavailable for ${decision.emotion}; restarting detection window`);
      this.restartDetection();
      return;
    }

    this.transition({
      kind: "playback",
      startedAt: now,
      emotion: decision.emotion,
      usesPrimarySet: decision.usesPrimarySet,
    });
    this.scheduleReentry();
  }

  // ─── Transitions ──────────────────────────────────────────────────────────────

  private enterDetectionWindow(): void {
    this.transition({ kind: "detection_window", startedAt: this.timers.now() });
    this.aggregator.reset();
    this.stateTimer = this.timers.schedule("detection-window", this.config.detectionWindowMs, () => {
      this.stateTimer = null;
      this.decide();
    });
  }

  private restartDetection(): void {
    this.transition({ kind: "awaiting_restart" });
    this.enterDetectionWindow();
  }

  private scheduleReentry(): void {
    const delay = this.config.playbackDurationMs - this.config.detectionWindowMs;
    if (delay <= 0) {
      this.enterDetectionWindow();
      return;
    }
    this.stateTimer = this.timers.schedule("playback-reentry", delay, () => {
      this.stateTimer = null;
      if (this.current.kind === "playback") {
        this.enterDetectionWindow();
      }
    });
  }

  private onPlaybackFinished(cycle: number): void {
    if (cycle !== this.playbackCycle) return;
    if (this.current.kind === "detection_window" || this.current.kind === "idle") return;
    this.enterDetectionWindow();
  }

  /** Every state change goes through here: the old state's timer is cancelled first. */
  private transition(next: CadenceState): void {
    this.cancelStateTimer();
    this.current = next;
    this.listeners.onStateChange?.(next);
  }

  private cancelStateTimer(): void {
    if (this.stateTimer) {
      this.timers.cancel(this.stateTimer);
      this.stateTimer = null;
    }
  }
}
