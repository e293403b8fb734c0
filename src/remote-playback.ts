// ─── Remote Playback ────────────────────────────────────────────────────────────
// PlaybackCapability for a client that plays audio itself. The server resolves
// the track, tells the client what to play and owns the duration timer; the
// client may report an early end with playback_ended.

import type {
  EmotionLabel,
  PlaybackCapability,
  PlaybackStatus,
  ServerMessage,
} from "./types.js";
import type { ResolvedTrack } from "./track-library.js";
import type { TimerHandle, TimerHost } from "./timer-host.js";
import { createLogger, type Logger } from "./logger.js";

export interface TrackResolver {
  resolve(label: EmotionLabel, usesPrimarySet: boolean): ResolvedTrack | null;
}

export interface RemotePlaybackDeps {
  tracks: TrackResolver;
  timers: TimerHost;
  send: (message: ServerMessage) => void;
  logger?: Logger;
}

interface ActivePlayback {
  emotion: EmotionLabel;
  track: ResolvedTrack;
  timer: TimerHandle;
  onFinished: () => void;
}

export const IDLE_PLAYBACK_STATUS: PlaybackStatus = { isGenerated: null, emotion: "" };

export class RemotePlayback implements PlaybackCapability {
  private readonly tracks: TrackResolver;
  private readonly timers: TimerHost;
  private readonly send: (message: ServerMessage) => void;
  private readonly logger: Logger;
  private active: ActivePlayback | null = null;
  private currentStatus: PlaybackStatus = IDLE_PLAYBACK_STATUS;

  constructor(deps: RemotePlaybackDeps) {
    this.tracks = deps.tracks;
    this.timers = deps.timers;
    this.send = deps.send;
    this.logger = deps.logger ?? createLogger("RemotePlayback");
  }

  get status(): PlaybackStatus {
    return this.currentStatus;
  }

  get isPlaying(): boolean {
    return this.active !== null;
  }

  play(label: EmotionLabel, usesPrimarySet: boolean, durationMs: number, onFinished: () => void): boolean {
    this.stop(false);

    const track = this.tracks.resolve(label, usesPrimarySet);
    if (!track) {
      this.logger.warn(`No track available for ${label} (${usesPrimarySet ? "primary" : "secondary"} set)`);
      return false;
    }

    const timer = this.timers.schedule("playback-duration", durationMs, () => this.finish());
    this.active = { emotion: label, track, timer, onFinished };

    this.send({ type: "playback_start", emotion: label, trackUrl: track.url, durationMs });
    this.emitStatus({ isGenerated: track.fromSet, emotion: label });
    this.logger.info(`Playing ${track.url} for ${durationMs}ms`);
    return true;
  }

  stop(triggerCallback: boolean): void {
    const active = this.active;
    if (!active) return;
    this.active = null;
    this.timers.cancel(active.timer);

    this.send({ type: "playback_stop" });
    this.emitStatus(IDLE_PLAYBACK_STATUS);
    if (triggerCallback) {
      active.onFinished();
    }
  }

  /** Client reports the track ended before the duration timer. Ignored when nothing is playing. */
  clientEnded(): void {
    this.finish();
  }

  private finish(): void {
    const active = this.active;
    if (!active) return;
    this.active = null;
    this.timers.cancel(active.timer);

    this.emitStatus(IDLE_PLAYBACK_STATUS);
    active.onFinished();
  }

  private emitStatus(status: PlaybackStatus): void {
    this.currentStatus = status;
    this.send({ type: "playback_status", status });
  }
}
