/**
 * Frame throttle that admits at most one frame per interval.
 * Accepts the first frame and then any frame arriving at least `intervalMs`
 * after the last accepted one; everything sooner is dropped.
 */

export class FrameThrottle {
  private readonly intervalMs: number;
  private lastAcceptedAt: number;

  constructor(intervalMs: number = 1000) {
    this.intervalMs = intervalMs;
    this.lastAcceptedAt = -Infinity;
  }

  /**
   * Returns true if a frame arriving at `now` (ms) should be processed.
   * An accepted frame starts a new interval.
   */
  shouldAccept(now: number): boolean {
    if (now - this.lastAcceptedAt >= this.intervalMs) {
      this.lastAcceptedAt = now;
      return true;
    }
    return false;
  }

  /** Forget the last accepted frame so the next one is admitted immediately. */
  reset(): void {
    this.lastAcceptedAt = -Infinity;
  }
}
