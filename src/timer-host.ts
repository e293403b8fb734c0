// Cancellable timers with stable identities.
// The cadence scheduler and playback only schedule through a TimerHost so that
// every timer can be cancelled by handle and tests can observe the discipline.

export interface TimerHandle {
  readonly id: number;
  readonly label: string;
}

export interface TimerHost {
  /** Milliseconds on the host's clock. */
  now(): number;
  schedule(label: string, delayMs: number, callback: () => void): TimerHandle;
  /** No-op for a handle that already fired or was cancelled. */
  cancel(handle: TimerHandle): void;
}

/** TimerHost backed by setTimeout and Date.now. */
export class SystemTimerHost implements TimerHost {
  private nextId = 1;
  private readonly active = new Map<number, ReturnType<typeof setTimeout>>();

  now(): number {
    return Date.now();
  }

  schedule(label: string, delayMs: number, callback: () => void): TimerHandle {
    const handle: TimerHandle = { id: this.nextId++, label };
    const timeout = setTimeout(() => {
      this.active.delete(handle.id);
      callback();
    }, Math.max(0, delayMs));
    this.active.set(handle.id, timeout);
    return handle;
  }

  cancel(handle: TimerHandle): void {
    const timeout = this.active.get(handle.id);
    if (timeout !== undefined) {
      clearTimeout(timeout);
      this.active.delete(handle.id);
    }
  }

  /** Timers scheduled and not yet fired or cancelled. */
  get pending(): number {
    return this.active.size;
  }
}
