// Shared fakes for unit and property tests. Nothing here is used at runtime.

import { vi } from "vitest";
import type { AcceleratorKind, BoundingRegion } from "./types.js";
import type { FaceLocator } from "./face-locator.js";
import type { BindOptions, InferenceBackend, ModelSession, TensorDescriptor } from "./inference-backend.js";
import type { TimerHandle, TimerHost } from "./timer-host.js";
import type { BufferLedger, ImageBuffer } from "./image-buffer.js";
import type { Logger } from "./logger.js";

// ─── Logger ─────────────────────────────────────────────────────────────────────

export function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

// ─── Timers ─────────────────────────────────────────────────────────────────────

export interface TimerEvent {
  type: "schedule" | "cancel" | "fire";
  id: number;
  label: string;
  at: number;
}

interface PendingTimer {
  handle: TimerHandle;
  dueAt: number;
  callback: () => void;
}

/** Deterministic TimerHost. Time only moves through advance(). */
export class ManualTimerHost implements TimerHost {
  readonly events: TimerEvent[] = [];
  private clock: number;
  private nextId = 1;
  private readonly pending = new Map<number, PendingTimer>();

  constructor(start = 0) {
    this.clock = start;
  }

  now(): number {
    return this.clock;
  }

  schedule(label: string, delayMs: number, callback: () => void): TimerHandle {
    const handle: TimerHandle = { id: this.nextId++, label };
    this.pending.set(handle.id, { handle, dueAt: this.clock + Math.max(0, delayMs), callback });
    this.events.push({ type: "schedule", id: handle.id, label, at: this.clock });
    return handle;
  }

  cancel(handle: TimerHandle): void {
    if (this.pending.delete(handle.id)) {
      this.events.push({ type: "cancel", id: handle.id, label: handle.label, at: this.clock });
    }
  }

  /** Handles of timers that have neither fired nor been cancelled. */
  get live(): TimerHandle[] {
    return [...this.pending.values()].map((p) => p.handle);
  }

  /** Moves the clock forward, firing due timers in due order (ties by schedule order). */
  advance(ms: number): void {
    const target = this.clock + ms;
    for (;;) {
      let next: PendingTimer | null = null;
      for (const timer of this.pending.values()) {
        if (timer.dueAt > target) continue;
        if (!next || timer.dueAt < next.dueAt || (timer.dueAt === next.dueAt && timer.handle.id < next.handle.id)) {
          next = timer;
        }
      }
      if (!next) break;
      this.clock = next.dueAt;
      this.pending.delete(next.handle.id);
      this.events.push({ type: "fire", id: next.handle.id, label: next.handle.label, at: this.clock });
      next.callback();
    }
    this.clock = target;
  }
}

// ─── Inference ──────────────────────────────────────────────────────────────────

export const TEST_INPUT_DIMS: readonly number[] = [1, 3, 224, 224];
export const TEST_OUTPUT_DIMS: readonly number[] = [1, 8];

export class FakeSession implements ModelSession {
  released = false;
  runs = 0;
  /** When set, descriptor reads throw it (simulates a corrupted session). */
  descriptorError: Error | null = null;

  constructor(
    readonly accelerator: AcceleratorKind,
    private readonly backend: FakeBackend,
  ) {}

  inputDescriptor(): TensorDescriptor {
    if (this.descriptorError) throw this.descriptorError;
    return { name: "input", dims: this.backend.inputDims, type: "float32" };
  }

  outputDescriptor(): TensorDescriptor {
    if (this.descriptorError) throw this.descriptorError;
    return { name: "logits", dims: this.backend.outputDims, type: "float32" };
  }

  async run(input: Float32Array): Promise<Float32Array> {
    this.runs++;
    this.backend.runCount++;
    return this.backend.runImpl(input, this);
  }

  async release(): Promise<void> {
    this.released = true;
  }
}

/** In-process InferenceBackend with scriptable bind and run behavior. */
export class FakeBackend implements InferenceBackend {
  readonly name = "fake";
  supported = true;
  inputDims: readonly number[] = TEST_INPUT_DIMS;
  outputDims: readonly number[] = TEST_OUTPUT_DIMS;
  scores: number[] = [0, 0, 0, 0, 0, 0, 0, 0];
  runCount = 0;
  readonly binds: BindOptions[] = [];
  readonly sessions: FakeSession[] = [];
  /** Return an Error to make the given bind attempt throw it. */
  bindFailure: (options: BindOptions) => Error | null = () => null;
  runImpl: (input: Float32Array, session: FakeSession) => Float32Array | Promise<Float32Array> = () =>
    Float32Array.from(this.scores);

  async acceleratorSupported(): Promise<boolean> {
    return this.supported;
  }

  async bind(_model: Uint8Array, options: BindOptions): Promise<ModelSession> {
    this.binds.push(options);
    const failure = this.bindFailure(options);
    if (failure) throw failure;
    const session = new FakeSession(options.accelerator, this);
    this.sessions.push(session);
    return session;
  }

  /** Sessions bound and not yet released. */
  get liveSessions(): FakeSession[] {
    return this.sessions.filter((s) => !s.released);
  }
}

export const TEST_MODEL = new Uint8Array([1, 2, 3, 4, 5, 6, 7, 8]);

// ─── Faces ──────────────────────────────────────────────────────────────────────

export class StubLocator implements FaceLocator {
  regions: BoundingRegion[] = [];
  error: Error | null = null;
  calls = 0;

  locate(): readonly BoundingRegion[] {
    this.calls++;
    if (this.error) throw this.error;
    return this.regions;
  }
}

// ─── Frames ─────────────────────────────────────────────────────────────────────

/** Allocates a frame filled with one RGBA color. */
export function solidFrame(
  ledger: BufferLedger,
  width: number,
  height: number,
  rgba: readonly [number, number, number, number] = [128, 128, 128, 255],
): ImageBuffer {
  const frame = ledger.allocateImage(width, height, "test-frame");
  const data = frame.data;
  for (let i = 0; i < data.length; i += 4) {
    data[i] = rgba[0];
    data[i + 1] = rgba[1];
    data[i + 2] = rgba[2];
    data[i + 3] = rgba[3];
  }
  return frame;
}

/** Resolves after pending microtasks and one macrotask turn. */
export function flushAsync(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
