/**
 * Owned pixel and tensor buffers.
 *
 * Every intermediate buffer the detection pipeline creates is allocated through
 * a BufferLedger and released exactly once. The ledger keeps the set of live
 * buffers so ownership can be checked at any point.
 */

export interface OwnedBuffer {
  readonly tag: string;
  readonly released: boolean;
  release(): void;
}

// ─── Ledger ─────────────────────────────────────────────────────────────────────

export class BufferLedger {
  private readonly live = new Set<OwnedBuffer>();
  private allocations = 0;
  private doubleReleaseCount = 0;

  /** Allocate a zero-filled RGBA image. */
  allocateImage(width: number, height: number, tag: string): ImageBuffer {
    assertDimensions(width, height);
    return this.track(new ImageBuffer(this, width, height, new Uint8ClampedArray(width * height * 4), tag));
  }

  /**
   * Wrap existing RGBA bytes (e.g. a decoded camera frame) as an owned image.
   * The byte length must be exactly width × height × 4.
   */
  adoptImage(width: number, height: number, pixels: Uint8Array | Uint8ClampedArray, tag: string): ImageBuffer {
    assertDimensions(width, height);
    if (pixels.length !== width * height * 4) {
      throw new Error(
        `RGBA payload has ${pixels.length} bytes, expected ${width * height * 4} for ${width}x${height}`,
      );
    }
    const data = new Uint8ClampedArray(pixels.buffer, pixels.byteOffset, pixels.length);
    return this.track(new ImageBuffer(this, width, height, data, tag));
  }

  allocateTensor(length: number, tag: string): TensorBuffer {
    if (!Number.isInteger(length) || length <= 0) {
      throw new Error(`Tensor length must be a positive integer, got ${length}`);
    }
    return this.track(new TensorBuffer(this, new Float32Array(length), tag));
  }

  /** Number of buffers allocated and not yet released. */
  get liveCount(): number {
    return this.live.size;
  }

  /** Total allocations since construction. */
  get allocationCount(): number {
    return this.allocations;
  }

  /** Number of release() calls on an already released buffer. */
  get doubleReleases(): number {
    return this.doubleReleaseCount;
  }

  isLive(buffer: OwnedBuffer): boolean {
    return this.live.has(buffer);
  }

  /** Snapshot of live buffers, in allocation order. */
  liveBuffers(): OwnedBuffer[] {
    return [...this.live];
  }

  /** @internal called by buffers on release */
  onRelease(buffer: OwnedBuffer): boolean {
    if (!this.live.delete(buffer)) {
      this.doubleReleaseCount++;
      return false;
    }
    return true;
  }

  private track<T extends OwnedBuffer>(buffer: T): T {
    this.allocations++;
    this.live.add(buffer);
    return buffer;
  }
}

function assertDimensions(width: number, height: number): void {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new Error(`Invalid image dimensions ${width}x${height}`);
  }
}

// ─── Image Buffer ───────────────────────────────────────────────────────────────

export class ImageBuffer implements OwnedBuffer {
  private pixels: Uint8ClampedArray | null;

  constructor(
    private readonly ledger: BufferLedger,
    readonly width: number,
    readonly height: number,
    pixels: Uint8ClampedArray,
    readonly tag: string,
  ) {
    this.pixels = pixels;
  }

  get released(): boolean {
    return this.pixels === null;
  }

  /**
   * RGBA bytes, row-major.
   * @throws Error if the buffer has been released
   */
  get data(): Uint8ClampedArray {
    if (this.pixels === null) {
      throw new Error(`Image buffer "${this.tag}" used after release`);
    }
    return this.pixels;
  }

  /** The ledger this buffer was allocated from. */
  get owner(): BufferLedger {
    return this.ledger;
  }

  release(): void {
    if (this.ledger.onRelease(this)) {
      this.pixels = null;
    }
  }
}

// ─── Tensor Buffer ──────────────────────────────────────────────────────────────

export class TensorBuffer implements OwnedBuffer {
  private values: Float32Array | null;

  constructor(
    private readonly ledger: BufferLedger,
    values: Float32Array,
    readonly tag: string,
  ) {
    this.values = values;
  }

  get released(): boolean {
    return this.values === null;
  }

  get data(): Float32Array {
    if (this.values === null) {
      throw new Error(`Tensor buffer "${this.tag}" used after release`);
    }
    return this.values;
  }

  release(): void {
    if (this.ledger.onRelease(this)) {
      this.values = null;
    }
  }
}

// ─── Pixel Operations ───────────────────────────────────────────────────────────

export interface PixelRect {
  left: number;
  top: number;
  width: number;
  height: number;
}

/** Copy a rectangle of `source` into a new buffer. The rect must lie inside the source. */
export function cropImage(source: ImageBuffer, rect: PixelRect, tag: string): ImageBuffer {
  const { left, top, width, height } = rect;
  if (
    left < 0 ||
    top < 0 ||
    width <= 0 ||
    height <= 0 ||
    left + width > source.width ||
    top + height > source.height
  ) {
    throw new Error(
      `Crop ${width}x${height}+${left}+${top} is outside ${source.width}x${source.height}`,
    );
  }

  const src = source.data;
  const out = source.owner.allocateImage(width, height, tag);
  const dst = out.data;
  const rowBytes = width * 4;
  for (let row = 0; row < height; row++) {
    const srcStart = ((top + row) * source.width + left) * 4;
    dst.set(src.subarray(srcStart, srcStart + rowBytes), row * rowBytes);
  }
  return out;
}

/** Full copy of `source` into a new buffer. */
export function cloneImage(source: ImageBuffer, tag: string): ImageBuffer {
  const src = source.data;
  const out = source.owner.allocateImage(source.width, source.height, tag);
  out.data.set(src);
  return out;
}
