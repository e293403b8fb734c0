/**
 * FramePreprocessor: Turns a cropped face into the classifier's input tensor
 * and turns the classifier's raw scores back into a label.
 *
 * Input layout: [1, 3, size, size] float32, channel-first (all R, then all G,
 * then all B), each value `(pixel / 255 − mean[c]) / std[c]`.
 */

import {
  cropImage,
  type ImageBuffer,
  type TensorBuffer,
} from "./image-buffer.js";

export interface PreprocessorConfig {
  /** Square input edge in pixels. Default: 224 */
  inputSize: number;
  /** Per-channel mean (R, G, B) applied after scaling to [0, 1]. Default: 0.5 each */
  mean: readonly [number, number, number];
  /** Per-channel standard deviation (R, G, B). Default: 0.5 each */
  std: readonly [number, number, number];
}

export const DEFAULT_PREPROCESSOR_CONFIG: PreprocessorConfig = {
  inputSize: 224,
  mean: [0.5, 0.5, 0.5],
  std: [0.5, 0.5, 0.5],
};

const CHANNELS = 3;

// ─── Resampling ─────────────────────────────────────────────────────────────────

/**
 * Bilinear resize of an RGBA image into a new buffer allocated from the
 * source's ledger. Pixel centers are aligned (half-pixel offset).
 */
export function resizeBilinear(source: ImageBuffer, width: number, height: number, tag: string): ImageBuffer {
  const out = source.owner.allocateImage(width, height, tag);
  const src = source.data;
  const dst = out.data;
  const scaleX = source.width / width;
  const scaleY = source.height / height;

  for (let y = 0; y < height; y++) {
    const sy = Math.min(Math.max((y + 0.5) * scaleY - 0.5, 0), source.height - 1);
    const y0 = Math.floor(sy);
    const y1 = Math.min(y0 + 1, source.height - 1);
    const fy = sy - y0;

    for (let x = 0; x < width; x++) {
      const sx = Math.min(Math.max((x + 0.5) * scaleX - 0.5, 0), source.width - 1);
      const x0 = Math.floor(sx);
      const x1 = Math.min(x0 + 1, source.width - 1);
      const fx = sx - x0;

      const i00 = (y0 * source.width + x0) * 4;
      const i01 = (y0 * source.width + x1) * 4;
      const i10 = (y1 * source.width + x0) * 4;
      const i11 = (y1 * source.width + x1) * 4;
      const o = (y * width + x) * 4;

      for (let c = 0; c < 4; c++) {
        const top = src[i00 + c] * (1 - fx) + src[i01 + c] * fx;
        const bottom = src[i10 + c] * (1 - fx) + src[i11 + c] * fx;
        dst[o + c] = top * (1 - fy) + bottom * fy;
      }
    }
  }
  return out;
}

// ─── Post-processing ────────────────────────────────────────────────────────────

/**
 * Numerically stable softmax: the maximum is subtracted before exponentiating.
 * Returns an empty array for empty input.
 */
export function softmax(scores: readonly number[]): number[] {
  if (scores.length === 0) return [];
  let max = -Infinity;
  for (const s of scores) {
    if (s > max) max = s;
  }

  const exps = scores.map((s) => Math.exp(s - max));
  let sum = 0;
  for (const e of exps) sum += e;
  return exps.map((e) => e / sum);
}

/** Index of the largest value; the first index wins ties. -1 for empty input. */
export function argMax(values: readonly number[]): number {
  let best = -1;
  let bestValue = -Infinity;
  for (let i = 0; i < values.length; i++) {
    if (values[i] > bestValue) {
      bestValue = values[i];
      best = i;
    }
  }
  return best;
}

// ─── Preprocessor ───────────────────────────────────────────────────────────────

export class FramePreprocessor {
  readonly config: PreprocessorConfig;

  constructor(config: Partial<PreprocessorConfig> = {}) {
    this.config = { ...DEFAULT_PREPROCESSOR_CONFIG, ...config };
    if (this.config.std.some((s) => s === 0)) {
      throw new Error("Preprocessor std must be non-zero for every channel");
    }
  }

  /** Number of float32 values in one input tensor. */
  get tensorLength(): number {
    return CHANNELS * this.config.inputSize * this.config.inputSize;
  }

  /** Tensor dims as the classifier expects them. */
  get inputDims(): readonly number[] {
    const size = this.config.inputSize;
    return [1, CHANNELS, size, size];
  }

  /**
   * Center-crops `face` to a square, resizes it to the input size and writes
   * the normalized channel-first tensor. Intermediate images are released
   * before returning or throwing; the returned tensor belongs to the caller.
   */
  preprocess(face: ImageBuffer): TensorBuffer {
    const size = this.config.inputSize;
    const side = Math.min(face.width, face.height);
    const square = cropImage(
      face,
      {
        left: Math.floor((face.width - side) / 2),
        top: Math.floor((face.height - side) / 2),
        width: side,
        height: side,
      },
      "square-crop",
    );

    let resized: ImageBuffer | null = null;
    try {
      resized = resizeBilinear(square, size, size, "resized-crop");

      const tensor = face.owner.allocateTensor(this.tensorLength, "input-tensor");
      try {
        this.writeNormalized(resized, tensor.data);
      } catch (err) {
        tensor.release();
        throw err;
      }
      return tensor;
    } finally {
      square.release();
      resized?.release();
    }
  }

  private writeNormalized(image: ImageBuffer, out: Float32Array): void {
    const { mean, std } = this.config;
    const plane = image.width * image.height;
    const pixels = image.data;

    for (let i = 0; i < plane; i++) {
      const p = i * 4;
      for (let c = 0; c < CHANNELS; c++) {
        out[c * plane + i] = (pixels[p + c] / 255 - mean[c]) / std[c];
      }
    }
  }
}
