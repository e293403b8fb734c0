// ─── Temporal Aggregator ────────────────────────────────────────────────────────
// Sliding time window of classification samples with a majority vote.
// Memory is bounded by time: samples older than the window are dropped on
// every add() and windowSummary().

import type { ClassificationSample, EmotionLabel, WindowSummary } from "./types.js";
import { isEmotionLabel } from "./emotion-labels.js";

export interface AggregatorConfig {
  /** Window length in ms. Default: 10000 */
  windowMs: number;
  /** Minimum samples in the window for a summary. Default: 7 */
  minValidSamples: number;
  /** Samples below this confidence are ignored. Default: 0.55 */
  confidenceThreshold: number;
}

export const DEFAULT_AGGREGATOR_CONFIG: AggregatorConfig = {
  windowMs: 10_000,
  minValidSamples: 7,
  confidenceThreshold: 0.55,
};

export class TemporalAggregator {
  readonly config: AggregatorConfig;
  private samples: ClassificationSample[] = [];

  constructor(config: Partial<AggregatorConfig> = {}) {
    this.config = { ...DEFAULT_AGGREGATOR_CONFIG, ...config };
  }

  /**
   * Record a classification. Ignored when the label is not a supported emotion
   * or the confidence is non-finite or below the gate.
   * Returns true if the sample was kept.
   */
  add(label: string, confidence: number, now: number): boolean {
    if (!isEmotionLabel(label)) return false;
    if (!Number.isFinite(confidence) || confidence < this.config.confidenceThreshold) return false;

    this.samples.push(Object.freeze({ label, confidence: Math.min(1, confidence), timestamp: now }));
    this.trim(now);
    return true;
  }

  /**
   * Majority label over the samples still inside the window, or null when
   * fewer than `minValidSamples` remain.
   *
   * Ties go to the label inserted into the count map first, i.e. the tied
   * label whose earliest sample in the window arrived first.
   */
  windowSummary(now: number): WindowSummary | null {
    this.trim(now);
    const total = this.samples.length;
    if (total < this.config.minValidSamples || total === 0) return null;

    const counts = new Map<EmotionLabel, number>();
    for (const sample of this.samples) {
      counts.set(sample.label, (counts.get(sample.label) ?? 0) + 1);
    }

    let topLabel: EmotionLabel | null = null;
    let topCount = 0;
    for (const [label, count] of counts) {
      if (count > topCount) {
        topCount = count;
        topLabel = label;
      }
    }
    if (topLabel === null) return null;

    return {
      topLabel,
      topShare: Math.min(1, Math.max(0, topCount / total)),
      totalSamples: total,
    };
  }

  /** Drop all samples. Used on session boundaries. */
  reset(): void {
    this.samples = [];
  }

  /** Samples currently held (not trimmed). */
  get size(): number {
    return this.samples.length;
  }

  private trim(now: number): void {
    let drop = 0;
    while (drop < this.samples.length && now - this.samples[drop].timestamp > this.config.windowMs) {
      drop++;
    }
    if (drop > 0) {
      this.samples.splice(0, drop);
    }
  }
}
