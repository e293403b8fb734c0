/**
 * Unit tests for temporal-aggregator.ts
 */

import { describe, it, expect } from "vitest";
import { TemporalAggregator, DEFAULT_AGGREGATOR_CONFIG } from "./temporal-aggregator.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

function feed(agg: TemporalAggregator, label: string, count: number, confidence: number, startAt: number): number {
  let t = startAt;
  for (let i = 0; i < count; i++) {
    agg.add(label, confidence, t);
    t += 100;
  }
  return t;
}

describe("TemporalAggregator", () => {
  it("uses 10s window, 7 samples and 0.55 gate by default", () => {
    expect(DEFAULT_AGGREGATOR_CONFIG).toEqual({ windowMs: 10_000, minValidSamples: 7, confidenceThreshold: 0.55 });
  });

  // ─── Majority ─────────────────────────────────────────────────────────────────

  describe("majority vote", () => {
    it("returns the majority label with its share", () => {
      const agg = new TemporalAggregator();
      let t = feed(agg, "Happiness", 6, 0.9, 0);
      t = feed(agg, "Sadness", 4, 0.9, t);

      const summary = agg.windowSummary(t);
      expect(summary).toEqual({ topLabel: "Happiness", topShare: 0.6, totalSamples: 10 });
    });

    it("breaks ties in favour of the label seen first in the window", () => {
      const agg = new TemporalAggregator({ minValidSamples: 1 });
      agg.add("Anger", 0.9, 0);
      agg.add("Fear", 0.9, 1);
      agg.add("Fear", 0.9, 2);
      agg.add("Anger", 0.9, 3);

      expect(agg.windowSummary(4)?.topLabel).toBe("Anger");
    });

    it("keeps the first-seen label on a tie even when another label reaches the count sooner", () => {
      const agg = new TemporalAggregator();
      const labels = ["Happiness", "Sadness", "Sadness", "Happiness", "Neutral", "Fear", "Contempt"];
      labels.forEach((label, i) => agg.add(label, 0.9, i * 100));

      expect(agg.windowSummary(700)).toEqual({ topLabel: "Happiness", topShare: 2 / 7, totalSamples: 7 });
    });

    it("drops the first-seen label from the tie once its early sample expires", () => {
      const agg = new TemporalAggregator({ minValidSamples: 1, windowMs: 1000 });
      agg.add("Anger", 0.9, 0);
      agg.add("Fear", 0.9, 500);
      agg.add("Anger", 0.9, 900);
      agg.add("Fear", 0.9, 1100);
      agg.add("Anger", 0.9, 1150);

      // Anger at 0 is gone; Fear (500) now precedes Anger (900).
      expect(agg.windowSummary(1200)).toEqual({ topLabel: "Fear", topShare: 0.5, totalSamples: 4 });
    });

    it("reports a share of 1 when every sample agrees", () => {
      const agg = new TemporalAggregator();
      const t = feed(agg, "Neutral", 7, 0.7, 0);
      expect(agg.windowSummary(t)).toEqual({ topLabel: "Neutral", topShare: 1, totalSamples: 7 });
    });
  });

  // ─── Gating ───────────────────────────────────────────────────────────────────

  describe("gating", () => {
    it("ignores samples below the confidence gate", () => {
      const agg = new TemporalAggregator();
      expect(agg.add("Happiness", 0.54, 0)).toBe(false);
      expect(agg.add("Happiness", 0.55, 0)).toBe(true);
      expect(agg.size).toBe(1);
    });

    it("returns null with fewer than the minimum samples", () => {
      const agg = new TemporalAggregator();
      const t = feed(agg, "Surprise", 5, 0.9, 0);
      feed(agg, "Surprise", 5, 0.3, t);
      expect(agg.windowSummary(t + 500)).toBeNull();
    });

    it("rejects unknown, blank and differently cased labels", () => {
      const agg = new TemporalAggregator();
      expect(agg.add("", 0.9, 0)).toBe(false);
      expect(agg.add("Joy", 0.9, 0)).toBe(false);
      expect(agg.add("happiness", 0.9, 0)).toBe(false);
      expect(agg.size).toBe(0);
    });

    it("rejects non-finite confidence", () => {
      const agg = new TemporalAggregator();
      expect(agg.add("Fear", Number.NaN, 0)).toBe(false);
      expect(agg.add("Fear", Number.POSITIVE_INFINITY, 0)).toBe(false);
    });
  });

  // ─── Expiry ───────────────────────────────────────────────────────────────────

  describe("expiry", () => {
    it("excludes samples older than the window", () => {
      const agg = new TemporalAggregator({ minValidSamples: 1 });
      agg.add("Disgust", 0.9, 0);
      agg.add("Contempt", 0.9, 5_000);

      expect(agg.windowSummary(10_001)).toEqual({ topLabel: "Contempt", topShare: 1, totalSamples: 1 });
      expect(agg.size).toBe(1);
    });

    it("keeps a sample exactly one window old", () => {
      const agg = new TemporalAggregator({ minValidSamples: 1 });
      agg.add("Disgust", 0.9, 0);
      expect(agg.windowSummary(10_000)?.totalSamples).toBe(1);
    });

    it("trims on add as well as on summary", () => {
      const agg = new TemporalAggregator();
      agg.add("Happiness", 0.9, 0);
      agg.add("Happiness", 0.9, 20_000);
      expect(agg.size).toBe(1);
    });
  });

  it("reset() drops every sample", () => {
    const agg = new TemporalAggregator();
    const t = feed(agg, "Happiness", 8, 0.9, 0);
    agg.reset();
    expect(agg.size).toBe(0);
    expect(agg.windowSummary(t)).toBeNull();
  });
});
