import { describe, it, expect } from "vitest";
import { APP_NAME, APP_VERSION, EMOTION_LABELS } from "./index.js";

describe("Project setup", () => {
  it("should export app name", () => {
    expect(APP_NAME).toBe("Emotion Cadence");
  });

  it("should export app version", () => {
    expect(APP_VERSION).toBe("0.1.0");
  });

  it("should export the eight emotion labels", () => {
    expect(EMOTION_LABELS).toHaveLength(8);
  });
});
