// Emotion Cadence - Runtime configuration
// Values come from the environment (populated from .env by dotenv at the entry point).

import type { AccelerationHint, CadenceConfig } from "./types.js";
import { isLogLevel, type LogLevel } from "./logger.js";

// ─── Defaults ───────────────────────────────────────────────────────────────────

export const DEFAULT_CADENCE_CONFIG: CadenceConfig = {
  detectionWindowMs: 10_000,
  playbackDurationMs: 30_000,
  noFaceDebounceMs: 1_200,
  primarySetShare: 0.5,
};

/** Frames arriving sooner than this after the last accepted frame are dropped. */
export const DEFAULT_FRAME_INTERVAL_MS = 1_000;

export interface AppConfig {
  port: number;
  modelPath: string;
  tracksDir: string;
  acceleration: AccelerationHint;
  /** Directory for the accelerated binding's serialization cache. Null disables caching. */
  cacheDir: string | null;
  frameIntervalMs: number;
  cadence: CadenceConfig;
  logLevel: LogLevel;
}

export type Env = Record<string, string | undefined>;

// ─── Parsing ────────────────────────────────────────────────────────────────────

function readPositiveInt(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${key} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function readAcceleration(env: Env): AccelerationHint {
  const raw = (env.ACCELERATION ?? "auto").trim().toLowerCase();
  if (raw === "auto" || raw === "accelerated" || raw === "fallback") {
    return raw;
  }
  throw new Error(`ACCELERATION must be one of auto, accelerated, fallback; got "${raw}"`);
}

function readLogLevel(env: Env): LogLevel {
  const raw = (env.LOG_LEVEL ?? "info").trim().toLowerCase();
  if (!isLogLevel(raw)) {
    throw new Error(`LOG_LEVEL must be one of debug, info, warn, error; got "${raw}"`);
  }
  return raw;
}

/**
 * Builds the application config from environment variables.
 * @throws Error naming the offending variable when a value is invalid
 */
export function loadConfig(env: Env): AppConfig {
  const port = readPositiveInt(env, "PORT", 3000);
  if (port > 65535) {
    throw new Error(`PORT must be at most 65535, got "${port}"`);
  }

  const cacheDirRaw = env.CACHE_DIR?.trim();

  return {
    port,
    modelPath: env.MODEL_PATH?.trim() || "models/emotion.onnx",
    tracksDir: env.TRACKS_DIR?.trim() || "tracks",
    acceleration: readAcceleration(env),
    cacheDir: cacheDirRaw === undefined ? ".cache/accelerator" : cacheDirRaw === "" ? null : cacheDirRaw,
    frameIntervalMs: readPositiveInt(env, "FRAME_INTERVAL_MS", DEFAULT_FRAME_INTERVAL_MS),
    cadence: {
      ...DEFAULT_CADENCE_CONFIG,
      detectionWindowMs: readPositiveInt(env, "DETECTION_WINDOW_MS", DEFAULT_CADENCE_CONFIG.detectionWindowMs),
      playbackDurationMs: readPositiveInt(env, "PLAYBACK_DURATION_MS", DEFAULT_CADENCE_CONFIG.playbackDurationMs),
    },
    logLevel: readLogLevel(env),
  };
}
