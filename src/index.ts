// Emotion Cadence - Public API and bootstrap
// Wires the inference resource, pipeline, track library and server together.

import { readFile } from "node:fs/promises";
import type { AppConfig } from "./config.js";
import { DetectionPipeline } from "./detection-pipeline.js";
import { EMOTION_CLASS_COUNT } from "./emotion-labels.js";
import { FrameHintFaceLocator } from "./face-locator.js";
import { FramePreprocessor } from "./frame-preprocessor.js";
import type { InferenceBackend } from "./inference-backend.js";
import { InferenceResource } from "./inference-resource.js";
import { createLogger, setLogLevel, type Logger } from "./logger.js";
import { OnnxBackend } from "./onnx-backend.js";
import { SerializationCache } from "./serialization-cache.js";
import { createAppServer, TRACKS_MOUNT, type AppServer } from "./server.js";
import { TrackLibrary } from "./track-library.js";

export const APP_NAME = "Emotion Cadence";
export const APP_VERSION = "0.1.0";

export { loadConfig, DEFAULT_CADENCE_CONFIG, DEFAULT_FRAME_INTERVAL_MS, type AppConfig } from "./config.js";
export { EMOTION_LABELS, type EmotionLabel } from "./emotion-labels.js";
export { BufferLedger, ImageBuffer, TensorBuffer } from "./image-buffer.js";
export { FramePreprocessor, softmax, argMax } from "./frame-preprocessor.js";
export { InferenceResource } from "./inference-resource.js";
export { DetectionPipeline, isAcceleratorFault } from "./detection-pipeline.js";
export { TemporalAggregator } from "./temporal-aggregator.js";
export { CadenceScheduler } from "./cadence-scheduler.js";
export { MonitoringSession } from "./monitoring-session.js";
export { TrackLibrary } from "./track-library.js";
export { FrameHintFaceLocator, FullFrameFaceLocator, type FaceLocator } from "./face-locator.js";
export { RemotePlayback } from "./remote-playback.js";
export { SystemTimerHost, type TimerHost } from "./timer-host.js";
export { encodeFrame, decodeFrame } from "./video-frame-codec.js";
export { createAppServer, handleConnection } from "./server.js";
export type * from "./types.js";

export interface Application {
  server: AppServer;
  resource: InferenceResource;
  pipeline: DetectionPipeline;
  tracks: TrackLibrary;
  /** Closes the server and releases the model. */
  shutdown(): Promise<void>;
}

export interface BootstrapOptions {
  /** Defaults to the ONNX Runtime backend. */
  backend?: InferenceBackend;
  logger?: Logger;
}

/**
 * Builds every component from config and starts listening.
 * Model load failure is not fatal: the pipeline retries on the next frame.
 * @throws Error if the model file or track directory cannot be read
 */
export async function bootstrap(config: AppConfig, options: BootstrapOptions = {}): Promise<Application> {
  const log = options.logger ?? createLogger("INIT");
  setLogLevel(config.logLevel);

  log.info(`Reading model from ${config.modelPath}...`);
  const modelBytes = new Uint8Array(await readFile(config.modelPath));

  const preprocessor = new FramePreprocessor();
  const backend =
    options.backend ??
    new OnnxBackend({ inputDims: preprocessor.inputDims, outputDims: [1, EMOTION_CLASS_COUNT] });
  const resource = new InferenceResource({
    backend,
    inputDims: preprocessor.inputDims,
    classCount: EMOTION_CLASS_COUNT,
    cache: config.cacheDir ? new SerializationCache(config.cacheDir) : undefined,
  });

  const locator = new FrameHintFaceLocator();
  const pipeline = new DetectionPipeline({
    resource,
    locator,
    preprocessor,
    model: { bytes: modelBytes, acceleration: config.acceleration },
  });

  log.info(`Loading model (${backend.name}, acceleration: ${config.acceleration})...`);
  if (await pipeline.warmStart()) {
    log.info(`Model ready: ${resource.state.status}`);
  } else {
    log.warn("Model failed to load; will retry on the first frame");
  }

  log.info(`Scanning tracks in ${config.tracksDir}...`);
  const tracks = new TrackLibrary({ root: config.tracksDir, urlPrefix: TRACKS_MOUNT });
  await tracks.scan();

  const server = createAppServer({
    pipeline,
    locator,
    tracks,
    inference: resource,
    cadence: config.cadence,
    frameIntervalMs: config.frameIntervalMs,
  });
  await server.listen(config.port);

  return {
    server,
    resource,
    pipeline,
    tracks,
    async shutdown() {
      await server.close();
      await pipeline.dispose();
    },
  };
}
