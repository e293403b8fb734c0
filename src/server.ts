// Emotion Cadence - WebSocket Handler and Express Server
//
// Privacy: camera frames are held in memory for one classification and
// released; nothing is written to disk.

import express, { type Express } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import type { CadenceConfig, ClientMessage, InferenceState, ServerMessage } from "./types.js";
import type { AggregatorConfig } from "./temporal-aggregator.js";
import type { FrameHintFaceLocator } from "./face-locator.js";
import type { TrackLibrary } from "./track-library.js";
import { BufferLedger } from "./image-buffer.js";
import { MonitoringSession, type FrameClassifier } from "./monitoring-session.js";
import { SystemTimerHost, type TimerHost } from "./timer-host.js";
import { decodeFrame } from "./video-frame-codec.js";
import { createLogger, errorMessage, type Logger } from "./logger.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

/** URL prefix the track directory is served under. */
export const TRACKS_MOUNT = "/tracks";

// ─── Connection Handling ────────────────────────────────────────────────────────

/** The part of a WebSocket the connection handler needs. */
export interface ClientSocket {
  send(text: string): void;
  readonly isOpen: boolean;
}

export interface ConnectionDeps {
  pipeline: FrameClassifier;
  locator: FrameHintFaceLocator;
  tracks: TrackLibrary;
  timers: TimerHost;
  ledger: BufferLedger;
  cadence?: Partial<CadenceConfig>;
  aggregator?: Partial<AggregatorConfig>;
  frameIntervalMs?: number;
  logger: Logger;
}

export interface ConnectionHandler {
  session: MonitoringSession;
  onMessage(data: Buffer | string, isBinary: boolean): void;
  onClose(): void;
}

export function sendMessage(socket: ClientSocket, message: ServerMessage): void {
  if (socket.isOpen) {
    socket.send(JSON.stringify(message));
  }
}

/** Parses a JSON control message. Returns null for anything that is not a known message. */
export function parseClientMessage(text: string): ClientMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  if (typeof parsed !== "object" || parsed === null || !("type" in parsed)) return null;
  const type = parsed.type;
  if (typeof type !== "string") return null;

  switch (type) {
    case "start_monitoring":
    case "stop_monitoring":
    case "reset":
    case "permission_revoked":
    case "playback_ended":
    case "reload_model":
      return { type };
    default:
      return null;
  }
}

/**
 * Binds one client to its own MonitoringSession. Transport-agnostic so it can
 * be driven without a network in tests; createAppServer wires it to ws.
 */
export function handleConnection(socket: ClientSocket, deps: ConnectionDeps): ConnectionHandler {
  const { logger } = deps;
  const session = new MonitoringSession({
    pipeline: deps.pipeline,
    tracks: deps.tracks,
    timers: deps.timers,
    send: (message) => sendMessage(socket, message),
    cadence: deps.cadence,
    aggregator: deps.aggregator,
    frameIntervalMs: deps.frameIntervalMs,
    logger,
  });

  logger.info(`New WebSocket connection, session ${session.id}`);
  sendMessage(socket, { type: "cadence_state", state: session.scheduler.state });
  sendMessage(socket, { type: "status", health: session.health });

  const sendError = (message: string) => sendMessage(socket, { type: "error", message, recoverable: true });

  const handleBinary = (data: Buffer) => {
    const decoded = decodeFrame(data);
    if (!decoded) {
      sendError("Malformed frame: expected EMF header followed by width x height x 4 RGBA bytes");
      return;
    }
    const { header, pixels } = decoded;
    const frame = deps.ledger.adoptImage(header.width, header.height, pixels, `frame-${header.seq}`);
    if (header.regions && header.regions.length > 0) {
      deps.locator.attach(frame, header.regions);
    }
    if (header.manual) {
      session.classifyOnce(frame).catch((err: unknown) => {
        logger.error(`Manual classification failed for session ${session.id}: ${errorMessage(err)}`);
        sendError(errorMessage(err));
      });
      return;
    }
    const outcome = session.submitFrame(frame);
    if (outcome !== "accepted") {
      logger.debug(`Frame ${header.seq} ${outcome} (session ${session.id})`);
    }
  };

  const handleClientMessage = (message: ClientMessage) => {
    switch (message.type) {
      case "start_monitoring":
        session.start();
        break;
      case "stop_monitoring":
        session.stop();
        break;
      case "reset":
        session.reset();
        break;
      case "permission_revoked":
        session.revokePermission();
        break;
      case "playback_ended":
        session.playbackEnded();
        break;
      case "reload_model":
        session
          .reloadModel()
          .then((ok) => {
            if (!ok) sendError("Model reload failed");
          })
          .catch((err: unknown) => {
            logger.error(`Async error for session ${session.id}: ${errorMessage(err)}`);
            sendError(errorMessage(err));
          });
        break;
      default: {
        const exhaustiveCheck: never = message;
        sendError(`Unknown message: ${JSON.stringify(exhaustiveCheck)}`);
      }
    }
  };

  return {
    session,
    onMessage(data, isBinary) {
      try {
        if (isBinary) {
          handleBinary(typeof data === "string" ? Buffer.from(data, "utf-8") : data);
          return;
        }
        const text = typeof data === "string" ? data : data.toString("utf-8");
        const message = parseClientMessage(text);
        if (!message) {
          sendError(`Unknown or malformed message: ${text.slice(0, 80)}`);
          return;
        }
        handleClientMessage(message);
      } catch (err) {
        logger.error(`Error handling message for session ${session.id}: ${errorMessage(err)}`);
        sendError(errorMessage(err));
      }
    },
    onClose() {
      logger.info(`WebSocket closed, session ${session.id}`);
      session.stop();
    },
  };
}

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface HealthSource {
  readonly state: InferenceState;
}

export interface CreateServerOptions {
  pipeline: FrameClassifier;
  locator: FrameHintFaceLocator;
  tracks: TrackLibrary;
  inference: HealthSource;
  timers?: TimerHost;
  ledger?: BufferLedger;
  cadence?: Partial<CadenceConfig>;
  aggregator?: Partial<AggregatorConfig>;
  frameIntervalMs?: number;
  logger?: Logger;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  /** Start listening on the given port. Resolves when listening. */
  listen(port: number): Promise<void>;
  /** Close every connection and the HTTP server. */
  close(): Promise<void>;
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

/** Builds the `/health` payload from the inference state. */
export function healthPayload(state: InferenceState): {
  status: "ok";
  inference: InferenceState["status"];
  accelerator: string | null;
} {
  const accelerator = state.status === "ready" || state.status === "degraded" ? state.accelerator : null;
  return { status: "ok", inference: state.status, accelerator };
}

/**
 * Creates the Express app, HTTP server and WebSocket server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const logger = options.logger ?? createLogger("Server");
  const deps: ConnectionDeps = {
    pipeline: options.pipeline,
    locator: options.locator,
    tracks: options.tracks,
    timers: options.timers ?? new SystemTimerHost(),
    ledger: options.ledger ?? new BufferLedger(),
    cadence: options.cadence,
    aggregator: options.aggregator,
    frameIntervalMs: options.frameIntervalMs,
    logger,
  };

  const app = express();
  const httpServer = createServer(app);

  app.use(TRACKS_MOUNT, express.static(options.tracks.root, { fallthrough: false }));

  app.get("/health", (_req, res) => {
    res.json(healthPayload(options.inference.state));
  });

  const wss = new WebSocketServer({ server: httpServer });

  wss.on("connection", (ws: WebSocket) => {
    const socket: ClientSocket = {
      send: (text) => ws.send(text),
      get isOpen() {
        return ws.readyState === WebSocket.OPEN;
      },
    };
    const handler = handleConnection(socket, deps);

    ws.on("message", (data: RawData, isBinary: boolean) => {
      handler.onMessage(toBuffer(data), isBinary);
    });
    ws.on("close", () => handler.onClose());
    ws.on("error", (err) => {
      logger.error(`WebSocket error for session ${handler.session.id}: ${err.message}`);
      handler.onClose();
    });
  });

  return {
    app,
    httpServer,
    wss,
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          logger.info(`Server listening on port ${port}`);
          resolve();
        });
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        for (const client of wss.clients) {
          client.close();
        }
        wss.close(() => {
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
    },
  };
}
