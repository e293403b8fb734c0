// Emotion Cadence - Entry point

import "dotenv/config";
import { loadConfig, type AppConfig } from "./config.js";
import { APP_NAME, APP_VERSION, bootstrap } from "./index.js";
import { errorMessage } from "./logger.js";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

let config: AppConfig;
try {
  config = loadConfig(process.env);
} catch (err) {
  logFatal(`Invalid configuration: ${errorMessage(err)}. Check your .env file.`);
  process.exit(1);
}

logInit("Configuration loaded");

bootstrap(config)
  .then((app) => {
    logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${config.port}`);
    logInit("Pipeline: frames → face regions → preprocess → inference → window vote → playback");
    logInit("Ready for connections");

    const shutdown = (signal: string) => {
      logInit(`${signal} received, shutting down`);
      app
        .shutdown()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logFatal(`Shutdown failed: ${errorMessage(err)}`);
          process.exit(1);
        });
    };
    process.once("SIGINT", () => shutdown("SIGINT"));
    process.once("SIGTERM", () => shutdown("SIGTERM"));
  })
  .catch((err: unknown) => {
    logFatal(`Startup failed: ${errorMessage(err)}`);
    process.exit(1);
  });
