// Transcript Relay - Entry point
// Wires up the relay core and its collaborators and starts the server.

import "dotenv/config";
import OpenAI from "openai";
import { loadConfig, type AppConfig } from "./config.js";
import { describeError } from "./errors.js";
import { createConsoleLogger } from "./logger.js";
import { createAppServer } from "./server.js";
import { SessionLifecycleManager } from "./session-lifecycle.js";
import { SessionStore } from "./session-store.js";
import { OpenAISummarizer, SessionSummarizer, openAIChatPort } from "./summarizer.js";
import { UpstreamTranscriptionClient } from "./upstream-client.js";

export const APP_NAME = "Transcript Relay";
export const APP_VERSION = "0.1.0";

const log = createConsoleLogger("Init");

// ─── Configuration ──────────────────────────────────────────────────────────────

let config: AppConfig;
try {
  config = loadConfig();
} catch (err) {
  log.error(describeError(err));
  process.exit(1);
}

if (!config.upstream.apiKey) {
  log.warn("DEEPGRAM_API_KEY is not set. Every transcription session will report missing_upstream_credential.");
}

// ─── Collaborators ──────────────────────────────────────────────────────────────

const store = new SessionStore();

const upstreamLogger = createConsoleLogger("Upstream");
const lifecycle = new SessionLifecycleManager({
  store,
  upstreamFactory: () =>
    new UpstreamTranscriptionClient({
      apiKey: config.upstream.apiKey,
      url: config.upstream.url,
      model: config.upstream.model,
      sampleRate: config.upstream.sampleRate,
      diarize: config.upstream.diarize,
      logger: upstreamLogger,
    }),
  logger: createConsoleLogger("Relay"),
});

const summarizer = new SessionSummarizer({
  store,
  external: config.summarizer.apiKey
    ? new OpenAISummarizer(openAIChatPort(new OpenAI({ apiKey: config.summarizer.apiKey })), config.summarizer.model)
    : null,
});
log.info(
  summarizer.hasExternal
    ? `Summarizer: OpenAI (${config.summarizer.model}) with local fallback`
    : "Summarizer: local bullet heuristic (OPENAI_API_KEY not set)",
);

// ─── Start server ───────────────────────────────────────────────────────────────

const server = createAppServer({ store, lifecycle, summarizer, corsOrigin: config.corsOrigin });

server
  .listen(config.port)
  .then(() => {
    log.info(`${APP_NAME} v${APP_VERSION} running at http://localhost:${config.port}`);
    log.info(`Transcription socket: ws://localhost:${config.port}/ws/transcribe/<sessionId>`);
  })
  .catch((err: unknown) => {
    log.error(`Failed to start server: ${describeError(err)}`);
    process.exit(1);
  });

const shutdown = (signal: string) => {
  log.info(`${signal} received, shutting down`);
  server
    .close()
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      log.error(`Shutdown failed: ${describeError(err)}`);
      process.exit(1);
    });
};

process.once("SIGINT", () => shutdown("SIGINT"));
process.once("SIGTERM", () => shutdown("SIGTERM"));
