// Transcript Relay - HTTP and WebSocket server
//
// Routes:
//   GET  /health                          liveness
//   POST /summarize                       session summary
//   GET  /sessions/:sessionId/transcript  stored transcript snapshot
//   WS   /ws/transcribe/:sessionId        live audio in, transcripts out

import cors from "cors";
import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { createServer, type IncomingMessage, type Server as HttpServer } from "node:http";
import type { Duplex } from "node:stream";
import { WebSocketServer, type WebSocket } from "ws";
import { z } from "zod";
import { WebSocketClientChannel } from "./client-channel.js";
import { describeError } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { toClientEvent } from "./relay-session.js";
import type { SessionLifecycleManager } from "./session-lifecycle.js";
import type { SessionStore } from "./session-store.js";
import type { SessionSummarizer } from "./summarizer.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

const TRANSCRIBE_PATH = /^\/ws\/transcribe\/([^/]+)\/?$/;

/** `sessionId`, or the legacy `session_id` key. */
const summarizeRequestSchema = z
  .object({
    sessionId: z.string().min(1).optional(),
    session_id: z.string().min(1).optional(),
  })
  .transform((body) => body.sessionId ?? body.session_id)
  .pipe(z.string({ required_error: "sessionId is required" }));

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  store: SessionStore;
  lifecycle: SessionLifecycleManager;
  summarizer: SessionSummarizer;
  /** Allowed CORS origin. Defaults to any origin. */
  corsOrigin?: string;
  logger?: Logger;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  /** Start listening on the given port. Returns a promise that resolves when listening. */
  listen(port: number): Promise<void>;
  /** Terminate live sessions, then close the WebSocket and HTTP servers. */
  close(): Promise<void>;
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const { store, lifecycle, summarizer, corsOrigin = "*", logger = createConsoleLogger("Server") } = options;

  const app = express();
  const httpServer = createServer(app);

  app.use(cors({ origin: corsOrigin }));
  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.post("/summarize", (req: Request, res: Response, next: NextFunction) => {
    const parsed = summarizeRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: "invalid_request",
        detail: parsed.error.issues.map((issue) => issue.message).join("; "),
      });
      return;
    }
    summarizer
      .summarizeSession(parsed.data)
      .then((result) => {
        res.json(result);
      })
      .catch(next);
  });

  app.get("/sessions/:sessionId/transcript", (req: Request, res: Response) => {
    const { sessionId } = req.params;
    res.json({ sessionId, messages: store.readAll(sessionId).map(toClientEvent) });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: "invalid_request", detail: "Malformed JSON body" });
      return;
    }
    const status = clientErrorStatus(err);
    if (status !== null) {
      res.status(status).json({ error: "invalid_request", detail: err instanceof Error ? err.message : String(err) });
      return;
    }
    logger.error(`Unhandled request error: ${describeError(err)}`);
    res.status(500).json({ error: "internal_error" });
  });

  // WebSocket server shares the HTTP server; upgrades are routed by path
  const wss = new WebSocketServer({ noServer: true });

  httpServer.on("upgrade", (req: IncomingMessage, socket: Duplex, head: Buffer) => {
    const sessionId = matchTranscribePath(req.url);
    if (sessionId === null) {
      socket.write("HTTP/1.1 404 Not Found\r\nConnection: close\r\n\r\n");
      socket.destroy();
      return;
    }
    wss.handleUpgrade(req, socket, head, (ws: WebSocket) => {
      wss.emit("connection", ws, req);
      logger.info(`WebSocket connected for session ${sessionId}`);
      lifecycle.accept(sessionId, new WebSocketClientChannel(ws)).then(
        () => logger.info(`WebSocket closed for session ${sessionId}`),
        (err: unknown) => logger.error(`Session ${sessionId} ended with error: ${describeError(err)}`),
      );
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
          httpServer.off("error", reject);
          logger.info(`Server listening on port ${port}`);
          resolve();
        });
      });
    },
    async close(): Promise<void> {
      await lifecycle.shutdown();
      await new Promise<void>((resolve, reject) => {
        for (const client of wss.clients) {
          client.terminate();
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

/** The 4xx status carried by a request-level error (body-parser sets `status`), or null. */
function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== "object" || err === null) {
    return null;
  }
  const status = "status" in err ? err.status : "statusCode" in err ? err.statusCode : undefined;
  if (typeof status === "number" && status >= 400 && status < 500) {
    return status;
  }
  return null;
}

/** Extracts the session identifier from `/ws/transcribe/:sessionId`, or null for any other path. */
export function matchTranscribePath(url: string | undefined): string | null {
  if (!url) {
    return null;
  }
  const pathname = url.split("?")[0];
  const match = TRANSCRIBE_PATH.exec(pathname);
  if (!match) {
    return null;
  }
  try {
    const sessionId = decodeURIComponent(match[1]);
    return sessionId.length > 0 ? sessionId : null;
  } catch {
    return null;
  }
}
