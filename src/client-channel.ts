// Transcript Relay - Client channel
// The Relay Session's view of the browser connection.

import WebSocket from "ws";
import { ReceiveError } from "./errors.js";
import type { ClientFrame, ServerMessage } from "./types.js";
import { AsyncQueue } from "./utils/async-queue.js";

export interface ClientChannel {
  readonly isOpen: boolean;
  /** Sends a JSON event. A no-op once the channel is closed. */
  send(message: ServerMessage): void;
  /** Inbound frames in arrival order; ends on disconnect, throws ReceiveError on a socket error. */
  frames(): AsyncIterable<ClientFrame>;
  close(): void;
}

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  return Buffer.from(data);
}

/**
 * Adapts a server-side `ws` socket to a ClientChannel. Frames are buffered from the
 * moment the channel is created, so audio sent right after the upgrade is kept.
 */
export class WebSocketClientChannel implements ClientChannel {
  private readonly ws: WebSocket;
  private readonly queue = new AsyncQueue<ClientFrame>();

  constructor(ws: WebSocket) {
    this.ws = ws;

    ws.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
      const buffer = toBuffer(data);
      if (isBinary) {
        this.queue.push({ kind: "audio", data: buffer });
      } else {
        this.queue.push({ kind: "text", text: buffer.toString("utf-8") });
      }
    });

    ws.on("close", () => {
      this.queue.end();
    });

    ws.on("error", (err: Error) => {
      this.queue.fail(new ReceiveError(`Client socket error: ${err.message}`, { cause: err }));
    });
  }

  get isOpen(): boolean {
    return this.ws.readyState === WebSocket.OPEN;
  }

  send(message: ServerMessage): void {
    if (this.ws.readyState === WebSocket.OPEN) {
      this.ws.send(JSON.stringify(message));
    }
  }

  frames(): AsyncIterable<ClientFrame> {
    return this.queue;
  }

  close(): void {
    this.queue.end();
    if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.close();
    }
  }
}
