import { describe, it, expect, afterEach, vi } from "vitest";
import type { IncomingMessage } from "node:http";
import { WebSocketServer, type RawData, type WebSocket } from "ws";
import { UpstreamTranscriptionClient, decodeTranscriptEvent, type UpstreamLink } from "./upstream-client.js";
import { AuthError, ConnectError, DecodeError, SendError } from "./errors.js";
import type { TranscriptEvent } from "./types.js";
import { createSilentLogger } from "./testing/fakes.js";

// ─── Test Helpers ───────────────────────────────────────────────────────────────

/** Builds a payload shaped like a live transcription result. */
function resultPayload(options: { transcript: string; is_final?: boolean; words?: unknown }): Record<string, unknown> {
  return {
    type: "Results",
    is_final: options.is_final ?? false,
    channel: {
      alternatives: [
        {
          transcript: options.transcript,
          confidence: 0.9,
          ...(options.words === undefined ? {} : { words: options.words }),
        },
      ],
    },
  };
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

const WORDS = [{ word: "hello", start: 0.1, end: 0.4, confidence: 0.9 }];

interface UpstreamSocket {
  socket: WebSocket;
  request: IncomingMessage;
  /** Binary frames received, in order. */
  audio: Buffer[];
  /** Text control messages received, in order. */
  control: string[];
}

interface FakeUpstream {
  server: WebSocketServer;
  url: string;
  /** Resolves with the next accepted socket. */
  nextConnection(): Promise<UpstreamSocket>;
}

/**
 * Stand-in for the live transcription service. Closes a stream with 1000 when
 * asked to finish it, the way the service does once pending results are flushed.
 */
async function startFakeUpstream(options: { reject?: boolean } = {}): Promise<FakeUpstream> {
  const server = new WebSocketServer({
    port: 0,
    verifyClient: () => !options.reject,
  });
  await new Promise<void>((resolve) => server.once("listening", () => resolve()));
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Unexpected server address format");
  }
  const { port } = address;

  const pending: UpstreamSocket[] = [];
  const waiters: Array<(conn: UpstreamSocket) => void> = [];
  server.on("connection", (socket, request) => {
    const conn: UpstreamSocket = { socket, request, audio: [], control: [] };
    socket.on("message", (data, isBinary) => {
      if (isBinary) {
        conn.audio.push(toBuffer(data));
        return;
      }
      const text = toBuffer(data).toString("utf8");
      conn.control.push(text);
      if (text === JSON.stringify({ type: "CloseStream" })) {
        socket.close(1000, "stream finished");
      }
    });
    const waiter = waiters.shift();
    if (waiter) waiter(conn);
    else pending.push(conn);
  });

  return {
    server,
    url: `ws://127.0.0.1:${port}`,
    nextConnection() {
      const ready = pending.shift();
      if (ready) return Promise.resolve(ready);
      return new Promise((resolve) => waiters.push(resolve));
    },
  };
}

async function collect(link: UpstreamLink): Promise<TranscriptEvent[]> {
  const events: TranscriptEvent[] = [];
  for await (const event of link.events()) {
    events.push(event);
  }
  return events;
}

function queryOf(request: IncomingMessage): URLSearchParams {
  return new URL(request.url ?? "", "ws://localhost").searchParams;
}

// ─── decodeTranscriptEvent ──────────────────────────────────────────────────────

describe("decodeTranscriptEvent", () => {
  it("decodes a final result with word timing", () => {
    const event = decodeTranscriptEvent(resultPayload({ transcript: "hello", is_final: true, words: WORDS }));
    expect(event).toEqual({ text: "hello", isFinal: true });
  });

  it("is not final without word timing even when flagged final", () => {
    const event = decodeTranscriptEvent(resultPayload({ transcript: "hello", is_final: true }));
    expect(event).toEqual({ text: "hello", isFinal: false });
  });

  it("is not final when words are null", () => {
    const event = decodeTranscriptEvent(resultPayload({ transcript: "hello", is_final: true, words: null }));
    expect(event).toEqual({ text: "hello", isFinal: false });
  });

  it("treats an empty words list as word timing", () => {
    const event = decodeTranscriptEvent(resultPayload({ transcript: "hello", is_final: true, words: [] }));
    expect(event).toEqual({ text: "hello", isFinal: true });
  });

  it("is interim when the final flag is false", () => {
    const event = decodeTranscriptEvent(resultPayload({ transcript: "hel", is_final: false, words: WORDS }));
    expect(event).toEqual({ text: "hel", isFinal: false });
  });

  it("decodes payloads without a channel to empty text", () => {
    expect(decodeTranscriptEvent({ type: "Results", request_id: "r-1" })).toEqual({ text: "", isFinal: false });
  });

  it("decodes an empty alternatives list to empty text", () => {
    expect(decodeTranscriptEvent({ is_final: true, channel: { alternatives: [] } })).toEqual({
      text: "",
      isFinal: false,
    });
  });

  it("labels the speaker of the first word when diarized", () => {
    const words = [
      { word: "good", start: 0, end: 0.2, speaker: 1 },
      { word: "morning", start: 0.2, end: 0.5, speaker: 1 },
    ];
    const event = decodeTranscriptEvent(resultPayload({ transcript: "good morning", is_final: true, words }));
    expect(event).toEqual({ text: "good morning", isFinal: true, speaker: "Speaker 1" });
  });

  it("throws DecodeError for payloads that are not objects", () => {
    expect(() => decodeTranscriptEvent("not json")).toThrow(DecodeError);
    expect(() => decodeTranscriptEvent([1, 2])).toThrow(DecodeError);
    expect(() => decodeTranscriptEvent(null)).toThrow(DecodeError);
  });
});

// ─── Connecting ─────────────────────────────────────────────────────────────────

describe("UpstreamTranscriptionClient.connect", () => {
  let upstream: FakeUpstream | null = null;
  const links: UpstreamLink[] = [];

  afterEach(async () => {
    await Promise.all(links.splice(0).map((link) => link.close()));
    if (upstream) {
      const { server } = upstream;
      for (const socket of server.clients) socket.terminate();
      await new Promise<void>((resolve) => server.close(() => resolve()));
      upstream = null;
    }
  });

  async function connect(
    options: {
      model?: string;
      sampleRate?: number;
      diarize?: boolean;
      keepAliveIntervalMs?: number;
      keepAliveTimeoutMs?: number;
      maxPendingAudioBytes?: number;
      logger?: ReturnType<typeof createSilentLogger>;
    } = {},
  ) {
    if (!upstream) throw new Error("fake upstream not started");
    const client = new UpstreamTranscriptionClient({
      apiKey: "test-key",
      url: upstream.url,
      logger: createSilentLogger(),
      ...options,
    });
    const link = await client.connect();
    links.push(link);
    return link;
  }

  it("fails with AuthError when no credential is configured", async () => {
    const client = new UpstreamTranscriptionClient({ apiKey: "", logger: createSilentLogger() });
    await expect(client.connect()).rejects.toBeInstanceOf(AuthError);
  });

  it("authenticates with the credential and requests mono linear16 audio", async () => {
    upstream = await startFakeUpstream();
    const accepted = upstream.nextConnection();
    const link = await connect();
    const { request } = await accepted;

    expect(link.isOpen).toBe(true);
    expect(request.headers.authorization).toBe("Token test-key");
    expect(new URL(request.url ?? "", "ws://localhost").pathname).toBe("/v1/listen");
    const params = queryOf(request);
    expect(params.get("encoding")).toBe("linear16");
    expect(params.get("sample_rate")).toBe("16000");
    expect(params.get("channels")).toBe("1");
    expect(params.get("interim_results")).toBe("true");
    expect(params.get("model")).toBe("nova-2");
    expect(params.has("diarize")).toBe(false);
  });

  it("applies model, sample rate and diarization overrides", async () => {
    upstream = await startFakeUpstream();
    const accepted = upstream.nextConnection();
    await connect({ model: "nova-3", sampleRate: 48000, diarize: true });
    const params = queryOf((await accepted).request);

    expect(params.get("model")).toBe("nova-3");
    expect(params.get("sample_rate")).toBe("48000");
    expect(params.get("diarize")).toBe("true");
  });

  it("fails with ConnectError when the service rejects the handshake", async () => {
    upstream = await startFakeUpstream({ reject: true });
    const client = new UpstreamTranscriptionClient({
      apiKey: "test-key",
      url: upstream.url,
      logger: createSilentLogger(),
    });

    await expect(client.connect()).rejects.toBeInstanceOf(ConnectError);
  });

  it("fails with ConnectError when aborted", async () => {
    upstream = await startFakeUpstream();
    const client = new UpstreamTranscriptionClient({
      apiKey: "test-key",
      url: upstream.url,
      logger: createSilentLogger(),
    });
    const controller = new AbortController();
    controller.abort();

    await expect(client.connect(controller.signal)).rejects.toThrow("Upstream connect aborted");
  });

  it("forwards audio as binary frames", async () => {
    upstream = await startFakeUpstream();
    const accepted = upstream.nextConnection();
    const link = await connect();
    const conn = await accepted;

    link.send(Buffer.from([1, 2, 3, 4]));

    await vi.waitFor(() => expect(conn.audio).toEqual([Buffer.from([1, 2, 3, 4])]));
  });

  it("decodes results, drops unparseable payloads, and ends when the service closes", async () => {
    upstream = await startFakeUpstream();
    const accepted = upstream.nextConnection();
    const link = await connect();
    const { socket } = await accepted;

    socket.send("not json");
    socket.send(JSON.stringify(resultPayload({ transcript: "hello", is_final: true, words: WORDS })));
    socket.send(JSON.stringify({ type: "Metadata", request_id: "r-1" }));
    socket.close(1000, "done");

    expect(await collect(link)).toEqual([{ text: "hello", isFinal: true }]);
    expect(link.isOpen).toBe(false);
    expect(link.closeReason).toBe("closed (1000: done)");
  });

  it("asks the service to finish the stream on close", async () => {
    upstream = await startFakeUpstream();
    const accepted = upstream.nextConnection();
    const link = await connect();
    const conn = await accepted;

    await link.close();

    expect(conn.control).toContain(JSON.stringify({ type: "CloseStream" }));
    expect(link.isOpen).toBe(false);
    expect(link.closeReason).toBe("closed by relay");
    expect(await collect(link)).toEqual([]);
  });

  it("throws SendError once the connection is closed", async () => {
    upstream = await startFakeUpstream();
    const link = await connect();
    await link.close();

    expect(() => link.send(Buffer.from([0, 0]))).toThrow(SendError);
  });

  it("sends keepalive messages while the stream is idle", async () => {
    upstream = await startFakeUpstream();
    const accepted = upstream.nextConnection();
    const link = await connect({ keepAliveIntervalMs: 20, keepAliveTimeoutMs: 1_000 });
    const conn = await accepted;

    await vi.waitFor(() => expect(conn.control).toContain(JSON.stringify({ type: "KeepAlive" })));
    expect(link.isOpen).toBe(true);
  });

  it("ends the event sequence when the service stops replying to audio", async () => {
    upstream = await startFakeUpstream();
    const link = await connect({ keepAliveIntervalMs: 20, keepAliveTimeoutMs: 20 });

    link.send(Buffer.from([1, 2]));

    expect(await collect(link)).toEqual([]);
    expect(link.closeReason).toBe("keepalive timeout");
  });

  it("drops audio past the unanswered-audio cap until the service replies", async () => {
    upstream = await startFakeUpstream();
    const accepted = upstream.nextConnection();
    const logger = createSilentLogger();
    const link = await connect({ maxPendingAudioBytes: 4, logger });
    const conn = await accepted;
    const events = link.events()[Symbol.asyncIterator]();

    link.send(Buffer.from([1, 2, 3, 4]));
    link.send(Buffer.from([5, 6]));
    link.send(Buffer.from([7, 8]));

    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      "Upstream has not replied to 4 bytes of audio, dropping audio until it does",
    );

    conn.socket.send(JSON.stringify(resultPayload({ transcript: "one", is_final: false })));
    expect(await events.next()).toEqual({ value: { text: "one", isFinal: false }, done: false });

    link.send(Buffer.from([9, 9]));

    await vi.waitFor(() => expect(conn.audio).toEqual([Buffer.from([1, 2, 3, 4]), Buffer.from([9, 9])]));
  });
});
