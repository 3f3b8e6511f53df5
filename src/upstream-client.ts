// Transcript Relay - Upstream Transcription Client
// Owns one Deepgram live connection per connect() call.
//
// Audio goes out through the SDK's ListenLiveClient; Results events are decoded
// into TranscriptEvents and exposed as a lazy async sequence. The sequence ends
// when the connection closes or errors; reconnecting is the caller's decision.

import {
  createClient as createDeepgramClient,
  LiveTranscriptionEvents,
  type DeepgramClient,
  type ListenLiveClient,
  type LiveSchema,
} from "@deepgram/sdk";
import { AuthError, ConnectError, DecodeError, SendError, describeError } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import type { TranscriptEvent } from "./types.js";
import { AsyncQueue } from "./utils/async-queue.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

/** Base URL of the live transcription service; the SDK appends `/v1/listen`. */
export const DEFAULT_UPSTREAM_URL = "wss://api.deepgram.com";

const DEFAULT_KEEPALIVE_INTERVAL_MS = 20_000;
const DEFAULT_KEEPALIVE_TIMEOUT_MS = 20_000;
const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;

/** Audio sent without any reply from the service before further chunks are dropped (~30 s of 16 kHz PCM16). */
const DEFAULT_MAX_PENDING_AUDIO_BYTES = 1_000_000;

/** How long close() waits for the service to finish the stream before disconnecting. */
const CLOSE_TIMEOUT_MS = 1_000;

/**
 * Live connection parameters. Audio is fixed-format: mono, 16-bit linear PCM.
 */
const DEFAULT_LIVE_CONFIG: LiveSchema = {
  model: "nova-2",
  encoding: "linear16",
  sample_rate: 16000,
  channels: 1,
  interim_results: true,
  punctuate: true,
  smart_format: true,
};

/** Service events that count as a reply for the keepalive watchdog. */
const ACTIVITY_EVENTS = [
  LiveTranscriptionEvents.Metadata,
  LiveTranscriptionEvents.UtteranceEnd,
  LiveTranscriptionEvents.SpeechStarted,
  LiveTranscriptionEvents.Unhandled,
];

// ─── Connection contracts ───────────────────────────────────────────────────────

/** A live upstream connection as seen by the Relay Session. */
export interface UpstreamLink {
  readonly isOpen: boolean;
  /** Why the connection ended, once it has. */
  readonly closeReason: string | null;
  /** Forwards raw PCM16 audio. Throws SendError when the connection is not open. */
  send(chunk: Buffer): void;
  /** Decoded transcript events; finishes when the connection closes or errors. */
  events(): AsyncIterable<TranscriptEvent>;
  /** Closes the connection. Never rejects. */
  close(): Promise<void>;
}

/** Opens upstream connections. Throws AuthError or ConnectError. */
export interface UpstreamConnector {
  connect(signal?: AbortSignal): Promise<UpstreamLink>;
}

// ─── Payload decoding ───────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function speakerLabel(words: unknown): string | undefined {
  if (!Array.isArray(words) || words.length === 0) {
    return undefined;
  }
  const first: unknown = words[0];
  if (isRecord(first) && typeof first.speaker === "number") {
    return `Speaker ${first.speaker}`;
  }
  return undefined;
}

/**
 * Decodes one Results payload.
 *
 * The transcript lives at `channel.alternatives[0].transcript`. A result counts as
 * final only when the top-level `is_final` flag is true AND the alternative carries
 * word-level timing (`words`). A payload without that structure decodes to an
 * empty-text event.
 *
 * @throws DecodeError when the payload is not an object.
 */
export function decodeTranscriptEvent(data: unknown): TranscriptEvent {
  if (!isRecord(data)) {
    throw new DecodeError("Upstream payload is not a JSON object");
  }

  const channel = isRecord(data.channel) ? data.channel : {};
  const alternatives = Array.isArray(channel.alternatives) ? channel.alternatives : [];
  const first: unknown = alternatives[0];
  const alternative = isRecord(first) ? first : {};

  const text = typeof alternative.transcript === "string" ? alternative.transcript : "";
  const hasWordTiming = alternative.words !== undefined && alternative.words !== null;
  const isFinal = hasWordTiming && data.is_final === true;
  const speaker = speakerLabel(alternative.words);

  return speaker === undefined ? { text, isFinal } : { text, isFinal, speaker };
}

/** The SDK reports undecodable frames as an Error event wrapping the JSON SyntaxError. */
function isParseFailure(data: unknown): boolean {
  return isRecord(data) && data.error instanceof SyntaxError;
}

function describeSdkError(data: unknown): string {
  if (data instanceof Error) {
    return describeError(data);
  }
  if (isRecord(data) && typeof data.message === "string" && data.message) {
    return data.message;
  }
  return "upstream connection error";
}

function describeClose(data: unknown): string {
  if (isRecord(data) && typeof data.code === "number") {
    const reason = typeof data.reason === "string" ? data.reason : "";
    return reason ? `closed (${data.code}: ${reason})` : `closed (${data.code})`;
  }
  return "closed";
}

// ─── Connection ─────────────────────────────────────────────────────────────────

interface ConnectionOptions {
  keepAliveIntervalMs: number;
  keepAliveTimeoutMs: number;
  maxPendingAudioBytes: number;
  logger: Logger;
}

/**
 * Wraps a ListenLiveClient. Listeners are attached at construction, before the
 * connection opens, so no result that arrives with the handshake is missed.
 *
 * Watchdog: every keepalive interval a KeepAlive message is sent. Once audio has
 * gone out, the service must reply (any event) within the keepalive timeout, or
 * the connection is dropped with reason "keepalive timeout".
 */
export class UpstreamConnection implements UpstreamLink {
  private readonly live: ListenLiveClient;
  private readonly queue = new AsyncQueue<TranscriptEvent>();
  private readonly options: ConnectionOptions;
  private keepAliveTimer: ReturnType<typeof setInterval> | null = null;
  private awaitingReplySince: number | null = null;
  private pendingAudioBytes = 0;
  private droppingAudio = false;
  private ended = false;
  private endWaiters: Array<() => void> = [];
  private _closeReason: string | null = null;

  constructor(live: ListenLiveClient, options: ConnectionOptions) {
    this.live = live;
    this.options = options;

    live.on(LiveTranscriptionEvents.Open, () => {
      // Opened after the relay gave up on it
      if (this.ended) {
        this.disconnect();
      }
    });

    live.on(LiveTranscriptionEvents.Transcript, (data: unknown) => {
      this.markActivity();
      this.handleTranscript(data);
    });

    for (const event of ACTIVITY_EVENTS) {
      live.on(event, () => this.markActivity());
    }

    live.on(LiveTranscriptionEvents.Error, (data: unknown) => {
      if (isParseFailure(data)) {
        // Malformed payloads are dropped, never surfaced
        this.options.logger.debug(`Dropped upstream payload: ${describeSdkError(data)}`);
        return;
      }
      const reason = describeSdkError(data);
      this._closeReason ??= reason;
      this.options.logger.warn(`Upstream connection error: ${reason}`);
      this.finish();
    });

    live.on(LiveTranscriptionEvents.Close, (data: unknown) => {
      this._closeReason ??= describeClose(data);
      this.finish();
    });
  }

  get isOpen(): boolean {
    return !this.ended && this.live.isConnected();
  }

  get closeReason(): string | null {
    return this._closeReason;
  }

  /**
   * Resolves once the connection opens. Rejects with ConnectError when the
   * handshake fails, times out, or `signal` aborts first; the connection is
   * dropped in every case.
   */
  waitForOpen(signal: AbortSignal | undefined, timeoutMs: number): Promise<void> {
    if (this.live.isConnected()) {
      this.startKeepAlive();
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const settle = (failure: ConnectError | null) => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        this.live.removeListener(LiveTranscriptionEvents.Open, onOpen);
        this.live.removeListener(LiveTranscriptionEvents.Error, onError);
        this.live.removeListener(LiveTranscriptionEvents.Close, onClose);
        if (failure) {
          this._closeReason ??= failure.message;
          this.disconnect();
          this.finish();
          reject(failure);
        } else {
          this.startKeepAlive();
          resolve();
        }
      };
      const onOpen = () => settle(null);
      const onError = (data: unknown) => {
        if (!isParseFailure(data)) {
          settle(new ConnectError(`Upstream connect failed: ${describeSdkError(data)}`));
        }
      };
      const onClose = (data: unknown) => {
        settle(new ConnectError(`Upstream ${describeClose(data)} during handshake`));
      };
      const onAbort = () => settle(new ConnectError("Upstream connect aborted"));

      const timer = setTimeout(() => {
        settle(new ConnectError(`Upstream connect timed out after ${timeoutMs}ms`));
      }, timeoutMs);
      if (signal?.aborted) {
        onAbort();
        return;
      }
      this.live.on(LiveTranscriptionEvents.Open, onOpen);
      this.live.on(LiveTranscriptionEvents.Error, onError);
      this.live.on(LiveTranscriptionEvents.Close, onClose);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  /**
   * Chunks beyond `maxPendingAudioBytes` of unanswered audio are dropped until the
   * service replies again.
   */
  send(chunk: Buffer): void {
    if (!this.isOpen) {
      throw new SendError("Upstream connection is not open");
    }
    if (this.pendingAudioBytes + chunk.length > this.options.maxPendingAudioBytes) {
      if (!this.droppingAudio) {
        this.droppingAudio = true;
        this.options.logger.warn(
          `Upstream has not replied to ${this.pendingAudioBytes} bytes of audio, dropping audio until it does`,
        );
      }
      return;
    }
    try {
      // Convert Buffer to ArrayBuffer for the SDK's SocketDataLike type
      this.live.send(chunk.buffer.slice(chunk.byteOffset, chunk.byteOffset + chunk.byteLength));
    } catch (err) {
      throw new SendError(`Upstream audio send failed: ${describeError(err)}`, { cause: err });
    }
    this.pendingAudioBytes += chunk.length;
    this.awaitingReplySince ??= Date.now();
  }

  events(): AsyncIterable<TranscriptEvent> {
    return this.queue;
  }

  async close(): Promise<void> {
    this._closeReason ??= "closed by relay";
    if (this.ended) {
      return;
    }
    this.stopKeepAlive();
    if (!this.live.isConnected()) {
      this.disconnect();
      this.finish();
      return;
    }

    const ended = new Promise<void>((resolve) => this.endWaiters.push(resolve));
    const timer = setTimeout(() => {
      this.disconnect();
      this.finish();
    }, CLOSE_TIMEOUT_MS);
    try {
      // Ask the service to flush pending results and close the stream
      this.live.requestClose();
    } catch (err) {
      this.options.logger.debug(`Upstream close request failed: ${describeError(err)}`);
      this.disconnect();
      this.finish();
    }
    await ended;
    clearTimeout(timer);
  }

  private handleTranscript(data: unknown): void {
    try {
      this.queue.push(decodeTranscriptEvent(data));
    } catch (err) {
      this.options.logger.debug(`Dropped upstream payload: ${describeError(err)}`);
    }
  }

  private markActivity(): void {
    this.awaitingReplySince = null;
    this.pendingAudioBytes = 0;
    if (this.droppingAudio) {
      this.droppingAudio = false;
      this.options.logger.info("Upstream replied, forwarding audio again");
    }
  }

  private disconnect(): void {
    try {
      this.live.disconnect();
    } catch (err) {
      this.options.logger.debug(`Upstream disconnect failed: ${describeError(err)}`);
    }
  }

  private finish(): void {
    if (this.ended) {
      return;
    }
    this.ended = true;
    this.stopKeepAlive();
    this.queue.end();
    for (const resolve of this.endWaiters.splice(0)) {
      resolve();
    }
  }

  private startKeepAlive(): void {
    if (this.keepAliveTimer !== null || this.ended) {
      return;
    }
    this.keepAliveTimer = setInterval(() => {
      const since = this.awaitingReplySince;
      if (since !== null && Date.now() - since >= this.options.keepAliveTimeoutMs) {
        this._closeReason ??= "keepalive timeout";
        this.options.logger.warn("Upstream keepalive timed out, dropping connection");
        this.disconnect();
        this.finish();
        return;
      }
      if (this.live.isConnected()) {
        try {
          this.live.keepAlive();
        } catch (err) {
          this.options.logger.debug(`Upstream keepalive failed: ${describeError(err)}`);
        }
      }
    }, this.options.keepAliveIntervalMs);
    this.keepAliveTimer.unref();
  }

  private stopKeepAlive(): void {
    if (this.keepAliveTimer !== null) {
      clearInterval(this.keepAliveTimer);
      this.keepAliveTimer = null;
    }
  }
}

// ─── Client ─────────────────────────────────────────────────────────────────────

export interface UpstreamClientOptions {
  /** Service credential. Empty means connect() fails with AuthError. */
  apiKey: string;
  /** Base URL of the live service. */
  url?: string;
  model?: string;
  sampleRate?: number;
  diarize?: boolean;
  keepAliveIntervalMs?: number;
  keepAliveTimeoutMs?: number;
  connectTimeoutMs?: number;
  maxPendingAudioBytes?: number;
  logger?: Logger;
}

/**
 * Opens authenticated live-transcription connections. One instance belongs to one
 * Relay Session; each connect() yields a fresh connection.
 */
export class UpstreamTranscriptionClient implements UpstreamConnector {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly liveConfig: LiveSchema;
  private readonly connectionOptions: ConnectionOptions;
  private readonly connectTimeoutMs: number;
  private readonly logger: Logger;
  private deepgram: DeepgramClient | null = null;

  constructor(options: UpstreamClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.url ?? DEFAULT_UPSTREAM_URL;
    this.liveConfig = {
      ...DEFAULT_LIVE_CONFIG,
      ...(options.model ? { model: options.model } : {}),
      ...(options.sampleRate ? { sample_rate: options.sampleRate } : {}),
      ...(options.diarize ? { diarize: true } : {}),
    };
    this.logger = options.logger ?? createConsoleLogger("Upstream");
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.connectionOptions = {
      keepAliveIntervalMs: options.keepAliveIntervalMs ?? DEFAULT_KEEPALIVE_INTERVAL_MS,
      keepAliveTimeoutMs: options.keepAliveTimeoutMs ?? DEFAULT_KEEPALIVE_TIMEOUT_MS,
      maxPendingAudioBytes: options.maxPendingAudioBytes ?? DEFAULT_MAX_PENDING_AUDIO_BYTES,
      logger: this.logger,
    };
  }

  async connect(signal?: AbortSignal): Promise<UpstreamLink> {
    if (!this.apiKey) {
      throw new AuthError();
    }
    if (signal?.aborted) {
      throw new ConnectError("Upstream connect aborted");
    }

    let live: ListenLiveClient;
    try {
      live = this.client().listen.live(this.liveConfig);
    } catch (err) {
      throw new ConnectError(`Upstream connect failed: ${describeError(err)}`, { cause: err });
    }

    const connection = new UpstreamConnection(live, this.connectionOptions);
    await connection.waitForOpen(signal, this.connectTimeoutMs);
    this.logger.debug("Upstream connection open");
    return connection;
  }

  private client(): DeepgramClient {
    this.deepgram ??= createDeepgramClient(this.apiKey, {
      global: { websocket: { options: { url: this.baseUrl } } },
    });
    return this.deepgram;
  }
}
