// Transcript Relay - Relay Session
// Pairs one browser connection with one upstream transcription connection.
//
// Two pumps run concurrently on the event loop:
//   - receiver: upstream transcript events → Session Store + client
//   - sender:   client audio frames → upstream
// Whichever pump finishes first ends the session; the other is cancelled and both
// connections are closed.
//
// State machine:
//   INITIALIZING → CONNECTING → ACTIVE ⇄ RECONNECTING
//   any state → TERMINATED (terminal)

import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import type { ClientChannel } from "./client-channel.js";
import { AuthError, describeError } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import type { SessionStore } from "./session-store.js";
import {
  RelayState,
  type ServerMessage,
  type TranscriptEvent,
  type TranscriptMessage,
  type TranscriptUpdateMessage,
} from "./types.js";
import type { UpstreamConnector, UpstreamLink } from "./upstream-client.js";
import { delay } from "./utils/delay.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

/** Wait after the upstream transcript stream ends before reconnecting. */
const DEFAULT_BACKOFF_MS = 2000;

/** Wait between failed reconnect attempts. Retries are unbounded at this fixed delay. */
const DEFAULT_RETRY_DELAY_MS = 1000;

const VALID_TRANSITIONS: ReadonlyMap<RelayState, readonly RelayState[]> = new Map([
  [RelayState.INITIALIZING, [RelayState.CONNECTING, RelayState.TERMINATED]],
  [RelayState.CONNECTING, [RelayState.ACTIVE, RelayState.RECONNECTING, RelayState.TERMINATED]],
  [RelayState.ACTIVE, [RelayState.RECONNECTING, RelayState.TERMINATED]],
  [RelayState.RECONNECTING, [RelayState.ACTIVE, RelayState.TERMINATED]],
  [RelayState.TERMINATED, []],
]);

/** Legacy text frame: `{"audio": "<base64 PCM16>"}`. */
const legacyAudioFrameSchema = z.object({
  audio: z.string().min(1),
});

type ConnectOutcome = "connected" | "failed" | "fatal" | "cancelled";

// ─── Upstream slot ──────────────────────────────────────────────────────────────

/**
 * Holds the session's single live upstream connection. Only the receiver pump
 * installs or releases; the sender pump only reads. Sealing at teardown hands the
 * last connection to the closer and rejects any later install.
 */
class UpstreamSlot {
  private current: UpstreamLink | null = null;
  private sealed = false;

  get link(): UpstreamLink | null {
    return this.current;
  }

  install(link: UpstreamLink): boolean {
    if (this.sealed || this.current !== null) {
      return false;
    }
    this.current = link;
    return true;
  }

  release(): UpstreamLink | null {
    const link = this.current;
    this.current = null;
    return link;
  }

  seal(): UpstreamLink | null {
    this.sealed = true;
    return this.release();
  }
}

// ─── Relay Session ──────────────────────────────────────────────────────────────

export interface RelaySessionOptions {
  sessionId: string;
  client: ClientChannel;
  upstream: UpstreamConnector;
  store: SessionStore;
  logger?: Logger;
  /** Identifies this connection in logs. Generated when omitted. */
  connectionId?: string;
  backoffMs?: number;
  retryDelayMs?: number;
  onStateChange?: (state: RelayState, previous: RelayState) => void;
}

export function toClientEvent(message: TranscriptMessage): TranscriptUpdateMessage {
  return message.speaker === undefined
    ? { transcript: message.text, is_final: message.isFinal }
    : { transcript: message.text, is_final: message.isFinal, speaker: message.speaker };
}

export class RelaySession {
  readonly sessionId: string;
  readonly connectionId: string;
  private readonly client: ClientChannel;
  private readonly connector: UpstreamConnector;
  private readonly store: SessionStore;
  private readonly logger: Logger;
  private readonly backoffMs: number;
  private readonly retryDelayMs: number;
  private readonly onStateChange: RelaySessionOptions["onStateChange"];

  private readonly upstream = new UpstreamSlot();
  private readonly abort = new AbortController();
  private _state = RelayState.INITIALIZING;
  private started = false;
  private terminated = false;
  private closing: Promise<void> | null = null;
  private readonly _closeFailures: string[] = [];

  constructor(options: RelaySessionOptions) {
    this.sessionId = options.sessionId;
    this.connectionId = options.connectionId ?? uuidv4();
    this.client = options.client;
    this.connector = options.upstream;
    this.store = options.store;
    this.logger = options.logger ?? createConsoleLogger("RelaySession");
    this.backoffMs = options.backoffMs ?? DEFAULT_BACKOFF_MS;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.onStateChange = options.onStateChange;
  }

  get state(): RelayState {
    return this._state;
  }

  get isTerminated(): boolean {
    return this.terminated;
  }

  /** Failures recorded while closing connections at teardown. */
  get closeFailures(): readonly string[] {
    return this._closeFailures;
  }

  /**
   * Runs the session until either pump finishes, then tears down.
   * Resolves after both connections have been closed.
   */
  async run(): Promise<void> {
    if (this.started) {
      throw new Error("RelaySession.run() may only be called once");
    }
    this.started = true;
    if (this.terminated) {
      return;
    }

    if (this.store.ensure(this.sessionId)) {
      this.logger.info(`Registered session ${this.sessionId} (${this.store.sessionCount} stored)`);
    }
    this.client.send({ status: "connecting_upstream" });

    const receiver = this.runReceiver();
    const sender = this.runSender();
    try {
      await Promise.race([receiver, sender]);
    } finally {
      await this.terminate();
      await Promise.allSettled([receiver, sender]);
      this.logger.info(`Session ${this.sessionId} terminated (connection ${this.connectionId})`);
    }
  }

  /**
   * Enters TERMINATED: no further sends or receives, in-flight waits are cancelled
   * and both connections are closed. Idempotent; resolves when closing is done.
   */
  terminate(): Promise<void> {
    if (!this.closing) {
      this.terminated = true;
      this.abort.abort();
      this.transition(RelayState.TERMINATED);
      this.closing = this.closeConnections();
    }
    return this.closing;
  }

  // ── Receiver pump ─────────────────────────────────────────────────────────────

  private async runReceiver(): Promise<void> {
    this.transition(RelayState.CONNECTING);
    let outcome = await this.connectUpstream();

    while (!this.terminated) {
      if (outcome === "fatal" || outcome === "cancelled") {
        return;
      }

      if (outcome === "failed") {
        this.transition(RelayState.RECONNECTING);
        if (!(await delay(this.retryDelayMs, this.abort.signal))) {
          return;
        }
        outcome = await this.connectUpstream();
        continue;
      }

      this.transition(RelayState.ACTIVE);
      const link = this.upstream.link;
      if (link) {
        await this.pumpTranscripts(link);
      }
      if (this.terminated) {
        return;
      }

      this.transition(RelayState.RECONNECTING);
      await this.releaseUpstream();
      if (!(await delay(this.backoffMs, this.abort.signal))) {
        return;
      }
      outcome = await this.connectUpstream();
    }
  }

  private async connectUpstream(): Promise<ConnectOutcome> {
    let link: UpstreamLink;
    try {
      link = await this.connector.connect(this.abort.signal);
    } catch (err) {
      if (this.terminated) {
        return "cancelled";
      }
      if (err instanceof AuthError) {
        this.logger.error(`Session ${this.sessionId}: ${err.message}`);
        this.notify({ error: "missing_upstream_credential", detail: err.message });
        return "fatal";
      }
      this.logger.warn(`Session ${this.sessionId}: upstream connect failed: ${describeError(err)}`);
      this.notify({ error: "upstream_connect_error", detail: describeError(err) });
      return "failed";
    }

    if (this.terminated || !this.upstream.install(link)) {
      await this.closeQuietly(link);
      return "cancelled";
    }
    this.logger.info(`Session ${this.sessionId}: upstream connected`);
    this.notify({ status: "upstream_connected" });
    return "connected";
  }

  private async pumpTranscripts(link: UpstreamLink): Promise<void> {
    try {
      for await (const event of link.events()) {
        if (this.terminated) {
          return;
        }
        this.relayTranscript(event);
      }
      if (this.terminated) {
        return;
      }
      this.notify({ error: "upstream_recv_error", detail: link.closeReason ?? "upstream stream ended" });
    } catch (err) {
      if (this.terminated) {
        return;
      }
      this.logger.warn(`Session ${this.sessionId}: upstream receive failed: ${describeError(err)}`);
      this.notify({ error: "upstream_recv_error", detail: describeError(err) });
    }
  }

  private relayTranscript(event: TranscriptEvent): void {
    if (!event.text) {
      return;
    }
    const message: TranscriptMessage =
      event.speaker === undefined
        ? { text: event.text, isFinal: event.isFinal }
        : { text: event.text, isFinal: event.isFinal, speaker: event.speaker };
    this.store.append(this.sessionId, message);
    this.notify(toClientEvent(message));
  }

  private async releaseUpstream(): Promise<void> {
    const link = this.upstream.release();
    if (link) {
      await this.closeQuietly(link);
    }
  }

  // ── Sender pump ───────────────────────────────────────────────────────────────

  private async runSender(): Promise<void> {
    try {
      for await (const frame of this.client.frames()) {
        if (this.terminated) {
          return;
        }
        const audio = frame.kind === "audio" ? frame.data : this.decodeLegacyFrame(frame.text);
        if (audio && audio.length > 0) {
          this.forwardAudio(audio);
        }
      }
      if (!this.terminated) {
        this.logger.info(`Session ${this.sessionId}: client disconnected`);
      }
    } catch (err) {
      if (!this.terminated) {
        this.logger.warn(`Session ${this.sessionId}: client receive failed: ${describeError(err)}`);
      }
    }
  }

  private decodeLegacyFrame(text: string): Buffer | null {
    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch {
      this.logger.debug(`Session ${this.sessionId}: ignored non-JSON text frame`);
      return null;
    }
    const parsed = legacyAudioFrameSchema.safeParse(payload);
    if (!parsed.success) {
      this.logger.debug(`Session ${this.sessionId}: ignored text frame without audio`);
      return null;
    }
    return Buffer.from(parsed.data.audio, "base64");
  }

  /** Audio arriving while no upstream connection is live is dropped. */
  private forwardAudio(chunk: Buffer): void {
    const link = this.upstream.link;
    if (!link || !link.isOpen) {
      return;
    }
    try {
      link.send(chunk);
    } catch (err) {
      this.notify({ error: "upstream_send_error", detail: describeError(err) });
    }
  }

  // ── Teardown ──────────────────────────────────────────────────────────────────

  /** Closes both connections independently. Failures are recorded and logged, never thrown. */
  private async closeConnections(): Promise<void> {
    const link = this.upstream.seal();
    const results = await Promise.allSettled([
      link ? link.close() : Promise.resolve(),
      Promise.resolve().then(() => this.client.close()),
    ]);
    for (const result of results) {
      if (result.status === "rejected") {
        const reason = describeError(result.reason);
        this._closeFailures.push(reason);
        this.logger.warn(`Session ${this.sessionId}: close failed during teardown: ${reason}`);
      }
    }
  }

  private async closeQuietly(link: UpstreamLink): Promise<void> {
    try {
      await link.close();
    } catch (err) {
      this.logger.warn(`Session ${this.sessionId}: upstream close failed: ${describeError(err)}`);
    }
  }

  // ── Helpers ───────────────────────────────────────────────────────────────────

  private notify(message: ServerMessage): void {
    if (!this.terminated && this.client.isOpen) {
      this.client.send(message);
    }
  }

  private transition(next: RelayState): void {
    const previous = this._state;
    if (previous === next) {
      return;
    }
    const allowed = VALID_TRANSITIONS.get(previous) ?? [];
    if (!allowed.includes(next)) {
      throw new Error(`Invalid relay state transition: ${previous} → ${next}`);
    }
    this._state = next;
    this.logger.debug(`Session ${this.sessionId}: ${previous} → ${next}`);
    this.onStateChange?.(next, previous);
  }
}
