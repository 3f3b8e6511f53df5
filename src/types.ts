// Transcript Relay - Shared TypeScript interfaces and types
//
// Wire shapes for the browser-facing WebSocket, the stored transcript model,
// and the Relay Session state machine.

// ─── Relay Session State Machine ────────────────────────────────────────────────

export enum RelayState {
  INITIALIZING = "initializing",
  CONNECTING = "connecting",
  ACTIVE = "active",
  RECONNECTING = "reconnecting",
  TERMINATED = "terminated",
}

// ─── Transcript Model ───────────────────────────────────────────────────────────

/**
 * One transcript result as stored for a session. Both interim and final
 * results are retained, in arrival order.
 */
export interface TranscriptMessage {
  readonly text: string;
  readonly isFinal: boolean;
  readonly speaker?: string;
}

/** A decoded upstream transcription result. `text` may be empty (silence, metadata). */
export interface TranscriptEvent {
  text: string;
  isFinal: boolean;
  speaker?: string;
}

// ─── Async Utilities ────────────────────────────────────────────────────────────

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

// ─── Client Frames (browser → server) ───────────────────────────────────────────

/**
 * Inbound frame from the browser. Binary frames carry raw PCM16 mono audio;
 * text frames are the legacy `{"audio": "<base64>"}` JSON envelope.
 */
export type ClientFrame =
  | { kind: "audio"; data: Buffer }
  | { kind: "text"; text: string };

// ─── Server Messages (server → browser) ─────────────────────────────────────────

export type RelayStatus = "connecting_upstream" | "upstream_connected";

export type RelayErrorCode =
  | "missing_upstream_credential"
  | "upstream_connect_error"
  | "upstream_recv_error"
  | "upstream_send_error";

export interface StatusMessage {
  status: RelayStatus;
}

export interface TranscriptUpdateMessage {
  transcript: string;
  is_final: boolean;
  speaker?: string;
}

export interface ErrorMessage {
  error: RelayErrorCode;
  detail?: string;
}

export type ServerMessage = StatusMessage | TranscriptUpdateMessage | ErrorMessage;

// ─── Summarization ──────────────────────────────────────────────────────────────

export type SummarySource = "external" | "local";

export interface SummaryResult {
  summary: string;
  source: SummarySource;
}

export interface SummaryResponse extends SummaryResult {
  sessionId: string;
}
